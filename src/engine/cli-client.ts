import { getConfig } from "../config.js";
import { log } from "../utils/logger.js";
import type { EngineClient, EngineRequest, EngineResponse, SubmitOptions } from "./client.js";
import { runProcess } from "./process.js";
import type { ProcessRunner } from "./process.js";

export type CliEngineClientOptions = {
  name?: string;
  /** Engine CLI binary (default: engine.command from config). */
  command?: string;
  /** Extra environment for the engine process (merged over engine.env). */
  env?: Record<string, string>;
  cwd?: string;
  runner?: ProcessRunner;
};

/**
 * Runs one engine CLI process per task:
 * `<command> submit <artifact> -- --input <json>`.
 */
export class CliEngineClient implements EngineClient {
  readonly name: string;
  readonly kind = "cli" as const;

  private command: string;
  private env: Record<string, string>;
  private cwd?: string;
  private runner: ProcessRunner;

  constructor(opts?: CliEngineClientOptions) {
    const cfg = getConfig().engine;
    this.name = opts?.name ?? "cli";
    this.command = opts?.command ?? cfg.command;
    this.env = { ...cfg.env, ...opts?.env };
    this.cwd = opts?.cwd;
    this.runner = opts?.runner ?? runProcess;
  }

  buildArgs(request: EngineRequest): string[] {
    return ["submit", request.artifactPath, "--", "--input", JSON.stringify(request.input)];
  }

  async submit(request: EngineRequest, opts?: SubmitOptions): Promise<EngineResponse> {
    log.debug(`[${this.name}] Submitting task "${request.taskId}"`, { artifact: request.artifactPath });

    const result = await this.runner(this.command, this.buildArgs(request), {
      cwd: this.cwd,
      env: this.env,
      signal: opts?.signal,
    });

    if (result.exitCode !== 0) {
      if (result.stderr.includes("Connection refused")) {
        log.warn(`[${this.name}] Engine refused the connection. Is the engine server running?`);
      }
      return { ok: false, diagnostic: result.stderr, exitCode: result.exitCode };
    }
    return { ok: true, output: result.stdout, exitCode: 0 };
  }
}
