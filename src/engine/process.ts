import { spawn } from "node:child_process";
import { EngineError } from "../errors.js";

export type ProcessResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type RunProcessOptions = {
  cwd?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
};

export type ProcessRunner = (command: string, args: string[], opts: RunProcessOptions) => Promise<ProcessResult>;

/** Spawn a command and collect its output. The child is killed when `signal` aborts. */
export const runProcess: ProcessRunner = (command, args, opts) =>
  new Promise((resolve, reject) => {
    if (opts.signal?.aborted) {
      reject(new EngineError("RUN_CANCELLED", `Not starting "${command}": aborted`));
      return;
    }

    const child = spawn(command, args, {
      cwd: opts.cwd,
      env: { ...process.env, ...opts.env },
    });

    let stdout = "";
    let stderr = "";
    let aborted = false;

    const onAbort = () => {
      aborted = true;
      child.kill("SIGKILL");
    };
    opts.signal?.addEventListener("abort", onAbort, { once: true });

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (err: NodeJS.ErrnoException) => {
      opts.signal?.removeEventListener("abort", onAbort);
      if (err.code === "ENOENT") {
        reject(new EngineError("ENGINE_UNAVAILABLE", `Command "${command}" not found. Add it to PATH or set engine.command.`));
      } else {
        reject(new EngineError("ENGINE_EXCEPTION", `Failed to run "${command}": ${err.message}`));
      }
    });

    child.on("close", (code: number | null) => {
      opts.signal?.removeEventListener("abort", onAbort);
      if (aborted) {
        reject(new EngineError("RUN_CANCELLED", `"${command}" was killed after abort`));
        return;
      }
      resolve({ exitCode: code ?? -1, stdout, stderr });
    });
  });
