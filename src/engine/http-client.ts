import { log } from "../utils/logger.js";
import type { EngineClient, EngineRequest, EngineResponse, SubmitOptions } from "./client.js";

export type HttpEngineClientOptions = {
  name?: string;
  url: string;
  headers?: Record<string, string>;
  /** Bound for healthCheck() in ms (default: 5000) */
  healthTimeout?: number;
};

/** POSTs each task to an engine endpoint; the response body is the raw output. */
export class HttpEngineClient implements EngineClient {
  readonly name: string;
  readonly kind = "http" as const;

  private url: string;
  private headers: Record<string, string>;
  private healthTimeout: number;

  constructor(opts: HttpEngineClientOptions) {
    this.name = opts.name ?? "http";
    this.url = opts.url;
    this.headers = opts.headers ?? {};
    this.healthTimeout = opts.healthTimeout ?? 5_000;
  }

  async submit(request: EngineRequest, opts?: SubmitOptions): Promise<EngineResponse> {
    log.debug(`[${this.name}] Calling ${this.url} for task "${request.taskId}"`);

    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers },
      body: JSON.stringify({
        task_id: request.taskId,
        parent_task_ids: request.parentTaskIds,
        artifact: request.artifactPath,
        input: request.input,
      }),
      signal: opts?.signal,
    });

    const body = await res.text();
    if (!res.ok) {
      return { ok: false, diagnostic: `HTTP ${res.status}: ${body}`, exitCode: res.status };
    }
    return { ok: true, output: body };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(this.url, {
        method: "HEAD",
        signal: AbortSignal.timeout(this.healthTimeout),
      });
      return res.ok;
    } catch (err) {
      log.debug(`[${this.name}] Health check failed`, { error: String(err) });
      return false;
    }
  }
}
