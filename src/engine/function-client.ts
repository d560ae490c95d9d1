import { log } from "../utils/logger.js";
import type { EngineClient, EngineRequest, EngineResponse, SubmitOptions } from "./client.js";

/**
 * In-process engine. Returning a string is a successful response; returning
 * an EngineResponse lets the function report an engine-side failure. A throw
 * propagates to the caller.
 */
export type EngineFunction = (
  request: EngineRequest,
  context: { signal?: AbortSignal },
) => Promise<string | EngineResponse>;

export type FunctionEngineClientOptions = {
  name?: string;
  fn: EngineFunction;
};

export class FunctionEngineClient implements EngineClient {
  readonly name: string;
  readonly kind = "function" as const;

  private fn: EngineFunction;

  constructor(opts: FunctionEngineClientOptions) {
    this.name = opts.name ?? "function";
    this.fn = opts.fn;
  }

  async submit(request: EngineRequest, opts?: SubmitOptions): Promise<EngineResponse> {
    log.debug(`[${this.name}] Running function for task "${request.taskId}"`);
    const result = await this.fn(request, { signal: opts?.signal });
    return typeof result === "string" ? { ok: true, output: result } : result;
  }
}
