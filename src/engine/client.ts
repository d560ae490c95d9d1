export type EngineRequest = {
  taskId: string;
  parentTaskIds: string[];
  /** Absolute path of the artifact the engine runs. */
  artifactPath: string;
  /** Payload built by the dispatcher's payload strategy. */
  input: Record<string, unknown>;
};

export type EngineResponse =
  | { ok: true; output: string; exitCode?: number }
  | { ok: false; diagnostic: string; exitCode?: number };

export type SubmitOptions = {
  /** Fires on timeout or run teardown. Clients should stop work when it does. */
  signal?: AbortSignal;
};

/**
 * The only seam between the scheduler and the engine that performs a node's
 * work: submit one task, get one result.
 */
export interface EngineClient {
  readonly name: string;
  readonly kind: "cli" | "http" | "ws" | "function" | string;

  submit(request: EngineRequest, opts?: SubmitOptions): Promise<EngineResponse>;
  healthCheck?(): Promise<boolean>;
  close?(): Promise<void> | void;
}
