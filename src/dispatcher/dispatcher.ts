import { access } from "node:fs/promises";
import { resolve } from "node:path";
import { getConfig } from "../config.js";
import type { ErrorCode } from "../errors.js";
import { ArtifactNotFoundError, DagflowError, errorMessage } from "../errors.js";
import type { EngineClient, EngineRequest, EngineResponse } from "../engine/client.js";
import { log } from "../utils/logger.js";
import type { WorkflowNode } from "../workflow/types.js";
import { DEFAULT_CLEANUP_RULES, normalizeOutput } from "./normalize.js";
import type { CleanupRule } from "./normalize.js";
import { payloadStrategy, taskIdFor } from "./payload.js";
import type { PayloadStrategy } from "./payload.js";

export type NodeStatus = "Success" | "Failed" | "Timeout" | "Exception" | "Cancelled";

export type NodeOutcome = {
  nodeId: string;
  taskId: string;
  status: NodeStatus;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
  parentTaskIds: string[];
  /** Dependency ids whose outputs were resolved for this node. */
  upstreamIds: string[];
  /** Normalized engine output (Success only). */
  output?: string;
  /** Engine or client diagnostic text (non-success only). */
  diagnostic?: string;
  errorCode?: ErrorCode;
};

export type DispatchContext = {
  runId: string;
  baseDir: string;
  upstream: Record<string, string>;
  /** Run teardown signal. */
  signal?: AbortSignal;
};

export type DispatcherOptions = {
  engine: EngineClient;
  strategy?: PayloadStrategy;
  /** Per-node bound in ms; 0 disables it (default: timeouts.engine from config). */
  timeoutMs?: number;
  cleanupRules?: readonly CleanupRule[];
};

type Settled =
  | { kind: "response"; response: EngineResponse }
  | { kind: "timeout" }
  | { kind: "cancelled" };

/** Executes one node against the engine. Holds no scheduler state. */
export class Dispatcher {
  readonly engine: EngineClient;
  readonly strategy: PayloadStrategy;

  private timeoutMs: number;
  private cleanupRules: readonly CleanupRule[];

  constructor(opts: DispatcherOptions) {
    const cfg = getConfig();
    this.engine = opts.engine;
    this.strategy = opts.strategy ?? payloadStrategy(cfg.scheduler.payloadStrategy);
    this.timeoutMs = opts.timeoutMs ?? cfg.timeouts.engine;
    this.cleanupRules = opts.cleanupRules ?? DEFAULT_CLEANUP_RULES;
  }

  async dispatch(node: WorkflowNode, ctx: DispatchContext): Promise<NodeOutcome> {
    const startedAt = Date.now();
    const taskId = taskIdFor(ctx.runId, node.id);
    const parentTaskIds = node.dependencies.map((dep) => taskIdFor(ctx.runId, dep));

    const finish = (fields: Pick<NodeOutcome, "status" | "output" | "diagnostic" | "errorCode">): NodeOutcome => {
      const finishedAt = Date.now();
      return {
        nodeId: node.id,
        taskId,
        parentTaskIds,
        upstreamIds: Object.keys(ctx.upstream),
        startedAt,
        finishedAt,
        durationMs: finishedAt - startedAt,
        ...fields,
      };
    };

    const artifactPath = resolve(ctx.baseDir, node.image);
    try {
      await access(artifactPath);
    } catch {
      const err = new ArtifactNotFoundError(artifactPath);
      log.error(`[${node.id}] ${err.message}`);
      return finish({ status: "Failed", diagnostic: err.message, errorCode: err.code });
    }

    const input = this.strategy.build({ runId: ctx.runId, node, taskId, parentTaskIds, upstream: ctx.upstream });

    let settled: Settled;
    try {
      settled = await this.invoke({ taskId, parentTaskIds, artifactPath, input }, ctx.signal);
    } catch (err) {
      if (ctx.signal?.aborted) {
        return finish({ status: "Cancelled", diagnostic: "Run aborted", errorCode: "RUN_CANCELLED" });
      }
      const code = err instanceof DagflowError ? err.code : "ENGINE_EXCEPTION";
      log.error(`[${node.id}] Engine call raised`, { error: errorMessage(err) });
      return finish({ status: "Exception", diagnostic: errorMessage(err), errorCode: code });
    }

    switch (settled.kind) {
      case "timeout":
        log.warn(`[${node.id}] Engine did not answer within ${this.timeoutMs}ms`);
        return finish({
          status: "Timeout",
          diagnostic: `Engine timed out after ${this.timeoutMs}ms`,
          errorCode: "ENGINE_TIMEOUT",
        });
      case "cancelled":
        return finish({ status: "Cancelled", diagnostic: "Run aborted", errorCode: "RUN_CANCELLED" });
      case "response": {
        const { response } = settled;
        if (!response.ok) {
          return finish({ status: "Failed", diagnostic: response.diagnostic, errorCode: "ENGINE_FAILURE" });
        }
        return finish({ status: "Success", output: normalizeOutput(response.output, this.cleanupRules) });
      }
    }
  }

  /**
   * Race the engine call against the timeout and the run signal. Whichever
   * fires first aborts the signal handed to the engine client.
   */
  private invoke(
    request: EngineRequest,
    runSignal?: AbortSignal,
  ): Promise<Settled> {
    const controller = new AbortController();

    return new Promise<Settled>((resolvePromise, rejectPromise) => {
      let done = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const settle = (fn: () => void) => {
        if (done) return;
        done = true;
        if (timer) clearTimeout(timer);
        runSignal?.removeEventListener("abort", onRunAbort);
        fn();
      };

      const onRunAbort = () => {
        settle(() => resolvePromise({ kind: "cancelled" }));
        controller.abort();
      };

      if (runSignal?.aborted) {
        onRunAbort();
        return;
      }
      runSignal?.addEventListener("abort", onRunAbort, { once: true });

      if (this.timeoutMs > 0) {
        timer = setTimeout(() => {
          settle(() => resolvePromise({ kind: "timeout" }));
          controller.abort();
        }, this.timeoutMs);
      }

      // A client that throws synchronously must still go through settle.
      void Promise.resolve()
        .then(() => this.engine.submit(request, { signal: controller.signal }))
        .then(
          (response) => settle(() => resolvePromise({ kind: "response", response })),
          (err: unknown) => settle(() => rejectPromise(err)),
        );
    });
  }
}
