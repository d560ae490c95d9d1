import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import type { BlockedNode, ErrorCode } from "../errors.js";
import { ConfigError, DeadlockError, errorMessage } from "../errors.js";
import type { DispatchContext, Dispatcher, NodeOutcome } from "../dispatcher/dispatcher.js";
import { taskIdFor } from "../dispatcher/payload.js";
import {
  blockedNodes,
  createDependencyGraph,
  downstreamOf,
  isDrained,
  readyIds,
} from "../graph/dependency-graph.js";
import { ResultStore } from "../run/result-store.js";
import { log } from "../utils/logger.js";
import type { Workflow, WorkflowNode } from "../workflow/types.js";
import type { RunOptions, RunReport, RunStatus } from "./types.js";

type Completion = { nodeId: string; outcome: NodeOutcome };

type Stop = {
  status: Exclude<RunStatus, "completed">;
  failingNode?: string;
  error: { code: ErrorCode; message: string };
  blocked?: BlockedNode[];
};

export function createRunId(): string {
  return `run_${randomUUID().replace(/-/g, "").slice(0, 8)}`;
}

/**
 * Drives one workflow run: dispatches ready nodes into a fixed number of
 * slots, consumes completions in arrival order and stops at the first
 * failure or deadlock. All run state is owned and mutated here only.
 */
export class Scheduler {
  private dispatcher: Dispatcher;

  constructor(dispatcher: Dispatcher) {
    this.dispatcher = dispatcher;
  }

  async run(workflow: Workflow, opts?: RunOptions): Promise<RunReport> {
    const startedAt = Date.now();
    const cfg = getConfig();
    const runId = opts?.runId ?? createRunId();
    const maxConcurrency = opts?.maxConcurrency ?? cfg.limits.maxConcurrency;
    const cancelInFlight = opts?.cancelInFlight ?? cfg.scheduler.cancelInFlight;

    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new ConfigError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }

    const graph = createDependencyGraph(workflow.nodes);
    const pending = new Set(workflow.nodes.map((n) => n.id));
    const running = new Set<string>();
    const completed = new Set<string>();
    const store = new ResultStore();
    const outcomes: NodeOutcome[] = [];
    const inFlight = new Map<string, Promise<Completion>>();

    const teardown = new AbortController();
    const onExternalAbort = () => teardown.abort();
    opts?.abortSignal?.addEventListener("abort", onExternalAbort, { once: true });

    const record = (outcome: NodeOutcome) => {
      running.delete(outcome.nodeId);
      outcomes.push(outcome);
      opts?.onNodeEnd?.(outcome.nodeId, outcome);
      if (outcome.status === "Success") {
        store.put(outcome.nodeId, outcome.output ?? "", outcome.finishedAt);
        completed.add(outcome.nodeId);
        log.info(`Node "${outcome.nodeId}" finished in ${(outcome.durationMs / 1000).toFixed(2)}s`);
      }
    };

    let stop: Stop | undefined;
    log.info(`Starting workflow "${workflow.name}"`, { runId, nodes: pending.size, maxConcurrency });

    try {
      while (!isDrained(pending, running)) {
        if (opts?.abortSignal?.aborted) {
          stop = cancelledStop();
          break;
        }

        for (const id of readyIds(graph, pending, completed)) {
          if (running.size >= maxConcurrency) break;
          const node = graph.byId.get(id);
          if (!node) continue;

          const upstream = store.getUpstream(node.dependencies);
          pending.delete(id);
          running.add(id);

          const taskId = taskIdFor(runId, id);
          log.info(`Dispatching "${id}"`, { taskId });
          opts?.onNodeStart?.(id, taskId);
          inFlight.set(
            id,
            this.launch(node, { runId, baseDir: workflow.baseDir, upstream, signal: teardown.signal }),
          );
        }

        if (running.size === 0) {
          const blocked = blockedNodes(graph, pending, completed);
          const err = new DeadlockError(blocked);
          log.error(err.message, { runId });
          opts?.onDeadlock?.(blocked);
          stop = { status: "deadlock", error: { code: err.code, message: err.message }, blocked };
          break;
        }

        const { nodeId, outcome } = await Promise.race(inFlight.values());
        inFlight.delete(nodeId);
        record(outcome);

        if (outcome.status !== "Success") {
          if (opts?.abortSignal?.aborted) {
            stop = cancelledStop();
          } else {
            log.error(`Aborting workflow due to failure in "${nodeId}"`, {
              status: outcome.status,
              diagnostic: outcome.diagnostic,
            });
            stop = {
              status: "failed",
              failingNode: nodeId,
              error: {
                code: outcome.errorCode ?? "ENGINE_FAILURE",
                message: outcome.diagnostic ?? `Node "${nodeId}" ended with status ${outcome.status}`,
              },
            };
          }
          break;
        }
      }

      if (inFlight.size > 0) {
        if (cancelInFlight) {
          log.info(`Cancelling ${inFlight.size} in-flight node(s)`);
          teardown.abort();
        } else {
          log.info(`Waiting for ${inFlight.size} in-flight node(s) to finish`);
        }
        const rest = await Promise.all(inFlight.values());
        inFlight.clear();
        for (const { outcome } of rest) record(outcome);
      }
    } finally {
      opts?.abortSignal?.removeEventListener("abort", onExternalAbort);
      if (inFlight.size > 0) teardown.abort();
    }

    const finishedAt = Date.now();
    const report: RunReport = {
      runId,
      workflow: workflow.name,
      status: stop?.status ?? "completed",
      completed: stop === undefined,
      failingNode: stop?.failingNode,
      error: stop?.error,
      blocked: stop?.blocked,
      nodes: outcomes,
      results: store.toRecord(),
      notStarted: workflow.nodes.filter((n) => pending.has(n.id)).map((n) => n.id),
      blockedByFailure: stop?.failingNode ? downstreamOf(graph, stop.failingNode) : [],
      startedAt,
      finishedAt,
      wallTimeMs: finishedAt - startedAt,
    };

    if (report.completed) {
      log.info(`Workflow "${workflow.name}" completed`, { runId, wallTimeMs: report.wallTimeMs });
    }
    return report;
  }

  private launch(node: WorkflowNode, ctx: DispatchContext): Promise<Completion> {
    const startedAt = Date.now();
    return this.dispatcher.dispatch(node, ctx).then(
      (outcome): Completion => ({ nodeId: node.id, outcome }),
      (err: unknown): Completion => {
        const finishedAt = Date.now();
        return {
          nodeId: node.id,
          outcome: {
            nodeId: node.id,
            taskId: taskIdFor(ctx.runId, node.id),
            status: "Exception",
            startedAt,
            finishedAt,
            durationMs: finishedAt - startedAt,
            parentTaskIds: node.dependencies.map((dep) => taskIdFor(ctx.runId, dep)),
            upstreamIds: Object.keys(ctx.upstream),
            diagnostic: errorMessage(err),
            errorCode: "ENGINE_EXCEPTION",
          },
        };
      },
    );
  }
}

function cancelledStop(): Stop {
  return { status: "cancelled", error: { code: "RUN_CANCELLED", message: "Run cancelled" } };
}
