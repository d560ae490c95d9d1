import type { PayloadStrategyName } from "../config.js";
import type { WorkflowNode } from "../workflow/types.js";

export type PayloadContext = {
  runId: string;
  node: WorkflowNode;
  taskId: string;
  parentTaskIds: string[];
  /** Dependency id → normalized output, for exactly the node's dependencies. */
  upstream: Record<string, string>;
};

export interface PayloadStrategy {
  readonly name: string;
  build(ctx: PayloadContext): Record<string, unknown>;
}

export function taskIdFor(runId: string, nodeId: string): string {
  return `${runId}_${nodeId}`;
}

/**
 * The engine resolves upstream state itself from parent task ids; only the
 * lineage and the node's own instruction travel in the payload.
 */
export const lineageStrategy: PayloadStrategy = {
  name: "lineage",
  build({ node, taskId, parentTaskIds }) {
    const payload: Record<string, unknown> = {
      task_id: taskId,
      parent_task_ids: parentTaskIds,
      prompt: node.instruction ?? "",
    };
    if (node.config) payload.config = node.config;
    return payload;
  },
};

/** Upstream outputs are passed inline, keyed by dependency id. */
export const contentStrategy: PayloadStrategy = {
  name: "content",
  build({ runId, node, upstream }) {
    const payload: Record<string, unknown> = {
      run_id: runId,
      node_id: node.id,
      input_context: node.config ?? {},
      upstream_results: upstream,
    };
    if (node.instruction !== undefined) payload.prompt = node.instruction;
    return payload;
  },
};

const STRATEGIES: Record<PayloadStrategyName, PayloadStrategy> = {
  lineage: lineageStrategy,
  content: contentStrategy,
};

export function payloadStrategy(name: PayloadStrategyName): PayloadStrategy {
  return STRATEGIES[name];
}
