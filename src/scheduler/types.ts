import type { BlockedNode, ErrorCode } from "../errors.js";
import type { NodeOutcome } from "../dispatcher/dispatcher.js";

export type RunStatus = "completed" | "failed" | "deadlock" | "cancelled";

export type RunOptions = {
  /** Reuse a run id instead of generating one. */
  runId?: string;
  maxConcurrency?: number;
  /** Abort in-flight nodes once the run has failed (default: scheduler.cancelInFlight). */
  cancelInFlight?: boolean;
  abortSignal?: AbortSignal;
  onNodeStart?: (nodeId: string, taskId: string) => void;
  onNodeEnd?: (nodeId: string, outcome: NodeOutcome) => void;
  onDeadlock?: (blocked: BlockedNode[]) => void;
};

export type RunReport = {
  runId: string;
  workflow: string;
  status: RunStatus;
  completed: boolean;
  /** Node whose failure ended the run. */
  failingNode?: string;
  error?: { code: ErrorCode; message: string };
  /** Deadlock diagnostics. */
  blocked?: BlockedNode[];
  /** Every dispatched node, in completion order. */
  nodes: NodeOutcome[];
  /** node id → normalized output for completed nodes. */
  results: Record<string, string>;
  /** Nodes never dispatched. */
  notStarted: string[];
  /** Transitive dependents of the failing node. */
  blockedByFailure: string[];
  startedAt: number;
  finishedAt: number;
  wallTimeMs: number;
};
