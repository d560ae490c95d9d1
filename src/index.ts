// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { DagflowConfig, DeepPartial, EngineKind, PayloadStrategyName, ValidationMode } from "./config.js";

// Errors
export {
  ERROR_CODES,
  DagflowError,
  ValidationError,
  ParseError,
  ConfigError,
  ArtifactNotFoundError,
  EngineError,
  DeadlockError,
  InvariantError,
  DuplicateWriteError,
  MissingDependencyError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode, BlockedNode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  WorkflowNodeSchema,
  WorkflowFileSchema,
  PayloadStrategySchema,
  EngineKindSchema,
  RunReportSchema,
} from "./schemas.js";
export type { WorkflowFile } from "./schemas.js";

// Workflow
export { createWorkflow, loadWorkflow } from "./workflow/loader.js";
export type { LoadWorkflowOptions } from "./workflow/loader.js";
export type { Workflow, WorkflowNode, NodeConfig } from "./workflow/types.js";

// Graph
export {
  createDependencyGraph,
  readyIds,
  isDrained,
  blockedNodes,
  downstreamOf,
  validate,
  topologicalOrder,
} from "./graph/dependency-graph.js";
export type { DependencyGraph } from "./graph/dependency-graph.js";

// Results
export { ResultStore } from "./run/result-store.js";
export type { ResultEntry } from "./run/result-store.js";

// Dispatcher
export { Dispatcher } from "./dispatcher/dispatcher.js";
export type { DispatchContext, DispatcherOptions, NodeOutcome, NodeStatus } from "./dispatcher/dispatcher.js";
export { lineageStrategy, contentStrategy, payloadStrategy, taskIdFor } from "./dispatcher/payload.js";
export type { PayloadContext, PayloadStrategy } from "./dispatcher/payload.js";
export { DEFAULT_CLEANUP_RULES, normalizeOutput } from "./dispatcher/normalize.js";
export type { CleanupRule, StripStrategy } from "./dispatcher/normalize.js";

// Scheduler
export { Scheduler, createRunId } from "./scheduler/scheduler.js";
export type { RunOptions, RunReport, RunStatus } from "./scheduler/types.js";

// Engine clients
export type { EngineClient, EngineRequest, EngineResponse, SubmitOptions } from "./engine/client.js";
export { CliEngineClient } from "./engine/cli-client.js";
export type { CliEngineClientOptions } from "./engine/cli-client.js";
export { HttpEngineClient } from "./engine/http-client.js";
export type { HttpEngineClientOptions } from "./engine/http-client.js";
export { WebSocketEngineClient } from "./engine/ws-client.js";
export type { WebSocketEngineClientOptions } from "./engine/ws-client.js";
export { FunctionEngineClient } from "./engine/function-client.js";
export type { EngineFunction, FunctionEngineClientOptions } from "./engine/function-client.js";
export { createEngineClient, ensureEngineReady } from "./engine/factory.js";
export { runProcess } from "./engine/process.js";
export type { ProcessResult, ProcessRunner, RunProcessOptions } from "./engine/process.js";

// Reporting
export { formatSummary, formatResults, formatBlocked, formatClock, formatSeconds, preview } from "./report/summary.js";

// Persistence
export { RunStore } from "./persistence/store.js";
export type { StoredRunSummary } from "./persistence/store.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
