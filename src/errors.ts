export const ERROR_CODES = [
  "VALIDATION_FAILED",
  "DUPLICATE_NODE",
  "UNKNOWN_DEPENDENCY",
  "SELF_DEPENDENCY",
  "CYCLE_DETECTED",
  "WORKFLOW_NOT_FOUND",
  "PARSE_FAILED",
  "INVALID_CONFIG",
  "ARTIFACT_NOT_FOUND",
  "ENGINE_FAILURE",
  "ENGINE_TIMEOUT",
  "ENGINE_UNAVAILABLE",
  "ENGINE_EXCEPTION",
  "DEADLOCK",
  "DUPLICATE_WRITE",
  "MISSING_DEPENDENCY",
  "RUN_CANCELLED",
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export class DagflowError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends DagflowError {}

export class ParseError extends DagflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PARSE_FAILED", message, details);
  }
}

export class ConfigError extends DagflowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_CONFIG", message, details);
  }
}

export class ArtifactNotFoundError extends DagflowError {
  readonly path: string;

  constructor(path: string) {
    super("ARTIFACT_NOT_FOUND", `Artifact not found at: ${path}`, { path });
    this.path = path;
  }
}

export class EngineError extends DagflowError {}

/** A pending node together with the dependencies that keep it from running. */
export type BlockedNode = {
  id: string;
  unmet: string[];
  /** Subset of `unmet` naming no node in the workflow. */
  missing: string[];
};

export class DeadlockError extends DagflowError {
  readonly blocked: BlockedNode[];

  constructor(blocked: BlockedNode[]) {
    const summary = blocked
      .map((b) => `${b.id} (waiting on ${b.unmet.join(", ") || "nothing"})`)
      .join("; ");
    super("DEADLOCK", `Deadlock: no node is ready. Remaining: ${summary}`, { blocked });
    this.blocked = blocked;
  }
}

/** Scheduler lifecycle violation. Never expected in a correct run. */
export class InvariantError extends DagflowError {}

export class DuplicateWriteError extends InvariantError {
  constructor(nodeId: string) {
    super("DUPLICATE_WRITE", `Result for node "${nodeId}" was already recorded`, { nodeId });
  }
}

export class MissingDependencyError extends InvariantError {
  constructor(nodeId: string) {
    super("MISSING_DEPENDENCY", `Dependency "${nodeId}" has no recorded result`, { nodeId });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
