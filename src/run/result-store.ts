import { DuplicateWriteError, MissingDependencyError } from "../errors.js";

export type ResultEntry = {
  nodeId: string;
  content: string;
  status: "success";
  completedAt: number;
};

/** Append-only results of completed nodes, keyed by node id. */
export class ResultStore {
  private entries = new Map<string, ResultEntry>();

  put(nodeId: string, content: string, completedAt = Date.now()): ResultEntry {
    if (this.entries.has(nodeId)) {
      throw new DuplicateWriteError(nodeId);
    }
    const entry: ResultEntry = { nodeId, content, status: "success", completedAt };
    this.entries.set(nodeId, entry);
    return entry;
  }

  get(nodeId: string): ResultEntry | undefined {
    return this.entries.get(nodeId);
  }

  has(nodeId: string): boolean {
    return this.entries.has(nodeId);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Resolved outputs for exactly the given dependency ids. */
  getUpstream(dependencyIds: readonly string[]): Record<string, string> {
    const upstream: Record<string, string> = {};
    for (const id of dependencyIds) {
      const entry = this.entries.get(id);
      if (!entry) throw new MissingDependencyError(id);
      upstream[id] = entry.content;
    }
    return upstream;
  }

  /** node id → content, in completion order. */
  toRecord(): Record<string, string> {
    return Object.fromEntries([...this.entries.values()].map((e) => [e.nodeId, e.content]));
  }
}
