import type { BlockedNode } from "../errors.js";
import { ValidationError } from "../errors.js";
import type { WorkflowNode } from "../workflow/types.js";

export type DependencyGraph = {
  /** Nodes in workflow order. */
  readonly nodes: readonly WorkflowNode[];
  readonly byId: ReadonlyMap<string, WorkflowNode>;
  /** node id → ids of the nodes that depend on it */
  readonly dependents: ReadonlyMap<string, readonly string[]>;
};

/** Build the graph once per run. Dangling dependencies are kept as-is. */
export function createDependencyGraph(nodes: readonly WorkflowNode[]): DependencyGraph {
  const byId = new Map<string, WorkflowNode>();
  for (const node of nodes) {
    if (byId.has(node.id)) {
      throw new ValidationError("DUPLICATE_NODE", `Duplicate node id "${node.id}"`, { nodeId: node.id });
    }
    byId.set(node.id, node);
  }

  const dependents = new Map<string, string[]>();
  for (const node of nodes) {
    for (const dep of node.dependencies) {
      const list = dependents.get(dep) ?? [];
      list.push(node.id);
      dependents.set(dep, list);
    }
  }

  return { nodes, byId, dependents };
}

/** Pending node ids whose dependencies are all completed, in workflow order. */
export function readyIds(
  graph: DependencyGraph,
  pending: ReadonlySet<string>,
  completed: ReadonlySet<string>,
): string[] {
  return graph.nodes
    .filter((n) => pending.has(n.id) && n.dependencies.every((d) => completed.has(d)))
    .map((n) => n.id);
}

export function isDrained(pending: ReadonlySet<string>, running: ReadonlySet<string>): boolean {
  return pending.size === 0 && running.size === 0;
}

/** Describe why each pending node cannot run. */
export function blockedNodes(
  graph: DependencyGraph,
  pending: ReadonlySet<string>,
  completed: ReadonlySet<string>,
): BlockedNode[] {
  return graph.nodes
    .filter((n) => pending.has(n.id))
    .map((n) => {
      const unmet = n.dependencies.filter((d) => !completed.has(d));
      return {
        id: n.id,
        unmet,
        missing: unmet.filter((d) => !graph.byId.has(d)),
      };
    });
}

/** Transitive dependents of a node, breadth-first. */
export function downstreamOf(graph: DependencyGraph, nodeId: string): string[] {
  const queue = [...(graph.dependents.get(nodeId) ?? [])];
  const visited = new Set<string>();
  const order: string[] = [];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);
    order.push(id);
    queue.push(...(graph.dependents.get(id) ?? []));
  }

  return order;
}

/** Eager validation: unknown dependencies, self-dependencies and cycles. */
export function validate(graph: DependencyGraph): void {
  for (const node of graph.nodes) {
    if (node.dependencies.includes(node.id)) {
      throw new ValidationError("SELF_DEPENDENCY", `Node "${node.id}" depends on itself`, { nodeId: node.id });
    }
    for (const dep of node.dependencies) {
      if (!graph.byId.has(dep)) {
        throw new ValidationError(
          "UNKNOWN_DEPENDENCY",
          `Node "${node.id}" depends on unknown node "${dep}"`,
          { nodeId: node.id, dependency: dep },
        );
      }
    }
  }

  const cycle = findCycle(graph);
  if (cycle) {
    throw new ValidationError("CYCLE_DETECTED", `Workflow contains a cycle: ${cycle.join(" -> ")}`, { cycle });
  }
}

const WHITE = 0, GRAY = 1, BLACK = 2;

/** DFS with coloring over dependent edges. Returns the first cycle found. */
function findCycle(graph: DependencyGraph): string[] | undefined {
  const color = new Map<string, number>();
  for (const node of graph.nodes) color.set(node.id, WHITE);
  const stack: string[] = [];

  function dfs(id: string): string[] | undefined {
    color.set(id, GRAY);
    stack.push(id);
    for (const next of graph.dependents.get(id) ?? []) {
      const c = color.get(next);
      if (c === GRAY) return [...stack.slice(stack.indexOf(next)), next];
      if (c === WHITE) {
        const found = dfs(next);
        if (found) return found;
      }
    }
    stack.pop();
    color.set(id, BLACK);
    return undefined;
  }

  for (const node of graph.nodes) {
    if (color.get(node.id) === WHITE) {
      const found = dfs(node.id);
      if (found) return found;
    }
  }
  return undefined;
}

/** Node ids in dependency-first order. Assumes a validated graph. */
export function topologicalOrder(graph: DependencyGraph): string[] {
  const visited = new Set<string>();
  const sorted: string[] = [];

  function visit(id: string): void {
    if (visited.has(id)) return;
    visited.add(id);
    for (const dep of graph.byId.get(id)?.dependencies ?? []) {
      visit(dep);
    }
    sorted.push(id);
  }

  for (const node of graph.nodes) {
    visit(node.id);
  }

  return sorted;
}
