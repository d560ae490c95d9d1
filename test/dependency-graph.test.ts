import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import {
  blockedNodes,
  createDependencyGraph,
  downstreamOf,
  isDrained,
  readyIds,
  topologicalOrder,
  validate,
} from "../src/graph/dependency-graph.js";
import type { WorkflowNode } from "../src/workflow/types.js";

const node = (id: string, dependencies: string[] = []): WorkflowNode => ({ id, dependencies, image: `${id}.wasm` });

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

const diamond = [node("a"), node("b", ["a"]), node("c", ["a"]), node("d", ["b", "c"])];

describe("createDependencyGraph", () => {
  it("indexes nodes and derives dependents", () => {
    const graph = createDependencyGraph(diamond);
    expect(graph.byId.get("d")?.dependencies).toEqual(["b", "c"]);
    expect(graph.dependents.get("a")).toEqual(["b", "c"]);
    expect(graph.dependents.get("d")).toBeUndefined();
  });

  it("rejects duplicate ids", () => {
    const err = captureError(() => createDependencyGraph([node("a"), node("a")]));
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ code: "DUPLICATE_NODE", message: 'Duplicate node id "a"' });
  });

  it("keeps dangling dependencies without failing", () => {
    const graph = createDependencyGraph([node("a", ["ghost"])]);
    expect(graph.dependents.get("ghost")).toEqual(["a"]);
  });
});

describe("readyIds", () => {
  it("returns roots first, in workflow order", () => {
    const graph = createDependencyGraph(diamond);
    expect(readyIds(graph, new Set(["a", "b", "c", "d"]), new Set())).toEqual(["a"]);
  });

  it("requires every dependency to be completed", () => {
    const graph = createDependencyGraph(diamond);
    expect(readyIds(graph, new Set(["c", "d"]), new Set(["a", "b"]))).toEqual(["c"]);
    expect(readyIds(graph, new Set(["d"]), new Set(["a", "b", "c"]))).toEqual(["d"]);
  });

  it("skips nodes that are no longer pending", () => {
    const graph = createDependencyGraph([node("x"), node("y")]);
    expect(readyIds(graph, new Set(["y"]), new Set())).toEqual(["y"]);
  });
});

describe("isDrained", () => {
  it("is true only when nothing is pending or running", () => {
    expect(isDrained(new Set(), new Set())).toBe(true);
    expect(isDrained(new Set(["a"]), new Set())).toBe(false);
    expect(isDrained(new Set(), new Set(["a"]))).toBe(false);
  });
});

describe("blockedNodes", () => {
  it("lists unmet and unknown dependencies", () => {
    const graph = createDependencyGraph([node("a"), node("b", ["a", "ghost"])]);
    expect(blockedNodes(graph, new Set(["b"]), new Set(["a"]))).toEqual([
      { id: "b", unmet: ["ghost"], missing: ["ghost"] },
    ]);
  });

  it("reports cycle members waiting on each other", () => {
    const graph = createDependencyGraph([node("a", ["b"]), node("b", ["a"])]);
    expect(blockedNodes(graph, new Set(["a", "b"]), new Set())).toEqual([
      { id: "a", unmet: ["b"], missing: [] },
      { id: "b", unmet: ["a"], missing: [] },
    ]);
  });
});

describe("downstreamOf", () => {
  it("walks transitive dependents breadth-first", () => {
    const graph = createDependencyGraph(diamond);
    expect(downstreamOf(graph, "a")).toEqual(["b", "c", "d"]);
    expect(downstreamOf(graph, "c")).toEqual(["d"]);
    expect(downstreamOf(graph, "d")).toEqual([]);
  });
});

describe("validate", () => {
  it("accepts a well-formed graph", () => {
    expect(() => validate(createDependencyGraph(diamond))).not.toThrow();
  });

  it("rejects self-dependencies", () => {
    expect(() => validate(createDependencyGraph([node("a", ["a"])]))).toThrow('Node "a" depends on itself');
  });

  it("rejects unknown dependencies", () => {
    expect(() => validate(createDependencyGraph([node("a", ["x"])]))).toThrow(
      'Node "a" depends on unknown node "x"',
    );
  });

  it("rejects cycles and names the path", () => {
    const graph = createDependencyGraph([node("a", ["c"]), node("b", ["a"]), node("c", ["b"])]);
    expect(() => validate(graph)).toThrow("Workflow contains a cycle: a -> b -> c -> a");
  });
});

describe("topologicalOrder", () => {
  it("puts every dependency before its dependents", () => {
    const graph = createDependencyGraph([node("d", ["b", "c"]), node("c", ["a"]), node("b", ["a"]), node("a")]);
    expect(topologicalOrder(graph)).toEqual(["a", "b", "c", "d"]);
  });
});
