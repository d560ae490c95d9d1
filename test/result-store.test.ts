import { describe, expect, it } from "vitest";
import { DuplicateWriteError, MissingDependencyError } from "../src/errors.js";
import { ResultStore } from "../src/run/result-store.js";

describe("ResultStore", () => {
  it("records and reads back results", () => {
    const store = new ResultStore();
    const entry = store.put("a", "alpha", 1000);

    expect(entry).toEqual({ nodeId: "a", content: "alpha", status: "success", completedAt: 1000 });
    expect(store.get("a")).toEqual(entry);
    expect(store.has("a")).toBe(true);
    expect(store.has("b")).toBe(false);
    expect(store.size).toBe(1);
  });

  it("refuses a second write for the same node", () => {
    const store = new ResultStore();
    store.put("a", "first");

    expect(() => store.put("a", "second")).toThrow(DuplicateWriteError);
    expect(store.get("a")?.content).toBe("first");
  });

  it("resolves exactly the requested upstream ids", () => {
    const store = new ResultStore();
    store.put("a", "alpha");
    store.put("b", "beta");
    store.put("c", "gamma");

    expect(store.getUpstream(["c", "a"])).toEqual({ c: "gamma", a: "alpha" });
    expect(store.getUpstream([])).toEqual({});
  });

  it("throws when an upstream id has no result", () => {
    const store = new ResultStore();
    store.put("a", "alpha");

    expect(() => store.getUpstream(["a", "b"])).toThrow(MissingDependencyError);
    expect(() => store.getUpstream(["b"])).toThrow('Dependency "b" has no recorded result');
  });

  it("exports results in completion order", () => {
    const store = new ResultStore();
    store.put("z", "last-id-first");
    store.put("a", "second");

    expect(Object.keys(store.toRecord())).toEqual(["z", "a"]);
  });
});
