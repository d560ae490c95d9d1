import { describe, expect, it } from "vitest";
import { contentStrategy, lineageStrategy, payloadStrategy, taskIdFor } from "../src/dispatcher/payload.js";
import type { PayloadContext } from "../src/dispatcher/payload.js";

const ctx = (overrides?: Partial<PayloadContext>): PayloadContext => ({
  runId: "run_00000001",
  node: { id: "summarize", dependencies: ["fetch"], image: "summarize.wasm", instruction: "Summarize it" },
  taskId: "run_00000001_summarize",
  parentTaskIds: ["run_00000001_fetch"],
  upstream: { fetch: "raw text" },
  ...overrides,
});

describe("taskIdFor", () => {
  it("joins run id and node id", () => {
    expect(taskIdFor("run_abc", "n1")).toBe("run_abc_n1");
  });
});

describe("lineageStrategy", () => {
  it("sends task lineage and the instruction", () => {
    expect(lineageStrategy.build(ctx())).toEqual({
      task_id: "run_00000001_summarize",
      parent_task_ids: ["run_00000001_fetch"],
      prompt: "Summarize it",
    });
  });

  it("includes node config when present and defaults the prompt", () => {
    const payload = lineageStrategy.build(
      ctx({ node: { id: "n", dependencies: [], image: "n.wasm", config: { temperature: 0 } } }),
    );
    expect(payload).toEqual({
      task_id: "run_00000001_summarize",
      parent_task_ids: ["run_00000001_fetch"],
      prompt: "",
      config: { temperature: 0 },
    });
  });
});

describe("contentStrategy", () => {
  it("inlines upstream outputs keyed by dependency id", () => {
    expect(contentStrategy.build(ctx())).toEqual({
      run_id: "run_00000001",
      node_id: "summarize",
      input_context: {},
      upstream_results: { fetch: "raw text" },
      prompt: "Summarize it",
    });
  });

  it("omits the prompt when the node has no instruction", () => {
    const payload = contentStrategy.build(
      ctx({ node: { id: "n", dependencies: [], image: "n.wasm", config: { k: "v" } }, upstream: {} }),
    );
    expect(payload).toEqual({ run_id: "run_00000001", node_id: "n", input_context: { k: "v" }, upstream_results: {} });
  });
});

describe("payloadStrategy", () => {
  it("looks strategies up by name", () => {
    expect(payloadStrategy("lineage")).toBe(lineageStrategy);
    expect(payloadStrategy("content")).toBe(contentStrategy);
  });
});
