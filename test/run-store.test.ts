import Database from "better-sqlite3";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RunStore } from "../src/persistence/store.js";
import type { RunReport } from "../src/scheduler/types.js";
import { setLogLevel } from "../src/utils/logger.js";

function report(runId: string, startedAt: number, overrides?: Partial<RunReport>): RunReport {
  return {
    runId,
    workflow: "Demo",
    status: "completed",
    completed: true,
    nodes: [
      {
        nodeId: "a",
        taskId: `${runId}_a`,
        status: "Success",
        startedAt,
        finishedAt: startedAt + 10,
        durationMs: 10,
        parentTaskIds: [],
        upstreamIds: [],
        output: "alpha",
      },
    ],
    results: { a: "alpha" },
    notStarted: [],
    blockedByFailure: [],
    startedAt,
    finishedAt: startedAt + 10,
    wallTimeMs: 10,
    ...overrides,
  };
}

describe("RunStore", () => {
  let store: RunStore;

  beforeEach(() => {
    store = new RunStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("stores and reads back a report", () => {
    const r = report("run_00000001", 1000);
    store.insert(r);
    expect(store.get("run_00000001")).toEqual(r);
  });

  it("returns undefined for an unknown run", () => {
    expect(store.get("run_missing")).toBeUndefined();
  });

  it("lists newest runs first", () => {
    store.insert(report("run_old", 1000));
    store.insert(
      report("run_new", 5000, {
        status: "failed",
        completed: false,
        failingNode: "a",
        error: { code: "ENGINE_FAILURE", message: "boom" },
      }),
    );

    expect(store.list()).toEqual([
      { runId: "run_new", workflow: "Demo", status: "failed", failingNode: "a", startedAt: 5000, wallTimeMs: 10 },
      { runId: "run_old", workflow: "Demo", status: "completed", failingNode: undefined, startedAt: 1000, wallTimeMs: 10 },
    ]);
    expect(store.list(1).map((r) => r.runId)).toEqual(["run_new"]);
  });

  it("deletes runs", () => {
    store.insert(report("run_a", 1));
    store.insert(report("run_b", 2));
    store.insert(report("run_c", 3));

    expect(store.delete("run_a")).toBe(true);
    expect(store.delete("run_a")).toBe(false);
    expect(store.deleteAll()).toBe(2);
    expect(store.list()).toEqual([]);
  });

  describe("with unreadable rows", () => {
    let dir: string;
    let dbPath: string;

    beforeEach(() => {
      setLogLevel("silent");
      dir = mkdtempSync(join(tmpdir(), "dagflow-store-"));
      dbPath = join(dir, "runs.db");
      const fileStore = new RunStore(dbPath);
      fileStore.insert(report("run_broken", 1000));
      fileStore.close();
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
      setLogLevel("info");
    });

    function overwriteReport(text: string): void {
      const db = new Database(dbPath);
      db.prepare("UPDATE runs SET report = ? WHERE run_id = ?").run(text, "run_broken");
      db.close();
    }

    it("returns undefined for a report that is not JSON", () => {
      overwriteReport("{not json");
      const fileStore = new RunStore(dbPath);
      try {
        expect(fileStore.get("run_broken")).toBeUndefined();
        expect(fileStore.list().map((r) => r.runId)).toEqual(["run_broken"]);
      } finally {
        fileStore.close();
      }
    });

    it("returns undefined for a report with the wrong shape", () => {
      overwriteReport(JSON.stringify({ runId: 42 }));
      const fileStore = new RunStore(dbPath);
      try {
        expect(fileStore.get("run_broken")).toBeUndefined();
      } finally {
        fileStore.close();
      }
    });
  });
});
