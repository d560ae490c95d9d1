import { describe, expect, it } from "vitest";
import type { NodeOutcome } from "../src/dispatcher/dispatcher.js";
import {
  formatBlocked,
  formatClock,
  formatResults,
  formatRow,
  formatSeconds,
  formatSummary,
  preview,
} from "../src/report/summary.js";
import type { RunReport } from "../src/scheduler/types.js";

function outcome(nodeId: string, status: NodeOutcome["status"], startedAt: number, finishedAt: number): NodeOutcome {
  return {
    nodeId,
    taskId: `run_0000abcd_${nodeId}`,
    status,
    startedAt,
    finishedAt,
    durationMs: finishedAt - startedAt,
    parentTaskIds: [],
    upstreamIds: [],
  };
}

const report: RunReport = {
  runId: "run_0000abcd",
  workflow: "Demo",
  status: "failed",
  completed: false,
  failingNode: "b",
  error: { code: "ENGINE_FAILURE", message: "boom" },
  nodes: [outcome("b", "Failed", 2000, 3500), outcome("a", "Success", 1000, 2000)],
  results: { a: "alpha" },
  notStarted: ["c"],
  blockedByFailure: ["c"],
  startedAt: 1000,
  finishedAt: 3500,
  wallTimeMs: 2500,
};

describe("formatting helpers", () => {
  it("formats seconds with two decimals", () => {
    expect(formatSeconds(1234)).toBe("1.23s");
    expect(formatSeconds(0)).toBe("0.00s");
  });

  it("formats a wall-clock time", () => {
    expect(formatClock(Date.now())).toMatch(/^\d{2}:\d{2}:\d{2}$/);
  });

  it("pads table rows to fixed columns", () => {
    expect(formatRow("a", "10:00:00", "10:00:01", "1.00s", "Success")).toBe(
      "| a                    | 10:00:00   | 10:00:01   |     1.00s | Success    |",
    );
  });

  it("previews output on one line", () => {
    expect(preview("a\n\n b   c", 100)).toBe("a b c");
    expect(preview("abcdef", 3)).toBe("abc...");
    expect(preview("abc", 3)).toBe("abc");
  });
});

describe("formatSummary", () => {
  it("lists started nodes by start time, then pending ones", () => {
    const lines = formatSummary(report).split("\n");

    expect(lines).toHaveLength(13);
    expect(lines[0]).toBe("=".repeat(80));
    expect(lines.slice(1, 4)).toEqual([
      "Workflow Execution Summary: Demo",
      "Run ID: run_0000abcd",
      "Status: failed (failed at b)",
    ]);
    expect(lines[5]).toBe("| Node ID              | Start      | End        |  Duration | Status     |");
    expect(lines[7]).toBe(formatRow("a", formatClock(1000), formatClock(2000), "1.00s", "Success"));
    expect(lines[8]).toBe(formatRow("b", formatClock(2000), formatClock(3500), "1.50s", "Failed"));
    expect(lines[9]).toBe(formatRow("c", "N/A", "N/A", "0.00s", "Pending"));
    expect(lines[11]).toBe("Total Wall-clock Time: 2.50s");
    expect(lines[12]).toBe("=".repeat(80));
  });

  it("omits the failing node for a completed run", () => {
    const lines = formatSummary({ ...report, status: "completed", completed: true, failingNode: undefined }).split("\n");
    expect(lines[3]).toBe("Status: completed");
  });
});

describe("formatResults", () => {
  it("prints each result under a header", () => {
    const text = formatResults({ ...report, results: { a: "alpha", b2: "beta" } });
    const rule = "-".repeat(40);
    expect(text).toBe(`>>>>> Node: [a] <<<<<\nalpha\n${rule}\n>>>>> Node: [b2] <<<<<\nbeta\n${rule}`);
  });
});

describe("formatBlocked", () => {
  it("names what each node waits on", () => {
    expect(
      formatBlocked([
        { id: "b", unmet: ["a", "ghost"], missing: ["ghost"] },
        { id: "c", unmet: [], missing: [] },
      ]),
    ).toBe("  - b waits on a, ghost (unknown: ghost)\n  - c waits on nothing");
  });
});
