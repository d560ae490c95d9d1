import type { BlockedNode } from "../errors.js";
import type { RunReport } from "../scheduler/types.js";

const RULE_WIDTH = 80;

/** Local wall-clock time as HH:MM:SS. */
export function formatClock(ts: number): string {
  return new Date(ts).toTimeString().slice(0, 8);
}

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

/** Collapse to one line and cut at `max` characters. */
export function preview(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length <= max ? flat : `${flat.slice(0, max)}...`;
}

export function formatRow(id: string, start: string, end: string, duration: string, status: string): string {
  return `| ${id.padEnd(20)} | ${start.padEnd(10)} | ${end.padEnd(10)} | ${duration.padStart(9)} | ${status.padEnd(10)} |`;
}

/** Post-run table: dispatched nodes by start time, then the ones never started. */
export function formatSummary(report: RunReport): string {
  const lines: string[] = [
    "=".repeat(RULE_WIDTH),
    `Workflow Execution Summary: ${report.workflow}`,
    `Run ID: ${report.runId}`,
    `Status: ${report.status}${report.failingNode ? ` (failed at ${report.failingNode})` : ""}`,
    "-".repeat(RULE_WIDTH),
    formatRow("Node ID", "Start", "End", "Duration", "Status"),
    "-".repeat(RULE_WIDTH),
  ];

  const started = [...report.nodes].sort((a, b) => a.startedAt - b.startedAt);
  for (const n of started) {
    lines.push(formatRow(n.nodeId, formatClock(n.startedAt), formatClock(n.finishedAt), formatSeconds(n.durationMs), n.status));
  }
  for (const id of report.notStarted) {
    lines.push(formatRow(id, "N/A", "N/A", formatSeconds(0), "Pending"));
  }

  lines.push("-".repeat(RULE_WIDTH));
  lines.push(`Total Wall-clock Time: ${formatSeconds(report.wallTimeMs)}`);
  lines.push("=".repeat(RULE_WIDTH));
  return lines.join("\n");
}

/** Full output of each completed node, in completion order. */
export function formatResults(report: RunReport): string {
  return Object.entries(report.results)
    .map(([id, content]) => `>>>>> Node: [${id}] <<<<<\n${content}\n${"-".repeat(40)}`)
    .join("\n");
}

export function formatBlocked(blocked: BlockedNode[]): string {
  return blocked
    .map((b) => {
      const missing = b.missing.length > 0 ? ` (unknown: ${b.missing.join(", ")})` : "";
      return `  - ${b.id} waits on ${b.unmet.join(", ") || "nothing"}${missing}`;
    })
    .join("\n");
}
