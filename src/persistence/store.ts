import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { RunReportSchema } from "../schemas.js";
import type { RunReport, RunStatus } from "../scheduler/types.js";
import { log } from "../utils/logger.js";

export type StoredRunSummary = {
  runId: string;
  workflow: string;
  status: RunStatus;
  failingNode?: string;
  startedAt: number;
  wallTimeMs: number;
};

/** History of finished runs, for inspection only. Runs are never resumed from it. */
export class RunStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().persistence.dbPath;
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id       TEXT PRIMARY KEY,
        workflow     TEXT NOT NULL,
        status       TEXT NOT NULL,
        failing_node TEXT,
        report       TEXT NOT NULL,
        started_at   INTEGER NOT NULL,
        wall_time_ms INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `);
  }

  insert(report: RunReport): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO runs (run_id, workflow, status, failing_node, report, started_at, wall_time_ms)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      report.runId,
      report.workflow,
      report.status,
      report.failingNode ?? null,
      JSON.stringify(report),
      report.startedAt,
      report.wallTimeMs,
    );
  }

  get(runId: string): RunReport | undefined {
    const row = this.db.prepare("SELECT report FROM runs WHERE run_id = ?").get(runId) as
      | Pick<RunRow, "report">
      | undefined;
    if (!row) return undefined;

    let json: unknown;
    try {
      json = JSON.parse(row.report);
    } catch (err) {
      log.warn(`Stored report for ${runId} is unreadable`, { error: errorMessage(err) });
      return undefined;
    }

    const parsed = RunReportSchema.safeParse(json);
    if (!parsed.success) {
      log.warn(`Stored report for ${runId} is unreadable`, { error: parsed.error.message });
      return undefined;
    }
    return parsed.data;
  }

  list(limit = 50): StoredRunSummary[] {
    const rows = this.db
      .prepare("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?")
      .all(limit) as RunRow[];
    return rows.map(rowToSummary);
  }

  /** Delete a specific run by ID. Returns true if deleted. */
  delete(runId: string): boolean {
    const result = this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId);
    return result.changes > 0;
  }

  /** Delete all runs. Returns count of deleted runs. */
  deleteAll(): number {
    const result = this.db.prepare("DELETE FROM runs").run();
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}

type RunRow = {
  run_id: string;
  workflow: string;
  status: RunStatus;
  failing_node: string | null;
  report: string;
  started_at: number;
  wall_time_ms: number;
};

function rowToSummary(row: RunRow): StoredRunSummary {
  return {
    runId: row.run_id,
    workflow: row.workflow,
    status: row.status,
    failingNode: row.failing_node ?? undefined,
    startedAt: row.started_at,
    wallTimeMs: row.wall_time_ms,
  };
}
