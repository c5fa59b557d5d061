// packages/core/src/store/run-store.ts — Run history in SQLite

import type Database from 'better-sqlite3';
import type { RunReport, RunStatus } from '../types/report.js';

export interface RunSummary {
  runId: string;
  name: string;
  version: string;
  status: RunStatus;
  startedAt: string;
  durationMs: number;
  succeeded: number;
  skipped: number;
  failed: number;
  blocked: number;
}

interface RunRow {
  run_id: string;
  name: string;
  version: string;
  status: RunStatus;
  started_at: string;
  duration_ms: number;
  succeeded: number | null;
  skipped: number | null;
  failed: number | null;
  blocked: number | null;
}

export class RunStore {
  constructor(private db: Database.Database) {}

  save(report: RunReport): void {
    const insertRun = this.db.prepare(
      `INSERT OR REPLACE INTO runs (run_id, name, version, status, started_at, finished_at, duration_ms, report_json)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const insertStep = this.db.prepare(
      `INSERT OR REPLACE INTO step_outcomes (run_id, step_id, status, fingerprint, attempts, error_kind, duration_ms)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );

    this.db.transaction(() => {
      insertRun.run(
        report.runId,
        report.name,
        report.version,
        report.status,
        report.startedAt,
        report.finishedAt,
        report.durationMs,
        JSON.stringify(report),
      );
      for (const step of report.steps) {
        insertStep.run(
          report.runId,
          step.stepId,
          step.status,
          step.fingerprint,
          step.attempts,
          step.error?.kind ?? null,
          step.durationMs,
        );
      }
    })();
  }

  get(runId: string): RunReport | null {
    const row = this.db
      .prepare<[string], { report_json: string }>('SELECT report_json FROM runs WHERE run_id = ?')
      .get(runId);
    if (!row) return null;
    const report: RunReport = JSON.parse(row.report_json);
    return report;
  }

  /** Most recent first. */
  list(options: { limit?: number; version?: string } = {}): RunSummary[] {
    const limit = options.limit ?? 20;
    const where = options.version !== undefined ? 'WHERE r.version = ?' : '';
    const params = options.version !== undefined ? [options.version, limit] : [limit];
    const rows = this.db
      .prepare<unknown[], RunRow>(
        `SELECT r.run_id, r.name, r.version, r.status, r.started_at, r.duration_ms,
                SUM(s.status = 'succeeded') AS succeeded,
                SUM(s.status = 'skipped') AS skipped,
                SUM(s.status = 'failed') AS failed,
                SUM(s.status = 'blocked') AS blocked
         FROM runs r LEFT JOIN step_outcomes s ON s.run_id = r.run_id
         ${where}
         GROUP BY r.run_id
         ORDER BY r.started_at DESC, r.rowid DESC
         LIMIT ?`,
      )
      .all(...params);

    return rows.map((row) => ({
      runId: row.run_id,
      name: row.name,
      version: row.version,
      status: row.status,
      startedAt: row.started_at,
      durationMs: row.duration_ms,
      succeeded: row.succeeded ?? 0,
      skipped: row.skipped ?? 0,
      failed: row.failed ?? 0,
      blocked: row.blocked ?? 0,
    }));
  }

  /** Most recent run, optionally for one version. */
  latest(version?: string): RunReport | null {
    const [summary] = this.list({ limit: 1, version });
    return summary ? this.get(summary.runId) : null;
  }

  /** Delete runs started before `cutoffIso`. Returns the number removed. */
  prune(cutoffIso: string): number {
    return this.db.prepare('DELETE FROM runs WHERE started_at < ?').run(cutoffIso).changes;
  }
}
