import type { JsonObject } from '@alertline/core';
import type { Db } from './db.js';
import { readJsonObject } from './json.js';

export type CheckStatus = 'ok' | 'warning' | 'critical' | 'unknown';

/**
 * Audit record of one checker execution
 */
export interface CheckRun {
  id: number;
  checkerName: string;
  hostname: string;
  status: CheckStatus;
  message: string;
  metrics: JsonObject;
  error: string | null;
  durationMs: number;
  traceId: string | null;
  createdAt: Date;
}

export type NewCheckRun = Omit<CheckRun, 'id' | 'createdAt'>;

interface CheckRunRow {
  id: number;
  checker_name: string;
  hostname: string;
  status: string;
  message: string;
  metrics_json: string;
  error: string | null;
  duration_ms: number;
  trace_id: string | null;
  created_at: number;
}

function toCheckStatus(value: string): CheckStatus {
  return value === 'ok' || value === 'warning' || value === 'critical' ? value : 'unknown';
}

export function insertCheckRun(db: Db, run: NewCheckRun, now: Date = new Date()): number {
  const result = db
    .prepare(
      `INSERT INTO check_runs (checker_name, hostname, status, message, metrics_json, error, duration_ms, trace_id, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      run.checkerName,
      run.hostname,
      run.status,
      run.message,
      JSON.stringify(run.metrics),
      run.error,
      Math.round(run.durationMs),
      run.traceId,
      now.getTime(),
    );
  return Number(result.lastInsertRowid);
}

export function listCheckRuns(db: Db, filters: { checkerName?: string; limit?: number } = {}): CheckRun[] {
  let sql = 'SELECT * FROM check_runs WHERE 1=1';
  const params: unknown[] = [];

  if (filters.checkerName) {
    sql += ' AND checker_name = ?';
    params.push(filters.checkerName);
  }

  sql += ' ORDER BY created_at DESC, id DESC';

  if (filters.limit !== undefined) {
    sql += ' LIMIT ?';
    params.push(filters.limit);
  }

  return db
    .prepare<unknown[], CheckRunRow>(sql)
    .all(...params)
    .map((row) => ({
      id: row.id,
      checkerName: row.checker_name,
      hostname: row.hostname,
      status: toCheckStatus(row.status),
      message: row.message,
      metrics: readJsonObject(row.metrics_json),
      error: row.error,
      durationMs: row.duration_ms,
      traceId: row.trace_id,
      createdAt: new Date(row.created_at),
    }));
}
