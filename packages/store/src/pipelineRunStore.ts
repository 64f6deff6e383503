import type { Db } from './db.js';
import { fromMillis, readStringList } from './json.js';

export type PipelineRunStatus = 'running' | 'completed' | 'failed';

export interface PipelineRun {
  runId: string;
  traceId: string;
  /** Pipeline definition name */
  definition: string;
  source: string;
  environment: string;
  status: PipelineRunStatus;
  incidentId: number | null;
  executedNodes: string[];
  skippedNodes: string[];
  error: string | null;
  startedAt: Date;
  finishedAt: Date | null;
  durationMs: number | null;
}

interface PipelineRunRow {
  run_id: string;
  trace_id: string;
  definition: string;
  source: string;
  environment: string;
  status: string;
  incident_id: number | null;
  executed_nodes_json: string;
  skipped_nodes_json: string;
  error: string | null;
  started_at: number;
  finished_at: number | null;
  duration_ms: number | null;
}

function toRunStatus(value: string): PipelineRunStatus {
  return value === 'completed' || value === 'failed' ? value : 'running';
}

function mapRun(row: PipelineRunRow): PipelineRun {
  return {
    runId: row.run_id,
    traceId: row.trace_id,
    definition: row.definition,
    source: row.source,
    environment: row.environment,
    status: toRunStatus(row.status),
    incidentId: row.incident_id,
    executedNodes: readStringList(row.executed_nodes_json),
    skippedNodes: readStringList(row.skipped_nodes_json),
    error: row.error,
    startedAt: new Date(row.started_at),
    finishedAt: fromMillis(row.finished_at),
    durationMs: row.duration_ms,
  };
}

export function insertPipelineRun(
  db: Db,
  run: { runId: string; traceId: string; definition: string; source: string; environment: string; incidentId?: number | null },
  now: Date = new Date(),
): void {
  db.prepare(
    `INSERT INTO pipeline_runs (run_id, trace_id, definition, source, environment, status, incident_id, started_at)
     VALUES (?, ?, ?, ?, ?, 'running', ?, ?)`,
  ).run(run.runId, run.traceId, run.definition, run.source, run.environment, run.incidentId ?? null, now.getTime());
}

/**
 * Record the final state of a run
 */
export function finishPipelineRun(
  db: Db,
  runId: string,
  outcome: {
    status: Exclude<PipelineRunStatus, 'running'>;
    incidentId: number | null;
    executedNodes: readonly string[];
    skippedNodes: readonly string[];
    error: string | null;
    durationMs: number;
  },
  now: Date = new Date(),
): void {
  db.prepare(
    `UPDATE pipeline_runs
     SET status = ?, incident_id = ?, executed_nodes_json = ?, skipped_nodes_json = ?,
         error = ?, finished_at = ?, duration_ms = ?
     WHERE run_id = ?`,
  ).run(
    outcome.status,
    outcome.incidentId,
    JSON.stringify(outcome.executedNodes),
    JSON.stringify(outcome.skippedNodes),
    outcome.error,
    now.getTime(),
    Math.round(outcome.durationMs),
    runId,
  );
}

export function getPipelineRun(db: Db, runId: string): PipelineRun | undefined {
  const row = db.prepare<[string], PipelineRunRow>('SELECT * FROM pipeline_runs WHERE run_id = ?').get(runId);
  return row ? mapRun(row) : undefined;
}

export function listPipelineRuns(db: Db, limit = 50): PipelineRun[] {
  return db
    .prepare<[number], PipelineRunRow>('SELECT * FROM pipeline_runs ORDER BY started_at DESC LIMIT ?')
    .all(limit)
    .map(mapRun);
}
