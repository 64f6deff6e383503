import { normalizeSeverity, type AlertSeverity, type JsonObject } from '@alertline/core';
import type { Db } from './db.js';
import { fromMillis, readJsonObject, toMillis } from './json.js';

export const INCIDENT_STATUSES = ['open', 'acknowledged', 'resolved', 'closed'] as const;
export type IncidentStatus = (typeof INCIDENT_STATUSES)[number];

/** Statuses that still accept new alerts */
export const ACTIVE_INCIDENT_STATUSES: readonly IncidentStatus[] = ['open', 'acknowledged'];

export function isIncidentStatus(value: string): value is IncidentStatus {
  return INCIDENT_STATUSES.some((status) => status === value);
}

export interface Incident {
  id: number;
  title: string;
  severity: AlertSeverity;
  status: IncidentStatus;
  description: string;
  summary: string;
  metadata: JsonObject;
  createdAt: Date;
  updatedAt: Date;
  acknowledgedAt: Date | null;
  resolvedAt: Date | null;
  closedAt: Date | null;
}

export type IncidentPatch = Partial<
  Pick<
    Incident,
    'title' | 'severity' | 'status' | 'description' | 'summary' | 'metadata' | 'acknowledgedAt' | 'resolvedAt' | 'closedAt'
  >
>;

interface IncidentRow {
  id: number;
  title: string;
  severity: string;
  status: string;
  description: string;
  summary: string;
  metadata_json: string;
  created_at: number;
  updated_at: number;
  acknowledged_at: number | null;
  resolved_at: number | null;
  closed_at: number | null;
}

function mapIncident(row: IncidentRow): Incident {
  return {
    id: row.id,
    title: row.title,
    severity: normalizeSeverity(row.severity),
    status: isIncidentStatus(row.status) ? row.status : 'open',
    description: row.description,
    summary: row.summary,
    metadata: readJsonObject(row.metadata_json),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    acknowledgedAt: fromMillis(row.acknowledged_at),
    resolvedAt: fromMillis(row.resolved_at),
    closedAt: fromMillis(row.closed_at),
  };
}

export function insertIncident(
  db: Db,
  incident: { title: string; severity: AlertSeverity; description?: string; metadata?: JsonObject },
  now: Date = new Date(),
): Incident {
  const result = db
    .prepare(
      `INSERT INTO incidents (title, severity, status, description, metadata_json, created_at, updated_at)
       VALUES (?, ?, 'open', ?, ?, ?, ?)`,
    )
    .run(
      incident.title,
      incident.severity,
      incident.description ?? '',
      JSON.stringify(incident.metadata ?? {}),
      now.getTime(),
      now.getTime(),
    );

  const created = getIncident(db, Number(result.lastInsertRowid));
  if (!created) {
    throw new Error(`Incident ${String(result.lastInsertRowid)} vanished after insert`);
  }
  return created;
}

export function getIncident(db: Db, id: number): Incident | undefined {
  const row = db.prepare<[number], IncidentRow>('SELECT * FROM incidents WHERE id = ?').get(id);
  return row ? mapIncident(row) : undefined;
}

export function updateIncident(db: Db, id: number, patch: IncidentPatch, now: Date = new Date()): void {
  const sets: string[] = ['updated_at = ?'];
  const params: unknown[] = [now.getTime()];

  const set = (column: string, value: unknown): void => {
    sets.push(`${column} = ?`);
    params.push(value);
  };

  if (patch.title !== undefined) set('title', patch.title);
  if (patch.severity !== undefined) set('severity', patch.severity);
  if (patch.status !== undefined) set('status', patch.status);
  if (patch.description !== undefined) set('description', patch.description);
  if (patch.summary !== undefined) set('summary', patch.summary);
  if (patch.metadata !== undefined) set('metadata_json', JSON.stringify(patch.metadata));
  if (patch.acknowledgedAt !== undefined) set('acknowledged_at', toMillis(patch.acknowledgedAt));
  if (patch.resolvedAt !== undefined) set('resolved_at', toMillis(patch.resolvedAt));
  if (patch.closedAt !== undefined) set('closed_at', toMillis(patch.closedAt));

  params.push(id);
  db.prepare<unknown[]>(`UPDATE incidents SET ${sets.join(', ')} WHERE id = ?`).run(...params);
}

export function listIncidents(
  db: Db,
  filters: { statuses?: readonly IncidentStatus[]; limit?: number } = {},
): Incident[] {
  let sql = 'SELECT * FROM incidents WHERE 1=1';
  const params: unknown[] = [];

  if (filters.statuses && filters.statuses.length > 0) {
    sql += ` AND status IN (${filters.statuses.map(() => '?').join(', ')})`;
    params.push(...filters.statuses);
  }

  sql += ' ORDER BY created_at DESC, id DESC';

  if (filters.limit !== undefined) {
    sql += ' LIMIT ?';
    params.push(filters.limit);
  }

  return db.prepare<unknown[], IncidentRow>(sql).all(...params).map(mapIncident);
}

/**
 * First open or acknowledged incident holding an alert with this grouping key
 */
export function findActiveIncidentByGroupingKey(db: Db, groupingKey: string): Incident | undefined {
  const row = db
    .prepare<[string], IncidentRow>(
      `SELECT i.* FROM incidents i
       WHERE i.status IN ('open', 'acknowledged')
         AND EXISTS (
           SELECT 1 FROM alerts a WHERE a.incident_id = i.id AND a.grouping_key = ?
         )
       ORDER BY i.created_at ASC, i.id ASC
       LIMIT 1`,
    )
    .get(groupingKey);
  return row ? mapIncident(row) : undefined;
}
