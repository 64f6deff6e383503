import {
  normalizeSeverity,
  normalizeStatus,
  type AlertSeverity,
  type AlertStatus,
  type JsonObject,
} from '@alertline/core';
import type { Db } from './db.js';
import { fromMillis, readJsonObject, readStringMap, toMillis } from './json.js';

/**
 * An alert as persisted: one row per (fingerprint, source)
 */
export interface PersistedAlert {
  id: number;
  fingerprint: string;
  source: string;
  name: string;
  status: AlertStatus;
  severity: AlertSeverity;
  description: string;
  labels: Record<string, string>;
  annotations: Record<string, string>;
  rawPayload: JsonObject;
  /** Key used to group alerts into incidents */
  groupingKey: string;
  startedAt: Date;
  endedAt: Date | null;
  /** First time this (fingerprint, source) was seen */
  receivedAt: Date;
  updatedAt: Date;
  incidentId: number | null;
}

export interface NewAlert {
  fingerprint: string;
  source: string;
  name: string;
  status: AlertStatus;
  severity: AlertSeverity;
  description: string;
  labels: Readonly<Record<string, string>>;
  annotations: Readonly<Record<string, string>>;
  rawPayload: JsonObject;
  groupingKey: string;
  startedAt: Date;
  endedAt: Date | null;
  incidentId?: number | null;
}

export type AlertPatch = Partial<
  Pick<
    PersistedAlert,
    'status' | 'severity' | 'description' | 'annotations' | 'rawPayload' | 'endedAt' | 'incidentId'
  >
>;

export type AlertHistoryEvent = 'created' | 'severity_changed' | 'resolved' | 'refired';

export interface AlertHistoryEntry {
  id: number;
  alertId: number;
  event: string;
  oldStatus: string | null;
  newStatus: string | null;
  details: JsonObject;
  createdAt: Date;
}

interface AlertRow {
  id: number;
  fingerprint: string;
  source: string;
  name: string;
  status: string;
  severity: string;
  description: string;
  labels_json: string;
  annotations_json: string;
  raw_payload_json: string;
  grouping_key: string;
  started_at: number;
  ended_at: number | null;
  received_at: number;
  updated_at: number;
  incident_id: number | null;
}

interface HistoryRow {
  id: number;
  alert_id: number;
  event: string;
  old_status: string | null;
  new_status: string | null;
  details_json: string;
  created_at: number;
}

function mapAlert(row: AlertRow): PersistedAlert {
  return {
    id: row.id,
    fingerprint: row.fingerprint,
    source: row.source,
    name: row.name,
    status: normalizeStatus(row.status),
    severity: normalizeSeverity(row.severity),
    description: row.description,
    labels: readStringMap(row.labels_json),
    annotations: readStringMap(row.annotations_json),
    rawPayload: readJsonObject(row.raw_payload_json),
    groupingKey: row.grouping_key,
    startedAt: new Date(row.started_at),
    endedAt: fromMillis(row.ended_at),
    receivedAt: new Date(row.received_at),
    updatedAt: new Date(row.updated_at),
    incidentId: row.incident_id,
  };
}

export function getAlert(db: Db, id: number): PersistedAlert | undefined {
  const row = db.prepare<[number], AlertRow>('SELECT * FROM alerts WHERE id = ?').get(id);
  return row ? mapAlert(row) : undefined;
}

/**
 * Look up the live alert for a dedup key
 */
export function findAlert(db: Db, fingerprint: string, source: string): PersistedAlert | undefined {
  const row = db
    .prepare<[string, string], AlertRow>('SELECT * FROM alerts WHERE fingerprint = ? AND source = ?')
    .get(fingerprint, source);
  return row ? mapAlert(row) : undefined;
}

/**
 * Insert a new alert. Fails on the (fingerprint, source) unique constraint
 * if a concurrent writer created the row first.
 */
export function insertAlert(db: Db, alert: NewAlert, now: Date = new Date()): PersistedAlert {
  const result = db
    .prepare(
      `INSERT INTO alerts (
        fingerprint, source, name, status, severity, description,
        labels_json, annotations_json, raw_payload_json, grouping_key,
        started_at, ended_at, received_at, updated_at, incident_id
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      alert.fingerprint,
      alert.source,
      alert.name,
      alert.status,
      alert.severity,
      alert.description,
      JSON.stringify(alert.labels),
      JSON.stringify(alert.annotations),
      JSON.stringify(alert.rawPayload),
      alert.groupingKey,
      alert.startedAt.getTime(),
      toMillis(alert.endedAt),
      now.getTime(),
      now.getTime(),
      alert.incidentId ?? null,
    );

  const created = getAlert(db, Number(result.lastInsertRowid));
  if (!created) {
    throw new Error(`Alert ${String(result.lastInsertRowid)} vanished after insert`);
  }
  return created;
}

/**
 * Apply a partial update; `updated_at` is always bumped
 */
export function updateAlert(db: Db, id: number, patch: AlertPatch, now: Date = new Date()): void {
  const sets: string[] = ['updated_at = ?'];
  const params: unknown[] = [now.getTime()];

  if (patch.status !== undefined) {
    sets.push('status = ?');
    params.push(patch.status);
  }
  if (patch.severity !== undefined) {
    sets.push('severity = ?');
    params.push(patch.severity);
  }
  if (patch.description !== undefined) {
    sets.push('description = ?');
    params.push(patch.description);
  }
  if (patch.annotations !== undefined) {
    sets.push('annotations_json = ?');
    params.push(JSON.stringify(patch.annotations));
  }
  if (patch.rawPayload !== undefined) {
    sets.push('raw_payload_json = ?');
    params.push(JSON.stringify(patch.rawPayload));
  }
  if (patch.endedAt !== undefined) {
    sets.push('ended_at = ?');
    params.push(toMillis(patch.endedAt));
  }
  if (patch.incidentId !== undefined) {
    sets.push('incident_id = ?');
    params.push(patch.incidentId);
  }

  params.push(id);
  db.prepare<unknown[]>(`UPDATE alerts SET ${sets.join(', ')} WHERE id = ?`).run(...params);
}

export interface AlertFilters {
  status?: AlertStatus;
  source?: string;
  incidentId?: number;
  /** Only alerts first received at or after this time */
  receivedSince?: Date;
  limit?: number;
}

export function listAlerts(db: Db, filters: AlertFilters = {}): PersistedAlert[] {
  let sql = 'SELECT * FROM alerts WHERE 1=1';
  const params: unknown[] = [];

  if (filters.status) {
    sql += ' AND status = ?';
    params.push(filters.status);
  }
  if (filters.source) {
    sql += ' AND source = ?';
    params.push(filters.source);
  }
  if (filters.incidentId !== undefined) {
    sql += ' AND incident_id = ?';
    params.push(filters.incidentId);
  }
  if (filters.receivedSince) {
    sql += ' AND received_at >= ?';
    params.push(filters.receivedSince.getTime());
  }

  sql += ' ORDER BY received_at DESC, id DESC';

  if (filters.limit !== undefined) {
    sql += ' LIMIT ?';
    params.push(filters.limit);
  }

  return db.prepare<unknown[], AlertRow>(sql).all(...params).map(mapAlert);
}

/**
 * Most recently created alert at or after `since`
 */
export function findLatestAlertSince(db: Db, since: Date): PersistedAlert | undefined {
  const [latest] = listAlerts(db, { receivedSince: since, limit: 1 });
  return latest;
}

export function countFiringAlerts(db: Db, incidentId: number): number {
  const row = db
    .prepare<[number], { total: number }>(
      "SELECT COUNT(*) AS total FROM alerts WHERE incident_id = ? AND status = 'firing'",
    )
    .get(incidentId);
  return row?.total ?? 0;
}

export function insertHistory(
  db: Db,
  entry: {
    alertId: number;
    event: AlertHistoryEvent;
    oldStatus?: string | null;
    newStatus?: string | null;
    details?: JsonObject;
  },
  now: Date = new Date(),
): void {
  db.prepare(
    `INSERT INTO alert_history (alert_id, event, old_status, new_status, details_json, created_at)
     VALUES (?, ?, ?, ?, ?, ?)`,
  ).run(
    entry.alertId,
    entry.event,
    entry.oldStatus ?? null,
    entry.newStatus ?? null,
    JSON.stringify(entry.details ?? {}),
    now.getTime(),
  );
}

export function listHistory(db: Db, alertId: number): AlertHistoryEntry[] {
  return db
    .prepare<[number], HistoryRow>('SELECT * FROM alert_history WHERE alert_id = ? ORDER BY id')
    .all(alertId)
    .map((row) => ({
      id: row.id,
      alertId: row.alert_id,
      event: row.event,
      oldStatus: row.old_status,
      newStatus: row.new_status,
      details: readJsonObject(row.details_json),
      createdAt: new Date(row.created_at),
    }));
}
