import type { JsonObject } from '@alertline/core';
import type { Db } from './db.js';
import { readJsonObject } from './json.js';

/**
 * A configured outbound notification target
 */
export interface NotificationChannel {
  id: number;
  name: string;
  /** Notify driver type, e.g. "webhook" or "slack" */
  driver: string;
  config: JsonObject;
  isActive: boolean;
  description: string;
  createdAt: Date;
  updatedAt: Date;
}

interface ChannelRow {
  id: number;
  name: string;
  driver: string;
  config_json: string;
  is_active: number;
  description: string;
  created_at: number;
  updated_at: number;
}

function mapChannel(row: ChannelRow): NotificationChannel {
  return {
    id: row.id,
    name: row.name,
    driver: row.driver,
    config: readJsonObject(row.config_json),
    isActive: row.is_active === 1,
    description: row.description,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function insertChannel(
  db: Db,
  channel: { name: string; driver: string; config?: JsonObject; isActive?: boolean; description?: string },
  now: Date = new Date(),
): NotificationChannel {
  const result = db
    .prepare(
      `INSERT INTO notification_channels (name, driver, config_json, is_active, description, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      channel.name,
      channel.driver.toLowerCase(),
      JSON.stringify(channel.config ?? {}),
      channel.isActive === false ? 0 : 1,
      channel.description ?? '',
      now.getTime(),
      now.getTime(),
    );

  const created = db
    .prepare<[number], ChannelRow>('SELECT * FROM notification_channels WHERE id = ?')
    .get(Number(result.lastInsertRowid));
  if (!created) {
    throw new Error(`Channel ${channel.name} vanished after insert`);
  }
  return mapChannel(created);
}

export function getChannelByName(db: Db, name: string): NotificationChannel | undefined {
  const row = db
    .prepare<[string], ChannelRow>('SELECT * FROM notification_channels WHERE name = ?')
    .get(name);
  return row ? mapChannel(row) : undefined;
}

/**
 * Channels in creation order, optionally only active ones of the given drivers
 */
export function listChannels(
  db: Db,
  filters: { activeOnly?: boolean; drivers?: readonly string[] } = {},
): NotificationChannel[] {
  let sql = 'SELECT * FROM notification_channels WHERE 1=1';
  const params: unknown[] = [];

  if (filters.activeOnly) {
    sql += ' AND is_active = 1';
  }
  if (filters.drivers && filters.drivers.length > 0) {
    sql += ` AND LOWER(driver) IN (${filters.drivers.map(() => '?').join(', ')})`;
    params.push(...filters.drivers.map((driver) => driver.toLowerCase()));
  }

  sql += ' ORDER BY id';

  return db.prepare<unknown[], ChannelRow>(sql).all(...params).map(mapChannel);
}

export function setChannelActive(db: Db, name: string, isActive: boolean, now: Date = new Date()): boolean {
  const result = db
    .prepare<[number, number, string]>(
      'UPDATE notification_channels SET is_active = ?, updated_at = ? WHERE name = ?',
    )
    .run(isActive ? 1 : 0, now.getTime(), name);
  return result.changes > 0;
}

export function deleteChannel(db: Db, name: string): boolean {
  return db.prepare<[string]>('DELETE FROM notification_channels WHERE name = ?').run(name).changes > 0;
}
