/**
 * SQLite Metric Store
 *
 * Time-series table the dashboard reads through its SQLite data source.
 * Each point field becomes one row; rows are keyed by
 * (measurement, plant, device, field, timestamp), so writing the same
 * sample again replaces it instead of adding a row. A second table records
 * which plants finished their backfill.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import type { MetricPoint } from './points.js';

export interface MetricStore {
  /** Persist points; returns how many points were written */
  writePoints(points: MetricPoint[]): number;
  countPoints(plantId: string): number;
  /** True once a backfill of the plant ran to the end */
  isBackfillComplete(plantId: string): boolean;
  markBackfillComplete(plantId: string, at: Date): void;
  close(): void;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS points (
    measurement TEXT NOT NULL,
    plant_id TEXT NOT NULL,
    device_sn TEXT NOT NULL DEFAULT '',
    field TEXT NOT NULL,
    timestamp INTEGER NOT NULL,
    value REAL NOT NULL,
    PRIMARY KEY (measurement, plant_id, device_sn, field, timestamp)
  );
  CREATE INDEX IF NOT EXISTS idx_points_series
    ON points(plant_id, measurement, field, timestamp);
  CREATE TABLE IF NOT EXISTS backfills (
    plant_id TEXT PRIMARY KEY,
    completed_at INTEGER NOT NULL
  );
`;

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  try {
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.exec(SCHEMA);
    return db;
  } catch (error) {
    console.error(
      '[Store] Failed to initialize database:',
      error instanceof Error ? error.message : String(error)
    );
    throw error;
  }
}

export class SqliteMetricStore implements MetricStore {
  private db: Database.Database;

  /** Takes a file path, or an open connection to initialize */
  constructor(source: string | Database.Database) {
    if (typeof source === 'string') {
      this.db = openDatabase(source);
      console.log(`[Store] Connected to SQLite database: ${source}`);
    } else {
      this.db = source;
      this.db.exec(SCHEMA);
    }
  }

  writePoints(points: MetricPoint[]): number {
    const insert = this.db.prepare(`
      INSERT OR REPLACE INTO points
        (measurement, plant_id, device_sn, field, timestamp, value)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    const writeAll = this.db.transaction((batch: MetricPoint[]) => {
      for (const point of batch) {
        const timestamp = toUnixSeconds(point.timestamp);
        for (const [field, value] of Object.entries(point.fields)) {
          insert.run(
            point.measurement,
            point.tags.plant_id,
            point.tags.device_sn ?? '',
            field,
            timestamp,
            value
          );
        }
      }
    });

    writeAll(points);
    return points.length;
  }

  countPoints(plantId: string): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM points WHERE plant_id = ?')
      .get(plantId);
    return row?.count ?? 0;
  }

  isBackfillComplete(plantId: string): boolean {
    const row = this.db
      .prepare<[string], { plant_id: string }>('SELECT plant_id FROM backfills WHERE plant_id = ?')
      .get(plantId);
    return row !== undefined;
  }

  markBackfillComplete(plantId: string, at: Date): void {
    this.db
      .prepare('INSERT OR REPLACE INTO backfills (plant_id, completed_at) VALUES (?, ?)')
      .run(plantId, toUnixSeconds(at));
  }

  close(): void {
    this.db.close();
  }
}
