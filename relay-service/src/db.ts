import Database from 'better-sqlite3';

export type DB = Database.Database;
export type Statement<P extends unknown[], R = unknown> = Database.Statement<P, R>;

export interface RecordRow {
  seq: number;
  topic: string;
  device_id: string;
  ts: string;
  payload: string;
  message_id: number | null;
  state: 'pending' | 'in_flight';
  attempts: number;
  last_error: string | null;
  enqueued_at: string;
}

export interface DeadLetterRow {
  seq: number;
  topic: string;
  device_id: string;
  ts: string;
  payload: string;
  message_id: number | null;
  attempts: number;
  reason: string;
  failed_at: string;
}

export interface AttemptRow {
  id: string;
  batch_id: string;
  record_count: number;
  started_at: string;
  completed_at: string;
  outcome: 'delivered' | 'transient' | 'permanent';
  status: number | null;
  error: string | null;
}

/**
 * Initialize SQLite and ensure the queue tables exist.
 * Rows a crashed process left `in_flight` go back to `pending`.
 */
export function initDb(path: string): DB {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  // Every committed enqueue is on disk before the call returns
  db.pragma('synchronous = FULL');
  db.pragma('busy_timeout = 5000');
  db.exec(`
    CREATE TABLE IF NOT EXISTS records (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      topic TEXT NOT NULL,
      device_id TEXT NOT NULL,
      ts TEXT NOT NULL,
      payload TEXT NOT NULL,
      message_id INTEGER,
      state TEXT NOT NULL DEFAULT 'pending' CHECK (state IN ('pending', 'in_flight')),
      attempts INTEGER NOT NULL DEFAULT 0,
      last_error TEXT,
      enqueued_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS records_state_seq ON records (state, seq);
    CREATE TABLE IF NOT EXISTS dead_letters (
      seq INTEGER PRIMARY KEY,
      topic TEXT NOT NULL,
      device_id TEXT NOT NULL,
      ts TEXT NOT NULL,
      payload TEXT NOT NULL,
      message_id INTEGER,
      attempts INTEGER NOT NULL,
      reason TEXT NOT NULL,
      failed_at TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS delivery_attempts (
      id TEXT PRIMARY KEY,
      batch_id TEXT NOT NULL,
      record_count INTEGER NOT NULL,
      started_at TEXT NOT NULL,
      completed_at TEXT NOT NULL,
      outcome TEXT NOT NULL,
      status INTEGER,
      error TEXT
    );
  `);
  db.prepare(`UPDATE records SET state = 'pending' WHERE state = 'in_flight'`).run();
  return db;
}
