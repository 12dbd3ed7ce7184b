import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import { SERVICE } from './config.js';
import { initDb, type AttemptRow, type DB, type DeadLetterRow, type RecordRow, type Statement } from './db.js';
import { QueueFullError, StorageError, errorMessage, type ForwardErrorKind } from './errors.js';
import type { Batch, DeadLetter, DeliveryAttempt, JsonValue, QueueStats, QueuedRecord, Reading } from './types.js';

export interface DurableQueueOptions {
  /** SQLite file; `:memory:` gives a non-durable queue for tests */
  path: string;
  /** Records held before `enqueue` refuses more. @default 100000 */
  maxRecords?: number;
  /** Failed attempts after which a record is dead-lettered. @default 5 */
  maxAttempts?: number;
  /** Delivery attempts kept in the audit log. @default 1000 */
  attemptRetention?: number;
}

export interface QueueEvents {
  enqueued: [sequence: number];
  /** Rows left the queue (delivered or dead-lettered) */
  evicted: [count: number];
}

export type FailureOutcome = 'retry' | 'dead_lettered';

interface InsertParams {
  topic: string;
  device_id: string;
  ts: string;
  payload: string;
  message_id: number | null;
  attempts: number;
  enqueued_at: string;
}

function rowToReading(row: { topic: string; device_id: string; ts: string; payload: string; message_id: number | null }): Reading {
  const payload: JsonValue = JSON.parse(row.payload);
  return Object.freeze({ topic: row.topic, deviceId: row.device_id, timestamp: row.ts, payload, messageId: row.message_id });
}

function rowToRecord(row: RecordRow): QueuedRecord {
  return {
    sequence: row.seq,
    state: row.state,
    attempts: row.attempts,
    lastError: row.last_error,
    enqueuedAt: row.enqueued_at,
    reading: rowToReading(row),
  };
}

/**
 * Crash-durable FIFO of readings awaiting delivery, backed by SQLite.
 *
 * better-sqlite3 is synchronous, so every method runs to completion before
 * another caller can touch the queue; batch selection additionally runs in a
 * transaction so a record is never handed to two batches.
 */
export class DurableQueue extends EventEmitter<QueueEvents> {
  readonly maxRecords: number;
  readonly maxAttempts: number;
  readonly #attemptRetention: number;
  readonly #db: DB;
  #size: number;

  readonly #insert: Statement<[InsertParams]>;
  readonly #selectPending: Statement<[number], RecordRow>;
  readonly #claim: Statement<[number]>;
  readonly #delete: Statement<[number]>;
  readonly #get: Statement<[number], RecordRow>;
  readonly #setAttempts: Statement<[number, string, number]>;
  readonly #release: Statement<[number]>;
  readonly #insertDeadLetter: Statement<[number, string, string, string, string, number | null, number, string, string]>;
  readonly #getDeadLetter: Statement<[number], DeadLetterRow>;
  readonly #deleteDeadLetter: Statement<[number]>;

  constructor(options: DurableQueueOptions) {
    super();
    this.maxRecords = options.maxRecords ?? 100_000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 5);
    this.#attemptRetention = options.attemptRetention ?? 1000;
    this.#db = initDb(options.path);

    this.#insert = this.#db.prepare<InsertParams>(
      `INSERT INTO records (topic, device_id, ts, payload, message_id, attempts, enqueued_at)
       VALUES (@topic, @device_id, @ts, @payload, @message_id, @attempts, @enqueued_at)`,
    );
    this.#selectPending = this.#db.prepare<[number], RecordRow>(
      `SELECT * FROM records WHERE state = 'pending' ORDER BY seq ASC LIMIT ?`,
    );
    this.#claim = this.#db.prepare<[number]>(`UPDATE records SET state = 'in_flight' WHERE seq = ?`);
    this.#delete = this.#db.prepare<[number]>('DELETE FROM records WHERE seq = ?');
    this.#get = this.#db.prepare<[number], RecordRow>('SELECT * FROM records WHERE seq = ?');
    this.#setAttempts = this.#db.prepare<[number, string, number]>('UPDATE records SET attempts = ?, last_error = ? WHERE seq = ?');
    this.#release = this.#db.prepare<[number]>(`UPDATE records SET state = 'pending' WHERE seq = ? AND state = 'in_flight'`);
    this.#insertDeadLetter = this.#db.prepare<[number, string, string, string, string, number | null, number, string, string]>(
      `INSERT INTO dead_letters (seq, topic, device_id, ts, payload, message_id, attempts, reason, failed_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    this.#getDeadLetter = this.#db.prepare<[number], DeadLetterRow>('SELECT * FROM dead_letters WHERE seq = ?');
    this.#deleteDeadLetter = this.#db.prepare<[number]>('DELETE FROM dead_letters WHERE seq = ?');

    this.#size = this.#count('SELECT COUNT(*) AS n FROM records');
  }

  #count(sql: string): number {
    const row = this.#db.prepare<[], { n: number }>(sql).get();
    return row ? row.n : 0;
  }

  /** Records held (pending and in flight). */
  size(): number {
    return this.#size;
  }

  pendingCount(): number {
    return this.#count(`SELECT COUNT(*) AS n FROM records WHERE state = 'pending'`);
  }

  /**
   * Persist a reading and return its sequence number. The row is committed
   * before this returns.
   */
  enqueue(reading: Reading): number {
    if (this.#size >= this.maxRecords) throw new QueueFullError(this.maxRecords);
    let sequence: number;
    try {
      const info = this.#insert.run({
        topic: reading.topic,
        device_id: reading.deviceId,
        ts: reading.timestamp,
        payload: JSON.stringify(reading.payload),
        message_id: reading.messageId,
        attempts: 0,
        enqueued_at: new Date().toISOString(),
      });
      sequence = Number(info.lastInsertRowid);
    } catch (e) {
      throw new StorageError(`enqueue failed: ${errorMessage(e)}`, { cause: e });
    }
    this.#size++;
    this.emit('enqueued', sequence);
    return sequence;
  }

  /**
   * Claim up to `maxSize` of the oldest pending records, in ascending
   * sequence order. Returns null when nothing is pending.
   */
  peekBatch(maxSize: number): Batch | null {
    const claim = this.#db.transaction((limit: number) => {
      const rows = this.#selectPending.all(limit);
      for (const row of rows) this.#claim.run(row.seq);
      return rows;
    });
    const rows = claim(Math.max(1, Math.floor(maxSize)));
    if (rows.length === 0) return null;
    const records = rows.map((row) => ({ ...rowToRecord(row), state: 'in_flight' as const }));
    return { id: uuidv4(), sequences: records.map((r) => r.sequence), records };
  }

  /** Evict delivered records. Returns how many rows were removed. */
  markDelivered(sequences: readonly number[]): number {
    const remove = this.#db.transaction((seqs: readonly number[]) => {
      let removed = 0;
      for (const seq of seqs) removed += this.#delete.run(seq).changes;
      return removed;
    });
    const removed = remove(sequences);
    if (removed > 0) {
      this.#size -= removed;
      this.emit('evicted', removed);
    }
    return removed;
  }

  /**
   * Count a failed attempt. Permanent failures, and transient ones that reach
   * `maxAttempts`, move the record to the dead-letter table.
   */
  markFailed(sequence: number, reason: string, kind: ForwardErrorKind): FailureOutcome {
    const fail = this.#db.transaction((): FailureOutcome => {
      const row = this.#get.get(sequence);
      if (!row) throw new Error(`unknown sequence ${sequence}`);
      const attempts = row.attempts + 1;
      if (kind === 'permanent' || attempts >= this.maxAttempts) {
        this.#insertDeadLetter.run(row.seq, row.topic, row.device_id, row.ts, row.payload, row.message_id, attempts, reason, new Date().toISOString());
        this.#delete.run(row.seq);
        return 'dead_lettered';
      }
      this.#setAttempts.run(attempts, reason, row.seq);
      return 'retry';
    });
    const outcome = fail();
    if (outcome === 'dead_lettered') {
      this.#size--;
      console.warn(`[${SERVICE}] record ${sequence} dead-lettered (${kind}): ${reason}`);
      this.emit('evicted', 1);
    }
    return outcome;
  }

  /** Return claimed records to pending without counting an attempt. */
  release(sequences: readonly number[]): void {
    const release = this.#db.transaction((seqs: readonly number[]) => {
      for (const seq of seqs) this.#release.run(seq);
    });
    release(sequences);
  }

  get(sequence: number): QueuedRecord | null {
    const row = this.#get.get(sequence);
    return row ? rowToRecord(row) : null;
  }

  /** Oldest first. */
  list(limit = 100): QueuedRecord[] {
    return this.#db.prepare<[number], RecordRow>('SELECT * FROM records ORDER BY seq ASC LIMIT ?').all(limit).map(rowToRecord);
  }

  stats(): QueueStats {
    const seq = this.#db.prepare<[], { seq: number }>(`SELECT seq FROM sqlite_sequence WHERE name = 'records'`).get();
    return {
      pending: this.pendingCount(),
      inFlight: this.#count(`SELECT COUNT(*) AS n FROM records WHERE state = 'in_flight'`),
      deadLetters: this.#count('SELECT COUNT(*) AS n FROM dead_letters'),
      lastSequence: seq ? seq.seq : 0,
    };
  }

  /** Most recent first. */
  deadLetters(limit = 50): DeadLetter[] {
    return this.#db
      .prepare<[number], DeadLetterRow>('SELECT * FROM dead_letters ORDER BY seq DESC LIMIT ?')
      .all(limit)
      .map((row) => ({ sequence: row.seq, reading: rowToReading(row), attempts: row.attempts, reason: row.reason, failedAt: row.failed_at }));
  }

  /**
   * Put a dead letter back at the tail of the queue with a fresh attempt
   * budget. Returns the new sequence number, or null if there is no such
   * dead letter.
   */
  requeueDeadLetter(sequence: number): number | null {
    if (this.#size >= this.maxRecords) throw new QueueFullError(this.maxRecords);
    const requeue = this.#db.transaction((): number | null => {
      const row = this.#getDeadLetter.get(sequence);
      if (!row) return null;
      const info = this.#insert.run({
        topic: row.topic,
        device_id: row.device_id,
        ts: row.ts,
        payload: row.payload,
        message_id: row.message_id,
        attempts: 0,
        enqueued_at: new Date().toISOString(),
      });
      this.#deleteDeadLetter.run(sequence);
      return Number(info.lastInsertRowid);
    });
    const next = requeue();
    if (next !== null) {
      this.#size++;
      console.log(`[${SERVICE}] dead letter ${sequence} requeued as ${next}`);
      this.emit('enqueued', next);
    }
    return next;
  }

  recordAttempt(attempt: DeliveryAttempt): void {
    this.#db
      .prepare<AttemptRow>(
        `INSERT INTO delivery_attempts (id, batch_id, record_count, started_at, completed_at, outcome, status, error)
         VALUES (@id, @batch_id, @record_count, @started_at, @completed_at, @outcome, @status, @error)`,
      )
      .run({
        id: attempt.id,
        batch_id: attempt.batchId,
        record_count: attempt.recordCount,
        started_at: attempt.startedAt,
        completed_at: attempt.completedAt,
        outcome: attempt.outcome,
        status: attempt.status,
        error: attempt.error,
      });
    this.#db
      .prepare<[number]>('DELETE FROM delivery_attempts WHERE rowid <= (SELECT MAX(rowid) FROM delivery_attempts) - ?')
      .run(this.#attemptRetention);
  }

  /** Most recent first. */
  attempts(limit = 50): DeliveryAttempt[] {
    return this.#db
      .prepare<[number], AttemptRow>('SELECT * FROM delivery_attempts ORDER BY rowid DESC LIMIT ?')
      .all(limit)
      .map((row) => ({
        id: row.id,
        batchId: row.batch_id,
        recordCount: row.record_count,
        startedAt: row.started_at,
        completedAt: row.completed_at,
        outcome: row.outcome,
        status: row.status,
        error: row.error,
      }));
  }

  close(): void {
    if (this.#db.open) this.#db.close();
    this.removeAllListeners();
  }
}
