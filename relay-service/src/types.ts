/** Any value JSON.parse can produce. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * One decoded sensor message. Frozen by the decoder.
 */
export interface Reading {
  readonly topic: string;
  readonly deviceId: string;
  /** ISO-8601 instant */
  readonly timestamp: string;
  readonly payload: JsonValue;
  /** MQTT packet id of the publish that carried it (null for QoS 0) */
  readonly messageId: number | null;
}

export type DeliveryState = 'pending' | 'in_flight' | 'delivered' | { failed: string };

export interface QueuedRecord {
  sequence: number;
  state: DeliveryState;
  attempts: number;
  lastError: string | null;
  enqueuedAt: string;
  reading: Reading;
}

/** Records selected for one forwarding attempt; retries reuse the same id. */
export interface Batch {
  id: string;
  sequences: readonly number[];
  records: readonly QueuedRecord[];
}

export interface DeadLetter {
  sequence: number;
  reading: Reading;
  attempts: number;
  reason: string;
  failedAt: string;
}

export type AttemptOutcome = 'delivered' | 'transient' | 'permanent';

export interface DeliveryAttempt {
  id: string;
  batchId: string;
  recordCount: number;
  startedAt: string;
  completedAt: string;
  outcome: AttemptOutcome;
  status: number | null;
  error: string | null;
}

export interface DeliveryReport {
  batchId: string;
  delivered: number;
  status: number;
  durationMs: number;
}

export interface QueueStats {
  pending: number;
  inFlight: number;
  deadLetters: number;
  lastSequence: number;
}

export type AckPolicy = 'delivered' | 'enqueued';
