import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import { Backoff, sleep, type BackoffOptions } from './backoff.js';
import { BoundedChannel } from './channel.js';
import { SERVICE, DEBUG } from './config.js';
import type { Decoder } from './decoder.js';
import { ConnectionError, QueueFullError, StorageError, errorMessage } from './errors.js';
import type { BatchSender, ForwardResult } from './forwarder.js';
import type { AckToken, InboundMessage, MqttSession } from './mqtt.js';
import type { DurableQueue, QueueEvents } from './queue.js';
import type { AckPolicy, Batch, QueuedRecord, Reading } from './types.js';

export type PipelineState = 'idle' | 'decoding' | 'queuing' | 'batching' | 'forwarding' | 'acking';

export interface PipelineCounters {
  received: number;
  decoded: number;
  dropped: number;
  enqueued: number;
  delivered: number;
  deadLettered: number;
  acked: number;
  batches: number;
  retries: number;
  /** Broker redeliveries matched to a reading that was already queued */
  redelivered: number;
}

export interface PipelineSnapshot extends PipelineCounters {
  state: PipelineState;
  connected: boolean;
}

export interface PipelineOptions {
  /** Opens a broker session; retried until it succeeds or the pipeline stops */
  connect: () => Promise<MqttSession>;
  decoder: Decoder;
  queue: DurableQueue;
  forwarder: BatchSender;
  /** @default 50 */
  batchSize?: number;
  /** How long a batch may wait to fill once a record is pending. @default 1000 */
  batchWaitMs?: number;
  /** Forwarding workers. @default 1 */
  concurrency?: number;
  /** @default 'delivered' */
  ackPolicy?: AckPolicy;
  /** Delay between attempts of a failing batch. @default base 1s, cap 60s, full jitter */
  retry?: BackoffOptions;
  /** Delay between broker connection attempts. @default base 1s, cap 60s, full jitter */
  connectRetry?: BackoffOptions;
  /** Messages buffered between the session and the reception loop. @default 100 */
  channelCapacity?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

interface PipelineEvents {
  state: [state: PipelineState];
}

// A held publish, by MQTT packet id. `sequence` is null once the record has
// left the queue but its acknowledgement went stale with a dropped connection.
interface HeldMessage {
  topic: string;
  sequence: number | null;
}

const HELD_LIMIT = 10_000;

/**
 * Moves readings from the broker session through the decoder and the durable
 * queue to the collector, and releases each message's acknowledgement once the
 * configured ack policy allows it.
 *
 * One reception loop feeds the queue; `concurrency` workers drain it. The two
 * sides only meet in the queue, so the broker never waits on the collector,
 * only on queue capacity.
 */
export class RelayPipeline extends EventEmitter<PipelineEvents> {
  readonly #connect: () => Promise<MqttSession>;
  readonly #decoder: Decoder;
  readonly #queue: DurableQueue;
  readonly #forwarder: BatchSender;
  readonly #batchSize: number;
  readonly #batchWaitMs: number;
  readonly #concurrency: number;
  readonly #ackPolicy: AckPolicy;
  readonly #retry: BackoffOptions;
  readonly #connectRetry: BackoffOptions;
  readonly #sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  readonly #channel: BoundedChannel<InboundMessage>;
  readonly #abort = new AbortController();
  // Held acknowledgements by queue sequence (ack policy 'delivered')
  readonly #tokens = new Map<number, AckToken>();
  readonly #held = new Map<number, HeldMessage>();
  readonly #counters: PipelineCounters = {
    received: 0,
    decoded: 0,
    dropped: 0,
    enqueued: 0,
    delivered: 0,
    deadLettered: 0,
    acked: 0,
    batches: 0,
    retries: 0,
    redelivered: 0,
  };
  #session: MqttSession | null = null;
  #state: PipelineState = 'idle';
  #tasks: Promise<void>[] = [];
  #started = false;
  #stopping: Promise<void> | null = null;

  constructor(options: PipelineOptions) {
    super();
    this.#connect = options.connect;
    this.#decoder = options.decoder;
    this.#queue = options.queue;
    this.#forwarder = options.forwarder;
    this.#batchSize = Math.max(1, options.batchSize ?? 50);
    this.#batchWaitMs = Math.max(0, options.batchWaitMs ?? 1000);
    this.#concurrency = Math.max(1, options.concurrency ?? 1);
    this.#ackPolicy = options.ackPolicy ?? 'delivered';
    this.#retry = options.retry ?? {};
    this.#connectRetry = options.connectRetry ?? {};
    this.#sleep = options.sleep ?? sleep;
    this.#channel = new BoundedChannel<InboundMessage>(options.channelCapacity ?? 100);
  }

  get state(): PipelineState {
    return this.#state;
  }

  get connected(): boolean {
    return this.#session?.connected ?? false;
  }

  snapshot(): PipelineSnapshot {
    return { ...this.#counters, state: this.#state, connected: this.connected };
  }

  /**
   * Start the workers, then connect to the broker in the background. The queue
   * drains even while the broker is unreachable.
   */
  start(): void {
    if (this.#started) throw new Error('pipeline already started');
    this.#started = true;
    console.log(
      `[${SERVICE}] pipeline starting (batch ${this.#batchSize}/${this.#batchWaitMs}ms, workers ${this.#concurrency}, ack on ${this.#ackPolicy})`,
    );
    for (let i = 0; i < this.#concurrency; i++) this.#tasks.push(this.#work(i));
    this.#tasks.push(this.#receive());
    this.#tasks.push(this.#connectWithRetry());
  }

  /**
   * Stop reception, let in-flight forwards finish, return unsent records to
   * pending and close the session and the queue. Held acknowledgements are
   * dropped; the broker redelivers those messages.
   */
  stop(): Promise<void> {
    if (!this.#stopping) this.#stopping = this.#shutdown();
    return this.#stopping;
  }

  async #shutdown(): Promise<void> {
    console.log(`[${SERVICE}] pipeline stopping...`);
    this.#abort.abort();
    this.#channel.close();
    await Promise.allSettled(this.#tasks);
    const session = this.#session;
    this.#session = null;
    this.#tokens.clear();
    this.#held.clear();
    if (session) await session.close();
    this.#queue.close();
    this.#setState('idle');
    console.log(`[${SERVICE}] pipeline stopped`);
  }

  get #stopped(): boolean {
    return this.#abort.signal.aborted;
  }

  #setState(state: PipelineState): void {
    if (state === this.#state) return;
    this.#state = state;
    this.emit('state', state);
  }

  async #connectWithRetry(): Promise<void> {
    const backoff = new Backoff(this.#connectRetry);
    while (!this.#stopped) {
      let session: MqttSession;
      try {
        session = await this.#connect();
      } catch (e) {
        if (!(e instanceof ConnectionError)) {
          console.error(`[${SERVICE}] broker session failed to start:`, errorMessage(e));
          return;
        }
        const delay = backoff.next();
        console.warn(`[${SERVICE}] broker unavailable (${e.message}); retrying in ${delay}ms`);
        await this.#sleep(delay, this.#abort.signal);
        continue;
      }
      if (this.#stopped) {
        await session.close();
        return;
      }
      this.#session = session;
      session.onMessage(async (message) => {
        if (this.#channel.closed) return;
        await this.#channel.push(message);
      });
      return;
    }
  }

  async #receive(): Promise<void> {
    for await (const message of this.#channel) {
      if (this.#stopped) break;
      this.#counters.received++;
      try {
        await this.#accept(message);
      } catch (e) {
        // Not acknowledged: the broker redelivers it
        console.error(`[${SERVICE}] failed to accept message on ${message.topic}:`, errorMessage(e));
      }
      this.#setState('idle');
    }
  }

  async #accept(message: InboundMessage): Promise<void> {
    if (this.#reattach(message)) return;
    this.#setState('decoding');
    const result = this.#decoder.decode(message.topic, message.payload, {
      receivedAt: message.receivedAt,
      messageId: message.messageId,
    });
    if (!result.ok) {
      this.#counters.dropped++;
      console.warn(`[${SERVICE}] dropping message on ${message.topic}: ${result.error.message}`);
      this.#ack(message.token);
      return;
    }
    this.#counters.decoded++;

    this.#setState('queuing');
    let sequence: number | null;
    try {
      sequence = await this.#enqueue(result.reading, message);
    } catch (e) {
      if (!(e instanceof StorageError)) throw e;
      console.error(`[${SERVICE}] ${e.message}; asking the broker to redeliver`);
      this.#session?.redeliver();
      return;
    }
    // Stopped while waiting for room
    if (sequence === null) return;
    this.#counters.enqueued++;
    if (DEBUG) console.log(`[${SERVICE}] queued ${result.reading.deviceId} reading as ${sequence}`);
    if (this.#ackPolicy === 'enqueued') this.#ack(message.token);
  }

  /**
   * A publish the broker redelivers after a reconnect takes over the stale
   * acknowledgement of its reading instead of being queued a second time.
   * Once that reading has already left the queue, it is acknowledged at once.
   */
  #reattach(message: InboundMessage): boolean {
    if (this.#ackPolicy !== 'delivered' || !message.dup || message.messageId === null) return false;
    const held = this.#held.get(message.messageId);
    if (!held || held.topic !== message.topic) return false;
    this.#counters.redelivered++;
    if (held.sequence === null) {
      this.#held.delete(message.messageId);
      this.#ack(message.token);
    } else {
      this.#tokens.set(held.sequence, message.token);
    }
    if (DEBUG) console.log(`[${SERVICE}] redelivered message ${message.messageId} matches ${held.sequence ?? 'a sent record'}`);
    return true;
  }

  #remember(messageId: number, held: HeldMessage): void {
    this.#held.delete(messageId);
    if (this.#held.size >= HELD_LIMIT) {
      const oldest = this.#held.keys().next();
      if (!oldest.done) this.#held.delete(oldest.value);
    }
    this.#held.set(messageId, held);
  }

  /** Enqueue, waiting for the queue to shrink while it is full. */
  async #enqueue(reading: Reading, message: InboundMessage): Promise<number | null> {
    let waiting = false;
    while (!this.#stopped) {
      try {
        return this.#store(reading, message);
      } catch (e) {
        if (!(e instanceof QueueFullError)) throw e;
        if (!waiting) console.warn(`[${SERVICE}] ${e.message}; holding the broker back until records leave`);
        waiting = true;
        await this.#waitFor('evicted', null);
      }
    }
    return null;
  }

  /**
   * Under 'delivered' the token is held in the same turn as the insert, before
   * a worker woken by `enqueued` can send and acknowledge the record.
   */
  #store(reading: Reading, message: InboundMessage): number {
    const sequence = this.#queue.enqueue(reading);
    if (this.#ackPolicy === 'delivered') {
      this.#tokens.set(sequence, message.token);
      if (message.messageId !== null) this.#remember(message.messageId, { topic: message.topic, sequence });
    }
    return sequence;
  }

  /** Resolves on the next queue event, after `timeoutMs`, or when the pipeline stops. */
  #waitFor(event: keyof QueueEvents, timeoutMs: number | null): Promise<void> {
    return new Promise((resolve) => {
      const signal = this.#abort.signal;
      if (signal.aborted) {
        resolve();
        return;
      }
      let timer: NodeJS.Timeout | null = null;
      const done = () => {
        this.#queue.off(event, done);
        signal.removeEventListener('abort', done);
        if (timer) clearTimeout(timer);
        resolve();
      };
      this.#queue.on(event, done);
      signal.addEventListener('abort', done, { once: true });
      if (timeoutMs !== null) timer = setTimeout(done, timeoutMs);
    });
  }

  #ack(token: AckToken): boolean {
    if (!this.#session?.acknowledge(token)) return false;
    this.#counters.acked++;
    return true;
  }

  #ackRecords(sequences: readonly number[]): void {
    for (const sequence of sequences) {
      const token = this.#tokens.get(sequence);
      if (!token) continue;
      this.#tokens.delete(sequence);
      const acked = this.#ack(token);
      if (token.messageId === null) continue;
      const held = this.#held.get(token.messageId);
      if (!held || held.sequence !== sequence) continue;
      // A stale ack leaves the entry for the broker's redelivery to settle
      if (acked) this.#held.delete(token.messageId);
      else held.sequence = null;
    }
  }

  async #work(worker: number): Promise<void> {
    const backoff = new Backoff(this.#retry);
    while (!this.#stopped) {
      this.#setState('batching');
      let batch: Batch | null = null;
      try {
        batch = await this.#collectBatch();
        if (batch) await this.#deliver(batch, backoff);
      } catch (e) {
        console.error(`[${SERVICE}] worker ${worker} failed${batch ? ` on batch ${batch.id}` : ''}:`, errorMessage(e));
        if (batch) this.#queue.release(batch.sequences);
        await this.#sleep(backoff.next(), this.#abort.signal);
      }
    }
  }

  /**
   * Up to `batchSize` records, or fewer once `batchWaitMs` passed since one was
   * pending, or at once when no further publish can arrive.
   */
  async #collectBatch(): Promise<Batch | null> {
    while (!this.#stopped && this.#queue.pendingCount() === 0) {
      await this.#waitFor('enqueued', null);
    }
    const deadline = Date.now() + this.#batchWaitMs;
    while (!this.#stopped && this.#queue.pendingCount() < this.#batchSize && !this.#intakeStalled()) {
      const left = deadline - Date.now();
      if (left <= 0) break;
      await this.#waitFor('enqueued', left);
    }
    if (this.#stopped) return null;
    return this.#queue.peekBatch(this.#batchSize);
  }

  /** Under 'delivered', mqtt.js reads no further publish while one is held. */
  #intakeStalled(): boolean {
    return this.#ackPolicy === 'delivered' && this.#channel.size === 0 && (this.#session?.unacknowledged ?? 0) > 0;
  }

  /** Send a batch until every record in it is delivered or dead-lettered. */
  async #deliver(batch: Batch, backoff: Backoff): Promise<void> {
    let current = batch;
    this.#counters.batches++;
    for (;;) {
      this.#setState('forwarding');
      const startedAt = new Date();
      const result = await this.#forwarder.send(current);
      this.#audit(current, startedAt, result);

      if (result.ok) {
        backoff.reset();
        this.#queue.markDelivered(current.sequences);
        this.#counters.delivered += current.sequences.length;
        if (DEBUG) console.log(`[${SERVICE}] batch ${current.id} delivered (${current.sequences.length} records, ${result.report.durationMs}ms)`);
        this.#setState('acking');
        this.#ackRecords(current.sequences);
        return;
      }

      const { error } = result;
      console.warn(`[${SERVICE}] batch ${current.id} (${current.sequences.length} records) failed, ${error.kind}: ${error.message}`);
      const remaining: QueuedRecord[] = [];
      const dead: number[] = [];
      for (const record of current.records) {
        if (this.#queue.markFailed(record.sequence, error.message, error.kind) === 'dead_lettered') dead.push(record.sequence);
        else remaining.push({ ...record, attempts: record.attempts + 1, lastError: error.message });
      }
      this.#counters.deadLettered += dead.length;
      if (dead.length > 0) {
        this.#setState('acking');
        this.#ackRecords(dead);
      }
      if (remaining.length === 0) {
        backoff.reset();
        return;
      }

      const sequences = remaining.map((r) => r.sequence);
      if (this.#stopped) {
        this.#queue.release(sequences);
        return;
      }
      const delay = backoff.next();
      this.#counters.retries++;
      console.log(`[${SERVICE}] retrying batch ${current.id} in ${delay}ms (attempt ${backoff.attempt + 1})`);
      await this.#sleep(delay, this.#abort.signal);
      if (this.#stopped) {
        this.#queue.release(sequences);
        return;
      }
      current = { id: current.id, sequences, records: remaining };
    }
  }

  #audit(batch: Batch, startedAt: Date, result: ForwardResult): void {
    try {
      this.#queue.recordAttempt({
        id: uuidv4(),
        batchId: batch.id,
        recordCount: batch.sequences.length,
        startedAt: startedAt.toISOString(),
        completedAt: new Date().toISOString(),
        outcome: result.ok ? 'delivered' : result.error.kind,
        status: result.ok ? result.report.status : result.error.status,
        error: result.ok ? null : result.error.message,
      });
    } catch (e) {
      console.warn(`[${SERVICE}] could not record delivery attempt for batch ${batch.id}:`, errorMessage(e));
    }
  }
}
