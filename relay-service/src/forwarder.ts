import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { SERVICE } from './config.js';
import { ForwardError, errorMessage, type ForwardErrorKind } from './errors.js';
import type { Batch, DeliveryReport, JsonValue } from './types.js';

/** Version tag of the collector request body. */
export const BATCH_SCHEMA = 'datalogger.batch/v1';

export interface WireReading {
  seq: number;
  topic: string;
  deviceId: string;
  timestamp: string;
  payload: JsonValue;
}

export interface WireBatch {
  schema: typeof BATCH_SCHEMA;
  batchId: string;
  sentAt: string;
  readings: WireReading[];
}

export type CollectorAuth =
  | { mode: 'none' }
  | { mode: 'token'; token: string }
  | { mode: 'login'; loginUrl: string; email: string; password: string };

export interface ForwarderOptions {
  url: string;
  /** @default { mode: 'none' } */
  auth?: CollectorAuth;
  /** Per request, login included. @default 10000 */
  timeoutMs?: number;
}

export type ForwardResult = { ok: true; report: DeliveryReport } | { ok: false; error: ForwardError };

/** What the pipeline needs from a forwarder. */
export interface BatchSender {
  send(batch: Batch): Promise<ForwardResult>;
}

export function toWireBatch(batch: Batch, sentAt: Date): WireBatch {
  return {
    schema: BATCH_SCHEMA,
    batchId: batch.id,
    sentAt: sentAt.toISOString(),
    readings: batch.records.map((record) => ({
      seq: record.sequence,
      topic: record.reading.topic,
      deviceId: record.reading.deviceId,
      timestamp: record.reading.timestamp,
      payload: record.reading.payload,
    })),
  };
}

/** 2xx is success; 408 and 429 are worth retrying, any other 4xx is not; everything else is transient. */
export function classifyStatus(status: number): 'ok' | ForwardErrorKind {
  if (status >= 200 && status < 300) return 'ok';
  if (status === 408 || status === 429) return 'transient';
  if (status >= 400 && status < 500) return 'permanent';
  return 'transient';
}

function readToken(data: unknown): string | null {
  if (typeof data === 'object' && data !== null && 'token' in data && typeof data.token === 'string' && data.token) {
    return data.token;
  }
  return null;
}

function transportError(e: unknown, timeoutMs: number): ForwardError {
  if (axios.isAxiosError(e) && (e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT')) {
    return new ForwardError('transient', `collector did not answer within ${timeoutMs}ms`, null, { cause: e });
  }
  return new ForwardError('transient', `collector unreachable: ${errorMessage(e)}`, null, { cause: e });
}

/**
 * Posts batches to the HTTP collector and classifies the answer. Never
 * throws: every outcome comes back as a ForwardResult.
 */
export class Forwarder implements BatchSender {
  readonly #url: string;
  readonly #auth: CollectorAuth;
  readonly #timeoutMs: number;
  readonly #http: AxiosInstance;
  #token: string | null;
  #login: Promise<string> | null = null;

  constructor(options: ForwarderOptions) {
    this.#url = options.url;
    this.#auth = options.auth ?? { mode: 'none' };
    this.#timeoutMs = options.timeoutMs ?? 10_000;
    this.#token = this.#auth.mode === 'token' ? this.#auth.token : null;
    this.#http = axios.create({
      timeout: this.#timeoutMs,
      // Status codes are classified here, not thrown
      validateStatus: () => true,
    });
  }

  async send(batch: Batch): Promise<ForwardResult> {
    const started = Date.now();
    const body = toWireBatch(batch, new Date());
    let res: AxiosResponse<unknown>;
    try {
      res = await this.#post(body, await this.#currentToken());
      if (res.status === 401 && this.#auth.mode === 'login') {
        console.warn(`[${SERVICE}] collector rejected the token; logging in again`);
        this.#token = null;
        res = await this.#post(body, await this.#currentToken());
      }
    } catch (e) {
      return { ok: false, error: e instanceof ForwardError ? e : transportError(e, this.#timeoutMs) };
    }

    const kind = classifyStatus(res.status);
    if (kind !== 'ok') {
      return { ok: false, error: new ForwardError(kind, `collector answered ${res.status} for batch ${batch.id}`, res.status) };
    }
    return {
      ok: true,
      report: { batchId: batch.id, delivered: batch.records.length, status: res.status, durationMs: Date.now() - started },
    };
  }

  #post(body: WireBatch, token: string | null): Promise<AxiosResponse<unknown>> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Idempotency-Key': body.batchId,
    };
    if (token) headers.Authorization = `Bearer ${token}`;
    return this.#http.post<unknown>(this.#url, body, { headers });
  }

  async #currentToken(): Promise<string | null> {
    const auth = this.#auth;
    if (auth.mode !== 'login') return this.#token;
    if (this.#token) return this.#token;
    // Concurrent workers share one login
    if (!this.#login) {
      this.#login = this.#logIn(auth.loginUrl, auth.email, auth.password).finally(() => {
        this.#login = null;
      });
    }
    this.#token = await this.#login;
    return this.#token;
  }

  async #logIn(loginUrl: string, email: string, password: string): Promise<string> {
    let res: AxiosResponse<unknown>;
    try {
      res = await this.#http.post<unknown>(loginUrl, new URLSearchParams({ email, password }), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
    } catch (e) {
      throw new ForwardError('transient', `collector login failed: ${errorMessage(e)}`, null, { cause: e });
    }
    if (res.status < 200 || res.status >= 300) {
      throw new ForwardError('transient', `collector login answered ${res.status}`, res.status);
    }
    const token = readToken(res.data);
    if (!token) throw new ForwardError('transient', 'collector login response carries no token', res.status);
    console.log(`[${SERVICE}] logged in to collector as ${email}`);
    return token;
  }
}
