import { vi } from 'vitest';
import { EventEmitter } from 'eventemitter3';
import http from 'http';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { IClientOptions, IConnackPacket, IPublishPacket, ISubscriptionGrant } from 'mqtt';
import type { BrokerClient, QoS } from '../src/mqtt.js';
import type { Reading } from '../src/types.js';

/**
 * In-process stand-in for mqtt.js' MqttClient and the broker session behind it.
 * Like mqtt.js it hands over one publish at a time: the next goes to
 * `handleMessage` only once the previous callback (the PUBACK) has fired.
 * Publishes left unacknowledged when a connection drops are redelivered, with
 * `dup` set, after the next CONNACK.
 */
export class FakeBrokerClient extends EventEmitter implements BrokerClient {
  connected = false;
  ended = false;
  reconnects = 0;
  readonly subscriptions: Array<{ topics: string[]; qos: QoS }> = [];
  /** Packet ids whose PUBACK was released */
  readonly acked: number[] = [];
  #nextId = 1;
  // Publishes the broker still waits on, oldest first; the head may be in delivery
  readonly #outbox: IPublishPacket[] = [];
  #delivering = false;
  #connection = 0;

  constructor(readonly options: IClientOptions) {
    super();
  }

  handleMessage(_packet: IPublishPacket, callback: (error?: Error) => void): void {
    callback();
  }

  open(sessionPresent = false): void {
    this.connected = true;
    this.#connection++;
    const connack: IConnackPacket = { cmd: 'connack', sessionPresent };
    this.emit('connect', connack);
    this.#deliverNext();
  }

  fail(error: Error): void {
    this.emit('error', error);
    this.#lose();
    this.emit('close');
  }

  /** Connection lost without `end()`. */
  drop(): void {
    this.connected = false;
    this.#lose();
    this.emit('close');
  }

  /** Queue a publish from the broker; returns its packet id. */
  publish(topic: string, payload: string | Buffer, qos: QoS = 1): number {
    const messageId = this.#nextId++;
    this.#outbox.push({
      cmd: 'publish',
      topic,
      payload: typeof payload === 'string' ? Buffer.from(payload) : payload,
      qos,
      dup: false,
      retain: false,
      messageId,
    });
    this.#deliverNext();
    return messageId;
  }

  /** Publishes not yet acknowledged, in delivery or waiting behind it. */
  get unacknowledged(): number {
    return this.#outbox.length;
  }

  #deliverNext(): void {
    if (this.#delivering || !this.connected) return;
    const packet = this.#outbox[0];
    if (!packet) return;
    this.#delivering = true;
    const connection = this.#connection;
    this.handleMessage(packet, () => {
      // A PUBACK for a closed connection never reaches the broker
      if (connection !== this.#connection || !this.connected) return;
      this.#delivering = false;
      this.#outbox.shift();
      if (packet.messageId !== undefined) this.acked.push(packet.messageId);
      this.#deliverNext();
    });
  }

  #lose(): void {
    const sent = this.#outbox[0];
    if (this.#delivering && sent) this.#outbox[0] = { ...sent, dup: true };
    this.#delivering = false;
  }

  subscribe(topics: string[], options: { qos: QoS }, callback: (error: Error | null, granted?: ISubscriptionGrant[]) => void): this {
    this.subscriptions.push({ topics, qos: options.qos });
    setImmediate(() => callback(null, topics.map((topic) => ({ topic, qos: options.qos }))));
    return this;
  }

  reconnect(): this {
    this.reconnects++;
    this.ended = false;
    setImmediate(() => this.open(true));
    return this;
  }

  end(_force: boolean, callback: () => void): this {
    const wasConnected = this.connected;
    this.connected = false;
    this.ended = true;
    this.#lose();
    if (wasConnected) this.emit('close');
    setImmediate(callback);
    return this;
  }
}

/** Hands out FakeBrokerClients; each connects (or is refused) on the next tick. */
export class FakeBroker {
  readonly clients: FakeBrokerClient[] = [];
  /** Refuse this many connection attempts before accepting */
  refusals = 0;

  readonly createClient = (_url: string, options: IClientOptions): FakeBrokerClient => {
    const client = new FakeBrokerClient(options);
    this.clients.push(client);
    const refuse = this.refusals > 0;
    if (refuse) this.refusals--;
    setImmediate(() => (refuse ? client.fail(new Error('Connection refused: Not authorized')) : client.open()));
    return client;
  };

  get client(): FakeBrokerClient {
    const client = this.clients[this.clients.length - 1];
    if (!client) throw new Error('no client created yet');
    return client;
  }
}

/** Retry an assertion until it passes; SQLite fsyncs make some paths slower than the runner default allows. */
export function eventually(assertion: () => void): Promise<void> {
  return vi.waitFor(assertion, { timeout: 10_000, interval: 10 });
}

export interface TempDir {
  path: string;
  file(name: string): string;
  remove(): void;
}

export function tempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), 'relay-test-'));
  return {
    path,
    file: (name) => join(path, name),
    remove: () => rmSync(path, { recursive: true, force: true }),
  };
}

export function reading(overrides: Partial<Reading> = {}): Reading {
  return {
    topic: 'sensors/dev-1/temp',
    deviceId: 'dev-1',
    timestamp: '2024-03-01T12:00:00.000Z',
    payload: { temp: 21.5 },
    messageId: null,
    ...overrides,
  };
}

export interface CollectorRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export interface CollectorReply {
  status: number;
  body?: unknown;
}

export interface Collector {
  url: string;
  requests: CollectorRequest[];
  close(): Promise<void>;
}

/** Local HTTP server standing in for the collector; `reply` picks each response, or null to leave the request unanswered. */
export async function startCollector(reply: (req: CollectorRequest, index: number) => CollectorReply | null): Promise<Collector> {
  const requests: CollectorRequest[] = [];
  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const request: CollectorRequest = {
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf8'),
      };
      requests.push(request);
      const answer = reply(request, requests.length - 1);
      if (!answer) return;
      res.statusCode = answer.status;
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify(answer.body ?? {}));
    });
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('collector stub is not listening on a port');
  return {
    url: `http://127.0.0.1:${address.port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
