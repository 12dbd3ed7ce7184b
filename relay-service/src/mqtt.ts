import { connect, type IClientOptions, type IConnackPacket, type IPublishPacket, type ISubscriptionGrant } from 'mqtt';
import { EventEmitter } from 'eventemitter3';
import { existsSync, readFileSync } from 'fs';
import { Backoff, type BackoffOptions } from './backoff.js';
import { DEBUG, SERVICE } from './config.js';
import { ConnectionError, errorMessage } from './errors.js';

export type QoS = 0 | 1 | 2;

/** The part of mqtt.js' MqttClient the session drives. */
export interface BrokerClient {
  connected: boolean;
  handleMessage(packet: IPublishPacket, callback: (error?: Error) => void): void;
  on(event: 'connect', listener: (connack: IConnackPacket) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'offline', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  subscribe(topics: string[], options: { qos: QoS }, callback: (error: Error | null, granted?: ISubscriptionGrant[]) => void): unknown;
  reconnect(): unknown;
  end(force: boolean, callback: () => void): unknown;
}

/** Opaque handle for one publish whose PUBACK is still held back. */
export interface AckToken {
  readonly epoch: number;
  readonly messageId: number | null;
}

export interface InboundMessage {
  topic: string;
  payload: Buffer;
  messageId: number | null;
  qos: QoS;
  /** Set by the broker on a redelivery after a reconnect */
  dup: boolean;
  receivedAt: Date;
  token: AckToken;
}

export type MessageHandler = (message: InboundMessage) => void | Promise<void>;

export interface MqttTlsFiles {
  ca?: string;
  cert?: string;
  key?: string;
  rejectUnauthorized?: boolean;
}

export interface MqttSessionOptions {
  url: string;
  username?: string;
  password?: string;
  /** Must be stable across restarts: the broker keeps unacked messages under it */
  clientId: string;
  topicFilters: string[];
  /** @default 1 */
  qos?: QoS;
  tls?: MqttTlsFiles;
  /** Reconnect schedule. @default base 1s, cap 60s, full jitter */
  reconnect?: BackoffOptions;
  /** @default 30000 */
  connectTimeoutMs?: number;
  /** Replaces mqtt.connect, e.g. with an in-process fake */
  createClient?: (url: string, options: IClientOptions) => BrokerClient;
}

interface SessionEvents {
  connected: [];
  disconnected: [];
}

function loadTlsFile(label: string, path: string | undefined): Buffer | undefined {
  if (!path) return undefined;
  try {
    if (existsSync(path)) return readFileSync(path);
    console.warn(`[${SERVICE}] WARNING: ${label} path set but file not found: ${path}`);
  } catch (e) {
    console.warn(`[${SERVICE}] WARNING: failed to read ${label} (${path}): ${errorMessage(e)}`);
  }
  return undefined;
}

/**
 * One logical broker session: connects, resubscribes on every CONNACK,
 * reconnects with backoff after unexpected disconnects, and holds each
 * inbound publish's acknowledgement until `acknowledge` is called.
 *
 * mqtt.js sends the PUBACK when `handleMessage` calls back and reads no
 * further packets until then, so holding a token also holds the broker back.
 */
export class MqttSession extends EventEmitter<SessionEvents> {
  readonly #options: MqttSessionOptions;
  readonly #qos: QoS;
  readonly #backoff: Backoff;
  readonly #pending = new Map<AckToken, () => void>();
  readonly #backlog: InboundMessage[] = [];
  #client: BrokerClient | null = null;
  #handler: MessageHandler | null = null;
  #epoch = 0;
  #connected = false;
  #closed = false;
  #reconnectTimer: NodeJS.Timeout | null = null;

  private constructor(options: MqttSessionOptions) {
    super();
    this.#options = options;
    this.#qos = options.qos ?? 1;
    this.#backoff = new Backoff({ baseMs: 1000, maxMs: 60_000, jitter: 'full', ...options.reconnect });
  }

  /**
   * Open a session. Rejects with ConnectionError when the first attempt is
   * refused or the broker is unreachable.
   */
  static async connect(options: MqttSessionOptions): Promise<MqttSession> {
    const session = new MqttSession(options);
    await session.#open();
    return session;
  }

  get connected(): boolean {
    return this.#connected;
  }

  /**
   * Held acknowledgements on the current connection. mqtt.js reads no further
   * publish while this is above zero.
   */
  get unacknowledged(): number {
    return this.#pending.size;
  }

  #open(): Promise<void> {
    const { url, username, password, clientId, tls } = this.#options;
    const usingTls = url.startsWith('mqtts://');
    const ca = usingTls ? loadTlsFile('MQTT_TLS_CA', tls?.ca) : undefined;
    const cert = usingTls ? loadTlsFile('MQTT_TLS_CERT', tls?.cert) : undefined;
    const key = usingTls ? loadTlsFile('MQTT_TLS_KEY', tls?.key) : undefined;

    // Only send credentials if both username and password are set
    const auth: Partial<IClientOptions> = {};
    if (username && password) {
      auth.username = username;
      auth.password = password;
    } else if (username && !password) {
      console.warn(`[${SERVICE}] WARNING: MQTT username is set but password is missing; connecting without credentials`);
    }

    const options: IClientOptions = {
      ...auth,
      clientId,
      // Persistent session: unacked QoS >= 1 messages are redelivered after reconnect
      clean: false,
      // Reconnects are scheduled here, with backoff
      reconnectPeriod: 0,
      resubscribe: false,
      connectTimeout: this.#options.connectTimeoutMs ?? 30_000,
      ca,
      cert,
      key,
      rejectUnauthorized: tls?.rejectUnauthorized ?? true,
    };
    console.log(
      `[${SERVICE}] MQTT config: url=${url} clientId=${clientId} topics=${this.#options.topicFilters.join(',')} qos=${this.#qos} ca=${tls?.ca || 'unset'} cert=${tls?.cert || 'unset'} key=${tls?.key || 'unset'}`,
    );

    const create = this.#options.createClient ?? ((u: string, o: IClientOptions): BrokerClient => connect(u, o));
    const client = create(url, options);
    this.#client = client;

    return new Promise((resolve, reject) => {
      let settled = false;
      const fail = (err: ConnectionError) => {
        settled = true;
        this.#closed = true;
        client.end(true, () => undefined);
        reject(err);
      };

      client.handleMessage = (packet, callback) => this.#onPublish(packet, callback);
      client.on('connect', (connack) => {
        this.#onConnect(client, connack);
        if (!settled) {
          settled = true;
          resolve();
        }
      });
      client.on('error', (err) => {
        if (!settled) {
          fail(new ConnectionError(`mqtt connect to ${url} failed: ${err.message}`, { cause: err }));
          return;
        }
        console.error(`[${SERVICE}] mqtt error`, err.message);
      });
      client.on('close', () => {
        if (!settled) {
          fail(new ConnectionError(`mqtt connection to ${url} closed before CONNACK`));
          return;
        }
        this.#onClose();
      });
      client.on('offline', () => console.warn(`[${SERVICE}] mqtt offline`));
    });
  }

  #onConnect(client: BrokerClient, connack: IConnackPacket): void {
    this.#epoch++;
    this.#connected = true;
    this.#pending.clear();
    this.#backoff.reset();
    console.log(`[${SERVICE}] connected to MQTT (session present: ${connack.sessionPresent ? 'yes' : 'no'})`);
    const topics = this.#options.topicFilters;
    client.subscribe(topics, { qos: this.#qos }, (err, granted) => {
      if (err) {
        console.error(`[${SERVICE}] subscribe error`, err.message);
        return;
      }
      for (const grant of granted ?? []) {
        if (grant.qos === 128) console.error(`[${SERVICE}] broker refused subscription to ${grant.topic}`);
      }
      console.log(`[${SERVICE}] subscribed to ${topics.join(', ')}`);
    });
    this.emit('connected');
  }

  #onClose(): void {
    const wasConnected = this.#connected;
    this.#connected = false;
    // Held acks belong to the dead connection; the broker redelivers those messages
    this.#pending.clear();
    if (wasConnected) this.emit('disconnected');
    if (this.#closed) return;
    this.#scheduleReconnect();
  }

  #scheduleReconnect(): void {
    if (this.#reconnectTimer || this.#closed) return;
    const delay = this.#backoff.next();
    console.warn(`[${SERVICE}] mqtt connection closed; reconnecting in ${delay}ms (attempt ${this.#backoff.attempt})`);
    this.#reconnectTimer = setTimeout(() => {
      this.#reconnectTimer = null;
      if (this.#closed || !this.#client) return;
      console.log(`[${SERVICE}] mqtt reconnecting...`);
      this.#client.reconnect();
    }, delay);
  }

  #onPublish(packet: IPublishPacket, callback: (error?: Error) => void): void {
    const token: AckToken = Object.freeze({ epoch: this.#epoch, messageId: packet.messageId ?? null });
    this.#pending.set(token, () => callback());
    const message: InboundMessage = {
      topic: packet.topic,
      payload: typeof packet.payload === 'string' ? Buffer.from(packet.payload) : packet.payload,
      messageId: token.messageId,
      qos: packet.qos,
      dup: packet.dup,
      receivedAt: new Date(),
      token,
    };
    if (DEBUG) console.log(`[${SERVICE}] publish topic=${message.topic} id=${message.messageId ?? '-'} bytes=${message.payload.length}`);
    if (!this.#handler) {
      this.#backlog.push(message);
      return;
    }
    this.#dispatch(this.#handler, message);
  }

  #dispatch(handler: MessageHandler, message: InboundMessage): void {
    (async () => {
      await handler(message);
    })().catch((e) => {
      console.error(`[${SERVICE}] message handler failed for ${message.topic}:`, errorMessage(e));
    });
  }

  /** Register the receiver of inbound publishes; messages that arrived earlier are replayed to it. */
  onMessage(handler: MessageHandler): void {
    this.#handler = handler;
    for (const message of this.#backlog.splice(0)) this.#dispatch(handler, message);
  }

  /**
   * Release the PUBACK for a message. Returns false when the token is unknown,
   * already used, or belongs to a connection that has since dropped.
   */
  acknowledge(token: AckToken): boolean {
    const ack = this.#pending.get(token);
    if (!ack) {
      if (DEBUG) console.log(`[${SERVICE}] ignoring ack for message ${token.messageId ?? '-'} (epoch ${token.epoch}, current ${this.#epoch})`);
      return false;
    }
    this.#pending.delete(token);
    ack();
    return true;
  }

  /** Drop the connection so the broker redelivers everything still unacknowledged. */
  redeliver(): void {
    const client = this.#client;
    if (this.#closed || !client) return;
    console.warn(`[${SERVICE}] dropping MQTT connection to force redelivery`);
    this.#pending.clear();
    if (this.#connected) {
      this.#connected = false;
      this.emit('disconnected');
    }
    client.end(true, () => this.#scheduleReconnect());
  }

  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    if (this.#reconnectTimer) {
      clearTimeout(this.#reconnectTimer);
      this.#reconnectTimer = null;
    }
    this.#pending.clear();
    this.#backlog.length = 0;
    const client = this.#client;
    if (client) await new Promise<void>((resolve) => client.end(true, () => resolve()));
    this.#connected = false;
    console.log(`[${SERVICE}] MQTT session closed`);
  }
}
