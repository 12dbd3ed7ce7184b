import dotenv from 'dotenv';

// Load .env before any constant below reads process.env
dotenv.config();

export const SERVICE = 'relay-service';

function list(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

// MQTT connection settings (mirrors the broker the sensors publish to)
export const MQTT_URL: string = process.env.MQTT_URL || 'mqtt://127.0.0.1:1883';
export const MQTT_USERNAME: string | undefined = process.env.MQTT_USERNAME || undefined;
export const MQTT_PASSWORD: string | undefined = process.env.MQTT_PASSWORD || undefined;
// Fixed client id: the broker keeps the persistent session (and unacked QoS 1 messages) under it
export const MQTT_CLIENT_ID: string = process.env.MQTT_CLIENT_ID || 'datalogger-relay';
export const MQTT_TOPICS: string[] = list(process.env.MQTT_TOPICS || 'sensors/#');
export const MQTT_QOS: 1 | 2 = process.env.MQTT_QOS === '2' ? 2 : 1;

// TLS options for mTLS connections (mqtts://)
// Provide filesystem paths to PEM files via env vars when using mTLS.
export const MQTT_TLS_CA: string | undefined = process.env.MQTT_TLS_CA || undefined; // e.g., ./certs/ca.crt
export const MQTT_TLS_CERT: string | undefined = process.env.MQTT_TLS_CERT || undefined; // e.g., ./certs/relay.crt
export const MQTT_TLS_KEY: string | undefined = process.env.MQTT_TLS_KEY || undefined; // e.g., ./certs/relay.key
export const MQTT_TLS_REJECT_UNAUTHORIZED: boolean = (process.env.MQTT_TLS_REJECT_UNAUTHORIZED ?? 'true') !== 'false';
export const RECONNECT_BASE_MS = Number(process.env.RECONNECT_BASE_MS || 1000);
export const RECONNECT_MAX_MS = Number(process.env.RECONNECT_MAX_MS || 60_000);

// Topics the decoder accepts; `{deviceId}` captures one level
export const TOPIC_PATTERNS: string[] = list(process.env.TOPIC_PATTERNS || 'sensors/{deviceId}/#');

// Durable queue
export const QUEUE_DB: string = process.env.QUEUE_DB || 'relay-queue.db';
export const QUEUE_MAX_RECORDS = Number(process.env.QUEUE_MAX_RECORDS || 100_000);
export const MAX_ATTEMPTS = Number(process.env.MAX_ATTEMPTS || 5);

// HTTP collector
export const COLLECTOR_URL: string = process.env.COLLECTOR_URL || 'http://127.0.0.1:8080/api/readings';
export const COLLECTOR_TOKEN: string | undefined = process.env.COLLECTOR_TOKEN || undefined;
export const COLLECTOR_LOGIN_URL: string | undefined = process.env.COLLECTOR_LOGIN_URL || undefined;
export const COLLECTOR_EMAIL: string | undefined = process.env.COLLECTOR_EMAIL || undefined;
export const COLLECTOR_PASSWORD: string | undefined = process.env.COLLECTOR_PASSWORD || undefined;
export const COLLECTOR_TIMEOUT_MS = Number(process.env.COLLECTOR_TIMEOUT_MS || 10_000);

// Batching and retries
export const BATCH_SIZE = Number(process.env.BATCH_SIZE || 50);
export const BATCH_WAIT_MS = Number(process.env.BATCH_WAIT_MS || 1000);
export const FORWARD_CONCURRENCY = Number(process.env.FORWARD_CONCURRENCY || 1);
export const RETRY_BASE_MS = Number(process.env.RETRY_BASE_MS || 1000);
export const RETRY_MAX_MS = Number(process.env.RETRY_MAX_MS || 60_000);

// `delivered`: PUBACK only once the collector accepted the reading; `enqueued`: once it is on disk
export const ACK_POLICY: 'delivered' | 'enqueued' = process.env.ACK_POLICY === 'enqueued' ? 'enqueued' : 'delivered';

// Status endpoint; 0 disables it
export const HTTP_PORT = Number(process.env.HTTP_PORT ?? 8082);

export const DEBUG: boolean = (process.env.DEBUG || '').toLowerCase() === 'true';
