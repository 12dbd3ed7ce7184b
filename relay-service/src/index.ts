/**
 * Relay Service
 * ---------------------------------------------
 * Purpose
 * - Relay sensor readings published over MQTT to a remote HTTP collector without losing any.
 *
 * Responsibilities
 * - Hold one persistent MQTT session (`clean: false`, fixed client id) subscribed to the sensor topics.
 * - Decode each publish into a Reading (JSON envelope v1, plain JSON, or `NAME:value,...,DATE:...` lines).
 * - Persist readings in a SQLite-backed queue (`relay-queue.db`) before anything else happens to them.
 * - POST batches to the collector (`datalogger.batch/v1`), retrying transient failures with backoff
 *   and dead-lettering records that fail permanently or too often.
 * - Release each message's PUBACK only once its reading is delivered or dead-lettered
 *   (`ACK_POLICY=enqueued`: once it is on disk).
 *
 * Messaging Contracts
 * - Ingests: `MQTT_TOPICS` (default `sensors/#`, QoS 1). Publishes nothing.
 * - Topic patterns (`TOPIC_PATTERNS`, default `sensors/{deviceId}/#`) name the device.
 *
 * Environment & Dependencies
 * - MQTT_URL, MQTT_USERNAME, MQTT_PASSWORD, MQTT_CLIENT_ID, MQTT_TLS_*: broker connection.
 * - COLLECTOR_URL plus COLLECTOR_TOKEN, or COLLECTOR_LOGIN_URL/EMAIL/PASSWORD: collector and its auth.
 * - QUEUE_DB, QUEUE_MAX_RECORDS, MAX_ATTEMPTS: durable queue.
 * - BATCH_SIZE, BATCH_WAIT_MS, FORWARD_CONCURRENCY, RETRY_BASE_MS, RETRY_MAX_MS: forwarding.
 * - HTTP_PORT: status endpoint (0 disables it).
 *
 * Operational Notes
 * - Broker outages are retried forever; the queue keeps draining meanwhile.
 * - A crash loses nothing: unacked messages are redelivered by the broker and queued
 *   records are resent on restart. Duplicates are possible; batches carry an Idempotency-Key.
 * - Shutdown finishes the in-flight request, then closes MQTT and the DB via `registerShutdown()`.
 *
 * Security Notes
 * - Payload contents are never logged.
 * - Collector credentials come from the environment only.
 */
import {
  SERVICE,
  ACK_POLICY,
  BATCH_SIZE,
  BATCH_WAIT_MS,
  COLLECTOR_EMAIL,
  COLLECTOR_LOGIN_URL,
  COLLECTOR_PASSWORD,
  COLLECTOR_TIMEOUT_MS,
  COLLECTOR_TOKEN,
  COLLECTOR_URL,
  FORWARD_CONCURRENCY,
  HTTP_PORT,
  MAX_ATTEMPTS,
  MQTT_CLIENT_ID,
  MQTT_PASSWORD,
  MQTT_QOS,
  MQTT_TLS_CA,
  MQTT_TLS_CERT,
  MQTT_TLS_KEY,
  MQTT_TLS_REJECT_UNAUTHORIZED,
  MQTT_TOPICS,
  MQTT_URL,
  MQTT_USERNAME,
  QUEUE_DB,
  QUEUE_MAX_RECORDS,
  RECONNECT_BASE_MS,
  RECONNECT_MAX_MS,
  RETRY_BASE_MS,
  RETRY_MAX_MS,
  TOPIC_PATTERNS,
} from './config.js';
import { Decoder } from './decoder.js';
import { Forwarder, type CollectorAuth } from './forwarder.js';
import { startHttpServer } from './http.js';
import { MqttSession } from './mqtt.js';
import { RelayPipeline } from './pipeline.js';
import { DurableQueue } from './queue.js';
import { registerShutdown } from './shutdown.js';

function collectorAuth(): CollectorAuth {
  if (COLLECTOR_LOGIN_URL && COLLECTOR_EMAIL && COLLECTOR_PASSWORD) {
    return { mode: 'login', loginUrl: COLLECTOR_LOGIN_URL, email: COLLECTOR_EMAIL, password: COLLECTOR_PASSWORD };
  }
  if (COLLECTOR_LOGIN_URL) console.warn(`[${SERVICE}] WARNING: COLLECTOR_LOGIN_URL set without COLLECTOR_EMAIL/COLLECTOR_PASSWORD; ignoring it`);
  if (COLLECTOR_TOKEN) return { mode: 'token', token: COLLECTOR_TOKEN };
  return { mode: 'none' };
}

async function main() {
  console.log(`[${SERVICE}] starting...`);
  const decoder = new Decoder(TOPIC_PATTERNS);
  const queue = new DurableQueue({ path: QUEUE_DB, maxRecords: QUEUE_MAX_RECORDS, maxAttempts: MAX_ATTEMPTS });
  const stats = queue.stats();
  console.log(`[${SERVICE}] queue ${QUEUE_DB}: ${stats.pending} pending, ${stats.deadLetters} dead letters`);

  const auth = collectorAuth();
  const forwarder = new Forwarder({ url: COLLECTOR_URL, auth, timeoutMs: COLLECTOR_TIMEOUT_MS });
  console.log(`[${SERVICE}] collector ${COLLECTOR_URL} (auth: ${auth.mode})`);

  const pipeline = new RelayPipeline({
    connect: () =>
      MqttSession.connect({
        url: MQTT_URL,
        username: MQTT_USERNAME,
        password: MQTT_PASSWORD,
        clientId: MQTT_CLIENT_ID,
        topicFilters: MQTT_TOPICS,
        qos: MQTT_QOS,
        tls: { ca: MQTT_TLS_CA, cert: MQTT_TLS_CERT, key: MQTT_TLS_KEY, rejectUnauthorized: MQTT_TLS_REJECT_UNAUTHORIZED },
        reconnect: { baseMs: RECONNECT_BASE_MS, maxMs: RECONNECT_MAX_MS },
      }),
    decoder,
    queue,
    forwarder,
    batchSize: BATCH_SIZE,
    batchWaitMs: BATCH_WAIT_MS,
    concurrency: FORWARD_CONCURRENCY,
    ackPolicy: ACK_POLICY,
    retry: { baseMs: RETRY_BASE_MS, maxMs: RETRY_MAX_MS },
    connectRetry: { baseMs: RECONNECT_BASE_MS, maxMs: RECONNECT_MAX_MS },
  });

  const server = HTTP_PORT > 0 ? startHttpServer({ pipeline, queue, port: HTTP_PORT }) : null;
  registerShutdown(pipeline, server);
  pipeline.start();
}

main().catch((e) => {
  console.error(`[${SERVICE}] startup failed:`, e);
  process.exitCode = 1;
});
