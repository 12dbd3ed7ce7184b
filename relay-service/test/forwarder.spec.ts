import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BATCH_SCHEMA, Forwarder, classifyStatus, toWireBatch } from '../src/forwarder.js';
import type { Batch } from '../src/types.js';
import { reading, startCollector, type Collector, type CollectorReply, type CollectorRequest } from './helpers.js';

const batch: Batch = {
  id: 'batch-1',
  sequences: [1, 2],
  records: [
    { sequence: 1, state: 'in_flight', attempts: 0, lastError: null, enqueuedAt: '2024-03-01T12:00:00.000Z', reading: reading() },
    {
      sequence: 2,
      state: 'in_flight',
      attempts: 0,
      lastError: null,
      enqueuedAt: '2024-03-01T12:00:01.000Z',
      reading: reading({ topic: 'sensors/dev-2/hum', deviceId: 'dev-2', payload: { hum: 40 } }),
    },
  ],
};

describe('classifyStatus', () => {
  it.each([
    [200, 'ok'],
    [204, 'ok'],
    [400, 'permanent'],
    [401, 'permanent'],
    [404, 'permanent'],
    [422, 'permanent'],
    [408, 'transient'],
    [429, 'transient'],
    [500, 'transient'],
    [503, 'transient'],
  ])('classifies %i as %s', (status, kind) => {
    expect(classifyStatus(status)).toBe(kind);
  });
});

describe('toWireBatch', () => {
  it('lists the readings with their sequence numbers', () => {
    expect(toWireBatch(batch, new Date('2024-03-01T12:00:05.000Z'))).toEqual({
      schema: 'datalogger.batch/v1',
      batchId: 'batch-1',
      sentAt: '2024-03-01T12:00:05.000Z',
      readings: [
        { seq: 1, topic: 'sensors/dev-1/temp', deviceId: 'dev-1', timestamp: '2024-03-01T12:00:00.000Z', payload: { temp: 21.5 } },
        { seq: 2, topic: 'sensors/dev-2/hum', deviceId: 'dev-2', timestamp: '2024-03-01T12:00:00.000Z', payload: { hum: 40 } },
      ],
    });
  });
});

describe('Forwarder', () => {
  let collector: Collector | null = null;

  const serve = async (reply: (req: CollectorRequest, index: number) => CollectorReply | null) => {
    collector = await startCollector(reply);
    return collector;
  };

  beforeEach(() => {
    vi.stubEnv('no_proxy', '127.0.0.1');
    vi.stubEnv('NO_PROXY', '127.0.0.1');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await collector?.close();
    collector = null;
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('posts the batch with an idempotency key', async () => {
    const stub = await serve(() => ({ status: 200 }));
    const forwarder = new Forwarder({ url: `${stub.url}/api/readings` });

    const result = await forwarder.send(batch);

    expect(result.ok).toBe(true);
    expect(result.ok && result.report).toMatchObject({ batchId: 'batch-1', delivered: 2, status: 200 });
    expect(stub.requests).toHaveLength(1);
    const [request] = stub.requests;
    expect(request.method).toBe('POST');
    expect(request.url).toBe('/api/readings');
    expect(request.headers['content-type']).toContain('application/json');
    expect(request.headers['idempotency-key']).toBe('batch-1');
    expect(request.headers.authorization).toBeUndefined();
    const body: unknown = JSON.parse(request.body);
    expect(body).toMatchObject({ schema: BATCH_SCHEMA, batchId: 'batch-1', readings: [{ seq: 1 }, { seq: 2 }] });
  });

  it('sends a static bearer token', async () => {
    const stub = await serve(() => ({ status: 202 }));
    const forwarder = new Forwarder({ url: stub.url, auth: { mode: 'token', token: 'test-token' } });

    const result = await forwarder.send(batch);

    expect(result.ok).toBe(true);
    expect(stub.requests[0].headers.authorization).toBe('Bearer test-token');
  });

  it.each([
    [503, 'transient'],
    [429, 'transient'],
    [408, 'transient'],
    [400, 'permanent'],
    [422, 'permanent'],
  ])('reports %i as a %s failure', async (status, kind) => {
    const stub = await serve(() => ({ status }));
    const forwarder = new Forwarder({ url: stub.url });

    const result = await forwarder.send(batch);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe(kind);
      expect(result.error.status).toBe(status);
      expect(result.error.message).toBe(`collector answered ${status} for batch batch-1`);
    }
  });

  it('reports an unreachable collector as transient', async () => {
    const stub = await serve(() => ({ status: 200 }));
    const url = stub.url;
    await stub.close();
    collector = null;
    const forwarder = new Forwarder({ url });

    const result = await forwarder.send(batch);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('transient');
      expect(result.error.status).toBeNull();
      expect(result.error.message).toMatch(/^collector unreachable: /);
    }
  });

  it('reports a collector that never answers as a transient timeout', async () => {
    const stub = await serve(() => null);
    const forwarder = new Forwarder({ url: stub.url, timeoutMs: 50 });

    const result = await forwarder.send(batch);

    expect(stub.requests).toHaveLength(1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('transient');
      expect(result.error.status).toBeNull();
      expect(result.error.message).toBe('collector did not answer within 50ms');
    }
  });

  describe('with login', () => {
    const login = (url: string) => ({ mode: 'login' as const, loginUrl: `${url}/login`, email: 'relay@example.com', password: 'test-secret' });

    it('logs in once and reuses the token', async () => {
      const stub = await serve((req) => (req.url === '/login' ? { status: 200, body: { token: 'test-token-1' } } : { status: 200 }));
      const forwarder = new Forwarder({ url: `${stub.url}/readings`, auth: login(stub.url) });

      await forwarder.send(batch);
      await forwarder.send(batch);

      expect(stub.requests.map((r) => r.url)).toEqual(['/login', '/readings', '/readings']);
      const [signIn, first, second] = stub.requests;
      expect(signIn.method).toBe('POST');
      expect(signIn.headers['content-type']).toContain('application/x-www-form-urlencoded');
      expect(signIn.body).toBe('email=relay%40example.com&password=test-secret');
      expect(first.headers.authorization).toBe('Bearer test-token-1');
      expect(second.headers.authorization).toBe('Bearer test-token-1');
    });

    it('logs in again after a 401 and repeats the request once', async () => {
      let logins = 0;
      let posts = 0;
      const stub = await serve((req) => {
        if (req.url === '/login') return { status: 200, body: { token: `test-token-${++logins}` } };
        return { status: ++posts === 1 ? 401 : 200 };
      });
      const forwarder = new Forwarder({ url: `${stub.url}/readings`, auth: login(stub.url) });

      const result = await forwarder.send(batch);

      expect(result.ok).toBe(true);
      expect(stub.requests.map((r) => [r.url, r.headers.authorization ?? null])).toEqual([
        ['/login', null],
        ['/readings', 'Bearer test-token-1'],
        ['/login', null],
        ['/readings', 'Bearer test-token-2'],
      ]);
    });

    it('gives up with a permanent failure on a second 401', async () => {
      const stub = await serve((req) => (req.url === '/login' ? { status: 200, body: { token: 'test-token' } } : { status: 401 }));
      const forwarder = new Forwarder({ url: `${stub.url}/readings`, auth: login(stub.url) });

      const result = await forwarder.send(batch);

      expect(!result.ok && [result.error.kind, result.error.status]).toEqual(['permanent', 401]);
      expect(stub.requests).toHaveLength(4);
    });

    it('treats a failed login as transient', async () => {
      const stub = await serve(() => ({ status: 500 }));
      const forwarder = new Forwarder({ url: `${stub.url}/readings`, auth: login(stub.url) });

      const result = await forwarder.send(batch);

      expect(!result.ok && result.error.kind).toBe('transient');
      expect(!result.ok && result.error.message).toBe('collector login answered 500');
      expect(stub.requests.map((r) => r.url)).toEqual(['/login']);
    });

    it('treats a login answer without token as transient', async () => {
      const stub = await serve(() => ({ status: 200, body: { ok: true } }));
      const forwarder = new Forwarder({ url: `${stub.url}/readings`, auth: login(stub.url) });

      const result = await forwarder.send(batch);

      expect(!result.ok && result.error.message).toBe('collector login response carries no token');
    });
  });
});
