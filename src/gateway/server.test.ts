import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import { fileURLToPath } from 'url';
import { createGateway } from './server.js';
import { API_KEY_HEADER } from '../auth/middleware.js';
import { RecommendationEngine } from '../recommend/orchestrator.js';
import { RecommendationService } from '../recommend/service.js';
import { loadCatalog } from '../catalog/catalog.js';
import { AuditTrail } from '../traces/audit-trail.js';
import { MemoryFeatureStore } from '../test-utils/memory-store.js';
import { createMockLogger, createTestDb } from '../test-utils/mocks.js';
import { TEST_USER, makeAccount } from '../test-utils/fixtures.js';

const API_KEY = 'test-secret';
const CATALOG = loadCatalog(fileURLToPath(new URL('../../config/catalog.json', import.meta.url)));

describe('gateway', () => {
  let server: Server;
  let base: string;
  let store: MemoryFeatureStore;

  beforeAll(async () => {
    store = new MemoryFeatureStore().seed([
      makeAccount({ id: 'acc-visa', type: 'credit', subtype: 'credit card', balance: 3400, creditLimit: 5000, mask: '4523' }),
    ], []);
    const engine = new RecommendationEngine({
      store,
      catalog: CATALOG,
      logger: createMockLogger(),
      options: { now: () => new Date('2026-10-01T00:00:00.000Z') },
    });
    const audit = new AuditTrail(createTestDb(), createMockLogger());
    audit.attach(engine);
    const service = new RecommendationService(engine, store, audit, createMockLogger());
    ({ server } = createGateway({
      service,
      logger: createMockLogger(),
      apiKey: API_KEY,
      defaultWindow: '30d',
      platform: { name: 'Ledgerwise', version: '1.0.0' },
      catalogVersion: CATALOG.version,
    }));

    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('gateway did not bind a TCP port');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  function call(method: string, path: string, body?: unknown, key: string | null = API_KEY): Promise<Response> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (key !== null) headers[API_KEY_HEADER] = key;
    return fetch(`${base}${path}`, { method, headers, body: body === undefined ? undefined : JSON.stringify(body) });
  }

  it('serves health without a key', async () => {
    const res = await call('GET', '/health', undefined, null);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', platform: 'Ledgerwise', catalogVersion: CATALOG.version });
  });

  it('requires the API key', async () => {
    expect((await call('GET', `/api/users/${TEST_USER}/recommendations`, undefined, null)).status).toBe(401);
    expect((await call('GET', `/api/users/${TEST_USER}/recommendations`, undefined, 'wrong')).status).toBe(403);
  });

  it('accepts the key as a bearer token', async () => {
    const res = await fetch(`${base}/api/users/${TEST_USER}/persona`, {
      method: 'POST',
      headers: { authorization: `Bearer ${API_KEY}` },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true, data: { primaryPersona: 'high_utilization' } });
  });

  it('generates and then lists recommendations', async () => {
    const created = await call('POST', `/api/users/${TEST_USER}/recommendations?window=30d`);
    expect(created.status).toBe(201);
    const body: { ok: boolean; data: Array<{ contentId: string }> } = await created.json();
    expect(body.data.map(r => r.contentId)[0]).toBe('edu_credit_util_101');

    const listed = await call('GET', `/api/users/${TEST_USER}/recommendations`);
    const listedBody: { ok: boolean; data: Array<{ contentId: string }> } = await listed.json();
    expect(listedBody.data.map(r => r.contentId)).toEqual(body.data.map(r => r.contentId));
  });

  it('looks up a trace and the user timeline', async () => {
    const created = await call('POST', `/api/users/${TEST_USER}/recommendations`);
    const body: { data: Array<{ id: string; decisionTrace: { traceId: string } }> } = await created.json();
    const { traceId } = body.data[0].decisionTrace;

    const trace = await call('GET', `/api/traces/${traceId}`);
    expect(trace.status).toBe(200);
    expect(await trace.json()).toMatchObject({ ok: true, data: { id: body.data[0].id, decisionTrace: { traceId } } });

    const timeline = await call('GET', `/api/users/${TEST_USER}/timeline?limit=1`);
    expect(timeline.status).toBe(200);
    expect(await timeline.json()).toMatchObject({ ok: true, data: { userId: TEST_USER, events: [{ action: 'recommendation:created' }] } });
  });

  it('maps an unknown trace to 404 and a bad limit to 400', async () => {
    expect((await call('GET', '/api/traces/trace-none')).status).toBe(404);
    expect((await call('GET', `/api/users/${TEST_USER}/timeline?limit=abc`)).status).toBe(400);
  });

  it('maps invalid windows to 400', async () => {
    const res = await call('POST', `/api/users/${TEST_USER}/features?window=7d`);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ ok: false, error: { code: 'INVALID_REQUEST' } });
  });

  it('maps storage failures to 503', async () => {
    store.failOn('listAccounts', 'user-down');

    const res = await call('POST', '/api/users/user-down/features');

    expect(res.status).toBe(503);
  });

  it('runs a batch', async () => {
    const res = await call('POST', '/api/batch/recommendations', { userIds: [TEST_USER, 'user-none'] });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true, data: { window: '30d', succeeded: 2, failed: 0 } });
  });

  it('validates the batch body', async () => {
    const res = await call('POST', '/api/batch/recommendations', { userIds: [] });

    expect(res.status).toBe(400);
  });

  it('returns 404 for unknown routes', async () => {
    expect((await call('GET', '/api/nowhere')).status).toBe(404);
  });
});
