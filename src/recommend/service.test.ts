import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { fileURLToPath } from 'url';
import { RecommendationService } from './service.js';
import { RecommendationEngine } from './orchestrator.js';
import { loadCatalog } from '../catalog/catalog.js';
import { AuditTrail } from '../traces/audit-trail.js';
import { MemoryFeatureStore } from '../test-utils/memory-store.js';
import { createMockLogger, createRecordingLogger, createTestDb } from '../test-utils/mocks.js';
import { TEST_USER, makeAccount } from '../test-utils/fixtures.js';

const CATALOG = loadCatalog(fileURLToPath(new URL('../../config/catalog.json', import.meta.url)));

describe('RecommendationService', () => {
  let store: MemoryFeatureStore;
  let db: Database.Database;
  let service: RecommendationService;
  let logger: ReturnType<typeof createRecordingLogger>;

  beforeEach(() => {
    store = new MemoryFeatureStore().seed([
      makeAccount({ id: 'acc-visa', type: 'credit', subtype: 'credit card', balance: 3400, creditLimit: 5000, mask: '4523' }),
      makeAccount({ id: 'acc-2', userId: 'user-2', type: 'credit', subtype: 'credit card', balance: 100, creditLimit: 1000 }),
    ], []);
    const engine = new RecommendationEngine({
      store,
      catalog: CATALOG,
      logger: createMockLogger(),
      options: { now: () => new Date('2026-10-01T00:00:00.000Z') },
    });
    db = createTestDb();
    const audit = new AuditTrail(db, createMockLogger());
    audit.attach(engine);
    logger = createRecordingLogger();
    service = new RecommendationService(engine, store, audit, logger);
  });

  it('defaults the window to 30d', () => {
    const result = service.computeFeatures(TEST_USER);

    expect(result.ok && result.data.timeWindow).toBe('30d');
  });

  it('returns the persona assignment', () => {
    const result = service.assignPersona(TEST_USER, '30d');

    expect(result.ok && result.data.primaryPersona).toBe('high_utilization');
  });

  it('lists what generation stored', () => {
    const generated = service.generateRecommendations(TEST_USER, '30d');
    const listed = service.listRecommendations(TEST_USER, '30d');

    expect(generated.ok).toBe(true);
    expect(listed).toEqual(generated);
  });

  it('rejects an unknown window', () => {
    expect(service.generateRecommendations(TEST_USER, '7d')).toMatchObject({
      ok: false,
      error: { code: 'INVALID_REQUEST' },
    });
    expect(store.recommendations).toEqual([]);
  });

  it('rejects a blank user id', () => {
    expect(service.assignPersona('   ')).toMatchObject({ ok: false, error: { code: 'INVALID_REQUEST' } });
  });

  it('maps storage failures to STORAGE_FAILURE and logs them', () => {
    store.failOn('listAccounts', TEST_USER);

    const result = service.computeFeatures(TEST_USER, '30d');

    expect(result).toEqual({
      ok: false,
      error: { code: 'STORAGE_FAILURE', message: 'Storage listAccounts failed: simulated storage timeout' },
    });
    expect(logger.lines.at(-1)).toMatchObject({ level: 'error', meta: { code: 'STORAGE_FAILURE' } });
  });

  it('reports a failed audit write as a storage failure', () => {
    db.exec('DROP TABLE audit_trail');

    const result = service.generateRecommendations(TEST_USER, '30d');

    expect(result.ok ? null : result.error.code).toBe('STORAGE_FAILURE');
  });

  describe('getTrace', () => {
    it('finds a trace from an earlier batch', () => {
      const first = service.generateRecommendations(TEST_USER, '30d');
      service.generateRecommendations(TEST_USER, '30d');
      if (!first.ok) throw new Error('generation failed');
      const traceId = first.data[0].decisionTrace.traceId;

      const result = service.getTrace(traceId);

      expect(result).toEqual({ ok: true, data: first.data[0] });
    });

    it('maps an unknown trace to NOT_FOUND and a blank one to INVALID_REQUEST', () => {
      expect(service.getTrace('trace-none')).toEqual({
        ok: false,
        error: { code: 'NOT_FOUND', message: 'No recommendation with trace trace-none' },
      });
      expect(service.getTrace(' ')).toMatchObject({ ok: false, error: { code: 'INVALID_REQUEST' } });
    });
  });

  describe('getTimeline', () => {
    it('lists the pipeline events for the user in order', () => {
      service.generateRecommendations(TEST_USER, '30d');
      service.assignPersona('user-2', '30d');

      const result = service.getTimeline(TEST_USER);
      if (!result.ok) throw new Error(result.error.message);

      expect(result.data.userId).toBe(TEST_USER);
      expect(result.data.events.slice(0, 2).map(e => e.action)).toEqual(['features:computed', 'persona:assigned']);
      expect(result.data.events.every(e => e.target === TEST_USER)).toBe(true);
      expect(result.data.stats.byAction['recommendation:created']).toBe(6);
      expect(result.data.stats.total).toBe(result.data.events.length);
    });

    it('keeps the newest events when limited', () => {
      service.generateRecommendations(TEST_USER, '30d');

      const result = service.getTimeline(TEST_USER, 2);

      expect(result.ok && result.data.events.map(e => e.action)).toEqual(['recommendation:created', 'recommendation:created']);
    });

    it('rejects a limit outside 1 to 1000', () => {
      expect(service.getTimeline(TEST_USER, 0)).toMatchObject({ ok: false, error: { code: 'INVALID_REQUEST' } });
      expect(service.getTimeline(TEST_USER, Number.NaN)).toMatchObject({ ok: false, error: { code: 'INVALID_REQUEST' } });
    });
  });

  describe('runBatch', () => {
    it('isolates one user\'s failure from the rest', () => {
      store.failOn('writeSignals', 'user-broken');

      const summary = service.runBatch([TEST_USER, 'user-broken', 'user-2'], '30d');

      expect(summary.window).toBe('30d');
      expect(summary.succeeded).toBe(2);
      expect(summary.failed).toBe(1);
      expect(summary.outcomes.map(o => [o.userId, o.result.ok])).toEqual([
        [TEST_USER, true],
        ['user-broken', false],
        ['user-2', true],
      ]);
      const broken = summary.outcomes[1].result;
      expect(broken.ok ? null : broken.error.code).toBe('STORAGE_FAILURE');
      expect(store.recommendations.some(r => r.userId === 'user-2')).toBe(true);
    });
  });
});
