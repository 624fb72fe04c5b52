import { describe, it, expect, beforeEach } from 'vitest';
import { fileURLToPath } from 'url';
import { RecommendationEngine } from './orchestrator.js';
import type { PipelineEventName } from './events.js';
import { createCatalog, loadCatalog } from '../catalog/catalog.js';
import { StorageFailureError } from '../core/errors.js';
import type { Catalog } from '../core/types.js';
import { MemoryFeatureStore } from '../test-utils/memory-store.js';
import { createMockLogger } from '../test-utils/mocks.js';
import { TEST_USER, makeAccount, monthlySeries } from '../test-utils/fixtures.js';

const CATALOG = loadCatalog(fileURLToPath(new URL('../../config/catalog.json', import.meta.url)));
const NOW = new Date('2026-10-01T00:00:00.000Z');

const visa = makeAccount({
  id: 'acc-visa', type: 'credit', subtype: 'credit card', balance: 3400, creditLimit: 5000, mask: '4523',
});

function subscriptionHeavyStore(): MemoryFeatureStore {
  const merchants: Array<[string, number]> = [['StreamFlix', 90], ['FitClub', 60], ['CloudBox', 40], ['NewsDaily', 20]];
  return new MemoryFeatureStore().seed(
    [makeAccount({ balance: 2000 })],
    [
      ...merchants.flatMap(([merchantName, amount]) =>
        monthlySeries({ start: '2026-04-10', count: 6, everyDays: 30, amount: -amount, merchantName })),
      ...monthlySeries({ start: '2026-04-05', count: 6, everyDays: 30, amount: -1590 }),
    ],
  );
}

function engineFor(store: MemoryFeatureStore, catalog: Catalog = CATALOG, now = () => NOW): RecommendationEngine {
  return new RecommendationEngine({ store, catalog, logger: createMockLogger(), options: { now } });
}

describe('RecommendationEngine', () => {
  describe('high utilization', () => {
    let store: MemoryFeatureStore;
    let engine: RecommendationEngine;

    beforeEach(() => {
      store = new MemoryFeatureStore().seed([visa], []);
      engine = engineFor(store);
    });

    it('assigns the persona with its evidence', () => {
      const assignment = engine.assignPersona(TEST_USER, '30d');

      expect(assignment.primaryPersona).toBe('high_utilization');
      expect(assignment.criteriaMet).toEqual(['credit utilization 68% >= 50%']);
      expect(assignment.matchScores).toEqual({
        high_utilization: 68, variable_income: 0, subscription_heavy: 0, savings_builder: 0, general_wellness: 32,
      });
      expect(store.personas.get(`${TEST_USER}:30d`)).toEqual(assignment);
    });

    it('recommends triggered education then eligible offers', () => {
      const recs = engine.generateRecommendations(TEST_USER, '30d');

      expect(recs.map(r => r.contentId)).toEqual([
        'edu_credit_util_101',
        'edu_payoff_strategies',
        'edu_debt_paydown_plan',
        'offer_balance_transfer',
        'offer_debt_consolidation',
        'offer_budgeting_app',
      ]);
      expect(recs[0].rationale).toBe(
        'Your Credit Card ending in 4523 is at 68% utilization ($3,400.00 of $5,000.00 limit). '
        + 'Bringing this below 30% could improve your credit score and reduce interest charges.',
      );
      expect(recs[4].rationale).toBe(
        'Consolidating your $3,400.00 in credit card balances into a single loan could simplify payments and potentially reduce your interest rate.',
      );
    });

    it('explains every recommendation with a complete trace', () => {
      const recs = engine.generateRecommendations(TEST_USER, '30d');
      const util = recs[0].decisionTrace;

      expect(util).toMatchObject({
        userId: TEST_USER,
        timeWindow: '30d',
        persona: { primary: 'high_utilization', criteriaMet: ['credit utilization 68% >= 50%'] },
        contentId: 'edu_credit_util_101',
        contentType: 'education',
        catalogVersion: CATALOG.version,
        triggersMatched: ['credit_utilization_high'],
        guardrail: { passed: true, violations: [] },
        createdAt: NOW.toISOString(),
      });
      expect(Object.keys(util.rationale.values)).toEqual(['card_name', 'utilization', 'balance', 'limit']);
      expect(util.signalsUsed[0]).toEqual({ path: 'creditUtilization.maxUtilization', value: 0.68 });
      expect(util.signalsUsed).toContainEqual({ path: 'creditUtilization.primaryAccount.balance', value: 3400 });

      expect(recs[3].decisionTrace.triggersMatched).toEqual([
        'creditUtilization.maxUtilization gte 0.5',
        'creditUtilization.isOverdue eq false',
      ]);
      expect(new Set(recs.map(r => r.batchId)).size).toBe(1);
      expect(recs.every(r => Object.isFrozen(r.decisionTrace))).toBe(true);
    });

    it('emits events in pipeline order', () => {
      const seen: PipelineEventName[] = [];
      engine.on('features:computed', () => seen.push('features:computed'));
      engine.on('persona:assigned', () => seen.push('persona:assigned'));
      engine.on('recommendation:created', () => seen.push('recommendation:created'));

      engine.generateRecommendations(TEST_USER, '30d');

      expect(seen).toEqual([
        'features:computed',
        'persona:assigned',
        ...Array.from({ length: 6 }, () => 'recommendation:created' as const),
      ]);
    });

    it('produces the same content on a rerun and lists only the newest batch', () => {
      const first = engine.generateRecommendations(TEST_USER, '30d');
      const second = engine.generateRecommendations(TEST_USER, '30d');

      expect(second.map(r => r.contentId)).toEqual(first.map(r => r.contentId));
      expect(second.map(r => r.rationale)).toEqual(first.map(r => r.rationale));
      expect(second[0].batchId).not.toBe(first[0].batchId);
      expect(store.recommendations).toHaveLength(12);
      expect(store.listRecommendations(TEST_USER, '30d').map(r => r.id)).toEqual(second.map(r => r.id));
    });

    it('reassigns the persona when features are newer than the assignment', () => {
      let now = NOW;
      engine = engineFor(store, CATALOG, () => now);
      let assignments = 0;
      engine.on('persona:assigned', () => { assignments++; });

      engine.generateRecommendations(TEST_USER, '30d');
      engine.generateRecommendations(TEST_USER, '30d');
      expect(assignments).toBe(1);

      now = new Date('2026-10-02T00:00:00.000Z');
      engine.computeFeatures(TEST_USER, '30d');
      engine.generateRecommendations(TEST_USER, '30d');
      expect(assignments).toBe(2);
      expect(store.personas.get(`${TEST_USER}:30d`)?.assignedAt).toBe('2026-10-02T00:00:00.000Z');
    });

    it('propagates storage failures', () => {
      store.failOn('writeRecommendation', TEST_USER);

      expect(() => engine.generateRecommendations(TEST_USER, '30d')).toThrow(StorageFailureError);
    });
  });

  describe('subscription heavy', () => {
    it('recommends subscription content over a 180-day window', () => {
      const store = subscriptionHeavyStore();
      const engine = engineFor(store);

      const features = engine.computeFeatures(TEST_USER, '180d');
      expect(features.subscriptions).toMatchObject({
        recurringCount: 4, monthlyRecurringTotal: 210, avgMonthlyOutflow: 1800, subscriptionShare: 0.1167,
      });

      const recs = engine.generateRecommendations(TEST_USER, '180d');
      const assignment = store.personas.get(`${TEST_USER}:180d`);

      expect(assignment?.primaryPersona).toBe('subscription_heavy');
      expect(assignment?.matchScores.subscription_heavy).toBe(67);
      expect(recs.map(r => r.contentId)).toEqual([
        'edu_subscription_audit',
        'edu_negotiate_subscriptions',
        'edu_subscription_share',
        'edu_subscription_alerts',
        'offer_subscription_manager',
        'offer_bill_negotiation',
        'offer_budgeting_app',
      ]);
      expect(recs[0].rationale).toBe(
        'You have 4 active subscriptions totaling $210.00 per month. Reviewing which ones you use could free up money for other goals.',
      );
      expect(recs[2].rationale).toBe(
        'Recurring charges make up 12% of your monthly spending. Knowing this number makes it easier to decide which services to keep.',
      );
    });
  });

  describe('skipped items', () => {
    const catalog = createCatalog({
      version: 'test',
      education: [
        { id: 'edu_missing', title: 'Buffer', personas: ['high_utilization'], priority: 1, rationaleTemplate: 'Your buffer is {cash_flow_buffer} months.' },
        { id: 'edu_bad', title: 'Habits', personas: ['high_utilization'], priority: 2, rationaleTemplate: 'Breaking bad habits starts with your {card_name}.' },
        { id: 'edu_ok', title: 'Utilization', personas: ['high_utilization'], priority: 3, rationaleTemplate: 'Your card is at {utilization} utilization.' },
      ],
      offers: [],
    });

    it('omits items it cannot render or that fail the tone check, and reports why', () => {
      const store = new MemoryFeatureStore().seed([visa], []);
      const engine = engineFor(store, catalog);
      const skipped: Array<{ contentId: string; reason: string; violations: string[] }> = [];
      engine.on('recommendation:skipped', e => skipped.push({ contentId: e.contentId, reason: e.reason, violations: e.violations }));

      const recs = engine.generateRecommendations(TEST_USER, '30d');

      expect(recs.map(r => r.contentId)).toEqual(['edu_ok']);
      expect(recs[0].rationale).toBe('Your card is at 68% utilization.');
      expect(skipped).toEqual([
        { contentId: 'edu_missing', reason: 'DATA_INCOMPLETE', violations: [] },
        { contentId: 'edu_bad', reason: 'GUARDRAIL_VIOLATION', violations: ['bad habit'] },
      ]);
      expect(store.recommendations.map(r => r.contentId)).toEqual(['edu_ok']);
    });

    it('never stores a rationale with an unresolved brace token', () => {
      const unchecked: Catalog = {
        ...catalog,
        education: [
          { ...catalog.education[2], id: 'edu_camel', priority: 0, rationaleTemplate: 'Your {cardName} is at {utilization2} utilization.' },
          catalog.education[2],
        ],
      };
      const store = new MemoryFeatureStore().seed([visa], []);
      const engine = engineFor(store, unchecked);
      const skipped: string[] = [];
      engine.on('recommendation:skipped', e => skipped.push(`${e.contentId}:${e.reason}`));

      const recs = engine.generateRecommendations(TEST_USER, '30d');

      expect(recs.map(r => r.contentId)).toEqual(['edu_ok']);
      expect(skipped).toEqual(['edu_camel:DATA_INCOMPLETE']);
      expect(store.recommendations.map(r => r.rationale)).toEqual(['Your card is at 68% utilization.']);
    });
  });

  describe('persona-scoped offers', () => {
    it('only shows an offer to the personas it lists', () => {
      const catalog = createCatalog({
        version: 'test',
        education: [
          { id: 'edu_ok', title: 'Utilization', personas: ['high_utilization'], rationaleTemplate: 'Your card is at {utilization} utilization.' },
        ],
        offers: [
          { id: 'offer_sav', title: 'Savings', personas: ['savings_builder'], rationaleTemplate: 'Your card is at {utilization}.' },
          { id: 'offer_util', title: 'Transfer', personas: ['high_utilization'], rationaleTemplate: 'Your card is at {utilization}.' },
        ],
      });
      const store = new MemoryFeatureStore().seed([visa], []);

      const recs = engineFor(store, catalog).generateRecommendations(TEST_USER, '30d');

      expect(recs.map(r => r.contentId)).toEqual(['edu_ok', 'offer_util']);
    });
  });

  describe('no data', () => {
    it('falls back to general wellness content without failing', () => {
      const store = new MemoryFeatureStore();
      const engine = engineFor(store);

      const recs = engine.generateRecommendations('user-empty', '30d');
      const assignment = store.personas.get('user-empty:30d');

      expect(assignment?.primaryPersona).toBe('general_wellness');
      expect(assignment?.criteriaMet).toEqual(['insufficient data: no applicable signals']);
      expect(recs.map(r => r.contentId)).toEqual([
        'edu_budgeting_101',
        'edu_emergency_fund',
        'edu_credit_scores',
        'edu_choosing_accounts',
        'edu_money_checkins',
        'offer_budgeting_app',
        'offer_credit_monitoring',
      ]);
      expect(recs.every(r => r.decisionTrace.signalsUsed.length === 0)).toBe(true);
    });
  });
});
