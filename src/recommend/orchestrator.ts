// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Recommendation Engine
// Features → persona → match → rationale → guardrail → trace
// ═══════════════════════════════════════════════════════════════

import { EventEmitter } from 'eventemitter3';
import { v4 as uuid } from 'uuid';
import type {
  Catalog,
  ContentItem,
  FeatureSet,
  LoggerHandle,
  PersonaAssignment,
  Recommendation,
  TimeWindow,
} from '../core/types.js';
import { DataIncompleteError, GuardrailViolationError } from '../core/errors.js';
import type { FeatureStore } from '../storage/types.js';
import { FeatureAggregator, toSignals } from '../features/aggregator.js';
import { DEFAULT_PAYROLL_MIN_AMOUNT } from '../signals/income.js';
import { classifyPersona } from '../personas/classifier.js';
import { ToneGuardrail } from '../guardrails/tone.js';
import { buildTrace, collectSignalsUsed } from '../traces/builder.js';
import { activeTriggers, DEFAULT_LIMITS, matchedTriggers, matchEducation, matchOffers, type MatchLimits } from './matcher.js';
import { generateRationale, type RationaleResult } from './rationale.js';
import type { PipelineEvents } from './events.js';

export interface EngineOptions extends MatchLimits {
  currency: string;
  payrollMinAmount: number;
  now: () => Date;
}

export interface EngineDeps {
  store: FeatureStore;
  catalog: Catalog;
  logger: LoggerHandle;
  guardrail?: ToneGuardrail;
  options?: Partial<EngineOptions>;
}

export class RecommendationEngine extends EventEmitter<PipelineEvents> {
  private store: FeatureStore;
  private catalog: Catalog;
  private logger: LoggerHandle;
  private guardrail: ToneGuardrail;
  private aggregator: FeatureAggregator;
  private options: EngineOptions;

  constructor(deps: EngineDeps) {
    super();
    this.store = deps.store;
    this.catalog = deps.catalog;
    this.logger = deps.logger;
    this.guardrail = deps.guardrail ?? new ToneGuardrail(deps.logger);
    this.options = {
      ...DEFAULT_LIMITS,
      currency: 'USD',
      payrollMinAmount: DEFAULT_PAYROLL_MIN_AMOUNT,
      now: () => new Date(),
      ...deps.options,
    };
    this.aggregator = new FeatureAggregator(this.store, this.logger, {
      payrollMinAmount: this.options.payrollMinAmount,
      now: this.options.now,
    });

    this.logger.info(`RecommendationEngine initialized (catalog ${this.catalog.version})`);
  }

  // ── Features ──

  computeFeatures(userId: string, window: TimeWindow): FeatureSet {
    const features = this.aggregator.computeAllFeatures(userId, window);
    this.emit('features:computed', {
      userId,
      window,
      applicable: toSignals(features).filter(s => s.payload.applicable).map(s => s.signalType),
      computedAt: features.computedAt,
    });
    return features;
  }

  // ── Persona ──

  /** Classifies the given features, or the stored ones, computing them when absent. */
  assignPersona(userId: string, window: TimeWindow, features?: FeatureSet | null): PersonaAssignment {
    const fs = features === undefined
      ? this.aggregator.loadFeatureSet(userId, window) ?? this.computeFeatures(userId, window)
      : features;

    const assignment = classifyPersona(userId, window, fs, this.options.now().toISOString());
    this.store.writePersonaAssignment(userId, window, assignment);

    this.logger.info(`[Persona] ${userId} (${window}) → ${assignment.primaryPersona}`, {
      criteriaMet: assignment.criteriaMet,
    });
    this.emit('persona:assigned', {
      userId,
      window,
      persona: assignment.primaryPersona,
      matchScores: assignment.matchScores,
      criteriaMet: assignment.criteriaMet,
    });
    return assignment;
  }

  // ── Recommendations ──

  generateRecommendations(userId: string, window: TimeWindow): Recommendation[] {
    let features = this.aggregator.loadFeatureSet(userId, window);
    let assignment = this.store.loadPersonaAssignment(userId, window);

    if (!features) {
      features = this.computeFeatures(userId, window);
      assignment = null;
    }
    if (!assignment || assignment.assignedAt < features.computedAt) {
      assignment = this.assignPersona(userId, window, features);
    }

    const triggers = activeTriggers(features);
    const items = [
      ...matchEducation(this.catalog, assignment.primaryPersona, triggers, this.options),
      ...matchOffers(this.catalog, assignment.primaryPersona, features, this.options),
    ];

    const batchId = uuid();
    const recommendations: Recommendation[] = [];

    for (const item of items) {
      const rec = this.buildRecommendation(item, features, assignment, triggers, batchId);
      if (!rec) continue;
      this.store.writeRecommendation(rec);
      recommendations.push(rec);
      this.emit('recommendation:created', {
        userId,
        window,
        batchId,
        recommendationId: rec.id,
        contentId: rec.contentId,
        contentType: rec.type,
        traceId: rec.decisionTrace.traceId,
      });
    }

    this.logger.info(`[Engine] ${recommendations.length}/${items.length} recommendations for ${userId} (${window})`, {
      persona: assignment.primaryPersona,
      batchId,
    });
    return recommendations;
  }

  /** Null when the item is skipped; storage is untouched here. */
  private buildRecommendation(
    item: ContentItem,
    features: FeatureSet,
    assignment: PersonaAssignment,
    triggers: ReadonlySet<string>,
    batchId: string,
  ): Recommendation | null {
    let rationale: RationaleResult;
    try {
      rationale = generateRationale(item.rationaleTemplate, features, this.options.currency);
    } catch (err) {
      if (err instanceof DataIncompleteError) {
        this.skip(assignment, batchId, item, err);
        return null;
      }
      throw err;
    }

    const guardrail = this.guardrail.validate(rationale.text);
    if (!guardrail.passed) {
      this.skip(assignment, batchId, item, new GuardrailViolationError(guardrail.violations));
      return null;
    }

    const createdAt = this.options.now().toISOString();
    const triggersMatched = item.type === 'offer'
      ? item.eligibility.map(c => `${c.metric} ${c.op} ${String(c.value)}`)
      : matchedTriggers(item, triggers);

    const decisionTrace = buildTrace(
      assignment,
      collectSignalsUsed(assignment, rationale),
      item,
      rationale,
      guardrail,
      { catalogVersion: this.catalog.version, triggersMatched, createdAt },
    );

    return {
      id: uuid(),
      userId: assignment.userId,
      timeWindow: assignment.timeWindow,
      batchId,
      type: item.type,
      contentId: item.id,
      title: item.title,
      rationale: rationale.text,
      decisionTrace,
      shownAt: createdAt,
    };
  }

  private skip(
    assignment: PersonaAssignment,
    batchId: string,
    item: ContentItem,
    err: DataIncompleteError | GuardrailViolationError,
  ): void {
    const violations = err instanceof GuardrailViolationError ? err.violations : [];
    this.logger.warn(`[Engine] Skipped ${item.id} for ${assignment.userId}: ${err.message}`, { code: err.code });
    this.emit('recommendation:skipped', {
      userId: assignment.userId,
      window: assignment.timeWindow,
      batchId,
      contentId: item.id,
      reason: err.code,
      detail: err.message,
      violations,
    });
  }
}
