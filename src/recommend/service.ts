// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Recommendation Service
// Caller-facing surface: every call yields an entity or an error code
// ═══════════════════════════════════════════════════════════════

import { z } from 'zod';
import type {
  ApiResult,
  FeatureSet,
  LoggerHandle,
  PersonaAssignment,
  Recommendation,
  TimeWindow,
} from '../core/types.js';
import { ApiRequestSchema } from '../core/types.js';
import { InvalidRequestError, NotFoundError, errorCode, errorMessage } from '../core/errors.js';
import type { FeatureStoreLookup } from '../storage/types.js';
import type { AuditEntry, AuditReader, AuditStats } from '../traces/audit-trail.js';
import type { RecommendationEngine } from './orchestrator.js';

const TraceRequestSchema = z.object({ traceId: z.string().trim().min(1) });

const TimelineRequestSchema = z.object({
  userId: ApiRequestSchema.shape.userId,
  limit: z.number().int().min(1).max(1000).default(100),
});

export interface BatchOutcome {
  userId: string;
  result: ApiResult<Recommendation[]>;
}

export interface BatchSummary {
  window: TimeWindow;
  succeeded: number;
  failed: number;
  outcomes: BatchOutcome[];
}

/** Pipeline events recorded for one user, oldest first. */
export interface UserTimeline {
  userId: string;
  stats: AuditStats;
  events: AuditEntry[];
}

export class RecommendationService {
  private engine: RecommendationEngine;
  private lookup: FeatureStoreLookup;
  private audit: AuditReader;
  private logger: LoggerHandle;

  constructor(engine: RecommendationEngine, lookup: FeatureStoreLookup, audit: AuditReader, logger: LoggerHandle) {
    this.engine = engine;
    this.lookup = lookup;
    this.audit = audit;
    this.logger = logger;
  }

  computeFeatures(userId: string, window?: string): ApiResult<FeatureSet> {
    return this.run('computeFeatures', userId, window, (id, w) => this.engine.computeFeatures(id, w));
  }

  assignPersona(userId: string, window?: string): ApiResult<PersonaAssignment> {
    return this.run('assignPersona', userId, window, (id, w) => this.engine.assignPersona(id, w));
  }

  generateRecommendations(userId: string, window?: string): ApiResult<Recommendation[]> {
    return this.run('generateRecommendations', userId, window, (id, w) => this.engine.generateRecommendations(id, w));
  }

  listRecommendations(userId: string, window?: string): ApiResult<Recommendation[]> {
    return this.run('listRecommendations', userId, window, (id, w) => this.lookup.listRecommendations(id, w));
  }

  // ── Traces ──

  /** The recommendation carrying the trace, from any batch. */
  getTrace(traceId: string): ApiResult<Recommendation> {
    return this.guarded('getTrace', traceId, () => {
      const request = validate(TraceRequestSchema, { traceId });
      const found = this.lookup.findRecommendationByTrace(request.traceId);
      if (!found) throw new NotFoundError(`No recommendation with trace ${request.traceId}`);
      return found;
    });
  }

  getTimeline(userId: string, limit?: number): ApiResult<UserTimeline> {
    return this.guarded('getTimeline', userId, () => {
      const request = validate(TimelineRequestSchema, { userId, limit });
      return {
        userId: request.userId,
        stats: this.audit.getStats(request.userId),
        events: this.audit.getByTarget(request.userId, request.limit),
      };
    });
  }

  /** One user's failure never affects another's outcome. */
  runBatch(userIds: string[], window: TimeWindow): BatchSummary {
    this.logger.info(`[Batch] Generating ${window} recommendations for ${userIds.length} users...`);

    const outcomes = userIds.map(userId => ({ userId, result: this.generateRecommendations(userId, window) }));
    const succeeded = outcomes.filter(o => o.result.ok).length;

    this.logger.info(`[Batch] Done: ${succeeded} succeeded, ${outcomes.length - succeeded} failed`);
    return { window, succeeded, failed: outcomes.length - succeeded, outcomes };
  }

  private run<T>(
    operation: string,
    userId: string,
    window: string | undefined,
    fn: (userId: string, window: TimeWindow) => T,
  ): ApiResult<T> {
    return this.guarded(operation, userId, () => {
      const request = validate(ApiRequestSchema, { userId, window });
      return fn(request.userId, request.window);
    });
  }

  private guarded<T>(operation: string, subject: string, fn: () => T): ApiResult<T> {
    try {
      return { ok: true, data: fn() };
    } catch (err) {
      const code = errorCode(err);
      this.logger.error(`[Service] ${operation} failed for ${subject}: ${errorMessage(err)}`, { code });
      return { ok: false, error: { code, message: errorMessage(err) } };
    }
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRequestError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return parsed.data;
}
