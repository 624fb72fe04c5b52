// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Recommendation Routes
// Thin adapters over RecommendationService
// ═══════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ApiResult, ErrorCode, TimeWindow } from '../core/types.js';
import { TimeWindowSchema } from '../core/types.js';
import type { RecommendationService } from '../recommend/service.js';

export interface RecommendationRouteDependencies {
  service: RecommendationService;
}

const HTTP_STATUS: Record<ErrorCode, number> = {
  INVALID_REQUEST: 400,
  NOT_FOUND: 404,
  DATA_INCOMPLETE: 422,
  GUARDRAIL_VIOLATION: 422,
  STORAGE_FAILURE: 503,
  INTERNAL: 500,
};

const BatchBodySchema = z.object({
  userIds: z.array(z.string().min(1)).min(1).max(1000),
  window: TimeWindowSchema.optional(),
});

function windowParam(req: Request): string | undefined {
  return typeof req.query.window === 'string' ? req.query.window : undefined;
}

function limitParam(req: Request): number | undefined {
  return typeof req.query.limit === 'string' ? Number(req.query.limit) : undefined;
}

function send<T>(res: Response, result: ApiResult<T>, okStatus = 200): void {
  res.status(result.ok ? okStatus : HTTP_STATUS[result.error.code]).json(result);
}

export function createRecommendationRoutes(deps: RecommendationRouteDependencies, defaultWindow: TimeWindow): Router {
  const router = Router();
  const { service } = deps;

  router.post('/users/:userId/features', (req: Request, res: Response) => {
    send(res, service.computeFeatures(String(req.params.userId), windowParam(req) ?? defaultWindow));
  });

  router.post('/users/:userId/persona', (req: Request, res: Response) => {
    send(res, service.assignPersona(String(req.params.userId), windowParam(req) ?? defaultWindow));
  });

  router.post('/users/:userId/recommendations', (req: Request, res: Response) => {
    send(res, service.generateRecommendations(String(req.params.userId), windowParam(req) ?? defaultWindow), 201);
  });

  router.get('/users/:userId/recommendations', (req: Request, res: Response) => {
    send(res, service.listRecommendations(String(req.params.userId), windowParam(req) ?? defaultWindow));
  });

  // ── Traces ──
  router.get('/traces/:traceId', (req: Request, res: Response) => {
    send(res, service.getTrace(String(req.params.traceId)));
  });

  router.get('/users/:userId/timeline', (req: Request, res: Response) => {
    send(res, service.getTimeline(String(req.params.userId), limitParam(req)));
  });

  // ── Batch ──
  router.post('/batch/recommendations', (req: Request, res: Response) => {
    const parsed = BatchBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        ok: false,
        error: { code: 'INVALID_REQUEST', message: parsed.error.issues.map(i => i.message).join('; ') },
      });
      return;
    }
    res.json({ ok: true, data: service.runBatch(parsed.data.userIds, parsed.data.window ?? defaultWindow) });
  });

  return router;
}
