// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Gateway Server
// Express 5 HTTP surface for the recommendation pipeline
// ═══════════════════════════════════════════════════════════════

import express, { type Request, type Response, type NextFunction } from 'express';
import { createServer, type Server } from 'http';
import type { LoggerHandle, TimeWindow } from '../core/types.js';
import { requireApiKey } from '../auth/middleware.js';
import type { RecommendationService } from '../recommend/service.js';
import { createRecommendationRoutes } from './routes.js';

export interface GatewayDependencies {
  service: RecommendationService;
  logger: LoggerHandle;
  apiKey: string;
  defaultWindow: TimeWindow;
  platform: { name: string; version: string };
  catalogVersion: string;
}

export function createGateway(deps: GatewayDependencies): { app: express.Application; server: Server } {
  const app = express();
  const server = createServer(app);

  app.use(express.json({ limit: '1mb' }));

  // ── Request logging ──
  app.use((req: Request, _res: Response, next: NextFunction) => {
    deps.logger.debug(`${req.method} ${req.path}`);
    next();
  });

  // ── Health (public) ──
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      platform: deps.platform.name,
      version: deps.platform.version,
      catalogVersion: deps.catalogVersion,
      uptime: process.uptime(),
    });
  });

  // ── Recommendation API (keyed) ──
  app.use('/api', requireApiKey(deps.apiKey), createRecommendationRoutes({ service: deps.service }, deps.defaultWindow));

  // ── Fallthrough ──
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: { code: 'INVALID_REQUEST', message: 'Not found' } });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = err instanceof Error ? err.message : String(err);
    deps.logger.error(`Unhandled request error: ${message}`);
    res.status(500).json({ ok: false, error: { code: 'INTERNAL', message } });
  });

  return { app, server };
}
