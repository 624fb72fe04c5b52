// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Auth Middleware
// Shared API key check for the recommendation API
// ═══════════════════════════════════════════════════════════════

import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

export const API_KEY_HEADER = 'x-api-key';

function sameKey(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Accepts the key in the `x-api-key` header or as a Bearer token.
 * An empty configured key leaves the API open (local development).
 */
export function requireApiKey(apiKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const header = req.get(API_KEY_HEADER) ?? req.get('authorization')?.replace(/^Bearer /, '');
    if (!header) {
      res.status(401).json({ ok: false, error: { code: 'INVALID_REQUEST', message: 'API key required' } });
      return;
    }
    if (!sameKey(header, apiKey)) {
      res.status(403).json({ ok: false, error: { code: 'INVALID_REQUEST', message: 'Invalid API key' } });
      return;
    }
    next();
  };
}
