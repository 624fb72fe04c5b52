// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: System Configuration
// ═══════════════════════════════════════════════════════════════

import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { TimeWindowSchema } from './types.js';

dotenv.config();

function env(key: string, fallback?: string): string {
  const v = process.env[key];
  if (!v && fallback === undefined) throw new Error(`Missing env: ${key}`);
  return v || fallback || '';
}

function list(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

const DEFAULT_PROHIBITED_PHRASES = [
  'overspending',
  'overspend',
  'bad habit',
  'poor choice',
  'irresponsible',
  'wasteful',
  'reckless',
  'careless with money',
  'financially illiterate',
  'you should be ashamed',
];

export const CONFIG = {
  // ── Platform ──
  platform: {
    name: 'Ledgerwise',
    version: '1.0.0',
  },

  // ── Gateway ──
  gateway: {
    port: parseInt(env('GATEWAY_PORT', '19100')),
    host: env('GATEWAY_HOST', '127.0.0.1'),
    // Empty key leaves the API open (local development)
    apiKey: env('GATEWAY_API_KEY', ''),
  },

  // ── Database ──
  database: {
    path: env('SQLITE_PATH', path.join(process.cwd(), 'data', 'ledgerwise.db')),
  },

  // ── Logging ──
  logging: {
    level: z.enum(['debug', 'info', 'warn', 'error']).parse(env('LOG_LEVEL', 'info')),
    dir: env('LOG_DIR', path.join(process.cwd(), 'logs')),
  },

  // ── Content Catalog ──
  catalog: {
    path: env('CATALOG_PATH', path.join(process.cwd(), 'config', 'catalog.json')),
  },

  // ── Recommendation Pipeline ──
  pipeline: {
    defaultWindow: TimeWindowSchema.parse(env('PIPELINE_DEFAULT_WINDOW', '30d')),
    educationMin: parseInt(env('PIPELINE_EDUCATION_MIN', '3')),
    educationMax: parseInt(env('PIPELINE_EDUCATION_MAX', '5')),
    offerMax: parseInt(env('PIPELINE_OFFER_MAX', '3')),
    // Credits at or above this amount count as payroll candidates
    payrollMinAmount: parseFloat(env('PIPELINE_PAYROLL_MIN_USD', '500')),
    currency: env('PIPELINE_CURRENCY', 'USD'),
  },

  // ── Tone Guardrails ──
  guardrails: {
    prohibitedPhrases: list(env('GUARDRAIL_PROHIBITED_PHRASES', DEFAULT_PROHIBITED_PHRASES.join(','))),
  },
};
