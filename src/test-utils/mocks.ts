// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Test Utilities
// Mock factories for unit testing
// ═══════════════════════════════════════════════════════════════

import Database from 'better-sqlite3';
import type { LoggerHandle } from '../core/types.js';

export function createMockLogger(): LoggerHandle {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

export interface RecordedLine {
  level: 'debug' | 'info' | 'warn' | 'error';
  msg: string;
  meta?: Record<string, unknown>;
}

/** Logger that keeps every line for assertions. */
export function createRecordingLogger(): LoggerHandle & { lines: RecordedLine[] } {
  const lines: RecordedLine[] = [];
  return {
    lines,
    debug: (msg, meta) => { lines.push({ level: 'debug', msg, meta }); },
    info: (msg, meta) => { lines.push({ level: 'info', msg, meta }); },
    warn: (msg, meta) => { lines.push({ level: 'warn', msg, meta }); },
    error: (msg, meta) => { lines.push({ level: 'error', msg, meta }); },
  };
}

export function createTestDb(): Database.Database {
  return new Database(':memory:');
}
