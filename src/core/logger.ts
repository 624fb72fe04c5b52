// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Logger
// Line-oriented log files per component, mirrored to stdout
// ═══════════════════════════════════════════════════════════════

import fs from 'fs';
import path from 'path';
import type { LoggerHandle } from './types.js';
import { CONFIG } from './config.js';

type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<Level, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<Level, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';

export function formatLine(name: string, level: Level, msg: string, meta?: Record<string, unknown>, at = new Date()): string {
  const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `[${at.toISOString()}] [${level.toUpperCase().padEnd(5)}] [${name}] ${msg}${metaStr}\n`;
}

export function createLogger(name: string): LoggerHandle {
  const logDir = CONFIG.logging.dir;
  const minRank = LEVEL_RANK[CONFIG.logging.level];

  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const stream = fs.createWriteStream(path.join(logDir, `${name}.log`), { flags: 'a' });

  function write(level: Level, msg: string, meta?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < minRank) return;

    const line = formatLine(name, level, msg, meta);
    stream.write(line);
    process.stdout.write(`${COLORS[level]}${line}${RESET}`);
  }

  return {
    debug: (msg, meta) => write('debug', msg, meta),
    info: (msg, meta) => write('info', msg, meta),
    warn: (msg, meta) => write('warn', msg, meta),
    error: (msg, meta) => write('error', msg, meta),
  };
}
