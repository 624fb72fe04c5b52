// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Pipeline Audit Trail
// SHA-256 hash chain over every pipeline event
// Each entry chains to the previous one; history is append-only
// ═══════════════════════════════════════════════════════════════

import { createHash } from 'crypto';
import Database from 'better-sqlite3';
import type { EventEmitter } from 'eventemitter3';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { LoggerHandle } from '../core/types.js';
import { StorageFailureError } from '../core/errors.js';
import type { PipelineEventName, PipelineEvents } from '../recommend/events.js';

const GENESIS_HASH = '0'.repeat(64);

export const PIPELINE_ACTOR = 'pipeline';

export interface AuditEntry {
  id: string;
  sequenceNumber: number;
  timestamp: Date;
  actor: string;
  action: string;
  target: string;
  details: Record<string, unknown>;
  previousHash: string;
  hash: string;
}

export interface AuditStats {
  total: number;
  byAction: Record<string, number>;
}

/** Read side of the trail, as the service layer sees it. */
export interface AuditReader {
  getByTarget(target: string, limit?: number): AuditEntry[];
  getStats(target: string): AuditStats;
}

interface AuditRow {
  id: string; sequence_number: number; timestamp: string; actor: string;
  action: string; target: string; details: string; previous_hash: string; hash: string;
}

const DetailsSchema = z.record(z.unknown());

function chainHash(previousHash: string, seq: number, timestamp: string, actor: string, action: string, target: string, details: string): string {
  return createHash('sha256')
    .update(`${previousHash}|${seq}|${timestamp}|${actor}|${action}|${target}|${details}`)
    .digest('hex');
}

export class AuditTrail implements AuditReader {
  private db: Database.Database;
  private logger: LoggerHandle;
  private sequenceCounter: number;
  private lastHash: string;

  constructor(db: Database.Database, logger: LoggerHandle) {
    this.db = db;
    this.logger = logger;
    this.initSchema();

    const last = this.db.prepare(
      'SELECT sequence_number, hash FROM audit_trail ORDER BY sequence_number DESC LIMIT 1'
    ).get() as { sequence_number: number; hash: string } | undefined;

    this.sequenceCounter = last ? last.sequence_number : 0;
    this.lastHash = last ? last.hash : GENESIS_HASH;

    this.logger.info(`AuditTrail initialized (${this.sequenceCounter} entries)`);
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audit_trail (
        id TEXT PRIMARY KEY,
        sequence_number INTEGER UNIQUE NOT NULL,
        timestamp TEXT NOT NULL,
        actor TEXT NOT NULL,
        action TEXT NOT NULL,
        target TEXT NOT NULL,
        details TEXT DEFAULT '{}',
        previous_hash TEXT NOT NULL,
        hash TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_audit_seq ON audit_trail(sequence_number);
      CREATE INDEX IF NOT EXISTS idx_audit_target ON audit_trail(target);
      CREATE INDEX IF NOT EXISTS idx_audit_action ON audit_trail(action);
    `);
  }

  /** Records every pipeline event with the user id as target. */
  attach(bus: EventEmitter<PipelineEvents>): void {
    const names: PipelineEventName[] = [
      'features:computed',
      'persona:assigned',
      'recommendation:created',
      'recommendation:skipped',
    ];
    for (const name of names) {
      bus.on(name, (event: { userId: string }) => {
        this.record(PIPELINE_ACTOR, name, event.userId, { ...event });
      });
    }
  }

  /** The sequence and head hash move only once the row is written. */
  record(actor: string, action: string, target: string, details: Record<string, unknown> = {}): AuditEntry {
    const seq = this.sequenceCounter + 1;
    const id = uuid();
    const now = new Date();
    const serialized = JSON.stringify(details);
    const hash = chainHash(this.lastHash, seq, now.toISOString(), actor, action, target, serialized);

    const entry: AuditEntry = {
      id, sequenceNumber: seq, timestamp: now,
      actor, action, target, details, previousHash: this.lastHash, hash,
    };

    this.guard('auditRecord', () => {
      this.db.prepare(`
        INSERT INTO audit_trail (id, sequence_number, timestamp, actor, action, target, details, previous_hash, hash)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(id, seq, now.toISOString(), actor, action, target, serialized, this.lastHash, hash);
    });

    this.sequenceCounter = seq;
    this.lastHash = hash;
    return entry;
  }

  verifyChain(): { valid: boolean; brokenAt?: number; totalEntries: number } {
    const rows = this.db.prepare(
      'SELECT * FROM audit_trail ORDER BY sequence_number ASC'
    ).all() as AuditRow[];

    let previousHash = GENESIS_HASH;
    for (const row of rows) {
      const expected = chainHash(row.previous_hash, row.sequence_number, row.timestamp, row.actor, row.action, row.target, row.details);
      if (row.previous_hash !== previousHash || row.hash !== expected) {
        this.logger.error(`[Audit] Chain broken at entry ${row.sequence_number}`);
        return { valid: false, brokenAt: row.sequence_number, totalEntries: rows.length };
      }
      previousHash = row.hash;
    }
    return { valid: true, totalEntries: rows.length };
  }

  /** The newest `limit` entries for the target, oldest first. */
  getByTarget(target: string, limit = 100): AuditEntry[] {
    return this.guard('auditByTarget', () => {
      const rows = this.db.prepare(
        'SELECT * FROM audit_trail WHERE target = ? ORDER BY sequence_number DESC LIMIT ?'
      ).all(target, limit) as AuditRow[];
      return rows.map(r => this.rowToEntry(r)).reverse();
    });
  }

  getStats(target: string): AuditStats {
    return this.guard('auditStats', () => {
      const rows = this.db.prepare(
        'SELECT action, COUNT(*) as c FROM audit_trail WHERE target = ? GROUP BY action ORDER BY action'
      ).all(target) as Array<{ action: string; c: number }>;

      const byAction: Record<string, number> = {};
      for (const row of rows) byAction[row.action] = row.c;
      return { total: rows.reduce((n, row) => n + row.c, 0), byAction };
    });
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      this.logger.error(`[Audit] ${operation} failed: ${err instanceof Error ? err.message : String(err)}`);
      throw new StorageFailureError(operation, err);
    }
  }

  private rowToEntry(row: AuditRow): AuditEntry {
    return {
      id: row.id, sequenceNumber: row.sequence_number, timestamp: new Date(row.timestamp),
      actor: row.actor, action: row.action, target: row.target,
      details: DetailsSchema.parse(JSON.parse(row.details)), previousHash: row.previous_hash, hash: row.hash,
    };
  }
}
