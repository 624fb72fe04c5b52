// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: SQLite Feature Store
// Accounts, transactions, signals, personas, recommendations
// ═══════════════════════════════════════════════════════════════

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import {
  AccountSchema,
  DecisionTraceSchema,
  PersonaAssignmentSchema,
  SIGNAL_PAYLOAD_SCHEMAS,
  TransactionSchema,
  type Account,
  type LoggerHandle,
  type PersonaAssignment,
  type Recommendation,
  type Signal,
  type TimeWindow,
  type Transaction,
  ContentTypeSchema,
  TimeWindowSchema,
} from '../core/types.js';
import { StorageFailureError } from '../core/errors.js';
import type { FeatureStore } from './types.js';

interface AccountRow {
  id: string; user_id: string; type: string; subtype: string; balance: number;
  credit_limit: number | null; mask: string | null; minimum_payment: number | null; is_overdue: number;
}

interface TransactionRow {
  id: string; account_id: string; user_id: string; date: string; amount: number;
  merchant_name: string | null; category: string; payment_channel: string; pending: number;
}

interface SignalRow {
  signal_type: string; time_window: string; payload: string; computed_at: string;
}

interface RecommendationRow {
  id: string; user_id: string; time_window: string; batch_id: string; type: string; content_id: string;
  title: string; rationale: string; decision_trace: string; shown_at: string;
}

function parseRecommendation(r: RecommendationRow): Recommendation {
  return {
    id: r.id,
    userId: r.user_id,
    timeWindow: TimeWindowSchema.parse(r.time_window),
    batchId: r.batch_id,
    type: ContentTypeSchema.parse(r.type),
    contentId: r.content_id,
    title: r.title,
    rationale: r.rationale,
    decisionTrace: DecisionTraceSchema.parse(JSON.parse(r.decision_trace)),
    shownAt: r.shown_at,
  };
}

function parseSignal(row: SignalRow): Signal {
  const timeWindow = TimeWindowSchema.parse(row.time_window);
  const raw: unknown = JSON.parse(row.payload);
  const base = { timeWindow, computedAt: row.computed_at };

  switch (row.signal_type) {
    case 'subscriptions':
      return { ...base, signalType: 'subscriptions', payload: SIGNAL_PAYLOAD_SCHEMAS.subscriptions.parse(raw) };
    case 'credit_utilization':
      return { ...base, signalType: 'credit_utilization', payload: SIGNAL_PAYLOAD_SCHEMAS.credit_utilization.parse(raw) };
    case 'savings_behavior':
      return { ...base, signalType: 'savings_behavior', payload: SIGNAL_PAYLOAD_SCHEMAS.savings_behavior.parse(raw) };
    case 'income_stability':
      return { ...base, signalType: 'income_stability', payload: SIGNAL_PAYLOAD_SCHEMAS.income_stability.parse(raw) };
    default:
      throw new Error(`Unknown signal type: ${row.signal_type}`);
  }
}

export class SqliteStore implements FeatureStore {
  private db: Database.Database;
  private logger: LoggerHandle;

  constructor(db: Database.Database, logger: LoggerHandle) {
    this.db = db;
    this.logger = logger;
    this.initSchema();
  }

  /** Open (or create) the database file with WAL enabled. */
  static open(dbPath: string, logger: LoggerHandle): SqliteStore {
    const dbDir = path.dirname(dbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }

    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    logger.info('SqliteStore opened', { dbPath });
    return new SqliteStore(db, logger);
  }

  getDb(): Database.Database {
    return this.db;
  }

  private initSchema(): void {
    this.db.exec(`
      -- ═══ RAW RECORDS (written by ingestion) ═══
      CREATE TABLE IF NOT EXISTS accounts (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        type TEXT CHECK(type IN ('depository', 'credit', 'loan')),
        subtype TEXT NOT NULL,
        balance REAL NOT NULL DEFAULT 0,
        credit_limit REAL,
        mask TEXT,
        minimum_payment REAL,
        is_overdue INTEGER DEFAULT 0
      );
      CREATE INDEX IF NOT EXISTS idx_accounts_user ON accounts(user_id);

      CREATE TABLE IF NOT EXISTS transactions (
        id TEXT PRIMARY KEY,
        account_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        date TEXT NOT NULL,
        amount REAL NOT NULL,
        merchant_name TEXT,
        category TEXT DEFAULT '[]',
        payment_channel TEXT DEFAULT 'other',
        pending INTEGER DEFAULT 0
      );
      CREATE INDEX IF NOT EXISTS idx_tx_user_date ON transactions(user_id, date);

      -- ═══ PIPELINE OUTPUT ═══
      CREATE TABLE IF NOT EXISTS computed_signals (
        user_id TEXT NOT NULL,
        time_window TEXT NOT NULL,
        signal_type TEXT NOT NULL,
        payload TEXT NOT NULL,
        computed_at TEXT NOT NULL,
        PRIMARY KEY (user_id, time_window, signal_type)
      );

      CREATE TABLE IF NOT EXISTS persona_assignments (
        user_id TEXT NOT NULL,
        time_window TEXT NOT NULL,
        primary_persona TEXT NOT NULL,
        assignment TEXT NOT NULL,
        assigned_at TEXT NOT NULL,
        PRIMARY KEY (user_id, time_window)
      );

      CREATE TABLE IF NOT EXISTS recommendations (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT UNIQUE NOT NULL,
        user_id TEXT NOT NULL,
        time_window TEXT NOT NULL,
        batch_id TEXT NOT NULL,
        type TEXT CHECK(type IN ('education', 'offer')),
        content_id TEXT NOT NULL,
        title TEXT NOT NULL,
        rationale TEXT NOT NULL,
        decision_trace TEXT NOT NULL,
        shown_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_rec_user ON recommendations(user_id, time_window);
    `);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      this.logger.error(`[Store] ${operation} failed: ${err instanceof Error ? err.message : String(err)}`);
      throw new StorageFailureError(operation, err);
    }
  }

  // ── Ingestion ──

  importAccounts(accounts: Account[]): void {
    this.guard('importAccounts', () => {
      const stmt = this.db.prepare(`
        INSERT OR REPLACE INTO accounts (id, user_id, type, subtype, balance, credit_limit, mask, minimum_payment, is_overdue)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      this.db.transaction((rows: Account[]) => {
        for (const a of rows) {
          stmt.run(a.id, a.userId, a.type, a.subtype, a.balance, a.creditLimit, a.mask, a.minimumPayment, a.isOverdue ? 1 : 0);
        }
      })(accounts);
    });
  }

  importTransactions(transactions: Transaction[]): void {
    this.guard('importTransactions', () => {
      const stmt = this.db.prepare(`
        INSERT OR REPLACE INTO transactions (id, account_id, user_id, date, amount, merchant_name, category, payment_channel, pending)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);
      this.db.transaction((rows: Transaction[]) => {
        for (const t of rows) {
          stmt.run(t.id, t.accountId, t.userId, t.date, t.amount, t.merchantName, JSON.stringify(t.category), t.paymentChannel, t.pending ? 1 : 0);
        }
      })(transactions);
    });
  }

  // ── Reader ──

  listTransactions(userId: string, since: string): Transaction[] {
    return this.guard('listTransactions', () => {
      const rows = this.db.prepare(
        'SELECT * FROM transactions WHERE user_id = ? AND date >= ? ORDER BY date ASC, id ASC'
      ).all(userId, since) as TransactionRow[];

      return rows.map(r => TransactionSchema.parse({
        id: r.id,
        accountId: r.account_id,
        userId: r.user_id,
        date: r.date,
        amount: r.amount,
        merchantName: r.merchant_name,
        category: JSON.parse(r.category || '[]'),
        paymentChannel: r.payment_channel,
        pending: r.pending === 1,
      }));
    });
  }

  listAccounts(userId: string): Account[] {
    return this.guard('listAccounts', () => {
      const rows = this.db.prepare(
        'SELECT * FROM accounts WHERE user_id = ? ORDER BY id ASC'
      ).all(userId) as AccountRow[];

      return rows.map(r => AccountSchema.parse({
        id: r.id,
        userId: r.user_id,
        type: r.type,
        subtype: r.subtype,
        balance: r.balance,
        creditLimit: r.credit_limit,
        mask: r.mask,
        minimumPayment: r.minimum_payment,
        isOverdue: r.is_overdue === 1,
      }));
    });
  }

  // ── Writer ──

  writeSignals(userId: string, window: TimeWindow, signals: Signal[]): void {
    this.guard('writeSignals', () => {
      const del = this.db.prepare('DELETE FROM computed_signals WHERE user_id = ? AND time_window = ?');
      const ins = this.db.prepare(`
        INSERT INTO computed_signals (user_id, time_window, signal_type, payload, computed_at)
        VALUES (?, ?, ?, ?, ?)
      `);
      this.db.transaction(() => {
        del.run(userId, window);
        for (const s of signals) {
          ins.run(userId, window, s.signalType, JSON.stringify(s.payload), s.computedAt);
        }
      })();
    });
  }

  writePersonaAssignment(userId: string, window: TimeWindow, assignment: PersonaAssignment): void {
    this.guard('writePersonaAssignment', () => {
      this.db.prepare(`
        INSERT OR REPLACE INTO persona_assignments (user_id, time_window, primary_persona, assignment, assigned_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(userId, window, assignment.primaryPersona, JSON.stringify(assignment), assignment.assignedAt);
    });
  }

  writeRecommendation(rec: Recommendation): void {
    this.guard('writeRecommendation', () => {
      this.db.prepare(`
        INSERT INTO recommendations (id, user_id, time_window, batch_id, type, content_id, title, rationale, decision_trace, shown_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(rec.id, rec.userId, rec.timeWindow, rec.batchId, rec.type, rec.contentId, rec.title, rec.rationale, JSON.stringify(rec.decisionTrace), rec.shownAt);
    });
  }

  // ── Lookup ──

  loadSignals(userId: string, window: TimeWindow): Signal[] {
    return this.guard('loadSignals', () => {
      const rows = this.db.prepare(
        'SELECT signal_type, time_window, payload, computed_at FROM computed_signals WHERE user_id = ? AND time_window = ?'
      ).all(userId, window) as SignalRow[];
      return rows.map(parseSignal);
    });
  }

  loadPersonaAssignment(userId: string, window: TimeWindow): PersonaAssignment | null {
    return this.guard('loadPersonaAssignment', () => {
      const row = this.db.prepare(
        'SELECT assignment FROM persona_assignments WHERE user_id = ? AND time_window = ?'
      ).get(userId, window) as { assignment: string } | undefined;
      return row ? PersonaAssignmentSchema.parse(JSON.parse(row.assignment)) : null;
    });
  }

  listRecommendations(userId: string, window: TimeWindow): Recommendation[] {
    return this.guard('listRecommendations', () => {
      const rows = this.db.prepare(`
        SELECT * FROM recommendations
        WHERE user_id = ? AND time_window = ? AND batch_id = (
          SELECT batch_id FROM recommendations WHERE user_id = ? AND time_window = ? ORDER BY seq DESC LIMIT 1
        )
        ORDER BY seq ASC
      `).all(userId, window, userId, window) as RecommendationRow[];

      return rows.map(parseRecommendation);
    });
  }

  findRecommendationByTrace(traceId: string): Recommendation | null {
    return this.guard('findRecommendationByTrace', () => {
      const row = this.db.prepare(
        "SELECT * FROM recommendations WHERE json_extract(decision_trace, '$.traceId') = ? LIMIT 1"
      ).get(traceId) as RecommendationRow | undefined;
      return row ? parseRecommendation(row) : null;
    });
  }
}
