// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: In-Memory Feature Store
// FeatureStore fake with per-user failure injection
// ═══════════════════════════════════════════════════════════════

import type { Account, PersonaAssignment, Recommendation, Signal, TimeWindow, Transaction } from '../core/types.js';
import { StorageFailureError } from '../core/errors.js';
import type { FeatureStore } from '../storage/types.js';

type Operation = keyof FeatureStore;

export class MemoryFeatureStore implements FeatureStore {
  readonly accounts: Account[] = [];
  readonly transactions: Transaction[] = [];
  readonly signals = new Map<string, Signal[]>();
  readonly personas = new Map<string, PersonaAssignment>();
  readonly recommendations: Recommendation[] = [];
  private failures: Array<{ operation: Operation; userId: string }> = [];

  seed(accounts: Account[], transactions: Transaction[]): this {
    this.accounts.push(...accounts);
    this.transactions.push(...transactions);
    return this;
  }

  failOn(operation: Operation, userId: string): this {
    this.failures.push({ operation, userId });
    return this;
  }

  private check(operation: Operation, userId: string): void {
    if (this.failures.some(f => f.operation === operation && f.userId === userId)) {
      throw new StorageFailureError(operation, new Error('simulated storage timeout'));
    }
  }

  listTransactions(userId: string, since: string): Transaction[] {
    this.check('listTransactions', userId);
    return this.transactions
      .filter(tx => tx.userId === userId && tx.date >= since)
      .sort((a, b) => a.date.localeCompare(b.date) || a.id.localeCompare(b.id));
  }

  listAccounts(userId: string): Account[] {
    this.check('listAccounts', userId);
    return this.accounts.filter(a => a.userId === userId);
  }

  writeSignals(userId: string, window: TimeWindow, signals: Signal[]): void {
    this.check('writeSignals', userId);
    this.signals.set(`${userId}:${window}`, structuredClone(signals));
  }

  writePersonaAssignment(userId: string, window: TimeWindow, assignment: PersonaAssignment): void {
    this.check('writePersonaAssignment', userId);
    this.personas.set(`${userId}:${window}`, structuredClone(assignment));
  }

  writeRecommendation(recommendation: Recommendation): void {
    this.check('writeRecommendation', recommendation.userId);
    this.recommendations.push(recommendation);
  }

  loadSignals(userId: string, window: TimeWindow): Signal[] {
    this.check('loadSignals', userId);
    return structuredClone(this.signals.get(`${userId}:${window}`) ?? []);
  }

  loadPersonaAssignment(userId: string, window: TimeWindow): PersonaAssignment | null {
    this.check('loadPersonaAssignment', userId);
    const found = this.personas.get(`${userId}:${window}`);
    return found ? structuredClone(found) : null;
  }

  listRecommendations(userId: string, window: TimeWindow): Recommendation[] {
    this.check('listRecommendations', userId);
    const mine = this.recommendations.filter(r => r.userId === userId && r.timeWindow === window);
    const latest = mine.at(-1)?.batchId;
    return mine.filter(r => r.batchId === latest);
  }

  findRecommendationByTrace(traceId: string): Recommendation | null {
    return this.recommendations.find(r => r.decisionTrace.traceId === traceId) ?? null;
  }
}
