// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Storage Contracts
// Single writer per record, last write wins on recomputation
// ═══════════════════════════════════════════════════════════════

import type { Account, PersonaAssignment, Recommendation, Signal, TimeWindow, Transaction } from '../core/types.js';

export interface FeatureStoreReader {
  /** Transactions dated on or after `since` (YYYY-MM-DD). */
  listTransactions(userId: string, since: string): Transaction[];
  listAccounts(userId: string): Account[];
}

export interface FeatureStoreWriter {
  /** Replaces the user's signals for the window as one unit. */
  writeSignals(userId: string, window: TimeWindow, signals: Signal[]): void;
  /** Replaces, never merges. */
  writePersonaAssignment(userId: string, window: TimeWindow, assignment: PersonaAssignment): void;
  /** Append-only; stored recommendations are never updated. */
  writeRecommendation(recommendation: Recommendation): void;
}

export interface FeatureStoreLookup {
  loadSignals(userId: string, window: TimeWindow): Signal[];
  loadPersonaAssignment(userId: string, window: TimeWindow): PersonaAssignment | null;
  /** Most recent batch for the window, in generation order. */
  listRecommendations(userId: string, window: TimeWindow): Recommendation[];
  /** Any stored recommendation, current batch or not. */
  findRecommendationByTrace(traceId: string): Recommendation | null;
}

export type FeatureStore = FeatureStoreReader & FeatureStoreWriter & FeatureStoreLookup;
