// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Feature Aggregator
// Runs every detector for a user/window, commits all four or none
// ═══════════════════════════════════════════════════════════════

import type { FeatureSet, LoggerHandle, Signal, TimeWindow } from '../core/types.js';
import { WINDOW_DAYS } from '../core/types.js';
import type { FeatureStore } from '../storage/types.js';
import { DETECTORS, type DetectorOptions } from '../signals/index.js';
import { DEFAULT_PAYROLL_MIN_AMOUNT } from '../signals/income.js';
import { shiftDays } from '../signals/stats.js';

export interface AggregatorOptions extends DetectorOptions {
  /** Reference point for the window; defaults to the current time. */
  now: () => Date;
}

export function toSignals(features: FeatureSet): Signal[] {
  const base = { timeWindow: features.timeWindow, computedAt: features.computedAt };
  return [
    { ...base, signalType: 'subscriptions', payload: features.subscriptions },
    { ...base, signalType: 'credit_utilization', payload: features.creditUtilization },
    { ...base, signalType: 'savings_behavior', payload: features.savingsBehavior },
    { ...base, signalType: 'income_stability', payload: features.incomeStability },
  ];
}

/** Null unless all four signals are present. */
export function fromSignals(userId: string, window: TimeWindow, signals: Signal[]): FeatureSet | null {
  let subscriptions: FeatureSet['subscriptions'] | undefined;
  let creditUtilization: FeatureSet['creditUtilization'] | undefined;
  let savingsBehavior: FeatureSet['savingsBehavior'] | undefined;
  let incomeStability: FeatureSet['incomeStability'] | undefined;
  let computedAt = '';

  for (const s of signals) {
    if (s.timeWindow !== window) continue;
    if (s.computedAt > computedAt) computedAt = s.computedAt;
    switch (s.signalType) {
      case 'subscriptions': subscriptions = s.payload; break;
      case 'credit_utilization': creditUtilization = s.payload; break;
      case 'savings_behavior': savingsBehavior = s.payload; break;
      case 'income_stability': incomeStability = s.payload; break;
    }
  }

  if (!subscriptions || !creditUtilization || !savingsBehavior || !incomeStability) return null;
  return { userId, timeWindow: window, computedAt, subscriptions, creditUtilization, savingsBehavior, incomeStability };
}

export class FeatureAggregator {
  private store: FeatureStore;
  private logger: LoggerHandle;
  private options: AggregatorOptions;

  constructor(store: FeatureStore, logger: LoggerHandle, options: Partial<AggregatorOptions> = {}) {
    this.store = store;
    this.logger = logger;
    this.options = {
      payrollMinAmount: options.payrollMinAmount ?? DEFAULT_PAYROLL_MIN_AMOUNT,
      now: options.now ?? (() => new Date()),
    };
  }

  computeAllFeatures(userId: string, window: TimeWindow): FeatureSet {
    const windowDays = WINDOW_DAYS[window];
    const asOf = this.options.now();
    const since = shiftDays(asOf, -windowDays);

    const accounts = this.store.listAccounts(userId);
    const transactions = this.store.listTransactions(userId, since);

    // Any detector exception escapes before the write, so nothing is committed
    const features: FeatureSet = {
      userId,
      timeWindow: window,
      computedAt: asOf.toISOString(),
      subscriptions: DETECTORS.subscriptions(transactions, accounts, windowDays, this.options),
      creditUtilization: DETECTORS.credit_utilization(transactions, accounts, windowDays, this.options),
      savingsBehavior: DETECTORS.savings_behavior(transactions, accounts, windowDays, this.options),
      incomeStability: DETECTORS.income_stability(transactions, accounts, windowDays, this.options),
    };

    this.store.writeSignals(userId, window, toSignals(features));

    this.logger.info(`[Features] Computed ${window} signals for ${userId}`, {
      transactions: transactions.length,
      accounts: accounts.length,
      applicable: toSignals(features).filter(s => s.payload.applicable).map(s => s.signalType),
    });

    return features;
  }

  loadFeatureSet(userId: string, window: TimeWindow): FeatureSet | null {
    return fromSignals(userId, window, this.store.loadSignals(userId, window));
  }
}
