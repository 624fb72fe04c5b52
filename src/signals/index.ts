// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Signal Detector Registry
// ═══════════════════════════════════════════════════════════════

import type { Account, SignalPayloads, SignalType, Transaction } from '../core/types.js';
import { detectSubscriptions } from './subscriptions.js';
import { detectCreditUtilization } from './credit.js';
import { detectSavingsBehavior } from './savings.js';
import { detectIncomeStability } from './income.js';

export interface DetectorOptions {
  payrollMinAmount: number;
}

export type Detector<K extends SignalType> = (
  transactions: Transaction[],
  accounts: Account[],
  windowDays: number,
  options: DetectorOptions,
) => SignalPayloads[K];

export type DetectorRegistry = { [K in SignalType]: Detector<K> };

/** Detectors are independent; order carries no meaning. */
export const DETECTORS: DetectorRegistry = {
  subscriptions: (txs, accounts, days) => detectSubscriptions(txs, accounts, days),
  credit_utilization: (txs, accounts, days) => detectCreditUtilization(txs, accounts, days),
  savings_behavior: (txs, accounts, days) => detectSavingsBehavior(txs, accounts, days),
  income_stability: (txs, accounts, days, opts) => detectIncomeStability(txs, accounts, days, opts.payrollMinAmount),
};

export { detectSubscriptions, detectCreditUtilization, detectSavingsBehavior, detectIncomeStability };
