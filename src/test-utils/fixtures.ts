// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Test Fixtures
// Builders for accounts, transactions and feature sets
// ═══════════════════════════════════════════════════════════════

import type { Account, FeatureSet, Transaction } from '../core/types.js';
import { shiftDays } from '../signals/stats.js';

export const TEST_USER = 'user-test-1';

let txCounter = 0;

export function makeTransaction(overrides: Partial<Transaction> = {}): Transaction {
  txCounter++;
  return {
    id: `tx-${txCounter}`,
    accountId: 'acc-checking',
    userId: TEST_USER,
    date: '2026-09-15',
    amount: -10,
    merchantName: null,
    category: [],
    paymentChannel: 'online',
    pending: false,
    ...overrides,
  };
}

export function makeAccount(overrides: Partial<Account> = {}): Account {
  return {
    id: 'acc-checking',
    userId: TEST_USER,
    type: 'depository',
    subtype: 'checking',
    balance: 0,
    creditLimit: null,
    mask: null,
    minimumPayment: null,
    isOverdue: false,
    ...overrides,
  };
}

export interface SeriesSpec {
  start: string;
  count: number;
  everyDays: number;
  amount: number;
  merchantName?: string | null;
  accountId?: string;
  userId?: string;
  category?: string[];
}

/** `count` transactions, `everyDays` apart, beginning on `start`. */
export function monthlySeries(series: SeriesSpec): Transaction[] {
  const origin = new Date(`${series.start}T00:00:00Z`);
  return Array.from({ length: series.count }, (_, i) => makeTransaction({
    date: shiftDays(origin, i * series.everyDays),
    amount: series.amount,
    merchantName: series.merchantName ?? null,
    accountId: series.accountId ?? 'acc-checking',
    userId: series.userId ?? TEST_USER,
    category: series.category ?? [],
  }));
}

/** Feature set where every signal is not applicable; override the ones a test needs. */
export function emptyFeatureSet(overrides: Partial<FeatureSet> = {}): FeatureSet {
  return {
    userId: TEST_USER,
    timeWindow: '30d',
    computedAt: '2026-10-01T00:00:00.000Z',
    subscriptions: {
      applicable: false, recurringMerchants: [], recurringCount: 0, monthlyRecurringTotal: 0,
      totalOutflow: 0, avgMonthlyOutflow: 0, subscriptionShare: 0,
    },
    creditUtilization: {
      applicable: false, accounts: [], primaryAccount: null, totalBalance: 0, totalLimit: 0,
      totalUtilization: 0, maxUtilization: 0, level: 'low', anyHigh: false, allBelow30: true,
      interestCharged: 0, minimumPaymentOnly: false, isOverdue: false,
    },
    savingsBehavior: {
      applicable: false, accounts: [], totalSavings: 0, netInflow: 0, monthlyNetInflow: 0,
      startBalance: 0, growthRate: 0, avgMonthlyOutflow: 0, emergencyFundCoverage: null, coverageLevel: 'low',
    },
    incomeStability: {
      applicable: false, payrollDeposits: 0, frequency: 'irregular', irregular: false, medianPayGap: 0,
      amountCv: 0, avgMonthlyIncome: 0, checkingBalance: 0, avgMonthlyOutflow: 0, cashFlowBuffer: null,
    },
    ...overrides,
  };
}
