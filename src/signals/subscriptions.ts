// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Subscription Detector
// Recurring merchants on a monthly or weekly cadence
// ═══════════════════════════════════════════════════════════════

import type { Account, RecurringFrequency, RecurringMerchant, SubscriptionPayload, Transaction } from '../core/types.js';
import { avgMonthlyOutflow, gaps, mean, round, settled, sum } from './stats.js';

const MIN_OCCURRENCES = 3;
const WEEKS_PER_MONTH = 52 / 12;

const CADENCES: Array<{ frequency: RecurringFrequency; days: number; tolerance: number }> = [
  { frequency: 'monthly', days: 30, tolerance: 3 },
  { frequency: 'weekly', days: 7, tolerance: 1 },
];

function cadenceOf(intervals: number[]): RecurringFrequency | null {
  for (const c of CADENCES) {
    if (intervals.every(g => Math.abs(g - c.days) <= c.tolerance)) return c.frequency;
  }
  return null;
}

export function detectSubscriptions(transactions: Transaction[], _accounts: Account[], windowDays: number): SubscriptionPayload {
  const debits = settled(transactions).filter(tx => tx.amount < 0);

  if (debits.length === 0) {
    return {
      applicable: false,
      recurringMerchants: [],
      recurringCount: 0,
      monthlyRecurringTotal: 0,
      totalOutflow: 0,
      avgMonthlyOutflow: 0,
      subscriptionShare: 0,
    };
  }

  const byMerchant = new Map<string, Transaction[]>();
  for (const tx of debits) {
    if (!tx.merchantName) continue;
    const list = byMerchant.get(tx.merchantName) ?? [];
    list.push(tx);
    byMerchant.set(tx.merchantName, list);
  }

  const recurring: RecurringMerchant[] = [];
  for (const [merchant, txs] of byMerchant) {
    if (txs.length < MIN_OCCURRENCES) continue;

    const sorted = [...txs].sort((a, b) => a.date.localeCompare(b.date));
    const frequency = cadenceOf(gaps(sorted.map(tx => tx.date)));
    if (!frequency) continue;

    const amount = mean(sorted.map(tx => -tx.amount));
    const monthlyEquivalent = frequency === 'monthly' ? amount : amount * WEEKS_PER_MONTH;
    recurring.push({
      merchant,
      frequency,
      amount: round(amount),
      monthlyEquivalent: round(monthlyEquivalent),
      occurrences: sorted.length,
    });
  }

  recurring.sort((a, b) => b.monthlyEquivalent - a.monthlyEquivalent || a.merchant.localeCompare(b.merchant));

  const monthlyRecurringTotal = round(sum(recurring.map(r => r.monthlyEquivalent)));
  const monthlyOutflow = avgMonthlyOutflow(debits, windowDays);

  return {
    applicable: true,
    recurringMerchants: recurring,
    recurringCount: recurring.length,
    monthlyRecurringTotal,
    totalOutflow: round(sum(debits.map(tx => -tx.amount))),
    avgMonthlyOutflow: round(monthlyOutflow),
    subscriptionShare: monthlyOutflow > 0 ? round(monthlyRecurringTotal / monthlyOutflow, 4) : 0,
  };
}
