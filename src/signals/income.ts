// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Income Stability Detector
// Payroll cadence, paycheck variability, cash-flow buffer
// ═══════════════════════════════════════════════════════════════

import type { Account, IncomePayload, PayFrequency, Transaction } from '../core/types.js';
import { avgMonthlyOutflow, gaps, mean, median, mentions, monthsIn, round, sampleStdev, settled, sum } from './stats.js';
import { isSavingsAccount } from './savings.js';

export const DEFAULT_PAYROLL_MIN_AMOUNT = 500;

const PAYROLL = /payroll|salary|direct dep|paycheck|income/i;

// `center` bounds the median gap where the per-gap range alone is too loose
const CADENCES: Array<{ frequency: PayFrequency; min: number; max: number; center?: [number, number] }> = [
  { frequency: 'weekly', min: 6, max: 8 },
  { frequency: 'biweekly', min: 13, max: 15 },
  { frequency: 'semimonthly', min: 12, max: 19, center: [13, 17] },
  { frequency: 'monthly', min: 27, max: 33 },
];

export function payFrequency(intervals: number[]): PayFrequency {
  if (intervals.length === 0) return 'irregular';
  const mid = median(intervals);
  for (const c of CADENCES) {
    if (!intervals.every(g => g >= c.min && g <= c.max)) continue;
    if (c.center && (mid < c.center[0] || mid > c.center[1])) continue;
    return c.frequency;
  }
  return 'irregular';
}

export function detectIncomeStability(
  transactions: Transaction[],
  accounts: Account[],
  windowDays: number,
  payrollMinAmount = DEFAULT_PAYROLL_MIN_AMOUNT,
): IncomePayload {
  const depository = accounts.filter(a => a.type === 'depository' && !isSavingsAccount(a));
  const depositoryIds = new Set(depository.map(a => a.id));
  const checkingBalance = sum(depository.filter(a => a.subtype.toLowerCase() === 'checking').map(a => a.balance));
  const outflow = avgMonthlyOutflow(transactions, windowDays);

  // Same-day deposits are one payday
  const paydays = new Map<string, number>();
  for (const tx of settled(transactions)) {
    if (tx.amount <= 0 || !depositoryIds.has(tx.accountId)) continue;
    if (tx.amount < payrollMinAmount && !mentions(tx, PAYROLL)) continue;
    paydays.set(tx.date, (paydays.get(tx.date) ?? 0) + tx.amount);
  }

  const cashFlowBuffer = outflow > 0 ? round(checkingBalance / outflow) : null;

  if (paydays.size < 2) {
    return {
      applicable: false,
      payrollDeposits: paydays.size,
      frequency: 'irregular',
      irregular: false,
      medianPayGap: 0,
      amountCv: 0,
      avgMonthlyIncome: round(sum([...paydays.values()]) / monthsIn(windowDays)),
      checkingBalance: round(checkingBalance),
      avgMonthlyOutflow: round(outflow),
      cashFlowBuffer,
    };
  }

  const dates = [...paydays.keys()].sort();
  const amounts = dates.map(d => paydays.get(d) ?? 0);
  const intervals = gaps(dates);
  const frequency = payFrequency(intervals);
  const avg = mean(amounts);

  return {
    applicable: true,
    payrollDeposits: dates.length,
    frequency,
    irregular: frequency === 'irregular',
    medianPayGap: median(intervals),
    amountCv: avg > 0 ? round(sampleStdev(amounts) / avg, 4) : 0,
    avgMonthlyIncome: round(sum(amounts) / monthsIn(windowDays)),
    checkingBalance: round(checkingBalance),
    avgMonthlyOutflow: round(outflow),
    cashFlowBuffer,
  };
}
