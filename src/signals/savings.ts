// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Savings Behavior Detector
// Net inflow, growth and emergency-fund coverage
// ═══════════════════════════════════════════════════════════════

import type { Account, CoverageLevel, SavingsPayload, Transaction } from '../core/types.js';
import { avgMonthlyOutflow, monthsIn, round, settled, sum } from './stats.js';

const SAVINGS_SUBTYPES = new Set(['savings', 'money market', 'hsa']);

export function isSavingsAccount(account: Account): boolean {
  if (account.type !== 'depository') return false;
  return SAVINGS_SUBTYPES.has(account.subtype.toLowerCase().replace(/[-_]+/g, ' ').trim());
}

export function coverageLevel(months: number): CoverageLevel {
  if (months >= 6) return 'excellent';
  if (months >= 3) return 'good';
  if (months >= 1) return 'building';
  return 'low';
}

export function detectSavingsBehavior(transactions: Transaction[], accounts: Account[], windowDays: number): SavingsPayload {
  const savings = accounts.filter(isSavingsAccount);
  const outflow = avgMonthlyOutflow(transactions, windowDays);

  if (savings.length === 0) {
    return {
      applicable: false,
      accounts: [],
      totalSavings: 0,
      netInflow: 0,
      monthlyNetInflow: 0,
      startBalance: 0,
      growthRate: 0,
      avgMonthlyOutflow: round(outflow),
      emergencyFundCoverage: null,
      coverageLevel: 'low',
    };
  }

  const ids = new Set(savings.map(a => a.id));
  const flows = new Map<string, number>();
  for (const tx of settled(transactions)) {
    if (!ids.has(tx.accountId)) continue;
    flows.set(tx.accountId, (flows.get(tx.accountId) ?? 0) + tx.amount);
  }

  const totalSavings = sum(savings.map(a => a.balance));
  const netInflow = sum([...flows.values()]);
  // Balance at window start, reconstructed from the window's flows
  const startBalance = totalSavings - netInflow;

  let growthRate: number;
  if (startBalance > 0) growthRate = netInflow / startBalance;
  else growthRate = totalSavings > 0 ? 1 : 0;

  let coverage: number | null = null;
  let level: CoverageLevel;
  if (outflow > 0) {
    coverage = totalSavings / outflow;
    level = coverageLevel(coverage);
  } else {
    level = totalSavings > 0 ? 'excellent' : 'low';
  }

  return {
    applicable: true,
    accounts: savings.map(a => ({
      accountId: a.id,
      subtype: a.subtype,
      balance: round(a.balance),
      netInflow: round(flows.get(a.id) ?? 0),
    })),
    totalSavings: round(totalSavings),
    netInflow: round(netInflow),
    monthlyNetInflow: round(netInflow / monthsIn(windowDays)),
    startBalance: round(startBalance),
    growthRate: round(growthRate, 4),
    avgMonthlyOutflow: round(outflow),
    emergencyFundCoverage: coverage === null ? null : round(coverage),
    coverageLevel: level,
  };
}
