// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Credit Utilization Detector
// Per-card utilization, interest, minimum-payment and overdue flags
// ═══════════════════════════════════════════════════════════════

import type { Account, CreditAccountSignal, CreditPayload, Transaction, UtilizationLevel } from '../core/types.js';
import { mentions, round, settled, sum } from './stats.js';

export const HIGH_UTILIZATION = 0.5;
export const MEDIUM_UTILIZATION = 0.3;

// Within this distance of the minimum due, a payment counts as minimum-only
const MINIMUM_PAYMENT_TOLERANCE = 5;
const INTEREST = /interest/i;

export function utilizationLevel(utilization: number): UtilizationLevel {
  if (utilization >= HIGH_UTILIZATION) return 'high';
  if (utilization >= MEDIUM_UTILIZATION) return 'medium';
  return 'low';
}

export function cardName(account: Pick<Account, 'subtype' | 'mask'>): string {
  const label = (account.subtype || 'card')
    .split(/\s+/)
    .filter(Boolean)
    .map(w => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(' ');
  return account.mask ? `${label} ending in ${account.mask}` : label;
}

/** Issuer-reported minimum, else the common 2%-or-$25 estimate. */
function minimumDue(account: Account): number {
  if (account.minimumPayment !== null && account.minimumPayment > 0) return account.minimumPayment;
  return Math.max(account.balance * 0.02, 25);
}

function analyzeAccount(account: Account, limit: number, txs: Transaction[]): CreditAccountSignal {
  const utilization = account.balance / limit;

  const payments = txs
    .filter(tx => tx.amount > 0)
    .sort((a, b) => b.date.localeCompare(a.date));
  const lastPayment = payments.length > 0 ? payments[0].amount : null;
  const due = minimumDue(account);

  const interestCharged = sum(txs.filter(tx => tx.amount < 0 && mentions(tx, INTEREST)).map(tx => -tx.amount));

  return {
    accountId: account.id,
    cardName: cardName(account),
    mask: account.mask,
    balance: round(account.balance),
    limit: round(limit),
    utilization: round(utilization, 4),
    level: utilizationLevel(utilization),
    interestCharged: round(interestCharged),
    lastPayment,
    minimumDue: round(due),
    minimumPaymentOnly: lastPayment !== null && Math.abs(lastPayment - due) <= MINIMUM_PAYMENT_TOLERANCE,
    isOverdue: account.isOverdue,
  };
}

export function detectCreditUtilization(transactions: Transaction[], accounts: Account[], _windowDays: number): CreditPayload {
  const cards = accounts.filter(a => a.type === 'credit' && a.creditLimit !== null && a.creditLimit > 0);

  if (cards.length === 0) {
    return {
      applicable: false,
      accounts: [],
      primaryAccount: null,
      totalBalance: 0,
      totalLimit: 0,
      totalUtilization: 0,
      maxUtilization: 0,
      level: 'low',
      anyHigh: false,
      allBelow30: true,
      interestCharged: 0,
      minimumPaymentOnly: false,
      isOverdue: false,
    };
  }

  const txs = settled(transactions);
  const signals = cards.map(card =>
    analyzeAccount(card, card.creditLimit ?? 0, txs.filter(tx => tx.accountId === card.id)),
  );

  let primary = signals[0];
  for (const s of signals) {
    if (s.utilization > primary.utilization) primary = s;
  }

  const totalBalance = sum(cards.map(c => c.balance));
  const totalLimit = sum(cards.map(c => c.creditLimit ?? 0));
  const totalUtilization = totalBalance / totalLimit;

  return {
    applicable: true,
    accounts: signals,
    primaryAccount: primary,
    totalBalance: round(totalBalance),
    totalLimit: round(totalLimit),
    totalUtilization: round(totalUtilization, 4),
    maxUtilization: primary.utilization,
    level: utilizationLevel(totalUtilization),
    anyHigh: signals.some(s => s.utilization >= HIGH_UTILIZATION),
    allBelow30: signals.every(s => s.utilization < MEDIUM_UTILIZATION),
    interestCharged: round(sum(signals.map(s => s.interestCharged))),
    minimumPaymentOnly: signals.some(s => s.minimumPaymentOnly),
    isOverdue: signals.some(s => s.isOverdue),
  };
}
