// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Signal Math
// Shared helpers for the detectors
// ═══════════════════════════════════════════════════════════════

import type { Transaction } from '../core/types.js';

const DAY_MS = 86_400_000;

export function round(value: number, places = 2): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

export function sum(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

export function mean(values: number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

export function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/** Sample standard deviation (n - 1). */
export function sampleStdev(values: number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  return Math.sqrt(sum(values.map(v => (v - m) ** 2)) / (values.length - 1));
}

export function parseDay(date: string): number {
  return Date.parse(`${date}T00:00:00Z`);
}

export function daysBetween(earlier: string, later: string): number {
  return Math.round((parseDay(later) - parseDay(earlier)) / DAY_MS);
}

export function shiftDays(date: Date, days: number): string {
  return new Date(date.getTime() + days * DAY_MS).toISOString().slice(0, 10);
}

/** Gaps in days between consecutive dates (dates must be sorted). */
export function gaps(dates: string[]): number[] {
  const out: number[] = [];
  for (let i = 1; i < dates.length; i++) {
    out.push(daysBetween(dates[i - 1], dates[i]));
  }
  return out;
}

export function monthsIn(windowDays: number): number {
  return windowDays / 30;
}

export function settled(transactions: Transaction[]): Transaction[] {
  return transactions.filter(tx => !tx.pending);
}

/** Average monthly debits across every account in the window. */
export function avgMonthlyOutflow(transactions: Transaction[], windowDays: number): number {
  const total = sum(settled(transactions).filter(tx => tx.amount < 0).map(tx => -tx.amount));
  return total / monthsIn(windowDays);
}

export function mentions(tx: Transaction, pattern: RegExp): boolean {
  if (tx.merchantName && pattern.test(tx.merchantName)) return true;
  return tx.category.some(c => pattern.test(c));
}
