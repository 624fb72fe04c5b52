// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Rationale Generator
// Named-placeholder substitution over the flattened feature view
// ═══════════════════════════════════════════════════════════════

import type { FeatureSet, RationaleValue } from '../core/types.js';
import { DataIncompleteError } from '../core/errors.js';
import { flattenFeatures, resolvePath, type FlatFeatures, type Scalar } from '../features/flatten.js';

type Format = 'text' | 'currency' | 'percent' | 'number' | 'integer';

interface PlaceholderSource {
  path: string;
  format: Format;
}

export const PLACEHOLDERS: Readonly<Record<string, PlaceholderSource>> = {
  card_name: { path: 'creditUtilization.primaryAccount.cardName', format: 'text' },
  utilization: { path: 'creditUtilization.primaryAccount.utilization', format: 'percent' },
  total_utilization: { path: 'creditUtilization.totalUtilization', format: 'percent' },
  balance: { path: 'creditUtilization.primaryAccount.balance', format: 'currency' },
  limit: { path: 'creditUtilization.primaryAccount.limit', format: 'currency' },
  total_balance: { path: 'creditUtilization.totalBalance', format: 'currency' },
  interest_charged: { path: 'creditUtilization.interestCharged', format: 'currency' },
  subscription_count: { path: 'subscriptions.recurringCount', format: 'integer' },
  monthly_recurring: { path: 'subscriptions.monthlyRecurringTotal', format: 'currency' },
  subscription_share: { path: 'subscriptions.subscriptionShare', format: 'percent' },
  total_savings: { path: 'savingsBehavior.totalSavings', format: 'currency' },
  growth_rate: { path: 'savingsBehavior.growthRate', format: 'percent' },
  net_inflow: { path: 'savingsBehavior.monthlyNetInflow', format: 'currency' },
  emergency_fund_coverage: { path: 'savingsBehavior.emergencyFundCoverage', format: 'number' },
  cash_flow_buffer: { path: 'incomeStability.cashFlowBuffer', format: 'number' },
  median_pay_gap: { path: 'incomeStability.medianPayGap', format: 'integer' },
  avg_monthly_income: { path: 'incomeStability.avgMonthlyIncome', format: 'currency' },
};

// Every brace token, known name or not
const PLACEHOLDER = /\{([^{}]+)\}/g;

/** Distinct placeholder names in first-use order. */
export function placeholderNames(template: string): string[] {
  return [...new Set(Array.from(template.matchAll(PLACEHOLDER), m => m[1]))];
}

export interface RationaleResult {
  text: string;
  values: Record<string, RationaleValue>;
}

// ── Formatting ──

const formatters = new Map<string, Intl.NumberFormat>();

function currencyFormat(currency: string): Intl.NumberFormat {
  let fmt = formatters.get(currency);
  if (!fmt) {
    fmt = new Intl.NumberFormat('en-US', { style: 'currency', currency });
    formatters.set(currency, fmt);
  }
  return fmt;
}

/** Ratios become whole-number percents and carry their own sign. */
export function formatValue(raw: Scalar, format: Format, currency = 'USD'): string {
  if (typeof raw !== 'number') return String(raw);
  switch (format) {
    case 'currency': return currencyFormat(currency).format(raw);
    case 'percent': return `${Math.round(raw * 100)}%`;
    case 'integer': return String(Math.round(raw));
    case 'number': return (Math.round(raw * 10) / 10).toFixed(1);
    case 'text': return String(raw);
  }
}

function resolve(flat: FlatFeatures, name: string, currency: string): RationaleValue {
  if (!Object.hasOwn(PLACEHOLDERS, name)) {
    throw new DataIncompleteError(name, `Unknown rationale placeholder {${name}}`);
  }
  const source = PLACEHOLDERS[name];
  const raw = resolvePath(flat, source.path);
  return { path: source.path, raw, formatted: formatValue(raw, source.format, currency) };
}

/** Any placeholder without a value throws DataIncompleteError; nothing is left blank. */
export function generateRationale(template: string, features: FeatureSet, currency = 'USD'): RationaleResult {
  const flat = flattenFeatures(features);
  const values: Record<string, RationaleValue> = {};

  for (const name of placeholderNames(template)) {
    values[name] = resolve(flat, name, currency);
  }

  const text = template.replace(PLACEHOLDER, (_, name: string) => values[name].formatted).trim();
  if (text.length === 0) {
    throw new DataIncompleteError('rationale', 'Rationale template produced empty text');
  }
  return { text, values };
}
