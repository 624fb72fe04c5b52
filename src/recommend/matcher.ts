// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Content Matcher
// Pure filters over the catalog; ties keep catalog order
// ═══════════════════════════════════════════════════════════════

import type { Catalog, ContentItem, FeatureSet, Persona } from '../core/types.js';

export type TriggerSignal =
  | 'credit_utilization_high'
  | 'interest_charged'
  | 'minimum_payment_only'
  | 'is_overdue'
  | 'irregular_frequency'
  | 'median_pay_gap_high'
  | 'cash_flow_buffer_low'
  | 'subscription_count_high'
  | 'monthly_recurring_high'
  | 'subscription_share_high'
  | 'savings_growth_rate_positive'
  | 'net_inflow_high'
  | 'emergency_fund_adequate'
  | 'savings_balance_positive';

export interface MatchLimits {
  educationMin: number;
  educationMax: number;
  offerMax: number;
}

export const DEFAULT_LIMITS: MatchLimits = { educationMin: 3, educationMax: 5, offerMax: 3 };

export function activeTriggers(fs: FeatureSet | null): Set<TriggerSignal> {
  const active = new Set<TriggerSignal>();
  if (!fs) return active;
  const on = (flag: boolean, trigger: TriggerSignal) => { if (flag) active.add(trigger); };

  const credit = fs.creditUtilization;
  if (credit.applicable) {
    on(credit.anyHigh, 'credit_utilization_high');
    on(credit.interestCharged > 0, 'interest_charged');
    on(credit.minimumPaymentOnly, 'minimum_payment_only');
    on(credit.isOverdue, 'is_overdue');
  }

  const income = fs.incomeStability;
  if (income.applicable) {
    on(income.irregular, 'irregular_frequency');
    on(income.medianPayGap > 45, 'median_pay_gap_high');
    on(income.cashFlowBuffer !== null && income.cashFlowBuffer < 1, 'cash_flow_buffer_low');
  }

  const subs = fs.subscriptions;
  if (subs.applicable) {
    on(subs.recurringCount >= 3, 'subscription_count_high');
    on(subs.monthlyRecurringTotal >= 50, 'monthly_recurring_high');
    on(subs.subscriptionShare >= 0.1, 'subscription_share_high');
  }

  const savings = fs.savingsBehavior;
  if (savings.applicable) {
    on(savings.growthRate > 0, 'savings_growth_rate_positive');
    on(savings.monthlyNetInflow >= 200, 'net_inflow_high');
    on(savings.coverageLevel === 'excellent' || savings.coverageLevel === 'good', 'emergency_fund_adequate');
    on(savings.totalSavings > 0, 'savings_balance_positive');
  }

  return active;
}

/** Stable: equal priorities keep catalog order. */
function byPriority(items: readonly ContentItem[]): ContentItem[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => a.item.priority - b.item.priority || a.index - b.index)
    .map(({ item }) => item);
}

export function matchedTriggers(item: ContentItem, triggers: ReadonlySet<string>): string[] {
  return [...item.triggerSignals].filter(t => triggers.has(t));
}

function qualifies(item: ContentItem, triggers: ReadonlySet<string>): boolean {
  return item.triggerSignals.size === 0 || matchedTriggers(item, triggers).length > 0;
}

/**
 * Persona items whose triggers intersect the active set, topped up from the
 * persona's remaining items to `educationMin` and capped at `educationMax`.
 */
export function matchEducation(
  catalog: Catalog,
  persona: Persona,
  triggers: ReadonlySet<string>,
  limits: MatchLimits = DEFAULT_LIMITS,
): ContentItem[] {
  const candidates = byPriority(catalog.education.filter(item => item.applicablePersonas.has(persona)));
  const selected = candidates.filter(item => qualifies(item, triggers)).slice(0, limits.educationMax);

  for (const item of candidates) {
    if (selected.length >= limits.educationMin) break;
    if (!selected.includes(item)) selected.push(item);
  }

  return candidates.filter(item => selected.includes(item));
}

/** A predicate that throws counts as ineligible. */
export function isOfferEligible(item: ContentItem, features: FeatureSet): boolean {
  if (!item.isEligible) return true;
  try {
    return item.isEligible(features);
  } catch {
    return false;
  }
}

/** An offer with no personas listed is open to every persona. */
export function matchOffers(
  catalog: Catalog,
  persona: Persona,
  features: FeatureSet | null,
  limits: MatchLimits = DEFAULT_LIMITS,
): ContentItem[] {
  if (!features) return [];
  return byPriority(catalog.offers)
    .filter(item => item.applicablePersonas.size === 0 || item.applicablePersonas.has(persona))
    .filter(item => isOfferEligible(item, features))
    .slice(0, limits.offerMax);
}
