// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Persona Rules
// Ordered, first-match-wins. Order encodes advisory triage.
// ═══════════════════════════════════════════════════════════════

import type { CriterionOutcome, FeatureSet, Persona } from '../core/types.js';

type CriterionValue = number | boolean | null;

type Test =
  | { op: 'gte' | 'gt'; threshold: number; span: number }
  | { op: 'lt'; threshold: number; span: number }
  | { op: 'flag' };

type Unit = 'percent' | 'usd' | 'days' | 'months' | 'count';

export interface Criterion {
  kind: 'criterion';
  id: string;
  label: string;
  path: string;
  unit: Unit;
  test: Test;
  read: (fs: FeatureSet) => CriterionValue;
  /** Outcome when `read` yields null; unsatisfied unless set. */
  whenAbsent?: { satisfied: boolean; description: string };
}

export type CriteriaNode =
  | Criterion
  | { kind: 'any'; of: CriteriaNode[] }
  | { kind: 'all'; of: CriteriaNode[] };

export interface PersonaRule {
  persona: Exclude<Persona, 'general_wellness'>;
  description: string;
  criteria: CriteriaNode;
}

export interface NodeResult {
  satisfied: boolean;
  /** 0..1; at least 0.5 when satisfied, below 0.5 otherwise. */
  strength: number;
  outcomes: CriterionOutcome[];
}

/** Each additional satisfied alternative in an `any` group. */
export const OR_BONUS = 0.05;
export const FLAG_STRENGTH = 0.75;

// ── Formatting ──

const usd = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

function formatValue(unit: Unit, value: number): string {
  switch (unit) {
    case 'percent': return `${Math.round(value * 100)}%`;
    case 'usd': return usd.format(value);
    case 'days': return `${value} days`;
    case 'months': return `${value} months`;
    case 'count': return String(value);
  }
}

const OP_SYMBOL = { gte: '>=', gt: '>', lt: '<' } as const;

function describe(c: Criterion, value: CriterionValue): string {
  if (value === null) return c.whenAbsent?.description ?? `${c.label} unavailable`;
  if (c.test.op === 'flag' || typeof value === 'boolean') return c.label;
  return `${c.label} ${formatValue(c.unit, value)} ${OP_SYMBOL[c.test.op]} ${formatValue(c.unit, c.test.threshold)}`;
}

// ── Strength ──

function closeness(ratio: number): number {
  return Math.min(0.49, 0.5 * Math.max(0, ratio));
}

function strengthOf(test: Test, value: number | boolean): { satisfied: boolean; strength: number } {
  if (test.op === 'flag' || typeof value === 'boolean') {
    const on = value === true || (typeof value === 'number' && value > 0);
    return { satisfied: on, strength: on ? FLAG_STRENGTH : 0 };
  }

  const { threshold, span } = test;
  if (test.op === 'lt') {
    if (value < threshold) return { satisfied: true, strength: 0.5 + 0.5 * Math.min(1, (threshold - value) / span) };
    return { satisfied: false, strength: value > 0 ? closeness(threshold / value) : 0 };
  }

  const satisfied = test.op === 'gte' ? value >= threshold : value > threshold;
  if (satisfied) return { satisfied, strength: 0.5 + 0.5 * Math.min(1, (value - threshold) / span) };
  return { satisfied, strength: threshold > 0 ? closeness(value / threshold) : 0 };
}

export function evaluateNode(node: CriteriaNode, fs: FeatureSet): NodeResult {
  if (node.kind === 'criterion') {
    const value = node.read(fs);
    const { satisfied, strength } = value === null
      ? { satisfied: node.whenAbsent?.satisfied ?? false, strength: node.whenAbsent?.satisfied ? 1 : 0 }
      : strengthOf(node.test, value);
    return {
      satisfied,
      strength,
      outcomes: [{ id: node.id, description: describe(node, value), satisfied, path: node.path, value }],
    };
  }

  const children = node.of.map(child => evaluateNode(child, fs));
  const outcomes = children.flatMap(c => c.outcomes);

  if (node.kind === 'all') {
    return {
      satisfied: children.every(c => c.satisfied),
      strength: Math.min(...children.map(c => c.strength)),
      outcomes,
    };
  }

  const hits = children.filter(c => c.satisfied).length;
  return {
    satisfied: hits > 0,
    strength: Math.min(1, Math.max(...children.map(c => c.strength)) + OR_BONUS * Math.max(0, hits - 1)),
    outcomes,
  };
}

// ── Rule Set ──

export const PERSONA_RULES: readonly PersonaRule[] = [
  {
    persona: 'high_utilization',
    description: 'Credit card debt or payment stress',
    criteria: {
      kind: 'any',
      of: [
        {
          kind: 'criterion', id: 'utilization_high', label: 'credit utilization', unit: 'percent',
          path: 'creditUtilization.maxUtilization', test: { op: 'gte', threshold: 0.5, span: 0.5 },
          read: fs => fs.creditUtilization.applicable ? fs.creditUtilization.maxUtilization : null,
        },
        {
          kind: 'criterion', id: 'interest_charged', label: 'interest charged', unit: 'usd',
          path: 'creditUtilization.interestCharged', test: { op: 'gt', threshold: 0, span: 100 },
          read: fs => fs.creditUtilization.applicable ? fs.creditUtilization.interestCharged : null,
        },
        {
          kind: 'criterion', id: 'minimum_payment_only', label: 'paying only the minimum due', unit: 'count',
          path: 'creditUtilization.minimumPaymentOnly', test: { op: 'flag' },
          read: fs => fs.creditUtilization.applicable ? fs.creditUtilization.minimumPaymentOnly : null,
        },
        {
          kind: 'criterion', id: 'overdue', label: 'credit account overdue', unit: 'count',
          path: 'creditUtilization.isOverdue', test: { op: 'flag' },
          read: fs => fs.creditUtilization.applicable ? fs.creditUtilization.isOverdue : null,
        },
      ],
    },
  },
  {
    persona: 'variable_income',
    description: 'Irregular income with a thin cash buffer',
    criteria: {
      kind: 'all',
      of: [
        {
          kind: 'any',
          of: [
            {
              kind: 'criterion', id: 'pay_gap_high', label: 'median pay gap', unit: 'days',
              path: 'incomeStability.medianPayGap', test: { op: 'gt', threshold: 45, span: 45 },
              read: fs => fs.incomeStability.applicable ? fs.incomeStability.medianPayGap : null,
            },
            {
              kind: 'criterion', id: 'irregular_frequency', label: 'irregular pay frequency', unit: 'count',
              path: 'incomeStability.irregular', test: { op: 'flag' },
              read: fs => fs.incomeStability.applicable ? fs.incomeStability.irregular : null,
            },
          ],
        },
        {
          kind: 'criterion', id: 'cash_flow_buffer_low', label: 'cash-flow buffer', unit: 'months',
          path: 'incomeStability.cashFlowBuffer', test: { op: 'lt', threshold: 1, span: 1 },
          read: fs => fs.incomeStability.applicable ? fs.incomeStability.cashFlowBuffer : null,
        },
      ],
    },
  },
  {
    persona: 'subscription_heavy',
    description: 'Many recurring subscriptions',
    criteria: {
      kind: 'all',
      of: [
        {
          kind: 'criterion', id: 'recurring_merchants', label: 'recurring merchants', unit: 'count',
          path: 'subscriptions.recurringCount', test: { op: 'gte', threshold: 3, span: 3 },
          read: fs => fs.subscriptions.applicable ? fs.subscriptions.recurringCount : null,
        },
        {
          kind: 'any',
          of: [
            {
              kind: 'criterion', id: 'monthly_recurring', label: 'monthly recurring spend', unit: 'usd',
              path: 'subscriptions.monthlyRecurringTotal', test: { op: 'gte', threshold: 50, span: 50 },
              read: fs => fs.subscriptions.applicable ? fs.subscriptions.monthlyRecurringTotal : null,
            },
            {
              kind: 'criterion', id: 'subscription_share', label: 'subscription share of spending', unit: 'percent',
              path: 'subscriptions.subscriptionShare', test: { op: 'gte', threshold: 0.1, span: 0.1 },
              read: fs => fs.subscriptions.applicable ? fs.subscriptions.subscriptionShare : null,
            },
          ],
        },
      ],
    },
  },
  {
    persona: 'savings_builder',
    description: 'Growing savings with low credit use',
    criteria: {
      kind: 'all',
      of: [
        {
          kind: 'any',
          of: [
            {
              kind: 'criterion', id: 'savings_growth', label: 'savings growth rate', unit: 'percent',
              path: 'savingsBehavior.growthRate', test: { op: 'gte', threshold: 0.02, span: 0.08 },
              read: fs => fs.savingsBehavior.applicable ? fs.savingsBehavior.growthRate : null,
            },
            {
              kind: 'criterion', id: 'monthly_net_inflow', label: 'monthly savings inflow', unit: 'usd',
              path: 'savingsBehavior.monthlyNetInflow', test: { op: 'gte', threshold: 200, span: 300 },
              read: fs => fs.savingsBehavior.applicable ? fs.savingsBehavior.monthlyNetInflow : null,
            },
          ],
        },
        {
          kind: 'criterion', id: 'utilization_low', label: 'credit utilization', unit: 'percent',
          path: 'creditUtilization.maxUtilization', test: { op: 'lt', threshold: 0.3, span: 0.3 },
          read: fs => fs.creditUtilization.applicable ? fs.creditUtilization.maxUtilization : null,
          whenAbsent: { satisfied: true, description: 'no credit card balances' },
        },
      ],
    },
  },
];
