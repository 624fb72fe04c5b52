// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Core Type Definitions
// Records, signals, personas and recommendations
// ═══════════════════════════════════════════════════════════════

import { z } from 'zod';

// ── Time Windows ────────────────────────────────────────────

export const TimeWindowSchema = z.enum(['30d', '180d']);
export type TimeWindow = z.infer<typeof TimeWindowSchema>;

export const WINDOW_DAYS: Record<TimeWindow, number> = {
  '30d': 30,
  '180d': 180,
};

// ── Raw Records (read-only to the core) ─────────────────────

export const TransactionSchema = z.object({
  id: z.string().min(1),
  accountId: z.string().min(1),
  userId: z.string().min(1),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  amount: z.number().finite(),
  merchantName: z.string().nullable(),
  category: z.array(z.string()),
  paymentChannel: z.string().default('other'),
  pending: z.boolean().default(false),
});

export type Transaction = z.infer<typeof TransactionSchema>;

export const AccountTypeSchema = z.enum(['depository', 'credit', 'loan']);
export type AccountType = z.infer<typeof AccountTypeSchema>;

export const AccountSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  type: AccountTypeSchema,
  subtype: z.string(),
  balance: z.number().finite(),
  creditLimit: z.number().finite().nullable(),
  mask: z.string().nullable(),
  // Liability fields, present only where the institution reports them
  minimumPayment: z.number().finite().nullable().default(null),
  isOverdue: z.boolean().default(false),
});

export type Account = z.infer<typeof AccountSchema>;

// ── Signals ─────────────────────────────────────────────────

export type SignalType = 'subscriptions' | 'credit_utilization' | 'savings_behavior' | 'income_stability';

export const SIGNAL_TYPES: readonly SignalType[] = [
  'subscriptions',
  'credit_utilization',
  'savings_behavior',
  'income_stability',
];

export const RecurringMerchantSchema = z.object({
  merchant: z.string(),
  frequency: z.enum(['weekly', 'monthly']),
  amount: z.number(),
  monthlyEquivalent: z.number(),
  occurrences: z.number().int(),
});

export type RecurringMerchant = z.infer<typeof RecurringMerchantSchema>;
export type RecurringFrequency = RecurringMerchant['frequency'];

export const SubscriptionPayloadSchema = z.object({
  applicable: z.boolean(),
  recurringMerchants: z.array(RecurringMerchantSchema),
  recurringCount: z.number().int(),
  monthlyRecurringTotal: z.number(),
  totalOutflow: z.number(),
  avgMonthlyOutflow: z.number(),
  subscriptionShare: z.number(),
});

export type SubscriptionPayload = z.infer<typeof SubscriptionPayloadSchema>;

const UtilizationLevelSchema = z.enum(['high', 'medium', 'low']);
export type UtilizationLevel = z.infer<typeof UtilizationLevelSchema>;

export const CreditAccountSignalSchema = z.object({
  accountId: z.string(),
  cardName: z.string(),
  mask: z.string().nullable(),
  balance: z.number(),
  limit: z.number(),
  utilization: z.number(),
  level: UtilizationLevelSchema,
  interestCharged: z.number(),
  lastPayment: z.number().nullable(),
  minimumDue: z.number(),
  minimumPaymentOnly: z.boolean(),
  isOverdue: z.boolean(),
});

export type CreditAccountSignal = z.infer<typeof CreditAccountSignalSchema>;

export const CreditPayloadSchema = z.object({
  applicable: z.boolean(),
  accounts: z.array(CreditAccountSignalSchema),
  primaryAccount: CreditAccountSignalSchema.nullable(),
  totalBalance: z.number(),
  totalLimit: z.number(),
  totalUtilization: z.number(),
  maxUtilization: z.number(),
  level: UtilizationLevelSchema,
  anyHigh: z.boolean(),
  allBelow30: z.boolean(),
  interestCharged: z.number(),
  minimumPaymentOnly: z.boolean(),
  isOverdue: z.boolean(),
});

export type CreditPayload = z.infer<typeof CreditPayloadSchema>;

const CoverageLevelSchema = z.enum(['excellent', 'good', 'building', 'low']);
export type CoverageLevel = z.infer<typeof CoverageLevelSchema>;

export const SavingsPayloadSchema = z.object({
  applicable: z.boolean(),
  accounts: z.array(z.object({
    accountId: z.string(),
    subtype: z.string(),
    balance: z.number(),
    netInflow: z.number(),
  })),
  totalSavings: z.number(),
  netInflow: z.number(),
  monthlyNetInflow: z.number(),
  startBalance: z.number(),
  growthRate: z.number(),
  avgMonthlyOutflow: z.number(),
  emergencyFundCoverage: z.number().nullable(),
  coverageLevel: CoverageLevelSchema,
});

export type SavingsPayload = z.infer<typeof SavingsPayloadSchema>;

const PayFrequencySchema = z.enum(['weekly', 'biweekly', 'semimonthly', 'monthly', 'irregular']);
export type PayFrequency = z.infer<typeof PayFrequencySchema>;

export const IncomePayloadSchema = z.object({
  applicable: z.boolean(),
  payrollDeposits: z.number().int(),
  frequency: PayFrequencySchema,
  irregular: z.boolean(),
  medianPayGap: z.number(),
  amountCv: z.number(),
  avgMonthlyIncome: z.number(),
  checkingBalance: z.number(),
  avgMonthlyOutflow: z.number(),
  cashFlowBuffer: z.number().nullable(),
});

export type IncomePayload = z.infer<typeof IncomePayloadSchema>;

export const SIGNAL_PAYLOAD_SCHEMAS = {
  subscriptions: SubscriptionPayloadSchema,
  credit_utilization: CreditPayloadSchema,
  savings_behavior: SavingsPayloadSchema,
  income_stability: IncomePayloadSchema,
};

export type SignalPayloads = { [K in SignalType]: z.infer<(typeof SIGNAL_PAYLOAD_SCHEMAS)[K]> };

export type Signal = {
  [K in SignalType]: {
    signalType: K;
    timeWindow: TimeWindow;
    payload: SignalPayloads[K];
    computedAt: string;
  };
}[SignalType];

export interface FeatureSet {
  userId: string;
  timeWindow: TimeWindow;
  computedAt: string;
  subscriptions: SubscriptionPayload;
  creditUtilization: CreditPayload;
  savingsBehavior: SavingsPayload;
  incomeStability: IncomePayload;
}

// ── Personas ────────────────────────────────────────────────

export const PERSONAS = [
  'high_utilization',
  'variable_income',
  'subscription_heavy',
  'savings_builder',
  'general_wellness',
] as const;

export type Persona = (typeof PERSONAS)[number];

export const PersonaSchema = z.enum(PERSONAS);

export const MatchScoresSchema = z.object({
  high_utilization: z.number(),
  variable_income: z.number(),
  subscription_heavy: z.number(),
  savings_builder: z.number(),
  general_wellness: z.number(),
});

export type MatchScores = z.infer<typeof MatchScoresSchema>;

export const CriterionOutcomeSchema = z.object({
  id: z.string(),
  description: z.string(),
  satisfied: z.boolean(),
  path: z.string(),
  value: z.union([z.number(), z.boolean()]).nullable(),
});

export type CriterionOutcome = z.infer<typeof CriterionOutcomeSchema>;

export const PersonaAssignmentSchema = z.object({
  userId: z.string(),
  timeWindow: TimeWindowSchema,
  primaryPersona: PersonaSchema,
  matchScores: MatchScoresSchema,
  criteriaMet: z.array(z.string()),
  evidence: z.array(CriterionOutcomeSchema),
  assignedAt: z.string(),
});

export type PersonaAssignment = z.infer<typeof PersonaAssignmentSchema>;

// ── Content Catalog ─────────────────────────────────────────

export type ConditionOp = 'gte' | 'gt' | 'lte' | 'lt' | 'eq';

export interface EligibilityCondition {
  metric: string;
  op: ConditionOp;
  value: number | boolean;
}

export type EligibilityPredicate = (features: FeatureSet) => boolean;

export interface ContentItem {
  id: string;
  type: ContentType;
  title: string;
  summary: string;
  priority: number;
  applicablePersonas: ReadonlySet<Persona>;
  triggerSignals: ReadonlySet<string>;
  rationaleTemplate: string;
  eligibility: readonly EligibilityCondition[];
  isEligible: EligibilityPredicate | null;
}

export interface Catalog {
  version: string;
  education: readonly ContentItem[];
  offers: readonly ContentItem[];
}

// ── Recommendations ─────────────────────────────────────────

export const GuardrailResultSchema = z.object({
  passed: z.boolean(),
  violations: z.array(z.string()),
});

export type GuardrailResult = z.infer<typeof GuardrailResultSchema>;

const ScalarSchema = z.union([z.number(), z.string(), z.boolean()]);

export const SignalValueSchema = z.object({
  path: z.string(),
  value: ScalarSchema.nullable(),
});

export type SignalValue = z.infer<typeof SignalValueSchema>;

export const RationaleValueSchema = z.object({
  path: z.string(),
  raw: ScalarSchema,
  formatted: z.string(),
});

export type RationaleValue = z.infer<typeof RationaleValueSchema>;

export const ContentTypeSchema = z.enum(['education', 'offer']);
export type ContentType = z.infer<typeof ContentTypeSchema>;

export const DecisionTraceSchema = z.object({
  traceId: z.string(),
  userId: z.string(),
  timeWindow: TimeWindowSchema,
  persona: z.object({
    primary: PersonaSchema,
    criteriaMet: z.array(z.string()),
    matchScores: MatchScoresSchema,
  }),
  signalsUsed: z.array(SignalValueSchema),
  contentId: z.string(),
  contentType: ContentTypeSchema,
  catalogVersion: z.string(),
  triggersMatched: z.array(z.string()),
  rationale: z.object({
    template: z.string(),
    values: z.record(RationaleValueSchema),
  }),
  guardrail: GuardrailResultSchema,
  createdAt: z.string(),
});

export type DecisionTrace = z.infer<typeof DecisionTraceSchema>;

export interface Recommendation {
  id: string;
  userId: string;
  timeWindow: TimeWindow;
  batchId: string;
  type: ContentType;
  contentId: string;
  title: string;
  rationale: string;
  decisionTrace: DecisionTrace;
  shownAt: string;
}

// ── Logging ─────────────────────────────────────────────────

export interface LoggerHandle {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

// ── API Surface ─────────────────────────────────────────────

export type ErrorCode =
  | 'DATA_INCOMPLETE'
  | 'GUARDRAIL_VIOLATION'
  | 'STORAGE_FAILURE'
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'INTERNAL';

export type ApiResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: { code: ErrorCode; message: string } };

export const ApiRequestSchema = z.object({
  userId: z.string().trim().min(1),
  window: TimeWindowSchema.default('30d'),
});
