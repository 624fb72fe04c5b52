// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Decision Trace Builder
// One immutable audit record per recommendation
// ═══════════════════════════════════════════════════════════════

import { v4 as uuid } from 'uuid';
import type {
  ContentItem,
  DecisionTrace,
  GuardrailResult,
  PersonaAssignment,
  SignalValue,
} from '../core/types.js';
import type { RationaleResult } from '../recommend/rationale.js';
import { deepFreeze } from '../core/immutable.js';

export interface TraceContext {
  catalogVersion: string;
  triggersMatched: string[];
  createdAt: string;
}

/**
 * Signal values consulted for a recommendation: the persona evidence plus
 * every rationale placeholder, deduplicated by path in that order.
 */
export function collectSignalsUsed(assignment: PersonaAssignment, rationale: RationaleResult): SignalValue[] {
  const seen = new Map<string, SignalValue>();
  for (const outcome of assignment.evidence) {
    if (!seen.has(outcome.path)) seen.set(outcome.path, { path: outcome.path, value: outcome.value });
  }
  for (const value of Object.values(rationale.values)) {
    if (!seen.has(value.path)) seen.set(value.path, { path: value.path, value: value.raw });
  }
  return [...seen.values()];
}

export function buildTrace(
  assignment: PersonaAssignment,
  signalsUsed: SignalValue[],
  item: ContentItem,
  rationale: RationaleResult,
  guardrail: GuardrailResult,
  context: TraceContext,
): Readonly<DecisionTrace> {
  // structuredClone detaches the trace from caller-owned objects before freezing
  const trace: DecisionTrace = structuredClone({
    traceId: uuid(),
    userId: assignment.userId,
    timeWindow: assignment.timeWindow,
    persona: {
      primary: assignment.primaryPersona,
      criteriaMet: assignment.criteriaMet,
      matchScores: assignment.matchScores,
    },
    signalsUsed,
    contentId: item.id,
    contentType: item.type,
    catalogVersion: context.catalogVersion,
    triggersMatched: context.triggersMatched,
    rationale: {
      template: item.rationaleTemplate,
      values: rationale.values,
    },
    guardrail,
    createdAt: context.createdAt,
  });

  return deepFreeze(trace);
}
