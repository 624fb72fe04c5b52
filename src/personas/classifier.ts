// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Persona Classifier
// Primary persona by priority; match scores are informational
// ═══════════════════════════════════════════════════════════════

import type { FeatureSet, MatchScores, PersonaAssignment, TimeWindow } from '../core/types.js';
import { PERSONA_RULES, evaluateNode, type PersonaRule } from './rules.js';

export const INSUFFICIENT_DATA = 'insufficient data';

function hasAnyApplicableSignal(fs: FeatureSet): boolean {
  return fs.subscriptions.applicable
    || fs.creditUtilization.applicable
    || fs.savingsBehavior.applicable
    || fs.incomeStability.applicable;
}

function toPercent(strength: number): number {
  return Math.round(Math.max(0, Math.min(1, strength)) * 100);
}

export function scoreAll(fs: FeatureSet, rules: readonly PersonaRule[] = PERSONA_RULES): MatchScores {
  const scores: MatchScores = {
    high_utilization: 0,
    variable_income: 0,
    subscription_heavy: 0,
    savings_builder: 0,
    general_wellness: 0,
  };

  for (const rule of rules) {
    scores[rule.persona] = toPercent(evaluateNode(rule.criteria, fs).strength);
  }
  scores.general_wellness = 100 - Math.max(
    scores.high_utilization, scores.variable_income, scores.subscription_heavy, scores.savings_builder,
  );
  return scores;
}

export function classifyPersona(
  userId: string,
  window: TimeWindow,
  features: FeatureSet | null,
  assignedAt: string,
  rules: readonly PersonaRule[] = PERSONA_RULES,
): PersonaAssignment {
  if (!features || !hasAnyApplicableSignal(features)) {
    const reason = features ? 'no applicable signals' : `no feature set for ${window}`;
    return {
      userId,
      timeWindow: window,
      primaryPersona: 'general_wellness',
      matchScores: {
        high_utilization: 0,
        variable_income: 0,
        subscription_heavy: 0,
        savings_builder: 0,
        general_wellness: 100,
      },
      criteriaMet: [`${INSUFFICIENT_DATA}: ${reason}`],
      evidence: [],
      assignedAt,
    };
  }

  const matchScores = scoreAll(features, rules);

  for (const rule of rules) {
    const result = evaluateNode(rule.criteria, features);
    if (!result.satisfied) continue;
    return {
      userId,
      timeWindow: window,
      primaryPersona: rule.persona,
      matchScores,
      criteriaMet: result.outcomes.filter(o => o.satisfied).map(o => o.description),
      evidence: result.outcomes,
      assignedAt,
    };
  }

  return {
    userId,
    timeWindow: window,
    primaryPersona: 'general_wellness',
    matchScores,
    criteriaMet: ['no higher-priority persona criteria met'],
    evidence: [],
    assignedAt,
  };
}
