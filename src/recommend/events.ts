// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Pipeline Event Bus
// ═══════════════════════════════════════════════════════════════

import type { ContentType, MatchScores, Persona, SignalType, TimeWindow } from '../core/types.js';

export interface FeaturesComputedEvent {
  userId: string;
  window: TimeWindow;
  applicable: SignalType[];
  computedAt: string;
}

export interface PersonaAssignedEvent {
  userId: string;
  window: TimeWindow;
  persona: Persona;
  matchScores: MatchScores;
  criteriaMet: string[];
}

export interface RecommendationCreatedEvent {
  userId: string;
  window: TimeWindow;
  batchId: string;
  recommendationId: string;
  contentId: string;
  contentType: ContentType;
  traceId: string;
}

export type SkipReason = 'DATA_INCOMPLETE' | 'GUARDRAIL_VIOLATION';

export interface RecommendationSkippedEvent {
  userId: string;
  window: TimeWindow;
  batchId: string;
  contentId: string;
  reason: SkipReason;
  detail: string;
  violations: string[];
}

export type PipelineEvents = {
  'features:computed': (event: FeaturesComputedEvent) => void;
  'persona:assigned': (event: PersonaAssignedEvent) => void;
  'recommendation:created': (event: RecommendationCreatedEvent) => void;
  'recommendation:skipped': (event: RecommendationSkippedEvent) => void;
};

export type PipelineEventName = keyof PipelineEvents;
