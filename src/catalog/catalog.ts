// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Content Catalog
// Versioned, immutable configuration loaded once per process
// ═══════════════════════════════════════════════════════════════

import fs from 'fs';
import { z } from 'zod';
import type {
  Catalog,
  ContentItem,
  EligibilityCondition,
  EligibilityPredicate,
} from '../core/types.js';
import { PersonaSchema } from '../core/types.js';
import { flattenFeatures, resolvePath } from '../features/flatten.js';
import { deepFreeze } from '../core/immutable.js';
import { PLACEHOLDERS, placeholderNames } from '../recommend/rationale.js';

// ── Schema ──

const ConditionSchema = z.object({
  metric: z.string().min(1),
  op: z.enum(['gte', 'gt', 'lte', 'lt', 'eq']),
  value: z.union([z.number(), z.boolean()]),
});

const BaseItemSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  summary: z.string().default(''),
  priority: z.number().int().default(100),
  rationaleTemplate: z.string().min(1),
});

const EducationItemSchema = BaseItemSchema.extend({
  personas: z.array(PersonaSchema).min(1),
  triggers: z.array(z.string()).default([]),
});

const OfferItemSchema = BaseItemSchema.extend({
  personas: z.array(PersonaSchema).default([]),
  eligibility: z.object({ all: z.array(ConditionSchema) }).default({ all: [] }),
});

export const CatalogSchema = z.object({
  version: z.string().min(1),
  education: z.array(EducationItemSchema),
  offers: z.array(OfferItemSchema),
}).superRefine((data, ctx) => {
  const seen = new Set<string>();
  for (const item of [...data.education, ...data.offers]) {
    if (seen.has(item.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate content id: ${item.id}` });
    }
    seen.add(item.id);

    for (const name of placeholderNames(item.rationaleTemplate)) {
      if (!Object.hasOwn(PLACEHOLDERS, name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown placeholder {${name}} in ${item.id}` });
      }
    }
  }
});

export type CatalogInput = z.input<typeof CatalogSchema>;

// ── Eligibility ──

function compare(actual: number | string | boolean, cond: EligibilityCondition): boolean {
  if (cond.op === 'eq') return actual === cond.value;
  if (typeof actual !== 'number' || typeof cond.value !== 'number') {
    throw new TypeError(`Condition ${cond.metric} ${cond.op} needs numeric operands`);
  }
  switch (cond.op) {
    case 'gte': return actual >= cond.value;
    case 'gt': return actual > cond.value;
    case 'lte': return actual <= cond.value;
    case 'lt': return actual < cond.value;
  }
}

/** Conditions are joined by AND. A missing metric throws DataIncompleteError. */
export function compileEligibility(conditions: readonly EligibilityCondition[]): EligibilityPredicate {
  return features => {
    const flat = flattenFeatures(features);
    return conditions.every(cond => compare(resolvePath(flat, cond.metric), cond));
  };
}

// ── Construction ──

export function createCatalog(input: CatalogInput): Catalog {
  const data = CatalogSchema.parse(input);

  const education: ContentItem[] = data.education.map(item => ({
    id: item.id,
    type: 'education',
    title: item.title,
    summary: item.summary,
    priority: item.priority,
    applicablePersonas: new Set(item.personas),
    triggerSignals: new Set(item.triggers),
    rationaleTemplate: item.rationaleTemplate,
    eligibility: [],
    isEligible: null,
  }));

  const offers: ContentItem[] = data.offers.map(item => ({
    id: item.id,
    type: 'offer',
    title: item.title,
    summary: item.summary,
    priority: item.priority,
    applicablePersonas: new Set(item.personas),
    triggerSignals: new Set<string>(),
    rationaleTemplate: item.rationaleTemplate,
    eligibility: item.eligibility.all,
    isEligible: compileEligibility(item.eligibility.all),
  }));

  return deepFreeze({ version: data.version, education, offers });
}

export function loadCatalog(filePath: string): Catalog {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return createCatalog(CatalogSchema.parse(raw));
}
