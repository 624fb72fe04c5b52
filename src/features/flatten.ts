// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Flattened Feature View
// Dot-path → scalar lookup shared by rationales and offer rules
// ═══════════════════════════════════════════════════════════════

import type { FeatureSet } from '../core/types.js';
import { DataIncompleteError } from '../core/errors.js';

export type Scalar = number | string | boolean;
export type FlatFeatures = ReadonlyMap<string, Scalar | null>;

const SIGNAL_KEYS = ['subscriptions', 'creditUtilization', 'savingsBehavior', 'incomeStability'] as const;

function walk(prefix: string, value: unknown, out: Map<string, Scalar | null>): void {
  if (value === null || value === undefined) {
    out.set(prefix, null);
  } else if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    out.set(prefix, value);
  } else if (Array.isArray(value)) {
    out.set(`${prefix}.length`, value.length);
    value.forEach((item, i) => walk(`${prefix}.${i}`, item, out));
  } else if (typeof value === 'object') {
    for (const [key, child] of Object.entries(value)) {
      walk(`${prefix}.${key}`, child, out);
    }
  }
}

/** Non-applicable signals contribute only `<signal>.applicable`. */
export function flattenFeatures(features: FeatureSet): FlatFeatures {
  const out = new Map<string, Scalar | null>();
  for (const key of SIGNAL_KEYS) {
    const payload = features[key];
    if (!payload.applicable) {
      out.set(`${key}.applicable`, false);
      continue;
    }
    walk(key, payload, out);
  }
  return out;
}

/** Throws DataIncompleteError when the path is absent or null. */
export function resolvePath(flat: FlatFeatures, path: string): Scalar {
  const value = flat.get(path);
  if (value === undefined || value === null) {
    throw new DataIncompleteError(path);
  }
  return value;
}
