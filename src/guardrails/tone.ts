// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Tone Guardrail
// Rejects judgmental or shaming language in generated text
// ═══════════════════════════════════════════════════════════════

import type { GuardrailResult, LoggerHandle } from '../core/types.js';
import { CONFIG } from '../core/config.js';

export interface ToneGuardrailOptions {
  phrases: string[];
  patterns: RegExp[];
}

export const DEFAULT_PATTERNS: RegExp[] = [
  /\byou (?:always|never) (?:waste|blow|overspend)\b/i,
  /\bshould(?:n't| not) have (?:bought|spent)\b/i,
  /\b(?:lazy|foolish|stupid) (?:spending|choices?|decisions?)\b/i,
];

export class ToneGuardrail {
  private phrases: string[];
  private patterns: RegExp[];
  private logger: LoggerHandle;

  constructor(logger: LoggerHandle, options: Partial<ToneGuardrailOptions> = {}) {
    this.logger = logger;
    this.phrases = (options.phrases ?? CONFIG.guardrails.prohibitedPhrases)
      .map(p => p.trim().toLowerCase())
      .filter(p => p.length > 0);
    // Global flag would make test() stateful across calls
    this.patterns = (options.patterns ?? DEFAULT_PATTERNS)
      .map(p => new RegExp(p.source, p.flags.replace('g', '')));
  }

  /** Violations list matched phrases first, then pattern sources, each once. */
  validate(text: string): GuardrailResult {
    const lower = text.toLowerCase();
    const violations: string[] = [];

    for (const phrase of this.phrases) {
      if (lower.includes(phrase) && !violations.includes(phrase)) violations.push(phrase);
    }
    for (const pattern of this.patterns) {
      if (pattern.test(text)) violations.push(pattern.source);
    }

    if (violations.length > 0) {
      this.logger.warn('[Guardrail] Prohibited language detected', { violations, excerpt: text.slice(0, 120) });
    }

    return { passed: violations.length === 0, violations };
  }
}
