// ═══════════════════════════════════════════════════════════════
// Ledgerwise :: Pipeline Errors
// DataAbsent is not an error: detectors report it as applicable=false
// ═══════════════════════════════════════════════════════════════

import type { ErrorCode } from './types.js';

export abstract class PipelineError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A rationale placeholder or eligibility metric has no source value. */
export class DataIncompleteError extends PipelineError {
  readonly code = 'DATA_INCOMPLETE' as const;

  constructor(readonly path: string, detail?: string) {
    super(detail ?? `No value for "${path}" in feature set`);
  }
}

export class GuardrailViolationError extends PipelineError {
  readonly code = 'GUARDRAIL_VIOLATION' as const;

  constructor(readonly violations: string[]) {
    super(`Tone guardrail rejected text: ${violations.join(', ')}`);
  }
}

/** Storage collaborator could not read or write. Propagates per user. */
export class StorageFailureError extends PipelineError {
  readonly code = 'STORAGE_FAILURE' as const;

  constructor(operation: string, cause: unknown) {
    super(`Storage ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class InvalidRequestError extends PipelineError {
  readonly code = 'INVALID_REQUEST' as const;
}

export class NotFoundError extends PipelineError {
  readonly code = 'NOT_FOUND' as const;
}

export function errorCode(err: unknown): ErrorCode {
  return err instanceof PipelineError ? err.code : 'INTERNAL';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
