import { describe, it, expect } from 'vitest';
import {
  DataIncompleteError,
  GuardrailViolationError,
  InvalidRequestError,
  StorageFailureError,
  errorCode,
  errorMessage,
} from './errors.js';

describe('errorCode', () => {
  it('reads the code from pipeline errors', () => {
    expect(errorCode(new DataIncompleteError('incomeStability.cashFlowBuffer'))).toBe('DATA_INCOMPLETE');
    expect(errorCode(new GuardrailViolationError(['reckless']))).toBe('GUARDRAIL_VIOLATION');
    expect(errorCode(new StorageFailureError('writeSignals', new Error('disk full')))).toBe('STORAGE_FAILURE');
    expect(errorCode(new InvalidRequestError('window: Invalid enum value'))).toBe('INVALID_REQUEST');
  });

  it('treats anything else as INTERNAL', () => {
    expect(errorCode(new TypeError('boom'))).toBe('INTERNAL');
    expect(errorCode('boom')).toBe('INTERNAL');
  });
});

describe('pipeline errors', () => {
  it('carry their class name and context', () => {
    const missing = new DataIncompleteError('creditUtilization.totalBalance');
    expect(missing.name).toBe('DataIncompleteError');
    expect(missing.path).toBe('creditUtilization.totalBalance');
    expect(missing.message).toBe('No value for "creditUtilization.totalBalance" in feature set');

    const cause = new Error('disk full');
    const storage = new StorageFailureError('writeSignals', cause);
    expect(storage.message).toBe('Storage writeSignals failed: disk full');
    expect(storage.cause).toBe(cause);
  });

  it('formats unknown thrown values', () => {
    expect(errorMessage(42)).toBe('42');
  });
});
