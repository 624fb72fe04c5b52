import { describe, it, expect } from 'vitest';
import { formatValue, generateRationale } from './rationale.js';
import { DataIncompleteError } from '../core/errors.js';
import { detectCreditUtilization } from '../signals/credit.js';
import { emptyFeatureSet, makeAccount } from '../test-utils/fixtures.js';

const features = emptyFeatureSet({
  creditUtilization: detectCreditUtilization([], [
    makeAccount({ id: 'acc-visa', type: 'credit', subtype: 'credit card', balance: 3400, creditLimit: 5000, mask: '4523' }),
  ], 30),
});

describe('formatValue', () => {
  it('formats each kind', () => {
    expect(formatValue(-1234.56, 'currency')).toBe('-$1,234.56');
    expect(formatValue(0.1167, 'percent')).toBe('12%');
    expect(formatValue(5.17, 'number')).toBe('5.2');
    expect(formatValue(2, 'number')).toBe('2.0');
    expect(formatValue(35.5, 'integer')).toBe('36');
    expect(formatValue('Visa', 'text')).toBe('Visa');
    expect(formatValue(true, 'currency')).toBe('true');
  });

  it('honours the configured currency', () => {
    expect(formatValue(10, 'currency', 'EUR')).toBe('€10.00');
  });
});

describe('generateRationale', () => {
  it('substitutes placeholders with formatted values', () => {
    const result = generateRationale(
      'Your {card_name} is at {utilization} utilization ({balance} of {limit} limit).',
      features,
    );

    expect(result.text).toBe('Your Credit Card ending in 4523 is at 68% utilization ($3,400.00 of $5,000.00 limit).');
    expect(result.values.utilization).toEqual({
      path: 'creditUtilization.primaryAccount.utilization',
      raw: 0.68,
      formatted: '68%',
    });
    expect(Object.keys(result.values)).toEqual(['card_name', 'utilization', 'balance', 'limit']);
  });

  it('resolves a repeated placeholder once', () => {
    const result = generateRationale('{total_balance} now, {total_balance} later', features);

    expect(result.text).toBe('$3,400.00 now, $3,400.00 later');
    expect(Object.keys(result.values)).toEqual(['total_balance']);
  });

  it('passes through templates without placeholders', () => {
    expect(generateRationale('  Check in on your budget monthly.  ', features)).toEqual({
      text: 'Check in on your budget monthly.',
      values: {},
    });
  });

  it('refuses to render a placeholder whose signal does not apply', () => {
    expect(() => generateRationale('Buffer: {cash_flow_buffer} months', features)).toThrow(DataIncompleteError);
  });

  it('refuses unknown placeholders, including object prototype keys', () => {
    expect(() => generateRationale('Hi {nickname}', features)).toThrow('Unknown rationale placeholder {nickname}');
    expect(() => generateRationale('{constructor}', features)).toThrow(DataIncompleteError);
  });

  it('treats any brace token as a placeholder', () => {
    expect(() => generateRationale('Your {cardName} is at {utilization2} utilization.', features))
      .toThrow('Unknown rationale placeholder {cardName}');
    expect(() => generateRationale('At {utilization2}', features)).toThrow('Unknown rationale placeholder {utilization2}');
    expect(() => generateRationale('Spaced { card_name }', features)).toThrow(DataIncompleteError);
  });

  it('refuses an empty result', () => {
    expect(() => generateRationale('   ', features)).toThrow(DataIncompleteError);
  });
});
