/**
 * Tests for number formatting helpers.
 */
import { describe, it, expect } from 'vitest';
import { formatFixed, formatMaybe, formatPercent } from '../../../src/utils/format.js';

describe('formatPercent', () => {
  it('should format a rate with one decimal by default', () => {
    expect(formatPercent(2 / 3)).toBe('66.7%');
    expect(formatPercent(1)).toBe('100.0%');
  });

  it('should honour the digits argument', () => {
    expect(formatPercent(0.5, 0)).toBe('50%');
  });
});

describe('formatFixed', () => {
  it('should use three decimals by default', () => {
    expect(formatFixed(0.5)).toBe('0.500');
    expect(formatFixed(-0.25, 2)).toBe('-0.25');
  });
});

describe('formatMaybe', () => {
  it('should format defined values', () => {
    expect(formatMaybe({ defined: true, value: 0.25 })).toBe('0.250');
    expect(formatMaybe({ defined: true, value: 0.25 }, formatPercent)).toBe('25.0%');
  });

  it('should use the placeholder for undefined values', () => {
    expect(formatMaybe({ defined: false, reason: 'no data' })).toBe('n/a');
    expect(formatMaybe({ defined: false, reason: 'no data' }, formatFixed, 'no data')).toBe('no data');
  });
});
