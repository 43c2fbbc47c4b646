/**
 * Tests for the tagged optional used by undefined metrics.
 */
import { describe, it, expect } from 'vitest';
import { measured, NO_DATA, ratio, toNullable, undefinedMetric } from '../../../../src/core/metrics/measured.js';

describe('ratio', () => {
  it('should divide when the total is nonzero', () => {
    expect(ratio(1, 4)).toEqual({ defined: true, value: 0.25 });
  });

  it('should be undefined for a zero total, not zero', () => {
    expect(ratio(0, 0)).toEqual({ defined: false, reason: NO_DATA });
    expect(ratio(0, 0, 'no runs')).toEqual({ defined: false, reason: 'no runs' });
  });
});

describe('toNullable', () => {
  it('should keep a computed zero distinct from undefined', () => {
    expect(toNullable(measured(0))).toBe(0);
    expect(toNullable(undefinedMetric('no data'))).toBeNull();
  });
});
