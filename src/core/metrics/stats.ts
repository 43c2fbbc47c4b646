/**
 * Binomial confidence intervals.
 */
import { measured, undefinedMetric, type Measured } from './measured.js';

export interface ConfidenceInterval {
  lower: number;
  upper: number;
}

/**
 * Wilson score interval for `successes` out of `trials` (z = 1.96 gives 95%).
 */
export function wilsonInterval(
  successes: number,
  trials: number,
  z: number = 1.96
): Measured<ConfidenceInterval> {
  if (trials === 0) return undefinedMetric('no trials');

  const p = successes / trials;
  const z2 = z * z;
  const denominator = 1 + z2 / trials;
  const centre = (p + z2 / (2 * trials)) / denominator;
  const margin = (z * Math.sqrt((p * (1 - p) + z2 / (4 * trials)) / trials)) / denominator;

  return measured({
    lower: Math.max(0, centre - margin),
    upper: Math.min(1, centre + margin),
  });
}
