/**
 * pass@1: raw, complexity-weighted and complexity-bucketed success rates.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { Complexity, Outcome } from '../trace/types.js';
import { measured, NO_DATA, ratio, undefinedMetric, type Measured } from './measured.js';
import { wilsonInterval, type ConfidenceInterval } from './stats.js';

export interface Pass1Sample {
  readonly outcome: Outcome;
  readonly complexity: Complexity;
}

/**
 * Complexity band: `[min, max)`, except the last configured band which is
 * closed at `max`.
 */
export interface ComplexityBand {
  label: string;
  min: number;
  max: number;
}

export type ComplexityWeight = (complexity: Complexity) => number;

export interface Pass1Options {
  /** Non-decreasing weight of a complexity value */
  weight?: ComplexityWeight;
  /** Weights of ordinal complexity labels, used by the default weight */
  labelWeights?: Readonly<Record<string, number>>;
  buckets?: readonly ComplexityBand[];
}

export interface BucketPass1 {
  label: string;
  min: number;
  max: number;
  runs: number;
  successes: number;
  pass1: Measured<number>;
}

export interface Pass1Report {
  runs: number;
  successes: number;
  raw: Measured<number>;
  rawInterval: Measured<ConfidenceInterval>;
  complexityWeighted: Measured<number>;
  byBucket: BucketPass1[];
  /** Runs no band accepted */
  unbucketed: number;
}

export const DEFAULT_COMPLEXITY_BANDS: readonly ComplexityBand[] = [
  { label: 'simple', min: 0, max: 3 },
  { label: 'medium', min: 3, max: 6 },
  { label: 'complex', min: 6, max: 1e9 },
];

/**
 * Numeric complexity weighs itself; an ordinal label weighs its configured
 * value, or 1.
 */
export function defaultComplexityWeight(labelWeights: Readonly<Record<string, number>> = {}): ComplexityWeight {
  return (complexity) => {
    if (typeof complexity === 'number') return complexity;
    return Object.hasOwn(labelWeights, complexity) ? labelWeights[complexity] : 1;
  };
}

/**
 * Bands must be non-empty intervals in ascending, non-overlapping order
 * with distinct labels.
 */
export function validateBands(bands: readonly ComplexityBand[]): void {
  const labels = new Set<string>();
  bands.forEach((band, index) => {
    if (!(band.min < band.max)) {
      throw new ConfigError(
        ErrorCodes.INVALID_BUCKETS,
        `Complexity band "${band.label}" must have min < max (got ${band.min}..${band.max})`,
        { band }
      );
    }
    if (labels.has(band.label)) {
      throw new ConfigError(ErrorCodes.INVALID_BUCKETS, `Duplicate complexity band label "${band.label}"`, { band });
    }
    labels.add(band.label);
    const previous = index > 0 ? bands[index - 1] : undefined;
    if (previous && band.min < previous.max) {
      throw new ConfigError(
        ErrorCodes.INVALID_BUCKETS,
        `Complexity band "${band.label}" overlaps or precedes "${previous.label}"`,
        { band, previous }
      );
    }
  });
}

/**
 * Band for a complexity value. Ordinal labels select the band with the
 * same label.
 */
export function assignBucket(
  complexity: Complexity,
  bands: readonly ComplexityBand[]
): ComplexityBand | undefined {
  if (typeof complexity === 'string') {
    return bands.find((band) => band.label === complexity);
  }
  return bands.find((band, index) => {
    const isLast = index === bands.length - 1;
    return complexity >= band.min && (isLast ? complexity <= band.max : complexity < band.max);
  });
}

function weightOf(weight: ComplexityWeight, complexity: Complexity): number {
  const value = weight(complexity);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(
      ErrorCodes.INVALID_WEIGHT,
      `Complexity weight must be a finite non-negative number (got ${value} for ${String(complexity)})`,
      { complexity, weight: value }
    );
  }
  return value;
}

export function computePass1(samples: Iterable<Pass1Sample>, options: Pass1Options = {}): Pass1Report {
  const bands = options.buckets ?? DEFAULT_COMPLEXITY_BANDS;
  validateBands(bands);
  const weight = options.weight ?? defaultComplexityWeight(options.labelWeights);

  const tallies = new Map<string, { runs: number; successes: number }>(
    bands.map((band) => [band.label, { runs: 0, successes: 0 }])
  );
  let runs = 0;
  let successes = 0;
  let weightedSuccess = 0;
  let totalWeight = 0;
  let unbucketed = 0;

  for (const sample of samples) {
    const success = sample.outcome === 'SUCCESS' ? 1 : 0;
    const w = weightOf(weight, sample.complexity);
    runs += 1;
    successes += success;
    weightedSuccess += w * success;
    totalWeight += w;

    const band = assignBucket(sample.complexity, bands);
    const tally = band ? tallies.get(band.label) : undefined;
    if (tally) {
      tally.runs += 1;
      tally.successes += success;
    } else {
      unbucketed += 1;
    }
  }

  return {
    runs,
    successes,
    raw: ratio(successes, runs),
    rawInterval: wilsonInterval(successes, runs),
    complexityWeighted: totalWeight === 0 ? undefinedMetric(NO_DATA) : measured(weightedSuccess / totalWeight),
    byBucket: bands.map((band) => {
      const tally = tallies.get(band.label) ?? { runs: 0, successes: 0 };
      return {
        label: band.label,
        min: band.min,
        max: band.max,
        runs: tally.runs,
        successes: tally.successes,
        pass1: ratio(tally.successes, tally.runs),
      };
    }),
    unbucketed,
  };
}
