import { z } from 'zod';
import { ConfigError } from '../../utils/errors.js';
import { DEFAULT_COMPLEXITY_BANDS, validateBands } from '../metrics/pass-at-1.js';
import { DEFAULT_ORDERING_LIMITS } from '../trace/plan-order.js';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** One complexity band: [min, max), the last band closed. */
export const ComplexityBandSchema = z.object({
  label: z.string().min(1),
  min: z.number(),
  max: z.number(),
});

/** Canonical-ordering expansion limits for sequence compliance. */
export const SequenceSettingsSchema = z.object({
  max_group_permutation_size: z.number().int().min(1).default(DEFAULT_ORDERING_LIMITS.maxGroupPermutationSize),
  max_canonical_orderings: z.number().int().min(1).default(DEFAULT_ORDERING_LIMITS.maxCanonicalOrderings),
});

/** pass@1 weighting and bucketing. */
export const Pass1SettingsSchema = z.object({
  /** Weight per ordinal complexity label (numeric complexity weighs itself) */
  label_weights: z.record(z.string(), z.number().min(0)).default({}),
  buckets: z
    .array(ComplexityBandSchema)
    .min(1)
    .default(() => DEFAULT_COMPLEXITY_BANDS.map((band) => ({ ...band })))
    .superRefine((bands, ctx) => {
      try {
        validateBands(bands);
      } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        ctx.addIssue({ code: 'custom', message: error.message });
      }
    }),
});

/** Terminal summary settings. */
export const OutputSettingsSchema = z.object({
  /** Number of TCI rows shown per domain */
  top_tci: z.number().int().min(1).default(5),
});

/** Complete config.yaml schema. */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  /** Root of <domain>/tasks.json, relative to the project root */
  tasks_dir: z.string().default('tasks'),
  sequence: withDefaults(SequenceSettingsSchema),
  pass_at_1: withDefaults(Pass1SettingsSchema),
  output: withDefaults(OutputSettingsSchema),
});

export type ComplexityBandConfig = z.infer<typeof ComplexityBandSchema>;
export type SequenceSettings = z.infer<typeof SequenceSettingsSchema>;
export type Pass1Settings = z.infer<typeof Pass1SettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
