/**
 * Tests for configuration loading.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  loadConfig,
  getDefaultConfig,
  getConfigPath,
  toMetricsOptions,
} from '../../../../src/core/config/loader.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('config loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `trajeval-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(testDir, '.trajeval'), { recursive: true });
  });

  afterEach(async () => {
    try {
      await rm(testDir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  describe('getDefaultConfig', () => {
    it('should have sensible defaults', () => {
      const config = getDefaultConfig();

      expect(config.version).toBe('1.0');
      expect(config.tasks_dir).toBe('tasks');
      expect(config.sequence).toEqual({ max_group_permutation_size: 6, max_canonical_orderings: 5040 });
      expect(config.pass_at_1.label_weights).toEqual({});
      expect(config.pass_at_1.buckets.map((band) => band.label)).toEqual(['simple', 'medium', 'complex']);
      expect(config.output.top_tci).toBe(5);
    });
  });

  describe('loadConfig', () => {
    it('should return default config when no config file exists', async () => {
      expect(await loadConfig(testDir)).toEqual(getDefaultConfig());
    });

    it('should load config from file and fill in missing sections', async () => {
      await writeFile(
        getConfigPath(testDir),
        `
tasks_dir: data/tasks
sequence:
  max_group_permutation_size: 4
pass_at_1:
  label_weights:
    easy: 1
    hard: 4
  buckets:
    - { label: short, min: 0, max: 5 }
    - { label: long, min: 5, max: 100 }
`
      );

      const config = await loadConfig(testDir);

      expect(config.tasks_dir).toBe('data/tasks');
      expect(config.sequence).toEqual({ max_group_permutation_size: 4, max_canonical_orderings: 5040 });
      expect(config.pass_at_1.label_weights).toEqual({ easy: 1, hard: 4 });
      expect(config.pass_at_1.buckets).toEqual([
        { label: 'short', min: 0, max: 5 },
        { label: 'long', min: 5, max: 100 },
      ]);
      expect(config.output.top_tci).toBe(5);
    });

    it('should treat null sections as missing', async () => {
      await writeFile(getConfigPath(testDir), 'sequence:\noutput:\n');

      const config = await loadConfig(testDir);

      expect(config.sequence.max_canonical_orderings).toBe(5040);
      expect(config.output.top_tci).toBe(5);
    });

    it('should load an explicit config path', async () => {
      const customPath = join(testDir, 'custom.yaml');
      await writeFile(customPath, 'output:\n  top_tci: 3\n');

      const config = await loadConfig(testDir, 'custom.yaml');

      expect(config.output.top_tci).toBe(3);
    });

    it('should fail when an explicit config path is missing', async () => {
      await expect(loadConfig(testDir, 'nope.yaml')).rejects.toMatchObject({
        name: 'ConfigError',
        code: ErrorCodes.CONFIG_LOAD_ERROR,
      });
    });

    it('should reject overlapping buckets', async () => {
      await writeFile(
        getConfigPath(testDir),
        `
pass_at_1:
  buckets:
    - { label: a, min: 0, max: 5 }
    - { label: b, min: 4, max: 9 }
`
      );

      const error = await loadConfig(testDir).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof Error ? error.message : '').toContain('overlaps or precedes');
    });

    it('should reject invalid values', async () => {
      await writeFile(getConfigPath(testDir), 'output:\n  top_tci: 0\n');

      await expect(loadConfig(testDir)).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe('toMetricsOptions', () => {
    it('should map config sections onto engine options', () => {
      const config = getDefaultConfig();

      expect(toMetricsOptions(config)).toEqual({
        maxGroupPermutationSize: 6,
        maxCanonicalOrderings: 5040,
        labelWeights: {},
        buckets: [
          { label: 'simple', min: 0, max: 3 },
          { label: 'medium', min: 3, max: 6 },
          { label: 'complex', min: 6, max: 1e9 },
        ],
      });
    });
  });
});
