/**
 * Tests for task definition ingestion.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { dirname, join, resolve } from 'path';
import { tmpdir } from 'os';
import { mkdir, rm, writeFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import {
  loadDomainTasks,
  loadTaskDirectory,
  parseDomainTasks,
  taskToPlan,
} from '../../../../src/core/ingest/task-loader.js';
import { SystemError, ErrorCodes } from '../../../../src/utils/errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const TASKS = resolve(__dirname, '../../../fixtures/trajectories/tasks');

describe('taskToPlan', () => {
  it('should default complexity to the number of actions', () => {
    const plan = taskToPlan(
      { id: '1', evaluation_criteria: { actions: [{ name: 'a', required: true }, { name: 'b', required: false, group: 2 }] } },
      'retail'
    );

    expect(plan).toEqual({
      taskId: '1',
      domain: 'retail',
      complexity: 2,
      steps: [
        { toolName: 'a', required: true },
        { toolName: 'b', required: false, group: 2 },
      ],
    });
  });

  it('should return undefined for a task without actions', () => {
    expect(taskToPlan({ id: '1', evaluation_criteria: null }, 'retail')).toBeUndefined();
    expect(taskToPlan({ id: '1' }, 'retail')).toBeUndefined();
  });
});

describe('parseDomainTasks', () => {
  const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

  beforeEach(() => {
    warn.mockClear();
  });

  it('should skip tasks without actions and warn', () => {
    const tasks = parseDomainTasks(
      [
        { id: 1, complexity: 'easy', evaluation_criteria: { actions: [{ name: 'a' }] } },
        { id: 2, evaluation_criteria: { actions: [] } },
      ],
      'retail',
      'tasks.json'
    );

    expect(tasks).toEqual({
      plans: [{ taskId: '1', domain: 'retail', complexity: 'easy', steps: [{ toolName: 'a', required: true }] }],
      emptyTaskIds: ['2'],
    });
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('Task 2 in domain retail lists no expected actions'));
  });

  it('should raise PARSE_ERROR for an invalid file', () => {
    try {
      parseDomainTasks({ tasks: [] }, 'retail', 'tasks.json');
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      expect(error).toMatchObject({ code: ErrorCodes.PARSE_ERROR, details: { source: 'tasks.json', domain: 'retail' } });
    }
  });
});

describe('loadDomainTasks', () => {
  it('should load the retail fixture', async () => {
    const { plans, emptyTaskIds } = await loadDomainTasks(TASKS, 'retail');

    expect(emptyTaskIds).toEqual(['3']);
    expect(plans.map((plan) => [plan.taskId, plan.complexity, plan.steps.length])).toEqual([
      ['1', 3, 3],
      ['2', 5, 5],
    ]);
    expect(plans[1].steps[1]).toEqual({ toolName: 'get_order', required: true, group: 1 });
  });

  it('should raise FILE_NOT_FOUND for an unknown domain', async () => {
    await expect(loadDomainTasks(TASKS, 'telecom')).rejects.toMatchObject({
      code: ErrorCodes.FILE_NOT_FOUND,
      details: { domain: 'telecom' },
    });
  });
});

describe('loadTaskDirectory', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `trajeval-tasks-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should index every domain directory with a tasks file', async () => {
    const index = await loadTaskDirectory(TASKS);

    expect(index.domains()).toEqual(['airline', 'retail']);
    expect(index.size).toBe(3);
    expect(index.get('airline', '10')?.complexity).toBe('hard');
    expect(index.isEmptyTask('retail', '3')).toBe(true);
  });

  it('should restrict loading to the listed domains', async () => {
    const index = await loadTaskDirectory(TASKS, ['retail']);

    expect(index.domains()).toEqual(['retail']);
  });

  it('should skip directories without a tasks file', async () => {
    await mkdir(join(testDir, 'empty'), { recursive: true });
    await mkdir(join(testDir, 'telecom'), { recursive: true });
    await writeFile(
      join(testDir, 'telecom', 'tasks.json'),
      JSON.stringify([{ id: 'x', evaluation_criteria: { actions: [{ name: 'reset' }] } }])
    );

    const index = await loadTaskDirectory(testDir);

    expect(index.domains()).toEqual(['telecom']);
  });

  it('should fail for a missing root', async () => {
    await expect(loadTaskDirectory(join(testDir, 'missing'))).rejects.toBeInstanceOf(SystemError);
  });
});
