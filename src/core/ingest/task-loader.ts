/**
 * Loads domain task definitions (`<tasksRoot>/<domain>/tasks.json`) into
 * expected plans.
 */
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { fileExists, readJsonFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { compareStrings } from '../../utils/string.js';
import { formatZodError } from '../../utils/yaml.js';
import { PlanIndex } from '../trace/plan-index.js';
import type { ExpectedPlan } from '../trace/types.js';

const log = logger.child('tasks');

const TaskActionSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).nullish(),
  required: z.boolean().default(true),
  group: z.number().int().nullish(),
});

const TaskSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  complexity: z.union([z.number().min(0), z.string().min(1)]).nullish(),
  evaluation_criteria: z
    .object({
      actions: z.array(TaskActionSchema).nullish(),
    })
    .nullish(),
});

export const TasksFileSchema = z.array(TaskSchema);

export type TaskDefinition = z.infer<typeof TaskSchema>;

export interface DomainTasks {
  plans: ExpectedPlan[];
  /** Tasks that exist but list no expected actions */
  emptyTaskIds: string[];
}

/**
 * Plan for one task definition, or undefined when the task lists no actions.
 * Complexity defaults to the number of expected actions.
 */
export function taskToPlan(task: TaskDefinition, domain: string): ExpectedPlan | undefined {
  const actions = task.evaluation_criteria?.actions ?? [];
  if (actions.length === 0) return undefined;

  return {
    taskId: task.id,
    domain,
    complexity: task.complexity ?? actions.length,
    steps: actions.map((action) => ({
      toolName: action.name,
      required: action.required,
      ...(action.group === null || action.group === undefined ? {} : { group: action.group }),
    })),
  };
}

export function parseDomainTasks(content: unknown, domain: string, source: string): DomainTasks {
  const parsed = TasksFileSchema.safeParse(content);
  if (!parsed.success) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Invalid tasks file ${source}: ${formatZodError(parsed.error)}`,
      { source, domain }
    );
  }

  const result: DomainTasks = { plans: [], emptyTaskIds: [] };
  for (const task of parsed.data) {
    const plan = taskToPlan(task, domain);
    if (plan) {
      result.plans.push(plan);
    } else {
      log.warn(`Task ${task.id} in domain ${domain} lists no expected actions; skipped`);
      result.emptyTaskIds.push(task.id);
    }
  }
  return result;
}

export async function loadDomainTasks(tasksRoot: string, domain: string): Promise<DomainTasks> {
  const tasksFile = path.join(tasksRoot, domain, 'tasks.json');
  if (!(await fileExists(tasksFile))) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `No tasks.json found for domain ${domain}`, {
      filePath: tasksFile,
      domain,
    });
  }
  const tasks = parseDomainTasks(await readJsonFile(tasksFile), domain, tasksFile);
  log.debug(`Loaded ${tasks.plans.length} tasks for domain ${domain}`);
  return tasks;
}

/**
 * Load every `<domain>/tasks.json` under `tasksRoot`, or only the listed
 * domains when `domains` is given.
 */
export async function loadTaskDirectory(tasksRoot: string, domains?: readonly string[]): Promise<PlanIndex> {
  let selected: string[];
  if (domains) {
    selected = [...domains];
  } else {
    const entries = await fs.readdir(tasksRoot, { withFileTypes: true }).catch((error: unknown) => {
      throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `Cannot read tasks directory ${tasksRoot}`, {
        tasksRoot,
        error: error instanceof Error ? error.message : String(error),
      });
    });
    const candidates = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    selected = [];
    for (const name of candidates) {
      if (await fileExists(path.join(tasksRoot, name, 'tasks.json'))) selected.push(name);
    }
  }

  const index = new PlanIndex();
  for (const domain of [...new Set(selected)].sort(compareStrings)) {
    const { plans, emptyTaskIds } = await loadDomainTasks(tasksRoot, domain);
    for (const plan of plans) {
      index.add(plan);
    }
    for (const taskId of emptyTaskIds) {
      index.addEmptyTask(domain, taskId);
    }
  }
  log.debug(`Loaded ${index.size} plans across ${index.domains().length} domain(s)`);
  return index;
}
