/**
 * Reads simulation result files into Trace records.
 *
 * File layout: `{ simulations: [{ id?, task_id, reward_info?, termination_reason?,
 * reward?, messages: [{ role, tool_calls? }] }] }`. The domain comes from the
 * caller or from the file name (`<timestamp>_<domain>_...json`). Runs without
 * an id are named `<relative file path>#<index>`.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { InputMismatchError, ErrorCodes } from '../../utils/errors.js';
import { globFiles, isDirectory, readJsonFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { formatZodError } from '../../utils/yaml.js';
import { validateTrace } from '../trace/schema.js';
import type { Outcome, ToolInvocation, Trace } from '../trace/types.js';

const log = logger.child('ingest');

const ToolCallSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).nullish(),
});

const MessageSchema = z.object({
  role: z.string(),
  tool_calls: z.array(ToolCallSchema).nullish(),
});

const SimulationSchema = z.object({
  id: z.string().nullish(),
  task_id: z.union([z.string(), z.number()]).transform(String),
  trial: z.number().nullish(),
  reward_info: z.object({ reward: z.number().nullish() }).loose().nullish(),
  termination_reason: z.string().nullish(),
  reward: z.number().nullish(),
  messages: z.array(MessageSchema).default([]),
});

export const SimulationFileSchema = z.object({
  simulations: z.array(SimulationSchema),
});

export type SimulationRecord = z.infer<typeof SimulationSchema>;

export interface SimulationLoadOptions {
  /** Overrides the domain inferred from the file name */
  domain?: string;
  /** Unnamed runs are named after the file path relative to this directory (default: the file's own directory) */
  root?: string;
}

/**
 * Domain token of `<timestamp>_<domain>_...json`.
 */
export function domainFromFileName(filePath: string): string | undefined {
  const parts = path.basename(filePath).split('_');
  return parts.length >= 2 && parts[1] ? parts[1] : undefined;
}

/**
 * Reward info wins; then a termination reason mentioning success; then the
 * top-level reward.
 */
export function simulationOutcome(simulation: SimulationRecord): Outcome {
  const rewardInfo = simulation.reward_info?.reward;
  if (typeof rewardInfo === 'number') {
    return rewardInfo > 0 ? 'SUCCESS' : 'FAILURE';
  }
  if (simulation.termination_reason) {
    return simulation.termination_reason.toLowerCase().includes('success') ? 'SUCCESS' : 'FAILURE';
  }
  return (simulation.reward ?? 0) > 0 ? 'SUCCESS' : 'FAILURE';
}

/**
 * Tool calls made by the assistant, in conversation order.
 */
export function extractInvocations(simulation: SimulationRecord): ToolInvocation[] {
  const invocations: ToolInvocation[] = [];
  for (const message of simulation.messages) {
    if (message.role !== 'assistant') continue;
    for (const call of message.tool_calls ?? []) {
      invocations.push({ name: call.name, arguments: call.arguments ?? {}, position: invocations.length });
    }
  }
  return invocations;
}

/**
 * Convert parsed simulation file content into traces.
 */
export function parseSimulations(
  content: unknown,
  source: string,
  options: SimulationLoadOptions = {}
): Trace[] {
  const parsed = SimulationFileSchema.safeParse(content);
  if (!parsed.success) {
    throw new InputMismatchError(
      ErrorCodes.MALFORMED_TRACE,
      `Malformed simulation file ${source}: ${formatZodError(parsed.error)}`,
      { source }
    );
  }

  const domain = options.domain ?? domainFromFileName(source);
  if (!domain) {
    throw new InputMismatchError(
      ErrorCodes.MALFORMED_TRACE,
      `Cannot determine the domain of ${source}; pass it explicitly`,
      { source }
    );
  }

  const relativePath = path
    .relative(options.root ?? path.dirname(source), source)
    .split(path.sep)
    .join('/');
  return parsed.data.simulations.map((simulation, index) =>
    validateTrace({
      runId: simulation.id ?? `${relativePath}#${index}`,
      domain,
      taskId: simulation.task_id,
      invocations: extractInvocations(simulation),
      outcome: simulationOutcome(simulation),
    })
  );
}

export async function loadSimulationFile(
  filePath: string,
  options: SimulationLoadOptions = {}
): Promise<Trace[]> {
  const traces = parseSimulations(await readJsonFile(filePath), filePath, options);
  log.debug(`Loaded ${traces.length} runs from ${path.basename(filePath)}`);
  return traces;
}

/**
 * Expand files and directories (to their `*.json` files) in a stable order.
 */
export async function resolveSimulationFiles(inputs: readonly string[], cwd: string = process.cwd()): Promise<string[]> {
  const files: string[] = [];
  for (const input of inputs) {
    const fullPath = path.resolve(cwd, input);
    if (await isDirectory(fullPath)) {
      files.push(...(await globFiles('*.json', { cwd: fullPath })));
    } else {
      files.push(fullPath);
    }
  }
  return [...new Set(files)];
}

export async function loadSimulationFiles(
  filePaths: readonly string[],
  options: SimulationLoadOptions = {}
): Promise<Trace[]> {
  const traces: Trace[] = [];
  for (const filePath of filePaths) {
    traces.push(...(await loadSimulationFile(filePath, options)));
  }
  return traces;
}
