/**
 * Zod schemas for traces and plans, plus validators that turn schema
 * failures into InputMismatchError.
 */
import { z } from 'zod';
import { InputMismatchError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import type { ExpectedPlan, Trace } from './types.js';

export const OutcomeSchema = z.enum(['SUCCESS', 'FAILURE']);

export const ToolInvocationSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).default({}),
  position: z.number().int().min(0),
});

export const TraceSchema = z.object({
  runId: z.string().min(1),
  domain: z.string().min(1),
  taskId: z.string().min(1),
  invocations: z.array(ToolInvocationSchema),
  outcome: OutcomeSchema,
});

export const ExpectedStepSchema = z.object({
  toolName: z.string().min(1),
  required: z.boolean().default(true),
  group: z.number().int().optional(),
});

export const ExpectedPlanSchema = z.object({
  taskId: z.string().min(1),
  domain: z.string().min(1),
  complexity: z.union([z.number().min(0), z.string().min(1)]),
  steps: z.array(ExpectedStepSchema).min(1, 'plan must have at least one step'),
});

function readStringField(value: unknown, field: string): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const raw: unknown = Reflect.get(value, field);
  return typeof raw === 'string' ? raw : undefined;
}

/**
 * Validate a trace record. Invocation positions must be exactly 0..n-1;
 * the returned trace lists invocations in position order.
 */
export function validateTrace(value: unknown): Trace {
  const result = TraceSchema.safeParse(value);
  if (!result.success) {
    const runId = readStringField(value, 'runId');
    throw new InputMismatchError(
      ErrorCodes.MALFORMED_TRACE,
      `Malformed trace${runId ? ` ${runId}` : ''}: ${formatZodError(result.error)}`,
      { runId, taskId: readStringField(value, 'taskId') }
    );
  }

  const trace = result.data;
  const invocations = [...trace.invocations].sort((a, b) => a.position - b.position);
  invocations.forEach((invocation, index) => {
    if (invocation.position !== index) {
      throw new InputMismatchError(
        ErrorCodes.MALFORMED_TRACE,
        `Malformed trace ${trace.runId}: invocation positions must be 0..${invocations.length - 1} without gaps or repeats`,
        { runId: trace.runId, taskId: trace.taskId, position: invocation.position }
      );
    }
  });

  return { ...trace, invocations };
}

/**
 * Validate a plan record.
 */
export function validatePlan(value: unknown): ExpectedPlan {
  const result = ExpectedPlanSchema.safeParse(value);
  if (!result.success) {
    const taskId = readStringField(value, 'taskId');
    throw new InputMismatchError(
      ErrorCodes.MALFORMED_PLAN,
      `Malformed plan${taskId ? ` for task ${taskId}` : ''}: ${formatZodError(result.error)}`,
      { taskId, domain: readStringField(value, 'domain') }
    );
  }
  return result.data;
}
