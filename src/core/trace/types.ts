/**
 * Trace and expectation model.
 *
 * Records are produced by ingestion (or any caller) and never mutated by the
 * metrics engine.
 */

export type Outcome = 'SUCCESS' | 'FAILURE';

/**
 * One tool call made by the agent during a run.
 */
export interface ToolInvocation {
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  /** Zero-based index of the call within its run's chronological order */
  readonly position: number;
}

/**
 * One simulation run: the agent's tool calls and whether the task succeeded.
 */
export interface Trace {
  readonly runId: string;
  readonly domain: string;
  readonly taskId: string;
  readonly invocations: readonly ToolInvocation[];
  readonly outcome: Outcome;
}

/**
 * Numeric complexity (e.g. plan length) or an ordinal bucket label.
 */
export type Complexity = number | string;

export interface ExpectedStep {
  readonly toolName: string;
  /** Optional steps earn credit when present but are never counted as omitted */
  readonly required: boolean;
  /** Steps sharing a group are mutually unordered */
  readonly group?: number;
}

/**
 * Ground-truth plan for one task.
 */
export interface ExpectedPlan {
  readonly taskId: string;
  readonly domain: string;
  readonly complexity: Complexity;
  readonly steps: readonly ExpectedStep[];
}

/**
 * Resolves the plan for a (domain, task) pair.
 */
export interface PlanLookup {
  get(domain: string, taskId: string): ExpectedPlan | undefined;
  /** True for a known task that lists no expected actions */
  isEmptyTask?(domain: string, taskId: string): boolean;
}
