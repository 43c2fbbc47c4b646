/**
 * Tool match engine: per-run true/false positive and false negative
 * accounting by tool identity and call count.
 */
import { compareStrings } from '../../utils/string.js';
import type { ExpectedPlan, Trace } from '../trace/types.js';

export interface ToolCounts {
  readonly tp: number;
  readonly fp: number;
  readonly fn: number;
}

export interface MatchResult {
  readonly truePositive: ReadonlySet<string>;
  readonly falsePositive: ReadonlySet<string>;
  readonly falseNegative: ReadonlySet<string>;
  /** Per-tool counts, keyed in ascending tool name order */
  readonly counts: ReadonlyMap<string, ToolCounts>;
}

export function countNames(names: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const name of names) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return counts;
}

/**
 * Every tool name the plan mentions, required or optional.
 */
export function expectedToolNames(plan: ExpectedPlan): Set<string> {
  return new Set(plan.steps.map((step) => step.toolName));
}

/**
 * Match one run's calls against its plan.
 *
 * Optional steps count toward the expected multiset (so a matching call is a
 * true positive rather than a false positive) but never toward omissions.
 */
export function matchTools(trace: Trace, plan: ExpectedPlan): MatchResult {
  const observed = countNames(trace.invocations.map((invocation) => invocation.name));
  const expected = countNames(plan.steps.map((step) => step.toolName));
  const required = countNames(plan.steps.filter((step) => step.required).map((step) => step.toolName));

  const names = [...new Set([...observed.keys(), ...expected.keys()])].sort(compareStrings);
  const counts = new Map<string, ToolCounts>();
  const truePositive = new Set<string>();
  const falsePositive = new Set<string>();
  const falseNegative = new Set<string>();

  for (const name of names) {
    const seen = observed.get(name) ?? 0;
    const wanted = expected.get(name) ?? 0;
    const tp = Math.min(seen, wanted);
    const fp = Math.max(0, seen - wanted);
    const fn = Math.max(0, (required.get(name) ?? 0) - seen);

    counts.set(name, { tp, fp, fn });
    if (tp > 0) truePositive.add(name);
    if (fp > 0) falsePositive.add(name);
    if (fn > 0) falseNegative.add(name);
  }

  return { truePositive, falsePositive, falseNegative, counts };
}
