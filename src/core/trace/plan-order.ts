/**
 * Partial-order view of an expected plan.
 *
 * A plan is a list of segments: an ungrouped step is a single-step segment,
 * and all steps sharing a group form one unordered segment placed where the
 * group's first step appears. Canonical orderings are the linear sequences
 * the partial order allows.
 */
import type { ExpectedStep } from './types.js';

export type PlanSegment =
  | { readonly kind: 'step'; readonly toolName: string }
  | { readonly kind: 'group'; readonly group: number; readonly toolNames: readonly string[] };

export interface OrderingLimits {
  /** Groups larger than this are never permuted */
  maxGroupPermutationSize: number;
  /** Upper bound on the number of candidate orderings */
  maxCanonicalOrderings: number;
}

export const DEFAULT_ORDERING_LIMITS: OrderingLimits = {
  maxGroupPermutationSize: 6,
  maxCanonicalOrderings: 5040,
};

export interface CanonicalOrderings {
  /** Candidate orderings, the plan's own order first */
  orderings: string[][];
  /** Groups scored by set containment instead of permutation */
  mergedGroups: number[];
}

export function segmentPlan(steps: readonly ExpectedStep[]): PlanSegment[] {
  const segments: PlanSegment[] = [];
  const groupSlots = new Map<number, string[]>();

  for (const step of steps) {
    if (step.group === undefined) {
      segments.push({ kind: 'step', toolName: step.toolName });
      continue;
    }
    const members = groupSlots.get(step.group);
    if (members) {
      members.push(step.toolName);
    } else {
      const created = [step.toolName];
      groupSlots.set(step.group, created);
      segments.push({ kind: 'group', group: step.group, toolNames: created });
    }
  }

  return segments;
}

function factorial(n: number): number {
  let result = 1;
  for (let i = 2; i <= n; i++) result *= i;
  return result;
}

/**
 * Number of distinct orderings of a multiset of names.
 */
export function countDistinctPermutations(names: readonly string[]): number {
  const counts = new Map<string, number>();
  for (const name of names) counts.set(name, (counts.get(name) ?? 0) + 1);
  let result = factorial(names.length);
  for (const count of counts.values()) result /= factorial(count);
  return result;
}

/**
 * Distinct permutations of a multiset. Names are tried in order of first
 * appearance, so the input order itself comes out first.
 */
export function distinctPermutations(names: readonly string[]): string[][] {
  const distinct: string[] = [];
  const remaining = new Map<string, number>();
  for (const name of names) {
    if (!remaining.has(name)) distinct.push(name);
    remaining.set(name, (remaining.get(name) ?? 0) + 1);
  }

  const results: string[][] = [];
  const current: string[] = [];
  const visit = (): void => {
    if (current.length === names.length) {
      results.push([...current]);
      return;
    }
    for (const name of distinct) {
      const left = remaining.get(name) ?? 0;
      if (left === 0) continue;
      remaining.set(name, left - 1);
      current.push(name);
      visit();
      current.pop();
      remaining.set(name, left);
    }
  };
  visit();

  return results;
}

/**
 * Lay out a merged group so that it never costs ordering penalties: members
 * are emitted in the order the observed sequence uses them, and members the
 * observed sequence never reaches follow in plan order.
 */
export function arrangeByObservation(
  members: readonly string[],
  observed: readonly string[]
): string[] {
  const remaining = new Map<string, number>();
  for (const name of members) remaining.set(name, (remaining.get(name) ?? 0) + 1);

  const arranged: string[] = [];
  for (const name of observed) {
    const left = remaining.get(name) ?? 0;
    if (left === 0) continue;
    arranged.push(name);
    remaining.set(name, left - 1);
  }

  for (const name of members) {
    const left = remaining.get(name) ?? 0;
    if (left === 0) continue;
    arranged.push(name);
    remaining.set(name, left - 1);
  }

  return arranged;
}

/**
 * Expand a segmented plan into candidate linear orderings.
 * `observed` is only consulted to lay out merged groups.
 */
export function canonicalOrderings(
  segments: readonly PlanSegment[],
  observed: readonly string[],
  limits: OrderingLimits = DEFAULT_ORDERING_LIMITS
): CanonicalOrderings {
  let orderings: string[][] = [[]];
  const mergedGroups: number[] = [];

  for (const segment of segments) {
    if (segment.kind === 'step') {
      orderings = orderings.map((ordering) => [...ordering, segment.toolName]);
      continue;
    }

    const permutationCount = countDistinctPermutations(segment.toolNames);
    const expandable =
      segment.toolNames.length <= limits.maxGroupPermutationSize &&
      orderings.length * permutationCount <= limits.maxCanonicalOrderings;

    if (!expandable) {
      mergedGroups.push(segment.group);
      const block = arrangeByObservation(segment.toolNames, observed);
      orderings = orderings.map((ordering) => [...ordering, ...block]);
      continue;
    }

    const permutations = distinctPermutations(segment.toolNames);
    orderings = orderings.flatMap((ordering) =>
      permutations.map((permutation) => [...ordering, ...permutation])
    );
  }

  return { orderings, mergedGroups };
}
