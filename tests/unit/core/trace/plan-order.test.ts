/**
 * Tests for partial-order segmentation and canonical ordering expansion.
 */
import { describe, it, expect } from 'vitest';
import {
  arrangeByObservation,
  canonicalOrderings,
  countDistinctPermutations,
  distinctPermutations,
  segmentPlan,
} from '../../../../src/core/trace/plan-order.js';
import { step } from '../../../helpers/trajectories.js';

describe('segmentPlan', () => {
  it('should place a group where its first member appears', () => {
    const segments = segmentPlan([step('a'), step('b', { group: 1 }), step('c'), step('d', { group: 1 })]);

    expect(segments).toEqual([
      { kind: 'step', toolName: 'a' },
      { kind: 'group', group: 1, toolNames: ['b', 'd'] },
      { kind: 'step', toolName: 'c' },
    ]);
  });

  it('should keep a totally ordered plan as single steps', () => {
    expect(segmentPlan([step('a'), step('b')])).toEqual([
      { kind: 'step', toolName: 'a' },
      { kind: 'step', toolName: 'b' },
    ]);
  });
});

describe('countDistinctPermutations', () => {
  it('should divide out repeated names', () => {
    expect(countDistinctPermutations(['a', 'b', 'c'])).toBe(6);
    expect(countDistinctPermutations(['a', 'a', 'b'])).toBe(3);
    expect(countDistinctPermutations([])).toBe(1);
  });
});

describe('distinctPermutations', () => {
  it('should emit the input order first', () => {
    const permutations = distinctPermutations(['c', 'a', 'b']);

    expect(permutations).toHaveLength(6);
    expect(permutations[0]).toEqual(['c', 'a', 'b']);
  });

  it('should not repeat permutations of duplicate names', () => {
    expect(distinctPermutations(['a', 'a', 'b'])).toEqual([
      ['a', 'a', 'b'],
      ['a', 'b', 'a'],
      ['b', 'a', 'a'],
    ]);
  });
});

describe('arrangeByObservation', () => {
  it('should follow observed order, then plan order for unobserved members', () => {
    expect(arrangeByObservation(['a', 'b', 'c'], ['c', 'x', 'a'])).toEqual(['c', 'a', 'b']);
  });

  it('should consume repeated members once per occurrence', () => {
    expect(arrangeByObservation(['a', 'b'], ['b', 'b', 'a', 'a'])).toEqual(['b', 'a']);
  });
});

describe('canonicalOrderings', () => {
  const plan = segmentPlan([step('a'), step('b', { group: 1 }), step('c', { group: 1 }), step('d')]);

  it('should expand an unordered group into every ordering', () => {
    expect(canonicalOrderings(plan, [])).toEqual({
      orderings: [
        ['a', 'b', 'c', 'd'],
        ['a', 'c', 'b', 'd'],
      ],
      mergedGroups: [],
    });
  });

  it('should merge groups larger than the permutation bound', () => {
    const segments = segmentPlan([step('x', { group: 4 }), step('y', { group: 4 }), step('z', { group: 4 })]);

    const result = canonicalOrderings(segments, ['z', 'x'], {
      maxGroupPermutationSize: 2,
      maxCanonicalOrderings: 100,
    });

    expect(result).toEqual({ orderings: [['z', 'x', 'y']], mergedGroups: [4] });
  });

  it('should merge the group that would exceed the ordering cap', () => {
    const segments = segmentPlan([
      step('a', { group: 1 }),
      step('b', { group: 1 }),
      step('c', { group: 1 }),
      step('d', { group: 2 }),
      step('e', { group: 2 }),
      step('f', { group: 2 }),
    ]);

    const result = canonicalOrderings(segments, [], { maxGroupPermutationSize: 6, maxCanonicalOrderings: 10 });

    expect(result.mergedGroups).toEqual([2]);
    expect(result.orderings).toHaveLength(6);
    expect(result.orderings[0]).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
  });
});
