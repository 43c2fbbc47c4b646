/**
 * Sequence compliance: normalized Position Edit Distance (nPED) and per-tool
 * Position Deviation between the observed call order and the plan's
 * partial order.
 *
 * Both sequences are restricted to tool names present in both, so missing or
 * unexpected tools are left to omission and precision accounting.
 */
import { compareStrings } from '../../utils/string.js';
import {
  canonicalOrderings,
  DEFAULT_ORDERING_LIMITS,
  segmentPlan,
  type OrderingLimits,
} from '../trace/plan-order.js';
import type { ExpectedPlan, Outcome, Trace } from '../trace/types.js';
import { levenshtein } from './edit-distance.js';
import { measured, undefinedMetric, type Measured } from './measured.js';

export type SequenceOptions = OrderingLimits;

export interface SequenceScore {
  runId: string;
  nped: number;
  minEditDistance: number;
  /** Observed tool names restricted to the plan's names */
  observed: string[];
  /** Best-aligned canonical ordering, restricted to the observed names */
  expected: string[];
  /** Number of canonical orderings compared */
  candidates: number;
  /** Groups that were too large to permute */
  mergedGroups: number[];
  positionDeviation: ReadonlyMap<string, Measured<number>>;
}

export interface SequenceEntry {
  readonly runId: string;
  readonly taskId: string;
  readonly domain: string;
  readonly outcome: Outcome;
  readonly planLength: number;
  readonly score: SequenceScore;
}

export interface SequenceRunRow {
  runId: string;
  taskId: string;
  domain: string;
  outcome: Outcome;
  planLength: number;
  nped: number;
}

export interface PositionDeviationSummary {
  tool: string;
  meanPositionDeviation: Measured<number>;
  /** Runs in which the deviation was defined */
  runs: number;
}

export interface SequenceDomainSummary {
  domain: string;
  runs: SequenceRunRow[];
  meanNped: Measured<number>;
  positionDeviation: PositionDeviationSummary[];
}

function normalizedPosition(index: number, length: number): number {
  return length <= 1 ? 0 : index / (length - 1);
}

/**
 * |first observed position − first expected position|, each scaled to [0, 1]
 * by its sequence length. Undefined for a tool missing from either side.
 */
export function positionDeviation(
  tool: string,
  observed: readonly string[],
  expected: readonly string[]
): Measured<number> {
  const observedIndex = observed.indexOf(tool);
  const expectedIndex = expected.indexOf(tool);
  if (observedIndex < 0 && expectedIndex < 0) return undefinedMetric('absent from both sequences');
  if (observedIndex < 0) return undefinedMetric('absent from observed sequence');
  if (expectedIndex < 0) return undefinedMetric('absent from expected sequence');
  return measured(
    Math.abs(
      normalizedPosition(observedIndex, observed.length) -
        normalizedPosition(expectedIndex, expected.length)
    )
  );
}

export function scoreSequence(
  trace: Trace,
  plan: ExpectedPlan,
  options: Partial<SequenceOptions> = {}
): SequenceScore {
  const limits: OrderingLimits = {
    maxGroupPermutationSize: options.maxGroupPermutationSize ?? DEFAULT_ORDERING_LIMITS.maxGroupPermutationSize,
    maxCanonicalOrderings: options.maxCanonicalOrderings ?? DEFAULT_ORDERING_LIMITS.maxCanonicalOrderings,
  };
  const observedNames = trace.invocations.map((invocation) => invocation.name);
  const planNames = new Set(plan.steps.map((step) => step.toolName));
  const observedNameSet = new Set(observedNames);

  const observed = observedNames.filter((name) => planNames.has(name));
  const relevantSteps = plan.steps.filter((step) => observedNameSet.has(step.toolName));
  const { orderings, mergedGroups } = canonicalOrderings(segmentPlan(relevantSteps), observed, limits);

  let best = orderings[0] ?? [];
  let minEditDistance = levenshtein(observed, best);
  for (const candidate of orderings.slice(1)) {
    if (minEditDistance === 0) break;
    const distance = levenshtein(observed, candidate);
    if (distance < minEditDistance) {
      minEditDistance = distance;
      best = candidate;
    }
  }

  const longest = Math.max(observed.length, best.length);
  const nped = longest === 0 ? 0 : minEditDistance / longest;

  const tools = [...new Set([...planNames, ...observedNames])].sort(compareStrings);
  const deviations = new Map<string, Measured<number>>();
  for (const tool of tools) {
    deviations.set(tool, positionDeviation(tool, observed, best));
  }

  return {
    runId: trace.runId,
    nped,
    minEditDistance,
    observed,
    expected: best,
    candidates: orderings.length,
    mergedGroups,
    positionDeviation: deviations,
  };
}

/**
 * Per-domain sequence summary: per-run nPED rows (by run id), the mean nPED,
 * and per-tool mean Position Deviation over runs where it is defined.
 */
export function summarizeSequences(entries: Iterable<SequenceEntry>): SequenceDomainSummary[] {
  const byDomain = new Map<string, SequenceEntry[]>();
  for (const entry of entries) {
    const list = byDomain.get(entry.domain) ?? [];
    list.push(entry);
    byDomain.set(entry.domain, list);
  }

  const summaries: SequenceDomainSummary[] = [];
  for (const domain of [...byDomain.keys()].sort(compareStrings)) {
    const domainEntries = (byDomain.get(domain) ?? []).sort((a, b) => compareStrings(a.runId, b.runId));

    const deviations = new Map<string, { sum: number; runs: number }>();
    let npedSum = 0;
    for (const { score } of domainEntries) {
      npedSum += score.nped;
      for (const [tool, deviation] of score.positionDeviation) {
        const total = deviations.get(tool) ?? { sum: 0, runs: 0 };
        if (deviation.defined) {
          total.sum += deviation.value;
          total.runs += 1;
        }
        deviations.set(tool, total);
      }
    }

    summaries.push({
      domain,
      runs: domainEntries.map((entry) => ({
        runId: entry.runId,
        taskId: entry.taskId,
        domain: entry.domain,
        outcome: entry.outcome,
        planLength: entry.planLength,
        nped: entry.score.nped,
      })),
      meanNped: domainEntries.length === 0 ? undefinedMetric('no runs') : measured(npedSum / domainEntries.length),
      positionDeviation: [...deviations.entries()]
        .sort(([a], [b]) => compareStrings(a, b))
        .map(([tool, total]) => ({
          tool,
          meanPositionDeviation:
            total.runs === 0
              ? undefinedMetric('tool never present in both sequences')
              : measured(total.sum / total.runs),
          runs: total.runs,
        })),
    });
  }

  return summaries;
}
