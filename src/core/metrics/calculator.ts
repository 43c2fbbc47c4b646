/**
 * MetricsCalculator - orchestrates tool matching, sequence scoring and the
 * per-domain aggregators over a batch of runs.
 *
 * The batch is validated up front and processed in (domain, runId) order, so
 * the report does not depend on the order runs arrive in.
 */
import { InputMismatchError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { compareStrings } from '../../utils/string.js';
import { PlanIndex } from '../trace/plan-index.js';
import { validatePlan, validateTrace } from '../trace/schema.js';
import type { ExpectedPlan, PlanLookup, Trace } from '../trace/types.js';
import { aggregatePerToolPrf, type PerToolPrfRow } from './per-tool-prf.js';
import { computePass1, type Pass1Options, type Pass1Report } from './pass-at-1.js';
import {
  scoreSequence,
  summarizeSequences,
  type SequenceDomainSummary,
  type SequenceOptions,
  type SequenceScore,
} from './sequence-compliance.js';
import { computeToolCriticality, type ToolCriticalityRow } from './tool-criticality.js';
import { expectedToolNames, matchTools, type MatchResult } from './tool-match.js';

export interface MetricsOptions extends Pass1Options, Partial<SequenceOptions> {
  /**
   * Domains that must each contribute at least one run. Defaults to every
   * domain holding a plan when plans arrive as an array or a PlanIndex.
   */
  expectedDomains?: readonly string[];
}

export interface RunEvaluation {
  trace: Trace;
  plan: ExpectedPlan;
  match: MatchResult;
  sequence: SequenceScore;
}

export interface DomainMetrics {
  domain: string;
  runCount: number;
  perToolPrf: PerToolPrfRow[];
  toolCriticality: ToolCriticalityRow[];
  sequence: SequenceDomainSummary;
  pass1: Pass1Report;
}

export interface MetricsReport {
  runCount: number;
  domains: DomainMetrics[];
  /** pass@1 over every run of every domain */
  overall: Pass1Report;
}

const log = logger.child('metrics');

function isPlanLookup(plans: PlanLookup | readonly ExpectedPlan[]): plans is PlanLookup {
  return !Array.isArray(plans);
}

export class MetricsCalculator {
  private readonly options: MetricsOptions;

  constructor(options: MetricsOptions = {}) {
    this.options = options;
  }

  /**
   * Match and sequence-score a single run.
   */
  evaluateRun(trace: Trace, plan: ExpectedPlan): RunEvaluation {
    return {
      trace,
      plan,
      match: matchTools(trace, plan),
      sequence: scoreSequence(trace, plan, {
        maxGroupPermutationSize: this.options.maxGroupPermutationSize,
        maxCanonicalOrderings: this.options.maxCanonicalOrderings,
      }),
    };
  }

  /**
   * Validate the batch and compute every metric family per domain.
   * Aborts with InputMismatchError on the first run whose task has no plan.
   */
  calculate(traces: Iterable<Trace>, plans: PlanLookup | readonly ExpectedPlan[]): MetricsReport {
    const lookup = isPlanLookup(plans) ? plans : PlanIndex.from(plans);
    const batch = this.prepareBatch(traces);

    const evaluations = batch.map((trace) => {
      const plan = lookup.get(trace.domain, trace.taskId);
      if (!plan && lookup.isEmptyTask?.(trace.domain, trace.taskId)) {
        throw new InputMismatchError(
          ErrorCodes.MALFORMED_PLAN,
          `Run ${trace.runId} references task ${trace.taskId} in domain ${trace.domain}, which lists no expected actions`,
          { runId: trace.runId, taskId: trace.taskId, domain: trace.domain }
        );
      }
      if (!plan) {
        throw new InputMismatchError(
          ErrorCodes.MISSING_PLAN,
          `Run ${trace.runId} references task ${trace.taskId} with no expected plan in domain ${trace.domain}`,
          { runId: trace.runId, taskId: trace.taskId, domain: trace.domain }
        );
      }
      return this.evaluateRun(trace, validatePlan(plan));
    });

    const byDomain = new Map<string, RunEvaluation[]>();
    for (const evaluation of evaluations) {
      const list = byDomain.get(evaluation.trace.domain) ?? [];
      list.push(evaluation);
      byDomain.set(evaluation.trace.domain, list);
    }

    const expectedDomains =
      this.options.expectedDomains ?? (lookup instanceof PlanIndex ? lookup.domains() : []);
    for (const domain of expectedDomains) {
      if (!byDomain.has(domain)) {
        throw new InputMismatchError(ErrorCodes.EMPTY_DOMAIN, `Domain ${domain} has zero runs`, { domain });
      }
    }

    const domains = [...byDomain.entries()].map(([domain, runs]) => this.aggregateDomain(domain, runs));
    log.debug(`Computed metrics for ${evaluations.length} runs across ${domains.length} domain(s)`);

    return {
      runCount: evaluations.length,
      domains,
      overall: computePass1(
        evaluations.map(({ trace, plan }) => ({ outcome: trace.outcome, complexity: plan.complexity })),
        this.options
      ),
    };
  }

  private prepareBatch(traces: Iterable<Trace>): Trace[] {
    const seen = new Set<string>();
    const batch: Trace[] = [];

    for (const raw of traces) {
      const trace = validateTrace(raw);
      if (seen.has(trace.runId)) {
        throw new InputMismatchError(
          ErrorCodes.DUPLICATE_RUN,
          `Run ${trace.runId} appears more than once in the batch`,
          { runId: trace.runId, taskId: trace.taskId }
        );
      }
      seen.add(trace.runId);
      batch.push(trace);
    }

    if (batch.length === 0) {
      throw new InputMismatchError(ErrorCodes.NO_RUNS, 'No runs to evaluate');
    }

    return batch.sort(
      (a, b) => compareStrings(a.domain, b.domain) || compareStrings(a.runId, b.runId)
    );
  }

  private aggregateDomain(domain: string, runs: readonly RunEvaluation[]): DomainMetrics {
    const [sequence] = summarizeSequences(
      runs.map(({ trace, plan, sequence: score }) => ({
        runId: trace.runId,
        taskId: trace.taskId,
        domain,
        outcome: trace.outcome,
        planLength: plan.steps.length,
        score,
      }))
    );

    return {
      domain,
      runCount: runs.length,
      perToolPrf: aggregatePerToolPrf(runs.map(({ match }) => ({ domain, match }))),
      toolCriticality: computeToolCriticality(
        runs.map(({ trace, plan, match }) => ({
          domain,
          match,
          expectedTools: expectedToolNames(plan),
          outcome: trace.outcome,
        }))
      ),
      sequence,
      pass1: computePass1(
        runs.map(({ trace, plan }) => ({ outcome: trace.outcome, complexity: plan.complexity })),
        this.options
      ),
    };
  }
}

/**
 * One-shot convenience wrapper around MetricsCalculator.
 */
export function calculateMetrics(
  traces: Iterable<Trace>,
  plans: PlanLookup | readonly ExpectedPlan[],
  options: MetricsOptions = {}
): MetricsReport {
  return new MetricsCalculator(options).calculate(traces, plans);
}
