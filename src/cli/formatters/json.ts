/**
 * JSON output for machine consumption. Field names are snake_case; undefined
 * metrics become `null` or the "no data" marker, never 0.
 */
import type { DomainMetrics, MetricsReport } from '../../core/metrics/calculator.js';
import { NO_DATA, toNullable, type Measured } from '../../core/metrics/measured.js';
import type { Pass1Report } from '../../core/metrics/pass-at-1.js';
import type { IReportFormatter } from './types.js';

function valueOrNoData(metric: Measured<number>): number | typeof NO_DATA {
  return metric.defined ? metric.value : NO_DATA;
}

function transformPass1(pass1: Pass1Report): Record<string, unknown> {
  const byBucket: Record<string, number | typeof NO_DATA> = {};
  for (const bucket of pass1.byBucket) {
    byBucket[bucket.label] = valueOrNoData(bucket.pass1);
  }

  return {
    runs: pass1.runs,
    successes: pass1.successes,
    raw: valueOrNoData(pass1.raw),
    raw_interval: pass1.rawInterval.defined
      ? { lower: pass1.rawInterval.value.lower, upper: pass1.rawInterval.value.upper }
      : null,
    complexity_weighted: valueOrNoData(pass1.complexityWeighted),
    by_bucket: byBucket,
    bucket_runs: Object.fromEntries(pass1.byBucket.map((bucket) => [bucket.label, bucket.runs])),
    unbucketed: pass1.unbucketed,
  };
}

function transformDomain(domain: DomainMetrics): Record<string, unknown> {
  return {
    domain: domain.domain,
    run_count: domain.runCount,
    per_tool_prf: domain.perToolPrf.map((row) => ({
      domain: row.domain,
      tool: row.tool,
      precision: row.precision,
      recall: row.recall,
      f1: row.f1,
      omission_rate: row.omissionRate,
      tp: row.tp,
      fp: row.fp,
      fn: row.fn,
    })),
    tool_criticality: domain.toolCriticality.map((row) => ({
      domain: row.domain,
      tool: row.tool,
      tci: toNullable(row.tci),
      defined: row.tci.defined,
      n_correct: row.nCorrect,
      n_mishandled: row.nMishandled,
      p_correct: toNullable(row.pCorrect),
      p_mishandled: toNullable(row.pMishandled),
    })),
    sequence: {
      mean_nped: toNullable(domain.sequence.meanNped),
      runs: domain.sequence.runs.map((run) => ({
        run_id: run.runId,
        task_id: run.taskId,
        domain: run.domain,
        nped: run.nped,
      })),
      position_deviation: domain.sequence.positionDeviation.map((entry) => ({
        tool: entry.tool,
        mean_position_deviation: toNullable(entry.meanPositionDeviation),
        runs: entry.runs,
      })),
    },
    pass_at_1: transformPass1(domain.pass1),
  };
}

/**
 * Plain-object form of a report, ready for `JSON.stringify`.
 */
export function toReportJson(report: MetricsReport): Record<string, unknown> {
  return {
    run_count: report.runCount,
    domains: report.domains.map(transformDomain),
    overall: { pass_at_1: transformPass1(report.overall) },
  };
}

export class JsonFormatter implements IReportFormatter {
  formatReport(report: MetricsReport): string {
    return JSON.stringify(toReportJson(report), null, 2);
  }
}
