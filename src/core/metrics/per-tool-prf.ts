/**
 * Per-tool precision / recall / F1 / omission, aggregated per domain.
 */
import { compareStrings } from '../../utils/string.js';
import type { MatchResult } from './tool-match.js';

export interface PrfEntry {
  readonly domain: string;
  readonly match: MatchResult;
}

export interface PrfScores {
  precision: number;
  recall: number;
  f1: number;
  omissionRate: number;
}

export interface PerToolPrfRow extends PrfScores {
  domain: string;
  tool: string;
  tp: number;
  fp: number;
  fn: number;
}

/**
 * Scores from summed counts. With nothing predicted precision is 1, with
 * nothing expected recall is 1; so a tool with all-zero counts scores
 * P = R = F1 = 1 and omission 0.
 */
export function computePrf(tp: number, fp: number, fn: number): PrfScores {
  const precision = tp + fp === 0 ? 1 : tp / (tp + fp);
  const recall = tp + fn === 0 ? 1 : tp / (tp + fn);
  const f1 = precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);
  const omissionRate = tp + fn === 0 ? 0 : fn / (tp + fn);
  return { precision, recall, f1, omissionRate };
}

/**
 * Fold per-run matches into one row per (domain, tool), sorted by domain
 * then tool. Counts are integer sums, so entry order does not matter.
 */
export function aggregatePerToolPrf(entries: Iterable<PrfEntry>): PerToolPrfRow[] {
  const totals = new Map<string, Map<string, { tp: number; fp: number; fn: number }>>();

  for (const { domain, match } of entries) {
    let byTool = totals.get(domain);
    if (!byTool) {
      byTool = new Map();
      totals.set(domain, byTool);
    }
    for (const [tool, counts] of match.counts) {
      const total = byTool.get(tool) ?? { tp: 0, fp: 0, fn: 0 };
      total.tp += counts.tp;
      total.fp += counts.fp;
      total.fn += counts.fn;
      byTool.set(tool, total);
    }
  }

  const byName = <T>([a]: [string, T], [b]: [string, T]): number => compareStrings(a, b);
  const rows: PerToolPrfRow[] = [];
  for (const [domain, byTool] of [...totals.entries()].sort(byName)) {
    for (const [tool, { tp, fp, fn }] of [...byTool.entries()].sort(byName)) {
      rows.push({ domain, tool, tp, fp, fn, ...computePrf(tp, fp, fn) });
    }
  }

  return rows;
}
