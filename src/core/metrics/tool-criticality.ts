/**
 * Tool Criticality Index (TCI).
 *
 * For each expected tool, the success rate of runs that handled it correctly
 * minus the success rate of runs that mishandled it. A tool whose mishandling
 * goes together with failed tasks scores close to 1.
 */
import { compareStrings } from '../../utils/string.js';
import type { Outcome } from '../trace/types.js';
import { measured, ratio, type Measured } from './measured.js';
import type { MatchResult, ToolCounts } from './tool-match.js';

export interface CriticalityEntry {
  readonly domain: string;
  readonly match: MatchResult;
  /** Tool names the run's plan mentions */
  readonly expectedTools: ReadonlySet<string>;
  readonly outcome: Outcome;
}

export type ToolHandling = 'correct' | 'mishandled' | 'unobserved';

export interface ToolCriticalityRow {
  domain: string;
  tool: string;
  tci: Measured<number>;
  nCorrect: number;
  nMishandled: number;
  pCorrect: Measured<number>;
  pMishandled: Measured<number>;
}

/**
 * Classify how a run handled one expected tool. An optional tool that was
 * never called is `unobserved` and belongs to neither group.
 */
export function classifyHandling(counts: ToolCounts | undefined): ToolHandling {
  if (!counts) return 'unobserved';
  if (counts.fp > 0 || counts.fn > 0) return 'mishandled';
  return counts.tp > 0 ? 'correct' : 'unobserved';
}

interface GroupTally {
  nCorrect: number;
  successCorrect: number;
  nMishandled: number;
  successMishandled: number;
}

function criticalityRow(domain: string, tool: string, tally: GroupTally): ToolCriticalityRow {
  const pCorrect = ratio(tally.successCorrect, tally.nCorrect, 'no correctly handled runs');
  const pMishandled = ratio(tally.successMishandled, tally.nMishandled, 'no mishandled runs');

  let tci: Measured<number>;
  if (!pCorrect.defined) {
    tci = pCorrect;
  } else if (!pMishandled.defined) {
    tci = pMishandled;
  } else {
    tci = measured(Math.max(-1, Math.min(1, pCorrect.value - pMishandled.value)));
  }

  return {
    domain,
    tool,
    tci,
    nCorrect: tally.nCorrect,
    nMishandled: tally.nMishandled,
    pCorrect,
    pMishandled,
  };
}

/**
 * Order rows within each domain: defined TCI descending, then undefined;
 * ties by ascending tool name.
 */
export function rankByCriticality(rows: readonly ToolCriticalityRow[]): ToolCriticalityRow[] {
  return [...rows].sort((a, b) => {
    const byDomain = compareStrings(a.domain, b.domain);
    if (byDomain !== 0) return byDomain;
    if (a.tci.defined && b.tci.defined) {
      if (a.tci.value !== b.tci.value) return b.tci.value - a.tci.value;
    } else if (a.tci.defined !== b.tci.defined) {
      return a.tci.defined ? -1 : 1;
    }
    return compareStrings(a.tool, b.tool);
  });
}

export function computeToolCriticality(entries: Iterable<CriticalityEntry>): ToolCriticalityRow[] {
  const tallies = new Map<string, Map<string, GroupTally>>();

  for (const entry of entries) {
    let byTool = tallies.get(entry.domain);
    if (!byTool) {
      byTool = new Map();
      tallies.set(entry.domain, byTool);
    }
    const success = entry.outcome === 'SUCCESS' ? 1 : 0;

    for (const tool of entry.expectedTools) {
      const tally = byTool.get(tool) ?? { nCorrect: 0, successCorrect: 0, nMishandled: 0, successMishandled: 0 };
      const handling = classifyHandling(entry.match.counts.get(tool));
      if (handling === 'correct') {
        tally.nCorrect += 1;
        tally.successCorrect += success;
      } else if (handling === 'mishandled') {
        tally.nMishandled += 1;
        tally.successMishandled += success;
      }
      byTool.set(tool, tally);
    }
  }

  const rows: ToolCriticalityRow[] = [];
  for (const [domain, byTool] of tallies) {
    for (const [tool, tally] of byTool) {
      rows.push(criticalityRow(domain, tool, tally));
    }
  }

  return rankByCriticality(rows);
}
