/**
 * Human-readable report formatter.
 */
import chalk from 'chalk';
import type { DomainMetrics, MetricsReport } from '../../core/metrics/calculator.js';
import { NO_DATA } from '../../core/metrics/measured.js';
import type { Pass1Report } from '../../core/metrics/pass-at-1.js';
import { formatFixed, formatMaybe, formatPercent } from '../../utils/format.js';
import type { FormatOptions, IReportFormatter } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'dim' | 'bold';

function formatSigned(value: number): string {
  return `${value > 0 ? '+' : ''}${formatFixed(value)}`;
}

export class HumanFormatter implements IReportFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
      topTci: options.topTci ?? 5,
    };
  }

  formatReport(report: MetricsReport): string {
    const lines: string[] = [];

    for (const domain of report.domains) {
      lines.push(...this.formatDomain(domain));
      lines.push('');
    }

    lines.push(this.colorize(`Overall (${report.runCount} runs, ${report.domains.length} domains)`, 'bold'));
    lines.push(...this.formatPass1(report.overall));

    return lines.join('\n');
  }

  formatDomain(domain: DomainMetrics): string[] {
    const lines: string[] = [];
    lines.push(this.colorize(`Domain ${domain.domain} (${domain.runCount} runs)`, 'bold'));
    lines.push(...this.formatPass1(domain.pass1));
    lines.push(`  mean nPED: ${formatMaybe(domain.sequence.meanNped, formatFixed, NO_DATA)}`);

    if (domain.perToolPrf.length > 0) {
      lines.push('');
      lines.push(`  ${this.colorize('Per-tool PRF:', 'cyan')}`);
      const width = Math.max(...domain.perToolPrf.map((row) => row.tool.length));
      for (const row of domain.perToolPrf) {
        const f1 = this.colorize(formatFixed(row.f1), row.f1 >= 0.8 ? 'green' : row.f1 >= 0.5 ? 'yellow' : 'red');
        lines.push(
          `    ${row.tool.padEnd(width)}  P ${formatFixed(row.precision)}  R ${formatFixed(row.recall)}  ` +
            `F1 ${f1}  omission ${formatPercent(row.omissionRate)}  ` +
            this.colorize(`(tp ${row.tp}, fp ${row.fp}, fn ${row.fn})`, 'dim')
        );
      }
    }

    const critical = domain.toolCriticality.slice(0, this.options.topTci);
    if (critical.length > 0) {
      lines.push('');
      lines.push(`  ${this.colorize(`Top ${critical.length} by TCI:`, 'cyan')}`);
      const width = Math.max(...critical.map((row) => row.tool.length));
      for (const row of critical) {
        const tci = row.tci.defined
          ? formatSigned(row.tci.value)
          : this.colorize('undefined', 'dim');
        lines.push(
          `    ${row.tool.padEnd(width)}  ${tci}  ` +
            this.colorize(`(correct ${row.nCorrect}, mishandled ${row.nMishandled})`, 'dim')
        );
      }
    }

    const deviations = domain.sequence.positionDeviation;
    if (deviations.length > 0) {
      lines.push('');
      lines.push(`  ${this.colorize('Position deviation:', 'cyan')}`);
      const width = Math.max(...deviations.map((entry) => entry.tool.length));
      for (const entry of deviations) {
        lines.push(
          `    ${entry.tool.padEnd(width)}  ${formatMaybe(entry.meanPositionDeviation, formatFixed, NO_DATA)}  ` +
            this.colorize(`(${entry.runs} runs)`, 'dim')
        );
      }
    }

    if (this.options.verbose) {
      lines.push('');
      lines.push(`  ${this.colorize('nPED per run:', 'cyan')}`);
      for (const run of domain.sequence.runs) {
        lines.push(`    ${run.runId}  task ${run.taskId}  ${formatFixed(run.nped)}  ${this.colorize(run.outcome, run.outcome === 'SUCCESS' ? 'green' : 'red')}`);
      }
    }

    return lines;
  }

  private formatPass1(pass1: Pass1Report): string[] {
    const raw = formatMaybe(pass1.raw, formatPercent, NO_DATA);
    const interval = pass1.rawInterval.defined
      ? `, 95% CI ${formatPercent(pass1.rawInterval.value.lower)}-${formatPercent(pass1.rawInterval.value.upper)}`
      : '';
    const buckets = pass1.byBucket.map(
      (bucket) => `${bucket.label} ${formatMaybe(bucket.pass1, formatPercent, NO_DATA)} (${bucket.runs})`
    );
    if (pass1.unbucketed > 0) {
      buckets.push(`unbucketed ${pass1.unbucketed}`);
    }

    return [
      `  pass@1: ${raw} (${pass1.successes}/${pass1.runs}${interval})`,
      `  complexity-weighted pass@1: ${formatMaybe(pass1.complexityWeighted, formatPercent, NO_DATA)}`,
      `  buckets: ${buckets.join(', ')}`,
    ];
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
