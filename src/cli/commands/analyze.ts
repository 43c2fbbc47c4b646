/**
 * CLI command that computes trajectory metrics for simulation result files.
 */
import * as path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadConfig, toMetricsOptions } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { loadSimulationFiles, resolveSimulationFiles } from '../../core/ingest/simulation-loader.js';
import { loadTaskDirectory } from '../../core/ingest/task-loader.js';
import { MetricsCalculator, type MetricsReport } from '../../core/metrics/calculator.js';
import { InputMismatchError, TrajevalError, ErrorCodes } from '../../utils/errors.js';
import { writeFile, writeJsonFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { compareStrings } from '../../utils/string.js';
import { HumanFormatter } from '../formatters/human.js';
import { JsonFormatter, toReportJson } from '../formatters/json.js';

export interface AnalyzeOptions {
  tasks?: string;
  domain?: string;
  config?: string;
  output?: string;
  json?: boolean;
  top?: number;
  verbose?: boolean;
}

export interface AnalysisResult {
  report: MetricsReport;
  config: Config;
  /** Simulation files that were read */
  files: string[];
}

export const METRICS_FILE = 'metrics.json';
export const SUMMARY_FILE = 'summary.txt';

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Create the analyze command.
 */
export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Compute tool-use trajectory metrics for simulation runs')
    .argument('<inputs...>', 'Simulation JSON files or directories of them')
    .option('--tasks <dir>', 'Root of <domain>/tasks.json (default: tasks_dir from config)')
    .option('--domain <name>', 'Domain of every input (default: taken from each file name)')
    .option('--config <path>', 'Config file (default: .trajeval/config.yaml)')
    .option('--output <dir>', `Write ${METRICS_FILE} and ${SUMMARY_FILE} to this directory`)
    .option('--json', 'Output as JSON')
    .option('--top <n>', 'TCI rows shown per domain (default: output.top_tci from config)', parsePositiveInt)
    .option('-v, --verbose', 'Show debug logging and per-run nPED')
    .action(async (inputs: string[], options: AnalyzeOptions) => {
      try {
        await runAnalyze(inputs, options);
      } catch (error) {
        reportFailure(error, options.json ?? false);
        process.exit(1);
      }
    });
}

/**
 * Print a failure. Under --json the logger is silenced, so the error goes to
 * stderr as a JSON object carrying the error code and details.
 */
function reportFailure(error: unknown, json: boolean): void {
  const message = error instanceof Error ? error.message : 'Unknown error';
  if (!json) {
    logger.error(message);
    return;
  }
  const payload = error instanceof TrajevalError ? error.toJSON() : { message };
  console.error(JSON.stringify({ error: payload }));
}

/**
 * Load runs and plans, then compute the report.
 * Plans are loaded only for the domains the runs belong to.
 */
export async function analyzeInputs(
  inputs: readonly string[],
  options: Pick<AnalyzeOptions, 'tasks' | 'domain' | 'config'>,
  projectRoot: string = process.cwd()
): Promise<AnalysisResult> {
  const config = await loadConfig(projectRoot, options.config);

  const files = await resolveSimulationFiles(inputs, projectRoot);
  if (files.length === 0) {
    throw new InputMismatchError(ErrorCodes.NO_RUNS, 'No simulation files found', { inputs: [...inputs] });
  }

  const traces = await loadSimulationFiles(files, {
    root: projectRoot,
    ...(options.domain ? { domain: options.domain } : {}),
  });
  const domains = [...new Set(traces.map((trace) => trace.domain))].sort(compareStrings);
  const tasksRoot = path.resolve(projectRoot, options.tasks ?? config.tasks_dir);
  const plans = await loadTaskDirectory(tasksRoot, domains);

  const report = new MetricsCalculator(toMetricsOptions(config)).calculate(traces, plans);
  return { report, config, files };
}

/**
 * Write the JSON tables and an uncolored summary into `outputDir`.
 */
export async function writeReportBundle(
  outputDir: string,
  report: MetricsReport,
  topTci: number
): Promise<string[]> {
  const metricsPath = path.join(outputDir, METRICS_FILE);
  const summaryPath = path.join(outputDir, SUMMARY_FILE);
  const summary = new HumanFormatter({ colors: false, topTci }).formatReport(report);

  await writeJsonFile(metricsPath, toReportJson(report));
  await writeFile(summaryPath, `${summary}\n`);
  return [metricsPath, summaryPath];
}

async function runAnalyze(inputs: string[], options: AnalyzeOptions): Promise<void> {
  const projectRoot = process.cwd();

  if (options.json) {
    logger.setLevel('silent');
  } else if (options.verbose) {
    logger.setLevel('debug');
  }

  const { report, config, files } = await analyzeInputs(inputs, options, projectRoot);
  const topTci = options.top ?? config.output.top_tci;

  if (options.output) {
    const written = await writeReportBundle(path.resolve(projectRoot, options.output), report, topTci);
    for (const file of written) {
      logger.success(`Wrote ${path.relative(projectRoot, file)}`);
    }
  }

  if (options.json) {
    console.log(new JsonFormatter().formatReport(report));
    return;
  }

  console.log(chalk.dim(`Analyzed ${report.runCount} runs from ${files.length} file(s)`));
  console.log();
  console.log(new HumanFormatter({ verbose: options.verbose ?? false, topTci }).formatReport(report));
}
