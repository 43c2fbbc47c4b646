/**
 * Report formatter type definitions.
 */
import type { MetricsReport } from '../../core/metrics/calculator.js';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Include per-run nPED rows and full tables */
  verbose: boolean;
  /** Number of TCI rows shown per domain */
  topTci: number;
}

/**
 * Interface for report formatters.
 */
export interface IReportFormatter {
  formatReport(report: MetricsReport): string;
}
