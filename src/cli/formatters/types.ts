/**
 * Formatter type definitions.
 */
import type { OperationRecord } from '../../core/calculator/types.js';
import type { OutputFormat } from '../../core/config/schema.js';

export type { OutputFormat };

/**
 * One evaluated expression, as printed by the CLI.
 */
export interface EvaluationResult {
  expression: string;
  result: number;
}

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  /**
   * Format evaluated expressions, optionally followed by the history.
   */
  formatRun(results: readonly EvaluationResult[], history?: readonly OperationRecord[]): string;
}
