import type { OperationRecord } from '../../core/calculator/types.js';
import type { EvaluationResult, IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatRun(results: readonly EvaluationResult[], history?: readonly OperationRecord[]): string {
    const output: Record<string, unknown> = { results };
    if (history) {
      output.history = history;
    }
    return JSON.stringify(output, null, 2);
  }
}
