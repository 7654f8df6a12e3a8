import chalk from 'chalk';
import type { OperationRecord } from '../../core/calculator/types.js';
import { describeRecord } from '../../core/calculator/operations.js';
import type { EvaluationResult, FormatOptions, IFormatter } from './types.js';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
    };
  }

  formatRun(results: readonly EvaluationResult[], history?: readonly OperationRecord[]): string {
    const lines = results.map((r) => `${r.expression} = ${r.result}`);

    if (history) {
      lines.push('');
      lines.push(this.colorize(`History (${history.length})`, 'bold'));
      history.forEach((record, index) => {
        lines.push(`  ${index + 1}. ${describeRecord(record)} ${this.colorize(`[${record.timestamp}]`, 'dim')}`);
      });
    }

    return lines.join('\n');
  }

  private colorize(text: string, style: 'bold' | 'dim'): string {
    if (!this.options.colors) return text;
    return style === 'bold' ? chalk.bold(text) : chalk.dim(text);
  }
}
