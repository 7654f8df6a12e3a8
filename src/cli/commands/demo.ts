import { Command } from 'commander';
import { Calculator } from '../../core/calculator/calculator.js';
import { renderExpression } from '../../core/calculator/operations.js';
import type { OperationName } from '../../core/calculator/types.js';
import { logger as log } from '../../utils/logger.js';
import type { EvaluationResult } from '../formatters/types.js';
import { exitCodeForError, resolveRunSettings, withRunOptions, type RunOptions } from './run-helpers.js';

export interface DemoStep {
  operation: OperationName;
  operands: readonly number[];
}

/** Fixed demonstration sequence. */
export const DEMO_SEQUENCE: readonly DemoStep[] = [
  { operation: 'add', operands: [5, 3] },
  { operation: 'subtract', operands: [10, 4] },
  { operation: 'multiply', operands: [6, 7] },
  { operation: 'divide', operands: [15, 3] },
  { operation: 'power', operands: [2, 8] },
  { operation: 'square_root', operands: [25] },
];

export const DEMO_HEADER = ['Calculator Demo', '==============='];

/**
 * Create the demo command (the program's default).
 */
export function createDemoCommand(): Command {
  return withRunOptions(
    new Command('demo').description('Run the fixed demonstration sequence')
  ).action(async (options: RunOptions) => {
    try {
      process.exitCode = await runDemoCommand(options);
    } catch (error) {
      log.error(error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }
  });
}

/**
 * Run every demo step on the calculator. Stops at the first error, after
 * `onResult` has seen every step that succeeded.
 */
export function runDemo(
  calculator: Calculator,
  steps: readonly DemoStep[] = DEMO_SEQUENCE,
  onResult?: (result: EvaluationResult) => void
): EvaluationResult[] {
  return steps.map(({ operation, operands }) => {
    const result: EvaluationResult = {
      expression: renderExpression(operation, operands),
      result: calculator.compute(operation, operands),
    };
    onResult?.(result);
    return result;
  });
}

/**
 * Human output prints each line as its step completes. JSON output is one
 * document, printed at the end or with the partial results on failure.
 */
export async function runDemoCommand(
  options: RunOptions,
  steps: readonly DemoStep[] = DEMO_SEQUENCE
): Promise<number> {
  const settings = await resolveRunSettings(options);
  const calculator = new Calculator();
  const streaming = settings.format === 'human';
  const results: EvaluationResult[] = [];

  if (streaming) {
    DEMO_HEADER.forEach((line) => console.log(line));
  }

  try {
    runDemo(calculator, steps, (result) => {
      results.push(result);
      if (streaming) {
        console.log(settings.formatter.formatRun([result]));
      }
    });
  } catch (error) {
    if (!streaming && results.length > 0) {
      console.log(settings.formatter.formatRun(results));
    }
    return exitCodeForError(error, settings);
  }

  const history = settings.showHistory ? calculator.getHistory() : undefined;
  if (!streaming) {
    console.log(settings.formatter.formatRun(results, history));
  } else if (history) {
    console.log(settings.formatter.formatRun([], history));
  }
  return settings.config.exit_codes.success;
}
