import { Command } from 'commander';
import { Calculator } from '../../core/calculator/calculator.js';
import { renderExpression } from '../../core/calculator/operations.js';
import { OperationNameSchema } from '../../core/calculator/types.js';
import { ErrorCodes, InvalidOperationError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { exitCodeForError, resolveRunSettings, withRunOptions, type RunOptions } from './run-helpers.js';

/**
 * Create the compute command.
 */
export function createComputeCommand(): Command {
  return withRunOptions(
    new Command('compute')
      .description('Run a single operation')
      .argument('<operation>', `One of: ${OperationNameSchema.options.join(', ')}`)
      .argument('<operands...>', 'Numeric operands (put "--" before negative numbers)')
  ).action(async (operation: string, operands: string[], options: RunOptions) => {
    try {
      process.exitCode = await runComputeCommand(operation, operands, options);
    } catch (error) {
      log.error(error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }
  });
}

/**
 * Parse command-line operands. Each must be a finite number.
 */
export function parseOperands(raw: readonly string[]): number[] {
  return raw.map((value) => {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isFinite(parsed)) {
      throw new InvalidOperationError(
        ErrorCodes.INVALID_OPERAND,
        `Not a finite number: "${value}"`,
        { value }
      );
    }
    return parsed;
  });
}

export async function runComputeCommand(
  operation: string,
  rawOperands: readonly string[],
  options: RunOptions
): Promise<number> {
  const settings = await resolveRunSettings(options);
  const calculator = new Calculator();

  try {
    const operands = parseOperands(rawOperands);
    const result = calculator.compute(operation, operands);
    const record = calculator.lastRecord();
    const expression = record
      ? renderExpression(record.operation, record.operands)
      : `${operation}(${operands.join(', ')})`;
    const history = settings.showHistory ? calculator.getHistory() : undefined;
    console.log(settings.formatter.formatRun([{ expression, result }], history));
    return settings.config.exit_codes.success;
  } catch (error) {
    return exitCodeForError(error, settings);
  }
}
