/**
 * Arithmetic calculator with an operation history.
 *
 * Every successful call logs one line at info level and appends exactly one
 * frozen OperationRecord. A failing call logs at error level (for domain
 * errors), throws, and leaves the history untouched.
 */
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import {
  DivisionByZeroError,
  ErrorCodes,
  InvalidOperationError,
} from '../../utils/errors.js';
import { OperationHistory } from './history.js';
import { OPERATIONS, renderExpression } from './operations.js';
import {
  OperationNameSchema,
  type CalculatorOptions,
  type OperationName,
  type OperationRecord,
} from './types.js';

export class Calculator {
  private readonly history = new OperationHistory();
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: CalculatorOptions = {}) {
    this.log = options.logger ?? rootLogger.child('calculator');
    this.now = options.now ?? (() => new Date());
  }

  add(a: number, b: number): number {
    return this.execute('add', [a, b], () => a + b);
  }

  subtract(a: number, b: number): number {
    return this.execute('subtract', [a, b], () => a - b);
  }

  multiply(a: number, b: number): number {
    return this.execute('multiply', [a, b], () => a * b);
  }

  /**
   * A zero divisor is reported before the dividend is validated.
   *
   * @throws DivisionByZeroError when b is zero
   */
  divide(a: number, b: number): number {
    if (b === 0) {
      this.log.error('Division by zero attempted');
      throw new DivisionByZeroError('Cannot divide by zero', { dividend: a });
    }
    return this.execute('divide', [a, b], () => a / b);
  }

  /**
   * Raise base to exponent. Negative and fractional exponents follow
   * real-number semantics.
   *
   * @throws InvalidOperationError when the result is not a finite real number
   */
  power(base: number, exponent: number): number {
    return this.execute('power', [base, exponent], () => {
      const result = base ** exponent;
      if (!Number.isFinite(result)) {
        this.log.error('Power result is not a real number');
        throw new InvalidOperationError(
          ErrorCodes.INVALID_OPERATION,
          `Cannot raise ${base} to the power ${exponent}: result is not a finite real number`,
          { base, exponent }
        );
      }
      return result;
    });
  }

  /**
   * @throws InvalidOperationError when x is negative
   */
  squareRoot(x: number): number {
    return this.execute('square_root', [x], () => {
      if (x < 0) {
        this.log.error('Square root of negative number attempted');
        throw new InvalidOperationError(
          ErrorCodes.INVALID_OPERATION,
          'Cannot calculate square root of negative number',
          { operand: x }
        );
      }
      return Math.sqrt(x);
    });
  }

  /**
   * Run an operation by name.
   *
   * @throws InvalidOperationError for unknown names or a wrong operand count
   */
  compute(operation: string, operands: readonly number[]): number {
    const parsed = OperationNameSchema.safeParse(operation);
    if (!parsed.success) {
      throw new InvalidOperationError(
        ErrorCodes.UNKNOWN_OPERATION,
        `Unknown operation: ${operation}`,
        { operation, supported: OperationNameSchema.options }
      );
    }

    const name = parsed.data;
    const { arity } = OPERATIONS[name];
    if (operands.length !== arity) {
      throw new InvalidOperationError(
        ErrorCodes.ARITY_MISMATCH,
        `${name} takes ${arity} operand(s), got ${operands.length}`,
        { operation: name, expected: arity, received: operands.length }
      );
    }

    this.log.debug(`Dispatching ${name} with [${operands.join(', ')}]`);
    const [first = 0, second = 0] = operands;
    switch (name) {
      case 'add':
        return this.add(first, second);
      case 'subtract':
        return this.subtract(first, second);
      case 'multiply':
        return this.multiply(first, second);
      case 'divide':
        return this.divide(first, second);
      case 'power':
        return this.power(first, second);
      case 'square_root':
        return this.squareRoot(first);
    }
  }

  getHistory(): OperationRecord[] {
    return this.history.entries();
  }

  lastRecord(): OperationRecord | undefined {
    return this.history.last();
  }

  get historySize(): number {
    return this.history.size;
  }

  private execute(
    operation: OperationName,
    operands: readonly number[],
    compute: () => number
  ): number {
    for (const operand of operands) {
      if (!Number.isFinite(operand)) {
        throw new InvalidOperationError(
          ErrorCodes.INVALID_OPERAND,
          `Operands of ${operation} must be finite numbers, got ${operand}`,
          { operation, operands: [...operands] }
        );
      }
    }

    const result = compute();
    this.record(operation, operands, result);
    this.log.info(`${OPERATIONS[operation].label}: ${renderExpression(operation, operands)} = ${result}`);
    return result;
  }

  private record(operation: OperationName, operands: readonly number[], result: number): void {
    const record: OperationRecord = Object.freeze({
      operation,
      operands: Object.freeze([...operands]),
      result,
      timestamp: this.now().toISOString(),
    });
    this.history.append(record);
  }
}
