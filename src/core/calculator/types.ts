/**
 * Calculator type definitions.
 */
import { z } from 'zod';
import type { Logger } from '../../utils/logger.js';

/** Names of the supported operations. */
export const OperationNameSchema = z.enum([
  'add',
  'subtract',
  'multiply',
  'divide',
  'power',
  'square_root',
]);

export type OperationName = z.infer<typeof OperationNameSchema>;

/**
 * One completed arithmetic call. Frozen once created.
 */
export interface OperationRecord {
  readonly operation: OperationName;
  readonly operands: readonly number[];
  readonly result: number;
  /** ISO-8601 time at which the operation completed */
  readonly timestamp: string;
}

/**
 * Static description of an operation.
 */
export interface OperationDescriptor {
  /** Label used in log lines, e.g. "Addition" */
  label: string;
  /** Number of operands the operation takes */
  arity: number;
  /** Render operands as an expression, e.g. "5 + 3" */
  render(operands: readonly number[]): string;
}

export interface CalculatorOptions {
  /**
   * Logger for operation lines. Defaults to a "calculator" child of the shared
   * logger, which follows later level changes on the shared logger.
   */
  logger?: Logger;
  /** Clock used for record timestamps */
  now?: () => Date;
}
