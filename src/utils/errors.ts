/**
 * Error types and codes for the calculator.
 * Every error raised by this package extends CalculatorError.
 */

// Error code constants
export const ErrorCodes = {
  // Arithmetic errors
  DIVISION_BY_ZERO: 'DIVISION_BY_ZERO',
  INVALID_OPERATION: 'INVALID_OPERATION',
  INVALID_OPERAND: 'INVALID_OPERAND',
  UNKNOWN_OPERATION: 'UNKNOWN_OPERATION',
  ARITY_MISMATCH: 'ARITY_MISMATCH',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  CONFIG_EXISTS: 'CONFIG_EXISTS',

  // System errors
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Codes an InvalidOperationError may carry.
 */
export type InvalidOperationCode =
  | typeof ErrorCodes.INVALID_OPERATION
  | typeof ErrorCodes.INVALID_OPERAND
  | typeof ErrorCodes.UNKNOWN_OPERATION
  | typeof ErrorCodes.ARITY_MISMATCH;

/**
 * Base error class for all calculator errors.
 */
export class CalculatorError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CalculatorError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Raised by divide() when the divisor is zero.
 */
export class DivisionByZeroError extends CalculatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.DIVISION_BY_ZERO, message, details);
    this.name = 'DivisionByZeroError';
  }
}

/**
 * Domain errors: negative square roots, non-real powers, bad operands,
 * unknown operation names.
 */
export class InvalidOperationError extends CalculatorError {
  constructor(
    code: InvalidOperationCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'InvalidOperationError';
  }
}

/**
 * Configuration-related errors (loading, writing).
 */
export class ConfigError extends CalculatorError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (parse failures, schema violations).
 */
export class SystemError extends CalculatorError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}
