/**
 * Operation catalog shared by the calculator, its log lines and the CLI.
 */
import type { OperationDescriptor, OperationName, OperationRecord } from './types.js';

function infix(symbol: string): (operands: readonly number[]) => string {
  return (operands) => `${operands[0]} ${symbol} ${operands[1]}`;
}

export const OPERATIONS = {
  add: { label: 'Addition', arity: 2, render: infix('+') },
  subtract: { label: 'Subtraction', arity: 2, render: infix('-') },
  multiply: { label: 'Multiplication', arity: 2, render: infix('*') },
  divide: { label: 'Division', arity: 2, render: infix('/') },
  power: { label: 'Power', arity: 2, render: infix('^') },
  square_root: {
    label: 'Square root',
    arity: 1,
    render: (operands) => `√${operands[0]}`,
  },
} as const satisfies Record<OperationName, OperationDescriptor>;

/**
 * Render an operation call as an expression, e.g. "2 ^ 8".
 */
export function renderExpression(name: OperationName, operands: readonly number[]): string {
  return OPERATIONS[name].render(operands);
}

/**
 * Render a record as "expression = result".
 */
export function describeRecord(record: OperationRecord): string {
  return `${renderExpression(record.operation, record.operands)} = ${record.result}`;
}
