/**
 * Property tests for the calculator's algebraic and history guarantees.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Calculator } from '../../../../src/core/calculator/calculator.js';
import { OPERATIONS } from '../../../../src/core/calculator/operations.js';
import { OperationNameSchema } from '../../../../src/core/calculator/types.js';
import { Logger } from '../../../../src/utils/logger.js';
import { DivisionByZeroError, InvalidOperationError } from '../../../../src/utils/errors.js';

function quietCalculator(): Calculator {
  const log = new Logger();
  log.setLevel('silent');
  return new Calculator({ logger: log });
}

const operand = fc.double({ min: -1e6, max: 1e6, noNaN: true });
const divisor = fc
  .tuple(fc.double({ min: 1e-3, max: 1e6, noNaN: true }), fc.boolean())
  .map(([magnitude, negative]) => (negative ? -magnitude : magnitude));

describe('Calculator properties', () => {
  it('add is commutative', () => {
    const calc = quietCalculator();
    fc.assert(
      fc.property(operand, operand, (a, b) => {
        expect(calc.add(a, b)).toBe(calc.add(b, a));
      })
    );
  });

  it('subtract is anti-commutative', () => {
    const calc = quietCalculator();
    fc.assert(
      fc.property(operand, operand, (a, b) => {
        expect(calc.subtract(a, b) === -calc.subtract(b, a)).toBe(true);
      })
    );
  });

  it('multiplying a quotient by its divisor recovers the dividend', () => {
    const calc = quietCalculator();
    fc.assert(
      fc.property(operand, divisor, (a, b) => {
        const roundTrip = calc.multiply(calc.divide(a, b), b);
        expect(Math.abs(roundTrip - a)).toBeLessThanOrEqual(1e-9 * Math.max(1, Math.abs(a)));
      })
    );
  });

  it('dividing by zero always fails', () => {
    const calc = quietCalculator();
    fc.assert(
      fc.property(operand, (a) => {
        expect(() => calc.divide(a, 0)).toThrow(DivisionByZeroError);
      })
    );
    expect(calc.historySize).toBe(0);
  });

  it('square root of a negative number always fails', () => {
    const calc = quietCalculator();
    fc.assert(
      fc.property(fc.double({ min: -1e6, max: -1e-9, noNaN: true }), (x) => {
        expect(() => calc.squareRoot(x)).toThrow(InvalidOperationError);
      })
    );
    expect(calc.historySize).toBe(0);
  });

  it('history grows by exactly one per successful call', () => {
    const call = fc.record({
      operation: fc.constantFrom(...OperationNameSchema.options),
      a: fc.integer({ min: -20, max: 20 }),
      b: fc.integer({ min: -5, max: 5 }),
    });

    fc.assert(
      fc.property(fc.array(call, { maxLength: 30 }), (calls) => {
        const calc = quietCalculator();
        let successes = 0;

        for (const { operation, a, b } of calls) {
          const operands = OPERATIONS[operation].arity === 1 ? [a] : [a, b];
          const before = calc.historySize;
          try {
            calc.compute(operation, operands);
            successes += 1;
            expect(calc.historySize).toBe(before + 1);
          } catch (error) {
            expect(error).toBeInstanceOf(Error);
            expect(calc.historySize).toBe(before);
          }
        }

        expect(calc.historySize).toBe(successes);
      })
    );
  });
});
