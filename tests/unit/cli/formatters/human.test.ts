/**
 * Tests for the human-readable formatter.
 */
import { describe, it, expect, vi } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import { createFormatter } from '../../../../src/cli/formatters/index.js';
import { JsonFormatter } from '../../../../src/cli/formatters/json.js';
import type { OperationRecord } from '../../../../src/core/calculator/types.js';

// Mock chalk so colored output can be asserted exactly
vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => `<b>${s}</b>`,
    dim: (s: string) => `<dim>${s}</dim>`,
  },
}));

const records: OperationRecord[] = [
  { operation: 'add', operands: [5, 3], result: 8, timestamp: '2026-01-01T00:00:00.000Z' },
  { operation: 'square_root', operands: [25], result: 5, timestamp: '2026-01-01T00:00:01.000Z' },
];

describe('HumanFormatter', () => {
  it('should print one line per result', () => {
    const formatter = new HumanFormatter({ colors: false });

    expect(
      formatter.formatRun([
        { expression: '5 + 3', result: 8 },
        { expression: '15 / 3', result: 5 },
      ])
    ).toBe('5 + 3 = 8\n15 / 3 = 5');
  });

  it('should append numbered history entries', () => {
    const formatter = new HumanFormatter({ colors: false });

    expect(formatter.formatRun([{ expression: '√25', result: 5 }], records)).toBe(
      [
        '√25 = 5',
        '',
        'History (2)',
        '  1. 5 + 3 = 8 [2026-01-01T00:00:00.000Z]',
        '  2. √25 = 5 [2026-01-01T00:00:01.000Z]',
      ].join('\n')
    );
  });

  it('should colorize the history when colors are enabled', () => {
    const formatter = new HumanFormatter();

    const lines = formatter.formatRun([], records.slice(0, 1)).split('\n');

    expect(lines).toEqual([
      '',
      '<b>History (1)</b>',
      '  1. 5 + 3 = 8 <dim>[2026-01-01T00:00:00.000Z]</dim>',
    ]);
  });
});

describe('createFormatter', () => {
  it('should pick the formatter by format', () => {
    expect(createFormatter('json')).toBeInstanceOf(JsonFormatter);
    expect(createFormatter('human')).toBeInstanceOf(HumanFormatter);
  });
});
