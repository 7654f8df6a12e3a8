import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { createCli } from '../../../src/cli/index.js';

describe('createCli', () => {
  it('should register the commands', () => {
    const program = createCli();

    expect(program.name()).toBe('calc');
    expect(program.commands.map((c) => c.name())).toEqual(['demo', 'compute', 'init']);
  });

  it('should report the package version', () => {
    const pkg = JSON.parse(readFileSync(new URL('../../../package.json', import.meta.url), 'utf-8'));

    expect(createCli().version()).toBe(pkg.version);
  });
});
