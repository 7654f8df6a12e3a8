import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createDemoCommand } from './commands/demo.js';
import { createComputeCommand } from './commands/compute.js';
import { createInitCommand } from './commands/init.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

/** Create the CLI program. Running it without a command runs the demo. */
export function createCli(): Command {
  const program = new Command()
    .name('calc')
    .description('Arithmetic calculator with an operation history')
    .version(VERSION);
  program.addCommand(createDemoCommand(), { isDefault: true });
  [createComputeCommand, createInitCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
