import { Command } from 'commander';
import * as path from 'node:path';
import { writeDefaultConfig } from '../../core/config/loader.js';
import { logger as log } from '../../utils/logger.js';

interface InitOptions {
  force?: boolean;
}

/**
 * Create the init command.
 */
export function createInitCommand(): Command {
  return new Command('init')
    .description('Write the default configuration to .calc/config.yaml')
    .option('--force', 'Overwrite existing configuration')
    .action(async (options: InitOptions) => {
      try {
        await runInit(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

export async function runInit(
  options: InitOptions,
  projectRoot: string = process.cwd()
): Promise<string> {
  const written = await writeDefaultConfig(projectRoot, { force: options.force });
  log.success(`Created ${path.relative(projectRoot, written)}`);
  return written;
}
