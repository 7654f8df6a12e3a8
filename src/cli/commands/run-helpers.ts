/**
 * Options and settings shared by the commands that run calculations.
 */
import { Command, Option } from 'commander';
import { loadConfig, DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { LogLevelSchema, type Config } from '../../core/config/schema.js';
import { CalculatorError } from '../../utils/errors.js';
import { logger as log, type LogLevel } from '../../utils/logger.js';
import { createFormatter, type IFormatter, type OutputFormat } from '../formatters/index.js';

export interface RunOptions {
  config: string;
  json?: boolean;
  history?: boolean;
  logLevel?: string;
}

export interface RunSettings {
  config: Config;
  format: OutputFormat;
  showHistory: boolean;
  formatter: IFormatter;
}

/**
 * Attach the options every calculating command accepts.
 */
export function withRunOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--json', 'Output as JSON')
    .option('--history', 'Print the operation history after the results')
    .addOption(
      new Option('--log-level <level>', 'Log verbosity (overrides config)').choices(LogLevelSchema.options)
    );
}

/**
 * Load config and merge it with command-line flags. Sets the shared logger level.
 */
export async function resolveRunSettings(
  options: RunOptions,
  projectRoot: string = process.cwd()
): Promise<RunSettings> {
  const config = await loadConfig(projectRoot, options.config);
  const format: OutputFormat = options.json ? 'json' : config.output.format;

  log.setLevel(resolveLogLevel(options.logLevel, config.logging.level, format));

  return {
    config,
    format,
    showHistory: options.history ?? config.output.show_history,
    formatter: createFormatter(format, { colors: process.stdout.isTTY === true }),
  };
}

/**
 * An explicit flag wins. Otherwise JSON output logs warnings and errors only.
 */
export function resolveLogLevel(
  flag: string | undefined,
  configured: LogLevel,
  format: OutputFormat
): LogLevel {
  if (flag !== undefined) {
    return LogLevelSchema.parse(flag);
  }
  if (format === 'json' && (configured === 'debug' || configured === 'info')) {
    return 'warn';
  }
  return configured;
}

/**
 * Map a calculator error to the configured exit code. Anything else propagates.
 */
export function exitCodeForError(error: unknown, settings: RunSettings): number {
  if (error instanceof CalculatorError) {
    log.error(`${error.code}: ${error.message}`);
    return settings.config.exit_codes.error;
  }
  throw error;
}
