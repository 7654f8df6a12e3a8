import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Logger verbosity. */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** CLI output format. */
export const OutputFormatSchema = z.enum(['human', 'json']);

/** Logging settings. */
export const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('info'),
});

/** Output settings. */
export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
  /** Print the operation history after results */
  show_history: z.boolean().default(false),
});

/** Exit codes configuration. */
export const ExitCodesSchema = z.object({
  success: z.number().int().min(0).default(0),
  error: z.number().int().min(1).default(1),
});

/** Complete config.yaml schema. */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  logging: withDefaults(LoggingSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
  exit_codes: withDefaults(ExitCodesSchema),
});

// Type exports (inferred from schemas)
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type Config = z.infer<typeof ConfigSchema>;
