import { z } from 'zod';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const coreConfigSchema = z.object({
  logLevel: logLevelSchema.default('info')
});

export type LogLevel = z.infer<typeof logLevelSchema>;
export type CoreConfig = z.infer<typeof coreConfigSchema>;

/**
 * Reads the core settings from environment variables. Unset variables fall
 * back to their defaults; malformed ones throw a ZodError.
 */
export function loadCoreConfig(env: NodeJS.ProcessEnv = process.env): CoreConfig {
  return coreConfigSchema.parse({
    logLevel: env.ADVMAP_LOG_LEVEL
  });
}
