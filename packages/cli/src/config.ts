import { z } from 'zod';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Environment variables read by the CLI
 */
export const CliEnvSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default('warn'),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type CliEnv = z.infer<typeof CliEnvSchema>;

/**
 * Reads CLI settings from the environment, falling back to defaults for unset values.
 *
 * @throws {Error} When a variable is set to an unsupported value
 */
export function loadCliConfig(env: Readonly<Record<string, string | undefined>>): CliEnv {
  const parsed = CliEnvSchema.safeParse({ LOG_LEVEL: env.LOG_LEVEL || undefined });
  if (!parsed.success) {
    throw new Error(
      `Invalid LOG_LEVEL "${env.LOG_LEVEL}" (expected one of: ${LogLevelSchema.options.join(', ')})`,
    );
  }
  return parsed.data;
}
