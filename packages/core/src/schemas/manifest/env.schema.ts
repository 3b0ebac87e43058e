import { z } from 'zod';

export const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * A single environment variable handed to the service at startup.
 * The value is passed through untouched and may hold `$NAME`, `${NAME}`
 * or `{{ secret.NAME }}` references that the platform substitutes.
 */
export const EnvVarSchema = z.strictObject({
  key: z
    .string()
    .regex(ENV_KEY_PATTERN, 'env key must match [A-Za-z_][A-Za-z0-9_]*'),
  value: z.string(),
});

export type EnvVar = z.infer<typeof EnvVarSchema>;
