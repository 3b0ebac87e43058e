import { z } from 'zod';

/**
 * How new revisions replace running instances.
 * - `rolling` replaces instances one at a time
 * - `recreate` stops all instances before starting new ones
 * - `blue-green` starts a full new set before switching traffic
 * - `immediate` switches without waiting for health checks
 */
export const DeployStrategySchema = z.enum(['rolling', 'recreate', 'blue-green', 'immediate']);

export const DeploySchema = z.strictObject({
  maxPendingDeployments: z.number().int().min(0, 'must be a non-negative integer'),
  maxReplicas: z.number().int().min(1, 'must be a positive integer'),
  minReplicas: z.number().int().min(0, 'must be a non-negative integer'),
  strategy: DeployStrategySchema,
});

export type DeployStrategy = z.infer<typeof DeployStrategySchema>;
export type Deploy = z.infer<typeof DeploySchema>;
