import { z } from 'zod';

import { PortNumberSchema, UrlPathSchema } from '../common.schema.js';

export const PortProtocolSchema = z.enum(['TCP', 'UDP']);

/** A port the service listens on */
export const PortSchema = z.strictObject({
  port: PortNumberSchema,
  protocol: PortProtocolSchema,
});

/**
 * Public route exposed by the platform's edge.
 * When `port` is omitted the platform picks the first declared port.
 */
export const RouteSchema = z.strictObject({
  path: UrlPathSchema,
  port: PortNumberSchema.optional(),
});

const HealthCheckTimingShape = {
  /** Seconds to wait after start before the first check */
  gracePeriod: z.number().int().min(0).optional(),
  /** Seconds between two checks */
  interval: z.number().int().min(1).optional(),
  /** Seconds before a single check is considered failed */
  timeout: z.number().int().min(1).optional(),
  /** Consecutive failures before the instance is restarted */
  restartLimit: z.number().int().min(1).optional(),
};

export const TcpHealthCheckSchema = z.strictObject({
  type: z.literal('tcp'),
  port: PortNumberSchema,
  ...HealthCheckTimingShape,
});

export const HttpHealthCheckSchema = z.strictObject({
  type: z.literal('http'),
  port: PortNumberSchema,
  path: UrlPathSchema,
  ...HealthCheckTimingShape,
});

export const HealthCheckSchema = z.discriminatedUnion('type', [
  TcpHealthCheckSchema,
  HttpHealthCheckSchema,
]);

export type PortProtocol = z.infer<typeof PortProtocolSchema>;
export type Port = z.infer<typeof PortSchema>;
export type Route = z.infer<typeof RouteSchema>;
export type HealthCheck = z.infer<typeof HealthCheckSchema>;
