import { z } from 'zod';

import { NonEmptyStringSchema } from '../common.schema.js';

import { BuildSchema, RuntimeSchema } from './build.schema.js';
import { DeploySchema } from './deploy.schema.js';
import { EnvVarSchema } from './env.schema.js';
import { HealthCheckSchema, PortSchema, RouteSchema } from './networking.schema.js';

export const ServiceKindSchema = z.enum(['Service']);

/**
 * `web` services receive public traffic and must expose at least one port,
 * `worker` services run in the background without routes.
 */
export const ServiceTypeSchema = z.enum(['web', 'worker']);

export const ServiceMetadataSchema = z.strictObject({
  /** Deployment unit name */
  name: NonEmptyStringSchema,
});

export const ServiceSpecSchema = z.strictObject({
  type: ServiceTypeSchema,
  env: z.array(EnvVarSchema).optional(),
  ports: z.array(PortSchema).optional(),
  routes: z.array(RouteSchema).optional(),
  healthChecks: z.array(HealthCheckSchema).optional(),
  regions: z.array(NonEmptyStringSchema).optional(),
  instanceType: NonEmptyStringSchema.optional(),
  deploy: DeploySchema,
  build: BuildSchema,
  runtime: RuntimeSchema,
});

/**
 * Schema for a service deployment manifest.
 * Structural checks only: cross-field rules such as replica bounds and
 * unique env keys are applied by the loader after this schema passes.
 */
export const ServiceManifestSchema = z.strictObject({
  apiVersion: NonEmptyStringSchema,
  kind: ServiceKindSchema,
  metadata: ServiceMetadataSchema,
  spec: ServiceSpecSchema,
});

export type ServiceKind = z.infer<typeof ServiceKindSchema>;
export type ServiceType = z.infer<typeof ServiceTypeSchema>;
export type ServiceMetadata = z.infer<typeof ServiceMetadataSchema>;
export type ServiceSpec = z.infer<typeof ServiceSpecSchema>;
export type ServiceManifest = z.infer<typeof ServiceManifestSchema>;
