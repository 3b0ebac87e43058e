import { z } from 'zod';

import { RelativePathSchema } from '../common.schema.js';

/** Container build definition, both paths relative to the repository root */
export const BuildSchema = z.strictObject({
  context: RelativePathSchema,
  dockerfile: RelativePathSchema,
});

export const RuntimeTypeSchema = z.enum(['docker', 'buildpack']);

export const RuntimeSchema = z.strictObject({
  type: RuntimeTypeSchema,
});

export type Build = z.infer<typeof BuildSchema>;
export type RuntimeType = z.infer<typeof RuntimeTypeSchema>;
export type Runtime = z.infer<typeof RuntimeSchema>;
