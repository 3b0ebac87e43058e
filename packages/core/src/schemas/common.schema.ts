import { posix, win32 } from 'node:path';

import { z } from 'zod';

/**
 * Common validation schemas shared by the manifest sections
 */

export const PortNumberSchema = z
  .number()
  .int('port must be an integer')
  .min(1, 'port must be between 1 and 65535')
  .max(65535, 'port must be between 1 and 65535');

export const NonEmptyStringSchema = z.string().min(1, 'must not be empty');

export const RelativePathSchema = NonEmptyStringSchema.refine(
  (value) => !posix.isAbsolute(value) && !win32.isAbsolute(value),
  'must be a relative path',
);

export const UrlPathSchema = z.string().startsWith('/', 'path must start with "/"');
