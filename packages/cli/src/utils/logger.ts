import { type Logger, destination, pino } from 'pino';

import type { LogLevel } from '../config.js';

/**
 * pino logger writing JSON lines to stderr so stdout stays machine-readable.
 */
export function createCliLogger(level: LogLevel): Logger {
  return pino({ name: 'svc-manifest', level }, destination(2));
}
