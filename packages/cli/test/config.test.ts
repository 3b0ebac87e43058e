import { describe, expect, it } from 'vitest';

import { loadCliConfig } from '../src/config.js';

describe('loadCliConfig', () => {
  it('defaults the log level to warn', () => {
    expect(loadCliConfig({})).toEqual({ LOG_LEVEL: 'warn' });
    expect(loadCliConfig({ LOG_LEVEL: '' })).toEqual({ LOG_LEVEL: 'warn' });
  });

  it('reads LOG_LEVEL', () => {
    expect(loadCliConfig({ LOG_LEVEL: 'debug' })).toEqual({ LOG_LEVEL: 'debug' });
  });

  it('rejects unknown levels', () => {
    expect(() => loadCliConfig({ LOG_LEVEL: 'loud' })).toThrow(
      'Invalid LOG_LEVEL "loud" (expected one of: fatal, error, warn, info, debug, trace, silent)',
    );
  });
});
