import { describe, expect, it } from 'vitest';

import { formatError, formatFieldPath } from '../src/utils/errorFormatting.js';

describe('formatFieldPath', () => {
  it('joins names with dots and indexes with brackets', () => {
    expect(formatFieldPath(['spec', 'ports', 0, 'port'])).toBe('spec.ports[0].port');
    expect(formatFieldPath([0, 'key'])).toBe('[0].key');
    expect(formatFieldPath([])).toBe('');
  });
});

describe('formatError', () => {
  it('uses the message of Error instances', () => {
    expect(formatError(new Error('boom'))).toBe('boom');
  });

  it('stringifies other values', () => {
    expect(formatError('plain')).toBe('plain');
    expect(formatError(42)).toBe('42');
  });
});
