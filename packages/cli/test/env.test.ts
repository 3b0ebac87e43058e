import { describe, expect, it } from 'vitest';

import { runEnv } from '../src/commands/env.js';

import { createTestContext, fixturePath } from './helpers/context.js';

const partialEnv = { API_ID: '12345', API_HASH: 'test-hash' };

describe('env command', () => {
  it('lists how each env entry resolves', async () => {
    const { context, stdout, exitCode } = createTestContext({ env: partialEnv });

    await runEnv(fixturePath('service.yaml'), {}, context);

    expect(exitCode()).toBe(0);
    expect(stdout()).toBe(
      [
        '✓ API_ID ← $API_ID',
        '✓ API_HASH ← $API_HASH',
        '✗ BOT_TOKEN ← $BOT_TOKEN (unset: BOT_TOKEN)',
        '✗ OWNER_ID ← $OWNER_ID (unset: OWNER_ID)',
        '',
      ].join('\n'),
    );
  });

  it('does not print resolved values', async () => {
    const { context, stdout } = createTestContext({ env: partialEnv });

    await runEnv(fixturePath('service.yaml'), {}, context);

    expect(stdout()).not.toContain('test-hash');
  });

  it('exits with 2 under --check when variables are unset', async () => {
    const { context, stderr, exitCode } = createTestContext({ env: partialEnv });

    await runEnv(fixturePath('service.yaml'), { check: true }, context);

    expect(exitCode()).toBe(2);
    expect(stderr()).toBe(
      [
        '✗ 2 env references are not set',
        '',
        '→ BOT_TOKEN: $BOT_TOKEN',
        '→ OWNER_ID: $OWNER_ID',
        '',
      ].join('\n'),
    );
  });

  it('passes --check when every variable is set', async () => {
    const { context, stderr, exitCode } = createTestContext({
      env: { ...partialEnv, BOT_TOKEN: 'test-token', OWNER_ID: '42' },
    });

    await runEnv(fixturePath('service.yaml'), { check: true }, context);

    expect(exitCode()).toBe(0);
    expect(stderr()).toBe('');
  });

  it('reports load failures like validate', async () => {
    const { context, exitCode } = createTestContext();

    await runEnv(fixturePath('web-without-ports.yaml'), { check: true }, context);

    expect(exitCode()).toBe(2);
  });
});
