#!/usr/bin/env node
/**
 * svc-manifest - CLI for validating service deployment manifests
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { formatError } from '@svc-manifest/core';
import { z } from 'zod';

import { loadCliConfig } from './config.js';
import { createProgram } from './program.js';
import { printError } from './utils/errorFormatter.js';
import { ExitCode } from './utils/exitCodes.js';
import { createCliLogger } from './utils/logger.js';

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')));

async function main(): Promise<void> {
  const config = loadCliConfig(process.env);
  const program = createProgram(
    {
      stdout: process.stdout,
      stderr: process.stderr,
      env: process.env,
      logger: createCliLogger(config.LOG_LEVEL),
      setExitCode: (code) => {
        process.exitCode = code;
      },
    },
    pkg.version,
  );

  await program.parseAsync();
}

main().catch((error: unknown) => {
  printError(process.stderr, formatError(error));
  process.exitCode = ExitCode.Failure;
});
