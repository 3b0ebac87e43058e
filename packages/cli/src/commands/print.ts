/**
 * Print command - Output the normalized manifest
 */

import { Command } from 'commander';
import { serializeManifest } from '@svc-manifest/core';

import type { CliContext } from '../context.js';
import { ExitCode } from '../utils/exitCodes.js';
import { loadForCommand, reportLoadFailure } from '../utils/loadForCommand.js';

export interface PrintOptions {
  json?: boolean;
}

export async function runPrint(
  file: string,
  options: PrintOptions,
  context: CliContext,
): Promise<void> {
  const result = await loadForCommand(file, context);
  if (!result.ok) {
    reportLoadFailure(file, result, context);
    return;
  }

  context.stdout.write(
    options.json
      ? `${JSON.stringify(result.manifest, null, 2)}\n`
      : serializeManifest(result.manifest),
  );
  context.setExitCode(ExitCode.Ok);
}

export function createPrintCommand(context: CliContext): Command {
  return new Command('print')
    .description('Validate a manifest and print it in normalized form')
    .argument('<file>', 'Path to the manifest (YAML or JSON)')
    .option('-j, --json', 'Print JSON instead of YAML')
    .action((file: string, options: PrintOptions) => runPrint(file, options, context));
}
