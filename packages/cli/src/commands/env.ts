/**
 * Env command - Show how env references resolve against the current environment
 *
 * Secret references (`{{ secret.NAME }}`) are resolved by the platform and are
 * listed without being checked.
 */

import { Command } from 'commander';
import { type ResolvedEnvVar, resolveEnv } from '@svc-manifest/core';

import type { CliContext } from '../context.js';
import { printError } from '../utils/errorFormatter.js';
import { ExitCode } from '../utils/exitCodes.js';
import { loadForCommand, reportLoadFailure } from '../utils/loadForCommand.js';

export interface EnvOptions {
  check?: boolean;
}

function describeEntry(entry: ResolvedEnvVar, unset: ReadonlySet<string>): string {
  if (entry.references.length === 0) {
    return `· ${entry.key} (literal)`;
  }
  const tokens = entry.references.map((reference) => reference.token).join(' ');
  const missing = entry.references.filter(
    (reference) => reference.kind === 'variable' && unset.has(reference.name),
  );
  if (missing.length > 0) {
    return `✗ ${entry.key} ← ${tokens} (unset: ${missing.map((reference) => reference.name).join(', ')})`;
  }
  if (entry.references.some((reference) => reference.kind === 'secret')) {
    return `? ${entry.key} ← ${tokens} (platform secret)`;
  }
  return `✓ ${entry.key} ← ${tokens}`;
}

export async function runEnv(file: string, options: EnvOptions, context: CliContext): Promise<void> {
  const result = await loadForCommand(file, context);
  if (!result.ok) {
    reportLoadFailure(file, result, context);
    return;
  }

  const resolution = resolveEnv(result.manifest, { variables: context.env });
  const unsetVariables = resolution.unresolved.filter(
    (item) => item.reference.kind === 'variable',
  );
  const unset = new Set(unsetVariables.map((item) => item.reference.name));

  for (const entry of resolution.entries) {
    context.stdout.write(`${describeEntry(entry, unset)}\n`);
  }

  if (options.check && unsetVariables.length > 0) {
    context.logger.debug({ unset: [...unset] }, 'unresolved env references');
    printError(
      context.stderr,
      `${unsetVariables.length} env ${unsetVariables.length === 1 ? 'reference is' : 'references are'} not set`,
      unsetVariables.map((item) => `${item.key}: ${item.reference.token}`),
    );
    context.setExitCode(ExitCode.Violation);
    return;
  }

  context.setExitCode(ExitCode.Ok);
}

export function createEnvCommand(context: CliContext): Command {
  return new Command('env')
    .description('Resolve env references against the current environment')
    .argument('<file>', 'Path to the manifest (YAML or JSON)')
    .option('--check', 'Exit with code 2 when a referenced variable is not set')
    .action((file: string, options: EnvOptions) => runEnv(file, options, context));
}
