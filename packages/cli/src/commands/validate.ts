/**
 * Validate command - Load a manifest and report whether it is valid
 *
 * Exit codes: 0 valid, 1 malformed input, 2 schema or invariant violation.
 */

import { Command } from 'commander';
import type { ServiceManifest } from '@svc-manifest/core';

import type { CliContext } from '../context.js';
import { ExitCode } from '../utils/exitCodes.js';
import { loadForCommand, reportLoadFailure } from '../utils/loadForCommand.js';

export interface ValidateOptions {
  json?: boolean;
  requireEnv?: string[];
  apiVersion?: string[];
}

/**
 * One-line summaries of the fields a deployer usually checks.
 */
export function describeManifest(manifest: ServiceManifest): string[] {
  const { spec } = manifest;
  const ports = (spec.ports ?? []).map((entry) => `${entry.port}/${entry.protocol}`);
  const routes = (spec.routes ?? []).map((route) => route.path);
  const lines = [
    `service:  ${manifest.metadata.name} (${spec.type}, ${spec.runtime.type})`,
    `replicas: ${spec.deploy.minReplicas}..${spec.deploy.maxReplicas} (${spec.deploy.strategy})`,
    `ports:    ${ports.length > 0 ? ports.join(', ') : '(none)'}`,
    `routes:   ${routes.length > 0 ? routes.join(', ') : '(none)'}`,
    `env:      ${(spec.env ?? []).map((entry) => entry.key).join(', ') || '(none)'}`,
    `build:    ${spec.build.dockerfile} in ${spec.build.context}`,
  ];
  return lines;
}

export async function runValidate(
  file: string,
  options: ValidateOptions,
  context: CliContext,
): Promise<void> {
  const result = await loadForCommand(file, context, {
    requiredEnvKeys: options.requireEnv,
    supportedApiVersions: options.apiVersion,
  });

  if (options.json) {
    const payload = result.ok
      ? { valid: true, manifest: result.manifest }
      : { valid: false, kind: result.error.kind, issues: result.error.issues };
    context.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);
    context.setExitCode(result.ok ? ExitCode.Ok : result.exitCode);
    return;
  }

  if (!result.ok) {
    reportLoadFailure(file, result, context);
    return;
  }

  context.stdout.write(`✓ ${file} is valid\n`);
  for (const line of describeManifest(result.manifest)) {
    context.stdout.write(`  ${line}\n`);
  }
  context.setExitCode(ExitCode.Ok);
}

export function createValidateCommand(context: CliContext): Command {
  return new Command('validate')
    .description('Validate a service manifest')
    .argument('<file>', 'Path to the manifest (YAML or JSON)')
    .option('-j, --json', 'Output the result as JSON')
    .option('--require-env <keys...>', 'Env keys that must be declared in spec.env')
    .option('--api-version <versions...>', 'Accepted apiVersion values')
    .addHelpText(
      'after',
      `
Exit codes:
  0  manifest is valid
  1  manifest is not a well-formed document, or cannot be read
  2  manifest violates the schema or an invariant

Examples:
  svc-manifest validate koyeb.yml
  svc-manifest validate koyeb.yml --require-env API_ID API_HASH BOT_TOKEN OWNER_ID
  svc-manifest validate koyeb.yml --json
`,
    )
    .action((file: string, options: ValidateOptions) => runValidate(file, options, context));
}
