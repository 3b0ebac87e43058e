import {
  ManifestError,
  ManifestLoader,
  type ManifestLoaderConfig,
  type ServiceManifest,
} from '@svc-manifest/core';

import type { CliContext } from '../context.js';

import { printManifestError } from './errorFormatter.js';
import { ExitCode, exitCodeFor } from './exitCodes.js';

export type CommandLoadResult =
  | { ok: true; manifest: ServiceManifest }
  | { ok: false; error: ManifestError; exitCode: ExitCode };

/**
 * Loads a manifest file with the command's logger, mapping manifest errors to exit codes.
 * Other errors propagate.
 */
export async function loadForCommand(
  file: string,
  context: CliContext,
  config: Omit<ManifestLoaderConfig, 'logger'> = {},
): Promise<CommandLoadResult> {
  const loader = new ManifestLoader({ ...config, logger: context.logger });
  try {
    return { ok: true, manifest: await loader.loadFile(file) };
  } catch (error) {
    if (error instanceof ManifestError) {
      return { ok: false, error, exitCode: exitCodeFor(error.kind) };
    }
    throw error;
  }
}

/** Prints the failure of `loadForCommand` in text form and records its exit code */
export function reportLoadFailure(
  file: string,
  result: Extract<CommandLoadResult, { ok: false }>,
  context: CliContext,
): void {
  printManifestError(context.stderr, file, result.error);
  context.setExitCode(result.exitCode);
}
