/**
 * Standardized error output for CLI commands.
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Detail or next action 1
 *   → Detail or next action 2
 */

import type { ManifestError } from '@svc-manifest/core';

import type { OutputStream } from '../context.js';

/**
 * Print a standardized error message.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param details - Optional lines printed below the title
 *
 * @example
 * printError(process.stderr, 'SchemaViolation in service.yaml (1 issue)', [
 *   'spec.ports: at least one port is required when spec.type is "web"',
 * ]);
 */
export function printError(stream: OutputStream, title: string, details: string[] = []): void {
  stream.write(`✗ ${title}\n`);

  if (details.length > 0) {
    stream.write('\n');
    for (const line of details) {
      stream.write(`→ ${line}\n`);
    }
  }
}

export function printManifestError(stream: OutputStream, file: string, error: ManifestError): void {
  const count = error.issues.length;
  printError(
    stream,
    `${error.kind} in ${file} (${count} ${count === 1 ? 'issue' : 'issues'})`,
    error.issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)),
  );
}
