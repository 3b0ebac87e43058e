import type { z } from 'zod';

import type { ManifestIssue } from '../interfaces/manifestIssue.js';

/**
 * Formats an unknown error into a readable string message.
 * Handles Error objects, strings, and other types safely.
 *
 * @param error - The error to format (can be Error, string, or any other type)
 * @returns Formatted error message string
 *
 * @example
 * ```typescript
 * try {
 *   await readFile(path, 'utf8');
 * } catch (error) {
 *   throw new Error(`Cannot read manifest: ${formatError(error)}`);
 * }
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

type ZodIssue = z.ZodError['issues'][number];

/**
 * Renders a field path in `spec.ports[0].port` notation.
 */
export function formatFieldPath(path: readonly PropertyKey[]): string {
  let result = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      result += `[${segment}]`;
    } else {
      const name = typeof segment === 'symbol' ? String(segment) : segment;
      result += result ? `.${name}` : name;
    }
  }
  return result;
}

function lookup(input: unknown, path: readonly PropertyKey[]): { found: boolean; value: unknown } {
  let current: unknown = input;
  for (const segment of path) {
    if (typeof current !== 'object' || current === null) {
      return { found: false, value: undefined };
    }
    if (!(segment in current)) {
      return { found: false, value: undefined };
    }
    current = Reflect.get(current, segment);
  }
  return { found: true, value: current };
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return typeof value;
}

/**
 * Converts zod issues into manifest issues, resolving each against the raw input
 * so that missing and unknown fields get their own wording.
 */
export function toManifestIssues(
  issues: readonly ZodIssue[],
  input: unknown,
): ManifestIssue[] {
  const result: ManifestIssue[] = [];

  for (const issue of issues) {
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        result.push({ path: formatFieldPath([...issue.path, key]), message: 'unknown field' });
      }
      continue;
    }

    const path = formatFieldPath(issue.path);
    const actual = lookup(input, issue.path);

    if (
      (issue.code === 'invalid_type' || issue.code === 'invalid_value') &&
      (!actual.found || actual.value === undefined)
    ) {
      result.push({ path, message: 'missing required field' });
      continue;
    }

    if (issue.code === 'invalid_type') {
      result.push({
        path,
        message: `expected ${issue.expected}, received ${describeValue(actual.value)}`,
      });
      continue;
    }

    if (issue.code === 'invalid_value') {
      const allowed = issue.values.map((value) => String(value)).join(', ');
      result.push({
        path,
        message: `expected one of: ${allowed}, received ${describeValue(actual.value)}`,
      });
      continue;
    }

    result.push({ path, message: issue.message });
  }

  return result;
}
