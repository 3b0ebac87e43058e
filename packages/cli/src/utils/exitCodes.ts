import type { ManifestErrorKind } from '@svc-manifest/core';

export const ExitCode = {
  Ok: 0,
  Failure: 1,
  MalformedInput: 1,
  Violation: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(kind: ManifestErrorKind): ExitCode {
  return kind === 'MalformedInput' ? ExitCode.MalformedInput : ExitCode.Violation;
}
