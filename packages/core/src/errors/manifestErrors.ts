import type { ManifestIssue } from '../interfaces/manifestIssue.js';

export type ManifestErrorKind = 'MalformedInput' | 'SchemaViolation' | 'InvariantViolation';

function summarize(title: string, issues: readonly ManifestIssue[]): string {
  const lines = issues.map((issue) =>
    issue.path ? `${issue.path}: ${issue.message}` : issue.message,
  );
  return [title, ...lines].join('\n  ');
}

/**
 * Base class for every failure raised while loading a manifest.
 * Carries all issues found by the failing stage.
 */
export abstract class ManifestError extends Error {
  abstract readonly kind: ManifestErrorKind;
  readonly issues: readonly ManifestIssue[];

  protected constructor(title: string, issues: readonly ManifestIssue[]) {
    super(summarize(title, issues));
    this.name = new.target.name;
    this.issues = issues;
  }
}

/** The input text is not a well-formed YAML/JSON document */
export class MalformedInputError extends ManifestError {
  readonly kind = 'MalformedInput';

  constructor(issues: readonly ManifestIssue[]) {
    super('Malformed manifest document', issues);
  }
}

/** A field is missing, unknown, of the wrong type or out of range */
export class SchemaViolationError extends ManifestError {
  readonly kind = 'SchemaViolation';

  constructor(issues: readonly ManifestIssue[]) {
    super('Manifest does not match the schema', issues);
  }
}

/** Fields are individually valid but contradict each other */
export class InvariantViolationError extends ManifestError {
  readonly kind = 'InvariantViolation';

  constructor(issues: readonly ManifestIssue[]) {
    super('Manifest violates an invariant', issues);
  }
}
