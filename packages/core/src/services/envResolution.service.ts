import type { EnvVar, ServiceManifest } from '../schemas/index.js';

export type EnvReferenceKind = 'variable' | 'secret';

/** A substitution placeholder found inside an env value */
export interface EnvReference {
  kind: EnvReferenceKind;
  name: string;
  /** The placeholder exactly as written, e.g. `${API_ID}` */
  token: string;
}

/** Lookup tables used to substitute references */
export interface EnvSources {
  variables?: Readonly<Record<string, string | undefined>>;
  secrets?: Readonly<Record<string, string | undefined>>;
}

export interface ResolvedEnvVar extends EnvVar {
  references: EnvReference[];
}

export interface UnresolvedEnvReference {
  key: string;
  reference: EnvReference;
}

export interface EnvResolution {
  entries: ResolvedEnvVar[];
  unresolved: UnresolvedEnvReference[];
}

const REFERENCE_PATTERN =
  /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)|\{\{\s*secret\.([A-Za-z0-9_.-]+)\s*\}\}/g;

interface ReferenceMatch {
  reference: EnvReference;
  start: number;
  end: number;
}

function scanReferences(value: string): ReferenceMatch[] {
  const matches: ReferenceMatch[] = [];
  for (const match of value.matchAll(REFERENCE_PATTERN)) {
    const [token, braced, bare, secret] = match;
    const start = match.index ?? 0;
    const reference: EnvReference =
      secret !== undefined
        ? { kind: 'secret', name: secret, token }
        : { kind: 'variable', name: braced ?? bare, token };
    matches.push({ reference, start, end: start + token.length });
  }
  return matches;
}

/**
 * Lists the `$NAME`, `${NAME}` and `{{ secret.NAME }}` references in an env value.
 *
 * @example
 * ```typescript
 * parseEnvReferences('postgres://${DB_USER}@db');
 * // [{ kind: 'variable', name: 'DB_USER', token: '${DB_USER}' }]
 * ```
 */
export function parseEnvReferences(value: string): EnvReference[] {
  return scanReferences(value).map((match) => match.reference);
}

/**
 * Substitutes env references with values from the given sources.
 * References without a value are left verbatim and reported in `unresolved`.
 */
export function resolveEnv(manifest: ServiceManifest, sources: EnvSources = {}): EnvResolution {
  const entries: ResolvedEnvVar[] = [];
  const unresolved: UnresolvedEnvReference[] = [];

  for (const { key, value } of manifest.spec.env ?? []) {
    const matches = scanReferences(value);
    let resolved = '';
    let cursor = 0;

    for (const { reference, start, end } of matches) {
      const table = reference.kind === 'secret' ? sources.secrets : sources.variables;
      const replacement = table?.[reference.name];
      resolved += value.slice(cursor, start);
      if (replacement === undefined) {
        resolved += reference.token;
        unresolved.push({ key, reference });
      } else {
        resolved += replacement;
      }
      cursor = end;
    }
    resolved += value.slice(cursor);

    entries.push({ key, value: resolved, references: matches.map((match) => match.reference) });
  }

  return { entries, unresolved };
}
