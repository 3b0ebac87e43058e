import { LineCounter, parseDocument, stringify } from 'yaml';

import { MalformedInputError } from '../errors/manifestErrors.js';
import type { ManifestIssue } from '../interfaces/manifestIssue.js';
import { formatError } from '../utils/errorFormatting.js';

/**
 * Parses manifest text (YAML 1.2; JSON is accepted as YAML) into plain data.
 *
 * @param text - Raw document text
 * @returns The parsed document contents
 * @throws {MalformedInputError} On syntax errors, duplicate mapping keys,
 *   multiple documents or an empty document
 */
export function parseManifestDocument(text: string): unknown {
  const lineCounter = new LineCounter();
  const doc = parseDocument(text, { lineCounter, prettyErrors: false, uniqueKeys: true });

  if (doc.errors.length > 0) {
    const issues: ManifestIssue[] = doc.errors.map((error) => {
      const { line, col } = lineCounter.linePos(error.pos[0]);
      return { path: `${line}:${col}`, message: error.message };
    });
    throw new MalformedInputError(issues);
  }

  if (doc.contents === null) {
    throw new MalformedInputError([{ path: '', message: 'document is empty' }]);
  }

  try {
    return doc.toJS();
  } catch (error) {
    throw new MalformedInputError([{ path: '', message: formatError(error) }]);
  }
}

/**
 * Renders manifest data as YAML text that parses back to an equal value.
 */
export function stringifyManifestDocument(value: unknown): string {
  return stringify(value);
}
