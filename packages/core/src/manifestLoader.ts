import { readFile } from 'node:fs/promises';

import { type Logger, pino } from 'pino';

import {
  InvariantViolationError,
  type ManifestError,
  MalformedInputError,
  SchemaViolationError,
} from './errors/manifestErrors.js';
import {
  DEFAULT_SUPPORTED_API_VERSIONS,
  type ManifestLoaderConfig,
} from './interfaces/manifestLoaderConfig.js';
import { type ServiceManifest, ServiceManifestSchema } from './schemas/index.js';
import {
  parseManifestDocument,
  stringifyManifestDocument,
} from './services/document.service.js';
import { checkManifestInvariants } from './services/invariants.service.js';
import { checkSchemaRules } from './services/schemaRules.service.js';
import { deepFreeze } from './utils/deepFreeze.js';
import { formatError, toManifestIssues } from './utils/errorFormatting.js';

export type SafeLoadResult =
  | { success: true; manifest: ServiceManifest }
  | { success: false; error: ManifestError };

/**
 * Loads and validates service deployment manifests.
 *
 * Validation runs in stages and stops at the first failing stage, reporting all
 * of that stage's issues: document parse (MalformedInput), schema and schema
 * rules (SchemaViolation), cross-field invariants (InvariantViolation).
 *
 * @example
 * ```typescript
 * const loader = new ManifestLoader({
 *   requiredEnvKeys: ['API_ID', 'API_HASH', 'BOT_TOKEN', 'OWNER_ID'],
 * });
 *
 * const manifest = loader.load(text);
 * console.log(manifest.spec.deploy.maxReplicas);
 * ```
 */
export class ManifestLoader {
  private logger: Logger;
  private supportedApiVersions: readonly string[];
  private requiredEnvKeys: readonly string[];

  /**
   * Creates a new loader.
   *
   * @param config - Optional logger, accepted apiVersions and required env keys
   */
  constructor(config: ManifestLoaderConfig = {}) {
    this.logger = config.logger ?? pino({ enabled: false });
    this.supportedApiVersions = config.supportedApiVersions ?? DEFAULT_SUPPORTED_API_VERSIONS;
    this.requiredEnvKeys = config.requiredEnvKeys ?? [];
  }

  /**
   * Parses and validates manifest text.
   *
   * @param text - Raw YAML or JSON document
   * @returns The validated manifest, deep-frozen
   * @throws {MalformedInputError} When the text is not a well-formed document
   * @throws {SchemaViolationError} When a field is missing, unknown or invalid
   * @throws {InvariantViolationError} When fields contradict each other
   */
  load(text: string): ServiceManifest {
    this.logger.debug({ length: text.length }, 'parsing manifest document');
    let document: unknown;
    try {
      document = parseManifestDocument(text);
    } catch (error) {
      if (error instanceof MalformedInputError) {
        this.logger.warn({ issues: error.issues }, 'malformed manifest document');
      }
      throw error;
    }
    return this.validate(document);
  }

  /**
   * Validates an already parsed manifest value.
   *
   * @param value - Parsed document, e.g. from JSON.parse
   * @returns The validated manifest, deep-frozen
   * @throws {SchemaViolationError | InvariantViolationError}
   */
  validate(value: unknown): ServiceManifest {
    const parsed = ServiceManifestSchema.safeParse(value);
    if (!parsed.success) {
      const issues = toManifestIssues(parsed.error.issues, value);
      this.logger.warn({ issues }, 'manifest does not match the schema');
      throw new SchemaViolationError(issues);
    }
    const manifest = parsed.data;

    const ruleIssues = checkSchemaRules(manifest, {
      supportedApiVersions: this.supportedApiVersions,
      requiredEnvKeys: this.requiredEnvKeys,
    });
    if (ruleIssues.length > 0) {
      this.logger.warn({ issues: ruleIssues }, 'manifest does not match the schema');
      throw new SchemaViolationError(ruleIssues);
    }

    const invariantIssues = checkManifestInvariants(manifest);
    if (invariantIssues.length > 0) {
      this.logger.warn({ issues: invariantIssues }, 'manifest violates invariants');
      throw new InvariantViolationError(invariantIssues);
    }

    this.logger.info(
      { name: manifest.metadata.name, type: manifest.spec.type },
      'manifest loaded',
    );
    return deepFreeze(manifest);
  }

  /**
   * Like `load`, but returns the failure instead of throwing it.
   * Errors other than manifest errors are still thrown.
   */
  safeLoad(text: string): SafeLoadResult {
    try {
      return { success: true, manifest: this.load(text) };
    } catch (error) {
      if (
        error instanceof MalformedInputError ||
        error instanceof SchemaViolationError ||
        error instanceof InvariantViolationError
      ) {
        return { success: false, error };
      }
      throw error;
    }
  }

  /**
   * Renders a manifest as YAML such that `load(serialize(manifest))` equals `manifest`.
   */
  serialize(manifest: ServiceManifest): string {
    return stringifyManifestDocument(manifest);
  }

  /**
   * Reads a UTF-8 manifest file and loads it.
   *
   * @throws {MalformedInputError} When the file cannot be read, or as `load`
   */
  async loadFile(path: string): Promise<ServiceManifest> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      this.logger.warn({ path, err: error }, 'cannot read manifest file');
      throw new MalformedInputError([
        { path: '', message: `cannot read ${path}: ${formatError(error)}` },
      ]);
    }
    return this.load(text);
  }
}

const defaultLoader = new ManifestLoader();

/** Loads manifest text with the default loader configuration */
export function loadManifest(text: string, config?: ManifestLoaderConfig): ServiceManifest {
  return (config ? new ManifestLoader(config) : defaultLoader).load(text);
}

export function safeLoadManifest(text: string, config?: ManifestLoaderConfig): SafeLoadResult {
  return (config ? new ManifestLoader(config) : defaultLoader).safeLoad(text);
}

export function serializeManifest(manifest: ServiceManifest): string {
  return defaultLoader.serialize(manifest);
}

export function loadManifestFile(
  path: string,
  config?: ManifestLoaderConfig,
): Promise<ServiceManifest> {
  return (config ? new ManifestLoader(config) : defaultLoader).loadFile(path);
}
