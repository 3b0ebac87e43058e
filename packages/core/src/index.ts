export {
  InvariantViolationError,
  MalformedInputError,
  ManifestError,
  type ManifestErrorKind,
  SchemaViolationError,
} from './errors/manifestErrors.js';
export {
  DEFAULT_SUPPORTED_API_VERSIONS,
  type ManifestIssue,
  type ManifestLoaderConfig,
} from './interfaces/index.js';
export {
  loadManifest,
  loadManifestFile,
  ManifestLoader,
  safeLoadManifest,
  type SafeLoadResult,
  serializeManifest,
} from './manifestLoader.js';
export * from './schemas/index.js';
export {
  type EnvReference,
  type EnvReferenceKind,
  type EnvResolution,
  type EnvSources,
  parseEnvReferences,
  type ResolvedEnvVar,
  resolveEnv,
  type UnresolvedEnvReference,
} from './services/envResolution.service.js';
export { checkManifestInvariants } from './services/invariants.service.js';
export { checkSchemaRules, type SchemaRuleOptions } from './services/schemaRules.service.js';
export { formatError, formatFieldPath } from './utils/errorFormatting.js';
