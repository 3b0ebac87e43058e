import type { Logger } from 'pino';

/** apiVersion values accepted when none are configured */
export const DEFAULT_SUPPORTED_API_VERSIONS: readonly string[] = ['koyeb/v1'];

/**
 * Configuration object for a ManifestLoader instance.
 */
export interface ManifestLoaderConfig {
  /** Optional pino logger */
  logger?: Logger;

  /** Accepted `apiVersion` values (defaults to DEFAULT_SUPPORTED_API_VERSIONS) */
  supportedApiVersions?: readonly string[];

  /**
   * Env keys the deployed application reads at startup and that must be declared
   * in `spec.env` (e.g. `['API_ID', 'API_HASH', 'BOT_TOKEN', 'OWNER_ID']`).
   */
  requiredEnvKeys?: readonly string[];
}
