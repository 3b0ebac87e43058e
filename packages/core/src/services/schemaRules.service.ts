import type { ManifestIssue } from '../interfaces/manifestIssue.js';
import type { ServiceManifest } from '../schemas/index.js';

export interface SchemaRuleOptions {
  supportedApiVersions: readonly string[];
  requiredEnvKeys: readonly string[];
}

/**
 * Field-presence rules the zod schema cannot express on its own because they
 * depend on other fields or on loader configuration.
 * Any issue returned here is a schema violation.
 */
export function checkSchemaRules(
  manifest: ServiceManifest,
  options: SchemaRuleOptions,
): ManifestIssue[] {
  const issues: ManifestIssue[] = [];

  if (!options.supportedApiVersions.includes(manifest.apiVersion)) {
    issues.push({
      path: 'apiVersion',
      message: `unsupported apiVersion "${manifest.apiVersion}" (supported: ${options.supportedApiVersions.join(', ')})`,
    });
  }

  const { spec } = manifest;
  if (spec.type === 'web' && (spec.ports === undefined || spec.ports.length === 0)) {
    issues.push({
      path: 'spec.ports',
      message: 'at least one port is required when spec.type is "web"',
    });
  }

  const declaredKeys = new Set((spec.env ?? []).map((entry) => entry.key));
  for (const key of options.requiredEnvKeys) {
    if (!declaredKeys.has(key)) {
      issues.push({ path: 'spec.env', message: `missing required env key "${key}"` });
    }
  }

  return issues;
}
