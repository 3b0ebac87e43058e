import { posix } from 'node:path';

import type { ManifestIssue } from '../interfaces/manifestIssue.js';
import type { Build, ServiceManifest } from '../schemas/index.js';

/**
 * Reports the first position of every value that occurs more than once.
 */
function findDuplicates<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
): { index: number; firstIndex: number; key: string }[] {
  const seen = new Map<string, number>();
  const duplicates: { index: number; firstIndex: number; key: string }[] = [];

  items.forEach((item, index) => {
    const key = keyOf(item);
    const firstIndex = seen.get(key);
    if (firstIndex === undefined) {
      seen.set(key, index);
    } else {
      duplicates.push({ index, firstIndex, key });
    }
  });

  return duplicates;
}

function checkBuildPaths(build: Build): ManifestIssue[] {
  // dockerfile is relative to the build context
  const target = posix.normalize(build.dockerfile.replace(/\\/g, '/'));

  if (target === '.' || target === './') {
    return [
      {
        path: 'spec.build.dockerfile',
        message: `dockerfile "${build.dockerfile}" resolves to the build context itself`,
      },
    ];
  }
  if (target === '..' || target.startsWith('../')) {
    return [
      {
        path: 'spec.build.dockerfile',
        message: `dockerfile "${build.dockerfile}" resolves outside build context "${build.context}"`,
      },
    ];
  }
  return [];
}

/**
 * Cross-field checks run on a manifest that already matches the schema.
 * Any issue returned here is an invariant violation.
 *
 * @param manifest - Schema-valid manifest
 * @returns Issues in document order; empty when the manifest is consistent
 */
export function checkManifestInvariants(manifest: ServiceManifest): ManifestIssue[] {
  const issues: ManifestIssue[] = [];
  const { spec } = manifest;

  const env = spec.env ?? [];
  for (const duplicate of findDuplicates(env, (entry) => entry.key)) {
    issues.push({
      path: `spec.env[${duplicate.index}].key`,
      message: `duplicate env key "${duplicate.key}" (first declared at spec.env[${duplicate.firstIndex}])`,
    });
  }

  const ports = spec.ports ?? [];
  for (const duplicate of findDuplicates(ports, (entry) => `${entry.port}/${entry.protocol}`)) {
    issues.push({
      path: `spec.ports[${duplicate.index}]`,
      message: `duplicate port ${duplicate.key}`,
    });
  }

  const declaredPorts = new Set(ports.map((entry) => entry.port));

  const routes = spec.routes ?? [];
  for (const duplicate of findDuplicates(routes, (entry) => entry.path)) {
    issues.push({
      path: `spec.routes[${duplicate.index}].path`,
      message: `duplicate route "${duplicate.key}"`,
    });
  }
  routes.forEach((route, index) => {
    if (route.port !== undefined && !declaredPorts.has(route.port)) {
      issues.push({
        path: `spec.routes[${index}].port`,
        message: `route targets port ${route.port} which is not declared in spec.ports`,
      });
    }
  });

  (spec.healthChecks ?? []).forEach((check, index) => {
    if (!declaredPorts.has(check.port)) {
      issues.push({
        path: `spec.healthChecks[${index}].port`,
        message: `health check targets port ${check.port} which is not declared in spec.ports`,
      });
    }
  });

  for (const duplicate of findDuplicates(spec.regions ?? [], (region) => region)) {
    issues.push({
      path: `spec.regions[${duplicate.index}]`,
      message: `duplicate region "${duplicate.key}"`,
    });
  }

  const { deploy } = spec;
  if (deploy.minReplicas > deploy.maxReplicas) {
    issues.push({
      path: 'spec.deploy.minReplicas',
      message: `minReplicas (${deploy.minReplicas}) must not exceed maxReplicas (${deploy.maxReplicas})`,
    });
  }

  issues.push(...checkBuildPaths(spec.build));

  return issues;
}
