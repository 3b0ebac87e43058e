import { describe, expect, it } from 'vitest';

import {
  BuildSchema,
  DeploySchema,
  EnvVarSchema,
  HealthCheckSchema,
  PortSchema,
  RouteSchema,
  ServiceManifestSchema,
} from '../src/schemas/index.js';

import { createManifestInput } from './helpers/fixtures.js';

describe('Schema Validation Tests', () => {
  describe('ServiceManifestSchema', () => {
    it('validates the repository manifest', () => {
      expect(() => ServiceManifestSchema.parse(createManifestInput())).not.toThrow();
    });

    it('rejects an unknown kind', () => {
      const input = { ...createManifestInput(), kind: 'Job' };
      expect(() => ServiceManifestSchema.parse(input)).toThrow();
    });

    it('rejects an empty service name', () => {
      const input = { ...createManifestInput(), metadata: { name: '' } };
      expect(() => ServiceManifestSchema.parse(input)).toThrow();
    });

    it('rejects unknown top-level fields', () => {
      const input = { ...createManifestInput(), status: 'healthy' };
      expect(() => ServiceManifestSchema.parse(input)).toThrow();
    });
  });

  describe('EnvVarSchema', () => {
    it('accepts substitution references as values', () => {
      expect(() => EnvVarSchema.parse({ key: 'API_ID', value: '$API_ID' })).not.toThrow();
      expect(() => EnvVarSchema.parse({ key: '_private', value: '' })).not.toThrow();
    });

    it('rejects malformed keys', () => {
      expect(() => EnvVarSchema.parse({ key: '1ST', value: 'x' })).toThrow();
      expect(() => EnvVarSchema.parse({ key: 'BOT-TOKEN', value: 'x' })).toThrow();
      expect(() => EnvVarSchema.parse({ key: '', value: 'x' })).toThrow();
    });

    it('rejects non-string values', () => {
      expect(() => EnvVarSchema.parse({ key: 'OWNER_ID', value: 12345 })).toThrow();
    });
  });

  describe('PortSchema', () => {
    it('accepts the bounds of the port range', () => {
      expect(() => PortSchema.parse({ port: 1, protocol: 'TCP' })).not.toThrow();
      expect(() => PortSchema.parse({ port: 65535, protocol: 'UDP' })).not.toThrow();
    });

    it('rejects fractional ports', () => {
      expect(() => PortSchema.parse({ port: 80.5, protocol: 'TCP' })).toThrow();
    });

    it('rejects lowercase protocols', () => {
      expect(() => PortSchema.parse({ port: 80, protocol: 'tcp' })).toThrow();
    });
  });

  describe('RouteSchema', () => {
    it('requires a leading slash', () => {
      expect(() => RouteSchema.parse({ path: '/api' })).not.toThrow();
      const result = RouteSchema.safeParse({ path: 'api' });
      expect(result.success).toBe(false);
      expect(result.error?.issues.map((issue) => issue.message)).toEqual([
        'path must start with "/"',
      ]);
    });
  });

  describe('DeploySchema', () => {
    it('accepts scale-to-zero', () => {
      const deploy = { maxPendingDeployments: 0, maxReplicas: 3, minReplicas: 0, strategy: 'rolling' };
      expect(() => DeploySchema.parse(deploy)).not.toThrow();
    });

    it('rejects zero maxReplicas', () => {
      const deploy = { maxPendingDeployments: 1, maxReplicas: 0, minReplicas: 0, strategy: 'rolling' };
      expect(() => DeploySchema.parse(deploy)).toThrow();
    });

    it('rejects unknown strategies', () => {
      const deploy = { maxPendingDeployments: 1, maxReplicas: 1, minReplicas: 1, strategy: 'canary' };
      expect(() => DeploySchema.parse(deploy)).toThrow();
    });
  });

  describe('BuildSchema', () => {
    it('rejects absolute paths', () => {
      expect(() => BuildSchema.parse({ context: '/srv/app', dockerfile: 'Dockerfile' })).toThrow(
        'must be a relative path',
      );
      expect(() => BuildSchema.parse({ context: '.', dockerfile: 'C:\\Dockerfile' })).toThrow(
        'must be a relative path',
      );
    });
  });

  describe('HealthCheckSchema', () => {
    it('requires a path for http checks', () => {
      expect(() => HealthCheckSchema.parse({ type: 'tcp', port: 8080 })).not.toThrow();
      expect(() =>
        HealthCheckSchema.parse({ type: 'http', port: 8080, path: '/health' }),
      ).not.toThrow();
      expect(() => HealthCheckSchema.parse({ type: 'http', port: 8080 })).toThrow();
    });

    it('rejects unknown check types', () => {
      expect(() => HealthCheckSchema.parse({ type: 'grpc', port: 8080 })).toThrow();
    });
  });
});
