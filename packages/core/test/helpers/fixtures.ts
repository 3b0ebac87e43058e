import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import type { ServiceManifest } from '../../src/schemas/index.js';

export const fixturePath = (name: string): string =>
  fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

export const readFixture = (name: string): string => readFileSync(fixturePath(name), 'utf8');

/**
 * Fresh, mutable copy of the repository's service manifest as plain data.
 */
export const createManifestInput = (): ServiceManifest => ({
  apiVersion: 'koyeb/v1',
  kind: 'Service',
  metadata: { name: 'telegram-url-uploader-bot' },
  spec: {
    type: 'web',
    env: [
      { key: 'API_ID', value: '$API_ID' },
      { key: 'API_HASH', value: '$API_HASH' },
      { key: 'BOT_TOKEN', value: '$BOT_TOKEN' },
      { key: 'OWNER_ID', value: '$OWNER_ID' },
    ],
    ports: [{ port: 8080, protocol: 'TCP' }],
    routes: [{ path: '/' }],
    deploy: {
      maxPendingDeployments: 1,
      maxReplicas: 1,
      minReplicas: 1,
      strategy: 'rolling',
    },
    build: { context: '.', dockerfile: 'Dockerfile' },
    runtime: { type: 'docker' },
  },
});
