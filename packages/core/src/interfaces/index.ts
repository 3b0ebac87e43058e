export type { ManifestIssue } from './manifestIssue.js';
export {
  DEFAULT_SUPPORTED_API_VERSIONS,
  type ManifestLoaderConfig,
} from './manifestLoaderConfig.js';
