export {
  NonEmptyStringSchema,
  PortNumberSchema,
  RelativePathSchema,
  UrlPathSchema,
} from './common.schema.js';
export {
  BuildSchema,
  RuntimeSchema,
  RuntimeTypeSchema,
  type Build,
  type Runtime,
  type RuntimeType,
} from './manifest/build.schema.js';
export {
  DeploySchema,
  DeployStrategySchema,
  type Deploy,
  type DeployStrategy,
} from './manifest/deploy.schema.js';
export { ENV_KEY_PATTERN, EnvVarSchema, type EnvVar } from './manifest/env.schema.js';
export {
  HealthCheckSchema,
  HttpHealthCheckSchema,
  PortProtocolSchema,
  PortSchema,
  RouteSchema,
  TcpHealthCheckSchema,
  type HealthCheck,
  type Port,
  type PortProtocol,
  type Route,
} from './manifest/networking.schema.js';
export {
  ServiceKindSchema,
  ServiceManifestSchema,
  ServiceMetadataSchema,
  ServiceSpecSchema,
  ServiceTypeSchema,
  type ServiceKind,
  type ServiceManifest,
  type ServiceMetadata,
  type ServiceSpec,
  type ServiceType,
} from './manifest/serviceManifest.schema.js';
