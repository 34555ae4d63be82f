// Interfaces
export type {
  IIdentityService,
  ISecretsEngine,
  ICredentialSource,
  IComputeProbe,
} from "./interfaces";

// Types
export type {
  UserInfo,
  AccessKeyPair,
  AccessKeyInfo,
  PolicyStatement,
  PolicyDocument,
  LeaseMetadata,
  CredentialSnapshot,
  AwsRootConfig,
  StaticRoleConfig,
  StaticRoleInfo,
  SecretsEngineHealth,
  ComputeInstanceSummary,
  LogCallback,
} from "./types";

// Errors
export {
  KeyturnError,
  KeyturnErrorCode,
  EndpointUnreachableError,
  AuthenticationError,
  ConfigError,
} from "./errors";

// Utilities
export { maskAccessKeyId, redactSecret } from "./utils";
