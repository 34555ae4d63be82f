export type {
  UserInfo,
  AccessKeyPair,
  AccessKeyInfo,
  PolicyStatement,
  PolicyDocument,
} from "./identity";
export type {
  LeaseMetadata,
  CredentialSnapshot,
  AwsRootConfig,
  StaticRoleConfig,
  StaticRoleInfo,
  SecretsEngineHealth,
} from "./secret";
export type { ComputeInstanceSummary } from "./compute";
export type { LogCallback } from "./logging";
