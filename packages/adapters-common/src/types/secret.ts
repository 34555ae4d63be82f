import type { AccessKeyPair } from "./identity";

/**
 * Lease metadata attached to a credential read.
 */
export interface LeaseMetadata {
  leaseId: string;
  leaseDurationSeconds: number;
  renewable: boolean;
}

/**
 * A point-in-time read of an identity's current key pair.
 * Superseded whenever the secrets service rotates the key.
 */
export interface CredentialSnapshot extends AccessKeyPair {
  lease: LeaseMetadata;
  readAt: Date;
}

/**
 * Root credentials and endpoints for an AWS secrets engine mount.
 */
export interface AwsRootConfig {
  accessKey: string;
  secretKey: string;
  region: string;
  /** IAM endpoint as reachable from the secrets service */
  iamEndpoint?: string;
  /** STS endpoint as reachable from the secrets service */
  stsEndpoint?: string;
}

/**
 * Rotation policy binding an IAM user to a rotation interval.
 */
export interface StaticRoleConfig {
  name: string;
  userName: string;
  rotationPeriodSeconds: number;
}

export interface StaticRoleInfo extends StaticRoleConfig {
  mountPath: string;
}

/**
 * Health of the secrets service.
 */
export interface SecretsEngineHealth {
  initialized: boolean;
  sealed: boolean;
  version?: string;
}
