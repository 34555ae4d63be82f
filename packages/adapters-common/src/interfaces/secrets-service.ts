import type {
  AwsRootConfig,
  StaticRoleConfig,
  StaticRoleInfo,
  SecretsEngineHealth,
} from "../types/secret";

/**
 * Interface for the secrets-management service that owns rotation.
 * Implemented by the Vault AwsSecretsEngine.
 */
export interface ISecretsEngine {
  /**
   * Report whether the service is initialized and unsealed.
   */
  checkHealth(): Promise<SecretsEngineHealth>;

  /**
   * Check whether an AWS secrets engine is mounted at the path.
   */
  isMounted(mountPath: string): Promise<boolean>;

  /**
   * Mount an AWS secrets engine at the path.
   */
  mount(mountPath: string, options?: { description?: string }): Promise<void>;

  /**
   * Unmount the engine at the path, revoking everything under it.
   */
  unmount(mountPath: string): Promise<void>;

  /**
   * Configure the root credentials the engine uses to manage keys.
   */
  configureRoot(mountPath: string, config: AwsRootConfig): Promise<void>;

  /**
   * Create or update a static role (rotation policy).
   */
  writeStaticRole(mountPath: string, role: StaticRoleConfig): Promise<void>;

  /**
   * Read a static role.
   *
   * @returns The role, or undefined if it does not exist
   */
  readStaticRole(mountPath: string, name: string): Promise<StaticRoleInfo | undefined>;

  /**
   * Delete a static role.
   */
  deleteStaticRole(mountPath: string, name: string): Promise<void>;
}
