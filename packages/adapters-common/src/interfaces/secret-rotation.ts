import type { CredentialSnapshot } from "../types/secret";

/**
 * Source of the current credentials of a rotated identity.
 * Implemented by the Vault AwsSecretsEngine (static-creds endpoint).
 */
export interface ICredentialSource {
  /**
   * Read the current key pair for a static role.
   *
   * @param mountPath - Mount path of the secrets engine
   * @param roleName - Name of the static role
   */
  readStaticCredentials(mountPath: string, roleName: string): Promise<CredentialSnapshot>;
}
