import {
  KeyturnErrorCode,
  type IIdentityService,
  type ISecretsEngine,
  type SecretsEngineHealth,
} from "@keyturn/adapters-common";
import { ProvisioningError, errorMessage } from "../errors";

export interface PreflightResult {
  secrets: SecretsEngineHealth;
  userCount: number;
}

/**
 * Confirms both endpoints answer before anything is created: the secrets
 * service must be initialised and unsealed, and the simulator must serve
 * IAM calls.
 */
export async function runPreflight(services: {
  identity: IIdentityService;
  secrets: ISecretsEngine;
}): Promise<PreflightResult> {
  let health: SecretsEngineHealth;
  try {
    health = await services.secrets.checkHealth();
  } catch (error) {
    throw new ProvisioningError(
      `Secrets service is unreachable: ${errorMessage(error)}`,
      KeyturnErrorCode.ENDPOINT_UNREACHABLE,
      { cause: error }
    );
  }
  if (!health.initialized) {
    throw new ProvisioningError("Secrets service is not initialized", KeyturnErrorCode.ENDPOINT_UNREACHABLE);
  }
  if (health.sealed) {
    throw new ProvisioningError("Secrets service is sealed", KeyturnErrorCode.ENDPOINT_UNREACHABLE);
  }

  try {
    const users = await services.identity.listUsers();
    return { secrets: health, userCount: users.length };
  } catch (error) {
    throw new ProvisioningError(
      `Cloud simulator is unreachable: ${errorMessage(error)}`,
      KeyturnErrorCode.ENDPOINT_UNREACHABLE,
      { cause: error }
    );
  }
}
