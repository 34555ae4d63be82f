import { KeyturnError, KeyturnErrorCode } from "@keyturn/adapters-common";

/**
 * Raised for manifest, dependency and resource failures during
 * provisioning. `logicalId` names the resource at fault, when there is one.
 */
export class ProvisioningError extends KeyturnError {
  readonly logicalId?: string;

  constructor(
    message: string,
    code: KeyturnErrorCode,
    options?: { logicalId?: string; cause?: unknown }
  ) {
    super(message, code, { cause: options?.cause });
    this.name = "ProvisioningError";
    this.logicalId = options?.logicalId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
