import { KeyturnError, KeyturnErrorCode } from "@keyturn/adapters-common";

/**
 * Non-2xx response from the Vault HTTP API.
 */
export class VaultApiError extends KeyturnError {
  readonly status: number;
  readonly errors: string[];

  constructor(method: string, path: string, status: number, errors: string[]) {
    const detail = errors.length > 0 ? `: ${errors.join("; ")}` : "";
    super(
      `Vault ${method} /v1/${path} failed with status ${status}${detail}`,
      VaultApiError.codeFor(status),
    );
    this.name = "VaultApiError";
    this.status = status;
    this.errors = errors;
  }

  private static codeFor(status: number): KeyturnErrorCode {
    if (status === 401 || status === 403) return KeyturnErrorCode.AUTH_FAILED;
    if (status === 404) return KeyturnErrorCode.NOT_FOUND;
    return KeyturnErrorCode.REQUEST_FAILED;
  }
}
