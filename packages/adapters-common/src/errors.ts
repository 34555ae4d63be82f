// ---------------------------------------------------------------------------
// Error hierarchy shared by every keyturn package
// ---------------------------------------------------------------------------

export enum KeyturnErrorCode {
  ENDPOINT_UNREACHABLE = "ENDPOINT_UNREACHABLE",
  AUTH_FAILED = "AUTH_FAILED",
  NOT_FOUND = "NOT_FOUND",
  INVALID_RESPONSE = "INVALID_RESPONSE",
  REQUEST_FAILED = "REQUEST_FAILED",
  INVALID_CONFIG = "INVALID_CONFIG",
  INVALID_MANIFEST = "INVALID_MANIFEST",
  DEPENDENCY_MISSING = "DEPENDENCY_MISSING",
  DEPENDENCY_CYCLE = "DEPENDENCY_CYCLE",
  RESOURCE_FAILED = "RESOURCE_FAILED",
}

export class KeyturnError extends Error {
  readonly code: KeyturnErrorCode;

  constructor(message: string, code: KeyturnErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "KeyturnError";
    this.code = code;
  }
}

/**
 * The secrets service or the simulator could not be reached at all.
 */
export class EndpointUnreachableError extends KeyturnError {
  readonly endpoint: string;

  constructor(endpoint: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Endpoint ${endpoint} is unreachable${reason}`, KeyturnErrorCode.ENDPOINT_UNREACHABLE, options);
    this.name = "EndpointUnreachableError";
    this.endpoint = endpoint;
  }
}

/**
 * Credentials were refused by the remote API.
 */
export class AuthenticationError extends KeyturnError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, KeyturnErrorCode.AUTH_FAILED, options);
    this.name = "AuthenticationError";
  }
}

export class ConfigError extends KeyturnError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, KeyturnErrorCode.INVALID_CONFIG);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
