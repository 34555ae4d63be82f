/** SDK error names returned when a key pair is refused */
const AUTH_ERROR_NAMES = new Set([
  "AuthFailure",
  "UnauthorizedOperation",
  "InvalidClientTokenId",
  "InvalidAccessKeyId",
  "SignatureDoesNotMatch",
  "UnrecognizedClientException",
  "AccessDenied",
  "AccessDeniedException",
]);

/** Socket-level error codes raised when the endpoint cannot be reached */
const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ETIMEDOUT",
]);

export function isNotFoundError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "NoSuchEntityException" || error.name === "NoSuchEntity")
  );
}

export function isAuthError(error: unknown): boolean {
  return error instanceof Error && AUTH_ERROR_NAMES.has(error.name);
}

export function isConnectionError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }
  return "code" in error && typeof error.code === "string" && CONNECTION_ERROR_CODES.has(error.code);
}
