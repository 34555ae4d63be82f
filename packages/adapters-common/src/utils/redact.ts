const SENSITIVE_PLACEHOLDER = "<sensitive>";

/**
 * Mask an access key id for display, keeping the first and last four
 * characters.
 *
 * @example maskAccessKeyId("AKIAEXAMPLE1234WXYZ") // "AKIA****WXYZ"
 */
export function maskAccessKeyId(accessKeyId: string): string {
  if (accessKeyId.length <= 8) {
    return "****";
  }
  return `${accessKeyId.slice(0, 4)}****${accessKeyId.slice(-4)}`;
}

/**
 * Replace a secret value with a fixed placeholder.
 */
export function redactSecret(value: string | undefined): string {
  return value ? SENSITIVE_PLACEHOLDER : "";
}
