import { KeyturnErrorCode } from "@keyturn/adapters-common";
import { ProvisioningError } from "../errors";
import { ManifestSchema, type Manifest } from "./types";

/**
 * Validates a manifest document.
 *
 * @throws ProvisioningError with code INVALID_MANIFEST describing every issue
 */
export function parseManifest(input: unknown): Manifest {
  const result = ManifestSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new ProvisioningError(
      `Invalid manifest: ${issues.join("; ")}`,
      KeyturnErrorCode.INVALID_MANIFEST
    );
  }
  return result.data;
}
