// Client
export { VaultClient, VaultClientOptions, VaultMethod } from "./vault-client";
export { VaultApiError } from "./errors";

// AWS secrets engine
export { AwsSecretsEngine, normalizeMountPath } from "./aws-secrets-engine";
export { parseDurationSeconds } from "./duration";
