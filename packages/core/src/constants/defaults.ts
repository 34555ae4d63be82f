/**
 * Default values for the rotation demo.
 *
 * These match the docker-compose stack: a dev-mode Vault started with the
 * root token "root" and a LocalStack container exposing IAM, STS and EC2.
 */

// Endpoints
export const DEFAULT_SECRETS_ENDPOINT = "http://127.0.0.1:8200";
export const DEFAULT_SECRETS_TOKEN = "root";
export const DEFAULT_SIMULATOR_ENDPOINT = "http://localhost:4566";
export const DEFAULT_SIMULATOR_CREDENTIAL = "test";
export const DEFAULT_REGION = "us-east-1";

// Secrets engine layout
export const DEFAULT_MOUNT_PATH = "aws";
export const DEFAULT_ROLE_NAME = "app-credentials";

// Identities
export const DEFAULT_MANAGED_USER = "app-user";
export const DEFAULT_MANAGER_USER = "rotation-manager";

// Rotation timing (seconds). Vault rejects static role periods under a minute.
export const DEFAULT_ROTATION_INTERVAL_SECONDS = 61;
export const DEFAULT_SAFETY_MARGIN_SECONDS = 4;
export const MIN_ROTATION_INTERVAL_SECONDS = 60;

// State
export const DEFAULT_STATE_FILE = ".keyturn/state.json";
export const STATE_FILE_MODE = 0o600;
