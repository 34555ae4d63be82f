import { z } from "zod";
import { ConfigError } from "@keyturn/adapters-common";
import {
  DEFAULT_SECRETS_ENDPOINT,
  DEFAULT_SECRETS_TOKEN,
  DEFAULT_SIMULATOR_ENDPOINT,
  DEFAULT_SIMULATOR_CREDENTIAL,
  DEFAULT_REGION,
  DEFAULT_MOUNT_PATH,
  DEFAULT_ROLE_NAME,
  DEFAULT_MANAGED_USER,
  DEFAULT_MANAGER_USER,
  DEFAULT_ROTATION_INTERVAL_SECONDS,
  DEFAULT_SAFETY_MARGIN_SECONDS,
  MIN_ROTATION_INTERVAL_SECONDS,
  DEFAULT_STATE_FILE,
} from "./constants";
import type { RotationManifestParams } from "./manifest";

const iamNameSchema = z
  .string()
  .regex(/^[\w+=,.@-]{1,64}$/, "Must be 1-64 characters of letters, digits and +=,.@_-");

const vaultPathSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*(\/[A-Za-z0-9_.-]+)*$/, "Must be a relative path without leading or trailing slashes");

export const RotationDemoConfigSchema = z.object({
  secretsEndpoint: z.string().url().default(DEFAULT_SECRETS_ENDPOINT),
  secretsToken: z.string().min(1).default(DEFAULT_SECRETS_TOKEN),
  secretsNamespace: z.string().min(1).optional(),
  simulatorEndpoint: z.string().url().default(DEFAULT_SIMULATOR_ENDPOINT),
  // The secrets engine may reach the simulator under a different host
  // (for example a compose service name) than this process does.
  engineSimulatorEndpoint: z.string().url().optional(),
  simulatorAccessKeyId: z.string().min(1).default(DEFAULT_SIMULATOR_CREDENTIAL),
  simulatorSecretAccessKey: z.string().min(1).default(DEFAULT_SIMULATOR_CREDENTIAL),
  region: z.string().min(1).default(DEFAULT_REGION),
  mountPath: vaultPathSchema.default(DEFAULT_MOUNT_PATH),
  roleName: vaultPathSchema.default(DEFAULT_ROLE_NAME),
  managedUserName: iamNameSchema.default(DEFAULT_MANAGED_USER),
  managerUserName: iamNameSchema.default(DEFAULT_MANAGER_USER),
  rotationIntervalSeconds: z.coerce
    .number()
    .int()
    .min(MIN_ROTATION_INTERVAL_SECONDS)
    .default(DEFAULT_ROTATION_INTERVAL_SECONDS),
  safetyMarginSeconds: z.coerce.number().int().positive().default(DEFAULT_SAFETY_MARGIN_SECONDS),
  stateFile: z.string().min(1).default(DEFAULT_STATE_FILE),
}).refine((config) => config.managedUserName !== config.managerUserName, {
  message: "Managed and manager users must differ",
  path: ["managerUserName"],
});

export type RotationDemoConfig = z.infer<typeof RotationDemoConfigSchema>;
export type RotationDemoConfigInput = z.input<typeof RotationDemoConfigSchema>;

/** Environment variable consulted for each option. */
export const CONFIG_ENV_VARS = {
  secretsEndpoint: "VAULT_ADDR",
  secretsToken: "VAULT_TOKEN",
  secretsNamespace: "VAULT_NAMESPACE",
  simulatorEndpoint: "KEYTURN_SIMULATOR_ENDPOINT",
  engineSimulatorEndpoint: "KEYTURN_ENGINE_SIMULATOR_ENDPOINT",
  simulatorAccessKeyId: "AWS_ACCESS_KEY_ID",
  simulatorSecretAccessKey: "AWS_SECRET_ACCESS_KEY",
  region: "AWS_REGION",
  mountPath: "KEYTURN_MOUNT_PATH",
  roleName: "KEYTURN_ROLE_NAME",
  managedUserName: "KEYTURN_MANAGED_USER",
  managerUserName: "KEYTURN_MANAGER_USER",
  rotationIntervalSeconds: "KEYTURN_ROTATION_INTERVAL",
  safetyMarginSeconds: "KEYTURN_SAFETY_MARGIN",
  stateFile: "KEYTURN_STATE_FILE",
} as const satisfies Record<keyof RotationDemoConfig, string>;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Parsed contents of a JSON config file. */
  file?: Record<string, unknown>;
  /** Values from command-line flags; `undefined` entries are ignored. */
  overrides?: Partial<Record<keyof RotationDemoConfig, unknown>>;
}

/**
 * Collects the options set through environment variables. Empty values
 * count as unset.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, variable] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[variable];
    if (value !== undefined && value !== "") {
      values[key] = value;
    }
  }
  return values;
}

function definedEntries(values: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!values) return {};
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Resolves the demo configuration. Later sources win:
 * defaults, environment, config file, overrides.
 *
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(options: LoadConfigOptions = {}): RotationDemoConfig {
  const merged = {
    ...configFromEnv(options.env ?? process.env),
    ...definedEntries(options.file),
    ...definedEntries(options.overrides),
  };

  const result = RotationDemoConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

/** Endpoint the secrets engine uses to call the simulator's IAM and STS APIs. */
export function engineSimulatorEndpoint(config: RotationDemoConfig): string {
  return config.engineSimulatorEndpoint ?? config.simulatorEndpoint;
}

/** Milliseconds the verifier sleeps between its two checks. */
export function rotationWaitMs(config: Pick<RotationDemoConfig, "rotationIntervalSeconds" | "safetyMarginSeconds">): number {
  return (config.rotationIntervalSeconds + config.safetyMarginSeconds) * 1000;
}

/** Parameters for the built-in manifest derived from the configuration. */
export function manifestParamsFromConfig(config: RotationDemoConfig): RotationManifestParams {
  return {
    managedUserName: config.managedUserName,
    managerUserName: config.managerUserName,
    mountPath: config.mountPath,
    roleName: config.roleName,
    rotationIntervalSeconds: config.rotationIntervalSeconds,
    region: config.region,
    engineEndpoint: engineSimulatorEndpoint(config),
  };
}
