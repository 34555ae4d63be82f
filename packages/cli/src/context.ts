import fs from "fs-extra";
import path from "path";
import { IAMService, AwsComputeProbe } from "@keyturn/adapters-aws";
import { VaultClient, AwsSecretsEngine } from "@keyturn/adapters-vault";
import { ConfigError } from "@keyturn/adapters-common";
import {
  FileStateStore,
  buildRotationManifest,
  loadConfig,
  manifestParamsFromConfig,
  parseManifest,
  type Manifest,
  type RotationDemoConfig,
} from "@keyturn/core";

/** Flags accepted by every command. */
export interface CommonOptions {
  config?: string;
  secretsEndpoint?: string;
  simulatorEndpoint?: string;
  rotationInterval?: string;
  safetyMargin?: string;
  state?: string;
}

export interface Services {
  identity: IAMService;
  secrets: AwsSecretsEngine;
  compute: AwsComputeProbe;
  state: FileStateStore;
}

async function readConfigFile(file: string): Promise<Record<string, unknown>> {
  let contents: unknown;
  try {
    contents = await fs.readJson(file);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`${file}: ${reason}`]);
  }
  if (typeof contents !== "object" || contents === null || Array.isArray(contents)) {
    throw new ConfigError([`${file}: expected a JSON object`]);
  }
  return Object.fromEntries(Object.entries(contents));
}

export async function resolveConfig(
  options: CommonOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<RotationDemoConfig> {
  const file = options.config ? await readConfigFile(options.config) : undefined;

  return loadConfig({
    env,
    file,
    overrides: {
      secretsEndpoint: options.secretsEndpoint,
      simulatorEndpoint: options.simulatorEndpoint,
      rotationIntervalSeconds: options.rotationInterval,
      safetyMarginSeconds: options.safetyMargin,
      stateFile: options.state,
    },
  });
}

export function createServices(config: RotationDemoConfig): Services {
  const credentials = {
    accessKeyId: config.simulatorAccessKeyId,
    secretAccessKey: config.simulatorSecretAccessKey,
  };

  return {
    identity: new IAMService({
      region: config.region,
      endpoint: config.simulatorEndpoint,
      credentials,
    }),
    secrets: new AwsSecretsEngine(
      new VaultClient({
        address: config.secretsEndpoint,
        token: config.secretsToken,
        namespace: config.secretsNamespace,
      })
    ),
    compute: new AwsComputeProbe({ region: config.region, endpoint: config.simulatorEndpoint }),
    state: new FileStateStore(path.resolve(config.stateFile)),
  };
}

/** The manifest from `--manifest`, or the built-in one for this configuration. */
export async function resolveManifest(
  config: RotationDemoConfig,
  manifestFile?: string
): Promise<Manifest> {
  if (!manifestFile) {
    return buildRotationManifest(manifestParamsFromConfig(config));
  }
  const contents: unknown = await fs.readJson(manifestFile);
  return parseManifest(contents);
}
