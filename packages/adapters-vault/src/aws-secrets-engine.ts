/**
 * Vault AWS secrets engine
 *
 * Mount management, root configuration, static roles (rotation policies)
 * and static credential reads for the engine that rotates the managed
 * identity's access keys.
 */

import { z } from "zod";
import type {
  ISecretsEngine,
  ICredentialSource,
  AwsRootConfig,
  StaticRoleConfig,
  StaticRoleInfo,
  SecretsEngineHealth,
  CredentialSnapshot,
} from "@keyturn/adapters-common";
import { KeyturnError, KeyturnErrorCode } from "@keyturn/adapters-common";
import type { VaultClient } from "./vault-client";
import { parseDurationSeconds } from "./duration";

const HealthSchema = z.object({
  initialized: z.boolean(),
  sealed: z.boolean(),
  version: z.string().optional(),
});

const MountsSchema = z.object({
  data: z.record(z.object({ type: z.string() }).passthrough()),
});

const StaticRoleSchema = z.object({
  data: z.object({
    name: z.string().optional(),
    username: z.string(),
    rotation_period: z.union([z.number(), z.string()]),
  }),
});

const StaticCredsSchema = z.object({
  lease_id: z.string().default(""),
  lease_duration: z.number().default(0),
  renewable: z.boolean().default(false),
  data: z.object({
    access_key: z.string(),
    secret_key: z.string(),
  }),
});

/** Query flags that make sys/health answer 200 in every state */
const HEALTH_QUERY = "standbyok=true&sealedcode=200&uninitcode=200";

export function normalizeMountPath(mountPath: string): string {
  return mountPath.replace(/^\/+|\/+$/g, "");
}

export class AwsSecretsEngine implements ISecretsEngine, ICredentialSource {
  constructor(
    private readonly client: VaultClient,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async checkHealth(): Promise<SecretsEngineHealth> {
    const body = await this.client.request("GET", `sys/health?${HEALTH_QUERY}`);
    return this.parse(HealthSchema, body, "sys/health");
  }

  async isMounted(mountPath: string): Promise<boolean> {
    const path = normalizeMountPath(mountPath);
    const body = await this.client.read("sys/mounts");
    const mounts = this.parse(MountsSchema, body, "sys/mounts");
    const mount = mounts.data[`${path}/`];
    return mount !== undefined && mount.type === "aws";
  }

  async mount(mountPath: string, options?: { description?: string }): Promise<void> {
    await this.client.write(`sys/mounts/${normalizeMountPath(mountPath)}`, {
      type: "aws",
      description: options?.description,
    });
  }

  async unmount(mountPath: string): Promise<void> {
    await this.client.delete(`sys/mounts/${normalizeMountPath(mountPath)}`);
  }

  async configureRoot(mountPath: string, config: AwsRootConfig): Promise<void> {
    await this.client.write(`${normalizeMountPath(mountPath)}/config/root`, {
      access_key: config.accessKey,
      secret_key: config.secretKey,
      region: config.region,
      iam_endpoint: config.iamEndpoint,
      sts_endpoint: config.stsEndpoint,
    });
  }

  async writeStaticRole(mountPath: string, role: StaticRoleConfig): Promise<void> {
    await this.client.write(
      `${normalizeMountPath(mountPath)}/static-roles/${role.name}`,
      {
        username: role.userName,
        rotation_period: role.rotationPeriodSeconds,
      },
    );
  }

  async readStaticRole(mountPath: string, name: string): Promise<StaticRoleInfo | undefined> {
    const path = `${normalizeMountPath(mountPath)}/static-roles/${name}`;
    const body = await this.client.read(path);
    if (body === undefined) {
      return undefined;
    }

    const role = this.parse(StaticRoleSchema, body, path).data;
    return {
      mountPath: normalizeMountPath(mountPath),
      name: role.name ?? name,
      userName: role.username,
      rotationPeriodSeconds: parseDurationSeconds(role.rotation_period),
    };
  }

  async deleteStaticRole(mountPath: string, name: string): Promise<void> {
    await this.client.delete(`${normalizeMountPath(mountPath)}/static-roles/${name}`);
  }

  async readStaticCredentials(mountPath: string, roleName: string): Promise<CredentialSnapshot> {
    const path = `${normalizeMountPath(mountPath)}/static-creds/${roleName}`;
    const body = await this.client.read(path);
    if (body === undefined) {
      throw new KeyturnError(`No credentials found at ${path}`, KeyturnErrorCode.NOT_FOUND);
    }

    const creds = this.parse(StaticCredsSchema, body, path);
    return {
      accessKeyId: creds.data.access_key,
      secretAccessKey: creds.data.secret_key,
      lease: {
        leaseId: creds.lease_id,
        leaseDurationSeconds: creds.lease_duration,
        renewable: creds.renewable,
      },
      readAt: this.now(),
    };
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: unknown, path: string): z.infer<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new KeyturnError(
        `Unexpected response from ${path}: ${issues}`,
        KeyturnErrorCode.INVALID_RESPONSE,
      );
    }
    return result.data;
  }
}
