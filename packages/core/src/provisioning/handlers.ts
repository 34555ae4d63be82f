/**
 * Resource handlers.
 *
 * One handler per manifest resource type. `apply` converges the remote
 * resource toward its properties and reports what it had to do; `destroy`
 * removes it and tolerates it being gone already.
 */

import { z } from "zod";
import {
  KeyturnErrorCode,
  maskAccessKeyId,
  type IIdentityService,
  type ISecretsEngine,
  type LogCallback,
  type PolicyDocument,
} from "@keyturn/adapters-common";
import { ProvisioningError } from "../errors";
import type { ResourceType } from "../manifest";
import type { ResourceState } from "./state";

export type ResourceAction = "created" | "updated" | "unchanged";

export interface HandlerContext {
  identity: IIdentityService;
  secrets: ISecretsEngine;
  log: LogCallback;
}

export interface AppliedResource {
  physicalId: string;
  attributes: Record<string, string>;
  action: ResourceAction;
}

export interface ResourceHandler {
  readonly type: ResourceType;
  apply(
    logicalId: string,
    properties: unknown,
    ctx: HandlerContext,
    prior?: ResourceState
  ): Promise<AppliedResource>;
  destroy(logicalId: string, state: ResourceState, ctx: HandlerContext): Promise<void>;
}

function defineHandler<S extends z.ZodTypeAny>(definition: {
  type: ResourceType;
  schema: S;
  apply(
    props: z.output<S>,
    ctx: HandlerContext,
    prior?: ResourceState
  ): Promise<AppliedResource>;
  destroy(state: ResourceState, ctx: HandlerContext): Promise<void>;
}): ResourceHandler {
  return {
    type: definition.type,
    async apply(logicalId, properties, ctx, prior) {
      const result = definition.schema.safeParse(properties);
      if (!result.success) {
        const issues = result.error.issues.map(
          (issue) => `${issue.path.join(".") || "Properties"}: ${issue.message}`
        );
        throw new ProvisioningError(
          `Resource "${logicalId}" (${definition.type}) has invalid properties: ${issues.join("; ")}`,
          KeyturnErrorCode.INVALID_MANIFEST,
          { logicalId }
        );
      }
      return definition.apply(result.data, ctx, prior?.type === definition.type ? prior : undefined);
    },
    destroy(_logicalId, state, ctx) {
      return definition.destroy(state, ctx);
    },
  };
}

/** JSON with object keys sorted, so equal documents compare equal as text. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, item: unknown) => {
    if (typeof item !== "object" || item === null || Array.isArray(item)) return item;
    return Object.fromEntries(
      Object.entries(item).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    );
  });
}

function sameDocument(existing: string, desired: PolicyDocument): boolean {
  try {
    return canonicalJson(JSON.parse(existing)) === canonicalJson(desired);
  } catch {
    // An unparseable stored document is rewritten.
    return false;
  }
}

// ── AWS::IAM::User ──

const UserProperties = z.object({
  UserName: z.string().min(1),
  Path: z.string().default("/"),
  Tags: z.record(z.string()).optional(),
});

const userHandler = defineHandler({
  type: "AWS::IAM::User",
  schema: UserProperties,
  async apply(props, ctx) {
    const existing = await ctx.identity.getUser(props.UserName);
    const user =
      existing ?? (await ctx.identity.createUser(props.UserName, { path: props.Path, tags: props.Tags }));

    return {
      physicalId: user.userName,
      attributes: { Arn: user.arn, UserId: user.userId },
      action: existing ? "unchanged" : "created",
    };
  },
  async destroy(state, ctx) {
    const userName = state.physicalId;
    if (!(await ctx.identity.getUser(userName))) return;

    // Keys minted by rotation are not in state but still block deletion.
    for (const key of await ctx.identity.listAccessKeys(userName)) {
      ctx.log(`  deleting access key ${maskAccessKeyId(key.accessKeyId)} of ${userName}`);
      await ctx.identity.deleteAccessKey(userName, key.accessKeyId);
    }
    await ctx.identity.deleteUser(userName);
  },
});

// ── AWS::IAM::UserPolicy ──

const PolicyDocumentSchema = z.object({
  Version: z.literal("2012-10-17"),
  Statement: z
    .array(
      z.object({
        Sid: z.string().optional(),
        Effect: z.enum(["Allow", "Deny"]),
        Action: z.union([z.string(), z.array(z.string()).min(1)]),
        Resource: z.union([z.string(), z.array(z.string()).min(1)]),
      })
    )
    .min(1),
});

const UserPolicyProperties = z.object({
  UserName: z.string().min(1),
  PolicyName: z.string().min(1),
  PolicyDocument: PolicyDocumentSchema,
});

const userPolicyHandler = defineHandler({
  type: "AWS::IAM::UserPolicy",
  schema: UserPolicyProperties,
  async apply(props, ctx) {
    const existing = await ctx.identity.getUserPolicy(props.UserName, props.PolicyName);
    const unchanged = existing !== undefined && sameDocument(existing, props.PolicyDocument);
    if (!unchanged) {
      await ctx.identity.putUserPolicy(props.UserName, props.PolicyName, props.PolicyDocument);
    }

    return {
      physicalId: `${props.UserName}:${props.PolicyName}`,
      attributes: { PolicyName: props.PolicyName, UserName: props.UserName },
      action: existing === undefined ? "created" : unchanged ? "unchanged" : "updated",
    };
  },
  async destroy(state, ctx) {
    const { UserName: userName, PolicyName: policyName } = state.attributes;
    if ((await ctx.identity.getUser(userName)) === undefined) return;
    if ((await ctx.identity.getUserPolicy(userName, policyName)) === undefined) return;
    await ctx.identity.deleteUserPolicy(userName, policyName);
  },
});

// ── AWS::IAM::AccessKey ──

const AccessKeyProperties = z.object({
  UserName: z.string().min(1),
});

const accessKeyHandler = defineHandler({
  type: "AWS::IAM::AccessKey",
  schema: AccessKeyProperties,
  async apply(props, ctx, prior) {
    // The secret is only returned at creation, so a recorded key is kept
    // rather than checked against the remote side.
    if (prior && prior.attributes.UserName === props.UserName) {
      return { physicalId: prior.physicalId, attributes: prior.attributes, action: "unchanged" };
    }

    const key = await ctx.identity.createAccessKey(props.UserName);
    return {
      physicalId: key.accessKeyId,
      attributes: {
        AccessKeyId: key.accessKeyId,
        SecretAccessKey: key.secretAccessKey,
        UserName: props.UserName,
      },
      action: "created",
    };
  },
  async destroy(state, ctx) {
    const userName = state.attributes.UserName;
    if ((await ctx.identity.getUser(userName)) === undefined) return;

    const keys = await ctx.identity.listAccessKeys(userName);
    if (keys.some((key) => key.accessKeyId === state.physicalId)) {
      await ctx.identity.deleteAccessKey(userName, state.physicalId);
    }
  },
});

// ── Vault::AWS::SecretBackend ──

const SecretBackendProperties = z.object({
  Path: z.string().min(1),
  Description: z.string().optional(),
  AccessKey: z.string().min(1),
  SecretKey: z.string().min(1),
  Region: z.string().min(1).default("us-east-1"),
  IamEndpoint: z.string().url().optional(),
  StsEndpoint: z.string().url().optional(),
});

const secretBackendHandler = defineHandler({
  type: "Vault::AWS::SecretBackend",
  schema: SecretBackendProperties,
  async apply(props, ctx, prior) {
    const attributes = {
      Path: props.Path,
      AccessKey: props.AccessKey,
      Region: props.Region,
      IamEndpoint: props.IamEndpoint ?? "",
      StsEndpoint: props.StsEndpoint ?? "",
    };

    const mounted = await ctx.secrets.isMounted(props.Path);
    if (!mounted) {
      await ctx.secrets.mount(props.Path, { description: props.Description });
    }

    // Vault never returns the stored secret key, so the recorded
    // attributes stand in for the remote root configuration.
    const recorded =
      mounted &&
      prior !== undefined &&
      Object.entries(attributes).every(([key, value]) => prior.attributes[key] === value);
    if (!recorded) {
      await ctx.secrets.configureRoot(props.Path, {
        accessKey: props.AccessKey,
        secretKey: props.SecretKey,
        region: props.Region,
        iamEndpoint: props.IamEndpoint,
        stsEndpoint: props.StsEndpoint,
      });
    }

    return {
      physicalId: props.Path,
      attributes,
      action: !mounted ? "created" : recorded ? "unchanged" : "updated",
    };
  },
  async destroy(state, ctx) {
    if (await ctx.secrets.isMounted(state.physicalId)) {
      await ctx.secrets.unmount(state.physicalId);
    }
  },
});

// ── Vault::AWS::StaticRole ──

const StaticRoleProperties = z.object({
  Backend: z.string().min(1),
  Name: z.string().min(1),
  UserName: z.string().min(1),
  RotationPeriodSeconds: z.number().int().positive(),
});

const staticRoleHandler = defineHandler({
  type: "Vault::AWS::StaticRole",
  schema: StaticRoleProperties,
  async apply(props, ctx) {
    const existing = await ctx.secrets.readStaticRole(props.Backend, props.Name);
    const unchanged =
      existing !== undefined &&
      existing.userName === props.UserName &&
      existing.rotationPeriodSeconds === props.RotationPeriodSeconds;

    if (!unchanged) {
      await ctx.secrets.writeStaticRole(props.Backend, {
        name: props.Name,
        userName: props.UserName,
        rotationPeriodSeconds: props.RotationPeriodSeconds,
      });
    }

    return {
      physicalId: `${props.Backend}/static-roles/${props.Name}`,
      attributes: {
        Name: props.Name,
        Backend: props.Backend,
        UserName: props.UserName,
        CredentialsPath: `${props.Backend}/static-creds/${props.Name}`,
      },
      action: existing === undefined ? "created" : unchanged ? "unchanged" : "updated",
    };
  },
  async destroy(state, ctx) {
    const { Backend: backend, Name: name } = state.attributes;
    if (!(await ctx.secrets.isMounted(backend))) return;
    await ctx.secrets.deleteStaticRole(backend, name);
  },
});

export const DEFAULT_HANDLERS: readonly ResourceHandler[] = [
  userHandler,
  userPolicyHandler,
  accessKeyHandler,
  secretBackendHandler,
  staticRoleHandler,
];
