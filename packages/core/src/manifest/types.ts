/**
 * Manifest schema.
 *
 * A manifest describes the resources of a rotation setup in a
 * CloudFormation-like shape: logical ids mapped to a `Type`, its
 * `Properties` and optional explicit `DependsOn` edges. Property values
 * may reference other resources through `Ref` and `Fn::GetAtt`.
 */

import { z } from "zod";

export const RESOURCE_TYPES = [
  "AWS::IAM::User",
  "AWS::IAM::UserPolicy",
  "AWS::IAM::AccessKey",
  "Vault::AWS::SecretBackend",
  "Vault::AWS::StaticRole",
] as const;

export const ResourceTypeSchema = z.enum(RESOURCE_TYPES);
export type ResourceType = z.infer<typeof ResourceTypeSchema>;

const logicalIdSchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9]*$/, "Logical ids must be alphanumeric and start with a letter");

export const ManifestResourceSchema = z.object({
  Type: ResourceTypeSchema,
  Properties: z.record(z.unknown()).default({}),
  DependsOn: z.union([logicalIdSchema, z.array(logicalIdSchema)]).optional(),
});

export type ManifestResource = z.infer<typeof ManifestResourceSchema>;

export const ManifestOutputSchema = z.object({
  Value: z.unknown(),
  Description: z.string().optional(),
  Sensitive: z.boolean().default(false),
});

export type ManifestOutput = z.infer<typeof ManifestOutputSchema>;

export const ManifestSchema = z.object({
  Description: z.string().optional(),
  Resources: z
    .record(logicalIdSchema, ManifestResourceSchema)
    .refine((resources) => Object.keys(resources).length > 0, "At least one resource is required"),
  Outputs: z.record(ManifestOutputSchema).default({}),
});

export type Manifest = z.infer<typeof ManifestSchema>;
export type ManifestInput = z.input<typeof ManifestSchema>;

/** Explicit `DependsOn` edges as a list. */
export function explicitDependencies(resource: ManifestResource): string[] {
  if (resource.DependsOn === undefined) return [];
  return typeof resource.DependsOn === "string" ? [resource.DependsOn] : resource.DependsOn;
}
