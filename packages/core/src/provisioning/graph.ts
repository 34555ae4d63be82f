import { KeyturnErrorCode } from "@keyturn/adapters-common";
import { ProvisioningError } from "../errors";
import {
  collectReferences,
  explicitDependencies,
  referencedId,
  type Manifest,
  type ResourceType,
} from "../manifest";

export interface ResourceNode {
  logicalId: string;
  type: ResourceType;
  /** Direct dependencies: explicit `DependsOn` first, then references. */
  dependencies: string[];
}

export interface ResourceGraph {
  /** Apply order. Destroy walks it backwards. */
  order: string[];
  nodes: Map<string, ResourceNode>;
  /** Every resource `logicalId` depends on, directly or not. */
  dependenciesOf(logicalId: string): Set<string>;
}

/**
 * Validates the manifest's dependency structure and computes a stable
 * apply order. Among resources whose dependencies are satisfied, the one
 * declared first goes first.
 *
 * Runs before any remote call, so every error here leaves the world
 * untouched.
 */
export function resolveGraph(manifest: Manifest): ResourceGraph {
  const nodes = new Map<string, ResourceNode>();

  for (const [logicalId, resource] of Object.entries(manifest.Resources)) {
    const dependencies = [...explicitDependencies(resource)];
    for (const ref of collectReferences(resource.Properties)) {
      if (!dependencies.includes(ref)) dependencies.push(ref);
    }

    for (const dependency of dependencies) {
      if (dependency === logicalId) {
        throw new ProvisioningError(
          `Resource "${logicalId}" depends on itself`,
          KeyturnErrorCode.DEPENDENCY_CYCLE,
          { logicalId }
        );
      }
      if (!(dependency in manifest.Resources)) {
        throw new ProvisioningError(
          `Resource "${logicalId}" depends on undefined resource "${dependency}"`,
          KeyturnErrorCode.DEPENDENCY_MISSING,
          { logicalId }
        );
      }
    }

    nodes.set(logicalId, { logicalId, type: resource.Type, dependencies });
  }

  for (const [name, output] of Object.entries(manifest.Outputs)) {
    for (const ref of collectReferences(output.Value)) {
      if (!nodes.has(ref)) {
        throw new ProvisioningError(
          `Output "${name}" references undefined resource "${ref}"`,
          KeyturnErrorCode.DEPENDENCY_MISSING
        );
      }
    }
  }

  const order = topologicalOrder(nodes);
  const closure = new Map<string, Set<string>>();

  const dependenciesOf = (logicalId: string): Set<string> => {
    const cached = closure.get(logicalId);
    if (cached) return cached;

    const result = new Set<string>();
    for (const dependency of nodes.get(logicalId)?.dependencies ?? []) {
      result.add(dependency);
      for (const transitive of dependenciesOf(dependency)) result.add(transitive);
    }
    closure.set(logicalId, result);
    return result;
  };

  const graph: ResourceGraph = { order, nodes, dependenciesOf };
  validateRotationPrerequisites(manifest, graph);
  return graph;
}

function topologicalOrder(nodes: Map<string, ResourceNode>): string[] {
  const order: string[] = [];
  const placed = new Set<string>();
  const pending = [...nodes.values()];

  while (pending.length > 0) {
    const index = pending.findIndex((node) =>
      node.dependencies.every((dependency) => placed.has(dependency))
    );
    if (index === -1) {
      const ids = pending.map((node) => node.logicalId).join(", ");
      throw new ProvisioningError(
        `Dependency cycle between resources: ${ids}`,
        KeyturnErrorCode.DEPENDENCY_CYCLE
      );
    }
    const [node] = pending.splice(index, 1);
    order.push(node.logicalId);
    placed.add(node.logicalId);
  }

  return order;
}

/**
 * Finds the `AWS::IAM::User` resource a `UserName` property designates,
 * either through a reference or by its literal name.
 */
function userResourceFor(manifest: Manifest, userName: unknown): string | undefined {
  const ref = referencedId(userName);
  if (ref !== undefined) {
    return manifest.Resources[ref]?.Type === "AWS::IAM::User" ? ref : undefined;
  }
  if (typeof userName !== "string") return undefined;

  return Object.entries(manifest.Resources).find(
    ([, resource]) => resource.Type === "AWS::IAM::User" && resource.Properties.UserName === userName
  )?.[0];
}

/**
 * A static role can only rotate once both its user and the user seeding
 * its backend hold their policies, so each static role must depend on a
 * policy of each.
 */
function validateRotationPrerequisites(manifest: Manifest, graph: ResourceGraph): void {
  for (const [logicalId, resource] of Object.entries(manifest.Resources)) {
    if (resource.Type !== "Vault::AWS::StaticRole") continue;

    const rotatedUser = userResourceFor(manifest, resource.Properties.UserName);
    if (rotatedUser === undefined) {
      throw new ProvisioningError(
        `Static role "${logicalId}" must reference an AWS::IAM::User declared in the manifest`,
        KeyturnErrorCode.DEPENDENCY_MISSING,
        { logicalId }
      );
    }

    const backendId = referencedId(resource.Properties.Backend);
    const backend = backendId === undefined ? undefined : manifest.Resources[backendId];
    if (backendId === undefined || backend?.Type !== "Vault::AWS::SecretBackend") {
      throw new ProvisioningError(
        `Static role "${logicalId}" must reference a Vault::AWS::SecretBackend through its Backend property`,
        KeyturnErrorCode.DEPENDENCY_MISSING,
        { logicalId }
      );
    }

    const keyId = referencedId(backend.Properties.AccessKey);
    const key = keyId === undefined ? undefined : manifest.Resources[keyId];
    const seedingUser =
      key?.Type === "AWS::IAM::AccessKey" ? userResourceFor(manifest, key.Properties.UserName) : undefined;
    if (seedingUser === undefined) {
      throw new ProvisioningError(
        `Secret backend "${backendId}" must take its AccessKey from an AWS::IAM::AccessKey of a declared user`,
        KeyturnErrorCode.DEPENDENCY_MISSING,
        { logicalId: backendId }
      );
    }

    const dependencies = graph.dependenciesOf(logicalId);
    for (const user of new Set([rotatedUser, seedingUser])) {
      const hasPolicy = [...dependencies].some((dependency) => {
        const candidate = manifest.Resources[dependency];
        return (
          candidate.Type === "AWS::IAM::UserPolicy" &&
          userResourceFor(manifest, candidate.Properties.UserName) === user
        );
      });
      if (!hasPolicy) {
        throw new ProvisioningError(
          `Static role "${logicalId}" requires a policy for user "${user}" to exist first`,
          KeyturnErrorCode.DEPENDENCY_MISSING,
          { logicalId }
        );
      }
    }
  }
}
