import { KeyturnErrorCode } from "@keyturn/adapters-common";
import { ProvisioningError } from "../errors";

export interface RefIntrinsic {
  Ref: string;
}

export interface GetAttIntrinsic {
  "Fn::GetAtt": [string, string];
}

export type Intrinsic = RefIntrinsic | GetAttIntrinsic;

/** Looks up a resource's physical id (no attribute) or one of its attributes. */
export type ReferenceLookup = (logicalId: string, attribute?: string) => string;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isRef(value: unknown): value is RefIntrinsic {
  return isRecord(value) && Object.keys(value).length === 1 && typeof value.Ref === "string";
}

export function isGetAtt(value: unknown): value is GetAttIntrinsic {
  if (!isRecord(value) || Object.keys(value).length !== 1) return false;
  const args = value["Fn::GetAtt"];
  return (
    Array.isArray(args) &&
    args.length === 2 &&
    typeof args[0] === "string" &&
    typeof args[1] === "string"
  );
}

/** Logical id an intrinsic points at, or undefined for plain values. */
export function referencedId(value: unknown): string | undefined {
  if (isRef(value)) return value.Ref;
  if (isGetAtt(value)) return value["Fn::GetAtt"][0];
  return undefined;
}

/**
 * Collects every logical id referenced anywhere inside `value`, in the
 * order they appear.
 */
export function collectReferences(value: unknown, into: string[] = []): string[] {
  const id = referencedId(value);
  if (id !== undefined) {
    if (!into.includes(id)) into.push(id);
    return into;
  }
  if (Array.isArray(value)) {
    for (const item of value) collectReferences(item, into);
  } else if (isRecord(value)) {
    for (const item of Object.values(value)) collectReferences(item, into);
  }
  return into;
}

/** Replaces every intrinsic inside `value` with the string it resolves to. */
export function resolveIntrinsics(value: unknown, lookup: ReferenceLookup): unknown {
  if (isRef(value)) return lookup(value.Ref);
  if (isGetAtt(value)) {
    const [logicalId, attribute] = value["Fn::GetAtt"];
    return lookup(logicalId, attribute);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveIntrinsics(item, lookup));
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, resolveIntrinsics(item, lookup)])
    );
  }
  return value;
}

/**
 * Builds a lookup over recorded resources. Unknown ids and attributes are
 * manifest errors.
 */
export function lookupFrom(
  resources: Record<string, { physicalId: string; attributes: Record<string, string> }>,
  referrer: string
): ReferenceLookup {
  return (logicalId, attribute) => {
    const resource = resources[logicalId];
    if (!resource) {
      throw new ProvisioningError(
        `Resource "${referrer}" references "${logicalId}", which has not been applied`,
        KeyturnErrorCode.DEPENDENCY_MISSING,
        { logicalId: referrer }
      );
    }
    if (attribute === undefined) return resource.physicalId;

    const value = resource.attributes[attribute];
    if (value === undefined) {
      throw new ProvisioningError(
        `Resource "${logicalId}" has no attribute "${attribute}" (referenced by "${referrer}")`,
        KeyturnErrorCode.INVALID_MANIFEST,
        { logicalId: referrer }
      );
    }
    return value;
  };
}
