import { promises as fs } from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { KeyturnError, KeyturnErrorCode } from "@keyturn/adapters-common";
import { ResourceTypeSchema } from "../manifest";
import { STATE_FILE_MODE } from "../constants";

export const ResourceStateSchema = z.object({
  type: ResourceTypeSchema,
  physicalId: z.string(),
  attributes: z.record(z.string()),
  appliedAt: z.string(),
});

export type ResourceState = z.infer<typeof ResourceStateSchema>;

export const OutputStateSchema = z.object({
  value: z.string(),
  sensitive: z.boolean(),
  description: z.string().optional(),
});

export type OutputState = z.infer<typeof OutputStateSchema>;

export const ProvisioningStateSchema = z.object({
  version: z.literal(1),
  resources: z.record(ResourceStateSchema),
  outputs: z.record(OutputStateSchema),
  updatedAt: z.string().optional(),
});

export type ProvisioningState = z.infer<typeof ProvisioningStateSchema>;

export function emptyState(): ProvisioningState {
  return { version: 1, resources: {}, outputs: {} };
}

export interface StateStore {
  load(): Promise<ProvisioningState>;
  save(state: ProvisioningState): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Keeps state in a JSON file readable only by its owner, since outputs
 * include secret access keys.
 */
export class FileStateStore implements StateStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<ProvisioningState> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return emptyState();
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new KeyturnError(
        `State file ${this.filePath} is not valid JSON`,
        KeyturnErrorCode.INVALID_RESPONSE,
        { cause: error }
      );
    }

    const result = ProvisioningStateSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new KeyturnError(
        `State file ${this.filePath} is malformed: ${issue.path.join(".")}: ${issue.message}`,
        KeyturnErrorCode.INVALID_RESPONSE
      );
    }
    return result.data;
  }

  async save(state: ProvisioningState): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${JSON.stringify(state, null, 2)}\n`, {
      encoding: "utf8",
      mode: STATE_FILE_MODE,
    });
    // writeFile only applies the mode when it creates the file
    await fs.chmod(this.filePath, STATE_FILE_MODE);
  }
}

export class MemoryStateStore implements StateStore {
  private state: ProvisioningState;

  constructor(initial: ProvisioningState = emptyState()) {
    this.state = structuredClone(initial);
  }

  async load(): Promise<ProvisioningState> {
    return structuredClone(this.state);
  }

  async save(state: ProvisioningState): Promise<void> {
    this.state = structuredClone(state);
  }

  /** Current contents, for inspection in tests and dry runs. */
  snapshot(): ProvisioningState {
    return structuredClone(this.state);
  }
}
