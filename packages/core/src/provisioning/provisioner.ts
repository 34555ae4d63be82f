/**
 * Provisioner for rotation manifests.
 *
 * Applies resources one at a time in dependency order, recording each in
 * the state store as soon as it succeeds. The first failure aborts the
 * run; resources applied before it stay recorded and a later apply picks
 * up from there. There is no rollback.
 */

import {
  KeyturnError,
  KeyturnErrorCode,
  type IIdentityService,
  type ISecretsEngine,
  type LogCallback,
} from "@keyturn/adapters-common";
import { ProvisioningError, errorMessage } from "../errors";
import { lookupFrom, resolveIntrinsics, type Manifest, type ResourceType } from "../manifest";
import { resolveGraph } from "./graph";
import { DEFAULT_HANDLERS, type HandlerContext, type ResourceAction, type ResourceHandler } from "./handlers";
import { runPreflight } from "./preflight";
import type { OutputState, ProvisioningState, StateStore } from "./state";

export interface ProvisionerOptions {
  identity: IIdentityService;
  secrets: ISecretsEngine;
  state: StateStore;
  onLog?: LogCallback;
  handlers?: readonly ResourceHandler[];
  now?: () => Date;
}

export interface PlanStep {
  logicalId: string;
  type: ResourceType;
  /** `create` when nothing is recorded yet, `refresh` when state has it. */
  action: "create" | "refresh";
  dependencies: string[];
}

export interface ApplyOptions {
  /** Check both endpoints before touching anything. Defaults to true. */
  preflight?: boolean;
}

export interface ApplyResult {
  order: string[];
  actions: Record<string, ResourceAction>;
  outputs: Record<string, OutputState>;
  state: ProvisioningState;
}

export class Provisioner {
  private readonly handlers: Map<ResourceType, ResourceHandler>;
  private readonly log: LogCallback;
  private readonly now: () => Date;

  constructor(private readonly options: ProvisionerOptions) {
    this.handlers = new Map(
      (options.handlers ?? DEFAULT_HANDLERS).map((handler) => [handler.type, handler])
    );
    this.log = options.onLog ?? (() => {});
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Computes the apply order and whether each resource is new.
   *
   * @param manifest - Manifest to plan
   * @returns One step per resource, in apply order
   */
  async plan(manifest: Manifest): Promise<PlanStep[]> {
    const graph = resolveGraph(manifest);
    this.assertHandled(manifest);
    const state = await this.options.state.load();

    return graph.order.map((logicalId): PlanStep => {
      const node = graph.nodes.get(logicalId);
      return {
        logicalId,
        type: manifest.Resources[logicalId].Type,
        action: state.resources[logicalId] ? "refresh" : "create",
        dependencies: node ? [...node.dependencies] : [],
      };
    });
  }

  /**
   * Applies every resource of the manifest in dependency order.
   *
   * @param manifest - Manifest to apply
   * @param options - Apply options
   * @returns Actions taken per resource and the resolved outputs
   */
  async apply(manifest: Manifest, options: ApplyOptions = {}): Promise<ApplyResult> {
    const graph = resolveGraph(manifest);
    this.assertHandled(manifest);

    if (options.preflight !== false) {
      this.log("Checking endpoints...");
      const result = await runPreflight(this.options);
      this.log(
        `Secrets service ready${result.secrets.version ? ` (version ${result.secrets.version})` : ""}; ` +
          `simulator reports ${result.userCount} existing user(s)`
      );
    }

    const state = await this.options.state.load();
    const ctx = this.context();
    const actions: Record<string, ResourceAction> = {};

    for (const logicalId of graph.order) {
      const resource = manifest.Resources[logicalId];
      const handler = this.handlerFor(resource.Type);

      try {
        const properties = resolveIntrinsics(
          resource.Properties,
          lookupFrom(state.resources, logicalId)
        );
        const applied = await handler.apply(logicalId, properties, ctx, state.resources[logicalId]);

        state.resources[logicalId] = {
          type: resource.Type,
          physicalId: applied.physicalId,
          attributes: applied.attributes,
          appliedAt: this.now().toISOString(),
        };
        state.updatedAt = this.now().toISOString();
        await this.options.state.save(state);

        actions[logicalId] = applied.action;
        this.log(`${logicalId} (${resource.Type}): ${applied.action}`);
      } catch (error) {
        throw this.wrap(error, logicalId, resource.Type, "apply");
      }
    }

    state.outputs = this.resolveOutputs(manifest, state);
    state.updatedAt = this.now().toISOString();
    await this.options.state.save(state);

    return { order: graph.order, actions, outputs: state.outputs, state };
  }

  /**
   * Tears down every recorded resource of the manifest in reverse
   * dependency order.
   *
   * @param manifest - Manifest whose resources to remove
   * @returns Logical ids destroyed, in the order they were removed
   */
  async destroy(manifest: Manifest): Promise<string[]> {
    const graph = resolveGraph(manifest);
    this.assertHandled(manifest);

    const state = await this.options.state.load();
    const ctx = this.context();
    const destroyed: string[] = [];

    for (const logicalId of [...graph.order].reverse()) {
      const recorded = state.resources[logicalId];
      if (!recorded) continue;

      try {
        await this.handlerFor(recorded.type).destroy(logicalId, recorded, ctx);
      } catch (error) {
        throw this.wrap(error, logicalId, recorded.type, "destroy");
      }

      delete state.resources[logicalId];
      state.updatedAt = this.now().toISOString();
      await this.options.state.save(state);

      destroyed.push(logicalId);
      this.log(`${logicalId} (${recorded.type}): destroyed`);
    }

    state.outputs = {};
    await this.options.state.save(state);
    return destroyed;
  }

  private context(): HandlerContext {
    return { identity: this.options.identity, secrets: this.options.secrets, log: this.log };
  }

  private assertHandled(manifest: Manifest): void {
    for (const [logicalId, resource] of Object.entries(manifest.Resources)) {
      if (!this.handlers.has(resource.Type)) {
        throw new ProvisioningError(
          `No handler registered for resource type ${resource.Type}`,
          KeyturnErrorCode.INVALID_MANIFEST,
          { logicalId }
        );
      }
    }
  }

  private handlerFor(type: ResourceType): ResourceHandler {
    const handler = this.handlers.get(type);
    if (!handler) {
      throw new ProvisioningError(
        `No handler registered for resource type ${type}`,
        KeyturnErrorCode.INVALID_MANIFEST
      );
    }
    return handler;
  }

  private resolveOutputs(manifest: Manifest, state: ProvisioningState): Record<string, OutputState> {
    const outputs: Record<string, OutputState> = {};
    for (const [name, output] of Object.entries(manifest.Outputs)) {
      const value = resolveIntrinsics(output.Value, lookupFrom(state.resources, name));
      outputs[name] = {
        value: typeof value === "string" ? value : JSON.stringify(value),
        sensitive: output.Sensitive,
        ...(output.Description !== undefined ? { description: output.Description } : {}),
      };
    }
    return outputs;
  }

  private wrap(
    error: unknown,
    logicalId: string,
    type: ResourceType,
    operation: "apply" | "destroy"
  ): KeyturnError {
    if (error instanceof ProvisioningError) return error;

    const code =
      error instanceof KeyturnError && error.code === KeyturnErrorCode.ENDPOINT_UNREACHABLE
        ? KeyturnErrorCode.ENDPOINT_UNREACHABLE
        : KeyturnErrorCode.RESOURCE_FAILED;
    return new ProvisioningError(
      `Failed to ${operation} resource "${logicalId}" (${type}): ${errorMessage(error)}`,
      code,
      { logicalId, cause: error }
    );
  }
}
