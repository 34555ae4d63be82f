import { z } from "zod";
import { EndpointUnreachableError, KeyturnError, KeyturnErrorCode } from "@keyturn/adapters-common";
import { VaultApiError } from "./errors";

export interface VaultClientOptions {
  /** Vault address, e.g. http://127.0.0.1:8200 */
  address: string;
  token: string;
  namespace?: string;
  /** Override for tests */
  fetch?: typeof fetch;
}

export type VaultMethod = "GET" | "POST" | "PUT" | "DELETE";

const ErrorBodySchema = z.object({ errors: z.array(z.string()) });

/**
 * Thin client for the Vault HTTP API (v1). Bodies are returned as
 * `unknown`; callers validate them.
 */
export class VaultClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly namespace?: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: VaultClientOptions) {
    this.baseUrl = options.address.replace(/\/+$/, "");
    this.token = options.token;
    this.namespace = options.namespace;
    this.fetchFn = options.fetch ?? fetch;
  }

  get address(): string {
    return this.baseUrl;
  }

  /**
   * Read a path. Returns undefined when Vault answers 404.
   */
  async read(path: string): Promise<unknown> {
    try {
      return await this.request("GET", path);
    } catch (error) {
      if (error instanceof VaultApiError && error.status === 404) {
        return undefined;
      }
      throw error;
    }
  }

  async write(path: string, body: Record<string, unknown>): Promise<unknown> {
    return this.request("POST", path, body);
  }

  async delete(path: string): Promise<void> {
    await this.request("DELETE", path);
  }

  async request(
    method: VaultMethod,
    path: string,
    body?: Record<string, unknown>,
  ): Promise<unknown> {
    const url = `${this.baseUrl}/v1/${path.replace(/^\/+/, "")}`;
    const headers: Record<string, string> = {
      "X-Vault-Token": this.token,
      "Content-Type": "application/json",
    };
    if (this.namespace) {
      headers["X-Vault-Namespace"] = this.namespace;
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        body: body ? JSON.stringify(body) : undefined,
      });
    } catch (error) {
      throw new EndpointUnreachableError(this.baseUrl, {
        cause: error instanceof Error && error.cause instanceof Error ? error.cause : error,
      });
    }

    const text = await response.text();
    let payload: unknown;
    let parseError: unknown;
    try {
      payload = text ? JSON.parse(text) : undefined;
    } catch (error) {
      parseError = error;
    }

    if (!response.ok) {
      const parsed = ErrorBodySchema.safeParse(payload);
      throw new VaultApiError(
        method,
        path.replace(/^\/+/, ""),
        response.status,
        parsed.success ? parsed.data.errors : [],
      );
    }

    if (parseError !== undefined) {
      throw new KeyturnError(
        `Vault ${method} /v1/${path.replace(/^\/+/, "")} returned a body that is not JSON`,
        KeyturnErrorCode.INVALID_RESPONSE,
        { cause: parseError },
      );
    }

    return payload;
  }
}
