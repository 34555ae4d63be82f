import { AwsSecretsEngine } from "../aws-secrets-engine";
import { VaultClient } from "../vault-client";
import { KeyturnError, KeyturnErrorCode } from "@keyturn/adapters-common";
import { jsonResponse } from "./helpers";

const READ_AT = new Date("2026-03-01T12:00:00Z");

describe("AwsSecretsEngine", () => {
  let fetchMock: jest.Mock;
  let engine: AwsSecretsEngine;

  beforeEach(() => {
    fetchMock = jest.fn();
    const client = new VaultClient({
      address: "http://127.0.0.1:8200",
      token: "test-token",
      fetch: fetchMock,
    });
    engine = new AwsSecretsEngine(client, () => READ_AT);
  });

  const lastCall = (): { url: string; method: string; body: unknown } => {
    const [url, init] = fetchMock.mock.calls[fetchMock.mock.calls.length - 1];
    return { url, method: init.method, body: init.body ? JSON.parse(init.body) : undefined };
  };

  describe("checkHealth", () => {
    it("reads sys/health in every seal state", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(200, { initialized: true, sealed: false, standby: false, version: "1.17.0" }),
      );

      const health = await engine.checkHealth();

      expect(health).toEqual({ initialized: true, sealed: false, version: "1.17.0" });
      expect(lastCall().url).toBe(
        "http://127.0.0.1:8200/v1/sys/health?standbyok=true&sealedcode=200&uninitcode=200",
      );
    });
  });

  describe("isMounted", () => {
    it("finds an aws engine at the path", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(200, { data: { "aws/": { type: "aws" }, "secret/": { type: "kv" } } }),
      );

      await expect(engine.isMounted("/aws/")).resolves.toBe(true);
    });

    it("ignores mounts of another type", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, { data: { "aws/": { type: "kv" } } }));

      await expect(engine.isMounted("aws")).resolves.toBe(false);
    });
  });

  describe("configuration writes", () => {
    it("mounts the aws engine", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(204));

      await engine.mount("aws", { description: "rotation demo" });

      expect(lastCall()).toEqual({
        url: "http://127.0.0.1:8200/v1/sys/mounts/aws",
        method: "POST",
        body: { type: "aws", description: "rotation demo" },
      });
    });

    it("writes root credentials and endpoints", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(204));

      await engine.configureRoot("aws", {
        accessKey: "AKIAMANAGER00001",
        secretKey: "test-secret",
        region: "us-east-1",
        iamEndpoint: "http://localstack:4566",
        stsEndpoint: "http://localstack:4566",
      });

      expect(lastCall()).toEqual({
        url: "http://127.0.0.1:8200/v1/aws/config/root",
        method: "POST",
        body: {
          access_key: "AKIAMANAGER00001",
          secret_key: "test-secret",
          region: "us-east-1",
          iam_endpoint: "http://localstack:4566",
          sts_endpoint: "http://localstack:4566",
        },
      });
    });

    it("writes a static role with its rotation period in seconds", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(204));

      await engine.writeStaticRole("aws", {
        name: "app-credentials",
        userName: "app-user",
        rotationPeriodSeconds: 61,
      });

      expect(lastCall()).toEqual({
        url: "http://127.0.0.1:8200/v1/aws/static-roles/app-credentials",
        method: "POST",
        body: { username: "app-user", rotation_period: 61 },
      });
    });
  });

  describe("readStaticRole", () => {
    it("parses duration strings", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(200, { data: { name: "app-credentials", username: "app-user", rotation_period: "1m1s" } }),
      );

      await expect(engine.readStaticRole("aws", "app-credentials")).resolves.toEqual({
        mountPath: "aws",
        name: "app-credentials",
        userName: "app-user",
        rotationPeriodSeconds: 61,
      });
    });

    it("returns undefined when the role does not exist", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(404, { errors: [] }));

      await expect(engine.readStaticRole("aws", "app-credentials")).resolves.toBeUndefined();
    });
  });

  describe("readStaticCredentials", () => {
    it("returns a snapshot with lease metadata", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse(200, {
          request_id: "req-1",
          lease_id: "",
          lease_duration: 0,
          renewable: false,
          data: { access_key: "AKIAROTATED00001", secret_key: "test-secret" },
        }),
      );

      const snapshot = await engine.readStaticCredentials("aws", "app-credentials");

      expect(snapshot).toEqual({
        accessKeyId: "AKIAROTATED00001",
        secretAccessKey: "test-secret",
        lease: { leaseId: "", leaseDurationSeconds: 0, renewable: false },
        readAt: READ_AT,
      });
      expect(lastCall().url).toBe("http://127.0.0.1:8200/v1/aws/static-creds/app-credentials");
    });

    it("fails with NOT_FOUND when the role has no credentials", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(404, { errors: [] }));

      const error = await engine.readStaticCredentials("aws", "app-credentials").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(KeyturnError);
      expect(error).toMatchObject({
        code: KeyturnErrorCode.NOT_FOUND,
        message: "No credentials found at aws/static-creds/app-credentials",
      });
    });

    it("rejects malformed bodies", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(200, { data: { access_key: "AKIAROTATED00001" } }));

      const error = await engine.readStaticCredentials("aws", "app-credentials").catch((e: unknown) => e);

      expect(error).toMatchObject({
        code: KeyturnErrorCode.INVALID_RESPONSE,
        message: "Unexpected response from aws/static-creds/app-credentials: data.secret_key: Required",
      });
    });
  });
});
