import type { IIdentityService, ISecretsEngine } from "@keyturn/adapters-common";
import { loadConfig } from "@keyturn/core";
import { checkNodeVersion, runChecks } from "./doctor";

describe("doctor", () => {
  const config = loadConfig({ env: {} });

  function services() {
    const identity = { listUsers: jest.fn().mockResolvedValue([]) };
    const secrets = {
      checkHealth: jest.fn().mockResolvedValue({ initialized: true, sealed: false, version: "1.15.0" }),
      isMounted: jest.fn().mockResolvedValue(true),
      readStaticRole: jest.fn().mockResolvedValue({
        name: "app-credentials",
        userName: "app-user",
        rotationPeriodSeconds: 61,
        mountPath: "aws",
      }),
    };
    return {
      identity,
      secrets,
      deps: {
        identity: identity as unknown as IIdentityService,
        secrets: secrets as unknown as ISecretsEngine,
      },
    };
  }

  it("passes every check on a provisioned setup", async () => {
    const { deps } = services();

    await expect(runChecks(config, deps)).resolves.toEqual([
      { name: "Secrets service", status: "pass", message: "http://127.0.0.1:8200 (Vault 1.15.0)" },
      { name: "Cloud simulator", status: "pass", message: "http://localhost:4566 (0 IAM user(s))" },
      { name: "Secrets engine mount", status: "pass", message: "aws/" },
      { name: "Static role", status: "pass", message: "app-credentials rotates app-user every 61s" },
    ]);
  });

  it("skips mount checks when the secrets service is down", async () => {
    const { deps, secrets } = services();
    secrets.checkHealth.mockRejectedValue(new Error("Endpoint http://127.0.0.1:8200 is unreachable"));

    const checks = await runChecks(config, deps);

    expect(checks.map((check) => check.status)).toEqual(["fail", "pass", "skip", "skip"]);
    expect(checks[0].message).toBe("Endpoint http://127.0.0.1:8200 is unreachable");
    expect(secrets.isMounted).not.toHaveBeenCalled();
  });

  it("flags a sealed secrets service", async () => {
    const { deps, secrets } = services();
    secrets.checkHealth.mockResolvedValue({ initialized: true, sealed: true });

    const [check] = await runChecks(config, deps);

    expect(check).toEqual({
      name: "Secrets service",
      status: "fail",
      message: "Sealed",
      fix: "Unseal it with 'vault operator unseal'",
    });
  });

  it("suggests apply when nothing is mounted", async () => {
    const { deps, secrets } = services();
    secrets.isMounted.mockResolvedValue(false);

    const checks = await runChecks(config, deps);

    expect(checks.slice(2)).toEqual([
      {
        name: "Secrets engine mount",
        status: "warn",
        message: "Nothing mounted at aws/",
        fix: "Run 'keyturn apply'",
      },
      { name: "Static role", status: "skip", message: "No mount" },
    ]);
  });

  it("requires Node.js 20", () => {
    expect(checkNodeVersion("v20.11.1").status).toBe("pass");
    expect(checkNodeVersion("v18.19.0")).toMatchObject({
      status: "fail",
      message: "v18.19.0 (requires 20+)",
    });
  });
});
