import { EndpointUnreachableError, KeyturnErrorCode } from "@keyturn/adapters-common";
import { FakeClock, FakeIdentityService, FakeSecretsEngine } from "../__tests__/fakes";
import { buildRotationManifest, parseManifest, type Manifest, type RotationManifestParams } from "../manifest";
import { Provisioner } from "./provisioner";
import { MemoryStateStore } from "./state";

const params: RotationManifestParams = {
  managedUserName: "app-user",
  managerUserName: "rotation-manager",
  mountPath: "aws",
  roleName: "app-credentials",
  rotationIntervalSeconds: 61,
  region: "us-east-1",
  engineEndpoint: "http://localstack:4566",
};

const APPLY_ORDER = [
  "ManagedUser",
  "ManagedPolicy",
  "ManagedAccessKey",
  "ManagerUser",
  "ManagerPolicy",
  "ManagerAccessKey",
  "SecretBackend",
  "RotationPolicy",
];

function setup() {
  const clock = new FakeClock();
  const identity = new FakeIdentityService(clock);
  const secrets = new FakeSecretsEngine(identity, clock);
  const store = new MemoryStateStore();
  const logs: string[] = [];
  const provisioner = new Provisioner({
    identity,
    secrets,
    state: store,
    onLog: (message) => logs.push(message),
    now: clock.now,
  });
  return { clock, identity, secrets, store, logs, provisioner };
}

function manifest(): Manifest {
  return structuredClone(buildRotationManifest(params));
}

describe("Provisioner", () => {
  describe("plan", () => {
    it("plans every resource for creation against empty state", async () => {
      const { provisioner } = setup();

      const steps = await provisioner.plan(manifest());

      expect(steps.map((step) => step.logicalId)).toEqual(APPLY_ORDER);
      expect(steps.every((step) => step.action === "create")).toBe(true);
      expect(steps[7]).toEqual({
        logicalId: "RotationPolicy",
        type: "Vault::AWS::StaticRole",
        action: "create",
        dependencies: ["ManagedPolicy", "ManagerPolicy", "SecretBackend", "ManagedUser"],
      });
    });

    it("plans a refresh for recorded resources", async () => {
      const { provisioner } = setup();
      await provisioner.apply(manifest());

      const steps = await provisioner.plan(manifest());

      expect(steps.every((step) => step.action === "refresh")).toBe(true);
    });
  });

  describe("apply", () => {
    it("creates both identities, the mount and the static role", async () => {
      const { provisioner, identity, secrets } = setup();

      const result = await provisioner.apply(manifest());

      expect(result.order).toEqual(APPLY_ORDER);
      expect(Object.values(result.actions)).toEqual(Array(8).fill("created"));
      expect([...identity.users.keys()]).toEqual(["app-user", "rotation-manager"]);

      const managerPolicy = identity.users.get("rotation-manager")?.policies.get("rotate-managed-keys");
      expect(JSON.parse(managerPolicy ?? "{}").Statement[0].Resource).toBe(
        "arn:aws:iam::000000000000:user/app-user"
      );

      expect(secrets.mounts.get("aws")?.root).toEqual({
        accessKey: "AKIAFAKEKEY00002",
        secretKey: "test-secret-00002",
        region: "us-east-1",
        iamEndpoint: "http://localstack:4566",
        stsEndpoint: "http://localstack:4566",
      });
      expect(secrets.roles.get("aws/app-credentials")?.config).toEqual({
        name: "app-credentials",
        userName: "app-user",
        rotationPeriodSeconds: 61,
      });
    });

    it("resolves outputs and keeps the initial key pair sensitive", async () => {
      const { provisioner } = setup();

      const { outputs } = await provisioner.apply(manifest());

      expect(outputs.CredentialsPath).toEqual({
        value: "aws/static-creds/app-credentials",
        sensitive: false,
        description: "Secrets engine path serving the current key pair",
      });
      expect(outputs.ManagedAccessKeyId).toEqual({
        value: "AKIAFAKEKEY00001",
        sensitive: true,
        description: "Initial access key id of the managed identity",
      });
      expect(outputs.ManagedSecretAccessKey.value).toBe("test-secret-00001");
    });

    it("records every applied resource in state", async () => {
      const { provisioner, store } = setup();

      await provisioner.apply(manifest());

      const state = store.snapshot();
      expect(Object.keys(state.resources)).toEqual(APPLY_ORDER);
      expect(state.resources.RotationPolicy).toEqual({
        type: "Vault::AWS::StaticRole",
        physicalId: "aws/static-roles/app-credentials",
        attributes: {
          Name: "app-credentials",
          Backend: "aws",
          UserName: "app-user",
          CredentialsPath: "aws/static-creds/app-credentials",
        },
        appliedAt: "2026-01-01T00:00:00.000Z",
      });
    });

    it("leaves exactly two identities when run again", async () => {
      const { provisioner, identity } = setup();
      await provisioner.apply(manifest());
      identity.calls.length = 0;

      const result = await provisioner.apply(manifest());

      expect(identity.users.size).toBe(2);
      expect(Object.values(result.actions)).toEqual(Array(8).fill("unchanged"));
      expect(identity.calls).not.toContain("createUser");
      expect(identity.calls).not.toContain("createAccessKey");
      expect(identity.calls).not.toContain("putUserPolicy");
    });

    it("rewrites a policy whose document drifted", async () => {
      const { provisioner, identity } = setup();
      await provisioner.apply(manifest());
      identity.users
        .get("app-user")
        ?.policies.set("compute-read", '{"Version":"2012-10-17","Statement":[]}');

      const result = await provisioner.apply(manifest());

      expect(result.actions.ManagedPolicy).toBe("updated");
      expect(result.actions.ManagerPolicy).toBe("unchanged");
      expect(JSON.parse(identity.users.get("app-user")?.policies.get("compute-read") ?? "{}").Statement).toHaveLength(1);
    });

    it("fails before any remote call when the manager policy is missing", async () => {
      const { provisioner, identity, secrets } = setup();
      const broken = manifest();
      delete broken.Resources.ManagerPolicy;

      await expect(provisioner.apply(broken)).rejects.toMatchObject({
        code: KeyturnErrorCode.DEPENDENCY_MISSING,
        logicalId: "ManagerAccessKey",
      });
      expect(identity.calls).toEqual([]);
      expect(secrets.calls).toEqual([]);
    });

    it("aborts when the secrets service is unreachable", async () => {
      const { provisioner, identity, secrets } = setup();
      secrets.healthError = new EndpointUnreachableError("http://127.0.0.1:8200");

      await expect(provisioner.apply(manifest())).rejects.toMatchObject({
        code: KeyturnErrorCode.ENDPOINT_UNREACHABLE,
        message: "Secrets service is unreachable: Endpoint http://127.0.0.1:8200 is unreachable",
      });
      expect(identity.calls).toEqual([]);
    });

    it("aborts when the secrets service is sealed", async () => {
      const { provisioner, secrets } = setup();
      secrets.health = { initialized: true, sealed: true };

      await expect(provisioner.apply(manifest())).rejects.toThrow("Secrets service is sealed");
    });

    it("aborts when the simulator does not answer IAM calls", async () => {
      const { provisioner, identity } = setup();
      identity.failOn("listUsers", new Error("connect ECONNREFUSED 127.0.0.1:4566"));

      await expect(provisioner.apply(manifest())).rejects.toThrow(
        "Cloud simulator is unreachable: connect ECONNREFUSED 127.0.0.1:4566"
      );
      expect(identity.calls).toEqual(["listUsers"]);
    });

    it("skips the endpoint check when asked", async () => {
      const { provisioner, secrets } = setup();

      await provisioner.apply(manifest(), { preflight: false });

      expect(secrets.calls).not.toContain("checkHealth");
    });

    it("stops at the first failing resource and keeps earlier ones recorded", async () => {
      const { provisioner, identity, store } = setup();
      identity.failOn("createAccessKey", new Error("boom"));

      await expect(provisioner.apply(manifest())).rejects.toMatchObject({
        code: KeyturnErrorCode.RESOURCE_FAILED,
        logicalId: "ManagedAccessKey",
        message: 'Failed to apply resource "ManagedAccessKey" (AWS::IAM::AccessKey): boom',
      });
      expect(Object.keys(store.snapshot().resources)).toEqual(["ManagedUser", "ManagedPolicy"]);
      expect(identity.users.has("rotation-manager")).toBe(false);
    });

    it("reports invalid resource properties", async () => {
      const { provisioner } = setup();
      const broken = parseManifest({
        Resources: { Deployer: { Type: "AWS::IAM::User", Properties: { Path: "/" } } },
      });

      await expect(provisioner.apply(broken, { preflight: false })).rejects.toMatchObject({
        code: KeyturnErrorCode.INVALID_MANIFEST,
        logicalId: "Deployer",
        message: 'Resource "Deployer" (AWS::IAM::User) has invalid properties: UserName: Required',
      });
    });

    it("logs one line per resource", async () => {
      const { provisioner, logs } = setup();

      await provisioner.apply(manifest(), { preflight: false });

      expect(logs).toEqual(APPLY_ORDER.map((id) => expect.stringMatching(new RegExp(`^${id} \\(.+\\): created$`))));
    });
  });

  describe("destroy", () => {
    it("removes everything, including keys minted by rotation", async () => {
      const { provisioner, identity, secrets, store, clock } = setup();
      await provisioner.apply(manifest());
      await clock.sleep(65_000);
      await secrets.readStaticCredentials("aws", "app-credentials");

      const destroyed = await provisioner.destroy(manifest());

      expect(destroyed).toEqual([...APPLY_ORDER].reverse());
      expect(identity.users.size).toBe(0);
      expect(secrets.mounts.size).toBe(0);
      expect(store.snapshot()).toEqual({
        version: 1,
        resources: {},
        outputs: {},
        updatedAt: "2026-01-01T00:01:05.000Z",
      });
    });

    it("does nothing for resources that were never applied", async () => {
      const { provisioner, identity } = setup();

      await expect(provisioner.destroy(manifest())).resolves.toEqual([]);
      expect(identity.calls).toEqual([]);
    });
  });
});
