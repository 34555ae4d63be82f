import fs from "fs-extra";
import { promises as fsp } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigError } from "@keyturn/adapters-common";
import { resolveConfig, resolveManifest } from "./context";

describe("context", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), "keyturn-cli-"));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  describe("resolveConfig", () => {
    it("lets flags win over the config file and the file over the environment", async () => {
      const file = path.join(dir, "config.json");
      await fs.writeJson(file, { rotationIntervalSeconds: 120, roleName: "web-credentials" });

      const config = await resolveConfig(
        { config: file, rotationInterval: "75" },
        { KEYTURN_ROTATION_INTERVAL: "90", KEYTURN_ROLE_NAME: "ignored", VAULT_ADDR: "http://vault:8200" }
      );

      expect(config.rotationIntervalSeconds).toBe(75);
      expect(config.roleName).toBe("web-credentials");
      expect(config.secretsEndpoint).toBe("http://vault:8200");
    });

    it("rejects a config file that is not a JSON object", async () => {
      const file = path.join(dir, "config.json");
      await fs.writeJson(file, [1, 2]);

      await expect(resolveConfig({ config: file }, {})).rejects.toEqual(
        new ConfigError([`${file}: expected a JSON object`])
      );
    });

    it("reports invalid flag values", async () => {
      await expect(resolveConfig({ safetyMargin: "0" }, {})).rejects.toThrow(
        "Invalid configuration: safetyMarginSeconds: Number must be greater than 0"
      );
    });
  });

  describe("resolveManifest", () => {
    it("builds the rotation manifest from the configuration", async () => {
      const config = await resolveConfig({}, { KEYTURN_MANAGED_USER: "billing" });

      const manifest = await resolveManifest(config);

      expect(manifest.Resources.ManagedUser.Properties).toMatchObject({ UserName: "billing" });
    });

    it("parses a manifest file", async () => {
      const file = path.join(dir, "manifest.json");
      await fs.writeJson(file, {
        Resources: { Deployer: { Type: "AWS::IAM::User", Properties: { UserName: "deployer" } } },
      });

      const config = await resolveConfig({}, {});
      const manifest = await resolveManifest(config, file);

      expect(Object.keys(manifest.Resources)).toEqual(["Deployer"]);
      expect(manifest.Outputs).toEqual({});
    });
  });
});
