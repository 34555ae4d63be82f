import chalk from "chalk";
import ora from "ora";
import fs from "fs-extra";
import type { IIdentityService, ISecretsEngine } from "@keyturn/adapters-common";
import type { RotationDemoConfig } from "@keyturn/core";
import { createServices, resolveConfig, type CommonOptions } from "../context";
import { formatCheck, type CheckResult } from "../output";

const MIN_NODE_MAJOR = 20;

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function checkNodeVersion(version: string = process.version): CheckResult {
  const major = parseInt(version.slice(1).split(".")[0], 10);
  return major >= MIN_NODE_MAJOR
    ? { name: "Node.js version", status: "pass", message: version }
    : {
        name: "Node.js version",
        status: "fail",
        message: `${version} (requires ${MIN_NODE_MAJOR}+)`,
        fix: `Upgrade Node.js to version ${MIN_NODE_MAJOR} or higher`,
      };
}

/**
 * Checks both endpoints and the provisioned resources. Later checks are
 * skipped when the endpoint they need is down.
 */
export async function runChecks(
  config: RotationDemoConfig,
  services: { identity: IIdentityService; secrets: ISecretsEngine }
): Promise<CheckResult[]> {
  const checks: CheckResult[] = [];

  let secretsUp = false;
  try {
    const health = await services.secrets.checkHealth();
    if (!health.initialized) {
      checks.push({
        name: "Secrets service",
        status: "fail",
        message: "Not initialized",
        fix: "Start Vault in dev mode: docker compose up -d vault",
      });
    } else if (health.sealed) {
      checks.push({
        name: "Secrets service",
        status: "fail",
        message: "Sealed",
        fix: "Unseal it with 'vault operator unseal'",
      });
    } else {
      secretsUp = true;
      checks.push({
        name: "Secrets service",
        status: "pass",
        message: `${config.secretsEndpoint}${health.version ? ` (Vault ${health.version})` : ""}`,
      });
    }
  } catch (error) {
    checks.push({
      name: "Secrets service",
      status: "fail",
      message: reason(error),
      fix: `Start it with 'docker compose up -d vault' or set VAULT_ADDR`,
    });
  }

  try {
    const users = await services.identity.listUsers();
    checks.push({
      name: "Cloud simulator",
      status: "pass",
      message: `${config.simulatorEndpoint} (${users.length} IAM user(s))`,
    });
  } catch (error) {
    checks.push({
      name: "Cloud simulator",
      status: "fail",
      message: reason(error),
      fix: "Start it with 'docker compose up -d localstack' or set KEYTURN_SIMULATOR_ENDPOINT",
    });
  }

  if (!secretsUp) {
    checks.push({ name: "Secrets engine mount", status: "skip", message: "Secrets service unavailable" });
    checks.push({ name: "Static role", status: "skip", message: "Secrets service unavailable" });
    return checks;
  }

  try {
    if (await services.secrets.isMounted(config.mountPath)) {
      checks.push({ name: "Secrets engine mount", status: "pass", message: `${config.mountPath}/` });

      const role = await services.secrets.readStaticRole(config.mountPath, config.roleName);
      checks.push(
        role
          ? {
              name: "Static role",
              status: "pass",
              message: `${config.roleName} rotates ${role.userName} every ${role.rotationPeriodSeconds}s`,
            }
          : {
              name: "Static role",
              status: "warn",
              message: `${config.roleName} not found`,
              fix: "Run 'keyturn apply'",
            }
      );
    } else {
      checks.push({
        name: "Secrets engine mount",
        status: "warn",
        message: `Nothing mounted at ${config.mountPath}/`,
        fix: "Run 'keyturn apply'",
      });
      checks.push({ name: "Static role", status: "skip", message: "No mount" });
    }
  } catch (error) {
    checks.push({ name: "Secrets engine mount", status: "fail", message: reason(error) });
  }

  return checks;
}

export async function checkStateFile(stateFile: string): Promise<CheckResult> {
  if (!(await fs.pathExists(stateFile))) {
    return {
      name: "State file",
      status: "warn",
      message: `${stateFile} does not exist yet`,
      fix: "Run 'keyturn apply'",
    };
  }

  const stat = await fs.stat(stateFile);
  if (process.platform !== "win32" && stat.mode & 0o077) {
    return {
      name: "State file",
      status: "warn",
      message: `${stateFile} is readable by other users (${(stat.mode & 0o777).toString(8)})`,
      fix: `chmod 600 ${stateFile}`,
    };
  }
  return { name: "State file", status: "pass", message: stateFile };
}

export async function doctor(options: CommonOptions) {
  console.log(chalk.blue.bold("🔧 Keyturn Doctor\n"));
  console.log(chalk.gray("Diagnosing the rotation demo setup...\n"));

  const checks: CheckResult[] = [checkNodeVersion()];
  const spinner = ora("Running diagnostics...").start();

  let config: RotationDemoConfig | undefined;
  try {
    config = await resolveConfig(options);
    checks.push({
      name: "Configuration",
      status: "pass",
      message: `interval ${config.rotationIntervalSeconds}s, margin ${config.safetyMarginSeconds}s`,
    });
  } catch (error) {
    checks.push({
      name: "Configuration",
      status: "fail",
      message: reason(error),
      fix: "Fix the flags, environment variables or --config file listed above",
    });
  }

  if (config) {
    checks.push(...(await runChecks(config, createServices(config))));
    checks.push(await checkStateFile(config.stateFile));
  }

  spinner.stop();

  const passCount = checks.filter((c) => c.status === "pass").length;
  const failCount = checks.filter((c) => c.status === "fail").length;
  const warnCount = checks.filter((c) => c.status === "warn").length;

  for (const check of checks) {
    for (const line of formatCheck(check)) {
      console.log(line);
    }
  }

  console.log();

  if (failCount === 0 && warnCount === 0) {
    console.log(chalk.green.bold("✓ All checks passed!"));
  } else {
    console.log(
      chalk.white("Summary: ") +
        chalk.green(`${passCount} passed`) +
        (failCount > 0 ? ", " + chalk.red(`${failCount} failed`) : "") +
        (warnCount > 0 ? ", " + chalk.yellow(`${warnCount} warnings`) : "")
    );

    if (failCount > 0) {
      console.log();
      console.log(chalk.red("Please fix the failed checks before running the demo."));
      process.exitCode = 1;
    }
  }

  console.log();
}
