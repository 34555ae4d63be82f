import chalk from "chalk";
import ora from "ora";
import { maskAccessKeyId } from "@keyturn/adapters-common";
import { createServices, resolveConfig, type CommonOptions } from "../context";
import { formatOutputs } from "../output";

export async function status(options: CommonOptions) {
  console.log(chalk.blue.bold("📊 Keyturn Status\n"));

  const config = await resolveConfig(options);
  const services = createServices(config);
  const state = await services.state.load();

  console.log(chalk.white(`State file: ${chalk.cyan(config.stateFile)}`));
  console.log(chalk.white(`Secrets service: ${chalk.cyan(config.secretsEndpoint)}`));
  console.log(chalk.white(`Simulator: ${chalk.cyan(config.simulatorEndpoint)}`));
  console.log();

  const entries = Object.entries(state.resources);
  if (entries.length === 0) {
    console.log(chalk.yellow("Nothing provisioned yet. Run 'keyturn apply' first."));
    return;
  }

  console.log(chalk.white.bold("Resources"));
  for (const [logicalId, resource] of entries) {
    const physicalId =
      resource.type === "AWS::IAM::AccessKey" ? maskAccessKeyId(resource.physicalId) : resource.physicalId;
    console.log(`  ${chalk.cyan(logicalId)} ${chalk.gray(`(${resource.type})`)} ${physicalId}`);
  }
  if (state.updatedAt) {
    console.log(chalk.gray(`  last updated ${state.updatedAt}`));
  }

  if (Object.keys(state.outputs).length > 0) {
    console.log();
    console.log(chalk.white.bold("Outputs"));
    for (const line of formatOutputs(state.outputs)) {
      console.log(line);
    }
  }
  console.log();

  const spinner = ora("Reading live static role...").start();
  try {
    const role = await services.secrets.readStaticRole(config.mountPath, config.roleName);
    if (!role) {
      spinner.warn(`Static role ${config.mountPath}/static-roles/${config.roleName} not found`);
      return;
    }
    spinner.succeed(
      `Static role ${config.roleName} rotates ${role.userName} every ${role.rotationPeriodSeconds}s`
    );

    const credentials = await services.secrets.readStaticCredentials(config.mountPath, config.roleName);
    console.log(chalk.white(`  Current key: ${chalk.cyan(maskAccessKeyId(credentials.accessKeyId))}`));
  } catch (error) {
    spinner.fail(`Could not reach the secrets service: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}
