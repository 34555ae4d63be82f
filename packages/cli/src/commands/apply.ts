import chalk from "chalk";
import ora from "ora";
import { Provisioner, type ApplyResult, type RotationDemoConfig } from "@keyturn/core";
import { createServices, resolveConfig, resolveManifest, type CommonOptions, type Services } from "../context";
import { formatAction, formatOutputs, spinnerLog } from "../output";

export interface ApplyOptions extends CommonOptions {
  manifest?: string;
  /** Commander sets this to false for `--no-preflight`. */
  preflight?: boolean;
  showSensitive?: boolean;
}

/**
 * Runs the provisioning pass with a spinner and prints the outcome.
 * Shared with `demo`.
 */
export async function runApply(
  config: RotationDemoConfig,
  services: Services,
  options: ApplyOptions
): Promise<ApplyResult> {
  const manifest = await resolveManifest(config, options.manifest);
  const spinner = ora("Provisioning rotation resources...").start();

  const provisioner = new Provisioner({
    identity: services.identity,
    secrets: services.secrets,
    state: services.state,
    onLog: spinnerLog(spinner),
  });

  let result: ApplyResult;
  try {
    result = await provisioner.apply(manifest, { preflight: options.preflight !== false });
  } catch (error) {
    spinner.fail("Provisioning failed");
    throw error;
  }
  spinner.succeed(`Provisioned ${result.order.length} resource(s)`);

  console.log();
  for (const logicalId of result.order) {
    console.log(`  ${formatAction(result.actions[logicalId])} ${chalk.cyan(logicalId)}`);
  }

  if (Object.keys(result.outputs).length > 0) {
    console.log();
    console.log(chalk.white.bold("Outputs"));
    for (const line of formatOutputs(result.outputs, options.showSensitive === true)) {
      console.log(line);
    }
  }
  console.log();
  return result;
}

export async function apply(options: ApplyOptions) {
  console.log(chalk.blue.bold("🔐 Keyturn apply\n"));

  const config = await resolveConfig(options);
  await runApply(config, createServices(config), options);

  console.log(chalk.gray(`State written to ${config.stateFile}`));
}
