import chalk from "chalk";
import inquirer from "inquirer";
import ora from "ora";
import { Provisioner } from "@keyturn/core";
import { createServices, resolveConfig, resolveManifest, type CommonOptions } from "../context";
import { spinnerLog } from "../output";

export interface DestroyOptions extends CommonOptions {
  manifest?: string;
  yes?: boolean;
}

export async function destroy(options: DestroyOptions) {
  console.log(chalk.red.bold("🗑  Keyturn destroy\n"));

  const config = await resolveConfig(options);
  const services = createServices(config);
  const manifest = await resolveManifest(config, options.manifest);

  const recorded = Object.keys((await services.state.load()).resources);
  if (recorded.length === 0) {
    console.log(chalk.yellow(`Nothing recorded in ${config.stateFile}; nothing to destroy.`));
    return;
  }

  console.log(chalk.white(`Resources to remove: ${chalk.cyan(recorded.join(", "))}\n`));

  if (!options.yes) {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: "confirm",
        name: "confirmed",
        message: `Delete ${recorded.length} resource(s), including users ${config.managedUserName} and ${config.managerUserName}?`,
        default: false,
      },
    ]);
    if (!confirmed) {
      console.log(chalk.gray("Aborted."));
      return;
    }
  }

  const spinner = ora("Tearing down...").start();
  const provisioner = new Provisioner({
    identity: services.identity,
    secrets: services.secrets,
    state: services.state,
    onLog: spinnerLog(spinner),
  });

  try {
    const destroyed = await provisioner.destroy(manifest);
    spinner.succeed(`Destroyed ${destroyed.length} resource(s)`);
  } catch (error) {
    spinner.fail("Teardown stopped");
    throw error;
  }
}
