import chalk from "chalk";
import { Provisioner } from "@keyturn/core";
import { createServices, resolveConfig, resolveManifest, type CommonOptions } from "../context";
import { formatPlan } from "../output";

export interface PlanOptions extends CommonOptions {
  manifest?: string;
}

export async function plan(options: PlanOptions) {
  const config = await resolveConfig(options);
  const services = createServices(config);
  const manifest = await resolveManifest(config, options.manifest);

  const provisioner = new Provisioner({
    identity: services.identity,
    secrets: services.secrets,
    state: services.state,
  });
  const steps = await provisioner.plan(manifest);

  console.log(chalk.blue.bold("📋 Provisioning plan\n"));
  if (manifest.Description) {
    console.log(chalk.gray(`${manifest.Description}\n`));
  }
  for (const line of formatPlan(steps)) {
    console.log(line);
  }

  const creates = steps.filter((step) => step.action === "create").length;
  console.log();
  console.log(
    chalk.white("Summary: ") +
      chalk.green(`${creates} to create`) +
      ", " +
      chalk.cyan(`${steps.length - creates} to refresh`)
  );
  console.log(chalk.gray(`State file: ${services.state.filePath}`));
}
