import chalk from "chalk";
import { createServices, resolveConfig } from "../context";
import { runApply, type ApplyOptions } from "./apply";
import { runVerify } from "./verify";

export async function demo(options: ApplyOptions) {
  console.log(chalk.blue.bold("🔐 Keyturn rotation demo\n"));

  const config = await resolveConfig(options);
  const services = createServices(config);

  console.log(chalk.white.bold("Step 1/2: provision"));
  await runApply(config, services, options);

  console.log(chalk.white.bold("Step 2/2: verify rotation"));
  await runVerify(config, services);
}
