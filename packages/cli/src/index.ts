#!/usr/bin/env node

import { Command, CommanderError } from "commander";
import chalk from "chalk";
import { KEYTURN_VERSION } from "@keyturn/core";
import { plan } from "./commands/plan";
import { apply } from "./commands/apply";
import { verify } from "./commands/verify";
import { demo } from "./commands/demo";
import { destroy } from "./commands/destroy";
import { status } from "./commands/status";
import { doctor } from "./commands/doctor";

function withCommonOptions(command: Command): Command {
  return command
    .option("-c, --config <file>", "JSON file with configuration values")
    .option("--secrets-endpoint <url>", "Vault address (default: $VAULT_ADDR or http://127.0.0.1:8200)")
    .option("--simulator-endpoint <url>", "LocalStack address (default: http://localhost:4566)")
    .option("--rotation-interval <seconds>", "Static role rotation period")
    .option("--safety-margin <seconds>", "Extra wait on top of the rotation period")
    .option("--state <file>", "Provisioning state file");
}

const program = new Command();

program
  .name("keyturn")
  .description("Keyturn - zero-downtime credential rotation demo for Vault and LocalStack")
  .version(KEYTURN_VERSION);

// Provisioning
withCommonOptions(
  program
    .command("plan")
    .description("Show the order resources will be applied in")
    .option("-m, --manifest <file>", "Apply a manifest file instead of the built-in one")
).action(plan);

withCommonOptions(
  program
    .command("apply")
    .description("Create the identities, policies, secrets engine mount and static role")
    .option("-m, --manifest <file>", "Apply a manifest file instead of the built-in one")
    .option("--no-preflight", "Skip the endpoint checks before applying")
    .option("--show-sensitive", "Print secret outputs in clear text")
).action(apply);

withCommonOptions(
  program
    .command("destroy")
    .description("Remove every recorded resource")
    .option("-m, --manifest <file>", "Manifest the resources were applied from")
    .option("-y, --yes", "Skip confirmation prompts")
).action(destroy);

// Verification
withCommonOptions(
  program
    .command("verify")
    .description("Check that the managed credentials rotate without downtime")
).action(verify);

withCommonOptions(
  program
    .command("demo")
    .description("Provision, then verify the rotation")
    .option("--no-preflight", "Skip the endpoint checks before applying")
    .option("--show-sensitive", "Print secret outputs in clear text")
).action(demo);

// Status and diagnostics
withCommonOptions(
  program
    .command("status")
    .description("Show recorded resources and the live static role")
).action(status);

withCommonOptions(
  program
    .command("doctor")
    .description("Diagnose common issues with the demo setup")
).action(doctor);

// Add error handling
program.exitOverride();

program.parseAsync().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // Commander has already printed its own message.
    process.exit(error.exitCode);
  }
  console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
