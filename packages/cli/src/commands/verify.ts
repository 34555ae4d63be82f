import chalk from "chalk";
import ora from "ora";
import { RotationVerifier, type RotationDemoConfig, type VerificationReport } from "@keyturn/core";
import { createServices, resolveConfig, type CommonOptions, type Services } from "../context";
import { formatReport, spinnerLog } from "../output";

const PHASE_LABELS = {
  INIT: "Reading current credentials...",
  FIRST_VERIFY: "Authenticating with the current key...",
  WAIT: "Waiting for the rotation to fire...",
  SECOND_VERIFY: "Re-reading and re-authenticating...",
  DONE: "Done",
} as const;

/**
 * Runs the rotation check and prints its report. Sets a failing exit
 * code when the check fails. Shared with `demo`.
 */
export async function runVerify(
  config: RotationDemoConfig,
  services: Services
): Promise<VerificationReport> {
  const spinner = ora(PHASE_LABELS.INIT).start();

  const verifier = new RotationVerifier(
    {
      credentials: services.secrets,
      compute: services.compute,
      onLog: spinnerLog(spinner),
      onPhase: (phase) => {
        spinner.text = PHASE_LABELS[phase];
      },
    },
    config
  );

  let report: VerificationReport;
  try {
    report = await verifier.run();
  } catch (error) {
    spinner.fail("Rotation check aborted");
    throw error;
  }
  if (report.success) {
    spinner.succeed("Rotation verified");
  } else {
    spinner.fail(`Rotation check failed in ${report.failedPhase ?? "DONE"}`);
    process.exitCode = 1;
  }

  console.log();
  for (const line of formatReport(report)) {
    console.log(line);
  }
  console.log();
  return report;
}

export async function verify(options: CommonOptions) {
  console.log(chalk.blue.bold("🔁 Keyturn verify\n"));

  const config = await resolveConfig(options);
  console.log(
    chalk.gray(
      `Reading ${config.mountPath}/static-creds/${config.roleName} from ${config.secretsEndpoint}; ` +
        `this takes about ${config.rotationIntervalSeconds + config.safetyMarginSeconds}s\n`
    )
  );

  await runVerify(config, createServices(config));
}
