import chalk from "chalk";
import type { Ora } from "ora";
import type { LogCallback } from "@keyturn/adapters-common";
import { maskAccessKeyId, redactSecret } from "@keyturn/adapters-common";
import type {
  OutputState,
  PlanStep,
  ResourceAction,
  VerificationReport,
} from "@keyturn/core";

/** Prints progress lines above a running spinner. */
export function spinnerLog(spinner: Ora): LogCallback {
  return (message, stream) => {
    spinner.clear();
    const line = chalk.gray(`  ${message}`);
    if (stream === "stderr") {
      console.error(line);
    } else {
      console.log(line);
    }
    spinner.render();
  };
}

const ACTION_STYLES: Record<ResourceAction | PlanStep["action"], (text: string) => string> = {
  created: chalk.green,
  create: chalk.green,
  updated: chalk.yellow,
  refresh: chalk.cyan,
  unchanged: chalk.gray,
};

export function formatAction(action: ResourceAction | PlanStep["action"]): string {
  return ACTION_STYLES[action](action.padEnd(9));
}

export function formatPlan(steps: PlanStep[]): string[] {
  return steps.map((step, index) => {
    const after = step.dependencies.length > 0 ? chalk.gray(` after ${step.dependencies.join(", ")}`) : "";
    return `  ${String(index + 1).padStart(2)}. ${formatAction(step.action)} ${chalk.cyan(step.logicalId)} ${chalk.gray(`(${step.type})`)}${after}`;
  });
}

/**
 * Renders outputs one per line. Sensitive values are redacted unless
 * `showSensitive` is set.
 */
export function formatOutputs(outputs: Record<string, OutputState>, showSensitive = false): string[] {
  return Object.entries(outputs).map(([name, output]) => {
    const value = output.sensitive && !showSensitive ? chalk.gray(redactSecret(output.value)) : output.value;
    return `  ${chalk.white(name)}: ${value}`;
  });
}

export function formatReport(report: VerificationReport): string[] {
  const lines = [`  Phases: ${report.phases.join(" → ")}`];
  if (report.initialAccessKeyId) {
    lines.push(
      `  Initial key: ${maskAccessKeyId(report.initialAccessKeyId)} (${report.initialInstanceCount ?? "-"} instance(s))`
    );
  }
  if (report.rotatedAccessKeyId) {
    lines.push(
      `  Rotated key: ${maskAccessKeyId(report.rotatedAccessKeyId)} (${report.rotatedInstanceCount ?? "-"} instance(s))`
    );
  }
  if (report.waitedMs > 0) {
    lines.push(`  Waited: ${report.waitedMs / 1000}s`);
  }
  const verdict = report.success
    ? chalk.green(`✓ ${report.message}`)
    : chalk.red(`✗ ${report.failedPhase ?? "DONE"}: ${report.message}`);
  lines.push(`  ${verdict}`);
  return lines;
}

export interface CheckResult {
  name: string;
  status: "pass" | "fail" | "warn" | "skip";
  message: string;
  fix?: string;
}

export function formatCheck(check: CheckResult): string[] {
  const icon = check.status === "pass" ? chalk.green("✓") :
               check.status === "fail" ? chalk.red("✗") :
               check.status === "skip" ? chalk.gray("—") :
               chalk.yellow("⚠");

  const color = check.status === "pass" ? chalk.green :
                check.status === "fail" ? chalk.red :
                check.status === "skip" ? chalk.gray :
                chalk.yellow;

  const lines = [`${icon} ${check.name}: ${color(check.message)}`];
  if (check.fix && check.status !== "pass") {
    lines.push(chalk.gray(`   Fix: ${check.fix}`));
  }
  return lines;
}
