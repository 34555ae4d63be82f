/**
 * Rotation verifier.
 *
 * Proves that the secrets engine rotated a key pair without downtime:
 *
 *   INIT          read the current key pair
 *   FIRST_VERIFY  authenticate a compute listing call with it
 *   WAIT          sleep for the rotation interval plus a safety margin
 *   SECOND_VERIFY read again, authenticate again, require a new key id
 *   DONE          report
 *
 * Failures are reported, never retried.
 */

import {
  maskAccessKeyId,
  type CredentialSnapshot,
  type ICredentialSource,
  type IComputeProbe,
  type LogCallback,
} from "@keyturn/adapters-common";
import { errorMessage } from "../errors";
import { rotationWaitMs } from "../config";

export type VerificationPhase = "INIT" | "FIRST_VERIFY" | "WAIT" | "SECOND_VERIFY" | "DONE";

export interface VerificationOptions {
  mountPath: string;
  roleName: string;
  rotationIntervalSeconds: number;
  /** Added to the interval so the wait always exceeds it. */
  safetyMarginSeconds: number;
}

export interface VerifierDependencies {
  credentials: ICredentialSource;
  compute: IComputeProbe;
  sleep?: (ms: number) => Promise<void>;
  onLog?: LogCallback;
  onPhase?: (phase: VerificationPhase) => void;
}

export interface VerificationReport {
  success: boolean;
  message: string;
  phases: VerificationPhase[];
  failedPhase?: VerificationPhase;
  initialAccessKeyId?: string;
  rotatedAccessKeyId?: string;
  initialInstanceCount?: number;
  rotatedInstanceCount?: number;
  waitedMs: number;
}

class PhaseFailure extends Error {
  constructor(readonly phase: VerificationPhase, message: string) {
    super(message);
    this.name = "PhaseFailure";
  }
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class RotationVerifier {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: LogCallback;

  constructor(
    private readonly deps: VerifierDependencies,
    private readonly options: VerificationOptions
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.log = deps.onLog ?? (() => {});
  }

  get waitMs(): number {
    return rotationWaitMs(this.options);
  }

  private get credentialsPath(): string {
    return `${this.options.mountPath}/static-creds/${this.options.roleName}`;
  }

  async run(): Promise<VerificationReport> {
    const report: VerificationReport = { success: false, message: "", phases: [], waitedMs: 0 };

    try {
      this.enter("INIT", report);
      const initial = await this.readCredentials("INIT");
      report.initialAccessKeyId = initial.accessKeyId;

      this.enter("FIRST_VERIFY", report);
      report.initialInstanceCount = await this.probe("FIRST_VERIFY", initial, "Initial");

      this.enter("WAIT", report);
      this.log(
        `Waiting ${this.waitMs / 1000}s for rotation ` +
          `(interval ${this.options.rotationIntervalSeconds}s + margin ${this.options.safetyMarginSeconds}s)`
      );
      await this.sleep(this.waitMs);
      report.waitedMs = this.waitMs;

      this.enter("SECOND_VERIFY", report);
      const rotated = await this.readCredentials("SECOND_VERIFY");
      report.rotatedAccessKeyId = rotated.accessKeyId;
      report.rotatedInstanceCount = await this.probe("SECOND_VERIFY", rotated, "Rotated");

      if (rotated.accessKeyId === initial.accessKeyId) {
        throw new PhaseFailure(
          "SECOND_VERIFY",
          `Access key ${maskAccessKeyId(initial.accessKeyId)} was not rotated after waiting ` +
            `${this.waitMs / 1000}s (rotation interval ${this.options.rotationIntervalSeconds}s)`
        );
      }

      report.success = true;
      report.message =
        `Credentials rotated from ${maskAccessKeyId(initial.accessKeyId)} to ` +
        `${maskAccessKeyId(rotated.accessKeyId)} and both authenticated`;
    } catch (error) {
      if (!(error instanceof PhaseFailure)) throw error;
      report.failedPhase = error.phase;
      report.message = error.message;
      this.log(`${error.phase} failed: ${error.message}`, "stderr");
    }

    this.enter("DONE", report);
    return report;
  }

  private enter(phase: VerificationPhase, report: VerificationReport): void {
    report.phases.push(phase);
    this.deps.onPhase?.(phase);
  }

  private async readCredentials(phase: VerificationPhase): Promise<CredentialSnapshot> {
    let snapshot: CredentialSnapshot;
    try {
      snapshot = await this.deps.credentials.readStaticCredentials(
        this.options.mountPath,
        this.options.roleName
      );
    } catch (error) {
      throw new PhaseFailure(
        phase,
        `Could not read credentials from ${this.credentialsPath}: ${errorMessage(error)}`
      );
    }

    if (!snapshot.accessKeyId || !snapshot.secretAccessKey) {
      throw new PhaseFailure(phase, `Credentials read from ${this.credentialsPath} are incomplete`);
    }

    this.log(`Read access key ${maskAccessKeyId(snapshot.accessKeyId)} from ${this.credentialsPath}`);
    return snapshot;
  }

  private async probe(
    phase: VerificationPhase,
    credentials: CredentialSnapshot,
    label: string
  ): Promise<number> {
    try {
      const instances = await this.deps.compute.listInstances(credentials);
      this.log(`Listed ${instances.length} instance(s) with ${maskAccessKeyId(credentials.accessKeyId)}`);
      return instances.length;
    } catch (error) {
      throw new PhaseFailure(
        phase,
        `${label} credentials ${maskAccessKeyId(credentials.accessKeyId)} failed the compute listing call: ${errorMessage(error)}`
      );
    }
  }
}
