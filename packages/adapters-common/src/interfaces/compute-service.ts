/**
 * Compute Probe Interface
 *
 * An authenticated, read-only compute listing call used to prove a key pair
 * is accepted by the cloud API. Implemented by the AWS ComputeProbe (EC2).
 */

import type { AccessKeyPair } from "../types/identity";
import type { ComputeInstanceSummary } from "../types/compute";

export interface IComputeProbe {
  /**
   * List compute instances using the given credentials.
   * Rejects with an AuthenticationError when the credentials are refused.
   */
  listInstances(credentials: AccessKeyPair): Promise<ComputeInstanceSummary[]>;
}
