/**
 * Summary of a compute instance returned by the listing probe.
 */
export interface ComputeInstanceSummary {
  instanceId: string;
  instanceType: string;
  state: string;
}
