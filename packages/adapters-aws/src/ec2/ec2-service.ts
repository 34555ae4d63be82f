import { EC2Client, DescribeInstancesCommand, Instance } from "@aws-sdk/client-ec2";
import type { ComputeInstanceSummary } from "@keyturn/adapters-common";
import { buildClientConfig, type AwsConnectionOptions } from "../client-options";

export class EC2Service {
  readonly client: EC2Client;

  constructor(
    options: AwsConnectionOptions = {},
    client: EC2Client = new EC2Client(buildClientConfig(options))
  ) {
    this.client = client;
  }

  /**
   * Describe every instance visible to the client's credentials,
   * following pagination.
   */
  async describeInstances(): Promise<ComputeInstanceSummary[]> {
    const instances: ComputeInstanceSummary[] = [];
    let nextToken: string | undefined;

    do {
      const result = await this.client.send(
        new DescribeInstancesCommand({ NextToken: nextToken })
      );

      for (const reservation of result.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          instances.push(this.mapInstance(instance));
        }
      }

      nextToken = result.NextToken;
    } while (nextToken);

    return instances;
  }

  private mapInstance(instance: Instance): ComputeInstanceSummary {
    return {
      instanceId: instance.InstanceId || "",
      instanceType: instance.InstanceType || "",
      state: instance.State?.Name || "unknown",
    };
  }
}
