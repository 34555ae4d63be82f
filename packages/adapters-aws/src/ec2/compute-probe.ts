/**
 * Compute probe: proves a key pair is accepted by listing EC2 instances
 * with it. A fresh client is built for every key pair.
 */

import type {
  IComputeProbe,
  AccessKeyPair,
  ComputeInstanceSummary,
} from "@keyturn/adapters-common";
import {
  AuthenticationError,
  EndpointUnreachableError,
  maskAccessKeyId,
} from "@keyturn/adapters-common";
import { EC2Service } from "./ec2-service";
import { DEFAULT_AWS_REGION } from "../client-options";
import { isAuthError, isConnectionError } from "../aws-errors";

export type EC2ServiceFactory = (credentials: AccessKeyPair) => EC2Service;

/**
 * Builds each EC2 client from the key pair under test only, so a probe
 * never falls back to ambient credentials.
 */
export function ec2ServiceFactory(options: { region?: string; endpoint?: string }): EC2ServiceFactory {
  return (credentials) =>
    new EC2Service({
      region: options.region ?? DEFAULT_AWS_REGION,
      endpoint: options.endpoint,
      credentials: {
        accessKeyId: credentials.accessKeyId,
        secretAccessKey: credentials.secretAccessKey,
      },
    });
}

export class AwsComputeProbe implements IComputeProbe {
  private readonly createService: EC2ServiceFactory;

  constructor(
    private readonly options: { region?: string; endpoint?: string },
    createService?: EC2ServiceFactory,
  ) {
    this.createService = createService ?? ec2ServiceFactory(options);
  }

  async listInstances(credentials: AccessKeyPair): Promise<ComputeInstanceSummary[]> {
    const service = this.createService(credentials);

    try {
      return await service.describeInstances();
    } catch (error) {
      if (isAuthError(error)) {
        const message = error instanceof Error ? error.message : String(error);
        throw new AuthenticationError(
          `Credentials ${maskAccessKeyId(credentials.accessKeyId)} were rejected: ${message}`,
          { cause: error },
        );
      }
      if (isConnectionError(error)) {
        throw new EndpointUnreachableError(this.options.endpoint ?? "EC2", { cause: error });
      }
      throw error;
    }
  }
}
