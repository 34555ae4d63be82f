/**
 * Connection settings shared by every AWS SDK client in this package.
 * `endpoint` points the clients at the cloud simulator instead of AWS.
 */
export interface AwsConnectionOptions {
  region?: string;
  endpoint?: string;
  credentials?: AwsCredentials;
}

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

export const DEFAULT_AWS_REGION = "us-east-1";

export function buildClientConfig(options: AwsConnectionOptions): {
  region: string;
  endpoint?: string;
  credentials?: AwsCredentials;
} {
  return {
    region: options.region ?? DEFAULT_AWS_REGION,
    endpoint: options.endpoint,
    credentials: options.credentials
      ? {
          accessKeyId: options.credentials.accessKeyId,
          secretAccessKey: options.credentials.secretAccessKey,
        }
      : undefined,
  };
}
