// Client configuration
export {
  buildClientConfig,
  DEFAULT_AWS_REGION,
  AwsConnectionOptions,
  AwsCredentials,
} from "./client-options";
export { isNotFoundError, isAuthError, isConnectionError } from "./aws-errors";

// EC2
export { EC2Service } from "./ec2/ec2-service";
export { AwsComputeProbe, EC2ServiceFactory, ec2ServiceFactory } from "./ec2/compute-probe";

// IAM
export { IAMService } from "./iam/iam-service";
