/**
 * A cloud principal (IAM user) as reported by the identity service.
 */
export interface UserInfo {
  userName: string;
  userId: string;
  arn: string;
  path: string;
  createDate: Date;
  tags: Record<string, string>;
}

/**
 * An access key pair. The secret is only returned when the key is created
 * or read from the secrets service.
 */
export interface AccessKeyPair {
  accessKeyId: string;
  secretAccessKey: string;
}

/**
 * Access key metadata as listed for a user (no secret).
 */
export interface AccessKeyInfo {
  accessKeyId: string;
  userName: string;
  status: "Active" | "Inactive";
  createDate: Date;
}

/** A single statement of an IAM policy document */
export interface PolicyStatement {
  Sid?: string;
  Effect: "Allow" | "Deny";
  Action: string | string[];
  Resource: string | string[];
}

/** IAM policy document */
export interface PolicyDocument {
  Version: "2012-10-17";
  Statement: PolicyStatement[];
}
