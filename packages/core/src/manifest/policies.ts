import type { PolicyDocument } from "@keyturn/adapters-common";

/** Actions the secrets engine needs to rotate a user's access keys. */
export const KEY_ROTATION_ACTIONS = [
  "iam:GetUser",
  "iam:CreateAccessKey",
  "iam:DeleteAccessKey",
  "iam:ListAccessKeys",
] as const;

/** Read-only compute listing used to prove a key pair authenticates. */
export const COMPUTE_LISTING_ACTIONS = ["ec2:DescribeInstances"] as const;

/**
 * Policy for the manager identity, scoped to the managed user's ARN.
 * `userArn` may be an intrinsic resolved at apply time.
 */
export function keyRotationPolicy(userArn: unknown): Record<string, unknown> {
  return {
    Version: "2012-10-17",
    Statement: [
      {
        Sid: "RotateManagedUserKeys",
        Effect: "Allow",
        Action: [...KEY_ROTATION_ACTIONS],
        Resource: userArn,
      },
    ],
  };
}

export function computeListingPolicy(): PolicyDocument {
  return {
    Version: "2012-10-17",
    Statement: [
      {
        Sid: "ListComputeInstances",
        Effect: "Allow",
        Action: [...COMPUTE_LISTING_ACTIONS],
        Resource: "*",
      },
    ],
  };
}
