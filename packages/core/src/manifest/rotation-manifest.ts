/**
 * Built-in manifest for the credential rotation demo.
 *
 * Resources, in declaration order:
 * - ManagedUser / ManagedPolicy / ManagedAccessKey: the identity whose keys
 *   rotate, allowed to list compute instances, with its first key pair
 * - ManagerUser / ManagerPolicy / ManagerAccessKey: the identity Vault uses
 *   to rotate them
 * - SecretBackend: the AWS secrets engine mount, seeded with the manager key
 * - RotationPolicy: the static role binding ManagedUser to the interval
 */

import { computeListingPolicy, keyRotationPolicy } from "./policies";
import type { Manifest } from "./types";

export interface RotationManifestParams {
  managedUserName: string;
  managerUserName: string;
  mountPath: string;
  roleName: string;
  rotationIntervalSeconds: number;
  region: string;
  /** Simulator endpoint as seen from the secrets engine. */
  engineEndpoint?: string;
}

export function buildRotationManifest(params: RotationManifestParams): Manifest {
  const tags = { "keyturn:managed": "true" };

  return {
    Description: `Rotate access keys of ${params.managedUserName} every ${params.rotationIntervalSeconds}s`,
    Resources: {
      ManagedUser: {
        Type: "AWS::IAM::User",
        Properties: {
          UserName: params.managedUserName,
          Path: "/",
          Tags: tags,
        },
      },
      ManagedPolicy: {
        Type: "AWS::IAM::UserPolicy",
        Properties: {
          UserName: { Ref: "ManagedUser" },
          PolicyName: "compute-read",
          PolicyDocument: computeListingPolicy(),
        },
      },
      ManagedAccessKey: {
        Type: "AWS::IAM::AccessKey",
        Properties: {
          UserName: { Ref: "ManagedUser" },
        },
        DependsOn: "ManagedPolicy",
      },

      ManagerUser: {
        Type: "AWS::IAM::User",
        Properties: {
          UserName: params.managerUserName,
          Path: "/",
          Tags: tags,
        },
      },
      ManagerPolicy: {
        Type: "AWS::IAM::UserPolicy",
        Properties: {
          UserName: { Ref: "ManagerUser" },
          PolicyName: "rotate-managed-keys",
          PolicyDocument: keyRotationPolicy({ "Fn::GetAtt": ["ManagedUser", "Arn"] }),
        },
      },
      ManagerAccessKey: {
        Type: "AWS::IAM::AccessKey",
        Properties: {
          UserName: { Ref: "ManagerUser" },
        },
        DependsOn: "ManagerPolicy",
      },

      SecretBackend: {
        Type: "Vault::AWS::SecretBackend",
        Properties: {
          Path: params.mountPath,
          Description: "AWS credentials for the rotation demo",
          AccessKey: { Ref: "ManagerAccessKey" },
          SecretKey: { "Fn::GetAtt": ["ManagerAccessKey", "SecretAccessKey"] },
          Region: params.region,
          ...(params.engineEndpoint
            ? { IamEndpoint: params.engineEndpoint, StsEndpoint: params.engineEndpoint }
            : {}),
        },
      },
      RotationPolicy: {
        Type: "Vault::AWS::StaticRole",
        Properties: {
          Backend: { Ref: "SecretBackend" },
          Name: params.roleName,
          UserName: { Ref: "ManagedUser" },
          RotationPeriodSeconds: params.rotationIntervalSeconds,
        },
        DependsOn: ["ManagedPolicy", "ManagerPolicy"],
      },
    },
    Outputs: {
      ManagedUserArn: {
        Description: "ARN of the identity whose keys rotate",
        Value: { "Fn::GetAtt": ["ManagedUser", "Arn"] },
        Sensitive: false,
      },
      ManagerUserArn: {
        Description: "ARN of the identity the secrets engine rotates with",
        Value: { "Fn::GetAtt": ["ManagerUser", "Arn"] },
        Sensitive: false,
      },
      CredentialsPath: {
        Description: "Secrets engine path serving the current key pair",
        Value: { "Fn::GetAtt": ["RotationPolicy", "CredentialsPath"] },
        Sensitive: false,
      },
      ManagedAccessKeyId: {
        Description: "Initial access key id of the managed identity",
        Value: { Ref: "ManagedAccessKey" },
        Sensitive: true,
      },
      ManagedSecretAccessKey: {
        Description: "Initial secret access key of the managed identity",
        Value: { "Fn::GetAtt": ["ManagedAccessKey", "SecretAccessKey"] },
        Sensitive: true,
      },
    },
  };
}
