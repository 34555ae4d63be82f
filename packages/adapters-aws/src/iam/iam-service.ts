import {
  IAMClient,
  GetUserCommand,
  CreateUserCommand,
  DeleteUserCommand,
  ListUsersCommand,
  PutUserPolicyCommand,
  GetUserPolicyCommand,
  DeleteUserPolicyCommand,
  CreateAccessKeyCommand,
  ListAccessKeysCommand,
  DeleteAccessKeyCommand,
  User,
  AccessKeyMetadata,
} from "@aws-sdk/client-iam";
import type {
  IIdentityService,
  UserInfo,
  AccessKeyPair,
  AccessKeyInfo,
  PolicyDocument,
} from "@keyturn/adapters-common";
import { buildClientConfig, type AwsConnectionOptions } from "../client-options";
import { isNotFoundError } from "../aws-errors";

export class IAMService implements IIdentityService {
  private client: IAMClient;

  constructor(
    options: AwsConnectionOptions = {},
    client: IAMClient = new IAMClient(buildClientConfig(options))
  ) {
    // IAM is a global service but we still need a region for the client
    this.client = client;
  }

  /**
   * Get a user by name.
   */
  async getUser(userName: string): Promise<UserInfo | undefined> {
    try {
      const result = await this.client.send(
        new GetUserCommand({ UserName: userName })
      );

      const user = result.User;
      if (!user) {
        return undefined;
      }

      return this.mapUserToInfo(user);
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Create a new IAM user.
   */
  async createUser(
    userName: string,
    options?: { path?: string; tags?: Record<string, string> }
  ): Promise<UserInfo> {
    const tags = options?.tags
      ? Object.entries(options.tags).map(([Key, Value]) => ({ Key, Value }))
      : undefined;

    const result = await this.client.send(
      new CreateUserCommand({
        UserName: userName,
        Path: options?.path ?? "/",
        Tags: tags,
      })
    );

    const user = result.User;
    if (!user) {
      throw new Error(`Failed to create user "${userName}"`);
    }

    return this.mapUserToInfo(user);
  }

  /**
   * Delete an IAM user.
   * Note: You must delete inline policies and access keys first.
   */
  async deleteUser(userName: string): Promise<void> {
    await this.client.send(new DeleteUserCommand({ UserName: userName }));
  }

  /**
   * List all users.
   */
  async listUsers(): Promise<UserInfo[]> {
    const users: UserInfo[] = [];
    let marker: string | undefined;

    do {
      const result = await this.client.send(
        new ListUsersCommand({ Marker: marker })
      );

      for (const user of result.Users ?? []) {
        users.push(this.mapUserToInfo(user));
      }

      marker = result.IsTruncated ? result.Marker : undefined;
    } while (marker);

    return users;
  }

  /**
   * Put an inline policy on a user.
   */
  async putUserPolicy(
    userName: string,
    policyName: string,
    policyDocument: PolicyDocument | string
  ): Promise<void> {
    const policyDoc =
      typeof policyDocument === "string"
        ? policyDocument
        : JSON.stringify(policyDocument);

    await this.client.send(
      new PutUserPolicyCommand({
        UserName: userName,
        PolicyName: policyName,
        PolicyDocument: policyDoc,
      })
    );
  }

  /**
   * Get an inline policy from a user.
   */
  async getUserPolicy(
    userName: string,
    policyName: string
  ): Promise<string | undefined> {
    try {
      const result = await this.client.send(
        new GetUserPolicyCommand({
          UserName: userName,
          PolicyName: policyName,
        })
      );

      return result.PolicyDocument
        ? decodeURIComponent(result.PolicyDocument)
        : undefined;
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Delete an inline policy from a user.
   */
  async deleteUserPolicy(userName: string, policyName: string): Promise<void> {
    await this.client.send(
      new DeleteUserPolicyCommand({
        UserName: userName,
        PolicyName: policyName,
      })
    );
  }

  /**
   * Create an access key for a user.
   */
  async createAccessKey(userName: string): Promise<AccessKeyPair> {
    const result = await this.client.send(
      new CreateAccessKeyCommand({ UserName: userName })
    );

    const key = result.AccessKey;
    if (!key?.AccessKeyId || !key.SecretAccessKey) {
      throw new Error(`Failed to create access key for user "${userName}"`);
    }

    return {
      accessKeyId: key.AccessKeyId,
      secretAccessKey: key.SecretAccessKey,
    };
  }

  /**
   * List access keys of a user.
   */
  async listAccessKeys(userName: string): Promise<AccessKeyInfo[]> {
    const keys: AccessKeyInfo[] = [];
    let marker: string | undefined;

    do {
      const result = await this.client.send(
        new ListAccessKeysCommand({
          UserName: userName,
          Marker: marker,
        })
      );

      for (const key of result.AccessKeyMetadata ?? []) {
        keys.push(this.mapAccessKeyToInfo(key, userName));
      }

      marker = result.IsTruncated ? result.Marker : undefined;
    } while (marker);

    return keys;
  }

  /**
   * Delete an access key of a user.
   */
  async deleteAccessKey(userName: string, accessKeyId: string): Promise<void> {
    await this.client.send(
      new DeleteAccessKeyCommand({
        UserName: userName,
        AccessKeyId: accessKeyId,
      })
    );
  }

  /**
   * Map AWS SDK User to UserInfo.
   */
  private mapUserToInfo(user: User): UserInfo {
    const tags: Record<string, string> = {};
    for (const tag of user.Tags ?? []) {
      if (tag.Key && tag.Value) {
        tags[tag.Key] = tag.Value;
      }
    }

    return {
      userName: user.UserName || "",
      userId: user.UserId || "",
      arn: user.Arn || "",
      path: user.Path || "/",
      createDate: user.CreateDate || new Date(),
      tags,
    };
  }

  /**
   * Map AWS SDK AccessKeyMetadata to AccessKeyInfo.
   */
  private mapAccessKeyToInfo(key: AccessKeyMetadata, userName: string): AccessKeyInfo {
    return {
      accessKeyId: key.AccessKeyId || "",
      userName: key.UserName || userName,
      status: key.Status === "Active" ? "Active" : "Inactive",
      createDate: key.CreateDate || new Date(),
    };
  }
}
