/**
 * Identity Service Interface
 *
 * Abstraction over the cloud-identity API used to provision the managed
 * and manager identities. Implemented by the AWS IAMService.
 */

import type {
  UserInfo,
  AccessKeyPair,
  AccessKeyInfo,
  PolicyDocument,
} from "../types/identity";

export interface IIdentityService {
  /**
   * Get a user by name.
   *
   * @returns The user, or undefined if it does not exist
   */
  getUser(userName: string): Promise<UserInfo | undefined>;

  /**
   * Create a user.
   */
  createUser(
    userName: string,
    options?: { path?: string; tags?: Record<string, string> }
  ): Promise<UserInfo>;

  /**
   * Delete a user. Inline policies and access keys must be removed first.
   */
  deleteUser(userName: string): Promise<void>;

  /**
   * List all users.
   */
  listUsers(): Promise<UserInfo[]>;

  /**
   * Put (create or replace) an inline policy on a user.
   */
  putUserPolicy(
    userName: string,
    policyName: string,
    policyDocument: PolicyDocument | string
  ): Promise<void>;

  /**
   * Get an inline policy document from a user.
   *
   * @returns The decoded JSON document, or undefined if it does not exist
   */
  getUserPolicy(userName: string, policyName: string): Promise<string | undefined>;

  /**
   * Delete an inline policy from a user.
   */
  deleteUserPolicy(userName: string, policyName: string): Promise<void>;

  /**
   * Create a new access key for a user.
   */
  createAccessKey(userName: string): Promise<AccessKeyPair>;

  /**
   * List access keys of a user.
   */
  listAccessKeys(userName: string): Promise<AccessKeyInfo[]>;

  /**
   * Delete an access key of a user.
   */
  deleteAccessKey(userName: string, accessKeyId: string): Promise<void>;
}
