/**
 * AWS credentials module types.
 *
 * This module defines the base credentials used to sign the AssumeRole call
 * and the provider interface that supplies them.
 *
 * @module credentials/types
 */

/**
 * AWS security credentials for authenticating API requests.
 */
export interface AwsCredentials {
  /**
   * AWS access key ID.
   */
  accessKeyId: string;

  /**
   * AWS secret access key. Never logged.
   */
  secretAccessKey: string;

  /**
   * Optional session token for temporary base credentials.
   *
   * Sent as `x-amz-security-token` when present.
   */
  sessionToken?: string;

  /**
   * Optional expiration time for temporary credentials.
   */
  expiration?: Date;
}

/**
 * Provider interface for retrieving AWS credentials.
 */
export interface CredentialProvider {
  /**
   * Retrieves AWS credentials.
   *
   * @throws {StsError} With code `CREDENTIAL` if credentials cannot be retrieved
   */
  getCredentials(): Promise<AwsCredentials>;

  /**
   * Checks if the current credentials are expired.
   */
  isExpired?(): boolean;
}
