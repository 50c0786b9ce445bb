/**
 * STS Assume Role Request Types
 *
 * This module contains the request-side types: the caller-facing
 * `AssumeRoleRequest` and the provider-shaped `AssumeRoleInput` that is sent to STS.
 */

/**
 * Request to assume an IAM role.
 */
export interface AssumeRoleRequest {
  /** ARN of the role to assume */
  roleArn: string;
  /** Session name recorded by CloudTrail (2-64 characters) */
  roleSessionName: string;
  /** Session policy (JSON) to scope down permissions */
  policy?: string;
  /** Session duration in seconds (900-3600) */
  durationSeconds?: number;
  /** External ID for cross-account trust */
  externalId?: string;
  /** MFA device serial number */
  mfaSerialNumber?: string;
  /** MFA token code */
  mfaToken?: string;
}

/**
 * AssumeRole parameters as named by the STS API.
 *
 * Optional keys are only present when the matching request field was supplied.
 */
export interface AssumeRoleInput {
  RoleArn: string;
  RoleSessionName: string;
  Policy?: string;
  DurationSeconds?: number;
  ExternalId?: string;
  SerialNumber?: string;
  TokenCode?: string;
}
