/**
 * STS Assume Role Response Types
 *
 * This module contains the provider payload returned by AssumeRole and the
 * normalized outcome handed back to callers.
 */

/**
 * Credentials block of an AssumeRole response.
 */
export interface StsCredentials {
  AccessKeyId: string;
  SecretAccessKey: string;
  SessionToken: string;
  Expiration: Date;
}

/**
 * Identity of the principal created by AssumeRole.
 */
export interface StsAssumedRoleUser {
  /** ARN of the assumed-role session */
  Arn: string;
  /** Role ID joined with the session name */
  AssumedRoleId: string;
}

/**
 * AssumeRole response payload.
 */
export interface AssumeRoleOutput {
  Credentials: StsCredentials;
  AssumedRoleUser: StsAssumedRoleUser;
  /** Percentage of the packed policy size limit used by the session policy */
  PackedPolicySize?: number;
}

/**
 * Temporary credentials issued for the assumed role.
 */
export interface TemporaryCredentials {
  readonly accessKey: string;
  readonly secretKey: string;
  readonly sessionToken: string;
  /** Credential expiration time */
  readonly expiration: Date;
}

/**
 * Principal that results from the role assumption.
 */
export interface AssumedIdentity {
  readonly arn: string;
  readonly assumedRoleId: string;
}

/**
 * Successful role assumption.
 */
export interface AssumeRoleSuccess {
  readonly ok: true;
  readonly changed: true;
  readonly credentials: TemporaryCredentials;
  readonly identity: AssumedIdentity;
}

/**
 * Failed role assumption. Never carries credentials.
 */
export interface AssumeRoleFailure {
  readonly ok: false;
  readonly changed: false;
  /** Fault message, preserved verbatim */
  readonly message: string;
  /** Error code when the fault was an StsError */
  readonly code?: string;
  /** AWS request ID when the provider returned one */
  readonly requestId?: string;
}

/**
 * Result of a single role assumption.
 */
export type AssumeRoleOutcome = AssumeRoleSuccess | AssumeRoleFailure;
