/**
 * Module result document.
 *
 * @module module/result
 */

import type { AssumeRoleOutcome } from '../types/responses.js';

/**
 * `sts_creds` section of a successful result.
 */
export interface ModuleCredentials {
  access_key: string;
  secret_key: string;
  session_token: string;
  /** Serialized as ISO-8601 by JSON.stringify */
  expiration: Date;
}

/**
 * `sts_user` section of a successful result.
 */
export interface ModuleUser {
  arn: string;
  assume_role_id: string;
}

export interface ModuleSuccessResult {
  changed: true;
  sts_creds: ModuleCredentials;
  sts_user: ModuleUser;
}

export interface ModuleFailureResult {
  failed: true;
  changed: false;
  msg: string;
}

export type ModuleResult = ModuleSuccessResult | ModuleFailureResult;

/**
 * Check whether a result reports a failure.
 */
export function isFailureResult(result: ModuleResult): result is ModuleFailureResult {
  return 'failed' in result;
}

/**
 * Build a failure result. Error messages are kept verbatim.
 */
export function failResult(error: unknown): ModuleFailureResult {
  return {
    failed: true,
    changed: false,
    msg: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Map an invoker outcome to the result document.
 */
export function toModuleResult(outcome: AssumeRoleOutcome): ModuleResult {
  if (!outcome.ok) {
    return { failed: true, changed: false, msg: outcome.message };
  }

  return {
    changed: true,
    sts_creds: {
      access_key: outcome.credentials.accessKey,
      secret_key: outcome.credentials.secretKey,
      session_token: outcome.credentials.sessionToken,
      expiration: outcome.credentials.expiration,
    },
    sts_user: {
      arn: outcome.identity.arn,
      assume_role_id: outcome.identity.assumedRoleId,
    },
  };
}
