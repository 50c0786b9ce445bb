/**
 * Role Assumption Invoker
 *
 * Builds the AssumeRole input from a request, calls the client once, and maps
 * the reply or the fault into an AssumeRoleOutcome.
 *
 * @module invoker
 */

import type { AssumeRoleInput, AssumeRoleRequest } from '../types/requests.js';
import type {
  AssumeRoleFailure,
  AssumeRoleOutcome,
  AssumeRoleOutput,
  AssumeRoleSuccess,
} from '../types/responses.js';
import type { AssumeRoleClient } from '../sts/service.js';
import { StsError } from '../error/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';

/**
 * Invocation options.
 */
export interface InvokeOptions {
  logger?: Logger;
}

/**
 * Build the STS input for a request.
 *
 * `RoleArn` and `RoleSessionName` are always set. Each optional field is
 * mapped only when defined, so STS applies its own defaults for the rest.
 *
 * @example
 * ```typescript
 * buildAssumeRoleInput({
 *   roleArn: 'arn:aws:iam::123456789012:role/someRole',
 *   roleSessionName: 'someRoleSession',
 *   durationSeconds: 900,
 * });
 * // { RoleArn: '...', RoleSessionName: 'someRoleSession', DurationSeconds: 900 }
 * ```
 */
export function buildAssumeRoleInput(request: AssumeRoleRequest): AssumeRoleInput {
  const input: AssumeRoleInput = {
    RoleArn: request.roleArn,
    RoleSessionName: request.roleSessionName,
  };

  if (request.policy !== undefined) {
    input.Policy = request.policy;
  }
  if (request.durationSeconds !== undefined) {
    input.DurationSeconds = request.durationSeconds;
  }
  if (request.externalId !== undefined) {
    input.ExternalId = request.externalId;
  }
  if (request.mfaSerialNumber !== undefined) {
    input.SerialNumber = request.mfaSerialNumber;
  }
  if (request.mfaToken !== undefined) {
    input.TokenCode = request.mfaToken;
  }

  return input;
}

/**
 * Map an AssumeRole payload to the success outcome.
 */
export function toSuccessOutcome(output: AssumeRoleOutput): AssumeRoleSuccess {
  return {
    ok: true,
    changed: true,
    credentials: {
      accessKey: output.Credentials.AccessKeyId,
      secretKey: output.Credentials.SecretAccessKey,
      sessionToken: output.Credentials.SessionToken,
      expiration: output.Credentials.Expiration,
    },
    identity: {
      arn: output.AssumedRoleUser.Arn,
      assumedRoleId: output.AssumedRoleUser.AssumedRoleId,
    },
  };
}

/**
 * Map a fault to the failure outcome. The message is kept verbatim.
 */
export function toFailureOutcome(error: unknown): AssumeRoleFailure {
  if (error instanceof StsError) {
    return {
      ok: false,
      changed: false,
      message: error.message,
      code: error.code,
      ...(error.requestId !== undefined ? { requestId: error.requestId } : {}),
    };
  }

  return {
    ok: false,
    changed: false,
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Assume a role with a single AssumeRole call.
 *
 * Never rejects: provider faults come back as the failure outcome. No retry
 * is attempted.
 *
 * @example
 * ```typescript
 * const outcome = await invoke(client, {
 *   roleArn: 'arn:aws:iam::123456789012:role/someRole',
 *   roleSessionName: 'someRoleSession',
 * });
 *
 * if (outcome.ok) {
 *   console.log(outcome.identity.arn, outcome.credentials.expiration);
 * } else {
 *   console.error(outcome.message);
 * }
 * ```
 */
export async function invoke(
  client: AssumeRoleClient,
  request: AssumeRoleRequest,
  options: InvokeOptions = {}
): Promise<AssumeRoleOutcome> {
  const logger = options.logger ?? new NoopLogger();
  const input = buildAssumeRoleInput(request);

  // Serial and token are forwarded independently; STS rejects a lone one.
  if ((input.SerialNumber === undefined) !== (input.TokenCode === undefined)) {
    logger.warn('MFA serial number and token should be supplied together', {
      roleArn: input.RoleArn,
      hasSerialNumber: input.SerialNumber !== undefined,
      hasTokenCode: input.TokenCode !== undefined,
    });
  }

  logger.debug('Assuming role', {
    roleArn: input.RoleArn,
    roleSessionName: input.RoleSessionName,
    parameters: Object.keys(input),
  });

  try {
    const output = await client.assumeRole(input);
    const expiration = output.Credentials.Expiration;
    if (Number.isNaN(expiration.getTime())) {
      throw new StsError('Invalid AssumeRole response: invalid expiration', 'AWS_API');
    }

    logger.info('Role assumed', {
      assumedRoleArn: output.AssumedRoleUser.Arn,
      expiration: expiration.toISOString(),
    });

    return toSuccessOutcome(output);
  } catch (error) {
    const failure = toFailureOutcome(error);
    logger.warn('AssumeRole failed', {
      roleArn: input.RoleArn,
      code: failure.code,
      message: failure.message,
    });
    return failure;
  }
}
