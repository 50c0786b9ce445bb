/**
 * Assume-role module runner.
 *
 * Validates the parameter document, builds the STS client from the connection
 * parameters, runs the invoker once, and renders the result document.
 *
 * @module module/runner
 */

import type { StsClientConfig } from '../config/index.js';
import { StsConfigBuilder } from '../config/index.js';
import {
  ACCESS_KEY_ENV_VARS,
  SECRET_KEY_ENV_VARS,
  firstEnvValue,
  type Environment,
} from '../credentials/environment.js';
import { configurationError } from '../error/index.js';
import { invoke } from '../invoker/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { createStsService, type AssumeRoleClient } from '../sts/service.js';
import { parseModuleParams, type ConnectionParams, type ModuleParams } from './params.js';
import { failResult, toModuleResult, type ModuleResult } from './result.js';

/**
 * Collaborators of the runner. All optional.
 */
export interface ModuleDependencies {
  /** Environment used for region and credential fallbacks; `process.env` by default */
  env?: Environment;
  /** Logger; silent by default */
  logger?: Logger;
  /** Builds the STS client; `createStsService` by default */
  clientFactory?: (config: StsClientConfig) => AssumeRoleClient;
}

/**
 * Resolve the client configuration from connection parameters, falling back to
 * the environment. Explicit parameters win over the environment.
 *
 * Credentials come from `aws_access_key`/`aws_secret_key`, then `profile`, then
 * the environment. A `security_token` pairs with keys from the parameters or
 * from the environment; it cannot be combined with a profile.
 *
 * @throws {StsError} With code `CONFIGURATION` or `CREDENTIAL`
 */
export function buildClientConfig(connection: ConnectionParams, env: Environment): StsClientConfig {
  const builder = new StsConfigBuilder().fromEnv(env).validateCerts(connection.validateCerts);

  if (connection.region !== undefined) {
    builder.region(connection.region);
  }
  if (connection.endpoint !== undefined) {
    builder.endpoint(connection.endpoint);
  }

  const { accessKey, secretKey, securityToken, profile } = connection;

  if ((accessKey === undefined) !== (secretKey === undefined)) {
    throw configurationError('aws_access_key and aws_secret_key must be supplied together');
  }

  if (accessKey !== undefined && secretKey !== undefined) {
    builder.credentials(accessKey, secretKey, securityToken);
  } else if (profile !== undefined) {
    if (securityToken !== undefined) {
      throw configurationError('security_token cannot be combined with profile');
    }
    builder.profile(profile, { env });
  } else if (securityToken !== undefined) {
    const envAccessKey = firstEnvValue(env, ACCESS_KEY_ENV_VARS);
    const envSecretKey = firstEnvValue(env, SECRET_KEY_ENV_VARS);
    if (envAccessKey === undefined || envSecretKey === undefined) {
      throw configurationError(
        'security_token requires aws_access_key and aws_secret_key, as parameters or in the environment'
      );
    }
    builder.credentials(envAccessKey, envSecretKey, securityToken);
  }

  return builder.build();
}

/**
 * Run the assume-role module against a raw parameter document.
 *
 * Never rejects. Invalid parameters and configuration problems are reported
 * before any client is called; provider faults are reported with their
 * message unchanged.
 *
 * @example
 * ```typescript
 * const result = await runAssumeRoleModule({
 *   region: 'us-east-1',
 *   role_arn: 'arn:aws:iam::123456789012:role/someRole',
 *   role_session_name: 'someRoleSession',
 * });
 *
 * if (!isFailureResult(result)) {
 *   console.log(result.sts_creds.access_key);
 * }
 * ```
 */
export async function runAssumeRoleModule(
  raw: unknown,
  deps: ModuleDependencies = {}
): Promise<ModuleResult> {
  const env = deps.env ?? process.env;
  const logger = deps.logger ?? new NoopLogger();
  const clientFactory = deps.clientFactory ?? createStsService;

  let params: ModuleParams;
  try {
    params = parseModuleParams(raw);
  } catch (error) {
    logger.error('Invalid module parameters', { error: failResult(error).msg });
    return failResult(error);
  }

  let client: AssumeRoleClient;
  try {
    client = clientFactory(buildClientConfig(params.connection, env));
  } catch (error) {
    logger.error('Unable to create STS client', { error: failResult(error).msg });
    return failResult(error);
  }

  try {
    const outcome = await invoke(client, params.request, { logger });
    return toModuleResult(outcome);
  } finally {
    await closeClient(client, logger);
  }
}

async function closeClient(client: AssumeRoleClient, logger: Logger): Promise<void> {
  try {
    await client.close?.();
  } catch (error) {
    logger.warn('Failed to close STS client', { error: failResult(error).msg });
  }
}
