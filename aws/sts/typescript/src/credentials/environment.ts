/**
 * Environment credential provider.
 *
 * Reads base credentials from environment variables, trying each name of a
 * group in order and taking the first non-empty value:
 *
 * - access key: `AWS_ACCESS_KEY_ID`, `AWS_ACCESS_KEY`, `EC2_ACCESS_KEY`
 * - secret key: `AWS_SECRET_ACCESS_KEY`, `AWS_SECRET_KEY`, `EC2_SECRET_KEY`
 * - session token: `AWS_SESSION_TOKEN`, `AWS_SECURITY_TOKEN`, `EC2_SECURITY_TOKEN`
 *
 * @module credentials/environment
 */

import type { AwsCredentials, CredentialProvider } from './types.js';
import { credentialError } from '../error/index.js';

export const ACCESS_KEY_ENV_VARS = ['AWS_ACCESS_KEY_ID', 'AWS_ACCESS_KEY', 'EC2_ACCESS_KEY'] as const;
export const SECRET_KEY_ENV_VARS = ['AWS_SECRET_ACCESS_KEY', 'AWS_SECRET_KEY', 'EC2_SECRET_KEY'] as const;
export const SESSION_TOKEN_ENV_VARS = ['AWS_SESSION_TOKEN', 'AWS_SECURITY_TOKEN', 'EC2_SECURITY_TOKEN'] as const;

/**
 * Environment variable map, `process.env` by default.
 */
export type Environment = Record<string, string | undefined>;

/**
 * First non-empty value among the named environment variables.
 */
export function firstEnvValue(env: Environment, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return undefined;
}

/**
 * Provider that reads credentials from environment variables.
 *
 * @example
 * ```typescript
 * const provider = new EnvironmentCredentialProvider();
 * if (provider.hasCredentials()) {
 *   const credentials = await provider.getCredentials();
 * }
 * ```
 */
export class EnvironmentCredentialProvider implements CredentialProvider {
  constructor(private readonly env: Environment = process.env) {}

  /**
   * Whether both an access key and a secret key are set.
   */
  public hasCredentials(): boolean {
    return (
      firstEnvValue(this.env, ACCESS_KEY_ENV_VARS) !== undefined &&
      firstEnvValue(this.env, SECRET_KEY_ENV_VARS) !== undefined
    );
  }

  public async getCredentials(): Promise<AwsCredentials> {
    const accessKeyId = firstEnvValue(this.env, ACCESS_KEY_ENV_VARS);
    const secretAccessKey = firstEnvValue(this.env, SECRET_KEY_ENV_VARS);

    if (accessKeyId === undefined || secretAccessKey === undefined) {
      throw credentialError(
        `Unable to locate credentials in environment (set ${ACCESS_KEY_ENV_VARS[0]} and ${SECRET_KEY_ENV_VARS[0]})`
      );
    }

    const sessionToken = firstEnvValue(this.env, SESSION_TOKEN_ENV_VARS);
    return sessionToken === undefined
      ? { accessKeyId, secretAccessKey }
      : { accessKeyId, secretAccessKey, sessionToken };
  }

  public isExpired(): boolean {
    return false;
  }
}
