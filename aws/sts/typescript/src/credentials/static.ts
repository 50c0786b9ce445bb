/**
 * Static credential provider.
 *
 * Returns pre-configured credentials, such as the `aws_access_key` /
 * `aws_secret_key` / `security_token` module parameters.
 *
 * @module credentials/static
 */

import type { AwsCredentials, CredentialProvider } from './types.js';
import { credentialError } from '../error/index.js';

/**
 * Provider that returns static AWS credentials.
 *
 * @example
 * ```typescript
 * const provider = new StaticCredentialProvider({
 *   accessKeyId: 'test-access-key',
 *   secretAccessKey: 'test-secret'
 * });
 *
 * const credentials = await provider.getCredentials();
 * ```
 */
export class StaticCredentialProvider implements CredentialProvider {
  /**
   * @throws {StsError} With code `CREDENTIAL` if a key is empty or already expired
   */
  constructor(private readonly credentials: AwsCredentials) {
    this.validateCredentials(credentials);
  }

  private validateCredentials(credentials: AwsCredentials): void {
    if (credentials.accessKeyId.trim() === '') {
      throw credentialError('accessKeyId is required and cannot be empty');
    }

    if (credentials.secretAccessKey.trim() === '') {
      throw credentialError('secretAccessKey is required and cannot be empty');
    }

    if (credentials.expiration && credentials.expiration.getTime() <= Date.now()) {
      throw credentialError('Credentials are already expired');
    }
  }

  /**
   * Returns a copy of the static credentials.
   */
  public async getCredentials(): Promise<AwsCredentials> {
    if (this.isExpired()) {
      throw credentialError('Credentials have expired');
    }

    return { ...this.credentials };
  }

  public isExpired(): boolean {
    if (!this.credentials.expiration) {
      return false;
    }

    return this.credentials.expiration.getTime() <= Date.now();
  }
}
