/**
 * AWS STS Service
 *
 * Sends AssumeRole to the STS Query API: a signed POST with an
 * application/x-www-form-urlencoded body.
 *
 * @module sts/service
 */

import type { AssumeRoleInput } from '../types/requests.js';
import type { AssumeRoleOutput } from '../types/responses.js';
import type { StsClientConfig } from '../config/index.js';
import { resolveStsEndpoint } from '../config/index.js';
import { createDefaultTransport, type HttpTransport, type HttpResponse } from '../http/index.js';
import { signRequest } from '../signing/index.js';
import { mapStsError, wrapError } from '../error/index.js';
import { parseAssumeRoleResponse } from './xml.js';

/**
 * Anything that can perform AssumeRole.
 *
 * Rejects with an StsError when the provider reports a fault.
 */
export interface AssumeRoleClient {
  assumeRole(input: AssumeRoleInput): Promise<AssumeRoleOutput>;

  /**
   * Release network resources held by the client.
   */
  close?(): Promise<void>;
}

/**
 * AWS Security Token Service (STS) client.
 *
 * @example
 * ```typescript
 * const service = createStsService(
 *   new StsConfigBuilder().fromEnv().build()
 * );
 *
 * try {
 *   const output = await service.assumeRole({
 *     RoleArn: 'arn:aws:iam::123456789012:role/MyRole',
 *     RoleSessionName: 'my-session',
 *   });
 * } finally {
 *   await service.close();
 * }
 * ```
 */
export class StsService implements AssumeRoleClient {
  /**
   * STS API version
   */
  static readonly VERSION = '2011-06-15';

  private readonly baseUrl: string;

  constructor(
    private readonly config: StsClientConfig,
    private readonly transport: HttpTransport
  ) {
    this.baseUrl = resolveStsEndpoint(config);
  }

  /**
   * Endpoint the requests are sent to.
   */
  get endpoint(): string {
    return this.baseUrl;
  }

  /**
   * Assume an IAM role.
   *
   * Every key present on `input` is sent as-is; nothing is added or defaulted.
   *
   * @throws {StsError} On API, credential or transport errors
   */
  async assumeRole(input: AssumeRoleInput): Promise<AssumeRoleOutput> {
    const params: Record<string, string | number> = {
      Action: 'AssumeRole',
      Version: StsService.VERSION,
    };

    for (const [key, value] of Object.entries(input)) {
      if (typeof value === 'string' || typeof value === 'number') {
        params[key] = value;
      }
    }

    const responseXml = await this.request(params);
    return parseAssumeRoleResponse(responseXml);
  }

  async close(): Promise<void> {
    await this.transport.close?.();
  }

  /**
   * Build form-encoded body from parameters.
   */
  private buildFormBody(params: Record<string, string | number>): string {
    const urlParams = new URLSearchParams();

    for (const [key, value] of Object.entries(params)) {
      urlParams.append(key, String(value));
    }

    return urlParams.toString();
  }

  /**
   * Make a signed POST request to STS.
   *
   * @returns Response body
   * @throws {StsError} On API errors
   */
  private async request(params: Record<string, string | number>): Promise<string> {
    const body = this.buildFormBody(params);
    const credentials = await this.config.credentialProvider.getCredentials();

    // Keeps any path prefix of a custom endpoint; a bare origin becomes '/'.
    const url = new URL(this.baseUrl).toString();
    const signed = signRequest(
      {
        method: 'POST',
        url,
        headers: {
          'content-type': 'application/x-www-form-urlencoded; charset=utf-8',
          'content-length': String(Buffer.byteLength(body, 'utf8')),
        },
        body,
      },
      {
        region: this.config.region,
        service: 'sts',
        credentials,
      }
    );

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: 'POST',
        url: signed.url,
        headers: signed.headers,
        body: signed.body,
      });
    } catch (error) {
      throw wrapError(error, 'TRANSPORT');
    }

    if (response.status >= 400) {
      throw mapStsError(response.body, response.status);
    }

    return response.body;
  }
}

/**
 * Create an STS service with the default pooled transport.
 */
export function createStsService(config: StsClientConfig, transport?: HttpTransport): StsService {
  return new StsService(
    config,
    transport ??
      createDefaultTransport({
        timeout: config.timeout,
        validateCerts: config.validateCerts,
      })
  );
}
