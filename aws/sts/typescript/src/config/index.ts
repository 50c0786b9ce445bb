/**
 * STS Configuration Module
 *
 * Provides configuration types, the builder, and parameter constraints for the
 * STS client.
 *
 * @module config
 */

import type { CredentialProvider } from '../credentials/types.js';
import { StaticCredentialProvider } from '../credentials/static.js';
import { ProfileCredentialProvider, type ProfileConfig } from '../credentials/profile.js';
import {
  EnvironmentCredentialProvider,
  firstEnvValue,
  type Environment,
} from '../credentials/environment.js';
import { configurationError } from '../error/index.js';

/**
 * Minimum AssumeRole session duration in seconds.
 */
export const MIN_SESSION_DURATION = 900;

/**
 * Maximum AssumeRole session duration in seconds accepted by this module.
 */
export const MAX_SESSION_DURATION = 3600;

/**
 * IAM role ARN, in any AWS partition.
 */
export const ROLE_ARN_PATTERN = /^arn:aws(-[a-z]+)*:iam::\d{12}:role\/.+$/;

/**
 * Role session name characters; length is 2-64.
 */
export const SESSION_NAME_PATTERN = /^[\w+=,.@-]+$/;

/**
 * External ID characters; length is 2-1224.
 */
export const EXTERNAL_ID_PATTERN = /^[\w+=,.@:/-]+$/;

/**
 * Environment variables holding the region, in lookup order.
 */
export const REGION_ENV_VARS = ['AWS_REGION', 'AWS_DEFAULT_REGION', 'EC2_REGION'] as const;

/**
 * Environment variables holding a custom STS endpoint, in lookup order.
 */
export const ENDPOINT_ENV_VARS = ['AWS_ENDPOINT_URL_STS', 'EC2_URL', 'AWS_ENDPOINT_URL'] as const;

/**
 * STS client configuration.
 *
 * @example
 * ```typescript
 * const config: StsClientConfig = {
 *   region: 'us-east-1',
 *   credentialProvider: new StaticCredentialProvider(credentials),
 *   useRegionalSts: true,
 *   timeout: 30000,
 *   validateCerts: true
 * };
 * ```
 */
export interface StsClientConfig {
  /**
   * AWS region for the STS endpoint (e.g., 'us-east-1', 'eu-west-1').
   */
  region: string;

  /**
   * Custom endpoint URL for STS.
   * If not provided, uses the regional or global STS endpoint based on useRegionalSts.
   *
   * @example 'https://sts.us-east-1.amazonaws.com'
   */
  endpoint?: string;

  /**
   * Base credentials used to sign the AssumeRole request.
   */
  credentialProvider: CredentialProvider;

  /**
   * Use regional STS endpoints instead of global.
   *
   * @default true
   */
  useRegionalSts: boolean;

  /**
   * Header and body timeout in milliseconds.
   *
   * @default 30000 (30 seconds)
   */
  timeout: number;

  /**
   * Verify the endpoint's TLS certificate.
   *
   * @default true
   */
  validateCerts: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG = {
  useRegionalSts: true,
  timeout: 30000,
  validateCerts: true,
} as const;

/**
 * STS configuration builder.
 *
 * @example
 * ```typescript
 * const config = new StsConfigBuilder()
 *   .fromEnv()
 *   .region('eu-west-1')
 *   .timeout(10000)
 *   .build();
 * ```
 */
export class StsConfigBuilder {
  private config: Partial<StsClientConfig> = {};

  /**
   * Set the AWS region.
   */
  region(region: string): this {
    this.config.region = region;
    return this;
  }

  /**
   * Set a custom STS endpoint URL.
   *
   * @example
   * builder.endpoint('http://localhost:4566')
   */
  endpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  /**
   * Set static credentials using access key and secret key.
   *
   * @throws {StsError} With code `CREDENTIAL` if a key is empty
   */
  credentials(accessKey: string, secretKey: string, sessionToken?: string): this {
    const creds = sessionToken
      ? { accessKeyId: accessKey, secretAccessKey: secretKey, sessionToken }
      : { accessKeyId: accessKey, secretAccessKey: secretKey };

    this.config.credentialProvider = new StaticCredentialProvider(creds);
    return this;
  }

  /**
   * Read credentials from a named profile of the shared configuration files.
   *
   * @example
   * builder.profile('dev')
   */
  profile(name: string, options: Omit<ProfileConfig, 'profile'> = {}): this {
    this.config.credentialProvider = new ProfileCredentialProvider({ ...options, profile: name });
    return this;
  }

  /**
   * Set a custom credentials provider.
   */
  credentialProvider(provider: CredentialProvider): this {
    this.config.credentialProvider = provider;
    return this;
  }

  /**
   * Set whether to use regional STS endpoints.
   */
  useRegionalSts(useRegional: boolean): this {
    this.config.useRegionalSts = useRegional;
    return this;
  }

  /**
   * Set request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  /**
   * Set whether to verify TLS certificates.
   */
  validateCerts(validate: boolean): this {
    this.config.validateCerts = validate;
    return this;
  }

  /**
   * Load configuration from environment variables.
   *
   * Reads the region from `AWS_REGION`, `AWS_DEFAULT_REGION` or `EC2_REGION`,
   * the endpoint from `AWS_ENDPOINT_URL_STS`, `EC2_URL` or `AWS_ENDPOINT_URL`,
   * `AWS_STS_REGIONAL_ENDPOINTS` ('regional' or 'legacy'), and installs an
   * environment credential provider when the environment holds a key pair,
   * or a profile provider when only `AWS_PROFILE` is set.
   * Values set earlier on the builder are overwritten.
   */
  fromEnv(env: Environment = process.env): this {
    const region = firstEnvValue(env, REGION_ENV_VARS);
    if (region) {
      this.config.region = region;
    }

    const endpoint = firstEnvValue(env, ENDPOINT_ENV_VARS);
    if (endpoint) {
      this.config.endpoint = endpoint;
    }

    const regionalEndpoints = env.AWS_STS_REGIONAL_ENDPOINTS;
    if (regionalEndpoints) {
      this.config.useRegionalSts = regionalEndpoints.toLowerCase() === 'regional';
    }

    const envProvider = new EnvironmentCredentialProvider(env);
    if (envProvider.hasCredentials()) {
      this.config.credentialProvider = envProvider;
    } else if (env['AWS_PROFILE']) {
      this.config.credentialProvider = new ProfileCredentialProvider({ env });
    }

    return this;
  }

  /**
   * Build the configuration.
   *
   * @throws {StsError} With code `CONFIGURATION` if region or credentials are missing,
   *   or the endpoint is not a URL
   */
  build(): StsClientConfig {
    if (!this.config.region) {
      throw configurationError('region must be specified');
    }

    if (!this.config.credentialProvider) {
      throw configurationError('Unable to locate credentials');
    }

    if (this.config.endpoint) {
      try {
        new URL(this.config.endpoint);
      } catch {
        throw configurationError(`Invalid endpoint URL: ${this.config.endpoint}`);
      }
    }

    return {
      region: this.config.region,
      endpoint: this.config.endpoint,
      credentialProvider: this.config.credentialProvider,
      useRegionalSts: this.config.useRegionalSts ?? DEFAULT_CONFIG.useRegionalSts,
      timeout: this.config.timeout ?? DEFAULT_CONFIG.timeout,
      validateCerts: this.config.validateCerts ?? DEFAULT_CONFIG.validateCerts,
    };
  }
}

/**
 * Create a new STS config builder.
 */
export function configBuilder(): StsConfigBuilder {
  return new StsConfigBuilder();
}

/**
 * DNS suffix of the partition a region belongs to, by region prefix.
 */
const PARTITION_DNS_SUFFIXES: ReadonlyArray<readonly [string, string]> = [
  ['cn-', 'amazonaws.com.cn'],
  ['us-isob-', 'sc2s.sgov.gov'],
  ['us-iso-', 'c2s.ic.gov'],
];

/**
 * Get the endpoint DNS suffix for a region.
 *
 * @example
 * ```typescript
 * partitionDnsSuffix('cn-north-1'); // 'amazonaws.com.cn'
 * partitionDnsSuffix('eu-west-1');  // 'amazonaws.com'
 * ```
 */
export function partitionDnsSuffix(region: string): string {
  for (const [prefix, suffix] of PARTITION_DNS_SUFFIXES) {
    if (region.startsWith(prefix)) {
      return suffix;
    }
  }
  return 'amazonaws.com';
}

/**
 * Resolve the STS API endpoint URL.
 *
 * The global endpoint only exists in the commercial partition; other
 * partitions always use their regional endpoint.
 *
 * @example
 * ```typescript
 * resolveStsEndpoint({ region: 'us-east-1', useRegionalSts: true });
 * // Returns: 'https://sts.us-east-1.amazonaws.com'
 *
 * resolveStsEndpoint({ region: 'us-east-1', useRegionalSts: false });
 * // Returns: 'https://sts.amazonaws.com'
 *
 * resolveStsEndpoint({ region: 'cn-north-1', useRegionalSts: true });
 * // Returns: 'https://sts.cn-north-1.amazonaws.com.cn'
 * ```
 */
export function resolveStsEndpoint(
  config: Pick<StsClientConfig, 'region' | 'endpoint' | 'useRegionalSts'>
): string {
  if (config.endpoint) {
    return config.endpoint;
  }

  const suffix = partitionDnsSuffix(config.region);
  const commercial = suffix === 'amazonaws.com' && !config.region.startsWith('us-gov-');

  if (config.useRegionalSts || !commercial) {
    return `https://sts.${config.region}.${suffix}`;
  }
  return 'https://sts.amazonaws.com';
}
