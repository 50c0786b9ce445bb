/**
 * Tests for STS configuration
 */

import { describe, it, expect } from 'vitest';
import {
  StsConfigBuilder,
  configBuilder,
  resolveStsEndpoint,
  partitionDnsSuffix,
  DEFAULT_CONFIG,
} from './index.js';
import { EnvironmentCredentialProvider } from '../credentials/environment.js';
import { StaticCredentialProvider } from '../credentials/static.js';
import { ProfileCredentialProvider } from '../credentials/profile.js';

describe('StsConfigBuilder', () => {
  it('should build with defaults', () => {
    const config = new StsConfigBuilder()
      .region('us-east-1')
      .credentials('test-access-key', 'test-secret')
      .build();

    expect(config.region).toBe('us-east-1');
    expect(config.endpoint).toBeUndefined();
    expect(config.useRegionalSts).toBe(DEFAULT_CONFIG.useRegionalSts);
    expect(config.timeout).toBe(30000);
    expect(config.validateCerts).toBe(true);
    expect(config.credentialProvider).toBeInstanceOf(StaticCredentialProvider);
  });

  it('should apply explicit settings', () => {
    const config = configBuilder()
      .region('eu-west-1')
      .endpoint('http://localhost:4566')
      .credentials('test-access-key', 'test-secret', 'test-session-token')
      .useRegionalSts(false)
      .timeout(5000)
      .validateCerts(false)
      .build();

    expect(config).toMatchObject({
      region: 'eu-west-1',
      endpoint: 'http://localhost:4566',
      useRegionalSts: false,
      timeout: 5000,
      validateCerts: false,
    });
  });

  it('should require a region', () => {
    expect(() => new StsConfigBuilder().credentials('test-access-key', 'test-secret').build()).toThrow(
      'region must be specified'
    );
  });

  it('should require credentials', () => {
    expect(() => new StsConfigBuilder().region('us-east-1').build()).toThrow('Unable to locate credentials');
  });

  it('should reject an endpoint that is not a URL', () => {
    expect(() =>
      new StsConfigBuilder()
        .region('us-east-1')
        .credentials('test-access-key', 'test-secret')
        .endpoint('not a url')
        .build()
    ).toThrow('Invalid endpoint URL: not a url');
  });

  it('should read credentials from a named profile', () => {
    const config = new StsConfigBuilder().region('us-east-1').profile('dev').build();

    expect(config.credentialProvider).toBeInstanceOf(ProfileCredentialProvider);
    expect(config.credentialProvider).toMatchObject({ profile: 'dev' });
  });

  it('should reject an empty access key', () => {
    expect(() => new StsConfigBuilder().credentials('', 'test-secret')).toThrow(
      'accessKeyId is required and cannot be empty'
    );
  });

  describe('fromEnv', () => {
    it('should read region, endpoint and credentials', async () => {
      const config = new StsConfigBuilder()
        .fromEnv({
          AWS_REGION: 'ap-southeast-2',
          EC2_URL: 'https://sts.example.test',
          AWS_ACCESS_KEY_ID: 'test-access-key',
          AWS_SECRET_ACCESS_KEY: 'test-secret',
        })
        .build();

      expect(config.region).toBe('ap-southeast-2');
      expect(config.endpoint).toBe('https://sts.example.test');
      expect(config.credentialProvider).toBeInstanceOf(EnvironmentCredentialProvider);
      await expect(config.credentialProvider.getCredentials()).resolves.toEqual({
        accessKeyId: 'test-access-key',
        secretAccessKey: 'test-secret',
      });
    });

    it('should fall back through the region variables', () => {
      const config = new StsConfigBuilder()
        .fromEnv({ AWS_REGION: '', EC2_REGION: 'us-west-2' })
        .credentials('test-access-key', 'test-secret')
        .build();

      expect(config.region).toBe('us-west-2');
    });

    it('should switch to the global endpoint for legacy mode', () => {
      const config = new StsConfigBuilder()
        .fromEnv({ AWS_REGION: 'us-east-1', AWS_STS_REGIONAL_ENDPOINTS: 'legacy' })
        .credentials('test-access-key', 'test-secret')
        .build();

      expect(config.useRegionalSts).toBe(false);
    });

    it('should use AWS_PROFILE when the environment holds no key pair', () => {
      const config = new StsConfigBuilder().fromEnv({ AWS_REGION: 'us-east-1', AWS_PROFILE: 'dev' }).build();

      expect(config.credentialProvider).toBeInstanceOf(ProfileCredentialProvider);
    });

    it('should leave credentials unset without a key pair', () => {
      expect(() =>
        new StsConfigBuilder().fromEnv({ AWS_REGION: 'us-east-1', AWS_ACCESS_KEY_ID: 'test-access-key' }).build()
      ).toThrow('Unable to locate credentials');
    });
  });
});

describe('resolveStsEndpoint', () => {
  it('should prefer a custom endpoint', () => {
    expect(
      resolveStsEndpoint({ region: 'us-east-1', endpoint: 'http://localhost:4566', useRegionalSts: true })
    ).toBe('http://localhost:4566');
  });

  it('should build the regional endpoint', () => {
    expect(resolveStsEndpoint({ region: 'eu-central-1', useRegionalSts: true })).toBe(
      'https://sts.eu-central-1.amazonaws.com'
    );
  });

  it('should use the global endpoint when regional endpoints are off', () => {
    expect(resolveStsEndpoint({ region: 'eu-central-1', useRegionalSts: false })).toBe('https://sts.amazonaws.com');
  });

  it('should use the China partition domain', () => {
    expect(resolveStsEndpoint({ region: 'cn-north-1', useRegionalSts: true })).toBe(
      'https://sts.cn-north-1.amazonaws.com.cn'
    );
  });

  it('should stay regional outside the commercial partition', () => {
    expect(resolveStsEndpoint({ region: 'cn-northwest-1', useRegionalSts: false })).toBe(
      'https://sts.cn-northwest-1.amazonaws.com.cn'
    );
    expect(resolveStsEndpoint({ region: 'us-gov-west-1', useRegionalSts: false })).toBe(
      'https://sts.us-gov-west-1.amazonaws.com'
    );
  });
});

describe('partitionDnsSuffix', () => {
  it('should map region prefixes to partition domains', () => {
    expect(partitionDnsSuffix('eu-west-1')).toBe('amazonaws.com');
    expect(partitionDnsSuffix('us-gov-east-1')).toBe('amazonaws.com');
    expect(partitionDnsSuffix('cn-north-1')).toBe('amazonaws.com.cn');
    expect(partitionDnsSuffix('us-iso-east-1')).toBe('c2s.ic.gov');
    expect(partitionDnsSuffix('us-isob-east-1')).toBe('sc2s.sgov.gov');
  });
});
