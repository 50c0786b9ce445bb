/**
 * Tests for the assume-role module runner
 */

import { describe, it, expect, vi } from 'vitest';
import { runAssumeRoleModule, buildClientConfig } from '../runner.js';
import type { StsClientConfig } from '../../config/index.js';
import type { AssumeRoleClient } from '../../sts/service.js';
import type { AssumeRoleInput } from '../../types/requests.js';
import type { AssumeRoleOutput } from '../../types/responses.js';
import { StaticCredentialProvider } from '../../credentials/static.js';
import { EnvironmentCredentialProvider } from '../../credentials/environment.js';
import { ProfileCredentialProvider } from '../../credentials/profile.js';
import { StsError } from '../../error/index.js';

const ROLE_ARN = 'arn:aws:iam::123456789012:role/someRole';
const EXPIRATION = new Date('2030-01-01T12:00:00Z');

const OUTPUT: AssumeRoleOutput = {
  Credentials: {
    AccessKeyId: 'AK1',
    SecretAccessKey: 'SK1',
    SessionToken: 'TOK1',
    Expiration: EXPIRATION,
  },
  AssumedRoleUser: {
    Arn: 'arn:aws:sts::123456789012:assumed-role/someRole/someRoleSession',
    AssumedRoleId: 'AROAEXAMPLE:someRoleSession',
  },
};

const ENV = {
  AWS_REGION: 'us-east-1',
  AWS_ACCESS_KEY_ID: 'test-access-key',
  AWS_SECRET_ACCESS_KEY: 'test-secret',
};

const PARAMS = {
  role_arn: ROLE_ARN,
  role_session_name: 'someRoleSession',
};

function createClient() {
  const assumeRole = vi.fn<(input: AssumeRoleInput) => Promise<AssumeRoleOutput>>();
  const close = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
  const client: AssumeRoleClient = { assumeRole, close };
  const clientFactory = vi.fn((_config: StsClientConfig) => client);
  return { assumeRole, close, clientFactory };
}

function createMockLogger() {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  };
}

describe('buildClientConfig', () => {
  it('should prefer explicit parameters over the environment', () => {
    const config = buildClientConfig(
      {
        region: 'eu-west-1',
        endpoint: 'http://localhost:4566',
        accessKey: 'param-access-key',
        secretKey: 'param-secret',
        validateCerts: false,
      },
      ENV
    );

    expect(config.region).toBe('eu-west-1');
    expect(config.endpoint).toBe('http://localhost:4566');
    expect(config.validateCerts).toBe(false);
    expect(config.credentialProvider).toBeInstanceOf(StaticCredentialProvider);
  });

  it('should fall back to environment credentials', () => {
    const config = buildClientConfig({ validateCerts: true }, ENV);

    expect(config.region).toBe('us-east-1');
    expect(config.credentialProvider).toBeInstanceOf(EnvironmentCredentialProvider);
  });

  it('should pair a security token with environment keys', async () => {
    const config = buildClientConfig({ securityToken: 'param-session-token', validateCerts: true }, ENV);

    await expect(config.credentialProvider.getCredentials()).resolves.toEqual({
      accessKeyId: 'test-access-key',
      secretAccessKey: 'test-secret',
      sessionToken: 'param-session-token',
    });
  });

  it('should pair a security token with parameter keys', async () => {
    const config = buildClientConfig(
      {
        accessKey: 'param-access-key',
        secretKey: 'param-secret',
        securityToken: 'param-session-token',
        validateCerts: true,
      },
      ENV
    );

    await expect(config.credentialProvider.getCredentials()).resolves.toEqual({
      accessKeyId: 'param-access-key',
      secretAccessKey: 'param-secret',
      sessionToken: 'param-session-token',
    });
  });

  it('should reject a security token without any keys', () => {
    expect(() =>
      buildClientConfig({ securityToken: 'param-session-token', validateCerts: true }, { AWS_REGION: 'us-east-1' })
    ).toThrow('security_token requires aws_access_key and aws_secret_key, as parameters or in the environment');
  });

  it('should use a named profile over environment keys', () => {
    const config = buildClientConfig({ profile: 'dev', validateCerts: true }, ENV);

    expect(config.credentialProvider).toBeInstanceOf(ProfileCredentialProvider);
    expect(config.credentialProvider).toMatchObject({ profile: 'dev' });
  });

  it('should reject a security token combined with a profile', () => {
    expect(() =>
      buildClientConfig({ profile: 'dev', securityToken: 'param-session-token', validateCerts: true }, ENV)
    ).toThrow('security_token cannot be combined with profile');
  });

  it('should reject an access key without a secret key', () => {
    expect(() => buildClientConfig({ accessKey: 'test-access-key', validateCerts: true }, ENV)).toThrow(
      'aws_access_key and aws_secret_key must be supplied together'
    );
  });
});

describe('runAssumeRoleModule', () => {
  it('should report the assumed role', async () => {
    const { assumeRole, clientFactory } = createClient();
    assumeRole.mockResolvedValue(OUTPUT);

    const result = await runAssumeRoleModule(PARAMS, { env: ENV, clientFactory });

    expect(result).toEqual({
      changed: true,
      sts_creds: {
        access_key: 'AK1',
        secret_key: 'SK1',
        session_token: 'TOK1',
        expiration: EXPIRATION,
      },
      sts_user: {
        arn: 'arn:aws:sts::123456789012:assumed-role/someRole/someRoleSession',
        assume_role_id: 'AROAEXAMPLE:someRoleSession',
      },
    });
    expect(assumeRole).toHaveBeenCalledWith({ RoleArn: ROLE_ARN, RoleSessionName: 'someRoleSession' });
  });

  it('should reject an out-of-range duration before creating a client', async () => {
    const { clientFactory } = createClient();

    const result = await runAssumeRoleModule(
      { ...PARAMS, duration_seconds: 7200 },
      { env: ENV, clientFactory }
    );

    expect(result).toEqual({
      failed: true,
      changed: false,
      msg: 'duration_seconds: must be between 900 and 3600 seconds',
    });
    expect(clientFactory).not.toHaveBeenCalled();
  });

  it('should fail without a region', async () => {
    const { clientFactory } = createClient();

    const result = await runAssumeRoleModule(PARAMS, {
      env: { AWS_ACCESS_KEY_ID: 'test-access-key', AWS_SECRET_ACCESS_KEY: 'test-secret' },
      clientFactory,
    });

    expect(result).toEqual({ failed: true, changed: false, msg: 'region must be specified' });
    expect(clientFactory).not.toHaveBeenCalled();
  });

  it('should fail when the client cannot be created', async () => {
    const clientFactory = vi.fn((_config: StsClientConfig): AssumeRoleClient => {
      throw new Error('unsupported endpoint');
    });

    const result = await runAssumeRoleModule(PARAMS, { env: ENV, clientFactory });

    expect(result).toEqual({ failed: true, changed: false, msg: 'unsupported endpoint' });
  });

  it('should report a provider fault verbatim and close the client', async () => {
    const { assumeRole, close, clientFactory } = createClient();
    assumeRole.mockRejectedValue(new StsError('Access denied for someRole', 'ACCESS_DENIED'));

    const result = await runAssumeRoleModule(PARAMS, { env: ENV, clientFactory });

    expect(result).toEqual({ failed: true, changed: false, msg: 'Access denied for someRole' });
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should close the client after success', async () => {
    const { assumeRole, close, clientFactory } = createClient();
    assumeRole.mockResolvedValue(OUTPUT);

    await runAssumeRoleModule(PARAMS, { env: ENV, clientFactory });

    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should log a failed close and keep the result', async () => {
    const { assumeRole, close, clientFactory } = createClient();
    assumeRole.mockResolvedValue(OUTPUT);
    close.mockRejectedValue(new Error('close failed'));
    const logger = createMockLogger();

    const result = await runAssumeRoleModule(PARAMS, { env: ENV, logger, clientFactory });

    expect('failed' in result).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('Failed to close STS client', { error: 'close failed' });
  });

  it('should sign with the security token parameter and environment keys', async () => {
    const { assumeRole, clientFactory } = createClient();
    assumeRole.mockResolvedValue(OUTPUT);

    await runAssumeRoleModule({ ...PARAMS, security_token: 'param-session-token' }, { env: ENV, clientFactory });

    const config = clientFactory.mock.calls[0]?.[0];
    await expect(config?.credentialProvider.getCredentials()).resolves.toMatchObject({
      accessKeyId: 'test-access-key',
      sessionToken: 'param-session-token',
    });
  });

  it('should pass the resolved configuration to the client factory', async () => {
    const { assumeRole, clientFactory } = createClient();
    assumeRole.mockResolvedValue(OUTPUT);

    await runAssumeRoleModule(
      { ...PARAMS, region: 'ap-northeast-1', validate_certs: false },
      { env: ENV, clientFactory }
    );

    const config = clientFactory.mock.calls[0]?.[0];
    expect(config?.region).toBe('ap-northeast-1');
    expect(config?.validateCerts).toBe(false);
    expect(config?.timeout).toBe(30000);
  });
});
