/**
 * Tests for AWS Signature Version 4 signing
 */

import { createHash, createHmac } from 'crypto';
import { describe, it, expect } from 'vitest';
import {
  signRequest,
  createCanonicalRequest,
  createStringToSign,
  deriveSigningKey,
  formatDate,
  formatDateTime,
} from './index.js';

const credentials = {
  accessKeyId: 'test-access-key',
  secretAccessKey: 'test-secret',
};

const date = new Date('2024-01-15T10:30:00Z');

function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

describe('formatDate', () => {
  it('should format as YYYYMMDD', () => {
    expect(formatDate(date)).toBe('20240115');
  });
});

describe('formatDateTime', () => {
  it('should format as YYYYMMDDTHHMMSSZ', () => {
    expect(formatDateTime(date)).toBe('20240115T103000Z');
  });
});

describe('createCanonicalRequest', () => {
  it('should join the parts with newlines', () => {
    const canonical = createCanonicalRequest(
      'post',
      '/',
      '',
      'host:sts.amazonaws.com\n',
      'host',
      'abc123'
    );

    expect(canonical).toBe('POST\n/\n\nhost:sts.amazonaws.com\n\nhost\nabc123');
  });
});

describe('createStringToSign', () => {
  it('should hash the canonical request', () => {
    const stringToSign = createStringToSign('20240115T103000Z', '20240115/us-east-1/sts/aws4_request', 'canonical');

    expect(stringToSign).toBe(
      `AWS4-HMAC-SHA256\n20240115T103000Z\n20240115/us-east-1/sts/aws4_request\n${sha256Hex('canonical')}`
    );
  });
});

describe('deriveSigningKey', () => {
  it('should derive a 32-byte key', () => {
    const key = deriveSigningKey('test-secret', '20240115', 'us-east-1', 'sts');

    expect(key).toHaveLength(32);
  });

  it('should match a known key for a fixed scope', () => {
    const key = deriveSigningKey('test-secret', '20240115', 'us-east-1', 'sts');

    expect(key.toString('hex')).toBe('a6ced43279bc288f916fefb36f67a130cd75a3f05cd637001910e03a4003501d');
  });

  it('should depend on every scope component', () => {
    const base = deriveSigningKey('test-secret', '20240115', 'us-east-1', 'sts').toString('hex');

    expect(deriveSigningKey('other-secret', '20240115', 'us-east-1', 'sts').toString('hex')).not.toBe(base);
    expect(deriveSigningKey('test-secret', '20240116', 'us-east-1', 'sts').toString('hex')).not.toBe(base);
    expect(deriveSigningKey('test-secret', '20240115', 'eu-west-1', 'sts').toString('hex')).not.toBe(base);
    expect(deriveSigningKey('test-secret', '20240115', 'us-east-1', 'iam').toString('hex')).not.toBe(base);
  });
});

describe('signRequest', () => {
  const body = 'Action=AssumeRole&Version=2011-06-15';
  const request = {
    method: 'post',
    url: 'https://sts.us-east-1.amazonaws.com/',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body,
  };

  it('should add the signing headers', () => {
    const signed = signRequest(request, { region: 'us-east-1', service: 'sts', credentials, date });

    expect(signed.method).toBe('POST');
    expect(signed.url).toBe('https://sts.us-east-1.amazonaws.com/');
    expect(signed.body).toBe(body);
    expect(signed.headers['content-type']).toBe('application/x-www-form-urlencoded');
    expect(signed.headers['host']).toBe('sts.us-east-1.amazonaws.com');
    expect(signed.headers['x-amz-date']).toBe('20240115T103000Z');
    expect(signed.headers['x-amz-content-sha256']).toBe(sha256Hex(body));
    expect(signed.headers['x-amz-security-token']).toBeUndefined();
  });

  it('should compute the signature over the canonical request', () => {
    const signed = signRequest(request, { region: 'us-east-1', service: 'sts', credentials, date });

    const payloadHash = sha256Hex(body);
    const signedHeaders = 'content-type;host;x-amz-content-sha256;x-amz-date';
    const canonical = createCanonicalRequest(
      'POST',
      '/',
      '',
      'content-type:application/x-www-form-urlencoded\n' +
        'host:sts.us-east-1.amazonaws.com\n' +
        `x-amz-content-sha256:${payloadHash}\n` +
        'x-amz-date:20240115T103000Z\n',
      signedHeaders,
      payloadHash
    );
    const scope = '20240115/us-east-1/sts/aws4_request';
    const signature = createHmac('sha256', deriveSigningKey('test-secret', '20240115', 'us-east-1', 'sts'))
      .update(createStringToSign('20240115T103000Z', scope, canonical), 'utf8')
      .digest('hex');

    expect(signed.headers['authorization']).toBe(
      `AWS4-HMAC-SHA256 Credential=test-access-key/${scope}, SignedHeaders=${signedHeaders}, Signature=${signature}`
    );
  });

  it('should sign the session token header', () => {
    const signed = signRequest(request, {
      region: 'us-east-1',
      service: 'sts',
      credentials: { ...credentials, sessionToken: 'test-session-token' },
      date,
    });

    expect(signed.headers['x-amz-security-token']).toBe('test-session-token');
    expect(signed.headers['authorization']).toContain(
      'SignedHeaders=content-type;host;x-amz-content-sha256;x-amz-date;x-amz-security-token,'
    );
  });

  it('should be deterministic for a fixed date', () => {
    const first = signRequest(request, { region: 'us-east-1', service: 'sts', credentials, date });
    const second = signRequest(request, { region: 'us-east-1', service: 'sts', credentials, date });

    expect(first.headers['authorization']).toBe(second.headers['authorization']);
  });

  it('should produce a known signature for an AssumeRole request', () => {
    const signed = signRequest(
      {
        method: 'POST',
        url: 'https://sts.us-east-1.amazonaws.com/',
        headers: { 'content-type': 'application/x-www-form-urlencoded; charset=utf-8' },
        body:
          'Action=AssumeRole&Version=2011-06-15' +
          '&RoleArn=arn%3Aaws%3Aiam%3A%3A123456789012%3Arole%2FsomeRole' +
          '&RoleSessionName=someRoleSession',
      },
      { region: 'us-east-1', service: 'sts', credentials, date }
    );

    expect(signed.headers['x-amz-content-sha256']).toBe(
      '616fc21a536b79345c244543944db6080b6d12c505bd02df532f24c51be2663b'
    );
    expect(signed.headers['authorization']).toBe(
      'AWS4-HMAC-SHA256 Credential=test-access-key/20240115/us-east-1/sts/aws4_request, ' +
        'SignedHeaders=content-type;host;x-amz-content-sha256;x-amz-date, ' +
        'Signature=0fa025d26c6f4f8a98bb6555c663a4412490904ebe9530909061a51f4bcb61a1'
    );
  });
});
