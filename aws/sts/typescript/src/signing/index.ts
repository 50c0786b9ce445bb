/**
 * AWS Signature V4 Implementation
 *
 * Signs STS Query API requests.
 *
 * @module signing
 */

import * as crypto from 'crypto';
import type { AwsCredentials } from '../credentials/types.js';

const ALGORITHM = 'AWS4-HMAC-SHA256';

/**
 * Request to be signed.
 */
export interface SignableRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Signed request result. Header names are lower-case.
 */
export interface SignedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Signing parameters.
 */
export interface SigningParams {
  region: string;
  service: string;
  credentials: AwsCredentials;
  /** Signing time; defaults to now */
  date?: Date;
}

/**
 * Sign a request with AWS Signature V4.
 *
 * Adds `host`, `x-amz-date`, `x-amz-content-sha256`, `x-amz-security-token`
 * (when the credentials carry a session token) and `authorization`.
 *
 * @example
 * ```typescript
 * const signed = signRequest(
 *   { method: 'POST', url: 'https://sts.us-east-1.amazonaws.com/', headers: {}, body },
 *   { region: 'us-east-1', service: 'sts', credentials }
 * );
 * ```
 */
export function signRequest(request: SignableRequest, params: SigningParams): SignedRequest {
  const timestamp = params.date ?? new Date();
  const dateStr = formatDate(timestamp);
  const dateTimeStr = formatDateTime(timestamp);
  const url = new URL(request.url);

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(request.headers)) {
    headers[key.toLowerCase()] = value;
  }
  headers['host'] = url.host;
  headers['x-amz-date'] = dateTimeStr;

  if (params.credentials.sessionToken) {
    headers['x-amz-security-token'] = params.credentials.sessionToken;
  }

  const payloadHash = sha256Hex(request.body ?? '');
  headers['x-amz-content-sha256'] = payloadHash;

  const sortedHeaders = Object.entries(headers)
    .map(([k, v]): [string, string] => [k, v.trim()])
    .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  const canonicalHeaders = sortedHeaders.map(([k, v]) => `${k}:${v}`).join('\n') + '\n';
  const signedHeaders = sortedHeaders.map(([k]) => k).join(';');

  const canonicalRequest = createCanonicalRequest(
    request.method,
    encodeUri(url.pathname || '/'),
    canonicalQueryString(url.searchParams),
    canonicalHeaders,
    signedHeaders,
    payloadHash
  );

  const credentialScope = `${dateStr}/${params.region}/${params.service}/aws4_request`;
  const stringToSign = createStringToSign(dateTimeStr, credentialScope, canonicalRequest);

  const signingKey = deriveSigningKey(
    params.credentials.secretAccessKey,
    dateStr,
    params.region,
    params.service
  );
  const signature = hmac(signingKey, stringToSign).toString('hex');

  headers['authorization'] = [
    `${ALGORITHM} Credential=${params.credentials.accessKeyId}/${credentialScope}`,
    `SignedHeaders=${signedHeaders}`,
    `Signature=${signature}`,
  ].join(', ');

  return {
    method: request.method.toUpperCase(),
    url: request.url,
    headers,
    body: request.body,
  };
}

/**
 * Create canonical request string.
 */
export function createCanonicalRequest(
  method: string,
  canonicalUri: string,
  canonicalQuery: string,
  canonicalHeaders: string,
  signedHeaders: string,
  payloadHash: string
): string {
  return [
    method.toUpperCase(),
    canonicalUri,
    canonicalQuery,
    canonicalHeaders,
    signedHeaders,
    payloadHash,
  ].join('\n');
}

/**
 * Create string to sign.
 */
export function createStringToSign(
  dateTime: string,
  credentialScope: string,
  canonicalRequest: string
): string {
  return [ALGORITHM, dateTime, credentialScope, sha256Hex(canonicalRequest)].join('\n');
}

/**
 * Derive the signing key.
 */
export function deriveSigningKey(
  secretAccessKey: string,
  date: string,
  region: string,
  service: string
): Buffer {
  const kDate = hmac(`AWS4${secretAccessKey}`, date);
  const kRegion = hmac(kDate, region);
  const kService = hmac(kRegion, service);
  return hmac(kService, 'aws4_request');
}

/**
 * Format date as YYYYMMDD.
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

/**
 * Format date as YYYYMMDDTHHMMSSZ.
 */
export function formatDateTime(date: Date): string {
  return date.toISOString().replace(/[:-]|\.\d{3}/g, '');
}

function canonicalQueryString(params: URLSearchParams): string {
  return Array.from(params.entries())
    .sort((a, b) => (a[0] === b[0] ? a[1].localeCompare(b[1]) : a[0] < b[0] ? -1 : 1))
    .map(([k, v]) => `${encodeUriComponent(k)}=${encodeUriComponent(v)}`)
    .join('&');
}

function encodeUri(path: string): string {
  return path
    .split('/')
    .map((segment) => encodeUriComponent(decodeURIComponent(segment)))
    .join('/');
}

function encodeUriComponent(str: string): string {
  return encodeURIComponent(str).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

function sha256Hex(data: string): string {
  return crypto.createHash('sha256').update(data, 'utf8').digest('hex');
}

function hmac(key: string | Buffer, data: string): Buffer {
  return crypto.createHmac('sha256', key).update(data, 'utf8').digest();
}
