/**
 * Module parameter schema.
 *
 * Parameters arrive as one flat, snake_case document. The schema is the
 * composition of the connection parameters (used only to build the client)
 * and the role parameters (handed to the invoker).
 *
 * @module module/params
 */

import { z } from 'zod';
import type { AssumeRoleRequest } from '../types/requests.js';
import {
  EXTERNAL_ID_PATTERN,
  MAX_SESSION_DURATION,
  MIN_SESSION_DURATION,
  ROLE_ARN_PATTERN,
  SESSION_NAME_PATTERN,
} from '../config/index.js';
import { validationError } from '../error/index.js';

/**
 * Alternative parameter names, mapped to their canonical name.
 */
export const PARAM_ALIASES: Readonly<Record<string, string>> = {
  aws_region: 'region',
  ec2_region: 'region',
  ec2_access_key: 'aws_access_key',
  access_key: 'aws_access_key',
  ec2_secret_key: 'aws_secret_key',
  secret_key: 'aws_secret_key',
  access_token: 'security_token',
  aws_profile: 'profile',
};

const nullToUndefined = (value: unknown): unknown => (value === null ? undefined : value);

/**
 * Integer-looking strings become numbers; everything else passes through.
 */
const integerStringToNumber = (value: unknown): unknown =>
  typeof value === 'string' && /^\s*-?\d+\s*$/.test(value) ? Number(value) : value;

function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(nullToUndefined, schema.optional());
}

function required<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(nullToUndefined, schema);
}

const text = () =>
  z.string({ required_error: 'is required', invalid_type_error: 'must be a string' });

/**
 * Connection parameters: where and as whom the STS call is made.
 */
export const connectionParamsSchema = z.object({
  region: optional(text().min(1, 'cannot be empty')),
  ec2_url: optional(text().url('must be a URL')),
  aws_access_key: optional(text()),
  aws_secret_key: optional(text()),
  security_token: optional(text()),
  profile: optional(text().min(1, 'cannot be empty')),
  validate_certs: z.preprocess(
    nullToUndefined,
    z.boolean({ invalid_type_error: 'must be a boolean' }).default(true)
  ),
});

/**
 * Role parameters: what is sent to AssumeRole.
 */
export const roleParamsSchema = z.object({
  role_arn: required(
    text()
      .min(1, 'cannot be empty')
      .regex(ROLE_ARN_PATTERN, 'must be an IAM role ARN (arn:aws:iam::<account>:role/<name>)')
  ),
  role_session_name: required(
    text()
      .min(2, 'must be 2-64 characters')
      .max(64, 'must be 2-64 characters')
      .regex(SESSION_NAME_PATTERN, 'may only contain letters, digits and +=,.@_-')
  ),
  policy: optional(text()),
  duration_seconds: optional(
    z.preprocess(
      integerStringToNumber,
      z
        .number({ invalid_type_error: 'must be an integer' })
        .int('must be an integer')
        .min(
          MIN_SESSION_DURATION,
          `must be between ${MIN_SESSION_DURATION} and ${MAX_SESSION_DURATION} seconds`
        )
        .max(
          MAX_SESSION_DURATION,
          `must be between ${MIN_SESSION_DURATION} and ${MAX_SESSION_DURATION} seconds`
        )
    )
  ),
  external_id: optional(
    text()
      .min(2, 'must be 2-1224 characters')
      .max(1224, 'must be 2-1224 characters')
      .regex(EXTERNAL_ID_PATTERN, 'may only contain letters, digits and +=,.@:/_-')
  ),
  mfa_serial_number: optional(text()),
  mfa_token: optional(text()),
});

/**
 * Full module parameter schema. Unknown keys are rejected.
 */
export const moduleParamsSchema = connectionParamsSchema.merge(roleParamsSchema).strict();

/**
 * Connection settings, camel-cased.
 */
export interface ConnectionParams {
  region?: string;
  endpoint?: string;
  accessKey?: string;
  secretKey?: string;
  securityToken?: string;
  profile?: string;
  validateCerts: boolean;
}

/**
 * Validated module parameters.
 */
export interface ModuleParams {
  connection: ConnectionParams;
  request: AssumeRoleRequest;
}

/**
 * Rename alias keys to their canonical name. A canonical key that is already
 * present wins over its aliases.
 */
export function normalizeParamAliases(raw: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (PARAM_ALIASES[key] === undefined) {
      normalized[key] = value;
    }
  }

  for (const [key, value] of Object.entries(raw)) {
    const canonical = PARAM_ALIASES[key];
    if (canonical !== undefined && normalized[canonical] === undefined) {
      normalized[canonical] = value;
    }
  }

  return normalized;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format zod issues as `<field>: <reason>` joined by `; `.
 */
export function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate a raw parameter document.
 *
 * @throws {StsError} With code `VALIDATION` listing every rejected field
 *
 * @example
 * ```typescript
 * const { connection, request } = parseModuleParams({
 *   region: 'us-east-1',
 *   role_arn: 'arn:aws:iam::123456789012:role/someRole',
 *   role_session_name: 'someRoleSession',
 * });
 * ```
 */
export function parseModuleParams(raw: unknown): ModuleParams {
  if (!isRecord(raw)) {
    throw validationError('parameters must be a JSON object');
  }

  const result = moduleParamsSchema.safeParse(normalizeParamAliases(raw));
  if (!result.success) {
    throw validationError(formatIssues(result.error.issues));
  }

  const params = result.data;

  const request: AssumeRoleRequest = {
    roleArn: params.role_arn,
    roleSessionName: params.role_session_name,
  };
  if (params.policy !== undefined) request.policy = params.policy;
  if (params.duration_seconds !== undefined) request.durationSeconds = params.duration_seconds;
  if (params.external_id !== undefined) request.externalId = params.external_id;
  if (params.mfa_serial_number !== undefined) request.mfaSerialNumber = params.mfa_serial_number;
  if (params.mfa_token !== undefined) request.mfaToken = params.mfa_token;

  const connection: ConnectionParams = { validateCerts: params.validate_certs };
  if (params.region !== undefined) connection.region = params.region;
  if (params.ec2_url !== undefined) connection.endpoint = params.ec2_url;
  if (params.aws_access_key !== undefined) connection.accessKey = params.aws_access_key;
  if (params.aws_secret_key !== undefined) connection.secretKey = params.aws_secret_key;
  if (params.security_token !== undefined) connection.securityToken = params.security_token;
  if (params.profile !== undefined) connection.profile = params.profile;

  return { connection, request };
}
