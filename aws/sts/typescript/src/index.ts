/**
 * AWS STS AssumeRole adapter.
 *
 * Obtains temporary credentials for an IAM role with a single AssumeRole call
 * and reports them, or the provider's fault, as a uniform result.
 *
 * @example
 * ```typescript
 * import { createStsService, invoke, StsConfigBuilder } from '@sts-adapter/aws-sts';
 *
 * const client = createStsService(new StsConfigBuilder().fromEnv().build());
 * try {
 *   const outcome = await invoke(client, {
 *     roleArn: 'arn:aws:iam::123456789012:role/someRole',
 *     roleSessionName: 'someRoleSession',
 *   });
 * } finally {
 *   await client.close();
 * }
 * ```
 *
 * @packageDocumentation
 */

export * from './types/index.js';

export * from './error/index.js';

export {
  StsConfigBuilder,
  configBuilder,
  resolveStsEndpoint,
  DEFAULT_CONFIG,
  MIN_SESSION_DURATION,
  MAX_SESSION_DURATION,
  ROLE_ARN_PATTERN,
  SESSION_NAME_PATTERN,
  EXTERNAL_ID_PATTERN,
  REGION_ENV_VARS,
  ENDPOINT_ENV_VARS,
  type StsClientConfig,
} from './config/index.js';

export * from './credentials/index.js';

export {
  signRequest,
  type SignableRequest,
  type SignedRequest,
  type SigningParams,
} from './signing/index.js';

export * from './http/index.js';

export * from './sts/index.js';

export {
  invoke,
  buildAssumeRoleInput,
  toSuccessOutcome,
  toFailureOutcome,
  type InvokeOptions,
} from './invoker/index.js';

export * from './observability/index.js';

export * from './module/index.js';
