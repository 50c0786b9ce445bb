/**
 * Base Credentials Module
 *
 * Credentials used to sign the AssumeRole request itself.
 *
 * @module credentials
 */

export type { AwsCredentials, CredentialProvider } from './types.js';

export { StaticCredentialProvider } from './static.js';

export { ProfileCredentialProvider, parseIni, type ProfileConfig } from './profile.js';

export {
  EnvironmentCredentialProvider,
  firstEnvValue,
  ACCESS_KEY_ENV_VARS,
  SECRET_KEY_ENV_VARS,
  SESSION_TOKEN_ENV_VARS,
  type Environment,
} from './environment.js';
