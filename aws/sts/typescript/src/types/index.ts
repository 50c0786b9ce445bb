/**
 * STS Assume Role Types
 *
 * @module types
 */

// Request types
export type {
  AssumeRoleRequest,
  AssumeRoleInput,
} from './requests.js';

// Response types
export type {
  StsCredentials,
  StsAssumedRoleUser,
  AssumeRoleOutput,
  TemporaryCredentials,
  AssumedIdentity,
  AssumeRoleSuccess,
  AssumeRoleFailure,
  AssumeRoleOutcome,
} from './responses.js';
