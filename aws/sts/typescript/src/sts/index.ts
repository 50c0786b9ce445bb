/**
 * AWS STS Module
 *
 * @module sts
 */

export {
  StsService,
  createStsService,
  type AssumeRoleClient,
} from './service.js';

export { parseAssumeRoleResponse } from './xml.js';
