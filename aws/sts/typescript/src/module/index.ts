/**
 * Assume-role module surface.
 *
 * @module module
 */

export {
  connectionParamsSchema,
  roleParamsSchema,
  moduleParamsSchema,
  normalizeParamAliases,
  parseModuleParams,
  formatIssues,
  PARAM_ALIASES,
  type ConnectionParams,
  type ModuleParams,
} from './params.js';

export {
  toModuleResult,
  failResult,
  isFailureResult,
  type ModuleResult,
  type ModuleSuccessResult,
  type ModuleFailureResult,
  type ModuleCredentials,
  type ModuleUser,
} from './result.js';

export {
  runAssumeRoleModule,
  buildClientConfig,
  type ModuleDependencies,
} from './runner.js';

export { runCli, processIo, LOG_LEVEL_ENV_VAR, type CliIo } from './cli.js';
