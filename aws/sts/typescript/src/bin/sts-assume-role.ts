#!/usr/bin/env node
/**
 * Assume an IAM role and print the temporary credentials as JSON.
 */

import { runCli } from '../module/cli.js';
import { ConsoleLogger, logError } from '../observability/logging.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logError(
      new ConsoleLogger('error'),
      'sts-assume-role',
      error instanceof Error ? error : new Error(String(error))
    );
    process.exitCode = 1;
  }
);
