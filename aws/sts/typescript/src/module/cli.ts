/**
 * Command-line runner.
 *
 * `sts-assume-role [args.json]` reads the parameter document from the named
 * file, or from stdin, and prints the result document as one JSON line.
 *
 * @module module/cli
 */

import { readFile } from 'fs/promises';
import type { StsClientConfig } from '../config/index.js';
import type { Environment } from '../credentials/environment.js';
import { createLogger } from '../observability/logging.js';
import type { AssumeRoleClient } from '../sts/service.js';
import { failResult, isFailureResult, type ModuleResult } from './result.js';
import { runAssumeRoleModule } from './runner.js';

/**
 * Environment variable naming the log level (`error`, `warn`, `info`, `debug`, `trace`).
 */
export const LOG_LEVEL_ENV_VAR = 'STS_ASSUME_ROLE_LOG_LEVEL';

/**
 * I/O used by the CLI.
 */
export interface CliIo {
  readFile(path: string): Promise<string>;
  readStdin(): Promise<string>;
  writeStdout(text: string): void;
  env: Environment;
  clientFactory?: (config: StsClientConfig) => AssumeRoleClient;
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Process-backed I/O.
 */
export function processIo(): CliIo {
  return {
    readFile: (path) => readFile(path, 'utf8'),
    readStdin: () => readStream(process.stdin),
    writeStdout: (text) => {
      process.stdout.write(text);
    },
    env: process.env,
  };
}

async function loadDocument(args: readonly string[], io: CliIo): Promise<unknown> {
  const path = args[0];
  const text = path !== undefined ? await io.readFile(path) : await io.readStdin();
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new Error(`Unable to parse parameters as JSON: ${failResult(error).msg}`);
  }
}

/**
 * Run the CLI.
 *
 * @returns Process exit code: 0 on success, 1 on failure
 */
export async function runCli(args: readonly string[], io: CliIo = processIo()): Promise<number> {
  const logger = createLogger(io.env[LOG_LEVEL_ENV_VAR]);

  let result: ModuleResult;
  try {
    const document = await loadDocument(args, io);
    result = await runAssumeRoleModule(document, {
      env: io.env,
      logger,
      clientFactory: io.clientFactory,
    });
  } catch (error) {
    result = failResult(error);
  }

  io.writeStdout(`${JSON.stringify(result)}\n`);
  return isFailureResult(result) ? 1 : 0;
}
