/**
 * nfse-reader command
 *
 * Usage:
 *   nfse-reader ./invoices
 *   nfse-reader --json --concurrency 8 a.xml b.xml ./more
 *
 * Exit codes:
 *   0 = every file read
 *   1 = at least one file failed
 *   2 = usage or configuration error
 *   130 = interrupted (SIGINT)
 */

import dotenv from 'dotenv';
import { buildEffectiveConfig, configFromEnv, processPaths, type BatchConfig } from '@nfse-reader/kernel';
import { ConfigurationError, createSafeLogger } from '@nfse-reader/shared';
import { USAGE, UsageError, parseArgs, type CliArgs } from './args.js';
import { exitCodeFor, renderJson, renderText } from './render.js';

interface Writable {
  write(chunk: string): unknown;
}

export interface CliIo {
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Aborts the running batch, e.g. on SIGINT */
  signal?: AbortSignal;
}

/** Usage, configuration or internal error */
const EXIT_ERROR = 2;

/**
 * Run the command and return its exit code. Never calls process.exit.
 */
export async function main(argv: readonly string[], io: CliIo): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`${error.message}\n\n${USAGE}\n`);
      return EXIT_ERROR;
    }
    throw error;
  }

  if (args.help) {
    io.stdout.write(`${USAGE}\n`);
    return 0;
  }

  let config: BatchConfig;
  try {
    config = buildEffectiveConfig(configFromEnv(io.env), args.overrides).config;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.stderr.write(`Configuration error: ${error.message}\n`);
      return EXIT_ERROR;
    }
    throw error;
  }

  const logger = createSafeLogger({ level: config.logLevel });
  logger.debug('Configuration resolved', { concurrency: config.concurrency, maxDepth: config.maxDepth });

  const { batch, diagnostics } = await processPaths(args.paths, {
    cwd: io.cwd,
    concurrency: config.concurrency,
    maxFileBytes: config.maxFileBytes,
    followSymlinks: config.followSymlinks,
    maxDepth: config.maxDepth,
    logger,
    ...(io.signal ? { signal: io.signal } : {}),
  });

  io.stdout.write(args.json ? renderJson(batch, diagnostics) : renderText(batch, diagnostics));

  return exitCodeFor(batch);
}

/**
 * Process entry point: loads .env, wires SIGINT to cancellation and sets
 * the exit code.
 */
export async function run(): Promise<void> {
  dotenv.config();

  const controller = new AbortController();
  const onSigint = (): void => {
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    process.exitCode = await main(process.argv.slice(2), {
      stdout: process.stdout,
      stderr: process.stderr,
      env: process.env,
      cwd: process.cwd(),
      signal: controller.signal,
    });
  } catch (error) {
    process.stderr.write(`nfse-reader: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = EXIT_ERROR;
  } finally {
    process.off('SIGINT', onSigint);
  }
}
