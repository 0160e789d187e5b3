/**
 * BatchProcessor
 *
 * Runs read → parse → extract for every path, isolating failures per file.
 * Workers pull index-tagged items from a shared cursor and write each result
 * to its index, so output order equals input order whatever the timing.
 *
 * IMPORTANT: Logs carry failure kinds and counts only, never field values.
 */

import { readFile, stat } from 'node:fs/promises';
import type { Batch, CollectionDiagnostic, IoFailure, ProcessingResult } from '@nfse-reader/contracts';
import { InvoiceExtractor, parseXmlTree } from '@nfse-reader/parser';
import { buildBatchSummary, createSafeLogger, type Logger, type LogLevel } from '@nfse-reader/shared';
import { collectPaths, type CollectOptions } from '../collector/path-collector.js';
import { DEFAULT_BATCH_CONFIG, validateBatchConfig } from '../config/effective-config.js';
import { RunContext, type Clock, type IdGenerator } from '../context/context.js';
import { CompositeEventHooks, LoggingEventHooks, type BatchEventHooks } from '../events/hooks.js';

export interface BatchOptions {
  /** Files processed at the same time (default: 4) */
  concurrency?: number;
  /** Larger files fail with IoError without being read (default: 10MB) */
  maxFileBytes?: number;
  /** Aborting stops new files from starting and discards in-flight ones */
  signal?: AbortSignal;
  /** Extractor with a custom alias table (default: built-in aliases) */
  extractor?: InvoiceExtractor;
  /** Called in addition to the built-in logging hooks */
  hooks?: BatchEventHooks;
  /** Used when no logger is given (default: 'warn') */
  logLevel?: LogLevel;
  logger?: Logger;
  /** Injectable time source and run id, for deterministic tests */
  clock?: Clock;
  idGenerator?: IdGenerator;
}

export interface PathsBatch {
  batch: Batch;
  diagnostics: CollectionDiagnostic[];
}

const IO_MESSAGES: Record<string, string> = {
  ENOENT: 'File not found',
  EACCES: 'Permission denied',
  EPERM: 'Permission denied',
  EISDIR: 'Is a directory',
  EMFILE: 'Too many open files',
};

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toIoFailure(error: unknown): IoFailure {
  const code = errorCode(error);
  const known = code !== undefined ? IO_MESSAGES[code] : undefined;
  const message = known ?? (error instanceof Error ? error.message : String(error));
  return code !== undefined ? { kind: 'IoError', message, code } : { kind: 'IoError', message };
}

type ReadOutcome = { ok: true; bytes: Uint8Array } | { ok: false; failure: IoFailure };

async function readInvoiceFile(path: string, maxFileBytes: number, signal?: AbortSignal): Promise<ReadOutcome> {
  try {
    const stats = await stat(path);
    if (!stats.isFile()) {
      return { ok: false, failure: { kind: 'IoError', message: 'Not a regular file' } };
    }
    if (stats.size > maxFileBytes) {
      return {
        ok: false,
        failure: { kind: 'IoError', message: `File exceeds maximum size (${maxFileBytes} bytes)`, code: 'EFBIG' },
      };
    }
    const bytes = signal ? await readFile(path, { signal }) : await readFile(path);
    return { ok: true, bytes };
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    return { ok: false, failure: toIoFailure(error) };
  }
}

/**
 * Process files into a Batch.
 *
 * One ProcessingResult per path, in input order. No failure crosses a file
 * boundary and no file is retried. When `signal` aborts, completed results
 * are kept, the rest are listed in `pending` and `cancelled` is true.
 *
 * @throws ConfigurationError when concurrency or maxFileBytes is out of range
 */
export async function processBatch(paths: readonly string[], options: BatchOptions = {}): Promise<Batch> {
  const concurrency = options.concurrency ?? DEFAULT_BATCH_CONFIG.concurrency;
  const maxFileBytes = options.maxFileBytes ?? DEFAULT_BATCH_CONFIG.maxFileBytes;
  validateBatchConfig({ ...DEFAULT_BATCH_CONFIG, concurrency, maxFileBytes });

  const run = new RunContext({
    ...(options.clock ? { clock: options.clock } : {}),
    ...(options.idGenerator ? { idGenerator: options.idGenerator } : {}),
  });
  const logger = (
    options.logger ??
    createSafeLogger({ level: options.logLevel ?? DEFAULT_BATCH_CONFIG.logLevel, prefix: 'nfse-reader:batch' })
  ).child({ runId: run.runId });
  const extractor = options.extractor ?? new InvoiceExtractor({ logger });
  const hooks = new CompositeEventHooks([
    new LoggingEventHooks(logger),
    ...(options.hooks ? [options.hooks] : []),
  ]);
  const { signal } = options;

  const invokeHook = async (name: string, call: () => Promise<void>): Promise<void> => {
    try {
      await call();
    } catch (error) {
      logger.warn('Event hook failed', {
        hook: name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  };

  await invokeHook('onBatchStart', () =>
    hooks.onBatchStart({
      runId: run.runId,
      timestamp: run.timestamp(),
      fileCount: paths.length,
      concurrency,
    }),
  );

  const processFile = async (path: string): Promise<ProcessingResult | undefined> => {
    let read: ReadOutcome;
    try {
      read = await readInvoiceFile(path, maxFileBytes, signal);
    } catch {
      // Aborted mid-read: the work is discarded
      return undefined;
    }
    if (signal?.aborted) {
      return undefined;
    }
    if (!read.ok) {
      return { status: 'failure', sourcePath: path, failure: read.failure };
    }

    try {
      const parsed = parseXmlTree(read.bytes);
      if (!parsed.ok) {
        return { status: 'failure', sourcePath: path, failure: parsed.failure };
      }
      const extracted = extractor.extractAll(parsed.root);
      if (extracted.ok) {
        return { status: 'success', sourcePath: path, invoices: extracted.invoices };
      }
      return extracted.invoiceIndex !== undefined
        ? { status: 'failure', sourcePath: path, failure: extracted.failure, invoiceIndex: extracted.invoiceIndex }
        : { status: 'failure', sourcePath: path, failure: extracted.failure };
    } catch (error) {
      // A bug in parsing or extraction must not take the batch down
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Unexpected error while processing file', { error: message });
      return {
        status: 'failure',
        sourcePath: path,
        failure: { kind: 'MalformedXml', message: `unexpected error: ${message}` },
      };
    }
  };

  const slots: (ProcessingResult | undefined)[] = paths.map(() => undefined);
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (!signal?.aborted) {
      const index = cursor++;
      const path = paths[index];
      if (path === undefined) {
        return;
      }

      const started = run.now().getTime();
      const result = await processFile(path);
      if (result === undefined) {
        return;
      }
      slots[index] = result;

      if (result.status === 'failure') {
        logger.info('File failed', { index, kind: result.failure.kind });
      }
      await invokeHook('onFileComplete', () =>
        hooks.onFileComplete({
          runId: run.runId,
          timestamp: run.timestamp(),
          index,
          sourcePath: path,
          status: result.status,
          ...(result.status === 'failure' ? { failureKind: result.failure.kind } : {}),
          durationMs: run.now().getTime() - started,
        }),
      );
    }
  };

  const workerCount = Math.min(concurrency, paths.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const results: ProcessingResult[] = [];
  const pending: string[] = [];
  paths.forEach((path, index) => {
    const result = slots[index];
    if (result === undefined) {
      pending.push(path);
    } else {
      results.push(result);
    }
  });

  const cancelled = pending.length > 0;
  const summary = buildBatchSummary(results, run.elapsedMs());

  if (cancelled) {
    logger.info('Files left unprocessed', { pending: pending.length });
  }
  await invokeHook('onBatchComplete', () =>
    hooks.onBatchComplete({
      runId: run.runId,
      timestamp: run.timestamp(),
      durationMs: summary.durationMs,
      total: summary.total,
      succeeded: summary.succeeded,
      failed: summary.failed,
      cancelled,
    }),
  );
  await invokeHook('flush', () => hooks.flush());

  return { results, summary, cancelled, pending };
}

/**
 * Collect XML files from entries, then process them.
 */
export async function processPaths(
  entries: readonly string[],
  options: BatchOptions & Omit<CollectOptions, 'logger'> = {},
): Promise<PathsBatch> {
  const collectOptions: CollectOptions = {
    logger:
      options.logger ??
      createSafeLogger({ level: options.logLevel ?? DEFAULT_BATCH_CONFIG.logLevel, prefix: 'nfse-reader:collector' }),
  };
  if (options.cwd !== undefined) collectOptions.cwd = options.cwd;
  if (options.followSymlinks !== undefined) collectOptions.followSymlinks = options.followSymlinks;
  if (options.maxDepth !== undefined) collectOptions.maxDepth = options.maxDepth;

  const { paths, diagnostics } = await collectPaths(entries, collectOptions);
  const batch = await processBatch(paths, options);

  return { batch, diagnostics };
}
