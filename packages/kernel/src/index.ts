/**
 * @nfse-reader/kernel
 *
 * Batch engine for the NFS-e reader: file discovery, per-file processing
 * with bounded concurrency, cancellation and run events.
 *
 * @packageDocumentation
 */

export { collectPaths } from './collector/path-collector.js';
export type { CollectOptions, CollectionResult } from './collector/path-collector.js';

export { processBatch, processPaths } from './batch/batch-processor.js';
export type { BatchOptions, PathsBatch } from './batch/batch-processor.js';

export { RunContext, defaultClock, defaultIdGenerator } from './context/context.js';

// Determinism support: injectable clock and ID generator for tests
export type { Clock, IdGenerator } from './context/context.js';

export {
  buildEffectiveConfig,
  configFromEnv,
  validateBatchConfig,
  CONFIG_ENV_VARS,
  DEFAULT_BATCH_CONFIG,
} from './config/effective-config.js';

export type { BatchConfig, EffectiveConfig } from './config/effective-config.js';

// Event Hooks
export { CompositeEventHooks, LoggingEventHooks } from './events/hooks.js';

export type {
  BatchEventHooks,
  BatchStartEvent,
  FileCompleteEvent,
  BatchCompleteEvent,
} from './events/hooks.js';

// Re-export commonly used types
export type { Batch, BatchSummary, CollectionDiagnostic, ProcessingResult } from '@nfse-reader/contracts';
