/**
 * Batch Event Hooks
 *
 * Observe a batch run without touching its results. A hook that throws or
 * rejects is logged by the processor and otherwise ignored.
 *
 * @packageDocumentation
 */

import type { FailureKind, ProcessingResult } from '@nfse-reader/contracts';
import type { Logger } from '@nfse-reader/shared';

/**
 * Event emitted when a batch run starts.
 */
export interface BatchStartEvent {
  runId: string;
  timestamp: string;
  fileCount: number;
  concurrency: number;
}

/**
 * Event emitted when one file has a result.
 */
export interface FileCompleteEvent {
  runId: string;
  timestamp: string;
  /** Position of the file in the batch input */
  index: number;
  sourcePath: string;
  status: ProcessingResult['status'];
  failureKind?: FailureKind;
  durationMs: number;
}

/**
 * Event emitted when a batch run completes or is cancelled.
 */
export interface BatchCompleteEvent {
  runId: string;
  timestamp: string;
  durationMs: number;
  total: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
}

/**
 * Batch event hooks interface.
 *
 * All methods are optional and may return a promise, which the processor
 * awaits before going on.
 *
 * @example
 * ```typescript
 * class ProgressHooks implements BatchEventHooks {
 *   onFileComplete(event: FileCompleteEvent) {
 *     progressBar.tick();
 *   }
 * }
 * ```
 */
export interface BatchEventHooks {
  onBatchStart?(event: BatchStartEvent): void | Promise<void>;

  onFileComplete?(event: FileCompleteEvent): void | Promise<void>;

  onBatchComplete?(event: BatchCompleteEvent): void | Promise<void>;

  /**
   * Flush any buffered events (for async implementations).
   */
  flush?(): Promise<void>;
}

/**
 * Composite event hooks that dispatches to multiple listeners.
 */
export class CompositeEventHooks implements BatchEventHooks {
  private readonly hooks: BatchEventHooks[];

  constructor(hooks: BatchEventHooks[]) {
    this.hooks = hooks;
  }

  async onBatchStart(event: BatchStartEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onBatchStart?.(event)));
  }

  async onFileComplete(event: FileCompleteEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onFileComplete?.(event)));
  }

  async onBatchComplete(event: BatchCompleteEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onBatchComplete?.(event)));
  }

  async flush(): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.flush?.()));
  }
}

/**
 * Event hooks that write progress through a logger.
 * File events go out at debug level, batch events at info.
 */
export class LoggingEventHooks implements BatchEventHooks {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  onBatchStart(event: BatchStartEvent): void {
    this.logger.info('Batch started', {
      runId: event.runId,
      fileCount: event.fileCount,
      concurrency: event.concurrency,
    });
  }

  onFileComplete(event: FileCompleteEvent): void {
    this.logger.debug('File processed', {
      runId: event.runId,
      index: event.index,
      status: event.status,
      failureKind: event.failureKind,
      durationMs: event.durationMs,
    });
  }

  onBatchComplete(event: BatchCompleteEvent): void {
    this.logger.info(event.cancelled ? 'Batch cancelled' : 'Batch completed', {
      runId: event.runId,
      total: event.total,
      succeeded: event.succeeded,
      failed: event.failed,
      durationMs: event.durationMs,
    });
  }
}
