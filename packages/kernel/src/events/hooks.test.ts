import { describe, it, expect, vi } from 'vitest';
import type { Logger } from '@nfse-reader/shared';
import {
  CompositeEventHooks,
  LoggingEventHooks,
  type BatchCompleteEvent,
  type BatchEventHooks,
  type FileCompleteEvent,
} from './hooks.js';

const fileEvent: FileCompleteEvent = {
  runId: 'run-1',
  timestamp: '2024-03-10T12:00:00.000Z',
  index: 0,
  sourcePath: '/invoices/a.xml',
  status: 'failure',
  failureKind: 'MissingField',
  durationMs: 5,
};

const completeEvent: BatchCompleteEvent = {
  runId: 'run-1',
  timestamp: '2024-03-10T12:00:01.000Z',
  durationMs: 1000,
  total: 3,
  succeeded: 2,
  failed: 1,
  cancelled: false,
};

type LogCall = [string, string, Record<string, unknown> | undefined];

function recordingLogger(): Logger & { calls: LogCall[] } {
  const calls: LogCall[] = [];
  const logger: Logger & { calls: LogCall[] } = {
    calls,
    debug: (message: string, context?: Record<string, unknown>) => {
      calls.push(['debug', message, context]);
    },
    info: (message: string, context?: Record<string, unknown>) => {
      calls.push(['info', message, context]);
    },
    warn: (message: string, context?: Record<string, unknown>) => {
      calls.push(['warn', message, context]);
    },
    error: (message: string, context?: Record<string, unknown>) => {
      calls.push(['error', message, context]);
    },
    child: () => logger,
  };
  return logger;
}

describe('CompositeEventHooks', () => {
  it('should dispatch to every listener', async () => {
    const first = vi.fn();
    const second = vi.fn();
    const composite = new CompositeEventHooks([
      { onFileComplete: first },
      { onFileComplete: second },
      {},
    ]);

    await composite.onFileComplete(fileEvent);

    expect(first).toHaveBeenCalledWith(fileEvent);
    expect(second).toHaveBeenCalledWith(fileEvent);
  });

  it('should wait for async listeners', async () => {
    const order: string[] = [];
    const slow: BatchEventHooks = {
      onBatchComplete: async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push('slow');
      },
    };
    const composite = new CompositeEventHooks([slow]);

    await composite.onBatchComplete(completeEvent);
    order.push('after');

    expect(order).toEqual(['slow', 'after']);
  });

  it('should flush every listener that buffers', async () => {
    const flush = vi.fn(() => Promise.resolve());
    const composite = new CompositeEventHooks([{ flush }, {}]);

    await composite.flush();

    expect(flush).toHaveBeenCalledTimes(1);
  });
});

describe('LoggingEventHooks', () => {
  it('should log file events at debug level without the path', () => {
    const logger = recordingLogger();

    new LoggingEventHooks(logger).onFileComplete(fileEvent);

    expect(logger.calls).toEqual([
      [
        'debug',
        'File processed',
        { runId: 'run-1', index: 0, status: 'failure', failureKind: 'MissingField', durationMs: 5 },
      ],
    ]);
  });

  it('should log batch completion at info level', () => {
    const logger = recordingLogger();

    new LoggingEventHooks(logger).onBatchComplete({ ...completeEvent, cancelled: true });

    expect(logger.calls).toEqual([
      ['info', 'Batch cancelled', { runId: 'run-1', total: 3, succeeded: 2, failed: 1, durationMs: 1000 }],
    ]);
  });
});
