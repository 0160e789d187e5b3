export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Leveled logger. `child` returns a logger that adds its context to every line.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  /** Lowest level written (default: 'info') */
  level?: LogLevel;
  /** Tag shown on every line (default: 'nfse-reader') */
  prefix?: string;
  /** Fields added to every line */
  context?: Record<string, unknown>;
}

/** Severity order, lowest first */
export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Type guard for level names coming from flags or environment variables
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Logger writing one line per entry to stderr; stdout is left to reports.
 *
 * @example
 * createLogger({ level: 'debug', prefix: 'nfse-reader:batch' }).info('Batch started', { fileCount: 3 });
 * // [2024-03-10T12:00:00.000Z] [INFO] [nfse-reader:batch] Batch started {"fileCount":3}
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS[options.level ?? 'info'];
  const prefix = options.prefix ?? 'nfse-reader';
  const bound = options.context ?? {};

  const write = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVELS[level] < threshold) return;

    const fields = { ...bound, ...context };
    const suffix = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    console.error(`[${new Date().toISOString()}] [${level.toUpperCase()}] [${prefix}] ${message}${suffix}`);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (context) =>
      createLogger({
        ...(options.level !== undefined ? { level: options.level } : {}),
        prefix,
        context: { ...bound, ...context },
      }),
  };
}
