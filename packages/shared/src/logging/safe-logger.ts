import { createLogger, type Logger, type LoggerOptions } from './logger.js';

interface ScrubPattern {
  pattern: RegExp;
  replacement: string;
}

/**
 * PII patterns that should be scrubbed from logs.
 * CNPJ patterns come before CPF ones: a raw CNPJ contains 11-digit runs.
 */
const PII_PATTERNS: (ScrubPattern & { name: string })[] = [
  // CNPJ, formatted (12.345.678/0001-90)
  {
    pattern: /\b\d{2}\.\d{3}\.\d{3}\/\d{4}-\d{2}\b/g,
    replacement: '[CNPJ:REDACTED]',
    name: 'cnpj-formatted',
  },
  // CNPJ, raw digits
  {
    pattern: /\b\d{14}\b/g,
    replacement: '[CNPJ:REDACTED]',
    name: 'cnpj-raw',
  },
  // CPF, formatted (123.456.789-09)
  {
    pattern: /\b\d{3}\.\d{3}\.\d{3}-\d{2}\b/g,
    replacement: '[CPF:REDACTED]',
    name: 'cpf-formatted',
  },
  // CPF, raw digits
  {
    pattern: /\b\d{11}\b/g,
    replacement: '[CPF:REDACTED]',
    name: 'cpf-raw',
  },
  // Email addresses
  {
    pattern: /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
    replacement: '[EMAIL:REDACTED]',
    name: 'email',
  },
  // Brazilian phone numbers ((11) 98765-4321, +55 11 3456-7890)
  {
    pattern: /(\+55\s?)?\(?\b\d{2}\)?\s?9?\d{4}-\d{4}\b/g,
    replacement: '[PHONE:REDACTED]',
    name: 'phone-br',
  },
];

/**
 * Fields that should be completely redacted when found in context
 */
const SENSITIVE_FIELD_NAMES = new Set([
  'password',
  'secret',
  'token',
  'taxid',
  'tax_id',
  'cpf',
  'cnpj',
  'cpfcnpj',
  'legalname',
  'legal_name',
  'razaosocial',
  'email',
  'phone',
  'telefone',
  'address',
  'endereco',
]);

function scrubString(value: string, patterns: readonly ScrubPattern[]): string {
  let result = value;
  for (const { pattern, replacement } of patterns) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function scrubValue(value: unknown, patterns: readonly ScrubPattern[], depth: number): unknown {
  // Prevent infinite recursion
  if (depth > 10) {
    return '[MAX_DEPTH_REACHED]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return scrubString(value, patterns);
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => scrubValue(item, patterns, depth + 1));
  }

  if (typeof value === 'object') {
    return scrubRecord(Object.entries(value), patterns, depth + 1);
  }

  // Functions, symbols, etc.
  return '[UNSUPPORTED_TYPE]';
}

function scrubRecord(
  entries: [string, unknown][],
  patterns: readonly ScrubPattern[],
  depth: number,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    if (SENSITIVE_FIELD_NAMES.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = scrubValue(value, patterns, depth);
    }
  }
  return result;
}

/**
 * Safe logger options
 */
export interface SafeLoggerOptions extends LoggerOptions {
  /**
   * Run ID to include in all log entries
   */
  runId?: string;

  /**
   * Whether to enable PII scrubbing
   * @default true
   */
  scrubPii?: boolean;

  /**
   * Additional patterns to scrub
   */
  additionalPatterns?: ScrubPattern[];
}

/**
 * Create a logger that scrubs PII from log output.
 *
 * CPF/CNPJ numbers, e-mail addresses and phone numbers are masked in both
 * message and context; context keys such as `taxId` or `legalName` are
 * redacted whole.
 *
 * @example
 * ```typescript
 * const logger = createSafeLogger({ runId: 'batch-1' });
 *
 * logger.info('Provider rejected', { cnpj: '11222333000181' }); // cnpj: '[REDACTED]'
 * ```
 */
export function createSafeLogger(options: SafeLoggerOptions = {}): Logger {
  const { context: boundContext, ...loggerOptions } = options;
  const baseLogger = createLogger(loggerOptions);
  const scrubPii = options.scrubPii ?? true;
  const patterns: ScrubPattern[] = [...PII_PATTERNS, ...(options.additionalPatterns ?? [])];

  const baseContext: Record<string, unknown> = {};
  if (options.runId !== undefined) {
    baseContext['runId'] = options.runId;
  }
  // Bound context goes through scrubbing too, so the base logger never sees it
  Object.assign(baseContext, boundContext);

  const scrubContext = (context?: Record<string, unknown>): Record<string, unknown> => {
    const merged = { ...baseContext, ...context };
    return scrubPii ? scrubRecord(Object.entries(merged), patterns, 0) : merged;
  };

  const scrubMessage = (message: string): string =>
    scrubPii ? scrubString(message, patterns) : message;

  const safeLogger: Logger = {
    debug(message: string, context?: Record<string, unknown>) {
      baseLogger.debug(scrubMessage(message), scrubContext(context));
    },

    info(message: string, context?: Record<string, unknown>) {
      baseLogger.info(scrubMessage(message), scrubContext(context));
    },

    warn(message: string, context?: Record<string, unknown>) {
      baseLogger.warn(scrubMessage(message), scrubContext(context));
    },

    error(message: string, context?: Record<string, unknown>) {
      baseLogger.error(scrubMessage(message), scrubContext(context));
    },

    child(context: Record<string, unknown>): Logger {
      return createSafeLogger({
        ...options,
        context: { ...boundContext, ...context },
      });
    },
  };

  return safeLogger;
}
