/**
 * @nfse-reader/shared
 *
 * Shared utilities for the NFS-e reader.
 *
 * @packageDocumentation
 */

export { createLogger, isLogLevel, LOG_LEVELS, type Logger, type LogLevel, type LoggerOptions } from './logging/logger.js';
export { createSafeLogger, type SafeLoggerOptions } from './logging/safe-logger.js';
export { NfseReaderError, ConfigurationError, FieldExtractionError } from './errors/errors.js';
export { describeFailure } from './errors/describe.js';

// Decimal arithmetic
export { add, round, isNegative, parseLocalizedAmount, formatAmountBr } from './decimal/decimal-utils.js';

// Dates
export { parseInvoiceDate, formatDateBr } from './dates/parse-date.js';

// CPF/CNPJ (offline checks only)
export {
  TAX_ID_LENGTHS,
  extractDigits,
  classifyTaxId,
  formatTaxId,
  hasValidCheckDigits,
  type TaxIdClassification,
} from './tax-id/index.js';

// Batch summary
export { buildBatchSummary, FAILURE_KINDS } from './diagnostics/index.js';
