import type { ExtractionFailure } from '@nfse-reader/contracts';

/**
 * Base error class for the NFS-e reader
 */
export class NfseReaderError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'NfseReaderError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error thrown for configuration issues
 */
export class ConfigurationError extends NfseReaderError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Carries an extraction failure out of nested field parsing.
 *
 * Never escapes the extractor: `InvoiceExtractor.extract` turns it back
 * into a failure value.
 */
export class FieldExtractionError extends NfseReaderError {
  readonly failure: ExtractionFailure;

  constructor(failure: ExtractionFailure) {
    super(`Extraction failed: ${failure.kind}`, 'FIELD_EXTRACTION_ERROR', { kind: failure.kind });
    this.name = 'FieldExtractionError';
    this.failure = failure;
  }
}
