import type { Invoice, DecimalAmount } from '../core/invoice.js';
import type { ExtractionFailure, FailureKind } from '../core/diagnostic.js';

/**
 * Outcome for one input file.
 *
 * A file may hold several invoices: `invoices` lists them in document order
 * and is never empty. A failure in any of them fails the file;
 * `invoiceIndex` then names the failing invoice (0-based) when the file
 * holds more than one.
 */
export type ProcessingResult =
  | { readonly status: 'success'; readonly sourcePath: string; readonly invoices: readonly Invoice[] }
  | {
      readonly status: 'failure';
      readonly sourcePath: string;
      readonly failure: ExtractionFailure;
      readonly invoiceIndex?: number;
    };

/**
 * Aggregate counts for summary reporting
 */
export interface BatchSummary {
  /** Number of results in the batch */
  total: number;

  succeeded: number;

  failed: number;

  /** Invoices read from successful files */
  invoiceCount: number;

  /** Failure count per kind (kinds with no failures are 0) */
  failuresByKind: Record<FailureKind, number>;

  /** Sum of totalServiceValue over every invoice of successful results */
  totalServiceValue: DecimalAmount;

  durationMs: number;
}

/**
 * Results of one `processBatch` call, in input order
 */
export interface Batch {
  results: ProcessingResult[];

  summary: BatchSummary;

  /** Whether the run was aborted before every file was processed */
  cancelled: boolean;

  /** Paths with no result because the run was cancelled (input order) */
  pending: string[];
}
