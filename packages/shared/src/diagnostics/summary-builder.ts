/**
 * Batch Summary Builder
 *
 * Aggregates per-file results into the counts shown at the end of a run.
 */

import type { BatchSummary, FailureKind, ProcessingResult } from '@nfse-reader/contracts';
import { add } from '../decimal/decimal-utils.js';

/**
 * Every failure kind, in reporting order
 */
export const FAILURE_KINDS: readonly FailureKind[] = [
  'IoError',
  'MalformedXml',
  'MissingField',
  'DateFormat',
  'NumberFormat',
  'TaxIdFormat',
];

/**
 * Build the summary of a batch.
 *
 * @example
 * const summary = buildBatchSummary(results, Date.now() - startedAt);
 * summary.failuresByKind.MissingField; // 2
 */
export function buildBatchSummary(
  results: readonly ProcessingResult[],
  durationMs: number,
): BatchSummary {
  const failuresByKind: Record<FailureKind, number> = {
    IoError: 0,
    MalformedXml: 0,
    MissingField: 0,
    DateFormat: 0,
    NumberFormat: 0,
    TaxIdFormat: 0,
  };

  let succeeded = 0;
  let invoiceCount = 0;
  let totalServiceValue = '0.00';

  for (const result of results) {
    if (result.status === 'success') {
      succeeded++;
      for (const invoice of result.invoices) {
        invoiceCount++;
        totalServiceValue = add(totalServiceValue, invoice.totalServiceValue);
      }
    } else {
      failuresByKind[result.failure.kind]++;
    }
  }

  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    invoiceCount,
    failuresByKind,
    totalServiceValue,
    durationMs,
  };
}
