/**
 * Report rendering
 *
 * Text output uses Brazilian conventions: R$ 1.500,00, 10/03/2024,
 * 11.222.333/0001-81. One block per invoice, files in input order.
 */

import type { Batch, CollectionDiagnostic, Invoice, Party, ProcessingResult } from '@nfse-reader/contracts';
import {
  FAILURE_KINDS,
  describeFailure,
  formatAmountBr,
  formatDateBr,
  formatTaxId,
  hasValidCheckDigits,
} from '@nfse-reader/shared';

const LABEL_WIDTH = 13;

function line(label: string, value: string): string {
  const padded = `${label}:`.padEnd(LABEL_WIDTH);
  // Continuation lines of multi-line values stay under the value column
  const indent = ' '.repeat(2 + LABEL_WIDTH);
  return `  ${padded}${value.split('\n').join(`\n${indent}`)}`;
}

function renderParty(party: Party): string {
  const taxId = formatTaxId(party.taxId);
  const note = hasValidCheckDigits(party.taxId) ? '' : ', check digits do not match';
  return `${party.legalName} (${party.taxId.kind} ${taxId}${note})`;
}

function renderInvoice(invoice: Invoice): string[] {
  const lines = [
    line('Number', invoice.number),
    line('Issue date', formatDateBr(invoice.issueDate)),
    line('Provider', renderParty(invoice.provider)),
    line('Recipient', renderParty(invoice.recipient)),
    line('Value', formatAmountBr(invoice.totalServiceValue)),
  ];
  if (invoice.serviceDescription !== '') {
    lines.push(line('Description', invoice.serviceDescription));
  }
  return lines;
}

/**
 * One block per invoice; files listing several invoices number them from 1
 */
function renderResult(result: ProcessingResult): string[] {
  if (result.status === 'success') {
    const numbered = result.invoices.length > 1;
    return result.invoices.map((invoice, index) => {
      const heading = numbered ? `[OK] ${result.sourcePath} #${index + 1}` : `[OK] ${result.sourcePath}`;
      return [heading, ...renderInvoice(invoice)].join('\n');
    });
  }

  const which = result.invoiceIndex !== undefined ? ` #${result.invoiceIndex + 1}` : '';
  return [[`[FAILED] ${result.sourcePath}${which}`, line('Reason', describeFailure(result.failure))].join('\n')];
}

function renderDiagnostic(diagnostic: CollectionDiagnostic): string {
  return `[SKIPPED] ${diagnostic.path}: ${diagnostic.message} (${diagnostic.kind})`;
}

/**
 * Plain-text report: collection diagnostics, one block per file, summary.
 */
export function renderText(batch: Batch, diagnostics: readonly CollectionDiagnostic[]): string {
  const blocks: string[] = [];

  if (diagnostics.length > 0) {
    blocks.push(diagnostics.map(renderDiagnostic).join('\n'));
  }

  for (const result of batch.results) {
    blocks.push(...renderResult(result));
  }

  const { summary } = batch;
  const summaryLines = [
    `Files: ${summary.total}, succeeded: ${summary.succeeded}, failed: ${summary.failed}`,
    `Invoices: ${summary.invoiceCount}`,
    `Total service value: ${formatAmountBr(summary.totalServiceValue)}`,
  ];

  const failureCounts = FAILURE_KINDS.filter((kind) => summary.failuresByKind[kind] > 0).map(
    (kind) => `${kind} ${summary.failuresByKind[kind]}`,
  );
  if (failureCounts.length > 0) {
    summaryLines.push(`Failures: ${failureCounts.join(', ')}`);
  }

  if (batch.cancelled) {
    summaryLines.push(`Interrupted: ${batch.pending.length} file(s) not processed`);
  }

  blocks.push(summaryLines.join('\n'));

  return `${blocks.join('\n\n')}\n`;
}

/**
 * JSON report: the batch plus collection diagnostics.
 */
export function renderJson(batch: Batch, diagnostics: readonly CollectionDiagnostic[]): string {
  return `${JSON.stringify({ diagnostics, ...batch }, null, 2)}\n`;
}

/**
 * 0 when every file succeeded, 1 when any failed, 130 when interrupted
 */
export function exitCodeFor(batch: Batch): number {
  if (batch.cancelled) return 130;
  return batch.summary.failed > 0 ? 1 : 0;
}
