import type { InvoiceField } from './invoice.js';

/**
 * Kinds of per-file failure
 */
export type FailureKind =
  | 'IoError'
  | 'MalformedXml'
  | 'MissingField'
  | 'DateFormat'
  | 'NumberFormat'
  | 'TaxIdFormat';

/**
 * File could not be read (missing, permission denied, too large, ...)
 */
export interface IoFailure {
  kind: 'IoError';
  message: string;
  /** System error code when available (e.g. 'ENOENT') */
  code?: string;
}

/**
 * Bytes could not be turned into an element tree
 */
export interface MalformedXmlFailure {
  kind: 'MalformedXml';
  message: string;
  /** 1-based line of the offending token */
  line?: number;
  /** 1-based column of the offending token */
  column?: number;
  /** Offset into the raw bytes, when the decoder can tell */
  byteOffset?: number;
}

/**
 * Required field absent after alias search
 */
export interface MissingFieldFailure {
  kind: 'MissingField';
  field: InvoiceField;
}

/**
 * Field present but not parseable as a date
 */
export interface DateFormatFailure {
  kind: 'DateFormat';
  field: InvoiceField;
  rawValue: string;
}

/**
 * Field present but not a valid non-negative amount
 */
export interface NumberFormatFailure {
  kind: 'NumberFormat';
  field: InvoiceField;
  rawValue: string;
}

/**
 * Tax id whose digit count is neither 11 (CPF) nor 14 (CNPJ)
 */
export interface TaxIdFormatFailure {
  kind: 'TaxIdFormat';
  field: InvoiceField;
  rawValue: string;
  digitCount: number;
}

/**
 * Single reason a file produced no invoice
 */
export type ExtractionFailure =
  | IoFailure
  | MalformedXmlFailure
  | MissingFieldFailure
  | DateFormatFailure
  | NumberFormatFailure
  | TaxIdFormatFailure;

/**
 * Kinds of problems found while expanding user-selected entries
 */
export type CollectionDiagnosticKind =
  | 'not-found'
  | 'unreadable-directory'
  | 'unsupported-entry'
  | 'depth-limit';

/**
 * Collection-time diagnostic. Distinct from a per-file failure: it concerns
 * an entry or directory, not an invoice file.
 */
export interface CollectionDiagnostic {
  path: string;
  kind: CollectionDiagnosticKind;
  message: string;
}
