/**
 * Types for the XML tree parser and the invoice extractor
 */

import type {
  ExtractionFailure,
  ExtractorConfigOverrides,
  GenericXmlNode,
  Invoice,
  MalformedXmlFailure,
} from '@nfse-reader/contracts';
import type { Logger } from '@nfse-reader/shared';

/**
 * Configuration for the XML tree parser
 */
export interface XmlTreeParserOptions {
  /**
   * Maximum input size in bytes (default: 10MB)
   */
  maxBytes?: number;
}

/**
 * Result of decoding raw bytes into text
 */
export type DecodeOutcome =
  | { ok: true; text: string; encoding: string }
  | { ok: false; failure: MalformedXmlFailure };

/**
 * Result of parsing one document
 */
export type XmlParseOutcome =
  | { ok: true; root: GenericXmlNode; encoding: string }
  | { ok: false; failure: MalformedXmlFailure };

/**
 * Result of extracting one invoice
 */
export type ExtractionOutcome =
  | { ok: true; invoice: Invoice }
  | { ok: false; failure: ExtractionFailure };

/**
 * Result of extracting every invoice of a document.
 *
 * All or nothing: one bad invoice fails the document. `invoiceIndex` is the
 * position of the failing invoice, given when the document holds several.
 */
export type DocumentExtractionOutcome =
  | { ok: true; invoices: Invoice[] }
  | { ok: false; failure: ExtractionFailure; invoiceIndex?: number };

/**
 * Options for the invoice extractor
 */
export interface InvoiceExtractorOptions {
  /**
   * Alias table overrides, merged over DEFAULT_EXTRACTOR_CONFIG
   */
  config?: ExtractorConfigOverrides;

  /**
   * Logger for extraction notes (default: silent below 'warn')
   */
  logger?: Logger;
}

/**
 * Options for a depth-first element search
 */
export interface SearchOptions {
  caseSensitive: boolean;

  /**
   * Elements neither matched nor descended into (the search root is exempt)
   */
  skipWithin?: readonly string[];

  /**
   * Extra condition a named node must meet to match
   */
  accept?: (node: GenericXmlNode) => boolean;
}
