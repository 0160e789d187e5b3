/**
 * @nfse-reader/parser
 *
 * NFS-e document parsing.
 *
 * This package provides:
 * - Byte decoding (BOM, declared encoding, strict decoding)
 * - XML parsing to a namespace-tolerant GenericXmlNode tree
 * - InvoiceExtractor: alias-driven mapping from tree to Invoice
 *
 * Pure functions over bytes: no file system or network access.
 *
 * @packageDocumentation
 */

// Tree parsing
export { parseXmlTree } from './parse-xml.js';
export { decodeXmlBytes, sniffDeclaredEncoding } from './decode.js';

// Extraction
export { InvoiceExtractor } from './extractor/invoice-extractor.js';
export { DEFAULT_EXTRACTOR_CONFIG, resolveExtractorConfig } from './extractor/aliases.js';
export { findAll, findByAliases, findFirst, findOutermost, namesMatch } from './extractor/tree-search.js';

// Types
export type {
  DecodeOutcome,
  DocumentExtractionOutcome,
  ExtractionOutcome,
  InvoiceExtractorOptions,
  SearchOptions,
  XmlParseOutcome,
  XmlTreeParserOptions,
} from './types.js';
