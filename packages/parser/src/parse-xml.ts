/**
 * XML to GenericXmlNode Parser
 *
 * Turns the raw bytes of one document into a namespace-tolerant element tree.
 * Never throws: every problem comes back as a MalformedXml failure so that a
 * batch can carry on with the next file.
 *
 * IMPORTANT: No document content is logged during parsing.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { GenericXmlNode, MalformedXmlFailure } from '@nfse-reader/contracts';
import { decodeXmlBytes } from './decode.js';
import type { XmlParseOutcome, XmlTreeParserOptions } from './types.js';

/**
 * Default configuration for the tree parser
 */
const DEFAULT_OPTIONS: Required<XmlTreeParserOptions> = {
  maxBytes: 10 * 1024 * 1024, // 10MB
};

/** Attribute group key in fast-xml-parser's ordered output */
const ATTRIBUTES_KEY = ':@';

/** Text node key in fast-xml-parser's ordered output */
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true, // ns:Numero and Numero are the same element
  parseTagValue: false, // keep "0001" as text
  parseAttributeValue: false,
  trimValues: false, // text around CDATA keeps its spaces; collectText trims the joined value
  processEntities: true,
  htmlEntities: true, // numeric character references
  ignoreDeclaration: true,
  ignorePiTags: true,
});

/**
 * Parse raw document bytes into an element tree.
 *
 * @param input - Raw bytes, or already decoded text
 * @returns Root element, or a MalformedXml failure
 */
export function parseXmlTree(
  input: Uint8Array | string,
  options?: XmlTreeParserOptions,
): XmlParseOutcome {
  const config = { ...DEFAULT_OPTIONS, ...options };

  let text: string;
  let encoding: string;

  if (typeof input === 'string') {
    text = input.startsWith('﻿') ? input.slice(1) : input;
    encoding = 'utf-8';
  } else {
    if (input.byteLength > config.maxBytes) {
      return malformed(`Document exceeds maximum size (${config.maxBytes} bytes)`);
    }
    const decoded = decodeXmlBytes(input);
    if (!decoded.ok) {
      return decoded;
    }
    text = decoded.text;
    encoding = decoded.encoding;
  }

  if (text.trim().length === 0) {
    return malformed('Empty document');
  }

  try {
    const validation = XMLValidator.validate(text, { allowBooleanAttributes: true });
    if (validation !== true) {
      return malformed(validation.err.msg, validation.err.line, validation.err.col);
    }

    const entries: unknown = parser.parse(text);
    const root = toNodes(entries)[0];
    if (!root) {
      return malformed('No root element found');
    }

    return { ok: true, root, encoding };
  } catch (error) {
    // Parser internals (deeply nested input, entity expansion limits, ...)
    const message = error instanceof Error ? error.message : String(error);
    return malformed(`Failed to parse document: ${message}`);
  }
}

function malformed(message: string, line?: number, column?: number): { ok: false; failure: MalformedXmlFailure } {
  const failure: MalformedXmlFailure = { kind: 'MalformedXml', message };
  if (line !== undefined) failure.line = line;
  if (column !== undefined) failure.column = column;
  return { ok: false, failure };
}

// ============================================================================
// Ordered output to GenericXmlNode
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a list of ordered entries ({ tag: [...children], ':@': {...} } or
 * { '#text': value }) into element nodes, collecting text into `text`.
 */
function toNodes(entries: unknown): GenericXmlNode[] {
  if (!Array.isArray(entries)) {
    return [];
  }

  const nodes: GenericXmlNode[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;

    const tag = Object.keys(entry).find((key) => key !== ATTRIBUTES_KEY);
    // Text belongs to the parent; declarations, PIs and comments are skipped
    if (tag === undefined || tag === TEXT_KEY || tag.startsWith('?') || tag.startsWith('!')) {
      continue;
    }

    const childEntries = entry[tag];
    nodes.push({
      localName: tag,
      attributes: toAttributes(entry[ATTRIBUTES_KEY]),
      text: collectText(childEntries),
      children: toNodes(childEntries),
    });
  }
  return nodes;
}

function toAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) {
    return attributes;
  }

  for (const [name, attrValue] of Object.entries(value)) {
    if (name.length === 0) continue;
    attributes[name] = typeof attrValue === 'string' ? attrValue : String(attrValue);
  }
  return attributes;
}

/**
 * Join the direct text and CDATA chunks of an element, then trim.
 * Whitespace-only chunks (indentation between children) are skipped.
 * Line endings are normalized to \n.
 */
function collectText(entries: unknown): string {
  if (!Array.isArray(entries)) {
    return '';
  }

  const chunks: string[] = [];
  for (const entry of entries) {
    if (isRecord(entry) && TEXT_KEY in entry) {
      const value = entry[TEXT_KEY];
      const chunk = typeof value === 'string' ? value : value === undefined || value === null ? '' : String(value);
      if (chunk.trim().length > 0) {
        chunks.push(chunk);
      }
    }
  }

  return chunks.join('').replace(/\r\n?/g, '\n').trim();
}
