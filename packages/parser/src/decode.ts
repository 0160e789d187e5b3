/**
 * Byte decoding for XML documents
 *
 * Picks the text encoding from the byte-order mark or the XML declaration
 * and decodes strictly: invalid byte sequences are failures, not U+FFFD.
 */

import { TextDecoder } from 'node:util';
import type { DecodeOutcome } from './types.js';

const DEFAULT_ENCODING = 'utf-8';

/**
 * Encoding declared in the prolog, e.g. <?xml version="1.0" encoding="ISO-8859-1"?>
 */
const DECLARED_ENCODING = /^\s*<\?xml[^>]*?\sencoding\s*=\s*["']([A-Za-z][A-Za-z0-9._-]*)["']/;

/**
 * How many leading bytes are inspected for the XML declaration
 */
const PROLOG_SNIFF_BYTES = 512;

interface ByteOrderMark {
  bytes: readonly number[];
  encoding: string;
}

const BYTE_ORDER_MARKS: readonly ByteOrderMark[] = [
  { bytes: [0xef, 0xbb, 0xbf], encoding: 'utf-8' },
  { bytes: [0xff, 0xfe], encoding: 'utf-16le' },
  { bytes: [0xfe, 0xff], encoding: 'utf-16be' },
];

function detectByteOrderMark(bytes: Uint8Array): ByteOrderMark | undefined {
  return BYTE_ORDER_MARKS.find((bom) => bom.bytes.every((byte, index) => bytes[index] === byte));
}

/**
 * Read the encoding label from the XML declaration, if any.
 * The declaration is ASCII in every encoding this reader accepts without a BOM.
 */
export function sniffDeclaredEncoding(bytes: Uint8Array): string | undefined {
  const head = new TextDecoder('latin1').decode(bytes.subarray(0, PROLOG_SNIFF_BYTES));
  const match = DECLARED_ENCODING.exec(head);
  return match?.[1]?.toLowerCase();
}

/**
 * Decode raw document bytes into text.
 *
 * 1. A leading byte-order mark is stripped and decides the encoding.
 * 2. Otherwise the declared encoding is used, UTF-8 when none is declared.
 */
export function decodeXmlBytes(bytes: Uint8Array): DecodeOutcome {
  const bom = detectByteOrderMark(bytes);
  const encoding = bom?.encoding ?? sniffDeclaredEncoding(bytes) ?? DEFAULT_ENCODING;
  const body = bom ? bytes.subarray(bom.bytes.length) : bytes;

  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true, ignoreBOM: true });
  } catch {
    return {
      ok: false,
      failure: { kind: 'MalformedXml', message: `Unsupported encoding "${encoding}"` },
    };
  }

  try {
    return { ok: true, text: decoder.decode(body), encoding: decoder.encoding };
  } catch {
    return {
      ok: false,
      failure: {
        kind: 'MalformedXml',
        message: `Invalid byte sequence for encoding "${decoder.encoding}"`,
        byteOffset: (bom?.bytes.length ?? 0) + firstInvalidOffset(decoder.encoding, body),
      },
    };
  }
}

function decodesAsPrefix(encoding: string, prefix: Uint8Array): boolean {
  try {
    new TextDecoder(encoding, { fatal: true, ignoreBOM: true }).decode(prefix, { stream: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Offset of the byte at which strict decoding fails.
 *
 * Bisects over prefixes decoded in streaming mode, where an incomplete
 * trailing sequence is not yet an error. A sequence cut off by the end of
 * the input gives `body.length`.
 */
function firstInvalidOffset(encoding: string, body: Uint8Array): number {
  let valid = 0;
  let invalid = body.length + 1;
  while (invalid - valid > 1) {
    const mid = Math.floor((valid + invalid) / 2);
    if (decodesAsPrefix(encoding, body.subarray(0, mid))) {
      valid = mid;
    } else {
      invalid = mid;
    }
  }
  return invalid - 1;
}
