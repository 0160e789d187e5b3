import { describe, it, expect } from 'vitest';
import { decodeXmlBytes, sniffDeclaredEncoding } from './decode.js';

const encoder = new TextEncoder();

describe('sniffDeclaredEncoding', () => {
  it('should read the declared encoding in lower case', () => {
    const bytes = encoder.encode('<?xml version="1.0" encoding="ISO-8859-1"?><a/>');

    expect(sniffDeclaredEncoding(bytes)).toBe('iso-8859-1');
  });

  it('should accept single quotes and leading whitespace', () => {
    const bytes = encoder.encode("\n  <?xml version='1.0' encoding='windows-1252' ?><a/>");

    expect(sniffDeclaredEncoding(bytes)).toBe('windows-1252');
  });

  it('should return undefined without a declaration', () => {
    expect(sniffDeclaredEncoding(encoder.encode('<a/>'))).toBeUndefined();
  });

  it('should return undefined for a declaration without encoding', () => {
    expect(sniffDeclaredEncoding(encoder.encode('<?xml version="1.0"?><a/>'))).toBeUndefined();
  });
});

describe('decodeXmlBytes', () => {
  it('should default to UTF-8', () => {
    const outcome = decodeXmlBytes(encoder.encode('<a>São Paulo</a>'));

    expect(outcome).toEqual({ ok: true, text: '<a>São Paulo</a>', encoding: 'utf-8' });
  });

  it('should decode declared ISO-8859-1 bytes', () => {
    const prolog = encoder.encode('<?xml version="1.0" encoding="ISO-8859-1"?><a>');
    const bytes = new Uint8Array([...prolog, 0x41, 0xe7, 0xe3, 0x6f, ...encoder.encode('</a>')]);

    const outcome = decodeXmlBytes(bytes);

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.text.endsWith('<a>Ação</a>')).toBe(true);
    }
  });

  it('should let a UTF-16 LE byte-order mark win over the default', () => {
    // "<a/>" in UTF-16 LE
    const bytes = new Uint8Array([0xff, 0xfe, 0x3c, 0x00, 0x61, 0x00, 0x2f, 0x00, 0x3e, 0x00]);

    expect(decodeXmlBytes(bytes)).toEqual({ ok: true, text: '<a/>', encoding: 'utf-16le' });
  });

  it('should strip a UTF-8 byte-order mark', () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...encoder.encode('<a/>')]);

    expect(decodeXmlBytes(bytes)).toEqual({ ok: true, text: '<a/>', encoding: 'utf-8' });
  });

  it('should fail on invalid UTF-8 sequences with the offending offset', () => {
    const bytes = new Uint8Array([0x3c, 0x61, 0x3e, 0xff, 0x3c, 0x2f, 0x61, 0x3e]);

    expect(decodeXmlBytes(bytes)).toEqual({
      ok: false,
      failure: { kind: 'MalformedXml', message: 'Invalid byte sequence for encoding "utf-8"', byteOffset: 3 },
    });
  });

  it('should count the byte-order mark in the offset', () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...encoder.encode('<a>ok'), 0xff, ...encoder.encode('</a>')]);

    const outcome = decodeXmlBytes(bytes);

    expect(outcome.ok ? undefined : outcome.failure.byteOffset).toBe(8);
  });

  it('should point past the end for a truncated sequence', () => {
    // "<a>" followed by the first byte of a two-byte sequence
    const bytes = new Uint8Array([0x3c, 0x61, 0x3e, 0xc3]);

    const outcome = decodeXmlBytes(bytes);

    expect(outcome.ok ? undefined : outcome.failure.byteOffset).toBe(4);
  });

  it('should fail on an unknown encoding label', () => {
    const bytes = encoder.encode('<?xml version="1.0" encoding="x-made-up"?><a/>');

    expect(decodeXmlBytes(bytes)).toEqual({
      ok: false,
      failure: { kind: 'MalformedXml', message: 'Unsupported encoding "x-made-up"' },
    });
  });
});
