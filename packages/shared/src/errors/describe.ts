import type { ExtractionFailure } from '@nfse-reader/contracts';

/**
 * Human-readable reason for a per-file failure: kind plus offending field/value.
 *
 * @example
 * describeFailure({ kind: 'MissingField', field: 'totalServiceValue' });
 * // 'MissingField: required field "totalServiceValue" not found'
 */
export function describeFailure(failure: ExtractionFailure): string {
  switch (failure.kind) {
    case 'IoError':
      return failure.code !== undefined
        ? `IoError: ${failure.message} (${failure.code})`
        : `IoError: ${failure.message}`;

    case 'MalformedXml': {
      const position =
        failure.line !== undefined
          ? ` at line ${failure.line}${failure.column !== undefined ? `, column ${failure.column}` : ''}`
          : failure.byteOffset !== undefined
            ? ` at byte ${failure.byteOffset}`
            : '';
      return `MalformedXml: ${failure.message}${position}`;
    }

    case 'MissingField':
      return `MissingField: required field "${failure.field}" not found`;

    case 'DateFormat':
      return `DateFormat: field "${failure.field}" has unparseable date "${failure.rawValue}"`;

    case 'NumberFormat':
      return `NumberFormat: field "${failure.field}" has invalid amount "${failure.rawValue}"`;

    case 'TaxIdFormat':
      return `TaxIdFormat: field "${failure.field}" has ${failure.digitCount} digits ("${failure.rawValue}"), expected 11 (CPF) or 14 (CNPJ)`;
  }
}
