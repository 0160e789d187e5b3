import type { InvoiceField } from '../core/invoice.js';

/**
 * Alias list for one field.
 *
 * Aliases are tried in order; the first alias with a match wins,
 * whatever the document order of the matches.
 */
export interface FieldAliases {
  readonly aliases: readonly string[];

  /**
   * Container elements the search does not descend into
   * (e.g. addresses, whose `Numero` is not the invoice number)
   */
  readonly skipWithin?: readonly string[];
}

/**
 * Where to find one party (provider or recipient) inside an invoice
 */
export interface PartyAliases {
  /** Container element aliases (e.g. PrestadorServico, emit) */
  readonly containers: readonly string[];

  readonly legalName: FieldAliases;

  readonly taxId: FieldAliases;
}

/**
 * Invoice fields resolved directly under the invoice root
 */
export type ScalarInvoiceField = Extract<
  InvoiceField,
  'number' | 'issueDate' | 'totalServiceValue' | 'serviceDescription'
>;

/**
 * Alias table used by the invoice extractor.
 *
 * Treated as an immutable value: the extractor freezes its copy.
 */
export interface ExtractorConfig {
  /** Invoice root element aliases, highest priority first */
  readonly invoiceRoots: readonly string[];

  readonly fields: Readonly<Record<ScalarInvoiceField, FieldAliases>>;

  readonly provider: PartyAliases;

  readonly recipient: PartyAliases;

  /**
   * Whether element names must match exactly
   * @default false
   */
  readonly caseSensitive: boolean;
}

/**
 * Partial override of the alias table; each given entry replaces the default
 */
export interface ExtractorConfigOverrides {
  invoiceRoots?: readonly string[];
  fields?: Partial<Record<ScalarInvoiceField, FieldAliases>>;
  provider?: Partial<PartyAliases>;
  recipient?: Partial<PartyAliases>;
  caseSensitive?: boolean;
}
