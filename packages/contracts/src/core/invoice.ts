/**
 * Decimal amount as string (avoids floating-point issues).
 * Always uses '.' as decimal separator, e.g. "1500.00".
 */
export type DecimalAmount = string;

/**
 * Calendar date in ISO 8601 format (YYYY-MM-DD)
 */
export type ISODate = string;

/**
 * Brazilian tax identifier, raw digits only.
 *
 * - CNPJ: 14 digits (legal entities)
 * - CPF: 11 digits (individuals)
 */
export type TaxId =
  | { readonly kind: 'CNPJ'; readonly digits: string }
  | { readonly kind: 'CPF'; readonly digits: string };

export type TaxIdKind = TaxId['kind'];

/**
 * Provider (prestador) or recipient (tomador) of the service
 */
export interface Party {
  /** Legal name (razão social), never empty */
  readonly legalName: string;

  readonly taxId: TaxId;
}

/**
 * Normalized NFS-e record.
 *
 * Built once by the extractor and frozen; `number` is never empty and
 * `totalServiceValue` is never negative.
 */
export interface Invoice {
  readonly number: string;

  readonly issueDate: ISODate;

  /** Party rendering the service */
  readonly provider: Party;

  /** Party receiving the service */
  readonly recipient: Party;

  /** Total value of services, at least two fraction digits */
  readonly totalServiceValue: DecimalAmount;

  /** Service description (discriminação), may span several lines; '' when absent */
  readonly serviceDescription: string;
}

/**
 * Invoice fields named in extraction failures.
 *
 * 'invoice' refers to the invoice root element itself.
 */
export type InvoiceField =
  | 'invoice'
  | 'number'
  | 'issueDate'
  | 'provider.legalName'
  | 'provider.taxId'
  | 'recipient.legalName'
  | 'recipient.taxId'
  | 'totalServiceValue'
  | 'serviceDescription';
