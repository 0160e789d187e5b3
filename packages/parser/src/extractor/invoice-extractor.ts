/**
 * InvoiceExtractor
 *
 * Maps a GenericXmlNode tree to a normalized Invoice using an alias table,
 * so that the many municipal NFS-e layouts resolve to the same record.
 *
 * Fields are evaluated in a fixed order and the first failure is reported:
 * number, issueDate, provider.legalName, provider.taxId, recipient.legalName,
 * recipient.taxId, totalServiceValue. serviceDescription is optional.
 *
 * A document may hold several invoices (e.g. ConsultarNfseResposta/ListaNfse
 * with one CompNfse per note): every outermost element of the winning root
 * alias is one invoice.
 */

import type {
  ExtractorConfig,
  FieldAliases,
  GenericXmlNode,
  Invoice,
  InvoiceField,
  Party,
  PartyAliases,
  ScalarInvoiceField,
} from '@nfse-reader/contracts';
import {
  FieldExtractionError,
  classifyTaxId,
  createSafeLogger,
  isNegative,
  parseInvoiceDate,
  parseLocalizedAmount,
  type Logger,
} from '@nfse-reader/shared';
import type {
  DocumentExtractionOutcome,
  ExtractionOutcome,
  InvoiceExtractorOptions,
  SearchOptions,
} from '../types.js';
import { resolveExtractorConfig } from './aliases.js';
import { findByAliases, findOutermost } from './tree-search.js';

type PartyRole = 'provider' | 'recipient';

const PARTY_FIELDS: Record<PartyRole, { legalName: InvoiceField; taxId: InvoiceField }> = {
  provider: { legalName: 'provider.legalName', taxId: 'provider.taxId' },
  recipient: { legalName: 'recipient.legalName', taxId: 'recipient.taxId' },
};

const hasText = (node: GenericXmlNode): boolean => node.text.trim().length > 0;

export class InvoiceExtractor {
  private readonly config: ExtractorConfig;
  private readonly logger: Logger;

  /**
   * Party containers, pruned from scalar field searches
   */
  private readonly partyContainers: readonly string[];

  /**
   * @throws ConfigurationError when the alias overrides are invalid
   */
  constructor(options: InvoiceExtractorOptions = {}) {
    this.config = resolveExtractorConfig(options.config);
    this.logger = options.logger ?? createSafeLogger({ level: 'warn', prefix: 'nfse-reader:extractor' });
    this.partyContainers = [...this.config.provider.containers, ...this.config.recipient.containers];
  }

  /**
   * The frozen alias table in use
   */
  get configuration(): ExtractorConfig {
    return this.config;
  }

  /**
   * Extract the first invoice of a document tree.
   *
   * @returns The frozen invoice, or the first failure in evaluation order
   */
  extract(root: GenericXmlNode): ExtractionOutcome {
    try {
      const invoiceRoots = this.locateInvoiceRoots(root);
      if (invoiceRoots.length > 1) {
        this.logger.debug('Document holds several invoices, extracting the first', { count: invoiceRoots.length });
      }
      return { ok: true, invoice: this.buildInvoice(invoiceRoots[0]) };
    } catch (error) {
      if (error instanceof FieldExtractionError) {
        return { ok: false, failure: error.failure };
      }
      throw error;
    }
  }

  /**
   * Extract every invoice of a document tree, in document order.
   * The first invoice that fails fails the whole document.
   */
  extractAll(root: GenericXmlNode): DocumentExtractionOutcome {
    let invoiceRoots: GenericXmlNode[];
    try {
      invoiceRoots = this.locateInvoiceRoots(root);
    } catch (error) {
      if (error instanceof FieldExtractionError) {
        return { ok: false, failure: error.failure };
      }
      throw error;
    }

    const invoices: Invoice[] = [];
    for (const [index, invoiceRoot] of invoiceRoots.entries()) {
      try {
        invoices.push(this.buildInvoice(invoiceRoot));
      } catch (error) {
        if (error instanceof FieldExtractionError) {
          return invoiceRoots.length > 1
            ? { ok: false, failure: error.failure, invoiceIndex: index }
            : { ok: false, failure: error.failure };
        }
        throw error;
      }
    }

    return { ok: true, invoices };
  }

  private buildInvoice(invoiceRoot: GenericXmlNode): Invoice {
    const number = this.requireText(invoiceRoot, 'number', this.scalarAliases('number'));

    const rawDate = this.requireText(invoiceRoot, 'issueDate', this.scalarAliases('issueDate'));
    const issueDate = parseInvoiceDate(rawDate);
    if (issueDate === null) {
      throw new FieldExtractionError({ kind: 'DateFormat', field: 'issueDate', rawValue: rawDate });
    }

    const provider = this.extractParty(invoiceRoot, 'provider', this.config.provider);
    const recipient = this.extractParty(invoiceRoot, 'recipient', this.config.recipient);

    const rawValue = this.requireText(invoiceRoot, 'totalServiceValue', this.scalarAliases('totalServiceValue'));
    const totalServiceValue = parseLocalizedAmount(rawValue);
    if (totalServiceValue === null || isNegative(totalServiceValue)) {
      throw new FieldExtractionError({ kind: 'NumberFormat', field: 'totalServiceValue', rawValue });
    }

    const description = this.findText(invoiceRoot, this.scalarAliases('serviceDescription'));

    return Object.freeze({
      number,
      issueDate,
      provider,
      recipient,
      totalServiceValue,
      serviceDescription: description ?? '',
    });
  }

  /**
   * Outermost elements of the first root alias present, never empty
   */
  private locateInvoiceRoots(document: GenericXmlNode): [GenericXmlNode, ...GenericXmlNode[]] {
    const options: SearchOptions = { caseSensitive: this.config.caseSensitive };
    const match = findByAliases(document, this.config.invoiceRoots, options);
    if (match === undefined) {
      throw new FieldExtractionError({ kind: 'MissingField', field: 'invoice' });
    }
    const [first = match.node, ...rest] = findOutermost(document, match.alias, options);
    return [first, ...rest];
  }

  private extractParty(invoiceRoot: GenericXmlNode, role: PartyRole, aliases: PartyAliases): Party {
    const container = findByAliases(invoiceRoot, aliases.containers, {
      caseSensitive: this.config.caseSensitive,
    });
    const fields = PARTY_FIELDS[role];
    if (container === undefined) {
      throw new FieldExtractionError({ kind: 'MissingField', field: fields.legalName });
    }

    const legalName = this.requireText(container.node, fields.legalName, aliases.legalName);

    const rawTaxId = this.requireText(container.node, fields.taxId, aliases.taxId);
    const classified = classifyTaxId(rawTaxId);
    if (!classified.ok) {
      throw new FieldExtractionError({
        kind: 'TaxIdFormat',
        field: fields.taxId,
        rawValue: rawTaxId,
        digitCount: classified.digitCount,
      });
    }

    return Object.freeze({ legalName, taxId: Object.freeze(classified.taxId) });
  }

  /**
   * Scalar fields never look inside party containers
   */
  private scalarAliases(field: ScalarInvoiceField): FieldAliases {
    const aliases = this.config.fields[field];
    return {
      aliases: aliases.aliases,
      skipWithin: [...(aliases.skipWithin ?? []), ...this.partyContainers],
    };
  }

  private findText(scope: GenericXmlNode, field: FieldAliases): string | undefined {
    const options: SearchOptions = { caseSensitive: this.config.caseSensitive, accept: hasText };
    if (field.skipWithin !== undefined) {
      options.skipWithin = field.skipWithin;
    }
    return findByAliases(scope, field.aliases, options)?.node.text.replace(/\r\n?/g, '\n').trim();
  }

  private requireText(scope: GenericXmlNode, name: InvoiceField, field: FieldAliases): string {
    const text = this.findText(scope, field);
    if (text === undefined) {
      throw new FieldExtractionError({ kind: 'MissingField', field: name });
    }
    return text;
  }
}
