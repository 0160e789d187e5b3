/**
 * Default alias table for NFS-e layouts
 *
 * Covers the ABRASF municipal layouts (1.0: CompNfse/Nfse/InfNfse,
 * 2.x: InfDeclaracaoPrestacaoServico) and the national layout (NFSe/infNFSe).
 */

import type {
  ExtractorConfig,
  ExtractorConfigOverrides,
  FieldAliases,
  PartyAliases,
  ScalarInvoiceField,
} from '@nfse-reader/contracts';
import { ConfigurationError } from '@nfse-reader/shared';

/**
 * Containers that hold address or contact data. Their `Numero`, `Nome`, ...
 * never describe the invoice itself.
 */
const ADDRESS_CONTAINERS = ['Endereco', 'enderNac', 'end', 'Contato'] as const;

export const DEFAULT_EXTRACTOR_CONFIG: ExtractorConfig = freezeConfig({
  invoiceRoots: ['InfNfse', 'infNFSe', 'InfDeclaracaoPrestacaoServico', 'Nfse', 'NFSe', 'CompNfse'],
  fields: {
    number: {
      aliases: ['Numero', 'NumeroNota', 'NumeroNfse', 'nNFSe'],
      // RPS numbering is the issuer's draft number, not the invoice's
      skipWithin: [...ADDRESS_CONTAINERS, 'IdentificacaoRps'],
    },
    issueDate: {
      aliases: ['DataEmissao', 'DataEmissaoNfse', 'DataHoraEmissao', 'dhEmi', 'dhProc'],
      skipWithin: ADDRESS_CONTAINERS,
    },
    totalServiceValue: {
      aliases: ['ValorServicos', 'vServ', 'ValorTotalServicos'],
      skipWithin: ADDRESS_CONTAINERS,
    },
    serviceDescription: {
      aliases: ['Discriminacao', 'xDescServ', 'DescricaoServico'],
      skipWithin: ADDRESS_CONTAINERS,
    },
  },
  provider: {
    containers: ['PrestadorServico', 'Prestador', 'emit', 'prest', 'DadosPrestador'],
    legalName: { aliases: ['RazaoSocial', 'NomeRazaoSocial', 'xNome', 'Nome'], skipWithin: ADDRESS_CONTAINERS },
    taxId: { aliases: ['Cnpj', 'Cpf', 'CpfCnpj', 'NumeroDocumento'], skipWithin: ADDRESS_CONTAINERS },
  },
  recipient: {
    containers: ['TomadorServico', 'Tomador', 'toma', 'DadosTomador'],
    legalName: { aliases: ['RazaoSocial', 'NomeRazaoSocial', 'xNome', 'Nome'], skipWithin: ADDRESS_CONTAINERS },
    taxId: { aliases: ['Cnpj', 'Cpf', 'CpfCnpj', 'NumeroDocumento'], skipWithin: ADDRESS_CONTAINERS },
  },
  caseSensitive: false,
});

const SCALAR_FIELDS: readonly ScalarInvoiceField[] = [
  'number',
  'issueDate',
  'totalServiceValue',
  'serviceDescription',
];

// ============================================================================
// Validation
// ============================================================================

function assertAliasList(aliases: readonly string[], path: string): void {
  if (aliases.length === 0) {
    throw new ConfigurationError(`Alias list "${path}" must not be empty`, { path });
  }
  const blank = aliases.findIndex((alias) => alias.trim().length === 0);
  if (blank >= 0) {
    throw new ConfigurationError(`Alias list "${path}" has a blank entry at index ${blank}`, { path, index: blank });
  }
}

function assertFieldAliases(field: FieldAliases, path: string): void {
  assertAliasList(field.aliases, `${path}.aliases`);
}

function assertPartyAliases(party: PartyAliases, path: string): void {
  assertAliasList(party.containers, `${path}.containers`);
  assertFieldAliases(party.legalName, `${path}.legalName`);
  assertFieldAliases(party.taxId, `${path}.taxId`);
}

// ============================================================================
// Freezing
// ============================================================================

function freezeFieldAliases(field: FieldAliases): FieldAliases {
  const frozen: FieldAliases = field.skipWithin === undefined
    ? { aliases: Object.freeze([...field.aliases]) }
    : { aliases: Object.freeze([...field.aliases]), skipWithin: Object.freeze([...field.skipWithin]) };
  return Object.freeze(frozen);
}

function freezePartyAliases(party: PartyAliases): PartyAliases {
  return Object.freeze({
    containers: Object.freeze([...party.containers]),
    legalName: freezeFieldAliases(party.legalName),
    taxId: freezeFieldAliases(party.taxId),
  });
}

/**
 * Copy a configuration into a deep-frozen value
 */
function freezeConfig(config: ExtractorConfig): ExtractorConfig {
  return Object.freeze({
    invoiceRoots: Object.freeze([...config.invoiceRoots]),
    fields: Object.freeze({
      number: freezeFieldAliases(config.fields.number),
      issueDate: freezeFieldAliases(config.fields.issueDate),
      totalServiceValue: freezeFieldAliases(config.fields.totalServiceValue),
      serviceDescription: freezeFieldAliases(config.fields.serviceDescription),
    }),
    provider: freezePartyAliases(config.provider),
    recipient: freezePartyAliases(config.recipient),
    caseSensitive: config.caseSensitive,
  });
}

/**
 * Merge overrides over the defaults, validate and freeze.
 *
 * Each given entry replaces the default one whole; party overrides are
 * merged per key (containers, legalName, taxId).
 *
 * @throws ConfigurationError when an alias list is empty or has blank names
 */
export function resolveExtractorConfig(
  overrides: ExtractorConfigOverrides = {},
  base: ExtractorConfig = DEFAULT_EXTRACTOR_CONFIG,
): ExtractorConfig {
  const merged: ExtractorConfig = {
    invoiceRoots: overrides.invoiceRoots ?? base.invoiceRoots,
    fields: { ...base.fields, ...overrides.fields },
    provider: { ...base.provider, ...overrides.provider },
    recipient: { ...base.recipient, ...overrides.recipient },
    caseSensitive: overrides.caseSensitive ?? base.caseSensitive,
  };

  assertAliasList(merged.invoiceRoots, 'invoiceRoots');
  for (const field of SCALAR_FIELDS) {
    assertFieldAliases(merged.fields[field], `fields.${field}`);
  }
  assertPartyAliases(merged.provider, 'provider');
  assertPartyAliases(merged.recipient, 'recipient');

  return freezeConfig(merged);
}
