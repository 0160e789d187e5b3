/**
 * CPF/CNPJ handling
 *
 * Offline only. The digit count decides the kind; check digits are
 * reported separately and never reject an id.
 */

import type { TaxId } from '@nfse-reader/contracts';
import { TAX_ID_LENGTHS, CPF_WEIGHTS, CNPJ_WEIGHTS } from './constants.js';

/**
 * Result of classifying a raw tax id
 */
export type TaxIdClassification =
  | { readonly ok: true; readonly taxId: TaxId }
  | { readonly ok: false; readonly digitCount: number };

/**
 * Strip everything but digits.
 *
 * @example
 * extractDigits('11.222.333/0001-81') // '11222333000181'
 */
export function extractDigits(raw: string): string {
  return raw.replace(/\D/g, '');
}

/**
 * Classify a raw tax id by digit count: 11 is a CPF, 14 a CNPJ.
 */
export function classifyTaxId(raw: string): TaxIdClassification {
  const digits = extractDigits(raw);

  if (digits.length === TAX_ID_LENGTHS.CPF) {
    return { ok: true, taxId: { kind: 'CPF', digits } };
  }
  if (digits.length === TAX_ID_LENGTHS.CNPJ) {
    return { ok: true, taxId: { kind: 'CNPJ', digits } };
  }

  return { ok: false, digitCount: digits.length };
}

/**
 * Format a tax id for display.
 *
 * @example
 * formatTaxId({ kind: 'CNPJ', digits: '11222333000181' }) // '11.222.333/0001-81'
 * formatTaxId({ kind: 'CPF', digits: '52998224725' })     // '529.982.247-25'
 */
export function formatTaxId(taxId: TaxId): string {
  const d = taxId.digits;
  if (taxId.kind === 'CNPJ') {
    return `${d.slice(0, 2)}.${d.slice(2, 5)}.${d.slice(5, 8)}/${d.slice(8, 12)}-${d.slice(12)}`;
  }
  return `${d.slice(0, 3)}.${d.slice(3, 6)}.${d.slice(6, 9)}-${d.slice(9)}`;
}

function checkDigit(digits: string, weights: readonly number[]): number {
  let total = 0;
  weights.forEach((weight, index) => {
    total += Number(digits[index]) * weight;
  });
  const remainder = total % 11;
  return remainder < 2 ? 0 : 11 - remainder;
}

/**
 * Verify the two modulo-11 check digits of a CPF or CNPJ.
 * Ids made of a single repeated digit are rejected.
 */
export function hasValidCheckDigits(taxId: TaxId): boolean {
  const { digits } = taxId;
  if (digits.length !== TAX_ID_LENGTHS[taxId.kind] || /^(\d)\1*$/.test(digits)) {
    return false;
  }

  const weights = taxId.kind === 'CPF' ? CPF_WEIGHTS : CNPJ_WEIGHTS;
  const first = checkDigit(digits, weights.first);
  const second = checkDigit(digits, weights.second);

  return digits.endsWith(`${first}${second}`);
}
