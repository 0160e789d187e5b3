/**
 * CPF/CNPJ constants
 */

import type { TaxIdKind } from '@nfse-reader/contracts';

/**
 * Digit count per tax id kind
 */
export const TAX_ID_LENGTHS: Readonly<Record<TaxIdKind, number>> = {
  CPF: 11,
  CNPJ: 14,
};

/**
 * Weights for the two CPF check digits (modulo 11)
 */
export const CPF_WEIGHTS = {
  first: [10, 9, 8, 7, 6, 5, 4, 3, 2],
  second: [11, 10, 9, 8, 7, 6, 5, 4, 3, 2],
} as const;

/**
 * Weights for the two CNPJ check digits (modulo 11)
 */
export const CNPJ_WEIGHTS = {
  first: [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2],
  second: [6, 5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2],
} as const;
