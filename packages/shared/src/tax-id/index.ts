/**
 * CPF/CNPJ module
 *
 * @example
 * ```typescript
 * import { classifyTaxId, formatTaxId } from '@nfse-reader/shared';
 *
 * const result = classifyTaxId('11.222.333/0001-81');
 * if (result.ok) {
 *   formatTaxId(result.taxId); // '11.222.333/0001-81'
 * }
 * ```
 */

export { TAX_ID_LENGTHS, CPF_WEIGHTS, CNPJ_WEIGHTS } from './constants.js';

export {
  extractDigits,
  classifyTaxId,
  formatTaxId,
  hasValidCheckDigits,
  type TaxIdClassification,
} from './validate.js';
