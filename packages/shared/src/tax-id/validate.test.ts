/**
 * CPF/CNPJ Tests
 */

import { describe, it, expect } from 'vitest';
import { extractDigits, classifyTaxId, formatTaxId, hasValidCheckDigits } from './validate.js';

describe('extractDigits', () => {
  it('should remove punctuation and whitespace', () => {
    expect(extractDigits('11.222.333/0001-81')).toBe('11222333000181');
    expect(extractDigits(' 529.982.247-25 ')).toBe('52998224725');
  });

  it('should return empty string when there are no digits', () => {
    expect(extractDigits('n/a')).toBe('');
  });
});

describe('classifyTaxId', () => {
  it('should classify 14 digits as CNPJ', () => {
    expect(classifyTaxId('11.222.333/0001-81')).toEqual({
      ok: true,
      taxId: { kind: 'CNPJ', digits: '11222333000181' },
    });
  });

  it('should classify 11 digits as CPF', () => {
    expect(classifyTaxId('529.982.247-25')).toEqual({
      ok: true,
      taxId: { kind: 'CPF', digits: '52998224725' },
    });
  });

  it('should reject other digit counts', () => {
    expect(classifyTaxId('123456789')).toEqual({ ok: false, digitCount: 9 });
    expect(classifyTaxId('123456789012')).toEqual({ ok: false, digitCount: 12 });
    expect(classifyTaxId('')).toEqual({ ok: false, digitCount: 0 });
  });
});

describe('formatTaxId', () => {
  it('should format CNPJ', () => {
    expect(formatTaxId({ kind: 'CNPJ', digits: '11222333000181' })).toBe('11.222.333/0001-81');
  });

  it('should format CPF', () => {
    expect(formatTaxId({ kind: 'CPF', digits: '52998224725' })).toBe('529.982.247-25');
  });
});

describe('hasValidCheckDigits', () => {
  it('should accept ids with matching check digits', () => {
    expect(hasValidCheckDigits({ kind: 'CNPJ', digits: '11222333000181' })).toBe(true);
    expect(hasValidCheckDigits({ kind: 'CPF', digits: '52998224725' })).toBe(true);
  });

  it('should reject ids with wrong check digits', () => {
    expect(hasValidCheckDigits({ kind: 'CNPJ', digits: '11222333000182' })).toBe(false);
    expect(hasValidCheckDigits({ kind: 'CPF', digits: '52998224724' })).toBe(false);
  });

  it('should reject repeated digits', () => {
    expect(hasValidCheckDigits({ kind: 'CPF', digits: '11111111111' })).toBe(false);
  });
});
