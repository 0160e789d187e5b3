/**
 * Decimal arithmetic utilities for monetary amounts.
 *
 * Amounts are stored as strings (DecimalAmount) with '.' as decimal
 * separator, so that values read from invoices never pass through
 * floating point. Arithmetic uses bigint.
 */

import type { DecimalAmount } from '@nfse-reader/contracts';

/**
 * Decimal places shown for monetary amounts, and the minimum stored
 */
const MONEY_PLACES = 2;

/**
 * Internal representation of a decimal value.
 */
interface DecimalValue {
  /** Absolute integer representation (|value| * 10^scale) */
  value: bigint;
  /** Number of decimal places */
  scale: number;
  /** Whether the value is negative */
  negative: boolean;
}

const CANONICAL_DECIMAL = /^-?\d+(\.\d+)?$/;

/**
 * Parse a canonical decimal string into internal representation.
 */
function parseDecimal(str: string): DecimalValue {
  const trimmed = str.trim();
  if (!CANONICAL_DECIMAL.test(trimmed)) {
    throw new Error(`Invalid decimal format: ${str}`);
  }

  const negative = trimmed.startsWith('-');
  const unsigned = negative ? trimmed.slice(1) : trimmed;
  const [intPart = '0', fracPart = ''] = unsigned.split('.');

  return {
    value: BigInt(intPart + fracPart),
    scale: fracPart.length,
    negative,
  };
}

/**
 * Format a decimal value back to string.
 */
function formatDecimal(decimal: DecimalValue): string {
  const { value, scale } = decimal;

  let str = value.toString();
  while (str.length <= scale) {
    str = '0' + str;
  }

  const insertPoint = str.length - scale;
  const result = scale > 0 ? str.slice(0, insertPoint) + '.' + str.slice(insertPoint) : str;

  return decimal.negative && value !== 0n ? '-' + result : result;
}

/**
 * Bring a value to a larger scale without changing it.
 */
function rescale(decimal: DecimalValue, scale: number): bigint {
  return decimal.scale < scale ? decimal.value * 10n ** BigInt(scale - decimal.scale) : decimal.value;
}

function toSigned(decimal: DecimalValue, scale: number): bigint {
  const scaled = rescale(decimal, scale);
  return decimal.negative ? -scaled : scaled;
}

function fromSigned(value: bigint, scale: number): DecimalValue {
  return value < 0n ? { value: -value, scale, negative: true } : { value, scale, negative: false };
}

/**
 * Round an absolute quotient half to even (banker's rounding)
 */
function roundHalfEven(quotient: bigint, remainder: bigint, divisor: bigint): bigint {
  const twice = remainder * 2n;
  if (twice > divisor || (twice === divisor && quotient % 2n === 1n)) {
    return quotient + 1n;
  }
  return quotient;
}

/**
 * Add two decimal amounts.
 */
export function add(a: DecimalAmount, b: DecimalAmount): DecimalAmount {
  const decA = parseDecimal(a);
  const decB = parseDecimal(b);
  const scale = Math.max(decA.scale, decB.scale);

  return formatDecimal(fromSigned(toSigned(decA, scale) + toSigned(decB, scale), scale));
}

/**
 * Check if amount is negative.
 */
export function isNegative(a: DecimalAmount): boolean {
  const dec = parseDecimal(a);
  return dec.negative && dec.value !== 0n;
}

/**
 * Round a decimal amount to `places` fraction digits, half to even.
 */
export function round(a: DecimalAmount, places: number = MONEY_PLACES): DecimalAmount {
  const dec = parseDecimal(a);

  if (dec.scale <= places) {
    return formatDecimal({ ...dec, value: rescale(dec, places), scale: places });
  }

  const factor = 10n ** BigInt(dec.scale - places);
  const rounded = roundHalfEven(dec.value / factor, dec.value % factor, factor);

  return formatDecimal({ value: rounded, scale: places, negative: dec.negative });
}

/**
 * Parse an amount as written in invoices into a canonical DecimalAmount.
 *
 * Accepts both '.' and ',' as decimal separator:
 * - both present: the last one is the decimal separator, the other groups thousands
 * - one kind repeated: thousands separator only
 * - one kind once: decimal separator
 *
 * Thousands groups must have three digits. An `R$` prefix and whitespace are
 * ignored. The result keeps every fraction digit, with at least two.
 * Returns null when the text is not a number. Negative values are returned
 * as such; callers decide whether they are acceptable.
 *
 * @example
 * parseLocalizedAmount('1.234,5')  // '1234.50'
 * parseLocalizedAmount('1500,00')  // '1500.00'
 * parseLocalizedAmount('R$ 1,234') // '1.234'
 */
export function parseLocalizedAmount(raw: string): DecimalAmount | null {
  let text = raw.trim().replace(/^R\$/i, '').replace(/\s+/g, '');

  let negative = false;
  if (text.startsWith('-') || text.startsWith('+')) {
    negative = text.startsWith('-');
    text = text.slice(1);
  }

  if (!/^[\d.,]+$/.test(text) || !/\d/.test(text)) {
    return null;
  }

  const lastDot = text.lastIndexOf('.');
  const lastComma = text.lastIndexOf(',');
  let decimalSeparator: '.' | ',' | null = null;
  let thousandsSeparator: '.' | ',' | null = null;

  if (lastDot >= 0 && lastComma >= 0) {
    decimalSeparator = lastDot > lastComma ? '.' : ',';
    thousandsSeparator = decimalSeparator === '.' ? ',' : '.';
  } else if (lastDot >= 0 || lastComma >= 0) {
    const separator = lastDot >= 0 ? '.' : ',';
    if (text.indexOf(separator) === text.lastIndexOf(separator)) {
      decimalSeparator = separator;
    } else {
      thousandsSeparator = separator;
    }
  }

  let intPart = text;
  let fracPart = '';
  if (decimalSeparator !== null) {
    const index = text.lastIndexOf(decimalSeparator);
    intPart = text.slice(0, index);
    fracPart = text.slice(index + 1);
    if (!/^\d+$/.test(fracPart)) {
      return null;
    }
  }

  if (thousandsSeparator !== null && intPart.includes(thousandsSeparator)) {
    const groups = intPart.split(thousandsSeparator);
    const [head = '', ...tail] = groups;
    if (!/^\d{1,3}$/.test(head) || !tail.every((group) => /^\d{3}$/.test(group))) {
      return null;
    }
    intPart = groups.join('');
  }

  if (intPart === '') {
    intPart = '0';
  }
  if (!/^\d+$/.test(intPart)) {
    return null;
  }

  const digits = intPart.replace(/^0+(?=\d)/, '');
  const fraction = fracPart.padEnd(MONEY_PLACES, '0');
  const isZero = /^0+$/.test(digits + fraction);

  return `${negative && !isZero ? '-' : ''}${digits}.${fraction}`;
}

/**
 * Format an amount in Brazilian notation, rounded to two places.
 *
 * @example
 * formatAmountBr('1234.5')  // 'R$ 1.234,50'
 */
export function formatAmountBr(amount: DecimalAmount): string {
  const rounded = round(amount, MONEY_PLACES);
  const negative = rounded.startsWith('-');
  const [intPart = '0', fracPart = '00'] = (negative ? rounded.slice(1) : rounded).split('.');
  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, '.');

  return `R$ ${negative ? '-' : ''}${grouped},${fracPart}`;
}
