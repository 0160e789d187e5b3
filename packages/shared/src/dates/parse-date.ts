import type { ISODate } from '@nfse-reader/contracts';

/**
 * ISO 8601 date with optional time and zone:
 * 2024-03-10, 2024-03-10T14:30:00, 2024-03-10T14:30:00.000-03:00
 */
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Local convention: 10/03/2024
 */
const BR_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  // Day 0 of the next month is the last day of this one
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function toIsoDate(year: string, month: string, day: string): ISODate | null {
  return isCalendarDate(Number(year), Number(month), Number(day)) ? `${year}-${month}-${day}` : null;
}

/**
 * Parse an invoice date into an ISO calendar date.
 *
 * Tries ISO 8601 first, then DD/MM/YYYY. The time and zone parts of an ISO
 * timestamp are dropped: the calendar date is the one written in the document.
 * Returns null for anything else, including impossible dates (31/02/2024).
 */
export function parseInvoiceDate(raw: string): ISODate | null {
  const text = raw.trim();

  const iso = ISO_DATE.exec(text);
  if (iso) {
    const [, year = '', month = '', day = ''] = iso;
    return toIsoDate(year, month, day);
  }

  const br = BR_DATE.exec(text);
  if (br) {
    const [, day = '', month = '', year = ''] = br;
    return toIsoDate(year, month, day);
  }

  return null;
}

/**
 * Format an ISO date as DD/MM/YYYY.
 */
export function formatDateBr(date: ISODate): string {
  const [year = '', month = '', day = ''] = date.split('-');
  return `${day}/${month}/${year}`;
}
