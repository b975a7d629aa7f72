/**
 * Field parsers - raw report cells to typed values
 *
 * Every parser is total: bad input yields `undefined` (or the documented
 * default), never an exception.
 */

import type { IsoDate } from '../types';
import type { ConditionCode } from './types';

// ---------------------------------------------------------------------------
// Currency
// ---------------------------------------------------------------------------

const CURRENCY_SYMBOLS = /[\s,$€£¥]/g;
const CURRENCY_CODE_PREFIX = /^(-?)(?:USD|US|CAD|CA|AUD|AU|GBP|EUR|C)(?=[-\d.])/i;
const CURRENCY_CODE_SUFFIX = /(?:USD|CAD|AUD|GBP|EUR)$/i;
const DECIMAL = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parse a currency amount such as `$1,234.50`, `US $12.00`, `-$3.10` or
 * `($3.10)`. Negative amounts are preserved so refund rows survive parsing.
 */
export function parseCurrency(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  let text = raw.trim();
  if (text.length === 0) return undefined;

  const accountingNegative = /^\((.*)\)$/.exec(text);
  if (accountingNegative) {
    // Parentheses already mean negative; a sign inside them is not an amount
    if (/[-+]/.test(accountingNegative[1])) return undefined;
    text = `-${accountingNegative[1]}`;
  }

  const cleaned = text
    .replace(CURRENCY_SYMBOLS, '')
    .replace(CURRENCY_CODE_PREFIX, '$1')
    .replace(CURRENCY_CODE_SUFFIX, '');

  if (!DECIMAL.test(cleaned)) return undefined;
  const value = Number(cleaned);
  if (!Number.isFinite(value)) return undefined;
  return Object.is(value, -0) ? 0 : value;
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T\s])/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4}|\d{2})(?:$|\s+\d{1,2}:\d{2}(?::\d{2})?(?:\s*[AP]M)?$)/i;
const MARKETPLACE_STAMP = /^([A-Za-z]{3})-(\d{1,2})-(\d{2}|\d{4})(?:\s+\d{1,2}:\d{2}(?::\d{2})?)?(?:\s+[A-Za-z]{2,5})?$/;

/** Two-digit years pivot at 69: 00-68 are 20xx, 69-99 are 19xx. */
function expandYear(year: string): number {
  const value = Number(year);
  if (year.length === 4) return value;
  return value < 69 ? 2000 + value : 1900 + value;
}

function toIsoDate(year: number, month: number, day: number): IsoDate | undefined {
  if (month < 1 || month > 12 || day < 1 || day > 31) return undefined;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  const mm = String(month).padStart(2, '0');
  const dd = String(day).padStart(2, '0');
  return `${String(year).padStart(4, '0')}-${mm}-${dd}`;
}

type DatePattern = (text: string) => IsoDate | undefined;

const DATE_PATTERNS: DatePattern[] = [
  (text) => {
    const m = ISO_DATE.exec(text);
    return m ? toIsoDate(Number(m[1]), Number(m[2]), Number(m[3])) : undefined;
  },
  (text) => {
    const m = US_DATE.exec(text);
    return m ? toIsoDate(expandYear(m[3]), Number(m[1]), Number(m[2])) : undefined;
  },
  (text) => {
    const m = MARKETPLACE_STAMP.exec(text);
    if (!m) return undefined;
    const month = MONTHS[m[1].toLowerCase()];
    return month ? toIsoDate(expandYear(m[3]), month, Number(m[2])) : undefined;
  },
];

/**
 * Parse a calendar date. Tries ISO, US slash forms, then the marketplace's
 * `Mon-DD-YY HH:MM:SS TZ` stamp (timezone dropped, time discarded).
 */
export function parseDate(raw: string | undefined): IsoDate | undefined {
  if (raw === undefined) return undefined;
  const text = raw.trim();
  if (text.length === 0) return undefined;

  for (const pattern of DATE_PATTERNS) {
    const parsed = pattern(text);
    if (parsed) return parsed;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Quantity
// ---------------------------------------------------------------------------

export const DEFAULT_QUANTITY = 1;

/** Strict form of parseQuantity: undefined unless the cell is a non-negative integer. */
export function parseQuantityValue(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const cleaned = raw.trim().replace(/,/g, '');
  if (!/^\d+(?:\.0*)?$/.test(cleaned)) return undefined;
  const value = Number.parseInt(cleaned, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

/** Non-negative integer; anything else (absent, negative, non-numeric) is 1. */
export function parseQuantity(raw: string | undefined): number {
  return parseQuantityValue(raw) ?? DEFAULT_QUANTITY;
}

// ---------------------------------------------------------------------------
// Condition
// ---------------------------------------------------------------------------

const CONDITION_MAP: ReadonlyArray<readonly [string, number]> = [
  ['New', 1000],
  ['New with tags', 1000],
  ['New without tags', 1500],
  ['Like New', 2750],
  ['Used', 3000],
  ['Very Good', 4000],
  ['Good', 5000],
  ['Acceptable', 6000],
  ['For parts or not working', 7000],
];

const CONDITION_LOOKUP = new Map(
  CONDITION_MAP.map(([label, code]) => [label.toLowerCase(), { label, code }]),
);

export const CONDITION_LABELS: readonly string[] = CONDITION_MAP.map(([label]) => label);

/** Case-insensitive exact lookup; unknown labels pass through as `unmapped`. */
export function mapCondition(rawLabel: string): ConditionCode {
  const raw = rawLabel.trim();
  const hit = CONDITION_LOOKUP.get(raw.toLowerCase());
  if (hit) return { kind: 'mapped', code: hit.code, label: hit.label };
  return { kind: 'unmapped', raw };
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

/** Trimmed text, or undefined when blank. */
export function parseText(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  const text = raw.trim();
  return text.length > 0 ? text : undefined;
}

/** Key used for title matching: trim and case-fold only. */
export function titleKey(title: string): string {
  return title.trim().toLowerCase();
}
