/**
 * Report classifier - decide whether a file is a listing export or an order export
 */

import { createLogger } from '../utils/logger';
import { parseCurrency } from './fields';
import type { RawRow, ReportKind } from './types';

const logger = createLogger('classifier');

// Columns that only appear in one of the two report kinds. Columns both
// kinds share ("Item number", "Quantity", "Title") carry no signal.
const LISTING_SIGNATURE: ReadonlySet<string> = new Set([
  'available quantity',
  'current price',
  'start price',
  'start date',
  'custom label (sku)',
  'ebay category 1 number',
  'p:upc',
  'condition',
]);

const ORDER_SIGNATURE: ReadonlySet<string> = new Set([
  'sold for',
  'order number',
  'sale date',
  'item title',
  'custom label',
  'total price',
  'buyer username',
  'sales record number',
  'paid on date',
]);

// Price column checked against the first data row when the header alone is weak
const PEEK_PRICE_COLUMNS: Record<Exclude<ReportKind, 'Unrecognized'>, readonly string[]> = {
  ListingExport: ['current price', 'start price'],
  OrderExport: ['sold for', 'total price'],
};

/** Header key used for every column comparison: no BOM, trimmed, single-spaced, lower case. */
export function headerKey(header: string): string {
  return header.replace(/^\uFEFF/, '').trim().replace(/\s+/g, ' ').toLowerCase();
}

export interface Classification {
  kind: ReportKind;
  listingScore: number;
  orderScore: number;
  /** Why the file was not recognized */
  reason?: string;
}

/** A header this close to zero signature columns needs its first row to agree */
const MARGINAL_SCORE = 1;

function overlap(keys: readonly string[], signature: ReadonlySet<string>): number {
  return new Set(keys.filter((key) => signature.has(key))).size;
}

function peekValue(row: RawRow, columns: readonly string[]): string | undefined {
  for (const [header, value] of row) {
    if (columns.includes(headerKey(header)) && value.trim().length > 0) {
      return value;
    }
  }
  return undefined;
}

/**
 * Classify a report by its header row. The kind with strictly more signature
 * columns wins; a tie (including zero/zero) is unrecognized. A win on a single
 * signature column is confirmed against the first data row, whose price cell
 * must then parse as currency. Stronger headers leave bad cells to the
 * normalizer.
 */
export function classifyReport(headers: readonly string[], firstRow?: RawRow): Classification {
  const keys = headers.map(headerKey);
  const listingScore = overlap(keys, LISTING_SIGNATURE);
  const orderScore = overlap(keys, ORDER_SIGNATURE);

  if (listingScore === orderScore) {
    logger.info({ listingScore, orderScore }, 'Report not recognized');
    return {
      kind: 'Unrecognized',
      listingScore,
      orderScore,
      reason: listingScore === 0
        ? 'Header matches neither a listing export nor an order export'
        : 'Header matches listing and order export columns equally',
    };
  }

  const kind = listingScore > orderScore ? 'ListingExport' : 'OrderExport';

  const winningScore = Math.max(listingScore, orderScore);
  if (firstRow && winningScore === MARGINAL_SCORE) {
    const price = peekValue(firstRow, PEEK_PRICE_COLUMNS[kind]);
    if (price !== undefined && parseCurrency(price) === undefined) {
      logger.info({ kind, price }, 'First row contradicts report header');
      return {
        kind: 'Unrecognized',
        listingScore,
        orderScore,
        reason: `First data row has a non-numeric price "${price}"`,
      };
    }
  }

  logger.debug({ kind, listingScore, orderScore }, 'Report classified');
  return { kind, listingScore, orderScore };
}
