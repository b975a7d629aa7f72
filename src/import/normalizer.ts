/**
 * Row normalizer - map a classified report row onto a canonical record
 *
 * Both report kinds go through one routine. What each column means lives in
 * the per-kind tables below (field -> accepted headers, first non-empty wins).
 */

import { createLogger } from '../utils/logger';
import { headerKey } from './classifier';
import {
  DEFAULT_QUANTITY,
  mapCondition,
  parseCurrency,
  parseDate,
  parseQuantity,
  parseQuantityValue,
  parseText,
} from './fields';
import type { ReportRow } from './csv-parser';
import type {
  ColumnMappings,
  NormalizedListing,
  NormalizedOrder,
  NormalizedRecord,
  ReportKind,
  RowWarning,
} from './types';

const logger = createLogger('normalizer');

// ---------------------------------------------------------------------------
// Column tables
// ---------------------------------------------------------------------------

type ColumnTable<F extends string> = Readonly<Record<F, readonly string[]>>;

export const LISTING_COLUMNS = {
  externalItemId: ['item number', 'item id'],
  title: ['title', 'item title'],
  sku: ['custom label (sku)', 'custom label', 'sku'],
  condition: ['condition'],
  listedPrice: ['current price', 'start price', 'price'],
  listedDate: ['start date', 'start time'],
  quantity: ['available quantity', 'quantity'],
  categoryId: ['ebay category 1 number', 'category id', 'category number'],
  upc: ['p:upc', 'upc'],
} as const satisfies Partial<ColumnTable<keyof NormalizedListing>>;

export const ORDER_COLUMNS = {
  title: ['item title', 'title'],
  sku: ['custom label', 'custom label (sku)', 'sku'],
  soldPrice: ['sold for', 'total price', 'sale price'],
  soldDate: ['sale date', 'sold date', 'order date'],
  quantity: ['quantity'],
  orderNumber: ['order number', 'order id'],
  externalItemId: ['item number', 'item id'],
} as const satisfies Partial<ColumnTable<keyof NormalizedOrder>>;

type ListingField = keyof typeof LISTING_COLUMNS;
type OrderField = keyof typeof ORDER_COLUMNS;

/** Column tables in effect for one import, keyed by normalized header */
export interface ColumnTables {
  listing: ColumnTable<ListingField>;
  order: ColumnTable<OrderField>;
}

export const DEFAULT_COLUMNS: ColumnTables = { listing: LISTING_COLUMNS, order: ORDER_COLUMNS };

function isTableField<F extends string>(table: ColumnTable<F>, field: string): field is F {
  return Object.prototype.hasOwnProperty.call(table, field);
}

function withOverrides<F extends string>(
  base: ColumnTable<F>,
  overrides: Readonly<Record<string, readonly string[]>> | undefined,
  kind: string,
): ColumnTable<F> {
  if (!overrides) return base;
  const table: Record<F, readonly string[]> = { ...base };
  for (const [field, headers] of Object.entries(overrides)) {
    if (!isTableField(base, field)) {
      logger.warn({ kind, field }, 'Ignoring column mapping for unknown field');
      continue;
    }
    const keys = headers.map(headerKey).filter((key) => key.length > 0);
    if (keys.length > 0) table[field] = keys;
  }
  return table;
}

/** Merge user column mappings over the built-in tables. */
export function resolveColumns(mappings: ColumnMappings = {}): ColumnTables {
  return {
    listing: withOverrides(LISTING_COLUMNS, mappings.listing, 'listing'),
    order: withOverrides(ORDER_COLUMNS, mappings.order, 'order'),
  };
}

// ---------------------------------------------------------------------------
// Generic routine
// ---------------------------------------------------------------------------

type CellReader<F extends string> = (field: F) => string | undefined;

interface FieldReaders<F extends string> {
  cell: CellReader<F>;
  text(field: F): string | undefined;
  price(field: F): number | undefined;
  date(field: F): string | undefined;
  quantity(field: F): number;
}

interface ReportSchema<F extends string, R> {
  build(read: FieldReaders<F>, title: string): R;
}

function createCellReader<F extends string>(row: ReportRow, columns: ColumnTable<F>): CellReader<F> {
  const byKey = new Map<string, string>();
  for (const [header, value] of row.cells) {
    const key = headerKey(header);
    if (!byKey.has(key)) byKey.set(key, value);
  }
  return (field) => {
    for (const header of columns[field]) {
      const value = byKey.get(header);
      if (value !== undefined && value.trim().length > 0) return value;
    }
    return undefined;
  };
}

function isSummaryLine(row: ReportRow): boolean {
  const values = [...row.cells.values()];
  return (
    values.length > 1 &&
    values[0].trim().length > 0 &&
    values.slice(1).every((value) => value.trim().length === 0)
  );
}

type SchemaResult<R> =
  | { ok: true; record: R; warnings: RowWarning[] }
  | { ok: false; reason: 'missing-title' | 'summary-line'; message: string };

function normalizeWith<F extends string, R>(
  row: ReportRow,
  schema: ReportSchema<F, R>,
  columns: ColumnTable<F | 'title'>,
): SchemaResult<R> {
  const cell = createCellReader<F | 'title'>(row, columns);
  const title = parseText(cell('title'));

  if (title === undefined) {
    if (isSummaryLine(row)) {
      return { ok: false, reason: 'summary-line', message: `Row ${row.rowIndex}: summary line, not an item` };
    }
    return { ok: false, reason: 'missing-title', message: `Row ${row.rowIndex}: missing title` };
  }

  const warnings: RowWarning[] = [];
  const warn = (message: string): void => {
    warnings.push({ rowIndex: row.rowIndex, message: `Row ${row.rowIndex}: ${message}` });
  };

  const read: FieldReaders<F> = {
    cell,
    text: (field) => parseText(cell(field)),
    price(field) {
      const raw = cell(field);
      if (raw === undefined) return undefined;
      const value = parseCurrency(raw);
      if (value === undefined) {
        warn(`non-numeric ${field} "${raw.trim()}" ignored`);
        return undefined;
      }
      if (value < 0) {
        warn(`negative ${field} "${raw.trim()}" ignored`);
        return undefined;
      }
      return value;
    },
    date(field) {
      const raw = cell(field);
      if (raw === undefined) return undefined;
      const value = parseDate(raw);
      if (value === undefined) warn(`unrecognized ${field} "${raw.trim()}" ignored`);
      return value;
    },
    quantity(field) {
      const raw = cell(field);
      if (raw !== undefined && parseQuantityValue(raw) === undefined) {
        warn(`invalid ${field} "${raw.trim()}", using ${DEFAULT_QUANTITY}`);
      }
      return parseQuantity(raw);
    },
  };

  return { ok: true, record: schema.build(read, title), warnings };
}

// ---------------------------------------------------------------------------
// Per-kind schemas
// ---------------------------------------------------------------------------

const LISTING_SCHEMA: ReportSchema<ListingField, NormalizedListing> = {
  build(read, title) {
    const rawCondition = read.text('condition');
    const condition = rawCondition === undefined ? undefined : mapCondition(rawCondition);
    return {
      title,
      externalItemId: read.text('externalItemId'),
      sku: read.text('sku'),
      condition: condition?.kind === 'mapped' ? condition.label : condition?.raw,
      conditionId: condition?.kind === 'mapped' ? condition.code : undefined,
      listedPrice: read.price('listedPrice'),
      listedDate: read.date('listedDate'),
      quantity: read.quantity('quantity'),
      categoryId: read.text('categoryId'),
      upc: read.text('upc'),
    };
  },
};

const ORDER_SCHEMA: ReportSchema<OrderField, NormalizedOrder> = {
  build(read, title) {
    return {
      title,
      sku: read.text('sku'),
      soldPrice: read.price('soldPrice'),
      soldDate: read.date('soldDate'),
      quantity: read.quantity('quantity'),
      orderNumber: read.text('orderNumber'),
      externalItemId: read.text('externalItemId'),
    };
  },
};

/**
 * Normalize one data row of a classified report.
 */
export function normalizeRow(
  row: ReportRow,
  kind: Exclude<ReportKind, 'Unrecognized'>,
  columns: ColumnTables = DEFAULT_COLUMNS,
): NormalizedRecord {
  if (kind === 'ListingExport') {
    const result = normalizeWith(row, LISTING_SCHEMA, columns.listing);
    return result.ok
      ? { type: 'listing', rowIndex: row.rowIndex, record: result.record, warnings: result.warnings }
      : { type: 'rejected', rowIndex: row.rowIndex, reason: result.reason, message: result.message };
  }

  const result = normalizeWith(row, ORDER_SCHEMA, columns.order);
  return result.ok
    ? { type: 'order', rowIndex: row.rowIndex, record: result.record, warnings: result.warnings }
    : { type: 'rejected', rowIndex: row.rowIndex, reason: result.reason, message: result.message };
}
