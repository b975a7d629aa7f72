/**
 * Marketplace report import types
 */

import type {
  InventoryItem,
  InventoryPatch,
  IsoDate,
  ItemStatus,
  NewInventoryItem,
} from '../types';
import type { ImportErrorCode } from './errors';

/** One data row keyed by its header as it appeared in the file (trimmed). */
export type RawRow = ReadonlyMap<string, string>;

export type ReportKind = 'ListingExport' | 'OrderExport' | 'Unrecognized';

export type ConditionCode =
  | { kind: 'mapped'; code: number; label: string }
  | { kind: 'unmapped'; raw: string };

export interface NormalizedListing {
  externalItemId?: string;
  sku?: string;
  title: string;
  condition?: string;
  conditionId?: number;
  listedPrice?: number;
  listedDate?: IsoDate;
  quantity: number;
  categoryId?: string;
  upc?: string;
}

export interface NormalizedOrder {
  title: string;
  sku?: string;
  soldPrice?: number;
  soldDate?: IsoDate;
  quantity: number;
  orderNumber?: string;
  externalItemId?: string;
}

export type RejectionReason = 'missing-title' | 'summary-line';

export interface RowWarning {
  rowIndex: number;
  message: string;
}

/**
 * Result of normalizing one row. Decided once per row so nothing downstream
 * has to re-inspect the record's shape.
 */
export type NormalizedRecord =
  | { type: 'listing'; rowIndex: number; record: NormalizedListing; warnings: RowWarning[] }
  | { type: 'order'; rowIndex: number; record: NormalizedOrder; warnings: RowWarning[] }
  | { type: 'rejected'; rowIndex: number; reason: RejectionReason; message: string };

export type ImportOutcome =
  | { kind: 'Inserted'; itemId: number }
  | { kind: 'Updated'; itemId: number }
  | { kind: 'SkippedDuplicate'; itemId: number; reason: string }
  | { kind: 'SkippedInvalid'; reason: string }
  | { kind: 'Errored'; reason: string; code: ImportErrorCode };

export type OutcomeKind = ImportOutcome['kind'];

export interface RowOutcome {
  rowIndex: number;
  outcome: ImportOutcome;
}

export interface RowError {
  rowIndex: number;
  message: string;
  code: ImportErrorCode;
}

export interface ImportReport {
  reportKind: ReportKind;
  totalRows: number;
  inserted: number;
  updated: number;
  skippedDuplicate: number;
  skippedInvalid: number;
  errored: number;
  errors: RowError[];
  warnings: RowWarning[];
  /** Set when the file could not be processed at all (unreadable, unrecognized) */
  error?: string;
  dryRun: boolean;
  outcomes: RowOutcome[];
}

/**
 * User-set header names per canonical field, by report kind. A field listed
 * here is read from these headers only (first non-empty wins); unlisted
 * fields keep the built-in headers.
 */
export interface ColumnMappings {
  listing?: Readonly<Record<string, readonly string[]>>;
  order?: Readonly<Record<string, readonly string[]>>;
}

export interface ImportOptions {
  /** Run matching against the store but write nothing */
  dryRun?: boolean;
  /** Field delimiter of the report (default `,`) */
  delimiter?: string;
  mappings?: ColumnMappings;
}

/**
 * The persistence boundary the reconciler works against. Finders return every
 * match so callers can tell "none" from "more than one". Writes throw on failure.
 */
export interface InventoryStore {
  findBySku(sku: string): InventoryItem[];
  /** Trimmed, case-insensitive exact title equality, skipping items in `excludeStatus` */
  findByTitleFuzzy(title: string, excludeStatus: ItemStatus): InventoryItem[];
  findByExternalItemId(externalItemId: string): InventoryItem[];
  findSoldByOrderNumber(orderNumber: string): InventoryItem[];
  insert(record: NewInventoryItem): InventoryItem;
  update(id: number, fields: InventoryPatch): void;
  /** Run `fn` atomically; a thrown error rolls every write in it back */
  transaction<T>(fn: () => T): T;
}
