/**
 * Marketplace report import - public surface
 */

export { importFile, importCsvText } from './importer';
export { reconcileRecord, reconcileRecords } from './reconciler';
export { DryRunStore } from './dry-run-store';
export { normalizeRow, resolveColumns, DEFAULT_COLUMNS, LISTING_COLUMNS, ORDER_COLUMNS } from './normalizer';
export type { ColumnTables } from './normalizer';
export { classifyReport, headerKey } from './classifier';
export type { Classification } from './classifier';
export { decodeCsvBuffer, parseCsvRecords, readReport } from './csv-parser';
export type { DecodedText, ParsedReport, ReportRow, TextEncoding } from './csv-parser';
export {
  CONDITION_LABELS,
  DEFAULT_QUANTITY,
  mapCondition,
  parseCurrency,
  parseDate,
  parseQuantity,
  parseText,
  titleKey,
} from './fields';
export {
  ClassificationFailure,
  DecodeFailure,
  DuplicateKeyConflict,
  ImportError,
  StoreWriteFailure,
} from './errors';
export type { ImportErrorCode } from './errors';
export type {
  ColumnMappings,
  ConditionCode,
  ImportOptions,
  ImportOutcome,
  ImportReport,
  InventoryStore,
  NormalizedListing,
  NormalizedOrder,
  NormalizedRecord,
  OutcomeKind,
  RawRow,
  RejectionReason,
  ReportKind,
  RowError,
  RowOutcome,
  RowWarning,
} from './types';
