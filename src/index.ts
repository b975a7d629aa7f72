/**
 * Reseller Ledger - marketplace report import and inventory bookkeeping
 */

export * from './import/index';
export { createDatabase } from './db/index';
export type { Database, DatabaseOptions, ListItemsFilter } from './db/index';
export { buildDraftCsv, buildLotDraft, draftRowFromItem, writeDraftCsv, DRAFT_HEADERS } from './listing/drafts';
export type { DraftRow, LotOptions } from './listing/drafts';
export { loadConfig, defaultConfig, resolveStateDir, resolveConfigPath } from './utils/config';
export type { Config, DraftSettings, ImportSettings } from './utils/config';
export { createLogger } from './utils/logger';
export type { Logger } from './utils/logger';
export { applyPatch, isItemStatus, ITEM_STATUSES, INVENTORY_FIELDS } from './types';
export type {
  InventoryItem,
  InventoryPatch,
  IsoDate,
  ItemStatus,
  NewInventoryItem,
} from './types';
