/**
 * Reconciler - upsert normalized records into the inventory store
 *
 * Records are applied strictly in file order; each one sees the effects of
 * the rows before it. A failure on one record becomes an `Errored` outcome
 * for that record and the batch carries on.
 */

import { createLogger } from '../utils/logger';
import type { InventoryItem, InventoryPatch, NewInventoryItem } from '../types';
import { DryRunStore } from './dry-run-store';
import { DuplicateKeyConflict, ImportError } from './errors';
import { titleKey } from './fields';
import type {
  ImportOptions,
  ImportOutcome,
  InventoryStore,
  NormalizedListing,
  NormalizedOrder,
  NormalizedRecord,
  RowOutcome,
} from './types';

const logger = createLogger('reconciler');

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

/** The single item for a key that must be unique, or undefined when none. */
function single(items: InventoryItem[], key: string, value: string): InventoryItem | undefined {
  if (items.length > 1) {
    throw new DuplicateKeyConflict(key, value, items.map((item) => item.id));
  }
  return items[0];
}

// ---------------------------------------------------------------------------
// Field mapping
// ---------------------------------------------------------------------------

function listingFields(listing: NormalizedListing): InventoryPatch {
  return {
    title: listing.title,
    sku: listing.sku,
    externalItemId: listing.externalItemId,
    condition: listing.condition,
    conditionId: listing.conditionId,
    listedPrice: listing.listedPrice,
    listedDate: listing.listedDate,
    quantity: listing.quantity,
    categoryId: listing.categoryId,
    upc: listing.upc,
  };
}

// The stored title is kept: order reports often truncate it
function orderFields(order: NormalizedOrder): InventoryPatch {
  return {
    status: 'Sold',
    soldPrice: order.soldPrice,
    soldDate: order.soldDate,
    orderNumber: order.orderNumber,
    quantity: order.quantity,
    externalItemId: order.externalItemId,
  };
}

// ---------------------------------------------------------------------------
// Per-kind upserts
// ---------------------------------------------------------------------------

function upsertListing(store: InventoryStore, listing: NormalizedListing): ImportOutcome {
  let existing: InventoryItem | undefined;
  if (listing.sku !== undefined) {
    existing = single(store.findBySku(listing.sku), 'sku', listing.sku);
  } else if (listing.externalItemId !== undefined) {
    existing = single(store.findByExternalItemId(listing.externalItemId), 'item number', listing.externalItemId);
  }

  if (existing) {
    const patch = listingFields(listing);
    if (existing.status !== 'Sold') patch.status = 'Listed';
    store.update(existing.id, patch);
    return { kind: 'Updated', itemId: existing.id };
  }

  const record: NewInventoryItem = { ...listingFields(listing), title: listing.title, quantity: listing.quantity, status: 'Listed' };
  const inserted = store.insert(record);
  return { kind: 'Inserted', itemId: inserted.id };
}

function upsertOrder(store: InventoryStore, order: NormalizedOrder): ImportOutcome {
  let existing: InventoryItem | undefined;

  if (order.sku !== undefined) {
    existing = single(store.findBySku(order.sku), 'sku', order.sku);
  } else {
    if (order.orderNumber !== undefined) {
      const key = titleKey(order.title);
      const recorded = store
        .findSoldByOrderNumber(order.orderNumber)
        .find((item) => titleKey(item.title) === key);
      if (recorded) {
        return {
          kind: 'SkippedDuplicate',
          itemId: recorded.id,
          reason: `order ${order.orderNumber} already recorded`,
        };
      }
    }
    // Ambiguous title matches fall through to a standalone sold record
    const candidates = store.findByTitleFuzzy(order.title, 'Sold');
    if (candidates.length === 1) existing = candidates[0];
  }

  if (existing) {
    store.update(existing.id, orderFields(order));
    return { kind: 'Updated', itemId: existing.id };
  }

  const record: NewInventoryItem = {
    ...orderFields(order),
    title: order.title,
    sku: order.sku,
    quantity: order.quantity,
    status: 'Sold',
  };
  const inserted = store.insert(record);
  return { kind: 'Inserted', itemId: inserted.id };
}

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

/** Outcome for one record. Store failures surface as `Errored`, never as a throw. */
export function reconcileRecord(store: InventoryStore, record: NormalizedRecord): ImportOutcome {
  if (record.type === 'rejected') {
    return { kind: 'SkippedInvalid', reason: record.message };
  }

  try {
    return record.type === 'listing'
      ? upsertListing(store, record.record)
      : upsertOrder(store, record.record);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    const code = err instanceof ImportError ? err.code : 'STORE_WRITE_FAILURE';
    logger.warn({ rowIndex: record.rowIndex, code, error: reason }, 'Row failed to reconcile');
    return { kind: 'Errored', reason, code };
  }
}

/**
 * Reconcile a batch in order. With `dryRun`, reads go to `store` and writes
 * stay in an overlay that is discarded afterwards.
 */
export function reconcileRecords(
  store: InventoryStore,
  records: readonly NormalizedRecord[],
  options: ImportOptions = {},
): RowOutcome[] {
  const target = options.dryRun ? new DryRunStore(store) : store;
  const outcomes = records.map((record) => ({
    rowIndex: record.rowIndex,
    outcome: reconcileRecord(target, record),
  }));

  logger.debug({ records: records.length, dryRun: options.dryRun === true }, 'Reconciled batch');
  return outcomes;
}
