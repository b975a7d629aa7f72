/**
 * Core domain types shared by the store, importers and exporters.
 */

/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = string;

export type ItemStatus = 'In Stock' | 'Listed' | 'Sold';

export const ITEM_STATUSES: readonly ItemStatus[] = ['In Stock', 'Listed', 'Sold'];

/**
 * One row of the `inventory` table. Optional fields are absent (not zero or
 * empty string) when unknown.
 */
export interface InventoryItem {
  id: number;
  title: string;
  sku?: string;
  /** Marketplace item number ("Item number" column in listing exports) */
  externalItemId?: string;
  condition?: string;
  conditionId?: number;
  listedPrice?: number;
  listedDate?: IsoDate;
  status: ItemStatus;
  soldPrice?: number;
  soldDate?: IsoDate;
  quantity: number;
  orderNumber?: string;
  upc?: string;
  categoryId?: string;
  imageUrl?: string;
  description?: string;
  purchasePrice?: number;
  createdAt: Date;
  updatedAt: Date;
}

/** Fields accepted when inserting; the store assigns id and timestamps. */
export type NewInventoryItem = Omit<InventoryItem, 'id' | 'createdAt' | 'updatedAt'>;

/** Field-level update. Keys that are absent leave the stored value untouched. */
export type InventoryPatch = Partial<NewInventoryItem>;

export function isItemStatus(value: unknown): value is ItemStatus {
  return typeof value === 'string' && ITEM_STATUSES.some((status) => status === value);
}

/** Every writable field, in the order the store lays out its columns. */
export const INVENTORY_FIELDS: ReadonlyArray<keyof NewInventoryItem> = [
  'title',
  'sku',
  'externalItemId',
  'condition',
  'conditionId',
  'listedPrice',
  'listedDate',
  'status',
  'soldPrice',
  'soldDate',
  'quantity',
  'orderNumber',
  'upc',
  'categoryId',
  'imageUrl',
  'description',
  'purchasePrice',
];

function assignDefined<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) target[key] = value;
}

/** Copy of `item` with every defined field of `patch` applied. */
export function applyPatch(item: InventoryItem, patch: InventoryPatch, now = new Date()): InventoryItem {
  const next: InventoryItem = { ...item, updatedAt: now };
  for (const field of INVENTORY_FIELDS) {
    assignDefined(next, field, patch[field]);
  }
  return next;
}
