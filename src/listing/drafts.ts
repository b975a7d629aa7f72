/**
 * Draft listings - build marketplace bulk-upload CSV files for inventory items
 *
 * The file is the marketplace's draft listing template: four #INFO lines,
 * the column header, then one `Draft` row per listing. Items can go in one
 * row each or be combined into a single lot row.
 */

import { writeFile } from 'fs/promises';
import { createLogger } from '../utils/logger';
import type { DraftSettings } from '../utils/config';
import { mapCondition } from '../import/fields';
import type { InventoryItem } from '../types';

const logger = createLogger('drafts');

const INFO_LINES: readonly string[] = [
  '#INFO Action and Category ID are required fields. 1) Set Action to Draft 2) Please find the category ID for your listings here: https://pages.ebay.com/sellerinformation/news/categorychanges.html,,,,,,,,,,',
  '"#INFO After you\'ve successfully uploaded your draft from the Seller Hub Reports tab, complete your drafts to active listings here: https://www.ebay.com/sh/lst/drafts",,,,,,,,,,',
  '#INFO,,,,,,,,,,',
];

export const DRAFT_HEADERS: readonly string[] = [
  'Action(SiteID=US|Country=US|Currency=USD|Version=1193|CC=UTF-8)',
  'Custom label (SKU)',
  'Category ID',
  'Title',
  'UPC',
  'Price',
  'Quantity',
  'Item photo URL',
  'Condition ID',
  'Description',
  'Format',
];

/** One listing row of the draft file. */
export interface DraftRow {
  sku?: string;
  categoryId: string;
  title: string;
  upc?: string;
  price: number;
  quantity: number;
  imageUrl?: string;
  conditionId: number;
  description: string;
}

export interface LotOptions {
  title?: string;
  sku?: string;
  /** Defaults to the summed purchase prices plus 20% */
  price?: number;
  categoryId?: string;
  /** Condition label, e.g. "Used" or "Like New" */
  condition?: string;
  description?: string;
  /** Clock used for the generated lot sku */
  now?: Date;
}

const LOT_MARKUP = 1.2;

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

function conditionIdFor(label: string | undefined, settings: DraftSettings): number {
  if (label === undefined) return settings.defaultConditionId;
  const condition = mapCondition(label);
  return condition.kind === 'mapped' ? condition.code : settings.defaultConditionId;
}

/**
 * Draft row for one inventory item. Price falls back from the listed price to
 * the purchase price, then 0.
 */
export function draftRowFromItem(item: InventoryItem, settings: DraftSettings): DraftRow {
  return {
    sku: item.sku,
    categoryId: item.categoryId ?? settings.defaultCategoryId,
    title: item.title,
    upc: item.upc,
    price: item.listedPrice ?? item.purchasePrice ?? 0,
    quantity: item.quantity,
    imageUrl: item.imageUrl,
    conditionId: item.conditionId ?? conditionIdFor(item.condition, settings),
    description: item.description ?? `<p>${item.title}</p>`,
  };
}

function lotSku(now: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return `LOT-${pad(now.getMonth() + 1)}${pad(now.getDate())}${pad(now.getHours())}${pad(now.getMinutes())}`;
}

function lotDescription(items: readonly InventoryItem[]): string {
  const lines = [
    `<p><b>Lot of ${items.length} Items</b></p>`,
    '<p>This lot includes:</p>',
    '<ul>',
    ...items.map((item) => `<li>${item.title}</li>`),
    '</ul>',
    '<p>All items sold as-is.</p>',
  ];
  return lines.join('\n');
}

/**
 * Combine several items into one lot listing row.
 */
export function buildLotDraft(
  items: readonly InventoryItem[],
  settings: DraftSettings,
  lot: LotOptions = {},
): DraftRow {
  if (items.length < 2) {
    throw new Error('A lot listing needs at least 2 items');
  }

  const totalCost = items.reduce((sum, item) => sum + (item.purchasePrice ?? 0), 0);
  return {
    sku: lot.sku ?? lotSku(lot.now ?? new Date()),
    categoryId: lot.categoryId ?? settings.defaultCategoryId,
    title: lot.title ?? `Lot of ${items.length} Items`,
    price: lot.price ?? Math.round(totalCost * LOT_MARKUP * 100) / 100,
    quantity: 1,
    conditionId: conditionIdFor(lot.condition, settings),
    description: lot.description ?? lotDescription(items),
  };
}

// ---------------------------------------------------------------------------
// CSV
// ---------------------------------------------------------------------------

function escapeField(value: string | number | undefined): string {
  if (value === undefined) return '';
  const str = String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Render draft rows as the marketplace's draft listing CSV.
 */
export function buildDraftCsv(rows: readonly DraftRow[], settings: DraftSettings): string {
  const lines = [
    `#INFO,Version=0.0.2,Template= ${settings.template},,,,,,,,`,
    ...INFO_LINES,
    DRAFT_HEADERS.map(escapeField).join(','),
  ];

  for (const row of rows) {
    const values: Array<string | number | undefined> = [
      'Draft',
      row.sku,
      row.categoryId,
      row.title,
      row.upc,
      row.price.toFixed(2),
      row.quantity,
      row.imageUrl,
      row.conditionId,
      row.description,
      settings.format,
    ];
    lines.push(values.map(escapeField).join(','));
  }

  return `${lines.join('\r\n')}\r\n`;
}

/** Write a draft listing CSV to `path`. */
export async function writeDraftCsv(
  path: string,
  rows: readonly DraftRow[],
  settings: DraftSettings,
): Promise<void> {
  await writeFile(path, buildDraftCsv(rows, settings), 'utf-8');
  logger.info({ path, rows: rows.length }, 'Wrote draft listings');
}
