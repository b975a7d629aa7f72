import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { InventoryItem } from '../types';
import type { DraftSettings } from '../utils/config';
import { buildDraftCsv, buildLotDraft, draftRowFromItem, writeDraftCsv } from './drafts';

const settings: DraftSettings = {
  defaultCategoryId: '47140',
  defaultConditionId: 3000,
  format: 'FixedPrice',
  template: 'eBay-draft-listings-template_US',
};

function makeItem(overrides: Partial<InventoryItem> = {}): InventoryItem {
  return {
    id: 1,
    title: 'Blue Mug',
    status: 'In Stock',
    quantity: 1,
    createdAt: new Date(0),
    updatedAt: new Date(0),
    ...overrides,
  };
}

describe('draftRowFromItem', () => {
  it('fills defaults from settings and the item title', () => {
    const row = draftRowFromItem(makeItem({ sku: 'A1', listedPrice: 12.5, condition: 'Like New' }), settings);

    expect(row).toEqual({
      sku: 'A1',
      categoryId: '47140',
      title: 'Blue Mug',
      price: 12.5,
      quantity: 1,
      conditionId: 2750,
      description: '<p>Blue Mug</p>',
    });
  });

  it('falls back from listed price to purchase price to zero', () => {
    expect(draftRowFromItem(makeItem({ purchasePrice: 4 }), settings).price).toBe(4);
    expect(draftRowFromItem(makeItem(), settings).price).toBe(0);
  });

  it('prefers stored category, condition code and description', () => {
    const row = draftRowFromItem(
      makeItem({ categoryId: '20625', conditionId: 1000, condition: 'Used', description: '<p>Mint</p>' }),
      settings,
    );
    expect(row).toMatchObject({ categoryId: '20625', conditionId: 1000, description: '<p>Mint</p>' });
  });

  it('uses the default condition for unknown labels', () => {
    expect(draftRowFromItem(makeItem({ condition: 'Pre-owned' }), settings).conditionId).toBe(3000);
  });
});

describe('buildDraftCsv', () => {
  it('writes the template preamble, header and one Draft row per item', () => {
    const rows = [draftRowFromItem(makeItem({ title: 'Lamp, brass', sku: 'A3', listedPrice: 40, condition: 'Like New' }), settings)];

    const lines = buildDraftCsv(rows, settings).split('\r\n');

    expect(lines).toHaveLength(7);
    expect(lines[0]).toBe('#INFO,Version=0.0.2,Template= eBay-draft-listings-template_US,,,,,,,,');
    expect(lines[3]).toBe('#INFO,,,,,,,,,,');
    expect(lines[4]).toBe(
      'Action(SiteID=US|Country=US|Currency=USD|Version=1193|CC=UTF-8),Custom label (SKU),Category ID,Title,UPC,Price,Quantity,Item photo URL,Condition ID,Description,Format',
    );
    expect(lines[5]).toBe('Draft,A3,47140,"Lamp, brass",,40.00,1,,2750,"<p>Lamp, brass</p>",FixedPrice');
    expect(lines[6]).toBe('');
  });

  it('ends rows with CRLF and keeps line feeds inside a quoted description', () => {
    const lot = buildLotDraft(
      [makeItem({ id: 1, title: 'Mug' }), makeItem({ id: 2, title: 'Plate' })],
      settings,
      { sku: 'LOT-1', price: 10 },
    );

    const lines = buildDraftCsv([lot], settings).split('\r\n');

    expect(lines).toHaveLength(7);
    expect(lines[5]).toBe(
      'Draft,LOT-1,47140,Lot of 2 Items,,10.00,1,,3000,"<p><b>Lot of 2 Items</b></p>\n<p>This lot includes:</p>\n<ul>\n<li>Mug</li>\n<li>Plate</li>\n</ul>\n<p>All items sold as-is.</p>",FixedPrice',
    );
  });

  it('quotes embedded quotes', () => {
    const rows = [draftRowFromItem(makeItem({ title: '12" Plate' }), settings)];
    const lines = buildDraftCsv(rows, settings).split('\r\n');
    expect(lines[5]).toBe('Draft,,47140,"12"" Plate",,0.00,1,,3000,"<p>12"" Plate</p>",FixedPrice');
  });
});

describe('buildLotDraft', () => {
  const items = [
    makeItem({ id: 1, title: 'Mug', purchasePrice: 4 }),
    makeItem({ id: 2, title: 'Plate', purchasePrice: 6 }),
  ];

  it('combines items into one row with a generated description', () => {
    const row = buildLotDraft(items, settings, { now: new Date(2025, 2, 30, 9, 5) });

    expect(row).toEqual({
      sku: 'LOT-03300905',
      categoryId: '47140',
      title: 'Lot of 2 Items',
      price: 12,
      quantity: 1,
      conditionId: 3000,
      description: [
        '<p><b>Lot of 2 Items</b></p>',
        '<p>This lot includes:</p>',
        '<ul>',
        '<li>Mug</li>',
        '<li>Plate</li>',
        '</ul>',
        '<p>All items sold as-is.</p>',
      ].join('\n'),
    });
  });

  it('takes explicit lot details', () => {
    const row = buildLotDraft(items, settings, {
      title: 'Kitchen lot',
      sku: 'LOT-1',
      price: 25,
      categoryId: '11700',
      condition: 'like new',
      description: '<p>Two pieces</p>',
    });

    expect(row).toEqual({
      sku: 'LOT-1',
      categoryId: '11700',
      title: 'Kitchen lot',
      price: 25,
      quantity: 1,
      conditionId: 2750,
      description: '<p>Two pieces</p>',
    });
  });

  it('needs at least two items', () => {
    expect(() => buildLotDraft([items[0]], settings)).toThrow('A lot listing needs at least 2 items');
  });
});

describe('writeDraftCsv', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
  });

  it('writes the rendered CSV to disk', async () => {
    dir = mkdtempSync(join(tmpdir(), 'reseller-drafts-'));
    const path = join(dir, 'drafts.csv');
    const rows = [draftRowFromItem(makeItem({ sku: 'A1' }), settings)];

    await writeDraftCsv(path, rows, settings);

    expect(readFileSync(path, 'utf-8')).toBe(buildDraftCsv(rows, settings));
  });
});
