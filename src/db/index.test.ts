import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StoreWriteFailure } from '../import/errors';
import { createDatabase } from './index';
import type { Database } from './index';

// =============================================================================
// Tests
// =============================================================================

describe('Database (in memory)', () => {
  let db: Database;

  beforeEach(async () => {
    db = await createDatabase();
  });

  afterEach(() => {
    db.close();
  });

  // -- Inventory --

  describe('Inventory', () => {
    it('inserts and reads back an item', () => {
      const inserted = db.insert({
        title: 'Blue Mug',
        sku: 'A1',
        status: 'Listed',
        quantity: 2,
        listedPrice: 12.5,
        listedDate: '2025-03-30',
        conditionId: 3000,
      });

      const found = db.getItem(inserted.id);
      expect(found).toEqual(inserted);
      expect(found).toMatchObject({
        title: 'Blue Mug',
        sku: 'A1',
        status: 'Listed',
        quantity: 2,
        listedPrice: 12.5,
        listedDate: '2025-03-30',
        conditionId: 3000,
      });
      expect(found?.soldPrice).toBeUndefined();
      expect(found?.createdAt).toBeInstanceOf(Date);
    });

    it('returns undefined for a missing item', () => {
      expect(db.getItem(42)).toBeUndefined();
    });

    it('refuses an item without a title', () => {
      expect(() => db.insert({ title: '  ', status: 'In Stock', quantity: 1 })).toThrow(StoreWriteFailure);
    });

    it('updates only the given fields', () => {
      const item = db.insert({ title: 'Lamp', sku: 'L1', status: 'In Stock', quantity: 1, purchasePrice: 4 });

      db.update(item.id, { status: 'Sold', soldPrice: 30, sku: undefined });

      expect(db.getItem(item.id)).toMatchObject({
        title: 'Lamp',
        sku: 'L1',
        status: 'Sold',
        soldPrice: 30,
        purchasePrice: 4,
      });
    });

    it('throws when updating a missing item or clearing a title', () => {
      const item = db.insert({ title: 'Lamp', status: 'In Stock', quantity: 1 });

      expect(() => db.update(99, { quantity: 2 })).toThrow('Inventory item 99 not found');
      expect(() => db.update(item.id, { title: '' })).toThrow('Cannot clear the title of an inventory item');
      expect(db.getItem(item.id)?.title).toBe('Lamp');
    });

    it('deletes an item', () => {
      const item = db.insert({ title: 'Lamp', status: 'In Stock', quantity: 1 });
      db.deleteItem(item.id);
      expect(db.getItem(item.id)).toBeUndefined();
    });
  });

  // -- Finders --

  describe('Finders', () => {
    it('returns every item sharing a sku', () => {
      db.insert({ title: 'Mug', sku: 'A1', status: 'In Stock', quantity: 1 });
      db.insert({ title: 'Mug again', sku: 'A1', status: 'In Stock', quantity: 1 });
      db.insert({ title: 'Plate', sku: 'a1', status: 'In Stock', quantity: 1 });

      expect(db.findBySku('A1').map((item) => item.title)).toEqual(['Mug', 'Mug again']);
      expect(db.findBySku('Z9')).toEqual([]);
    });

    it('matches titles by trimmed, case-folded equality and skips the excluded status', () => {
      db.insert({ title: 'Café Sign', status: 'Listed', quantity: 1 });
      db.insert({ title: 'CAFÉ SIGN', status: 'Sold', quantity: 1 });
      db.insert({ title: 'Café Sign, large', status: 'Listed', quantity: 1 });

      const found = db.findByTitleFuzzy('  CAFÉ sign ', 'Sold');
      expect(found.map((item) => item.title)).toEqual(['Café Sign']);
      expect(db.findByTitleFuzzy('café sign', 'In Stock')).toHaveLength(2);
    });

    it('matches plain ASCII titles exactly after narrowing in SQL', () => {
      db.insert({ title: '  Blue MUG\t', status: 'Listed', quantity: 1 });
      db.insert({ title: 'Blue Mug Set', status: 'Listed', quantity: 1 });
      db.insert({ title: 'blue mug', status: 'Sold', quantity: 1 });
      db.insert({ title: 'Red Mug', status: 'In Stock', quantity: 1 });

      const found = db.findByTitleFuzzy('BLUE mug', 'Sold');
      expect(found.map((item) => item.title)).toEqual(['  Blue MUG\t']);
    });

    it('finds items by item number', () => {
      db.insert({ title: 'Vase', externalItemId: '1001', status: 'Listed', quantity: 1 });
      expect(db.findByExternalItemId('1001').map((item) => item.title)).toEqual(['Vase']);
      expect(db.findByExternalItemId('1002')).toEqual([]);
    });

    it('finds sold items by order number only', () => {
      db.insert({ title: 'Teapot', orderNumber: '55-1', status: 'Sold', quantity: 1 });
      db.insert({ title: 'Kettle', orderNumber: '55-1', status: 'Listed', quantity: 1 });

      expect(db.findSoldByOrderNumber('55-1').map((item) => item.title)).toEqual(['Teapot']);
    });

    it('lists items by status and search text, newest first', () => {
      db.insert({ title: 'Blue Mug', sku: 'A1', status: 'Listed', quantity: 1 });
      db.insert({ title: 'Red Mug', sku: 'A2', status: 'Sold', quantity: 1 });
      db.insert({ title: 'Plate', sku: 'MUG-3', status: 'Listed', quantity: 1 });

      expect(db.listItems().map((item) => item.title)).toEqual(['Plate', 'Red Mug', 'Blue Mug']);
      expect(db.listItems({ status: 'Listed' }).map((item) => item.title)).toEqual(['Plate', 'Blue Mug']);
      expect(db.listItems({ search: 'mug' }).map((item) => item.title)).toEqual(['Plate', 'Red Mug', 'Blue Mug']);
      expect(db.listItems({ status: 'Sold', search: 'MUG' }).map((item) => item.title)).toEqual(['Red Mug']);
    });
  });

  // -- Transactions --

  describe('Transactions', () => {
    it('commits every write in the callback', () => {
      const count = db.transaction(() => {
        db.insert({ title: 'Mug', status: 'In Stock', quantity: 1 });
        db.insert({ title: 'Plate', status: 'In Stock', quantity: 1 });
        return 2;
      });

      expect(count).toBe(2);
      expect(db.listItems()).toHaveLength(2);
    });

    it('rolls back when the callback throws', () => {
      db.insert({ title: 'Kept', status: 'In Stock', quantity: 1 });

      expect(() =>
        db.transaction(() => {
          db.insert({ title: 'Dropped', status: 'In Stock', quantity: 1 });
          throw new Error('boom');
        }),
      ).toThrow('boom');

      expect(db.listItems().map((item) => item.title)).toEqual(['Kept']);
    });

    it('joins nested transactions to the outer one', () => {
      expect(() =>
        db.transaction(() => {
          db.transaction(() => db.insert({ title: 'Inner', status: 'In Stock', quantity: 1 }));
          throw new Error('outer failed');
        }),
      ).toThrow('outer failed');

      expect(db.listItems()).toEqual([]);
    });
  });

  // -- Raw SQL --

  describe('Raw SQL', () => {
    it('executes raw SQL with run() and reads it with query()', () => {
      db.run("INSERT INTO inventory (title, status, quantity) VALUES ('Raw Item', 'In Stock', 1)");
      const rows = db.query('SELECT title FROM inventory WHERE title = ?', ['Raw Item']);
      expect(rows).toEqual([{ title: 'Raw Item' }]);
    });
  });
});

describe('Database (on disk)', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'reseller-db-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('persists committed writes and drops rolled back ones', async () => {
    const path = join(dir, 'data', 'reseller.db');
    const first = await createDatabase({ path });
    first.insert({ title: 'Kept', status: 'In Stock', quantity: 1 });
    expect(() =>
      first.transaction(() => {
        first.insert({ title: 'Dropped', status: 'In Stock', quantity: 1 });
        throw new Error('boom');
      }),
    ).toThrow('boom');
    first.close();

    expect(existsSync(path)).toBe(true);
    const second = await createDatabase({ path });
    expect(second.listItems().map((item) => item.title)).toEqual(['Kept']);
    second.close();
  });

  it('backs up an existing file on open and prunes old backups', async () => {
    const path = join(dir, 'reseller.db');
    for (let i = 0; i < 3; i++) {
      const db = await createDatabase({ path, backupMax: 1 });
      db.close();
    }

    expect(readdirSync(join(dir, 'backups'))).toHaveLength(1);
  });
});
