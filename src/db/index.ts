/**
 * Database - SQLite (sql.js WASM) for local persistence
 *
 * In-memory WASM database that saves to disk after every mutation (or once at
 * commit when inside a transaction). Creates a backup on open.
 */

import initSqlJs from 'sql.js';
import type { SqlValue } from 'sql.js';
import { dirname, join, basename } from 'path';
import {
  mkdirSync,
  existsSync,
  readFileSync,
  writeFileSync,
  renameSync,
  readdirSync,
  statSync,
  unlinkSync,
} from 'fs';
import { createLogger } from '../utils/logger';
import { titleKey } from '../import/fields';
import { StoreWriteFailure } from '../import/errors';
import type { InventoryStore } from '../import/types';
import type {
  InventoryItem,
  InventoryPatch,
  ItemStatus,
  NewInventoryItem,
} from '../types';
import { isItemStatus } from '../types';

const logger = createLogger('db');

type SqlParams = SqlValue[];
type SqlRow = Record<string, SqlValue>;

// ---------------------------------------------------------------------------
// Database interface
// ---------------------------------------------------------------------------

export interface ListItemsFilter {
  status?: ItemStatus;
  /** Case-insensitive substring of title or sku */
  search?: string;
}

export interface Database extends InventoryStore {
  close(): void;
  save(): void;

  // Raw SQL access
  run(sql: string, params?: SqlParams): void;
  query(sql: string, params?: SqlParams): SqlRow[];

  getItem(id: number): InventoryItem | undefined;
  listItems(filter?: ListItemsFilter): InventoryItem[];
  deleteItem(id: number): void;
}

export interface DatabaseOptions {
  /** Database file. Omit for a purely in-memory database (nothing is written). */
  path?: string;
  /** Backups kept beside the file; older ones are pruned */
  backupMax?: number;
}

// ---------------------------------------------------------------------------
// Schema DDL
// ---------------------------------------------------------------------------

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS inventory (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    sku TEXT,
    item_number TEXT,
    condition TEXT,
    condition_id INTEGER,
    listed_price REAL,
    listed_date TEXT,
    status TEXT NOT NULL DEFAULT 'In Stock',
    sold_price REAL,
    sold_date TEXT,
    quantity INTEGER NOT NULL DEFAULT 1,
    order_number TEXT,
    upc TEXT,
    category_id TEXT,
    image_url TEXT,
    description TEXT,
    purchase_price REAL,
    created_at INTEGER DEFAULT (strftime('%s','now') * 1000),
    updated_at INTEGER DEFAULT (strftime('%s','now') * 1000)
  );

  CREATE INDEX IF NOT EXISTS idx_inventory_sku ON inventory(sku);
  CREATE INDEX IF NOT EXISTS idx_inventory_item_number ON inventory(item_number);
  CREATE INDEX IF NOT EXISTS idx_inventory_order_number ON inventory(order_number);
  CREATE INDEX IF NOT EXISTS idx_inventory_status ON inventory(status);
`;

const ASCII_ONLY = /^[\x00-\x7f]*$/;

// Writable fields and their columns, in insert order
const FIELD_COLUMNS: ReadonlyArray<readonly [keyof NewInventoryItem, string]> = [
  ['title', 'title'],
  ['sku', 'sku'],
  ['externalItemId', 'item_number'],
  ['condition', 'condition'],
  ['conditionId', 'condition_id'],
  ['listedPrice', 'listed_price'],
  ['listedDate', 'listed_date'],
  ['status', 'status'],
  ['soldPrice', 'sold_price'],
  ['soldDate', 'sold_date'],
  ['quantity', 'quantity'],
  ['orderNumber', 'order_number'],
  ['upc', 'upc'],
  ['categoryId', 'category_id'],
  ['imageUrl', 'image_url'],
  ['description', 'description'],
  ['purchasePrice', 'purchase_price'],
];

// ---------------------------------------------------------------------------
// Row parsing
// ---------------------------------------------------------------------------

function text(row: SqlRow, column: string): string | undefined {
  const value = row[column];
  if (value === null || value === undefined) return undefined;
  return typeof value === 'string' ? value : String(value);
}

function num(row: SqlRow, column: string): number | undefined {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

function parseItem(row: SqlRow): InventoryItem {
  const status = text(row, 'status');
  return {
    id: num(row, 'id') ?? 0,
    title: text(row, 'title') ?? '',
    sku: text(row, 'sku'),
    externalItemId: text(row, 'item_number'),
    condition: text(row, 'condition'),
    conditionId: num(row, 'condition_id'),
    listedPrice: num(row, 'listed_price'),
    listedDate: text(row, 'listed_date'),
    status: isItemStatus(status) ? status : 'In Stock',
    soldPrice: num(row, 'sold_price'),
    soldDate: text(row, 'sold_date'),
    quantity: num(row, 'quantity') ?? 1,
    orderNumber: text(row, 'order_number'),
    upc: text(row, 'upc'),
    categoryId: text(row, 'category_id'),
    imageUrl: text(row, 'image_url'),
    description: text(row, 'description'),
    purchasePrice: num(row, 'purchase_price'),
    createdAt: new Date(num(row, 'created_at') ?? 0),
    updatedAt: new Date(num(row, 'updated_at') ?? 0),
  };
}

// ---------------------------------------------------------------------------
// createDatabase
// ---------------------------------------------------------------------------

/**
 * Open (or create) the inventory database and return a handle.
 */
export async function createDatabase(options: DatabaseOptions = {}): Promise<Database> {
  const { path: dbFile, backupMax = 10 } = options;

  if (dbFile && !existsSync(dirname(dbFile))) {
    mkdirSync(dirname(dbFile), { recursive: true });
  }

  logger.info(`Opening database: ${dbFile ?? ':memory:'}`);

  // Initialize sql.js WASM
  const SQL = await initSqlJs();
  const existed = dbFile !== undefined && existsSync(dbFile);
  const db = dbFile !== undefined && existed ? new SQL.Database(readFileSync(dbFile)) : new SQL.Database();

  db.run(SCHEMA_SQL);

  let transactionDepth = 0;

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  function saveDb(): void {
    if (!dbFile || transactionDepth > 0) return;
    const tmpPath = dbFile + '.tmp';
    writeFileSync(tmpPath, Buffer.from(db.export()));
    renameSync(tmpPath, dbFile);
  }

  const backupDir = dbFile ? join(dirname(dbFile), 'backups') : undefined;

  function pruneBackups(dir: string): void {
    const files = readdirSync(dir)
      .filter((name) => name.endsWith('.db'))
      .map((name) => ({ name, path: join(dir, name), mtimeMs: statSync(join(dir, name)).mtimeMs }))
      .sort((a, b) => b.mtimeMs - a.mtimeMs);
    for (const file of files.slice(Math.max(1, backupMax))) {
      try {
        unlinkSync(file.path);
      } catch (error) {
        logger.warn({ error, file: file.name }, 'Failed to delete old backup');
      }
    }
  }

  function createBackup(): void {
    if (!dbFile || !backupDir) return;
    if (!existsSync(backupDir)) {
      mkdirSync(backupDir, { recursive: true });
    }
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const stem = basename(dbFile, '.db');
    writeFileSync(join(backupDir, `${stem}-${timestamp}.db`), Buffer.from(db.export()));
    pruneBackups(backupDir);
  }

  function getAll(sql: string, params: SqlParams = []): SqlRow[] {
    const stmt = db.prepare(sql);
    try {
      stmt.bind(params);
      const results: SqlRow[] = [];
      while (stmt.step()) {
        results.push(stmt.getAsObject());
      }
      return results;
    } finally {
      stmt.free();
    }
  }

  function getOne(sql: string, params: SqlParams = []): SqlRow | undefined {
    return getAll(sql, params)[0];
  }

  function write(sql: string, params: SqlParams): void {
    try {
      db.run(sql, params);
    } catch (err) {
      throw new StoreWriteFailure(`Inventory write failed: ${err instanceof Error ? err.message : String(err)}`, err);
    }
  }

  function toSqlValue(value: string | number | undefined): SqlValue {
    return value === undefined ? null : value;
  }

  // -------------------------------------------------------------------------
  // Startup backup
  // -------------------------------------------------------------------------

  if (existed) {
    try {
      createBackup();
      logger.info('Created startup backup');
    } catch (err) {
      logger.warn({ error: err }, 'Failed to create startup backup');
    }
  }

  saveDb();

  // -------------------------------------------------------------------------
  // Build Database instance
  // -------------------------------------------------------------------------

  const instance: Database = {
    // -- Lifecycle --

    close() {
      saveDb();
      db.close();
    },

    save() {
      saveDb();
    },

    // -- Raw SQL --

    run(sql: string, params: SqlParams = []): void {
      db.run(sql, params);
      saveDb();
    },

    query(sql: string, params: SqlParams = []): SqlRow[] {
      return getAll(sql, params);
    },

    transaction<T>(fn: () => T): T {
      if (transactionDepth > 0) {
        // Nested calls join the outer transaction
        return fn();
      }
      db.run('BEGIN');
      transactionDepth++;
      let committed = false;
      try {
        const result = fn();
        db.run('COMMIT');
        committed = true;
        return result;
      } finally {
        transactionDepth--;
        if (committed) {
          saveDb();
        } else {
          db.run('ROLLBACK');
          logger.warn('Transaction rolled back');
        }
      }
    },

    // -- Inventory --

    getItem(id: number): InventoryItem | undefined {
      const row = getOne('SELECT * FROM inventory WHERE id = ?', [id]);
      return row ? parseItem(row) : undefined;
    },

    listItems(filter: ListItemsFilter = {}): InventoryItem[] {
      const clauses: string[] = [];
      const params: SqlParams = [];
      if (filter.status) {
        clauses.push('status = ?');
        params.push(filter.status);
      }
      if (filter.search && filter.search.trim().length > 0) {
        clauses.push('(LOWER(title) LIKE ? OR LOWER(sku) LIKE ?)');
        const like = `%${filter.search.trim().toLowerCase()}%`;
        params.push(like, like);
      }
      const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
      return getAll(`SELECT * FROM inventory${where} ORDER BY id DESC`, params).map(parseItem);
    },

    deleteItem(id: number): void {
      instance.run('DELETE FROM inventory WHERE id = ?', [id]);
    },

    findBySku(sku: string): InventoryItem[] {
      return getAll('SELECT * FROM inventory WHERE sku = ? ORDER BY id', [sku]).map(parseItem);
    },

    findByTitleFuzzy(title: string, excludeStatus: ItemStatus): InventoryItem[] {
      // SQLite's LOWER() only folds ASCII: SQL narrows the candidates for
      // ASCII keys, the exact comparison happens here
      const key = titleKey(title);
      const rows = ASCII_ONLY.test(key)
        ? getAll(
            'SELECT * FROM inventory WHERE status != ? AND instr(LOWER(title), ?) > 0 ORDER BY id',
            [excludeStatus, key],
          )
        : getAll('SELECT * FROM inventory WHERE status != ? ORDER BY id', [excludeStatus]);
      return rows.map(parseItem).filter((item) => titleKey(item.title) === key);
    },

    findByExternalItemId(externalItemId: string): InventoryItem[] {
      return getAll('SELECT * FROM inventory WHERE item_number = ? ORDER BY id', [externalItemId]).map(parseItem);
    },

    findSoldByOrderNumber(orderNumber: string): InventoryItem[] {
      return getAll(
        "SELECT * FROM inventory WHERE order_number = ? AND status = 'Sold' ORDER BY id",
        [orderNumber],
      ).map(parseItem);
    },

    insert(record: NewInventoryItem): InventoryItem {
      if (record.title.trim().length === 0) {
        throw new StoreWriteFailure('Cannot insert an inventory item without a title');
      }
      const now = Date.now();
      const columns = FIELD_COLUMNS.map(([, column]) => column);
      const values = FIELD_COLUMNS.map(([field]) => toSqlValue(record[field]));
      write(
        `INSERT INTO inventory (${columns.join(', ')}, created_at, updated_at)
         VALUES (${columns.map(() => '?').join(', ')}, ?, ?)`,
        [...values, now, now],
      );
      const idRow = getOne('SELECT last_insert_rowid() AS id');
      const id = idRow ? num(idRow, 'id') : undefined;
      saveDb();

      const inserted = id === undefined ? undefined : instance.getItem(id);
      if (!inserted) {
        throw new StoreWriteFailure('Inserted inventory item could not be read back');
      }
      return inserted;
    },

    update(id: number, fields: InventoryPatch): void {
      const setClauses: string[] = [];
      const params: SqlParams = [];

      for (const [field, column] of FIELD_COLUMNS) {
        const value = fields[field];
        if (value === undefined) continue;
        setClauses.push(`${column} = ?`);
        params.push(value);
      }

      if (fields.title !== undefined && fields.title.trim().length === 0) {
        throw new StoreWriteFailure('Cannot clear the title of an inventory item');
      }

      setClauses.push('updated_at = ?');
      params.push(Date.now(), id);

      write(`UPDATE inventory SET ${setClauses.join(', ')} WHERE id = ?`, params);
      if (db.getRowsModified() === 0) {
        throw new StoreWriteFailure(`Inventory item ${id} not found`);
      }
      saveDb();
    },
  };

  return instance;
}
