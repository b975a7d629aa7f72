#!/usr/bin/env node
/**
 * Reseller Ledger CLI
 *
 * Commands:
 * - reseller import <file>    - Import a listing or order report
 * - reseller inventory        - List stored items
 * - reseller drafts <out>     - Write a draft listing CSV
 */

import { Command } from 'commander';
import { createDatabase } from '../db/index';
import type { Database } from '../db/index';
import { importFile } from '../import/importer';
import type { ImportReport } from '../import/types';
import { buildLotDraft, draftRowFromItem, writeDraftCsv } from '../listing/drafts';
import { isItemStatus, ITEM_STATUSES } from '../types';
import type { InventoryItem } from '../types';
import { loadConfig } from '../utils/config';
import type { Config } from '../utils/config';
import { logger } from '../utils/logger';

const program = new Command();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});
process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception');
  process.exit(1);
});

program
  .name('reseller')
  .description('Marketplace report import and inventory bookkeeping')
  .version('0.1.0');

async function withDatabase<T>(config: Config, fn: (db: Database) => Promise<T> | T): Promise<T> {
  const db = await createDatabase({ path: config.database.path, backupMax: config.database.backupMax });
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

function formatPrice(value: number | undefined): string {
  return value === undefined ? '-' : `$${value.toFixed(2)}`;
}

function printReport(path: string, report: ImportReport): void {
  if (report.error) {
    console.error(`\n  \x1b[31mError:\x1b[0m ${report.error}\n`);
    return;
  }

  const mode = report.dryRun ? ' \x1b[33m(dry run, nothing written)\x1b[0m' : '';
  console.log(`\n\x1b[1m${path}\x1b[0m${mode}\n`);
  console.log(`  Report:     ${report.reportKind} (${report.totalRows} rows)`);
  console.log(`  Inserted:   ${report.inserted}`);
  console.log(`  Updated:    ${report.updated}`);
  console.log(`  Duplicates: ${report.skippedDuplicate}`);
  console.log(`  Invalid:    ${report.skippedInvalid}`);
  console.log(`  Errored:    ${report.errored}`);

  if (report.errors.length > 0) {
    console.log('\n  Row errors:');
    for (const error of report.errors) {
      console.log(`    Row ${error.rowIndex}: ${error.message}`);
    }
  }
  if (report.warnings.length > 0) {
    console.log('\n  Warnings:');
    for (const warning of report.warnings) {
      console.log(`    ${warning.message}`);
    }
  }
  console.log('');
}

// ============================================================================
// import - Import a marketplace report
// ============================================================================
program
  .command('import')
  .description('Import a listing export or order export CSV')
  .argument('<file>', 'Report file')
  .option('--dry-run', 'Show what would change without writing')
  .option('--json', 'Print the full report as JSON')
  .option('--delimiter <char>', 'Field delimiter (default: import.delimiter from config)')
  .action(async (file: string, options: { dryRun?: boolean; json?: boolean; delimiter?: string }) => {
    const config = loadConfig();
    const delimiter = options.delimiter ?? config.import.delimiter;
    if (delimiter.length !== 1) {
      console.error(`Delimiter must be a single character, got "${delimiter}"`);
      process.exitCode = 1;
      return;
    }
    const report = await withDatabase(config, (db) =>
      importFile(db, file, { dryRun: options.dryRun, delimiter, mappings: config.import.mappings }),
    );

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(file, report);
    }
    if (report.error) process.exitCode = 1;
  });

// ============================================================================
// inventory - List stored items
// ============================================================================
program
  .command('inventory')
  .description('List inventory items')
  .option('--status <status>', `Only items with this status (${ITEM_STATUSES.join(', ')})`)
  .option('--search <text>', 'Only items whose title or sku contains this text')
  .action(async (options: { status?: string; search?: string }) => {
    const { status, search } = options;
    if (status !== undefined && !isItemStatus(status)) {
      console.error(`\n  \x1b[31mError:\x1b[0m Unknown status "${status}". Use one of: ${ITEM_STATUSES.join(', ')}\n`);
      process.exitCode = 1;
      return;
    }

    const config = loadConfig();
    const items = await withDatabase(config, (db) => db.listItems({ status, search }));

    if (items.length === 0) {
      console.log('\n  No items found.\n');
      return;
    }

    console.log('');
    for (const item of items) {
      const price = item.status === 'Sold' ? item.soldPrice : item.listedPrice;
      console.log(
        `  #${String(item.id).padEnd(5)} ${item.status.padEnd(9)} ${(item.sku ?? '-').padEnd(12)} ${formatPrice(price).padStart(10)}  ${item.title}`,
      );
    }
    console.log(`\n  ${items.length} item(s)\n`);
  });

// ============================================================================
// drafts - Write a draft listing CSV
// ============================================================================
program
  .command('drafts')
  .description('Write a draft listing CSV for unsold items')
  .argument('<out>', 'Output CSV path')
  .option('--sku <sku...>', 'Only these skus (default: every In Stock and Listed item)')
  .option('--category <id>', 'Category ID for items without one')
  .option('--lot', 'Combine the items into one lot listing')
  .option('--title <title>', 'Lot title')
  .option('--price <price>', 'Lot price')
  .action(async (out: string, options: {
    sku?: string[];
    category?: string;
    lot?: boolean;
    title?: string;
    price?: string;
  }) => {
    const config = loadConfig();
    const settings = { ...config.drafts };
    if (options.category) settings.defaultCategoryId = options.category;

    const lotPrice = options.price === undefined ? undefined : Number.parseFloat(options.price);
    if (lotPrice !== undefined && (!Number.isFinite(lotPrice) || lotPrice < 0)) {
      console.error(`\n  \x1b[31mError:\x1b[0m Invalid price "${options.price}"\n`);
      process.exitCode = 1;
      return;
    }

    const items = await withDatabase(config, (db): InventoryItem[] => {
      if (options.sku && options.sku.length > 0) {
        return options.sku.flatMap((sku) => {
          const found = db.findBySku(sku);
          if (found.length === 0) logger.warn({ sku }, 'No item with this sku');
          return found;
        });
      }
      return [...db.listItems({ status: 'In Stock' }), ...db.listItems({ status: 'Listed' })];
    });

    if (items.length === 0) {
      console.log('\n  No items to write.\n');
      return;
    }

    try {
      const rows = options.lot
        ? [buildLotDraft(items, settings, { title: options.title, price: lotPrice })]
        : items.map((item) => draftRowFromItem(item, settings));
      await writeDraftCsv(out, rows, settings);
      console.log(`\n  Wrote ${rows.length} draft listing(s) to ${out}\n`);
    } catch (err) {
      console.error(`\n  \x1b[31mError:\x1b[0m ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((err: unknown) => {
  logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Command failed');
  process.exit(1);
});
