import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { defaultConfig, loadConfig, resolveConfigPath, resolveStateDir } from './config';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'reseller-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('resolves the state dir and config path from the environment', () => {
    expect(resolveStateDir({ RESELLER_STATE_DIR: dir })).toBe(dir);
    expect(resolveConfigPath({ RESELLER_STATE_DIR: dir })).toBe(join(dir, 'reseller.json'));
    expect(resolveConfigPath({ RESELLER_CONFIG_PATH: join(dir, 'other.json') })).toBe(join(dir, 'other.json'));
  });

  it('uses defaults when there is no config file', () => {
    const config = loadConfig(undefined, { RESELLER_STATE_DIR: dir });

    expect(config).toEqual({
      database: { path: join(dir, 'reseller.db'), backupMax: 10 },
      drafts: {
        defaultCategoryId: '47140',
        defaultConditionId: 3000,
        format: 'FixedPrice',
        template: 'eBay-draft-listings-template_US',
      },
      import: { delimiter: ',', mappings: { listing: {}, order: {} } },
    });
  });

  it('merges the file over defaults and substitutes variables', () => {
    writeFileSync(
      join(dir, 'reseller.json'),
      JSON.stringify({
        database: { path: '${DATA_DIR}/ledger.db', backupMax: 3 },
        drafts: { defaultCategoryId: '11450' },
      }),
    );

    const config = loadConfig(undefined, { RESELLER_STATE_DIR: dir, DATA_DIR: dir });

    expect(config.database).toEqual({ path: join(dir, 'ledger.db'), backupMax: 3 });
    expect(config.drafts.defaultCategoryId).toBe('11450');
    expect(config.drafts.format).toBe('FixedPrice');
  });

  it('reads import settings with array or pipe-separated header lists', () => {
    writeFileSync(
      join(dir, 'reseller.json'),
      JSON.stringify({
        import: {
          delimiter: ';',
          mappings: {
            listing: { sku: ['Artikelnummer', ' SKU '] },
            order: { soldPrice: 'Total Price|Sale Price' },
          },
        },
      }),
    );

    const config = loadConfig(undefined, { RESELLER_STATE_DIR: dir });

    expect(config.import).toEqual({
      delimiter: ';',
      mappings: {
        listing: { sku: ['Artikelnummer', 'SKU'] },
        order: { soldPrice: ['Total Price', 'Sale Price'] },
      },
    });
  });

  it('rejects a quote as delimiter', () => {
    const path = join(dir, 'quote.json');
    writeFileSync(path, JSON.stringify({ import: { delimiter: '"' } }));

    expect(loadConfig(path, { RESELLER_STATE_DIR: dir }).import.delimiter).toBe(',');
  });

  it('falls back to defaults for an invalid file', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, JSON.stringify({ drafts: { defaultConditionId: 'abc' } }));

    expect(loadConfig(path, { RESELLER_STATE_DIR: dir })).toEqual(defaultConfig({ RESELLER_STATE_DIR: dir }));
  });

  it('falls back to defaults for unparseable JSON', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ not json');

    expect(loadConfig(path, { RESELLER_STATE_DIR: dir }).drafts.defaultCategoryId).toBe('47140');
  });
});
