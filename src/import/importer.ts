/**
 * Import orchestrator - marketplace report file in, ImportReport out
 *
 * decode -> read rows -> classify -> normalize -> reconcile. Nothing in here
 * throws to the caller: an unreadable or unrecognized file is reported as the
 * report's top-level `error`, and row failures are counted per row.
 */

import { readFile } from 'fs/promises';
import { createLogger } from '../utils/logger';
import { classifyReport } from './classifier';
import { decodeCsvBuffer, readReport } from './csv-parser';
import { ClassificationFailure, ImportError } from './errors';
import { normalizeRow, resolveColumns } from './normalizer';
import { reconcileRecords } from './reconciler';
import type {
  ImportOptions,
  ImportReport,
  InventoryStore,
  NormalizedRecord,
  ReportKind,
  RowOutcome,
} from './types';

const logger = createLogger('import');

function emptyReport(reportKind: ReportKind, dryRun: boolean): ImportReport {
  return {
    reportKind,
    totalRows: 0,
    inserted: 0,
    updated: 0,
    skippedDuplicate: 0,
    skippedInvalid: 0,
    errored: 0,
    errors: [],
    warnings: [],
    dryRun,
    outcomes: [],
  };
}

function failedReport(err: unknown, dryRun: boolean): ImportReport {
  const report = emptyReport('Unrecognized', dryRun);
  report.error = err instanceof Error ? err.message : String(err);
  logger.warn(
    { code: err instanceof ImportError ? err.code : undefined, error: report.error },
    'Import failed',
  );
  return report;
}

/** Tally outcomes into the report and collect row errors. */
function summarize(report: ImportReport, outcomes: RowOutcome[]): void {
  for (const row of outcomes) {
    const { outcome } = row;
    switch (outcome.kind) {
      case 'Inserted':
        report.inserted++;
        break;
      case 'Updated':
        report.updated++;
        break;
      case 'SkippedDuplicate':
        report.skippedDuplicate++;
        break;
      case 'SkippedInvalid':
        report.skippedInvalid++;
        report.errors.push({ rowIndex: row.rowIndex, message: outcome.reason, code: 'ROW_INVALID' });
        break;
      case 'Errored':
        report.errored++;
        report.errors.push({ rowIndex: row.rowIndex, message: outcome.reason, code: outcome.code });
        break;
    }
  }
  report.outcomes = outcomes;
}

/**
 * Run the import pipeline over already-decoded report text.
 */
export function importCsvText(
  store: InventoryStore,
  text: string,
  options: ImportOptions = {},
): ImportReport {
  const dryRun = options.dryRun === true;
  const { headers, rows } = readReport(text, options.delimiter);
  const classification = classifyReport(headers, rows[0]?.cells);

  if (classification.kind === 'Unrecognized') {
    return failedReport(
      new ClassificationFailure(classification.reason ?? 'Unrecognized report'),
      dryRun,
    );
  }

  const kind = classification.kind;
  const report = emptyReport(kind, dryRun);
  report.totalRows = rows.length;

  const columns = resolveColumns(options.mappings);
  const records: NormalizedRecord[] = rows.map((row) => normalizeRow(row, kind, columns));
  for (const record of records) {
    if (record.type !== 'rejected') report.warnings.push(...record.warnings);
  }

  logger.info({ kind, rows: rows.length, dryRun }, 'Importing report');

  let outcomes: RowOutcome[];
  try {
    outcomes = dryRun
      ? reconcileRecords(store, records, { dryRun })
      : store.transaction(() => reconcileRecords(store, records));
  } catch (err) {
    // The transaction rolled back, so no row was applied
    const failed = failedReport(err, dryRun);
    failed.reportKind = kind;
    failed.totalRows = rows.length;
    failed.warnings = report.warnings;
    return failed;
  }

  summarize(report, outcomes);

  logger.info(
    {
      kind,
      inserted: report.inserted,
      updated: report.updated,
      skippedDuplicate: report.skippedDuplicate,
      skippedInvalid: report.skippedInvalid,
      errored: report.errored,
      dryRun,
    },
    'Import complete',
  );
  return report;
}

/**
 * Import a marketplace report file into `store`.
 */
export async function importFile(
  store: InventoryStore,
  path: string,
  options: ImportOptions = {},
): Promise<ImportReport> {
  const dryRun = options.dryRun === true;

  let text: string;
  try {
    const bytes = await readFile(path);
    const decoded = decodeCsvBuffer(bytes);
    logger.debug({ path, encoding: decoded.encoding, bytes: bytes.length }, 'Decoded report file');
    text = decoded.text;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return failedReport(
      err instanceof ImportError ? err : new ClassificationFailure(`Cannot read ${path}: ${message}`),
      dryRun,
    );
  }

  return importCsvText(store, text, options);
}
