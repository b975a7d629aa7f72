/**
 * CSV Parser - decode marketplace report files and split them into rows
 *
 * Handles:
 * - UTF-8 (with or without BOM), falling back to Latin-1
 * - Windows (\r\n) and Unix (\n) line endings
 * - Quoted fields with embedded delimiters, doubled quotes and newlines
 * - Blank lines before the header (order reports start with one)
 */

import { createLogger } from '../utils/logger';
import { DecodeFailure } from './errors';
import type { RawRow } from './types';

const logger = createLogger('csv-parser');

export type TextEncoding = 'utf-8' | 'latin1';

export interface DecodedText {
  text: string;
  encoding: TextEncoding;
}

const UTF8_BOM = [0xef, 0xbb, 0xbf];

function stripBom(bytes: Uint8Array): Uint8Array {
  return UTF8_BOM.every((byte, index) => bytes[index] === byte) ? bytes.subarray(UTF8_BOM.length) : bytes;
}

/**
 * Decode report bytes. A leading UTF-8 byte-order mark is dropped first, then
 * strict UTF-8 is tried; on invalid sequences the bytes are read as Latin-1.
 * Text that still contains NUL characters is not a CSV report.
 */
export function decodeCsvBuffer(bytes: Uint8Array): DecodedText {
  const body = stripBom(bytes);
  let decoded: DecodedText;
  try {
    const text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(body);
    decoded = { text, encoding: 'utf-8' };
  } catch (err) {
    logger.debug({ error: err instanceof Error ? err.message : String(err) }, 'Not valid UTF-8, decoding as Latin-1');
    decoded = { text: Buffer.from(body).toString('latin1'), encoding: 'latin1' };
  }

  if (decoded.text.includes('\u0000')) {
    throw new DecodeFailure('File is not a text report (binary content)');
  }
  return decoded;
}

// ---------------------------------------------------------------------------
// Record tokenizer
// ---------------------------------------------------------------------------

/**
 * Split CSV text into records of fields. Quotes only open at the start of a
 * field; inside quotes, `""` is a literal quote and newlines are kept.
 * Unquoted fields are trimmed.
 */
export function parseCsvRecords(text: string, delimiter = ','): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let wasQuoted = false;
  let i = 0;

  const endField = (): void => {
    fields.push(wasQuoted ? current : current.trim());
    current = '';
    wasQuoted = false;
  };
  const endRecord = (): void => {
    endField();
    records.push(fields);
    fields = [];
  };

  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      current += ch;
      i++;
      continue;
    }

    if (ch === '"' && current.trim().length === 0 && !wasQuoted) {
      inQuotes = true;
      wasQuoted = true;
      current = '';
      i++;
      continue;
    }
    if (ch === delimiter) {
      endField();
      i++;
      continue;
    }
    if (ch === '\r' || ch === '\n') {
      endRecord();
      i += ch === '\r' && text[i + 1] === '\n' ? 2 : 1;
      continue;
    }
    // Text after a closing quote is kept verbatim
    current += ch;
    i++;
  }

  if (current.length > 0 || fields.length > 0 || wasQuoted) {
    endRecord();
  }

  return records;
}

// ---------------------------------------------------------------------------
// Report reader
// ---------------------------------------------------------------------------

export interface ReportRow {
  /** 1-based position among the data rows (blank lines are not counted) */
  rowIndex: number;
  cells: RawRow;
}

export interface ParsedReport {
  headers: string[];
  rows: ReportRow[];
}

function isBlank(record: string[]): boolean {
  return record.every((field) => field.trim().length === 0);
}

/** Header text as it should be keyed: BOM removed, whitespace trimmed. */
export function cleanHeader(header: string): string {
  return header.replace(/^\uFEFF/, '').trim();
}

/**
 * Split decoded report text into its header and keyed data rows.
 * When a header repeats, the first column carrying it wins.
 */
export function readReport(text: string, delimiter = ','): ParsedReport {
  const records = parseCsvRecords(text, delimiter);
  const headerIndex = records.findIndex((record) => !isBlank(record));
  if (headerIndex === -1) {
    return { headers: [], rows: [] };
  }

  const headers = records[headerIndex].map(cleanHeader);
  const rows: ReportRow[] = [];
  let rowIndex = 0;

  for (const record of records.slice(headerIndex + 1)) {
    if (isBlank(record)) continue;
    rowIndex++;

    const cells = new Map<string, string>();
    headers.forEach((header, column) => {
      if (header.length === 0 || cells.has(header)) return;
      cells.set(header, record[column] ?? '');
    });
    rows.push({ rowIndex, cells });
  }

  logger.debug({ columns: headers.length, rows: rows.length }, 'Read CSV report');
  return { headers, rows };
}
