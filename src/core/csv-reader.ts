import { readFile } from 'node:fs/promises';
import Papa, { type ParseError } from 'papaparse';
import { CSV_COLUMNS, DEFAULT_STATUS } from '../constants.js';
import type { CsvReadResult, CsvRow, SkippedRow } from '../types/csv.js';
import { logger } from '../utils/logger.js';

export interface CsvReadOptions {
  defaultStatus?: string;
}

type RawRecord = Record<string, string | undefined>;

/**
 * Split a comma-separated label cell. Labels are trimmed, empties dropped and
 * case-insensitive duplicates collapsed (first spelling wins).
 */
export function splitLabels(cell: string | undefined): string[] {
  if (!cell) return [];
  const seen = new Set<string>();
  const labels: string[] = [];
  for (const part of cell.split(',')) {
    const label = part.trim();
    const key = label.toLowerCase();
    if (!label || seen.has(key)) continue;
    seen.add(key);
    labels.push(label);
  }
  return labels;
}

/**
 * Data row number of a parser error. Quote errors index rows as read, with
 * the header at 0; field-count errors index data rows from 0.
 */
function errorRow(err: ParseError): number | undefined {
  if (err.row === undefined) return undefined;
  return err.type === 'Quotes' ? err.row : err.row + 1;
}

function cell(record: RawRecord, column: string): string {
  return (record[column] ?? '').trim();
}

/**
 * Parse CSV text with a header row into import rows.
 * Rows without a title are reported in `skipped` instead of `rows`.
 */
export function parseCsvContent(content: string, options: CsvReadOptions = {}): CsvReadResult {
  const defaultStatus = options.defaultStatus?.trim() || DEFAULT_STATUS;

  const parsed = Papa.parse<RawRecord>(content.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: true,
  });

  for (const err of parsed.errors) {
    const row = errorRow(err);
    const where = row !== undefined ? `Row ${row}: ` : '';
    logger.warn(`CSV ${where}${err.message}`);
  }

  const headers = parsed.meta.fields ?? [];
  if (headers.length > 0 && !headers.includes(CSV_COLUMNS.title)) {
    logger.warn(`CSV has no '${CSV_COLUMNS.title}' column. Found: ${headers.join(', ')}`);
  }

  const rows: CsvRow[] = [];
  const skipped: SkippedRow[] = [];

  parsed.data.forEach((record, index) => {
    const row = index + 1;
    const title = cell(record, CSV_COLUMNS.title);
    if (!title) {
      logger.info(`Skipping row ${row} without Title`);
      skipped.push({ row, reason: 'missing title' });
      return;
    }

    rows.push({
      row,
      title,
      body: cell(record, CSV_COLUMNS.body),
      labels: splitLabels(record[CSV_COLUMNS.labels]),
      status: cell(record, CSV_COLUMNS.status) || defaultStatus,
    });
  });

  return { rows, skipped };
}

export async function readCsvRows(filePath: string, options: CsvReadOptions = {}): Promise<CsvReadResult> {
  const content = await readFile(filePath, 'utf-8');
  logger.debug(`Read ${content.length} characters from ${filePath}`);
  return parseCsvContent(content, options);
}
