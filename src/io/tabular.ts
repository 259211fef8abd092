// ---------------------------------------------------------------------------
// Tabular file adapters
//
// Reads and writes header-row tables as CSV (csv-parse / csv-stringify) or as
// XLSX workbooks (exceljs), selected by file extension.  Only the first
// worksheet of a workbook is read.
// ---------------------------------------------------------------------------

import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { Workbook } from 'exceljs';
import type { CellValue, Worksheet } from 'exceljs';
import { TabularSourceError } from '../inventory/errors';
import type { TabularRow } from '../config/mapping';

export type TabularFormat = 'csv' | 'xlsx';

export function formatForPath(filePath: string): TabularFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.csv' || ext === '.txt') return 'csv';
  if (ext === '.xlsx' || ext === '.xlsm') return 'xlsx';
  throw new TabularSourceError(`unsupported table format '${ext || '(none)'}'`, filePath);
}

// ---------------------------------------------------------------------------
// Read
// ---------------------------------------------------------------------------

export async function readTable(filePath: string): Promise<TabularRow[]> {
  if (formatForPath(filePath) === 'xlsx') return readWorkbookTable(filePath);
  return parseCsvTable(await fs.readFile(filePath, 'utf8'));
}

export function parseCsvTable(input: string): TabularRow[] {
  const rows: unknown = parse(input, {
    bom: true,
    columns: (header: string[]) => header.map((h) => h.trim()),
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return Array.isArray(rows) ? rows.filter(isTabularRow) : [];
}

function isTabularRow(value: unknown): value is TabularRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}

async function readWorkbookTable(filePath: string): Promise<TabularRow[]> {
  const workbook = new Workbook();
  await workbook.xlsx.readFile(filePath);

  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new TabularSourceError('workbook has no worksheets', filePath);
  }

  const headers = headerNames(sheet);
  const rows: TabularRow[] = [];

  sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    if (rowNumber === 1) return;
    const out: TabularRow = {};
    headers.forEach((header, colNumber) => {
      if (!header) return;
      out[header] = cellText(row.getCell(colNumber).value);
    });
    if (Object.values(out).some((v) => v.trim() !== '')) rows.push(out);
  });

  return rows;
}

// Sparse: index = 1-based column number.
function headerNames(sheet: Worksheet): string[] {
  const headers: string[] = [];
  sheet.getRow(1).eachCell({ includeEmpty: true }, (cell, colNumber) => {
    headers[colNumber] = cellText(cell.value).trim();
  });
  return headers;
}

/**
 * Render a cell as the text a CSV export of the sheet would carry.  Date cells
 * come back from exceljs as UTC instants holding the sheet's wall-clock time,
 * so they are formatted from their UTC parts.
 */
export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatSheetDate(value);
  if (typeof value === 'object') {
    if ('richText' in value) return value.richText.map((run) => run.text).join('');
    if ('text' in value) return String(value.text);
    if ('result' in value) return value.result === undefined ? '' : cellText(value.result);
    if ('error' in value) return value.error;
    return '';
  }
  return String(value);
}

function formatSheetDate(date: Date): string {
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  return `${date.getUTCMonth() + 1}/${date.getUTCDate()}/${date.getUTCFullYear()} ${date.getUTCHours()}:${minutes}`;
}

// ---------------------------------------------------------------------------
// Write
// ---------------------------------------------------------------------------

export async function writeTable(
  filePath: string,
  columns: readonly string[],
  rows: readonly TabularRow[],
): Promise<void> {
  const format = formatForPath(filePath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  if (format === 'csv') {
    await fs.writeFile(filePath, formatCsvTable(columns, rows), 'utf8');
    return;
  }

  const workbook = new Workbook();
  const sheet = workbook.addWorksheet(path.basename(filePath, path.extname(filePath)).slice(0, 31));
  sheet.columns = columns.map((header) => ({ header, key: header }));
  for (const row of rows) {
    sheet.addRow(columns.map((column) => row[column] ?? ''));
  }
  await workbook.xlsx.writeFile(filePath);
}

export function formatCsvTable(columns: readonly string[], rows: readonly TabularRow[]): string {
  return stringify(
    rows.map((row) => columns.map((column) => row[column] ?? '')),
    { header: true, columns: [...columns] },
  );
}
