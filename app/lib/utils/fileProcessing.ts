import fs from 'fs';
import path from 'path';
import * as XLSX from 'xlsx';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { FileProcessingError, errorMessage } from '../errors';
import type { CellValue, RawRow, TabularData } from '../types';

export type TabularFileFormat = 'xlsx' | 'xls' | 'csv';

const RESULT_SHEET_NAME = 'Reconciliation';

/**
 * Get file format from the extension
 */
export function detectFileFormat(filePath: string): TabularFileFormat | null {
  const ext = path.extname(filePath).toLowerCase();

  if (ext === '.xlsx') return 'xlsx';
  if (ext === '.xls') return 'xls';
  if (ext === '.csv') return 'csv';

  return null;
}

/**
 * Input must exist, be a readable file, and have a supported extension.
 */
export function validateInputFile(filePath: string): TabularFileFormat {
  if (!fs.existsSync(filePath)) {
    throw new FileProcessingError(`File does not exist: ${filePath}`, filePath);
  }

  try {
    fs.accessSync(filePath, fs.constants.R_OK);
  } catch (error) {
    throw new FileProcessingError(`File is not readable: ${filePath}`, filePath, { cause: error });
  }

  if (!fs.statSync(filePath).isFile()) {
    throw new FileProcessingError(`Not a file: ${filePath}`, filePath);
  }

  const format = detectFileFormat(filePath);
  if (!format) {
    throw new FileProcessingError(`Unsupported file type (expected .xlsx, .xls or .csv): ${filePath}`, filePath);
  }
  return format;
}

function toCellValue(value: unknown): CellValue {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  return null;
}

function isBlankCell(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Header row → unique header names. Blank headers get a positional name and
 * repeated headers a numeric suffix, so no column is lost.
 */
function uniqueHeaders(headerRow: unknown[]): string[] {
  const seen = new Map<string, number>();

  return headerRow.map((cell, index) => {
    const base = isBlankCell(cell) ? `Column${index + 1}` : String(cell).trim();
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}_${count}`;
  });
}

function toMatrix(value: unknown): unknown[][] {
  if (!Array.isArray(value)) {
    throw new Error('Parsed content is not a table');
  }
  return value.map((row: unknown) => (Array.isArray(row) ? row : []));
}

/**
 * First row is the header row; fully blank data rows are dropped.
 */
export function tableFromMatrix(matrix: unknown[][]): TabularData {
  if (matrix.length === 0) {
    return { headers: [], rows: [] };
  }

  const headers = uniqueHeaders(matrix[0]);
  const rows = matrix
    .slice(1)
    .filter((row) => row.some((cell) => !isBlankCell(cell)))
    .map((row) => {
      const record: RawRow = {};
      headers.forEach((header, index) => {
        record[header] = toCellValue(row[index]);
      });
      return record;
    });

  return { headers, rows };
}

/**
 * Parse the first sheet of an Excel workbook
 */
export function parseWorkbook(buffer: Buffer): TabularData {
  const workbook = XLSX.read(buffer, { type: 'buffer' });

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new Error('Workbook has no sheets');
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  });

  return tableFromMatrix(toMatrix(matrix));
}

export function parseCsv(content: string): TabularData {
  const parsed: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });

  return tableFromMatrix(toMatrix(parsed));
}

/**
 * Main function to load an input file (.xlsx, .xls or .csv)
 */
export function readTabularFile(filePath: string): TabularData {
  const format = validateInputFile(filePath);

  try {
    if (format === 'csv') {
      return parseCsv(fs.readFileSync(filePath, 'utf-8'));
    }
    return parseWorkbook(fs.readFileSync(filePath));
  } catch (error) {
    throw new FileProcessingError(`Failed to parse file ${path.basename(filePath)}: ${errorMessage(error)}`, filePath, {
      cause: error,
    });
  }
}

function formatCsvCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export function serializeCsv(headers: string[], rows: RawRow[]): string {
  // Positional keys: csv-stringify reads dotted keys as nested paths
  const columns = headers.map((header, index) => ({ key: `c${index}`, header }));
  const records = rows.map((row) =>
    Object.fromEntries(headers.map((header, index) => [`c${index}`, formatCsvCell(row[header])]))
  );

  return stringify(records, { header: true, columns });
}

export function buildWorkbookBuffer(headers: string[], rows: RawRow[]): Buffer {
  const sheet = XLSX.utils.json_to_sheet(rows, { header: headers });
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, RESULT_SHEET_NAME);

  const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(output)) {
    throw new Error('Workbook writer did not return a buffer');
  }
  return output;
}

/**
 * Write annotated rows as .xlsx or .csv, chosen by extension.
 */
export function writeReconciliationResult(filePath: string, headers: string[], rows: RawRow[]): void {
  const format = detectFileFormat(filePath);

  try {
    if (format === 'csv') {
      fs.writeFileSync(filePath, serializeCsv(headers, rows), 'utf-8');
    } else if (format === 'xlsx') {
      fs.writeFileSync(filePath, buildWorkbookBuffer(headers, rows));
    } else {
      throw new Error('output must end in .xlsx or .csv');
    }
  } catch (error) {
    throw new FileProcessingError(`Failed to save ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
  }
}
