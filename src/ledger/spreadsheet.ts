/**
 * Thin SheetJS adapter: reads the first worksheet of a workbook into a header
 * row plus a cell matrix, and writes a modified matrix back into the same
 * workbook so that other sheets survive the round trip.
 */

import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import { capitalize } from '../shared/utils.js';

export type CellValue = string | number | boolean | Date | null;

export interface SheetTable {
  workbook: XLSX.WorkBook;
  sheetName: string;
  /** Header names, capitalised ("combination" -> "Combination"). */
  columns: string[];
  /** Data rows, each exactly `columns.length` long. */
  rows: CellValue[][];
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

/**
 * Reads the first worksheet of the workbook at `filePath`.
 * Throws on unreadable files or workbooks without sheets.
 */
export async function readSheetTable(filePath: string): Promise<SheetTable> {
  const buffer = await readFile(filePath);
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (sheetName === undefined || sheet === undefined) {
    throw new Error(`Workbook ${filePath} has no worksheets`);
  }

  const matrix: unknown[][] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
  });

  const [headerRow = [], ...body] = matrix;
  const columns = headerRow.map((cell) => capitalize(String(cell ?? '').trim()));
  const rows = body.map((row) => columns.map((_, i) => toCellValue(row[i])));

  return { workbook, sheetName, columns, rows };
}

/**
 * Replaces the table's worksheet and writes the whole workbook to
 * `filePath`. The bytes go to a sibling temp file first and are renamed over
 * the target, so readers never observe a half-written workbook.
 */
export async function writeSheetTable(filePath: string, table: SheetTable): Promise<void> {
  const sheet = XLSX.utils.aoa_to_sheet([table.columns, ...table.rows]);
  table.workbook.Sheets[table.sheetName] = sheet;

  const data: Buffer = XLSX.write(table.workbook, { type: 'buffer', bookType: 'xlsx' });
  const tempPath = `${filePath}.${process.pid}.tmp`;

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
