/**
 * Constraints Worksheet Reader
 *
 * Row source for the converter: reads the "Constraints" sheet of an .xlsx
 * workbook and yields one column → cell mapping per data row. The header row
 * is the first row of the sheet; headers are matched after trimming.
 */

import * as XLSX from 'xlsx';
import { MissingColumnError, MissingSheetError, UnreadableWorkbookError } from './goals/errors';
import {
  CellValueSchema,
  ClinicalGoalRowSchema,
  COLUMN_KEYS,
  COLUMN_VARIANTS,
  COLUMNS,
  CONSTRAINTS_SHEET,
  REQUIRED_COLUMNS,
} from './goals/schema';
import type { CellValue, ClinicalGoalRow, ColumnKey } from './goals/schema';
import { isBlank } from './goals/cells';

export type ColumnIndex = Partial<Record<ColumnKey, number>>;

/**
 * Map each known column to its position in the header row. Throws
 * MissingColumnError for the first required column that is absent.
 */
export function indexColumns(headerRow: readonly unknown[]): ColumnIndex {
  const positions = new Map<string, number>();
  headerRow.forEach((cell, idx) => {
    const name = typeof cell === 'string' ? cell.trim() : '';
    if (name && !positions.has(name)) positions.set(name, idx);
  });

  const index: ColumnIndex = {};
  for (const key of COLUMN_KEYS) {
    const names = [COLUMNS[key], ...(COLUMN_VARIANTS[key] ?? [])];
    const found = names.map((name) => positions.get(name)).find((pos) => pos !== undefined);
    if (found !== undefined) index[key] = found;
  }

  for (const key of REQUIRED_COLUMNS) {
    if (index[key] === undefined) throw new MissingColumnError(COLUMNS[key]);
  }
  return index;
}

function toCell(value: unknown): CellValue {
  const parsed = CellValueSchema.safeParse(value);
  return parsed.success ? parsed.data : String(value);
}

/**
 * Convert a header-first matrix to rows. `firstRowNumber` is the 1-based sheet
 * row of the header.
 */
export function matrixToRows(matrix: readonly (readonly unknown[])[], firstRowNumber = 1): ClinicalGoalRow[] {
  const [headerRow = [], ...dataRows] = matrix;
  const index = indexColumns(headerRow);
  const rows: ClinicalGoalRow[] = [];

  dataRows.forEach((values, i) => {
    const cells: ClinicalGoalRow['cells'] = {};
    for (const key of COLUMN_KEYS) {
      const pos = index[key];
      if (pos !== undefined) cells[key] = toCell(values[pos]);
    }
    if (Object.values(cells).every((cell) => isBlank(cell))) return;

    rows.push(ClinicalGoalRowSchema.parse({ rowNumber: firstRowNumber + 1 + i, cells }));
  });

  return rows;
}

export function readConstraintRows(data: Buffer | Uint8Array): ClinicalGoalRow[] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, {
      type: Buffer.isBuffer(data) ? 'buffer' : 'array',
      cellDates: true,
    });
  } catch (err) {
    throw new UnreadableWorkbookError(err);
  }
  const sheet = workbook.Sheets[CONSTRAINTS_SHEET];
  if (!sheet) {
    throw new MissingSheetError(CONSTRAINTS_SHEET, workbook.SheetNames);
  }

  const range = XLSX.utils.decode_range(sheet['!ref'] ?? 'A1');
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: true,
  });
  return matrixToRows(matrix, range.s.r + 1);
}
