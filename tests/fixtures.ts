/**
 * Shared builders for converter tests.
 */
import * as XLSX from 'xlsx';
import { COLUMN_KEYS, COLUMNS } from '../lib/goals/schema';
import type { CellValue, ClinicalGoalRow, ColumnKey } from '../lib/goals/schema';

export const FIXED_NOW = new Date(2026, 9, 18, 14, 3, 5, 123);

export function row(rowNumber: number, cells: Partial<Record<ColumnKey, CellValue>>): ClinicalGoalRow {
  return { rowNumber, cells };
}

/** Header row in the worksheet's column order. */
export const HEADER: string[] = COLUMN_KEYS.map((key) => COLUMNS[key]);

/**
 * Positional row in HEADER order, as in the worksheet:
 * Structure IDs, Structure Codes, IDAliases, DVH Objective, Evaluation Point,
 * Variation, Source, Priority, TemplateID, ZusatzInfo, Endpoint.
 */
export function tuple(rowNumber: number, values: CellValue[]): ClinicalGoalRow {
  const cells: ClinicalGoalRow['cells'] = {};
  COLUMN_KEYS.forEach((key, i) => {
    cells[key] = values[i] ?? '';
  });
  return { rowNumber, cells };
}

export function workbookBuffer(
  sheets: Record<string, unknown[][]>
): Buffer {
  const wb = XLSX.utils.book_new();
  for (const [name, aoa] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(aoa), name);
  }
  const out: unknown = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(out)) throw new Error('xlsx did not return a Buffer');
  return out;
}

export function quietLogger() {
  const lines = { log: [] as string[], warn: [] as string[], error: [] as string[] };
  return {
    lines,
    logger: {
      log: (...args: unknown[]) => {
        lines.log.push(args.join(' '));
      },
      warn: (...args: unknown[]) => {
        lines.warn.push(args.join(' '));
      },
      error: (...args: unknown[]) => {
        lines.error.push(args.join(' '));
      },
    },
  };
}
