import type { CellValue, ClinicalGoalRow, ColumnKey } from './schema';

/**
 * Cell content as trimmed text. Blank cells become ''.
 */
export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

export function rowText(row: ClinicalGoalRow, key: ColumnKey): string {
  return cellText(row.cells[key]);
}

export function isBlank(value: CellValue): boolean {
  return cellText(value) === '';
}
