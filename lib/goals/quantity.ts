/**
 * Quantity parsing for "Evaluation Point" and "Variation" cells.
 *
 * A quantity is a leading number followed by a unit token: "20Gy", "10 cc",
 * "95%". A decimal comma is read as a decimal point. Doses and volumes are
 * never negative.
 */

import { cellText } from './cells';
import { QUANTITY_UNITS } from './schema';
import type { CellValue, Quantity, QuantityUnit } from './schema';

export type QuantityResult =
  | { ok: true; quantity: Quantity }
  | { ok: false; error: string };

const QUANTITY_RE = /^([+-]?(?:\d+(?:[.,]\d*)?|[.,]\d+))\s*([A-Za-z%]+)$/;

const UNIT_LOOKUP: ReadonlyMap<string, QuantityUnit> = new Map(
  QUANTITY_UNITS.map((unit) => [unit.toLowerCase(), unit])
);

export function parseUnit(token: string): QuantityUnit | null {
  return UNIT_LOOKUP.get(token.trim().toLowerCase()) ?? null;
}

/**
 * Parse a non-blank cell into a quantity. Callers decide what blank means.
 */
export function parseQuantity(value: CellValue): QuantityResult {
  const text = cellText(value);
  if (!text) {
    return { ok: false, error: 'Value is required' };
  }
  if (typeof value === 'number') {
    return { ok: false, error: `Unit missing; expected one of ${QUANTITY_UNITS.join(', ')}` };
  }

  const match = QUANTITY_RE.exec(text);
  if (!match) {
    return { ok: false, error: 'Expected a number followed by a unit, e.g. "20Gy"' };
  }

  const number = Number(match[1].replace(',', '.'));
  if (!Number.isFinite(number)) {
    return { ok: false, error: `"${match[1]}" is not a number` };
  }

  if (number < 0) {
    return { ok: false, error: 'Value must not be negative' };
  }

  const unit = parseUnit(match[2]);
  if (!unit) {
    return {
      ok: false,
      error: `Unknown unit "${match[2]}"; expected one of ${QUANTITY_UNITS.join(', ')}`,
    };
  }

  return { ok: true, quantity: { value: number, unit } };
}
