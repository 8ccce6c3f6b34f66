/**
 * Locale-independent value formatting for the importer.
 */

import type { XmlValue } from './tree';

/** The importer keeps one decimal place. */
export const DECIMAL_PLACES = 1;

/**
 * Round half away from zero, shifting through the exponent string
 * (1.005 * 100 is 100.49999… in binary).
 */
export function roundHalfAwayFromZero(value: number, places: number = DECIMAL_PLACES): number {
  const magnitude = Math.abs(value);
  const rounded = String(magnitude).includes('e')
    ? Math.round(magnitude * 10 ** places) / 10 ** places
    : Number(`${Math.round(Number(`${magnitude}e${places}`))}e-${places}`);
  return value < 0 ? -rounded : rounded;
}

export function formatDecimal(value: number, places: number = DECIMAL_PLACES): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot format non-finite number ${value}`);
  }
  const rounded = roundHalfAwayFromZero(value, places);
  // Avoid "-0.0"
  return (rounded === 0 ? 0 : rounded).toFixed(places);
}

export function formatInteger(value: number): string {
  if (!Number.isInteger(value)) {
    throw new RangeError(`Expected an integer, got ${value}`);
  }
  return String(value);
}

export function formatValue(value: XmlValue): string {
  if (typeof value === 'string') return value;
  return value.kind === 'decimal' ? formatDecimal(value.value) : formatInteger(value.value);
}

const TEXT_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
};

const ATTRIBUTE_ESCAPES: Record<string, string> = {
  ...TEXT_ESCAPES,
  '"': '&quot;',
  '\n': '&#10;',
  '\r': '&#13;',
  '\t': '&#9;',
};

// Characters XML 1.0 does not allow at all
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

export function escapeText(text: string): string {
  return text.replace(INVALID_XML_CHARS, '').replace(/[&<>]/g, (ch) => TEXT_ESCAPES[ch]);
}

export function escapeAttribute(text: string): string {
  return text
    .replace(INVALID_XML_CHARS, '')
    .replace(/[&<>"\n\r\t]/g, (ch) => ATTRIBUTE_ESCAPES[ch]);
}
