/**
 * Structure identity and output aliases.
 *
 * "Structure IDs" holds the canonical structure id followed by pipe-separated
 * synonyms. "IDAliases" holds the semicolon-separated identifiers under which
 * the goal is exported; each alias becomes one MeasureItem.
 */

import { cellText } from './cells';
import type { CellValue, StructureIdentity } from './schema';

export interface ResolvedIdentity {
  structure: StructureIdentity;
  aliases: string[];
}

/** Trimmed, non-empty, first occurrence wins. */
export function splitTokens(text: string, separator: string): string[] {
  const seen = new Set<string>();
  const tokens: string[] = [];
  for (const part of text.split(separator)) {
    const token = part.trim();
    if (!token || seen.has(token)) continue;
    seen.add(token);
    tokens.push(token);
  }
  return tokens;
}

/**
 * Returns null when the cell has no usable segment.
 */
export function parseStructureIds(value: CellValue): Omit<StructureIdentity, 'code'> | null {
  const [canonicalId, ...synonyms] = splitTokens(cellText(value), '|');
  if (!canonicalId) return null;
  return { canonicalId, synonyms };
}

/**
 * First positive integer segment of "Structure Codes". Anything else means
 * the structure has no code.
 */
export function parseStructureCode(value: CellValue): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value > 0 ? value : undefined;
  }
  for (const segment of splitTokens(cellText(value), '|')) {
    if (/^\d+$/.test(segment)) {
      const code = Number.parseInt(segment, 10);
      if (code > 0) return code;
    }
  }
  return undefined;
}

export function parseAliases(value: CellValue, fallback: string): string[] {
  const aliases = splitTokens(cellText(value), ';');
  return aliases.length ? aliases : [fallback];
}

export function resolveIdentity(
  structureIds: CellValue,
  structureCodes: CellValue,
  idAliases: CellValue
): ResolvedIdentity | null {
  const ids = parseStructureIds(structureIds);
  if (!ids) return null;

  const code = parseStructureCode(structureCodes);
  const structure: StructureIdentity = code === undefined ? ids : { ...ids, code };

  return {
    structure,
    aliases: parseAliases(idAliases, ids.canonicalId),
  };
}
