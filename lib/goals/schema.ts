/**
 * Clinical Goal Schema
 *
 * Column vocabulary of the "Constraints" worksheet, the raw row shape read from
 * it, and the typed model the conversion pipeline produces.
 */

import { z } from 'zod';

export const CONSTRAINTS_SHEET = 'Constraints';

export const COLUMN_KEYS = [
  'structureIds',
  'structureCodes',
  'idAliases',
  'dvhObjective',
  'evaluationPoint',
  'variation',
  'source',
  'priority',
  'templateId',
  'zusatzInfo',
  'endpoint',
] as const;

export type ColumnKey = (typeof COLUMN_KEYS)[number];

export const COLUMNS = {
  structureIds: 'Structure IDs',
  structureCodes: 'Structure Codes',
  idAliases: 'IDAliases',
  dvhObjective: 'DVH Objective',
  evaluationPoint: 'Evaluation Point',
  variation: 'Variation',
  source: 'Source',
  priority: 'Priority',
  templateId: 'TemplateID',
  zusatzInfo: 'ZusatzInfo',
  endpoint: 'Endpoint (grade ≥ 3)',
} as const satisfies Record<ColumnKey, string>;

export type ColumnName = (typeof COLUMNS)[ColumnKey];

export const REQUIRED_COLUMNS: readonly ColumnKey[] = ['structureIds', 'dvhObjective', 'priority'];

/**
 * Header spellings accepted in addition to the canonical column names.
 */
export const COLUMN_VARIANTS: Partial<Record<ColumnKey, readonly string[]>> = {
  zusatzInfo: ['Zusatzinfo'],
  endpoint: ['Endpoint (grade >= 3)', 'Endpoint (grade>=3)'],
};

// ── Raw rows ────────────────────────────────────────────────────────

export const CellValueSchema = z
  .union([z.string(), z.number(), z.boolean(), z.date()])
  .nullish();

export type CellValue = z.infer<typeof CellValueSchema>;

export const ClinicalGoalRowSchema = z.object({
  rowNumber: z.number().int().positive(),
  cells: z.record(z.enum(COLUMN_KEYS), CellValueSchema),
});

/** One worksheet row: spreadsheet row number plus column → cell value. */
export type ClinicalGoalRow = z.infer<typeof ClinicalGoalRowSchema>;

// ── Typed model ─────────────────────────────────────────────────────

export const QUANTITY_UNITS = ['Gy', 'cGy', '%', 'cc'] as const;
export type QuantityUnit = (typeof QUANTITY_UNITS)[number];

/** Numeric value with its unit token, e.g. 20 Gy or 10 cc. */
export interface Quantity {
  value: number;
  unit: QuantityUnit;
}

export type FixedMetricFamily = 'Dmean' | 'Dmax' | 'Dmin';
export type ParametrizedMetricFamily = 'V[x]' | 'D[x]';
export type MetricFamily = FixedMetricFamily | ParametrizedMetricFamily;

export interface StructureIdentity {
  canonicalId: string;
  synonyms: string[];
  code?: number;
}

/** Columns kept for QA only. Never serialized. */
export interface GoalInfo {
  source: string;
  templateId: string;
  notes: string;
  endpoint: string;
}

export interface ClinicalGoal {
  rowNumber: number;
  structure: StructureIdentity;
  aliases: string[];
  metric: MetricFamily;
  evaluationPoint?: Quantity;
  variation?: Quantity;
  priority: number;
  /** Effective TemplateID after the override rule. */
  templateId: string;
  templateOverridden: boolean;
  info: GoalInfo;
}

export interface TemplateGroup {
  templateId: string;
  goals: ClinicalGoal[];
}
