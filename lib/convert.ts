/**
 * Clinical Goals Conversion Pipeline
 *
 *   rows → parseRow → resolveTemplateId → resolveIdentity → ClinicalGoal
 *        → groupGoals → buildDocument → serialize
 *
 * Every call starts from fresh state; nothing is cached between workbooks.
 */

import { DEFAULT_CONFIG } from './config';
import type { ConverterConfig } from './config';
import { EmptyStructureError } from './goals/errors';
import type { RowError } from './goals/errors';
import { resolveIdentity } from './goals/identity';
import { parseRow } from './goals/rowParser';
import type { ParsedRow } from './goals/rowParser';
import { resolveTemplateId } from './goals/rules';
import type { ClinicalGoal, ClinicalGoalRow, TemplateGroup } from './goals/schema';
import { readConstraintRows } from './workbook';
import { buildDocument, groupGoals } from './xml/builder';
import { serialize } from './xml/serializer';
import type { XmlElement } from './xml/tree';

export type DocumentConfig = Omit<ConverterConfig, 'templatesDir'>;

export interface ConvertOptions {
  previewId?: string;
  sourceName?: string;
  now?: Date;
  config?: Partial<DocumentConfig>;
}

export interface RowWarning {
  rowNumber: number;
  message: string;
}

export interface ConversionResult {
  goals: ClinicalGoal[];
  groups: TemplateGroup[];
  document: XmlElement;
  xml: string;
  rowErrors: RowError[];
  skipped: EmptyStructureError[];
  warnings: RowWarning[];
}

export function resolveGoal(
  row: ClinicalGoalRow,
  parsed: ParsedRow,
  defaultTemplateId: string
): ClinicalGoal | null {
  const identity = resolveIdentity(row.cells.structureIds, row.cells.structureCodes, row.cells.idAliases);
  if (!identity) return null;

  const template = resolveTemplateId(parsed.structureIds, parsed.info.templateId, defaultTemplateId);

  return {
    rowNumber: parsed.rowNumber,
    structure: identity.structure,
    aliases: identity.aliases,
    metric: parsed.metric.family,
    evaluationPoint: parsed.evaluationPoint,
    variation: parsed.variation,
    priority: parsed.priority,
    templateId: template.templateId,
    templateOverridden: template.overridden,
    info: parsed.info,
  };
}

export function convertRows(rows: readonly ClinicalGoalRow[], options: ConvertOptions = {}): ConversionResult {
  const config: DocumentConfig = { ...DEFAULT_CONFIG, ...options.config };
  const goals: ClinicalGoal[] = [];
  const rowErrors: RowError[] = [];
  const skipped: EmptyStructureError[] = [];
  const warnings: RowWarning[] = [];

  for (const row of rows) {
    const result = parseRow(row);
    if (result.status === 'skipped') {
      skipped.push(result.reason);
      continue;
    }
    if (result.status === 'error') {
      rowErrors.push(...result.errors);
      continue;
    }

    const goal = resolveGoal(row, result.row, config.defaultTemplateId);
    if (!goal) {
      skipped.push(new EmptyStructureError(row.rowNumber));
      continue;
    }
    if (!result.row.metric.parametrized && goal.evaluationPoint) {
      warnings.push({
        rowNumber: goal.rowNumber,
        message: `Evaluation point is not exported for ${goal.metric}`,
      });
    }
    goals.push(goal);
  }

  const groups = groupGoals(goals);
  const document = buildDocument(groups, {
    previewId: options.previewId,
    sourceName: options.sourceName,
    assignedUsers: config.assignedUsers,
    codeScheme: config.codeScheme,
    codeSchemeVersion: config.codeSchemeVersion,
    now: options.now ?? new Date(),
  });

  return {
    goals,
    groups,
    document,
    xml: serialize(document),
    rowErrors,
    skipped,
    warnings,
  };
}

/**
 * Convert one workbook. Throws MissingSheetError / MissingColumnError when the
 * workbook cannot be converted at all.
 */
export function convertWorkbook(data: Buffer | Uint8Array, options: ConvertOptions = {}): ConversionResult {
  return convertRows(readConstraintRows(data), options);
}
