/**
 * Row Parser
 *
 * Turns one raw worksheet row into a validated record. Pure: every problem in
 * the row is returned as a RowError, nothing is thrown or logged.
 */

import { cellText, rowText } from './cells';
import {
  EmptyStructureError,
  InvalidEvaluationPointError,
  InvalidObjectiveError,
  InvalidPriorityError,
} from './errors';
import type { RowError } from './errors';
import { parseMetric } from './metrics';
import type { MetricDefinition } from './metrics';
import { parseQuantity } from './quantity';
import { COLUMNS } from './schema';
import type { CellValue, ClinicalGoalRow, GoalInfo, Quantity } from './schema';

export interface ParsedRow {
  rowNumber: number;
  /** Trimmed "Structure IDs" cell, as the override rule sees it. */
  structureIds: string;
  metric: MetricDefinition;
  evaluationPoint?: Quantity;
  variation?: Quantity;
  priority: number;
  info: GoalInfo;
}

export type RowParseResult =
  | { status: 'ok'; row: ParsedRow }
  | { status: 'skipped'; reason: EmptyStructureError }
  | { status: 'error'; rowNumber: number; errors: RowError[] };

const INTEGER_RE = /^[+-]?\d+$/;

/**
 * Integers beyond Number.MAX_SAFE_INTEGER are refused: they could not be
 * written back unchanged.
 */
export function parsePriority(value: CellValue): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value !== 'string') return null;
  const text = value.trim();
  if (!INTEGER_RE.test(text)) return null;
  const parsed = Number.parseInt(text, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function parseRow(row: ClinicalGoalRow): RowParseResult {
  const { rowNumber, cells } = row;
  const structureIds = rowText(row, 'structureIds');
  if (!structureIds) {
    return { status: 'skipped', reason: new EmptyStructureError(rowNumber) };
  }

  const errors: RowError[] = [];

  const objectiveText = rowText(row, 'dvhObjective');
  const metric = parseMetric(objectiveText);
  if (!metric) {
    errors.push(new InvalidObjectiveError(rowNumber, objectiveText));
  }

  const priority = parsePriority(cells.priority);
  if (priority === null) {
    errors.push(new InvalidPriorityError(rowNumber, cellText(cells.priority)));
  }

  let evaluationPoint: Quantity | undefined;
  const evaluationText = cellText(cells.evaluationPoint);
  if (evaluationText) {
    const parsed = parseQuantity(cells.evaluationPoint);
    if (!parsed.ok) {
      errors.push(
        new InvalidEvaluationPointError(rowNumber, COLUMNS.evaluationPoint, evaluationText, parsed.error)
      );
    } else if (metric?.parametrized && !metric.parameterUnits.includes(parsed.quantity.unit)) {
      errors.push(
        new InvalidEvaluationPointError(
          rowNumber,
          COLUMNS.evaluationPoint,
          evaluationText,
          `${metric.family} expects a parameter in ${metric.parameterUnits.join(' or ')}`
        )
      );
    } else {
      evaluationPoint = parsed.quantity;
    }
  } else if (metric?.inlineParameter) {
    evaluationPoint = metric.inlineParameter;
  } else if (metric?.parametrized) {
    errors.push(
      new InvalidEvaluationPointError(
        rowNumber,
        COLUMNS.evaluationPoint,
        '',
        `${metric.family} requires an evaluation point`
      )
    );
  }

  let variation: Quantity | undefined;
  const variationText = cellText(cells.variation);
  if (variationText) {
    const parsed = parseQuantity(cells.variation);
    if (parsed.ok) {
      variation = parsed.quantity;
    } else {
      errors.push(new InvalidEvaluationPointError(rowNumber, COLUMNS.variation, variationText, parsed.error));
    }
  }

  if (errors.length || !metric || priority === null) {
    return { status: 'error', rowNumber, errors };
  }

  return {
    status: 'ok',
    row: {
      rowNumber,
      structureIds,
      metric,
      evaluationPoint,
      variation,
      priority,
      info: {
        source: rowText(row, 'source'),
        templateId: rowText(row, 'templateId'),
        notes: rowText(row, 'zusatzInfo'),
        endpoint: rowText(row, 'endpoint'),
      },
    },
  };
}
