/**
 * DVH Metric Families
 *
 * Recognises the "DVH Objective" column. Fixed-form metrics (Dmean, Dmax, Dmin)
 * carry no parameter. Parametrized metrics are written with a bracketed
 * placeholder, "V[x]" or "D[x]", and take their parameter from the
 * evaluation point. The older spellings with the parameter written inline,
 * "V30Gy [%]", "D2cc [Gy]", "D95% [%]", are read as the same families.
 */

import type {
  FixedMetricFamily,
  MetricFamily,
  ParametrizedMetricFamily,
  Quantity,
  QuantityUnit,
} from './schema';
import { parseUnit } from './quantity';

export interface MetricDefinition {
  family: MetricFamily;
  parametrized: boolean;
  /** Units the parameter may carry. Empty for fixed-form metrics. */
  parameterUnits: readonly QuantityUnit[];
  /** Parameter given in the objective itself, e.g. 30 Gy in "V30Gy [%]". */
  inlineParameter?: Quantity;
}

export const METRICS: Record<MetricFamily, MetricDefinition> = {
  Dmean: { family: 'Dmean', parametrized: false, parameterUnits: [] },
  Dmax: { family: 'Dmax', parametrized: false, parameterUnits: [] },
  Dmin: { family: 'Dmin', parametrized: false, parameterUnits: [] },
  'V[x]': { family: 'V[x]', parametrized: true, parameterUnits: ['Gy', 'cGy', '%'] },
  'D[x]': { family: 'D[x]', parametrized: true, parameterUnits: ['cc', '%'] },
};

const FIXED_RE = /^D?(mean|max|min)(?:\s*\[\s*(?:gy|%)\s*\])?$/i;
const PARAMETRIZED_RE = /^([VD])\s*\[\s*x\s*\]$/i;
const INLINE_V_RE = /^V\s*(\d+(?:[.,]\d+)?)\s*(c?Gy|%)\s*\[\s*(?:%|cc)\s*\]$/i;
const INLINE_D_RE = /^D\s*(\d+(?:[.,]\d+)?)\s*(cc|%)\s*\[\s*(?:c?Gy|%)\s*\]$/i;

const FIXED_BY_WORD: Record<string, FixedMetricFamily> = {
  mean: 'Dmean',
  max: 'Dmax',
  min: 'Dmin',
};

function inlineMetric(family: ParametrizedMetricFamily, match: RegExpExecArray): MetricDefinition | null {
  const unit = parseUnit(match[2]);
  if (!unit) return null;
  return { ...METRICS[family], inlineParameter: { value: Number(match[1].replace(',', '.')), unit } };
}

/**
 * Accepts "Dmean", "Dmax", "Dmin", the longer "Mean [Gy]" spelling, the
 * parametrized "V[x]" / "D[x]" forms and their inline-parameter spellings.
 * Returns null for anything else.
 */
export function parseMetric(text: string): MetricDefinition | null {
  const s = text.trim();
  if (!s) return null;

  const fixed = FIXED_RE.exec(s);
  if (fixed) {
    return METRICS[FIXED_BY_WORD[fixed[1].toLowerCase()]];
  }

  const parametrized = PARAMETRIZED_RE.exec(s);
  if (parametrized) {
    const family: ParametrizedMetricFamily = parametrized[1].toUpperCase() === 'V' ? 'V[x]' : 'D[x]';
    return METRICS[family];
  }

  const inlineV = INLINE_V_RE.exec(s);
  if (inlineV) return inlineMetric('V[x]', inlineV);

  const inlineD = INLINE_D_RE.exec(s);
  if (inlineD) return inlineMetric('D[x]', inlineD);

  return null;
}

// ── Importer type codes ─────────────────────────────────────────────

const FIXED_TYPE_CODES: Record<FixedMetricFamily, number> = {
  Dmax: 6,
  Dmin: 7,
  Dmean: 8,
};

const FIXED_FAMILIES: readonly FixedMetricFamily[] = ['Dmean', 'Dmax', 'Dmin'];

const V_TYPE_CODE = 3;
const D_AT_PERCENT_TYPE_CODE = 4;
const D_AT_CC_TYPE_CODE = 5;

/**
 * Importer "Type" code. D[x] splits on whether its volume is relative or
 * absolute.
 */
export function metricTypeCode(family: MetricFamily, parameter?: Quantity): number {
  switch (family) {
    case 'V[x]':
      return V_TYPE_CODE;
    case 'D[x]':
      return parameter?.unit === 'cc' ? D_AT_CC_TYPE_CODE : D_AT_PERCENT_TYPE_CODE;
    default:
      return FIXED_TYPE_CODES[family];
  }
}

/**
 * Inverse of {@link metricTypeCode}.
 */
export function metricFamilyForTypeCode(code: number): MetricFamily | null {
  switch (code) {
    case V_TYPE_CODE:
      return 'V[x]';
    case D_AT_PERCENT_TYPE_CODE:
    case D_AT_CC_TYPE_CODE:
      return 'D[x]';
    default:
      return FIXED_FAMILIES.find((family) => FIXED_TYPE_CODES[family] === code) ?? null;
  }
}
