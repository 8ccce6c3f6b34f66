/**
 * Dose Objectives Builder
 *
 * Groups clinical goals by effective TemplateID and builds the element tree
 * the template importer reads:
 *
 *   DoseObjectives
 *     Preview                  document header
 *     Prescription
 *       MeasureGroup ID=…      one per TemplateID, first-seen order
 *         MeasureItem ID=…     one per goal alias, row order
 *
 * Informational columns (Source, raw TemplateID, notes, endpoint) have no
 * place in this tree.
 */

import { metricTypeCode } from '../goals/metrics';
import type { ClinicalGoal, TemplateGroup } from '../goals/schema';
import { decimal, element, integer } from './tree';
import type { XmlElement } from './tree';

export const XSI_NAMESPACE = 'http://www.w3.org/2001/XMLSchema-instance';

export interface BuildOptions {
  /** Replaces the ID of the first group and names the document. */
  previewId?: string;
  /** Source workbook file name, shown in the header description. */
  sourceName?: string;
  assignedUsers: string;
  codeScheme: string;
  codeSchemeVersion: string;
  now: Date;
}

/**
 * Stable grouping: groups in order of first appearance, goals in input order.
 */
export function groupGoals(goals: readonly ClinicalGoal[]): TemplateGroup[] {
  const groups = new Map<string, TemplateGroup>();
  for (const goal of goals) {
    let group = groups.get(goal.templateId);
    if (!group) {
      group = { templateId: goal.templateId, goals: [] };
      groups.set(goal.templateId, group);
    }
    group.goals.push(goal);
  }
  return [...groups.values()];
}

// ── Header ──────────────────────────────────────────────────────────

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** " October 18 2026 14:03:05:123", the importer's own timestamp layout. */
export function formatLastModified(d: Date): string {
  return (
    ` ${MONTHS[d.getMonth()]} ${pad(d.getDate())} ${d.getFullYear()} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}:${pad(d.getMilliseconds(), 3)}`
  );
}

function formatConverted(d: Date): string {
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

function buildPreview(documentId: string, options: BuildOptions): XmlElement {
  const lastModified = formatLastModified(options.now);
  const converted = `Converted: ${formatConverted(options.now)}`;
  return element('Preview', {
    Version: '1.2',
    ID: documentId,
    Type: 'DoseObjectives',
    ApprovalStatus: 'Unapproved',
    Diagnosis: '',
    TreatmentSite: '',
    Description: options.sourceName ? `Source Excel: ${options.sourceName} | ${converted}` : converted,
    AssignedUsers: options.assignedUsers,
    LastModified: lastModified,
    ApprovalHistory: `Created [ ${lastModified} ]`,
  });
}

// ── Items ───────────────────────────────────────────────────────────

function buildStructure(goal: ClinicalGoal, options: BuildOptions): XmlElement {
  const { canonicalId, code } = goal.structure;
  const children =
    code === undefined
      ? []
      : [
          element('StructureCode', {
            Code: integer(code),
            CodeScheme: options.codeScheme,
            CodeSchemeVersion: options.codeSchemeVersion,
          }),
        ];
  return element('Structure', { ID: canonicalId }, children);
}

export function buildMeasureItems(goal: ClinicalGoal, options: BuildOptions): XmlElement[] {
  const parameter = goal.metric === 'V[x]' || goal.metric === 'D[x]' ? goal.evaluationPoint : undefined;

  return goal.aliases.map((alias) => {
    const children: XmlElement[] = [
      buildStructure(goal, options),
      element('Type', {}, integer(metricTypeCode(goal.metric, parameter))),
    ];
    if (parameter) {
      children.push(element('TypeSpecifier', { Unit: parameter.unit }, decimal(parameter.value)));
    }
    if (goal.variation) {
      children.push(
        element('VariationAcceptable', { Unit: goal.variation.unit }, decimal(goal.variation.value))
      );
    }
    children.push(element('Priority', {}, integer(goal.priority)));
    return element('MeasureItem', { ID: alias }, children);
  });
}

export function buildDocument(groups: readonly TemplateGroup[], options: BuildOptions): XmlElement {
  const documentId =
    options.previewId ?? (options.sourceName ? stem(options.sourceName) : groups[0]?.templateId) ?? 'ClinicalGoals';

  const measureGroups = groups.map((group, index) =>
    element(
      'MeasureGroup',
      { ID: index === 0 && options.previewId ? options.previewId : group.templateId },
      group.goals.flatMap((goal) => buildMeasureItems(goal, options))
    )
  );

  return element('DoseObjectives', { Version: '1.0', 'xmlns:xsi': XSI_NAMESPACE }, [
    buildPreview(documentId, options),
    element('Prescription', { Version: '1.10' }, measureGroups),
  ]);
}

function stem(fileName: string): string {
  const base = fileName.replace(/^.*[\\/]/, '');
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}
