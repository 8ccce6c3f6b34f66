/**
 * TemplateID override rule.
 *
 * Rows whose "Structure IDs" mention a conventional or fractionation-specific
 * plan ("Conv", "Fx") form their own template, keyed by the Structure IDs
 * string. The test is a case-sensitive substring match over the whole cell,
 * so "Converted" also matches.
 */

export const OVERRIDE_MARKERS: readonly string[] = ['Conv', 'Fx'];

export function isTemplateOverride(structureIds: string): boolean {
  return OVERRIDE_MARKERS.some((marker) => structureIds.includes(marker));
}

export interface EffectiveTemplate {
  templateId: string;
  overridden: boolean;
}

export function resolveTemplateId(
  structureIds: string,
  templateIdCell: string,
  placeholder: string
): EffectiveTemplate {
  if (isTemplateOverride(structureIds)) {
    return { templateId: structureIds, overridden: true };
  }
  return { templateId: templateIdCell || placeholder, overridden: false };
}
