/**
 * Tests for value formatting, serialization, grouping, and MeasureItem building.
 */
import {
  escapeAttribute,
  escapeText,
  formatDecimal,
  formatInteger,
  roundHalfAwayFromZero,
} from '../lib/xml/format';
import { serialize } from '../lib/xml/serializer';
import { decimal, element, integer } from '../lib/xml/tree';
import { buildDocument, buildMeasureItems, formatLastModified, groupGoals } from '../lib/xml/builder';
import type { BuildOptions } from '../lib/xml/builder';
import type { ClinicalGoal } from '../lib/goals/schema';
import { FIXED_NOW } from './fixtures';

function goal(overrides: Partial<ClinicalGoal>): ClinicalGoal {
  return {
    rowNumber: 2,
    structure: { canonicalId: 'PTV70', synonyms: [] },
    aliases: ['PTV70'],
    metric: 'Dmean',
    priority: 2,
    templateId: 'T1',
    templateOverridden: false,
    info: { source: 'RTOG', templateId: 'T1', notes: 'note', endpoint: 'Fibrosis' },
    ...overrides,
  };
}

const options: BuildOptions = {
  assignedUsers: '',
  codeScheme: 'FMA',
  codeSchemeVersion: '3.2',
  now: FIXED_NOW,
};

// ── Formatting ──────────────────────────────────────────────────────

describe('number formatting', () => {
  test('one decimal place, half away from zero', () => {
    expect(formatDecimal(60)).toBe('60.0');
    expect(formatDecimal(2.25)).toBe('2.3');
    expect(formatDecimal(2.24)).toBe('2.2');
    expect(formatDecimal(1.05)).toBe('1.1');
    expect(formatDecimal(-2.25)).toBe('-2.3');
    expect(formatDecimal(-0.04)).toBe('0.0');
  });

  test('rounding is not truncation', () => {
    expect(roundHalfAwayFromZero(0.96)).toBe(1);
    expect(formatDecimal(99.95)).toBe('100.0');
  });

  test('non-finite and non-integer values are refused', () => {
    expect(() => formatDecimal(Number.NaN)).toThrow(RangeError);
    expect(() => formatInteger(2.5)).toThrow(RangeError);
    expect(formatInteger(2)).toBe('2');
  });

  test('escaping', () => {
    expect(escapeText('a < b & c > d')).toBe('a &lt; b &amp; c &gt; d');
    expect(escapeAttribute('say "hi"\n')).toBe('say &quot;hi&quot;&#10;');
    expect(escapeText('bell\u0007')).toBe('bell');
  });
});

// ── Serializer ──────────────────────────────────────────────────────

describe('serialize', () => {
  test('renders declaration, indentation, and typed values', () => {
    const tree = element('Root', { Version: '1.0' }, [
      element('Empty', { ID: 'A&B' }),
      element('Value', { Unit: 'Gy' }, decimal(20)),
      element('Count', {}, integer(3)),
      element('Nested', {}, [element('Leaf', {}, 'x<y')]),
    ]);

    expect(serialize(tree)).toBe(
      [
        '<?xml version="1.0" encoding="utf-8"?>',
        '<Root Version="1.0">',
        '  <Empty ID="A&amp;B" />',
        '  <Value Unit="Gy">20.0</Value>',
        '  <Count>3</Count>',
        '  <Nested>',
        '    <Leaf>x&lt;y</Leaf>',
        '  </Nested>',
        '</Root>',
        '',
      ].join('\n')
    );
  });

  test('undefined attributes are omitted', () => {
    expect(serialize(element('A', { B: undefined, C: 'c' }))).toBe(
      '<?xml version="1.0" encoding="utf-8"?>\n<A C="c" />\n'
    );
  });

  test('rejects invalid element names', () => {
    expect(() => serialize(element('Bad Name'))).toThrow('Invalid XML name "Bad Name"');
  });
});

// ── Grouping ────────────────────────────────────────────────────────

describe('groupGoals', () => {
  test('groups by first appearance and keeps row order inside groups', () => {
    const goals = [
      goal({ rowNumber: 2, templateId: 'B' }),
      goal({ rowNumber: 3, templateId: 'A' }),
      goal({ rowNumber: 4, templateId: 'B' }),
      goal({ rowNumber: 5, templateId: 'C' }),
      goal({ rowNumber: 6, templateId: 'A' }),
    ];

    const groups = groupGoals(goals);

    expect(groups.map((g) => g.templateId)).toEqual(['B', 'A', 'C']);
    expect(groups.map((g) => g.goals.map((x) => x.rowNumber))).toEqual([[2, 4], [3, 6], [5]]);
  });

  test('is deterministic', () => {
    const goals = [goal({ templateId: 'X' }), goal({ templateId: 'Y' }), goal({ templateId: 'X' })];
    expect(groupGoals(goals)).toEqual(groupGoals(goals));
  });
});

// ── MeasureItems ────────────────────────────────────────────────────

describe('buildMeasureItems', () => {
  test('one item per alias with identical content', () => {
    const items = buildMeasureItems(
      goal({
        aliases: ['A', 'B', 'C'],
        metric: 'V[x]',
        evaluationPoint: { value: 60, unit: 'Gy' },
        priority: 1,
      }),
      options
    );

    expect(items.map((item) => item.attributes)).toEqual([[['ID', 'A']], [['ID', 'B']], [['ID', 'C']]]);
    expect(items[1].children).toEqual(items[0].children);
    expect(items[2].children).toEqual(items[0].children);
  });

  test('structure code is nested with the configured scheme', () => {
    const [item] = buildMeasureItems(
      goal({ structure: { canonicalId: 'Heart', synonyms: ['Herz'], code: 7088 } }),
      { ...options, codeScheme: 'SCHEME', codeSchemeVersion: '9' }
    );

    expect(serialize(item)).toBe(
      [
        '<?xml version="1.0" encoding="utf-8"?>',
        '<MeasureItem ID="PTV70">',
        '  <Structure ID="Heart">',
        '    <StructureCode Code="7088" CodeScheme="SCHEME" CodeSchemeVersion="9" />',
        '  </Structure>',
        '  <Type>8</Type>',
        '  <Priority>2</Priority>',
        '</MeasureItem>',
        '',
      ].join('\n')
    );
  });

  test('D[x] with an absolute volume uses the cc type code', () => {
    const [item] = buildMeasureItems(
      goal({ metric: 'D[x]', evaluationPoint: { value: 2, unit: 'cc' }, variation: { value: 1.25, unit: 'Gy' } }),
      options
    );
    const rendered = serialize(item).split('\n');

    expect(rendered).toContain('  <Type>5</Type>');
    expect(rendered).toContain('  <TypeSpecifier Unit="cc">2.0</TypeSpecifier>');
    expect(rendered).toContain('  <VariationAcceptable Unit="Gy">1.3</VariationAcceptable>');
  });

  test('informational fields never reach the tree', () => {
    const doc = buildDocument(groupGoals([goal({})]), options);
    const xml = serialize(doc);

    expect(xml).not.toContain('RTOG');
    expect(xml).not.toContain('Fibrosis');
    expect(xml).not.toContain('note');
  });
});

// ── Document ────────────────────────────────────────────────────────

describe('buildDocument', () => {
  test('LastModified uses the importer layout', () => {
    expect(formatLastModified(FIXED_NOW)).toBe(' October 18 2026 14:03:05:123');
  });

  test('preview id replaces only the first group ID', () => {
    const groups = groupGoals([goal({ templateId: 'T1' }), goal({ templateId: 'T2' })]);
    const doc = buildDocument(groups, { ...options, previewId: 'Prostate' });
    const lines = serialize(doc).split('\n');

    expect(lines.filter((l) => l.includes('<MeasureGroup'))).toEqual([
      '    <MeasureGroup ID="Prostate">',
      '    <MeasureGroup ID="T2">',
    ]);
    expect(lines[2]).toContain(' ID="Prostate" ');
  });

  test('document id falls back to the source file stem', () => {
    const doc = buildDocument(groupGoals([goal({})]), { ...options, sourceName: 'Lung SBRT.xlsx' });
    const preview = serialize(doc).split('\n')[2];

    expect(preview).toContain(' ID="Lung SBRT" ');
    expect(preview).toContain(' Description="Source Excel: Lung SBRT.xlsx | Converted: 2026-10-18 14:03:05" ');
  });

  test('empty input still yields a valid document', () => {
    const lines = serialize(buildDocument([], options)).split('\n');

    expect(lines[2]).toContain(' ID="ClinicalGoals" ');
    expect(lines.slice(-3)).toEqual(['  <Prescription Version="1.10" />', '</DoseObjectives>', '']);
  });
});
