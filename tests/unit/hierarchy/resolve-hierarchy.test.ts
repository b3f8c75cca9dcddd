import { describe, expect, it } from 'vitest';

import { resolveHierarchy, validateTree } from '@/modules/hierarchy/index.js';
import { HIERARCHY_DEFAULTS } from '@/modules/pipeline-config/index.js';
import { makeRecord } from '@/tests/fixtures/builders.js';

const parksRecords = () => [
  makeRecord({ fiscalYear: 2022, department: { code: 'PR', name: 'Parks & Recreation' } }),
  makeRecord({ fiscalYear: 2023, department: { code: 'PR', name: 'Parks & Recreation' } }),
  makeRecord({ fiscalYear: 2024, department: { code: 'PKR', name: 'Parks and Recreation' } }),
];

describe('resolveHierarchy', () => {
  it('builds a fund → department → line item tree', () => {
    const resolution = resolveHierarchy([makeRecord()], HIERARCHY_DEFAULTS);

    expect(resolution.entities.map((e) => [e.kind, e.key, e.parentKey])).toEqual([
      ['fund', 'fund:100', null],
      ['department', 'department:FIR', 'fund:100'],
      ['line_item', 'department:FIR/line_item:5100', 'department:FIR'],
    ]);
    expect(resolution.records[0]?.entityKey).toBe('department:FIR/line_item:5100');
    expect(validateTree(resolution.entities)).toEqual([]);
  });

  it('scopes line items to their program when one is present', () => {
    const resolution = resolveHierarchy(
      [makeRecord({ program: { code: 'FR01', name: 'Emergency Response' } })],
      HIERARCHY_DEFAULTS
    );

    expect(resolution.records[0]?.entityKey).toBe('program:FR01/line_item:5100');
    const program = resolution.entities.find((e) => e.kind === 'program');
    expect(program?.parentKey).toBe('department:FIR');
  });

  it('merges a renamed department by normalized name across years', () => {
    const resolution = resolveHierarchy(parksRecords(), HIERARCHY_DEFAULTS);

    const departments = resolution.entities.filter((e) => e.kind === 'department');
    expect(departments).toHaveLength(1);

    const parks = departments[0]!;
    expect(parks.key).toBe('department:PR');
    expect(parks.code).toBe('PKR');
    expect(parks.name).toBe('Parks and Recreation');
    expect(parks.fiscalYears).toEqual([2022, 2023, 2024]);
    expect(parks.labels).toEqual([
      { code: 'PKR', name: 'Parks and Recreation', fiscalYears: [2024] },
      { code: 'PR', name: 'Parks & Recreation', fiscalYears: [2022, 2023] },
    ]);

    expect(resolution.aliasLinks).toEqual([
      {
        kind: 'department',
        entityKey: 'department:PR',
        reason: 'name',
        from: { fiscalYear: 2024, code: 'PKR', name: 'Parks and Recreation' },
        to: { fiscalYear: 2022, code: 'PR', name: 'Parks & Recreation' },
      },
    ]);

    const keys = new Set(resolution.records.map((record) => record.entityKey));
    expect([...keys]).toEqual(['department:PR/line_item:5100']);
  });

  it('maps every raw code of a merged entity', () => {
    const resolution = resolveHierarchy(parksRecords(), HIERARCHY_DEFAULTS);

    const departmentCodes = resolution.codeMappings
      .filter((mapping) => mapping.kind === 'department')
      .map((mapping) => [mapping.fiscalYear, mapping.code, mapping.entityKey]);
    expect(departmentCodes).toEqual([
      [2022, 'PR', 'department:PR'],
      [2023, 'PR', 'department:PR'],
      [2024, 'PKR', 'department:PR'],
    ]);
  });

  it('does not merge same-named departments active in the same year', () => {
    const resolution = resolveHierarchy(
      [
        makeRecord({ department: { code: 'A1', name: 'Library' } }),
        makeRecord({ department: { code: 'A2', name: 'Library' } }),
      ],
      HIERARCHY_DEFAULTS
    );

    const keys = resolution.entities.filter((e) => e.kind === 'department').map((e) => e.key);
    expect(keys).toEqual(['department:A1', 'department:A2']);
    expect(resolution.aliasLinks).toEqual([]);
  });

  it('merges declared aliases regardless of name', () => {
    const resolution = resolveHierarchy(
      [
        makeRecord({ fiscalYear: 2023, department: { code: 'PR', name: 'Parks' } }),
        makeRecord({ fiscalYear: 2024, department: { code: 'PKR', name: 'Recreation Dept' } }),
      ],
      { ...HIERARCHY_DEFAULTS, aliases: [{ kind: 'department', codes: ['PR', 'PKR'] }] }
    );

    const departments = resolution.entities.filter((e) => e.kind === 'department');
    expect(departments.map((e) => e.key)).toEqual(['department:PR']);
    expect(resolution.aliasLinks.map((link) => link.reason)).toEqual(['declared']);
  });

  it('matches a code-less line item to its coded twin in the same year', () => {
    const resolution = resolveHierarchy(
      [
        makeRecord(),
        makeRecord({ lineItem: { code: null, name: 'Salaries' }, amountType: 'actual' }),
      ],
      HIERARCHY_DEFAULTS
    );

    const lineItems = resolution.entities.filter((e) => e.kind === 'line_item');
    expect(lineItems.map((e) => [e.key, e.code])).toEqual([
      ['department:FIR/line_item:5100', '5100'],
    ]);
    expect(resolution.records.map((record) => record.entityKey)).toEqual([
      'department:FIR/line_item:5100',
      'department:FIR/line_item:5100',
    ]);
    expect(resolution.aliasLinks).toEqual([
      {
        kind: 'line_item',
        entityKey: 'department:FIR/line_item:5100',
        reason: 'name',
        from: { fiscalYear: 2024, code: null, name: 'Salaries' },
        to: { fiscalYear: 2024, code: '5100', name: 'Salaries' },
      },
    ]);
  });

  it('matches a code-less department to its coded twin in the same year', () => {
    const resolution = resolveHierarchy(
      [
        makeRecord(),
        makeRecord({ department: { code: null, name: 'Fire-Rescue' }, amountType: 'actual' }),
      ],
      HIERARCHY_DEFAULTS
    );

    const departments = resolution.entities.filter((e) => e.kind === 'department');
    expect(departments.map((e) => e.key)).toEqual(['department:FIR']);
    expect(resolution.records.map((record) => record.entityKey)).toEqual([
      'department:FIR/line_item:5100',
      'department:FIR/line_item:5100',
    ]);
    expect(resolution.aliasLinks).toEqual([
      {
        kind: 'department',
        entityKey: 'department:FIR',
        reason: 'name',
        from: { fiscalYear: 2024, code: null, name: 'Fire-Rescue' },
        to: { fiscalYear: 2024, code: 'FIR', name: 'Fire-Rescue' },
      },
    ]);
  });

  it('applies line item aliases within each department only', () => {
    const library = { code: 'LIB', name: 'Library' };
    const wages = { code: '5101', name: 'Wages' };
    const resolution = resolveHierarchy(
      [
        makeRecord({ fiscalYear: 2023 }),
        makeRecord({ fiscalYear: 2024, lineItem: wages }),
        makeRecord({ fiscalYear: 2023, department: library }),
        makeRecord({ fiscalYear: 2024, department: library, lineItem: wages }),
      ],
      { ...HIERARCHY_DEFAULTS, aliases: [{ kind: 'line_item', codes: ['5100', '5101'] }] }
    );

    const lineItems = resolution.entities.filter((e) => e.kind === 'line_item');
    expect(lineItems.map((e) => [e.key, e.parentKey, e.code])).toEqual([
      ['department:FIR/line_item:5100', 'department:FIR', '5101'],
      ['department:LIB/line_item:5100', 'department:LIB', '5101'],
    ]);
    expect(resolution.records.map((record) => record.entityKey)).toEqual([
      'department:FIR/line_item:5100',
      'department:FIR/line_item:5100',
      'department:LIB/line_item:5100',
      'department:LIB/line_item:5100',
    ]);
    expect(resolution.aliasLinks.map((link) => [link.entityKey, link.reason])).toEqual([
      ['department:FIR/line_item:5100', 'declared'],
      ['department:LIB/line_item:5100', 'declared'],
    ]);
  });

  it('keys code-less labels by name within their parent', () => {
    const resolution = resolveHierarchy(
      [makeRecord({ department: { code: null, name: 'Animal Services' } })],
      HIERARCHY_DEFAULTS
    );

    const department = resolution.entities.find((e) => e.kind === 'department');
    expect(department?.key).toBe('fund:100/department:~animal-services');
    expect(department?.code).toBeNull();
    expect(department?.name).toBe('Animal Services');
  });

  it('keeps the latest parent and records a conflict', () => {
    const resolution = resolveHierarchy(
      [
        makeRecord({ fiscalYear: 2022, fund: { code: '100', name: 'General Fund' } }),
        makeRecord({ fiscalYear: 2023, fund: { code: '200', name: 'Utility Fund' } }),
      ],
      HIERARCHY_DEFAULTS
    );

    const department = resolution.entities.find((e) => e.key === 'department:FIR');
    expect(department?.parentKey).toBe('fund:200');
    expect(resolution.conflicts).toEqual([
      {
        type: 'HierarchyConflict',
        message: "department 'department:FIR' appears under 2 parents; keeping 'fund:200' from FY2023",
        kind: 'department',
        entityKey: 'department:FIR',
        parents: [
          { fiscalYear: 2022, parentKey: 'fund:100' },
          { fiscalYear: 2023, parentKey: 'fund:200' },
        ],
        chosenParentKey: 'fund:200',
      },
    ]);
    expect(validateTree(resolution.entities)).toEqual([]);
  });

  it('takes department attributes from records, then from configuration', () => {
    const resolution = resolveHierarchy(
      [
        makeRecord({ department: { code: 'FIR', name: 'Fire-Rescue' }, district: 'Citywide' }),
        makeRecord({ department: { code: 'LIB', name: 'Library' } }),
      ],
      {
        ...HIERARCHY_DEFAULTS,
        departmentAttributes: {
          FIR: { serviceArea: 'Public Safety', district: 'North' },
          LIB: { serviceArea: 'Culture' },
        },
      }
    );

    const attributes = Object.fromEntries(
      resolution.entities
        .filter((e) => e.kind === 'department')
        .map((e) => [e.key, e.attributes])
    );
    expect(attributes).toEqual({
      'department:FIR': { serviceArea: 'Public Safety', district: 'Citywide' },
      'department:LIB': { serviceArea: 'Culture', district: null },
    });
  });

  it('is independent of record order', () => {
    const records = parksRecords();

    const forward = resolveHierarchy(records, HIERARCHY_DEFAULTS);
    const backward = resolveHierarchy([...records].reverse(), HIERARCHY_DEFAULTS);

    expect(backward.entities).toEqual(forward.entities);
    expect(backward.aliasLinks).toEqual(forward.aliasLinks);
  });
});
