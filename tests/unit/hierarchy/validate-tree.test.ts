import { describe, expect, it } from 'vitest';

import { ancestorsOf, validateTree, type Entity } from '@/modules/hierarchy/index.js';

const entity = (key: string, kind: Entity['kind'], parentKey: string | null): Entity => ({
  key,
  kind,
  code: null,
  name: key,
  parentKey,
  labels: [],
  fiscalYears: [2024],
  attributes: { serviceArea: null, district: null },
});

describe('validateTree', () => {
  it('accepts a department root without a fund', () => {
    const entities = [
      entity('d', 'department', null),
      entity('d/p', 'program', 'd'),
      entity('d/p/l', 'line_item', 'd/p'),
    ];

    expect(validateTree(entities)).toEqual([]);
  });

  it('reports orphans, inverted levels and parentless line items', () => {
    const entities = [
      entity('f', 'fund', null),
      entity('d', 'department', 'missing'),
      entity('p', 'program', 'l'),
      entity('l', 'line_item', 'f'),
      entity('x', 'line_item', null),
    ];

    expect(validateTree(entities)).toEqual([
      "'d' references missing parent 'missing'",
      "'p' (program) sits under line_item 'l'",
      "line_item 'x' has no parent",
    ]);
  });
});

describe('ancestorsOf', () => {
  it('lists ancestors nearest first', () => {
    const entities = [
      entity('f', 'fund', null),
      entity('d', 'department', 'f'),
      entity('l', 'line_item', 'd'),
    ];
    const byKey = new Map(entities.map((e) => [e.key, e]));

    expect(ancestorsOf('l', byKey).map((e) => e.key)).toEqual(['d', 'f']);
    expect(ancestorsOf('f', byKey)).toEqual([]);
  });
});
