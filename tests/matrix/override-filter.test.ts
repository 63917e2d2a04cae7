import { OverrideRule } from '../../src/domain/matrix';
import { expand } from '../../src/matrix/expander';
import { filterCells, filterCellsWithDiagnostics } from '../../src/matrix/override-filter';

function exclude(values: Record<string, string>, description?: string): OverrideRule {
  return { kind: 'exclude', values, description };
}

function include(values: Record<string, string>): OverrideRule {
  return { kind: 'include', values };
}

const ORDER = ['target', 'profile'];

const candidates = expand([
  { name: 'target', values: ['a', 'b'] },
  { name: 'profile', values: ['dev', 'release'] },
]);

describe('Override Filter', () => {
  test('exclusion rule drops every matching cell', () => {
    const cells = filterCells(candidates, [exclude({ target: 'b', profile: 'dev' })], [], ORDER);
    expect(cells).toEqual([
      { target: 'a', profile: 'dev' },
      { target: 'a', profile: 'release' },
      { target: 'b', profile: 'release' },
    ]);
  });

  test('partial rule matches on its own keys only', () => {
    const cells = filterCells(candidates, [exclude({ profile: 'dev' })], [], ORDER);
    expect(cells).toEqual([
      { target: 'a', profile: 'release' },
      { target: 'b', profile: 'release' },
    ]);
  });

  test('exclusion rules are OR-combined', () => {
    const cells = filterCells(candidates, [exclude({ target: 'a' }), exclude({ profile: 'release' })], [], ORDER);
    expect(cells).toEqual([{ target: 'b', profile: 'dev' }]);
  });

  test('rule naming a dimension the cell lacks matches nothing', () => {
    const cells = filterCells(candidates, [exclude({ machine: 'arm' })], [], ORDER);
    expect(cells).toEqual(candidates);
  });

  test('inclusion restores an excluded cell in its original position', () => {
    const result = filterCellsWithDiagnostics(
      candidates,
      [exclude({ target: 'a' })],
      [include({ target: 'a', profile: 'release' })],
      ORDER,
    );
    expect(result.cells).toEqual([
      { target: 'a', profile: 'release' },
      { target: 'b', profile: 'dev' },
      { target: 'b', profile: 'release' },
    ]);
    expect(result.restored).toEqual([{ target: 'a', profile: 'release' }]);
    expect(result.appended).toEqual([]);
  });

  test('inclusion of a new cell appends it in declaration key order', () => {
    const result = filterCellsWithDiagnostics(candidates, [], [include({ profile: 'debug', target: 'c' })], ORDER);
    expect(result.cells).toHaveLength(5);
    const last = result.cells[4];
    expect(last).toEqual({ target: 'c', profile: 'debug' });
    expect(Object.keys(last)).toEqual(['target', 'profile']);
    expect(result.appended).toEqual([{ target: 'c', profile: 'debug' }]);
  });

  test('duplicate inclusions are added once', () => {
    const cells = filterCells(
      candidates,
      [],
      [include({ target: 'c', profile: 'dev' }), include({ profile: 'dev', target: 'c' })],
      ORDER,
    );
    expect(cells).toHaveLength(5);
  });

  test('records the first matching exclusion rule', () => {
    const rules = [exclude({ target: 'b' }, 'no b'), exclude({ profile: 'dev' })];
    const result = filterCellsWithDiagnostics(candidates, rules, [], ORDER);
    expect(result.excluded.map((record) => [record.cell, record.ruleIndex])).toEqual([
      [{ target: 'a', profile: 'dev' }, 1],
      [{ target: 'b', profile: 'dev' }, 0],
      [{ target: 'b', profile: 'release' }, 0],
    ]);
    expect(result.excluded[1].rule.description).toBe('no b');
  });

  test('empty exclusion rule matches every cell', () => {
    expect(filterCells(candidates, [exclude({})], [], ORDER)).toEqual([]);
  });

  test('filtering is idempotent', () => {
    const excludes = [exclude({ target: 'a' })];
    const includes = [include({ target: 'a', profile: 'dev' }), include({ target: 'c', profile: 'dev' })];
    const once = filterCells(candidates, excludes, includes, ORDER);
    const twice = filterCells(once, excludes, includes, ORDER);
    expect(twice).toEqual(once);
  });

  test('duplicate candidates are kept once', () => {
    const cells = filterCells([...candidates, ...candidates], [], [], ORDER);
    expect(cells).toEqual(candidates);
  });
});
