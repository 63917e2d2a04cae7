import { candidateCount, expand } from '../../src/matrix/expander';

describe('Matrix Expander', () => {
  test('first dimension varies slowest, last fastest', () => {
    const cells = expand([
      { name: 'target', values: ['a', 'b'] },
      { name: 'profile', values: ['dev', 'release'] },
    ]);
    expect(cells).toEqual([
      { target: 'a', profile: 'dev' },
      { target: 'a', profile: 'release' },
      { target: 'b', profile: 'dev' },
      { target: 'b', profile: 'release' },
    ]);
  });

  test('produces the product of value counts', () => {
    const dimensions = [
      { name: 'target', values: ['a', 'b', 'c'] },
      { name: 'profile', values: ['dev', 'release'] },
      { name: 'machine', values: ['x86'] },
    ];
    expect(candidateCount(dimensions)).toBe(6);
    expect(expand(dimensions)).toHaveLength(6);
  });

  test('cells keep dimension declaration order', () => {
    const [cell] = expand([
      { name: 'profile', values: ['dev'] },
      { name: 'target', values: ['a'] },
    ]);
    expect(Object.keys(cell)).toEqual(['profile', 'target']);
  });

  test('cells are frozen', () => {
    const [cell] = expand([{ name: 'target', values: ['a'] }]);
    expect(Object.isFrozen(cell)).toBe(true);
  });

  test('a dimension without values yields nothing', () => {
    const dimensions = [
      { name: 'target', values: ['a', 'b'] },
      { name: 'profile', values: [] },
    ];
    expect(candidateCount(dimensions)).toBe(0);
    expect(expand(dimensions)).toEqual([]);
  });

  test('no dimensions yields nothing', () => {
    expect(candidateCount([])).toBe(0);
    expect(expand([])).toEqual([]);
  });

  test('identical input yields identical order', () => {
    const dimensions = [
      { name: 'target', values: ['static', 'dynamic'] },
      { name: 'toolchain', values: ['stable', 'nightly'] },
    ];
    expect(expand(dimensions)).toEqual(expand(dimensions));
  });
});
