import { addAll, HashMap, HashSet, setsAreEqual } from './sets.js';

type Point = { x: number; y: number };
const hashPoint = (p: Point) => `${p.x},${p.y}`;

describe('HashSet', () => {
  test('compares members by hash', () => {
    const set = new HashSet(hashPoint, [
      { x: 1, y: 2 },
      { x: 1, y: 2 },
      { x: 3, y: 4 },
    ]);
    expect(set.size).toEqual(2);
    expect(set.has({ x: 3, y: 4 })).toBe(true);
    expect(set.has({ x: 4, y: 3 })).toBe(false);
  });

  test('keeps the first member added for a hash', () => {
    const first = { x: 1, y: 1 };
    const set = new HashSet(hashPoint, [first]);
    set.add({ x: 1, y: 1 });
    expect([...set][0]).toBe(first);
  });

});

describe('HashMap', () => {
  test('looks up values by hash', () => {
    const map: HashMap<Point, string> = new HashMap(hashPoint);
    map.set({ x: 0, y: 0 }, 'origin');
    expect(map.get({ x: 0, y: 0 })).toEqual('origin');
    expect(map.get({ x: 0, y: 1 })).toBeUndefined();
    map.set({ x: 0, y: 0 }, 'zero');
    expect(map.size).toEqual(1);
    expect(map.get({ x: 0, y: 0 })).toEqual('zero');
  });
});

describe('setsAreEqual()', () => {
  test('ignores order', () => {
    expect(setsAreEqual(new Set([1, 2, 3]), new Set([3, 2, 1]))).toBe(true);
    expect(setsAreEqual(new Set([1, 2]), new Set([1, 3]))).toBe(false);
    expect(setsAreEqual(new Set([1]), new Set([1, 2]))).toBe(false);
  });
});

describe('addAll()', () => {
  test('reports whether the set grew', () => {
    const set = new Set(['a']);
    expect(addAll(set, ['a'])).toBe(false);
    expect(addAll(set, ['a', 'b'])).toBe(true);
    expect([...set]).toEqual(['a', 'b']);
  });
});
