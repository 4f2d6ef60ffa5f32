import { buildGrammar } from '../grammar/grammar.js';
import { closure, goto, ItemSet, LRItem } from './items.js';

// S → A, A → a A | b
const grammar = buildGrammar({ S: [['A']], A: [['a', 'A'], ['b']] }).augment();
const [goalProduction, , aA, b] = grammar.productions;
const initial = () => closure(grammar, [new LRItem(goalProduction, 0)]);

describe('LRItem', () => {
  test('toString() marks the dot', () => {
    expect(new LRItem(aA, 0).toString()).toEqual('A → • a A');
    expect(new LRItem(aA, 1).toString()).toEqual('A → a • A');
    expect(new LRItem(b, 1).toString()).toEqual('A → b •');
  });

  test('an empty production has only a complete item', () => {
    const g = buildGrammar({ S: [['A', 'x']], A: [[]] });
    const item = new LRItem(g.productions[1], 0);
    expect(item.toString()).toEqual('A → •');
    expect(item.isComplete()).toBe(true);
  });

  test('next() and advance()', () => {
    const item = new LRItem(aA, 0);
    expect(item.next()).toEqual('a');
    expect(item.advance().next()).toEqual('A');
    expect(item.advance().advance().next()).toBeUndefined();
    expect(item.advance().advance().isComplete()).toBe(true);
  });

  test('rejects a dot past the end', () => {
    expect(() => new LRItem(b, 2)).toThrow(RangeError);
  });

  test('equals() compares production and dot', () => {
    expect(new LRItem(aA, 1).equals(new LRItem(aA, 1))).toBe(true);
    expect(new LRItem(aA, 1).equals(new LRItem(aA, 0))).toBe(false);
  });

  test('parse() reads back toString()', () => {
    const item = LRItem.parse('A → a • A', grammar);
    expect(item.isOk() && item.value.hash()).toEqual('2.1');
    expect(LRItem.parse('A → a A', grammar).isErr()).toBe(true);
    expect(LRItem.parse('A → c •', grammar).isErr()).toBe(true);
  });
});

describe('closure()', () => {
  test('adds an item for every production of a non-terminal after the dot', () => {
    expect(initial().sorted().map((i) => i.toString())).toEqual([
      "S' → • S",
      'S → • A',
      'A → • a A',
      'A → • b',
    ]);
  });

  test('is idempotent', () => {
    const once = initial();
    const twice = closure(grammar, once);
    expect(twice.equals(once)).toBe(true);
    expect(twice.key()).toEqual(once.key());
  });

  test('is independent of the order items are given in', () => {
    const items = [new LRItem(aA, 1), new LRItem(b, 0)];
    expect(closure(grammar, items).key()).toEqual(
      closure(grammar, [...items].reverse()).key()
    );
  });
});

describe('goto()', () => {
  test('advances the dot and closes the result', () => {
    expect(goto(grammar, initial(), 'a').toString()).toEqual(
      ['A → • a A', 'A → a • A', 'A → • b'].join('\n')
    );
  });

  test('is empty when no item can advance', () => {
    expect(goto(grammar, initial(), '$').size).toEqual(0);
    expect(goto(grammar, [new LRItem(b, 1)], 'b').size).toEqual(0);
  });
});

describe('ItemSet', () => {
  test('ignores duplicates', () => {
    const set = new ItemSet([new LRItem(aA, 0)]);
    expect(set.add(new LRItem(aA, 0))).toBe(false);
    expect(set.add(new LRItem(aA, 1))).toBe(true);
    expect(set.size).toEqual(2);
  });

  test('freeze() stops further additions', () => {
    const set = new ItemSet([new LRItem(aA, 0)]);
    const frozen = set.freeze();
    expect(frozen.isFrozen).toBe(true);
    expect(() => set.add(new LRItem(aA, 1))).toThrow(
      'cannot add A → a • A to a frozen item set'
    );
    expect(frozen.size).toEqual(1);
  });

  test('key() lists items in order', () => {
    expect(initial().key()).toEqual('0.0,1.0,2.0,3.0');
  });
});
