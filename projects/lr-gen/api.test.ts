import { generate, parse } from './api.js';

const SIMPLE = 'S -> A\nA -> a A | b';
const EXPRESSIONS = [
  'S -> E',
  'E -> T + E | T',
  'T -> F * T | F',
  'F -> ( E ) | id',
].join('\n');
const AMBIGUOUS = 'S -> E\nE -> E + E | E * E | id';

describe('generate()', () => {
  describe('LR(0) tables for S -> A, A -> a A | b', () => {
    const response = generate(SIMPLE, 'lr0')._unsafeUnwrap();

    test('summary', () => {
      expect(response.parser_type).toEqual('lr0');
      expect(response.num_states).toEqual(6);
      expect(response.is_lr0).toBe(true);
      expect(response.is_slr1).toBeUndefined();
      expect(response.shift_reduce_conflicts).toEqual([]);
      expect(response.reduce_reduce_conflicts).toEqual([]);
    });

    test('grammar', () => {
      expect(response.augmented_grammar).toEqual([
        "S' → S",
        'S → A',
        'A → a A',
        'A → b',
      ]);
      expect(response.terminals).toEqual(['a', 'b', '$']);
      expect(response.non_terminals).toEqual(["S'", 'S', 'A']);
    });

    test('states', () => {
      expect(response.states[0]).toEqual({
        id: 0,
        items: ["S' → • S", 'S → • A', 'A → • a A', 'A → • b'],
      });
      expect(response.states[5]).toEqual({ id: 5, items: ['A → a A •'] });
      expect(response.dfa_transitions[0]).toEqual({
        from: 0,
        to: 1,
        symbol: 'a',
      });
    });

    test('tables', () => {
      expect(response.action_table[0]).toEqual({ a: 's1', b: 's2' });
      expect(response.action_table[2]).toEqual({ a: 'r3', b: 'r3', $: 'r3' });
      expect(response.action_table[3]).toEqual({ $: 'acc' });
      expect(response.goto_table[0]).toEqual({ S: 3, A: 4 });
      expect(response.goto_table[1]).toEqual({ A: 5 });
    });

    test('no FIRST or FOLLOW sets', () => {
      expect(response.first_sets).toBeUndefined();
      expect(response.follow_sets).toBeUndefined();
    });
  });

  test('SLR(1) tables for the expression grammar', () => {
    const response = generate(EXPRESSIONS, 'slr1')._unsafeUnwrap();
    expect(response.num_states).toEqual(13);
    expect(response.is_slr1).toBe(true);
    expect(response.is_lr0).toBe(true);
    expect(response.follow_sets).toEqual({
      "S'": ['$'],
      S: ['$'],
      E: ['$', ')'],
      T: ['$', ')', '+'],
      F: ['$', ')', '*', '+'],
    });
    expect(response.first_sets?.['F']).toEqual(['(', 'id']);
  });

  test('the ambiguous grammar is not LR(0)', () => {
    const response = generate(AMBIGUOUS, 'lr0')._unsafeUnwrap();
    expect(response.is_lr0).toBe(false);
    expect(response.shift_reduce_conflicts[0]).toEqual({
      state: 3,
      symbol: '+',
      shift: 's4',
      reduce: 'r1',
    });
    expect(response.shift_reduce_conflicts).toHaveLength(6);
  });

  test('reduce-reduce conflicts name both productions', () => {
    const response = generate('S -> A | B\nA -> x\nB -> x', 'slr1')._unsafeUnwrap();
    expect(response.is_slr1).toBe(false);
    expect(response.reduce_reduce_conflicts).toEqual([
      { state: 1, symbol: '$', reduce1: 'r3', reduce2: 'r4' },
    ]);
  });

  test('a lone empty production is an invalid grammar', () => {
    expect(generate('A ->', 'lr0')._unsafeUnwrapErr().name).toEqual(
      'InvalidGrammarError'
    );
  });

  test('a symbol named __proto__ is kept as a key', () => {
    const response = generate('S -> __proto__ x', 'slr1')._unsafeUnwrap();
    expect(Object.keys(response.action_table[0])).toEqual(['__proto__']);
    expect(response.action_table[0]['__proto__']).toEqual('s1');
    expect(Object.keys(response.goto_table[0])).toEqual(['S']);
    expect(Object.keys(response.first_sets ?? {})).toContain('__proto__');
    expect(response.first_sets?.['S']).toEqual(['__proto__']);
  });

  test('the same grammar gives the same response', () => {
    expect(generate(AMBIGUOUS, 'slr1')).toEqual(generate(AMBIGUOUS, 'slr1'));
  });
});

describe('parse()', () => {
  test('accepts a b', () => {
    const response = parse(SIMPLE, 'a b', 'lr0')._unsafeUnwrap();
    expect(response.accepted).toBe(true);
    expect(response.error).toBeNull();
    expect(response.steps).toHaveLength(6);
    expect(response.parse_tree).toEqual({
      symbol: 'S',
      production: 'S → A',
      children: [
        {
          symbol: 'A',
          production: 'A → a A',
          children: [
            { symbol: 'a', production: null, children: [] },
            {
              symbol: 'A',
              production: 'A → b',
              children: [{ symbol: 'b', production: null, children: [] }],
            },
          ],
        },
      ],
    });
  });

  test('accepts id+id*id with SLR(1) tables', () => {
    const response = parse(EXPRESSIONS, 'id+id*id', 'slr1')._unsafeUnwrap();
    expect(response.accepted).toBe(true);
    expect(response.steps[response.steps.length - 1].message).toEqual(
      'Input accepted!'
    );
  });

  test('rejected input is a response, not an error', () => {
    const response = parse(SIMPLE, 'a a', 'slr1')._unsafeUnwrap();
    expect(response).toMatchObject({
      accepted: false,
      parse_tree: null,
      error: "No action defined for state 1 and token '$' at position 2",
    });
    expect(response.steps).toHaveLength(3);
  });

  test('unknown tokens are rejected before parsing', () => {
    expect(parse(SIMPLE, 'a c', 'slr1')._unsafeUnwrap()).toEqual({
      accepted: false,
      parse_tree: null,
      steps: [],
      error: "Unknown token 'c' at position 1. Valid terminals: a, b",
    });
  });

  test('honors the step limit', () => {
    const response = parse(SIMPLE, 'a a a b', 'slr1', {
      maxSteps: 3,
    })._unsafeUnwrap();
    expect(response.error).toEqual('Parser exceeded maximum steps (3)');
  });

  test('honors the tokenizer mode', () => {
    const response = parse(SIMPLE, 'aab', 'slr1', {
      tokenizer: 'longest',
    })._unsafeUnwrap();
    expect(response.accepted).toBe(true);
  });

  test('an invalid grammar is an error', () => {
    expect(parse('S -> a\nbroken', 'a', 'slr1').isErr()).toBe(true);
  });
});
