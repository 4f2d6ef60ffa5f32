import { ExitCode, runGenerate, runParse, type CommandOptions } from './commands.js';
import { DEFAULT_CONFIG } from './config.js';

const SIMPLE = 'S -> A\nA -> a A | b';

function capture() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    output: {
      out: (text: string) => out.push(text),
      err: (text: string) => err.push(text),
    },
  };
}

const options = (overrides: Partial<CommandOptions> = {}): CommandOptions => ({
  ...DEFAULT_CONFIG,
  json: false,
  ...overrides,
});

describe('runGenerate()', () => {
  test('prints a report', () => {
    const { out, output } = capture();
    expect(runGenerate(SIMPLE, options({ parserType: 'lr0' }), output)).toEqual(
      ExitCode.ok
    );
    expect(out).toHaveLength(1);
    expect(out[0].split('\n').slice(0, 6)).toEqual([
      'Augmented grammar',
      "  0  S' → S",
      '  1  S → A',
      '  2  A → a A',
      '  3  A → b',
      '',
    ]);
    expect(out[0]).toContain('Canonical LR(0) collection (6 states)');
    expect(out[0]).toContain('LR(0) parsing table');
    expect(out[0]).not.toContain('FIRST / FOLLOW');
    expect(out[0].trimEnd().endsWith('Conflicts\nno conflicts')).toBe(true);
  });

  test('reports FIRST and FOLLOW sets for SLR(1)', () => {
    const { out, output } = capture();
    runGenerate(SIMPLE, options(), output);
    expect(out[0]).toContain('FOLLOW(A) = { $ }');
    expect(out[0]).toContain('FIRST(A) = { a, b }');
  });

  test('lists conflicts', () => {
    const { out, output } = capture();
    runGenerate('S -> E\nE -> E + E | id', options({ parserType: 'lr0' }), output);
    expect(out[0]).toContain(
      "state 3 on '+': s4 / r1 (shift-reduce)"
    );
  });

  test('prints JSON', () => {
    const { out, output } = capture();
    runGenerate(SIMPLE, options({ json: true }), output);
    const response = JSON.parse(out[0]);
    expect(response.num_states).toEqual(6);
    expect(response.is_slr1).toBe(true);
  });

  test('exits with 1 for an invalid grammar', () => {
    const { out, err, output } = capture();
    expect(runGenerate('A ->', options(), output)).toEqual(
      ExitCode.invalidGrammar
    );
    expect(out).toEqual([]);
    expect(err).toEqual(['InvalidGrammarError: grammar has no terminal symbols']);
  });
});

describe('runParse()', () => {
  test('prints the trace and the tree', () => {
    const { out, output } = capture();
    expect(runParse(SIMPLE, 'b', options(), output)).toEqual(ExitCode.ok);
    expect(out).toHaveLength(2);
    expect(out[0].split('\n')).toHaveLength(6);
    expect(out[0]).toContain('Input accepted!');
    expect(out[1]).toEqual('\n<S>\n|  <A>\n|  |  b\n|  </A>\n</S>\n');
  });

  test('exits with 2 for rejected input', () => {
    const { err, output } = capture();
    expect(runParse(SIMPLE, 'a', options(), output)).toEqual(
      ExitCode.rejected
    );
    expect(err).toEqual([
      "No action defined for state 1 and token '$' at position 1",
    ]);
  });

  test('exits with 2 for unknown tokens', () => {
    const { err, output } = capture();
    expect(runParse(SIMPLE, 'z', options(), output)).toEqual(
      ExitCode.rejected
    );
    expect(err).toEqual([
      "Unknown token 'z' at position 0. Valid terminals: a, b",
    ]);
  });

  test('prints JSON', () => {
    const { out, output } = capture();
    expect(runParse(SIMPLE, 'a', options({ json: true }), output)).toEqual(
      ExitCode.rejected
    );
    expect(JSON.parse(out[0]).accepted).toBe(false);
  });

  test('exits with 1 for an invalid grammar', () => {
    const { output } = capture();
    expect(runParse('S -> a\nnope', 'a', options(), output)).toEqual(
      ExitCode.invalidGrammar
    );
  });
});
