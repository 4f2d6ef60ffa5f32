import { EOF, EPSILON, type AugmentedGrammar, type GSymbol } from './grammar.js';
import { FixpointError } from '../lr/errors.js';
import { addAll } from '../utils/sets.js';
import { log } from '../utils/debug.js';

export type FirstSet = ReadonlySet<GSymbol>;
export type FirstMap = ReadonlyMap<GSymbol, FirstSet>;

/**
 * The terminals that can begin a derivation of the given sequence of
 * symbols, plus {@link EPSILON} when the whole sequence can derive the
 * empty string. The empty sequence yields `{ϵ}`.
 */
export function firstOfString(
  firstMap: FirstMap,
  symbols: readonly GSymbol[]
): Set<GSymbol> {
  const result: Set<GSymbol> = new Set();
  for (const symbol of symbols) {
    const firstSymbol = firstMap.get(symbol) ?? new Set();
    for (const s of firstSymbol) {
      if (s !== EPSILON) {
        result.add(s);
      }
    }
    if (!firstSymbol.has(EPSILON)) {
      return result;
    }
  }
  result.add(EPSILON);
  return result;
}

/**
 * Calculate the set of terminal symbols that can appear as the first
 * word of each grammar symbol. Non-terminals that derive the empty
 * string get {@link EPSILON} in their set.
 *
 * Iterates over every production until no set changes.
 */
export function calcFirst(grammar: AugmentedGrammar): FirstMap {
  const firstMap: Map<GSymbol, Set<GSymbol>> = new Map();
  const getFirst = (k: GSymbol) => {
    let first = firstMap.get(k);
    if (!first) {
      first = new Set();
      firstMap.set(k, first);
    }
    return first;
  };

  for (const terminal of grammar.terminals) {
    firstMap.set(terminal, new Set([terminal]));
  }
  firstMap.set(EOF, new Set([EOF]));
  for (const nonTerminal of grammar.nonTerminals) {
    getFirst(nonTerminal);
  }

  // every pass that changes something adds at least one terminal (or ϵ)
  // to some non-terminal's set
  const bound =
    (grammar.terminals.length + 2) * grammar.nonTerminals.length + 1;
  let passes = 0;
  let done = false;
  while (!done) {
    if (++passes > bound) {
      throw new FixpointError('FIRST set computation', bound);
    }
    done = true;
    for (const production of grammar.productions) {
      const rhs = firstOfString(firstMap, production.symbols);
      if (addAll(getFirst(production.rule), rhs)) {
        done = false;
      }
    }
  }
  log(`FIRST sets converged after ${passes} passes`);
  return firstMap;
}

/**
 * Calculate the set of terminals that can immediately follow each
 * non-terminal. The goal symbol of the augmented grammar is followed by
 * {@link EOF}.
 *
 * @param grammar an augmented grammar
 * @param firstMap the first sets calculated with {@link calcFirst}
 */
export function calcFollow(
  grammar: AugmentedGrammar,
  firstMap: FirstMap
): FirstMap {
  const followMap: Map<GSymbol, Set<GSymbol>> = new Map();
  for (const nonTerminal of grammar.nonTerminals) {
    followMap.set(nonTerminal, new Set());
  }
  followMap.get(grammar.goal)?.add(EOF);
  const getFollow = (k: GSymbol) => followMap.get(k) ?? new Set<GSymbol>();

  const bound =
    (grammar.terminals.length + 1) * grammar.nonTerminals.length + 1;
  let passes = 0;
  let done = false;
  while (!done) {
    if (++passes > bound) {
      throw new FixpointError('FOLLOW set computation', bound);
    }
    done = true;
    for (const production of grammar.productions) {
      const A = production.rule;
      for (const [i, B] of production.symbols.entries()) {
        if (!grammar.isNonTerminal(B)) {
          continue;
        }
        const followB = getFollow(B);
        const firstBeta = firstOfString(
          firstMap,
          production.symbols.slice(i + 1)
        );
        const nullable = firstBeta.delete(EPSILON);
        if (addAll(followB, firstBeta)) {
          done = false;
        }
        if (nullable && addAll(followB, getFollow(A))) {
          done = false;
        }
      }
    }
  }
  log(`FOLLOW sets converged after ${passes} passes`);
  return followMap;
}

const sorted = (set: FirstSet) => [...set].sort();

/**
 * FIRST and FOLLOW sets of an augmented grammar, computed once.
 */
export class FirstFollow {
  readonly grammar: AugmentedGrammar;
  private readonly firstMap: FirstMap;
  private readonly followMap: FirstMap;

  constructor(grammar: AugmentedGrammar) {
    this.grammar = grammar;
    this.firstMap = calcFirst(grammar);
    this.followMap = calcFollow(grammar, this.firstMap);
  }

  first(symbol: GSymbol): FirstSet {
    return this.firstMap.get(symbol) ?? new Set();
  }

  firstOf(symbols: readonly GSymbol[]): FirstSet {
    return firstOfString(this.firstMap, symbols);
  }

  follow(nonTerminal: GSymbol): FirstSet {
    return this.followMap.get(nonTerminal) ?? new Set();
  }

  /**
   * FIRST sets of every grammar symbol, each sorted.
   */
  firstSets(): { [symbol: string]: string[] } {
    return Object.fromEntries(
      this.grammar.symbols.map((symbol): [GSymbol, string[]] => [
        symbol,
        sorted(this.first(symbol)),
      ])
    );
  }

  /**
   * FOLLOW sets of every non-terminal, each sorted.
   */
  followSets(): { [nonTerminal: string]: string[] } {
    return Object.fromEntries(
      this.grammar.nonTerminals.map((nonTerminal): [GSymbol, string[]] => [
        nonTerminal,
        sorted(this.follow(nonTerminal)),
      ])
    );
  }
}
