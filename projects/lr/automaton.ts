import type { Grammar, AugmentedGrammar, GSymbol } from '../grammar/grammar.js';
import { HashMap } from '../utils/sets.js';
import { log, colors, type IHaveDebugStr } from '../utils/debug.js';
import {
  closure,
  goto,
  LRItem,
  type ItemSet,
  type ReadonlyItemSet,
} from './items.js';
import { FixpointError } from './errors.js';

export type LRState = {
  readonly id: number;
  readonly items: ReadonlyItemSet;
};

export type Transition = {
  readonly from: number;
  readonly symbol: GSymbol;
  readonly to: number;
};

/**
 * The LR(0) automaton of an augmented grammar. States are kept in an
 * array indexed by their id, transitions as an edge list plus an
 * adjacency map keyed by state id.
 */
export class LRAutomaton implements IHaveDebugStr {
  readonly grammar: AugmentedGrammar;
  readonly states: readonly LRState[];
  readonly transitions: readonly Transition[];
  private readonly edges: Map<number, Map<GSymbol, number>> = new Map();

  constructor(
    grammar: AugmentedGrammar,
    states: readonly LRState[],
    transitions: readonly Transition[]
  ) {
    this.grammar = grammar;
    this.states = states;
    this.transitions = transitions;
    for (const { from, symbol, to } of transitions) {
      let out = this.edges.get(from);
      if (!out) {
        out = new Map();
        this.edges.set(from, out);
      }
      out.set(symbol, to);
    }
  }

  get numStates(): number {
    return this.states.length;
  }

  goto(state: number, symbol: GSymbol): number | undefined {
    return this.edges.get(state)?.get(symbol);
  }

  outgoing(state: number): ReadonlyMap<GSymbol, number> {
    return this.edges.get(state) ?? new Map();
  }

  toDebugStr(): string {
    let out = '';
    for (const state of this.states) {
      out += colors.bold(`I${state.id}:`) + '\n';
      for (const item of state.items.sorted()) {
        out += `  ${item.toString()}\n`;
      }
      for (const [symbol, to] of this.outgoing(state.id)) {
        out += `  ${colors.blue(`-- ${symbol} --> I${to}`)}\n`;
      }
    }
    return out;
  }
}

/**
 * Construct the LR(0) automaton of a grammar, augmenting it first.
 *
 * States are discovered breadth first from `closure({[S' → •S]})`. For
 * each state the symbols are tried terminals first, then non-terminals,
 * each in grammar order, so ids are the same on every run.
 */
export function buildAutomaton(grammar: Grammar): LRAutomaton {
  const augmented = grammar.augment();
  const initial = closure(augmented, [
    new LRItem(augmented.goalProduction, 0),
  ]);
  const states: LRState[] = [{ id: 0, items: initial.freeze() }];
  const ids: HashMap<ItemSet, number> = new HashMap((set) => set.key());
  ids.set(initial, 0);
  const transitions: Transition[] = [];

  const symbols = augmented.symbols;
  const bound = augmented.itemCount * symbols.length;
  // states are appended in discovery order, so walking the array is a
  // FIFO worklist
  for (let next = 0; next < states.length; next++) {
    if (states.length > bound) {
      throw new FixpointError('state discovery', bound);
    }
    const from = states[next];
    for (const symbol of symbols) {
      const target = goto(augmented, from.items, symbol);
      if (target.size === 0) {
        continue;
      }
      let to = ids.get(target);
      if (to === undefined) {
        to = states.length;
        states.push({ id: to, items: target.freeze() });
        ids.set(target, to);
        log(`discovered state ${to} from ${from.id} on '${symbol}'`);
      }
      transitions.push({ from: from.id, symbol, to });
    }
  }
  return new LRAutomaton(augmented, states, transitions);
}
