import {
  EOF,
  type AugmentedGrammar,
  type GSymbol,
  type Production,
} from '../grammar/grammar.js';
import type { FirstFollow } from '../grammar/first-follow.js';
import { Table } from '../utils/data-structures/table.js';
import { colors, log, type IHaveDebugStr } from '../utils/debug.js';
import type { LRAutomaton } from './automaton.js';

export type ParserType = 'lr0' | 'slr1';

export type LRAction =
  | { readonly type: 'shift'; readonly state: number }
  | { readonly type: 'reduce'; readonly production: number }
  | { readonly type: 'accept' };

export const shift = (state: number): LRAction => ({ type: 'shift', state });
export const reduce = (production: number): LRAction => ({
  type: 'reduce',
  production,
});
export const accept: LRAction = { type: 'accept' };

/**
 * The text form of an action: `s3`, `r2` or `acc`.
 */
export function formatAction(action: LRAction): string {
  switch (action.type) {
    case 'shift':
      return `s${action.state}`;
    case 'reduce':
      return `r${action.production}`;
    case 'accept':
      return 'acc';
  }
}

export function parseAction(text: string): LRAction | undefined {
  if (text === 'acc' || text === 'accept') {
    return accept;
  }
  const match = /^([sr])(\d+)$/.exec(text);
  if (!match) {
    return undefined;
  }
  const n = parseInt(match[2], 10);
  return match[1] === 's' ? shift(n) : reduce(n);
}

export function actionsEqual(a: LRAction, b: LRAction): boolean {
  return formatAction(a) === formatAction(b);
}

export type ConflictKind = 'shift-reduce' | 'reduce-reduce';

export type Conflict = {
  readonly state: number;
  readonly symbol: GSymbol;
  readonly kind: ConflictKind;
  /**
   * The action that was in the cell first and stays in the table.
   */
  readonly kept: LRAction;
  readonly discarded: LRAction;
};

/**
 * Chooses the lookahead terminals on which a complete item reduces.
 * This is the only thing that differs between LR(0) and SLR(1) tables.
 */
export interface ReduceLookahead {
  readonly parserType: ParserType;
  lookaheads(production: Production): Iterable<GSymbol>;
}

/**
 * LR(0): reduce on every terminal and the end marker.
 */
export function lr0Lookahead(grammar: AugmentedGrammar): ReduceLookahead {
  const all = [...grammar.terminals, EOF];
  return {
    parserType: 'lr0',
    lookaheads: () => all,
  };
}

/**
 * SLR(1): reduce only on the terminals in FOLLOW of the production's
 * left hand side.
 */
export function slr1Lookahead(firstFollow: FirstFollow): ReduceLookahead {
  const all = [...firstFollow.grammar.terminals, EOF];
  return {
    parserType: 'slr1',
    lookaheads: (production) => {
      const follow = firstFollow.follow(production.rule);
      return all.filter((t) => follow.has(t));
    },
  };
}

type ActionCell = { action: LRAction; discarded: LRAction[] };

/**
 * ACTION and GOTO tables of an LR automaton.
 *
 * Cells are filled state by state. Within a state the shift actions of
 * items `[A → α•aβ]` come first, then the actions of complete items,
 * both in item order (production index, then dot). When a cell already
 * holds a different action the first one stays and the newcomer is
 * recorded as a conflict. `accept` counts as reducing by production 0.
 */
export class ParsingTable implements IHaveDebugStr {
  readonly automaton: LRAutomaton;
  readonly grammar: AugmentedGrammar;
  readonly parserType: ParserType;
  private readonly actions: Map<number, Map<GSymbol, ActionCell>> = new Map();
  private readonly gotos: Map<number, Map<GSymbol, number>> = new Map();
  private readonly _conflicts: Conflict[] = [];

  constructor(automaton: LRAutomaton, lookahead: ReduceLookahead) {
    this.automaton = automaton;
    this.grammar = automaton.grammar;
    this.parserType = lookahead.parserType;

    for (const state of automaton.states) {
      const items = state.items.sorted();
      for (const item of items) {
        const a = item.next();
        if (a === undefined || !this.grammar.isTerminal(a)) {
          continue;
        }
        const to = automaton.goto(state.id, a);
        if (to !== undefined) {
          this.setAction(state.id, a, shift(to));
        }
      }
      for (const item of items) {
        if (!item.isComplete()) {
          continue;
        }
        if (item.production.rule === this.grammar.goal) {
          this.setAction(state.id, EOF, accept);
          continue;
        }
        for (const b of lookahead.lookaheads(item.production)) {
          this.setAction(state.id, b, reduce(item.production.index));
        }
      }
      for (const nonTerminal of this.grammar.nonTerminals) {
        const to = automaton.goto(state.id, nonTerminal);
        if (to !== undefined) {
          this.setGoto(state.id, nonTerminal, to);
        }
      }
    }
  }

  private setAction(state: number, symbol: GSymbol, action: LRAction) {
    let row = this.actions.get(state);
    if (!row) {
      row = new Map();
      this.actions.set(state, row);
    }
    const cell = row.get(symbol);
    if (!cell) {
      row.set(symbol, { action, discarded: [] });
      return;
    }
    if (actionsEqual(cell.action, action)) {
      return;
    }
    cell.discarded.push(action);
    const kind: ConflictKind =
      cell.action.type === 'shift' || action.type === 'shift'
        ? 'shift-reduce'
        : 'reduce-reduce';
    this._conflicts.push({
      state,
      symbol,
      kind,
      kept: cell.action,
      discarded: action,
    });
    log(
      colors.yellow(
        `${kind} conflict in state ${state} on '${symbol}': kept ${formatAction(
          cell.action
        )}, discarded ${formatAction(action)}`
      )
    );
  }

  private setGoto(state: number, nonTerminal: GSymbol, to: number) {
    let row = this.gotos.get(state);
    if (!row) {
      row = new Map();
      this.gotos.set(state, row);
    }
    row.set(nonTerminal, to);
  }

  get numStates(): number {
    return this.automaton.numStates;
  }

  action(state: number, terminal: GSymbol): LRAction | undefined {
    return this.actions.get(state)?.get(terminal)?.action;
  }

  /**
   * Actions that lost a conflict for this cell, in the order they came.
   */
  discarded(state: number, terminal: GSymbol): readonly LRAction[] {
    return this.actions.get(state)?.get(terminal)?.discarded ?? [];
  }

  goto(state: number, nonTerminal: GSymbol): number | undefined {
    return this.gotos.get(state)?.get(nonTerminal);
  }

  get conflicts(): readonly Conflict[] {
    return this._conflicts;
  }

  get shiftReduceConflicts(): readonly Conflict[] {
    return this._conflicts.filter((c) => c.kind === 'shift-reduce');
  }

  get reduceReduceConflicts(): readonly Conflict[] {
    return this._conflicts.filter((c) => c.kind === 'reduce-reduce');
  }

  /**
   * Whether the grammar is LR(0) (or SLR(1)) with respect to this table.
   */
  get isValid(): boolean {
    return this._conflicts.length === 0;
  }

  *actionEntries(): Generator<[number, GSymbol, LRAction]> {
    for (const [state, row] of this.actions) {
      for (const [symbol, cell] of row) {
        yield [state, symbol, cell.action];
      }
    }
  }

  *gotoEntries(): Generator<[number, GSymbol, number]> {
    for (const [state, row] of this.gotos) {
      for (const [symbol, to] of row) {
        yield [state, symbol, to];
      }
    }
  }

  toDebugStr(): string {
    const terminals = [...this.grammar.terminals, EOF];
    const nonTerminals = this.grammar.nonTerminals.filter(
      (nt) => nt !== this.grammar.goal
    );
    const table = Table.init(
      this.numStates + 1,
      1 + terminals.length + nonTerminals.length,
      () => ''
    );
    table.setCell(0, 0, 'state');
    terminals.forEach((t, i) => table.setCell(0, 1 + i, t));
    nonTerminals.forEach((nt, i) =>
      table.setCell(0, 1 + terminals.length + i, nt)
    );
    for (let state = 0; state < this.numStates; state++) {
      table.setCell(state + 1, 0, `${state}`);
      terminals.forEach((t, i) => {
        const action = this.action(state, t);
        if (action) {
          const conflicted = this.discarded(state, t).length > 0;
          table.setCell(
            state + 1,
            1 + i,
            formatAction(action) + (conflicted ? '!' : '')
          );
        }
      });
      nonTerminals.forEach((nt, i) => {
        const to = this.goto(state, nt);
        if (to !== undefined) {
          table.setCell(state + 1, 1 + terminals.length + i, `${to}`);
        }
      });
    }
    return table.toDebugStr();
  }
}

export function buildParsingTable(
  automaton: LRAutomaton,
  lookahead: ReduceLookahead
): ParsingTable {
  return new ParsingTable(automaton, lookahead);
}
