import type { Result } from 'neverthrow';
import { EOF, type GSymbol } from '../grammar/grammar.js';
import type { ParseTreeJSON } from '../grammar/ParseNode.js';
import type { InvalidGrammarError } from '../lr/errors.js';
import { generateTables, type LRTables } from '../lr/generator.js';
import { LRParser, type ParseStep } from '../lr/LR-parser.js';
import {
  formatAction,
  type Conflict,
  type ParserType,
} from '../lr/parsing-table.js';
import { DEFAULT_CONFIG, type LRConfig } from './config.js';
import { readGrammarText } from './grammar-text.js';
import { tokenize } from './tokenizer.js';

export type ActionTableJSON = {
  [state: number]: { [terminal: string]: string };
};
export type GotoTableJSON = {
  [state: number]: { [nonTerminal: string]: number };
};
export type ShiftReduceConflictJSON = {
  state: number;
  symbol: string;
  shift: string;
  reduce: string;
};
export type ReduceReduceConflictJSON = {
  state: number;
  symbol: string;
  reduce1: string;
  reduce2: string;
};

export type GenerateResponse = {
  parser_type: ParserType;
  augmented_grammar: string[];
  states: { id: number; items: string[] }[];
  action_table: ActionTableJSON;
  goto_table: GotoTableJSON;
  dfa_transitions: { from: number; to: number; symbol: string }[];
  terminals: string[];
  non_terminals: string[];
  shift_reduce_conflicts: ShiftReduceConflictJSON[];
  reduce_reduce_conflicts: ReduceReduceConflictJSON[];
  /**
   * For SLR(1) tables this repeats `is_slr1`.
   */
  is_lr0: boolean;
  is_slr1?: boolean;
  first_sets?: { [symbol: string]: string[] };
  follow_sets?: { [nonTerminal: string]: string[] };
  num_states: number;
};

export type ParseResponse = {
  accepted: boolean;
  parse_tree: ParseTreeJSON | null;
  steps: ParseStep[];
  error: string | null;
};

export type ApiOptions = Partial<Omit<LRConfig, 'parserType'>>;

function shiftReduceJSON(conflict: Conflict): ShiftReduceConflictJSON {
  const [shift, reduce] =
    conflict.kept.type === 'shift'
      ? [conflict.kept, conflict.discarded]
      : [conflict.discarded, conflict.kept];
  return {
    state: conflict.state,
    symbol: conflict.symbol,
    shift: formatAction(shift),
    reduce: formatAction(reduce),
  };
}

function reduceReduceJSON(conflict: Conflict): ReduceReduceConflictJSON {
  return {
    state: conflict.state,
    symbol: conflict.symbol,
    reduce1: formatAction(conflict.kept),
    reduce2: formatAction(conflict.discarded),
  };
}

// Object.fromEntries defines own keys, so a symbol named __proto__
// stays a key.
function byState<V>(
  entries: [number, GSymbol, V][]
): { [state: number]: { [symbol: string]: V } } {
  const rows = new Map<number, [GSymbol, V][]>();
  for (const [state, symbol, value] of entries) {
    const row = rows.get(state) ?? [];
    row.push([symbol, value]);
    rows.set(state, row);
  }
  return Object.fromEntries(
    [...rows].map(([state, row]): [number, { [symbol: string]: V }] => [
      state,
      Object.fromEntries(row),
    ])
  );
}

/**
 * Flatten constructed tables into the plain JSON shape `generate`
 * responds with.
 */
export function describeTables(tables: LRTables): GenerateResponse {
  const { grammar, automaton, firstFollow, table } = tables;

  const actionTable: ActionTableJSON = byState(
    [...table.actionEntries()].map(([state, symbol, action]): [
      number,
      GSymbol,
      string
    ] => [
      state,
      symbol,
      formatAction(action),
    ])
  );
  const gotoTable: GotoTableJSON = byState([...table.gotoEntries()]);

  const response: GenerateResponse = {
    parser_type: table.parserType,
    augmented_grammar: grammar.productions.map((p) => p.toString()),
    states: automaton.states.map((state) => ({
      id: state.id,
      items: state.items.sorted().map((item) => item.toString()),
    })),
    action_table: actionTable,
    goto_table: gotoTable,
    dfa_transitions: automaton.transitions.map(({ from, to, symbol }) => ({
      from,
      to,
      symbol,
    })),
    terminals: [...grammar.terminals, EOF],
    non_terminals: [...grammar.nonTerminals],
    shift_reduce_conflicts: table.shiftReduceConflicts.map(shiftReduceJSON),
    reduce_reduce_conflicts: table.reduceReduceConflicts.map(reduceReduceJSON),
    is_lr0: table.isValid,
    num_states: automaton.numStates,
  };
  if (firstFollow) {
    response.is_slr1 = table.isValid;
    response.first_sets = firstFollow.firstSets();
    response.follow_sets = firstFollow.followSets();
  }
  return response;
}

/**
 * Build LR(0) or SLR(1) tables for a grammar written in the text format
 * {@link readGrammarText} reads.
 */
export function generate(
  grammarText: string,
  parserType: ParserType = DEFAULT_CONFIG.parserType,
  options: ApiOptions = {}
): Result<GenerateResponse, InvalidGrammarError> {
  return readGrammarText(grammarText, { start: options.start }).map(
    (grammar) => describeTables(generateTables(grammar, parserType))
  );
}

/**
 * Build tables for the grammar and run the parser over the tokenized
 * input. Rejected input is a successful response with `accepted: false`;
 * only an invalid grammar is an error.
 */
export function parse(
  grammarText: string,
  input: string,
  parserType: ParserType = DEFAULT_CONFIG.parserType,
  options: ApiOptions = {}
): Result<ParseResponse, InvalidGrammarError> {
  return readGrammarText(grammarText, { start: options.start }).map(
    (grammar): ParseResponse => {
      const { table } = generateTables(grammar, parserType);
      const tokens = tokenize(
        input,
        grammar.terminals,
        options.tokenizer ?? DEFAULT_CONFIG.tokenizer
      );
      if (tokens.isErr()) {
        return {
          accepted: false,
          parse_tree: null,
          steps: [],
          error: tokens.error.message,
        };
      }
      const parser = new LRParser(table, {
        maxSteps: options.maxSteps ?? DEFAULT_CONFIG.maxSteps,
      });
      const outcome = parser.parse(tokens.value);
      if (outcome.accepted) {
        return {
          accepted: true,
          parse_tree: outcome.tree.toJSON(),
          steps: outcome.steps,
          error: null,
        };
      }
      return {
        accepted: false,
        parse_tree: null,
        steps: outcome.steps,
        error: outcome.error.message,
      };
    }
  );
}
