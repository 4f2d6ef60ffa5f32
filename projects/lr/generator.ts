import type { AugmentedGrammar, Grammar } from '../grammar/grammar.js';
import { FirstFollow } from '../grammar/first-follow.js';
import { log } from '../utils/debug.js';
import { buildAutomaton, type LRAutomaton } from './automaton.js';
import {
  buildParsingTable,
  lr0Lookahead,
  slr1Lookahead,
  type ParserType,
  type ParsingTable,
} from './parsing-table.js';

export type LRTables = {
  grammar: AugmentedGrammar;
  automaton: LRAutomaton;
  /**
   * Only computed for SLR(1) tables.
   */
  firstFollow: FirstFollow | null;
  table: ParsingTable;
};

/**
 * Run the whole construction for a grammar: augment it, build the LR(0)
 * automaton and synthesize the ACTION/GOTO tables of the requested kind.
 */
export function generateTables(
  grammar: Grammar,
  parserType: ParserType
): LRTables {
  const automaton = buildAutomaton(grammar);
  const augmented = automaton.grammar;
  const firstFollow =
    parserType === 'slr1' ? new FirstFollow(augmented) : null;
  const table = buildParsingTable(
    automaton,
    firstFollow ? slr1Lookahead(firstFollow) : lr0Lookahead(augmented)
  );
  log(
    `built ${parserType} table with ${automaton.numStates} states and ${table.conflicts.length} conflicts`
  );
  return { grammar: augmented, automaton, firstFollow, table };
}
