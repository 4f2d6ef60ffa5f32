export {
  EOF,
  EPSILON,
  Grammar,
  AugmentedGrammar,
  Production,
  buildGrammar,
  type GSymbol,
  type GrammarOptions,
  type RuleMap,
  type ProductionRule,
} from './grammar/grammar.js';
export { FirstFollow, calcFirst, calcFollow, firstOfString } from './grammar/first-follow.js';
export { ParseNode, type ParseTreeJSON } from './grammar/ParseNode.js';
export {
  InvalidGrammarError,
  ParseRejectedError,
  TokenizeError,
  FixpointError,
} from './lr/errors.js';
export { LRItem, ItemSet, closure, goto, type ReadonlyItemSet } from './lr/items.js';
export { LRAutomaton, buildAutomaton, type LRState, type Transition } from './lr/automaton.js';
export {
  ParsingTable,
  buildParsingTable,
  formatAction,
  lr0Lookahead,
  slr1Lookahead,
  type Conflict,
  type LRAction,
  type ParserType,
  type ReduceLookahead,
} from './lr/parsing-table.js';
export { generateTables, type LRTables } from './lr/generator.js';
export { LRParser, type ParseOutcome, type ParseStep } from './lr/LR-parser.js';
export { readGrammarText } from './lr-gen/grammar-text.js';
export { tokenize, type TokenizerMode } from './lr-gen/tokenizer.js';
export { loadConfig, fromEnv, type LRConfig } from './lr-gen/config.js';
export {
  generate,
  parse,
  describeTables,
  type GenerateResponse,
  type ParseResponse,
} from './lr-gen/api.js';
