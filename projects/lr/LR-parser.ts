import { err, ok, type Result } from 'neverthrow';
import { EOF, type GSymbol } from '../grammar/grammar.js';
import { ParseNode } from '../grammar/ParseNode.js';
import { log } from '../utils/debug.js';
import { ParseRejectedError, type RejectReason } from './errors.js';
import { formatAction, type ParsingTable } from './parsing-table.js';

export const DEFAULT_MAX_STEPS = 10000;

/**
 * One configuration of the stack machine, recorded before the
 * transition it names is applied.
 */
export type ParseStep = {
  step: number;
  state: number;
  token: GSymbol;
  /**
   * Index of `token` in the input. The end marker sits at
   * `tokens.length`.
   */
  position: number;
  /**
   * States and symbols, alternating, bottom first.
   */
  stack: (number | GSymbol)[];
  /**
   * The remaining input, end marker included.
   */
  input: GSymbol[];
  /**
   * `sN`, `rN`, `acc`, or `error`.
   */
  action: string;
  message: string;
  production?: string;
};

export type ParseOutcome =
  | { accepted: true; tree: ParseNode; steps: ParseStep[] }
  | { accepted: false; error: ParseRejectedError; steps: ParseStep[] };

export type ParserOptions = {
  /**
   * Give up after this many steps.
   */
  maxSteps?: number;
};

/**
 * Table driven shift-reduce parser. Each call to {@link LRParser.parse}
 * works on its own stack, so one parser can be shared.
 */
export class LRParser {
  readonly table: ParsingTable;
  private readonly maxSteps: number;

  constructor(table: ParsingTable, options: ParserOptions = {}) {
    this.table = table;
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  }

  parseOrThrow(tokens: readonly GSymbol[]): ParseNode {
    const outcome = this.parse(tokens);
    if (outcome.accepted) {
      return outcome.tree;
    }
    throw outcome.error;
  }

  parse(tokens: readonly GSymbol[]): ParseOutcome {
    const steps: ParseStep[] = [];
    const generator = this.parseGen(tokens);
    let state = generator.next();
    while (!state.done) {
      steps.push(state.value);
      state = generator.next();
    }
    const result = state.value;
    if (result.isOk()) {
      return { accepted: true, tree: result.value, steps };
    }
    return { accepted: false, error: result.error, steps };
  }

  /**
   * Runs the stack machine, yielding every step before applying it.
   * Returns the parse tree, or the reason the input was rejected.
   */
  *parseGen(
    tokens: readonly GSymbol[]
  ): Generator<ParseStep, Result<ParseNode, ParseRejectedError>> {
    const grammar = this.table.grammar;
    const input = [...tokens, EOF];
    // the stack is kept as three parallel arrays: states has one more
    // entry than symbols and nodes
    const states: number[] = [0];
    const symbols: GSymbol[] = [];
    const nodes: ParseNode[] = [];
    let position = 0;

    for (let step = 1; ; step++) {
      const state = states[states.length - 1];
      const token = input[position];
      const configuration = {
        step,
        state,
        token,
        position,
        stack: snapshot(states, symbols),
        input: input.slice(position),
      };
      const reject = (reason: RejectReason, message: string) => {
        log(`step ${step}: ${message}`);
        return new ParseRejectedError(
          reason,
          {
            state,
            token,
            position,
            parseStack: configuration.stack,
          },
          message
        );
      };

      if (step > this.maxSteps) {
        const error = reject(
          'step-limit',
          `Parser exceeded maximum steps (${this.maxSteps})`
        );
        yield { ...configuration, action: 'error', message: error.message };
        return err(error);
      }

      const action = this.table.action(state, token);
      if (!action) {
        const error = reject(
          'no-action',
          `No action defined for state ${state} and token '${token}' at position ${position}`
        );
        yield { ...configuration, action: 'error', message: error.message };
        return err(error);
      }

      switch (action.type) {
        case 'shift': {
          const message = `Shift ${token}, goto state ${action.state}`;
          log(`step ${step}: ${message}`);
          yield { ...configuration, action: formatAction(action), message };
          states.push(action.state);
          symbols.push(token);
          nodes.push(ParseNode.forToken(token, position));
          position++;
          break;
        }
        case 'reduce': {
          const production = grammar.productions[action.production];
          const k = production.symbols.length;
          const exposed = states[states.length - 1 - k];
          const target =
            exposed === undefined
              ? undefined
              : this.table.goto(exposed, production.rule);
          if (target === undefined) {
            const error = reject(
              'no-goto',
              `No GOTO defined for state ${exposed} and non-terminal ${production.rule}`
            );
            yield { ...configuration, action: 'error', message: error.message };
            return err(error);
          }
          const message = `Reduce ${production.toString()}, goto state ${target}`;
          log(`step ${step}: ${message}`);
          yield {
            ...configuration,
            action: formatAction(action),
            message,
            production: production.toString(),
          };
          states.splice(states.length - k, k);
          symbols.splice(symbols.length - k, k);
          const children = nodes.splice(nodes.length - k, k);
          states.push(target);
          symbols.push(production.rule);
          nodes.push(new ParseNode(production.rule, production, children));
          break;
        }
        case 'accept': {
          if (position !== input.length - 1) {
            const error = reject(
              'no-action',
              `Unexpected end marker at position ${position}`
            );
            yield { ...configuration, action: 'error', message: error.message };
            return err(error);
          }
          const message = 'Input accepted!';
          log(`step ${step}: ${message}`);
          yield { ...configuration, action: formatAction(action), message };
          return ok(nodes[nodes.length - 1]);
        }
      }
    }
  }
}

function snapshot(
  states: readonly number[],
  symbols: readonly GSymbol[]
): (number | GSymbol)[] {
  const stack: (number | GSymbol)[] = [states[0]];
  for (let i = 0; i < symbols.length; i++) {
    stack.push(symbols[i], states[i + 1]);
  }
  return stack;
}
