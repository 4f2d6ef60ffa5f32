import { err, ok, type Result } from 'neverthrow';
import { OrderedMap } from '../utils/data-structures/OrderedMap.js';
import { InvalidGrammarError } from '../lr/errors.js';
import { unwrap } from '../utils/result.js';

/**
 * Marks the empty string inside FIRST sets. Never a grammar symbol.
 */
export const EPSILON = 'ε';
/**
 * The end of input marker. Never a grammar symbol.
 */
export const EOF = '$';

export type GSymbol = string;

const RESERVED: ReadonlySet<GSymbol> = new Set([EPSILON, EOF]);

export class Production {
  /**
   * Position of the production in its grammar. Reduce actions and parse
   * tree nodes refer to productions by this number.
   */
  readonly index: number;

  /**
   * The left hand symbol. So the production:
   *   Expr -> Term Op Term
   * the `rule` would be `Expr`
   */
  readonly rule: GSymbol;

  /**
   * The right hand side of a production. So for the production:
   *   Expr -> Term Op Term
   * the `symbols` would be `[Term, Op, Term]`. Empty for ϵ productions.
   */
  readonly symbols: readonly GSymbol[];

  constructor(index: number, rule: GSymbol, symbols: readonly GSymbol[]) {
    this.index = index;
    this.rule = rule;
    this.symbols = symbols;
  }

  get isEpsilon(): boolean {
    return this.symbols.length === 0;
  }

  toString(): string {
    const body = this.isEpsilon ? EPSILON : this.symbols.join(' ');
    return `${this.rule} → ${body}`;
  }
}

export type ProductionRule = { rule: GSymbol; symbols: readonly GSymbol[] };

export type GrammarOptions = {
  /**
   * The start symbol. Defaults to the left hand side of the first production.
   */
  start?: GSymbol;
  /**
   * When given, every right hand side symbol must either be one of these
   * or have productions of its own.
   */
  terminals?: Iterable<GSymbol>;
};

function checkSymbol(
  symbol: GSymbol,
  where: string
): InvalidGrammarError | undefined {
  if (symbol.length === 0 || /\s/.test(symbol)) {
    return new InvalidGrammarError(`invalid symbol '${symbol}' ${where}`);
  }
  if (RESERVED.has(symbol)) {
    return new InvalidGrammarError(
      `'${symbol}' is reserved and cannot be used as a symbol ${where}`
    );
  }
  return undefined;
}

export class Grammar {
  readonly start: GSymbol;
  readonly productions: readonly Production[];
  private readonly byRule: OrderedMap<GSymbol, Production[]>;
  private readonly terminalList: readonly GSymbol[];
  private readonly terminalSet: ReadonlySet<GSymbol>;

  protected constructor(
    productions: readonly Production[],
    start: GSymbol,
    terminals: readonly GSymbol[]
  ) {
    this.productions = productions;
    this.start = start;
    this.terminalList = terminals;
    this.terminalSet = new Set(terminals);
    this.byRule = new OrderedMap();
    for (const production of productions) {
      const existing = this.byRule.get(production.rule);
      if (existing) {
        existing.push(production);
      } else {
        this.byRule.push(production.rule, [production]);
      }
    }
  }

  /**
   * Build a grammar from an ordered list of productions, classifying
   * symbols in two passes: first every left hand side becomes a
   * non-terminal, then the right hand sides are checked against them.
   */
  static fromProductions(
    rules: readonly ProductionRule[],
    options: GrammarOptions = {}
  ): Result<Grammar, InvalidGrammarError> {
    if (rules.length === 0) {
      return err(new InvalidGrammarError('grammar has no productions'));
    }

    const nonTerminals: Set<GSymbol> = new Set();
    for (const { rule } of rules) {
      const problem = checkSymbol(rule, 'on the left hand side');
      if (problem) {
        return err(problem);
      }
      nonTerminals.add(rule);
    }

    const start = options.start ?? rules[0].rule;
    if (!nonTerminals.has(start)) {
      return err(
        new InvalidGrammarError(`start symbol '${start}' has no productions`)
      );
    }

    let declared: Set<GSymbol> | undefined;
    if (options.terminals) {
      declared = new Set();
      for (const t of options.terminals) {
        const problem = checkSymbol(t, 'in the terminal list');
        if (problem) {
          return err(problem);
        }
        if (nonTerminals.has(t)) {
          return err(
            new InvalidGrammarError(
              `'${t}' is declared as a terminal but also has productions`
            )
          );
        }
        declared.add(t);
      }
    }

    const terminals: Set<GSymbol> = new Set(declared);
    const productions: Production[] = [];
    for (const [index, { rule, symbols }] of rules.entries()) {
      const production = new Production(index, rule, [...symbols]);
      for (const symbol of symbols) {
        const problem = checkSymbol(symbol, `in ${production}`);
        if (problem) {
          return err(problem);
        }
        if (nonTerminals.has(symbol)) {
          continue;
        }
        if (declared && !declared.has(symbol)) {
          return err(
            new InvalidGrammarError(
              `undefined symbol '${symbol}' in ${production}`
            )
          );
        }
        terminals.add(symbol);
      }
      productions.push(production);
    }

    if (terminals.size === 0) {
      return err(new InvalidGrammarError('grammar has no terminal symbols'));
    }
    return ok(new Grammar(productions, start, [...terminals]));
  }

  /**
   * Terminals in the order they first appear, without the end marker.
   */
  get terminals(): readonly GSymbol[] {
    return this.terminalList;
  }

  /**
   * Non-terminals in the order their first production appears.
   */
  get nonTerminals(): readonly GSymbol[] {
    return this.byRule.keys().toArray();
  }

  /**
   * Every grammar symbol: terminals first, then non-terminals.
   */
  get symbols(): readonly GSymbol[] {
    return [...this.terminals, ...this.nonTerminals];
  }

  isTerminal(symbol: GSymbol): boolean {
    return this.terminalSet.has(symbol) || symbol === EOF;
  }

  isNonTerminal(symbol: GSymbol): boolean {
    return this.byRule.has(symbol);
  }

  productionsFrom(rule: GSymbol): readonly Production[] {
    return this.byRule.get(rule) ?? [];
  }

  /**
   * The number of distinct LR(0) items the grammar has.
   */
  get itemCount(): number {
    let count = 0;
    for (const production of this.productions) {
      count += production.symbols.length + 1;
    }
    return count;
  }

  /**
   * Prepend the production `S' → S` with a fresh start symbol `S'`.
   */
  augment(): AugmentedGrammar {
    const taken = new Set(this.symbols);
    let goal = `${this.start}'`;
    while (taken.has(goal)) {
      goal += "'";
    }
    return new AugmentedGrammar(
      [
        new Production(0, goal, [this.start]),
        ...this.productions.map(
          (p) => new Production(p.index + 1, p.rule, p.symbols)
        ),
      ],
      this.start,
      this.terminals,
      goal
    );
  }

  toString() {
    let out = '\n';
    for (const productions of this.byRule.values()) {
      out += `${productions[0].rule} →\n`;
      for (const production of productions) {
        out += '  | ';
        out += production.isEpsilon
          ? EPSILON
          : production.symbols
              .map((s) => (this.isTerminal(s) ? `'${s}'` : s))
              .join(' ');
        out += '\n';
      }
    }
    return out;
  }
}

export class AugmentedGrammar extends Grammar {
  /**
   * The synthetic start symbol of the production at index 0.
   */
  readonly goal: GSymbol;

  constructor(
    productions: readonly Production[],
    start: GSymbol,
    terminals: readonly GSymbol[],
    goal: GSymbol
  ) {
    super(productions, start, terminals);
    if (productions[0]?.rule !== goal) {
      throw new Error(`first production must derive ${start} from ${goal}`);
    }
    this.goal = goal;
  }

  get goalProduction(): Production {
    return this.productions[0];
  }

  /**
   * Augmenting is idempotent: the first production already derives the
   * start symbol from the goal.
   */
  override augment(): AugmentedGrammar {
    return this;
  }
}

export type RuleMap = { [rule: string]: string[][] };

/**
 * Build a grammar from an object mapping each rule to its alternatives.
 * Throws {@link InvalidGrammarError} for an invalid grammar.
 */
export function buildGrammar(
  ruleMap: RuleMap,
  options: GrammarOptions = {}
): Grammar {
  const rules: ProductionRule[] = [];
  for (const [rule, alternatives] of Object.entries(ruleMap)) {
    for (const symbols of alternatives) {
      rules.push({ rule, symbols });
    }
  }
  return unwrap(Grammar.fromProductions(rules, options));
}
