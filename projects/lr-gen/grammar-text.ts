import { err, ok, type Result } from 'neverthrow';
import {
  EPSILON,
  Grammar,
  type GrammarOptions,
  type ProductionRule,
} from '../grammar/grammar.js';
import { InvalidGrammarError } from '../lr/errors.js';

const ARROWS = ['->', '→'];
const EMPTY_ALTERNATIVES = new Set([EPSILON, 'epsilon']);

function findArrow(line: string): { index: number; length: number } | null {
  let found: { index: number; length: number } | null = null;
  for (const arrow of ARROWS) {
    const index = line.indexOf(arrow);
    if (index >= 0 && (found === null || index < found.index)) {
      found = { index, length: arrow.length };
    }
  }
  return found;
}

/**
 * Split the right hand side of a rule into alternatives of symbols.
 *
 * Symbols are separated by whitespace and alternatives by `|`. A symbol
 * that starts with a quote runs to the matching quote, so `'|'` is the
 * terminal `|`. A quote anywhere else is part of the symbol, as in `E'`.
 * Quoted symbols may not contain whitespace: symbols are printed space
 * separated in items, stacks and traces.
 */
export function splitAlternatives(
  rhs: string,
  line?: number
): Result<string[][], InvalidGrammarError> {
  const alternatives: string[][] = [];
  let symbols: string[] = [];
  let current = '';
  let quote: string | null = null;
  let quoted = false;
  const flush = () => {
    if (current.length > 0 || quoted) {
      symbols.push(current);
    }
    current = '';
    quoted = false;
  };

  for (const ch of rhs) {
    if (quote !== null) {
      if (ch === quote) {
        quote = null;
      } else if (/\s/.test(ch)) {
        return err(
          new InvalidGrammarError(
            `whitespace inside quoted symbol ${quote}${current}`,
            line
          )
        );
      } else {
        current += ch;
      }
    } else if ((ch === '"' || ch === "'") && current.length === 0) {
      quote = ch;
      quoted = true;
    } else if (/\s/.test(ch)) {
      flush();
    } else if (ch === '|') {
      flush();
      alternatives.push(symbols);
      symbols = [];
    } else {
      current += ch;
    }
  }
  if (quote !== null) {
    return err(new InvalidGrammarError(`unterminated ${quote} quote`, line));
  }
  flush();
  alternatives.push(symbols);

  return ok(
    alternatives.map((alternative) =>
      alternative.length === 1 && EMPTY_ALTERNATIVES.has(alternative[0])
        ? []
        : alternative
    )
  );
}

/**
 * Read a grammar written one rule per line:
 *
 *     E -> E + T | T
 *     T -> ( E ) | id | ε
 *
 * `→` works as the arrow too, blank lines and lines starting with `#`
 * are skipped, and a left hand side may appear on several lines.
 */
export function readGrammarText(
  text: string,
  options: GrammarOptions = {}
): Result<Grammar, InvalidGrammarError> {
  const rules: ProductionRule[] = [];
  for (const [i, raw] of text.split(/\r?\n/).entries()) {
    const lineNumber = i + 1;
    const line = raw.trim();
    if (line.length === 0 || line.startsWith('#')) {
      continue;
    }
    const arrow = findArrow(line);
    if (!arrow) {
      return err(
        new InvalidGrammarError(`expected '->' in '${line}'`, lineNumber)
      );
    }
    const rule = line.slice(0, arrow.index).trim();
    if (rule.length === 0) {
      return err(new InvalidGrammarError('missing left hand side', lineNumber));
    }
    if (/\s/.test(rule)) {
      return err(
        new InvalidGrammarError(
          `left hand side '${rule}' must be a single symbol`,
          lineNumber
        )
      );
    }
    const alternatives = splitAlternatives(
      line.slice(arrow.index + arrow.length),
      lineNumber
    );
    if (alternatives.isErr()) {
      return err(alternatives.error);
    }
    for (const symbols of alternatives.value) {
      rules.push({ rule, symbols });
    }
  }
  return Grammar.fromProductions(rules, options);
}
