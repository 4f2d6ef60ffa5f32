import { err, ok, type Result } from 'neverthrow';
import type { GSymbol } from '../grammar/grammar.js';
import { TokenizeError } from '../lr/errors.js';

export type TokenizerMode = 'simple' | 'longest';

export const OPERATORS: ReadonlySet<string> = new Set([
  '+', '-', '*', '/', '(', ')', '=', ',', ';', ':', '.', '&', '|', '!', '<', '>',
]);

/**
 * Split on whitespace, then split every chunk around the characters in
 * {@link OPERATORS}. A whitespace separated chunk that is a terminal on
 * its own is kept whole. Every token must be one of `terminals`.
 */
export function tokenizeSimple(
  input: string,
  terminals: readonly GSymbol[]
): Result<GSymbol[], TokenizeError> {
  const known = new Set(terminals);
  const tokens: string[] = [];
  for (const part of input.split(/\s+/)) {
    if (part.length === 0) {
      continue;
    }
    if (known.has(part)) {
      tokens.push(part);
      continue;
    }
    let current = '';
    for (const ch of part) {
      if (OPERATORS.has(ch)) {
        if (current.length > 0) {
          tokens.push(current);
          current = '';
        }
        tokens.push(ch);
      } else {
        current += ch;
      }
    }
    if (current.length > 0) {
      tokens.push(current);
    }
  }

  for (const [position, token] of tokens.entries()) {
    if (!known.has(token)) {
      return err(new TokenizeError(token, position, [...terminals]));
    }
  }
  return ok(tokens);
}

/**
 * Repeatedly match the longest terminal at the current position,
 * skipping whitespace between tokens.
 */
export function tokenizeLongest(
  input: string,
  terminals: readonly GSymbol[]
): Result<GSymbol[], TokenizeError> {
  const byLength = [...terminals].sort((a, b) => b.length - a.length);
  const tokens: string[] = [];
  let offset = 0;
  while (offset < input.length) {
    if (/\s/.test(input[offset])) {
      offset++;
      continue;
    }
    const match = byLength.find((t) => input.startsWith(t, offset));
    if (match === undefined) {
      return err(new TokenizeError(input[offset], tokens.length, [...terminals]));
    }
    tokens.push(match);
    offset += match.length;
  }
  return ok(tokens);
}

export function tokenize(
  input: string,
  terminals: readonly GSymbol[],
  mode: TokenizerMode = 'simple'
): Result<GSymbol[], TokenizeError> {
  return mode === 'longest'
    ? tokenizeLongest(input, terminals)
    : tokenizeSimple(input, terminals);
}
