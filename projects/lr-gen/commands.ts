import { generateTables } from '../lr/generator.js';
import { LRParser } from '../lr/LR-parser.js';
import { colors } from '../utils/debug.js';
import { generate, parse } from './api.js';
import type { LRConfig } from './config.js';
import { readGrammarText } from './grammar-text.js';
import { formatTablesReport, formatTrace } from './report.js';
import { tokenize } from './tokenizer.js';

export const ExitCode = {
  ok: 0,
  invalidGrammar: 1,
  rejected: 2,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type Output = {
  out: (text: string) => void;
  err: (text: string) => void;
};

export type CommandOptions = LRConfig & { json: boolean };

export function runGenerate(
  grammarText: string,
  options: CommandOptions,
  output: Output
): ExitCode {
  if (options.json) {
    const response = generate(grammarText, options.parserType, options);
    if (response.isErr()) {
      output.err(response.error.message);
      return ExitCode.invalidGrammar;
    }
    output.out(JSON.stringify(response.value, null, 2));
    return ExitCode.ok;
  }

  const grammar = readGrammarText(grammarText, { start: options.start });
  if (grammar.isErr()) {
    output.err(colors.red(grammar.error.message));
    return ExitCode.invalidGrammar;
  }
  output.out(formatTablesReport(generateTables(grammar.value, options.parserType)));
  return ExitCode.ok;
}

export function runParse(
  grammarText: string,
  input: string,
  options: CommandOptions,
  output: Output
): ExitCode {
  if (options.json) {
    const response = parse(grammarText, input, options.parserType, options);
    if (response.isErr()) {
      output.err(response.error.message);
      return ExitCode.invalidGrammar;
    }
    output.out(JSON.stringify(response.value, null, 2));
    return response.value.accepted ? ExitCode.ok : ExitCode.rejected;
  }

  const grammar = readGrammarText(grammarText, { start: options.start });
  if (grammar.isErr()) {
    output.err(colors.red(grammar.error.message));
    return ExitCode.invalidGrammar;
  }
  const tokens = tokenize(input, grammar.value.terminals, options.tokenizer);
  if (tokens.isErr()) {
    output.err(colors.red(tokens.error.message));
    return ExitCode.rejected;
  }
  const { table } = generateTables(grammar.value, options.parserType);
  const outcome = new LRParser(table, { maxSteps: options.maxSteps }).parse(
    tokens.value
  );
  output.out(formatTrace(outcome.steps));
  if (!outcome.accepted) {
    output.err(colors.red(outcome.error.message));
    return ExitCode.rejected;
  }
  output.out(outcome.tree.pretty());
  return ExitCode.ok;
}
