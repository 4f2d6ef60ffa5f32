import type { FirstFollow } from '../grammar/first-follow.js';
import type { Grammar } from '../grammar/grammar.js';
import type { ParseStep } from '../lr/LR-parser.js';
import type { LRTables } from '../lr/generator.js';
import {
  formatAction,
  type Conflict,
  type ParsingTable,
} from '../lr/parsing-table.js';
import { Table } from '../utils/data-structures/table.js';
import { colors } from '../utils/debug.js';

export function formatProductions(grammar: Grammar): string {
  return grammar.productions
    .map((p) => `${String(p.index).padStart(3)}  ${p.toString()}`)
    .join('\n');
}

export function formatConflict(conflict: Conflict): string {
  return `state ${conflict.state} on '${conflict.symbol}': ${formatAction(
    conflict.kept
  )} / ${formatAction(conflict.discarded)} (${conflict.kind})`;
}

export function formatConflicts(table: ParsingTable): string {
  if (table.isValid) {
    return colors.green('no conflicts');
  }
  return table.conflicts
    .map((c) => colors.red(formatConflict(c)))
    .join('\n');
}

const setStr = (set: Iterable<string>) => `{ ${[...set].join(', ')} }`;

export function formatFirstFollow(firstFollow: FirstFollow): string {
  const first = Object.entries(firstFollow.firstSets())
    .filter(([symbol]) => firstFollow.grammar.isNonTerminal(symbol))
    .map(([symbol, set]) => `FIRST(${symbol}) = ${setStr(set)}`);
  const follow = Object.entries(firstFollow.followSets()).map(
    ([symbol, set]) => `FOLLOW(${symbol}) = ${setStr(set)}`
  );
  return [...first, ...follow].join('\n');
}

/**
 * Render parse steps as a table: step, stack, remaining input, action.
 */
export function formatTrace(steps: readonly ParseStep[]): string {
  const table = Table.init(steps.length + 1, 5, () => '');
  ['step', 'stack', 'input', 'action', ''].forEach((header, col) =>
    table.setCell(0, col, header)
  );
  steps.forEach((step, i) => {
    table.setCell(i + 1, 0, `${step.step}`);
    table.setCell(i + 1, 1, step.stack.join(' '));
    table.setCell(i + 1, 2, step.input.join(' '));
    table.setCell(i + 1, 3, step.action);
    table.setCell(i + 1, 4, step.message);
  });
  return table.toDebugStr();
}

const section = (title: string, body: string) =>
  `${colors.bold(title)}\n${body.replace(/\n+$/, '')}\n`;

/**
 * The human readable report `generate` prints: the augmented grammar,
 * the canonical collection, FIRST/FOLLOW sets for SLR(1) tables, the
 * ACTION/GOTO table and its conflicts.
 */
export function formatTablesReport(tables: LRTables): string {
  const { grammar, automaton, firstFollow, table } = tables;
  const sections = [
    section('Augmented grammar', formatProductions(grammar)),
    section(
      `Canonical LR(0) collection (${automaton.numStates} states)`,
      automaton.toDebugStr()
    ),
  ];
  if (firstFollow) {
    sections.push(section('FIRST / FOLLOW', formatFirstFollow(firstFollow)));
  }
  sections.push(
    section(
      `${table.parserType === 'lr0' ? 'LR(0)' : 'SLR(1)'} parsing table`,
      table.toDebugStr()
    ),
    section('Conflicts', formatConflicts(table))
  );
  return sections.join('\n');
}
