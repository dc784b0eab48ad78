import type { FirstMap, FollowMap } from './first-follow';
import type { LeftRecursionError } from './errors';
import type { Grammar } from './grammar';
import type { ConflictReport, LL1Table } from './LL1-table';
import type { ParseAction, ParseStep, StackSymbol } from './LL1-parser';
import {
  EOF,
  type Eof,
  type Epsilon,
  type Lookahead,
  lookaheadToString,
} from './symbols';

/**
 * Plain text renderings of analysis results, for the CLI and for anyone
 * else who wants to show them. ε stands for the empty string, $ for the
 * end of input.
 */

export function formatSet(set: Iterable<string | Epsilon | Eof>): string {
  const items = [...set].map(lookaheadToString).sort();
  return items.length === 0 ? '{ }' : `{ ${items.join(', ')} }`;
}

export function formatFirstSets(grammar: Grammar, first: FirstMap): string[] {
  return grammar
    .getNonTerminals()
    .map((nt) => `FIRST(${nt.name}) = ${formatSet(first.get(nt.name) ?? [])}`);
}

export function formatFollowSets(
  grammar: Grammar,
  follow: FollowMap
): string[] {
  return grammar
    .getNonTerminals()
    .map(
      (nt) => `FOLLOW(${nt.name}) = ${formatSet(follow.get(nt.name) ?? [])}`
    );
}

function formatRows(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) => cell.padEnd(widths[i]))
      .join(' | ')
      .trimEnd()
  );
}

/**
 * One row per non-terminal, one column per terminal plus $.
 */
export function formatTable(grammar: Grammar, table: LL1Table): string[] {
  const columns: Lookahead[] = [
    ...grammar.getTerminals().map((t) => t.name),
    EOF,
  ];
  const header = ['', ...columns.map(lookaheadToString)];
  const rows = grammar.getNonTerminals().map((nt) => [
    nt.name,
    ...columns.map((col) => table.get(nt, col)?.toString() ?? '-'),
  ]);
  return formatRows([header, ...rows]);
}

export function formatConflicts(conflicts: ConflictReport): string[] {
  return [...conflicts.entries()].map(
    ([{ nonTerminal, lookahead }, productions]) =>
      `(${nonTerminal.name}, ${lookaheadToString(lookahead)}): ${productions
        .map((p) => p.toString())
        .join(' | ')}`
  );
}

export function formatLeftRecursion(error: LeftRecursionError): string[] {
  return [
    ...error.productions.map((p) => `direct: ${p}`),
    ...error.nonTerminals.map((nt) => `indirect: ${nt.name}`),
  ];
}

const formatStack = (stack: readonly StackSymbol[]) =>
  stack.map((s) => (s === EOF ? '$' : s.name)).join(' ');

function formatAction(action: ParseAction): string {
  switch (action.type) {
    case 'match':
      return `match ${action.terminal === EOF ? '$' : action.terminal.name}`;
    case 'expand':
      return `expand ${action.production}`;
    case 'accept':
      return 'accept';
    case 'error':
      return `error: ${action.error.message}`;
  }
}

/**
 * A three column table of stack, remaining input and action for every step.
 */
export function formatTrace(trace: readonly ParseStep[]): string[] {
  return formatRows([
    ['Stack', 'Input', 'Action'],
    ...trace.map((step) => [
      formatStack(step.stack),
      step.input.map(lookaheadToString).join(' '),
      formatAction(step.action),
    ]),
  ]);
}
