import * as debug from '../utils/debug';
import { calcFirst, type FirstMap, isNullable } from './first-follow';
import type { Grammar, Production } from './grammar';
import { type NonTerminal, Terminal } from './symbols';

export type LeftRecursionReport = {
  /**
   * Productions whose body starts with their own head, like `S -> S a`.
   */
  readonly direct: readonly Production[];
  /**
   * Non-terminals that derive a string starting with themselves through
   * other non-terminals or a nullable prefix.
   */
  readonly indirect: readonly NonTerminal[];
};

export function hasLeftRecursion(report: LeftRecursionReport): boolean {
  return report.direct.length > 0 || report.indirect.length > 0;
}

export function findDirectLeftRecursion(grammar: Grammar): Production[] {
  return grammar.productions.filter((p) => p.isLeftRecursive());
}

/**
 * The left-corner graph: an edge A -> B for every non-terminal B that can be
 * the leftmost symbol of something A derives in one step, looking past
 * nullable symbols. The position-0 self edges of direct left recursion are
 * left out so the two kinds of recursion are reported separately.
 */
export function leftCornerGraph(
  grammar: Grammar,
  firstMap: FirstMap
): Map<string, NonTerminal[]> {
  const graph: Map<string, NonTerminal[]> = new Map();
  for (const nonTerminal of grammar.getNonTerminals()) {
    graph.set(nonTerminal.name, []);
  }
  for (const production of grammar.productionsIter()) {
    const edges = graph.get(production.head.name) ?? [];
    for (const [i, symbol] of production.symbols.entries()) {
      if (symbol instanceof Terminal) {
        break;
      }
      const isDirect = i === 0 && symbol.equals(production.head);
      if (!isDirect && !edges.some((e) => e.equals(symbol))) {
        edges.push(symbol);
      }
      if (!isNullable(firstMap, symbol)) {
        break;
      }
    }
  }
  return graph;
}

/**
 * Depth first search from the successors of `start`, with an explicit stack
 * and a visited set so cyclic grammars terminate.
 */
function reachesItself(
  graph: ReadonlyMap<string, readonly NonTerminal[]>,
  start: NonTerminal
): boolean {
  const visited: Set<string> = new Set();
  const stack: NonTerminal[] = [...(graph.get(start.name) ?? [])];
  let node: NonTerminal | undefined;
  while ((node = stack.pop()) !== undefined) {
    if (node.equals(start)) {
      return true;
    }
    if (visited.has(node.name)) {
      continue;
    }
    visited.add(node.name);
    stack.push(...(graph.get(node.name) ?? []));
  }
  return false;
}

/**
 * Finds direct and indirect left recursion. Skipping nullable prefixes needs
 * FIRST sets, which are computed here unless the caller already has them.
 */
export function findLeftRecursion(
  grammar: Grammar,
  firstMap: FirstMap = calcFirst(grammar)
): LeftRecursionReport {
  const direct = findDirectLeftRecursion(grammar);
  const graph = leftCornerGraph(grammar, firstMap);
  const indirect = grammar
    .getNonTerminals()
    .filter((nt) => reachesItself(graph, nt));
  debug.log(
    'findLeftRecursion:',
    `${direct.length} direct,`,
    `${indirect.length} indirect`
  );
  return { direct, indirect };
}
