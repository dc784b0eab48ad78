import { calcFirst, calcFollow, firstPlus } from '../first-follow';
import { buildGrammarOrThrow, type Grammar } from '../grammar';
import { buildLL1Table } from '../LL1-table';
import { EOF, lookaheadToString, NonTerminal } from '../symbols';
import { expressionGrammar } from './fixtures';

const build = (grammar: Grammar) => {
  const first = calcFirst(grammar);
  const follow = calcFollow(grammar, first);
  return { first, follow, ...buildLL1Table(grammar, first, follow) };
};

describe('buildLL1Table()', () => {
  const grammar = expressionGrammar();
  const { first, follow, table, conflicts } = build(grammar);

  test('fills one cell per lookahead of each production', () => {
    const cells = [...table.entries()].map(
      ([nt, col, p]) => `(${nt.name}, ${lookaheadToString(col)}) ${p}`
    );
    expect(cells).toEqual([
      '(E, () E -> T EREST',
      '(E, num) E -> T EREST',
      '(EREST, +) EREST -> + T EREST',
      '(EREST, $) EREST -> ε',
      '(EREST, )) EREST -> ε',
      '(T, () T -> F TREST',
      '(T, num) T -> F TREST',
      '(TREST, *) TREST -> * F TREST',
      '(TREST, $) TREST -> ε',
      '(TREST, +) TREST -> ε',
      '(TREST, )) TREST -> ε',
      '(F, () F -> ( E )',
      '(F, num) F -> num',
    ]);
    expect(table.size).toBe(13);
    expect(conflicts.isEmpty()).toBe(true);
  });

  test('looks up cells by non-terminal and lookahead', () => {
    expect(table.get(new NonTerminal('EREST'), EOF)?.toString()).toBe(
      'EREST -> ε'
    );
    expect(table.get(new NonTerminal('F'), '+')).toBeUndefined();
  });

  test('every production can be found under each of its lookaheads', () => {
    for (const production of grammar.productions) {
      for (const lookahead of firstPlus(first, follow, production)) {
        expect(table.get(production.head, lookahead)).toBe(production);
      }
    }
  });
});

describe('conflicts', () => {
  test('two alternatives starting with the same terminal', () => {
    const grammar = buildGrammarOrThrow({ S: [['a', 'S', 'b'], ['a', 'S', 'c']] });
    const { table, conflicts } = build(grammar);
    const S = new NonTerminal('S');
    expect(conflicts.size).toBe(1);
    expect(conflicts.get(S, 'a')?.map(String)).toEqual([
      'S -> a S b',
      'S -> a S c',
    ]);
    // the first production keeps the cell
    expect(table.get(S, 'a')?.toString()).toBe('S -> a S b');
  });

  test('an epsilon production whose FOLLOW overlaps a FIRST', () => {
    const grammar = buildGrammarOrThrow({
      S: [['A', 'a']],
      A: [['a'], []],
    });
    const { conflicts } = build(grammar);
    expect(conflicts.get(new NonTerminal('A'), 'a')?.map(String)).toEqual([
      'A -> a',
      'A -> ε',
    ]);
  });

  test('more than two productions competing for one cell', () => {
    const grammar = buildGrammarOrThrow({
      S: [['A'], ['B'], ['D'], ['c']],
      A: [[]],
      B: [[]],
      D: [[]],
    });
    const { conflicts } = build(grammar);
    const entries = [...conflicts.entries()].map(([key, productions]) => [
      `${key.nonTerminal.name}, ${lookaheadToString(key.lookahead)}`,
      productions.map(String),
    ]);
    expect(entries).toEqual([['S, $', ['S -> A', 'S -> B', 'S -> D']]]);
  });
});
