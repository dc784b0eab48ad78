import { analyze } from '../analysis';
import { LeftRecursionError } from '../errors';
import { calcFirst, calcFollow } from '../first-follow';
import {
  formatConflicts,
  formatFirstSets,
  formatFollowSets,
  formatLeftRecursion,
  formatSet,
  formatTable,
  formatTrace,
} from '../format';
import { buildGrammarOrThrow } from '../grammar';
import { findLeftRecursion } from '../left-recursion';
import { buildLL1Table } from '../LL1-table';
import { LL1Parser } from '../LL1-parser';
import { EOF, EPSILON } from '../symbols';
import { expressionGrammar } from './fixtures';

const simple = () => buildGrammarOrThrow({ S: [['a', 'S'], ['b']] });

describe('formatSet()', () => {
  test('sorts members and shows the markers', () => {
    expect(formatSet(['b', EOF, 'a'])).toBe('{ $, a, b }');
    expect(formatSet([EPSILON, '+'])).toBe('{ +, ε }');
    expect(formatSet([])).toBe('{ }');
  });
});

describe('FIRST and FOLLOW sets', () => {
  test('one line per non-terminal', () => {
    const grammar = expressionGrammar();
    const first = calcFirst(grammar);
    expect(formatFirstSets(grammar, first)).toEqual([
      'FIRST(E) = { (, num }',
      'FIRST(EREST) = { +, ε }',
      'FIRST(T) = { (, num }',
      'FIRST(TREST) = { *, ε }',
      'FIRST(F) = { (, num }',
    ]);
    expect(formatFollowSets(grammar, calcFollow(grammar, first))).toEqual([
      'FOLLOW(E) = { $, ) }',
      'FOLLOW(EREST) = { $, ) }',
      'FOLLOW(T) = { $, ), + }',
      'FOLLOW(TREST) = { $, ), + }',
      'FOLLOW(F) = { $, ), *, + }',
    ]);
  });
});

describe('formatTable()', () => {
  test('pads the columns', () => {
    const grammar = simple();
    const first = calcFirst(grammar);
    const { table } = buildLL1Table(grammar, first, calcFollow(grammar, first));
    expect(formatTable(grammar, table)).toEqual([
      '  | a        | b      | $',
      'S | S -> a S | S -> b | -',
    ]);
  });
});

describe('formatConflicts()', () => {
  test('lists the competing productions, winner first', () => {
    const grammar = buildGrammarOrThrow({ S: [['a', 'S', 'b'], ['a', 'S', 'c']] });
    const { conflicts } = analyze(grammar)._unsafeUnwrap();
    expect(formatConflicts(conflicts)).toEqual([
      '(S, a): S -> a S b | S -> a S c',
    ]);
  });
});

describe('formatLeftRecursion()', () => {
  test('lists direct productions then indirect non-terminals', () => {
    const grammar = buildGrammarOrThrow({
      S: [['S', 'a'], ['A']],
      A: [['B', 'x']],
      B: [['A', 'y'], ['z']],
    });
    const error = new LeftRecursionError(findLeftRecursion(grammar));
    expect(formatLeftRecursion(error)).toEqual([
      'direct: S -> S a',
      'indirect: A',
      'indirect: B',
    ]);
  });
});

describe('formatTrace()', () => {
  test('shows stack, remaining input and action', () => {
    const parser = LL1Parser.fromGrammar(simple())._unsafeUnwrap();
    const { trace } = parser.parseTraced(['a', 'b']);
    expect(formatTrace(trace)).toEqual([
      'Stack | Input | Action',
      '$ S   | a b $ | expand S -> a S',
      '$ S a | a b $ | match a',
      '$ S   | b $   | expand S -> b',
      '$ b   | b $   | match b',
      '$     | $     | match $',
      '      |       | accept',
    ]);
  });

  test('ends with the error', () => {
    const parser = LL1Parser.fromGrammar(simple())._unsafeUnwrap();
    const lines = formatTrace(parser.parseTraced(['c']).trace);
    expect(lines[lines.length - 1]).toBe(
      '$ S   | c $   | error: ParseError: "No applicable production" at token 0: cannot expand S on c'
    );
  });
});
