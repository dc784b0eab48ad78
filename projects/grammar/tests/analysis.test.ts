import { analyze, isLL1, validate } from '../analysis';
import { AmbiguousGrammarError, LeftRecursionError } from '../errors';
import { buildGrammarOrThrow } from '../grammar';
import { expressionGrammar } from './fixtures';

describe('analyze()', () => {
  test('returns sets and table for a grammar without left recursion', () => {
    const grammar = expressionGrammar();
    const analysis = analyze(grammar)._unsafeUnwrap();
    expect(analysis.grammar).toBe(grammar);
    expect(analysis.table.size).toBe(13);
    expect(analysis.conflicts.isEmpty()).toBe(true);
    expect([...(analysis.follow.get('F') ?? [])].length).toBe(4);
  });

  test('stops at left recursion', () => {
    const result = analyze(buildGrammarOrThrow({ S: [['S', 'a'], ['b']] }));
    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(LeftRecursionError);
    expect(error.message).toBe('Grammar is left recursive (direct: S -> S a)');
    expect(error.productions.map(String)).toEqual(['S -> S a']);
    expect(error.nonTerminals).toEqual([]);
  });

  test('reports indirect left recursion by non-terminal', () => {
    const result = analyze(
      buildGrammarOrThrow({ A: [['B', 'x']], B: [['A', 'y'], ['z']] })
    );
    expect(result._unsafeUnwrapErr().message).toBe(
      'Grammar is left recursive (indirect: A, B)'
    );
  });

  test('still builds the table when productions conflict', () => {
    const analysis = analyze(
      buildGrammarOrThrow({ S: [['a', 'S', 'b'], ['a', 'S', 'c']] })
    )._unsafeUnwrap();
    expect(analysis.conflicts.size).toBe(1);
    expect(analysis.table.size).toBe(1);
  });
});

describe('validate()', () => {
  test('accepts an LL(1) grammar', () => {
    const result = validate(expressionGrammar());
    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap().ready).toBe(true);
  });

  test('rejects a left recursive grammar before building a table', () => {
    const result = validate(buildGrammarOrThrow({ S: [['S', 'a'], ['b']] }));
    expect(result._unsafeUnwrapErr()).toBeInstanceOf(LeftRecursionError);
  });

  test('rejects an ambiguous grammar and keeps the diagnostics', () => {
    const result = validate(
      buildGrammarOrThrow({ S: [['a', 'S', 'b'], ['a', 'S', 'c']] })
    );
    const error = result._unsafeUnwrapErr();
    if (!(error instanceof AmbiguousGrammarError)) {
      throw error;
    }
    expect(error.message).toBe('Grammar is not LL(1): conflicts at (S, a)');
    expect(error.analysis.conflicts.size).toBe(1);
  });

  test('names end of input conflicts with $', () => {
    const result = validate(
      buildGrammarOrThrow({ S: [['A'], ['B']], A: [[]], B: [[]] })
    );
    expect(result._unsafeUnwrapErr().message).toBe(
      'Grammar is not LL(1): conflicts at (S, $)'
    );
  });

  test('is idempotent and leaves the grammar alone', () => {
    const grammar = expressionGrammar();
    const before = grammar.toString();
    const first = validate(grammar)._unsafeUnwrap();
    const second = validate(grammar)._unsafeUnwrap();
    expect([...second.table.entries()]).toEqual([...first.table.entries()]);
    expect(grammar.toString()).toBe(before);
  });

  test('isLL1()', () => {
    expect(isLL1(expressionGrammar())).toBe(true);
    expect(isLL1(buildGrammarOrThrow({ S: [['S', 'a'], ['b']] }))).toBe(false);
  });
});
