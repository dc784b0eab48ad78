import { err, ok, Result } from 'neverthrow';
import * as debug from '../utils/debug';
import { type GrammarError, validate, type ValidGrammar } from './analysis';
import { ParseError, ParseErrorType } from './errors';
import type { Grammar, Production } from './grammar';
import type { LL1Table } from './LL1-table';
import {
  EOF,
  type Eof,
  type GrammarSymbol,
  type Lookahead,
  lookaheadToString,
  Terminal,
} from './symbols';

export type StackSymbol = GrammarSymbol | Eof;

export type ParseAction =
  | { type: 'match'; terminal: Terminal | Eof }
  | { type: 'expand'; production: Production }
  | { type: 'accept' }
  | { type: 'error'; error: ParseError };

/**
 * The parser state right before `action` was taken. `stack` is listed from
 * the bottom up, so the last element is the top.
 */
export type ParseStep = {
  readonly stack: readonly StackSymbol[];
  readonly input: readonly Lookahead[];
  readonly action: ParseAction;
};

export type ParseAccept = {
  /**
   * Number of tokens consumed, not counting the end of input.
   */
  readonly tokens: number;
  /**
   * The productions of the leftmost derivation, in the order they were
   * expanded.
   */
  readonly derivation: readonly Production[];
};

export type ParseResult = Result<ParseAccept, ParseError>;

const stackToString = (stack: readonly StackSymbol[]) =>
  stack.map((s) => (s === EOF ? '$' : s.name)).join(' ');

/**
 * Table driven LL(1) skeleton parser. Yields the state before every step
 * and returns the verdict, so that the plain and traced parsers make
 * exactly the same decisions.
 */
export function* parseGen(
  table: LL1Table,
  grammar: Grammar,
  tokens: readonly string[]
): Generator<ParseStep, ParseResult> {
  const stack: StackSymbol[] = [EOF, grammar.start];
  let cursor = 0;
  const derivation: Production[] = [];

  const word = (): Lookahead =>
    cursor < tokens.length ? tokens[cursor] : EOF;
  const snapshot = (action: ParseAction): ParseStep => ({
    stack: [...stack],
    input: cursor <= tokens.length ? [...tokens.slice(cursor), EOF] : [],
    action,
  });

  while (stack.length > 0) {
    const focus = stack[stack.length - 1];
    const lookahead = word();
    debug.log(
      `[${stackToString(stack)}]`,
      'next:',
      lookaheadToString(lookahead)
    );
    if (focus === EOF || focus instanceof Terminal) {
      const matches =
        focus === EOF ? lookahead === EOF : lookahead === focus.name;
      if (!matches) {
        const error = new ParseError({
          type: ParseErrorType.TERMINAL_MISMATCH,
          expected: focus,
          found: lookahead,
          position: cursor,
        });
        yield snapshot({ type: 'error', error });
        return err(error);
      }
      yield snapshot({ type: 'match', terminal: focus });
      stack.pop();
      cursor++;
    } else {
      // focus is a non-terminal
      const production = table.get(focus, lookahead);
      if (!production) {
        const error = new ParseError({
          type: ParseErrorType.NO_APPLICABLE_PRODUCTION,
          nonTerminal: focus,
          found: lookahead,
          position: cursor,
        });
        yield snapshot({ type: 'error', error });
        return err(error);
      }
      yield snapshot({ type: 'expand', production });
      stack.pop();
      derivation.push(production);
      // push body onto the stack in reverse, epsilon bodies push nothing
      const B = production.symbols;
      for (let i = B.length - 1; i >= 0; i--) {
        stack.push(B[i]);
      }
    }
  }
  yield snapshot({ type: 'accept' });
  return ok({ tokens: tokens.length, derivation });
}

/**
 * Decides whether `tokens` is a sentence of `grammar`.
 */
export function parse(
  table: LL1Table,
  grammar: Grammar,
  tokens: readonly string[]
): ParseResult {
  const generator = parseGen(table, grammar, tokens);
  let state: IteratorResult<ParseStep, ParseResult>;
  do {
    state = generator.next();
  } while (!state.done);
  return state.value;
}

/**
 * Like {@link parse}, also returning every step the parser took.
 */
export function parseTraced(
  table: LL1Table,
  grammar: Grammar,
  tokens: readonly string[]
): { result: ParseResult; trace: ParseStep[] } {
  const generator = parseGen(table, grammar, tokens);
  const trace: ParseStep[] = [];
  let state = generator.next();
  while (!state.done) {
    trace.push(state.value);
    state = generator.next();
  }
  return { result: state.value, trace };
}

/**
 * A predictive parser for a grammar that passed {@link validate}. Safe to
 * share: each call keeps its own stack and cursor.
 */
export class LL1Parser {
  readonly grammar: Grammar;
  readonly analysis: ValidGrammar;

  constructor(analysis: ValidGrammar) {
    this.analysis = analysis;
    this.grammar = analysis.grammar;
  }

  static fromGrammar(grammar: Grammar): Result<LL1Parser, GrammarError> {
    return validate(grammar).map((valid) => new LL1Parser(valid));
  }

  parse(tokens: readonly string[]): ParseResult {
    return parse(this.analysis.table, this.grammar, tokens);
  }

  parseTraced(tokens: readonly string[]) {
    return parseTraced(this.analysis.table, this.grammar, tokens);
  }

  parseOrThrow(tokens: readonly string[]): ParseAccept {
    const result = this.parse(tokens);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }

  accepts(tokens: readonly string[]): boolean {
    return this.parse(tokens).isOk();
  }
}
