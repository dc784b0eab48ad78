import {
  EOF,
  type Eof,
  type Lookahead,
  lookaheadToString,
  type NonTerminal,
  type Terminal,
} from './symbols';
import type { Production } from './grammar';
import type { Analysis } from './analysis';
import type { LeftRecursionReport } from './left-recursion';

/**
 * The grammar handed to {@link buildGrammar} (or the text handed to
 * {@link parseGrammarText}) does not describe a usable grammar.
 */
export class MalformedGrammarError extends Error {
  /**
   * 1-based line of the grammar text the problem was found on, when the
   * grammar came from text.
   */
  readonly line?: number;
  constructor(message: string, line?: number) {
    super(
      line === undefined
        ? `MalformedGrammar: ${message}`
        : `MalformedGrammar at line ${line}: ${message}`
    );
    this.name = 'MalformedGrammarError';
    this.line = line;
  }
}

export class LeftRecursionError extends Error {
  readonly productions: readonly Production[];
  readonly nonTerminals: readonly NonTerminal[];
  constructor(report: LeftRecursionReport) {
    const parts: string[] = [];
    if (report.direct.length > 0) {
      parts.push(`direct: ${report.direct.map((p) => p.toString()).join(', ')}`);
    }
    if (report.indirect.length > 0) {
      parts.push(`indirect: ${report.indirect.map((nt) => nt.name).join(', ')}`);
    }
    super(`Grammar is left recursive (${parts.join('; ')})`);
    this.name = 'LeftRecursionError';
    this.productions = report.direct;
    this.nonTerminals = report.indirect;
  }
}

/**
 * The grammar has no left recursion but some table cells are claimed by more
 * than one production. The analysis is kept so the conflicts can be shown.
 */
export class AmbiguousGrammarError extends Error {
  readonly analysis: Analysis;
  constructor(analysis: Analysis) {
    const keys = [...analysis.conflicts.entries()].map(
      ([{ nonTerminal, lookahead }]) =>
        `(${nonTerminal.name}, ${lookaheadToString(lookahead)})`
    );
    super(`Grammar is not LL(1): conflicts at ${keys.join(', ')}`);
    this.name = 'AmbiguousGrammarError';
    this.analysis = analysis;
  }
}

export enum ParseErrorType {
  TERMINAL_MISMATCH = 'Terminal mismatch',
  NO_APPLICABLE_PRODUCTION = 'No applicable production',
}

export type ParseErrorDetail =
  | {
      type: ParseErrorType.TERMINAL_MISMATCH;
      expected: Terminal | Eof;
      found: Lookahead;
      position: number;
    }
  | {
      type: ParseErrorType.NO_APPLICABLE_PRODUCTION;
      nonTerminal: NonTerminal;
      found: Lookahead;
      position: number;
    };

/**
 * Why an input was rejected. These are returned inside a `Result`, not
 * thrown, unless the caller asks for it with `parseOrThrow`.
 */
export class ParseError extends Error {
  readonly detail: ParseErrorDetail;
  constructor(detail: ParseErrorDetail) {
    const found = lookaheadToString(detail.found);
    let message: string;
    if (detail.type === ParseErrorType.TERMINAL_MISMATCH) {
      const expected =
        detail.expected === EOF ? '$' : detail.expected.name;
      message = `expected ${expected} but found ${found}`;
    } else {
      message = `cannot expand ${detail.nonTerminal.name} on ${found}`;
    }
    super(
      `ParseError: "${detail.type}" at token ${detail.position}: ${message}`
    );
    this.name = 'ParseError';
    this.detail = detail;
  }

  get type(): ParseErrorType {
    return this.detail.type;
  }

  get position(): number {
    return this.detail.position;
  }
}
