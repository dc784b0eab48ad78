/**
 * Marks a production that derives the empty string, and the presence of the
 * empty string in a FIRST set.
 */
export const EPSILON = Symbol('ϵ');
/**
 * The end of input. Sits at the bottom of the parse stack and is the
 * lookahead once every token has been consumed.
 */
export const EOF = Symbol('EOF');
export type Epsilon = typeof EPSILON;
export type Eof = typeof EOF;

export class Terminal {
  readonly kind = 'terminal' as const;
  readonly name: string;
  constructor(name: string) {
    this.name = name;
  }
  equals(other: GrammarSymbol): boolean {
    return other.kind === this.kind && other.name === this.name;
  }
  toString() {
    return this.name;
  }
}

export class NonTerminal {
  readonly kind = 'nonTerminal' as const;
  readonly name: string;
  constructor(name: string) {
    this.name = name;
  }
  equals(other: GrammarSymbol): boolean {
    return other.kind === this.kind && other.name === this.name;
  }
  toString() {
    return this.name;
  }
}

export type GrammarSymbol = Terminal | NonTerminal;
export type BodySymbol = GrammarSymbol | Epsilon;

/**
 * What the parser can see next: the name of a terminal, or the end of input.
 */
export type Lookahead = string | Eof;

export function lookaheadToString(lookahead: Lookahead | Epsilon): string {
  if (lookahead === EOF) {
    return '$';
  }
  if (lookahead === EPSILON) {
    return 'ε';
  }
  return lookahead;
}
