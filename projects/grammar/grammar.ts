import { err, ok, Result } from 'neverthrow';
import { MalformedGrammarError } from './errors';
import {
  type BodySymbol,
  EPSILON,
  type GrammarSymbol,
  NonTerminal,
  Terminal,
} from './symbols';

const EPSILON_BODY: readonly BodySymbol[] = Object.freeze<BodySymbol[]>([
  EPSILON,
]);

export class Production {
  /**
   * The left hand symbol. So the production:
   *   Expr -> Term Op Term
   * the `head` would be `Expr`
   */
  readonly head: NonTerminal;

  /**
   * The right hand side of a production. So for the production:
   *   Expr -> Term Op Term
   * the `body` would be `[Term, Op, Term]`. A production deriving the empty
   * string has the body `[EPSILON]`.
   */
  readonly body: readonly BodySymbol[];

  /**
   * The body without the empty marker, i.e. what gets pushed on the parse
   * stack when this production is expanded.
   */
  readonly symbols: readonly GrammarSymbol[];

  constructor(head: NonTerminal, body: readonly BodySymbol[]) {
    const symbols = body.filter((s): s is GrammarSymbol => s !== EPSILON);
    if (symbols.length > 0 && symbols.length !== body.length) {
      throw new Error(
        `The empty marker cannot be mixed with other symbols in a production of ${head.name}`
      );
    }
    this.head = head;
    this.symbols = Object.freeze(symbols);
    this.body = symbols.length === 0 ? EPSILON_BODY : this.symbols;
  }

  isEpsilon(): boolean {
    return this.symbols.length === 0;
  }

  isLeftRecursive(): boolean {
    const first = this.symbols[0];
    return first !== undefined && first.equals(this.head);
  }

  toString(): string {
    const body = this.isEpsilon()
      ? 'ε'
      : this.symbols.map((s) => s.name).join(' ');
    return `${this.head.name} -> ${body}`;
  }
}

/**
 * An immutable context free grammar. Terminals and non-terminals are kept in
 * the order they first appear, and the start symbol is the head of the first
 * production.
 */
export class Grammar {
  readonly start: NonTerminal;
  readonly productions: readonly Production[];
  private byHead: Map<string, Production[]> = new Map();
  private terminals: Map<string, Terminal> = new Map();
  private nonTerminals: Map<string, NonTerminal> = new Map();

  private constructor(productions: readonly Production[]) {
    this.productions = Object.freeze([...productions]);
    this.start = productions[0].head;
    for (const production of productions) {
      const key = production.head.name;
      this.nonTerminals.set(key, production.head);
      const existing = this.byHead.get(key);
      if (existing) {
        existing.push(production);
      } else {
        this.byHead.set(key, [production]);
      }
    }
    for (const production of productions) {
      for (const symbol of production.symbols) {
        if (symbol instanceof Terminal) {
          this.terminals.set(symbol.name, symbol);
        }
      }
    }
  }

  /**
   * Checks the structural invariants of a grammar: at least one production,
   * no name used both as a terminal and a non-terminal, and a production for
   * every non-terminal that appears in a body.
   */
  static fromProductions(
    productions: readonly Production[]
  ): Result<Grammar, MalformedGrammarError> {
    if (productions.length === 0) {
      return err(new MalformedGrammarError('the grammar has no rules'));
    }
    const heads = new Set(productions.map((p) => p.head.name));
    const kinds: Map<string, GrammarSymbol['kind']> = new Map();
    for (const production of productions) {
      for (const symbol of [production.head, ...production.symbols]) {
        const kind = kinds.get(symbol.name);
        if (kind === undefined) {
          kinds.set(symbol.name, symbol.kind);
        } else if (kind !== symbol.kind) {
          return err(
            new MalformedGrammarError(
              `${symbol.name} is used both as a terminal and a non-terminal`
            )
          );
        }
        if (symbol instanceof NonTerminal && !heads.has(symbol.name)) {
          return err(
            new MalformedGrammarError(
              `${symbol.name} is used as a non-terminal in "${production}" but has no rules`
            )
          );
        }
      }
    }
    return ok(new Grammar(productions));
  }

  *productionsIter(): Generator<Production> {
    yield* this.productions;
  }

  productionsFrom(head: NonTerminal | string): readonly Production[] {
    return this.byHead.get(typeof head === 'string' ? head : head.name) || [];
  }

  getNonTerminals(): readonly NonTerminal[] {
    return [...this.nonTerminals.values()];
  }

  getTerminals(): readonly Terminal[] {
    return [...this.terminals.values()];
  }

  /**
   * Looks up a grammar symbol by name.
   */
  symbol(name: string): GrammarSymbol | undefined {
    return this.nonTerminals.get(name) ?? this.terminals.get(name);
  }

  toString() {
    let out = '\n';
    for (const productions of this.byHead.values()) {
      out += `${productions[0].head.name} →\n`;
      for (const production of productions) {
        out += '  | ';
        out += production.isEpsilon()
          ? 'ε'
          : production.symbols
              .map((s) => (s instanceof Terminal ? `'${s.name}'` : s.name))
              .join(' ');
        out += '\n';
      }
    }
    return out;
  }
}

export type SymbolKind = GrammarSymbol['kind'];

/**
 * Decides whether a name in a rule set is a terminal or a non-terminal.
 * `heads` holds every name that heads a rule group.
 */
export type Classifier = (
  name: string,
  heads: ReadonlySet<string>
) => SymbolKind;

/**
 * A name is a non-terminal exactly when some rule has it as its head.
 */
export const declaredHeads: Classifier = (name, heads) =>
  heads.has(name) ? 'nonTerminal' : 'terminal';

/**
 * Upper case names (`EXPR`, `T'`) are non-terminals, everything else
 * (`num`, `+`, `(`) is a terminal.
 */
export const uppercaseNonTerminals: Classifier = (name) =>
  name.toUpperCase() === name && name.toLowerCase() !== name
    ? 'nonTerminal'
    : 'terminal';

/**
 * Explicitly tags the given names as terminals. Every other name is a
 * non-terminal.
 */
export function terminalsFrom(names: Iterable<string>): Classifier {
  const terminals = new Set(names);
  return (name) => (terminals.has(name) ? 'terminal' : 'nonTerminal');
}

export type RuleGroup = {
  head: string;
  alternatives: readonly (readonly string[])[];
};
export type GrammarSpec =
  | readonly RuleGroup[]
  | { readonly [head: string]: readonly (readonly string[])[] };

export type BuildGrammarOptions = {
  classify?: Classifier;
  /**
   * The name that stands for the empty string inside an alternative.
   */
  epsilon?: string;
};

function isRuleGroupList(spec: GrammarSpec): spec is readonly RuleGroup[] {
  return Array.isArray(spec);
}

function toRuleGroups(spec: GrammarSpec): readonly RuleGroup[] {
  if (isRuleGroupList(spec)) {
    return spec;
  }
  return Object.entries(spec).map(([head, alternatives]) => ({
    head,
    alternatives,
  }));
}

/**
 * Builds a grammar from rule groups that have already been split into
 * heads, alternatives and symbol names.
 *
 * An empty alternative, or one made only of empty markers, becomes an
 * epsilon production. Groups sharing a head are merged in order.
 */
export function buildGrammar(
  spec: GrammarSpec,
  options: BuildGrammarOptions = {}
): Result<Grammar, MalformedGrammarError> {
  const { classify = declaredHeads, epsilon = 'ε' } = options;
  const groups = toRuleGroups(spec);
  if (groups.length === 0) {
    return err(new MalformedGrammarError('the grammar has no rules'));
  }
  const heads: ReadonlySet<string> = new Set(groups.map((g) => g.head));

  const symbols: Map<string, GrammarSymbol> = new Map();
  const symbolFor = (name: string): GrammarSymbol => {
    let symbol = symbols.get(name);
    if (!symbol) {
      symbol =
        classify(name, heads) === 'nonTerminal'
          ? new NonTerminal(name)
          : new Terminal(name);
      symbols.set(name, symbol);
    }
    return symbol;
  };

  const productions: Production[] = [];
  for (const { head, alternatives } of groups) {
    const headSymbol = symbolFor(head);
    if (!(headSymbol instanceof NonTerminal)) {
      return err(
        new MalformedGrammarError(
          `${head} heads a rule but is classified as a terminal`
        )
      );
    }
    if (alternatives.length === 0) {
      return err(new MalformedGrammarError(`${head} has no alternatives`));
    }
    for (const alternative of alternatives) {
      const body = alternative
        .filter((name) => name !== epsilon)
        .map((name) => symbolFor(name));
      productions.push(new Production(headSymbol, body));
    }
  }
  return Grammar.fromProductions(productions);
}

export function buildGrammarOrThrow(
  spec: GrammarSpec,
  options?: BuildGrammarOptions
): Grammar {
  const result = buildGrammar(spec, options);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}
