import * as debug from '../utils/debug';
import { addAll } from '../utils/sets';
import type { Grammar, Production } from './grammar';
import {
  type BodySymbol,
  EOF,
  type Eof,
  EPSILON,
  type Epsilon,
  type Lookahead,
  type NonTerminal,
  Terminal,
} from './symbols';

export type FirstSet = ReadonlySet<string | Epsilon>;
export type FollowSet = ReadonlySet<string | Eof>;
/**
 * FIRST sets keyed by symbol name. Terminals map to themselves.
 */
export type FirstMap = ReadonlyMap<string, FirstSet>;
/**
 * FOLLOW sets keyed by non-terminal name.
 */
export type FollowMap = ReadonlyMap<string, FollowSet>;

/**
 * The set of terminals that can begin a string derived from `symbols`,
 * plus EPSILON when the whole string can derive the empty string.
 *
 * Walks the string left to right and stops at the first symbol that is not
 * nullable, so `A b` with a nullable `A` contributes `b` as well.
 */
export function firstOfString(
  firstMap: FirstMap,
  symbols: readonly BodySymbol[]
): Set<string | Epsilon> {
  const result: Set<string | Epsilon> = new Set();
  for (const symbol of symbols) {
    if (symbol === EPSILON) {
      continue;
    }
    if (symbol instanceof Terminal) {
      result.add(symbol.name);
      return result;
    }
    let nullable = false;
    for (const s of firstMap.get(symbol.name) ?? []) {
      if (s === EPSILON) {
        nullable = true;
      } else {
        result.add(s);
      }
    }
    if (!nullable) {
      return result;
    }
  }
  result.add(EPSILON);
  return result;
}

/**
 * Algorithm to calculate the set of terminal symbols
 * that can appear as the first word in some string of symbols.
 * Iterates over every production until a full pass adds nothing.
 *
 * @returns a map from symbols in the given grammar to their "first" sets
 */
export function calcFirst(grammar: Grammar): FirstMap {
  const firstMap: Map<string, Set<string | Epsilon>> = new Map();
  for (const terminal of grammar.getTerminals()) {
    firstMap.set(terminal.name, new Set([terminal.name]));
  }
  const getFirst = (nt: NonTerminal) => {
    let first = firstMap.get(nt.name);
    if (!first) {
      first = new Set();
      firstMap.set(nt.name, first);
    }
    return first;
  };
  for (const nonTerminal of grammar.getNonTerminals()) {
    getFirst(nonTerminal);
  }

  let done = false;
  let pass = 0;
  while (!done) {
    done = true;
    pass++;
    for (const production of grammar.productionsIter()) {
      const rhs = firstOfString(firstMap, production.body);
      if (addAll(getFirst(production.head), rhs)) {
        done = false;
      }
    }
    debug.log(`calcFirst: pass ${pass}`, done ? 'stable' : 'grew');
  }
  return firstMap;
}

/**
 * Calculate follow sets by pushing a "trailer" backwards through every
 * production body, repeating until a full pass changes no set.
 *
 * @param grammar a grammar
 * @param firstMap the first sets calculated with {@link calcFirst}
 * @returns a mapping from non terminal symbols in the given grammar
 * to their follow sets
 */
export function calcFollow(grammar: Grammar, firstMap: FirstMap): FollowMap {
  const followMap: Map<string, Set<string | Eof>> = new Map();
  const getFollow = (nt: NonTerminal) => {
    let follow = followMap.get(nt.name);
    if (!follow) {
      follow = new Set();
      followMap.set(nt.name, follow);
    }
    return follow;
  };
  for (const nonTerminal of grammar.getNonTerminals()) {
    getFollow(nonTerminal);
  }
  getFollow(grammar.start).add(EOF);

  let done = false;
  let pass = 0;
  while (!done) {
    done = true;
    pass++;
    for (const production of grammar.productionsIter()) {
      const B = production.symbols;
      let trailer: Set<string | Eof> = new Set(getFollow(production.head));
      for (let i = B.length - 1; i >= 0; i--) {
        const Bi = B[i];
        if (Bi instanceof Terminal) {
          trailer = new Set([Bi.name]);
          continue;
        }
        if (addAll(getFollow(Bi), trailer)) {
          done = false;
        }
        const firstBi: FirstSet = firstMap.get(Bi.name) ?? new Set();
        if (!firstBi.has(EPSILON)) {
          trailer = new Set();
        }
        for (const s of firstBi) {
          if (s !== EPSILON) {
            trailer.add(s);
          }
        }
      }
    }
    debug.log(`calcFollow: pass ${pass}`, done ? 'stable' : 'grew');
  }
  return followMap;
}

/**
 * The lookaheads that select `production` in an LL(1) parser: FIRST of its
 * body without EPSILON, plus FOLLOW of its head when the body is nullable.
 */
export function firstPlus(
  firstMap: FirstMap,
  followMap: FollowMap,
  production: Production
): Set<Lookahead> {
  const result: Set<Lookahead> = new Set();
  const firstB = firstOfString(firstMap, production.body);
  for (const s of firstB) {
    if (s !== EPSILON) {
      result.add(s);
    }
  }
  if (firstB.has(EPSILON)) {
    addAll(result, followMap.get(production.head.name) ?? []);
  }
  return result;
}

export function isNullable(firstMap: FirstMap, nonTerminal: NonTerminal) {
  return firstMap.get(nonTerminal.name)?.has(EPSILON) ?? false;
}
