import { err, ok, Result } from 'neverthrow';
import { AmbiguousGrammarError, LeftRecursionError } from './errors';
import {
  calcFirst,
  calcFollow,
  type FirstMap,
  type FollowMap,
} from './first-follow';
import type { Grammar } from './grammar';
import { findLeftRecursion, hasLeftRecursion } from './left-recursion';
import { buildLL1Table, type ConflictReport, type LL1Table } from './LL1-table';

/**
 * Everything derived from a grammar that has no left recursion. The table
 * is always filled in, even when `conflicts` is not empty.
 */
export interface Analysis {
  readonly grammar: Grammar;
  readonly first: FirstMap;
  readonly follow: FollowMap;
  readonly table: LL1Table;
  readonly conflicts: ConflictReport;
}

/**
 * An analysis with an empty conflict report, the only kind an
 * {@link LL1Parser} will accept.
 */
export interface ValidGrammar extends Analysis {
  readonly ready: true;
}

export type GrammarError = LeftRecursionError | AmbiguousGrammarError;

/**
 * Computes FIRST sets, rejects left recursive grammars, then computes
 * FOLLOW sets and the parse table.
 */
export function analyze(grammar: Grammar): Result<Analysis, LeftRecursionError> {
  const first = calcFirst(grammar);
  const recursion = findLeftRecursion(grammar, first);
  if (hasLeftRecursion(recursion)) {
    return err(new LeftRecursionError(recursion));
  }
  const follow = calcFollow(grammar, first);
  const { table, conflicts } = buildLL1Table(grammar, first, follow);
  return ok({ grammar, first, follow, table, conflicts });
}

/**
 * A grammar is LL(1) when it has no left recursion and no two productions
 * compete for a table cell. Calling this again on the same grammar gives
 * the same answer; the grammar is never modified.
 */
export function validate(grammar: Grammar): Result<ValidGrammar, GrammarError> {
  return analyze(grammar).andThen(
    (analysis): Result<ValidGrammar, GrammarError> => {
      if (!analysis.conflicts.isEmpty()) {
        return err(new AmbiguousGrammarError(analysis));
      }
      const valid: ValidGrammar = { ...analysis, ready: true };
      return ok(valid);
    }
  );
}

export function isLL1(grammar: Grammar): boolean {
  return validate(grammar).isOk();
}
