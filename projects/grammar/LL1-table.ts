import * as debug from '../utils/debug';
import { HashMap } from '../utils/sets';
import { type FirstMap, firstPlus, type FollowMap } from './first-follow';
import type { Grammar, Production } from './grammar';
import {
  EOF,
  type Lookahead,
  lookaheadToString,
  type NonTerminal,
} from './symbols';

export interface LL1Table {
  get(nonTerminal: NonTerminal, lookahead: Lookahead): Production | undefined;
  entries(): Generator<[NonTerminal, Lookahead, Production]>;
  readonly size: number;
}

class LL1TableImpl implements LL1Table {
  private table: Map<string, Map<Lookahead, Production>> = new Map();
  private count = 0;

  set(production: Production, lookahead: Lookahead) {
    let columns = this.table.get(production.head.name);
    if (!columns) {
      columns = new Map();
      this.table.set(production.head.name, columns);
    }
    if (!columns.has(lookahead)) {
      this.count++;
    }
    columns.set(lookahead, production);
  }

  get(nonTerminal: NonTerminal, lookahead: Lookahead) {
    return this.table.get(nonTerminal.name)?.get(lookahead);
  }

  get size() {
    return this.count;
  }

  *entries(): Generator<[NonTerminal, Lookahead, Production]> {
    for (const cols of this.table.values()) {
      for (const [col, cell] of cols.entries()) {
        yield [cell.head, col, cell];
      }
    }
  }
}

export type TableKey = {
  readonly nonTerminal: NonTerminal;
  readonly lookahead: Lookahead;
};

const hashKey = ({ nonTerminal, lookahead }: TableKey) =>
  JSON.stringify([nonTerminal.name, lookahead === EOF ? null : lookahead]);

/**
 * Table cells claimed by more than one production. The production that won
 * the cell comes first in each list.
 */
export class ConflictReport {
  private conflicts: HashMap<TableKey, Production[]> = new HashMap(hashKey);

  record(key: TableKey, occupant: Production, contender: Production) {
    let competing = this.conflicts.get(key);
    if (!competing) {
      competing = [occupant];
      this.conflicts.set(key, competing);
    }
    if (!competing.includes(contender)) {
      competing.push(contender);
    }
  }

  get(
    nonTerminal: NonTerminal,
    lookahead: Lookahead
  ): readonly Production[] | undefined {
    return this.conflicts.get({ nonTerminal, lookahead });
  }

  entries(): IterableIterator<[TableKey, readonly Production[]]> {
    return this.conflicts.entries();
  }

  get size() {
    return this.conflicts.size;
  }

  isEmpty() {
    return this.conflicts.size === 0;
  }
}

/**
 * Builds the LL(1) table. A production is written under every lookahead in
 * its FIRST+ set. The first production written to a cell keeps it; any
 * other production that wants the same cell is recorded as a conflict.
 */
export function buildLL1Table(
  grammar: Grammar,
  firstMap: FirstMap,
  followMap: FollowMap
): { table: LL1Table; conflicts: ConflictReport } {
  const table = new LL1TableImpl();
  const conflicts = new ConflictReport();

  for (const production of grammar.productionsIter()) {
    for (const lookahead of firstPlus(firstMap, followMap, production)) {
      const occupant = table.get(production.head, lookahead);
      if (!occupant) {
        table.set(production, lookahead);
      } else if (occupant !== production) {
        debug.log(
          `buildLL1Table: conflict at (${production.head.name}, ${lookaheadToString(lookahead)})`,
          `between "${occupant}" and "${production}"`
        );
        conflicts.record(
          { nonTerminal: production.head, lookahead },
          occupant,
          production
        );
      }
    }
  }
  return { table, conflicts };
}
