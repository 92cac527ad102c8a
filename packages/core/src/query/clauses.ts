/**
 * Clause model
 *
 * Plain records the builder accumulates and the grammar compiles.
 * Insertion order of every list is significant: it fixes both the
 * textual order of the fragments and the order of their bindings.
 */

import type { RawExpression } from './raw-expression';

export type Conjunction = 'AND' | 'OR';

export type JoinType = 'INNER' | 'LEFT' | 'RIGHT' | 'CROSS';

export type OrderDirection = 'ASC' | 'DESC';

export type Predicate =
  | { type: 'basic'; boolean: Conjunction; column: string; operator: string; value: unknown }
  | { type: 'in'; boolean: Conjunction; column: string; values: unknown[] }
  | { type: 'not_in'; boolean: Conjunction; column: string; values: unknown[] }
  | { type: 'null'; boolean: Conjunction; column: string }
  | { type: 'not_null'; boolean: Conjunction; column: string }
  | { type: 'between'; boolean: Conjunction; column: string; low: unknown; high: unknown }
  | { type: 'raw'; boolean: Conjunction; sql: string; bindings: unknown[] };

export type JoinClause =
  | { type: 'CROSS'; table: string }
  | {
      type: Exclude<JoinType, 'CROSS'>;
      table: string;
      first: string;
      operator: string;
      second: string;
    };

export type HavingClause =
  | { type: 'basic'; boolean: Conjunction; column: string; operator: string; value: unknown }
  | { type: 'raw'; boolean: Conjunction; sql: string; bindings: unknown[] };

export type OrderClause =
  | { type: 'column'; column: string; direction: OrderDirection }
  | { type: 'raw'; sql: string; bindings: unknown[] };

/**
 * A projection entry: a column name, or a raw expression added by `selectRaw`.
 */
export type SelectColumn = string | RawExpression;

export function clonePredicate(predicate: Predicate): Predicate {
  switch (predicate.type) {
    case 'in':
    case 'not_in': {
      return { ...predicate, values: [...predicate.values] };
    }
    case 'raw': {
      return { ...predicate, bindings: [...predicate.bindings] };
    }
    default: {
      return { ...predicate };
    }
  }
}

export function cloneHaving(having: HavingClause): HavingClause {
  return having.type === 'raw' ? { ...having, bindings: [...having.bindings] } : { ...having };
}

export function cloneOrder(order: OrderClause): OrderClause {
  return order.type === 'raw' ? { ...order, bindings: [...order.bindings] } : { ...order };
}
