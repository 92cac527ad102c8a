/**
 * Query Builder Module
 *
 * Fluent builder over a clause model, compiled by a dialect grammar and run
 * through a connection or transaction handle.
 *
 * @module query
 */

export { Builder } from './builder';
export { QueryExecutor, normalizeRow, type ExecutorOptions } from './executor';
export { RawExpression, raw, toBindable, type Bindable } from './raw-expression';
export type {
  Conjunction,
  JoinType,
  OrderDirection,
  Predicate,
  JoinClause,
  HavingClause,
  OrderClause,
  SelectColumn,
} from './clauses';
