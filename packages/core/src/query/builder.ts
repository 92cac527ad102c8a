/**
 * Query Builder
 *
 * Fluent, mutable representation of a single statement. Modifiers record
 * clauses in call order and return the same instance; terminal methods
 * compile through the connection's grammar and run through its handle.
 *
 * @example
 * ```typescript
 * const users = await db
 *   .table('users')
 *   .where('age', '>', 25)
 *   .where('status', '=', 'active')
 *   .orderBy('age', 'desc')
 *   .limit(5)
 *   .get();
 * ```
 */

import { QueryError } from '../errors';
import { clonePredicate, cloneHaving, cloneOrder } from './clauses';
import { QueryExecutor } from './executor';
import { raw } from './raw-expression';

import type {
  Conjunction,
  HavingClause,
  JoinClause,
  OrderClause,
  OrderDirection,
  Predicate,
  SelectColumn,
} from './clauses';
import type { ExecutorOptions } from './executor';
import type { Grammar, QueryState } from '../grammar/grammar';
import type { ExecutionHandle } from '../interfaces/execution-handle';
import type { CompiledQuery, ExecutionContext, Row } from '../types';

type WhereArgs = [value: unknown] | [operator: string, value: unknown];

export class Builder implements QueryState {
  private _table: string;
  private _columns: SelectColumn[] = ['*'];
  private _distinct = false;
  private _joins: JoinClause[] = [];
  private _wheres: Predicate[] = [];
  private _groups: string[] = [];
  private _havings: HavingClause[] = [];
  private _orders: OrderClause[] = [];
  private _limit?: number;
  private _offset?: number;
  private _context: ExecutionContext = {};
  private _error?: Error;

  private readonly executor: QueryExecutor;

  constructor(
    private readonly handle: ExecutionHandle,
    private readonly grammar: Grammar,
    table: string,
  ) {
    this._table = table;
    this.executor = new QueryExecutor(handle);
  }

  // ============ Projection ============

  /**
   * Replace the projection. Calling with no columns keeps the current one.
   */
  select(...columns: string[]): this {
    if (columns.length > 0) {
      this._columns = [...columns];
    }
    return this;
  }

  /**
   * Append a raw projection entry, e.g. `selectRaw('COUNT(*) AS total')`
   */
  selectRaw(expression: string, ...bindings: unknown[]): this {
    this._columns.push(raw(expression, bindings));
    return this;
  }

  addSelect(...columns: string[]): this {
    this._columns.push(...columns);
    return this;
  }

  distinct(): this {
    this._distinct = true;
    return this;
  }

  from(table: string): this {
    this._table = table;
    return this;
  }

  // ============ Joins ============

  join(table: string, first: string, operator: string, second: string): this {
    this._joins.push({ type: 'INNER', table, first, operator, second });
    return this;
  }

  leftJoin(table: string, first: string, operator: string, second: string): this {
    this._joins.push({ type: 'LEFT', table, first, operator, second });
    return this;
  }

  rightJoin(table: string, first: string, operator: string, second: string): this {
    this._joins.push({ type: 'RIGHT', table, first, operator, second });
    return this;
  }

  crossJoin(table: string): this {
    this._joins.push({ type: 'CROSS', table });
    return this;
  }

  // ============ Where ============

  /**
   * Add an AND condition. With two arguments the operator is `=`.
   */
  where(column: string, value: unknown): this;
  where(column: string, operator: string, value: unknown): this;
  where(column: string, ...args: WhereArgs): this {
    return this.addBasicWhere('AND', column, args);
  }

  orWhere(column: string, value: unknown): this;
  orWhere(column: string, operator: string, value: unknown): this;
  orWhere(column: string, ...args: WhereArgs): this {
    return this.addBasicWhere('OR', column, args);
  }

  whereIn(column: string, values: readonly unknown[]): this {
    this._wheres.push({ type: 'in', boolean: 'AND', column, values: [...values] });
    return this;
  }

  orWhereIn(column: string, values: readonly unknown[]): this {
    this._wheres.push({ type: 'in', boolean: 'OR', column, values: [...values] });
    return this;
  }

  whereNotIn(column: string, values: readonly unknown[]): this {
    this._wheres.push({ type: 'not_in', boolean: 'AND', column, values: [...values] });
    return this;
  }

  orWhereNotIn(column: string, values: readonly unknown[]): this {
    this._wheres.push({ type: 'not_in', boolean: 'OR', column, values: [...values] });
    return this;
  }

  whereNull(column: string): this {
    this._wheres.push({ type: 'null', boolean: 'AND', column });
    return this;
  }

  orWhereNull(column: string): this {
    this._wheres.push({ type: 'null', boolean: 'OR', column });
    return this;
  }

  whereNotNull(column: string): this {
    this._wheres.push({ type: 'not_null', boolean: 'AND', column });
    return this;
  }

  orWhereNotNull(column: string): this {
    this._wheres.push({ type: 'not_null', boolean: 'OR', column });
    return this;
  }

  whereBetween(column: string, low: unknown, high: unknown): this {
    this._wheres.push({ type: 'between', boolean: 'AND', column, low, high });
    return this;
  }

  orWhereBetween(column: string, low: unknown, high: unknown): this {
    this._wheres.push({ type: 'between', boolean: 'OR', column, low, high });
    return this;
  }

  /**
   * Add a raw condition. `?` markers bind to `bindings` in order.
   */
  whereRaw(sql: string, ...bindings: unknown[]): this {
    this._wheres.push({ type: 'raw', boolean: 'AND', sql, bindings });
    return this;
  }

  orWhereRaw(sql: string, ...bindings: unknown[]): this {
    this._wheres.push({ type: 'raw', boolean: 'OR', sql, bindings });
    return this;
  }

  // ============ Grouping ============

  groupBy(...columns: string[]): this {
    this._groups.push(...columns);
    return this;
  }

  having(column: string, operator: string, value: unknown): this {
    this._havings.push({ type: 'basic', boolean: 'AND', column, operator, value });
    return this;
  }

  orHaving(column: string, operator: string, value: unknown): this {
    this._havings.push({ type: 'basic', boolean: 'OR', column, operator, value });
    return this;
  }

  havingRaw(sql: string, ...bindings: unknown[]): this {
    this._havings.push({ type: 'raw', boolean: 'AND', sql, bindings });
    return this;
  }

  // ============ Ordering & Paging ============

  /**
   * Anything other than `desc` (any case) sorts ascending
   */
  orderBy(column: string, direction: string = 'ASC'): this {
    const normalized: OrderDirection = direction.toUpperCase() === 'DESC' ? 'DESC' : 'ASC';
    this._orders.push({ type: 'column', column, direction: normalized });
    return this;
  }

  orderByDesc(column: string): this {
    return this.orderBy(column, 'DESC');
  }

  orderByRaw(sql: string, ...bindings: unknown[]): this {
    this._orders.push({ type: 'raw', sql, bindings });
    return this;
  }

  limit(value: number): this {
    this._limit = value;
    return this;
  }

  offset(value: number): this {
    this._offset = value;
    return this;
  }

  take(value: number): this {
    return this.limit(value);
  }

  skip(value: number): this {
    return this.offset(value);
  }

  /**
   * Paginate; pages start at 1 and lower values are clamped
   */
  forPage(page: number, perPage: number): this {
    const current = Math.max(page, 1);
    return this.offset((current - 1) * perPage).limit(perPage);
  }

  // ============ Execution Settings ============

  withContext(context: ExecutionContext): this {
    this._context = context;
    return this;
  }

  /**
   * Attach an error that every later query or statement rejects with
   */
  setError(error: Error): this {
    this._error = error;
    return this;
  }

  // ============ Reads ============

  async get(): Promise<Row[]> {
    return this.executor.select(this.toSQL(), this.executorOptions());
  }

  /**
   * Fetch the first row. Leaves the builder limited to one row.
   */
  async first(): Promise<Row | null> {
    this.limit(1);
    const rows = await this.get();
    return rows[0] ?? null;
  }

  async find(id: unknown): Promise<Row | null> {
    return this.where('id', '=', id).first();
  }

  async value(column: string): Promise<unknown> {
    this._columns = [column];
    const row = await this.first();
    return row ? (row[column] ?? null) : null;
  }

  async pluck(column: string): Promise<unknown[]> {
    this._columns = [column];
    const rows = await this.get();
    return rows.filter((row) => column in row).map((row) => row[column]);
  }

  async exists(): Promise<boolean> {
    return (await this.count()) > 0;
  }

  async doesntExist(): Promise<boolean> {
    return !(await this.exists());
  }

  async count(): Promise<number> {
    const { value: result } = await this.aggregate('COUNT', '*');
    if (typeof result === 'number') {
      return result;
    }
    if (typeof result === 'bigint') {
      return Number(result);
    }
    if (typeof result === 'string' && result.trim() !== '' && !Number.isNaN(Number(result))) {
      return Number(result);
    }
    return 0;
  }

  async max(column: string): Promise<unknown> {
    return (await this.aggregate('MAX', this.grammar.wrapColumn(column))).value;
  }

  async min(column: string): Promise<unknown> {
    return (await this.aggregate('MIN', this.grammar.wrapColumn(column))).value;
  }

  async sum(column: string): Promise<number> {
    return this.numericAggregate('SUM', column);
  }

  async avg(column: string): Promise<number> {
    return this.numericAggregate('AVG', column);
  }

  // ============ Writes ============

  async insert(values: Record<string, unknown>): Promise<number> {
    const result = await this.executor.execute(
      this.grammar.compileInsert(this, values),
      this.executorOptions(),
    );
    return result.rowsAffected();
  }

  /**
   * Insert one record and return its generated `id`. PostgreSQL reads it
   * back through `RETURNING id`; other drivers report the last insert id.
   */
  async insertGetId(values: Record<string, unknown>): Promise<number | bigint> {
    const compiled = this.grammar.compileInsertGetId(this, values);

    if (this.grammar.driver === 'postgres') {
      const row = await this.executor.selectOne(compiled, this.executorOptions());
      if (!row) {
        throw new QueryError('insertGetId returned no row', compiled);
      }
      return toId(row['id'], compiled);
    }

    const result = await this.executor.execute(compiled, this.executorOptions());
    return result.lastInsertId();
  }

  /**
   * Insert records one statement at a time. Not atomic: a failure leaves
   * the earlier records written.
   */
  async insertBatch(records: readonly Record<string, unknown>[]): Promise<number> {
    let total = 0;
    for (const record of records) {
      total += await this.clone().insert(record);
    }
    return total;
  }

  async update(values: Record<string, unknown>): Promise<number> {
    const result = await this.executor.execute(
      this.grammar.compileUpdate(this, values),
      this.executorOptions(),
    );
    return result.rowsAffected();
  }

  async increment(column: string, amount = 1): Promise<number> {
    return this.update({ [column]: raw(`${this.grammar.wrapColumn(column)} + ${amount}`) });
  }

  async decrement(column: string, amount = 1): Promise<number> {
    return this.update({ [column]: raw(`${this.grammar.wrapColumn(column)} - ${amount}`) });
  }

  async delete(): Promise<number> {
    const result = await this.executor.execute(
      this.grammar.compileDelete(this),
      this.executorOptions(),
    );
    return result.rowsAffected();
  }

  async truncate(): Promise<void> {
    await this.executor.execute(this.grammar.compileTruncate(this._table), this.executorOptions());
  }

  // ============ Compilation ============

  toSQL(): CompiledQuery {
    return this.grammar.compileSelect(this);
  }

  toExistsSQL(): CompiledQuery {
    return this.grammar.compileExists(this);
  }

  /**
   * Copy every clause list so the two builders evolve independently. The
   * handle, grammar, context and sticky error are shared.
   */
  clone(): Builder {
    const copy = new Builder(this.handle, this.grammar, this._table);
    copy._columns = [...this._columns];
    copy._distinct = this._distinct;
    copy._joins = this._joins.map((join) => ({ ...join }));
    copy._wheres = this._wheres.map(clonePredicate);
    copy._groups = [...this._groups];
    copy._havings = this._havings.map(cloneHaving);
    copy._orders = this._orders.map(cloneOrder);
    copy._limit = this._limit;
    copy._offset = this._offset;
    copy._context = this._context;
    copy._error = this._error;
    return copy;
  }

  // ============ Accessors ============

  getTable(): string {
    return this._table;
  }

  getColumns(): readonly SelectColumn[] {
    return this._columns;
  }

  isDistinct(): boolean {
    return this._distinct;
  }

  getJoins(): readonly JoinClause[] {
    return this._joins;
  }

  getWheres(): readonly Predicate[] {
    return this._wheres;
  }

  getGroups(): readonly string[] {
    return this._groups;
  }

  getHavings(): readonly HavingClause[] {
    return this._havings;
  }

  getOrders(): readonly OrderClause[] {
    return this._orders;
  }

  getLimit(): number | undefined {
    return this._limit;
  }

  getOffset(): number | undefined {
    return this._offset;
  }

  getGrammar(): Grammar {
    return this.grammar;
  }

  getContext(): ExecutionContext {
    return this._context;
  }

  getError(): Error | undefined {
    return this._error;
  }

  // ============ Internals ============

  private addBasicWhere(boolean: Conjunction, column: string, args: WhereArgs): this {
    const [operator, value]: [string, unknown] = args.length === 1 ? ['=', args[0]] : args;
    this._wheres.push({ type: 'basic', boolean, column, operator, value });
    return this;
  }

  private executorOptions(): ExecutorOptions {
    return { context: this._context, error: this._error };
  }

  /**
   * Swap the projection for `FN(expression) AS aggregate`, read the first
   * row and put the projection back. Like `first()`, leaves `limit 1` set.
   */
  private async aggregate(
    fn: string,
    expression: string,
  ): Promise<{ value: unknown; query: CompiledQuery }> {
    const original = this._columns;
    this._columns = [`${fn}(${expression}) AS aggregate`];
    try {
      const query = this.limit(1).toSQL();
      const [row] = await this.executor.select(query, this.executorOptions());
      return { value: row ? (row['aggregate'] ?? null) : null, query };
    } finally {
      this._columns = original;
    }
  }

  private async numericAggregate(fn: 'SUM' | 'AVG', column: string): Promise<number> {
    const { value: result, query } = await this.aggregate(fn, this.grammar.wrapColumn(column));
    if (result === null) {
      return 0;
    }
    if (typeof result === 'number') {
      return result;
    }
    if (typeof result === 'bigint') {
      return Number(result);
    }
    // NUMERIC and DECIMAL arrive as strings from pg and mysql2
    if (typeof result === 'string' && result.trim() !== '' && !Number.isNaN(Number(result))) {
      return Number(result);
    }
    throw new QueryError(`unexpected type for ${fn.toLowerCase()}: ${typeof result}`, query);
  }
}

function toId(value: unknown, compiled: CompiledQuery): number | bigint {
  if (typeof value === 'number' || typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value)) {
    const id = Number(value);
    return Number.isSafeInteger(id) ? id : BigInt(value);
  }
  throw new QueryError(`unexpected type for insert id: ${typeof value}`, compiled);
}
