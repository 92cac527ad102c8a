/**
 * SQL Grammar Base Class
 *
 * Compiles accumulated builder state into SQL text plus an ordered binding
 * list. Dialects override identifier quoting, placeholder syntax and the few
 * statements whose shape differs per engine.
 *
 * A grammar holds no per-query state: one instance is cached per connection
 * and shared by every builder of that connection. The placeholder counter
 * lives in a {@link CompileState} created for each compile call.
 */

import { RawExpression, toBindable } from '../query/raw-expression';

import type {
  HavingClause,
  JoinClause,
  OrderClause,
  Predicate,
  SelectColumn,
} from '../query/clauses';
import type { CompiledQuery } from '../types';

export type GrammarDriver = 'base' | 'postgres' | 'sqlite' | 'mysql';

/**
 * Read-only view of a query the grammar compiles.
 */
export interface QueryState {
  getTable(): string;
  getColumns(): readonly SelectColumn[];
  isDistinct(): boolean;
  getJoins(): readonly JoinClause[];
  getWheres(): readonly Predicate[];
  getGroups(): readonly string[];
  getHavings(): readonly HavingClause[];
  getOrders(): readonly OrderClause[];
  getLimit(): number | undefined;
  getOffset(): number | undefined;
}

/**
 * Placeholder bookkeeping for a single compile call. WHERE and HAVING of one
 * statement (or SET and WHERE of an UPDATE) draw from the same counter.
 */
export class CompileState {
  private index = 0;

  constructor(private readonly grammar: Grammar) {}

  /** Emit the next placeholder and advance the counter */
  next(): string {
    return this.grammar.parameter(this.index++);
  }

  get count(): number {
    return this.index;
  }
}

interface Fragment {
  sql: string;
  bindings: unknown[];
}

const QUOTES = new Set(["'", '"', '`']);

/**
 * `?|` and `?&` at `index`; `?||` is a placeholder followed by concatenation
 */
function isJsonOperator(sql: string, index: number): boolean {
  const next = sql[index + 1];
  return next === '&' || (next === '|' && sql[index + 2] !== '|');
}

export abstract class Grammar {
  abstract readonly driver: GrammarDriver;

  protected readonly identifierQuote: string = '"';

  /**
   * Placeholder for the binding at a zero-based position
   */
  parameter(_index: number): string {
    return '?';
  }

  /**
   * Date format the database expects for datetime literals
   */
  dateFormat(): string {
    return 'YYYY-MM-DD HH:mm:ss';
  }

  wrapTable(table: string): string {
    return this.wrap(table);
  }

  wrapColumn(column: string): string {
    return this.wrap(column);
  }

  compileSelect(query: QueryState): CompiledQuery {
    return this.compileSelectWith(query, new CompileState(this));
  }

  compileExists(query: QueryState): CompiledQuery {
    const { sql, bindings } = this.compileSelect(query);
    return { sql: `SELECT EXISTS (${sql}) AS ${this.wrapColumn('exists')}`, bindings };
  }

  /**
   * Build INSERT for one record. Keys are sorted so the column order and the
   * binding order never depend on how the record was constructed.
   */
  compileInsert(query: QueryState, values: Record<string, unknown>): CompiledQuery {
    const state = new CompileState(this);
    const keys = Object.keys(values).sort();
    const bindings: unknown[] = [];

    const columns = keys.map((key) => this.wrapColumn(key));
    const placeholders = keys.map((key) => this.compileValue(values[key], state, bindings));

    return {
      sql: `INSERT INTO ${this.wrapTable(query.getTable())} (${columns.join(', ')}) VALUES (${placeholders.join(', ')})`,
      bindings,
    };
  }

  /**
   * INSERT used by `insertGetId`. Dialects that can return the key from the
   * statement itself override this.
   */
  compileInsertGetId(query: QueryState, values: Record<string, unknown>): CompiledQuery {
    return this.compileInsert(query, values);
  }

  compileUpdate(query: QueryState, values: Record<string, unknown>): CompiledQuery {
    const state = new CompileState(this);
    const keys = Object.keys(values).sort();
    const bindings: unknown[] = [];

    const sets = keys.map(
      (key) => `${this.wrapColumn(key)} = ${this.compileValue(values[key], state, bindings)}`,
    );
    let sql = `UPDATE ${this.wrapTable(query.getTable())} SET ${sets.join(', ')}`;

    const where = this.compileWheres(query.getWheres(), state);
    if (where) {
      sql += ` WHERE ${where.sql}`;
      bindings.push(...where.bindings);
    }

    return { sql, bindings };
  }

  compileDelete(query: QueryState): CompiledQuery {
    const state = new CompileState(this);
    let sql = `DELETE FROM ${this.wrapTable(query.getTable())}`;

    const where = this.compileWheres(query.getWheres(), state);
    if (where) {
      sql += ` WHERE ${where.sql}`;
      return { sql, bindings: where.bindings };
    }

    return { sql, bindings: [] };
  }

  compileTruncate(table: string): CompiledQuery {
    return { sql: `TRUNCATE TABLE ${this.wrapTable(table)}`, bindings: [] };
  }

  // ============ Clause Compilers ============

  protected compileSelectWith(query: QueryState, state: CompileState): CompiledQuery {
    const parts: string[] = [];
    const bindings: unknown[] = [];

    const columns = query.getColumns().map((column) => {
      if (column instanceof RawExpression) {
        bindings.push(...column.bindings);
        return this.parameterize(column.sql, state);
      }
      return this.wrapColumn(column);
    });
    parts.push(`SELECT ${query.isDistinct() ? 'DISTINCT ' : ''}${columns.join(', ')}`);

    parts.push(`FROM ${this.wrapTable(query.getTable())}`);

    for (const join of query.getJoins()) {
      parts.push(this.compileJoin(join));
    }

    const where = this.compileWheres(query.getWheres(), state);
    if (where) {
      parts.push(`WHERE ${where.sql}`);
      bindings.push(...where.bindings);
    }

    const groups = query.getGroups();
    if (groups.length > 0) {
      parts.push(`GROUP BY ${groups.map((column) => this.wrapColumn(column)).join(', ')}`);
    }

    const having = this.compileHavings(query.getHavings(), state);
    if (having) {
      parts.push(`HAVING ${having.sql}`);
      bindings.push(...having.bindings);
    }

    const order = this.compileOrders(query.getOrders(), state);
    if (order) {
      parts.push(`ORDER BY ${order.sql}`);
      bindings.push(...order.bindings);
    }

    this.appendLimitOffset(parts, query.getLimit(), query.getOffset());

    return { sql: parts.join(' '), bindings };
  }

  protected compileJoin(join: JoinClause): string {
    if (join.type === 'CROSS') {
      return `CROSS JOIN ${this.wrapTable(join.table)}`;
    }
    return `${join.type} JOIN ${this.wrapTable(join.table)} ON ${this.wrapColumn(join.first)} ${join.operator} ${this.wrapColumn(join.second)}`;
  }

  protected compileWheres(wheres: readonly Predicate[], state: CompileState): Fragment | undefined {
    if (wheres.length === 0) {
      return undefined;
    }

    const parts: string[] = [];
    const bindings: unknown[] = [];

    wheres.forEach((where, index) => {
      const fragment = this.compilePredicate(where, state);
      parts.push(index === 0 ? fragment.sql : `${where.boolean} ${fragment.sql}`);
      bindings.push(...fragment.bindings);
    });

    return { sql: parts.join(' '), bindings };
  }

  protected compilePredicate(where: Predicate, state: CompileState): Fragment {
    switch (where.type) {
      case 'basic': {
        return {
          sql: `${this.wrapColumn(where.column)} ${where.operator} ${state.next()}`,
          bindings: [where.value],
        };
      }
      case 'in':
      case 'not_in': {
        const placeholders = where.values.map(() => state.next());
        const operator = where.type === 'in' ? 'IN' : 'NOT IN';
        return {
          sql: `${this.wrapColumn(where.column)} ${operator} (${placeholders.join(', ')})`,
          bindings: [...where.values],
        };
      }
      case 'null': {
        return { sql: `${this.wrapColumn(where.column)} IS NULL`, bindings: [] };
      }
      case 'not_null': {
        return { sql: `${this.wrapColumn(where.column)} IS NOT NULL`, bindings: [] };
      }
      case 'between': {
        const low = state.next();
        const high = state.next();
        return {
          sql: `${this.wrapColumn(where.column)} BETWEEN ${low} AND ${high}`,
          bindings: [where.low, where.high],
        };
      }
      case 'raw': {
        return { sql: this.parameterize(where.sql, state), bindings: [...where.bindings] };
      }
    }
  }

  protected compileHavings(
    havings: readonly HavingClause[],
    state: CompileState,
  ): Fragment | undefined {
    if (havings.length === 0) {
      return undefined;
    }

    const parts: string[] = [];
    const bindings: unknown[] = [];

    havings.forEach((having, index) => {
      const sql =
        having.type === 'raw'
          ? this.parameterize(having.sql, state)
          : `${this.wrapColumn(having.column)} ${having.operator} ${state.next()}`;
      parts.push(index === 0 ? sql : `${having.boolean} ${sql}`);
      if (having.type === 'raw') {
        bindings.push(...having.bindings);
      } else {
        bindings.push(having.value);
      }
    });

    return { sql: parts.join(' '), bindings };
  }

  protected compileOrders(orders: readonly OrderClause[], state: CompileState): Fragment | undefined {
    if (orders.length === 0) {
      return undefined;
    }

    const bindings: unknown[] = [];
    const parts = orders.map((order) => {
      if (order.type === 'raw') {
        bindings.push(...order.bindings);
        return this.parameterize(order.sql, state);
      }
      return `${this.wrapColumn(order.column)} ${order.direction}`;
    });

    return { sql: parts.join(', '), bindings };
  }

  /**
   * Limit and offset are always integers, so they are written as literals
   */
  protected appendLimitOffset(parts: string[], limit?: number, offset?: number): void {
    if (limit !== undefined) {
      parts.push(`LIMIT ${limit}`);
    }
    if (offset !== undefined) {
      parts.push(`OFFSET ${offset}`);
    }
  }

  /**
   * Emit a literal for raw expressions, a placeholder for everything else
   */
  protected compileValue(value: unknown, state: CompileState, bindings: unknown[]): string {
    const bindable = toBindable(value);
    if (bindable.kind === 'literal') {
      bindings.push(...bindable.bindings);
      return this.parameterize(bindable.sql, state);
    }
    bindings.push(bindable.value);
    return state.next();
  }

  /**
   * Replace `?` markers in a caller-written fragment with this dialect's
   * placeholders. `\?` is written as a literal question mark. Quoted strings,
   * quoted identifiers and the jsonb operators `?|` / `?&` are copied as is.
   */
  protected parameterize(sql: string, state: CompileState): string {
    let out = '';
    let quote: string | undefined;

    for (let i = 0; i < sql.length; i++) {
      const char = sql[i];

      if (quote) {
        out += char;
        if (char === quote) {
          // a doubled quote is an escaped quote, still inside
          if (sql[i + 1] === quote) {
            out += quote;
            i++;
          } else {
            quote = undefined;
          }
        }
        continue;
      }

      if (QUOTES.has(char)) {
        quote = char;
        out += char;
      } else if (char === '\\' && sql[i + 1] === '?') {
        out += '?';
        i++;
      } else if (char === '?') {
        out += isJsonOperator(sql, i) ? char : state.next();
      } else {
        out += char;
      }
    }

    return out;
  }

  protected wrap(identifier: string): string {
    if (identifier === '*') {
      return identifier;
    }
    if (identifier.includes(' AS ') || identifier.includes(' as ')) {
      return identifier;
    }
    if (identifier.includes('(') || /\s/.test(identifier)) {
      return identifier;
    }
    return identifier
      .split('.')
      .map((segment) => (segment === '*' ? segment : this.quote(segment)))
      .join('.');
  }

  protected quote(segment: string): string {
    const quote = this.identifierQuote;
    return `${quote}${segment.replaceAll(quote, quote + quote)}${quote}`;
  }
}
