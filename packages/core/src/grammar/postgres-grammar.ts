/**
 * PostgreSQL Grammar
 *
 * Handles PostgreSQL-specific SQL syntax:
 * - Numbered ($1, $2) parameter placeholders
 * - RETURNING clause for insertGetId
 */

import { Grammar } from './grammar';

import type { QueryState } from './grammar';
import type { CompiledQuery } from '../types';

export class PostgresGrammar extends Grammar {
  readonly driver = 'postgres' as const;

  /**
   * PostgreSQL placeholders are 1-based: index 0 becomes $1
   */
  override parameter(index: number): string {
    return `$${index + 1}`;
  }

  override compileInsertGetId(query: QueryState, values: Record<string, unknown>): CompiledQuery {
    const { sql, bindings } = this.compileInsert(query, values);
    return { sql: `${sql} RETURNING id`, bindings };
  }
}
