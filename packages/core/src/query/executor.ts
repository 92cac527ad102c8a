/**
 * Query Executor
 *
 * Single dispatch point between a builder and its execution handle.
 * Whether the handle is a connection or a transaction makes no difference
 * here; both satisfy {@link ExecutionHandle}.
 */

import type { ExecutionHandle } from '../interfaces/execution-handle';
import type { CompiledQuery, ExecResult, ExecutionContext, Row } from '../types';

export interface ExecutorOptions {
  context: ExecutionContext;
  /** Sticky builder error; when set, nothing reaches the handle */
  error?: Error;
}

const decoder = new TextDecoder();

/**
 * Drivers hand back text columns as byte buffers in some configurations
 * (mysql2 binary collations, better-sqlite3 BLOBs). Those become strings.
 */
export function normalizeRow(row: Row): Row {
  const normalized: Row = {};
  for (const [key, value] of Object.entries(row)) {
    normalized[key] = value instanceof Uint8Array ? decoder.decode(value) : value;
  }
  return normalized;
}

export class QueryExecutor {
  constructor(private readonly handle: ExecutionHandle) {}

  async select(query: CompiledQuery, options: ExecutorOptions): Promise<Row[]> {
    this.assertNoError(options);
    const rows = await this.handle.query(query.sql, query.bindings, options.context);
    return rows.map(normalizeRow);
  }

  async selectOne(query: CompiledQuery, options: ExecutorOptions): Promise<Row | null> {
    this.assertNoError(options);
    const row = await this.handle.queryRow(query.sql, query.bindings, options.context);
    return row ? normalizeRow(row) : null;
  }

  async execute(query: CompiledQuery, options: ExecutorOptions): Promise<ExecResult> {
    this.assertNoError(options);
    return this.handle.exec(query.sql, query.bindings, options.context);
  }

  private assertNoError(options: ExecutorOptions): void {
    if (options.error) {
      throw options.error;
    }
  }
}
