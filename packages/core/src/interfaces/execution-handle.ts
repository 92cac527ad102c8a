import type { Builder } from '../query/builder';
import type { ExecResult, ExecutionContext, Row } from '../types';

/**
 * The minimal execute/query capability a connection or transaction exposes
 * to the query builder.
 */
export interface ExecutionHandle {
  query(sql: string, bindings?: unknown[], context?: ExecutionContext): Promise<Row[]>;
  queryRow(sql: string, bindings?: unknown[], context?: ExecutionContext): Promise<Row | null>;
  exec(sql: string, bindings?: unknown[], context?: ExecutionContext): Promise<ExecResult>;
}

export interface TransactionHandle extends ExecutionHandle {
  readonly id: string;
  readonly isActive: boolean;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  table(name: string): Builder;
}
