import { BaseTransaction, StatementResult } from '@querywright/core';

import type { ExecResult, Row } from '@querywright/core';
import type { PoolClient } from 'pg';

/**
 * Transaction pinned to one pooled client; the client goes back to the pool
 * after COMMIT or ROLLBACK.
 */
export class PostgreSQLTransaction extends BaseTransaction<PoolClient> {
  protected async doBegin(): Promise<void> {
    await this.client.query('BEGIN');
  }

  protected async doCommit(): Promise<void> {
    await this.client.query('COMMIT');
  }

  protected async doRollback(): Promise<void> {
    await this.client.query('ROLLBACK');
  }

  protected async doQuery(sql: string, bindings: unknown[]): Promise<Row[]> {
    const result = await this.client.query<Row>(sql, bindings);
    return result.rows;
  }

  protected async doExec(sql: string, bindings: unknown[]): Promise<ExecResult> {
    const result = await this.client.query(sql, bindings);
    return new StatementResult(result.rowCount ?? 0, undefined, 'PostgreSQL');
  }

  protected override async release(): Promise<void> {
    this.client.release();
  }
}
