import { BaseTransaction, StatementResult } from '@querywright/core';

import type { ExecResult, Row } from '@querywright/core';
import type { PoolConnection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';

export class MySQLTransaction extends BaseTransaction<PoolConnection> {
  protected async doBegin(): Promise<void> {
    await this.client.beginTransaction();
  }

  protected async doCommit(): Promise<void> {
    await this.client.commit();
  }

  protected async doRollback(): Promise<void> {
    await this.client.rollback();
  }

  protected async doQuery(sql: string, bindings: unknown[]): Promise<Row[]> {
    const [rows] = await this.client.query<RowDataPacket[]>(sql, bindings);
    return rows;
  }

  protected async doExec(sql: string, bindings: unknown[]): Promise<ExecResult> {
    const [header] = await this.client.query<ResultSetHeader>(sql, bindings);
    return new StatementResult(header.affectedRows, header.insertId, 'MySQL');
  }

  protected override async release(): Promise<void> {
    this.client.release();
  }
}
