import { BaseTransaction } from '@querywright/core';

import { runStatement, selectRows } from '../utils/statements';

import type { ExecResult, Row } from '@querywright/core';
import type { Database } from 'better-sqlite3';

/**
 * SQLite has a single connection per database handle, so the transaction
 * runs on the connection's handle itself and has nothing to release.
 */
export class SQLiteTransaction extends BaseTransaction<Database> {
  protected async doBegin(): Promise<void> {
    this.client.exec('BEGIN');
  }

  protected async doCommit(): Promise<void> {
    this.client.exec('COMMIT');
  }

  protected async doRollback(): Promise<void> {
    this.client.exec('ROLLBACK');
  }

  protected async doQuery(sql: string, bindings: unknown[]): Promise<Row[]> {
    return selectRows(this.client, sql, bindings);
  }

  protected async doExec(sql: string, bindings: unknown[]): Promise<ExecResult> {
    return runStatement(this.client, sql, bindings);
  }
}
