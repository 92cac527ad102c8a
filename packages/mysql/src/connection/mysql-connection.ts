/**
 * MySQL Connection
 *
 * Runs statements on a mysql2 promise pool. Identifiers are quoted with
 * backticks by the MySQL grammar; insert ids come from the result header.
 */

import { BaseConnection, ConnectionError, StatementResult } from '@querywright/core';

import { MySQLConnectionPool } from '../pool/connection-pool';
import { buildPoolOptions } from '../utils/mysql-utils';
import { MySQLTransaction } from './mysql-transaction';

import type { ConnectionConfig, ConnectionOptions, ExecResult, Row } from '@querywright/core';
import type { PoolOptions } from 'mysql2/promise';

export interface MySQLConnectionOptions extends ConnectionOptions {
  /** Raw mysql2 pool options, applied over the ones derived from the config */
  mysql2Options?: PoolOptions;
}

export class MySQLConnection extends BaseConnection {
  private pool?: MySQLConnectionPool;
  private readonly mysql2Options?: PoolOptions;

  constructor(name: string, config: ConnectionConfig, options: MySQLConnectionOptions = {}) {
    super(name, config, options);
    this.mysql2Options = options.mysql2Options;
  }

  protected async doConnect(): Promise<void> {
    const pool = new MySQLConnectionPool(
      buildPoolOptions(this.config, this.mysql2Options),
      this.logger,
    );
    await pool.initialize();
    this.pool = pool;
  }

  protected async doClose(): Promise<void> {
    const pool = this.pool;
    this.pool = undefined;
    await pool?.end();
  }

  protected async doQuery(sql: string, bindings: unknown[]): Promise<Row[]> {
    return this.requirePool().query(sql, bindings);
  }

  protected async doExec(sql: string, bindings: unknown[]): Promise<ExecResult> {
    const header = await this.requirePool().execute(sql, bindings);
    return new StatementResult(header.affectedRows, header.insertId, 'MySQL');
  }

  protected async createTransaction(): Promise<MySQLTransaction> {
    const connection = await this.requirePool().getConnection();
    return new MySQLTransaction(this, connection);
  }

  private requirePool(): MySQLConnectionPool {
    if (!this.pool) {
      throw new ConnectionError(`Not connected to database [${this.name}]`, undefined, this.name);
    }
    return this.pool;
  }
}
