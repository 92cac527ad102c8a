/**
 * PostgreSQL Connection
 *
 * Runs statements on a pg `Pool`. PostgreSQL reports no insert id, so
 * `exec(...).lastInsertId()` throws and builders read generated keys back
 * through `RETURNING id` instead.
 */

import { BaseConnection, ConnectionError, StatementResult } from '@querywright/core';

import { PostgreSQLConnectionPool } from '../pool/connection-pool';
import { buildPoolConfig } from '../utils/pg-utils';
import { configurePgTypes } from '../utils/pg-types';
import { PostgreSQLTransaction } from './postgresql-transaction';

import type { PoolStats } from '../pool/connection-pool';
import type { ConnectionConfig, ConnectionOptions, ExecResult, Row } from '@querywright/core';
import type { PoolConfig } from 'pg';

export interface PostgreSQLConnectionOptions extends ConnectionOptions {
  /** Raw pg pool options, applied over the ones derived from the config */
  pgOptions?: PoolConfig;
  parseTypes?: boolean;
}

export class PostgreSQLConnection extends BaseConnection {
  private pool?: PostgreSQLConnectionPool;
  private readonly pgOptions?: PoolConfig;

  constructor(name: string, config: ConnectionConfig, options: PostgreSQLConnectionOptions = {}) {
    super(name, config, options);
    this.pgOptions = options.pgOptions;

    if (options.parseTypes ?? true) {
      configurePgTypes();
    }
  }

  getPoolStats(): PoolStats {
    if (!this.pool) {
      return { total: 0, idle: 0, active: 0, waiting: 0 };
    }
    return this.pool.getStats();
  }

  protected async doConnect(): Promise<void> {
    const pool = new PostgreSQLConnectionPool(
      buildPoolConfig(this.config, this.pgOptions),
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
    const result = await this.requirePool().query(sql, bindings);
    return result.rows;
  }

  protected async doExec(sql: string, bindings: unknown[]): Promise<ExecResult> {
    const result = await this.requirePool().query(sql, bindings);
    return new StatementResult(result.rowCount ?? 0, undefined, 'PostgreSQL');
  }

  protected async createTransaction(): Promise<PostgreSQLTransaction> {
    const client = await this.requirePool().getClient();
    return new PostgreSQLTransaction(this, client);
  }

  private requirePool(): PostgreSQLConnectionPool {
    if (!this.pool) {
      throw new ConnectionError(`Not connected to database [${this.name}]`, undefined, this.name);
    }
    return this.pool;
  }
}
