import { ConnectionError, toError } from '@querywright/core';
import * as mysql from 'mysql2/promise';

import type { Logger, Row } from '@querywright/core';

export class MySQLConnectionPool {
  private pool?: mysql.Pool;

  constructor(
    private readonly options: mysql.PoolOptions,
    private readonly logger: Logger,
  ) {}

  /**
   * Create the pool and ping through one connection. Driver errors are
   * rethrown unwrapped.
   */
  async initialize(): Promise<void> {
    const pool = mysql.createPool(this.options);

    try {
      const connection = await pool.getConnection();
      try {
        await connection.ping();
      } finally {
        connection.release();
      }
    } catch (error) {
      await pool.end().catch((endError: unknown) => {
        this.logger.warn(`Failed to end MySQL pool: ${toError(endError).message}`);
      });
      throw error;
    }

    this.pool = pool;
  }

  async query(sql: string, bindings: unknown[]): Promise<Row[]> {
    const [rows] = await this.requirePool().query<mysql.RowDataPacket[]>(sql, bindings);
    return rows;
  }

  async execute(sql: string, bindings: unknown[]): Promise<mysql.ResultSetHeader> {
    const [header] = await this.requirePool().query<mysql.ResultSetHeader>(sql, bindings);
    return header;
  }

  async getConnection(): Promise<mysql.PoolConnection> {
    const pool = this.requirePool();

    try {
      return await pool.getConnection();
    } catch (error) {
      throw new ConnectionError('Failed to get connection from pool', toError(error));
    }
  }

  async end(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = undefined;
      await pool.end();
    }
  }

  private requirePool(): mysql.Pool {
    if (!this.pool) {
      throw new ConnectionError('Connection pool not initialized');
    }
    return this.pool;
  }
}
