import { ConnectionError, toError } from '@querywright/core';
import { Pool } from 'pg';

import type { Logger, Row } from '@querywright/core';
import type { PoolClient, PoolConfig, QueryResult } from 'pg';

export interface PoolStats {
  total: number;
  idle: number;
  active: number;
  waiting: number;
}

export class PostgreSQLConnectionPool {
  private pool?: Pool;

  constructor(
    private readonly config: PoolConfig,
    private readonly logger: Logger,
  ) {}

  /**
   * Create the pool and check out one client to prove the server is
   * reachable. Errors from the driver are rethrown unwrapped so the caller
   * can tell transient network failures apart.
   */
  async initialize(): Promise<void> {
    const pool = new Pool(this.config);

    pool.on('error', (err) => {
      this.logger.error(`Unexpected error on idle PostgreSQL client: ${err.message}`);
    });

    try {
      const client = await pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
    } catch (error) {
      await pool.end().catch((endError: unknown) => {
        this.logger.warn(`Failed to end PostgreSQL pool: ${toError(endError).message}`);
      });
      throw error;
    }

    this.pool = pool;
  }

  async query(sql: string, bindings: unknown[]): Promise<QueryResult<Row>> {
    return this.requirePool().query<Row>(sql, bindings);
  }

  async getClient(): Promise<PoolClient> {
    const pool = this.requirePool();

    try {
      return await pool.connect();
    } catch (error) {
      throw new ConnectionError('Failed to get client from pool', toError(error));
    }
  }

  async end(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = undefined;
      await pool.end();
    }
  }

  getStats(): PoolStats {
    if (!this.pool) {
      return {
        total: 0,
        idle: 0,
        active: 0,
        waiting: 0,
      };
    }

    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      active: this.pool.totalCount - this.pool.idleCount,
      waiting: this.pool.waitingCount,
    };
  }

  private requirePool(): Pool {
    if (!this.pool) {
      throw new ConnectionError('Connection pool not initialized');
    }
    return this.pool;
  }
}
