/**
 * Base Connection
 *
 * Abstract base for the driver connections. Owns the configuration, the
 * cached grammar and the instrumentation every statement passes through:
 * execution context handling, debug and slow-query logging, and the
 * `query` / `queryError` events. Driver errors are rethrown as they are.
 */

import { EventEmitter } from 'eventemitter3';

import { validateConnectionConfig } from '../config/database-config';
import { ConnectionError } from '../errors';
import { createGrammar } from '../grammar/grammar-factory';
import { formatParams, noopLogger, truncateSql } from '../logger';
import { Builder } from '../query/builder';
import { retry, runWithContext, toError } from '../utils';

import type { Grammar } from '../grammar/grammar';
import type { ExecutionHandle, TransactionHandle } from '../interfaces/execution-handle';
import type { BaseTransaction, TransactionOwner } from '../transaction/base-transaction';
import type { ConnectionConfig, ExecResult, ExecutionContext, Logger, Row } from '../types';

export interface ConnectionOptions {
  logger?: Logger;
  /** Statements at or above this duration are logged at warn level (ms) */
  slowQueryThreshold?: number;
  retryOptions?: {
    maxRetries?: number;
    retryDelay?: number;
  };
}

export interface QueryEvent {
  connection: string;
  sql: string;
  bindings: unknown[];
  duration: number;
}

export interface QueryErrorEvent extends QueryEvent {
  error: Error;
}

export interface ConnectionEvents {
  connect: [{ connection: string }];
  disconnect: [{ connection: string }];
  query: [QueryEvent];
  queryError: [QueryErrorEvent];
}

export abstract class BaseConnection
  extends EventEmitter<ConnectionEvents>
  implements ExecutionHandle, TransactionOwner
{
  readonly logger: Logger;
  protected readonly slowQueryThreshold: number;
  protected _isConnected = false;
  protected retryOptions = {
    maxRetries: 3,
    retryDelay: 1000,
  };

  private _grammar?: Grammar;

  constructor(
    readonly name: string,
    readonly config: ConnectionConfig,
    options: ConnectionOptions = {},
  ) {
    super();
    this.logger = options.logger ?? noopLogger;
    this.slowQueryThreshold = options.slowQueryThreshold ?? 1000;
    if (options.retryOptions) {
      this.retryOptions = { ...this.retryOptions, ...options.retryOptions };
    }
  }

  get driver(): string {
    return this.config.driver;
  }

  get prefix(): string {
    return this.config.prefix ?? '';
  }

  get isConnected(): boolean {
    return this._isConnected;
  }

  /**
   * Grammar for this connection's driver, created once and shared by every
   * builder the connection hands out
   */
  get grammar(): Grammar {
    this._grammar ??= createGrammar(this.config.driver);
    return this._grammar;
  }

  // ============ Lifecycle ============

  async connect(): Promise<void> {
    if (this._isConnected) {
      return;
    }
    validateConnectionConfig(this.name, this.config);

    try {
      await retry(() => this.doConnect(), {
        maxRetries: this.retryOptions.maxRetries,
        retryDelay: this.retryOptions.retryDelay,
      });
    } catch (error) {
      this.logger.error(`Failed to connect [${this.name}]: ${toError(error).message}`);
      throw new ConnectionError(
        `Failed to connect to database [${this.name}]`,
        toError(error),
        this.name,
      );
    }

    this._isConnected = true;
    this.logger.info(`Connected [${this.name}] (${this.driver})`);
    this.emit('connect', { connection: this.name });
  }

  async close(): Promise<void> {
    if (!this._isConnected) {
      return;
    }

    try {
      await this.doClose();
    } catch (error) {
      throw new ConnectionError(
        `Failed to disconnect from database [${this.name}]`,
        toError(error),
        this.name,
      );
    } finally {
      this._isConnected = false;
    }

    this.logger.info(`Disconnected [${this.name}]`);
    this.emit('disconnect', { connection: this.name });
  }

  async ping(): Promise<boolean> {
    try {
      await this.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(`Ping failed [${this.name}]: ${toError(error).message}`);
      return false;
    }
  }

  // ============ Statements ============

  async query(sql: string, bindings: unknown[] = [], context?: ExecutionContext): Promise<Row[]> {
    this.ensureConnected();
    return this.instrument(sql, bindings, context, () => this.doQuery(sql, bindings));
  }

  async queryRow(
    sql: string,
    bindings: unknown[] = [],
    context?: ExecutionContext,
  ): Promise<Row | null> {
    const rows = await this.query(sql, bindings, context);
    return rows[0] ?? null;
  }

  async exec(sql: string, bindings: unknown[] = [], context?: ExecutionContext): Promise<ExecResult> {
    this.ensureConnected();
    return this.instrument(sql, bindings, context, () => this.doExec(sql, bindings));
  }

  /**
   * Start a builder on `name`, with the configured table prefix applied
   */
  table(name: string): Builder {
    return new Builder(this, this.grammar, `${this.prefix}${name}`);
  }

  // ============ Transactions ============

  async beginTransaction(): Promise<BaseTransaction> {
    this.ensureConnected();
    const transaction = await this.createTransaction();
    await transaction.begin();
    return transaction;
  }

  /**
   * Run `fn` inside a transaction. A throw rolls back and rethrows the
   * original error; otherwise the transaction commits and `fn`'s result is
   * returned.
   */
  async transaction<T>(fn: (tx: TransactionHandle) => Promise<T>): Promise<T> {
    const tx = await this.beginTransaction();

    let result: T;
    try {
      result = await fn(tx);
    } catch (error) {
      if (tx.isActive) {
        try {
          await tx.rollback();
        } catch (rollbackError) {
          this.logger.error(`Rollback of transaction ${tx.id} failed`, {
            error: toError(rollbackError).message,
          });
        }
      }
      throw error;
    }

    if (tx.isActive) {
      await tx.commit();
    }
    return result;
  }

  // ============ Instrumentation ============

  /**
   * Run a driver call under `context`, logging and emitting its outcome
   */
  async instrument<T>(
    sql: string,
    bindings: unknown[],
    context: ExecutionContext | undefined,
    call: () => Promise<T>,
  ): Promise<T> {
    const truncatedSql = truncateSql(sql);
    const startTime = Date.now();

    try {
      const result = await runWithContext(call, context);
      const duration = Date.now() - startTime;

      if (duration >= this.slowQueryThreshold) {
        this.logger.warn(`Slow query detected (${duration}ms): ${truncatedSql}`, { duration });
      }
      this.logger.debug(`Query completed in ${duration}ms: ${truncatedSql}`, {
        params: formatParams(bindings),
      });
      this.emit('query', { connection: this.name, sql, bindings, duration });

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      const failure = toError(error);
      this.logger.error(`Query failed after ${duration}ms: ${failure.message}`, {
        sql: truncatedSql,
      });
      this.emit('queryError', { connection: this.name, sql, bindings, duration, error: failure });
      throw error;
    }
  }

  protected ensureConnected(): void {
    if (!this._isConnected) {
      throw new ConnectionError(`Not connected to database [${this.name}]`, undefined, this.name);
    }
  }

  // ============ Abstract Methods (Driver-specific) ============

  protected abstract doConnect(): Promise<void>;

  protected abstract doClose(): Promise<void>;

  protected abstract doQuery(sql: string, bindings: unknown[]): Promise<Row[]>;

  protected abstract doExec(sql: string, bindings: unknown[]): Promise<ExecResult>;

  /**
   * Create a not-yet-begun transaction pinned to one driver client
   */
  protected abstract createTransaction(): Promise<BaseTransaction>;
}
