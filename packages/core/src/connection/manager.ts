/**
 * Database Manager
 *
 * Resolves named connections from a {@link DatabaseConfig}. Connections are
 * created on first use, connected, and cached until `disconnect` or `close`.
 *
 * @example
 * ```typescript
 * import { register as registerPostgres } from '@querywright/postgresql';
 *
 * registerPostgres();
 * const db = new DatabaseManager(configFromEnv(), { logger: consoleLogger });
 *
 * const adults = await db.table('users').where('age', '>=', 18).get();
 * await db.transaction(async (tx) => {
 *   await tx.table('accounts').where('id', '=', 1).decrement('balance', 100);
 *   await tx.table('accounts').where('id', '=', 2).increment('balance', 100);
 * });
 * ```
 */

import { applyConnectionDefaults, validateDatabaseConfig } from '../config/database-config';
import { ValidationError } from '../errors';
import { createGrammar, normalizeDriver } from '../grammar/grammar-factory';
import { noopLogger } from '../logger';
import { Builder } from '../query/builder';
import { toError } from '../utils';
import { resolveDriver } from './driver-registry';

import type { BaseConnection, ConnectionOptions } from './base-connection';
import type { ConnectionFactory } from './driver-registry';
import type { GrammarDriver } from '../grammar/grammar';
import type { ExecutionHandle, TransactionHandle } from '../interfaces/execution-handle';
import type { BaseTransaction } from '../transaction/base-transaction';
import type {
  ConnectionConfig,
  DatabaseConfig,
  ExecResult,
  ExecutionContext,
  Logger,
  Row,
} from '../types';

export interface DatabaseManagerOptions extends ConnectionOptions {
  /** Factories that take precedence over globally registered drivers */
  drivers?: Record<string, ConnectionFactory>;
}

export class DatabaseManager {
  private readonly config: DatabaseConfig;
  private readonly connections = new Map<string, Promise<BaseConnection>>();
  private readonly drivers = new Map<GrammarDriver, ConnectionFactory>();
  private readonly logger: Logger;

  constructor(
    config: DatabaseConfig,
    private readonly options: DatabaseManagerOptions = {},
  ) {
    validateDatabaseConfig(config);
    this.config = { default: config.default, connections: { ...config.connections } };
    this.logger = options.logger ?? noopLogger;

    for (const [driver, factory] of Object.entries(options.drivers ?? {})) {
      this.registerDriver(driver, factory);
    }
  }

  registerDriver(driver: string, factory: ConnectionFactory): this {
    this.drivers.set(normalizeDriver(driver), factory);
    return this;
  }

  /**
   * Get a connected connection by name, the default one when omitted
   */
  async connection(name?: string): Promise<BaseConnection> {
    const connName = name || this.config.default;

    const existing = this.connections.get(connName);
    if (existing) {
      return existing;
    }

    const pending = this.makeConnection(connName);
    this.connections.set(connName, pending);

    try {
      return await pending;
    } catch (error) {
      if (this.connections.get(connName) === pending) {
        this.connections.delete(connName);
      }
      throw error;
    }
  }

  /**
   * Start a builder on a named connection. The connection is opened when
   * the first statement runs, so this call itself is synchronous.
   */
  table(name: string, connection?: string): Builder {
    const connName = connection || this.config.default;
    const config = this.requireConfig(connName);
    return new Builder(
      this.lazyHandle(connName),
      createGrammar(config.driver),
      `${config.prefix ?? ''}${name}`,
    );
  }

  // ============ Raw Statements ============

  async select(sql: string, bindings: unknown[] = [], context?: ExecutionContext): Promise<Row[]> {
    const connection = await this.connection();
    return connection.query(sql, bindings, context);
  }

  async insert(sql: string, bindings: unknown[] = [], context?: ExecutionContext): Promise<ExecResult> {
    return this.statement(sql, bindings, context);
  }

  async update(sql: string, bindings: unknown[] = [], context?: ExecutionContext): Promise<ExecResult> {
    return this.statement(sql, bindings, context);
  }

  async delete(sql: string, bindings: unknown[] = [], context?: ExecutionContext): Promise<ExecResult> {
    return this.statement(sql, bindings, context);
  }

  async statement(
    sql: string,
    bindings: unknown[] = [],
    context?: ExecutionContext,
  ): Promise<ExecResult> {
    const connection = await this.connection();
    return connection.exec(sql, bindings, context);
  }

  // ============ Transactions ============

  async transaction<T>(fn: (tx: TransactionHandle) => Promise<T>): Promise<T> {
    const connection = await this.connection();
    return connection.transaction(fn);
  }

  async beginTransaction(): Promise<BaseTransaction> {
    const connection = await this.connection();
    return connection.beginTransaction();
  }

  // ============ Configuration ============

  getDefaultConnection(): string {
    return this.config.default;
  }

  setDefaultConnection(name: string): void {
    this.config.default = name;
  }

  getConfig(name?: string): ConnectionConfig | undefined {
    return this.config.connections[name || this.config.default];
  }

  // ============ Lifecycle ============

  /**
   * Close and forget a cached connection. Unknown or unopened names are a no-op.
   */
  async disconnect(name?: string): Promise<void> {
    const connName = name || this.config.default;
    const pending = this.connections.get(connName);
    if (!pending) {
      return;
    }

    this.connections.delete(connName);
    const connection = await pending;
    await connection.close();
  }

  /**
   * Drop the cached connection and open a fresh one. A failure while
   * closing the old connection is logged and does not stop the reconnect.
   */
  async reconnect(name?: string): Promise<BaseConnection> {
    const connName = name || this.config.default;

    try {
      await this.disconnect(connName);
    } catch (error) {
      this.logger.warn(`Disconnect before reconnect failed [${connName}]`, {
        error: toError(error).message,
      });
    }

    return this.connection(connName);
  }

  /**
   * Close every cached connection; rethrows the last failure after trying all
   */
  async close(): Promise<void> {
    const pending = [...this.connections.entries()];
    this.connections.clear();

    let lastError: Error | undefined;
    for (const [name, connection] of pending) {
      try {
        await (await connection).close();
      } catch (error) {
        lastError = toError(error);
        this.logger.error(`Failed to close connection [${name}]: ${lastError.message}`);
      }
    }

    if (lastError) {
      throw lastError;
    }
  }

  // ============ Internals ============

  private requireConfig(name: string): ConnectionConfig {
    const config = this.config.connections[name];
    if (!config) {
      throw new ValidationError(`database connection [${name}] not configured`, 'connection');
    }
    return config;
  }

  private async makeConnection(name: string): Promise<BaseConnection> {
    const config = applyConnectionDefaults(this.requireConfig(name));

    const driver = normalizeDriver(config.driver);
    const factory = this.drivers.get(driver) ?? resolveDriver(driver);
    if (!factory) {
      throw new ValidationError(
        `No connection factory registered for driver "${config.driver}"`,
        `connections.${name}.driver`,
      );
    }

    const connection = factory(name, config, {
      logger: this.options.logger,
      slowQueryThreshold: this.options.slowQueryThreshold,
      retryOptions: this.options.retryOptions,
    });
    await connection.connect();
    return connection;
  }

  /**
   * Execution handle that opens the named connection on first use
   */
  private lazyHandle(name: string): ExecutionHandle {
    return {
      query: async (sql, bindings, context) => (await this.connection(name)).query(sql, bindings, context),
      queryRow: async (sql, bindings, context) =>
        (await this.connection(name)).queryRow(sql, bindings, context),
      exec: async (sql, bindings, context) => (await this.connection(name)).exec(sql, bindings, context),
    };
  }
}
