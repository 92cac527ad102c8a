/**
 * A result row keyed by column name.
 */
export type Row = Record<string, unknown>;

/**
 * Compiled SQL text plus the bindings for its placeholders, in order.
 */
export interface CompiledQuery {
  sql: string;
  bindings: unknown[];
}

export type DriverName =
  | 'pgsql'
  | 'postgres'
  | 'postgresql'
  | 'sqlite'
  | 'sqlite3'
  | 'mysql'
  | 'mariadb';

/**
 * Connection pool configuration
 */
export interface PoolConfig {
  /** Maximum number of connections in pool */
  max?: number;

  /** Time before idle connection is closed (ms) */
  idleTimeout?: number;

  /** Maximum time to wait for a new connection (ms) */
  connectionTimeout?: number;
}

/**
 * Configuration of a single named connection
 * @example
 * ```typescript
 * const config: ConnectionConfig = {
 *   driver: 'pgsql',
 *   host: 'localhost',
 *   port: 5432,
 *   database: 'app',
 *   username: 'app',
 *   password: 'secret',
 *   prefix: 'app_',
 * };
 * ```
 */
export interface ConnectionConfig {
  driver: DriverName;
  host?: string;
  port?: number;
  /** Database name, or the file path for SQLite (`:memory:` for an in-memory database) */
  database: string;
  username?: string;
  password?: string;
  /** PostgreSQL SSL mode; `disable` turns TLS off */
  sslMode?: string;
  /** Prepended to every table name given to `table()` */
  prefix?: string;
  /** Enables `PRAGMA foreign_keys` on SQLite */
  foreignKeyConstraints?: boolean;
  pool?: PoolConfig;
}

export interface DatabaseConfig {
  /** Name of the connection used when none is given */
  default: string;
  connections: Record<string, ConnectionConfig>;
}

/**
 * Per-call execution settings, threaded from the builder down to the driver.
 */
export interface ExecutionContext {
  /** Aborting rejects the pending call with the signal's reason */
  signal?: AbortSignal;
  /** Milliseconds before the call rejects with a TimeoutError */
  timeout?: number;
}

/**
 * Outcome of a write statement. Both accessors may throw when the driver
 * cannot report the value.
 */
export interface ExecResult {
  rowsAffected(): number;
  lastInsertId(): number | bigint;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
