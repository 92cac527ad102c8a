/**
 * Database configuration helpers: defaults, validation and the
 * `defineConfig` identity helper for typed config files.
 *
 * @example
 * ```typescript
 * export default defineConfig({
 *   default: 'main',
 *   connections: {
 *     main: { driver: 'pgsql', host: 'localhost', database: 'app', username: 'app' },
 *     cache: { driver: 'sqlite', database: ':memory:' },
 *   },
 * });
 * ```
 */

import { ValidationError } from '../errors';
import { normalizeDriver } from '../grammar/grammar-factory';

import type { ConnectionConfig, DatabaseConfig, DriverName } from '../types';

const DRIVER_NAMES: readonly DriverName[] = [
  'pgsql',
  'postgres',
  'postgresql',
  'sqlite',
  'sqlite3',
  'mysql',
  'mariadb',
];

const DEFAULT_PORTS: Partial<Record<ReturnType<typeof normalizeDriver>, number>> = {
  postgres: 5432,
  mysql: 3306,
};

export function defineConfig(config: DatabaseConfig): DatabaseConfig {
  return config;
}

export function isDriverName(value: string): value is DriverName {
  return DRIVER_NAMES.some((driver) => driver === value);
}

/**
 * Fill in the per-driver port, host and SSL mode defaults
 */
export function applyConnectionDefaults(config: ConnectionConfig): ConnectionConfig {
  const driver = normalizeDriver(config.driver);
  if (driver === 'sqlite') {
    return { ...config };
  }

  const withDefaults: ConnectionConfig = {
    ...config,
    host: config.host ?? 'localhost',
    port: config.port ?? DEFAULT_PORTS[driver],
  };
  if (driver === 'postgres') {
    withDefaults.sslMode = config.sslMode || 'disable';
  }
  return withDefaults;
}

export function validateConnectionConfig(name: string, config: ConnectionConfig): void {
  const field = (key: string): string => `connections.${name}.${key}`;

  if (!isDriverName(config.driver)) {
    throw new ValidationError(
      `Unsupported driver "${String(config.driver)}" for connection [${name}]`,
      field('driver'),
    );
  }

  if (!config.database) {
    throw new ValidationError(`Database is required for connection [${name}]`, field('database'));
  }

  if (
    config.port !== undefined &&
    (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535)
  ) {
    throw new ValidationError('Port must be a number between 1 and 65535', field('port'));
  }

  const pool = config.pool;
  if (pool?.max !== undefined && pool.max < 1) {
    throw new ValidationError('Pool size must be a positive number', field('pool.max'));
  }
  if (pool?.idleTimeout !== undefined && pool.idleTimeout < 0) {
    throw new ValidationError('Idle timeout must be a non-negative number', field('pool.idleTimeout'));
  }
  if (pool?.connectionTimeout !== undefined && pool.connectionTimeout < 0) {
    throw new ValidationError(
      'Connection timeout must be a non-negative number',
      field('pool.connectionTimeout'),
    );
  }
}

export function validateDatabaseConfig(config: DatabaseConfig): void {
  if (!config.default) {
    throw new ValidationError('A default connection name is required', 'default');
  }

  if (!(config.default in config.connections)) {
    throw new ValidationError(
      `database connection [${config.default}] not configured`,
      'default',
    );
  }

  for (const [name, connection] of Object.entries(config.connections)) {
    validateConnectionConfig(name, connection);
  }
}
