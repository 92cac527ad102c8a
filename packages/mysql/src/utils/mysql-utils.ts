import type { ConnectionConfig } from '@querywright/core';
import type { PoolOptions } from 'mysql2/promise';

export function buildPoolOptions(config: ConnectionConfig, overrides: PoolOptions = {}): PoolOptions {
  return {
    host: config.host,
    port: config.port ?? 3306,
    user: config.username,
    password: config.password,
    database: config.database,
    connectionLimit: config.pool?.max ?? 10,
    waitForConnections: true,
    queueLimit: 0,
    connectTimeout: config.pool?.connectionTimeout ?? 10000,
    idleTimeout: config.pool?.idleTimeout ?? 60000,
    enableKeepAlive: true,
    keepAliveInitialDelay: 10000,
    ...overrides,
  };
}
