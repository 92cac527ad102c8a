import type { ConnectionConfig } from '@querywright/core';
import type { PoolConfig } from 'pg';

/**
 * Map a libpq-style `sslmode` onto pg's `ssl` option
 */
export function sslFromMode(mode?: string): PoolConfig['ssl'] {
  if (mode === undefined || mode === 'disable' || mode === 'false' || mode === '0') {
    return false;
  }
  if (mode === 'require' || mode === 'true' || mode === '1') {
    return true;
  }
  return { rejectUnauthorized: mode === 'verify-full' };
}

export function buildPoolConfig(config: ConnectionConfig, overrides: PoolConfig = {}): PoolConfig {
  return {
    host: config.host,
    port: config.port ?? 5432,
    user: config.username,
    password: config.password,
    database: config.database,
    ssl: sslFromMode(config.sslMode),
    max: config.pool?.max ?? 10,
    idleTimeoutMillis: config.pool?.idleTimeout ?? 30000,
    connectionTimeoutMillis: config.pool?.connectionTimeout ?? 10000,
    ...overrides,
  };
}
