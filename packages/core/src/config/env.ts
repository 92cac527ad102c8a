import { ValidationError } from '../errors';
import { isDriverName } from './database-config';

import type { ConnectionConfig, DatabaseConfig } from '../types';

/**
 * Build a single-connection config named `default` from DB_* variables.
 * Unset variables are left out so {@link applyConnectionDefaults} can fill them.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const driver = env['DB_CONNECTION'] || 'pgsql';
  if (!isDriverName(driver)) {
    throw new ValidationError(`Unsupported driver "${driver}"`, 'DB_CONNECTION');
  }

  const connection: ConnectionConfig = {
    driver,
    database: env['DB_DATABASE'] ?? '',
  };

  const host = env['DB_HOST'];
  if (host) {
    connection.host = host;
  }

  const port = env['DB_PORT'];
  if (port) {
    const parsed = Number(port);
    if (!Number.isInteger(parsed)) {
      throw new ValidationError(`DB_PORT must be an integer, got "${port}"`, 'DB_PORT');
    }
    connection.port = parsed;
  }

  const username = env['DB_USERNAME'];
  if (username) {
    connection.username = username;
  }

  const password = env['DB_PASSWORD'];
  if (password !== undefined) {
    connection.password = password;
  }

  const sslMode = env['DB_SSLMODE'];
  if (sslMode) {
    connection.sslMode = sslMode;
  }

  const prefix = env['DB_PREFIX'];
  if (prefix) {
    connection.prefix = prefix;
  }

  const foreignKeys = env['DB_FOREIGN_KEYS'];
  if (foreignKeys) {
    connection.foreignKeyConstraints = ['1', 'true', 'on', 'yes'].includes(foreignKeys.toLowerCase());
  }

  return { default: 'default', connections: { default: connection } };
}
