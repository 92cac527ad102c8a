import { registerDriver } from '@querywright/core';

import { PostgreSQLConnection } from './connection/postgresql-connection';

import type { ConnectionFactory } from '@querywright/core';

export const createPostgreSQLConnection: ConnectionFactory = (name, config, options) =>
  new PostgreSQLConnection(name, config, options);

/**
 * Register the PostgreSQL driver for `pgsql`, `postgres` and `postgresql`
 */
export function register(): void {
  registerDriver('pgsql', createPostgreSQLConnection);
}
