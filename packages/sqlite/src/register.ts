import { registerDriver } from '@querywright/core';

import { SQLiteConnection } from './connection/sqlite-connection';

import type { ConnectionFactory } from '@querywright/core';

export const createSQLiteConnection: ConnectionFactory = (name, config, options) =>
  new SQLiteConnection(name, config, options);

/**
 * Register the SQLite driver for `sqlite` and `sqlite3`
 */
export function register(): void {
  registerDriver('sqlite', createSQLiteConnection);
}
