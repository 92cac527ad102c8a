import { registerDriver } from '@querywright/core';

import { MySQLConnection } from './connection/mysql-connection';

import type { ConnectionFactory } from '@querywright/core';

export const createMySQLConnection: ConnectionFactory = (name, config, options) =>
  new MySQLConnection(name, config, options);

/**
 * Register the MySQL driver for `mysql` and `mariadb`
 */
export function register(): void {
  registerDriver('mysql', createMySQLConnection);
}
