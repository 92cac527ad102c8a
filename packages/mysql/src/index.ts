export { MySQLConnection, type MySQLConnectionOptions } from './connection/mysql-connection';
export { MySQLTransaction } from './connection/mysql-transaction';
export { MySQLConnectionPool } from './pool/connection-pool';
export { buildPoolOptions } from './utils/mysql-utils';
export { register, createMySQLConnection } from './register';
