export {
  PostgreSQLConnection,
  type PostgreSQLConnectionOptions,
} from './connection/postgresql-connection';
export { PostgreSQLTransaction } from './connection/postgresql-transaction';
export { PostgreSQLConnectionPool, type PoolStats } from './pool/connection-pool';
export { configurePgTypes, parseInt8 } from './utils/pg-types';
export { buildPoolConfig, sslFromMode } from './utils/pg-utils';
export { register, createPostgreSQLConnection } from './register';
