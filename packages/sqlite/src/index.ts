export { SQLiteConnection, type SQLiteConnectionOptions } from './connection/sqlite-connection';
export { SQLiteTransaction } from './connection/sqlite-transaction';
export { normalizeBinding, normalizeBindings } from './utils/bindings';
export { register, createSQLiteConnection } from './register';
