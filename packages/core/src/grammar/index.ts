/**
 * SQL Grammar Layer
 *
 * Dialect-specific compilation of builder state into SQL text and bindings.
 *
 * @module grammar
 */

export { Grammar, CompileState, type GrammarDriver, type QueryState } from './grammar';
export { BaseGrammar } from './base-grammar';
export { PostgresGrammar } from './postgres-grammar';
export { SQLiteGrammar } from './sqlite-grammar';
export { MySQLGrammar } from './mysql-grammar';
export { createGrammar, normalizeDriver } from './grammar-factory';
