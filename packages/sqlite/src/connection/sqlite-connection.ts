/**
 * SQLite Connection
 *
 * Opens a better-sqlite3 database (a file path or `:memory:`). Calls are
 * synchronous underneath; they are wrapped in promises so the connection
 * fits the same interface as the pooled drivers.
 */

import { BaseConnection, ConnectionError, toError } from '@querywright/core';
import Database from 'better-sqlite3';

import { runStatement, selectRows } from '../utils/statements';
import { SQLiteTransaction } from './sqlite-transaction';

import type { ConnectionConfig, ConnectionOptions, ExecResult, Row } from '@querywright/core';

export interface SQLiteConnectionOptions extends ConnectionOptions {
  /** Options handed to the better-sqlite3 constructor */
  sqliteOptions?: Database.Options;
}

export class SQLiteConnection extends BaseConnection {
  private db?: Database.Database;
  private readonly sqliteOptions?: Database.Options;

  constructor(name: string, config: ConnectionConfig, options: SQLiteConnectionOptions = {}) {
    super(name, config, options);
    this.sqliteOptions = options.sqliteOptions;
  }

  protected async doConnect(): Promise<void> {
    const db = new Database(this.config.database, this.sqliteOptions);

    if (this.config.foreignKeyConstraints) {
      try {
        db.pragma('foreign_keys = ON');
      } catch (error) {
        db.close();
        throw toError(error);
      }
    }

    this.db = db;
  }

  protected async doClose(): Promise<void> {
    const db = this.db;
    this.db = undefined;
    db?.close();
  }

  protected async doQuery(sql: string, bindings: unknown[]): Promise<Row[]> {
    return selectRows(this.requireDb(), sql, bindings);
  }

  protected async doExec(sql: string, bindings: unknown[]): Promise<ExecResult> {
    return runStatement(this.requireDb(), sql, bindings);
  }

  protected async createTransaction(): Promise<SQLiteTransaction> {
    return new SQLiteTransaction(this, this.requireDb());
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new ConnectionError(`Not connected to database [${this.name}]`, undefined, this.name);
    }
    return this.db;
  }
}
