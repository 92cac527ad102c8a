/**
 * Grammar Factory
 *
 * Maps a configured driver name onto its grammar. Unknown drivers get the
 * base grammar.
 */

import { BaseGrammar } from './base-grammar';
import { MySQLGrammar } from './mysql-grammar';
import { PostgresGrammar } from './postgres-grammar';
import { SQLiteGrammar } from './sqlite-grammar';

import type { Grammar, GrammarDriver } from './grammar';

export function normalizeDriver(driver: string): GrammarDriver {
  switch (driver) {
    case 'pgsql':
    case 'postgres':
    case 'postgresql': {
      return 'postgres';
    }
    case 'sqlite':
    case 'sqlite3': {
      return 'sqlite';
    }
    case 'mysql':
    case 'mariadb': {
      return 'mysql';
    }
    default: {
      return 'base';
    }
  }
}

export function createGrammar(driver: string): Grammar {
  switch (normalizeDriver(driver)) {
    case 'postgres': {
      return new PostgresGrammar();
    }
    case 'sqlite': {
      return new SQLiteGrammar();
    }
    case 'mysql': {
      return new MySQLGrammar();
    }
    case 'base': {
      return new BaseGrammar();
    }
  }
}
