import { Grammar } from './grammar';

import type { CompiledQuery } from '../types';

/**
 * SQLite quotes and binds exactly like the base grammar; it carries its own
 * driver tag so builder code can branch on it.
 */
export class SQLiteGrammar extends Grammar {
  readonly driver = 'sqlite' as const;

  /**
   * SQLite has no TRUNCATE; an unqualified DELETE takes the truncate optimization
   */
  override compileTruncate(table: string): CompiledQuery {
    return { sql: `DELETE FROM ${this.wrapTable(table)}`, bindings: [] };
  }
}
