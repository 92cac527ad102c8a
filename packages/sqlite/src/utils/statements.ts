import { StatementResult } from '@querywright/core';

import { normalizeBindings } from './bindings';

import type { Row } from '@querywright/core';
import type { Database } from 'better-sqlite3';

/**
 * Rows of a statement; statements that return no data run and yield none
 */
export function selectRows(db: Database, sql: string, bindings: readonly unknown[]): Row[] {
  const statement = db.prepare<unknown[], Row>(sql);
  const params = normalizeBindings(bindings);

  if (!statement.reader) {
    statement.run(...params);
    return [];
  }
  return statement.all(...params);
}

export function runStatement(
  db: Database,
  sql: string,
  bindings: readonly unknown[],
): StatementResult {
  const result = db.prepare(sql).run(...normalizeBindings(bindings));
  return new StatementResult(result.changes, result.lastInsertRowid, 'SQLite');
}
