/**
 * MySQL Grammar
 *
 * Handles MySQL-specific SQL syntax:
 * - Backtick (`) identifier quoting
 * - Positional (?) parameter placeholders
 * - OFFSET only after a LIMIT
 */

import { Grammar } from './grammar';

export class MySQLGrammar extends Grammar {
  readonly driver = 'mysql' as const;

  protected override readonly identifierQuote: string = '`';

  /**
   * MySQL rejects OFFSET without LIMIT; the largest unsigned bigint stands in for "no limit"
   */
  protected override appendLimitOffset(parts: string[], limit?: number, offset?: number): void {
    if (offset !== undefined && limit === undefined) {
      parts.push('LIMIT 18446744073709551615', `OFFSET ${offset}`);
      return;
    }
    super.appendLimitOffset(parts, limit, offset);
  }
}
