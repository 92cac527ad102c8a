import { UnsupportedOperationError } from '../errors';

import type { ExecResult } from '../types';

/**
 * Result of a write statement as reported by the driver. `insertId` is left
 * undefined by drivers that cannot report one (PostgreSQL reads keys back
 * through RETURNING instead).
 */
export class StatementResult implements ExecResult {
  constructor(
    private readonly affected: number,
    private readonly insertId?: number | bigint,
    private readonly driver = 'this driver',
  ) {}

  rowsAffected(): number {
    return this.affected;
  }

  lastInsertId(): number | bigint {
    if (this.insertId === undefined) {
      throw new UnsupportedOperationError(
        'lastInsertId',
        `${this.driver} does not report insert ids; use RETURNING`,
      );
    }
    return this.insertId;
  }
}
