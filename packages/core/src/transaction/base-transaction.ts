/**
 * Base Transaction
 *
 * Abstract base class for driver transactions. Handles the active/inactive
 * state, error wrapping for BEGIN/COMMIT/ROLLBACK and releasing the client.
 * Statements run through the owning connection's instrumentation, so they
 * are logged and emitted like any other query.
 *
 * @example
 * ```typescript
 * class PostgresTransaction extends BaseTransaction<PoolClient> {
 *   protected async doBegin(): Promise<void> {
 *     await this.client.query('BEGIN');
 *   }
 *
 *   protected async doCommit(): Promise<void> {
 *     await this.client.query('COMMIT');
 *   }
 *
 *   // ... other abstract method implementations
 * }
 * ```
 */

import { TransactionError } from '../errors';
import { Builder } from '../query/builder';
import { generateUUID, toError } from '../utils';

import type { Grammar } from '../grammar/grammar';
import type { TransactionHandle } from '../interfaces/execution-handle';
import type { ExecResult, ExecutionContext, Logger, Row } from '../types';

/**
 * What a transaction needs from the connection that opened it
 */
export interface TransactionOwner {
  readonly grammar: Grammar;
  readonly prefix: string;
  readonly logger: Logger;
  instrument<T>(
    sql: string,
    bindings: unknown[],
    context: ExecutionContext | undefined,
    call: () => Promise<T>,
  ): Promise<T>;
}

export abstract class BaseTransaction<TClient = unknown>
  implements TransactionHandle
{
  readonly id: string;
  protected _isActive = false;

  constructor(
    protected readonly owner: TransactionOwner,
    protected readonly client: TClient,
  ) {
    this.id = generateUUID();
  }

  get isActive(): boolean {
    return this._isActive;
  }

  // ============ Lifecycle ============

  async begin(): Promise<void> {
    if (this._isActive) {
      throw new TransactionError('Transaction already active', this.id);
    }

    try {
      await this.doBegin();
      this._isActive = true;
      this.owner.logger.debug(`Transaction ${this.id} started`);
    } catch (error) {
      await this.releaseClient();
      throw new TransactionError('Failed to begin transaction', this.id, toError(error));
    }
  }

  async commit(): Promise<void> {
    this.ensureActive('commit');

    try {
      await this.doCommit();
      this.owner.logger.debug(`Transaction ${this.id} committed`);
    } catch (error) {
      throw new TransactionError('Failed to commit transaction', this.id, toError(error));
    } finally {
      this._isActive = false;
      await this.releaseClient();
    }
  }

  async rollback(): Promise<void> {
    this.ensureActive('rollback');

    try {
      await this.doRollback();
      this.owner.logger.debug(`Transaction ${this.id} rolled back`);
    } catch (error) {
      throw new TransactionError('Failed to rollback transaction', this.id, toError(error));
    } finally {
      this._isActive = false;
      await this.releaseClient();
    }
  }

  // ============ Statements ============

  async query(sql: string, bindings: unknown[] = [], context?: ExecutionContext): Promise<Row[]> {
    this.ensureActive('execute query');
    return this.owner.instrument(sql, bindings, context, () => this.doQuery(sql, bindings));
  }

  async queryRow(
    sql: string,
    bindings: unknown[] = [],
    context?: ExecutionContext,
  ): Promise<Row | null> {
    const rows = await this.query(sql, bindings, context);
    return rows[0] ?? null;
  }

  async exec(sql: string, bindings: unknown[] = [], context?: ExecutionContext): Promise<ExecResult> {
    this.ensureActive('execute statement');
    return this.owner.instrument(sql, bindings, context, () => this.doExec(sql, bindings));
  }

  /**
   * Builder bound to this transaction
   */
  table(name: string): Builder {
    return new Builder(this, this.owner.grammar, `${this.owner.prefix}${name}`);
  }

  // ============ Abstract Methods (Driver-specific) ============

  protected abstract doBegin(): Promise<void>;

  protected abstract doCommit(): Promise<void>;

  protected abstract doRollback(): Promise<void>;

  protected abstract doQuery(sql: string, bindings: unknown[]): Promise<Row[]>;

  protected abstract doExec(sql: string, bindings: unknown[]): Promise<ExecResult>;

  // ============ Protected Helper Methods ============

  /**
   * Hand the client back once the transaction is over. Drivers that borrow
   * a pooled client override this.
   */
  protected async release(): Promise<void> {}

  /**
   * A failed release is logged; the transaction outcome has already been
   * decided at this point.
   */
  protected async releaseClient(): Promise<void> {
    try {
      await this.release();
    } catch (error) {
      this.owner.logger.warn(`Failed to release client of transaction ${this.id}`, {
        error: toError(error).message,
      });
    }
  }

  protected ensureActive(operation: string): void {
    if (!this._isActive) {
      throw new TransactionError(`Cannot ${operation}: Transaction not active`, this.id);
    }
  }
}
