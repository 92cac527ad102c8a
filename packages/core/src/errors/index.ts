import type { CompiledQuery } from '../types';

export class DatabaseError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'DatabaseError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class QueryWrightError extends DatabaseError {
  constructor(message: string, public override code?: string, public override cause?: Error) {
    super(message, code, cause);
    this.name = 'QueryWrightError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Failure to open, use or close a connection. `connection` is the configured
 * connection name when the failing component knows it.
 */
export class ConnectionError extends QueryWrightError {
  constructor(message: string, cause?: Error, public connection?: string) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

/**
 * A statement produced a result the builder cannot use. Carries the compiled
 * SQL and its bindings when the failure belongs to a statement.
 */
export class QueryError extends QueryWrightError {
  readonly sql?: string;
  readonly bindings: unknown[];

  constructor(message: string, query?: CompiledQuery, cause?: Error) {
    super(message, 'QUERY_ERROR', cause);
    this.name = 'QueryError';
    this.sql = query?.sql;
    this.bindings = query ? [...query.bindings] : [];
  }
}

export class TransactionError extends QueryWrightError {
  constructor(message: string, public transactionId?: string, cause?: Error) {
    super(message, 'TRANSACTION_ERROR', cause);
    this.name = 'TransactionError';
  }
}

export class TimeoutError extends QueryWrightError {
  constructor(message: string, public timeout?: number, cause?: Error) {
    super(message, 'TIMEOUT_ERROR', cause);
    this.name = 'TimeoutError';
  }
}

export class ValidationError extends QueryWrightError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class UnsupportedOperationError extends QueryWrightError {
  constructor(public feature: string, detail?: string) {
    super(
      detail ? `Operation "${feature}" is not supported: ${detail}` : `Operation "${feature}" is not supported`,
      'UNSUPPORTED_OPERATION',
    );
    this.name = 'UnsupportedOperationError';
  }
}
