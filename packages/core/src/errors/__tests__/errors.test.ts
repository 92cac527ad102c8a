import { describe, it, expect } from 'vitest';

import {
  DatabaseError,
  QueryWrightError,
  ConnectionError,
  QueryError,
  TransactionError,
  TimeoutError,
  ValidationError,
  UnsupportedOperationError,
} from '../index';

describe('Error classes', () => {
  describe('DatabaseError', () => {
    it('should create error with message and code', () => {
      const error = new DatabaseError('Test error', 'TEST_CODE');
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('DatabaseError');
      expect(error.code).toBe('TEST_CODE');
    });

    it('should keep the cause', () => {
      const cause = new Error('Original error');
      const error = new DatabaseError('Test error', 'TEST_CODE', cause);
      expect(error.cause).toBe(cause);
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('QueryWrightError', () => {
    it('should extend DatabaseError', () => {
      const error = new QueryWrightError('Test error');
      expect(error).toBeInstanceOf(DatabaseError);
      expect(error.name).toBe('QueryWrightError');
    });
  });

  describe('ConnectionError', () => {
    it('should carry the connection code', () => {
      const cause = new Error('ECONNREFUSED');
      const error = new ConnectionError('Connection failed', cause);
      expect(error.code).toBe('CONNECTION_ERROR');
      expect(error.cause).toBe(cause);
      expect(error).toBeInstanceOf(QueryWrightError);
      expect(error.connection).toBeUndefined();
    });

    it('should store the connection name', () => {
      const error = new ConnectionError('Not connected to database [main]', undefined, 'main');
      expect(error.connection).toBe('main');
    });
  });

  describe('QueryError', () => {
    it('should copy the compiled query', () => {
      const query = { sql: 'SELECT * FROM "users" WHERE "id" = ?', bindings: [1] };
      const error = new QueryError('Query failed', query);
      query.bindings.push(2);

      expect(error.code).toBe('QUERY_ERROR');
      expect(error.sql).toBe('SELECT * FROM "users" WHERE "id" = ?');
      expect(error.bindings).toEqual([1]);
    });

    it('should default to no statement', () => {
      const error = new QueryError('unexpected type for sum: boolean');
      expect(error.sql).toBeUndefined();
      expect(error.bindings).toEqual([]);
    });
  });

  describe('TransactionError', () => {
    it('should store transaction id', () => {
      const error = new TransactionError('Transaction not active', 'tx-1');
      expect(error.code).toBe('TRANSACTION_ERROR');
      expect(error.transactionId).toBe('tx-1');
    });
  });

  describe('TimeoutError', () => {
    it('should store timeout', () => {
      const error = new TimeoutError('Query timed out after 50ms', 50);
      expect(error.code).toBe('TIMEOUT_ERROR');
      expect(error.timeout).toBe(50);
    });
  });

  describe('ValidationError', () => {
    it('should store field', () => {
      const error = new ValidationError('Port must be a number between 1 and 65535', 'port');
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.field).toBe('port');
    });
  });

  describe('UnsupportedOperationError', () => {
    it('should build the message from the feature', () => {
      expect(new UnsupportedOperationError('lastInsertId').message).toBe(
        'Operation "lastInsertId" is not supported',
      );
    });

    it('should append the detail', () => {
      const error = new UnsupportedOperationError('lastInsertId', 'use insertGetId');
      expect(error.message).toBe('Operation "lastInsertId" is not supported: use insertGetId');
      expect(error.code).toBe('UNSUPPORTED_OPERATION');
      expect(error.feature).toBe('lastInsertId');
    });
  });
});
