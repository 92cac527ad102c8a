import { describe, it, expect, vi, beforeEach } from 'vitest';

import {
  ConnectionError,
  resolveDriver,
  UnsupportedOperationError,
  unregisterDriver,
} from '@querywright/core';

import { PostgreSQLConnection } from '../connection/postgresql-connection';
import { register } from '../register';

import type { ConnectionConfig, Logger, Row } from '@querywright/core';

const pg = vi.hoisted(() => {
  interface MockResult {
    rows: Row[];
    rowCount: number | null;
  }

  class MockClient {
    result: MockResult = { rows: [], rowCount: 0 };
    query = vi.fn(async (_sql: string, _bindings?: unknown[]) => this.result);
    release = vi.fn();
  }

  class MockPool {
    static instances: MockPool[] = [];
    static connectFailures: Error[] = [];

    readonly client = new MockClient();
    result: MockResult = { rows: [], rowCount: 0 };
    totalCount = 3;
    idleCount = 2;
    waitingCount = 0;

    query = vi.fn(async (_sql: string, _bindings?: unknown[]) => this.result);
    connect = vi.fn(async () => {
      const failure = MockPool.connectFailures.shift();
      if (failure) {
        throw failure;
      }
      return this.client;
    });
    end = vi.fn(async () => undefined);
    on = vi.fn();

    constructor(readonly config: unknown) {
      MockPool.instances.push(this);
    }
  }

  return { MockPool, setTypeParser: vi.fn() };
});

vi.mock('pg', () => ({
  Pool: pg.MockPool,
  types: {
    setTypeParser: pg.setTypeParser,
    builtins: {
      INT8: 20,
      FLOAT4: 700,
      FLOAT8: 701,
      NUMERIC: 1700,
      DATE: 1082,
      TIMESTAMP: 1114,
      TIMESTAMPTZ: 1184,
    },
  },
}));

const config: ConnectionConfig = {
  driver: 'pgsql',
  host: 'db.internal',
  port: 5433,
  database: 'app',
  username: 'app',
  password: 'test-secret',
  pool: { max: 5 },
};

const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe('PostgreSQLConnection', () => {
  let connection: PostgreSQLConnection;

  beforeEach(() => {
    pg.MockPool.instances = [];
    pg.MockPool.connectFailures = [];
    pg.setTypeParser.mockClear();
    connection = new PostgreSQLConnection('main', config, {
      logger,
      retryOptions: { retryDelay: 0 },
    });
  });

  const currentPool = () => {
    const pool = pg.MockPool.instances.at(-1);
    if (!pool) {
      throw new Error('no pool created');
    }
    return pool;
  };

  describe('connect', () => {
    it('should build the pool from the connection config', async () => {
      await connection.connect();

      expect(currentPool().config).toEqual({
        host: 'db.internal',
        port: 5433,
        user: 'app',
        password: 'test-secret',
        database: 'app',
        ssl: false,
        max: 5,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 10000,
      });
    });

    it('should verify the server with SELECT 1 and release the client', async () => {
      await connection.connect();

      const pool = currentPool();
      expect(pool.client.query).toHaveBeenCalledWith('SELECT 1');
      expect(pool.client.release).toHaveBeenCalledTimes(1);
      expect(pool.on).toHaveBeenCalledWith('error', expect.any(Function));
    });

    it('should apply raw pg options over the derived ones', async () => {
      const tuned = new PostgreSQLConnection('main', config, {
        pgOptions: { max: 50, application_name: 'reports' },
      });

      await tuned.connect();

      expect(currentPool().config).toMatchObject({ max: 50, application_name: 'reports' });
    });

    it('should end the pool and report a failed connect', async () => {
      pg.MockPool.connectFailures = [new Error('password authentication failed for user "app"')];

      await expect(connection.connect()).rejects.toBeInstanceOf(ConnectionError);
      expect(pg.MockPool.instances).toHaveLength(1);
      expect(currentPool().end).toHaveBeenCalledTimes(1);
    });

    it('should retry a refused connection with a fresh pool', async () => {
      pg.MockPool.connectFailures = [new Error('connect ECONNREFUSED 10.0.0.5:5433')];

      await connection.connect();

      expect(pg.MockPool.instances).toHaveLength(2);
      expect(pg.MockPool.instances[0].end).toHaveBeenCalledTimes(1);
      expect(connection.isConnected).toBe(true);
    });

    it('should install the type parsers unless disabled', () => {
      expect(pg.setTypeParser).toHaveBeenCalledWith(20, expect.any(Function));

      pg.setTypeParser.mockClear();
      new PostgreSQLConnection('raw', config, { parseTypes: false });

      expect(pg.setTypeParser).not.toHaveBeenCalled();
    });
  });

  describe('statements', () => {
    beforeEach(async () => {
      await connection.connect();
    });

    it('should send builder queries with numbered placeholders', async () => {
      currentPool().result = { rows: [{ id: 1, name: 'Ann' }], rowCount: 1 };

      const rows = await connection
        .table('users')
        .where('age', '>', 25)
        .where('status', '=', 'active')
        .get();

      expect(currentPool().query).toHaveBeenCalledWith(
        'SELECT * FROM "users" WHERE "age" > $1 AND "status" = $2',
        [25, 'active'],
      );
      expect(rows).toEqual([{ id: 1, name: 'Ann' }]);
    });

    it('should report affected rows and refuse insert ids', async () => {
      currentPool().result = { rows: [], rowCount: 2 };

      const result = await connection.exec('UPDATE users SET active = $1', [true]);

      expect(result.rowsAffected()).toBe(2);
      expect(() => result.lastInsertId()).toThrow(UnsupportedOperationError);
    });

    it('should treat a missing row count as zero', async () => {
      currentPool().result = { rows: [], rowCount: null };

      const result = await connection.exec('LISTEN jobs');

      expect(result.rowsAffected()).toBe(0);
    });

    it('should read insertGetId back through RETURNING', async () => {
      currentPool().result = { rows: [{ id: '42' }], rowCount: 1 };

      const id = await connection.table('users').insertGetId({ name: 'Ann', age: 30 });

      expect(currentPool().query).toHaveBeenCalledWith(
        'INSERT INTO "users" ("age", "name") VALUES ($1, $2) RETURNING id',
        [30, 'Ann'],
      );
      expect(id).toBe(42);
    });

    it('should rethrow driver errors unchanged', async () => {
      const failure = new Error('relation "missing" does not exist');
      currentPool().query.mockRejectedValueOnce(failure);

      await expect(connection.query('SELECT * FROM missing')).rejects.toBe(failure);
    });
  });

  describe('transaction', () => {
    beforeEach(async () => {
      await connection.connect();
    });

    it('should run the transaction on one pooled client', async () => {
      await connection.transaction(async (tx) => {
        await tx.table('users').where('id', '=', 1).update({ active: false });
      });

      const { client } = currentPool();
      expect(client.query.mock.calls).toEqual([
        ['SELECT 1'],
        ['BEGIN'],
        ['UPDATE "users" SET "active" = $1 WHERE "id" = $2', [false, 1]],
        ['COMMIT'],
      ]);
      expect(client.release).toHaveBeenCalledTimes(2);
      expect(currentPool().query).not.toHaveBeenCalled();
    });

    it('should roll back on a thrown error', async () => {
      const failure = new Error('insufficient funds');

      await expect(
        connection.transaction(async () => {
          throw failure;
        }),
      ).rejects.toBe(failure);

      expect(currentPool().client.query.mock.calls.at(-1)).toEqual(['ROLLBACK']);
    });

    it('should wrap a failed checkout', async () => {
      currentPool().connect.mockRejectedValueOnce(new Error('timeout exceeded when trying to connect'));

      await expect(connection.beginTransaction()).rejects.toThrow('Failed to get client from pool');
    });
  });

  describe('close', () => {
    it('should end the pool and reset the stats', async () => {
      await connection.connect();
      const pool = currentPool();

      expect(connection.getPoolStats()).toEqual({ total: 3, idle: 2, active: 1, waiting: 0 });

      await connection.close();

      expect(pool.end).toHaveBeenCalledTimes(1);
      expect(connection.getPoolStats()).toEqual({ total: 0, idle: 0, active: 0, waiting: 0 });
    });
  });

  describe('register', () => {
    it('should register the driver under every PostgreSQL alias', () => {
      register();
      try {
        const factory = resolveDriver('postgresql');

        expect(factory?.('main', config, {})).toBeInstanceOf(PostgreSQLConnection);
        expect(resolveDriver('postgres')).toBe(factory);
        expect(resolveDriver('pgsql')).toBe(factory);
      } finally {
        unregisterDriver('pgsql');
      }
    });
  });
});
