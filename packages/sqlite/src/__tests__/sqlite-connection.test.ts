import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { DatabaseManager, raw, resolveDriver, unregisterDriver } from '@querywright/core';

import { SQLiteConnection } from '../connection/sqlite-connection';
import { register } from '../register';
import { normalizeBindings } from '../utils/bindings';

describe('SQLiteConnection', () => {
  let connection: SQLiteConnection;

  beforeEach(async () => {
    connection = new SQLiteConnection('main', { driver: 'sqlite', database: ':memory:' });
    await connection.connect();
    await connection.exec(
      'CREATE TABLE users (id INTEGER PRIMARY KEY AUTOINCREMENT, name TEXT NOT NULL, age INTEGER, active INTEGER DEFAULT 1)',
    );
    await connection.table('users').insertBatch([
      { name: 'A', age: 20 },
      { name: 'B', age: 30 },
      { name: 'C', age: 40 },
    ]);
  });

  afterEach(async () => {
    await connection.close();
  });

  describe('aggregates', () => {
    it('should count rows', async () => {
      expect(await connection.table('users').count()).toBe(3);
    });

    it('should count filtered rows', async () => {
      expect(await connection.table('users').where('age', '>', 25).count()).toBe(2);
    });

    it('should count the same rows get returns for one filter chain', async () => {
      const users = () => connection.table('users');
      const filtered = [
        users().where('age', '>', 25),
        users().whereIn('name', ['A', 'C']).orWhere('age', '=', 30),
        users().whereRaw("name <> 'n/a?' AND age < ?", 35),
        users().whereNull('age'),
      ];

      const lengths: number[] = [];
      for (const builder of filtered) {
        const rows = await builder.clone().get();
        expect(await builder.count()).toBe(rows.length);
        lengths.push(rows.length);
      }

      expect(lengths).toEqual([2, 3, 2, 0]);
    });

    it('should sum and average a column', async () => {
      expect(await connection.table('users').sum('age')).toBe(90);
      expect(await connection.table('users').avg('age')).toBe(30);
    });

    it('should return min and max', async () => {
      expect(await connection.table('users').min('age')).toBe(20);
      expect(await connection.table('users').max('age')).toBe(40);
    });

    it('should return zero for the sum of no rows', async () => {
      expect(await connection.table('users').where('age', '>', 100).sum('age')).toBe(0);
    });

    it('should report existence', async () => {
      expect(await connection.table('users').where('name', 'B').exists()).toBe(true);
      expect(await connection.table('users').where('name', 'Z').doesntExist()).toBe(true);
    });
  });

  describe('reads', () => {
    it('should order, limit and offset', async () => {
      const names = await connection
        .table('users')
        .orderByDesc('age')
        .limit(2)
        .offset(1)
        .pluck('name');

      expect(names).toEqual(['B', 'A']);
    });

    it('should fetch one value', async () => {
      expect(await connection.table('users').where('name', 'C').value('age')).toBe(40);
    });

    it('should fetch by id', async () => {
      expect(await connection.table('users').select('name').find(2)).toEqual({ name: 'B' });
    });

    it('should match IN and BETWEEN predicates', async () => {
      const rows = await connection
        .table('users')
        .select('name')
        .whereIn('name', ['A', 'C'])
        .orWhereBetween('age', 29, 31)
        .orderBy('name')
        .get();

      expect(rows).toEqual([{ name: 'A' }, { name: 'B' }, { name: 'C' }]);
    });

    it('should treat an empty IN list as matching nothing', async () => {
      expect(await connection.table('users').whereIn('id', []).count()).toBe(0);
    });

    it('should group and filter groups', async () => {
      await connection.table('users').insert({ name: 'D', age: 40 });

      const rows = await connection
        .table('users')
        .select('age')
        .selectRaw('COUNT(*) AS total')
        .groupBy('age')
        .having('total', '>', 1)
        .get();

      expect(rows).toEqual([{ age: 40, total: 2 }]);
    });

    it('should decode blob columns to strings', async () => {
      await connection.exec('CREATE TABLE notes (body BLOB)');
      await connection.exec('INSERT INTO notes (body) VALUES (?)', [Buffer.from('hello')]);

      expect(await connection.table('notes').value('body')).toBe('hello');
    });
  });

  describe('writes', () => {
    it('should return the generated id', async () => {
      expect(await connection.table('users').insertGetId({ name: 'D', age: 50 })).toBe(4);
    });

    it('should increment and decrement', async () => {
      await connection.table('users').where('name', 'A').increment('age', 5);
      await connection.table('users').where('name', 'B').decrement('age');

      expect(await connection.table('users').orderBy('id').pluck('age')).toEqual([25, 29, 40]);
    });

    it('should update and delete matching rows', async () => {
      expect(await connection.table('users').where('age', '<', 35).update({ active: false })).toBe(2);
      expect(await connection.table('users').where('active', '=', false).delete()).toBe(2);
      expect(await connection.table('users').pluck('name')).toEqual(['C']);
    });

    it('should insert raw expressions', async () => {
      await connection.table('users').insert({ name: raw("upper('d')"), age: 1 });

      expect(await connection.table('users').where('age', 1).value('name')).toBe('D');
    });

    it('should truncate with DELETE FROM', async () => {
      await connection.table('users').truncate();

      expect(await connection.table('users').count()).toBe(0);
    });

    it('should store null for undefined values', async () => {
      await connection.table('users').insert({ name: 'E', age: undefined });

      expect(await connection.table('users').whereNull('age').pluck('name')).toEqual(['E']);
    });
  });

  describe('transactions', () => {
    it('should commit', async () => {
      await connection.transaction(async (tx) => {
        await tx.table('users').insert({ name: 'D', age: 50 });
      });

      expect(await connection.table('users').count()).toBe(4);
    });

    it('should roll back and rethrow', async () => {
      const failure = new Error('abort import');

      await expect(
        connection.transaction(async (tx) => {
          await tx.table('users').insert({ name: 'D', age: 50 });
          throw failure;
        }),
      ).rejects.toBe(failure);

      expect(await connection.table('users').count()).toBe(3);
    });
  });

  describe('errors', () => {
    it('should rethrow driver errors', async () => {
      await expect(connection.table('missing').get()).rejects.toThrow('no such table: missing');
    });

    it('should refuse statements after close', async () => {
      const other = new SQLiteConnection('other', { driver: 'sqlite3', database: ':memory:' });
      await other.connect();
      await other.close();

      await expect(other.query('SELECT 1')).rejects.toThrow('Not connected to database [other]');
    });
  });
});

describe('SQLiteConnection foreign keys', () => {
  it('should enforce foreign keys when configured', async () => {
    const connection = new SQLiteConnection('fk', {
      driver: 'sqlite',
      database: ':memory:',
      foreignKeyConstraints: true,
    });
    await connection.connect();

    try {
      await connection.exec('CREATE TABLE teams (id INTEGER PRIMARY KEY)');
      await connection.exec(
        'CREATE TABLE members (id INTEGER PRIMARY KEY, team_id INTEGER REFERENCES teams(id))',
      );

      await expect(connection.table('members').insert({ team_id: 9 })).rejects.toThrow(
        'FOREIGN KEY constraint failed',
      );
    } finally {
      await connection.close();
    }
  });
});

describe('SQLite through DatabaseManager', () => {
  afterEach(() => {
    unregisterDriver('sqlite');
  });

  it('should resolve the registered driver', async () => {
    register();
    const db = new DatabaseManager({
      default: 'local',
      connections: { local: { driver: 'sqlite3', database: ':memory:', prefix: 'app_' } },
    });

    try {
      expect(resolveDriver('sqlite3')).toBeDefined();
      await db.statement('CREATE TABLE app_jobs (id INTEGER PRIMARY KEY, name TEXT)');
      await db.table('jobs').insert({ name: 'reindex' });

      expect(await db.table('jobs').pluck('name')).toEqual(['reindex']);
      expect(await db.connection()).toBeInstanceOf(SQLiteConnection);
    } finally {
      await db.close();
    }
  });
});

describe('normalizeBindings', () => {
  it('should convert values SQLite cannot bind', () => {
    const at = new Date('2024-03-01T12:00:00.000Z');

    expect(normalizeBindings([true, false, at, undefined, 'x', 2, null])).toEqual([
      1,
      0,
      '2024-03-01T12:00:00.000Z',
      null,
      'x',
      2,
      null,
    ]);
  });
});
