import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { knex } from 'knex';
import type { Knex } from 'knex';
import { KnexQueryExecutor, applyRowLimit, extractRows, toJsonValue } from './executor.js';
import { SQLExecutionError } from '../types/errors.js';

describe('applyRowLimit', () => {
  it('appends a limit to plain selects and drops the semicolon', () => {
    expect(applyRowLimit('SELECT id FROM customers;', 100)).toBe('SELECT id FROM customers LIMIT 100');
  });

  it('leaves single-row aggregates alone', () => {
    expect(applyRowLimit('SELECT COUNT(*) FROM customers;', 100)).toBe('SELECT COUNT(*) FROM customers');
  });

  it('limits grouped aggregates', () => {
    expect(applyRowLimit('SELECT city, COUNT(*) FROM customers GROUP BY city', 50)).toBe(
      'SELECT city, COUNT(*) FROM customers GROUP BY city LIMIT 50'
    );
  });

  it('keeps an existing limit', () => {
    expect(applyRowLimit('SELECT id FROM customers LIMIT 5;', 100)).toBe(
      'SELECT id FROM customers LIMIT 5'
    );
  });
});

describe('extractRows', () => {
  it('reads the pg, mysql and sqlite result shapes', () => {
    expect(extractRows({ rows: [{ a: 1 }] })).toEqual([{ a: 1 }]);
    expect(extractRows([[{ a: 1 }], [{ name: 'a' }]])).toEqual([{ a: 1 }]);
    expect(extractRows([{ a: 1 }, { a: 2 }, { a: 3 }])).toEqual([{ a: 1 }, { a: 2 }, { a: 3 }]);
    expect(extractRows('nothing')).toEqual([]);
  });
});

describe('toJsonValue', () => {
  it('converts driver values', () => {
    expect(toJsonValue(undefined)).toBeNull();
    expect(toJsonValue(10n)).toBe(10);
    expect(toJsonValue(new Date('2024-01-02T03:04:05.000Z'))).toBe('2024-01-02T03:04:05.000Z');
    expect(toJsonValue(Number.NaN)).toBeNull();
    expect(toJsonValue({ nested: [1, 'a'] })).toEqual({ nested: [1, 'a'] });
  });
});

describe('KnexQueryExecutor', () => {
  let db: Knex;

  beforeAll(async () => {
    db = knex({
      client: 'better-sqlite3',
      connection: { filename: ':memory:' },
      useNullAsDefault: true,
    });
    await db.schema.createTable('customers', (table) => {
      table.integer('id').primary();
      table.string('name');
      table.string('city');
    });
    await db('customers').insert([
      { id: 1, name: 'Ada', city: 'London' },
      { id: 2, name: 'Grace', city: 'New York' },
      { id: 3, name: 'Linus', city: 'Helsinki' },
    ]);
  });

  afterAll(async () => {
    await db.destroy();
  });

  it('returns rows and column names', async () => {
    const executor = new KnexQueryExecutor(db);

    const result = await executor.executeSelect(
      'SELECT id, name FROM customers ORDER BY id;',
      5,
      100
    );

    expect(result).toEqual({
      rows: [
        { id: 1, name: 'Ada' },
        { id: 2, name: 'Grace' },
        { id: 3, name: 'Linus' },
      ],
      columns: ['id', 'name'],
      truncated: false,
    });
  });

  it('caps rows even when the statement carries a larger limit', async () => {
    const executor = new KnexQueryExecutor(db);

    const result = await executor.executeSelect(
      'SELECT id FROM customers ORDER BY id LIMIT 10',
      5,
      2
    );

    expect(result.rows).toEqual([{ id: 1 }, { id: 2 }]);
    expect(result.truncated).toBe(true);
  });

  it('refuses statements that are not SELECT', async () => {
    const executor = new KnexQueryExecutor(db);

    await expect(executor.executeSelect("DELETE FROM customers", 5, 100)).rejects.toThrow(
      'Only SELECT queries are allowed'
    );
    await expect(db('customers').count({ n: '*' })).resolves.toEqual([{ n: 3 }]);
  });

  it('wraps driver failures and releases the connection', async () => {
    const executor = new KnexQueryExecutor(db);

    const failure = executor.executeSelect('SELECT ghost FROM customers', 5, 100);
    await expect(failure).rejects.toBeInstanceOf(SQLExecutionError);
    await expect(failure).rejects.toThrow(/^SQL execution failed: /);

    const result = await executor.executeSelect('SELECT COUNT(*) AS n FROM customers', 5, 100);
    expect(result.rows).toEqual([{ n: 3 }]);
  });

  it('wraps a failure to acquire a connection', async () => {
    const closed = knex({
      client: 'better-sqlite3',
      connection: { filename: ':memory:' },
      useNullAsDefault: true,
    });
    await closed.destroy();
    const executor = new KnexQueryExecutor(closed);

    const failure = executor.executeSelect('SELECT 1 AS one', 5, 100);
    await expect(failure).rejects.toBeInstanceOf(SQLExecutionError);
    await expect(failure).rejects.toThrow(/^SQL execution failed: /);
  });
});
