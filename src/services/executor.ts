/**
 * Read-only SQL execution with a timeout, a row cap and guaranteed rollback.
 */

import type { Knex } from 'knex';
import { QueryTimeoutError, SQLExecutionError, errorMessage } from '../types/errors.js';
import type { JsonValue, ResultRow } from '../types/utils.js';
import { isRecord } from '../types/utils.js';
import { logger } from '../utils/logger.js';

export interface ExecutionResult {
  rows: ResultRow[];
  columns: string[];
  /** True when the driver returned more rows than the cap allowed. */
  truncated: boolean;
}

/**
 * Executes validated SELECT statements. Implementations must tell a timeout
 * (QueryTimeoutError) apart from other failures (SQLExecutionError) and leave
 * no open transaction behind.
 */
export interface QueryExecutor {
  executeSelect(sql: string, timeoutSeconds: number, rowLimit: number): Promise<ExecutionResult>;
}

const AGGREGATE_CALL = /\b(count|sum|avg|max|min)\s*\(/i;

/**
 * Append `LIMIT rowLimit` to statements without one, unless the statement is
 * a plain aggregate (which returns a single row). GROUP BY queries are
 * limited. The trailing semicolon is dropped.
 */
export function applyRowLimit(sql: string, rowLimit: number): string {
  const statement = sql.trim().replace(/;+\s*$/, '').trimEnd();

  if (/\blimit\b/i.test(statement)) {
    return statement;
  }

  const hasAggregation = AGGREGATE_CALL.test(statement);
  const hasGroupBy = /\bgroup\s+by\b/i.test(statement);

  if (!hasAggregation || hasGroupBy) {
    return `${statement} LIMIT ${rowLimit}`;
  }
  return statement;
}

/**
 * Knex returns different result structures per dialect.
 * Order matters: check more specific structures first.
 */
export function extractRows(result: unknown): unknown[] {
  // PostgreSQL: returns { rows: [...] }
  if (isRecord(result) && Array.isArray(result.rows)) {
    return result.rows;
  }

  // MySQL: returns [[rows], [fields]] - check for nested array
  if (Array.isArray(result) && result.length === 2 && Array.isArray(result[0])) {
    return result[0];
  }

  // SQLite: returns array of rows directly
  if (Array.isArray(result)) {
    return result;
  }

  return [];
}

/**
 * Convert driver values (Date, bigint, Buffer, numeric strings stay strings)
 * into JSON-safe values.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (isRecord(value)) {
    const out: Record<string, JsonValue> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = toJsonValue(inner);
    }
    return out;
  }
  return String(value);
}

function toRow(raw: unknown): ResultRow {
  const row: ResultRow = {};
  if (!isRecord(raw)) return row;
  for (const [key, value] of Object.entries(raw)) {
    row[key] = toJsonValue(value);
  }
  return row;
}

export interface KnexQueryExecutorOptions {
  /** Ask the server to cancel a query that hits its timeout (pg, mysql). */
  cancelOnTimeout?: boolean;
}

/**
 * QueryExecutor running each statement in its own transaction, which is
 * always rolled back.
 */
export class KnexQueryExecutor implements QueryExecutor {
  private readonly cancelOnTimeout: boolean;

  constructor(
    private readonly db: Knex,
    options: KnexQueryExecutorOptions = {}
  ) {
    this.cancelOnTimeout = options.cancelOnTimeout ?? false;
  }

  async executeSelect(
    sql: string,
    timeoutSeconds: number,
    rowLimit: number
  ): Promise<ExecutionResult> {
    if (!/^\s*select\b/i.test(sql)) {
      throw new SQLExecutionError('Only SELECT queries are allowed', sql);
    }

    const statement = applyRowLimit(sql, rowLimit);
    let trx: Knex.Transaction | undefined;

    try {
      trx = await this.db.transaction();
      const result: unknown = await trx
        .raw(statement)
        .timeout(timeoutSeconds * 1000, { cancel: this.cancelOnTimeout });

      const rawRows = extractRows(result);
      const rows = rawRows.slice(0, rowLimit).map(toRow);
      const columns = rows.length > 0 ? Object.keys(rows[0] ?? {}) : [];

      logger.debug(`Executed query returning ${rows.length} rows`);
      return { rows, columns, truncated: rawRows.length > rowLimit };
    } catch (error) {
      if (error instanceof Error && error.name === 'KnexTimeoutError') {
        throw new QueryTimeoutError(timeoutSeconds);
      }
      throw new SQLExecutionError(`SQL execution failed: ${errorMessage(error)}`, statement);
    } finally {
      if (trx !== undefined) {
        try {
          await trx.rollback();
        } catch (rollbackError) {
          logger.warn(`Rollback after query failed: ${errorMessage(rollbackError)}`);
        }
      }
    }
  }
}
