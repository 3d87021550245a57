/**
 * Gatekeeper for generated SQL: syntax, safety and schema checks, in that
 * order. Expected failures come back as { valid: false, reason } and are never
 * thrown.
 */

import sqlParser from 'node-sql-parser';
import { errorMessage } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import type { SchemaRegistry } from './schema.js';

const { Parser } = sqlParser;

export interface ValidationOutcome {
  valid: boolean;
  reason: string | null;
}

export interface SQLValidatorLike {
  validate(sql: string): Promise<ValidationOutcome>;
}

/** Dialect names understood by node-sql-parser. */
export type SqlDialect = 'PostgresQL' | 'MySQL' | 'Sqlite';

const DANGEROUS_KEYWORDS = ['DROP', 'DELETE', 'TRUNCATE', 'ALTER', 'CREATE', 'INSERT', 'UPDATE'];

const SQL_KEYWORDS = new Set([
  'select', 'from', 'where', 'group', 'by', 'order', 'having', 'limit', 'offset',
  'and', 'or', 'not', 'in', 'like', 'ilike', 'between', 'is', 'null', 'as',
  'count', 'sum', 'avg', 'max', 'min', 'distinct', 'all', 'any', 'some',
  'case', 'when', 'then', 'else', 'end', 'asc', 'desc', 'nulls', 'first', 'last',
  'join', 'inner', 'left', 'right', 'outer', 'full', 'cross', 'natural', 'on', 'using',
  'union', 'intersect', 'except', 'with', 'escape', 'collate', 'similar', 'to',
  'true', 'false', 'exists', 'interval', 'extract', 'cast',
  'year', 'month', 'week', 'day', 'hour', 'minute', 'second', 'quarter', 'epoch',
  // window clauses
  'over', 'partition', 'rows', 'range', 'groups', 'unbounded', 'preceding', 'following',
  'current', 'row', 'filter', 'within', 'exclude', 'ties', 'others', 'no',
  // type names after CAST ... AS and ::
  'date', 'time', 'timestamp', 'timestamptz', 'zone', 'without', 'text', 'varchar', 'char',
  'character', 'varying', 'integer', 'int', 'bigint', 'smallint', 'numeric', 'decimal',
  'real', 'float', 'double', 'precision', 'boolean', 'bool', 'signed', 'unsigned',
]);

// Words that may directly precede an implicit alias (`CASE ... END total`).
const ALIAS_PRECEDERS = new Set(['end', 'null', 'true', 'false']);

const PASS: ValidationOutcome = { valid: true, reason: null };

function fail(reason: string): ValidationOutcome {
  return { valid: false, reason };
}

/**
 * Blank out string literals and unwrap quoted identifiers so that the lexical
 * checks below only see SQL structure.
 */
export function stripLiterals(sql: string): string {
  return sql
    .replace(/'(?:[^']|'')*'/g, "''")
    .replace(/"([^"]*)"/g, '$1')
    .replace(/`([^`]*)`/g, '$1');
}

/**
 * Remove `--` and `/* *\/` comments, leaving string literals untouched.
 */
export function stripComments(sql: string): string {
  return sql.replace(
    /('(?:[^']|'')*')|--[^\n]*|\/\*[\s\S]*?\*\//g,
    (_match: string, literal: string | undefined) => literal ?? ' '
  );
}

/**
 * Gate 2: denylist, SELECT-only, and UPDATE/DELETE without WHERE.
 * Matches the raw text, literals included.
 */
export function checkSafety(sql: string): ValidationOutcome {
  const upper = sql.toUpperCase();

  for (const keyword of DANGEROUS_KEYWORDS) {
    if (new RegExp(`\\b${keyword}\\b`).test(upper)) {
      return fail(`Dangerous operation detected: ${keyword}. Only SELECT queries are allowed.`);
    }
  }

  if (!stripComments(upper).trim().startsWith('SELECT')) {
    return fail('Only SELECT queries are allowed');
  }

  // Unreachable while the denylist above holds.
  if (/\bUPDATE\b/.test(upper) && !/\bWHERE\b/.test(upper)) {
    return fail('UPDATE without WHERE clause is not allowed');
  }
  if (/\bDELETE\b/.test(upper) && !/\bWHERE\b/.test(upper)) {
    return fail('DELETE without WHERE clause is not allowed');
  }

  return PASS;
}

interface ColumnReference {
  table: string;
  column: string;
}

const IDENTIFIER = /[a-z_][a-z0-9_$]*/gi;

/**
 * Identifiers of a clause that can only be bare column names: qualified
 * references, numbers, function names and keywords are removed.
 */
function bareIdentifiers(fragment: string, exclude: Set<string>): string[] {
  const cleaned = fragment
    .replace(/::\s*[a-z_][a-z0-9_]*/gi, ' ')
    .replace(/\b[a-z_][a-z0-9_$]*\s*\.\s*[a-z_*][a-z0-9_$]*/gi, ' ')
    .replace(/\b\d+(?:\.\d+)?\b/g, ' ')
    .replace(/''/g, ' ')
    // function names go, their arguments stay
    .replace(/\b[a-z_][a-z0-9_$]*\s*\(/gi, '(');

  const identifiers: string[] = [];
  for (const match of cleaned.matchAll(IDENTIFIER)) {
    const identifier = match[0].toLowerCase();
    if (!SQL_KEYWORDS.has(identifier) && !exclude.has(identifier)) {
      identifiers.push(identifier);
    }
  }
  return identifiers;
}

/**
 * Split a SELECT list on its top-level commas.
 */
function selectItems(list: string): string[] {
  const items: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < list.length; i++) {
    const ch = list[i];
    if (ch === '(') depth++;
    else if (ch === ')') depth--;
    else if (ch === ',' && depth === 0) {
      items.push(list.slice(start, i));
      start = i + 1;
    }
  }
  items.push(list.slice(start));
  return items.map((item) => item.trim());
}

/**
 * Output name given without AS: `COUNT(*) total`, `c.name customer`.
 */
function implicitAlias(item: string): string | null {
  const match = /^([\s\S]*\S)\s+([a-z_][a-z0-9_$]*)$/.exec(item);
  if (!match) return null;
  const [, expression = '', alias = ''] = match;
  if (SQL_KEYWORDS.has(alias)) return null;

  if (/[)*']$/.test(expression) || /\b\d+(?:\.\d+)?$/.test(expression)) return alias;
  const previous = /([a-z_][a-z0-9_$]*)$/.exec(expression)?.[1];
  if (previous === undefined) return null;
  return SQL_KEYWORDS.has(previous) && !ALIAS_PRECEDERS.has(previous) ? null : alias;
}

function clause(text: string, pattern: RegExp): string | null {
  const match = pattern.exec(text);
  return match?.[1] ?? null;
}

/**
 * Gate 3 building block: lexical extraction of table and column references.
 *
 * Returns the referenced tables (as written, lower-cased) and the column
 * references attributed to known tables. `schema` maps lower-cased table names
 * to lower-cased column names.
 */
export function extractReferences(
  sql: string,
  schema: Map<string, Set<string>>
): { tables: string[]; validTables: string[]; columns: ColumnReference[] } {
  const text = stripLiterals(stripComments(sql)).toLowerCase();

  const tables: string[] = [];
  const aliases = new Map<string, string>();
  const nonColumns = new Set<string>();

  const tablePattern = /\b(?:from|join)\s+(?:[a-z_][a-z0-9_$]*\.)?([a-z_][a-z0-9_$]*)/g;
  for (const match of text.matchAll(tablePattern)) {
    const table = match[1] ?? '';
    // Read the alias without consuming it: it may be the next JOIN keyword.
    const rest = text.slice((match.index ?? 0) + match[0].length);
    const alias = /^\s+(?:as\s+)?([a-z_][a-z0-9_$]*)/.exec(rest)?.[1];
    if (!tables.includes(table)) tables.push(table);
    nonColumns.add(table);
    if (alias && !SQL_KEYWORDS.has(alias)) {
      aliases.set(alias, table);
      nonColumns.add(alias);
    }
  }

  // Output names, with or without AS, are not columns either
  for (const match of text.matchAll(/\bas\s+([a-z_][a-z0-9_$]*)/g)) {
    nonColumns.add(match[1] ?? '');
  }
  const selectList = clause(text, /\bselect\s+([\s\S]+?)\s+from\b/);
  for (const item of selectItems(selectList ?? '')) {
    const alias = implicitAlias(item);
    if (alias !== null) nonColumns.add(alias);
  }

  // Anything that is not a known table is taken to be an alias
  const validTables = tables.filter((t) => schema.has(t));
  const columns: ColumnReference[] = [];
  if (validTables.length === 0) {
    return { tables, validTables, columns };
  }

  const add = (table: string, column: string) => {
    if (!columns.some((c) => c.table === table && c.column === column)) {
      columns.push({ table, column });
    }
  };

  // table.column and alias.column
  for (const match of text.matchAll(/\b([a-z_][a-z0-9_$]*)\s*\.\s*([a-z_][a-z0-9_$]*)\b/g)) {
    const qualifier = match[1] ?? '';
    const column = match[2] ?? '';
    const table = validTables.includes(qualifier) ? qualifier : aliases.get(qualifier);
    if (table !== undefined && validTables.includes(table)) {
      add(table, column);
    }
  }

  const attribute = (identifier: string) => {
    const owner =
      validTables.find((t) => schema.get(t)?.has(identifier)) ?? validTables[0] ?? '';
    add(owner, identifier);
  };

  const fragments = [
    clause(text, /\bwhere\s+([\s\S]+?)(?=\bgroup\s+by\b|\border\s+by\b|\bhaving\b|\blimit\b|\boffset\b|;|$)/),
    selectList?.replace(/\bas\s+[a-z_][a-z0-9_$]*/g, ' ') ?? null,
    clause(text, /\bgroup\s+by\s+([\s\S]+?)(?=\bhaving\b|\border\s+by\b|\blimit\b|\boffset\b|;|$)/),
    clause(text, /\border\s+by\s+([\s\S]+?)(?=\blimit\b|\boffset\b|;|$)/),
  ];

  for (const fragment of fragments) {
    if (fragment === null) continue;
    for (const identifier of bareIdentifiers(fragment, nonColumns)) {
      attribute(identifier);
    }
  }

  return { tables, validTables, columns };
}

export interface SQLSafetyValidatorOptions {
  dialect?: SqlDialect;
}

/**
 * Validates candidate SQL against the live schema before execution.
 */
export class SQLSafetyValidator implements SQLValidatorLike {
  private readonly parser = new Parser();
  private readonly dialect: SqlDialect;

  constructor(
    private readonly registry: SchemaRegistry,
    options: SQLSafetyValidatorOptions = {}
  ) {
    this.dialect = options.dialect ?? 'PostgresQL';
  }

  async validate(sql: string): Promise<ValidationOutcome> {
    try {
      const syntax = this.checkSyntax(sql);
      if (!syntax.valid) return syntax;

      const safety = checkSafety(sql);
      if (!safety.valid) return safety;

      return await this.checkSchema(sql);
    } catch (error) {
      logger.error(`SQL validation error: ${errorMessage(error)}`);
      return fail(`Validation error: ${errorMessage(error)}`);
    }
  }

  /**
   * Gate 1: exactly one parseable statement.
   */
  checkSyntax(sql: string): ValidationOutcome {
    const body = stripComments(sql).trim().replace(/;+\s*$/, '').trim();
    if (body.length === 0) {
      return fail('Empty or invalid SQL statement');
    }

    if (stripLiterals(body).includes(';')) {
      return fail('Multiple SQL statements not allowed');
    }

    const statements = this.parse(body);
    if (!Array.isArray(statements)) {
      return fail(`SQL syntax error: ${statements.error}`);
    }

    if (statements.length === 0) {
      return fail('Empty or invalid SQL statement');
    }
    if (statements.length > 1) {
      return fail('Multiple SQL statements not allowed');
    }
    return PASS;
  }

  /**
   * The SQLite grammar of node-sql-parser lags the engine (window functions
   * with a bare ORDER BY, for one), so SQLite statements get a second try with
   * the PostgreSQL grammar.
   */
  private parse(body: string): unknown[] | { error: string } {
    const dialects: SqlDialect[] =
      this.dialect === 'Sqlite' ? ['Sqlite', 'PostgresQL'] : [this.dialect];

    let firstError: string | null = null;
    for (const database of dialects) {
      try {
        const ast: unknown = this.parser.astify(body, { database });
        if (database !== this.dialect) {
          logger.warn(`Parsed with the ${database} grammar after ${this.dialect} failed: ${firstError ?? ''}`);
        }
        return (Array.isArray(ast) ? ast : [ast]).filter(Boolean);
      } catch (error) {
        if (firstError === null) firstError = errorMessage(error);
      }
    }
    return { error: firstError ?? 'unparseable statement' };
  }

  /**
   * Gate 3: every referenced column exists in its table.
   */
  private async checkSchema(sql: string): Promise<ValidationOutcome> {
    let live: Map<string, string[]>;
    try {
      live = await this.registry.getTableColumns();
    } catch (error) {
      // Gates 1 and 2 already passed; a missing schema must not block queries.
      logger.warn(`Schema validation skipped, schema unavailable: ${errorMessage(error)}`);
      return PASS;
    }

    const canonical = new Map<string, { name: string; columns: string[] }>();
    const lowered = new Map<string, Set<string>>();
    for (const [table, columns] of live) {
      canonical.set(table.toLowerCase(), { name: table, columns });
      lowered.set(table.toLowerCase(), new Set(columns.map((c) => c.toLowerCase())));
    }

    const { validTables, columns } = extractReferences(sql, lowered);
    if (validTables.length === 0) {
      return fail('No valid tables found in SQL for schema validation');
    }

    for (const { table, column } of columns) {
      if (lowered.get(table)?.has(column)) continue;

      const info = canonical.get(table);
      const tableName = info?.name ?? table;
      const available = [...(info?.columns ?? [])].sort();
      return fail(
        `Column '${column}' does not exist in table '${tableName}'. ` +
          `Available columns in '${tableName}': ${available.join(', ')}. ` +
          'Please reformulate your query using only the available columns.'
      );
    }

    return PASS;
  }
}
