/**
 * SQL synthesis from a grounded plan, with retrieval-supplied schema context.
 */

import type { CompletionProvider } from './llm.js';
import { stripCodeFences } from './llm.js';
import type { RetrievalEngine } from './retrieval/engine.js';
import { formatContext } from './retrieval/engine.js';
import type { SchemaRegistry } from './schema.js';
import { describeSchema } from './schema.js';
import { SQLGenerationError, errorMessage } from '../types/errors.js';
import type { PlanFilter, SemanticQueryPlan } from '../types/models.js';
import type { JsonPrimitive } from '../types/utils.js';
import { logger } from '../utils/logger.js';

export interface SQLSynthesizer {
  generate(plan: SemanticQueryPlan, query: string): Promise<string>;
  selfCorrect(
    plan: SemanticQueryPlan,
    query: string,
    previousSql: string,
    error: string
  ): Promise<string>;
}

const GENERATION_TEMPERATURE = 0.1;
const GENERATION_MAX_TOKENS = 800;

/**
 * System prompt for SQL generation.
 */
const SQL_SYSTEM_PROMPT = `You are an expert {dialect} SQL writer.

Context:
- Your SQL is validated before execution: only a single SELECT statement is accepted
- Every table and column is checked against the schema below; anything else is rejected
- The result is shown to a non-technical user

Rules:
1. Use ONLY the tables and columns listed in the schema context
2. Generate exactly one SELECT statement ending with a semicolon
3. Use table-qualified column names when joining
4. Give aggregate expressions readable aliases
5. If the question cannot be answered from this schema, reply with "ERROR: <reason>" instead of SQL
6. Return ONLY the SQL, no explanations`;

const GENERATION_PROMPT = `Schema context:
{context}

Question: {query}

Interpreted plan:
{plan}

SQL:`;

const CORRECTION_PROMPT = `Schema context:
{context}

Question: {query}

Interpreted plan:
{plan}

The previous SQL was rejected.
Previous SQL:
{previous_sql}

Error:
{error}

Write a corrected SQL statement that fixes the error.

SQL:`;

/**
 * Normalize a model reply into a single SQL statement.
 *
 * Returns '' when the reply holds no SELECT.
 *
 * @throws SQLGenerationError when the model replied with the ERROR: sentinel
 */
export function cleanSql(reply: string): string {
  const text = stripCodeFences(reply);

  if (/^error:/i.test(text)) {
    const reason = text.slice('ERROR:'.length).trim();
    throw new SQLGenerationError(`SQL generation declined: ${reason || 'no reason given'}`);
  }

  const start = text.search(/\bselect\b/i);
  if (start < 0) return '';

  return `${text.slice(start).trim().replace(/;+$/, '').trimEnd()};`;
}

const AGGREGATES = new Set(['COUNT', 'SUM', 'AVG', 'MIN', 'MAX']);
const OPERATORS = new Set(['=', '!=', '<>', '<', '<=', '>', '>=', 'LIKE', 'ILIKE', 'IN']);

function literal(value: JsonPrimitive): string {
  if (value === null) return 'NULL';
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return `'${value.replace(/'/g, "''")}'`;
}

function condition(filter: PlanFilter): string {
  const operator = OPERATORS.has(filter.operator.toUpperCase())
    ? filter.operator.toUpperCase()
    : '=';
  const { value } = filter;

  if (Array.isArray(value)) {
    return `${filter.column} IN (${value.map(literal).join(', ')})`;
  }
  if (value === null) {
    return `${filter.column} ${operator === '!=' || operator === '<>' ? 'IS NOT NULL' : 'IS NULL'}`;
  }
  return `${filter.column} ${operator === 'IN' ? '=' : operator} ${literal(value)}`;
}

/**
 * Deterministic single-table SELECT built from a grounded plan. Used when the
 * model replies without any SQL.
 */
export function buildFallbackSql(plan: SemanticQueryPlan): string | null {
  const table = plan.tables[0];
  if (table === undefined) return null;

  const select: string[] = [...plan.group_by];
  const aggregate = /^\s*([a-z]+)/i.exec(plan.aggregations[0] ?? '')?.[1]?.toUpperCase();

  if (aggregate !== undefined && AGGREGATES.has(aggregate)) {
    const target =
      aggregate === 'COUNT' ? '*' : plan.columns.find((c) => !plan.group_by.includes(c));
    if (target !== undefined) {
      select.push(`${aggregate}(${target}) AS ${aggregate.toLowerCase()}_value`);
    }
  }
  if (select.length === 0) {
    select.push(...(plan.columns.length > 0 ? plan.columns : ['*']));
  }

  let sql = `SELECT ${select.join(', ')} FROM ${table}`;
  if (plan.filters.length > 0) {
    sql += ` WHERE ${plan.filters.map(condition).join(' AND ')}`;
  }
  if (plan.group_by.length > 0) {
    sql += ` GROUP BY ${plan.group_by.join(', ')}`;
  }
  if (plan.order_by) {
    sql += ` ORDER BY ${plan.order_by.column} ${plan.order_by.direction}`;
  }
  if (plan.limit !== null) {
    sql += ` LIMIT ${plan.limit}`;
  }
  return `${sql};`;
}

export interface SQLGenerationAgentOptions {
  /** Dialect named in the prompt, e.g. "PostgreSQL". */
  dialect?: string;
}

export class SQLGenerationAgent implements SQLSynthesizer {
  private readonly dialect: string;

  constructor(
    private readonly llm: CompletionProvider,
    private readonly registry: SchemaRegistry,
    private readonly retrieval: RetrievalEngine | null,
    options: SQLGenerationAgentOptions = {}
  ) {
    this.dialect = options.dialect ?? 'PostgreSQL';
  }

  async generate(plan: SemanticQueryPlan, query: string): Promise<string> {
    const prompt = GENERATION_PROMPT.replace('{context}', await this.context(plan, query))
      .replace('{query}', query)
      .replace('{plan}', JSON.stringify(plan, null, 2));

    return this.synthesize(prompt, plan);
  }

  async selfCorrect(
    plan: SemanticQueryPlan,
    query: string,
    previousSql: string,
    error: string
  ): Promise<string> {
    logger.info(`Self-correcting SQL after: ${error}`);

    const prompt = CORRECTION_PROMPT.replace('{context}', await this.context(plan, query))
      .replace('{query}', query)
      .replace('{plan}', JSON.stringify(plan, null, 2))
      .replace('{previous_sql}', previousSql || '(none)')
      .replace('{error}', error);

    return this.synthesize(prompt, plan);
  }

  private async synthesize(prompt: string, plan: SemanticQueryPlan): Promise<string> {
    const reply = await this.llm.complete(
      prompt,
      SQL_SYSTEM_PROMPT.replace('{dialect}', this.dialect),
      GENERATION_TEMPERATURE,
      GENERATION_MAX_TOKENS
    );

    const sql = cleanSql(reply);
    if (sql) {
      logger.info(`Generated SQL: ${sql}`);
      return sql;
    }

    const fallback = buildFallbackSql(plan);
    if (fallback === null) {
      throw new SQLGenerationError('Model reply contained no SELECT statement');
    }
    logger.warn(`Model reply contained no SQL; using plan-derived SQL: ${fallback}`);
    return fallback;
  }

  /**
   * Retrieval context for the prompt, or the full schema description when
   * retrieval finds nothing.
   */
  private async context(plan: SemanticQueryPlan, query: string): Promise<string> {
    if (this.retrieval) {
      try {
        const context = formatContext(await this.retrieval.search(plan, query));
        if (context) return context;
      } catch (error) {
        logger.warn(`Retrieval failed, using full schema: ${errorMessage(error)}`);
      }
    }
    return describeSchema(await this.registry.getSnapshot());
  }
}
