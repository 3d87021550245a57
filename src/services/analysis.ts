/**
 * Result analysis: insights, trends and recommendations for a finished query.
 */

import type { CompletionProvider } from './llm.js';
import { parseJsonReply } from './llm.js';
import { LLMError, errorMessage } from '../types/errors.js';
import { AnalysisResultSchema } from '../types/models.js';
import type { AnalysisResult, SemanticQueryPlan } from '../types/models.js';
import type { ResultRow } from '../types/utils.js';
import { logger } from '../utils/logger.js';

export interface AnalysisInput {
  query: string;
  sql: string;
  rows: ResultRow[];
  plan: SemanticQueryPlan;
}

export interface AnalysisProvider {
  analyze(input: AnalysisInput): Promise<AnalysisResult>;
}

const SAMPLE_ROWS = 10;

const ANALYSIS_SYSTEM_PROMPT = `You interpret SQL query results for business users.

Return ONLY a JSON object with this structure:
{
  "summary": "<2-3 sentence summary of the findings>",
  "insights": ["<key insight>"],
  "trends": ["<trend, if the data shows one>"],
  "anomalies": ["<outlier or surprising value>"],
  "recommendations": ["<actionable recommendation>"]
}

Only state what the data supports. Use empty lists when nothing applies.`;

const ANALYSIS_PROMPT = `Question: {query}
Intent: {intent}
SQL: {sql}

Data summary:
{summary}`;

/**
 * Row count, columns, numeric min/max/avg and a sample of rows.
 */
export function summarizeRows(rows: ResultRow[]): string {
  const columns = rows.length > 0 ? Object.keys(rows[0] ?? {}) : [];
  const lines = [`Total rows: ${rows.length}`, `Columns: ${columns.join(', ')}`];

  const stats: string[] = [];
  for (const column of columns) {
    const values = rows.map((row) => row[column]).filter((v): v is number => typeof v === 'number');
    if (values.length === 0) continue;
    const total = values.reduce((sum, v) => sum + v, 0);
    stats.push(
      `  ${column}: min=${Math.min(...values)}, max=${Math.max(...values)}, ` +
        `avg=${(total / values.length).toFixed(2)}, count=${values.length}`
    );
  }
  if (stats.length > 0) {
    lines.push('Numeric statistics:', ...stats);
  }

  const sample = rows.slice(0, SAMPLE_ROWS);
  lines.push(`Sample rows (first ${sample.length}):`);
  sample.forEach((row, i) => lines.push(`  Row ${i + 1}: ${JSON.stringify(row)}`));

  return lines.join('\n');
}

/**
 * Fixed analysis for a query that returned nothing; no model call is made.
 */
export function emptyResultAnalysis(query: string): AnalysisResult {
  return {
    summary: `The query '${query}' returned no results.`,
    insights: ['No rows matched the query criteria.'],
    trends: [],
    anomalies: [],
    recommendations: [
      'Broaden the filters of the question',
      'Check that data exists for the requested criteria',
    ],
  };
}

export class AnalysisAgent implements AnalysisProvider {
  constructor(private readonly llm: CompletionProvider) {}

  /**
   * @throws LLMError when the model fails or replies with something other than
   * an analysis object
   */
  async analyze({ query, sql, rows, plan }: AnalysisInput): Promise<AnalysisResult> {
    if (rows.length === 0) {
      return emptyResultAnalysis(query);
    }

    logger.info(`Analyzing ${rows.length} result rows`);

    const prompt = ANALYSIS_PROMPT.replace('{query}', query)
      .replace('{intent}', plan.intent)
      .replace('{sql}', sql)
      .replace('{summary}', summarizeRows(rows));

    const reply = await this.llm.complete(prompt, ANALYSIS_SYSTEM_PROMPT, 0.3, 1500);

    let raw: unknown;
    try {
      raw = parseJsonReply(reply);
    } catch (error) {
      throw new LLMError(`Analysis reply was not JSON: ${errorMessage(error)}`);
    }

    const parsed = AnalysisResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LLMError(`Analysis reply had an unexpected structure: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
