/**
 * Chart selection for query results.
 */

import type { CompletionProvider } from './llm.js';
import { parseJsonReply } from './llm.js';
import { errorMessage } from '../types/errors.js';
import { VisualizationConfigSchema } from '../types/models.js';
import type { SemanticQueryPlan, VisualizationConfig } from '../types/models.js';
import type { ResultRow } from '../types/utils.js';
import { logger } from '../utils/logger.js';

export interface VisualizationInput {
  query: string;
  sql: string;
  rows: ResultRow[];
  plan: SemanticQueryPlan;
}

export interface VisualizationProvider {
  visualize(input: VisualizationInput): Promise<VisualizationConfig>;
}

const VISUALIZATION_SYSTEM_PROMPT = `You choose the chart that best presents SQL query results.

Chart rules:
1. One aggregate per category -> bar (pie when the categories are parts of a whole)
2. Values over dates or times -> line, or area for cumulative values
3. Two numeric columns -> scatter
4. Many columns or no numeric column -> table

Return ONLY a JSON object:
{"chart_type": "<bar|line|pie|area|scatter|table>", "title": "<title>", "description": "<one sentence>", "x_axis": "<column or null>", "y_axis": ["<numeric column>"]}

Only use column names that appear in the data.`;

const VISUALIZATION_PROMPT = `Question: {query}
Intent: {intent}
SQL: {sql}
Columns: {columns}

Sample data:
{sample}`;

const DATE_LIKE = /^\d{4}-\d{2}(-\d{2})?/;

/**
 * Deterministic chart choice from the shape of the rows.
 */
export function suggestChart(rows: ResultRow[], title: string): VisualizationConfig {
  const first = rows[0];
  if (first === undefined) {
    return {
      chart_type: 'table',
      title: 'No Data Available',
      description: 'The query returned no results to visualize.',
      x_axis: null,
      y_axis: [],
    };
  }

  const columns = Object.keys(first);
  const numeric = columns.filter((c) => rows.every((row) => typeof row[c] === 'number' || row[c] === null));
  const labels = columns.filter((c) => !numeric.includes(c));
  const dateColumn = labels.find((c) => rows.every((row) => {
    const value = row[c];
    return typeof value === 'string' && DATE_LIKE.test(value);
  }));

  if (numeric.length === 0 || columns.length > 4) {
    return { chart_type: 'table', title, description: `${rows.length} rows`, x_axis: null, y_axis: [] };
  }
  if (dateColumn !== undefined) {
    return {
      chart_type: 'line',
      title,
      description: `${numeric.join(', ')} over ${dateColumn}`,
      x_axis: dateColumn,
      y_axis: numeric,
    };
  }
  if (labels.length === 0 && numeric.length >= 2) {
    const [x, ...ys] = numeric;
    return {
      chart_type: 'scatter',
      title,
      description: `${ys.join(', ')} against ${x}`,
      x_axis: x ?? null,
      y_axis: ys,
    };
  }
  return {
    chart_type: 'bar',
    title,
    description: labels[0] ? `${numeric.join(', ')} by ${labels[0]}` : numeric.join(', '),
    x_axis: labels[0] ?? null,
    y_axis: numeric,
  };
}

export class VisualizationAgent implements VisualizationProvider {
  constructor(private readonly llm: CompletionProvider) {}

  /**
   * Ask the model for a chart; an unparseable reply falls back to
   * {@link suggestChart}. Model call failures propagate.
   */
  async visualize({ query, sql, rows, plan }: VisualizationInput): Promise<VisualizationConfig> {
    const title = plan.intent || query;
    if (rows.length === 0) {
      return suggestChart(rows, title);
    }

    const prompt = VISUALIZATION_PROMPT.replace('{query}', query)
      .replace('{intent}', plan.intent)
      .replace('{sql}', sql)
      .replace('{columns}', Object.keys(rows[0] ?? {}).join(', '))
      .replace('{sample}', JSON.stringify(rows.slice(0, 5), null, 2));

    const reply = await this.llm.complete(prompt, VISUALIZATION_SYSTEM_PROMPT, 0.2, 1000);

    try {
      const config = VisualizationConfigSchema.parse(parseJsonReply(reply));
      logger.info(`Visualization generated: ${config.chart_type}`);
      return { ...config, title: config.title || title };
    } catch (error) {
      logger.warn(`Unusable visualization reply, choosing chart from data: ${errorMessage(error)}`);
      return suggestChart(rows, title);
    }
  }
}
