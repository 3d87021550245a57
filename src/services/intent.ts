/**
 * Query understanding: natural language question to semantic query plan.
 */

import { createHash } from 'crypto';
import type { CacheProvider } from './cache/types.js';
import type { CompletionProvider } from './llm.js';
import { parseJsonReply } from './llm.js';
import type { SchemaRegistry } from './schema.js';
import { describeSchema } from './schema.js';
import { QueryUnderstandingError, errorMessage } from '../types/errors.js';
import { SemanticQueryPlanSchema } from '../types/models.js';
import type { SemanticQueryPlan } from '../types/models.js';
import { logger } from '../utils/logger.js';

export interface QueryUnderstanding {
  understand(query: string): Promise<SemanticQueryPlan>;
}

const UNDERSTANDING_TTL_SECONDS = 86400;

/**
 * System prompt for query understanding.
 */
const UNDERSTANDING_SYSTEM_PROMPT = `You analyze natural language questions about a relational database.

Context:
- You are the first stage of a natural language to SQL pipeline
- Every table and column you name is checked against the live schema; unknown names are removed
- Never invent a table: if the question is about data the schema does not hold, name the table the user asked about anyway

{schema}

Return ONLY a JSON object with this structure:
{
  "intent": "<one sentence describing what the user wants>",
  "tables": ["<table>"],
  "columns": ["<column>"],
  "filters": [{"column": "<column>", "operator": "<=|!=|>|<|>=|<=|LIKE|IN>", "value": <value>, "type": "<string|number|date|boolean>"}],
  "aggregations": ["<COUNT|SUM|AVG|MIN|MAX>"],
  "group_by": ["<column>"],
  "order_by": {"column": "<column>", "direction": "<ASC|DESC>"} or null,
  "limit": <number or null>,
  "ambiguities": ["<anything unclear>"],
  "needs_clarification": <true|false>
}

<example>
Question: "How many customers do we have?"
Output: {"intent": "Count all customers", "tables": ["customers"], "columns": [], "filters": [], "aggregations": ["COUNT"], "group_by": [], "order_by": null, "limit": null, "ambiguities": [], "needs_clarification": false}
</example>

<example>
Question: "Customers in Paris sorted by name"
Output: {"intent": "List customers located in Paris by name", "tables": ["customers"], "columns": ["name", "city"], "filters": [{"column": "city", "operator": "=", "value": "Paris", "type": "string"}], "aggregations": [], "group_by": [], "order_by": {"column": "name", "direction": "ASC"}, "limit": null, "ambiguities": [], "needs_clarification": false}
</example>
`;

/**
 * Normalize query text for cache keys: case, surrounding and repeated
 * whitespace are ignored.
 */
export function normalizeQuery(query: string): string {
  return query.toLowerCase().trim().replace(/\s+/g, ' ');
}

export function understandingCacheKey(query: string): string {
  const hash = createHash('sha256').update(normalizeQuery(query)).digest('hex');
  return `query_understanding:${hash.slice(0, 16)}`;
}

/**
 * Parse a model reply into a plan. Missing fields take their defaults.
 *
 * @throws QueryUnderstandingError if the reply is not a JSON plan
 */
export function parsePlan(reply: string): SemanticQueryPlan {
  let raw: unknown;
  try {
    raw = parseJsonReply(reply);
  } catch (error) {
    throw new QueryUnderstandingError(
      `Query understanding returned no usable JSON: ${errorMessage(error)}`
    );
  }

  const parsed = SemanticQueryPlanSchema.safeParse(raw);
  if (!parsed.success) {
    throw new QueryUnderstandingError(
      `Query understanding returned an unexpected structure: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
    );
  }
  return parsed.data;
}

export class QueryUnderstandingAgent implements QueryUnderstanding {
  constructor(
    private readonly llm: CompletionProvider,
    private readonly registry: SchemaRegistry,
    private readonly cache?: CacheProvider
  ) {}

  /**
   * Build a semantic plan for a question, reusing a cached plan for the same
   * normalized text.
   */
  async understand(query: string): Promise<SemanticQueryPlan> {
    const key = understandingCacheKey(query);

    if (this.cache) {
      const cached = SemanticQueryPlanSchema.safeParse(await this.cache.get(key));
      if (cached.success) {
        logger.debug(`Query understanding cache hit: ${key}`);
        return cached.data;
      }
    }

    const snapshot = await this.registry.getSnapshot();
    const systemPrompt = UNDERSTANDING_SYSTEM_PROMPT.replace('{schema}', describeSchema(snapshot));

    const reply = await this.llm.complete(query, systemPrompt, 0.0, 1000);
    const plan = parsePlan(reply);

    logger.info(`Understood query: ${plan.intent} (tables: ${plan.tables.join(', ') || 'none'})`);

    if (this.cache) {
      await this.cache.set(key, plan, UNDERSTANDING_TTL_SECONDS);
    }
    return plan;
  }
}
