/**
 * Query endpoint for natural language database questions.
 */

import type { FastifyInstance } from 'fastify';
import type { AppServices } from '../app.js';
import type { PipelineResult } from '../pipeline/orchestrator.js';
import type { QueryRequest } from '../types/models.js';

export type RouteOptions = {
  services: AppServices;
};

/**
 * Wire format of a pipeline result.
 */
export function toQueryResponse(result: PipelineResult) {
  return {
    sql: result.sql,
    results: result.results,
    plan: result.plan,
    validation_passed: result.validationPassed,
    execution_time_ms: result.executionTimeMs,
    analysis: result.analysis,
    visualization: result.visualization,
    error: result.error,
    error_category: result.errorCategory,
    retry_count: result.retryCount,
    step: result.step.toLowerCase(),
  };
}

export async function queryRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  // POST /query - Main query endpoint. Pipeline failures come back as 200 with `error` set.
  fastify.post<{ Body: QueryRequest }>(
    '/query',
    {
      schema: {
        description: 'Answer a natural language question with SQL',
        body: {
          type: 'object',
          properties: {
            query: { type: 'string', minLength: 1, maxLength: services.maxQueryLength },
          },
          required: ['query'],
        },
      },
    },
    async (request) => {
      const result = await services.orchestrator.process(request.body.query.trim());
      return toQueryResponse(result);
    }
  );
}
