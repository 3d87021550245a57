/**
 * Utility endpoints (explain, health, root).
 */

import type { FastifyInstance } from 'fastify';
import { formatContext } from '../services/retrieval/engine.js';
import type { QueryRequest } from '../types/models.js';
import type { RouteOptions } from './query.js';

export async function utilityRoutes(fastify: FastifyInstance, { services }: RouteOptions) {
  // POST /explain - Plan, context and SQL for a question, without executing
  fastify.post<{ Body: QueryRequest }>(
    '/explain',
    {
      schema: {
        description: 'Show the grounded plan and generated SQL without running it',
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
      const query = request.body.query.trim();
      const plan = await services.grounding.ground(await services.understanding.understand(query));
      const context = formatContext(await services.retrieval.search(plan, query));
      const sql = await services.generator.generate(plan, query);
      const validation = await services.validator.validate(sql);

      return {
        query,
        plan,
        retrieval_context: context,
        sql,
        validation,
      };
    }
  );

  // GET /health - Health check
  fastify.get('/health', async () => {
    const snapshot = await services.registry.getSnapshot();
    return {
      status: 'ok',
      database: {
        client: services.databaseClient,
        tables: [...snapshot.tables.keys()],
      },
    };
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: 'groundql',
      version: '1.0.0',
      description: 'Natural language questions answered with validated SQL',
      docs: '/docs',
    };
  });
}
