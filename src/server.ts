/**
 * HTTP server.
 */

import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { AppServices } from './app.js';
import { createServices } from './app.js';
import type { Config } from './config.js';
import { queryRoutes } from './routes/query.js';
import { schemaRoutes } from './routes/schemas.js';
import { utilityRoutes } from './routes/utility.js';
import {
  GroundingError,
  LLMError,
  QueryTimeoutError,
  QueryUnderstandingError,
  SQLExecutionError,
  SQLGenerationError,
} from './types/errors.js';
import { logger, loggerConfig } from './utils/logger.js';

export interface ServerOptions {
  /** Fastify request logging; off in tests. */
  logRequests?: boolean;
}

/**
 * Create and configure the Fastify server around a set of services.
 */
export async function buildServer(
  services: AppServices,
  options: ServerOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logRequests === false ? false : loggerConfig,
  });

  await fastify.register(cors, {
    origin: '*',
  });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'groundql API',
        description: 'Answer natural language questions with grounded, validated SQL',
        version: '1.0.0',
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
  });

  await fastify.register(queryRoutes, { services });
  await fastify.register(schemaRoutes, { services });
  await fastify.register(utilityRoutes, { services });

  // /query never throws; these cover /explain and the schema endpoints.
  fastify.setErrorHandler((error, _request, reply) => {
    if (error.validation) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    } else if (error instanceof GroundingError) {
      reply.status(422).send({
        error: 'GroundingError',
        message: error.message,
        available_tables: error.availableTables,
        suggestions: error.suggestions,
      });
    } else if (error instanceof QueryUnderstandingError || error instanceof SQLGenerationError) {
      reply.status(400).send({
        error: error.name,
        message: error.message,
        suggestions: error.suggestions,
      });
    } else if (error instanceof QueryTimeoutError) {
      reply.status(504).send({
        error: 'QueryTimeoutError',
        message: error.message,
      });
    } else if (error instanceof SQLExecutionError) {
      reply.status(500).send({
        error: 'SQLExecutionError',
        message: error.message,
      });
    } else if (error instanceof LLMError) {
      reply.status(502).send({
        error: 'LLMError',
        message: 'Language model service unavailable',
        detail: error.message,
      });
    } else {
      reply.status(500).send({
        error: 'InternalServerError',
        message: error.message || 'An unexpected error occurred',
      });
    }
  });

  fastify.addHook('onClose', async () => {
    logger.info('Shutting down groundql API server...');
    await services.close();
  });

  return fastify;
}

/**
 * Connect, build and listen.
 */
export async function startServer(config: Config): Promise<FastifyInstance> {
  logger.info('Starting groundql API server...');
  const services = await createServices(config);
  const fastify = await buildServer(services);

  await fastify.listen({ port: config.PORT, host: config.HOST });
  logger.info(`Server running at http://localhost:${config.PORT}`);
  logger.info(`API docs at http://localhost:${config.PORT}/docs`);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  }

  return fastify;
}
