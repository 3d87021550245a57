/**
 * Service wiring: builds every collaborator from configuration.
 */

import type { Knex } from 'knex';
import type { Config, DatabaseType } from './config.js';
import { AnalysisAgent } from './services/analysis.js';
import { createCache } from './services/cache/index.js';
import type { CacheProvider } from './services/cache/index.js';
import { KnexSchemaCatalog, connectDatabase } from './services/database.js';
import { OpenAIEmbedder } from './services/embedding.js';
import { KnexQueryExecutor } from './services/executor.js';
import { GroundingValidator } from './services/grounding.js';
import type { PlanGrounder } from './services/grounding.js';
import { QueryUnderstandingAgent } from './services/intent.js';
import type { QueryUnderstanding } from './services/intent.js';
import { LLMService } from './services/llm.js';
import { RetrievalEngine } from './services/retrieval/engine.js';
import { MemoryVectorStore } from './services/retrieval/vector-store.js';
import { SchemaRegistry } from './services/schema.js';
import { SQLGenerationAgent } from './services/sql-generator.js';
import type { SQLSynthesizer } from './services/sql-generator.js';
import { SQLSafetyValidator } from './services/sql-validator.js';
import type { SQLValidatorLike, SqlDialect } from './services/sql-validator.js';
import { VisualizationAgent } from './services/visualization.js';
import { PipelineOrchestrator } from './pipeline/orchestrator.js';
import { logger } from './utils/logger.js';

/**
 * Everything the HTTP routes and the CLI need.
 */
export interface AppServices {
  registry: SchemaRegistry;
  retrieval: RetrievalEngine;
  understanding: QueryUnderstanding;
  grounding: PlanGrounder;
  generator: SQLSynthesizer;
  validator: SQLValidatorLike;
  orchestrator: Pick<PipelineOrchestrator, 'process'>;
  /** Name of the knex client, reported by the health endpoint. */
  databaseClient: string;
  maxQueryLength: number;
  close(): Promise<void>;
}

const PARSER_DIALECTS: Record<DatabaseType, SqlDialect> = {
  sqlite3: 'Sqlite',
  pg: 'PostgresQL',
  mysql2: 'MySQL',
};

const PROMPT_DIALECTS: Record<DatabaseType, string> = {
  sqlite3: 'SQLite',
  pg: 'PostgreSQL',
  mysql2: 'MySQL',
};

/**
 * Connect to the database and cache, and build the pipeline.
 */
export async function createServices(config: Config): Promise<AppServices> {
  const db: Knex = await connectDatabase(config.KNEX_CONFIG);
  const cache: CacheProvider = createCache(config.REDIS_URL);

  const registry = new SchemaRegistry(new KnexSchemaCatalog(db), {
    ttlSeconds: config.SCHEMA_CACHE_TTL_SECONDS,
  });

  const vector = config.EMBEDDING_CONFIG
    ? new MemoryVectorStore(registry, new OpenAIEmbedder(config.EMBEDDING_CONFIG))
    : null;
  if (!vector) {
    logger.info('No embedding key configured; vector retrieval disabled');
  }

  const retrieval = new RetrievalEngine(registry, vector, {
    cache,
    defaultResults: config.RETRIEVAL_RESULTS,
  });

  const llm = new LLMService(config.LLM_CONFIG);
  const understanding = new QueryUnderstandingAgent(llm, registry, cache);
  const grounding = new GroundingValidator(registry);
  const generator = new SQLGenerationAgent(llm, registry, retrieval, {
    dialect: PROMPT_DIALECTS[config.DATABASE_TYPE],
  });
  const validator = new SQLSafetyValidator(registry, {
    dialect: PARSER_DIALECTS[config.DATABASE_TYPE],
  });
  const executor = new KnexQueryExecutor(db, {
    cancelOnTimeout: config.DATABASE_TYPE !== 'sqlite3',
  });

  const orchestrator = new PipelineOrchestrator(
    {
      understanding,
      grounding,
      generator,
      validator,
      executor,
      analysis: new AnalysisAgent(llm),
      visualization: new VisualizationAgent(llm),
    },
    {
      maxRetries: config.MAX_RETRIES,
      timeoutSeconds: config.QUERY_TIMEOUT_SECONDS,
      rowLimit: config.ROW_LIMIT,
    }
  );

  return {
    registry,
    retrieval,
    understanding,
    grounding,
    generator,
    validator,
    orchestrator,
    databaseClient: String(config.KNEX_CONFIG.client),
    maxQueryLength: config.MAX_QUERY_LENGTH,
    async close() {
      await Promise.all([db.destroy(), cache.close()]);
    },
  };
}
