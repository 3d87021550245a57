/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import type { Knex } from 'knex';
import { ConfigError } from './types/errors.js';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

/**
 * Log levels accepted in LOG_LEVEL. Shared with the logger, which must not
 * depend on the full configuration being valid.
 */
export const LogLevelSchema = z
  .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
  .default('INFO');

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // LLM Provider Configuration
  LLM_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
  LLM_MODEL: z.string().default('claude-sonnet-4-5-20250929'),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2048),

  // API Keys (provider-specific)
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),

  // Embeddings for vector retrieval (OpenAI only; disabled without a key)
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),

  // Database Configuration
  DATABASE_TYPE: z.enum(['sqlite3', 'pg', 'mysql2']).default('sqlite3'),
  DATABASE_PATH: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  DATABASE_SCHEMA: z.string().default('public'),

  // Optional Redis cache
  REDIS_URL: z
    .string()
    .url()
    .optional()
    .describe('Connection string for the shared cache (e.g. redis://localhost:6379)'),

  // Pipeline limits
  QUERY_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),
  ROW_LIMIT: z.coerce.number().int().positive().default(10000),
  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  SCHEMA_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  RETRIEVAL_RESULTS: z.coerce.number().int().positive().default(10),
  MAX_QUERY_LENGTH: z.coerce.number().int().positive().default(500),

  // Server Configuration
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: LogLevelSchema,
});

/**
 * Type for base configuration object.
 */
type BaseConfig = z.infer<typeof ConfigSchema>;

export type DatabaseType = BaseConfig['DATABASE_TYPE'];

export interface LLMConfig {
  provider: 'anthropic' | 'openai';
  model: string;
  apiKey: string;
  maxTokens: number;
}

export interface EmbeddingConfig {
  model: string;
  apiKey: string;
}

/**
 * Extended configuration with parsed KNEX_CONFIG, LLM_CONFIG, and EMBEDDING_CONFIG.
 */
export interface Config extends Omit<BaseConfig,
  'DATABASE_PATH' | 'DATABASE_URL' | 'DATABASE_SCHEMA' |
  'LLM_PROVIDER' | 'LLM_MODEL' | 'LLM_MAX_TOKENS' | 'EMBEDDING_MODEL' |
  'ANTHROPIC_API_KEY' | 'OPENAI_API_KEY'
> {
  KNEX_CONFIG: Knex.Config;
  LLM_CONFIG: LLMConfig;
  /** Null when no embedding key is configured; vector retrieval is then skipped. */
  EMBEDDING_CONFIG: EmbeddingConfig | null;
}

function buildKnexConfig(base: BaseConfig, issues: string[]): Knex.Config {
  switch (base.DATABASE_TYPE) {
    case 'sqlite3':
      if (!base.DATABASE_PATH) {
        issues.push('DATABASE_PATH is required when DATABASE_TYPE is sqlite3');
      }
      return {
        client: 'better-sqlite3',
        connection: {
          filename: base.DATABASE_PATH ?? '',
        },
        useNullAsDefault: true,
      };

    case 'pg':
      if (!base.DATABASE_URL) {
        issues.push('DATABASE_URL is required when DATABASE_TYPE is pg');
      }
      return {
        client: 'pg',
        connection: base.DATABASE_URL,
        searchPath: [base.DATABASE_SCHEMA],
        pool: { min: 2, max: 10 },
      };

    case 'mysql2':
      if (!base.DATABASE_URL) {
        issues.push('DATABASE_URL is required when DATABASE_TYPE is mysql2');
      }
      return {
        client: 'mysql2',
        connection: base.DATABASE_URL,
        pool: { min: 2, max: 10 },
      };
  }
}

/**
 * Parse and validate configuration from environment variables.
 *
 * Throws ConfigError with every problem found rather than exiting, so callers
 * decide how to report it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const baseConfig = parsed.data;
  const issues: string[] = [];

  const knexConfig = buildKnexConfig(baseConfig, issues);

  // Determine API key based on provider
  const llmApiKey =
    baseConfig.LLM_PROVIDER === 'anthropic'
      ? baseConfig.ANTHROPIC_API_KEY
      : baseConfig.OPENAI_API_KEY;
  if (!llmApiKey) {
    issues.push(
      `${baseConfig.LLM_PROVIDER === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY'} ` +
        `is required when LLM_PROVIDER is ${baseConfig.LLM_PROVIDER}`
    );
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  const {
    DATABASE_PATH,
    DATABASE_URL,
    DATABASE_SCHEMA,
    LLM_PROVIDER,
    LLM_MODEL,
    LLM_MAX_TOKENS,
    EMBEDDING_MODEL,
    ANTHROPIC_API_KEY,
    OPENAI_API_KEY,
    ...rest
  } = baseConfig;

  return {
    ...rest,
    KNEX_CONFIG: knexConfig,
    LLM_CONFIG: {
      provider: LLM_PROVIDER,
      model: LLM_MODEL,
      apiKey: llmApiKey ?? '',
      maxTokens: LLM_MAX_TOKENS,
    },
    EMBEDDING_CONFIG: OPENAI_API_KEY
      ? { model: EMBEDDING_MODEL, apiKey: OPENAI_API_KEY }
      : null,
  };
}
