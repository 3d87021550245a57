import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from './server.js';
import type { AppServices } from './app.js';
import type { PipelineResult } from './pipeline/orchestrator.js';
import { GroundingValidator } from './services/grounding.js';
import { RetrievalEngine } from './services/retrieval/engine.js';
import { SQLSafetyValidator } from './services/sql-validator.js';
import { LLMError } from './types/errors.js';
import { CUSTOMERS_SCHEMA, makePlan, makeRegistry } from './testing/fixtures.js';

const countPlan = makePlan({ intent: 'Count customers', tables: ['customers'], aggregations: ['COUNT'] });

const completed: PipelineResult = {
  sql: 'SELECT COUNT(*) AS total FROM customers;',
  results: [{ total: 42 }],
  plan: countPlan,
  validationPassed: true,
  executionTimeMs: 1.5,
  analysis: null,
  visualization: null,
  error: null,
  errorCategory: null,
  retryCount: 0,
  step: 'COMPLETE',
};

function fakeServices() {
  const registry = makeRegistry(CUSTOMERS_SCHEMA);
  return {
    registry,
    retrieval: new RetrievalEngine(registry, null),
    understanding: { understand: vi.fn(async () => countPlan) },
    grounding: new GroundingValidator(registry),
    generator: {
      generate: vi.fn(async () => 'SELECT COUNT(*) AS total FROM customers;'),
      selfCorrect: vi.fn(async () => ''),
    },
    validator: new SQLSafetyValidator(registry, { dialect: 'Sqlite' }),
    orchestrator: { process: vi.fn(async () => completed) },
    databaseClient: 'better-sqlite3',
    maxQueryLength: 50,
    close: vi.fn(async () => {}),
  } satisfies AppServices;
}

describe('HTTP API', () => {
  let services: ReturnType<typeof fakeServices>;
  let app: FastifyInstance;

  beforeEach(async () => {
    services = fakeServices();
    app = await buildServer(services, { logRequests: false });
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /query', () => {
    it('runs the trimmed question and returns a snake_case result', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/query',
        payload: { query: '  How many customers?  ' },
      });

      expect(response.statusCode).toBe(200);
      expect(services.orchestrator.process).toHaveBeenCalledWith('How many customers?');
      expect(response.json()).toEqual({
        sql: 'SELECT COUNT(*) AS total FROM customers;',
        results: [{ total: 42 }],
        plan: countPlan,
        validation_passed: true,
        execution_time_ms: 1.5,
        analysis: null,
        visualization: null,
        error: null,
        error_category: null,
        retry_count: 0,
        step: 'complete',
      });
    });

    it('reports pipeline failures in the body', async () => {
      services.orchestrator.process.mockResolvedValue({
        ...completed,
        sql: '',
        results: [],
        plan: null,
        validationPassed: false,
        executionTimeMs: null,
        error: "Table 'cars' does not exist in the database. Available tables are: customers",
        errorCategory: 'SCHEMA',
        step: 'ERROR',
      });

      const response = await app.inject({
        method: 'POST',
        url: '/query',
        payload: { query: 'How many cars?' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ step: 'error', error_category: 'SCHEMA' });
    });

    it('rejects a missing question', async () => {
      const response = await app.inject({ method: 'POST', url: '/query', payload: {} });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: 'ValidationError' });
      expect(services.orchestrator.process).not.toHaveBeenCalled();
    });

    it('rejects questions over the length limit', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/query',
        payload: { query: 'x'.repeat(51) },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('POST /explain', () => {
    it('returns plan, context, SQL and validation without executing', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/explain',
        payload: { query: 'How many customers?' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        query: 'How many customers?',
        plan: countPlan,
        retrieval_context: 'Tables:\n- Table: customers | Columns: id, name, city, created_at',
        sql: 'SELECT COUNT(*) AS total FROM customers;',
        validation: { valid: true, reason: null },
      });
      expect(services.orchestrator.process).not.toHaveBeenCalled();
    });

    it('answers 422 with the available tables when grounding fails', async () => {
      services.understanding.understand.mockResolvedValue(makePlan({ tables: ['cars'] }));

      const response = await app.inject({
        method: 'POST',
        url: '/explain',
        payload: { query: 'How many cars?' },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toEqual({
        error: 'GroundingError',
        message: "Table 'cars' does not exist in the database. Available tables are: customers",
        available_tables: ['customers'],
        suggestions: ['Ask about one of: customers'],
      });
    });

    it('answers 502 when the model is unavailable', async () => {
      services.generator.generate.mockRejectedValue(
        new LLMError('LLM API failed after 2 attempts: overloaded')
      );

      const response = await app.inject({
        method: 'POST',
        url: '/explain',
        payload: { query: 'How many customers?' },
      });

      expect(response.statusCode).toBe(502);
      expect(response.json()).toEqual({
        error: 'LLMError',
        message: 'Language model service unavailable',
        detail: 'LLM API failed after 2 attempts: overloaded',
      });
    });
  });

  describe('schema endpoints', () => {
    it('lists tables and columns', async () => {
      const response = await app.inject({ method: 'GET', url: '/schema' });

      const body = response.json();
      expect(body.tables).toEqual([
        {
          name: 'customers',
          columns: [
            { name: 'id', data_type: 'integer', nullable: true },
            { name: 'name', data_type: 'text', nullable: true },
            { name: 'city', data_type: 'text', nullable: true },
            { name: 'created_at', data_type: 'timestamp', nullable: true },
          ],
        },
      ]);
      expect(body.foreign_keys).toEqual([]);
      expect(body.loaded_at).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });

    it('refreshes the schema', async () => {
      const response = await app.inject({ method: 'POST', url: '/schema/refresh' });

      expect(response.json()).toEqual({ refreshed: true, tables: 1 });
    });
  });

  describe('utility endpoints', () => {
    it('reports health', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.json()).toEqual({
        status: 'ok',
        database: { client: 'better-sqlite3', tables: ['customers'] },
      });
    });

    it('describes the service at the root', async () => {
      const response = await app.inject({ method: 'GET', url: '/' });

      expect(response.json()).toMatchObject({ name: 'groundql', docs: '/docs' });
    });
  });

  it('closes the services with the server', async () => {
    const owned = fakeServices();
    const server = await buildServer(owned, { logRequests: false });

    await server.close();

    expect(owned.close).toHaveBeenCalledTimes(1);
  });
});
