import { describe, it, expect, vi } from 'vitest';
import { PipelineOrchestrator, analysisPlaceholder, visualizationPlaceholder } from './orchestrator.js';
import type { PipelineDependencies } from './orchestrator.js';
import { GroundingValidator } from '../services/grounding.js';
import { SQLSafetyValidator } from '../services/sql-validator.js';
import type { ExecutionResult } from '../services/executor.js';
import { LLMError, QueryTimeoutError, SQLExecutionError } from '../types/errors.js';
import type { AnalysisResult, SemanticQueryPlan, VisualizationConfig } from '../types/models.js';
import type { ResultRow } from '../types/utils.js';
import { CUSTOMERS_SCHEMA, makePlan, makeRegistry } from '../testing/fixtures.js';

const COUNT_SQL = 'SELECT COUNT(*) AS total FROM customers;';

function executed(rows: ResultRow[]): ExecutionResult {
  return { rows, columns: Object.keys(rows[0] ?? {}), truncated: false };
}

/**
 * Real grounding and validation over the customers schema; everything that
 * would reach a model or a database is a stub.
 */
function setup(plan: SemanticQueryPlan, overrides: Partial<PipelineDependencies> = {}) {
  const registry = makeRegistry(CUSTOMERS_SCHEMA);
  const deps = {
    understanding: { understand: vi.fn(async () => plan) },
    grounding: new GroundingValidator(registry),
    generator: {
      generate: vi.fn(async () => COUNT_SQL),
      selfCorrect: vi.fn(async () => COUNT_SQL),
    },
    validator: new SQLSafetyValidator(registry, { dialect: 'Sqlite' }),
    executor: { executeSelect: vi.fn(async () => executed([{ total: 42 }])) },
    analysis: {
      analyze: vi.fn(async (): Promise<AnalysisResult> => ({
        summary: 'Paris leads.',
        insights: [],
        trends: [],
        anomalies: [],
        recommendations: [],
      })),
    },
    visualization: {
      visualize: vi.fn(async (): Promise<VisualizationConfig> => ({
        chart_type: 'bar',
        title: 'Customers per city',
        description: '',
        x_axis: 'city',
        y_axis: ['n'],
      })),
    },
  };
  const sleeps: number[] = [];
  const orchestrator = new PipelineOrchestrator(
    { ...deps, ...overrides },
    {
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    }
  );
  return { deps, orchestrator, sleeps };
}

const countPlan = makePlan({ intent: 'Count customers', tables: ['customers'], aggregations: ['COUNT'] });
const groupedPlan = makePlan({
  intent: 'Customers per city',
  tables: ['customers'],
  aggregations: ['COUNT'],
  group_by: ['city'],
});
const GROUPED_SQL = 'SELECT city, COUNT(*) AS n FROM customers GROUP BY city;';
const CITY_ROWS = [
  { city: 'Paris', n: 3 },
  { city: 'Rome', n: 1 },
];

describe('PipelineOrchestrator', () => {
  it('answers a simple count without analysis', async () => {
    const { deps, orchestrator } = setup(countPlan);

    const result = await orchestrator.process('How many customers do we have?');

    expect(result).toMatchObject({
      step: 'COMPLETE',
      sql: COUNT_SQL,
      results: [{ total: 42 }],
      validationPassed: true,
      error: null,
      errorCategory: null,
      retryCount: 0,
      analysis: null,
      visualization: null,
    });
    expect(typeof result.executionTimeMs).toBe('number');
    expect(deps.executor.executeSelect).toHaveBeenCalledWith(COUNT_SQL, 30, 10000);
    expect(deps.analysis.analyze).not.toHaveBeenCalled();
  });

  it('stops at grounding when the question names no known table', async () => {
    const { deps, orchestrator } = setup(makePlan({ intent: 'Count cars', tables: ['cars'] }));

    const result = await orchestrator.process('How many cars do we have?');

    expect(result.step).toBe('ERROR');
    expect(result.error).toBe(
      "Table 'cars' does not exist in the database. Available tables are: customers"
    );
    expect(result.errorCategory).toBe('SCHEMA');
    expect(result.plan).toBeNull();
    expect(deps.generator.generate).not.toHaveBeenCalled();
  });

  it('self-corrects schema errors until the retry budget runs out', async () => {
    const ghost = 'SELECT ghost_col FROM customers;';
    const { deps, orchestrator, sleeps } = setup(countPlan);
    deps.generator.generate.mockResolvedValue(ghost);
    deps.generator.selfCorrect.mockResolvedValue(ghost);

    const result = await orchestrator.process('How many customers do we have?');

    const rejection =
      "SQL validation failed: Column 'ghost_col' does not exist in table 'customers'. " +
      "Available columns in 'customers': city, created_at, id, name. " +
      'Please reformulate your query using only the available columns.';
    expect(result).toMatchObject({
      step: 'ERROR',
      error: rejection,
      errorCategory: 'SCHEMA',
      retryCount: 3,
      validationPassed: false,
    });
    expect(deps.generator.generate).toHaveBeenCalledTimes(1);
    expect(deps.generator.selfCorrect).toHaveBeenCalledTimes(3);
    expect(deps.generator.selfCorrect).toHaveBeenNthCalledWith(
      1,
      countPlan,
      'How many customers do we have?',
      ghost,
      rejection
    );
    expect(deps.executor.executeSelect).not.toHaveBeenCalled();
    expect(sleeps).toEqual([]);
  });

  it('executes the corrected statement', async () => {
    const { deps, orchestrator } = setup(countPlan);
    deps.generator.generate.mockResolvedValue('SELECT ghost_col FROM customers;');

    const result = await orchestrator.process('How many customers do we have?');

    expect(result).toMatchObject({ step: 'COMPLETE', sql: COUNT_SQL, retryCount: 1, error: null });
    expect(deps.executor.executeSelect).toHaveBeenCalledTimes(1);
  });

  it('backs off exponentially while the model keeps failing', async () => {
    const { deps, orchestrator, sleeps } = setup(countPlan);
    deps.generator.generate.mockRejectedValue(
      new LLMError('LLM API failed after 2 attempts: overloaded')
    );

    const result = await orchestrator.process('How many customers do we have?');

    expect(sleeps).toEqual([1000, 2000, 4000]);
    expect(result).toMatchObject({
      step: 'ERROR',
      error: 'SQL generation failed: LLM API failed after 2 attempts: overloaded',
      errorCategory: 'LLM',
      retryCount: 3,
    });
    expect(deps.generator.generate).toHaveBeenCalledTimes(4);
  });

  it('recovers after a transient model failure', async () => {
    const { deps, orchestrator, sleeps } = setup(countPlan);
    deps.generator.generate.mockRejectedValueOnce(
      new LLMError('LLM API failed after 2 attempts: overloaded')
    );

    const result = await orchestrator.process('How many customers do we have?');

    expect(result).toMatchObject({ step: 'COMPLETE', retryCount: 1, error: null });
    expect(sleeps).toEqual([1000]);
  });

  it('retries a timed out query with fresh SQL', async () => {
    const { deps, orchestrator, sleeps } = setup(countPlan);
    deps.executor.executeSelect.mockRejectedValueOnce(new QueryTimeoutError(30));

    const result = await orchestrator.process('How many customers do we have?');

    expect(result).toMatchObject({ step: 'COMPLETE', retryCount: 1, results: [{ total: 42 }] });
    expect(sleeps).toEqual([1000]);
    expect(deps.generator.generate).toHaveBeenCalledTimes(2);
  });

  it('gives up on execution failures that are not transient', async () => {
    const { deps, orchestrator } = setup(countPlan);
    deps.executor.executeSelect.mockRejectedValue(
      new SQLExecutionError('SQL execution failed: no such column: total', COUNT_SQL)
    );

    const result = await orchestrator.process('How many customers do we have?');

    expect(result).toMatchObject({
      step: 'ERROR',
      error: 'Execution failed: SQL execution failed: no such column: total',
      errorCategory: 'SCHEMA',
      retryCount: 0,
      validationPassed: true,
    });
  });

  it('reports understanding failures', async () => {
    const { orchestrator } = setup(countPlan, {
      understanding: {
        understand: vi.fn(async () =>
          Promise.reject(new LLMError('LLM API failed after 2 attempts: rate limit'))
        ),
      },
    });

    const result = await orchestrator.process('How many customers do we have?');

    expect(result).toMatchObject({
      step: 'ERROR',
      error: 'Query understanding failed: LLM API failed after 2 attempts: rate limit',
      errorCategory: 'LLM',
      sql: '',
      plan: null,
    });
  });

  it('ends when self-correction itself fails', async () => {
    const { deps, orchestrator } = setup(countPlan);
    deps.generator.generate.mockResolvedValue('SELECT ghost_col FROM customers;');
    deps.generator.selfCorrect.mockRejectedValue(
      new LLMError('LLM API failed after 2 attempts: overloaded')
    );

    const result = await orchestrator.process('How many customers do we have?');

    expect(result).toMatchObject({
      step: 'ERROR',
      error: 'Self-correction failed: LLM API failed after 2 attempts: overloaded',
      errorCategory: 'LLM',
      retryCount: 0,
    });
  });

  it('analyzes grouped answers and substitutes a placeholder for a failed analysis', async () => {
    const grouped = makePlan({
      intent: 'Customers per city',
      tables: ['customers'],
      aggregations: ['COUNT'],
      group_by: ['city'],
    });
    const { deps, orchestrator } = setup(grouped);
    deps.generator.generate.mockResolvedValue(
      'SELECT city, COUNT(*) AS n FROM customers GROUP BY city;'
    );
    deps.executor.executeSelect.mockResolvedValue(
      executed([
        { city: 'Paris', n: 3 },
        { city: 'Rome', n: 1 },
      ])
    );
    deps.analysis.analyze.mockRejectedValue(new Error('analysis model unavailable'));

    const result = await orchestrator.process('How many customers per city?');

    expect(result.step).toBe('COMPLETE');
    expect(result.analysis).toEqual(analysisPlaceholder('analysis model unavailable'));
    expect(result.visualization).toEqual({
      chart_type: 'bar',
      title: 'Customers per city',
      description: '',
      x_axis: 'city',
      y_axis: ['n'],
    });
    expect(deps.visualization.visualize).toHaveBeenCalledWith({
      query: 'How many customers per city?',
      sql: 'SELECT city, COUNT(*) AS n FROM customers GROUP BY city;',
      rows: [
        { city: 'Paris', n: 3 },
        { city: 'Rome', n: 1 },
      ],
      plan: grouped,
    });
  });

  it('keeps the analysis when the chart suggestion fails', async () => {
    const { deps, orchestrator } = setup(groupedPlan);
    deps.generator.generate.mockResolvedValue(GROUPED_SQL);
    deps.executor.executeSelect.mockResolvedValue(executed(CITY_ROWS));
    deps.visualization.visualize.mockRejectedValue(new Error('chart model unavailable'));

    const result = await orchestrator.process('How many customers per city?');

    expect(result.step).toBe('COMPLETE');
    expect(result.analysis).toEqual({
      summary: 'Paris leads.',
      insights: [],
      trends: [],
      anomalies: [],
      recommendations: [],
    });
    expect(result.visualization).toEqual(visualizationPlaceholder('chart model unavailable'));
  });

  it('starts analysis and visualization before either settles', async () => {
    const { deps, orchestrator } = setup(groupedPlan);
    deps.generator.generate.mockResolvedValue(GROUPED_SQL);
    deps.executor.executeSelect.mockResolvedValue(executed(CITY_ROWS));

    let finishAnalysis: () => void = () => {};
    let finishVisualization: () => void = () => {};
    deps.analysis.analyze.mockImplementation(
      () =>
        new Promise((resolve) => {
          finishAnalysis = () =>
            resolve({ summary: 'Rome trails.', insights: [], trends: [], anomalies: [], recommendations: [] });
        })
    );
    deps.visualization.visualize.mockImplementation(
      () =>
        new Promise((resolve) => {
          finishVisualization = () =>
            resolve({ chart_type: 'pie', title: 'Share by city', description: '', x_axis: 'city', y_axis: ['n'] });
        })
    );

    const pending = orchestrator.process('How many customers per city?');
    await vi.waitFor(() => {
      expect(deps.analysis.analyze).toHaveBeenCalledTimes(1);
      expect(deps.visualization.visualize).toHaveBeenCalledTimes(1);
    });

    finishVisualization();
    finishAnalysis();
    const result = await pending;

    expect(result.analysis?.summary).toBe('Rome trails.');
    expect(result.visualization?.chart_type).toBe('pie');
  });

  it('does not hand a stale statement to self-correction after a failed regeneration', async () => {
    const { deps, orchestrator, sleeps } = setup(countPlan);
    deps.executor.executeSelect.mockRejectedValueOnce(new QueryTimeoutError(30));
    deps.generator.generate
      .mockResolvedValueOnce(COUNT_SQL)
      .mockRejectedValueOnce(new Error('Could not produce a query for this question'));

    const result = await orchestrator.process('How many customers do we have?');

    expect(sleeps).toEqual([1000]);
    expect(deps.generator.selfCorrect).toHaveBeenCalledWith(
      countPlan,
      'How many customers do we have?',
      '',
      'SQL generation failed: Could not produce a query for this question'
    );
    expect(result).toMatchObject({ step: 'COMPLETE', sql: COUNT_SQL, retryCount: 2 });
  });

  it('passes its timeout and row limit to the executor', async () => {
    const registry = makeRegistry(CUSTOMERS_SCHEMA);
    const executeSelect = vi.fn(async () => executed([{ total: 1 }]));
    const orchestrator = new PipelineOrchestrator(
      {
        understanding: { understand: async () => countPlan },
        grounding: new GroundingValidator(registry),
        generator: { generate: async () => COUNT_SQL, selfCorrect: async () => COUNT_SQL },
        validator: new SQLSafetyValidator(registry, { dialect: 'Sqlite' }),
        executor: { executeSelect },
        analysis: { analyze: vi.fn() },
        visualization: { visualize: vi.fn() },
      },
      { timeoutSeconds: 5, rowLimit: 100 }
    );

    await orchestrator.process('How many customers do we have?');

    expect(executeSelect).toHaveBeenCalledWith(COUNT_SQL, 5, 100);
  });
});
