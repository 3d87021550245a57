/**
 * Pipeline orchestrator: runs one natural language question through
 * understanding, grounding, SQL synthesis, validation, execution and
 * (for non-trivial answers) analysis and visualization.
 */

import type { AnalysisProvider } from '../services/analysis.js';
import { classifyError } from '../services/error-classifier.js';
import type { ErrorCategory } from '../services/error-classifier.js';
import type { QueryExecutor } from '../services/executor.js';
import type { PlanGrounder } from '../services/grounding.js';
import type { QueryUnderstanding } from '../services/intent.js';
import type { SQLSynthesizer } from '../services/sql-generator.js';
import type { SQLValidatorLike, ValidationOutcome } from '../services/sql-validator.js';
import type { VisualizationProvider } from '../services/visualization.js';
import { GroundingError, errorMessage } from '../types/errors.js';
import type { AnalysisResult, SemanticQueryPlan, VisualizationConfig } from '../types/models.js';
import type { ResultRow } from '../types/utils.js';
import { logger } from '../utils/logger.js';
import { backoffSeconds, isSimplePlan, isTerminal, transition } from './state-machine.js';
import type { PipelineEvent, PipelineStep, TerminalStep } from './state-machine.js';

export interface PipelineDependencies {
  understanding: QueryUnderstanding;
  grounding: PlanGrounder;
  generator: SQLSynthesizer;
  validator: SQLValidatorLike;
  executor: QueryExecutor;
  analysis: AnalysisProvider;
  visualization: VisualizationProvider;
}

export interface PipelineOptions {
  maxRetries?: number;
  timeoutSeconds?: number;
  rowLimit?: number;
  /** Backoff sleep; replaced in tests. */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Mutable context for one request.
 */
export interface PipelineState {
  query: string;
  step: PipelineStep;
  plan: SemanticQueryPlan | null;
  sql: string;
  /** SQL produced by self-correction, submitted by the next GENERATE. */
  pendingSql: string | null;
  generationFailed: boolean;
  validation: ValidationOutcome | null;
  rows: ResultRow[];
  executionTimeMs: number | null;
  error: string | null;
  errorCategory: ErrorCategory | null;
  retryCount: number;
  maxRetries: number;
  analysis: AnalysisResult | null;
  visualization: VisualizationConfig | null;
}

export interface PipelineResult {
  sql: string;
  results: ResultRow[];
  plan: SemanticQueryPlan | null;
  validationPassed: boolean;
  executionTimeMs: number | null;
  analysis: AnalysisResult | null;
  visualization: VisualizationConfig | null;
  error: string | null;
  errorCategory: ErrorCategory | null;
  retryCount: number;
  step: TerminalStep;
}

export function analysisPlaceholder(reason: string): AnalysisResult {
  return {
    summary: `Analysis unavailable: ${reason}`,
    insights: [],
    trends: [],
    anomalies: [],
    recommendations: [],
  };
}

export function visualizationPlaceholder(reason: string): VisualizationConfig {
  return {
    chart_type: 'bar',
    title: 'Visualization unavailable',
    description: `Visualization generation failed: ${reason}`,
    x_axis: null,
    y_axis: [],
  };
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class PipelineOrchestrator {
  private readonly maxRetries: number;
  private readonly timeoutSeconds: number;
  private readonly rowLimit: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly deps: PipelineDependencies,
    options: PipelineOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? 3;
    this.timeoutSeconds = options.timeoutSeconds ?? 30;
    this.rowLimit = options.rowLimit ?? 10000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Run a question to COMPLETE or ERROR. Never throws.
   */
  async process(query: string): Promise<PipelineResult> {
    const state: PipelineState = {
      query,
      step: 'UNDERSTAND',
      plan: null,
      sql: '',
      pendingSql: null,
      generationFailed: false,
      validation: null,
      rows: [],
      executionTimeMs: null,
      error: null,
      errorCategory: null,
      retryCount: 0,
      maxRetries: this.maxRetries,
      analysis: null,
      visualization: null,
    };

    try {
      while (!isTerminal(state.step)) {
        const event = await this.run(state);
        const next = transition(state.step, event, state);
        logger.debug(`Pipeline ${state.step} --${event.type}--> ${next}`);
        state.step = next;
      }
    } catch (error) {
      // Only a broken transition table lands here; step handlers catch their own failures.
      logger.error(`Pipeline aborted in ${state.step}: ${errorMessage(error)}`);
      state.error = errorMessage(error);
      state.errorCategory = classifyError(error, { step: state.step }).category;
      state.step = 'ERROR';
    }

    return this.toResult(state);
  }

  private run(state: PipelineState): Promise<PipelineEvent> {
    switch (state.step) {
      case 'UNDERSTAND':
        return this.understand(state);
      case 'GENERATE':
        return this.generate(state);
      case 'VALIDATE':
        return this.validate(state);
      case 'EXECUTE':
        return this.execute(state);
      case 'RETRY':
        return this.retry(state);
      case 'SELF_CORRECT':
        return this.selfCorrect(state);
      case 'ANALYZE_AND_VISUALIZE':
        return this.analyzeAndVisualize(state);
      case 'COMPLETE':
      case 'ERROR':
        throw new Error(`Terminal step ${state.step} has no handler`);
    }
  }

  private async understand(state: PipelineState): Promise<PipelineEvent> {
    try {
      const plan = await this.deps.understanding.understand(state.query);
      state.plan = await this.deps.grounding.ground(plan);
      return { type: 'understood' };
    } catch (error) {
      state.error =
        error instanceof GroundingError
          ? error.message
          : `Query understanding failed: ${errorMessage(error)}`;
      state.errorCategory = classifyError(error, { step: 'understand', query: state.query }).category;
      return { type: 'understanding_failed' };
    }
  }

  private async generate(state: PipelineState): Promise<PipelineEvent> {
    state.generationFailed = false;

    if (state.pendingSql !== null) {
      state.sql = state.pendingSql;
      state.pendingSql = null;
      return { type: 'generated' };
    }

    try {
      state.sql = await this.deps.generator.generate(this.planOf(state), state.query);
    } catch (error) {
      state.generationFailed = true;
      state.sql = '';
      state.error = `SQL generation failed: ${errorMessage(error)}`;
      state.errorCategory = classifyError(error, { step: 'generate', query: state.query }).category;
    }
    return { type: 'generated' };
  }

  private async validate(state: PipelineState): Promise<PipelineEvent> {
    if (state.generationFailed) {
      state.validation = { valid: false, reason: state.error };
      return { type: 'rejected', category: state.errorCategory ?? 'UNKNOWN' };
    }

    const outcome = await this.deps.validator.validate(state.sql);
    state.validation = outcome;
    if (outcome.valid) {
      logger.info('SQL validation passed');
      return { type: 'validated' };
    }

    const reason = outcome.reason ?? 'unknown reason';
    const record = classifyError(reason, { step: 'validation', sql: state.sql, query: state.query });
    state.error = `SQL validation failed: ${reason}`;
    state.errorCategory = record.category;
    return { type: 'rejected', category: record.category };
  }

  private async execute(state: PipelineState): Promise<PipelineEvent> {
    const started = performance.now();
    try {
      const result = await this.deps.executor.executeSelect(
        state.sql,
        this.timeoutSeconds,
        this.rowLimit
      );
      state.rows = result.rows;
      state.executionTimeMs = performance.now() - started;
      state.error = null;
      state.errorCategory = null;

      if (result.rows.length === 0) {
        logger.warn('Query returned no rows');
      }
      logger.info(
        `Query executed, ${result.rows.length} rows in ${state.executionTimeMs.toFixed(2)}ms`
      );
      return { type: 'executed', simple: isSimplePlan(this.planOf(state), result.rows.length) };
    } catch (error) {
      const record = classifyError(error, { step: 'execution', sql: state.sql, query: state.query });
      state.error = `Execution failed: ${record.message}`;
      state.errorCategory = record.category;
      return { type: 'execution_failed', category: record.category };
    }
  }

  private async retry(state: PipelineState): Promise<PipelineEvent> {
    if (state.retryCount >= state.maxRetries) {
      state.error = `Max retries (${state.maxRetries}) exceeded. Last error: ${state.error ?? 'Unknown'}`;
      return { type: 'gave_up' };
    }

    const seconds = backoffSeconds(state.retryCount);
    logger.info(`Retrying after ${seconds}s (attempt ${state.retryCount + 1}/${state.maxRetries})`);
    await this.sleep(seconds * 1000);
    state.retryCount += 1;
    return { type: 'retry_scheduled' };
  }

  private async selfCorrect(state: PipelineState): Promise<PipelineEvent> {
    if (state.retryCount >= state.maxRetries) {
      return { type: 'gave_up' };
    }

    logger.info(
      `Self-correcting SQL (attempt ${state.retryCount + 1}/${state.maxRetries}), ` +
        `category ${state.errorCategory ?? 'UNKNOWN'}`
    );

    try {
      state.pendingSql = await this.deps.generator.selfCorrect(
        this.planOf(state),
        state.query,
        state.sql,
        state.error ?? ''
      );
    } catch (error) {
      state.error = `Self-correction failed: ${errorMessage(error)}`;
      state.errorCategory = classifyError(error, { step: 'self_correct', sql: state.sql }).category;
      return { type: 'gave_up' };
    }

    state.retryCount += 1;
    state.error = null;
    state.errorCategory = null;
    return { type: 'corrected' };
  }

  private async analyzeAndVisualize(state: PipelineState): Promise<PipelineEvent> {
    const input = { query: state.query, sql: state.sql, rows: state.rows, plan: this.planOf(state) };

    const [analysis, visualization] = await Promise.allSettled([
      this.deps.analysis.analyze(input),
      this.deps.visualization.visualize(input),
    ]);

    if (analysis.status === 'fulfilled') {
      state.analysis = analysis.value;
    } else {
      logger.warn(`Analysis failed: ${errorMessage(analysis.reason)}`);
      state.analysis = analysisPlaceholder(errorMessage(analysis.reason));
    }

    if (visualization.status === 'fulfilled') {
      state.visualization = visualization.value;
    } else {
      logger.warn(`Visualization failed: ${errorMessage(visualization.reason)}`);
      state.visualization = visualizationPlaceholder(errorMessage(visualization.reason));
    }

    return { type: 'analyzed' };
  }

  private planOf(state: PipelineState): SemanticQueryPlan {
    if (state.plan === null) {
      throw new Error(`No plan available in ${state.step}`);
    }
    return state.plan;
  }

  private toResult(state: PipelineState): PipelineResult {
    return {
      sql: state.sql,
      results: state.rows,
      plan: state.plan,
      validationPassed: state.validation?.valid ?? false,
      executionTimeMs: state.executionTimeMs,
      analysis: state.analysis,
      visualization: state.visualization,
      error: state.step === 'ERROR' ? state.error : null,
      errorCategory: state.step === 'ERROR' ? state.errorCategory : null,
      retryCount: state.retryCount,
      step: state.step === 'COMPLETE' ? 'COMPLETE' : 'ERROR',
    };
  }
}
