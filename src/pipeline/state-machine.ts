/**
 * Pipeline state machine.
 *
 * `transition` is pure: it maps the current step and the outcome of running
 * it to the next step. The orchestrator owns every side effect.
 */

import type { ErrorCategory } from '../services/error-classifier.js';
import { PipelineTransitionError } from '../types/errors.js';
import type { SemanticQueryPlan } from '../types/models.js';

export const PIPELINE_STEPS = [
  'UNDERSTAND',
  'GENERATE',
  'VALIDATE',
  'EXECUTE',
  'RETRY',
  'SELF_CORRECT',
  'ANALYZE_AND_VISUALIZE',
  'COMPLETE',
  'ERROR',
] as const;

export type PipelineStep = (typeof PIPELINE_STEPS)[number];

export type TerminalStep = Extract<PipelineStep, 'COMPLETE' | 'ERROR'>;

/**
 * Outcome of running one step.
 */
export type PipelineEvent =
  | { type: 'understood' }
  | { type: 'understanding_failed' }
  | { type: 'generated' }
  | { type: 'validated' }
  | { type: 'rejected'; category: ErrorCategory }
  | { type: 'executed'; simple: boolean }
  | { type: 'execution_failed'; category: ErrorCategory }
  | { type: 'retry_scheduled' }
  | { type: 'corrected' }
  | { type: 'gave_up' }
  | { type: 'analyzed' };

export interface RetryBudget {
  retryCount: number;
  maxRetries: number;
}

export function isTerminal(step: PipelineStep): step is TerminalStep {
  return step === 'COMPLETE' || step === 'ERROR';
}

/**
 * Seconds to wait before the retry that follows `retryCount` earlier retries.
 */
export function backoffSeconds(retryCount: number): number {
  return Math.pow(2, retryCount);
}

/**
 * Single table, at most one aggregation, no grouping, at most 10 rows.
 * Such answers skip analysis and visualization.
 */
export function isSimplePlan(plan: SemanticQueryPlan, rowCount: number): boolean {
  return (
    plan.tables.length <= 1 &&
    plan.aggregations.length <= 1 &&
    plan.group_by.length === 0 &&
    rowCount <= 10
  );
}

function afterRejection(category: ErrorCategory, budget: RetryBudget): PipelineStep {
  if (budget.retryCount >= budget.maxRetries) return 'ERROR';

  switch (category) {
    case 'SYNTAX':
    case 'SCHEMA':
      return 'SELF_CORRECT';
    case 'LLM':
    case 'NETWORK':
      return 'RETRY';
    default:
      return 'SELF_CORRECT';
  }
}

function afterExecutionFailure(category: ErrorCategory, budget: RetryBudget): PipelineStep {
  const retryable = category === 'TIMEOUT' || category === 'EXECUTION';
  return retryable && budget.retryCount < budget.maxRetries ? 'RETRY' : 'ERROR';
}

/**
 * @throws PipelineTransitionError when the event cannot follow the step
 */
export function transition(
  step: PipelineStep,
  event: PipelineEvent,
  budget: RetryBudget
): PipelineStep {
  switch (step) {
    case 'UNDERSTAND':
      if (event.type === 'understood') return 'GENERATE';
      if (event.type === 'understanding_failed') return 'ERROR';
      break;

    case 'GENERATE':
      if (event.type === 'generated') return 'VALIDATE';
      break;

    case 'VALIDATE':
      if (event.type === 'validated') return 'EXECUTE';
      if (event.type === 'rejected') return afterRejection(event.category, budget);
      break;

    case 'EXECUTE':
      if (event.type === 'executed') return event.simple ? 'COMPLETE' : 'ANALYZE_AND_VISUALIZE';
      if (event.type === 'execution_failed') return afterExecutionFailure(event.category, budget);
      break;

    case 'RETRY':
      if (event.type === 'retry_scheduled') return 'GENERATE';
      if (event.type === 'gave_up') return 'ERROR';
      break;

    case 'SELF_CORRECT':
      if (event.type === 'corrected') return 'GENERATE';
      if (event.type === 'gave_up') return 'ERROR';
      break;

    case 'ANALYZE_AND_VISUALIZE':
      if (event.type === 'analyzed') return 'COMPLETE';
      break;

    case 'COMPLETE':
    case 'ERROR':
      break;
  }

  throw new PipelineTransitionError(step, event.type);
}
