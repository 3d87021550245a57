/**
 * Error taxonomy for pipeline failures.
 *
 * Categories are derived by keyword-matching the lower-cased message. Rules
 * are checked in order and the first hit wins, so a message mentioning both
 * "syntax" and "column" is SYNTAX.
 */

import { errorMessage } from '../types/errors.js';
import type { JsonObject } from '../types/utils.js';
import { logger } from '../utils/logger.js';

export const ERROR_CATEGORIES = [
  'SYNTAX',
  'SCHEMA',
  'PERMISSION',
  'TIMEOUT',
  'EXECUTION',
  'VALIDATION',
  'LLM',
  'EMPTY_RESULTS',
  'NETWORK',
  'UNKNOWN',
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export type RecoveryStrategy =
  | 'self_correct_sql'
  | 'augment_schema_context'
  | 'optimize_query'
  | 'retry_execution'
  | 'self_correct'
  | 'retry_with_backoff'
  | 'check_intent'
  | 'none';

interface CategoryRule {
  category: ErrorCategory;
  keywords: readonly string[];
  severity: ErrorSeverity;
  retryable: boolean;
  strategy: RecoveryStrategy;
}

const RULES: readonly CategoryRule[] = [
  {
    category: 'SYNTAX',
    keywords: ['syntax', 'parse', 'invalid sql', 'malformed'],
    severity: 'medium',
    retryable: true,
    strategy: 'self_correct_sql',
  },
  {
    category: 'SCHEMA',
    keywords: ['does not exist', 'relation', 'column', 'table'],
    severity: 'medium',
    retryable: true,
    strategy: 'augment_schema_context',
  },
  {
    category: 'PERMISSION',
    keywords: ['permission', 'access denied', 'unauthorized'],
    severity: 'high',
    retryable: false,
    strategy: 'none',
  },
  {
    category: 'TIMEOUT',
    keywords: ['timeout', 'timed out', 'exceeded'],
    severity: 'medium',
    retryable: true,
    strategy: 'optimize_query',
  },
  {
    category: 'EXECUTION',
    keywords: ['execution', 'failed to execute', 'database error'],
    severity: 'medium',
    retryable: true,
    strategy: 'retry_execution',
  },
  {
    category: 'VALIDATION',
    keywords: ['validation', 'invalid', 'not allowed'],
    severity: 'medium',
    retryable: true,
    strategy: 'self_correct',
  },
  {
    category: 'LLM',
    keywords: ['llm', 'api', 'model', 'rate limit'],
    severity: 'medium',
    retryable: true,
    strategy: 'retry_with_backoff',
  },
  {
    category: 'EMPTY_RESULTS',
    keywords: ['empty', 'no results'],
    severity: 'low',
    retryable: true,
    strategy: 'check_intent',
  },
  {
    category: 'NETWORK',
    keywords: ['connection', 'network', 'unreachable', 'refused'],
    severity: 'high',
    retryable: true,
    strategy: 'retry_with_backoff',
  },
];

const UNKNOWN_RULE: CategoryRule = {
  category: 'UNKNOWN',
  keywords: [],
  severity: 'medium',
  retryable: true,
  strategy: 'self_correct',
};

export interface ErrorRecord {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  strategy: RecoveryStrategy;
  message: string;
  context: JsonObject;
}

function ruleFor(message: string): CategoryRule {
  const lower = message.toLowerCase();
  return (
    RULES.find((rule) => rule.keywords.some((keyword) => lower.includes(keyword))) ??
    UNKNOWN_RULE
  );
}

/**
 * Category for a failure message.
 */
export function categorizeError(message: string): ErrorCategory {
  return ruleFor(message).category;
}

/**
 * Build and log an ErrorRecord for anything thrown (or a failure message).
 */
export function classifyError(error: unknown, context: JsonObject = {}): ErrorRecord {
  const message = errorMessage(error);
  const rule = ruleFor(message);

  const record: ErrorRecord = {
    category: rule.category,
    severity: rule.severity,
    retryable: rule.retryable,
    strategy: rule.strategy,
    message,
    context,
  };

  logger.warn(
    { category: record.category, severity: record.severity, context },
    `Pipeline error classified as ${record.category}: ${message}`
  );

  return record;
}
