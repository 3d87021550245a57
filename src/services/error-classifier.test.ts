import { describe, it, expect } from 'vitest';
import { categorizeError, classifyError } from './error-classifier.js';
import { GroundingError, LLMError, QueryTimeoutError } from '../types/errors.js';

describe('categorizeError', () => {
  it.each([
    ['SQL syntax error: unexpected token', 'SYNTAX'],
    ['Malformed statement', 'SYNTAX'],
    ["Column 'ghost_col' does not exist in table 'customers'", 'SCHEMA'],
    ['relation "cars" does not exist', 'SCHEMA'],
    ['permission denied for schema private', 'PERMISSION'],
    ['Query timeout after 30 seconds', 'TIMEOUT'],
    ['statement timed out', 'TIMEOUT'],
    ['SQL execution failed: disk I/O error', 'EXECUTION'],
    ['Multiple SQL statements not allowed', 'VALIDATION'],
    ['LLM API failed after 2 attempts: overloaded', 'LLM'],
    ['Result set was empty', 'EMPTY_RESULTS'],
    ['connect ECONNREFUSED 127.0.0.1:5432', 'NETWORK'],
    ['something odd happened', 'UNKNOWN'],
  ])('%s -> %s', (message, category) => {
    expect(categorizeError(message)).toBe(category);
  });

  it('checks categories in order, so syntax wins over schema', () => {
    expect(categorizeError('syntax error near column list')).toBe('SYNTAX');
  });

  it('matches case-insensitively', () => {
    expect(categorizeError('ACCESS DENIED for user')).toBe('PERMISSION');
  });
});

describe('classifyError', () => {
  it('builds a record with severity, retryability and strategy', () => {
    const record = classifyError(new QueryTimeoutError(30), { step: 'execution' });

    expect(record).toEqual({
      category: 'TIMEOUT',
      severity: 'medium',
      retryable: true,
      strategy: 'optimize_query',
      message: 'Query timeout after 30 seconds',
      context: { step: 'execution' },
    });
  });

  it('marks permission failures as the only non-retryable category', () => {
    const record = classifyError('permission denied for user analyst');

    expect(record.category).toBe('PERMISSION');
    expect(record.retryable).toBe(false);
    expect(record.strategy).toBe('none');
    expect(record.severity).toBe('high');
  });

  it('classifies a grounding failure as a schema error', () => {
    expect(classifyError(new GroundingError(['cars'], ['customers'])).category).toBe('SCHEMA');
  });

  it('treats unknown failures as retryable with self-correction', () => {
    const record = classifyError(new LLMError('boom'));

    expect(record.category).toBe('UNKNOWN');
    expect(record.retryable).toBe(true);
    expect(record.strategy).toBe('self_correct');
  });
});
