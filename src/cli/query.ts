/**
 * Execute questions from the CLI
 */

import { createServices } from '../app.js';
import type { AppServices } from '../app.js';
import { loadConfig } from '../config.js';
import type { PipelineResult } from '../pipeline/orchestrator.js';
import { ConfigError, errorMessage } from '../types/errors.js';
import * as out from './logger.js';

export type OutputFormat = 'json' | 'table';

/**
 * Print a finished pipeline run.
 */
export function printResult(result: PipelineResult, format: OutputFormat): void {
  if (result.sql) {
    out.sql(result.sql);
  }

  if (result.step === 'ERROR') {
    out.failure(result.error ?? 'Unknown error', result.errorCategory);
    return;
  }

  if (format === 'json') {
    console.log(JSON.stringify(result.results, null, 2));
  } else {
    console.table(result.results);
  }

  if (result.analysis) {
    out.analysis(result.analysis);
  }
  if (result.visualization) {
    out.chart(result.visualization);
  }
}

async function withServices<T>(run: (services: AppServices) => Promise<T>): Promise<T> {
  const spinner = out.spinner('Connecting to database...');
  let services: AppServices;
  try {
    services = await createServices(loadConfig());
    spinner.succeed('Connected');
  } catch (error) {
    spinner.fail('Connection failed');
    throw error;
  }

  try {
    return await run(services);
  } finally {
    await services.close();
  }
}

function fail(error: unknown): never {
  if (error instanceof ConfigError) {
    out.error('Invalid configuration', error.issues);
    out.warn('Copy .env.example to .env and fill in the database and API key settings');
  } else {
    out.error(errorMessage(error));
  }
  process.exit(1);
}

export async function runQuery(text: string, options: { format: OutputFormat }): Promise<void> {
  try {
    const result = await withServices(async (services) => {
      const spinner = out.spinner('Answering question...');
      const result = await services.orchestrator.process(text);
      if (result.step === 'COMPLETE') {
        spinner.succeed(
          `Query complete (${result.results.length} rows in ` +
            `${(result.executionTimeMs ?? 0).toFixed(0)}ms, ${result.retryCount} retries)`
        );
      } else {
        spinner.fail('Query failed');
      }
      return result;
    });

    printResult(result, options.format);
    if (result.step === 'ERROR') {
      process.exitCode = 1;
    }
  } catch (error) {
    fail(error);
  }
}

export async function runTables(): Promise<void> {
  try {
    await withServices(async (services) => {
      const snapshot = await services.registry.getSnapshot();
      for (const [table, columns] of snapshot.tables) {
        out.table(table, columns);
      }
      out.success(`${snapshot.tables.size} tables`);
    });
  } catch (error) {
    fail(error);
  }
}
