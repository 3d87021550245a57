#!/usr/bin/env node
/**
 * groundql CLI
 */

import { Command } from 'commander';
import { loadConfig } from './config.js';
import { startServer } from './server.js';
import { runQuery, runTables } from './cli/query.js';
import type { OutputFormat } from './cli/query.js';
import * as out from './cli/logger.js';
import { ConfigError, errorMessage } from './types/errors.js';

const program = new Command();

program
  .name('groundql')
  .description('Ask a relational database questions in natural language')
  .version('1.0.0');

program
  .command('query <text>')
  .description('Answer a natural language question')
  .option('-f, --format <type>', 'Output format (json|table)', 'table')
  .action(async (text: string, options: { format: string }) => {
    const format: OutputFormat = options.format === 'json' ? 'json' : 'table';
    await runQuery(text, { format });
  });

program
  .command('tables')
  .description('List the tables and columns of the connected database')
  .action(runTables);

program
  .command('serve')
  .description('Start the HTTP API')
  .action(async () => {
    out.printBanner();
    try {
      const config = loadConfig();
      await startServer(config);
      out.link('API docs', `http://localhost:${config.PORT}/docs`);
    } catch (error) {
      out.error(
        error instanceof ConfigError ? 'Invalid configuration' : errorMessage(error),
        error instanceof ConfigError ? error.issues : []
      );
      process.exit(1);
    }
  });

await program.parseAsync();
