/**
 * groundql server - main entry point
 */

import { loadConfig } from './config.js';
import { startServer } from './server.js';
import { ConfigError, errorMessage } from './types/errors.js';
import { logger } from './utils/logger.js';

const start = async () => {
  try {
    await startServer(loadConfig());
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error({ err: error }, `Failed to start server: ${errorMessage(error)}`);
    }
    process.exit(1);
  }
};

void start();
