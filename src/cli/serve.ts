#!/usr/bin/env node

/**
 * Gateway server CLI
 *
 * Usage:
 *   infergate-serve                  # config/runtime.yaml, NODE_ENV section
 *   CONFIG_PATH=./my.yaml infergate-serve
 *   MODELS=hashing-384 PORT=9000 infergate-serve
 *
 * SIGINT/SIGTERM drain in-flight requests before the process exits.
 */

import { createApp } from '../app.js';
import { loadConfig } from '../config/loader.js';
import { createRootLogger } from '../utils/logger-helpers.js';

async function main(): Promise<void> {
  const config = loadConfig({ configPath: process.env.CONFIG_PATH });
  const logger = createRootLogger(config.logging.level);

  const app = createApp(config, { logger });

  let isShuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn('Already shutting down, please wait...');
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    try {
      const drained = await app.shutdown();
      process.exit(drained ? 0 : 1);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await app.start();
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
