/**
 * Vibingway - Single Entry Point
 */

// Load environment variables first
import './env-loader.js';

import { logger } from '@vibingway/logger';
import { VibingwayApplication } from './main.js';

async function start() {
  const app = new VibingwayApplication();

  // Graceful shutdown handling
  const stop = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    app.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled Rejection');
  });

  process.on('uncaughtException', (error) => {
    logger.error({ error }, 'Uncaught Exception');
    process.exit(1);
  });

  await app.initialize();
}

// Execute
start().catch((error: unknown) => {
  logger.error({ error }, 'Failed to start Vibingway');
  process.exit(1);
});
