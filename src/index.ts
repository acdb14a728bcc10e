/**
 * Forum knowledge core - Main Entry Point
 *
 * Features:
 * - Knowledge base of answered questions (vector search)
 * - Answer suggestions for new questions (RAG)
 * - LLM moderation with ban enforcement
 * - Scheduled re-import of answered questions
 */

import { config } from './config/index.js';
import { createModuleLogger, errorMessage, setLogLevel } from './utils/logger.js';
import { buildServices, type Services } from './container.js';

const logger = createModuleLogger('main');

let services: Services | null = null;

async function main(): Promise<void> {
  setLogLevel(config.app.logLevel);

  logger.info('='.repeat(50));
  logger.info('Starting forum knowledge core');
  logger.info('='.repeat(50));

  try {
    services = buildServices(config);

    if (config.rag.enabled) {
      logger.info('Initializing knowledge base...');
      services.store.ensureCollection();
      const count = await services.store.count();
      logger.info(`Knowledge base ready (${count} entries)`);

      if (config.indexer.enabled) {
        services.indexer.start(config.indexer.cron, { answerPolicy: config.indexer.answerPolicy });
        logger.info('Background indexer started');
      }
    } else {
      logger.info('RAG system disabled');
    }

    logger.info('='.repeat(50));
    logger.info(`RAG: ${config.rag.enabled ? 'Enabled' : 'Disabled'}`);
    logger.info(`Moderation: ${config.moderation.enabled ? 'Enabled' : 'Disabled'}`);
    logger.info(`Model: ${config.llm.model}`);
    logger.info('='.repeat(50));
  } catch (error) {
    logger.error('Failed to start application', { error: errorMessage(error) });
    process.exit(1);
  }
}

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down...`);

  try {
    services?.cleanup();
    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: errorMessage(error) });
    process.exit(1);
  }
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
});

main().catch((error: unknown) => {
  logger.error('Startup failed', { error: errorMessage(error) });
  process.exit(1);
});
