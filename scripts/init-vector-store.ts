/**
 * Create the knowledge collection and its index.
 * Safe to run repeatedly.
 *
 * Usage:
 *   npx tsx scripts/init-vector-store.ts
 */

import 'dotenv/config';
import { config } from '../src/config/index.js';
import { buildServices } from '../src/container.js';
import { createModuleLogger, errorMessage } from '../src/utils/logger.js';

const logger = createModuleLogger('init-vector-store');

async function main() {
  const services = buildServices(config);

  try {
    services.store.ensureCollection();
    const count = await services.store.count();
    logger.info(`Collection ${services.store.collection} ready with ${count} entries`);
  } catch (error) {
    logger.error(`Error initializing vector store: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    services.cleanup();
  }
}

main().catch((error: unknown) => {
  logger.error(`Unexpected failure: ${errorMessage(error)}`);
  process.exit(1);
});
