/**
 * Bulk Import Script
 *
 * Copies every answered question, with one of its answers, into the
 * knowledge base.
 *
 * Usage:
 *   npx tsx scripts/bulk-import.ts            # import, earliest answer per question
 *   npx tsx scripts/bulk-import.ts --latest   # use the most recent answer instead
 *   npx tsx scripts/bulk-import.ts --dry-run  # count only, write nothing (-d also works)
 */

import 'dotenv/config';
import { config } from '../src/config/index.js';
import { buildServices } from '../src/container.js';
import { createModuleLogger, errorMessage } from '../src/utils/logger.js';

const logger = createModuleLogger('bulk-import');

async function main() {
  const args = process.argv.slice(2);
  const dryRun = args.includes('--dry-run') || args.includes('-d');
  const answerPolicy = args.includes('--latest') ? 'latest' : 'earliest';

  if (dryRun) {
    logger.info('Running in DRY RUN mode - no data will be imported');
  }

  const services = buildServices(config);

  try {
    const stats = await services.indexer.bulkImport({ answerPolicy, dryRun });

    logger.info('='.repeat(50));
    logger.info('Import Statistics:');
    logger.info(`  • Total questions found: ${stats.totalQuestions}`);
    logger.info(`  • Questions with answers: ${stats.questionsWithAnswers}`);
    logger.info(`  • Successfully imported: ${stats.imported}`);
    logger.info(`  • Skipped: ${stats.skipped}`);
    logger.info(`  • Errors: ${stats.errors}`);
    for (const detail of stats.errorDetails) {
      logger.info(`    - Question ${detail.questionId}: ${detail.error}`);
    }
    logger.info('='.repeat(50));
  } catch (error) {
    logger.error(`Bulk import failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    services.cleanup();
  }
}

main().catch((error: unknown) => {
  logger.error(`Unexpected failure: ${errorMessage(error)}`);
  process.exit(1);
});
