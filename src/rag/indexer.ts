/**
 * Knowledge Indexer
 *
 * Feeds accepted question/answer pairs into the knowledge base.
 *
 * TWO PATHS:
 * ----------
 * 1. Live: when an answer is posted, `addToKnowledgeBase` writes the pair
 *    straight away. Failures are logged and swallowed; the answer itself is
 *    already saved and must not be rolled back because of this.
 * 2. Batch: `bulkImport` walks every answered question, picks one answer
 *    per question (earliest or latest) and upserts the pair. One bad record
 *    is counted and the batch moves on. A dry run does all the selection
 *    and counting and writes nothing.
 *
 * Entries are keyed by question id, so re-running the batch (manually or
 * on the cron schedule) replaces entries instead of duplicating them.
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { ForumDatabase, QuestionStatus, QuestionWithAnswers, Answer } from '../memory/database.js';
import { getQuestionsWithAnswers } from '../memory/database.js';
import { createModuleLogger, errorMessage } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';
import type { EntryMetadata, KnowledgeVectorStore } from './vectorstore.js';

const logger = createModuleLogger('indexer');

export type AnswerPolicy = 'earliest' | 'latest';

export interface AddToKnowledgeOptions {
  /** Entry id; also recorded as `question_id` in the metadata. */
  id?: string;
  metadata?: EntryMetadata;
}

export interface BulkImportOptions {
  status?: QuestionStatus;
  answerPolicy?: AnswerPolicy;
  dryRun?: boolean;
}

export interface ImportErrorDetail {
  questionId: string;
  error: string;
}

export interface ImportStats {
  totalQuestions: number;
  questionsWithAnswers: number;
  imported: number;
  skipped: number;
  errors: number;
  errorDetails: ImportErrorDetail[];
}

export interface IndexerStatus {
  scheduled: boolean;
  running: boolean;
  lastRunAt: string | null;
  lastStats: ImportStats | null;
}

/**
 * Canonical text of a knowledge entry.
 */
export function formatKnowledgeContent(question: string, answer: string): string {
  return `Q: ${question.trim()}\n\nA: ${answer.trim()}`;
}

/**
 * Pick one answer by creation time. Ties keep the stored order.
 */
export function selectAnswer(answers: Answer[], policy: AnswerPolicy): Answer | undefined {
  const sorted = [...answers].sort((a, b) =>
    a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0
  );
  return policy === 'earliest' ? sorted[0] : sorted[sorted.length - 1];
}

export class KnowledgeIndexer {
  private task: ScheduledTask | null = null;
  private running = false;
  private lastRunAt: string | null = null;
  private lastStats: ImportStats | null = null;

  constructor(
    private readonly db: ForumDatabase,
    private readonly store: KnowledgeVectorStore
  ) {}

  private async ingest(question: string, answer: string, options: AddToKnowledgeOptions): Promise<string> {
    const metadata: EntryMetadata = { ...(options.metadata ?? {}) };
    if (options.id) {
      metadata.question_id = options.id;
    }

    return this.store.upsert(formatKnowledgeContent(question, answer), metadata, options.id);
  }

  /**
   * Add one question/answer pair to the knowledge base.
   *
   * @returns the entry id, or null when the write failed (logged)
   */
  async addToKnowledgeBase(
    question: string,
    answer: string,
    options: AddToKnowledgeOptions = {}
  ): Promise<string | null> {
    try {
      const id = await this.ingest(question, answer, options);
      logger.debug(`Added Q&A to knowledge base: ${id}`);
      return id;
    } catch (error) {
      logger.error(`Failed to add Q&A to knowledge base: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Import every question in `status` that has answers.
   *
   * @example
   * const stats = await indexer.bulkImport({ dryRun: true });
   * console.log(`${stats.imported} pairs would be imported`);
   */
  async bulkImport(options: BulkImportOptions = {}): Promise<ImportStats> {
    const { status = 'Answered', answerPolicy = 'earliest', dryRun = false } = options;

    const stats: ImportStats = {
      totalQuestions: 0,
      questionsWithAnswers: 0,
      imported: 0,
      skipped: 0,
      errors: 0,
      errorDetails: [],
    };

    let questions: QuestionWithAnswers[];
    try {
      questions = getQuestionsWithAnswers(this.db, status);
    } catch (error) {
      logger.error(`Error during bulk import: ${errorMessage(error)}`);
      throw error;
    }
    stats.totalQuestions = questions.length;

    logger.info(`Bulk import started: ${questions.length} questions`, { status, answerPolicy, dryRun });

    for (const question of questions) {
      const answer = selectAnswer(question.answers, answerPolicy);
      if (!answer) {
        stats.skipped++;
        continue;
      }

      stats.questionsWithAnswers++;

      if (!question.message.trim() || !answer.message.trim()) {
        stats.skipped++;
        continue;
      }

      if (dryRun) {
        stats.imported++;
        continue;
      }

      try {
        await this.ingest(question.message, answer.message, {
          id: question.id,
          metadata: {
            question_id: question.id,
            answer_id: answer.id,
            user_id: question.userId,
            question_created_at: question.createdAt,
            answer_created_at: answer.createdAt,
            total_answers: question.answers.length,
            status: question.status,
          },
        });
        stats.imported++;
      } catch (error) {
        stats.errors++;
        stats.errorDetails.push({ questionId: question.id, error: errorMessage(error) });
        logger.error(`Error importing question ${question.id}: ${errorMessage(error)}`);
      }
    }

    logger.info(
      `Bulk import complete. Imported: ${stats.imported}, Skipped: ${stats.skipped}, Errors: ${stats.errors}`,
      { dryRun }
    );
    return stats;
  }

  /**
   * Run one import unless another is still in progress.
   *
   * @returns the stats, or null when a run was already active
   */
  async runOnce(options: BulkImportOptions = {}): Promise<ImportStats | null> {
    if (this.running) {
      logger.warn('Import already in progress, skipping');
      return null;
    }

    this.running = true;
    try {
      const stats = await this.bulkImport(options);
      this.lastRunAt = new Date().toISOString();
      this.lastStats = stats;
      return stats;
    } finally {
      this.running = false;
    }
  }

  /**
   * Schedule periodic imports with a cron expression.
   * Runs once immediately, then on schedule.
   */
  start(cronExpression: string, options: BulkImportOptions = {}): void {
    if (this.task) {
      logger.warn('Indexer already scheduled');
      return;
    }
    if (!cron.validate(cronExpression)) {
      throw new ConfigurationError(`Invalid indexer cron expression: ${cronExpression}`);
    }

    const run = () => {
      this.runOnce(options).catch((error: unknown) => {
        logger.error(`Scheduled import failed: ${errorMessage(error)}`);
      });
    };

    this.task = cron.schedule(cronExpression, run);
    run();
    logger.info(`Indexer scheduled: ${cronExpression}`);
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('Indexer stopped');
    }
  }

  getStatus(): IndexerStatus {
    return {
      scheduled: this.task !== null,
      running: this.running,
      lastRunAt: this.lastRunAt,
      lastStats: this.lastStats,
    };
  }
}
