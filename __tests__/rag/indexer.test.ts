import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Embedder } from '../../src/rag/embeddings.js';
import { KnowledgeVectorStore } from '../../src/rag/vectorstore.js';
import { KnowledgeIndexer, formatKnowledgeContent, selectAnswer } from '../../src/rag/indexer.js';
import {
  createAnswer,
  createQuestion,
  createUser,
  type Answer,
  type ForumDatabase,
  type Question,
} from '../../src/memory/database.js';
import { ConfigurationError } from '../../src/utils/errors.js';
import { createTestDatabase, vocabularyLoader } from '../helpers/fakes.js';

const ENTRY_ID = 'dddddddd-dddd-4ddd-8ddd-dddddddddddd';

describe('formatKnowledgeContent', () => {
  it('trims both parts', () => {
    expect(formatKnowledgeContent('  How?  ', '\nLike this.\n')).toBe('Q: How?\n\nA: Like this.');
  });
});

describe('selectAnswer', () => {
  const answer = (id: string, createdAt: string): Answer => ({
    id,
    questionId: 'q',
    message: id,
    userId: 'u',
    createdAt,
  });
  const answers = [
    answer('middle', '2024-01-02T00:00:00.000Z'),
    answer('first', '2024-01-01T00:00:00.000Z'),
    answer('last', '2024-01-03T00:00:00.000Z'),
  ];

  it('picks by creation time', () => {
    expect(selectAnswer(answers, 'earliest')?.id).toBe('first');
    expect(selectAnswer(answers, 'latest')?.id).toBe('last');
  });

  it('returns undefined without answers', () => {
    expect(selectAnswer([], 'earliest')).toBeUndefined();
  });
});

describe('KnowledgeIndexer', () => {
  let db: ForumDatabase;
  let store: KnowledgeVectorStore;
  let indexer: KnowledgeIndexer;
  let userId: string;

  function useEmbedder(failOn?: string): void {
    store = new KnowledgeVectorStore({
      db,
      embedder: new Embedder(vocabularyLoader({ dimensions: 256, failOn })),
      dimensions: 256,
    });
    indexer = new KnowledgeIndexer(db, store);
  }

  beforeEach(() => {
    db = createTestDatabase();
    userId = createUser(db, { username: 'alice', email: 'alice@example.com', passwordHash: 'test-hash' }).id;
    useEmbedder();
  });

  afterEach(() => {
    indexer.stop();
    if (db.open) db.close();
  });

  describe('addToKnowledgeBase', () => {
    it('stores the pair under the given id', async () => {
      const id = await indexer.addToKnowledgeBase('How do refunds work?', 'Within 30 days.', {
        id: ENTRY_ID,
        metadata: { source: 'live' },
      });

      const entry = await store.get(ENTRY_ID);
      expect(id).toBe(ENTRY_ID);
      expect(entry?.content).toBe('Q: How do refunds work?\n\nA: Within 30 days.');
      expect(entry?.metadata).toEqual({ source: 'live', question_id: ENTRY_ID });
    });

    it('generates an id when none is given', async () => {
      const id = await indexer.addToKnowledgeBase('How do refunds work?', 'Within 30 days.');

      expect(id).not.toBeNull();
      expect(await store.count()).toBe(1);
    });

    it('returns null when the write fails', async () => {
      const id = await indexer.addToKnowledgeBase('q', 'a', { id: 'not-a-uuid' });

      expect(id).toBeNull();
      expect(await store.count()).toBe(0);
    });
  });

  describe('bulkImport', () => {
    let refunds: Question;
    let shipping: Question;
    let firstRefundAnswer: Answer;
    let latestRefundAnswer: Answer;

    beforeEach(() => {
      refunds = createQuestion(db, {
        message: 'How do refunds work?',
        userId,
        status: 'Answered',
        createdAt: '2024-01-01T00:00:00.000Z',
      });
      latestRefundAnswer = createAnswer(db, {
        questionId: refunds.id,
        message: 'Within 14 days now.',
        userId,
        createdAt: '2024-01-03T00:00:00.000Z',
      });
      firstRefundAnswer = createAnswer(db, {
        questionId: refunds.id,
        message: 'Within 30 days.',
        userId,
        createdAt: '2024-01-02T00:00:00.000Z',
      });

      shipping = createQuestion(db, {
        message: 'Do you ship to Canada?',
        userId,
        status: 'Answered',
        createdAt: '2024-01-05T00:00:00.000Z',
      });
      createAnswer(db, { questionId: shipping.id, message: 'Yes, in 5 days.', userId });

      const pending = createQuestion(db, { message: 'Is there a student discount?', userId });
      createAnswer(db, { questionId: pending.id, message: 'Not yet.', userId });

      createQuestion(db, { message: 'Unanswered but closed?', userId, status: 'Answered' });
    });

    it('imports answered questions with their earliest answer', async () => {
      const stats = await indexer.bulkImport();

      expect(stats).toEqual({
        totalQuestions: 2,
        questionsWithAnswers: 2,
        imported: 2,
        skipped: 0,
        errors: 0,
        errorDetails: [],
      });

      const entry = await store.get(refunds.id);
      expect(entry?.content).toBe('Q: How do refunds work?\n\nA: Within 30 days.');
      expect(entry?.metadata).toEqual({
        question_id: refunds.id,
        answer_id: firstRefundAnswer.id,
        user_id: userId,
        question_created_at: '2024-01-01T00:00:00.000Z',
        answer_created_at: '2024-01-02T00:00:00.000Z',
        total_answers: 2,
        status: 'Answered',
      });
      expect(await store.exists(shipping.id)).toBe(true);
    });

    it('can pick the latest answer instead', async () => {
      await indexer.bulkImport({ answerPolicy: 'latest' });

      const entry = await store.get(refunds.id);
      expect(entry?.content).toBe('Q: How do refunds work?\n\nA: Within 14 days now.');
      expect(entry?.metadata.answer_id).toBe(latestRefundAnswer.id);
    });

    it('imports another status when asked', async () => {
      const stats = await indexer.bulkImport({ status: 'Pending' });

      expect(stats.totalQuestions).toBe(1);
      expect(stats.imported).toBe(1);
    });

    it('counts without writing on a dry run', async () => {
      const stats = await indexer.bulkImport({ dryRun: true });

      expect(stats.imported).toBe(2);
      expect(await store.count()).toBe(0);
    });

    it('replaces entries when run again', async () => {
      await indexer.bulkImport();
      await indexer.bulkImport();

      expect(await store.count()).toBe(2);
    });

    it('skips pairs with blank text', async () => {
      const blank = createQuestion(db, {
        message: 'What about gift cards?',
        userId,
        status: 'Answered',
        createdAt: '2024-01-06T00:00:00.000Z',
      });
      createAnswer(db, { questionId: blank.id, message: '   ', userId });

      const stats = await indexer.bulkImport();

      expect(stats).toMatchObject({ totalQuestions: 3, questionsWithAnswers: 3, imported: 2, skipped: 1 });
      expect(await store.exists(blank.id)).toBe(false);
    });

    it('records a failing pair and continues', async () => {
      useEmbedder('EXPLODE');
      const broken = createQuestion(db, {
        message: 'EXPLODE please',
        userId,
        status: 'Answered',
        createdAt: '2024-01-04T00:00:00.000Z',
      });
      createAnswer(db, { questionId: broken.id, message: 'No.', userId });

      const stats = await indexer.bulkImport();

      expect(stats.imported).toBe(2);
      expect(stats.errors).toBe(1);
      expect(stats.errorDetails).toEqual([
        { questionId: broken.id, error: 'cannot embed text containing EXPLODE' },
      ]);
      expect(await store.exists(shipping.id)).toBe(true);
    });
  });

  describe('scheduling', () => {
    beforeEach(() => {
      const question = createQuestion(db, { message: 'How do refunds work?', userId, status: 'Answered' });
      createAnswer(db, { questionId: question.id, message: 'Within 30 days.', userId });
    });

    it('skips a run while another is in progress', async () => {
      const [first, second] = await Promise.all([indexer.runOnce(), indexer.runOnce()]);

      expect(first?.imported).toBe(1);
      expect(second).toBeNull();

      const status = indexer.getStatus();
      expect(status.running).toBe(false);
      expect(status.lastStats).toEqual(first);
      expect(status.lastRunAt).not.toBeNull();
    });

    it('rejects an invalid cron expression', () => {
      expect(() => indexer.start('every hour')).toThrow(ConfigurationError);
      expect(indexer.getStatus().scheduled).toBe(false);
    });

    it('runs once on start and stops cleanly', async () => {
      indexer.start('0 * * * *');

      expect(indexer.getStatus().scheduled).toBe(true);
      await vi.waitFor(() => {
        expect(indexer.getStatus().lastStats?.imported).toBe(1);
      });

      indexer.stop();
      expect(indexer.getStatus().scheduled).toBe(false);
    });
  });
});
