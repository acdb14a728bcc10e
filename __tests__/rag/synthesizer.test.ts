import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Embedder } from '../../src/rag/embeddings.js';
import { KnowledgeVectorStore, type SearchResult } from '../../src/rag/vectorstore.js';
import {
  AnswerSynthesizer,
  GENERATION_ERROR_MESSAGE,
  NO_CONTEXT_MESSAGE,
  SEARCH_ERROR_MESSAGE,
  SYSTEM_PROMPT,
  computeConfidence,
  formatContext,
  previewContent,
  type GenerationSettings,
} from '../../src/rag/synthesizer.js';
import type { ForumDatabase } from '../../src/memory/database.js';
import { OracleUnavailableError } from '../../src/utils/errors.js';
import { FakeOracle, createTestDatabase, vocabularyLoader } from '../helpers/fakes.js';

const REFUNDS_ID = 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa';
const ORDERS_ID = 'bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb';
const PARCEL_ID = 'cccccccc-cccc-4ccc-8ccc-cccccccccccc';

const REFUNDS_CONTENT = 'Q: How do refunds work?\n\nA: Refunds work within 30 days.';
const ORDERS_CONTENT = 'Q: How do refunds work for orders?\n\nA: Refunds work in 30 days.';
const PARCEL_CONTENT = 'Q: Where is my parcel?\n\nA: Check the tracking page.';

// Bag-of-words similarity of each entry to "how do refunds work?"
const REFUNDS_SIMILARITY = 6 / (2 * Math.sqrt(15));
const ORDERS_SIMILARITY = 6 / (2 * Math.sqrt(17));

const generation: GenerationSettings = { temperature: 0.3, maxCompletionTokens: 1024, topP: 1 };

function result(content: string, similarity: number): SearchResult {
  return { id: REFUNDS_ID, content, metadata: {}, similarity };
}

describe('formatContext', () => {
  it('labels each reference with its position and relevance', () => {
    expect(formatContext([result('first', 0.9), result('second', 0.5)])).toBe(
      '--- Reference 1 (Relevance: 90.0%) ---\nfirst\n\n--- Reference 2 (Relevance: 50.0%) ---\nsecond\n'
    );
  });

  it('rounds relevance to one decimal', () => {
    expect(formatContext([result('Q: x\n\nA: y', 0.876)])).toBe(
      '--- Reference 1 (Relevance: 87.6%) ---\nQ: x\n\nA: y\n'
    );
  });
});

describe('previewContent', () => {
  it('leaves short content alone', () => {
    expect(previewContent('abc', 3)).toBe('abc');
  });

  it('cuts long content and appends an ellipsis', () => {
    expect(previewContent('abcdef', 3)).toBe('abc...');
  });

  it('defaults to 200 characters', () => {
    expect(previewContent('x'.repeat(201))).toBe(`${'x'.repeat(200)}...`);
  });
});

describe('computeConfidence', () => {
  it('is 0 without context', () => {
    expect(computeConfidence([])).toBe(0);
  });

  it('is the mean similarity', () => {
    expect(computeConfidence([result('a', 0.9), result('b', 0.5)])).toBeCloseTo(0.7, 10);
  });

  it('is clamped to [0, 1]', () => {
    expect(computeConfidence([result('a', -0.4)])).toBe(0);
    expect(computeConfidence([result('a', 1.2)])).toBe(1);
  });
});

describe('AnswerSynthesizer', () => {
  let db: ForumDatabase;
  let store: KnowledgeVectorStore;
  let oracle: FakeOracle;

  beforeEach(async () => {
    db = createTestDatabase();
    store = new KnowledgeVectorStore({
      db,
      embedder: new Embedder(vocabularyLoader({ dimensions: 256 })),
      dimensions: 256,
    });
    oracle = new FakeOracle(() => '  - Refunds are accepted within 30 days.  ');
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  async function seedRefunds(): Promise<void> {
    await store.upsert(REFUNDS_CONTENT, {}, REFUNDS_ID);
    await store.upsert(ORDERS_CONTENT, {}, ORDERS_ID);
    await store.upsert(PARCEL_CONTENT, {}, PARCEL_ID);
  }

  it('answers from the most similar stored pairs', async () => {
    await seedRefunds();
    const synthesizer = new AnswerSynthesizer({ store, oracle, generation });

    const suggestion = await synthesizer.generateAnswer('how do refunds work?', {
      limit: 3,
      similarityThreshold: 0.6,
    });

    expect(suggestion.answer).toBe('- Refunds are accepted within 30 days.');
    expect(suggestion.contextUsed).toBe(true);
    expect(suggestion.error).toBeUndefined();
    expect(suggestion.sources.map((s) => s.id)).toEqual([REFUNDS_ID, ORDERS_ID]);
    expect(suggestion.sources[0].similarity).toBeCloseTo(REFUNDS_SIMILARITY, 10);
    expect(suggestion.sources[1].content).toBe(ORDERS_CONTENT);
    expect(suggestion.confidence).toBeCloseTo((REFUNDS_SIMILARITY + ORDERS_SIMILARITY) / 2, 10);
  });

  it('sends the grounded prompt to the oracle', async () => {
    await seedRefunds();
    const synthesizer = new AnswerSynthesizer({
      store,
      oracle,
      generation: { ...generation, reasoningEffort: 'medium' },
    });

    await synthesizer.generateAnswer('how do refunds work?', { similarityThreshold: 0.6 });

    expect(oracle.calls).toHaveLength(1);
    const [request] = oracle.calls;
    expect(request.messages[0]).toEqual({ role: 'system', content: SYSTEM_PROMPT });
    expect(request.messages[1].role).toBe('user');
    expect(request.messages[1].content).toContain("User's Question:\nhow do refunds work?\n");
    expect(request.messages[1].content).toContain(
      `--- Reference 1 (Relevance: 77.5%) ---\n${REFUNDS_CONTENT}\n\n--- Reference 2 (Relevance: 72.8%) ---\n${ORDERS_CONTENT}\n`
    );
    expect(request).toMatchObject({
      temperature: 0.3,
      maxCompletionTokens: 1024,
      topP: 1,
      reasoningEffort: 'medium',
    });
  });

  it('applies the configured defaults', async () => {
    await seedRefunds();
    const synthesizer = new AnswerSynthesizer({ store, oracle, generation, defaultLimit: 1, defaultThreshold: 0.7 });

    const suggestion = await synthesizer.generateAnswer('how do refunds work?');

    expect(suggestion.sources.map((s) => s.id)).toEqual([REFUNDS_ID]);
  });

  it('shortens source previews', async () => {
    const content = `Q: refund question\n\nA: ${'refund '.repeat(60).trim()}`;
    const id = await store.upsert(content);
    const synthesizer = new AnswerSynthesizer({ store, oracle, generation, previewLength: 50 });

    const suggestion = await synthesizer.generateAnswer('refund', { similarityThreshold: 0.1 });

    expect(suggestion.sources).toEqual([
      { id, content: `${content.slice(0, 50)}...`, similarity: suggestion.sources[0].similarity },
    ]);
  });

  it('does not call the oracle without context', async () => {
    const synthesizer = new AnswerSynthesizer({ store, oracle, generation });

    const suggestion = await synthesizer.generateAnswer('how do refunds work?');

    expect(suggestion).toEqual({
      answer: NO_CONTEXT_MESSAGE,
      contextUsed: false,
      confidence: 0,
      sources: [],
    });
    expect(oracle.calls).toHaveLength(0);
  });

  it('degrades when generation fails', async () => {
    await seedRefunds();
    const failing = new FakeOracle(() => {
      throw new OracleUnavailableError('Chat completion failed: Request timed out.');
    });
    const synthesizer = new AnswerSynthesizer({ store, oracle: failing, generation });

    const outcome = await synthesizer.suggest('how do refunds work?', { similarityThreshold: 0.6 });

    expect(outcome.kind).toBe('degraded');
    expect(outcome.suggestion).toEqual({
      answer: GENERATION_ERROR_MESSAGE,
      contextUsed: false,
      confidence: 0,
      sources: [],
      error: 'generation_error',
    });
    if (outcome.kind === 'degraded') {
      expect(outcome.diagnostic.stage).toBe('generation');
      expect(outcome.diagnostic.message).toBe('Chat completion failed: Request timed out.');
    }
  });

  it('degrades when the store is unavailable', async () => {
    await seedRefunds();
    db.close();
    const synthesizer = new AnswerSynthesizer({ store, oracle, generation });

    const suggestion = await synthesizer.generateAnswer('how do refunds work?');

    expect(suggestion).toEqual({
      answer: SEARCH_ERROR_MESSAGE,
      contextUsed: false,
      confidence: 0,
      sources: [],
      error: 'search_error',
    });
    expect(oracle.calls).toHaveLength(0);
  });

  it('treats a blank question as a search failure', async () => {
    const synthesizer = new AnswerSynthesizer({ store, oracle, generation });

    const suggestion = await synthesizer.generateAnswer('   ');

    expect(suggestion.error).toBe('search_error');
  });
});
