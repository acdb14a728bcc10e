import { describe, it, expect, vi, beforeEach } from 'vitest';

const sdk = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('openai', () => ({
  default: class {
    embeddings = { create: sdk.create };
  },
}));

import { Embedder, openAIEmbeddingLoader } from '../../src/rag/embeddings.js';
import { OracleResponseError, OracleUnavailableError } from '../../src/utils/errors.js';

const options = { apiKey: 'test-key', model: 'text-embedding-3-small', dimensions: 3 };

describe('openAIEmbeddingLoader', () => {
  beforeEach(() => {
    sdk.create.mockReset();
  });

  it('requests the configured dimensions and restores input order', async () => {
    sdk.create.mockResolvedValue({
      data: [
        { index: 1, embedding: [0, 1, 0] },
        { index: 0, embedding: [1, 0, 0] },
      ],
    });
    const model = await openAIEmbeddingLoader(options)();

    const vectors = await model.encode(['first', 'second']);

    expect(vectors).toEqual([
      [1, 0, 0],
      [0, 1, 0],
    ]);
    expect(sdk.create).toHaveBeenCalledWith({
      model: 'text-embedding-3-small',
      input: ['first', 'second'],
      dimensions: 3,
    });
    expect(model.dimensions).toBe(3);
  });

  it('sends normalized text through the embedder', async () => {
    sdk.create.mockResolvedValue({ data: [{ index: 0, embedding: [0.5, 0.5, 0] }] });
    const embedder = new Embedder(openAIEmbeddingLoader(options));

    await embedder.embed('How do\nrefunds   work?');

    expect(sdk.create.mock.calls[0][0]).toMatchObject({ input: ['How do refunds work?'] });
  });

  it('wraps request failures', async () => {
    sdk.create.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const model = await openAIEmbeddingLoader(options)();

    await expect(model.encode(['text'])).rejects.toBeInstanceOf(OracleUnavailableError);
  });

  it('rejects vectors of the wrong size', async () => {
    sdk.create.mockResolvedValue({ data: [{ index: 0, embedding: [1, 0] }] });
    const model = await openAIEmbeddingLoader(options)();

    await expect(model.encode(['text'])).rejects.toThrow(
      new OracleResponseError('Embedding has 2 dimensions, expected 3')
    );
  });
});
