// Text embeddings
/**
 * Embeddings Module
 *
 * Turns question/answer text into fixed-length vectors so that similar
 * questions land near each other. "How do I get my money back?" and
 * "What is the refund process?" share almost no words but produce close
 * vectors.
 *
 * HOW IT WORKS:
 * -------------
 * 1. Normalize whitespace (newlines become spaces)
 * 2. Send the text to the embedding model
 * 3. Receive a vector of D floats (D fixed per deployment, e.g. 384)
 * 4. Compare vectors with cosine similarity
 *
 * MODEL LIFETIME:
 * ---------------
 * The model is loaded lazily on first use and shared by every caller of the
 * same Embedder. Concurrent first callers wait on the same load instead of
 * starting their own. After loading the model is only read from.
 */

import OpenAI from 'openai';
import type { CreateEmbeddingResponse } from 'openai/resources/embeddings';
import { createModuleLogger, errorMessage } from '../utils/logger.js';
import { EmptyInputError, OracleResponseError, OracleUnavailableError } from '../utils/errors.js';

const logger = createModuleLogger('embeddings');

// OpenAI allows up to 2048 inputs per request, but we stay conservative
const MAX_BATCH_SIZE = 100;

/**
 * A loaded embedding model.
 */
export interface EmbeddingModel {
  readonly name: string;
  readonly dimensions: number;
  /** One vector per input, in input order. */
  encode(texts: string[]): Promise<number[][]>;
}

export type EmbeddingModelLoader = () => Promise<EmbeddingModel>;

/**
 * Collapse whitespace runs (including newlines) to single spaces and trim.
 */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export class Embedder {
  private modelPromise: Promise<EmbeddingModel> | null = null;

  constructor(private readonly loader: EmbeddingModelLoader) {}

  /**
   * Resolve the shared model, loading it on first use.
   * A failed load is forgotten so the next call can try again.
   */
  private getModel(): Promise<EmbeddingModel> {
    if (!this.modelPromise) {
      logger.info('Loading embedding model');
      this.modelPromise = this.loader().then(
        (model) => {
          logger.info(`Embedding model ${model.name} loaded (${model.dimensions} dimensions)`);
          return model;
        },
        (error: unknown) => {
          this.modelPromise = null;
          logger.error(`Failed to load embedding model: ${errorMessage(error)}`);
          throw error;
        }
      );
    }
    return this.modelPromise;
  }

  async dimensions(): Promise<number> {
    const model = await this.getModel();
    return model.dimensions;
  }

  /**
   * Create an embedding for a single text string.
   *
   * @throws EmptyInputError when the text is blank after normalization
   *
   * @example
   * const vector = await embedder.embed('How do refunds work?');
   * vector.length; // 384
   */
  async embed(text: string): Promise<number[]> {
    const normalized = normalizeText(text);
    if (!normalized) {
      throw new EmptyInputError('Text cannot be empty');
    }

    const model = await this.getModel();
    const [embedding] = await model.encode([normalized]);
    if (!embedding) {
      throw new OracleResponseError('Embedding model returned no vector');
    }

    logger.debug(`Created embedding for text (${normalized.length} chars)`);
    return embedding;
  }

  /**
   * Create embeddings for several texts, batched.
   * Every text must be non-blank; results keep input order.
   */
  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const normalized = texts.map((text, index) => {
      const value = normalizeText(text);
      if (!value) {
        throw new EmptyInputError(`Text at position ${index} cannot be empty`);
      }
      return value;
    });

    const model = await this.getModel();
    const results: number[][] = [];

    for (let i = 0; i < normalized.length; i += MAX_BATCH_SIZE) {
      const batch = normalized.slice(i, i + MAX_BATCH_SIZE);
      const vectors = await model.encode(batch);
      if (vectors.length !== batch.length) {
        throw new OracleResponseError(
          `Embedding model returned ${vectors.length} vectors for ${batch.length} inputs`
        );
      }
      results.push(...vectors);
    }

    logger.debug(`Created ${results.length} embeddings`);
    return results;
  }
}

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model: string;
  dimensions: number;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Loader for OpenAI's embedding API. text-embedding-3 models accept a
 * `dimensions` parameter, so the vector size follows configuration.
 */
export function openAIEmbeddingLoader(options: OpenAIEmbeddingOptions): EmbeddingModelLoader {
  return async () => {
    const client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });

    return {
      name: options.model,
      dimensions: options.dimensions,
      async encode(texts: string[]): Promise<number[][]> {
        let response: CreateEmbeddingResponse;
        try {
          response = await client.embeddings.create({
            model: options.model,
            input: texts,
            dimensions: options.dimensions,
          });
        } catch (error) {
          throw new OracleUnavailableError(`Embedding failed: ${errorMessage(error)}`, { cause: error });
        }

        const vectors = [...response.data]
          .sort((a, b) => a.index - b.index)
          .map((item) => item.embedding);

        for (const vector of vectors) {
          if (vector.length !== options.dimensions) {
            throw new OracleResponseError(
              `Embedding has ${vector.length} dimensions, expected ${options.dimensions}`
            );
          }
        }
        return vectors;
      },
    };
  };
}

/**
 * Calculate cosine similarity between two vectors.
 *
 * 1.0 means same direction, 0.0 unrelated, -1.0 opposite (rare with text
 * embeddings). Zero vectors have similarity 0 with everything.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error('Vectors must have the same length');
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);

  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}
