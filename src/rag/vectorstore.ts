// Knowledge collection on SQLite
/**
 * Vector Store Module
 *
 * Persists the knowledge base: one row per question/answer pair with its
 * text, metadata and embedding. Rows live in a single SQLite table next to
 * the forum tables, so ingestion shares the connection the rest of the app
 * already holds.
 *
 * DATA MODEL:
 * -----------
 * - id:         UUID (the source question id when ingested from the forum)
 * - content:    "Q: <question>\n\nA: <answer>"
 * - metadata:   flat JSON object of scalars, filterable by exact match
 * - embedding:  JSON array of D floats, D fixed when the collection is created
 * - created_at: reset on every upsert (no history is kept)
 *
 * SEARCH:
 * -------
 * Brute-force cosine similarity over every stored row. Fine for a forum
 * knowledge base (tens of thousands of rows); the collection is the only
 * one this store manages.
 *
 * ATOMICITY:
 * ----------
 * better-sqlite3 is synchronous and each upsert is a single statement, so a
 * reader never sees content without its embedding. The embedding is computed
 * before the write starts; nothing is locked while the oracle is called.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { ForumDatabase } from '../memory/database.js';
import { createModuleLogger, errorMessage } from '../utils/logger.js';
import {
  ConfigurationError,
  ForumCoreError,
  InvalidArgumentError,
  InvalidIdentifierError,
  StoreUnavailableError,
} from '../utils/errors.js';
import { cosineSimilarity, type Embedder } from './embeddings.js';

const logger = createModuleLogger('vectorstore');

const DEFAULT_TABLE_NAME = 'knowledge_entries';
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type MetadataValue = string | number | boolean | null;

/**
 * Metadata stored alongside each entry, e.g. question_id, answer_id,
 * timestamps. Searches and deletes can filter on any key.
 */
export type EntryMetadata = Record<string, MetadataValue>;

export interface KnowledgeEntry {
  id: string;
  content: string;
  embedding: number[];
  metadata: EntryMetadata;
  createdAt: string;
}

/**
 * Search result with similarity score.
 */
export interface SearchResult {
  id: string;
  content: string;
  metadata: EntryMetadata;
  similarity: number;
}

export interface SearchOptions {
  limit?: number;
  /** Inclusive lower bound on similarity. */
  threshold?: number;
  metadataFilter?: EntryMetadata;
}

/**
 * Exactly one of the three selectors must be set.
 */
export interface DeleteSelector {
  id?: string;
  metadataFilter?: EntryMetadata;
  deleteAll?: boolean;
}

export interface VectorStoreOptions {
  db: ForumDatabase;
  embedder: Embedder;
  dimensions: number;
  tableName?: string;
}

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));
const EmbeddingSchema = z.array(z.number());

interface EntryRow {
  id: string;
  content: string;
  metadata: string;
  embedding: string;
  created_at: string;
}

export function isValidId(value: string): boolean {
  return UUID_PATTERN.test(value);
}

/**
 * Exact match on every filter key, compared as strings. A null on either
 * side never matches.
 */
function matchesFilter(metadata: EntryMetadata, filter: EntryMetadata | undefined): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, expected]) => {
    const actual = metadata[key];
    return expected !== null && actual !== undefined && actual !== null && String(actual) === String(expected);
  });
}

function hasFilter(filter: EntryMetadata | undefined): filter is EntryMetadata {
  return filter !== undefined && Object.keys(filter).length > 0;
}

export class KnowledgeVectorStore {
  private readonly db: ForumDatabase;
  private readonly embedder: Embedder;
  private readonly dimensions: number;
  private readonly tableName: string;
  private initialized = false;

  constructor(options: VectorStoreOptions) {
    const tableName = options.tableName ?? DEFAULT_TABLE_NAME;
    if (!IDENTIFIER_PATTERN.test(tableName)) {
      throw new ConfigurationError(`Invalid collection table name: ${tableName}`);
    }
    if (!Number.isInteger(options.dimensions) || options.dimensions <= 0) {
      throw new ConfigurationError(`Invalid embedding dimensions: ${options.dimensions}`);
    }

    this.db = options.db;
    this.embedder = options.embedder;
    this.dimensions = options.dimensions;
    this.tableName = tableName;
  }

  get collection(): string {
    return this.tableName;
  }

  /**
   * Run a storage operation, translating backend failures into
   * StoreUnavailableError. Errors from this module pass through unchanged.
   */
  private withStore<T>(operation: string, fn: () => T): T {
    if (!this.db.open) {
      throw new StoreUnavailableError(`Cannot ${operation}: database connection is closed`);
    }
    try {
      return fn();
    } catch (error) {
      if (error instanceof ForumCoreError) throw error;
      logger.error(`Failed to ${operation}: ${errorMessage(error)}`, { table: this.tableName });
      throw new StoreUnavailableError(`Failed to ${operation}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Create the collection table, its index and the collection record.
   * Calling it again is a no-op. A collection created earlier with a
   * different dimensionality is a configuration error.
   */
  ensureCollection(): void {
    if (this.initialized) return;

    this.withStore('initialize collection', () => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS vector_collections (
          name TEXT PRIMARY KEY,
          dimensions INTEGER NOT NULL,
          created_at TEXT NOT NULL
        )
      `);

      this.db.exec(`
        CREATE TABLE IF NOT EXISTS ${this.tableName} (
          id TEXT PRIMARY KEY,
          content TEXT NOT NULL,
          metadata TEXT NOT NULL DEFAULT '{}',
          embedding TEXT NOT NULL,
          created_at TEXT NOT NULL
        )
      `);

      this.db.exec(`
        CREATE INDEX IF NOT EXISTS ${this.tableName}_created_idx ON ${this.tableName}(created_at)
      `);

      this.db.prepare(`
        INSERT OR IGNORE INTO vector_collections (name, dimensions, created_at) VALUES (?, ?, ?)
      `).run(this.tableName, this.dimensions, new Date().toISOString());

      const row = this.db.prepare(`
        SELECT dimensions FROM vector_collections WHERE name = ?
      `).get(this.tableName) as { dimensions: number } | undefined;

      if (row && row.dimensions !== this.dimensions) {
        throw new ConfigurationError(
          `Collection ${this.tableName} stores ${row.dimensions}-dimensional embeddings, ` +
            `but ${this.dimensions} are configured`
        );
      }
    });

    this.initialized = true;
    logger.info(`Collection ${this.tableName} ready (${this.dimensions} dimensions)`);
  }

  /**
   * Insert or fully replace an entry. The embedding is computed from
   * `content`; an existing row with the same id is overwritten, including
   * its timestamp.
   *
   * @returns the id written
   * @throws InvalidIdentifierError when `id` is not a UUID
   * @throws ConfigurationError when the embedding size differs from the collection's
   */
  async upsert(content: string, metadata: EntryMetadata = {}, id?: string): Promise<string> {
    if (id !== undefined && !isValidId(id)) {
      throw new InvalidIdentifierError(id);
    }
    this.ensureCollection();

    const embedding = await this.embedder.embed(content);
    if (embedding.length !== this.dimensions) {
      throw new ConfigurationError(
        `Embedding dimension mismatch: model produced ${embedding.length}, ` +
          `collection ${this.tableName} expects ${this.dimensions}`
      );
    }

    const recordId = id ?? randomUUID();

    this.withStore('upsert entry', () => {
      this.db.prepare(`
        INSERT INTO ${this.tableName} (id, content, metadata, embedding, created_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          content = excluded.content,
          metadata = excluded.metadata,
          embedding = excluded.embedding,
          created_at = excluded.created_at
      `).run(recordId, content, JSON.stringify(metadata), JSON.stringify(embedding), new Date().toISOString());
    });

    logger.debug(`Upserted entry ${recordId}`);
    return recordId;
  }

  private loadEntries(): KnowledgeEntry[] {
    return this.withStore('read entries', () => {
      const rows = this.db.prepare(`
        SELECT id, content, metadata, embedding, created_at FROM ${this.tableName} ORDER BY rowid
      `).all() as EntryRow[];
      return rows.map((row) => this.toEntry(row));
    });
  }

  private toEntry(row: EntryRow): KnowledgeEntry {
    return {
      id: row.id,
      content: row.content,
      metadata: MetadataSchema.parse(JSON.parse(row.metadata)),
      embedding: EmbeddingSchema.parse(JSON.parse(row.embedding)),
      createdAt: row.created_at,
    };
  }

  /**
   * Find entries similar to a query text.
   *
   * Keeps entries with similarity >= threshold that match every key of the
   * metadata filter, sorted by descending similarity, at most `limit`.
   * Returns an empty array when nothing qualifies.
   *
   * @example
   * const hits = await store.search('how do refunds work?', { limit: 3, threshold: 0.6 });
   */
  async search(queryText: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    const { limit = 5, threshold = 0.7, metadataFilter } = options;

    if (!Number.isInteger(limit) || limit <= 0) {
      throw new InvalidArgumentError(`limit must be a positive integer, got ${limit}`);
    }
    if (!Number.isFinite(threshold)) {
      throw new InvalidArgumentError(`threshold must be a finite number, got ${threshold}`);
    }
    this.ensureCollection();

    const queryEmbedding = await this.embedder.embed(queryText);
    if (queryEmbedding.length !== this.dimensions) {
      throw new ConfigurationError(
        `Query embedding has ${queryEmbedding.length} dimensions, ` +
          `collection ${this.tableName} expects ${this.dimensions}`
      );
    }
    const entries = this.loadEntries();

    const results: SearchResult[] = [];
    for (const entry of entries) {
      if (!matchesFilter(entry.metadata, metadataFilter)) continue;

      const similarity = cosineSimilarity(queryEmbedding, entry.embedding);
      if (similarity < threshold) continue;

      results.push({
        id: entry.id,
        content: entry.content,
        metadata: entry.metadata,
        similarity,
      });
    }

    // Array.prototype.sort is stable, so ties keep insertion order
    results.sort((a, b) => b.similarity - a.similarity);
    const top = results.slice(0, limit);

    logger.debug(`Search returned ${top.length} of ${results.length} matches`, { threshold });
    return top;
  }

  /**
   * Delete entries by id, by metadata filter, or all of them.
   *
   * @returns number of rows removed
   * @throws InvalidArgumentError unless exactly one selector is given
   */
  async delete(selector: DeleteSelector): Promise<number> {
    const { id, metadataFilter, deleteAll } = selector;
    const chosen = [Boolean(id), hasFilter(metadataFilter), deleteAll === true].filter(Boolean).length;

    if (chosen !== 1) {
      throw new InvalidArgumentError('Provide exactly one of: id, metadataFilter, or deleteAll');
    }
    this.ensureCollection();

    let removed: number;

    if (deleteAll === true) {
      removed = this.withStore('delete all entries', () =>
        this.db.prepare(`DELETE FROM ${this.tableName}`).run().changes
      );
      logger.warn(`Cleared all ${removed} entries from ${this.tableName}`);
      return removed;
    }

    if (id) {
      if (!isValidId(id)) {
        throw new InvalidIdentifierError(id);
      }
      removed = this.withStore('delete entry', () =>
        this.db.prepare(`DELETE FROM ${this.tableName} WHERE id = ?`).run(id).changes
      );
    } else {
      removed = this.withStore('delete entries', () => {
        const selectAll = this.db.prepare(`SELECT id, metadata FROM ${this.tableName}`);
        const deleteById = this.db.prepare(`DELETE FROM ${this.tableName} WHERE id = ?`);

        return this.db.transaction(() => {
          const rows = selectAll.all() as Array<Pick<EntryRow, 'id' | 'metadata'>>;
          return rows
            .filter((row) => matchesFilter(MetadataSchema.parse(JSON.parse(row.metadata)), metadataFilter))
            .reduce((total, row) => total + deleteById.run(row.id).changes, 0);
        })();
      });
    }

    logger.info(`Deleted ${removed} entries from ${this.tableName}`);
    return removed;
  }

  /**
   * Get the total number of entries in the collection.
   */
  async count(): Promise<number> {
    this.ensureCollection();
    const row = this.withStore('count entries', () =>
      this.db.prepare(`SELECT COUNT(*) AS total FROM ${this.tableName}`).get() as { total: number }
    );
    return row.total;
  }

  /**
   * Get an entry by id, or null when it does not exist.
   */
  async get(id: string): Promise<KnowledgeEntry | null> {
    if (!isValidId(id)) {
      throw new InvalidIdentifierError(id);
    }
    this.ensureCollection();

    return this.withStore('read entry', () => {
      const row = this.db.prepare(`
        SELECT id, content, metadata, embedding, created_at FROM ${this.tableName} WHERE id = ?
      `).get(id) as EntryRow | undefined;
      return row ? this.toEntry(row) : null;
    });
  }

  /**
   * Check if an entry exists in the collection.
   */
  async exists(id: string): Promise<boolean> {
    return (await this.get(id)) !== null;
  }
}
