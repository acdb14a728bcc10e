/**
 * Service wiring
 *
 * Builds every component once, from configuration, around a single
 * database handle. The embedder (and its model) is shared by the vector
 * store and everything above it.
 */

import type { Config } from './config/schema.js';
import { closeDatabase, initSchema, openDatabase, type ForumDatabase } from './memory/database.js';
import { OpenAIChatOracle, type ChatOracle } from './llm/oracle.js';
import {
  AnswerSynthesizer,
  Embedder,
  KnowledgeIndexer,
  KnowledgeVectorStore,
  openAIEmbeddingLoader,
  type EmbeddingModelLoader,
} from './rag/index.js';
import { ModerationClassifier } from './moderation/classifier.js';
import { ForumEventBus } from './forum/events.js';
import { ForumService } from './forum/submissions.js';

export interface Services {
  db: ForumDatabase;
  embedder: Embedder;
  store: KnowledgeVectorStore;
  synthesizer: AnswerSynthesizer;
  classifier: ModerationClassifier;
  indexer: KnowledgeIndexer;
  events: ForumEventBus;
  forum: ForumService;
  /** Stop scheduled work and close the database. */
  cleanup(): void;
}

export interface BuildServicesOverrides {
  db?: ForumDatabase;
  oracle?: ChatOracle;
  embeddingLoader?: EmbeddingModelLoader;
}

export function buildServices(config: Config, overrides: BuildServicesOverrides = {}): Services {
  const db = overrides.db ?? openDatabase(config.app.databasePath);
  initSchema(db);

  const oracle =
    overrides.oracle ??
    new OpenAIChatOracle({
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      baseUrl: config.llm.baseUrl,
      timeoutMs: config.llm.timeoutMs,
    });

  const embedder = new Embedder(
    overrides.embeddingLoader ??
      openAIEmbeddingLoader({
        apiKey: config.embeddings.apiKey,
        model: config.embeddings.model,
        dimensions: config.embeddings.dimensions,
        timeoutMs: config.llm.timeoutMs,
      })
  );

  const store = new KnowledgeVectorStore({
    db,
    embedder,
    dimensions: config.embeddings.dimensions,
    tableName: config.rag.tableName,
  });

  const synthesizer = new AnswerSynthesizer({
    store,
    oracle,
    generation: {
      temperature: config.llm.temperature,
      maxCompletionTokens: config.llm.maxCompletionTokens,
      topP: config.llm.topP,
      reasoningEffort: config.llm.reasoningEffort,
    },
    previewLength: config.rag.previewLength,
    defaultLimit: config.rag.searchLimit,
    defaultThreshold: config.rag.similarityThreshold,
  });

  const classifier = new ModerationClassifier(oracle);
  const indexer = new KnowledgeIndexer(db, store);
  const events = new ForumEventBus();

  const forum = new ForumService({
    db,
    events,
    classifier: config.moderation.enabled ? classifier : null,
    synthesizer: config.rag.enabled ? synthesizer : null,
    indexer: config.rag.enabled ? indexer : null,
  });

  return {
    db,
    embedder,
    store,
    synthesizer,
    classifier,
    indexer,
    events,
    forum,
    cleanup() {
      indexer.stop();
      closeDatabase(db);
    },
  };
}
