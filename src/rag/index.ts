/**
 * RAG Module Index
 *
 * QUICK START:
 * ------------
 *
 * 1. Build the store around a shared embedder:
 *    ```typescript
 *    const embedder = new Embedder(openAIEmbeddingLoader({ apiKey, model, dimensions: 384 }));
 *    const store = new KnowledgeVectorStore({ db, embedder, dimensions: 384 });
 *    store.ensureCollection();
 *    ```
 *
 * 2. Ingest answered questions:
 *    ```typescript
 *    const indexer = new KnowledgeIndexer(db, store);
 *    await indexer.addToKnowledgeBase(question, answer, { id: questionId });
 *    ```
 *
 * 3. Suggest an answer:
 *    ```typescript
 *    const synthesizer = new AnswerSynthesizer({ store, oracle, generation });
 *    const suggestion = await synthesizer.generateAnswer('how do refunds work?');
 *    ```
 */

// Embeddings - Convert text to vectors
export {
  Embedder,
  openAIEmbeddingLoader,
  cosineSimilarity,
  normalizeText,
  type EmbeddingModel,
  type EmbeddingModelLoader,
  type OpenAIEmbeddingOptions,
} from './embeddings.js';

// Vector Store - Store and search vectors
export {
  KnowledgeVectorStore,
  isValidId,
  type KnowledgeEntry,
  type EntryMetadata,
  type MetadataValue,
  type SearchResult,
  type SearchOptions,
  type DeleteSelector,
  type VectorStoreOptions,
} from './vectorstore.js';

// Synthesizer - Grounded answer suggestions
export {
  AnswerSynthesizer,
  buildPrompt,
  formatContext,
  previewContent,
  computeConfidence,
  type RAGSuggestion,
  type SourceReference,
  type SuggestionResult,
  type GenerateOptions,
  type GenerationSettings,
} from './synthesizer.js';

// Indexer - Knowledge ingestion
export {
  KnowledgeIndexer,
  formatKnowledgeContent,
  selectAnswer,
  type AnswerPolicy,
  type BulkImportOptions,
  type ImportStats,
  type IndexerStatus,
} from './indexer.js';
