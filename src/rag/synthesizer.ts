// Answer synthesis
/**
 * Answer Synthesizer
 *
 * Suggests an answer to a new forum question from previously answered
 * ones. This is the "generation" half of RAG:
 *
 *   question → vector search → context block → grounded prompt → LLM
 *
 * The suggestion is advisory. Every failure along the way (store down,
 * oracle down, empty reply) turns into an apology message instead of an
 * error, so question creation never fails because of it.
 *
 * CONFIDENCE:
 * -----------
 * Mean similarity of the retrieved entries, clamped to [0, 1]. No decay
 * for source age or count.
 */

import { createModuleLogger, errorMessage } from '../utils/logger.js';
import type { ChatOracle, ReasoningEffort } from '../llm/oracle.js';
import type { KnowledgeVectorStore, SearchResult } from './vectorstore.js';

const logger = createModuleLogger('synthesizer');

export const SYSTEM_PROMPT = `
You are an AI assistant for a Q&A forum system. Your task is to synthesize a coherent and helpful answer
based on the given question and relevant context retrieved from a knowledge database of previous questions and answers.

Guidelines:
1. Provide a clear and concise answer to the question.
2. Use only the information from the relevant context to support your answer.
3. The context is retrieved based on semantic similarity, so some information might be missing or irrelevant.
4. Be transparent when there is insufficient information to fully answer the question.
5. Do not make up or infer information not present in the provided context.
6. If you cannot answer the question based on the given context, clearly state that.
7. Maintain a helpful and professional tone appropriate for a forum discussion.
8. If the context contains similar questions and answers, synthesize the best answer from them.

Format your response as a natural, conversational answer that would be helpful to someone asking this question.
`.trim();

export const NO_CONTEXT_MESSAGE =
  "I don't have enough information in the knowledge base to answer this question accurately. " +
  'Please wait for community members to respond.';

export const SEARCH_ERROR_MESSAGE =
  'The AI assistant encountered an error while searching the knowledge base. ' +
  'Please wait for community members to respond.';

export const GENERATION_ERROR_MESSAGE =
  'I encountered an error while generating an answer. Please wait for community members to respond.';

const DEFAULT_PREVIEW_LENGTH = 200;

export interface SourceReference {
  id: string;
  content: string;
  similarity: number;
}

export type SuggestionErrorTag = 'search_error' | 'generation_error';

export interface RAGSuggestion {
  answer: string;
  contextUsed: boolean;
  confidence: number;
  sources: SourceReference[];
  error?: SuggestionErrorTag;
}

export interface SuggestionDiagnostic {
  stage: 'search' | 'generation';
  message: string;
  cause: unknown;
}

/**
 * Outcome of one suggestion attempt. `degraded` still carries a
 * user-facing suggestion (the apology) plus what went wrong.
 */
export type SuggestionResult =
  | { kind: 'ok'; suggestion: RAGSuggestion }
  | { kind: 'degraded'; suggestion: RAGSuggestion; diagnostic: SuggestionDiagnostic };

export interface GenerationSettings {
  temperature: number;
  maxCompletionTokens: number;
  topP: number;
  reasoningEffort?: ReasoningEffort;
}

export interface SynthesizerOptions {
  store: KnowledgeVectorStore;
  oracle: ChatOracle;
  generation: GenerationSettings;
  previewLength?: number;
  defaultLimit?: number;
  defaultThreshold?: number;
}

export interface GenerateOptions {
  limit?: number;
  similarityThreshold?: number;
}

/**
 * Label each retrieved entry with its position and relevance.
 *
 * @example
 * formatContext([{ id: 'a', content: 'Q: x\n\nA: y', metadata: {}, similarity: 0.876 }]);
 * // "--- Reference 1 (Relevance: 87.6%) ---\nQ: x\n\nA: y\n"
 */
export function formatContext(contexts: SearchResult[]): string {
  return contexts
    .map(
      (ctx, i) => `--- Reference ${i + 1} (Relevance: ${(ctx.similarity * 100).toFixed(1)}%) ---\n${ctx.content}\n`
    )
    .join('\n');
}

export function buildPrompt(question: string, context: string): string {
  return `You are a helpful assistant for a Q&A forum. Below is a user's question and relevant Q&A pairs from the knowledge base.

User's Question:
${question}

Relevant Q&A Pairs from Knowledge Base:
${context}

Instructions:
1. Analyze the user's question and the provided Q&A pairs
2. Synthesize a short, point-wise answer (bullet list), max 500-600 words total
3. Prefer concise bullets; if only one point, keep it as one short bullet
4. If context is partial, combine what is available; avoid speculation
5. If context is insufficient, say so clearly
6. Do not invent information not present in the provided context

Your Response:
Provide a short (<=500-600 words), bullet-point answer to the user's question based on the context above:`;
}

/**
 * Shorten content for source previews; longer text gets an ellipsis.
 */
export function previewContent(content: string, maxLength: number = DEFAULT_PREVIEW_LENGTH): string {
  return content.length > maxLength ? `${content.slice(0, maxLength)}...` : content;
}

export function computeConfidence(contexts: SearchResult[]): number {
  if (contexts.length === 0) return 0;
  const mean = contexts.reduce((sum, ctx) => sum + ctx.similarity, 0) / contexts.length;
  return Math.min(Math.max(mean, 0), 1);
}

function degraded(
  stage: SuggestionDiagnostic['stage'],
  answer: string,
  cause: unknown
): SuggestionResult {
  return {
    kind: 'degraded',
    suggestion: {
      answer,
      contextUsed: false,
      confidence: 0,
      sources: [],
      error: stage === 'search' ? 'search_error' : 'generation_error',
    },
    diagnostic: { stage, message: errorMessage(cause), cause },
  };
}

export class AnswerSynthesizer {
  private readonly store: KnowledgeVectorStore;
  private readonly oracle: ChatOracle;
  private readonly generation: GenerationSettings;
  private readonly previewLength: number;
  private readonly defaultLimit: number;
  private readonly defaultThreshold: number;

  constructor(options: SynthesizerOptions) {
    this.store = options.store;
    this.oracle = options.oracle;
    this.generation = options.generation;
    this.previewLength = options.previewLength ?? DEFAULT_PREVIEW_LENGTH;
    this.defaultLimit = options.defaultLimit ?? 3;
    this.defaultThreshold = options.defaultThreshold ?? 0.7;
  }

  /**
   * Retrieve context and ask the oracle for a grounded answer.
   * Never rejects; failures come back as `degraded`.
   */
  async suggest(question: string, options: GenerateOptions = {}): Promise<SuggestionResult> {
    const limit = options.limit ?? this.defaultLimit;
    const threshold = options.similarityThreshold ?? this.defaultThreshold;

    let contexts: SearchResult[];
    try {
      contexts = await this.store.search(question, { limit, threshold });
    } catch (error) {
      logger.error(`Error during vector search: ${errorMessage(error)}`);
      return degraded('search', SEARCH_ERROR_MESSAGE, error);
    }

    if (contexts.length === 0) {
      logger.debug('No knowledge entries above threshold', { threshold });
      return {
        kind: 'ok',
        suggestion: { answer: NO_CONTEXT_MESSAGE, contextUsed: false, confidence: 0, sources: [] },
      };
    }

    let answer: string;
    try {
      answer = await this.oracle.complete({
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildPrompt(question, formatContext(contexts)) },
        ],
        temperature: this.generation.temperature,
        maxCompletionTokens: this.generation.maxCompletionTokens,
        topP: this.generation.topP,
        reasoningEffort: this.generation.reasoningEffort,
      });
    } catch (error) {
      logger.error(`Error generating RAG answer: ${errorMessage(error)}`, { model: this.oracle.model });
      return degraded('generation', GENERATION_ERROR_MESSAGE, error);
    }

    const confidence = computeConfidence(contexts);
    logger.info(`Generated suggestion from ${contexts.length} sources`, { confidence });

    return {
      kind: 'ok',
      suggestion: {
        answer: answer.trim(),
        contextUsed: true,
        confidence,
        sources: contexts.map((ctx) => ({
          id: ctx.id,
          content: previewContent(ctx.content, this.previewLength),
          similarity: ctx.similarity,
        })),
      },
    };
  }

  /**
   * Plain suggestion for callers that do not need the diagnostic.
   *
   * @example
   * const suggestion = await synthesizer.generateAnswer('how do refunds work?', {
   *   limit: 3,
   *   similarityThreshold: 0.6,
   * });
   * if (suggestion.contextUsed) console.log(suggestion.sources.map((s) => s.id));
   */
  async generateAnswer(question: string, options: GenerateOptions = {}): Promise<RAGSuggestion> {
    const result = await this.suggest(question, options);
    return result.suggestion;
  }
}
