/**
 * Chat Oracle
 *
 * The generation and classification models are black boxes reached through
 * an OpenAI-compatible chat-completions endpoint. Groq, OpenAI and most
 * self-hosted servers speak this protocol, so a single client covers them
 * by switching the base URL.
 *
 * CALL CONTRACT:
 * --------------
 * request  = model, ordered messages, temperature, max output tokens,
 *            top-p, optional reasoning-effort hint
 * response = one text completion (non-streaming)
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { createModuleLogger, errorMessage } from '../utils/logger.js';
import { OracleResponseError, OracleUnavailableError } from '../utils/errors.js';

const logger = createModuleLogger('oracle');

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export type ReasoningEffort = 'low' | 'medium' | 'high';

export interface ChatRequest {
  messages: ChatMessage[];
  temperature: number;
  maxCompletionTokens: number;
  topP: number;
  reasoningEffort?: ReasoningEffort;
}

/**
 * Anything that turns a chat request into a single completion.
 * Implementations throw OracleUnavailableError when the service cannot be
 * reached and OracleResponseError when the reply carries no text.
 */
export interface ChatOracle {
  readonly model: string;
  complete(request: ChatRequest): Promise<string>;
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export interface OpenAIChatOracleOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export class OpenAIChatOracle implements ChatOracle {
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIChatOracleOptions) {
    this.model = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      // Retry policy belongs to the callers
      maxRetries: 0,
    });
  }

  async complete(request: ChatRequest): Promise<string> {
    const params: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: request.messages.map(toMessageParam),
      temperature: request.temperature,
      max_completion_tokens: request.maxCompletionTokens,
      top_p: request.topP,
      stream: false,
    };

    if (request.reasoningEffort) {
      params.reasoning_effort = request.reasoningEffort;
    }

    let completion: ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(params);
    } catch (error) {
      logger.error(`Chat completion failed: ${errorMessage(error)}`, { model: this.model });
      throw new OracleUnavailableError(`Chat completion failed: ${errorMessage(error)}`, { cause: error });
    }

    const content = completion.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new OracleResponseError('Chat completion returned no content');
    }

    logger.debug(`Completion received (${content.length} chars)`, { model: this.model });
    return content;
  }
}
