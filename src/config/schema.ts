import { z } from 'zod';

// Configuration schema with validation
export const ConfigSchema = z.object({
  // Chat oracle (generation + moderation), any OpenAI-compatible endpoint
  llm: z.object({
    apiKey: z.string().min(1, 'LLM_API_KEY is required'),
    baseUrl: z.string().url().default('https://api.groq.com/openai/v1'),
    model: z.string().default('llama-3.3-70b-versatile'),
    temperature: z.number().min(0).max(2).default(0.3),
    maxCompletionTokens: z.number().int().positive().default(1024),
    topP: z.number().gt(0).max(1).default(1),
    reasoningEffort: z.enum(['low', 'medium', 'high']).optional(),
    timeoutMs: z.number().int().positive().default(30000),
  }),

  // Embedding oracle
  embeddings: z.object({
    apiKey: z.string().min(1, 'OPENAI_API_KEY is required'),
    model: z.string().default('text-embedding-3-small'),
    dimensions: z.number().int().positive().default(384),
  }),

  // Knowledge base / RAG
  rag: z.object({
    enabled: z.boolean().default(true),
    tableName: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'RAG_TABLE_NAME must be a plain SQL identifier')
      .default('knowledge_entries'),
    searchLimit: z.number().int().positive().default(3),
    similarityThreshold: z.number().min(-1).max(1).default(0.7),
    previewLength: z.number().int().positive().default(200),
  }),

  moderation: z.object({
    enabled: z.boolean().default(true),
  }),

  // Periodic re-import of answered questions
  indexer: z.object({
    enabled: z.boolean().default(false),
    cron: z.string().default('0 * * * *'),
    answerPolicy: z.enum(['earliest', 'latest']).default('earliest'),
  }),

  app: z.object({
    logLevel: z.enum(['critical', 'error', 'warn', 'info', 'debug']).default('info'),
    databasePath: z.string().default('./data/forum.db'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return value !== 'false';
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Map environment variables onto the shape of {@link ConfigSchema}.
 * Unset variables stay undefined so schema defaults apply.
 */
export function buildRawConfig(env: Env) {
  return {
    llm: {
      apiKey: env.LLM_API_KEY || env.GROQ_API_KEY || '',
      baseUrl: emptyToUndefined(env.LLM_BASE_URL),
      model: emptyToUndefined(env.LLM_MODEL),
      temperature: parseNumber(env.LLM_TEMPERATURE),
      maxCompletionTokens: parseNumber(env.LLM_MAX_COMPLETION_TOKENS),
      topP: parseNumber(env.LLM_TOP_P),
      reasoningEffort: emptyToUndefined(env.LLM_REASONING_EFFORT),
      timeoutMs: parseNumber(env.LLM_TIMEOUT_MS),
    },
    embeddings: {
      apiKey: env.OPENAI_API_KEY || '',
      model: emptyToUndefined(env.EMBEDDING_MODEL),
      dimensions: parseNumber(env.EMBEDDING_DIMENSIONS),
    },
    rag: {
      enabled: parseFlag(env.RAG_ENABLED, true),
      tableName: emptyToUndefined(env.RAG_TABLE_NAME),
      searchLimit: parseNumber(env.RAG_SEARCH_LIMIT),
      similarityThreshold: parseNumber(env.RAG_SIMILARITY_THRESHOLD),
      previewLength: parseNumber(env.RAG_PREVIEW_LENGTH),
    },
    moderation: {
      enabled: parseFlag(env.MODERATION_ENABLED, true),
    },
    indexer: {
      enabled: parseFlag(env.INDEXER_ENABLED, false),
      cron: emptyToUndefined(env.INDEXER_CRON),
      answerPolicy: emptyToUndefined(env.INDEXER_ANSWER_POLICY),
    },
    app: {
      logLevel: emptyToUndefined(env.LOG_LEVEL),
      databasePath: emptyToUndefined(env.DATABASE_PATH),
    },
  };
}

export type ConfigResult =
  | { success: true; config: Config }
  | { success: false; issues: string[] };

/**
 * Validate configuration from an environment map without side effects.
 */
export function parseConfig(env: Env): ConfigResult {
  const result = ConfigSchema.safeParse(buildRawConfig(env));

  if (!result.success) {
    return {
      success: false,
      issues: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
    };
  }

  return { success: true, config: result.data };
}
