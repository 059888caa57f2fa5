import { z } from 'zod';

/**
 * Typed view over process.env.
 *
 * dotenv is loaded by the entry point (src/cli.ts) before loadConfig() runs;
 * this module only parses and range-checks what is already in the environment.
 */

const TRACING_MODES = ['console', 'disabled'] as const;
export type TracingMode = (typeof TRACING_MODES)[number];

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const intInRange = (min: number, max: number, fallback: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  TRACING_MODE: z.enum(TRACING_MODES).optional(),

  OPENAI_API_KEY: optionalString,
  NEO4J_URI: optionalString,
  NEO4J_USERNAME: optionalString,
  NEO4J_PASSWORD: optionalString,
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,

  CHAT_MODEL: z.string().default('gpt-4o-mini'),
  EXTRACTION_MODEL: z.string().default('gpt-4o-mini'),
  SUMMARY_MODEL: z.string().default('gpt-4o-mini'),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),

  RETRIEVAL_TOP_K: intInRange(1, 20, 3),
  CONTEXT_MAX_TOKENS: intInRange(50, 8000, 600),
  REPLY_MAX_WORDS: intInRange(10, 200, 50),
  REPLY_MAX_OUTPUT_TOKENS: intInRange(20, 1000, 100),
  EMBEDDING_TIMEOUT_MS: intInRange(100, 60000, 4000),
  EXTRACTION_TIMEOUT_MS: intInRange(100, 60000, 8000),
  GRAPH_TIMEOUT_MS: intInRange(100, 60000, 3000),
  GENERATION_TIMEOUT_MS: intInRange(100, 120000, 15000),
  GENTLE_INTENSITY_THRESHOLD: intInRange(1, 5, 4),
  SELF_AWARENESS_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  GRAPH_DEPTH: intInRange(1, 3, 1),
  GRAPH_MAX_ENTITIES: intInRange(1, 10, 3),
  HISTORY_WINDOW: intInRange(0, 50, 10),
  CHUNK_MAX_TOKENS: intInRange(20, 2000, 200),
});

/**
 * Tuning knobs consumed by the pipeline. Tests construct this directly.
 */
export interface PipelineSettings {
  retrievalTopK: number;
  contextMaxTokens: number;
  replyMaxWords: number;
  replyMaxOutputTokens: number;
  timeouts: {
    embeddingMs: number;
    extractionMs: number;
    graphMs: number;
    generationMs: number;
  };
  gentleIntensityThreshold: number;
  selfAwarenessThreshold: number;
  graphDepth: number;
  graphMaxEntities: number;
  historyWindow: number;
  chunkMaxTokens: number;
}

export interface AppConfig {
  nodeEnv: string;
  tracingMode: TracingMode;
  openaiApiKey?: string;
  neo4j?: { uri: string; username: string; password: string };
  supabase?: { url: string; serviceRoleKey: string };
  models: {
    chat: string;
    extraction: string;
    summary: string;
    embedding: string;
  };
  pipeline: PipelineSettings;
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  retrievalTopK: 3,
  contextMaxTokens: 600,
  replyMaxWords: 50,
  replyMaxOutputTokens: 100,
  timeouts: {
    embeddingMs: 4000,
    extractionMs: 8000,
    graphMs: 3000,
    generationMs: 15000,
  },
  gentleIntensityThreshold: 4,
  selfAwarenessThreshold: 0.7,
  graphDepth: 1,
  graphMaxEntities: 3,
  historyWindow: 10,
  chunkMaxTokens: 200,
};

/**
 * Parse the environment into AppConfig
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n  ${issues.join('\n  ')}`);
  }

  const e = parsed.data;

  return {
    nodeEnv: e.NODE_ENV,
    tracingMode: e.TRACING_MODE ?? (e.NODE_ENV === 'development' ? 'console' : 'disabled'),
    openaiApiKey: e.OPENAI_API_KEY,
    neo4j:
      e.NEO4J_URI && e.NEO4J_PASSWORD
        ? { uri: e.NEO4J_URI, username: e.NEO4J_USERNAME ?? 'neo4j', password: e.NEO4J_PASSWORD }
        : undefined,
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : undefined,
    models: {
      chat: e.CHAT_MODEL,
      extraction: e.EXTRACTION_MODEL,
      summary: e.SUMMARY_MODEL,
      embedding: e.EMBEDDING_MODEL,
    },
    pipeline: {
      retrievalTopK: e.RETRIEVAL_TOP_K,
      contextMaxTokens: e.CONTEXT_MAX_TOKENS,
      replyMaxWords: e.REPLY_MAX_WORDS,
      replyMaxOutputTokens: e.REPLY_MAX_OUTPUT_TOKENS,
      timeouts: {
        embeddingMs: e.EMBEDDING_TIMEOUT_MS,
        extractionMs: e.EXTRACTION_TIMEOUT_MS,
        graphMs: e.GRAPH_TIMEOUT_MS,
        generationMs: e.GENERATION_TIMEOUT_MS,
      },
      gentleIntensityThreshold: e.GENTLE_INTENSITY_THRESHOLD,
      selfAwarenessThreshold: e.SELF_AWARENESS_THRESHOLD,
      graphDepth: e.GRAPH_DEPTH,
      graphMaxEntities: e.GRAPH_MAX_ENTITIES,
      historyWindow: e.HISTORY_WINDOW,
      chunkMaxTokens: e.CHUNK_MAX_TOKENS,
    },
  };
}
