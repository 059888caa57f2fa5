/**
 * Reflective journal backend
 *
 * createJournalApp() wires the read-path pipeline and the entry service from
 * an AppConfig. Callers (src/cli.ts, or an HTTP layer) use:
 * - pipeline.handleTurn(userId, sessionId, message) → reply text
 * - entries.saveEntry(userId, sessionId) → entry id
 */

import type { AppConfig } from './config/env.js';
import { Neo4jService } from './db/neo4j.js';
import { createSupabaseClient } from './db/supabase.js';
import { ChunkRepository } from './repositories/ChunkRepository.js';
import { EntryRepository } from './repositories/EntryRepository.js';
import { DisabledGraphBackend, Neo4jGraphBackend } from './repositories/GraphRepository.js';
import { SessionRepository } from './repositories/SessionRepository.js';
import { ContextBudgeter } from './services/contextBudgetService.js';
import { OpenAiEmbeddingProvider } from './services/embeddingGenerationService.js';
import { GenerativeExtractionStrategy, ParserExtractionStrategy } from './services/entityExtractionService.js';
import { EntryService } from './services/entryService.js';
import { IntentRouter } from './services/intentRouterService.js';
import { JournalPipeline } from './services/journalPipelineService.js';
import { KnowledgeGraph } from './services/knowledgeGraphService.js';
import { OpenAiTextGenerator } from './services/llmService.js';
import { NluService } from './services/nluService.js';
import { ParserEntityTagger } from './services/parserEntityTagger.js';
import { ResponseFormatValidator } from './services/responseFormatService.js';
import { SemanticRetriever } from './services/semanticRetrievalService.js';
import { SummaryService } from './services/summaryService.js';
import type { GraphBackend } from './types/capabilities.js';
import { errorMessage } from './utils/errors.js';

export interface JournalApp {
  pipeline: JournalPipeline;
  entries: EntryService;
  graphBackend: GraphBackend;
  close(): Promise<void>;
}

async function connectGraph(config: AppConfig): Promise<{ backend: GraphBackend; close: () => Promise<void> }> {
  if (!config.neo4j) {
    console.warn('[Graph] NEO4J_URI / NEO4J_PASSWORD not set, knowledge graph disabled');
    return { backend: new DisabledGraphBackend('Neo4j is not configured'), close: async () => {} };
  }

  const neo4jService = new Neo4jService(config.neo4j);
  try {
    await neo4jService.connect();
  } catch (error) {
    console.warn(`[Graph] Continuing without knowledge graph: ${errorMessage(error)}`);
    return { backend: new DisabledGraphBackend(`Neo4j connection failed: ${errorMessage(error)}`), close: async () => {} };
  }

  const backend = new Neo4jGraphBackend(neo4jService);
  try {
    await backend.ensureSchema();
  } catch (error) {
    console.warn(`[Graph] Schema declaration failed, continuing: ${errorMessage(error)}`);
  }

  return { backend, close: () => neo4jService.close() };
}

export async function createJournalApp(config: AppConfig): Promise<JournalApp> {
  if (!config.supabase) {
    throw new Error('Missing Supabase configuration: set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
  }
  if (!config.openaiApiKey) {
    console.warn('[Pipeline] OPENAI_API_KEY not set, replies and summaries will use fallbacks');
  }

  const { pipeline: settings, models, openaiApiKey } = config;
  const supabase = createSupabaseClient(config.supabase);
  const sessions = new SessionRepository(supabase);
  const entryStore = new EntryRepository(supabase);
  const chunks = new ChunkRepository(supabase);

  const graphConnection = await connectGraph(config);
  const graph = new KnowledgeGraph(graphConnection.backend, settings.timeouts.graphMs);

  const embeddings = new OpenAiEmbeddingProvider(models.embedding, openaiApiKey);
  const nlu = new NluService(
    new GenerativeExtractionStrategy(new OpenAiTextGenerator(models.extraction, openaiApiKey)),
    new ParserExtractionStrategy(new ParserEntityTagger()),
    settings.timeouts.extractionMs
  );

  const pipeline = new JournalPipeline({
    retriever: new SemanticRetriever(embeddings, chunks, settings.timeouts.embeddingMs),
    nlu,
    graph,
    budgeter: new ContextBudgeter(),
    router: new IntentRouter(settings.gentleIntensityThreshold, settings.selfAwarenessThreshold),
    validator: new ResponseFormatValidator(settings.replyMaxWords),
    generator: new OpenAiTextGenerator(models.chat, openaiApiKey),
    sessions,
    entries: entryStore,
    settings,
  });

  const entries = new EntryService({
    sessions,
    entries: entryStore,
    chunks,
    embeddings,
    nlu,
    graph,
    summaries: new SummaryService(new OpenAiTextGenerator(models.summary, openaiApiKey), settings.timeouts.generationMs),
    settings,
  });

  return {
    pipeline,
    entries,
    graphBackend: graphConnection.backend,
    close: graphConnection.close,
  };
}

export { loadConfig, DEFAULT_PIPELINE_SETTINGS } from './config/env.js';
export type { AppConfig, PipelineSettings } from './config/env.js';
export { initTracing } from './config/tracing.js';
export { JournalPipeline, FAILURE_REPLY } from './services/journalPipelineService.js';
export { EntryService } from './services/entryService.js';
export * from './utils/errors.js';
export type * from './types/journal.js';
export type * from './types/extraction.js';
export type * from './types/pipeline.js';
export type * from './types/capabilities.js';
