/**
 * External capabilities the pipeline consumes. Production implementations
 * live in services/ and repositories/; tests supply in-process stand-ins.
 */

import type { z } from 'zod';
import type { ExtractedEntity } from './extraction.js';
import type { GraphFact, GraphProjection } from './graph.js';
import type { Chunk, Entry, JournalSession, ScoredChunk, Turn } from './journal.js';

export interface EmbeddingProvider {
  /** Model identifier recorded on every stored chunk */
  readonly version: string;
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  system: string;
  messages: ChatMessage[];
  maxOutputTokens: number;
  temperature?: number;
  /** Telemetry label for the call site */
  functionId: string;
}

export interface ObjectRequest<T> {
  system: string;
  prompt: string;
  /** Output schema; the parsed object is returned only when it validates */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  maxOutputTokens: number;
  temperature?: number;
  functionId: string;
}

export interface TextGenerator {
  isAvailable(): boolean;
  complete(request: CompletionRequest): Promise<string>;
  /**
   * @throws SchemaValidationError when the model's output does not match `request.schema`
   */
  completeObject<T>(request: ObjectRequest<T>): Promise<T>;
}

/**
 * Offline named-entity tagger used when generative extraction is unavailable.
 */
export interface EntityTagger {
  tag(text: string): ExtractedEntity[];
}

export interface ChunkStore {
  /** Insert or replace by chunk id */
  upsertChunks(chunks: Chunk[]): Promise<void>;
  /**
   * Nearest chunks for one owner and one embedding version, ranked by cosine
   * similarity. Both filters are part of the query.
   */
  nearest(userId: string, queryVector: number[], k: number, embeddingVersion: string): Promise<ScoredChunk[]>;
  deleteByEntry(userId: string, entryId: string): Promise<void>;
}

export interface EntryStore {
  /** Insert unless the id already exists; resolves to the stored row either way */
  create(entry: Entry): Promise<Entry>;
  getById(userId: string, entryId: string): Promise<Entry | null>;
  listByUser(userId: string, limit: number): Promise<Entry[]>;
  delete(userId: string, entryId: string): Promise<boolean>;
}

export interface SessionStore {
  get(userId: string, sessionId: string): Promise<JournalSession | null>;
  /**
   * Atomically append to the transcript, creating the session when absent.
   * Resolves false for an ended session.
   */
  appendTurns(userId: string, sessionId: string, turns: Turn[]): Promise<boolean>;
  markEnded(userId: string, sessionId: string): Promise<void>;
}

export interface GraphBackend {
  /** Declare constraints and indexes; declaring an existing one is not an error */
  ensureSchema(): Promise<void>;
  mergeProjection(projection: GraphProjection): Promise<void>;
  /**
   * Edges within `depth` hops of the nodes whose name_key is in `nameKeys`,
   * never leaving the owner's subgraph.
   */
  neighborhood(userId: string, nameKeys: string[], depth: number): Promise<GraphFact[]>;
  /** Remove an entry node and its edges; entity nodes stay */
  deleteEntry(userId: string, entryId: string): Promise<void>;
}
