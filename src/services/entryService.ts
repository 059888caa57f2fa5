/**
 * Entry Service (write-path and entry management)
 *
 * saveEntry: summarize → persist entry → end session → chunk → embed + store → NLU → graph.
 * Only the entry write is fatal. Chunks and graph facts are enrichment and
 * fail independently.
 *
 * Entry and chunk ids are uuid v5 of their identity. A saved entry never
 * changes: saving the same session again reuses the stored entry and only
 * re-runs enrichment over its summary, rewriting the same chunk rows and
 * merging the same graph nodes.
 */

import { v5 as uuidv5 } from 'uuid';
import type { PipelineSettings } from '../config/env.js';
import type { ChunkStore, EmbeddingProvider, EntryStore, SessionStore } from '../types/capabilities.js';
import type { Chunk, Entry, JournalSession } from '../types/journal.js';
import type { StageResult } from '../types/pipeline.js';
import { DependencyUnavailableError, PersistenceError, errorMessage } from '../utils/errors.js';
import { runStage, skippedStage } from '../utils/stage.js';
import { countTokens, type TokenCounter } from '../utils/tokenCounter.js';
import { buildEntryAttributes, withSpan } from '../utils/tracing.js';
import { chunkText } from './chunkingService.js';
import type { KnowledgeGraph } from './knowledgeGraphService.js';
import type { NluService } from './nluService.js';
import type { SummaryService } from './summaryService.js';

/** Namespace for deterministic entry and chunk ids */
export const JOURNAL_ID_NAMESPACE = '9b3e1c52-6f0a-4d7e-8c1b-2a5f4e7d9c03';

export function entryIdFor(userId: string, sessionId: string): string {
  return uuidv5(`entry:${userId}:${sessionId}`, JOURNAL_ID_NAMESPACE);
}

export function chunkIdFor(entryId: string, index: number, embeddingVersion: string): string {
  return uuidv5(`chunk:${entryId}:${index}:${embeddingVersion}`, JOURNAL_ID_NAMESPACE);
}

export interface EntryServiceDeps {
  sessions: SessionStore;
  entries: EntryStore;
  chunks: ChunkStore;
  embeddings: EmbeddingProvider;
  nlu: NluService;
  graph: KnowledgeGraph;
  summaries: SummaryService;
  settings: PipelineSettings;
  countTokens?: TokenCounter;
}

export class EntryService {
  private readonly counter: TokenCounter;

  constructor(private readonly deps: EntryServiceDeps) {
    this.counter = deps.countTokens ?? countTokens;
  }

  /**
   * Save a session as an entry
   *
   * @returns The entry id
   * @throws PersistenceError when the session cannot be read or the entry cannot be stored
   */
  async saveEntry(userId: string, sessionId: string): Promise<string> {
    return withSpan('entry.save', buildEntryAttributes('create', userId, { sessionId }), async () => {
      const session = await this.loadSession(userId, sessionId);
      const entryId = entryIdFor(userId, sessionId);
      const entry = (await this.findEntry(userId, entryId)) ?? (await this.createEntry(entryId, session));
      const summary = entry.summarized_text;

      // Later turns must not land in a transcript that is already an entry
      try {
        await this.deps.sessions.markEnded(userId, sessionId);
      } catch (error) {
        console.warn(`[Entry] Could not mark session ${sessionId} ended: ${errorMessage(error)}`);
      }

      const stored = await this.storeChunks(entry);
      const facts = await this.deps.nlu.extract(summary);
      const merged = await runStage('graph-upsert', this.deps.settings.timeouts.graphMs, 0, async () => {
        const projection = await this.deps.graph.upsertFacts(userId, entry.id, facts, {
          summary,
          createdAt: entry.created_at,
        });
        return projection.edges.length;
      });

      console.log(
        `[Entry] Enrichment for ${entry.id}: chunks ${stored.ok ? stored.value : 'skipped'}, graph edges ${merged.ok ? merged.value : 'skipped'}`
      );
      return entry.id;
    });
  }

  private async findEntry(userId: string, entryId: string): Promise<Entry | null> {
    const existing = await this.getEntry(userId, entryId);
    if (existing) {
      console.log(`[Entry] Entry ${entryId} already saved, re-running enrichment only`);
    }
    return existing;
  }

  private async createEntry(entryId: string, session: JournalSession): Promise<Entry> {
    const [summary, title] = await Promise.all([
      this.deps.summaries.summarize(session.transcript),
      this.deps.summaries.title(session.transcript),
    ]);

    const entry: Entry = {
      id: entryId,
      user_id: session.user_id,
      session_id: session.id,
      title,
      summarized_text: summary,
      transcript: session.transcript,
      created_at: session.started_at,
    };

    let stored: Entry;
    try {
      stored = await this.deps.entries.create(entry);
    } catch (error) {
      throw new PersistenceError('save entry', errorMessage(error), { cause: error });
    }
    console.log(`[Entry] Saved entry ${stored.id} for session ${session.id}`);
    return stored;
  }

  async getEntry(userId: string, entryId: string): Promise<Entry | null> {
    try {
      return await this.deps.entries.getById(userId, entryId);
    } catch (error) {
      throw new PersistenceError('get entry', errorMessage(error), { cause: error });
    }
  }

  /**
   * Newest first
   */
  async listEntries(userId: string, limit: number = 20): Promise<Entry[]> {
    try {
      return await this.deps.entries.listByUser(userId, limit);
    } catch (error) {
      throw new PersistenceError('list entries', errorMessage(error), { cause: error });
    }
  }

  /**
   * Delete an entry and its chunks. Shared graph nodes are kept; the Entry
   * node is removed best-effort.
   *
   * @returns false when the entry did not exist for this user
   */
  async deleteEntry(userId: string, entryId: string): Promise<boolean> {
    return withSpan('entry.delete', buildEntryAttributes('delete', userId, { entryId }), async () => {
      let deleted: boolean;
      try {
        await this.deps.chunks.deleteByEntry(userId, entryId);
        deleted = await this.deps.entries.delete(userId, entryId);
      } catch (error) {
        throw new PersistenceError('delete entry', errorMessage(error), { cause: error });
      }

      if (deleted) {
        try {
          await this.deps.graph.removeEntry(userId, entryId);
        } catch (error) {
          console.warn(`[Entry] Graph cleanup for ${entryId} skipped: ${errorMessage(error)}`);
        }
      }

      return deleted;
    });
  }

  private async loadSession(userId: string, sessionId: string): Promise<JournalSession> {
    let session: JournalSession | null;
    try {
      session = await this.deps.sessions.get(userId, sessionId);
    } catch (error) {
      throw new PersistenceError('load session', errorMessage(error), { cause: error });
    }

    if (!session) {
      throw new PersistenceError('load session', `session ${sessionId} not found`);
    }
    return session;
  }

  /**
   * Embed and store the entry's chunks. An embedding failure leaves the entry
   * without chunks.
   */
  private async storeChunks(entry: Entry): Promise<StageResult<number>> {
    const pieces = chunkText(entry.summarized_text, this.deps.settings.chunkMaxTokens, this.counter);
    if (pieces.length === 0) {
      return skippedStage('embedding', 0);
    }

    const { embeddings } = this.deps;

    return runStage('embedding', this.deps.settings.timeouts.embeddingMs, 0, async () => {
      const vectors = await embeddings.embedMany(pieces);
      if (vectors.length !== pieces.length) {
        throw new DependencyUnavailableError(
          'embedding',
          `expected ${pieces.length} vectors, received ${vectors.length}`
        );
      }

      const chunks: Chunk[] = pieces.map((content, index) => ({
        id: chunkIdFor(entry.id, index, embeddings.version),
        entry_id: entry.id,
        user_id: entry.user_id,
        content,
        embedding: vectors[index],
        embedding_version: embeddings.version,
        chunk_index: index,
        created_at: entry.created_at,
      }));

      await this.deps.chunks.upsertChunks(chunks);
      return chunks.length;
    });
  }
}
