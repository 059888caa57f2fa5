import type { SupabaseClient } from '@supabase/supabase-js';
import type { ChunkStore } from '../types/capabilities.js';
import type { Chunk, ScoredChunk } from '../types/journal.js';
import { MatchedChunkRowSchema } from './rowSchemas.js';

/**
 * Entry chunks and their embeddings in Supabase (pgvector).
 *
 * Similarity search runs in the `match_entry_chunks` function
 * (supabase/schema.sql), which filters on owner and embedding version before
 * ranking.
 */
export class ChunkRepository implements ChunkStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async upsertChunks(chunks: Chunk[]): Promise<void> {
    if (chunks.length === 0) {
      return;
    }

    const { error } = await this.supabase.from('entry_chunks').upsert(chunks, { onConflict: 'id' });

    if (error) {
      throw new Error(`Failed to upsert entry chunks: ${error.message}`);
    }
  }

  async nearest(userId: string, queryVector: number[], k: number, embeddingVersion: string): Promise<ScoredChunk[]> {
    const { data, error } = await this.supabase.rpc('match_entry_chunks', {
      query_embedding: queryVector,
      match_user_id: userId,
      match_version: embeddingVersion,
      match_count: k,
    });

    if (error) {
      throw new Error(`Chunk similarity search failed: ${error.message}`);
    }

    const rows: unknown[] = Array.isArray(data) ? data : [];
    return rows.map((row) => {
      const { similarity, ...chunk } = MatchedChunkRowSchema.parse(row);
      return { chunk, similarity };
    });
  }

  async deleteByEntry(userId: string, entryId: string): Promise<void> {
    const { error } = await this.supabase
      .from('entry_chunks')
      .delete()
      .eq('entry_id', entryId)
      .eq('user_id', userId);

    if (error) {
      throw new Error(`Failed to delete entry chunks: ${error.message}`);
    }
  }
}
