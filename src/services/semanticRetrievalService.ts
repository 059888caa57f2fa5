/**
 * Semantic retrieval over past entry chunks.
 *
 * Only chunks owned by the caller and embedded with the provider's current
 * version are eligible. Ranking is by similarity, ties broken by recency.
 */

import type { ChunkStore, EmbeddingProvider } from '../types/capabilities.js';
import type { ScoredChunk } from '../types/journal.js';
import type { StageResult } from '../types/pipeline.js';
import { compareScoredChunks } from '../utils/contextFormatting.js';
import { asUnavailable } from '../utils/errors.js';
import { runStage, skippedStage } from '../utils/stage.js';
import { buildStageAttributes, withSpan } from '../utils/tracing.js';

/**
 * Similarity descending, then newer first, then id for a stable order
 */
export function rankChunks(hits: ScoredChunk[], k: number): ScoredChunk[] {
  return [...hits].sort(compareScoredChunks).slice(0, k);
}

export class SemanticRetriever {
  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly chunks: ChunkStore,
    private readonly timeoutMs: number
  ) {}

  async retrieve(query: string, userId: string, k: number): Promise<StageResult<ScoredChunk[]>> {
    if (query.trim().length === 0 || k <= 0) {
      return skippedStage('semantic', []);
    }

    const version = this.embeddings.version;

    return runStage('semantic', this.timeoutMs, [], () =>
      withSpan('retriever.retrieve', buildStageAttributes('semantic', userId), async () => {
        let vector: number[];
        try {
          vector = await this.embeddings.embed(query);
        } catch (error) {
          throw asUnavailable('embedding', error);
        }

        let hits: ScoredChunk[];
        try {
          hits = await this.chunks.nearest(userId, vector, k, version);
        } catch (error) {
          throw asUnavailable('vector-search', error);
        }

        // The store filters too; a mismatched row here is never served
        const eligible = hits.filter(
          (hit) => hit.chunk.user_id === userId && hit.chunk.embedding_version === version
        );
        const ranked = rankChunks(eligible, k);

        console.log(`[Retriever] ${ranked.length} chunks for user ${userId}`);
        return ranked;
      })
    );
  }
}
