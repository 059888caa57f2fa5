/**
 * Knowledge graph service
 *
 * Write side: project an entry's facts into nodes and edges and merge them.
 * Read side: facts within a few hops of named entities, nearest first.
 * Both sides are scoped to one owner.
 */

import type { GraphBackend } from '../types/capabilities.js';
import type { ExtractedFacts } from '../types/extraction.js';
import type { GraphFact, GraphProjection } from '../types/graph.js';
import type { StageResult } from '../types/pipeline.js';
import { compareGraphFacts } from '../utils/contextFormatting.js';
import { normalizeEntityName } from '../utils/entityNormalization.js';
import { asUnavailable } from '../utils/errors.js';
import { projectFacts, type ProjectionOptions } from '../utils/graphProjection.js';
import { runStage, skippedStage } from '../utils/stage.js';
import { buildEntryAttributes, buildStageAttributes, withSpan } from '../utils/tracing.js';

/**
 * One fact per (subject, relation, object) at its smallest hop count,
 * ordered by hops, then anchor, relation and object.
 */
export function dedupeFacts(facts: GraphFact[]): GraphFact[] {
  const best = new Map<string, GraphFact>();

  for (const fact of facts) {
    const key = `${fact.subject}|${fact.relation}|${fact.object}`;
    const existing = best.get(key);
    if (!existing || fact.hops < existing.hops) {
      best.set(key, fact);
    }
  }

  return [...best.values()].sort(compareGraphFacts);
}

export class KnowledgeGraph {
  constructor(
    private readonly backend: GraphBackend,
    private readonly timeoutMs: number
  ) {}

  /**
   * Merge an entry's facts. Re-running with the same input changes nothing.
   */
  async upsertFacts(
    userId: string,
    entryId: string,
    facts: ExtractedFacts,
    options: ProjectionOptions = {}
  ): Promise<GraphProjection> {
    const projection = projectFacts(userId, entryId, facts, options);

    await withSpan(
      'graph.upsertFacts',
      buildEntryAttributes('enrich', userId, { entryId, itemCount: projection.nodes.length }),
      async () => {
        try {
          await this.backend.mergeProjection(projection);
        } catch (error) {
          throw asUnavailable('graph', error);
        }
      }
    );

    console.log(`[Graph] Merged ${projection.nodes.length} nodes, ${projection.edges.length} edges for entry ${entryId}`);
    return projection;
  }

  /**
   * Facts near the named entities. Unavailable graph yields an empty result.
   */
  async related(userId: string, names: string[], depth: number = 1): Promise<StageResult<GraphFact[]>> {
    const nameKeys = [...new Set(names.map(normalizeEntityName).filter((key) => key.length > 0))];

    if (nameKeys.length === 0) {
      return skippedStage('graph', []);
    }

    return runStage('graph', this.timeoutMs, [], () =>
      withSpan('graph.related', buildStageAttributes('graph', userId, { itemCount: nameKeys.length }), async () => {
        try {
          return dedupeFacts(await this.backend.neighborhood(userId, nameKeys, depth));
        } catch (error) {
          throw asUnavailable('graph', error);
        }
      })
    );
  }

  async removeEntry(userId: string, entryId: string): Promise<void> {
    try {
      await this.backend.deleteEntry(userId, entryId);
    } catch (error) {
      throw asUnavailable('graph', error);
    }
  }
}
