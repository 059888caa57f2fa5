import neo4j from 'neo4j-driver';
import { z } from 'zod';
import { NodeLabels, TRAVERSABLE_RELATIONSHIPS } from '../constants/graph.js';
import type { CypherStatement, Neo4jService } from '../db/neo4j.js';
import { initializeGraphSchema } from '../db/schema.js';
import type { GraphBackend } from '../types/capabilities.js';
import type { GraphEdgeSpec, GraphFact, GraphNodeSpec, GraphProjection } from '../types/graph.js';
import { DependencyUnavailableError } from '../utils/errors.js';
import { entryNodeKey } from '../utils/graphProjection.js';

/**
 * The slice of Neo4jService this repository needs.
 */
export type GraphQueryRunner = Pick<Neo4jService, 'executeQuery' | 'executeWrite'>;

export const MAX_GRAPH_DEPTH = 3;
const NEIGHBORHOOD_LIMIT = 50;

const NeighborhoodRowSchema = z.object({
  anchor: z.string(),
  subject: z.string(),
  relation: z.string(),
  object: z.string(),
  hops: z.number().int(),
});

function clampDepth(depth: number): number {
  if (!Number.isFinite(depth)) {
    return 1;
  }
  return Math.min(MAX_GRAPH_DEPTH, Math.max(1, Math.trunc(depth)));
}

function groupBy<T>(items: T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

/**
 * Labels and relationship types cannot be query parameters, so nodes and
 * edges are written in one UNWIND per label (or per edge shape). Every write is
 * a MERGE on the identity key; nothing is created unconditionally.
 */
function nodeStatements(nodes: GraphNodeSpec[]): CypherStatement[] {
  return [...groupBy(nodes, (node) => node.label).entries()].map(([label, group]) => ({
    cypher: `
      UNWIND $nodes AS node
      MERGE (n:${label} {entity_key: node.key})
      ON CREATE SET
        n.name = node.name,
        n.created_at = datetime()
      SET
        n.user_id = node.user_id,
        n.name_key = node.name_key,
        n.entity_type = node.entity_type,
        n.updated_at = datetime()
      SET n += node.properties
    `,
    params: {
      nodes: group.map((node) => ({
        key: node.key,
        user_id: node.user_id,
        name: node.name,
        name_key: node.name_key ?? null,
        entity_type: node.entity_type ?? null,
        properties: node.properties,
      })),
    },
  }));
}

function edgeStatements(edges: GraphEdgeSpec[]): CypherStatement[] {
  const shapeOf = (edge: GraphEdgeSpec) =>
    `${edge.type}|${edge.from_label}|${edge.to_label}|${edge.relation !== undefined ? 'rel' : ''}`;

  return [...groupBy(edges, shapeOf).values()].map((group) => {
    const { type, from_label, to_label, relation } = group[0];
    const identity = relation !== undefined ? ' {relation: edge.relation}' : '';

    return {
      cypher: `
        UNWIND $edges AS edge
        MATCH (a:${from_label} {entity_key: edge.from_key, user_id: edge.user_id})
        MATCH (b:${to_label} {entity_key: edge.to_key, user_id: edge.user_id})
        MERGE (a)-[r:${type}${identity}]->(b)
        ON CREATE SET r.created_at = datetime()
        SET r.user_id = edge.user_id
        SET r += edge.properties
      `,
      params: {
        edges: group.map((edge) => ({
          from_key: edge.from_key,
          to_key: edge.to_key,
          user_id: edge.user_id,
          relation: edge.relation ?? null,
          properties: edge.properties,
        })),
      },
    };
  });
}

/**
 * Knowledge graph persistence on Neo4j
 */
export class Neo4jGraphBackend implements GraphBackend {
  constructor(private readonly db: GraphQueryRunner) {}

  async ensureSchema(): Promise<void> {
    await initializeGraphSchema(this.db);
  }

  /**
   * Merge one entry's projection in a single write transaction
   */
  async mergeProjection(projection: GraphProjection): Promise<void> {
    const foreign = [...projection.nodes, ...projection.edges].filter((item) => item.user_id !== projection.user_id);
    if (foreign.length > 0) {
      throw new Error(`Projection for ${projection.user_id} contains items owned by another user`);
    }

    await this.db.executeWrite([...nodeStatements(projection.nodes), ...edgeStatements(projection.edges)]);
  }

  /**
   * Edges reachable within `depth` hops from the anchors, every node on the
   * path owned by `userId`. Returns the last edge of each path.
   */
  async neighborhood(userId: string, nameKeys: string[], depth: number): Promise<GraphFact[]> {
    if (nameKeys.length === 0) {
      return [];
    }

    const types = TRAVERSABLE_RELATIONSHIPS.join('|');
    const query = `
      MATCH (anchor)
      WHERE anchor.user_id = $userId AND anchor.name_key IN $nameKeys
      MATCH path = (anchor)-[:${types}*1..${clampDepth(depth)}]-(far)
      WHERE all(n IN nodes(path) WHERE n.user_id = $userId)
      WITH anchor, last(relationships(path)) AS rel, length(path) AS hops
      WITH anchor, rel, hops, startNode(rel) AS s, endNode(rel) AS o
      RETURN
        anchor.name AS anchor,
        CASE WHEN s:${NodeLabels.Entry} THEN 'entry: ' + coalesce(s.summary, s.entry_id) ELSE s.name END AS subject,
        coalesce(rel.relation, toLower(type(rel))) AS relation,
        CASE WHEN o:${NodeLabels.Entry} THEN 'entry: ' + coalesce(o.summary, o.entry_id) ELSE o.name END AS object,
        hops
      ORDER BY hops ASC
      LIMIT $limit
    `;

    const rows = await this.db.executeQuery(query, {
      userId,
      nameKeys,
      limit: neo4j.int(NEIGHBORHOOD_LIMIT),
    });

    const facts: GraphFact[] = [];
    for (const row of rows) {
      const parsed = NeighborhoodRowSchema.safeParse(row);
      if (parsed.success) {
        facts.push(parsed.data);
      }
    }
    return facts;
  }

  async deleteEntry(userId: string, entryId: string): Promise<void> {
    await this.db.executeWrite([
      {
        cypher: `
          MATCH (n:${NodeLabels.Entry} {entity_key: $key, user_id: $userId})
          DETACH DELETE n
        `,
        params: { key: entryNodeKey(entryId), userId },
      },
    ]);
  }
}

/**
 * Stand-in used when no Neo4j credentials are configured or the connection
 * fails. Every call reports the graph as unavailable, which the pipeline
 * treats as an empty result.
 */
export class DisabledGraphBackend implements GraphBackend {
  constructor(private readonly reason: string) {}

  async ensureSchema(): Promise<void> {
    throw new DependencyUnavailableError('graph', this.reason);
  }

  async mergeProjection(): Promise<void> {
    throw new DependencyUnavailableError('graph', this.reason);
  }

  async neighborhood(): Promise<GraphFact[]> {
    throw new DependencyUnavailableError('graph', this.reason);
  }

  async deleteEntry(): Promise<void> {
    throw new DependencyUnavailableError('graph', this.reason);
  }
}
