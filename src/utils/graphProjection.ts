/**
 * Pure mapping from extracted facts to the nodes and edges merged for one entry.
 *
 * Identity rules:
 * - the owner is a single Person node per user (name "me", is_owner)
 * - entity-like nodes are keyed by (owner, type, normalized name)
 * - the Entry node is keyed by entry id
 * - edges are keyed by (type, from, to, relation)
 *
 * Projecting the same facts twice yields the same projection, so merging it
 * twice leaves the graph unchanged.
 */

import { NodeLabels, OWNER_NODE_NAME, RelationshipTypes, type NodeLabel } from '../constants/graph.js';
import type { EntityType, ExtractedFacts } from '../types/extraction.js';
import type { GraphEdgeSpec, GraphNodeSpec, GraphProjection } from '../types/graph.js';
import { generateEntityKey, isSelfReference, normalizeEntityName } from './entityNormalization.js';

export interface ProjectionOptions {
  summary?: string;
  createdAt?: string;
}

export function ownerNodeKey(userId: string): string {
  return generateEntityKey(OWNER_NODE_NAME, 'owner', userId);
}

export function entryNodeKey(entryId: string): string {
  return `entry:${entryId}`;
}

export function edgeIdentity(edge: Pick<GraphEdgeSpec, 'type' | 'from_key' | 'to_key' | 'relation'>): string {
  return `${edge.type}|${edge.from_key}|${edge.to_key}|${edge.relation ?? ''}`;
}

function labelFor(type: EntityType): NodeLabel {
  return type === 'person' ? NodeLabels.Person : NodeLabels.Entity;
}

export function projectFacts(
  userId: string,
  entryId: string,
  facts: ExtractedFacts,
  options: ProjectionOptions = {}
): GraphProjection {
  const nodes = new Map<string, GraphNodeSpec>();
  const edges = new Map<string, GraphEdgeSpec>();
  // normalized name -> node, for resolving relationship endpoints
  const byName = new Map<string, GraphNodeSpec>();

  const addNode = (node: GraphNodeSpec): GraphNodeSpec => {
    const existing = nodes.get(node.key);
    if (existing) {
      return existing;
    }
    nodes.set(node.key, node);
    return node;
  };

  const addEdge = (edge: GraphEdgeSpec): void => {
    const id = edgeIdentity(edge);
    if (!edges.has(id)) {
      edges.set(id, edge);
    }
  };

  const owner = addNode({
    key: ownerNodeKey(userId),
    label: NodeLabels.Person,
    user_id: userId,
    name: OWNER_NODE_NAME,
    name_key: normalizeEntityName(OWNER_NODE_NAME),
    properties: { is_owner: true },
  });

  const entryProperties: Record<string, string | number | boolean> = { entry_id: entryId };
  if (options.summary) {
    entryProperties.summary = options.summary;
  }
  if (options.createdAt) {
    entryProperties.created_at = options.createdAt;
  }

  const entry = addNode({
    key: entryNodeKey(entryId),
    label: NodeLabels.Entry,
    user_id: userId,
    name: entryId,
    properties: entryProperties,
  });

  addEdge({
    type: RelationshipTypes.Authored,
    from_key: owner.key,
    from_label: owner.label,
    to_key: entry.key,
    to_label: entry.label,
    user_id: userId,
    properties: {},
  });

  for (const entity of facts.entities) {
    const name = entity.name.trim();
    const nameKey = normalizeEntityName(name);
    if (!nameKey || isSelfReference(name)) {
      continue;
    }

    const node = addNode({
      key: generateEntityKey(name, entity.type, userId),
      label: labelFor(entity.type),
      user_id: userId,
      name,
      name_key: nameKey,
      entity_type: entity.type,
      properties: {},
    });

    if (!byName.has(nameKey)) {
      byName.set(nameKey, node);
    }

    addEdge({
      type: RelationshipTypes.Mentions,
      from_key: entry.key,
      from_label: entry.label,
      to_key: node.key,
      to_label: node.label,
      user_id: userId,
      properties: {},
    });
  }

  for (const emotion of facts.emotions) {
    const name = emotion.name.trim().toLowerCase();
    const nameKey = normalizeEntityName(name);
    if (!nameKey) {
      continue;
    }

    const node = addNode({
      key: generateEntityKey(name, 'emotion', userId),
      label: NodeLabels.Emotion,
      user_id: userId,
      name,
      name_key: nameKey,
      properties: {},
    });

    addEdge({
      type: RelationshipTypes.Feels,
      from_key: entry.key,
      from_label: entry.label,
      to_key: node.key,
      to_label: node.label,
      user_id: userId,
      properties: { valence: emotion.valence, intensity: emotion.intensity },
    });
  }

  const resolve = (endpoint: string): GraphNodeSpec | undefined =>
    isSelfReference(endpoint) ? owner : byName.get(normalizeEntityName(endpoint));

  for (const relationship of facts.relationships) {
    const source = resolve(relationship.source);
    const target = resolve(relationship.target);
    const relation = relationship.relation.trim().toLowerCase();

    // Endpoints must be extracted entities or the owner
    if (!source || !target || source.key === target.key || !relation) {
      continue;
    }

    addEdge({
      type: RelationshipTypes.RelatesTo,
      from_key: source.key,
      from_label: source.label,
      to_key: target.key,
      to_label: target.label,
      user_id: userId,
      relation,
      properties: {},
    });
  }

  return {
    user_id: userId,
    entry_id: entryId,
    nodes: [...nodes.values()],
    edges: [...edges.values()],
  };
}
