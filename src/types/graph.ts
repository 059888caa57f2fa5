/**
 * Knowledge graph shapes: the merge plan written for an entry and the facts
 * read back for a turn.
 */

import type { NodeLabel, RelationshipType } from '../constants/graph.js';
import type { EntityType } from './extraction.js';

/**
 * Node to merge. `key` is the node's identity: (owner, type, normalized name)
 * hashed for entity-like nodes, the entry id for Entry nodes.
 */
export interface GraphNodeSpec {
  key: string;
  label: NodeLabel;
  user_id: string;
  name: string;
  /** Normalized name used for lookups; absent on Entry nodes */
  name_key?: string;
  entity_type?: EntityType;
  properties: Record<string, string | number | boolean>;
}

/**
 * Edge to merge. Identity is (type, from_key, to_key, relation).
 */
export interface GraphEdgeSpec {
  type: RelationshipType;
  from_key: string;
  from_label: NodeLabel;
  to_key: string;
  to_label: NodeLabel;
  user_id: string;
  /** Sub-type for RELATES_TO edges */
  relation?: string;
  properties: Record<string, string | number | boolean>;
}

export interface GraphProjection {
  user_id: string;
  entry_id: string;
  nodes: GraphNodeSpec[];
  edges: GraphEdgeSpec[];
}

/**
 * One edge found near a queried entity.
 */
export interface GraphFact {
  /** Queried entity this fact was reached from */
  anchor: string;
  subject: string;
  relation: string;
  object: string;
  /** Hop distance from the anchor to the far end of this edge */
  hops: number;
}
