/**
 * Centralized constants for the Neo4j graph schema
 * Node labels and relationship types used by the knowledge graph adapter.
 */

export const NodeLabels = {
  Person: 'Person',
  Entity: 'Entity',
  Emotion: 'Emotion',
  Entry: 'Entry',
} as const;

export type NodeLabel = (typeof NodeLabels)[keyof typeof NodeLabels];

export const RelationshipTypes = {
  Authored: 'AUTHORED',
  Mentions: 'MENTIONS',
  Feels: 'FEELS',
  RelatesTo: 'RELATES_TO',
} as const;

export type RelationshipType = (typeof RelationshipTypes)[keyof typeof RelationshipTypes];

/**
 * Relationship types followed by related() traversal. AUTHORED is left out so
 * the owner's own node does not connect every entry to every other one.
 */
export const TRAVERSABLE_RELATIONSHIPS: RelationshipType[] = [
  RelationshipTypes.Mentions,
  RelationshipTypes.Feels,
  RelationshipTypes.RelatesTo,
];

/** Name given to the owner's own Person node */
export const OWNER_NODE_NAME = 'me';

/** Relationship endpoints that refer to the journal's author */
export const SELF_REFERENCES = ['i', 'me', 'myself', 'user', 'the user'] as const;
