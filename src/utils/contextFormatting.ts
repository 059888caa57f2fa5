/**
 * Formatting and ordering helpers for the context block handed to generation.
 */

import type { ExtractedFacts } from '../types/extraction.js';
import type { GraphFact } from '../types/graph.js';
import type { ScoredChunk } from '../types/journal.js';

/**
 * Format date to show only the day (YYYY-MM-DD)
 */
export function formatDateDayOnly(timestamp: string | undefined | null): string | undefined {
  if (!timestamp) return undefined;
  const date = new Date(timestamp);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString().split('T')[0];
}

/**
 * Similarity descending, then newer first, then id
 */
export function compareScoredChunks(a: ScoredChunk, b: ScoredChunk): number {
  return (
    b.similarity - a.similarity ||
    b.chunk.created_at.localeCompare(a.chunk.created_at) ||
    a.chunk.id.localeCompare(b.chunk.id)
  );
}

/**
 * Hops ascending, then anchor, relation and object alphabetically
 */
export function compareGraphFacts(a: GraphFact, b: GraphFact): number {
  return (
    a.hops - b.hops ||
    a.anchor.localeCompare(b.anchor) ||
    a.relation.localeCompare(b.relation) ||
    a.object.localeCompare(b.object)
  );
}

/**
 * One line describing the current message, or undefined when NLU found nothing.
 */
export function formatCurrentFacts(facts: ExtractedFacts): string | undefined {
  const parts: string[] = [];

  if (facts.emotions.length > 0) {
    parts.push(
      `emotions: ${facts.emotions.map((e) => `${e.name} (${e.valence}, ${e.intensity}/5)`).join(', ')}`
    );
  }
  if (facts.entities.length > 0) {
    parts.push(`mentions: ${facts.entities.map((e) => `${e.name} (${e.type})`).join(', ')}`);
  }
  if (facts.relationships.length > 0) {
    parts.push(
      `relationships: ${facts.relationships.map((r) => `${r.source} ${r.relation} ${r.target}`).join(', ')}`
    );
  }
  if (parts.length === 0 && facts.intent === 'general') {
    return undefined;
  }

  parts.push(`intent: ${facts.intent}`);
  return `Current message: ${parts.join('; ')}`;
}

export function formatSemanticItem(hit: ScoredChunk): string {
  const day = formatDateDayOnly(hit.chunk.created_at);
  return day ? `Past entry (${day}): ${hit.chunk.content}` : `Past entry: ${hit.chunk.content}`;
}

export function formatGraphItem(fact: GraphFact): string {
  return `Related: ${fact.subject} ${fact.relation} ${fact.object}`;
}
