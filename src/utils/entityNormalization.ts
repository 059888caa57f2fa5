import natural from 'natural';
import crypto from 'crypto';
import { SELF_REFERENCES } from '../constants/graph.js';

const tokenizer = new natural.WordTokenizer();
const stemmer = natural.PorterStemmer;

/**
 * Normalizes entity names for consistent graph keys and matching.
 * Handles:
 * - Case normalization (lowercase)
 * - Possessive removal
 * - Token stemming so plural and singular forms collapse
 *
 * Examples:
 * - "Sarah's" → "sarah"
 * - "Team Meetings" → "team meet"
 */
export function normalizeEntityName(name: string): string {
  if (!name) {
    return '';
  }

  const cleaned = name.toLowerCase().trim();
  const withoutPossessives = cleaned.replace(/'s\b/g, '');
  const tokens = tokenizer.tokenize(withoutPossessives) ?? [];

  return tokens.map((token) => stemmer.stem(token)).join(' ');
}

/**
 * Stable key for idempotent node merges.
 *
 * Format: SHA256(nodeKind + normalizedName + userId). Two mentions of the same
 * person by the same user always hash to the same key; the same name under a
 * different user or a different kind never does.
 */
export function generateEntityKey(name: string, nodeKind: string, userId: string): string {
  const input = `${nodeKind}:${normalizeEntityName(name)}:${userId}`;
  return crypto.createHash('sha256').update(input).digest('hex');
}

/**
 * True when a relationship endpoint names the journal's author.
 */
export function isSelfReference(name: string): boolean {
  const lowered = name.toLowerCase().trim();
  return SELF_REFERENCES.some((ref) => ref === lowered);
}
