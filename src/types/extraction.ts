/**
 * Output of the NLU extractor for one piece of text.
 *
 * Produced fresh per turn or per entry and never persisted as-is; only its
 * graph projection is stored.
 */

export const ENTITY_TYPES = ['person', 'organization', 'place', 'topic', 'event'] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

export const VALENCES = ['positive', 'negative', 'neutral'] as const;
export type Valence = (typeof VALENCES)[number];

export const INTENT_LABELS = [
  'self-reflection',
  'planning',
  'emotional-release',
  'insight-generation',
  'general',
] as const;
export type IntentLabel = (typeof INTENT_LABELS)[number];

export const MIN_INTENSITY = 1;
export const MAX_INTENSITY = 5;

export interface ExtractedEntity {
  name: string;
  type: EntityType;
}

export interface ExtractedEmotion {
  name: string;
  valence: Valence;
  /** Integer on the fixed 1-5 scale */
  intensity: number;
}

export interface ExtractedRelationship {
  source: string;
  target: string;
  relation: string;
}

export type ExtractionStrategyName = 'generative' | 'parser' | 'none';

export interface ExtractedFacts {
  entities: ExtractedEntity[];
  emotions: ExtractedEmotion[];
  relationships: ExtractedRelationship[];
  intent: IntentLabel;
  /** 0-1, how clearly the writer already shows insight into their own situation */
  selfAwareness: number;
  strategy: ExtractionStrategyName;
}

export function emptyFacts(strategy: ExtractionStrategyName = 'none'): ExtractedFacts {
  return {
    entities: [],
    emotions: [],
    relationships: [],
    intent: 'general',
    selfAwareness: 0,
    strategy,
  };
}
