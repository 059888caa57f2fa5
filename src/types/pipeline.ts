/**
 * Shapes shared by the read-path and write-path orchestration.
 */

import type { ExtractedFacts, IntentLabel } from './extraction.js';
import type { GraphFact } from './graph.js';
import type { ScoredChunk } from './journal.js';

export type StageName =
  | 'semantic'
  | 'graph'
  | 'generation'
  | 'embedding'
  | 'graph-upsert'
  | 'summary'
  | 'recent-entries';

/**
 * Outcome of one external stage. Both variants carry a value so callers can
 * compose them without branching; an unavailable stage carries its fallback.
 */
export type StageResult<T> =
  | { stage: StageName; ok: true; value: T; durationMs: number }
  | { stage: StageName; ok: false; value: T; durationMs: number; reason: string };

export type TurnState = 'Idle' | 'Retrieving' | 'Routing' | 'Generating' | 'Validating' | 'Done' | 'Failed';

export type ContextItemKind = 'fact' | 'semantic' | 'graph';

export interface ContextItem {
  kind: ContextItemKind;
  text: string;
  tokens: number;
}

/**
 * Size-bounded context handed to generation.
 */
export interface ContextBlock {
  items: ContextItem[];
  dropped: ContextItem[];
  tokenCount: number;
  text: string;
}

export interface RetrievalContext {
  semantic: StageResult<ScoredChunk[]>;
  graph: StageResult<GraphFact[]>;
  facts: ExtractedFacts;
  extractionOk: boolean;
}

export type Tone = 'gentle' | 'direct';

export type ReplyMode = 'probe' | 'acknowledge';

export interface RoutingDecision {
  intent: IntentLabel;
  tone: Tone;
  mode: ReplyMode;
  selfAwarenessScore: number;
  templateGuidance: string;
}

export interface TurnOutcome {
  reply: string;
  state: Extract<TurnState, 'Done' | 'Failed'>;
  transitions: TurnState[];
  /** True when the served reply still violates the format contract */
  qualityFlagged: boolean;
  routing?: RoutingDecision;
  context?: RetrievalContext;
  greeting: boolean;
}
