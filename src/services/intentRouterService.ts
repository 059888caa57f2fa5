/**
 * Maps extracted facts to a prompt template, a tone and a reply mode.
 *
 * Self-awareness is the larger of the extractor's score and a lexical score
 * from first-person insight markers; the cut-off is configuration.
 */

import { INTENT_TEMPLATES, MODE_GUIDANCE, TONE_GUIDANCE } from '../agents/prompts/index.js';
import type { ExtractedFacts } from '../types/extraction.js';
import type { ReplyMode, RoutingDecision, Tone } from '../types/pipeline.js';

export const SELF_AWARENESS_MARKERS = [
  'i realize',
  'i realise',
  "i've realized",
  'i have realized',
  "i've noticed",
  'i have noticed',
  'i notice that',
  'i understand now',
  'now i understand',
  'i see now',
  "i've learned",
  'i have learned',
  'i recognize',
  "i've come to",
  "it's because i",
  'the reason i',
  'looking back',
];

const MARKER_WEIGHT = 0.45;

/**
 * 0.45 per distinct marker present, capped at 1
 */
export function lexicalSelfAwareness(text: string): number {
  const lowered = text.toLowerCase().replace(/[‘’]/g, "'");
  const hits = SELF_AWARENESS_MARKERS.filter((marker) => lowered.includes(marker)).length;
  return Math.min(1, hits * MARKER_WEIGHT);
}

export class IntentRouter {
  constructor(
    private readonly gentleIntensityThreshold: number,
    private readonly selfAwarenessThreshold: number
  ) {}

  route(message: string, facts: ExtractedFacts): RoutingDecision {
    const maxIntensity = facts.emotions.reduce((max, emotion) => Math.max(max, emotion.intensity), 0);
    const tone: Tone = maxIntensity >= this.gentleIntensityThreshold ? 'gentle' : 'direct';

    const selfAwarenessScore = Math.max(facts.selfAwareness, lexicalSelfAwareness(message));
    const mode: ReplyMode = selfAwarenessScore >= this.selfAwarenessThreshold ? 'acknowledge' : 'probe';

    return {
      intent: facts.intent,
      tone,
      mode,
      selfAwarenessScore,
      templateGuidance: [INTENT_TEMPLATES[facts.intent], TONE_GUIDANCE[tone], MODE_GUIDANCE[mode]].join('\n'),
    };
  }
}
