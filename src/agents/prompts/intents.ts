/**
 * Intent-specific guidance appended to the system prompt by the router.
 */

import type { IntentLabel } from '../../types/extraction.js';
import type { ReplyMode, Tone } from '../../types/pipeline.js';

export const INTENT_TEMPLATES: Record<IntentLabel, string> = {
  'self-reflection':
    'Engage conversationally to help them reflect on patterns in their thinking. Use warm, simple language.',
  planning:
    'Gently explore their plans. What feelings or worries might be shaping this decision?',
  'emotional-release':
    'This entry carries strong feelings. With warmth, help them understand what is behind these emotions using one simple, gentle question.',
  'insight-generation':
    'Notice the patterns in what they are sharing and reflect one back in plain language.',
  general:
    'Engage warmly and simply to understand what they are feeling and thinking.',
};

export const TONE_GUIDANCE: Record<Tone, string> = {
  gentle:
    'Their feelings are intense right now. Slow down, validate first, and keep the question soft and easy to answer.',
  direct:
    'Their feelings are manageable. You can be a little more direct and name what you notice.',
};

export const MODE_GUIDANCE: Record<ReplyMode, string> = {
  probe: 'End with exactly one gentle question.',
  acknowledge:
    'They are already showing clear self-awareness. Acknowledge their insight warmly and explicitly (for example "That\'s a real insight" or "You\'ve noticed something important") and do not ask a question.',
};
