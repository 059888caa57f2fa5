import { describe, expect, it } from 'vitest';
import { INTENT_TEMPLATES, MODE_GUIDANCE, TONE_GUIDANCE } from '../agents/prompts/index.js';
import { emptyFacts, type ExtractedFacts } from '../types/extraction.js';
import { IntentRouter, lexicalSelfAwareness } from './intentRouterService.js';

function factsWith(overrides: Partial<ExtractedFacts>): ExtractedFacts {
  return { ...emptyFacts('generative'), ...overrides };
}

describe('lexicalSelfAwareness', () => {
  it('scores each distinct marker', () => {
    expect(lexicalSelfAwareness("I realize I get defensive, and it's because I'm scared")).toBeCloseTo(0.9);
    expect(lexicalSelfAwareness('Looking back, it was fine')).toBeCloseTo(0.45);
    expect(lexicalSelfAwareness('Work was busy')).toBe(0);
  });
});

describe('IntentRouter', () => {
  const router = new IntentRouter(4, 0.7);

  it('routes a high-intensity outburst to a gentle probe', () => {
    const decision = router.route(
      "I'm so angry at my boss",
      factsWith({
        emotions: [{ name: 'anger', valence: 'negative', intensity: 5 }],
        intent: 'emotional-release',
        selfAwareness: 0.1,
      })
    );

    expect(decision).toMatchObject({ intent: 'emotional-release', tone: 'gentle', mode: 'probe' });
    expect(decision.templateGuidance).toBe(
      [INTENT_TEMPLATES['emotional-release'], TONE_GUIDANCE.gentle, MODE_GUIDANCE.probe].join('\n')
    );
  });

  it('stays direct below the intensity threshold', () => {
    const decision = router.route(
      'Work was annoying',
      factsWith({ emotions: [{ name: 'annoyance', valence: 'negative', intensity: 3 }] })
    );

    expect(decision.tone).toBe('direct');
  });

  it('acknowledges when the extractor reports clear self-awareness', () => {
    expect(router.route('Something clicked', factsWith({ selfAwareness: 0.8 })).mode).toBe('acknowledge');
  });

  it('acknowledges on lexical markers alone', () => {
    const decision = router.route("I've noticed I snap when I'm tired, and it's because I skip lunch", factsWith({}));

    expect(decision.mode).toBe('acknowledge');
    expect(decision.selfAwarenessScore).toBeCloseTo(0.9);
  });

  it('respects a stricter threshold', () => {
    const strict = new IntentRouter(4, 0.95);

    expect(strict.route("I've noticed I snap when I'm tired, and it's because I skip lunch", factsWith({})).mode).toBe(
      'probe'
    );
  });
});
