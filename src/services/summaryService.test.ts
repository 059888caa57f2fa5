import { describe, expect, it } from 'vitest';
import { ScriptedTextGenerator, turn } from '../testing/fakes.js';
import {
  DEFAULT_ENTRY_TITLE,
  EMPTY_SESSION_SUMMARY,
  SummaryService,
  fallbackSummary,
  formatTranscript,
  truncate,
} from './summaryService.js';

const transcript = [
  turn('user', 'Work was rough today.'),
  turn('assistant', 'What made it rough?'),
  turn('user', 'My manager moved the deadline again.'),
];

describe('truncate', () => {
  it('leaves short text alone and marks cut text with an ellipsis', () => {
    expect(truncate('  short  ', 10)).toBe('short');
    expect(truncate('a'.repeat(150), 100)).toBe(`${'a'.repeat(97)}...`);
  });
});

describe('fallbackSummary', () => {
  it('uses the first user message', () => {
    expect(fallbackSummary(transcript)).toBe('Work was rough today.');
  });

  it('describes an empty session', () => {
    expect(fallbackSummary([turn('assistant', 'Welcome back.')])).toBe(EMPTY_SESSION_SUMMARY);
  });
});

describe('formatTranscript', () => {
  it('labels speakers line by line', () => {
    expect(formatTranscript(transcript)).toBe(
      'User: Work was rough today.\nAssistant: What made it rough?\nUser: My manager moved the deadline again.'
    );
  });
});

describe('SummaryService', () => {
  it('returns the generated summary capped at 200 characters', async () => {
    const generator = new ScriptedTextGenerator(['b'.repeat(250)]);
    const summary = await new SummaryService(generator, 1000).summarize(transcript);

    expect(summary).toBe(`${'b'.repeat(197)}...`);
    expect(generator.requests[0].functionId).toBe('summary-generate');
    expect(generator.requests[0].messages[0].content).toContain('User: My manager moved the deadline again.');
  });

  it('falls back when generation fails', async () => {
    const generator = new ScriptedTextGenerator([new Error('rate limited')]);

    expect(await new SummaryService(generator, 1000).summarize(transcript)).toBe('Work was rough today.');
  });

  it('does not call an unavailable generator', async () => {
    const generator = new ScriptedTextGenerator([], undefined, false);
    const service = new SummaryService(generator, 1000);

    expect(await service.summarize(transcript)).toBe('Work was rough today.');
    expect(await service.title(transcript)).toBe(DEFAULT_ENTRY_TITLE);
    expect(generator.requests).toHaveLength(0);
  });

  it('cleans quotes and trailing periods from titles', async () => {
    const generator = new ScriptedTextGenerator(['"Work Stress Reflection."']);

    expect(await new SummaryService(generator, 1000).title(transcript)).toBe('Work Stress Reflection');
  });

  it('uses the default title when the model returns only punctuation', async () => {
    const generator = new ScriptedTextGenerator(['""']);

    expect(await new SummaryService(generator, 1000).title(transcript)).toBe(DEFAULT_ENTRY_TITLE);
  });

  it('uses the default title for a session without user messages', async () => {
    const generator = new ScriptedTextGenerator(['Unused']);

    expect(await new SummaryService(generator, 1000).title([])).toBe(DEFAULT_ENTRY_TITLE);
    expect(generator.requests).toHaveLength(0);
  });
});
