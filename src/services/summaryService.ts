/**
 * Summary generation for saved sessions.
 *
 * Summaries and titles are best-effort: any generation failure yields the
 * deterministic fallback instead of failing the save.
 */

import {
  SUMMARY_SYSTEM_PROMPT,
  SUMMARY_USER_PROMPT,
  TITLE_SYSTEM_PROMPT,
  TITLE_USER_PROMPT,
} from '../agents/prompts/index.js';
import type { TextGenerator } from '../types/capabilities.js';
import type { Turn } from '../types/journal.js';
import { runStage } from '../utils/stage.js';

export const SUMMARY_MAX_CHARS = 200;
export const FALLBACK_SUMMARY_MAX_CHARS = 100;
export const EMPTY_SESSION_SUMMARY = 'A journaling conversation was recorded.';
export const DEFAULT_ENTRY_TITLE = 'Journal Entry';
const TITLE_MAX_CHARS = 80;

export function truncate(text: string, maxChars: number): string {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) {
    return trimmed;
  }
  return `${trimmed.slice(0, maxChars - 3).trimEnd()}...`;
}

function firstUserMessage(transcript: Turn[]): string | undefined {
  return transcript.find((turn) => turn.role === 'user' && turn.content.trim().length > 0)?.content.trim();
}

/**
 * Summary used when generation is unavailable
 */
export function fallbackSummary(transcript: Turn[]): string {
  const first = firstUserMessage(transcript);
  return first ? truncate(first, FALLBACK_SUMMARY_MAX_CHARS) : EMPTY_SESSION_SUMMARY;
}

/**
 * Convert transcript to readable format: "User: ...\nAssistant: ..."
 */
export function formatTranscript(transcript: Turn[]): string {
  return transcript
    .filter((turn) => turn.content.trim().length > 0)
    .map((turn) => `${turn.role === 'user' ? 'User' : 'Assistant'}: ${turn.content}`)
    .join('\n');
}

export class SummaryService {
  constructor(
    private readonly generator: TextGenerator,
    private readonly timeoutMs: number
  ) {}

  async summarize(transcript: Turn[]): Promise<string> {
    const fallback = fallbackSummary(transcript);
    const dialogue = formatTranscript(transcript);
    if (!dialogue || !this.generator.isAvailable()) {
      return fallback;
    }

    const result = await runStage('summary', this.timeoutMs, fallback, async () => {
      const text = await this.generator.complete({
        system: SUMMARY_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: SUMMARY_USER_PROMPT(dialogue) }],
        maxOutputTokens: 150,
        functionId: 'summary-generate',
      });
      if (!text) {
        throw new Error('LLM returned empty summary');
      }
      return truncate(text, SUMMARY_MAX_CHARS);
    });

    return result.value;
  }

  async title(transcript: Turn[]): Promise<string> {
    const first = firstUserMessage(transcript);
    if (!first || !this.generator.isAvailable()) {
      return DEFAULT_ENTRY_TITLE;
    }

    const result = await runStage('summary', this.timeoutMs, DEFAULT_ENTRY_TITLE, async () => {
      const text = await this.generator.complete({
        system: TITLE_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: TITLE_USER_PROMPT(first) }],
        maxOutputTokens: 20,
        functionId: 'title-generate',
      });
      const cleaned = text.replace(/^["'\s]+|["'.\s]+$/g, '');
      return cleaned ? truncate(cleaned, TITLE_MAX_CHARS) : DEFAULT_ENTRY_TITLE;
    });

    return result.value;
  }
}
