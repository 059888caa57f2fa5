/**
 * Response format contract for assistant replies:
 * - exactly one question mark, or none together with an explicit acknowledgment
 * - at most `maxWords` words
 * - no bulleted or numbered lists, inline or line-leading
 */

import { FormatContractViolation } from '../utils/errors.js';
import { countWords } from '../utils/tokenCounter.js';

export const DEFAULT_ACKNOWLEDGMENT_PHRASES = [
  "that's a real insight",
  "that's an important insight",
  "that's a powerful realization",
  "that's a meaningful realization",
  "that's an important realization",
  "you've noticed something important",
  "you've clearly thought about this",
  'that takes real self-awareness',
  'that shows real self-awareness',
  "you're seeing it clearly",
  'what a thoughtful realization',
];

const LIST_LINE = /^\s*(?:[-*•]|\d+[.)])\s+/m;
const INLINE_ENUMERATION = /(?:^|\s)\(?1[.)]\s[\s\S]*?(?:^|\s)\(?2[.)]\s/;
const STEP_MARKER = /\bstep\s+(?:\d+|one|two|three)\b/gi;

export interface FormatCheck {
  valid: boolean;
  violations: string[];
  questionMarks: number;
  wordCount: number;
  acknowledged: boolean;
}

function normalizeApostrophes(text: string): string {
  return text.replace(/[‘’]/g, "'");
}

export class ResponseFormatValidator {
  private readonly phrases: string[];

  constructor(
    private readonly maxWords: number,
    acknowledgmentPhrases: string[] = DEFAULT_ACKNOWLEDGMENT_PHRASES
  ) {
    this.phrases = acknowledgmentPhrases.map((phrase) => normalizeApostrophes(phrase.toLowerCase()));
  }

  isAcknowledgment(reply: string): boolean {
    const lowered = normalizeApostrophes(reply.toLowerCase());
    return this.phrases.some((phrase) => lowered.includes(phrase));
  }

  check(reply: string): FormatCheck {
    const text = reply.trim();
    const questionMarks = (text.match(/\?/g) ?? []).length;
    const wordCount = countWords(text);
    const acknowledged = this.isAcknowledgment(text);
    const violations: string[] = [];

    if (text.length === 0) {
      violations.push('reply is empty');
    } else if (questionMarks > 1) {
      violations.push(`asks ${questionMarks} questions instead of one`);
    } else if (questionMarks === 0 && !acknowledged) {
      violations.push('neither asks a question nor acknowledges an insight');
    }

    if (wordCount > this.maxWords) {
      violations.push(`has ${wordCount} words, limit is ${this.maxWords}`);
    }

    if (LIST_LINE.test(text) || INLINE_ENUMERATION.test(text) || (text.match(STEP_MARKER) ?? []).length > 1) {
      violations.push('contains a list or multi-step instructions');
    }

    return { valid: violations.length === 0, violations, questionMarks, wordCount, acknowledged };
  }

  /**
   * @throws FormatContractViolation listing every broken rule
   */
  assertValid(reply: string): void {
    const result = this.check(reply);
    if (!result.valid) {
      throw new FormatContractViolation(result.violations);
    }
  }
}
