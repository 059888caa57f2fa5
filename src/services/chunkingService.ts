import { countTokens, type TokenCounter } from '../utils/tokenCounter.js';

/**
 * Split text into retrieval-sized chunks.
 *
 * Sentences are packed greedily up to `maxTokens`; a single sentence longer
 * than that is split on word boundaries.
 */
export function chunkText(text: string, maxTokens: number, counter: TokenCounter = countTokens): string[] {
  const sentences = text
    .trim()
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);

  const chunks: string[] = [];
  let current = '';

  const flush = () => {
    if (current) {
      chunks.push(current);
      current = '';
    }
  };

  for (const sentence of sentences) {
    const candidate = current ? `${current} ${sentence}` : sentence;
    if (counter(candidate) <= maxTokens) {
      current = candidate;
      continue;
    }

    flush();
    if (counter(sentence) <= maxTokens) {
      current = sentence;
      continue;
    }

    for (const word of sentence.split(/\s+/)) {
      const next = current ? `${current} ${word}` : word;
      if (current && counter(next) > maxTokens) {
        flush();
        current = word;
      } else {
        current = next;
      }
    }
  }

  flush();
  return chunks;
}
