import { get_encoding, type Tiktoken } from 'tiktoken';

export type TokenCounter = (text: string) => number;

let encoder: Tiktoken | undefined;

/**
 * Count tokens using tiktoken (cl100k_base encoding used by modern OpenAI models).
 * The encoder is created on first use and reused.
 */
export function countTokens(text: string): number {
  if (!text) {
    return 0;
  }
  if (!encoder) {
    encoder = get_encoding('cl100k_base');
  }
  return encoder.encode(text).length;
}

/**
 * Whitespace-delimited word count
 */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}
