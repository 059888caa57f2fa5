/**
 * Entity Extraction Service
 *
 * Two strategies behind one interface:
 * - GenerativeExtractionStrategy: structured generation against
 *   ExtractionOutputSchema, with one stricter retry on invalid output
 * - ParserExtractionStrategy: offline entity tagger, no emotions or relationships
 *
 * Strategy selection and fallback live in nluService.ts.
 */

import { z } from 'zod';
import { EXTRACTION_SYSTEM_PROMPT, EXTRACTION_USER_PROMPT, STRICT_EXTRACTION_SUFFIX } from '../agents/prompts/index.js';
import type { ChatMessage, EntityTagger, TextGenerator } from '../types/capabilities.js';
import {
  ENTITY_TYPES,
  INTENT_LABELS,
  MAX_INTENSITY,
  MIN_INTENSITY,
  VALENCES,
  type ExtractedFacts,
  type ExtractionStrategyName,
} from '../types/extraction.js';
import { SchemaValidationError } from '../utils/errors.js';

export interface ExtractionStrategy {
  readonly name: ExtractionStrategyName;
  isAvailable(): boolean;
  extract(text: string, history: ChatMessage[]): Promise<ExtractedFacts>;
}

const MAX_RELATION_LENGTH = 40;
const HISTORY_TURNS_FOR_EXTRACTION = 4;

export const ExtractionOutputSchema = z.object({
  entities: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        type: z.enum(ENTITY_TYPES),
      })
    )
    .default([]),
  emotions: z
    .array(
      z.object({
        name: z
          .string()
          .trim()
          .min(1)
          .transform((name) => name.toLowerCase()),
        valence: z.enum(VALENCES),
        intensity: z.number().int().min(MIN_INTENSITY).max(MAX_INTENSITY),
      })
    )
    .default([]),
  relationships: z
    .array(
      z.object({
        source: z.string().trim().min(1),
        target: z.string().trim().min(1),
        relation: z.string().trim().min(1).max(MAX_RELATION_LENGTH),
      })
    )
    .default([]),
  intent: z.enum(INTENT_LABELS),
  self_awareness: z.number().min(0).max(1),
});

export type ExtractionOutput = z.infer<typeof ExtractionOutputSchema>;

export function toExtractedFacts(output: ExtractionOutput): ExtractedFacts {
  return {
    entities: output.entities,
    emotions: output.emotions,
    relationships: output.relationships,
    intent: output.intent,
    selfAwareness: output.self_awareness,
    strategy: 'generative',
  };
}

function formatHistory(history: ChatMessage[]): string {
  return history
    .slice(-HISTORY_TURNS_FOR_EXTRACTION)
    .map((message) => `${message.role === 'user' ? 'User' : 'Assistant'}: ${message.content}`)
    .join('\n');
}

export class GenerativeExtractionStrategy implements ExtractionStrategy {
  readonly name = 'generative' as const;

  constructor(
    private readonly generator: TextGenerator,
    private readonly maxOutputTokens: number = 600
  ) {}

  isAvailable(): boolean {
    return this.generator.isAvailable();
  }

  async extract(text: string, history: ChatMessage[]): Promise<ExtractedFacts> {
    const prompt = EXTRACTION_USER_PROMPT(text, formatHistory(history));

    try {
      return toExtractedFacts(await this.request(EXTRACTION_SYSTEM_PROMPT, prompt, 'nlu-extract'));
    } catch (error) {
      if (!(error instanceof SchemaValidationError)) {
        throw error;
      }
      console.warn(`[NLU] Extraction output invalid, retrying with strict instruction: ${error.issues.join(', ') || error.message}`);
    }

    return toExtractedFacts(
      await this.request(EXTRACTION_SYSTEM_PROMPT + STRICT_EXTRACTION_SUFFIX, prompt, 'nlu-extract-strict')
    );
  }

  private request(system: string, prompt: string, functionId: string): Promise<ExtractionOutput> {
    return this.generator.completeObject({
      system,
      prompt,
      schema: ExtractionOutputSchema,
      maxOutputTokens: this.maxOutputTokens,
      temperature: 0,
      functionId,
    });
  }
}

/**
 * Entities from the offline tagger, with neutral defaults for everything the
 * tagger cannot infer.
 */
export class ParserExtractionStrategy implements ExtractionStrategy {
  readonly name = 'parser' as const;

  constructor(private readonly tagger: EntityTagger) {}

  isAvailable(): boolean {
    return true;
  }

  async extract(text: string): Promise<ExtractedFacts> {
    return {
      entities: this.tagger.tag(text),
      emotions: [],
      relationships: [],
      intent: 'general',
      selfAwareness: 0,
      strategy: 'parser',
    };
  }
}
