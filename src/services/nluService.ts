/**
 * NLU Service
 *
 * Runs the primary extraction strategy under a timeout and falls back to the
 * parser strategy on any failure. extract() never throws; the worst case is
 * an empty result with strategy "none".
 */

import type { ChatMessage } from '../types/capabilities.js';
import { emptyFacts, type ExtractedFacts } from '../types/extraction.js';
import { errorMessage } from '../utils/errors.js';
import { withTimeout } from '../utils/stage.js';
import { TraceAttributes, annotateActiveSpan, withSpan } from '../utils/tracing.js';
import type { ExtractionStrategy } from './entityExtractionService.js';

export class NluService {
  constructor(
    private readonly primary: ExtractionStrategy,
    private readonly fallback: ExtractionStrategy,
    private readonly timeoutMs: number
  ) {}

  async extract(text: string, history: ChatMessage[] = []): Promise<ExtractedFacts> {
    if (text.trim().length === 0) {
      return emptyFacts();
    }

    return withSpan('nlu.extract', {}, async () => {
      const facts = await this.extractWithFallback(text, history);
      console.log(
        `[NLU] ${facts.strategy}: ${facts.entities.length} entities, ${facts.emotions.length} emotions, intent ${facts.intent}`
      );
      return facts;
    });
  }

  private async extractWithFallback(text: string, history: ChatMessage[]): Promise<ExtractedFacts> {
    if (this.primary.isAvailable()) {
      try {
        const facts = await withTimeout(this.primary.extract(text, history), this.timeoutMs, 'extraction');
        return this.annotate(facts);
      } catch (error) {
        console.warn(`[NLU] ${this.primary.name} extraction failed, using ${this.fallback.name}: ${errorMessage(error)}`);
      }
    }

    try {
      return this.annotate(await this.fallback.extract(text, history));
    } catch (error) {
      console.warn(`[NLU] ${this.fallback.name} extraction failed: ${errorMessage(error)}`);
      return emptyFacts();
    }
  }

  private annotate(facts: ExtractedFacts): ExtractedFacts {
    annotateActiveSpan({
      [TraceAttributes.STRATEGY]: facts.strategy,
      [TraceAttributes.INTENT]: facts.intent,
      [TraceAttributes.ITEM_COUNT]: facts.entities.length,
    });
    return facts;
  }
}
