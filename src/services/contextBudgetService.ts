/**
 * Context Budgeter
 *
 * Priority, highest first:
 * 1. current-turn facts, always kept in full
 * 2. semantic snippets, similarity descending (ties: newer first)
 * 3. graph facts, hops ascending, then anchor / relation / object
 *
 * Optional items are kept as a priority prefix: the first item that does not
 * fit ends the block and everything after it is dropped whole.
 */

import type { ExtractedFacts } from '../types/extraction.js';
import type { GraphFact } from '../types/graph.js';
import type { ScoredChunk } from '../types/journal.js';
import type { ContextBlock, ContextItem, StageResult } from '../types/pipeline.js';
import {
  compareGraphFacts,
  compareScoredChunks,
  formatCurrentFacts,
  formatGraphItem,
  formatSemanticItem,
} from '../utils/contextFormatting.js';
import { countTokens, type TokenCounter } from '../utils/tokenCounter.js';

export class ContextBudgeter {
  constructor(private readonly counter: TokenCounter = countTokens) {}

  assemble(
    semantic: StageResult<ScoredChunk[]>,
    graph: StageResult<GraphFact[]>,
    facts: ExtractedFacts,
    maxTokens: number
  ): ContextBlock {
    const required: ContextItem[] = [];
    const factLine = formatCurrentFacts(facts);
    if (factLine) {
      required.push(this.item('fact', factLine));
    }

    const optional: ContextItem[] = [
      ...(semantic.ok ? [...semantic.value].sort(compareScoredChunks) : []).map((hit) =>
        this.item('semantic', formatSemanticItem(hit))
      ),
      ...(graph.ok ? [...graph.value].sort(compareGraphFacts) : []).map((fact) =>
        this.item('graph', formatGraphItem(fact))
      ),
    ];

    // Counted over the joined text so separators are inside the budget
    const items = [...required];
    let text = required.map((item) => item.text).join('\n');
    let tokenCount = this.counter(text);
    let cut = optional.length;

    for (let i = 0; i < optional.length; i++) {
      const candidate = text ? `${text}\n${optional[i].text}` : optional[i].text;
      const candidateTokens = this.counter(candidate);
      if (candidateTokens > maxTokens) {
        cut = i;
        break;
      }
      items.push(optional[i]);
      text = candidate;
      tokenCount = candidateTokens;
    }

    const dropped = optional.slice(cut);
    if (dropped.length > 0) {
      console.log(`[Budget] Dropped ${dropped.length} context items to fit ${maxTokens} tokens`);
    }

    return {
      items,
      dropped,
      tokenCount,
      text,
    };
  }

  private item(kind: ContextItem['kind'], text: string): ContextItem {
    return { kind, text, tokens: this.counter(text) };
  }
}
