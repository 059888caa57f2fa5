/**
 * Parser-based entity tagger
 *
 * Deterministic, offline fallback for entity extraction. Finds runs of
 * capitalized tokens and assigns a coarse category from suffix words and the
 * preposition in front of the run:
 * - organization: "Acme Corp", "works at Blue Bottle"
 * - place: "Lake Tahoe", "moved to Denver" (cue: in/from/near/...)
 * - person: everything else
 *
 * No emotions, no relationships, no network.
 */

import natural from 'natural';
import { readFileSync } from 'fs';
import { z } from 'zod';
import type { EntityTagger } from '../types/capabilities.js';
import type { ExtractedEntity } from '../types/extraction.js';

const LexiconSchema = z.object({
  stopwords: z.array(z.string()),
  connectors: z.array(z.string()),
  organizationSuffixes: z.array(z.string()),
  placeSuffixes: z.array(z.string()),
  placeCues: z.array(z.string()),
  organizationCues: z.array(z.string()),
});

export type TaggerLexicon = z.infer<typeof LexiconSchema>;

const LEXICON_URL = new URL('../../data/fallback-lexicon.json', import.meta.url);

export function loadTaggerLexicon(): TaggerLexicon {
  return LexiconSchema.parse(JSON.parse(readFileSync(LEXICON_URL, 'utf-8')));
}

type TaggedCategory = Extract<ExtractedEntity['type'], 'person' | 'organization' | 'place'>;

function isCapitalized(token: string): boolean {
  return /^[A-Z][A-Za-z]*$/.test(token);
}

export class ParserEntityTagger implements EntityTagger {
  private readonly tokenizer = new natural.WordTokenizer();
  private readonly stopwords: Set<string>;
  private readonly connectors: Set<string>;
  private readonly organizationSuffixes: Set<string>;
  private readonly placeSuffixes: Set<string>;
  private readonly placeCues: Set<string>;
  private readonly organizationCues: Set<string>;

  constructor(lexicon: TaggerLexicon = loadTaggerLexicon()) {
    this.stopwords = new Set(lexicon.stopwords.map((w) => w.toLowerCase()));
    this.connectors = new Set(lexicon.connectors);
    this.organizationSuffixes = new Set(lexicon.organizationSuffixes);
    this.placeSuffixes = new Set(lexicon.placeSuffixes);
    this.placeCues = new Set(lexicon.placeCues);
    this.organizationCues = new Set(lexicon.organizationCues);
  }

  tag(text: string): ExtractedEntity[] {
    const entities: ExtractedEntity[] = [];
    const seen = new Set<string>();

    for (const sentence of text.split(/[.!?;\n]+/)) {
      const tokens = this.tokenizer.tokenize(sentence) ?? [];

      for (const run of this.capitalizedRuns(tokens)) {
        const name = run.tokens.join(' ');
        const type = this.categorize(run.tokens, run.previous);
        const dedupeKey = `${type}:${name.toLowerCase()}`;

        if (!seen.has(dedupeKey)) {
          seen.add(dedupeKey);
          entities.push({ name, type });
        }
      }
    }

    return entities;
  }

  /**
   * Maximal runs of capitalized tokens, allowing lowercase connectors between
   * two capitalized tokens ("Bank of America"). Single stopwords never form a run.
   */
  private capitalizedRuns(tokens: string[]): Array<{ tokens: string[]; previous?: string }> {
    const runs: Array<{ tokens: string[]; previous?: string }> = [];
    let i = 0;

    while (i < tokens.length) {
      if (!isCapitalized(tokens[i]) || this.stopwords.has(tokens[i].toLowerCase())) {
        i++;
        continue;
      }

      const start = i;
      const runTokens = [tokens[i]];
      i++;

      while (i < tokens.length) {
        if (isCapitalized(tokens[i]) && !this.stopwords.has(tokens[i].toLowerCase())) {
          runTokens.push(tokens[i]);
          i++;
        } else if (
          this.connectors.has(tokens[i]) &&
          i + 1 < tokens.length &&
          isCapitalized(tokens[i + 1]) &&
          !this.stopwords.has(tokens[i + 1].toLowerCase())
        ) {
          runTokens.push(tokens[i], tokens[i + 1]);
          i += 2;
        } else {
          break;
        }
      }

      runs.push({ tokens: runTokens, previous: start > 0 ? tokens[start - 1].toLowerCase() : undefined });
    }

    return runs;
  }

  private categorize(runTokens: string[], previous?: string): TaggedCategory {
    if (runTokens.some((token) => this.organizationSuffixes.has(token))) {
      return 'organization';
    }
    if (runTokens.some((token) => this.placeSuffixes.has(token))) {
      return 'place';
    }
    if (previous && this.placeCues.has(previous)) {
      return 'place';
    }
    if (previous && this.organizationCues.has(previous)) {
      return 'organization';
    }
    return 'person';
  }
}
