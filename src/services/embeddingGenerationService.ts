/**
 * Embedding Generation Service
 *
 * Embeds queries and entry chunks with an OpenAI embedding model
 * (text-embedding-3-small by default, 1536 dimensions).
 * Batches embeddings for efficiency (up to 2048 inputs per call).
 */

import { embed, embedMany } from 'ai';
import { createOpenAI, type OpenAIProvider } from '@ai-sdk/openai';
import type { EmbeddingProvider } from '../types/capabilities.js';
import { DependencyUnavailableError, asUnavailable } from '../utils/errors.js';

const BATCH_SIZE = 2048;

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly version: string;
  private readonly provider?: OpenAIProvider;

  constructor(
    private readonly model: string,
    apiKey?: string
  ) {
    this.version = `openai:${model}`;
    this.provider = apiKey ? createOpenAI({ apiKey }) : undefined;
  }

  private requireProvider(): OpenAIProvider {
    if (!this.provider) {
      throw new DependencyUnavailableError('embedding', 'no OpenAI API key configured');
    }
    return this.provider;
  }

  async embed(text: string): Promise<number[]> {
    const provider = this.requireProvider();

    try {
      const { embedding } = await embed({
        model: provider.embedding(this.model),
        value: text,
      });
      return embedding;
    } catch (error) {
      throw asUnavailable('embedding', error);
    }
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const provider = this.requireProvider();
    const allEmbeddings: number[][] = [];

    try {
      for (let i = 0; i < texts.length; i += BATCH_SIZE) {
        const { embeddings } = await embedMany({
          model: provider.embedding(this.model),
          values: texts.slice(i, i + BATCH_SIZE),
        });
        allEmbeddings.push(...embeddings);
      }
    } catch (error) {
      throw asUnavailable('embedding', error);
    }

    return allEmbeddings;
  }
}
