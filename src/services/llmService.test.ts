import { beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { DependencyUnavailableError, SchemaValidationError } from '../utils/errors.js';

const ai = vi.hoisted(() => {
  class NoObjectGeneratedError extends Error {
    static isInstance(error: unknown): error is NoObjectGeneratedError {
      return error instanceof NoObjectGeneratedError;
    }
  }
  class TypeValidationError extends Error {
    static isInstance(error: unknown): error is TypeValidationError {
      return error instanceof TypeValidationError;
    }
  }

  return {
    generateText: vi.fn(),
    generateObject: vi.fn(),
    embed: vi.fn(),
    embedMany: vi.fn(),
    NoObjectGeneratedError,
    TypeValidationError,
  };
});

vi.mock('ai', () => ai);

import { OpenAiEmbeddingProvider } from './embeddingGenerationService.js';
import { OpenAiTextGenerator } from './llmService.js';

describe('OpenAiTextGenerator', () => {
  beforeEach(() => {
    ai.generateText.mockReset();
  });

  it('is unavailable without an API key', async () => {
    const generator = new OpenAiTextGenerator('gpt-4o-mini');

    expect(generator.isAvailable()).toBe(false);
    await expect(
      generator.complete({ system: 's', messages: [], maxOutputTokens: 10, functionId: 'test' })
    ).rejects.toBeInstanceOf(DependencyUnavailableError);
    expect(ai.generateText).not.toHaveBeenCalled();
  });

  it('passes the prompt and limits through and trims the reply', async () => {
    ai.generateText.mockResolvedValueOnce({ text: '  How did that feel?  ' });
    const generator = new OpenAiTextGenerator('gpt-4o-mini', 'test-key');

    const reply = await generator.complete({
      system: 'Be kind.',
      messages: [
        { role: 'user', content: 'Rough day.' },
        { role: 'assistant', content: 'What happened?' },
        { role: 'user', content: 'Deadlines.' },
      ],
      maxOutputTokens: 100,
      temperature: 0.2,
      functionId: 'journal-reply',
    });

    expect(reply).toBe('How did that feel?');
    expect(ai.generateText.mock.calls[0][0]).toMatchObject({
      system: 'Be kind.',
      maxTokens: 100,
      temperature: 0.2,
      messages: [
        { role: 'user', content: 'Rough day.' },
        { role: 'assistant', content: 'What happened?' },
        { role: 'user', content: 'Deadlines.' },
      ],
      experimental_telemetry: { isEnabled: true, functionId: 'journal-reply' },
    });
  });

  it('reports provider errors as an unavailable dependency', async () => {
    ai.generateText.mockRejectedValueOnce(new Error('429 Too Many Requests'));
    const generator = new OpenAiTextGenerator('gpt-4o-mini', 'test-key');

    await expect(
      generator.complete({ system: 's', messages: [], maxOutputTokens: 10, functionId: 'test' })
    ).rejects.toThrow('generation unavailable: 429 Too Many Requests');
  });
});

describe('OpenAiTextGenerator.completeObject', () => {
  const MoodSchema = z.object({ mood: z.string() });
  const request = {
    system: 'Extract the mood.',
    prompt: 'I feel calm today.',
    schema: MoodSchema,
    maxOutputTokens: 50,
    temperature: 0,
    functionId: 'nlu-extract',
  };

  beforeEach(() => {
    ai.generateObject.mockReset();
  });

  it('returns the validated object and passes the schema through', async () => {
    ai.generateObject.mockResolvedValueOnce({ object: { mood: 'calm' } });
    const generator = new OpenAiTextGenerator('gpt-4o-mini', 'test-key');

    expect(await generator.completeObject(request)).toEqual({ mood: 'calm' });
    expect(ai.generateObject.mock.calls[0][0]).toMatchObject({
      schema: MoodSchema,
      system: 'Extract the mood.',
      prompt: 'I feel calm today.',
      maxTokens: 50,
      temperature: 0,
      experimental_telemetry: { isEnabled: true, functionId: 'nlu-extract' },
    });
  });

  it('reports unparseable or mismatched output as a schema failure', async () => {
    ai.generateObject.mockRejectedValueOnce(new ai.NoObjectGeneratedError('No object generated'));
    ai.generateObject.mockRejectedValueOnce(new ai.TypeValidationError('Type validation failed'));
    const generator = new OpenAiTextGenerator('gpt-4o-mini', 'test-key');

    await expect(generator.completeObject(request)).rejects.toBeInstanceOf(SchemaValidationError);
    await expect(generator.completeObject(request)).rejects.toBeInstanceOf(SchemaValidationError);
  });

  it('reports provider errors as an unavailable dependency', async () => {
    ai.generateObject.mockRejectedValueOnce(new Error('503 Service Unavailable'));
    const generator = new OpenAiTextGenerator('gpt-4o-mini', 'test-key');

    await expect(generator.completeObject(request)).rejects.toThrow('generation unavailable: 503 Service Unavailable');
  });

  it('rejects without an API key', async () => {
    await expect(new OpenAiTextGenerator('gpt-4o-mini').completeObject(request)).rejects.toBeInstanceOf(
      DependencyUnavailableError
    );
    expect(ai.generateObject).not.toHaveBeenCalled();
  });
});

describe('OpenAiEmbeddingProvider', () => {
  beforeEach(() => {
    ai.embed.mockReset();
    ai.embedMany.mockReset();
  });

  it('records the model as the embedding version', () => {
    expect(new OpenAiEmbeddingProvider('text-embedding-3-small').version).toBe('openai:text-embedding-3-small');
  });

  it('rejects without an API key', async () => {
    await expect(new OpenAiEmbeddingProvider('text-embedding-3-small').embed('hello')).rejects.toThrow(
      'embedding unavailable: no OpenAI API key configured'
    );
  });

  it('returns one vector per input and skips the call for no input', async () => {
    ai.embedMany.mockResolvedValueOnce({ embeddings: [[1, 0], [0, 1]] });
    const provider = new OpenAiEmbeddingProvider('text-embedding-3-small', 'test-key');

    expect(await provider.embedMany(['first', 'second'])).toEqual([[1, 0], [0, 1]]);
    expect(await provider.embedMany([])).toEqual([]);
    expect(ai.embedMany).toHaveBeenCalledTimes(1);
  });

  it('reports provider errors as an unavailable dependency', async () => {
    ai.embed.mockRejectedValueOnce(new Error('network down'));
    const provider = new OpenAiEmbeddingProvider('text-embedding-3-small', 'test-key');

    await expect(provider.embed('hello')).rejects.toThrow('embedding unavailable: network down');
  });
});
