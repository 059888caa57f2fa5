/**
 * Text generation over the AI SDK.
 *
 * One OpenAiTextGenerator per model role (chat, extraction, summary). Any
 * provider failure surfaces as DependencyUnavailableError('generation');
 * structured output that fails its schema surfaces as SchemaValidationError.
 */

import { NoObjectGeneratedError, TypeValidationError, generateObject, generateText, type CoreMessage } from 'ai';
import { createOpenAI, type OpenAIProvider } from '@ai-sdk/openai';
import type { CompletionRequest, ObjectRequest, TextGenerator } from '../types/capabilities.js';
import { DependencyUnavailableError, SchemaValidationError, asUnavailable, errorMessage } from '../utils/errors.js';
import { buildLLMAttributes, withSpan } from '../utils/tracing.js';

export class OpenAiTextGenerator implements TextGenerator {
  private readonly provider?: OpenAIProvider;

  constructor(
    private readonly model: string,
    apiKey?: string
  ) {
    this.provider = apiKey ? createOpenAI({ apiKey }) : undefined;
  }

  isAvailable(): boolean {
    return this.provider !== undefined;
  }

  private requireProvider(): OpenAIProvider {
    if (!this.provider) {
      throw new DependencyUnavailableError('generation', 'no OpenAI API key configured');
    }
    return this.provider;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const provider = this.requireProvider();

    const messages: CoreMessage[] = request.messages.map((message): CoreMessage =>
      message.role === 'user'
        ? { role: 'user', content: message.content }
        : { role: 'assistant', content: message.content }
    );

    return withSpan(`llm.${request.functionId}`, buildLLMAttributes(this.model, request.functionId), async () => {
      try {
        const { text } = await generateText({
          model: provider(this.model),
          system: request.system,
          messages,
          maxTokens: request.maxOutputTokens,
          temperature: request.temperature,
          experimental_telemetry: {
            isEnabled: true,
            functionId: request.functionId,
            metadata: {
              messageCount: request.messages.length,
            },
          },
        });

        return text.trim();
      } catch (error) {
        throw asUnavailable('generation', error);
      }
    });
  }

  async completeObject<T>(request: ObjectRequest<T>): Promise<T> {
    const provider = this.requireProvider();

    return withSpan(`llm.${request.functionId}`, buildLLMAttributes(this.model, request.functionId), async () => {
      try {
        const { object } = await generateObject({
          model: provider(this.model),
          schema: request.schema,
          system: request.system,
          prompt: request.prompt,
          maxTokens: request.maxOutputTokens,
          temperature: request.temperature,
          experimental_telemetry: {
            isEnabled: true,
            functionId: request.functionId,
          },
        });

        return object;
      } catch (error) {
        if (NoObjectGeneratedError.isInstance(error) || TypeValidationError.isInstance(error)) {
          throw new SchemaValidationError('Model output did not match schema', [errorMessage(error.cause ?? error)]);
        }
        throw asUnavailable('generation', error);
      }
    });
  }
}
