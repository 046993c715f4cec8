/**
 * OpenAI LLM Provider implementation
 *
 * Also talks to OpenAI-compatible servers (Anthropic's compatibility
 * endpoint, Ollama, LM Studio) through `baseUrl`; `name` then carries the
 * server's provider name so its own limits apply.
 *
 * The SDK's own retries are switched off: retry and backoff belong to the
 * engine's recovery handler, which needs to see every failure.
 */

import OpenAI from 'openai';
import type {
  ILLMProvider,
  LLMProviderConfig,
  Message,
  CompletionOptions,
  CompletionResult,
} from '../interfaces/llm-provider.js';
import { TranslationError, classifyError } from '../quality/errors.js';

export class OpenAIProvider implements ILLMProvider {
  readonly name: string;
  readonly model: string;
  readonly maxTokens: number;

  private client: OpenAI;

  constructor(config: LLMProviderConfig) {
    if (!config.apiKey) {
      throw new TranslationError('config_error', 'OpenAI API key is not configured');
    }
    this.name = config.name ?? 'openai';
    this.model = config.model ?? 'gpt-4o-mini';
    this.maxTokens = config.maxTokens ?? 4096;

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeout ?? 120_000,
      maxRetries: config.maxRetries ?? 0,
    });
  }

  async complete(messages: Message[], options?: CompletionOptions): Promise<CompletionResult> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: messages.map(m => ({
            role: m.role,
            content: m.content,
          })),
          temperature: options?.temperature ?? 0.3,
          max_tokens: options?.maxTokens ?? this.maxTokens,
          response_format: options?.jsonMode ? { type: 'json_object' } : undefined,
        },
        { signal: options?.signal }
      );

      const choice = response.choices[0];
      if (!choice) {
        throw new TranslationError('invalid_response', 'Response contained no choices');
      }

      return {
        content: choice.message.content ?? '',
        tokensUsed: {
          prompt: response.usage?.prompt_tokens ?? 0,
          completion: response.usage?.completion_tokens ?? 0,
          total: response.usage?.total_tokens ?? 0,
        },
        finishReason: this.mapFinishReason(choice.finish_reason),
        model: response.model,
      };
    } catch (error) {
      throw this.mapError(error);
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (error) {
      console.warn(`[OpenAIProvider] Availability check failed: ${this.mapError(error).message}`);
      return false;
    }
  }

  private mapError(error: unknown): TranslationError {
    if (error instanceof TranslationError) return error;

    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof OpenAI.APIUserAbortError) {
      return new TranslationError('timeout', message, { cause: error });
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new TranslationError('network', message, { cause: error });
    }
    if (error instanceof OpenAI.RateLimitError) {
      return new TranslationError('rate_limit', message, { cause: error });
    }
    if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
      return new TranslationError('config_error', message, { cause: error });
    }
    if (error instanceof OpenAI.BadRequestError || error instanceof OpenAI.NotFoundError) {
      return new TranslationError('provider_error', message, { cause: error });
    }
    if (error instanceof OpenAI.InternalServerError) {
      return new TranslationError('network', message, { cause: error });
    }
    if (error instanceof OpenAI.APIError) {
      return new TranslationError('provider_error', message, { cause: error });
    }
    return classifyError(error);
  }

  private mapFinishReason(reason: string | null): CompletionResult['finishReason'] {
    switch (reason) {
      case 'stop':
        return 'stop';
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'error';
    }
  }
}
