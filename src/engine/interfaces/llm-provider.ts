/**
 * LLM Provider interface - abstraction for different AI providers
 *
 * Implementations raise TranslationError (see quality/errors.ts) so the
 * recovery handler can classify failures without knowing the provider.
 */

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask for a bare JSON object where the provider supports it */
  jsonMode?: boolean;
  /** Aborts the request; the engine uses it for per-request timeouts */
  signal?: AbortSignal;
}

export interface CompletionResult {
  content: string;
  tokensUsed: {
    prompt: number;
    completion: number;
    total: number;
  };
  finishReason: 'stop' | 'length' | 'content_filter' | 'error';
  model: string;
}

export interface ILLMProvider {
  readonly name: string;
  readonly model: string;
  /** Output token ceiling for one completion */
  readonly maxTokens: number;

  /**
   * Send a completion request to the LLM
   */
  complete(messages: Message[], options?: CompletionOptions): Promise<CompletionResult>;

  /**
   * Check if the provider is available and configured
   */
  isAvailable(): Promise<boolean>;
}

export interface LLMProviderConfig {
  /** Provider name reported to the engine; selects its rate-limit profile */
  name?: string;
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeout?: number;
  maxRetries?: number;
  maxTokens?: number;
}
