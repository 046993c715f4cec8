/**
 * Scripted provider for tests and dry runs.
 *
 * Each call consumes the next scripted step. A step is either the raw text
 * to return, an error to throw, or a function of the request messages.
 * Once the script is used up the provider falls back to `echo`, which
 * answers every requested entry with a tagged copy of its text.
 */

import type { CompletionOptions, CompletionResult, ILLMProvider, Message } from '../interfaces/llm-provider.js';
import { TranslationError } from '../quality/errors.js';

export type MockStep = string | Error | ((messages: Message[]) => string);

export interface MockProviderOptions {
  model?: string;
  script?: MockStep[];
  /** Prefix used by the echo fallback */
  echoPrefix?: string;
}

interface RequestedEntry {
  id: number;
  text: string;
}

function requestedEntries(messages: Message[]): RequestedEntry[] {
  const last = messages[messages.length - 1];
  if (!last) return [];
  try {
    const parsed: unknown = JSON.parse(last.content);
    if (typeof parsed !== 'object' || parsed === null || !('entries_to_translate' in parsed)) return [];
    const entries = parsed.entries_to_translate;
    if (!Array.isArray(entries)) return [];
    return entries.flatMap((e: unknown) =>
      typeof e === 'object' && e !== null && 'id' in e && 'text' in e &&
      typeof e.id === 'number' && typeof e.text === 'string'
        ? [{ id: e.id, text: e.text }]
        : []
    );
  } catch {
    return [];
  }
}

export class MockProvider implements ILLMProvider {
  readonly name = 'mock';
  readonly model: string;
  readonly maxTokens = 4096;

  readonly calls: Message[][] = [];
  private script: MockStep[];
  private echoPrefix: string;

  constructor(options: MockProviderOptions = {}) {
    this.model = options.model ?? 'mock-model';
    this.script = [...(options.script ?? [])];
    this.echoPrefix = options.echoPrefix ?? '[T] ';
  }

  get callCount(): number {
    return this.calls.length;
  }

  enqueue(...steps: MockStep[]): void {
    this.script.push(...steps);
  }

  async complete(messages: Message[], options?: CompletionOptions): Promise<CompletionResult> {
    this.calls.push(messages);
    if (options?.signal?.aborted) {
      throw new TranslationError('timeout', 'Request aborted');
    }

    const step = this.script.shift();
    let content: string;
    if (step === undefined) {
      content = this.echo(messages);
    } else if (step instanceof Error) {
      throw step;
    } else if (typeof step === 'function') {
      content = step(messages);
    } else {
      content = step;
    }

    return {
      content,
      tokensUsed: { prompt: 0, completion: 0, total: 0 },
      finishReason: 'stop',
      model: this.model,
    };
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  /** Translate every requested entry as `<prefix><text>` */
  echo(messages: Message[]): string {
    return JSON.stringify({
      translations: requestedEntries(messages).map(e => ({
        id: e.id,
        translated: `${this.echoPrefix}${e.text}`,
        confidence: 0.9,
      })),
    });
  }
}
