/**
 * Translation error taxonomy
 *
 * Every failure the engine raises is a TranslationError with a kind that
 * drives the recovery decision (see recovery.ts).
 */

export type TranslationErrorKind =
  | 'network'
  | 'rate_limit'
  | 'timeout'
  | 'invalid_response'
  | 'parse_error'
  | 'validation_failed'
  | 'provider_error'
  | 'config_error'
  | 'resource_exhausted'
  | 'unknown';

interface KindPolicy {
  retryable: boolean;
  baseDelayMs: number;
  maxRetries: number;
}

const DEFAULT_POLICY: KindPolicy = { retryable: false, baseDelayMs: 1000, maxRetries: 1 };

const KIND_POLICIES: Partial<Record<TranslationErrorKind, KindPolicy>> = {
  rate_limit: { retryable: true, baseDelayMs: 60_000, maxRetries: 5 },
  network: { retryable: true, baseDelayMs: 10_000, maxRetries: 3 },
  timeout: { retryable: true, baseDelayMs: 5_000, maxRetries: 3 },
  invalid_response: { retryable: true, baseDelayMs: 2_000, maxRetries: 2 },
};

export const policyFor = (kind: TranslationErrorKind): KindPolicy =>
  KIND_POLICIES[kind] ?? DEFAULT_POLICY;

export const isRetryableKind = (kind: TranslationErrorKind): boolean => policyFor(kind).retryable;

export interface TranslationErrorOptions {
  affectedEntries?: number[];
  retryCount?: number;
  cause?: unknown;
}

export class TranslationError extends Error {
  readonly kind: TranslationErrorKind;
  readonly affectedEntries: number[];
  readonly retryCount: number;

  constructor(kind: TranslationErrorKind, message: string, options: TranslationErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TranslationError';
    this.kind = kind;
    this.affectedEntries = options.affectedEntries ?? [];
    this.retryCount = options.retryCount ?? 0;
  }

  withEntries(entries: number[]): TranslationError {
    return new TranslationError(this.kind, this.message, {
      affectedEntries: entries,
      retryCount: this.retryCount,
      cause: this.cause,
    });
  }

  withRetries(count: number): TranslationError {
    return new TranslationError(this.kind, this.message, {
      affectedEntries: this.affectedEntries,
      retryCount: count,
      cause: this.cause,
    });
  }

  shouldRetry(): boolean {
    const policy = policyFor(this.kind);
    return policy.retryable && this.retryCount < policy.maxRetries;
  }

  /** Exponential: base delay for the kind doubled per retry already spent */
  retryDelayMs(): number {
    return policyFor(this.kind).baseDelayMs * 2 ** this.retryCount;
  }

  userMessage(): string {
    switch (this.kind) {
      case 'network':
        return 'Network connection error. Please check your internet connection.';
      case 'rate_limit':
        return 'API rate limit reached. Please wait before retrying.';
      case 'timeout':
        return 'Request timed out. The server may be overloaded.';
      case 'invalid_response':
        return 'Received invalid response from translation service.';
      case 'parse_error':
        return 'Failed to parse translation response.';
      case 'validation_failed':
        return `Translation validation failed: ${this.message}`;
      case 'provider_error':
        return `Translation provider error: ${this.message}`;
      case 'config_error':
        return `Configuration error: ${this.message}`;
      case 'resource_exhausted':
        return 'System resources exhausted. Please free up memory or disk space.';
      case 'unknown':
        return `Unexpected error: ${this.message}`;
    }
  }

  override toString(): string {
    const cause = this.cause instanceof Error ? ` (caused by: ${this.cause.message})` : '';
    return `${this.kind}: ${this.message}${cause}`;
  }
}

/**
 * Wrap anything thrown by foreign code. Errors that already carry a kind are
 * returned as they are.
 */
export function classifyError(error: unknown, affectedEntries: number[] = []): TranslationError {
  if (error instanceof TranslationError) {
    return error.affectedEntries.length > 0 || affectedEntries.length === 0
      ? error
      : error.withEntries(affectedEntries);
  }

  const message = error instanceof Error ? error.message : String(error);
  const lower = message.toLowerCase();

  let kind: TranslationErrorKind = 'unknown';
  if (error instanceof Error && error.name === 'AbortError') {
    kind = 'timeout';
  } else if (lower.includes('rate limit') || lower.includes('429')) {
    kind = 'rate_limit';
  } else if (lower.includes('timed out') || lower.includes('timeout')) {
    kind = 'timeout';
  } else if (lower.includes('econnreset') || lower.includes('econnrefused') || lower.includes('network')) {
    kind = 'network';
  } else if (error instanceof SyntaxError) {
    kind = 'parse_error';
  }

  return new TranslationError(kind, message, { affectedEntries, cause: error });
}
