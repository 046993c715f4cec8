/**
 * Error recovery - maps a classified failure to the next action.
 *
 * `decideRecovery` is a pure function of (error, state, strategy) so the
 * whole decision table can be tested without a provider. `ErrorRecovery`
 * wraps it with the running state for one batch.
 */

import { TranslationError, type TranslationErrorKind } from './errors.js';

export type RecoveryAction =
  | { type: 'retry'; delayMs: number; modifiedParams: boolean }
  | { type: 'skip'; entries: number[] }
  | { type: 'use_fallback'; entries: number[] }
  | { type: 'reduce_batch_size'; newSize: number }
  | { type: 'switch_provider'; reason: string }
  | { type: 'abort'; reason: string }
  | { type: 'continue_partial'; completed: number[]; failed: number[] };

export interface RecoveryStrategy {
  maxRetries: number;
  maxRetryDurationMs: number;
  useFallback: boolean;
  allowPartial: boolean;
  minBatchSize: number;
  allowProviderSwitch: boolean;
}

export type RecoveryProfile = 'default' | 'aggressive' | 'fast_fail';

export const RECOVERY_STRATEGIES: Record<RecoveryProfile, RecoveryStrategy> = {
  default: {
    maxRetries: 3,
    maxRetryDurationMs: 300_000,
    useFallback: true,
    allowPartial: true,
    minBatchSize: 1,
    allowProviderSwitch: false,
  },
  aggressive: {
    maxRetries: 5,
    maxRetryDurationMs: 600_000,
    useFallback: true,
    allowPartial: true,
    minBatchSize: 1,
    allowProviderSwitch: true,
  },
  fast_fail: {
    maxRetries: 1,
    maxRetryDurationMs: 30_000,
    useFallback: false,
    allowPartial: false,
    minBatchSize: 10,
    allowProviderSwitch: false,
  },
};

export interface RecoveryState {
  totalRetries: number;
  retriesByKind: Partial<Record<TranslationErrorKind, number>>;
}

export const initialRecoveryState = (): RecoveryState => ({ totalRetries: 0, retriesByKind: {} });

export interface RecoveryDecision {
  action: RecoveryAction;
  state: RecoveryState;
}

export function describeAction(action: RecoveryAction): string {
  switch (action.type) {
    case 'retry':
      return action.modifiedParams
        ? `Retry with modified parameters after ${action.delayMs}ms`
        : `Retry after ${action.delayMs}ms`;
    case 'skip':
      return `Skip ${action.entries.length} entries`;
    case 'use_fallback':
      return `Use fallback for ${action.entries.length} entries`;
    case 'reduce_batch_size':
      return `Reduce batch size to ${action.newSize}`;
    case 'switch_provider':
      return `Switch provider: ${action.reason}`;
    case 'abort':
      return `Abort: ${action.reason}`;
    case 'continue_partial':
      return `Continue with ${action.completed.length} completed, ${action.failed.length} failed`;
  }
}

export const allowsContinuation = (action: RecoveryAction): boolean => action.type !== 'abort';

function finalAction(error: TranslationError, strategy: RecoveryStrategy): RecoveryAction {
  if (strategy.useFallback && error.affectedEntries.length > 0) {
    return { type: 'use_fallback', entries: error.affectedEntries };
  }
  if (strategy.allowPartial) {
    return { type: 'skip', entries: error.affectedEntries };
  }
  return { type: 'abort', reason: `Max retries exceeded: ${error.message}` };
}

/**
 * Decide what to do about `error`. The retry count used for backoff and for
 * the per-kind limit is the number of retries already spent on this kind,
 * so repeated rate limits back off 1x, 2x, 4x the base delay.
 */
export function decideRecovery(
  error: TranslationError,
  state: RecoveryState,
  strategy: RecoveryStrategy
): RecoveryDecision {
  const keep = (action: RecoveryAction): RecoveryDecision => ({ action, state });
  const spend = (action: RecoveryAction): RecoveryDecision => ({
    action,
    state: {
      totalRetries: state.totalRetries + 1,
      retriesByKind: {
        ...state.retriesByKind,
        [error.kind]: (state.retriesByKind[error.kind] ?? 0) + 1,
      },
    },
  });

  if (state.totalRetries >= strategy.maxRetries) {
    return keep(finalAction(error, strategy));
  }

  const counted = error.withRetries(state.retriesByKind[error.kind] ?? 0);
  const retry = (modifiedParams: boolean): RecoveryDecision =>
    spend({ type: 'retry', delayMs: counted.retryDelayMs(), modifiedParams });

  switch (error.kind) {
    case 'rate_limit':
      return retry(false);

    case 'network':
    case 'timeout':
      if (counted.shouldRetry()) return retry(false);
      if (strategy.useFallback) return keep({ type: 'use_fallback', entries: error.affectedEntries });
      return keep({ type: 'abort', reason: error.message });

    case 'invalid_response':
    case 'parse_error':
      if (strategy.minBatchSize < error.affectedEntries.length) {
        return spend({
          type: 'reduce_batch_size',
          newSize: Math.max(Math.floor(error.affectedEntries.length / 2), strategy.minBatchSize),
        });
      }
      if (counted.shouldRetry()) return retry(true);
      return keep(finalAction(error, strategy));

    case 'validation_failed':
      if (strategy.allowPartial && error.affectedEntries.length > 0) {
        return keep({ type: 'continue_partial', completed: [], failed: error.affectedEntries });
      }
      if (strategy.useFallback) return keep({ type: 'use_fallback', entries: error.affectedEntries });
      return keep({ type: 'abort', reason: error.message });

    case 'provider_error':
      if (strategy.allowProviderSwitch) return keep({ type: 'switch_provider', reason: error.message });
      if (counted.shouldRetry()) return retry(false);
      return keep(finalAction(error, strategy));

    case 'config_error':
      return keep({ type: 'abort', reason: `Configuration error: ${error.message}` });

    case 'resource_exhausted':
      return keep({ type: 'abort', reason: 'System resources exhausted' });

    case 'unknown':
      if (counted.shouldRetry()) return retry(false);
      return keep(finalAction(error, strategy));
  }
}

export class ErrorRecovery {
  private state: RecoveryState = initialRecoveryState();
  private seen: TranslationError[] = [];

  constructor(readonly strategy: RecoveryStrategy = RECOVERY_STRATEGIES.default) {}

  handleError(error: TranslationError): RecoveryAction {
    this.seen.push(error);
    const decision = decideRecovery(error, this.state, this.strategy);
    this.state = decision.state;
    return decision.action;
  }

  reset(): void {
    this.state = initialRecoveryState();
    this.seen = [];
  }

  errors(): readonly TranslationError[] {
    return this.seen;
  }

  retryCount(): number {
    return this.state.totalRetries;
  }

  errorSummary(): string {
    if (this.seen.length === 0) {
      return 'No errors';
    }
    const counts = new Map<TranslationErrorKind, number>();
    for (const error of this.seen) {
      counts.set(error.kind, (counts.get(error.kind) ?? 0) + 1);
    }
    const parts = [...counts].map(([kind, count]) => `${kind}: ${count}`);
    return `${this.seen.length} errors (${parts.join(', ')}), ${this.state.totalRetries} retries`;
  }
}
