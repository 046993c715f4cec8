/**
 * Per-batch retry state machine.
 *
 * Pure transitions over (attempt count, pending ids, chunk size, last error,
 * recovery state). The translation stage performs the I/O and feeds each
 * outcome back in as an event.
 */

import type { TranslationError } from './errors.js';
import {
  decideRecovery,
  initialRecoveryState,
  type RecoveryAction,
  type RecoveryState,
  type RecoveryStrategy,
} from './recovery.js';

export type RetryPhase = 'request' | 'waiting' | 'done' | 'exhausted' | 'aborted';

export interface BatchRetryState {
  phase: RetryPhase;
  /** Requests made so far */
  attempt: number;
  /** Ids not yet answered, in batch order */
  pending: number[];
  chunkSize: number;
  /** 0 for the primary provider, 1 after a switch to the fallback */
  providerIndex: number;
  delayMs: number;
  retriesUsed: number;
  fallbackIds: number[];
  skippedIds: number[];
  recovery: RecoveryState;
  lastError?: TranslationError;
  lastAction?: RecoveryAction;
  abortReason?: string;
}

export interface RetryContext {
  strategy: RecoveryStrategy;
  /** Hard cap on requests for the batch */
  maxAttempts: number;
  canSwitchProvider: boolean;
  fallbackEnabled: boolean;
}

export type RetryEvent =
  | { type: 'success' }
  | { type: 'failure'; error: TranslationError }
  | { type: 'resumed' };

export function initialRetryState(ids: readonly number[], chunkSize: number = ids.length): BatchRetryState {
  return {
    phase: ids.length > 0 ? 'request' : 'done',
    attempt: 0,
    pending: [...ids],
    chunkSize: Math.max(1, chunkSize),
    providerIndex: 0,
    delayMs: 0,
    retriesUsed: 0,
    fallbackIds: [],
    skippedIds: [],
    recovery: initialRecoveryState(),
  };
}

/** Ids the next request should carry */
export const currentChunk = (state: BatchRetryState): number[] => state.pending.slice(0, state.chunkSize);

function settleChunk(state: BatchRetryState, into?: 'fallbackIds' | 'skippedIds'): BatchRetryState {
  const chunk = currentChunk(state);
  const pending = state.pending.slice(chunk.length);
  const next: BatchRetryState = {
    ...state,
    pending,
    phase: pending.length > 0 ? 'request' : 'done',
    delayMs: 0,
  };
  if (into) next[into] = [...state[into], ...chunk];
  return next;
}

export function transition(state: BatchRetryState, event: RetryEvent, ctx: RetryContext): BatchRetryState {
  switch (event.type) {
    case 'resumed':
      return state.phase === 'waiting' ? { ...state, phase: 'request', delayMs: 0 } : state;

    case 'success':
      return settleChunk({ ...state, attempt: state.attempt + 1 });

    case 'failure':
      return onFailure(state, event.error, ctx);
  }
}

function onFailure(state: BatchRetryState, error: TranslationError, ctx: RetryContext): BatchRetryState {
  const chunk = currentChunk(state);
  const affected = error.withEntries(chunk);
  const decision = decideRecovery(affected, state.recovery, ctx.strategy);
  const base: BatchRetryState = {
    ...state,
    attempt: state.attempt + 1,
    recovery: decision.state,
    lastError: affected,
    lastAction: decision.action,
  };
  const outOfAttempts = base.attempt >= ctx.maxAttempts;
  const fallbackOrAbort = (reason: string): BatchRetryState =>
    ctx.fallbackEnabled ? settleChunk(base, 'fallbackIds') : { ...base, phase: 'aborted', abortReason: reason };

  const action = decision.action;
  switch (action.type) {
    case 'retry':
      if (outOfAttempts) return { ...base, phase: 'exhausted' };
      return { ...base, phase: 'waiting', delayMs: action.delayMs, retriesUsed: base.retriesUsed + 1 };

    case 'reduce_batch_size':
      if (outOfAttempts) return { ...base, phase: 'exhausted' };
      return {
        ...base,
        phase: 'request',
        delayMs: 0,
        chunkSize: Math.max(1, Math.min(action.newSize, chunk.length)),
        retriesUsed: base.retriesUsed + 1,
      };

    case 'switch_provider':
      if (ctx.canSwitchProvider && base.providerIndex === 0 && !outOfAttempts) {
        return { ...base, phase: 'request', delayMs: 0, providerIndex: 1, retriesUsed: base.retriesUsed + 1 };
      }
      return fallbackOrAbort(action.reason);

    case 'use_fallback':
      return fallbackOrAbort(error.message);

    case 'skip':
    case 'continue_partial':
      return settleChunk(base, 'skippedIds');

    case 'abort':
      return { ...base, phase: 'aborted', abortReason: action.reason };
  }
}
