/**
 * Worker pool for independent translation units
 *
 * Runs tasks with bounded concurrency (p-limit), spaces dispatches to stay
 * under the provider's request rate, and gives every task its own timeout
 * and retry loop. Outcomes come back ordered by task id, whatever order
 * the tasks finished in.
 */

import pLimit from 'p-limit';
import type { Sleep } from '../types/common.js';
import { TranslationError, classifyError } from '../quality/errors.js';
import { ErrorRecovery, RECOVERY_STRATEGIES, type RecoveryAction, type RecoveryStrategy } from '../quality/recovery.js';
import { minDispatchIntervalMs, type ProviderProfile } from '../providers/profiles.js';
import { sleep as realSleep, withTimeout } from '../utils/timing.js';

export interface WorkerPoolConfig {
  maxConcurrent: number;
  /** Minimum gap between two dispatches, across all workers */
  minDispatchIntervalMs: number;
  taskTimeoutMs: number;
  /** Attempts per task are capped at maxRetries + 1 */
  maxRetries: number;
  recovery: RecoveryStrategy;
}

export const DEFAULT_POOL_CONFIG: WorkerPoolConfig = {
  maxConcurrent: 4,
  minDispatchIntervalMs: 0,
  taskTimeoutMs: 120_000,
  maxRetries: 2,
  recovery: RECOVERY_STRATEGIES.default,
};

export interface PoolTask<T> {
  id: number;
  run: (signal: AbortSignal) => Promise<T>;
}

export type TaskOutcome<T> =
  | { id: number; ok: true; value: T; attempts: number }
  | {
      id: number;
      ok: false;
      error: TranslationError;
      attempts: number;
      /** Recovery action that ended the task; the caller may act on it (split, fallback) */
      action?: RecoveryAction;
    };

export interface PoolRunOptions {
  onProgress?: (completed: number, total: number) => void;
  signal?: AbortSignal;
}

export interface WorkerPoolOptions {
  sleep?: Sleep;
  now?: () => number;
  quiet?: boolean;
}

export class WorkerPool {
  readonly config: WorkerPoolConfig;
  private sleep: Sleep;
  private now: () => number;
  private quiet: boolean;
  private nextDispatchAt = 0;

  constructor(config: Partial<WorkerPoolConfig> = {}, options: WorkerPoolOptions = {}) {
    this.config = { ...DEFAULT_POOL_CONFIG, ...config };
    this.config.maxConcurrent = Math.max(1, this.config.maxConcurrent);
    this.sleep = options.sleep ?? realSleep;
    this.now = options.now ?? Date.now;
    this.quiet = options.quiet ?? false;
  }

  /**
   * Pool sized from a provider profile. `maxConcurrent` in overrides wins
   * over the profile.
   */
  static forProvider(
    profile: ProviderProfile,
    overrides: Partial<WorkerPoolConfig> = {},
    options: WorkerPoolOptions = {}
  ): WorkerPool {
    return new WorkerPool(
      {
        maxConcurrent: profile.maxConcurrentRequests,
        minDispatchIntervalMs: minDispatchIntervalMs(profile),
        ...overrides,
      },
      options
    );
  }

  async run<T>(tasks: readonly PoolTask<T>[], options: PoolRunOptions = {}): Promise<TaskOutcome<T>[]> {
    const limit = pLimit(this.config.maxConcurrent);
    let completed = 0;

    if (!this.quiet) {
      console.log(`[WorkerPool] Running ${tasks.length} tasks, ${this.config.maxConcurrent} at a time`);
    }

    const outcomes = await Promise.all(
      tasks.map(task =>
        limit(async () => {
          try {
            return await this.runTask(task, options.signal);
          } finally {
            completed++;
            options.onProgress?.(completed, tasks.length);
          }
        })
      )
    );

    const failed = outcomes.filter(o => !o.ok).length;
    if (failed > 0 && !this.quiet) {
      console.warn(`[WorkerPool] ${failed}/${tasks.length} tasks failed`);
    }
    return outcomes.sort((a, b) => a.id - b.id);
  }

  /**
   * Reserve the next dispatch slot and return how long to wait for it.
   * Runs synchronously, so concurrent callers get distinct slots.
   */
  private reserveSlot(): number {
    const now = this.now();
    const at = Math.max(now, this.nextDispatchAt);
    this.nextDispatchAt = at + this.config.minDispatchIntervalMs;
    return at - now;
  }

  private async runTask<T>(task: PoolTask<T>, signal?: AbortSignal): Promise<TaskOutcome<T>> {
    const recovery = new ErrorRecovery(this.config.recovery);
    const maxAttempts = this.config.maxRetries + 1;
    let attempts = 0;

    for (;;) {
      if (signal?.aborted) {
        return { id: task.id, ok: false, error: new TranslationError('unknown', 'Cancelled'), attempts };
      }

      const wait = this.reserveSlot();
      if (wait > 0) await this.sleep(wait);
      attempts++;

      try {
        const value = await withTimeout(task.run, this.config.taskTimeoutMs, `Task ${task.id}`);
        return { id: task.id, ok: true, value, attempts };
      } catch (error) {
        const classified = classifyError(error);
        const action = recovery.handleError(classified);
        if (action.type !== 'retry' || attempts >= maxAttempts) {
          if (!this.quiet) {
            console.error(`[WorkerPool] Task ${task.id} failed after ${attempts} attempts: ${classified.message}`);
          }
          return { id: task.id, ok: false, error: classified, attempts, action };
        }
        if (!this.quiet) {
          console.warn(`[WorkerPool] Task ${task.id} ${classified.kind}, retrying in ${action.delayMs}ms`);
        }
        await this.sleep(action.delayMs);
      }
    }
  }
}
