import { describe, it, expect, vi } from 'vitest';
import { TranslationError } from '../quality/errors.js';
import { PROVIDER_PROFILES } from '../providers/profiles.js';
import { WorkerPool } from './worker-pool.js';

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

function recordingSleep() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => void delays.push(ms) };
}

describe('WorkerPool', () => {
  it('returns outcomes in task order whatever order they finish in', async () => {
    let releaseFirst = () => {};
    const firstDone = new Promise<void>(resolve => {
      releaseFirst = resolve;
    });

    const outcomes = await new WorkerPool({ maxConcurrent: 2 }, { quiet: true }).run([
      {
        id: 0,
        run: async () => {
          await firstDone;
          return 'first';
        },
      },
      {
        id: 1,
        run: async () => {
          releaseFirst();
          return 'second';
        },
      },
    ]);

    expect(outcomes).toEqual([
      { id: 0, ok: true, value: 'first', attempts: 1 },
      { id: 1, ok: true, value: 'second', attempts: 1 },
    ]);
  });

  it('never runs more tasks at once than allowed', async () => {
    let active = 0;
    let peak = 0;
    const tasks = [0, 1, 2, 3, 4].map(id => ({
      id,
      run: async () => {
        active++;
        peak = Math.max(peak, active);
        await tick();
        active--;
        return id;
      },
    }));

    const outcomes = await new WorkerPool({ maxConcurrent: 2 }, { quiet: true }).run(tasks);

    expect(peak).toBe(2);
    expect(outcomes.map(o => o.ok && o.value)).toEqual([0, 1, 2, 3, 4]);
  });

  it('retries retryable failures after the recovery delay', async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    const [outcome] = await new WorkerPool({}, { sleep, quiet: true }).run([
      {
        id: 0,
        run: async () => {
          calls++;
          if (calls === 1) throw new TranslationError('network', 'ECONNRESET');
          return 'ok';
        },
      },
    ]);

    expect(delays).toEqual([10_000]);
    expect(outcome).toEqual({ id: 0, ok: true, value: 'ok', attempts: 2 });
  });

  it('reports a task that cannot be retried', async () => {
    const [outcome] = await new WorkerPool({}, { quiet: true }).run([
      {
        id: 0,
        run: async () => {
          throw new TranslationError('config_error', 'bad key');
        },
      },
    ]);

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(1);
    if (!outcome.ok) expect(outcome.error.kind).toBe('config_error');
    if (!outcome.ok) expect(outcome.action).toEqual({ type: 'abort', reason: 'Configuration error: bad key' });
  });

  it('hands a batch split back to the caller instead of retrying', async () => {
    const { delays, sleep } = recordingSleep();

    const [outcome] = await new WorkerPool({}, { sleep, quiet: true }).run([
      {
        id: 0,
        run: async () => {
          throw new TranslationError('parse_error', 'not json', { affectedEntries: [1, 2, 3, 4] });
        },
      },
    ]);

    expect(delays).toEqual([]);
    expect(outcome).toMatchObject({ id: 0, ok: false, attempts: 1, action: { type: 'reduce_batch_size', newSize: 2 } });
  });

  it('stops retrying at maxRetries', async () => {
    const { sleep } = recordingSleep();
    let calls = 0;

    const [outcome] = await new WorkerPool({ maxRetries: 1 }, { sleep, quiet: true }).run([
      {
        id: 0,
        run: async () => {
          calls++;
          throw new Error('socket timeout');
        },
      },
    ]);

    expect(calls).toBe(2);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.kind).toBe('timeout');
  });

  it('spaces dispatches by the provider rate limit', async () => {
    const { delays, sleep } = recordingSleep();
    const pool = WorkerPool.forProvider(PROVIDER_PROFILES.openai, {}, { sleep, now: () => 0, quiet: true });

    await pool.run([0, 1, 2].map(id => ({ id, run: async () => id })));

    expect(delays).toEqual([1_000, 2_000]);
  });

  it('does not start tasks once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    let started = false;

    const [outcome] = await new WorkerPool({}, { quiet: true }).run(
      [
        {
          id: 0,
          run: async () => {
            started = true;
          },
        },
      ],
      { signal: controller.signal }
    );

    expect(started).toBe(false);
    expect(outcome).toMatchObject({ id: 0, ok: false, attempts: 0 });
    if (!outcome.ok) expect(outcome.error.message).toBe('Cancelled');
  });

  it('counts finished tasks', async () => {
    const onProgress = vi.fn();

    await new WorkerPool({}, { quiet: true }).run(
      [0, 1, 2].map(id => ({ id, run: async () => id })),
      { onProgress }
    );

    expect(onProgress.mock.calls).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });
});
