import { describe, expect, it } from 'vitest';
import { createLimiter, runWithTimeout } from '../src/concurrency';
import { RelayTimeoutError } from '../src/errors';

const tick = (ms = 1) => new Promise((resolve) => setTimeout(resolve, ms));

describe('createLimiter', () => {
  it('never runs more than the configured number of tasks', async () => {
    const limit = createLimiter(2);
    let active = 0;
    let peak = 0;
    const task = async (value: number) => {
      active += 1;
      peak = Math.max(peak, active);
      await tick();
      active -= 1;
      return value;
    };

    const results = await Promise.all([1, 2, 3, 4, 5].map((n) => limit(() => task(n))));

    expect(results).toEqual([1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
  });

  it('releases the slot when a task throws', async () => {
    const limit = createLimiter(1);
    await expect(limit(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(limit(() => Promise.resolve('next'))).resolves.toBe('next');
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => createLimiter(0)).toThrow('Concurrency must be a positive integer');
  });
});

describe('runWithTimeout', () => {
  it('resolves with the task result', async () => {
    await expect(
      runWithTimeout('ws://relay.test', 50, async () => 'done')
    ).resolves.toBe('done');
  });

  it('aborts the signal and rejects when the task is too slow', async () => {
    const captured: { signal?: AbortSignal } = {};
    const pending = runWithTimeout('ws://relay.test', 5, (signal) => {
      captured.signal = signal;
      return new Promise<never>(() => undefined);
    });

    await expect(pending).rejects.toBeInstanceOf(RelayTimeoutError);
    await expect(pending).rejects.toThrow('Relay ws://relay.test timed out after 5ms');
    expect(captured.signal?.aborted).toBe(true);
  });
});
