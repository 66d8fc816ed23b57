import { describe, it, expect, vi } from 'vitest';
import {
  retryAction,
  retryOperation,
  repeatable,
  singleShot,
  sleep,
} from '../../src/application/retry-policy.js';

// ─── retryAction ─────────────────────────────────────────────

describe('retryAction', () => {
  it('succeeds on the fifth attempt after four failures', async () => {
    let calls = 0;
    const action = vi.fn(() => {
      calls++;
      if (calls < 5) throw new Error(`attempt ${calls}`);
      return 'ok';
    });

    const outcome = await retryAction(action, { delayMs: 0, maxAttempts: 5 });

    expect(outcome).toEqual({ status: 'completed', value: 'ok', attempts: 5 });
    expect(action).toHaveBeenCalledTimes(5);
  });

  it('rethrows the last failure when every attempt fails', async () => {
    let calls = 0;
    const action = vi.fn(() => {
      calls++;
      throw new Error(`attempt ${calls}`);
    });

    await expect(retryAction(action, { delayMs: 0, maxAttempts: 5 })).rejects.toThrow('attempt 5');
    expect(action).toHaveBeenCalledTimes(5);
  });

  it('returns cancelled without invoking the action when already aborted', async () => {
    const ac = new AbortController();
    ac.abort();
    const action = vi.fn(() => 'never');

    const outcome = await retryAction(action, { delayMs: 0, maxAttempts: 5, signal: ac.signal });

    expect(outcome).toEqual({ status: 'cancelled', attempts: 0 });
    expect(action).not.toHaveBeenCalled();
  });

  it('stops waiting and returns cancelled when aborted during the delay', async () => {
    const ac = new AbortController();
    const action = vi.fn(() => {
      throw new Error('down');
    });

    const outcome = await retryAction(action, {
      delayMs: 60_000,
      maxAttempts: 5,
      signal: ac.signal,
      onRetry: () => ac.abort(),
    });

    expect(outcome).toEqual({ status: 'cancelled', attempts: 1 });
    expect(action).toHaveBeenCalledTimes(1);
  });

  it('reports each failed attempt that will be retried', async () => {
    const onRetry = vi.fn();
    let calls = 0;

    await retryAction(
      () => {
        calls++;
        if (calls < 3) throw new Error(`attempt ${calls}`);
        return calls;
      },
      { delayMs: 0, maxAttempts: 3, onRetry },
    );

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, expect.objectContaining({ message: 'attempt 1' }), 1);
    expect(onRetry).toHaveBeenNthCalledWith(2, expect.objectContaining({ message: 'attempt 2' }), 2);
  });

  it('does not call onRetry after the final failure', async () => {
    const onRetry = vi.fn();

    await expect(
      retryAction(() => {
        throw new Error('down');
      }, { delayMs: 0, maxAttempts: 2, onRetry }),
    ).rejects.toThrow('down');

    expect(onRetry).toHaveBeenCalledTimes(1);
  });
});

// ─── retryOperation ──────────────────────────────────────────

describe('retryOperation', () => {
  it('starts a repeatable operation afresh on every attempt', async () => {
    const start = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValueOnce('third');

    const outcome = await retryOperation(repeatable(start), { delayMs: 0, maxAttempts: 5 });

    expect(outcome).toEqual({ status: 'completed', value: 'third', attempts: 3 });
    expect(start).toHaveBeenCalledTimes(3);
  });

  it('passes the cancellation signal to each attempt', async () => {
    const ac = new AbortController();
    const start = vi.fn(async (_signal: AbortSignal) => 'done');

    await retryOperation(repeatable(start), { delayMs: 0, maxAttempts: 1, signal: ac.signal });

    expect(start).toHaveBeenCalledWith(ac.signal);
  });

  it('awaits a single-shot operation once and surfaces its failure', async () => {
    const onRetry = vi.fn();

    await expect(
      retryOperation(singleShot(Promise.reject(new Error('consumed'))), { delayMs: 0, maxAttempts: 5, onRetry }),
    ).rejects.toThrow('consumed');

    expect(onRetry).not.toHaveBeenCalled();
  });

  it('resolves a single-shot operation that succeeds', async () => {
    const outcome = await retryOperation(singleShot(Promise.resolve(42)), { delayMs: 0, maxAttempts: 5 });

    expect(outcome).toEqual({ status: 'completed', value: 42, attempts: 1 });
  });

  it('returns cancelled when aborted while an attempt is in flight', async () => {
    const ac = new AbortController();
    const start = vi.fn(() => new Promise<string>(() => undefined));

    const pending = retryOperation(repeatable(start), { delayMs: 0, maxAttempts: 5, signal: ac.signal });
    ac.abort();

    await expect(pending).resolves.toEqual({ status: 'cancelled', attempts: 1 });
    expect(start).toHaveBeenCalledTimes(1);
  });

  it('treats a failure caused by shutdown as cancellation', async () => {
    const ac = new AbortController();
    const start = vi.fn(async () => {
      ac.abort();
      throw new Error('connection closed');
    });

    const outcome = await retryOperation(repeatable(start), { delayMs: 0, maxAttempts: 5, signal: ac.signal });

    expect(outcome).toEqual({ status: 'cancelled', attempts: 1 });
    expect(start).toHaveBeenCalledTimes(1);
  });

  it('returns cancelled without starting when already aborted', async () => {
    const ac = new AbortController();
    ac.abort();
    const start = vi.fn(async () => 'never');

    const outcome = await retryOperation(repeatable(start), { delayMs: 0, maxAttempts: 5, signal: ac.signal });

    expect(outcome).toEqual({ status: 'cancelled', attempts: 0 });
    expect(start).not.toHaveBeenCalled();
  });
});

// ─── sleep ───────────────────────────────────────────────────

describe('sleep', () => {
  it('resolves true after the delay', async () => {
    await expect(sleep(1)).resolves.toBe(true);
  });

  it('resolves false immediately when aborted', async () => {
    const ac = new AbortController();
    const pending = sleep(60_000, ac.signal);
    ac.abort();

    await expect(pending).resolves.toBe(false);
  });

  it('resolves false for an already aborted signal', async () => {
    const ac = new AbortController();
    ac.abort();

    await expect(sleep(60_000, ac.signal)).resolves.toBe(false);
  });
});
