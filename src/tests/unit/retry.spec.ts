import { describe, expect, it, vi } from 'vitest';

import { RetriesExhaustedError } from '../../errors';
import { retryWithLinearBackoff } from '../../utils/retry';
import { recordingSleep } from '../helpers';

describe('retryWithLinearBackoff', () => {
  it('returns the first successful attempt', async () => {
    const { sleeps, sleepFn } = recordingSleep();
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`attempt ${attempt}`);
      return 'ok';
    });

    await expect(retryWithLinearBackoff(fn, { retryCount: 2, backoffMs: 100, sleepFn })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it('wraps the last error once attempts run out', async () => {
    const { sleeps, sleepFn } = recordingSleep();
    const onRetry = vi.fn();

    const error = await retryWithLinearBackoff(
      async (attempt) => {
        throw new Error(`attempt ${attempt}`);
      },
      { retryCount: 1, backoffMs: 50, sleepFn, onRetry }
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetriesExhaustedError);
    if (!(error instanceof RetriesExhaustedError)) return;
    expect(error.attempts).toBe(2);
    expect(error.lastError.message).toBe('attempt 2');
    expect(error.message).toBe('attempt 2');
    expect(sleeps).toEqual([50]);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(1, 2, expect.any(Error));
  });

  it('rethrows errors that must not be retried', async () => {
    const { sleeps, sleepFn } = recordingSleep();
    const fatal = new TypeError('bad input');

    await expect(
      retryWithLinearBackoff(
        async () => {
          throw fatal;
        },
        { retryCount: 3, backoffMs: 10, sleepFn, shouldRetry: (err) => !(err instanceof TypeError) }
      )
    ).rejects.toBe(fatal);
    expect(sleeps).toEqual([]);
  });

  it('converts non-Error rejections', async () => {
    const error = await retryWithLinearBackoff(
      async () => {
        throw 'plain string';
      },
      { retryCount: 0, backoffMs: 0 }
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetriesExhaustedError);
    if (!(error instanceof RetriesExhaustedError)) return;
    expect(error.lastError.message).toBe('plain string');
  });
});
