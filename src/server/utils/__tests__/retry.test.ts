import { describe, it, expect } from 'vitest';
import { retryWithBackoff } from '../retry.js';

function recordingSleep() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => void delays.push(ms) };
}

describe('retryWithBackoff', () => {
  it('returns the first success without sleeping', async () => {
    const { delays, sleep } = recordingSleep();
    await expect(retryWithBackoff(async () => 'ok', { sleep })).resolves.toBe('ok');
    expect(delays).toEqual([]);
  });

  it('retries once after a fixed delay by default', async () => {
    const { delays, sleep } = recordingSleep();
    const attempts: number[] = [];

    const result = await retryWithBackoff(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt === 1) throw new Error('flaky');
        return attempt;
      },
      { initialDelay: 250, sleep }
    );

    expect(result).toBe(2);
    expect(attempts).toEqual([1, 2]);
    expect(delays).toEqual([250]);
  });

  it('throws the last error when attempts run out', async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          throw new Error(`failure ${calls}`);
        },
        { maxRetries: 2, initialDelay: 100, multiplier: 2, sleep }
      )
    ).rejects.toThrow('failure 3');
    expect(delays).toEqual([100, 200]);
  });

  it('caps the delay at maxDelay', async () => {
    const { delays, sleep } = recordingSleep();
    await expect(
      retryWithBackoff(
        async () => {
          throw new Error('down');
        },
        { maxRetries: 3, initialDelay: 100, multiplier: 10, maxDelay: 500, sleep }
      )
    ).rejects.toThrow('down');
    expect(delays).toEqual([100, 500, 500]);
  });

  it('stops on non-retryable errors', async () => {
    const { delays, sleep } = recordingSleep();
    const retried: number[] = [];
    await expect(
      retryWithBackoff(
        async () => {
          throw new RangeError('bad input');
        },
        { maxRetries: 3, isRetryable: (error) => !(error instanceof RangeError), onRetry: (n) => retried.push(n), sleep }
      )
    ).rejects.toThrow(RangeError);
    expect(delays).toEqual([]);
    expect(retried).toEqual([]);
  });
});
