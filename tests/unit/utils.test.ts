import { describe, it, expect, vi } from 'vitest';
import axios, { AxiosError } from 'axios';
import {
  classifyError,
  ConfigurationError,
  DuplicateEventError,
  ErrorCategory,
  OrderRejectedError,
} from '../../src/utils/errors.js';
import { calculateDelay, retry } from '../../src/utils/retry.js';
import { KeyedMutex, runWithConcurrency } from '../../src/utils/concurrency.js';
import { computeLimitPrice } from '../../src/clients/shared/pricing.js';

/**
 * Axios error as a real request with the given response status produces it
 */
async function failedRequest(status?: number): Promise<unknown> {
  const client = axios.create({
    adapter: async (config) => {
      if (status === undefined) {
        throw new AxiosError('timeout of 10ms exceeded', 'ECONNABORTED', config);
      }
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, {
        data: {},
        status,
        statusText: '',
        headers: {},
        config,
      });
    },
  });
  return client.get('/activity').catch((error: unknown) => error);
}

describe('Error classification', () => {
  it('should keep the category of copier errors', () => {
    expect(classifyError(new OrderRejectedError('market closed'))).toBe(ErrorCategory.REJECTED);
    expect(classifyError(new ConfigurationError('missing key'))).toBe(ErrorCategory.FATAL);
    expect(classifyError(new DuplicateEventError('evt-1'))).toBe(ErrorCategory.REJECTED);
  });

  it('should classify HTTP failures by status', async () => {
    expect(classifyError(await failedRequest(503))).toBe(ErrorCategory.TRANSIENT);
    expect(classifyError(await failedRequest(429))).toBe(ErrorCategory.TRANSIENT);
    expect(classifyError(await failedRequest(401))).toBe(ErrorCategory.FATAL);
    expect(classifyError(await failedRequest(400))).toBe(ErrorCategory.REJECTED);
  });

  it('should treat a request without a response as transient', async () => {
    expect(classifyError(await failedRequest())).toBe(ErrorCategory.TRANSIENT);
  });

  it('should classify plain errors by message', () => {
    expect(classifyError(new Error('socket hang up'))).toBe(ErrorCategory.TRANSIENT);
    expect(classifyError(new Error('upstream answered 502'))).toBe(ErrorCategory.TRANSIENT);
    expect(classifyError(new Error('not enough balance / allowance'))).toBe(ErrorCategory.REJECTED);
    expect(classifyError(new Error('something odd'))).toBe(ErrorCategory.TRANSIENT);
  });

  it('should only mark transient errors retryable', () => {
    expect(new OrderRejectedError('invalid tick size').isRetryable).toBe(false);
    expect(new DuplicateEventError('evt-1').message).toBe('Event already processed: evt-1');
  });
});

describe('Retry', () => {
  const fast = { initialDelayMs: 1, maxDelayMs: 5, multiplier: 2, jitter: 0 };

  describe('calculateDelay', () => {
    it('should grow exponentially up to the cap', () => {
      const options = { initialDelayMs: 100, maxDelayMs: 1000, multiplier: 2, jitter: 0 };
      expect(calculateDelay(0, options)).toBe(100);
      expect(calculateDelay(3, options)).toBe(800);
      expect(calculateDelay(5, options)).toBe(1000);
    });

    it('should keep jitter inside its band', () => {
      for (let i = 0; i < 20; i++) {
        const delay = calculateDelay(1, { initialDelayMs: 100, maxDelayMs: 1000, multiplier: 2, jitter: 0.1 });
        expect(delay).toBeGreaterThanOrEqual(180);
        expect(delay).toBeLessThanOrEqual(220);
      }
    });
  });

  it('should retry transient failures until one succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('ETIMEDOUT'))
      .mockRejectedValueOnce(new Error('ETIMEDOUT'))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();

    await expect(retry(fn, { ...fast, maxAttempts: 3, onRetry })).resolves.toBe('ok');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([attempt, , delayMs]) => [attempt, delayMs])).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it('should not retry a rejection', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('insufficient balance'));

    await expect(retry(fn, { ...fast, maxAttempts: 3 })).rejects.toThrow('insufficient balance');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should give up after the last attempt', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('ECONNRESET'));

    await expect(retry(fn, { ...fast, maxAttempts: 2, onRetry: vi.fn() })).rejects.toThrow('ECONNRESET');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('Concurrency', () => {
  describe('KeyedMutex', () => {
    it('should serialize callers of one key and leave other keys free', async () => {
      const mutex = new KeyedMutex();
      const order: string[] = [];
      let releaseFirst: () => void = () => undefined;

      const first = mutex.runExclusive('market-a', async () => {
        order.push('first:start');
        await new Promise<void>((resolve) => {
          releaseFirst = resolve;
        });
        order.push('first:end');
      });
      const second = mutex.runExclusive('market-a', async () => {
        order.push('second');
      });
      await mutex.runExclusive('market-b', async () => {
        order.push('other');
      });

      expect(order).toEqual(['first:start', 'other']);
      expect(mutex.isLocked('market-a')).toBe(true);

      releaseFirst();
      await Promise.all([first, second]);

      expect(order).toEqual(['first:start', 'other', 'first:end', 'second']);
      expect(mutex.size).toBe(0);
    });

    it('should release the key when the holder throws', async () => {
      const mutex = new KeyedMutex();

      await expect(
        mutex.runExclusive('market-a', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      await expect(mutex.runExclusive('market-a', async () => 'ok')).resolves.toBe('ok');
    });
  });

  describe('runWithConcurrency', () => {
    it('should bound the work in flight and keep results in input order', async () => {
      let active = 0;
      let peak = 0;

      const results = await runWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 1));
        active--;
        if (item === 3) {
          throw new Error('item 3 failed');
        }
        return item * 10;
      });

      expect(peak).toBe(2);
      expect(results.map((result) => (result.status === 'fulfilled' ? result.value : 'rejected'))).toEqual([
        10,
        20,
        'rejected',
        40,
        50,
      ]);
    });

    it('should return nothing for no items', async () => {
      expect(await runWithConcurrency([], 3, async () => 1)).toEqual([]);
    });
  });
});

describe('computeLimitPrice', () => {
  it('should pay up from the book price when buying', () => {
    expect(computeLimitPrice('BUY', 0.5, 0.4, 0.02)).toBe(0.52);
  });

  it('should give way from the reference price when selling without a book', () => {
    expect(computeLimitPrice('SELL', null, 0.4, 0.02)).toBe(0.38);
    expect(computeLimitPrice('SELL', 0, 0.4, 0.02)).toBe(0.38);
  });

  it('should clamp to the tradable price range', () => {
    expect(computeLimitPrice('BUY', 0.98, 0.98, 0.05)).toBe(0.99);
    expect(computeLimitPrice('SELL', 0.02, 0.02, 0.05)).toBe(0.01);
  });

  it('should round to the market tick size', () => {
    expect(computeLimitPrice('BUY', 0.5, 0.5, 0.012, '0.001')).toBe(0.512);
    expect(computeLimitPrice('BUY', 0.5, 0.5, 0.012)).toBe(0.51);
  });
});
