import { jest, describe, it, expect } from '@jest/globals';
import { AxiosError } from 'axios';
import { AbortedError, TimeoutError, mapWithConcurrency, sleep, withTimeout } from '../../utils/async';
import { calculateRetryDelay, isRetryableError, withRetry } from '../../utils/retry';
import { TransientDataError } from '../../utils/errors';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const noDelay = { baseDelay: 0, jitterMax: 0, maxDelay: 0 };

describe('async helpers', () => {
  describe('sleep', () => {
    it('should resolve early when the signal aborts', async () => {
      const controller = new AbortController();
      const started = Date.now();
      const pending = sleep(10_000, controller.signal);
      controller.abort();
      await pending;
      expect(Date.now() - started).toBeLessThan(1000);
    });
  });

  describe('withTimeout', () => {
    it('should return the task result when it finishes in time', async () => {
      await expect(withTimeout(() => 42, 1000, 'answer')).resolves.toBe(42);
    });

    it('should reject with TimeoutError and abort the task signal', async () => {
      let taskSignal: AbortSignal | undefined;
      const task = (signal: AbortSignal) => {
        taskSignal = signal;
        return new Promise<number>(() => undefined);
      };

      await expect(withTimeout(task, 20, 'slow')).rejects.toBeInstanceOf(TimeoutError);
      expect(taskSignal?.aborted).toBe(true);
    });

    it('should reject with AbortedError when the parent aborts', async () => {
      const parent = new AbortController();
      const pending = withTimeout(() => new Promise<number>(() => undefined), 10_000, 'cancelled', parent.signal);
      parent.abort();
      await expect(pending).rejects.toBeInstanceOf(AbortedError);
    });

    it('should refuse to start under an aborted parent', async () => {
      const parent = new AbortController();
      parent.abort();
      const task = jest.fn(() => 1);

      await expect(withTimeout(task, 100, 'late', parent.signal)).rejects.toThrow('late was aborted');
      expect(task).not.toHaveBeenCalled();
    });
  });

  describe('mapWithConcurrency', () => {
    it('should keep input order and settle failures independently', async () => {
      const results = await mapWithConcurrency([1, 2, 3], 2, async (n) => {
        if (n === 2) throw new Error('two');
        return n * 10;
      });

      expect(results[0]).toEqual({ status: 'fulfilled', value: 10 });
      expect(results[1].status).toBe('rejected');
      expect(results[2]).toEqual({ status: 'fulfilled', value: 30 });
    });

    it('should never exceed the concurrency limit', async () => {
      let inFlight = 0;
      let peak = 0;
      await mapWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await sleep(5);
        inFlight--;
      });
      expect(peak).toBe(2);
    });
  });
});

describe('retry', () => {
  it('should classify transient and permanent failures', () => {
    expect(isRetryableError(new TransientDataError('flaky'))).toBe(true);
    expect(isRetryableError(new TransientDataError('bad symbol', false))).toBe(false);
    expect(isRetryableError(new Error('socket timeout'))).toBe(true);
    expect(isRetryableError(new Error('invalid argument'))).toBe(false);
    expect(isRetryableError(new AxiosError('network down'))).toBe(true);
  });

  it('should grow the delay exponentially up to the cap', () => {
    const config = { maxAttempts: 5, baseDelay: 100, maxDelay: 500, backoffMultiplier: 2, jitterMax: 50 };
    expect(calculateRetryDelay(1, config, () => 0)).toBe(100);
    expect(calculateRetryDelay(2, config, () => 0.5)).toBe(225);
    expect(calculateRetryDelay(4, config, () => 0)).toBe(500);
  });

  it('should retry transient failures until one succeeds', async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new TransientDataError('flaky');
        return 'ok';
      },
      { label: 'flaky call', maxAttempts: 3, ...noDelay }
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
  });

  it('should rethrow non-retryable errors immediately', async () => {
    const fn = jest.fn(async () => {
      throw new TransientDataError('unknown symbol', false);
    });

    await expect(withRetry(fn, { label: 'lookup', maxAttempts: 5, ...noDelay })).rejects.toThrow('unknown symbol');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should give up after the last attempt with the last error', async () => {
    const fn = jest.fn(async () => {
      throw new TransientDataError('still down');
    });

    await expect(withRetry(fn, { label: 'down', maxAttempts: 2, ...noDelay })).rejects.toThrow('still down');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
