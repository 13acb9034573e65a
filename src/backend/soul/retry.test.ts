import { describe, expect, it, vi } from 'vitest';
import { APIConnectionError, APIStatusError, APITimeoutError } from '../llm/errors';
import { isRetryableError, retryDelayMs, withRetry } from './retry';

const noSleep = vi.fn(() => Promise.resolve());

function failingThen<T>(errors: Error[], value: T) {
  let calls = 0;
  const call = vi.fn(() => {
    const error = errors[calls];
    calls += 1;
    return error ? Promise.reject(error) : Promise.resolve(value);
  });
  return call;
}

describe('withRetry', () => {
  it.each([1, 2, 3, 5, 10])(
    'recovers from one connection error with one extra call (budget %i)',
    async (maxAttempts) => {
      const call = failingThen([new APIConnectionError('socket hang up')], 'hello');
      const onRetryableError = vi.fn(() => true);

      const result = await withRetry({
        call,
        provider: { name: 'test', onRetryableError },
        maxAttempts,
        sleep: noSleep,
      });

      expect(result).toBe('hello');
      expect(call).toHaveBeenCalledTimes(2);
      expect(onRetryableError).toHaveBeenCalledTimes(1);
    }
  );

  it('gives up after one recovery when connection errors persist', async () => {
    const error = new APIConnectionError('refused');
    const call = vi.fn(() => Promise.reject(error));
    const onRetryableError = vi.fn(() => Promise.resolve(true));

    await expect(
      withRetry({
        call,
        provider: { name: 'test', onRetryableError },
        maxAttempts: 5,
        sleep: noSleep,
      })
    ).rejects.toBe(error);
    expect(call).toHaveBeenCalledTimes(2);
    expect(onRetryableError).toHaveBeenCalledTimes(1);
  });

  it('backs off on status errors without calling the recovery hook', async () => {
    const call = failingThen(
      [new APIStatusError(503, 'unavailable'), new APIStatusError(503, 'unavailable')],
      'ok'
    );
    const onRetryableError = vi.fn(() => true);
    const sleep = vi.fn(() => Promise.resolve());

    const result = await withRetry({
      call,
      provider: { name: 'test', onRetryableError },
      maxAttempts: 3,
      sleep,
    });

    expect(result).toBe('ok');
    expect(call).toHaveBeenCalledTimes(3);
    expect(onRetryableError).not.toHaveBeenCalled();
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('propagates the last error once the budget is spent', async () => {
    const last = new APITimeoutError('timed out again');
    const call = failingThen([new APITimeoutError('timed out'), last], 'never');

    await expect(
      withRetry({ call, provider: { name: 'test' }, maxAttempts: 2, sleep: noSleep })
    ).rejects.toBe(last);
    expect(call).toHaveBeenCalledTimes(2);
  });

  it('falls back to backoff when no recovery hook exists', async () => {
    const call = failingThen(
      [new APIConnectionError('reset'), new APIConnectionError('reset')],
      'ok'
    );

    await expect(
      withRetry({ call, provider: { name: 'test' }, maxAttempts: 3, sleep: noSleep })
    ).resolves.toBe('ok');
    expect(call).toHaveBeenCalledTimes(3);
  });

  it('falls back to backoff when the hook declines', async () => {
    const call = failingThen([new APIConnectionError('reset')], 'ok');
    const onRetryableError = vi.fn(() => false);

    await expect(
      withRetry({
        call,
        provider: { name: 'test', onRetryableError },
        maxAttempts: 2,
        sleep: noSleep,
      })
    ).resolves.toBe('ok');
    expect(call).toHaveBeenCalledTimes(2);
    expect(onRetryableError).toHaveBeenCalledTimes(1);
  });

  it('does not retry non-retryable errors', async () => {
    const error = new APIStatusError(400, 'bad request');
    const call = vi.fn(() => Promise.reject(error));

    await expect(
      withRetry({ call, provider: { name: 'test' }, maxAttempts: 5, sleep: noSleep })
    ).rejects.toBe(error);
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('stops retrying once the signal is aborted', async () => {
    const controller = new AbortController();
    const error = new APITimeoutError('timed out');
    const call = vi.fn(() => {
      controller.abort();
      return Promise.reject(error);
    });

    await expect(
      withRetry({
        call,
        provider: { name: 'test' },
        maxAttempts: 5,
        signal: controller.signal,
        sleep: noSleep,
      })
    ).rejects.toBe(error);
    expect(call).toHaveBeenCalledTimes(1);
  });
});

describe('retry helpers', () => {
  it('classifies retryable errors', () => {
    expect(isRetryableError(new APIStatusError(429, 'slow down'))).toBe(true);
    expect(isRetryableError(new APIStatusError(502, 'bad gateway'))).toBe(true);
    expect(isRetryableError(new APIStatusError(401, 'unauthorized'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });

  it('grows the delay exponentially up to the cap', () => {
    const noJitter = () => 0;
    expect(retryDelayMs(1, noJitter)).toBe(300);
    expect(retryDelayMs(2, noJitter)).toBe(600);
    expect(retryDelayMs(5, noJitter)).toBe(4800);
    expect(retryDelayMs(6, noJitter)).toBe(5000);
    expect(retryDelayMs(1, () => 1)).toBe(800);
  });
});
