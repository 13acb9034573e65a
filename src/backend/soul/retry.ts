import { setTimeout as delay } from 'node:timers/promises';
import { toError } from '../lib/error-utils';
import {
  APIConnectionError,
  APIEmptyResponseError,
  APIStatusError,
  APITimeoutError,
} from '../llm/errors';
import type { ChatProvider } from '../llm/provider';
import { createLogger } from '../services/logger.service';

const logger = createLogger('retry');

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503]);
const INITIAL_DELAY_MS = 300;
const MAX_DELAY_MS = 5000;
const JITTER_MS = 500;

export function isRetryableError(error: unknown): boolean {
  if (
    error instanceof APIConnectionError ||
    error instanceof APITimeoutError ||
    error instanceof APIEmptyResponseError
  ) {
    return true;
  }
  return error instanceof APIStatusError && RETRYABLE_STATUS_CODES.has(error.statusCode);
}

export function retryDelayMs(attempt: number, random: () => number = Math.random): number {
  const base = Math.min(INITIAL_DELAY_MS * 2 ** (attempt - 1), MAX_DELAY_MS);
  return base + random() * JITTER_MS;
}

type WithRetryParams<T> = {
  call: () => Promise<T>;
  provider: Pick<ChatProvider, 'name' | 'onRetryableError'>;
  /** Total attempts of the backoff layer. A transport recovery attempt is not counted. */
  maxAttempts: number;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

const defaultSleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  delay(ms, undefined, { signal });

/**
 * Run a provider call with two independent recovery layers:
 *
 * 1. On a connection error, ask the provider to rebuild its transport. If it says yes, retry
 *    once outside the budget. A connection error after such a recovery is final.
 * 2. Otherwise retry retryable errors with exponential backoff until `maxAttempts` calls
 *    have been made.
 */
export async function withRetry<T>(params: WithRetryParams<T>): Promise<T> {
  const maxAttempts = Math.max(1, params.maxAttempts);
  const sleep = params.sleep ?? defaultSleep;
  let attempt = 0;
  let recovered = false;

  while (true) {
    attempt += 1;
    try {
      return await params.call();
    } catch (error) {
      if (params.signal?.aborted) {
        throw error;
      }

      if (error instanceof APIConnectionError && params.provider.onRetryableError) {
        if (recovered) {
          throw error;
        }
        if (await params.provider.onRetryableError(error)) {
          recovered = true;
          attempt -= 1;
          logger.warn('Provider transport rebuilt after connection error; retrying once', {
            provider: params.provider.name,
            error: error.message,
          });
          continue;
        }
      }

      if (!isRetryableError(error) || attempt >= maxAttempts) {
        throw error;
      }

      const waitMs = retryDelayMs(attempt);
      logger.warn('Retrying provider call', {
        provider: params.provider.name,
        attempt,
        maxAttempts,
        delayMs: Math.round(waitMs),
        error: toError(error).message,
      });
      await sleep(waitMs, params.signal);
    }
  }
}
