/**
 * Retry with exponential backoff for transient store outages
 */

import { StoreUnavailableError } from './errors.js';
import type { AgentLogger } from './logger.js';

export interface RetryOptions {
  attempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  signal?: AbortSignal | undefined;
  logger?: AgentLogger;
  operation?: string;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn`, retrying only on StoreUnavailable. Every other error, and the
 * last StoreUnavailable once attempts run out, is rethrown unchanged.
 */
export async function withStoreRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = options.attempts ?? 5;
  const factor = options.factor ?? 2;
  const maxDelayMs = options.maxDelayMs ?? 10_000;
  let delayMs = options.initialDelayMs ?? 250;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof StoreUnavailableError) || attempt >= attempts || options.signal?.aborted) {
        throw error;
      }
      options.logger?.warn('Store unavailable, retrying', {
        operation: options.operation,
        attempt,
        delayMs,
        error,
      });
      await sleep(delayMs, options.signal);
      delayMs = Math.min(delayMs * factor, maxDelayMs);
    }
  }
}
