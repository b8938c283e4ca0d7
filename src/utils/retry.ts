/**
 * Retry for page discovery
 *
 * Only a FatalDiscoveryError (the page never loaded) is worth another try;
 * anything else is a bug or a parse problem and is rethrown at once.
 */

import { setTimeout as delayFor } from 'node:timers/promises';
import type { RetryConfig } from '../types/index.js';
import { FatalDiscoveryError } from './errors.js';
import { logger } from './logger.js';

export interface DiscoveryRetryOptions extends Partial<RetryConfig> {
  /** Backoff wait; defaults to a real timer */
  wait?: (ms: number) => Promise<void>;
}

const DEFAULT_POLICY: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  factor: 2,
};

export async function withDiscoveryRetry<T>(
  url: string,
  discover: () => Promise<T>,
  options: DiscoveryRetryOptions = {}
): Promise<T> {
  const { wait = (ms: number) => delayFor(ms), ...policy } = options;
  const { maxAttempts, initialDelayMs, maxDelayMs, factor } = { ...DEFAULT_POLICY, ...policy };

  let delay = initialDelayMs;
  for (let attempt = 1; ; attempt++) {
    try {
      return await discover();
    } catch (error) {
      if (!(error instanceof FatalDiscoveryError) || attempt >= maxAttempts) {
        throw error;
      }

      logger.warn(
        { url, attempt, maxAttempts, nextDelayMs: delay, error: error.message },
        'Discovery failed, retrying'
      );

      await wait(delay);
      delay = Math.min(delay * factor, maxDelayMs);
    }
  }
}
