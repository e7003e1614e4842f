import { DEFAULT_CONFIG } from "../constants";
import { isTransientNetworkError } from "../errors";

import type { RetryConfig } from "../types";

export interface RetryOptions extends RetryConfig {
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: DEFAULT_CONFIG.RETRY.MAX_ATTEMPTS,
  initialDelayMs: DEFAULT_CONFIG.RETRY.INITIAL_DELAY_MS,
  maxDelayMs: DEFAULT_CONFIG.RETRY.MAX_DELAY_MS,
  backoffMultiplier: DEFAULT_CONFIG.RETRY.BACKOFF_MULTIPLIER,
  shouldRetry: isTransientNetworkError,
  onRetry: () => {},
};

export function computeDelay(attempt: number, options: Required<RetryConfig>): number {
  return Math.min(options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt - 1), options.maxDelayMs);
}

export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let attempt = 1;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (!opts.shouldRetry(error) || attempt >= opts.maxAttempts) {
        throw error;
      }

      opts.onRetry(error, attempt);

      await new Promise((resolve) => setTimeout(resolve, computeDelay(attempt, opts)));
      attempt++;
    }
  }
}
