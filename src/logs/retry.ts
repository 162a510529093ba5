import type { HttpConfig } from "../core/config.js";
import { delay } from "../core/utils.js";

import { HttpStatusError, TransportError } from "./log-transport.js";

// =============================================================================
// TYPES
// =============================================================================

export type RetryPolicy = {
  maxRetries: number;
  minDelayMs: number;
  maxDelayMs: number;
};

export type RetryAttemptInfo = {
  attempt: number;
  delayMs: number;
  error: unknown;
};

export type RetryHooks = {
  onRetry?: (info: RetryAttemptInfo) => void;
  sleep?: (ms: number) => Promise<void>;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  minDelayMs: 100,
  maxDelayMs: 5_000,
};

const RETRIABLE_STATUS_CODES = new Set([408, 429]);

// =============================================================================
// POLICY
// =============================================================================

export function retryPolicyFromConfig(http: HttpConfig): RetryPolicy {
  return {
    maxRetries: http.max_retries,
    minDelayMs: http.retry_min_delay_ms,
    maxDelayMs: http.retry_max_delay_ms,
  };
}

export function isRetriableStatus(status: number): boolean {
  return RETRIABLE_STATUS_CODES.has(status) || (status >= 500 && status <= 599);
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof HttpStatusError) return isRetriableStatus(error.status);
  return error instanceof TransportError;
}

// Delay before retry number `attempt` (1-based): min * 2^(attempt-1), capped at max.
export function backoffDelayMs(policy: RetryPolicy, attempt: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, policy.minDelayMs * 2 ** exponent);
}

// =============================================================================
// EXECUTION
// =============================================================================

export async function runWithRetries<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? delay;
  let retries = 0;

  for (;;) {
    try {
      return await fn();
    } catch (err) {
      if (!isTransientError(err) || retries >= policy.maxRetries) {
        throw err;
      }
      retries += 1;
      const delayMs = backoffDelayMs(policy, retries);
      hooks.onRetry?.({ attempt: retries, delayMs, error: err });
      await sleep(delayMs);
    }
  }
}
