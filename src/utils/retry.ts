import { TransportError, type Transport } from "../clients/transport";
import type { RetryConfig } from "../data/types";
import { logger } from "./logger";

export interface RetryPolicy extends RetryConfig {
  /** Decides whether a failure is worth another attempt. */
  retryOn: (error: Error) => boolean;
  sleep: (ms: number) => Promise<void>;
  random: () => number;
}

const NETWORK_PATTERNS = ["econnrefused", "enotfound", "econnreset", "etimedout", "socket hang up", "timeout"];

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * 429, 5xx and connection-level failures are retryable; any other HTTP status
 * (4xx auth/validation errors) is fatal for the call.
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof TransportError) {
    if (error.status === undefined) return true;
    return error.status === 429 || error.status >= 500;
  }
  const message = error.message.toLowerCase();
  return NETWORK_PATTERNS.some((p) => message.includes(p));
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  rateLimitDelayMs: 1000,
  retryOn: isRetryableError,
  sleep,
  random: Math.random,
};

export function createRetryPolicy(config?: Partial<RetryPolicy>): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...config };
}

/** baseDelay * 2^attempt with ±25% jitter, capped at maxDelay. */
export function calculateBackoffDelay(attempt: number, policy: RetryPolicy): number {
  const exponential = policy.baseDelayMs * Math.pow(2, attempt);
  const jitter = 0.75 + policy.random() * 0.5;
  return Math.min(Math.round(exponential * jitter), policy.maxDelayMs);
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  operation = "request"
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (attempt >= policy.maxRetries || !policy.retryOn(error)) {
        if (attempt > 0) {
          logger.error({ operation, attempts: attempt + 1, error: error.message }, "重试后仍然失败");
        }
        throw error;
      }

      const rateLimited = error instanceof TransportError && error.isRateLimit;
      const delay = rateLimited ? policy.rateLimitDelayMs : calculateBackoffDelay(attempt, policy);
      if (rateLimited) {
        logger.warn({ operation, delayMs: delay, attempt: attempt + 1 }, "触发限流，等待后重试");
      } else {
        logger.warn(
          { operation, delayMs: delay, attempt: attempt + 1, maxRetries: policy.maxRetries, error: error.message },
          "请求失败，退避后重试"
        );
      }
      await policy.sleep(delay);
    }
  }
}

/** Wraps every call of a transport in the retry policy; pagination stays unaware of it. */
export function withRetryingTransport(transport: Transport, policy: RetryPolicy = DEFAULT_RETRY_POLICY): Transport {
  return {
    get: (endpoint, params) => withRetry(() => transport.get(endpoint, params), policy, `GET ${endpoint}`),
    post: (endpoint, body) => withRetry(() => transport.post(endpoint, body), policy, `POST ${endpoint}`),
  };
}
