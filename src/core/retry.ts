import { logger, type Logger } from "../config/logger.js";
import { NetworkError, RateLimitError, errorMessage } from "./errors.js";
import type { PlatformName } from "./types.js";

export interface RetryPolicy {
  rateLimit: {
    /** Retries after the first attempt; total attempts are `maxRetries + 1`. */
    maxRetries: number;
    baseDelayMs: number;
    maxTotalWaitMs: number;
  };
  network: {
    /** Total attempts, the first one included. */
    maxAttempts: number;
    delayMs: number;
  };
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  rateLimit: {
    maxRetries: 5,
    baseDelayMs: 2_000,
    maxTotalWaitMs: 5 * 60 * 1000
  },
  network: {
    maxAttempts: 3,
    delayMs: 2_000
  }
};

export interface RetryContext {
  platform: PlatformName;
  operation: string;
}

export interface RetryRuntime {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  log?: Logger;
}

export type RetryClass = "rate-limit" | "network" | "fatal";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function classifyForRetry(error: unknown): RetryClass {
  if (error instanceof RateLimitError) {
    return "rate-limit";
  }

  if (error instanceof NetworkError) {
    return "network";
  }

  return "fatal";
}

/** Exponential back-off with equal jitter: half fixed, half random. */
export function rateLimitDelayMs(baseDelayMs: number, retryIndex: number, random: () => number): number {
  const ceiling = baseDelayMs * 2 ** retryIndex;
  return Math.round(ceiling / 2 + random() * (ceiling / 2));
}

/**
 * Runs `call` until it succeeds or its error is not worth retrying. Rate
 * limits back off exponentially inside a total wait budget; network failures
 * back off linearly up to a fixed attempt count. Anything else surfaces at once.
 */
export async function withRetry<T>(
  call: () => Promise<T>,
  policy: RetryPolicy,
  context: RetryContext,
  runtime: RetryRuntime = {}
): Promise<T> {
  const wait = runtime.sleep ?? sleep;
  const random = runtime.random ?? Math.random;
  const log = (runtime.log ?? logger).child({ module: "core/retry" });

  let attempt = 0;
  let rateLimitRetries = 0;
  let networkFailures = 0;
  let waitedMs = 0;

  for (;;) {
    attempt += 1;

    try {
      return await call();
    } catch (error) {
      const retryClass = classifyForRetry(error);
      let delayMs: number;

      if (error instanceof RateLimitError) {
        if (rateLimitRetries >= policy.rateLimit.maxRetries) {
          throw error;
        }

        const remainingMs = policy.rateLimit.maxTotalWaitMs - waitedMs;
        if (remainingMs <= 0) {
          throw error;
        }

        const backoffMs = rateLimitDelayMs(policy.rateLimit.baseDelayMs, rateLimitRetries, random);
        delayMs = Math.min(Math.max(backoffMs, error.retryAfterMs ?? 0), remainingMs);
        rateLimitRetries += 1;
      } else if (error instanceof NetworkError) {
        networkFailures += 1;
        if (networkFailures >= policy.network.maxAttempts) {
          throw error;
        }

        delayMs = policy.network.delayMs * networkFailures;
      } else {
        throw error;
      }

      log.warn(
        {
          platform: context.platform,
          operation: context.operation,
          attempt,
          retryClass,
          delayMs,
          error: errorMessage(error)
        },
        "Platform call failed; retrying after back-off"
      );

      await wait(delayMs);
      waitedMs += delayMs;
    }
  }
}
