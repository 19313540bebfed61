import type { RetryPolicy } from 'App/config/config';
import { ValidationError } from 'App/errors/CustomError';
import type { Logger } from 'App/logger';
import { sleep as defaultSleep, type Sleep } from './sleep';

export const DEFAULT_WAIT_RANGE_SEC = { min: 10, max: 20 } as const;

export interface RetryOptions {
  logger: Logger;
  /** Label used in log lines, e.g. the wrapped operation's name. */
  name?: string;
  /** Errors for which this returns false are rethrown without further attempts. */
  retryIf?: (error: unknown) => boolean;
  sleep?: Sleep;
  random?: () => number;
}

/**
 * Resolves the delay between attempts. Without an explicit value, each call
 * draws a whole number of seconds from 10–20 so that several retrying callers
 * do not wake up together.
 */
export function resolveWaitSeconds(
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  if (policy.waitSeconds !== undefined) return policy.waitSeconds;
  const { min, max } = DEFAULT_WAIT_RANGE_SEC;
  return min + Math.min(max - min, Math.floor(random() * (max - min + 1)));
}

function assertPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    throw new ValidationError('maxRetries must be a non-negative integer', {
      maxRetries: policy.maxRetries,
    });
  }
  if (
    policy.waitSeconds !== undefined &&
    (!Number.isFinite(policy.waitSeconds) || policy.waitSeconds < 0)
  ) {
    throw new ValidationError('waitSeconds must be >= 0', {
      waitSeconds: policy.waitSeconds,
    });
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs `operation` up to `maxRetries + 1` times with a fixed delay between
 * attempts. The last error is rethrown as-is once attempts run out.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  assertPolicy(policy);
  const { logger, name = operation.name || 'operation', retryIf } = options;
  const sleep = options.sleep ?? defaultSleep;
  const waitSeconds = resolveWaitSeconds(policy, options.random);
  const maxAttempts = policy.maxRetries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (retryIf && !retryIf(error)) {
        logger.error(`${name} failed with a non-retryable error: ${errorMessage(error)}`, {
          attempt,
        });
        throw error;
      }
      if (attempt >= maxAttempts) {
        logger.error(`${name} failed after ${maxAttempts} attempts.`, {
          error: errorMessage(error),
        });
        throw error;
      }
      logger.warn(
        `${name} failed with: ${errorMessage(error)}. Retrying in ${waitSeconds} seconds...`,
        { attempt, maxAttempts },
      );
      await sleep(waitSeconds * 1000);
    }
  }
}

/** Wraps `fn` so every call goes through {@link withRetry} with the same policy. */
export function retryable<A extends unknown[], R>(
  fn: (...args: A) => Promise<R>,
  policy: RetryPolicy,
  options: RetryOptions,
): (...args: A) => Promise<R> {
  const name = options.name ?? fn.name;
  return (...args: A) => withRetry(() => fn(...args), policy, { ...options, name });
}
