import { setTimeout as delay } from "node:timers/promises";

import { InvalidParameterError, MaxRetriesExceededError } from "./errors";

export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_BASE_DELAY_SECONDS = 5;
export const DEFAULT_BACKOFF_FACTOR = 2;

export type Sleep = (seconds: number) => Promise<void>;

export const realSleep: Sleep = async (seconds) => {
  await delay(seconds * 1000);
};

export interface RetryPolicyOptions {
  maxRetries?: number;
  baseDelaySeconds?: number;
  factor?: number;
  sleep?: Sleep;
}

export interface RetryHooks {
  isRetryable(error: unknown): boolean;
  onRetry?(info: { attempt: number; waitSeconds: number; error: unknown }): void;
}

/**
 * Exponential backoff: attempt `n` (from 0) that fails with a retryable error
 * waits `baseDelaySeconds * factor^n` before the next one.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelaySeconds: number;
  readonly factor: number;
  private readonly sleep: Sleep;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseDelaySeconds = options.baseDelaySeconds ?? DEFAULT_BASE_DELAY_SECONDS;
    this.factor = options.factor ?? DEFAULT_BACKOFF_FACTOR;
    this.sleep = options.sleep ?? realSleep;

    if (!Number.isInteger(this.maxRetries) || this.maxRetries <= 0) {
      throw new InvalidParameterError(
        `maxRetries must be a positive integer, got ${this.maxRetries}.`
      );
    }
    if (!(this.baseDelaySeconds >= 0) || !(this.factor >= 1)) {
      throw new InvalidParameterError(
        "baseDelaySeconds must be >= 0 and factor must be >= 1."
      );
    }
  }

  backoffSeconds(attempt: number): number {
    return this.baseDelaySeconds * this.factor ** attempt;
  }

  async run<T>(operation: (attempt: number) => Promise<T>, hooks: RetryHooks): Promise<T> {
    let lastError: unknown;
    for (let attempt = 0; attempt < this.maxRetries; attempt += 1) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (!hooks.isRetryable(error)) {
          throw error;
        }
        lastError = error;
        if (attempt + 1 >= this.maxRetries) {
          break;
        }
        const waitSeconds = this.backoffSeconds(attempt);
        hooks.onRetry?.({ attempt, waitSeconds, error });
        await this.sleep(waitSeconds);
      }
    }
    throw new MaxRetriesExceededError(this.maxRetries, lastError);
  }
}
