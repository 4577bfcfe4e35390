/**
 * Retry policy with exponential backoff, shared by every network client
 */

import {
  RateLimitedError,
  RemoteUnreachableError,
  StewardError,
  toError,
  type ExternalSystem,
} from "./errors.js";
import type { StewardLogger } from "./logger.js";

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Total attempts including the first (default: 3) */
  maxAttempts: number;
  /** Delay before the second attempt in milliseconds (default: 1000) */
  initialDelayMs: number;
  /** Upper bound for any single delay (default: 30000) */
  maxDelayMs: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier: number;
  /** Jitter factor 0-1 (default: 0.1) */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

/**
 * What a single call is, for logs and the final error
 */
export interface RetryContext {
  operation: string;
  system: ExternalSystem;
}

export type Sleep = (ms: number) => Promise<void>;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate delay with jitter
 */
export function calculateDelay(baseDelay: number, jitterFactor: number, maxDelay: number): number {
  const jitter = baseDelay * jitterFactor * (Math.random() * 2 - 1);
  return Math.min(Math.max(baseDelay + jitter, 0), maxDelay);
}

/**
 * Only Transient and RateLimited errors are retried. Unauthorized,
 * Conflict, NotFound and InvalidInput surface on the first attempt.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof RemoteUnreachableError) return false;
  if (error instanceof StewardError) {
    return error.kind === "Transient" || error.kind === "RateLimited";
  }
  return false;
}

/**
 * One policy object per invocation, injected into the tag client, the
 * release client and the params updater.
 */
export class RetryPolicy {
  readonly config: RetryConfig;
  private readonly sleepFn: Sleep;
  private readonly logger?: StewardLogger;

  constructor(
    config: Partial<RetryConfig> = {},
    options: { sleep?: Sleep; logger?: StewardLogger } = {},
  ) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.sleepFn = options.sleep ?? sleep;
    this.logger = options.logger;
  }

  /**
   * Run `fn` until it succeeds, a non-retryable error is thrown, or attempts
   * run out. Exhaustion throws RemoteUnreachableError carrying the last error.
   */
  async execute<T>(fn: () => Promise<T>, context: RetryContext): Promise<T> {
    let delay = this.config.initialDelayMs;
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;

        if (!isRetryableError(error)) {
          throw error;
        }

        if (attempt === this.config.maxAttempts) {
          break;
        }

        const wait =
          error instanceof RateLimitedError
            ? error.retryAfterMs
            : calculateDelay(delay, this.config.jitterFactor, this.config.maxDelayMs);

        this.logger?.warn(
          `${context.operation} failed (attempt ${attempt}/${this.config.maxAttempts}), retrying in ${Math.round(wait)}ms`,
        );

        await this.sleepFn(wait);
        delay = Math.min(delay * this.config.backoffMultiplier, this.config.maxDelayMs);
      }
    }

    const cause = toError(lastError);
    throw new RemoteUnreachableError(
      `${context.operation} failed after ${this.config.maxAttempts} attempts: ${cause.message}`,
      {
        system: context.system,
        operation: context.operation,
        attempts: this.config.maxAttempts,
        cause,
      },
    );
  }

  /**
   * Same policy, different logger
   */
  withLogger(logger: StewardLogger): RetryPolicy {
    return new RetryPolicy(this.config, { sleep: this.sleepFn, logger });
  }
}
