/**
 * Retry Policy
 *
 * Exponential backoff with jitter. The error decides whether a retry is
 * worthwhile; the attempt counter decides whether one is still allowed.
 */

import type { ApiError } from "./error-taxonomy.js";

export type RetryDecision = {
  /** Whether to resubmit the request. */
  shouldRetry: boolean;
  /** Reason for the decision (human-readable). */
  reason: string;
};

export type RetrySchedulerOptions = {
  maxRetries?: number;
  baseDelayMs?: number;
  /** Fraction of the backoff added or removed at random (0.3 = ±30%). */
  jitterRange?: number;
  minDelayMs?: number;
  /** Uniform source in [0, 1). */
  random?: () => number;
};

export class RetryScheduler {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly jitterRange: number;
  readonly minDelayMs: number;
  private readonly random: () => number;

  constructor(options: RetrySchedulerOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1_000;
    this.jitterRange = options.jitterRange ?? 0.3;
    this.minDelayMs = options.minDelayMs ?? 100;
    this.random = options.random ?? Math.random;
  }

  /**
   * Decide whether a failed attempt gets another go.
   *
   * Rules:
   * - Non-retryable errors are final on any attempt.
   * - Retryable errors are resubmitted while attempt < maxRetries.
   */
  shouldRetry(error: ApiError, attempt: number): RetryDecision {
    if (!error.shouldRetry) {
      return {
        shouldRetry: false,
        reason: error.cancelled
          ? "Cancelled by caller"
          : `Non-retriable error (${describeKind(error)})`,
      };
    }

    if (attempt >= this.maxRetries) {
      return {
        shouldRetry: false,
        reason: `Max retries exhausted (attempt=${attempt}, maxRetries=${this.maxRetries})`,
      };
    }

    return {
      shouldRetry: true,
      reason: `Transient error (${describeKind(error)}), retry ${attempt + 1}/${this.maxRetries}`,
    };
  }

  /**
   * Backoff before resubmitting after `attempt` failed: base·2^attempt,
   * shifted by a fresh uniform offset within ±jitterRange of itself, never
   * below minDelayMs.
   */
  delay(attempt: number): number {
    const backoff = this.baseDelayMs * 2 ** attempt;
    const offset = (this.random() * 2 - 1) * this.jitterRange * backoff;
    return Math.max(this.minDelayMs, backoff + offset);
  }
}

function describeKind(error: ApiError): string {
  return error.kind === "http" ? `http ${error.statusCode ?? "?"}` : error.kind;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Wait `ms`. Resolves early when `signal` aborts; callers check
 * `signal.aborted` afterwards.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
