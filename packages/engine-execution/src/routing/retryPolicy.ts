/**
 * Retry Policy
 *
 * Retries transient provider failures on a fixed delay schedule, built on
 * cockatiel. Non-transient failures propagate on the first attempt.
 */

import {
  CircuitOpenError,
  ExhaustedRetriesError,
  isTransientError,
} from "@loopwright/engine-core";
import { handleWhen, IterableBackoff, retry } from "cockatiel";

// ============================================================================
// Types
// ============================================================================

export interface RetryScheduleConfig {
  /** Delay before each retry; the last entry repeats (default: 1000, 2000, 4000) */
  delaysMs: readonly number[];
  /** Maximum retries after the first attempt (default: 3) */
  maxRetries: number;
  /** Called before each retry */
  onRetry?: (info: RetryAttemptInfo) => void;
}

export interface RetryAttemptInfo {
  provider: string;
  /** Attempt that just failed (1-based) */
  attempt: number;
  delayMs: number;
  error: unknown;
}

const DEFAULT_SCHEDULE: RetryScheduleConfig = {
  delaysMs: [1000, 2000, 4000],
  maxRetries: 3,
};

// ============================================================================
// Retry Policy
// ============================================================================

export class ProviderRetryPolicy {
  private readonly config: RetryScheduleConfig;

  constructor(config: Partial<RetryScheduleConfig> = {}) {
    // Callers pass optional settings straight through, so undefined keeps the default
    this.config = {
      delaysMs: config.delaysMs ?? DEFAULT_SCHEDULE.delaysMs,
      maxRetries: config.maxRetries ?? DEFAULT_SCHEDULE.maxRetries,
      onRetry: config.onRetry,
    };
  }

  /**
   * Run `fn` with retries. A transient failure that outlives the schedule
   * becomes ExhaustedRetriesError.
   */
  async execute<T>(
    provider: string,
    fn: (attempt: number, signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    // One policy per call keeps onRetry events scoped to this call
    const policy = retry(
      handleWhen((error) => isTransientError(error) && !(error instanceof CircuitOpenError)),
      {
        maxAttempts: this.config.maxRetries,
        backoff: new IterableBackoff([...this.config.delaysMs]),
      }
    );

    let attempts = 0;
    const retrySub = policy.onRetry((reason) => {
      this.config.onRetry?.({
        provider,
        attempt: attempts,
        delayMs: reason.delay,
        error: "error" in reason ? reason.error : reason.value,
      });
    });

    try {
      return await policy.execute(({ signal: attemptSignal }) => {
        attempts += 1;
        return fn(attempts, attemptSignal);
      }, signal);
    } catch (error) {
      if (signal?.aborted || !isTransientError(error) || error instanceof CircuitOpenError) {
        throw error;
      }
      throw new ExhaustedRetriesError(provider, attempts, error);
    } finally {
      retrySub.dispose();
    }
  }
}

export function createRetryPolicy(config: Partial<RetryScheduleConfig> = {}): ProviderRetryPolicy {
  return new ProviderRetryPolicy(config);
}
