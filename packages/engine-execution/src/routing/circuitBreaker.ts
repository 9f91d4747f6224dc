/**
 * Circuit Breaker
 *
 * Per-provider breaker for routed model calls.
 *
 * States:
 * - closed: normal operation, calls flow through
 * - open: provider unhealthy, calls fail fast
 * - half_open: a single trial call tests recovery
 */

import { CircuitOpenError } from "@loopwright/engine-core";

/** Circuit breaker state */
export type CircuitState = "closed" | "open" | "half_open";

/** Circuit breaker configuration */
export interface CircuitBreakerConfig {
  /** Consecutive failures before opening (default: 5) */
  failureThreshold: number;
  /** Time in ms before an open circuit admits a trial call (default: 60000) */
  resetTimeoutMs: number;
  /** Clock, injectable for tests */
  now: () => number;
  /** Optional callback when state changes */
  onStateChange?: (from: CircuitState, to: CircuitState, reason: string) => void;
}

/** Circuit breaker metrics */
export interface CircuitBreakerMetrics {
  state: CircuitState;
  consecutiveFailures: number;
  openedAt: number | null;
  trialInFlight: boolean;
  totalRequests: number;
  totalFailures: number;
  totalSuccesses: number;
  totalRejections: number;
  /** Calls cut short by the caller's own abort */
  totalCancellations: number;
}

export class CircuitBreaker {
  private state: CircuitState = "closed";
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private trialInFlight = false;
  private totalRequests = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private totalRejections = 0;
  private totalCancellations = 0;

  private readonly config: CircuitBreakerConfig;

  constructor(
    readonly name: string,
    config: Partial<CircuitBreakerConfig> = {}
  ) {
    this.config = {
      failureThreshold: config.failureThreshold ?? 5,
      resetTimeoutMs: config.resetTimeoutMs ?? 60_000,
      now: config.now ?? Date.now,
      onStateChange: config.onStateChange,
    };
  }

  /**
   * Execute a function through the circuit breaker. Every rejected or
   * failed execution counts once, however many attempts `fn` makes.
   * A failure after the caller's `signal` aborted is not the provider's
   * and is not counted.
   */
  async execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    this.totalRequests++;
    const isProbe = this.admit();

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (signal?.aborted) {
        this.totalCancellations++;
      } else {
        this.recordFailure();
      }
      throw error;
    } finally {
      if (isProbe) {
        this.trialInFlight = false;
      }
    }
  }

  /**
   * Admit a call or throw CircuitOpenError. Returns whether the call is the
   * half-open trial call.
   */
  private admit(): boolean {
    if (this.state === "open" && this.openedAt !== null) {
      if (this.config.now() - this.openedAt >= this.config.resetTimeoutMs) {
        this.transitionTo("half_open", "Reset timeout elapsed");
      }
    }

    switch (this.state) {
      case "closed":
        return false;
      case "half_open":
        if (this.trialInFlight) {
          this.totalRejections++;
          throw new CircuitOpenError(this.name, 0);
        }
        this.trialInFlight = true;
        return true;
      case "open":
        this.totalRejections++;
        throw new CircuitOpenError(this.name, this.getTimeUntilRetry());
    }
  }

  private recordSuccess(): void {
    this.totalSuccesses++;
    this.consecutiveFailures = 0;
    if (this.state === "half_open") {
      this.transitionTo("closed", "Probe succeeded");
    }
  }

  private recordFailure(): void {
    this.totalFailures++;
    this.consecutiveFailures++;

    if (this.state === "half_open") {
      this.transitionTo("open", "Probe failed");
      return;
    }
    if (this.state === "closed" && this.consecutiveFailures >= this.config.failureThreshold) {
      this.transitionTo(
        "open",
        `Failure threshold reached (${this.consecutiveFailures} consecutive failures)`
      );
    }
  }

  private transitionTo(newState: CircuitState, reason: string): void {
    const oldState = this.state;
    this.state = newState;

    if (newState === "open") {
      this.openedAt = this.config.now();
    } else if (newState === "closed") {
      this.openedAt = null;
      this.consecutiveFailures = 0;
    }

    this.config.onStateChange?.(oldState, newState, reason);
  }

  /**
   * Time until an open circuit admits its trial call.
   */
  getTimeUntilRetry(): number {
    if (this.state !== "open" || this.openedAt === null) {
      return 0;
    }
    const elapsed = this.config.now() - this.openedAt;
    return Math.max(0, this.config.resetTimeoutMs - elapsed);
  }

  getState(): CircuitState {
    return this.state;
  }

  getMetrics(): CircuitBreakerMetrics {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      trialInFlight: this.trialInFlight,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
      totalRejections: this.totalRejections,
      totalCancellations: this.totalCancellations,
    };
  }

  /**
   * Reset circuit breaker to initial state.
   */
  reset(): void {
    this.state = "closed";
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.trialInFlight = false;
  }
}
