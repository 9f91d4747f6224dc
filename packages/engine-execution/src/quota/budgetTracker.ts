/**
 * Budget Tracker
 *
 * Daily spend and tool-call ceilings shared by every running loop. All
 * state lives in one owner and every check-and-update is a synchronous
 * critical section, so concurrent sessions cannot interleave inside one.
 */

import { BudgetExceededError } from "@loopwright/engine-core";
import { getLogger, type RuntimeLogger } from "@loopwright/engine-telemetry/logging";

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// Types
// ============================================================================

export interface BudgetTrackerConfig {
  /** Daily spend ceiling in USD */
  dailyLimitUsd: number;
  /** Tool calls allowed in one agent loop */
  maxToolCallsPerLoop: number;
  /** UTC hour at which the daily window rolls over (default: 0) */
  resetHourUtc?: number;
  /** Clock, injectable for tests */
  now?: () => number;
  logger?: RuntimeLogger;
}

export interface BudgetSnapshot {
  /** Start of the current accounting window (epoch ms) */
  windowStart: number;
  dailySpendUsd: number;
  /** Held by in-flight model calls */
  pendingUsd: number;
  dailyLimitUsd: number;
  maxToolCallsPerLoop: number;
  totalSpendUsd: number;
  totalToolCalls: number;
}

/**
 * Spend held against the daily ceiling while a model call is in flight.
 * `settle` records the actual cost; `release` drops the hold without
 * spending. Both are idempotent, and settling after a release still
 * records the spend.
 */
export interface SpendReservation {
  readonly estimatedUsd: number;
  settle(actualUsd: number): void;
  release(): void;
}

/**
 * Start of the accounting window containing `now`.
 */
export function windowStartFor(now: number, resetHourUtc: number): number {
  const date = new Date(now);
  const boundary = Date.UTC(
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate(),
    resetHourUtc
  );
  return boundary <= now ? boundary : boundary - DAY_MS;
}

// ============================================================================
// Budget Tracker
// ============================================================================

export class BudgetTracker {
  private readonly dailyLimitUsd: number;
  private readonly maxToolCallsPerLoop: number;
  private readonly resetHourUtc: number;
  private readonly now: () => number;
  private readonly logger: RuntimeLogger;

  private windowStart: number;
  private dailySpendUsd = 0;
  private pendingUsd = 0;
  private totalSpendUsd = 0;
  private totalToolCalls = 0;

  constructor(config: BudgetTrackerConfig) {
    this.dailyLimitUsd = config.dailyLimitUsd;
    this.maxToolCallsPerLoop = config.maxToolCallsPerLoop;
    this.resetHourUtc = config.resetHourUtc ?? 0;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? getLogger("budget");
    this.windowStart = windowStartFor(this.now(), this.resetHourUtc);
  }

  /**
   * Fail fast if today's spend has reached the ceiling, or would pass it
   * once outstanding reservations and the estimated cost are added.
   * Called before every tool call.
   */
  check(estimatedCostUsd = 0): void {
    this.rollWindow();
    this.assertWithinLimit(estimatedCostUsd);
  }

  /**
   * Check the ceiling and hold `estimatedCostUsd` against it in one step.
   * Concurrent callers see each other's holds, so spend can pass the
   * ceiling by at most one call's estimation error.
   */
  reserve(estimatedCostUsd: number): SpendReservation {
    this.rollWindow();
    const estimatedUsd = Number.isFinite(estimatedCostUsd) ? Math.max(0, estimatedCostUsd) : 0;
    this.assertWithinLimit(estimatedUsd);
    this.pendingUsd += estimatedUsd;

    let held = true;
    let settled = false;
    const releaseHold = () => {
      if (held) {
        held = false;
        this.pendingUsd = Math.max(0, this.pendingUsd - estimatedUsd);
      }
    };

    return {
      estimatedUsd,
      settle: (actualUsd) => {
        if (settled) {
          return;
        }
        settled = true;
        releaseHold();
        this.recordSpend(actualUsd);
      },
      release: releaseHold,
    };
  }

  /**
   * Record spend for a completed call. Never throws; the next check() rejects.
   */
  recordSpend(amountUsd: number): void {
    if (!Number.isFinite(amountUsd) || amountUsd <= 0) {
      return;
    }
    this.rollWindow();
    this.dailySpendUsd += amountUsd;
    this.totalSpendUsd += amountUsd;
    this.logger.debug("spend recorded", {
      amountUsd,
      dailySpendUsd: this.dailySpendUsd,
    });
  }

  /**
   * Count a completed tool call toward lifetime totals.
   */
  recordToolCall(): void {
    this.totalToolCalls += 1;
  }

  /**
   * Open a per-loop scope with its own tool-call counter.
   */
  beginLoop(): LoopBudget {
    return new LoopBudget(this, this.maxToolCallsPerLoop);
  }

  snapshot(): BudgetSnapshot {
    this.rollWindow();
    return {
      windowStart: this.windowStart,
      dailySpendUsd: this.dailySpendUsd,
      pendingUsd: this.pendingUsd,
      dailyLimitUsd: this.dailyLimitUsd,
      maxToolCallsPerLoop: this.maxToolCallsPerLoop,
      totalSpendUsd: this.totalSpendUsd,
      totalToolCalls: this.totalToolCalls,
    };
  }

  private assertWithinLimit(estimatedCostUsd: number): void {
    const projected = this.dailySpendUsd + this.pendingUsd + Math.max(0, estimatedCostUsd);
    if (this.dailySpendUsd >= this.dailyLimitUsd || projected > this.dailyLimitUsd) {
      this.logger.warn("daily budget exhausted", {
        spentUsd: this.dailySpendUsd,
        pendingUsd: this.pendingUsd,
        estimatedCostUsd,
        limitUsd: this.dailyLimitUsd,
      });
      throw new BudgetExceededError("daily_spend_usd", this.dailySpendUsd, this.dailyLimitUsd);
    }
  }

  private rollWindow(): void {
    const current = windowStartFor(this.now(), this.resetHourUtc);
    if (current !== this.windowStart) {
      this.logger.info("budget window rolled over", {
        previousSpendUsd: this.dailySpendUsd,
      });
      this.windowStart = current;
      this.dailySpendUsd = 0;
    }
  }
}

// ============================================================================
// Loop Budget
// ============================================================================

/**
 * Tool-call counter for one agent loop invocation. Each loop owns its
 * own instance; shared spend is delegated to the tracker.
 */
export class LoopBudget {
  private toolCalls = 0;
  private inFlight = 0;

  constructor(
    private readonly tracker: BudgetTracker,
    private readonly maxToolCalls: number
  ) {}

  /**
   * Fail fast before a tool call: daily spend or the per-loop ceiling.
   * Dispatches still running count toward the ceiling.
   */
  check(): void {
    this.tracker.check();
    if (this.toolCalls + this.inFlight >= this.maxToolCalls) {
      throw new BudgetExceededError("tool_calls_per_loop", this.toolCalls, this.maxToolCalls);
    }
  }

  /** A dispatch has started; `recordToolCall` ends it */
  startToolCall(): void {
    this.inFlight += 1;
  }

  recordToolCall(): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
    this.toolCalls += 1;
    this.tracker.recordToolCall();
  }

  get toolCallCount(): number {
    return this.toolCalls;
  }
}

export function createBudgetTracker(config: BudgetTrackerConfig): BudgetTracker {
  return new BudgetTracker(config);
}
