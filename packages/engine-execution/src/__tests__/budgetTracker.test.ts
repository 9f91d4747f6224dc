/**
 * Budget Tracker Tests
 */

import { BudgetExceededError } from "@loopwright/engine-core";
import { describe, expect, it } from "vitest";
import { BudgetTracker, windowStartFor } from "../quota/budgetTracker";

const NOON_UTC = Date.UTC(2025, 5, 10, 12, 0, 0);
const HOUR_MS = 60 * 60 * 1000;

describe("BudgetTracker", () => {
  it("rejects the third 0.40 call against a 1.00 ceiling before it runs", () => {
    const tracker = new BudgetTracker({ dailyLimitUsd: 1, maxToolCallsPerLoop: 10 });
    const executed: number[] = [];

    const attempt = (call: number) => {
      tracker.check(0.4);
      executed.push(call);
      tracker.recordSpend(0.4);
    };

    attempt(1);
    attempt(2);
    expect(() => attempt(3)).toThrow(BudgetExceededError);
    expect(executed).toEqual([1, 2]);
    expect(tracker.snapshot().dailySpendUsd).toBeCloseTo(0.8);
  });

  it("rejects once spend has reached the ceiling even with no estimate", () => {
    const tracker = new BudgetTracker({ dailyLimitUsd: 0.5, maxToolCallsPerLoop: 10 });
    tracker.recordSpend(0.5);

    try {
      tracker.check();
      expect.unreachable("check should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(BudgetExceededError);
      if (error instanceof BudgetExceededError) {
        expect(error.resource).toBe("daily_spend_usd");
        expect(error.used).toBe(0.5);
        expect(error.limit).toBe(0.5);
      }
    }
  });

  it("ignores non-positive and non-finite spend", () => {
    const tracker = new BudgetTracker({ dailyLimitUsd: 1, maxToolCallsPerLoop: 10 });
    tracker.recordSpend(-1);
    tracker.recordSpend(Number.NaN);
    tracker.recordSpend(0);
    expect(tracker.snapshot().dailySpendUsd).toBe(0);
  });

  it("resets daily spend when the window rolls over", () => {
    let now = NOON_UTC;
    const tracker = new BudgetTracker({
      dailyLimitUsd: 1,
      maxToolCallsPerLoop: 10,
      resetHourUtc: 6,
      now: () => now,
    });

    tracker.recordSpend(1);
    expect(() => tracker.check()).toThrow(BudgetExceededError);

    now = NOON_UTC + 17 * HOUR_MS; // 05:00 next day, same window
    expect(() => tracker.check()).toThrow(BudgetExceededError);

    now = NOON_UTC + 18 * HOUR_MS; // 06:00 next day
    expect(() => tracker.check()).not.toThrow();
    const snapshot = tracker.snapshot();
    expect(snapshot.dailySpendUsd).toBe(0);
    expect(snapshot.totalSpendUsd).toBe(1);
  });

  it("counts outstanding reservations against the ceiling", () => {
    const tracker = new BudgetTracker({ dailyLimitUsd: 1.5, maxToolCallsPerLoop: 10 });

    const first = tracker.reserve(1);
    expect(() => tracker.reserve(1)).toThrow(BudgetExceededError);
    expect(tracker.snapshot().pendingUsd).toBe(1);

    first.settle(1);
    expect(tracker.snapshot()).toMatchObject({ dailySpendUsd: 1, pendingUsd: 0 });
    expect(() => tracker.reserve(1)).toThrow("Budget exceeded for daily_spend_usd: used 1 of 1.5");
  });

  it("frees the hold when a reservation is released", () => {
    const tracker = new BudgetTracker({ dailyLimitUsd: 1, maxToolCallsPerLoop: 10 });

    const failed = tracker.reserve(0.8);
    failed.release();
    failed.release();

    expect(tracker.snapshot()).toMatchObject({ dailySpendUsd: 0, pendingUsd: 0 });
    expect(() => tracker.reserve(0.8)).not.toThrow();
  });

  it("settles once and still records spend that lands after a release", () => {
    const tracker = new BudgetTracker({ dailyLimitUsd: 1, maxToolCallsPerLoop: 10 });
    const reservation = tracker.reserve(0.5);

    reservation.release();
    reservation.settle(0.25);
    reservation.settle(0.25);

    expect(tracker.snapshot()).toMatchObject({ dailySpendUsd: 0.25, pendingUsd: 0 });
  });

  it("computes window starts around the reset hour", () => {
    expect(windowStartFor(NOON_UTC, 0)).toBe(Date.UTC(2025, 5, 10, 0));
    expect(windowStartFor(NOON_UTC, 18)).toBe(Date.UTC(2025, 5, 9, 18));
    expect(windowStartFor(Date.UTC(2025, 5, 10, 18), 18)).toBe(Date.UTC(2025, 5, 10, 18));
  });
});

describe("LoopBudget", () => {
  it("enforces the per-loop tool-call ceiling", () => {
    const tracker = new BudgetTracker({ dailyLimitUsd: 1, maxToolCallsPerLoop: 2 });
    const loop = tracker.beginLoop();

    loop.check();
    loop.recordToolCall();
    loop.check();
    loop.recordToolCall();

    expect(() => loop.check()).toThrow("tool_calls_per_loop");
    expect(loop.toolCallCount).toBe(2);
    expect(tracker.snapshot().totalToolCalls).toBe(2);
  });

  it("keeps counters independent between concurrent loops", () => {
    const tracker = new BudgetTracker({ dailyLimitUsd: 1, maxToolCallsPerLoop: 1 });
    const first = tracker.beginLoop();
    first.recordToolCall();

    const second = tracker.beginLoop();
    expect(() => second.check()).not.toThrow();
    expect(() => first.check()).toThrow(BudgetExceededError);
  });

  it("counts dispatches still in flight toward the ceiling", () => {
    const tracker = new BudgetTracker({ dailyLimitUsd: 1, maxToolCallsPerLoop: 2 });
    const loop = tracker.beginLoop();

    loop.check();
    loop.startToolCall();
    loop.check();
    loop.startToolCall();
    expect(() => loop.check()).toThrow("Budget exceeded for tool_calls_per_loop: used 0 of 2");

    loop.recordToolCall();
    loop.recordToolCall();
    expect(loop.toolCallCount).toBe(2);
    expect(() => loop.check()).toThrow("used 2 of 2");
  });

  it("also rejects tool calls once daily spend is exhausted", () => {
    const tracker = new BudgetTracker({ dailyLimitUsd: 0.1, maxToolCallsPerLoop: 5 });
    const loop = tracker.beginLoop();
    tracker.recordSpend(0.2);
    expect(() => loop.check()).toThrow("daily_spend_usd");
  });
});
