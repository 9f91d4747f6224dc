import { CircuitOpenError } from "@loopwright/engine-core";
import { describe, expect, it, vi } from "vitest";
import { CircuitBreaker, type CircuitState } from "../routing/circuitBreaker";

function createClock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

async function failTimes(breaker: CircuitBreaker, count: number): Promise<void> {
  for (let i = 0; i < count; i++) {
    await expect(breaker.execute(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
  }
}

describe("CircuitBreaker", () => {
  it("opens after consecutive failures and stops invoking the call", async () => {
    const clock = createClock();
    const breaker = new CircuitBreaker("primary", { now: clock.now });
    await failTimes(breaker, 5);

    expect(breaker.getState()).toBe("open");
    const call = vi.fn(() => Promise.resolve("ok"));
    await expect(breaker.execute(call)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(call).not.toHaveBeenCalled();
  });

  it("resets the failure count on success", async () => {
    const breaker = new CircuitBreaker("primary", { failureThreshold: 3 });
    await failTimes(breaker, 2);
    await breaker.execute(() => Promise.resolve("ok"));
    await failTimes(breaker, 2);

    expect(breaker.getState()).toBe("closed");
    expect(breaker.getMetrics().consecutiveFailures).toBe(2);
  });

  it("admits exactly one trial after the cool-off and closes on success", async () => {
    const clock = createClock();
    const transitions: Array<[CircuitState, CircuitState]> = [];
    const breaker = new CircuitBreaker("primary", {
      now: clock.now,
      onStateChange: (from, to) => transitions.push([from, to]),
    });
    await failTimes(breaker, 5);

    clock.advance(59_999);
    await expect(breaker.execute(() => Promise.resolve("early"))).rejects.toBeInstanceOf(
      CircuitOpenError
    );

    clock.advance(1);
    let finishProbe: (value: string) => void = () => undefined;
    const trial = breaker.execute(
      () =>
        new Promise<string>((resolve) => {
          finishProbe = resolve;
        })
    );

    const concurrent = vi.fn(() => Promise.resolve("second"));
    await expect(breaker.execute(concurrent)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(concurrent).not.toHaveBeenCalled();

    finishProbe("recovered");
    await expect(trial).resolves.toBe("recovered");
    expect(breaker.getState()).toBe("closed");
    expect(breaker.getMetrics().consecutiveFailures).toBe(0);
    expect(transitions).toEqual([
      ["closed", "open"],
      ["open", "half_open"],
      ["half_open", "closed"],
    ]);
  });

  it("reopens with a fresh timer when the trial fails", async () => {
    const clock = createClock();
    const breaker = new CircuitBreaker("primary", { now: clock.now, resetTimeoutMs: 1_000 });
    await failTimes(breaker, 5);

    clock.advance(1_000);
    await failTimes(breaker, 1);

    expect(breaker.getState()).toBe("open");
    expect(breaker.getTimeUntilRetry()).toBe(1_000);
    expect(breaker.getMetrics().trialInFlight).toBe(false);
  });

  it("does not count calls the caller aborted as failures", async () => {
    const clock = createClock();
    const breaker = new CircuitBreaker("primary", { now: clock.now, failureThreshold: 2 });
    const controller = new AbortController();
    controller.abort(new Error("turn deadline"));

    for (let i = 0; i < 3; i++) {
      await expect(
        breaker.execute(() => Promise.reject(new Error("aborted")), controller.signal)
      ).rejects.toThrow("aborted");
    }

    const metrics = breaker.getMetrics();
    expect(metrics.state).toBe("closed");
    expect(metrics.consecutiveFailures).toBe(0);
    expect(metrics.totalFailures).toBe(0);
    expect(metrics.totalCancellations).toBe(3);
  });

  it("releases an aborted trial without reopening", async () => {
    const clock = createClock();
    const breaker = new CircuitBreaker("primary", { now: clock.now, resetTimeoutMs: 1_000 });
    await failTimes(breaker, 5);
    clock.advance(1_000);

    const controller = new AbortController();
    controller.abort();
    await expect(
      breaker.execute(() => Promise.reject(new Error("aborted")), controller.signal)
    ).rejects.toThrow("aborted");

    expect(breaker.getState()).toBe("half_open");
    expect(breaker.getMetrics().trialInFlight).toBe(false);
    await expect(breaker.execute(() => Promise.resolve("ok"))).resolves.toBe("ok");
    expect(breaker.getState()).toBe("closed");
  });
});
