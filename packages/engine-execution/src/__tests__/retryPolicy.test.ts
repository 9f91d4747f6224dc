import {
  ExhaustedRetriesError,
  ProviderError,
  ProviderFatalError,
} from "@loopwright/engine-core";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ProviderRetryPolicy, type RetryAttemptInfo } from "../routing/retryPolicy";

function transient(): ProviderError {
  return new ProviderError("upstream timed out", "primary", { transient: true });
}

describe("ProviderRetryPolicy", () => {
  it("retries transient failures on the configured schedule", async () => {
    const retries: RetryAttemptInfo[] = [];
    const policy = new ProviderRetryPolicy({
      delaysMs: [1, 2, 4],
      maxRetries: 3,
      onRetry: (info) => retries.push(info),
    });
    const fn = vi
      .fn<(attempt: number, signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce("done");

    await expect(policy.execute("primary", fn)).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(retries.map((info) => info.delayMs)).toEqual([1, 2]);
    expect(retries.map((info) => info.attempt)).toEqual([1, 2]);
  });

  it("does not retry non-transient failures", async () => {
    const policy = new ProviderRetryPolicy({ delaysMs: [1], maxRetries: 3 });
    const fatal = new ProviderFatalError("bad request", "primary", { statusCode: 400 });
    const fn = vi.fn(() => Promise.reject(fatal));

    await expect(policy.execute("primary", fn)).rejects.toBe(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("wraps a transient failure that outlives the schedule", async () => {
    const retries: number[] = [];
    const policy = new ProviderRetryPolicy({
      delaysMs: [1, 2, 4],
      maxRetries: 3,
      onRetry: (info) => retries.push(info.delayMs),
    });
    const fn = vi.fn(() => Promise.reject(transient()));

    const error = await policy.execute("primary", fn).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ExhaustedRetriesError);
    if (error instanceof ExhaustedRetriesError) {
      expect(error.attempts).toBe(4);
      expect(error.message).toBe("primary failed after 4 attempts: upstream timed out");
    }
    expect(fn).toHaveBeenCalledTimes(4);
    expect(retries).toEqual([1, 2, 4]);
  });

  describe("with settings left undefined", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("falls back to the default schedule", async () => {
      vi.useFakeTimers();
      const retries: number[] = [];
      const policy = new ProviderRetryPolicy({
        delaysMs: undefined,
        maxRetries: undefined,
        onRetry: (info) => retries.push(info.delayMs),
      });
      const fn = vi.fn(() => Promise.reject(transient()));

      const outcome = policy.execute("primary", fn).catch((caught: unknown) => caught);
      await vi.advanceTimersByTimeAsync(7_000);

      expect(await outcome).toBeInstanceOf(ExhaustedRetriesError);
      expect(fn).toHaveBeenCalledTimes(4);
      expect(retries).toEqual([1_000, 2_000, 4_000]);
    });
  });
});
