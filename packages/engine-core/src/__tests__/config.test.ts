import { describe, expect, it } from "vitest";
import { parseEngineConfig, resolveEngineConfig } from "../config";
import { ConfigValidationError } from "../errors";
import { isErr, isOk } from "../types/result";

describe("engine config", () => {
  it("fills every default from an empty object", () => {
    const config = resolveEngineConfig({}, {});

    expect(config.agent.maxIterations).toBe(50);
    expect(config.agent.requestTimeoutMs).toBe(300_000);
    expect(config.agent.fallbackAfterFailures).toBe(3);
    expect(config.agent.fallbackModel).toBeUndefined();
    expect(config.agent.toolResultMaxTokens).toBe(12_000);
    expect(config.autonomy.level).toBe(1);
    expect(config.autonomy.dailyBudgetUsd).toBe(10);
    expect(config.autonomy.maxToolCallsPerLoop).toBe(100);
    expect(config.autonomy.approvalTimeoutMs).toBe(120_000);
    expect(config.autonomy.toolAllowlist).toEqual([]);
    expect(config.router.retryDelaysMs).toEqual([1000, 2000, 4000]);
    expect(config.router.maxRetries).toBe(3);
    expect(config.router.circuitFailureThreshold).toBe(5);
    expect(config.router.circuitResetTimeoutMs).toBe(60_000);
    expect(config.lazyStop.enabled).toBe(false);
    expect(config.lazyStop.deferralPhrases).toEqual([]);
    expect(config.lazyStop.lateIteration).toBe(8);
    expect(config.lazyStop.lateThreshold).toBe(3);
    expect(config.lazyStop.suppressAfterTools).toEqual([]);
    expect(config.agent.parallelToolCalls).toBe(false);
  });

  it("keeps explicit values", () => {
    const config = resolveEngineConfig(
      {
        agent: { maxIterations: 7, fallbackModel: "backup/small" },
        autonomy: { level: 3, toolDenylist: ["shell_exec"] },
      },
      {}
    );

    expect(config.agent.maxIterations).toBe(7);
    expect(config.agent.fallbackModel).toBe("backup/small");
    expect(config.agent.requestTimeoutMs).toBe(300_000);
    expect(config.autonomy.level).toBe(3);
    expect(config.autonomy.toolDenylist).toEqual(["shell_exec"]);
  });

  it("applies environment overrides", () => {
    const config = resolveEngineConfig(
      { agent: { maxIterations: 7 } },
      {
        ENGINE_MAX_ITERATIONS: "12",
        ENGINE_REQUEST_TIMEOUT_MS: "1500",
        ENGINE_DAILY_BUDGET_USD: "2.5",
        ENGINE_AUTONOMY_LEVEL: "4",
        ENGINE_FALLBACK_MODEL: " backup/large ",
      }
    );

    expect(config.agent.maxIterations).toBe(12);
    expect(config.agent.requestTimeoutMs).toBe(1500);
    expect(config.autonomy.dailyBudgetUsd).toBe(2.5);
    expect(config.autonomy.level).toBe(4);
    expect(config.agent.fallbackModel).toBe("backup/large");
  });

  it("ignores non-numeric environment values", () => {
    const config = resolveEngineConfig({}, { ENGINE_MAX_ITERATIONS: "lots" });
    expect(config.agent.maxIterations).toBe(50);
  });

  it("rejects an out-of-range autonomy level from the environment", () => {
    expect(() => resolveEngineConfig({}, { ENGINE_AUTONOMY_LEVEL: "9" })).toThrow(
      ConfigValidationError
    );
  });

  it("reports issue paths without throwing", () => {
    const result = parseEngineConfig({ autonomy: { level: 7 }, extra: true });

    expect(isErr(result)).toBe(true);
    if (!result.ok) {
      expect(result.error.issues).toContain(
        "autonomy.level: Number must be less than or equal to 4"
      );
      expect(result.error.code).toBe("INVALID_CONFIG");
    }
  });

  it("accepts rate overrides", () => {
    const result = parseEngineConfig({
      router: { rates: { "local/tiny": { inputPer1M: 0.1, outputPer1M: 0.2 } } },
    });

    expect(isOk(result)).toBe(true);
    if (result.ok) {
      expect(result.value.router.rates["local/tiny"]).toEqual({ inputPer1M: 0.1, outputPer1M: 0.2 });
    }
  });
});
