/**
 * Engine configuration schema.
 *
 * Validated with zod; every field has a default so `{}` is a complete
 * configuration. Environment overrides are applied after parsing.
 */

import { z } from "zod";
import { ConfigValidationError } from "./errors";
import { err, ok, type Result } from "./types/result";

const modelRateSchema = z
  .object({
    /** USD per 1M input tokens */
    inputPer1M: z.number().nonnegative(),
    /** USD per 1M output tokens */
    outputPer1M: z.number().nonnegative(),
  })
  .strict();

const agentConfigSchema = z
  .object({
    model: z.string().min(1).default("anthropic/claude-sonnet-4"),
    fallbackModel: z.string().min(1).optional(),
    fallbackAfterFailures: z.number().int().positive().default(3),
    maxIterations: z.number().int().positive().default(50),
    requestTimeoutMs: z.number().int().nonnegative().default(300_000),
    maxTokens: z.number().int().positive().default(8192),
    temperature: z.number().min(0).max(2).optional(),
    systemPrompt: z.string().optional(),
    /** 0 disables truncation */
    toolResultMaxTokens: z.number().int().nonnegative().default(12_000),
    /** Dispatch allowed read-only calls of one round concurrently */
    parallelToolCalls: z.boolean().default(false),
  })
  .strict();

const autonomyConfigSchema = z
  .object({
    level: z.number().int().min(0).max(4).default(1),
    dailyBudgetUsd: z.number().nonnegative().default(10),
    maxToolCallsPerLoop: z.number().int().nonnegative().default(100),
    budgetResetHourUtc: z.number().int().min(0).max(23).default(0),
    toolAllowlist: z.array(z.string()).default([]),
    toolDenylist: z.array(z.string()).default([]),
    maxBulkDeletes: z.number().int().nonnegative().default(5),
    approvalTimeoutMs: z.number().int().positive().default(120_000),
  })
  .strict();

const routerConfigSchema = z
  .object({
    retryDelaysMs: z.array(z.number().int().nonnegative()).min(1).default([1000, 2000, 4000]),
    maxRetries: z.number().int().nonnegative().default(3),
    circuitFailureThreshold: z.number().int().positive().default(5),
    circuitResetTimeoutMs: z.number().int().nonnegative().default(60_000),
    rates: z.record(modelRateSchema).default({}),
  })
  .strict();

const lazyStopConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    deferralPhrases: z.array(z.string().min(1)).default([]),
    completionPhrases: z.array(z.string().min(1)).default([]),
    /** Responses shorter than this are never considered lazy */
    minLength: z.number().int().nonnegative().default(0),
    /** Deferral phrase hits needed to fire */
    threshold: z.number().int().positive().default(2),
    /** From this iteration on, `lateThreshold` hits are needed instead */
    lateIteration: z.number().int().positive().default(8),
    lateThreshold: z.number().int().positive().default(3),
    /** Tool patterns whose use in the previous round suppresses detection */
    suppressAfterTools: z.array(z.string().min(1)).default([]),
    /** When set, suppression also needs one of these phrases in the text */
    suppressPhrases: z.array(z.string().min(1)).default([]),
    /** "Set up and stopped" phrases; one plus a single deferral fires early on */
    scaffoldingPhrases: z.array(z.string().min(1)).default([]),
    /** Scaffolding phrases only count before this iteration */
    scaffoldingBeforeIteration: z.number().int().positive().default(5),
  })
  .strict();

export const engineConfigSchema = z
  .object({
    agent: agentConfigSchema.default({}),
    autonomy: autonomyConfigSchema.default({}),
    router: routerConfigSchema.default({}),
    lazyStop: lazyStopConfigSchema.default({}),
  })
  .strict();

export type ModelRate = z.infer<typeof modelRateSchema>;
export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type AutonomyConfig = z.infer<typeof autonomyConfigSchema>;
export type RouterConfig = z.infer<typeof routerConfigSchema>;
export type LazyStopConfig = z.infer<typeof lazyStopConfigSchema>;
export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Parse configuration without throwing.
 */
export function parseEngineConfig(input: unknown): Result<EngineConfig, ConfigValidationError> {
  const parsed = engineConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    return err(
      new ConfigValidationError(
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      )
    );
  }
  return ok(parsed.data);
}

/**
 * Parse configuration and apply environment overrides.
 * Throws ConfigValidationError on invalid input.
 */
export function resolveEngineConfig(
  input: EngineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  const parsed = parseEngineConfig(input);
  if (!parsed.ok) {
    throw parsed.error;
  }
  const config = parsed.value;

  const maxIterations = readEnvNumber(env, ["ENGINE_MAX_ITERATIONS"]);
  const requestTimeoutMs = readEnvNumber(env, ["ENGINE_REQUEST_TIMEOUT_MS"]);
  const dailyBudgetUsd = readEnvNumber(env, ["ENGINE_DAILY_BUDGET_USD"]);
  const level = readEnvNumber(env, ["ENGINE_AUTONOMY_LEVEL"]);
  const fallbackModel = env.ENGINE_FALLBACK_MODEL?.trim();

  const merged = {
    ...config,
    agent: {
      ...config.agent,
      maxIterations: maxIterations ?? config.agent.maxIterations,
      requestTimeoutMs: requestTimeoutMs ?? config.agent.requestTimeoutMs,
      fallbackModel: fallbackModel || config.agent.fallbackModel,
    },
    autonomy: {
      ...config.autonomy,
      dailyBudgetUsd: dailyBudgetUsd ?? config.autonomy.dailyBudgetUsd,
      level: level ?? config.autonomy.level,
    },
  };

  // Env overrides are validated by the same schema
  const revalidated = parseEngineConfig(merged);
  if (!revalidated.ok) {
    throw revalidated.error;
  }
  return revalidated.value;
}

function readEnvNumber(env: NodeJS.ProcessEnv, keys: string[]): number | undefined {
  for (const key of keys) {
    const raw = env[key];
    if (!raw) {
      continue;
    }
    const parsed = Number(raw);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  return undefined;
}
