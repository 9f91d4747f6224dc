/**
 * Agent Engine
 *
 * Wires the loop to its collaborators from one resolved configuration.
 * Every session shares the engine's router, budget, approval gate and
 * session manager.
 */

import {
  type EngineConfig,
  type EngineConfigInput,
  type MemoryStore,
  type ModelProvider,
  resolveEngineConfig,
  type Session,
  type ToolDefinition,
  type ToolDispatcher,
} from "@loopwright/engine-core";
import { getLogger, type RuntimeLogger } from "@loopwright/engine-telemetry/logging";
import { AgentLoop, type TurnInput } from "./orchestrator/agentLoop";
import { createPhraseLazyStopDetector, type LazyStopDetector } from "./orchestrator/lazyStop";
import { InMemoryTranscriptStore, type TranscriptStore } from "./orchestrator/transcript";
import { type BudgetSnapshot, BudgetTracker } from "./quota/budgetTracker";
import type { CircuitBreakerMetrics } from "./routing/circuitBreaker";
import { ModelRouter } from "./routing/modelRouter";
import type { RetryAttemptInfo } from "./routing/retryPolicy";
import {
  type ApprovalAuditLogger,
  ApprovalGate,
  type ApprovalRecord,
} from "./security/approvalGate";
import { GuardrailEngine, type GuardrailRule } from "./security/guardrails";
import { SessionManager } from "./session/sessionManager";
import type { EngineEventStream } from "./streaming/eventStream";

export interface AgentEngineOptions {
  /** Raw configuration; validated and merged with env overrides */
  config?: EngineConfigInput;
  env?: NodeJS.ProcessEnv;
  providers: ModelProvider[];
  /** Provider that receives a request when the primary route fails */
  fallbackProvider?: string;
  /** Tool catalogue offered to the model */
  tools: ToolDefinition[];
  dispatcher: ToolDispatcher;
  memory?: MemoryStore;
  transcripts?: TranscriptStore;
  /** Persisted sessions to load; empty ones are dropped at startup */
  sessions?: readonly Session[];
  /** Replaces the phrase detector built from `lazyStop` config */
  lazyStop?: LazyStopDetector;
  /** Extra guardrail rules, evaluated after the built-in ones */
  rules?: GuardrailRule[];
  approvalAudit?: ApprovalAuditLogger;
  onRetry?: (info: RetryAttemptInfo) => void;
  now?: () => number;
  logger?: RuntimeLogger;
}

/**
 * Provider named by a `provider/model` fallback model, when registered.
 */
function providerOf(model: string | undefined, providers: readonly ModelProvider[]): string | undefined {
  if (!model) {
    return undefined;
  }
  const slash = model.indexOf("/");
  if (slash <= 0) {
    return undefined;
  }
  const name = model.slice(0, slash);
  return providers.some((provider) => provider.name === name) ? name : undefined;
}

export class AgentEngine {
  readonly config: EngineConfig;
  readonly router: ModelRouter;
  readonly guardrails: GuardrailEngine;
  readonly approvals: ApprovalGate;
  readonly budget: BudgetTracker;
  readonly sessions: SessionManager;
  readonly transcripts: TranscriptStore;
  private readonly loop: AgentLoop;
  private readonly logger: RuntimeLogger;

  constructor(options: AgentEngineOptions) {
    this.config = resolveEngineConfig(options.config, options.env);
    this.logger = options.logger ?? getLogger("engine");
    const { agent, autonomy, router, lazyStop } = this.config;
    const now = options.now ?? Date.now;

    this.budget = new BudgetTracker({
      dailyLimitUsd: autonomy.dailyBudgetUsd,
      maxToolCallsPerLoop: autonomy.maxToolCallsPerLoop,
      resetHourUtc: autonomy.budgetResetHourUtc,
      now,
      logger: this.logger.child({ module: "budget" }),
    });
    this.router = new ModelRouter({
      providers: options.providers,
      fallbackProvider:
        options.fallbackProvider ?? providerOf(agent.fallbackModel, options.providers),
      budget: this.budget,
      retryDelaysMs: router.retryDelaysMs,
      maxRetries: router.maxRetries,
      circuitFailureThreshold: router.circuitFailureThreshold,
      circuitResetTimeoutMs: router.circuitResetTimeoutMs,
      rates: router.rates,
      now,
      onRetry: options.onRetry,
      logger: this.logger.child({ module: "router" }),
    });
    this.guardrails = new GuardrailEngine({
      allowlist: autonomy.toolAllowlist,
      denylist: autonomy.toolDenylist,
      maxBulkDeletes: autonomy.maxBulkDeletes,
      logger: this.logger.child({ module: "guardrails" }),
    });
    for (const rule of options.rules ?? []) {
      this.guardrails.addRule(rule);
    }
    this.approvals = new ApprovalGate({
      auditLogger: options.approvalAudit,
      now,
      logger: this.logger.child({ module: "approval" }),
    });
    this.sessions = new SessionManager({ now, logger: this.logger.child({ module: "sessions" }) });
    this.transcripts = options.transcripts ?? new InMemoryTranscriptStore();

    this.loop = new AgentLoop({
      config: () => this.config,
      router: this.router,
      guardrails: this.guardrails,
      approvals: this.approvals,
      budget: this.budget,
      sessions: this.sessions,
      transcripts: this.transcripts,
      tools: options.dispatcher,
      catalogue: options.tools,
      memory: options.memory,
      lazyStop: options.lazyStop ?? createPhraseLazyStopDetector(lazyStop),
      now,
      logger: this.logger.child({ module: "agent-loop" }),
    });

    this.sessions.restore(options.sessions ?? []);
    const removed = this.sessions.cleanupEmpty();
    this.logger.info("engine ready", {
      model: agent.model,
      providers: options.providers.map((provider) => provider.name),
      tools: options.tools.length,
      level: autonomy.level,
      sessions: this.sessions.list().length,
      removedEmptySessions: removed,
    });
  }

  /**
   * Run one turn. The stream ends after `done` or `error`.
   */
  process(input: TurnInput): EngineEventStream {
    return this.loop.process(input);
  }

  approve(approvalId: string, resolvedBy?: string): ApprovalRecord {
    return this.approvals.approve(approvalId, resolvedBy);
  }

  deny(approvalId: string, options: { reason?: string; resolvedBy?: string } = {}): ApprovalRecord {
    return this.approvals.deny(approvalId, options);
  }

  listPendingApprovals(sessionId?: string): ApprovalRecord[] {
    return this.approvals.listPending(sessionId);
  }

  getCircuitStates(): Record<string, CircuitBreakerMetrics> {
    return this.router.getCircuitStates();
  }

  getBudget(): BudgetSnapshot {
    return this.budget.snapshot();
  }
}

export function createAgentEngine(options: AgentEngineOptions): AgentEngine {
  return new AgentEngine(options);
}
