/**
 * @loopwright/engine-execution
 *
 * Agent loop with model routing, guardrails, approvals, budgets and
 * per-session serialization.
 *
 * @example
 * ```typescript
 * import { createAgentEngine, collectText } from '@loopwright/engine-execution';
 *
 * const engine = createAgentEngine({
 *   config: { autonomy: { level: 2 } },
 *   providers: [anthropicProvider],
 *   tools: catalogue,
 *   dispatcher,
 * });
 *
 * const reply = await collectText(engine.process({ text: 'List the open tickets' }));
 * ```
 */

// ============================================================================
// Engine
// ============================================================================

export { AgentEngine, type AgentEngineOptions, createAgentEngine } from "./engine";

// ============================================================================
// Orchestrator
// ============================================================================

export {
  AgentLoop,
  type AgentLoopDependencies,
  CONTINUATION_PROMPT,
  CONTINUING_MARKER,
  DEFAULT_CHANNEL,
  DEFAULT_TARGET,
  type TurnInput,
} from "./orchestrator/agentLoop";
export {
  createPhraseLazyStopDetector,
  DEFAULT_NUDGE,
  disabledLazyStopDetector,
  type LazyStopDetector,
  type LazyStopInput,
} from "./orchestrator/lazyStop";
export { deniedResult, truncateToolResult } from "./orchestrator/toolResults";
export { InMemoryTranscriptStore, type TranscriptStore } from "./orchestrator/transcript";
export {
  type TurnPhase,
  TurnStateMachine,
  type TurnTransition,
} from "./orchestrator/turnStateMachine";

// ============================================================================
// Quota
// ============================================================================

export {
  type BudgetSnapshot,
  BudgetTracker,
  type BudgetTrackerConfig,
  createBudgetTracker,
  LoopBudget,
  type SpendReservation,
  windowStartFor,
} from "./quota/budgetTracker";

// ============================================================================
// Routing
// ============================================================================

export {
  CircuitBreaker,
  type CircuitBreakerConfig,
  type CircuitBreakerMetrics,
  type CircuitState,
} from "./routing/circuitBreaker";
export { CostTable, DEFAULT_RATES, roundUsd } from "./routing/costTable";
export {
  createModelRouter,
  ModelRouter,
  type ModelRouterConfig,
  type RouteOptions,
  type RouteTarget,
} from "./routing/modelRouter";
export {
  createRetryPolicy,
  ProviderRetryPolicy,
  type RetryAttemptInfo,
  type RetryScheduleConfig,
} from "./routing/retryPolicy";

// ============================================================================
// Security
// ============================================================================

export {
  type ApprovalAuditLogger,
  type ApprovalDecision,
  ApprovalGate,
  type ApprovalGateConfig,
  type ApprovalRecord,
  type ApprovalRequestInput,
  type ApprovalRequestOptions,
  type ApprovalStatus,
  createApprovalGate,
  type PendingApproval,
} from "./security/approvalGate";
export {
  type AutonomyLevel,
  autoApproveThreshold,
  describeAutonomyLevel,
  formatAutonomyLevel,
  SUPERVISED_LEVEL,
  toAutonomyLevel,
} from "./security/autonomy";
export {
  createDestructiveActionRule,
  createGuardrailEngine,
  type GuardrailDecision,
  GuardrailEngine,
  type GuardrailEngineConfig,
  type GuardrailInput,
  type GuardrailRule,
  hasIrreversibleArguments,
  isDestructiveToolName,
  looksLikeExfiltration,
  matchesToolPattern,
  networkExfiltrationRule,
  type RuleVerdict,
  riskLevelRule,
} from "./security/guardrails";

// ============================================================================
// Sessions
// ============================================================================

export { Mutex } from "./session/mutex";
export {
  createSessionManager,
  deriveSessionName,
  type SessionLookup,
  SessionManager,
  type SessionManagerConfig,
} from "./session/sessionManager";

// ============================================================================
// Streaming
// ============================================================================

export { collectEvents, collectText, EngineEventStream } from "./streaming/eventStream";

// ============================================================================
// Testing
// ============================================================================

export {
  fail,
  hang,
  reply,
  type ScriptStep,
  ScriptedProvider,
  type ScriptedProviderOptions,
  toolUse,
} from "./testing/scriptedProvider";
