/**
 * Agent Loop
 *
 * Drives one turn from an inbound message to a terminal outcome:
 *
 *   start -> recall -> model_call -> { tool_use -> model_call
 *                                    | continuation -> model_call
 *                                    | nudge -> model_call
 *                                    | respond -> end
 *                                    | failed -> end }
 *
 * The session run lock is held for the whole turn. Every fatal condition
 * yields exactly one `error` event before the stream closes.
 */

import {
  BudgetExceededError,
  type EngineConfig,
  IterationLimitError,
  type MemoryStore,
  type ModelMessage,
  type ModelRequest,
  type ModelResponse,
  type ModelToolSchema,
  ProviderFatalError,
  type Session,
  type ToolCall,
  type ToolDefinition,
  type ToolDispatcher,
  type ToolResult,
  type TurnMessage,
  TurnTimeoutError,
  toEngineError,
} from "@loopwright/engine-core";
import { getLogger, type RuntimeLogger } from "@loopwright/engine-telemetry/logging";
import type { BudgetTracker, LoopBudget } from "../quota/budgetTracker";
import type { ModelRouter } from "../routing/modelRouter";
import type { ApprovalGate } from "../security/approvalGate";
import { type AutonomyLevel, toAutonomyLevel } from "../security/autonomy";
import type { GuardrailDecision, GuardrailEngine } from "../security/guardrails";
import type { SessionManager } from "../session/sessionManager";
import { EngineEventStream } from "../streaming/eventStream";
import type { LazyStopDetector } from "./lazyStop";
import { deniedResult, truncateToolResult } from "./toolResults";
import type { TranscriptStore } from "./transcript";
import { TurnStateMachine } from "./turnStateMachine";

// ============================================================================
// Types
// ============================================================================

export interface TurnInput {
  /** Existing or caller-chosen session id; omitted creates a new session */
  sessionId?: string;
  text: string;
  /** Inbound channel (default: `api`) */
  channel?: string;
  /** Routing target within the channel (default: `default`) */
  target?: string;
}

export interface AgentLoopDependencies {
  /** Read at the start of every turn */
  config: () => EngineConfig;
  router: ModelRouter;
  guardrails: GuardrailEngine;
  approvals: ApprovalGate;
  budget: BudgetTracker;
  sessions: SessionManager;
  transcripts: TranscriptStore;
  tools: ToolDispatcher;
  /** Tool catalogue offered to the model */
  catalogue: readonly ToolDefinition[];
  memory?: MemoryStore;
  lazyStop: LazyStopDetector;
  now?: () => number;
  logger?: RuntimeLogger;
}

/** Mutable state of one turn */
interface TurnState {
  session: Session;
  userText: string;
  level: AutonomyLevel;
  model: string;
  memoryContext: string;
  /** Model calls made so far */
  iterations: number;
  consecutiveFailures: number;
  response: ModelResponse | null;
  /** Output of truncated responses awaiting continuation */
  carriedText: string;
  nudge: string | null;
  toolNames: string[];
  previousToolNames: string[];
  loopBudget: LoopBudget;
}

interface TurnContext {
  stream: EngineEventStream;
  signal: AbortSignal;
  config: EngineConfig;
  logger: RuntimeLogger;
}

export const DEFAULT_CHANNEL = "api";
export const DEFAULT_TARGET = "default";

export const CONTINUATION_PROMPT =
  "[SYSTEM: Your previous response was truncated because it exceeded the output token limit. " +
  "Continue exactly where you left off. Do not repeat what you already said.]";

export const CONTINUING_MARKER = "\n\n*Continuing...*\n\n";

const UNKNOWN_TOOL_RISK = 5;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Settle with `promise`, or reject with the signal's reason once it aborts.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

interface Deadline {
  signal: AbortSignal;
  cancel(): void;
}

/**
 * Signal that aborts with `reason()` after `timeoutMs`; never aborts when
 * `timeoutMs` is 0.
 */
function startDeadline(timeoutMs: number, reason: () => Error): Deadline {
  const controller = new AbortController();
  if (timeoutMs <= 0) {
    return { signal: controller.signal, cancel: () => undefined };
  }
  const timer = setTimeout(() => {
    controller.abort(reason());
  }, timeoutMs);
  return {
    signal: controller.signal,
    cancel: () => {
      clearTimeout(timer);
    },
  };
}

function toModelTool(tool: ToolDefinition): ModelToolSchema {
  return { name: tool.name, description: tool.description, parameters: tool.parameters };
}

function unknownTool(name: string): ToolDefinition {
  return {
    name,
    description: "",
    parameters: {},
    mutating: true,
    riskLevel: UNKNOWN_TOOL_RISK,
  };
}

/** Failures that end the turn instead of costing an iteration */
function isFatalTurnError(error: unknown): boolean {
  return (
    error instanceof BudgetExceededError ||
    error instanceof ProviderFatalError ||
    error instanceof IterationLimitError ||
    error instanceof TurnTimeoutError
  );
}

// ============================================================================
// Agent Loop
// ============================================================================

export class AgentLoop {
  private readonly now: () => number;
  private readonly logger: RuntimeLogger;

  constructor(private readonly deps: AgentLoopDependencies) {
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? getLogger("agent-loop");
  }

  /**
   * Start a turn. Events arrive on the returned stream, which closes after
   * `done` or `error`.
   */
  process(input: TurnInput): EngineEventStream {
    const stream = new EngineEventStream(this.now);
    const { sessions } = this.deps;

    const channel = input.channel ?? DEFAULT_CHANNEL;
    const target = input.target ?? DEFAULT_TARGET;
    const sessionId =
      input.sessionId ?? sessions.getOrInsert(undefined, channel, target).session.id;

    void sessions
      .withRunLock(sessionId, async () => {
        const { session, created } = sessions.getOrInsert(sessionId, channel, target);
        await this.runTurn(session, created || input.sessionId === undefined, input.text, stream);
      })
      .catch((error: unknown) => {
        const engineError = toEngineError(error);
        this.logger.error("turn crashed", engineError);
        stream.writeError(engineError.code, engineError.message);
      })
      .finally(() => {
        stream.close();
      });

    return stream;
  }

  private async runTurn(
    session: Session,
    created: boolean,
    text: string,
    stream: EngineEventStream
  ): Promise<void> {
    const config = this.deps.config();
    const logger = this.logger.child({ sessionId: session.id });

    const state: TurnState = {
      session,
      userText: text,
      level: toAutonomyLevel(config.autonomy.level),
      model: config.agent.model,
      memoryContext: "",
      iterations: 0,
      consecutiveFailures: 0,
      response: null,
      carriedText: "",
      nudge: null,
      toolNames: [],
      previousToolNames: [],
      loopBudget: this.deps.budget.beginLoop(),
    };

    const timeoutMs = config.agent.requestTimeoutMs;
    const timedOut = () => new TurnTimeoutError(timeoutMs, state.iterations);
    const deadline = startDeadline(timeoutMs, timedOut);
    const { signal } = deadline;
    const ctx: TurnContext = { stream, signal, config, logger };

    const machine = new TurnStateMachine(this.now);
    let outcome: "completed" | "failed" = "failed";

    stream.emit({ type: "session-assigned", data: { sessionId: session.id, created } });
    this.appendMessage(session.id, { role: "user", content: text, timestamp: this.now() });
    this.deps.sessions.setName(session.id, text);
    logger.info("turn started", { model: state.model, level: state.level });

    try {
      machine.transition("recall");
      while (!machine.isTerminal) {
        switch (machine.getPhase()) {
          case "recall":
            state.memoryContext = await this.recall(state, ctx);
            machine.transition("model_call");
            break;

          case "model_call":
            machine.transition(await this.callModel(state, ctx));
            break;

          case "tool_use":
            await this.useTools(state, ctx);
            machine.transition("model_call");
            break;

          case "continuation":
            this.injectInstruction(session.id, CONTINUATION_PROMPT);
            stream.writeText(CONTINUING_MARKER);
            logger.info("response truncated, continuing", { iteration: state.iterations });
            machine.transition("model_call");
            break;

          case "nudge":
            this.injectInstruction(session.id, state.nudge ?? CONTINUATION_PROMPT);
            state.nudge = null;
            stream.writeText(CONTINUING_MARKER);
            logger.info("lazy stop detected, nudging", { iteration: state.iterations });
            machine.transition("model_call");
            break;

          case "respond": {
            const response = state.response;
            stream.emit({
              type: "done",
              data: {
                content: state.carriedText + (response?.content ?? ""),
                stopReason: response?.stopReason ?? "completed",
                iterations: state.iterations,
              },
            });
            outcome = "completed";
            machine.transition("end");
            break;
          }

          case "failed":
            machine.transition("end");
            break;
        }
      }
    } catch (error) {
      const failure =
        signal.aborted && signal.reason instanceof TurnTimeoutError
          ? signal.reason
          : toEngineError(error);

      if (failure instanceof TurnTimeoutError) {
        stream.writeText(
          `\n\nTurn timed out after ${failure.timeoutMs}ms (${state.iterations} iterations).`
        );
      }
      logger.warn("turn failed", { code: failure.code, error: failure.message });
      stream.writeError(failure.code, failure.message);
      if (machine.canTransition("failed")) {
        machine.transition("failed");
        machine.transition("end");
      }
    }

    // A timed-out turn still stores its summary, within one more deadline period
    const memoryDeadline = signal.aborted ? startDeadline(timeoutMs, timedOut) : deadline;
    try {
      await this.remember(state, outcome, memoryDeadline.signal, logger);
    } finally {
      deadline.cancel();
      memoryDeadline.cancel();
    }
    logger.info("turn finished", { outcome, iterations: state.iterations });
  }

  // ==========================================================================
  // Phases
  // ==========================================================================

  private async recall(state: TurnState, ctx: TurnContext): Promise<string> {
    const { memory } = this.deps;
    if (!memory) {
      return "";
    }
    try {
      return await abortable(
        memory.recall(state.userText, { sessionId: state.session.id }),
        ctx.signal
      );
    } catch (error) {
      ctx.signal.throwIfAborted();
      ctx.logger.warn("memory recall failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return "";
    }
  }

  /**
   * One model call. Returns the next phase.
   */
  private async callModel(
    state: TurnState,
    ctx: TurnContext
  ): Promise<"model_call" | "tool_use" | "continuation" | "nudge" | "respond"> {
    const { config, stream, signal } = ctx;
    const maxIterations = config.agent.maxIterations;
    if (state.iterations >= maxIterations) {
      throw new IterationLimitError(maxIterations);
    }

    const request = this.buildRequest(state, config);
    const reservation = this.deps.budget.reserve(this.deps.router.estimateCost(request));
    state.iterations += 1;

    let streamed = false;
    let response: ModelResponse;
    try {
      response = await abortable(
        this.deps.router.complete(request, {
          signal,
          reservation,
          onText: (delta) => {
            streamed = true;
            stream.writeText(delta);
          },
        }),
        signal
      );
      if (response.stopReason === "provider_error") {
        throw new Error(`Provider ${response.provider} reported an error: ${response.content}`);
      }
    } catch (error) {
      reservation.release();
      signal.throwIfAborted();
      if (isFatalTurnError(error) || state.iterations >= maxIterations) {
        throw error;
      }
      this.recordModelFailure(state, ctx, error);
      return "model_call";
    }

    state.consecutiveFailures = 0;
    state.response = response;

    if (!streamed && response.content) {
      stream.writeText(response.content);
    }
    stream.emit({
      type: "usage",
      data: {
        model: response.model,
        provider: response.provider,
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
        costUsd: response.usage.costUsd,
      },
    });
    this.appendMessage(state.session.id, {
      role: "assistant",
      content: response.content,
      toolCalls: response.toolCalls.length > 0 ? response.toolCalls : undefined,
      timestamp: this.now(),
    });

    return this.nextPhase(state, response, maxIterations);
  }

  private nextPhase(
    state: TurnState,
    response: ModelResponse,
    maxIterations: number
  ): "tool_use" | "continuation" | "nudge" | "respond" {
    if (response.toolCalls.length > 0) {
      state.carriedText = "";
      return "tool_use";
    }
    if (response.stopReason === "truncated") {
      state.carriedText += response.content;
      return "continuation";
    }

    if (response.stopReason === "completed" && state.iterations < maxIterations) {
      const nudge = this.deps.lazyStop.detect({
        text: state.carriedText + response.content,
        iteration: state.iterations,
        previousToolNames: state.previousToolNames,
      });
      if (nudge) {
        state.nudge = nudge;
        state.carriedText = "";
        return "nudge";
      }
    }
    return "respond";
  }

  private recordModelFailure(state: TurnState, ctx: TurnContext, error: unknown): void {
    const { agent } = ctx.config;
    state.consecutiveFailures += 1;
    ctx.logger.warn("model call failed", {
      iteration: state.iterations,
      consecutiveFailures: state.consecutiveFailures,
      error: error instanceof Error ? error.message : String(error),
    });

    if (
      agent.fallbackModel &&
      state.model !== agent.fallbackModel &&
      state.consecutiveFailures >= agent.fallbackAfterFailures
    ) {
      ctx.logger.warn("switching to fallback model", {
        from: state.model,
        to: agent.fallbackModel,
      });
      state.model = agent.fallbackModel;
      state.consecutiveFailures = 0;
    }
  }

  /**
   * Guard, approve and dispatch every tool call of the last response.
   * With `parallelToolCalls`, consecutive allowed read-only calls run
   * together; any other call waits for them first. Results are reported
   * in request order either way.
   */
  private async useTools(state: TurnState, ctx: TurnContext): Promise<void> {
    const calls = state.response?.toolCalls ?? [];
    const parallel = ctx.config.agent.parallelToolCalls;
    let batch: Array<{ call: ToolCall; result: Promise<ToolResult> }> = [];

    const flush = async () => {
      if (batch.length === 0) {
        return;
      }
      const pending = batch;
      batch = [];
      const results = await Promise.all(pending.map((entry) => entry.result));
      pending.forEach((entry, index) => {
        const result = results[index];
        if (result) {
          this.reportToolResult(state, ctx, entry.call, result);
        }
      });
    };

    try {
      for (const call of calls) {
        state.loopBudget.check();
        ctx.stream.emit({
          type: "tool-call-started",
          data: { callId: call.id, name: call.name, arguments: call.arguments },
        });

        const tool =
          this.deps.catalogue.find((entry) => entry.name === call.name) ?? unknownTool(call.name);
        const decision = this.deps.guardrails.evaluate(tool, call, state.level);

        if (parallel && decision.kind === "allow" && !tool.mutating) {
          batch.push({ call, result: this.dispatch(state, ctx, call) });
          continue;
        }

        await flush();
        const result = await this.resolveToolCall(state, ctx, call, decision);
        this.reportToolResult(state, ctx, call, result);
      }
      await flush();
    } catch (error) {
      // Started dispatches still settle before the turn unwinds
      await Promise.allSettled(batch.map((entry) => entry.result));
      throw error;
    }

    state.previousToolNames = calls.map((call) => call.name);
  }

  private reportToolResult(
    state: TurnState,
    ctx: TurnContext,
    call: ToolCall,
    result: ToolResult
  ): void {
    state.toolNames.push(call.name);
    ctx.stream.emit({
      type: "tool-result",
      data: {
        callId: call.id,
        name: call.name,
        content: result.content,
        isError: result.isError,
        data: result.data,
      },
    });
    this.appendMessage(state.session.id, {
      role: "tool",
      content: truncateToolResult(result.content, ctx.config.agent.toolResultMaxTokens),
      toolCallId: call.id,
      isError: result.isError,
      timestamp: this.now(),
    });
  }

  private async resolveToolCall(
    state: TurnState,
    ctx: TurnContext,
    call: ToolCall,
    decision: GuardrailDecision
  ): Promise<ToolResult> {
    switch (decision.kind) {
      case "allow":
        return this.dispatch(state, ctx, call);

      case "deny":
        ctx.logger.info("tool call denied", { tool: call.name, rule: decision.rule });
        return { content: deniedResult(decision.reason), isError: true };

      case "require_approval": {
        const pending = this.deps.approvals.request(
          {
            sessionId: state.session.id,
            toolCallId: call.id,
            toolName: call.name,
            arguments: call.arguments,
            reason: decision.reason,
            riskLevel: decision.riskLevel,
          },
          { timeoutMs: ctx.config.autonomy.approvalTimeoutMs, signal: ctx.signal }
        );
        ctx.stream.emit({
          type: "approval-required",
          data: {
            approvalId: pending.id,
            toolName: call.name,
            arguments: call.arguments,
            reason: decision.reason,
            riskLevel: decision.riskLevel,
          },
        });

        const resolution = await abortable(pending.decision, ctx.signal);
        ctx.signal.throwIfAborted();
        if (resolution.approved) {
          return this.dispatch(state, ctx, call);
        }
        return {
          content: deniedResult(resolution.reason ?? "Human denied the action"),
          isError: true,
        };
      }
    }
  }

  private async dispatch(state: TurnState, ctx: TurnContext, call: ToolCall): Promise<ToolResult> {
    state.loopBudget.startToolCall();
    let result: ToolResult;
    try {
      result = await abortable(
        this.deps.tools.execute(call, { sessionId: state.session.id, signal: ctx.signal }),
        ctx.signal
      );
    } catch (error) {
      ctx.signal.throwIfAborted();
      const message = error instanceof Error ? error.message : String(error);
      ctx.logger.warn("tool execution failed", { tool: call.name, error: message });
      result = { content: `Error: ${message}`, isError: true };
    }
    state.loopBudget.recordToolCall();
    return result;
  }

  private async remember(
    state: TurnState,
    outcome: "completed" | "failed",
    signal: AbortSignal,
    logger: RuntimeLogger
  ): Promise<void> {
    const { memory } = this.deps;
    if (!memory) {
      return;
    }
    try {
      await abortable(
        memory.remember({
          sessionId: state.session.id,
          userText: state.userText,
          responseText: state.carriedText + (state.response?.content ?? ""),
          toolCalls: state.toolNames,
          outcome,
        }),
        signal
      );
    } catch (error) {
      logger.warn(signal.aborted ? "memory remember timed out" : "memory remember failed", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // ==========================================================================
  // Transcript
  // ==========================================================================

  private buildRequest(state: TurnState, config: EngineConfig): ModelRequest {
    const messages: ModelMessage[] = [];
    if (state.memoryContext) {
      messages.push({ role: "system", content: state.memoryContext });
    }
    for (const message of this.deps.transcripts.messages(state.session.id)) {
      messages.push({
        role: message.role,
        content: message.content,
        toolCalls: message.toolCalls,
        toolCallId: message.toolCallId,
        isError: message.isError,
      });
    }

    return {
      model: state.model,
      messages,
      tools: this.deps.catalogue.map(toModelTool),
      system: config.agent.systemPrompt,
      maxTokens: config.agent.maxTokens,
      temperature: config.agent.temperature,
    };
  }

  private appendMessage(sessionId: string, message: TurnMessage): void {
    this.deps.transcripts.append(sessionId, message);
    this.deps.sessions.recordMessage(sessionId, message.role);
  }

  /** User-role instruction from the engine; not counted as a session message */
  private injectInstruction(sessionId: string, content: string): void {
    this.deps.transcripts.append(sessionId, { role: "user", content, timestamp: this.now() });
  }
}
