/**
 * Model Router
 *
 * Routes model requests to a provider with retry, a per-provider circuit
 * breaker, failover to a fallback provider and cost accounting.
 */

import {
  CircuitOpenError,
  classifyProviderError,
  EngineError,
  ExhaustedRetriesError,
  type ModelProvider,
  type ModelRate,
  type ModelRequest,
  type ModelResponse,
  type ProviderCompletion,
  StreamInterruptedError,
  type ToolCall,
} from "@loopwright/engine-core";
import { getLogger, type RuntimeLogger } from "@loopwright/engine-telemetry/logging";
import type { BudgetTracker, SpendReservation } from "../quota/budgetTracker";
import { CircuitBreaker, type CircuitBreakerMetrics } from "./circuitBreaker";
import { CostTable } from "./costTable";
import { ProviderRetryPolicy, type RetryAttemptInfo } from "./retryPolicy";

// ============================================================================
// Types
// ============================================================================

export interface ModelRouterConfig {
  /** Registered providers; the first is the primary unless `primaryProvider` is set */
  providers: ModelProvider[];
  primaryProvider?: string;
  /** Provider that receives the identical request when the target fails */
  fallbackProvider?: string;
  /** Receives the cost of every successful call made without a reservation */
  budget?: BudgetTracker;
  retryDelaysMs?: readonly number[];
  maxRetries?: number;
  circuitFailureThreshold?: number;
  circuitResetTimeoutMs?: number;
  /** Per-model rate overrides */
  rates?: Record<string, ModelRate>;
  /** Clock for circuit cool-off, injectable for tests */
  now?: () => number;
  onRetry?: (info: RetryAttemptInfo) => void;
  logger?: RuntimeLogger;
}

export interface RouteOptions {
  signal?: AbortSignal;
  /** Receives text deltas from streaming providers */
  onText?: (delta: string) => void;
  /** Settled with the call's cost in place of recording it on `budget` */
  reservation?: SpendReservation;
}

export interface RouteTarget {
  provider: ModelProvider;
  /** Model id without the provider prefix */
  model: string;
}

// ============================================================================
// Model Router
// ============================================================================

export class ModelRouter {
  private readonly providers = new Map<string, ModelProvider>();
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly retryPolicy: ProviderRetryPolicy;
  private readonly costs: CostTable;
  private readonly primaryName: string | undefined;
  private readonly fallbackName: string | undefined;
  private readonly budget?: BudgetTracker;
  private readonly logger: RuntimeLogger;

  constructor(private readonly config: ModelRouterConfig) {
    this.logger = config.logger ?? getLogger("router");
    this.budget = config.budget;
    this.costs = new CostTable(config.rates);
    this.retryPolicy = new ProviderRetryPolicy({
      delaysMs: config.retryDelaysMs,
      maxRetries: config.maxRetries,
      onRetry: (info) => {
        this.logger.warn("retrying provider call", {
          provider: info.provider,
          attempt: info.attempt,
          delayMs: info.delayMs,
          error: info.error instanceof Error ? info.error.message : String(info.error),
        });
        config.onRetry?.(info);
      },
    });

    for (const provider of config.providers) {
      this.registerProvider(provider);
    }
    this.primaryName = config.primaryProvider ?? config.providers[0]?.name;
    this.fallbackName = config.fallbackProvider;
  }

  /**
   * Register a provider with its own circuit.
   */
  registerProvider(provider: ModelProvider): void {
    this.providers.set(provider.name, provider);
    this.breakers.set(
      provider.name,
      new CircuitBreaker(provider.name, {
        failureThreshold: this.config.circuitFailureThreshold,
        resetTimeoutMs: this.config.circuitResetTimeoutMs,
        now: this.config.now,
        onStateChange: (from, to, reason) => {
          this.logger.warn("circuit state changed", { provider: provider.name, from, to, reason });
        },
      })
    );
  }

  /**
   * Resolve `provider/model` or a bare model id to a provider.
   * Bare ids go to the provider listing them, else to the primary.
   */
  resolve(model: string): RouteTarget {
    const slash = model.indexOf("/");
    if (slash > 0) {
      const named = this.providers.get(model.slice(0, slash));
      if (named) {
        return { provider: named, model: model.slice(slash + 1) };
      }
    }

    for (const provider of this.providers.values()) {
      if (provider.models.includes(model)) {
        return { provider, model };
      }
    }

    const primary = this.primaryName ? this.providers.get(this.primaryName) : undefined;
    if (!primary) {
      throw new EngineError(`No provider registered for model ${model}`, "NO_PROVIDER", {
        context: { model },
      });
    }
    return { provider: primary, model };
  }

  /**
   * Upper-bound cost of a request: prompt characters / 4 as input tokens,
   * `maxTokens` as output tokens.
   */
  estimateCost(request: ModelRequest): number {
    const target = this.resolve(request.model);
    const chars =
      (request.system?.length ?? 0) +
      request.messages.reduce((total, message) => total + message.content.length, 0);
    return this.costs.cost(
      `${target.provider.name}/${target.model}`,
      Math.ceil(chars / 4),
      request.maxTokens ?? 0
    );
  }

  /**
   * Route a request. Fails with CircuitOpenError, ExhaustedRetriesError or
   * a non-transient ProviderError once failover is spent.
   */
  async complete(request: ModelRequest, options: RouteOptions = {}): Promise<ModelResponse> {
    const target = this.resolve(request.model);

    try {
      return await this.callProvider(target, request, options);
    } catch (error) {
      if (!(error instanceof CircuitOpenError || error instanceof ExhaustedRetriesError)) {
        throw error;
      }
      const fallback = this.fallbackFor(target);
      if (!fallback || options.signal?.aborted) {
        throw error;
      }

      this.logger.warn("failing over to fallback provider", {
        from: target.provider.name,
        to: fallback.provider.name,
        error: error.message,
      });
      return this.callProvider(fallback, request, options);
    }
  }

  getCircuitStates(): Record<string, CircuitBreakerMetrics> {
    const states: Record<string, CircuitBreakerMetrics> = {};
    for (const [name, breaker] of this.breakers) {
      states[name] = breaker.getMetrics();
    }
    return states;
  }

  private fallbackFor(target: RouteTarget): RouteTarget | undefined {
    if (!this.fallbackName || this.fallbackName === target.provider.name) {
      return undefined;
    }
    const provider = this.providers.get(this.fallbackName);
    if (!provider) {
      return undefined;
    }
    const model = provider.models.includes(target.model)
      ? target.model
      : (provider.models[0] ?? target.model);
    return { provider, model };
  }

  private async callProvider(
    target: RouteTarget,
    request: ModelRequest,
    options: RouteOptions
  ): Promise<ModelResponse> {
    const { provider, model } = target;
    const breaker = this.breakers.get(provider.name);
    if (!breaker) {
      throw new EngineError(`Provider ${provider.name} is not registered`, "NO_PROVIDER");
    }

    const providerRequest: ModelRequest = { ...request, model };
    const completion = await breaker.execute(
      () =>
        this.retryPolicy.execute(
          provider.name,
          (_attempt, signal) => this.invoke(provider, providerRequest, signal, options.onText),
          options.signal
        ),
      options.signal
    );

    const costUsd = this.costs.cost(
      `${provider.name}/${model}`,
      completion.inputTokens,
      completion.outputTokens
    );
    if (options.reservation) {
      options.reservation.settle(costUsd);
    } else {
      this.budget?.recordSpend(costUsd);
    }

    this.logger.debug("model call completed", {
      provider: provider.name,
      model,
      stopReason: completion.stopReason,
      costUsd,
    });

    return {
      stopReason: completion.stopReason,
      content: completion.content,
      toolCalls: completion.toolCalls,
      usage: {
        inputTokens: completion.inputTokens,
        outputTokens: completion.outputTokens,
        costUsd,
      },
      model,
      provider: provider.name,
    };
  }

  /**
   * One provider attempt. Streams when the provider supports it.
   */
  private async invoke(
    provider: ModelProvider,
    request: ModelRequest,
    signal: AbortSignal,
    onText?: (delta: string) => void
  ): Promise<ProviderCompletion> {
    if (!provider.stream) {
      try {
        return await provider.complete(request, signal);
      } catch (error) {
        throw classifyProviderError(error, provider.name);
      }
    }

    let content = "";
    const toolCalls: ToolCall[] = [];
    let inputTokens = 0;
    let outputTokens = 0;
    let stopReason: ProviderCompletion["stopReason"] | undefined;
    let emitted = false;

    try {
      for await (const chunk of provider.stream(request, signal)) {
        switch (chunk.type) {
          case "text":
            content += chunk.content;
            emitted = true;
            onText?.(chunk.content);
            break;
          case "tool_call":
            toolCalls.push(chunk.toolCall);
            break;
          case "usage":
            inputTokens = chunk.inputTokens;
            outputTokens = chunk.outputTokens;
            break;
          case "done":
            stopReason = chunk.stopReason;
            break;
        }
      }
    } catch (error) {
      if (emitted) {
        throw new StreamInterruptedError(provider.name, error);
      }
      throw classifyProviderError(error, provider.name);
    }

    return {
      stopReason: stopReason ?? (toolCalls.length > 0 ? "tool_use" : "completed"),
      content,
      toolCalls,
      inputTokens,
      outputTokens,
    };
  }
}

export function createModelRouter(config: ModelRouterConfig): ModelRouter {
  return new ModelRouter(config);
}
