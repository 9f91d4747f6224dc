/**
 * Engine Error Types
 *
 * Typed error hierarchy shared by the router, the budget tracker, the
 * approval gate and the agent loop. Every fatal turn outcome maps to one
 * of these codes on the `error` event.
 */

/** Error codes surfaced on `error` events and in logs */
export type EngineErrorCode =
  // Provider errors
  | "PROVIDER_TRANSIENT"
  | "PROVIDER_FATAL"
  | "PROVIDER_EXHAUSTED"
  | "STREAM_INTERRUPTED"
  | "CIRCUIT_OPEN"
  | "NO_PROVIDER"
  // Turn limits
  | "BUDGET_EXCEEDED"
  | "ITERATION_LIMIT"
  | "TIMEOUT"
  // Application errors
  | "APPROVAL_NOT_FOUND"
  | "INVALID_CONFIG"
  | "INVALID_TRANSITION"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Base engine error.
 */
export class EngineError extends Error {
  override readonly name: string = "EngineError";
  readonly code: EngineErrorCode;
  readonly timestamp: number;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: EngineErrorCode,
    options: { cause?: unknown; context?: Record<string, unknown> } = {}
  ) {
    super(message, { cause: options.cause });
    this.code = code;
    this.timestamp = Date.now();
    this.context = options.context ?? {};
  }

  /**
   * Create a structured representation.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

// ============================================================================
// Provider Errors
// ============================================================================

export interface ProviderErrorOptions {
  statusCode?: number;
  /** Whether a retry may succeed */
  transient?: boolean;
  /** Provider hint for when to retry */
  retryAfterMs?: number;
  cause?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Failure reported by, or on behalf of, a model provider.
 */
export class ProviderError extends EngineError {
  override readonly name: string = "ProviderError";
  readonly provider: string;
  readonly statusCode?: number;
  readonly transient: boolean;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    provider: string,
    options: ProviderErrorOptions = {},
    code: EngineErrorCode = options.transient === false ? "PROVIDER_FATAL" : "PROVIDER_TRANSIENT"
  ) {
    super(message, code, {
      cause: options.cause,
      context: { ...options.context, provider, statusCode: options.statusCode },
    });
    this.provider = provider;
    this.statusCode = options.statusCode;
    this.transient = options.transient ?? true;
    this.retryAfterMs = options.retryAfterMs;
  }

  /**
   * Create from an HTTP status.
   */
  static fromResponse(provider: string, status: number, body = ""): ProviderError {
    if (TRANSIENT_STATUS_CODES.has(status) || status >= 500) {
      return new ProviderError(
        `${provider} returned HTTP ${status}${body ? `: ${body.slice(0, 100)}` : ""}`,
        provider,
        { statusCode: status, transient: true }
      );
    }
    switch (status) {
      case 401:
      case 403:
        return new ProviderFatalError(`Authentication failed for ${provider}`, provider, {
          statusCode: status,
        });
      case 400:
        return new ProviderFatalError(
          `Invalid request to ${provider}: ${body.slice(0, 100)}`,
          provider,
          { statusCode: status }
        );
      default:
        return new ProviderFatalError(
          `${provider} error (${status}): ${body.slice(0, 100)}`,
          provider,
          { statusCode: status }
        );
    }
  }
}

/**
 * Non-transient provider failure (auth, malformed request). Never retried.
 */
export class ProviderFatalError extends ProviderError {
  override readonly name: string = "ProviderFatalError";

  constructor(message: string, provider: string, options: Omit<ProviderErrorOptions, "transient"> = {}) {
    super(message, provider, { ...options, transient: false }, "PROVIDER_FATAL");
  }
}

/**
 * All retry attempts against a provider failed with transient errors.
 */
export class ExhaustedRetriesError extends ProviderError {
  override readonly name: string = "ExhaustedRetriesError";
  readonly attempts: number;

  constructor(provider: string, attempts: number, lastError: unknown) {
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    super(
      `${provider} failed after ${attempts} attempts: ${detail}`,
      provider,
      { transient: true, cause: lastError, context: { attempts } },
      "PROVIDER_EXHAUSTED"
    );
    this.attempts = attempts;
  }
}

/**
 * Call rejected without contacting the provider because its circuit is open.
 */
export class CircuitOpenError extends ProviderError {
  override readonly name: string = "CircuitOpenError";

  constructor(provider: string, retryAfterMs: number) {
    super(
      `Circuit breaker for ${provider} is open`,
      provider,
      { transient: true, retryAfterMs, context: { retryAfterMs } },
      "CIRCUIT_OPEN"
    );
  }
}

/**
 * A stream failed after emitting output. Not retried: the partial output
 * has already been delivered.
 */
export class StreamInterruptedError extends ProviderError {
  override readonly name: string = "StreamInterruptedError";

  constructor(provider: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      `${provider} stream failed after partial output: ${detail}`,
      provider,
      { transient: false, cause },
      "STREAM_INTERRUPTED"
    );
  }
}

// ============================================================================
// Turn Errors
// ============================================================================

export type BudgetResource = "daily_spend_usd" | "tool_calls_per_loop";

/**
 * A resource ceiling was reached. Fatal for the current turn.
 */
export class BudgetExceededError extends EngineError {
  override readonly name: string = "BudgetExceededError";
  readonly resource: BudgetResource;
  readonly used: number;
  readonly limit: number;

  constructor(resource: BudgetResource, used: number, limit: number) {
    super(`Budget exceeded for ${resource}: used ${used} of ${limit}`, "BUDGET_EXCEEDED", {
      context: { resource, used, limit },
    });
    this.resource = resource;
    this.used = used;
    this.limit = limit;
  }
}

export class IterationLimitError extends EngineError {
  override readonly name: string = "IterationLimitError";
  readonly maxIterations: number;

  constructor(maxIterations: number) {
    super(`Maximum iterations (${maxIterations}) reached before completion`, "ITERATION_LIMIT", {
      context: { maxIterations },
    });
    this.maxIterations = maxIterations;
  }
}

export class TurnTimeoutError extends EngineError {
  override readonly name: string = "TurnTimeoutError";
  readonly timeoutMs: number;

  constructor(timeoutMs: number, iterations: number) {
    super(`Turn timed out after ${timeoutMs}ms (${iterations} iterations)`, "TIMEOUT", {
      context: { timeoutMs, iterations },
    });
    this.timeoutMs = timeoutMs;
  }
}

export class ApprovalNotFoundError extends EngineError {
  override readonly name: string = "ApprovalNotFoundError";

  constructor(id: string) {
    super(`Approval request ${id} not found or already resolved`, "APPROVAL_NOT_FOUND", {
      context: { approvalId: id },
    });
  }
}

export class ConfigValidationError extends EngineError {
  override readonly name: string = "ConfigValidationError";
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid engine configuration: ${issues.join("; ")}`, "INVALID_CONFIG", {
      context: { issues },
    });
    this.issues = issues;
  }
}

export class InvalidTransitionError extends EngineError {
  override readonly name: string = "InvalidTransitionError";
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(`Invalid turn transition: ${from} -> ${to}`, "INVALID_TRANSITION", {
      context: { from, to },
    });
    this.from = from;
    this.to = to;
  }
}

// ============================================================================
// Classification
// ============================================================================

const TRANSIENT_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504, 529]);

const TRANSIENT_MESSAGE_PATTERNS = [
  "429",
  "500",
  "502",
  "503",
  "529",
  "timed out",
  "timeout",
  "connection reset",
  "econnreset",
  "econnrefused",
  "overloaded",
  "rate limit",
];

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Map an arbitrary provider failure to a typed ProviderError.
 * Unrecognised errors are treated as fatal.
 */
export function classifyProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  const status = readStatus(error);
  const message = error instanceof Error ? error.message : String(error);
  if (status !== undefined) {
    const classified = ProviderError.fromResponse(provider, status, message);
    return classified.transient
      ? new ProviderError(message, provider, { statusCode: status, transient: true, cause: error })
      : new ProviderFatalError(message, provider, { statusCode: status, cause: error });
  }

  const lower = message.toLowerCase();
  if (TRANSIENT_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern))) {
    return new ProviderError(message, provider, { transient: true, cause: error });
  }
  return new ProviderFatalError(message, provider, { cause: error });
}

/**
 * Determine if an error is worth retrying.
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof ProviderError && error.transient;
}

/**
 * Wrap an error as an EngineError.
 */
export function toEngineError(
  error: unknown,
  defaultCode: EngineErrorCode = "UNKNOWN_ERROR"
): EngineError {
  if (error instanceof EngineError) {
    return error;
  }
  if (error instanceof Error) {
    return new EngineError(error.message, defaultCode, { cause: error });
  }
  return new EngineError(String(error), defaultCode);
}
