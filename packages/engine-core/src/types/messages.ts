/**
 * Conversation and model-call types.
 *
 * Shared between the router, the agent loop and external providers.
 */

// ============================================================================
// Turn Messages
// ============================================================================

/** Role of a message stored in a session transcript */
export type TurnRole = "user" | "assistant" | "tool";

/** Role of a message sent to a model provider */
export type ModelMessageRole = TurnRole | "system";

/**
 * A tool invocation requested by the model.
 */
export interface ToolCall {
  /** Provider-assigned call id, echoed back on the result */
  id: string;
  /** Tool name from the catalogue */
  name: string;
  /** Parsed arguments */
  arguments: Record<string, unknown>;
}

/**
 * A message in a session transcript. Append-only, in processing order.
 */
export interface TurnMessage {
  role: TurnRole;
  content: string;
  /** Tool calls requested by an assistant message */
  toolCalls?: ToolCall[];
  /** Call this tool message answers */
  toolCallId?: string;
  /** Whether a tool message carries an error */
  isError?: boolean;
  timestamp: number;
}

/**
 * A message as sent to a provider.
 */
export interface ModelMessage {
  role: ModelMessageRole;
  content: string;
  toolCalls?: ToolCall[];
  toolCallId?: string;
  isError?: boolean;
}

// ============================================================================
// Model Request / Response
// ============================================================================

/**
 * Why a model response ended.
 * - `completed`: the model finished its turn
 * - `truncated`: output hit the token limit
 * - `tool_use`: the model requested tool calls
 * - `provider_error`: the provider reported an error in-band
 */
export type StopReason = "completed" | "truncated" | "tool_use" | "provider_error";

/** JSON schema tool description sent to the model */
export interface ModelToolSchema {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ModelRequest {
  /** Model id, optionally prefixed as `provider/model` */
  model: string;
  messages: ModelMessage[];
  tools: ModelToolSchema[];
  system?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  /** Estimated cost in USD */
  costUsd: number;
}

export interface ModelResponse {
  stopReason: StopReason;
  content: string;
  toolCalls: ToolCall[];
  usage: TokenUsage;
  /** Model that served the request */
  model: string;
  /** Provider that served the request */
  provider: string;
}

// ============================================================================
// Provider Contract
// ============================================================================

/** Incremental output from a streaming provider */
export type ModelStreamChunk =
  | { type: "text"; content: string }
  | { type: "tool_call"; toolCall: ToolCall }
  | { type: "usage"; inputTokens: number; outputTokens: number }
  | { type: "done"; stopReason: StopReason };

/** Completion result as returned by a provider, before cost accounting */
export interface ProviderCompletion {
  stopReason: StopReason;
  content: string;
  toolCalls: ToolCall[];
  inputTokens: number;
  outputTokens: number;
}

/**
 * A model provider. Wire protocol is the implementation's concern.
 */
export interface ModelProvider {
  /** Provider name, used in `provider/model` addressing */
  readonly name: string;
  /** Model ids this provider serves */
  readonly models: readonly string[];
  /** Non-streaming completion */
  complete(request: ModelRequest, signal?: AbortSignal): Promise<ProviderCompletion>;
  /** Optional streaming completion */
  stream?(request: ModelRequest, signal?: AbortSignal): AsyncIterable<ModelStreamChunk>;
}
