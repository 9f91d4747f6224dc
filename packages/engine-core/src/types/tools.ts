/**
 * External collaborator contracts: tool dispatch and memory.
 */

import type { ToolCall } from "./messages";

/** Declared risk of a tool, 0 (harmless) to 10 (irreversible) */
export type RiskLevel = number;

/**
 * Tool catalogue entry. Supplied externally, read-only to the engine.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON schema for arguments */
  parameters: Record<string, unknown>;
  /** Whether the tool changes state outside the engine */
  mutating: boolean;
  riskLevel: RiskLevel;
  /** Marks irreversible tools whose names do not say so */
  destructive?: boolean;
}

export interface ToolResult {
  content: string;
  isError: boolean;
  data?: Record<string, unknown>;
}

export interface ToolExecutionContext {
  sessionId: string;
  signal: AbortSignal;
}

/**
 * Executes tools by name. Implementations own tool semantics.
 */
export interface ToolDispatcher {
  execute(call: ToolCall, context: ToolExecutionContext): Promise<ToolResult>;
}

/** How a turn ended, as reported to memory */
export type TurnOutcome = "completed" | "failed";

export interface TurnSummary {
  sessionId: string;
  userText: string;
  responseText: string;
  toolCalls: string[];
  outcome: TurnOutcome;
}

/**
 * Long-term memory. Search and compaction are the implementation's concern.
 */
export interface MemoryStore {
  /** Context to prepend to the turn; empty string when nothing relevant */
  recall(query: string, options: { sessionId: string }): Promise<string>;
  remember(summary: TurnSummary): Promise<void>;
}
