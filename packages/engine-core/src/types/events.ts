/**
 * Engine event stream types.
 *
 * Events are emitted in strict temporal order per turn; `sequence` is
 * monotonically increasing within one stream.
 */

import type { EngineErrorCode } from "../errors";
import type { StopReason } from "./messages";
import type { RiskLevel } from "./tools";

export type EngineEventType =
  | "session-assigned"
  | "text-delta"
  | "tool-call-started"
  | "tool-result"
  | "approval-required"
  | "usage"
  | "done"
  | "error";

/** Payload carried by each event type */
export interface EngineEventPayloads {
  "session-assigned": {
    sessionId: string;
    /** Whether the session was created by this turn */
    created: boolean;
  };
  "text-delta": {
    content: string;
  };
  "tool-call-started": {
    callId: string;
    name: string;
    arguments: Record<string, unknown>;
  };
  "tool-result": {
    callId: string;
    name: string;
    content: string;
    isError: boolean;
    data?: Record<string, unknown>;
  };
  "approval-required": {
    approvalId: string;
    toolName: string;
    arguments: Record<string, unknown>;
    reason: string;
    riskLevel: RiskLevel;
  };
  usage: {
    model: string;
    provider: string;
    inputTokens: number;
    outputTokens: number;
    costUsd: number;
  };
  done: {
    content: string;
    stopReason: StopReason;
    iterations: number;
  };
  error: {
    code: EngineErrorCode;
    message: string;
  };
}

/** An event before the stream stamps it */
export type EngineEventInput = {
  [K in EngineEventType]: { type: K; data: EngineEventPayloads[K] };
}[EngineEventType];

export type EngineEvent = EngineEventInput & {
  /** Position within the stream, starting at 0 */
  sequence: number;
  timestamp: number;
};

/** Narrow an event to a specific type */
export type EngineEventOf<K extends EngineEventType> = Extract<EngineEvent, { type: K }>;
