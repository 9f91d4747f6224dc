/**
 * Turn State Machine
 *
 * Enforces valid phase transitions for one agent loop turn and keeps the
 * transition history for diagnostics.
 */

import { InvalidTransitionError } from "@loopwright/engine-core";

/**
 * Phases of a turn.
 * - `start`: lock held, session assigned
 * - `recall`: loading memory context
 * - `model_call`: waiting for the router
 * - `tool_use`: guarding, approving and dispatching tool calls
 * - `continuation`: response was truncated, continuation injected
 * - `nudge`: response stopped early, nudge injected
 * - `respond`: final response emitted
 * - `failed`: fatal error surfaced
 * - `end`: memory written, lock released
 */
export type TurnPhase =
  | "start"
  | "recall"
  | "model_call"
  | "tool_use"
  | "continuation"
  | "nudge"
  | "respond"
  | "failed"
  | "end";

export interface TurnTransition {
  readonly from: TurnPhase;
  readonly to: TurnPhase;
  readonly timestamp: number;
}

const VALID_TRANSITIONS: Readonly<Record<TurnPhase, readonly TurnPhase[]>> = {
  start: ["recall", "failed"],
  recall: ["model_call", "failed"],
  // A failed call that leaves iterations loops back to model_call
  model_call: ["model_call", "tool_use", "continuation", "nudge", "respond", "failed"],
  tool_use: ["model_call", "failed"],
  continuation: ["model_call", "failed"],
  nudge: ["model_call", "failed"],
  respond: ["end"],
  failed: ["end"],
  end: [],
};

export class TurnStateMachine {
  private phase: TurnPhase = "start";
  private readonly history: TurnTransition[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  getPhase(): TurnPhase {
    return this.phase;
  }

  getHistory(): readonly TurnTransition[] {
    return this.history;
  }

  canTransition(to: TurnPhase): boolean {
    return VALID_TRANSITIONS[this.phase].includes(to);
  }

  transition(to: TurnPhase): TurnPhase {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this.phase, to);
    }
    this.history.push({ from: this.phase, to, timestamp: this.now() });
    this.phase = to;
    return to;
  }

  get isTerminal(): boolean {
    return this.phase === "end";
  }
}
