/**
 * Per-session transcript storage.
 */

import type { TurnMessage } from "@loopwright/engine-core";

/**
 * Append-only message log per session.
 */
export interface TranscriptStore {
  append(sessionId: string, message: TurnMessage): void;
  messages(sessionId: string): readonly TurnMessage[];
  clear(sessionId: string): void;
}

export class InMemoryTranscriptStore implements TranscriptStore {
  private readonly transcripts = new Map<string, TurnMessage[]>();

  append(sessionId: string, message: TurnMessage): void {
    const transcript = this.transcripts.get(sessionId);
    if (transcript) {
      transcript.push(message);
    } else {
      this.transcripts.set(sessionId, [message]);
    }
  }

  messages(sessionId: string): readonly TurnMessage[] {
    return this.transcripts.get(sessionId) ?? [];
  }

  clear(sessionId: string): void {
    this.transcripts.delete(sessionId);
  }
}
