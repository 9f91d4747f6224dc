/**
 * Engine Event Stream
 *
 * Single-writer, single-reader queue of engine events. The writer stamps
 * each event with a sequence number; the reader consumes it as an
 * AsyncIterable. Events are never dropped.
 */

import type { EngineErrorCode, EngineEvent, EngineEventInput } from "@loopwright/engine-core";

type Resolver = (value: IteratorResult<EngineEvent>) => void;

export class EngineEventStream implements AsyncIterable<EngineEvent> {
  private readonly buffer: EngineEvent[] = [];
  private resolvers: Resolver[] = [];
  private sequence = 0;
  private closed = false;

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Append an event. Returns false once the stream is closed.
   */
  emit(input: EngineEventInput): boolean {
    if (this.closed) {
      return false;
    }

    const event: EngineEvent = { ...input, sequence: this.sequence++, timestamp: this.now() };

    const resolver = this.resolvers.shift();
    if (resolver) {
      resolver({ value: event, done: false });
      return true;
    }
    this.buffer.push(event);
    return true;
  }

  writeText(content: string): boolean {
    return this.emit({ type: "text-delta", data: { content } });
  }

  writeError(code: EngineErrorCode, message: string): boolean {
    return this.emit({ type: "error", data: { code, message } });
  }

  /**
   * Close the stream. Buffered events are still delivered.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const resolver of this.resolvers) {
      resolver({ value: undefined, done: true });
    }
    this.resolvers = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Events emitted so far */
  get emitted(): number {
    return this.sequence;
  }

  [Symbol.asyncIterator](): AsyncIterator<EngineEvent> {
    return {
      next: () => this.read(),
      return: () => {
        this.close();
        this.buffer.length = 0;
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private read(): Promise<IteratorResult<EngineEvent>> {
    const event = this.buffer.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.resolvers.push(resolve);
    });
  }
}

/**
 * Drain a stream into an array.
 */
export async function collectEvents(stream: AsyncIterable<EngineEvent>): Promise<EngineEvent[]> {
  const events: EngineEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

/**
 * Concatenated `text-delta` content of a stream.
 */
export async function collectText(stream: AsyncIterable<EngineEvent>): Promise<string> {
  let text = "";
  for await (const event of stream) {
    if (event.type === "text-delta") {
      text += event.data.content;
    }
  }
  return text;
}
