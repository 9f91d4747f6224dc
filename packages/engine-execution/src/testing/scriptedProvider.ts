/**
 * Scripted model provider.
 *
 * Replays a fixed list of steps, one per call, and records every request.
 * Used by tests and local demos in place of a network provider.
 */

import type {
  ModelProvider,
  ModelRequest,
  ModelStreamChunk,
  ProviderCompletion,
  StopReason,
  ToolCall,
} from "@loopwright/engine-core";

export type ScriptStep =
  | { kind: "reply"; completion: ProviderCompletion }
  | { kind: "fail"; error: unknown }
  /** Streams `content`, then fails with `error` */
  | { kind: "fail_mid_stream"; content: string; error: unknown }
  /** Never settles until the request is aborted */
  | { kind: "hang" };

export interface ScriptedProviderOptions {
  name?: string;
  models?: string[];
  /** Expose `stream` as well as `complete` */
  streaming?: boolean;
}

export function reply(
  content: string,
  options: { stopReason?: StopReason; inputTokens?: number; outputTokens?: number } = {}
): ScriptStep {
  return {
    kind: "reply",
    completion: {
      stopReason: options.stopReason ?? "completed",
      content,
      toolCalls: [],
      inputTokens: options.inputTokens ?? 10,
      outputTokens: options.outputTokens ?? 5,
    },
  };
}

export function toolUse(toolCalls: ToolCall[], content = ""): ScriptStep {
  return {
    kind: "reply",
    completion: {
      stopReason: "tool_use",
      content,
      toolCalls,
      inputTokens: 10,
      outputTokens: 5,
    },
  };
}

export function fail(error: unknown): ScriptStep {
  return { kind: "fail", error };
}

export function hang(): ScriptStep {
  return { kind: "hang" };
}

export class ScriptedProvider implements ModelProvider {
  readonly name: string;
  readonly models: string[];
  readonly requests: ModelRequest[] = [];
  readonly stream?: (request: ModelRequest, signal?: AbortSignal) => AsyncIterable<ModelStreamChunk>;
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[], options: ScriptedProviderOptions = {}) {
    this.steps = [...steps];
    this.name = options.name ?? "scripted";
    this.models = options.models ?? ["scripted-model"];
    if (options.streaming) {
      this.stream = (request, signal) => this.streamStep(request, signal);
    }
  }

  get remainingSteps(): number {
    return this.steps.length;
  }

  /** Append steps after construction */
  enqueue(...steps: ScriptStep[]): void {
    this.steps.push(...steps);
  }

  async complete(request: ModelRequest, signal?: AbortSignal): Promise<ProviderCompletion> {
    const step = this.next(request);
    switch (step.kind) {
      case "reply":
        return step.completion;
      case "fail":
      case "fail_mid_stream":
        throw step.error;
      case "hang":
        return waitForAbort(signal);
    }
  }

  private async *streamStep(
    request: ModelRequest,
    signal?: AbortSignal
  ): AsyncGenerator<ModelStreamChunk> {
    const step = this.next(request);
    switch (step.kind) {
      case "reply": {
        const { completion } = step;
        if (completion.content) {
          yield { type: "text", content: completion.content };
        }
        for (const toolCall of completion.toolCalls) {
          yield { type: "tool_call", toolCall };
        }
        yield {
          type: "usage",
          inputTokens: completion.inputTokens,
          outputTokens: completion.outputTokens,
        };
        yield { type: "done", stopReason: completion.stopReason };
        return;
      }
      case "fail":
        throw step.error;
      case "fail_mid_stream":
        yield { type: "text", content: step.content };
        throw step.error;
      case "hang":
        await waitForAbort(signal);
    }
  }

  private next(request: ModelRequest): ScriptStep {
    this.requests.push(request);
    const step = this.steps.shift();
    if (!step) {
      throw new Error(`Scripted provider ${this.name} has no steps left`);
    }
    return step;
  }
}

function waitForAbort(signal?: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (!signal) {
      return;
    }
    const abortSignal = signal;
    if (abortSignal.aborted) {
      reject(abortSignal.reason);
      return;
    }
    abortSignal.addEventListener(
      "abort",
      () => {
        reject(abortSignal.reason);
      },
      { once: true }
    );
  });
}
