/**
 * Lazy-stop detection.
 *
 * Decides whether a `completed` response stopped early, deferring work
 * to the user instead of doing it. The phrase sets are configuration.
 */

import type { LazyStopConfig } from "@loopwright/engine-core";
import { matchesToolPattern } from "../security/guardrails";

export interface LazyStopInput {
  /** Final text of the response */
  text: string;
  /** Iteration that produced it (1-based) */
  iteration: number;
  /** Tools called in the previous round */
  previousToolNames: readonly string[];
}

export interface LazyStopDetector {
  /** Returns the nudge to inject, or null when the response is final */
  detect(input: LazyStopInput): string | null;
}

export const DEFAULT_NUDGE =
  "[SYSTEM: You stopped but the task is not complete. Do not describe what could be done; " +
  "do it with your tools and finish the job. Continue working now.]";

/** Never fires */
export const disabledLazyStopDetector: LazyStopDetector = {
  detect: () => null,
};

function lowered(phrases: readonly string[]): string[] {
  return phrases.map((phrase) => phrase.toLowerCase());
}

/**
 * Phrase-count detector.
 *
 * - Completion phrases veto.
 * - A previous round that used a `suppressAfterTools` tool vetoes, when the
 *   text also carries a `suppressPhrases` entry (or that list is empty).
 * - Before `scaffoldingBeforeIteration`, a scaffolding phrase plus one
 *   deferral fires.
 * - Otherwise `threshold` deferrals fire, or `lateThreshold` from
 *   `lateIteration` on.
 */
export function createPhraseLazyStopDetector(
  config: LazyStopConfig,
  nudge: string = DEFAULT_NUDGE
): LazyStopDetector {
  if (!config.enabled || config.deferralPhrases.length === 0) {
    return disabledLazyStopDetector;
  }

  const deferrals = lowered(config.deferralPhrases);
  const completions = lowered(config.completionPhrases);
  const suppressPhrases = lowered(config.suppressPhrases);
  const scaffolding = lowered(config.scaffoldingPhrases);

  const suppressed = (lower: string, previousToolNames: readonly string[]): boolean => {
    if (config.suppressAfterTools.length === 0) {
      return false;
    }
    const usedSuppressingTool = previousToolNames.some((name) =>
      matchesToolPattern(name, config.suppressAfterTools)
    );
    if (!usedSuppressingTool) {
      return false;
    }
    return suppressPhrases.length === 0 || suppressPhrases.some((phrase) => lower.includes(phrase));
  };

  return {
    detect({ text, iteration, previousToolNames }) {
      if (text.length < config.minLength) {
        return null;
      }
      const lower = text.toLowerCase();
      if (completions.some((phrase) => lower.includes(phrase))) {
        return null;
      }
      if (suppressed(lower, previousToolNames)) {
        return null;
      }

      const hits = deferrals.filter((phrase) => lower.includes(phrase)).length;
      if (
        iteration < config.scaffoldingBeforeIteration &&
        hits >= 1 &&
        scaffolding.some((phrase) => lower.includes(phrase))
      ) {
        return nudge;
      }

      const threshold = iteration >= config.lateIteration ? config.lateThreshold : config.threshold;
      return hits >= threshold ? nudge : null;
    },
  };
}
