/**
 * Guardrail Engine
 *
 * Classifies a proposed tool call as allow / deny / require approval.
 * Deny-list first, then allow-list, then rules in registration order;
 * the first rule that does not pass decides.
 */

import type { RiskLevel, ToolCall, ToolDefinition } from "@loopwright/engine-core";
import { getLogger, type RuntimeLogger } from "@loopwright/engine-telemetry/logging";
import {
  type AutonomyLevel,
  autoApproveThreshold,
  formatAutonomyLevel,
  SUPERVISED_LEVEL,
} from "./autonomy";

// ============================================================================
// Types
// ============================================================================

export type GuardrailDecision =
  | { kind: "allow"; reason: string; riskLevel: RiskLevel; rule?: string }
  | { kind: "deny"; reason: string; riskLevel: RiskLevel; rule: string }
  | { kind: "require_approval"; reason: string; riskLevel: RiskLevel; rule: string };

export interface GuardrailInput {
  tool: ToolDefinition;
  call: ToolCall;
  level: AutonomyLevel;
}

export type RuleVerdict =
  | { verdict: "pass" }
  | { verdict: "deny"; reason: string }
  | { verdict: "require_approval"; reason: string };

/**
 * A single guardrail rule.
 */
export interface GuardrailRule {
  readonly id: string;
  evaluate(input: GuardrailInput): RuleVerdict;
}

export interface GuardrailEngineConfig {
  /** Tool name patterns always allowed (`*` and trailing `*` wildcards) */
  allowlist?: string[];
  /** Tool name patterns always denied; wins over the allowlist */
  denylist?: string[];
  /** Delete calls targeting more paths than this are denied (default: 5) */
  maxBulkDeletes?: number;
  /** Replace the built-in rules */
  rules?: GuardrailRule[];
  logger?: RuntimeLogger;
}

const PASS: RuleVerdict = { verdict: "pass" };

// ============================================================================
// Matching Helpers
// ============================================================================

export function matchesToolPattern(toolName: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => {
    if (pattern === "*") {
      return true;
    }
    if (pattern.endsWith("*")) {
      return toolName.startsWith(pattern.slice(0, -1));
    }
    return toolName === pattern;
  });
}

const DESTRUCTIVE_NAME_TOKENS = new Set(["delete", "remove", "rm", "rmdir", "unlink", "destroy", "purge"]);

function nameTokens(toolName: string): string[] {
  return toolName
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
}

/**
 * Whether a tool name reads as a delete/remove operation.
 */
export function isDestructiveToolName(toolName: string): boolean {
  return nameTokens(toolName).some((token) => DESTRUCTIVE_NAME_TOKENS.has(token));
}

const ROOT_LIKE_TARGETS = new Set(["/", "/*", "~", "~/", "~/*", "*", ".", "./*"]);

const IRREVERSIBLE_COMMAND_PATTERNS = [
  /\brm\s+-[a-z]*(rf|fr)[a-z]*\b/i,
  /\bmkfs(\.\w+)?\b/i,
  /\bdd\s+if=/i,
  /\bdrop\s+(table|database|schema)\b/i,
  /\btruncate\s+table\b/i,
  /\bgit\s+push\s+(-f|--force)\b/i,
];

function stringArgs(args: Record<string, unknown>, keys: string[]): string[] {
  const values: string[] = [];
  for (const key of keys) {
    const value = args[key];
    if (typeof value === "string") {
      values.push(value);
    } else if (Array.isArray(value)) {
      for (const item of value) {
        if (typeof item === "string") {
          values.push(item);
        }
      }
    }
  }
  return values;
}

/**
 * Arguments signalling broad-scope or irreversible effects.
 */
export function hasIrreversibleArguments(args: Record<string, unknown>): boolean {
  if (args.recursive === true || args.force === true) {
    return true;
  }
  const targets = stringArgs(args, ["path", "paths", "target", "directory"]);
  if (targets.some((target) => ROOT_LIKE_TARGETS.has(target.trim()))) {
    return true;
  }
  const commands = stringArgs(args, ["command"]);
  return commands.some((command) =>
    IRREVERSIBLE_COMMAND_PATTERNS.some((pattern) => pattern.test(command))
  );
}

const EXFILTRATION_CHECKS: Array<(command: string) => boolean> = [
  (cmd) => /\bcurl\b/.test(cmd) && (cmd.includes("cat ") || cmd.includes("< /") || /(-d|--data[\w-]*|-F|--form)\s+\S*@/.test(cmd)),
  (cmd) => /\bwget\b/.test(cmd) && cmd.includes("--post-file"),
  (cmd) => /\|\s*(nc|ncat|netcat)\b/.test(cmd) || /\b(nc|ncat|netcat)\b[^|]*<\s*\S/.test(cmd),
  (cmd) => /\bscp\b\s+(-\S+\s+)*[^\s@:]+\s+\S+:/.test(cmd),
];

/**
 * Whether a shell command ships local data to the network.
 */
export function looksLikeExfiltration(command: string): boolean {
  return EXFILTRATION_CHECKS.some((check) => check(command));
}

// ============================================================================
// Built-in Rules
// ============================================================================

/**
 * Declared tool risk against the autonomy level's auto-approve threshold.
 */
export const riskLevelRule: GuardrailRule = {
  id: "risk_level",
  evaluate({ tool, level }) {
    const threshold = autoApproveThreshold(level);
    if (tool.riskLevel > threshold) {
      return {
        verdict: "require_approval",
        reason: `tool '${tool.name}' has risk level ${tool.riskLevel} which exceeds threshold ${threshold} for ${formatAutonomyLevel(level)}`,
      };
    }
    return PASS;
  },
};

/**
 * Mass deletes are denied; irreversible or broad-scope mutations need a
 * human at any level; single deletes need one below L2.
 */
export function createDestructiveActionRule(maxBulkDeletes = 5): GuardrailRule {
  return {
    id: "destructive_action",
    evaluate({ tool, call, level }) {
      const named = isDestructiveToolName(tool.name);
      const destructive = named || tool.destructive === true;

      const paths = call.arguments.paths;
      if (destructive && Array.isArray(paths) && paths.length > maxBulkDeletes) {
        return {
          verdict: "deny",
          reason: `attempting to delete ${paths.length} files, max allowed is ${maxBulkDeletes}`,
        };
      }

      if (tool.mutating && hasIrreversibleArguments(call.arguments)) {
        return {
          verdict: "require_approval",
          reason: `tool '${tool.name}' was called with irreversible or broad-scope arguments`,
        };
      }

      if (tool.destructive === true) {
        return {
          verdict: "require_approval",
          reason: `tool '${tool.name}' is declared destructive`,
        };
      }

      if (named && level < SUPERVISED_LEVEL) {
        return { verdict: "require_approval", reason: "delete operation requires approval" };
      }

      return PASS;
    },
  };
}

/**
 * Commands combining local data access with network egress.
 */
export const networkExfiltrationRule: GuardrailRule = {
  id: "network_exfiltration",
  evaluate({ call }) {
    const commands = stringArgs(call.arguments, ["command"]);
    if (commands.some(looksLikeExfiltration)) {
      return {
        verdict: "require_approval",
        reason: "command may be exfiltrating data via network",
      };
    }
    return PASS;
  },
};

// ============================================================================
// Engine
// ============================================================================

export class GuardrailEngine {
  private readonly rules: GuardrailRule[];
  private allowlist: string[];
  private denylist: string[];
  private readonly logger: RuntimeLogger;

  constructor(config: GuardrailEngineConfig = {}) {
    this.allowlist = [...(config.allowlist ?? [])];
    this.denylist = [...(config.denylist ?? [])];
    this.rules = config.rules
      ? [...config.rules]
      : [riskLevelRule, createDestructiveActionRule(config.maxBulkDeletes), networkExfiltrationRule];
    this.logger = config.logger ?? getLogger("guardrails");
  }

  addRule(rule: GuardrailRule): void {
    this.rules.push(rule);
  }

  setAllowlist(patterns: string[]): void {
    this.allowlist = [...patterns];
  }

  setDenylist(patterns: string[]): void {
    this.denylist = [...patterns];
  }

  evaluate(tool: ToolDefinition, call: ToolCall, level: AutonomyLevel): GuardrailDecision {
    const riskLevel = tool.riskLevel;

    if (matchesToolPattern(tool.name, this.denylist)) {
      this.logger.warn("tool is on denylist", { tool: tool.name });
      return {
        kind: "deny",
        reason: `tool '${tool.name}' is on the denylist`,
        riskLevel,
        rule: "denylist",
      };
    }

    if (matchesToolPattern(tool.name, this.allowlist)) {
      return {
        kind: "allow",
        reason: `tool '${tool.name}' is on the allowlist`,
        riskLevel,
        rule: "allowlist",
      };
    }

    for (const rule of this.rules) {
      const result = rule.evaluate({ tool, call, level });
      if (result.verdict === "pass") {
        continue;
      }
      if (result.verdict === "deny") {
        this.logger.info("guardrail denied action", { rule: rule.id, tool: tool.name });
        return { kind: "deny", reason: result.reason, riskLevel, rule: rule.id };
      }
      this.logger.info("guardrail escalated action for approval", {
        rule: rule.id,
        tool: tool.name,
      });
      return { kind: "require_approval", reason: result.reason, riskLevel, rule: rule.id };
    }

    return { kind: "allow", reason: "all guardrails passed", riskLevel };
  }
}

export function createGuardrailEngine(config: GuardrailEngineConfig = {}): GuardrailEngine {
  return new GuardrailEngine(config);
}
