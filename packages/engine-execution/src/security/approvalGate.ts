/**
 * Approval Gate
 *
 * Parks a tool call until a human approves or denies it, or until the
 * request times out. Each request resolves exactly once.
 */

import { randomUUID } from "node:crypto";
import { ApprovalNotFoundError, type RiskLevel } from "@loopwright/engine-core";
import { getLogger, type RuntimeLogger } from "@loopwright/engine-telemetry/logging";

export type ApprovalStatus = "pending" | "approved" | "denied" | "timed_out";

export interface ApprovalRequestInput {
  sessionId: string;
  toolCallId: string;
  toolName: string;
  arguments: Record<string, unknown>;
  reason: string;
  riskLevel: RiskLevel;
}

export interface ApprovalRecord extends ApprovalRequestInput {
  id: string;
  status: ApprovalStatus;
  createdAt: number;
  expiresAt: number;
  resolvedAt?: number;
  /** Actor label of whoever resolved the request */
  resolvedBy?: string;
  resolutionReason?: string;
}

export interface ApprovalDecision {
  status: Exclude<ApprovalStatus, "pending">;
  approved: boolean;
  reason?: string;
  resolvedBy?: string;
}

export interface PendingApproval {
  id: string;
  decision: Promise<ApprovalDecision>;
}

export interface ApprovalRequestOptions {
  timeoutMs: number;
  /** Aborting resolves the request as denied */
  signal?: AbortSignal;
}

/**
 * Audit logger for approval events.
 * Implement this interface to integrate with external compliance/audit systems.
 */
export interface ApprovalAuditLogger {
  logRequest?(record: ApprovalRecord): void | Promise<void>;
  logResolution?(record: ApprovalRecord, decision: ApprovalDecision): void | Promise<void>;
}

export interface ApprovalGateConfig {
  auditLogger?: ApprovalAuditLogger;
  /** Resolved records kept for `get()`; the oldest are dropped first (default: 100) */
  maxResolvedRecords?: number;
  now?: () => number;
  logger?: RuntimeLogger;
}

const DEFAULT_MAX_RESOLVED_RECORDS = 100;

type ApprovalListener = (record: ApprovalRecord) => void;

interface Waiter {
  settle: (decision: ApprovalDecision) => void;
}

export class ApprovalGate {
  private readonly records = new Map<string, ApprovalRecord>();
  /** Resolved ids, oldest first */
  private resolvedIds: string[] = [];
  private readonly waiters = new Map<string, Waiter>();
  private readonly listeners = new Set<ApprovalListener>();
  private readonly auditLogger?: ApprovalAuditLogger;
  private readonly maxResolvedRecords: number;
  private readonly now: () => number;
  private readonly logger: RuntimeLogger;

  constructor(config: ApprovalGateConfig = {}) {
    this.auditLogger = config.auditLogger;
    this.maxResolvedRecords = config.maxResolvedRecords ?? DEFAULT_MAX_RESOLVED_RECORDS;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? getLogger("approval");
  }

  /**
   * Open a request. The returned decision settles on approve(), deny(),
   * timeout or abort, whichever comes first.
   */
  request(input: ApprovalRequestInput, options: ApprovalRequestOptions): PendingApproval {
    const createdAt = this.now();
    const record: ApprovalRecord = {
      ...input,
      id: randomUUID(),
      status: "pending",
      createdAt,
      expiresAt: createdAt + options.timeoutMs,
    };
    this.records.set(record.id, record);

    const decision = new Promise<ApprovalDecision>((resolve) => {
      let settled = false;
      const timer = setTimeout(() => {
        settle({ status: "timed_out", approved: false, reason: "Approval request timed out" });
      }, options.timeoutMs);

      const onAbort = () => {
        settle({ status: "denied", approved: false, reason: "Turn aborted" });
      };

      const settle = (result: ApprovalDecision) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        options.signal?.removeEventListener("abort", onAbort);
        this.waiters.delete(record.id);
        this.finish(record, result);
        resolve(result);
      };

      this.waiters.set(record.id, { settle });
      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener("abort", onAbort, { once: true });
      }
    });

    this.logger.info("approval requested", {
      approvalId: record.id,
      sessionId: record.sessionId,
      tool: record.toolName,
      riskLevel: record.riskLevel,
    });
    this.audit(() => this.auditLogger?.logRequest?.(record));
    for (const listener of this.listeners) {
      listener(record);
    }

    return { id: record.id, decision };
  }

  approve(id: string, resolvedBy?: string): ApprovalRecord {
    return this.resolvePending(id, { status: "approved", approved: true, resolvedBy });
  }

  deny(
    id: string,
    options: { reason?: string; resolvedBy?: string } = {}
  ): ApprovalRecord {
    return this.resolvePending(id, {
      status: "denied",
      approved: false,
      reason: options.reason ?? "Human denied the action",
      resolvedBy: options.resolvedBy,
    });
  }

  get(id: string): ApprovalRecord | undefined {
    return this.records.get(id);
  }

  listPending(sessionId?: string): ApprovalRecord[] {
    return Array.from(this.records.values()).filter(
      (record) =>
        record.status === "pending" && (sessionId === undefined || record.sessionId === sessionId)
    );
  }

  /**
   * Subscribe to new requests. Returns an unsubscribe function.
   */
  onRequest(listener: ApprovalListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Drop resolved records. Pending requests are kept.
   */
  clearResolved(): void {
    for (const [id, record] of this.records) {
      if (record.status !== "pending") {
        this.records.delete(id);
      }
    }
    this.resolvedIds = [];
  }

  private resolvePending(id: string, decision: ApprovalDecision): ApprovalRecord {
    const waiter = this.waiters.get(id);
    const record = this.records.get(id);
    if (!waiter || !record) {
      throw new ApprovalNotFoundError(id);
    }
    waiter.settle(decision);
    return record;
  }

  private finish(record: ApprovalRecord, decision: ApprovalDecision): void {
    record.status = decision.status;
    record.resolvedAt = this.now();
    record.resolvedBy = decision.resolvedBy;
    record.resolutionReason = decision.reason;
    this.logger.info("approval resolved", {
      approvalId: record.id,
      status: decision.status,
      resolvedBy: decision.resolvedBy,
    });
    this.audit(() => this.auditLogger?.logResolution?.(record, decision));

    this.resolvedIds.push(record.id);
    while (this.resolvedIds.length > this.maxResolvedRecords) {
      const evicted = this.resolvedIds.shift();
      if (evicted !== undefined) {
        this.records.delete(evicted);
      }
    }
  }

  private audit(write: () => void | Promise<void>): void {
    void Promise.resolve()
      .then(write)
      .catch((error: unknown) => {
        this.logger.warn("approval audit logger failed", {
          error: error instanceof Error ? error.message : String(error),
        });
      });
  }
}

export function createApprovalGate(config: ApprovalGateConfig = {}): ApprovalGate {
  return new ApprovalGate(config);
}
