import { ApprovalNotFoundError } from "@loopwright/engine-core";
import { afterEach, describe, expect, it, vi } from "vitest";
import { type ApprovalRecord, ApprovalGate } from "../security/approvalGate";

const input = {
  sessionId: "session-1",
  toolCallId: "call-1",
  toolName: "delete_file",
  arguments: { path: "notes.txt" },
  reason: "delete operation requires approval",
  riskLevel: 3,
};

describe("ApprovalGate", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves approved decisions", async () => {
    const gate = new ApprovalGate();
    const pending = gate.request(input, { timeoutMs: 1000 });

    expect(gate.listPending()).toHaveLength(1);
    const record = gate.approve(pending.id, "operator");

    await expect(pending.decision).resolves.toEqual({
      status: "approved",
      approved: true,
      resolvedBy: "operator",
    });
    expect(record.status).toBe("approved");
    expect(record.resolvedBy).toBe("operator");
    expect(gate.listPending()).toHaveLength(0);
  });

  it("resolves denied decisions with the default reason", async () => {
    const gate = new ApprovalGate();
    const pending = gate.request(input, { timeoutMs: 1000 });
    gate.deny(pending.id);

    await expect(pending.decision).resolves.toEqual({
      status: "denied",
      approved: false,
      reason: "Human denied the action",
    });
    expect(gate.get(pending.id)?.resolutionReason).toBe("Human denied the action");
  });

  it("times out when nobody answers", async () => {
    vi.useFakeTimers();
    const gate = new ApprovalGate();
    const pending = gate.request(input, { timeoutMs: 50 });

    vi.advanceTimersByTime(50);
    const decision = await pending.decision;

    expect(decision).toEqual({
      status: "timed_out",
      approved: false,
      reason: "Approval request timed out",
    });
    expect(gate.get(pending.id)?.status).toBe("timed_out");
    expect(() => gate.approve(pending.id)).toThrow(ApprovalNotFoundError);
  });

  it("rejects unknown and already-resolved ids", async () => {
    const gate = new ApprovalGate();
    expect(() => gate.approve("missing")).toThrow(ApprovalNotFoundError);

    const pending = gate.request(input, { timeoutMs: 1000 });
    gate.approve(pending.id);
    await pending.decision;
    expect(() => gate.deny(pending.id)).toThrow(ApprovalNotFoundError);
  });

  it("denies when the turn is aborted", async () => {
    const gate = new ApprovalGate();
    const controller = new AbortController();
    const pending = gate.request(input, { timeoutMs: 1000, signal: controller.signal });

    controller.abort();
    await expect(pending.decision).resolves.toMatchObject({ status: "denied", approved: false });
  });

  it("notifies subscribers and the audit logger", async () => {
    const logRequest = vi.fn();
    const logResolution = vi.fn();
    const gate = new ApprovalGate({ auditLogger: { logRequest, logResolution } });
    const seen: ApprovalRecord[] = [];
    const unsubscribe = gate.onRequest((record) => seen.push(record));

    const pending = gate.request(input, { timeoutMs: 1000 });
    expect(seen.map((record) => record.id)).toEqual([pending.id]);

    gate.approve(pending.id);
    await pending.decision;
    await vi.waitFor(() => {
      expect(logResolution).toHaveBeenCalledTimes(1);
    });
    expect(logRequest).toHaveBeenCalledTimes(1);

    unsubscribe();
    gate.request(input, { timeoutMs: 1000 });
    expect(seen).toHaveLength(1);
  });

  it("filters pending requests by session", () => {
    const gate = new ApprovalGate();
    gate.request(input, { timeoutMs: 1000 });
    gate.request({ ...input, sessionId: "session-2" }, { timeoutMs: 1000 });

    expect(gate.listPending("session-2").map((record) => record.sessionId)).toEqual(["session-2"]);
  });

  it("keeps only the most recent resolved records", async () => {
    const gate = new ApprovalGate({ maxResolvedRecords: 2 });
    const first = gate.request(input, { timeoutMs: 1000 });
    const second = gate.request(input, { timeoutMs: 1000 });
    const third = gate.request(input, { timeoutMs: 1000 });
    const open = gate.request(input, { timeoutMs: 1000 });

    gate.approve(first.id);
    gate.deny(second.id);
    gate.approve(third.id);
    await Promise.all([first.decision, second.decision, third.decision]);

    expect(gate.get(first.id)).toBeUndefined();
    expect(gate.get(second.id)?.status).toBe("denied");
    expect(gate.get(third.id)?.status).toBe("approved");
    expect(gate.listPending().map((record) => record.id)).toEqual([open.id]);
    gate.deny(open.id);
  });
});
