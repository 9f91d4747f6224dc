/**
 * Session Manager
 *
 * Owns conversation identity, routing metadata and the per-session run
 * lock. Sessions are handed out by reference.
 */

import { randomUUID } from "node:crypto";
import type { Session, TurnRole } from "@loopwright/engine-core";
import { getLogger, type RuntimeLogger } from "@loopwright/engine-telemetry/logging";
import { Mutex } from "./mutex";

const MAX_NAME_LENGTH = 60;

export interface SessionManagerConfig {
  now?: () => number;
  /** Id generator, injectable for tests */
  generateId?: () => string;
  logger?: RuntimeLogger;
}

export interface SessionLookup {
  session: Session;
  /** Whether this call created the session */
  created: boolean;
}

/**
 * Label from the first line of a message, trimmed and capped.
 */
export function deriveSessionName(text: string): string | undefined {
  const firstLine = text.split(/\r?\n/, 1)[0]?.trim() ?? "";
  if (!firstLine) {
    return undefined;
  }
  return firstLine.length > MAX_NAME_LENGTH ? firstLine.slice(0, MAX_NAME_LENGTH) : firstLine;
}

export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new Map<string, Mutex>();
  private readonly now: () => number;
  private readonly generateId: () => string;
  private readonly logger: RuntimeLogger;

  constructor(config: SessionManagerConfig = {}) {
    this.now = config.now ?? Date.now;
    this.generateId = config.generateId ?? randomUUID;
    this.logger = config.logger ?? getLogger("sessions");
  }

  /**
   * Resume a session by id, backfilling missing routing fields, or create one.
   */
  getOrInsert(id: string | undefined, channel?: string, target?: string): SessionLookup {
    if (id) {
      const existing = this.sessions.get(id);
      if (existing) {
        existing.channel ??= channel;
        existing.target ??= target;
        return { session: existing, created: false };
      }
    }
    return { session: this.create(id ?? this.generateId(), channel, target), created: true };
  }

  /**
   * The active session for a routing pair, or a new one.
   */
  findOrCreate(channel: string, target: string): SessionLookup {
    for (const session of this.sessions.values()) {
      if (session.active && session.channel === channel && session.target === target) {
        return { session, created: false };
      }
    }
    return { session: this.create(this.generateId(), channel, target), created: true };
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  list(): Session[] {
    return Array.from(this.sessions.values()).sort((a, b) => a.createdAt - b.createdAt);
  }

  /**
   * Count a transcript message. Only user and assistant messages count.
   */
  recordMessage(id: string, role: TurnRole): void {
    const session = this.sessions.get(id);
    if (!session || (role !== "user" && role !== "assistant")) {
      return;
    }
    session.messageCount += 1;
  }

  /**
   * Backfill the display name from a user message when none is set.
   */
  setName(id: string, text: string): void {
    const session = this.sessions.get(id);
    if (!session || session.name) {
      return;
    }
    session.name = deriveSessionName(text);
  }

  close(id: string): void {
    const session = this.sessions.get(id);
    if (session) {
      session.active = false;
    }
  }

  /**
   * The run lock for a session, created on first access and shared by id.
   */
  runLock(id: string): Mutex {
    let lock = this.locks.get(id);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(id, lock);
    }
    return lock;
  }

  withRunLock<T>(id: string, fn: () => Promise<T>): Promise<T> {
    return this.runLock(id).runExclusive(fn);
  }

  /**
   * Remove sessions with no recorded messages. Returns the number removed.
   */
  cleanupEmpty(): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      const lock = this.locks.get(id);
      if (session.messageCount === 0 && !lock?.isLocked) {
        this.sessions.delete(id);
        this.locks.delete(id);
        removed += 1;
      }
    }
    if (removed > 0) {
      this.logger.info("removed empty sessions", { removed });
    }
    return removed;
  }

  snapshot(): Session[] {
    return this.list().map((session) => ({ ...session }));
  }

  /**
   * Load persisted sessions. Existing ids are replaced.
   */
  restore(records: readonly Session[]): void {
    for (const record of records) {
      this.sessions.set(record.id, { ...record });
    }
  }

  private create(id: string, channel?: string, target?: string): Session {
    const session: Session = {
      id,
      channel,
      target,
      messageCount: 0,
      createdAt: this.now(),
      active: true,
    };
    this.sessions.set(id, session);
    this.logger.debug("session created", { sessionId: id, channel, target });
    return session;
  }
}

export function createSessionManager(config: SessionManagerConfig = {}): SessionManager {
  return new SessionManager(config);
}
