/**
 * AgentSessionStore - multi-turn agent conversations with idle expiry
 *
 * Holds at most one live session per owner. Each session exclusively owns
 * an engine handle; closing the session releases the handle exactly once.
 * A periodic reaper closes sessions that have been idle longer than the
 * timeout, skipping any session that is mid-turn.
 */

import { randomUUID } from "node:crypto";
import { getContextLogger } from "@ticketflow/core";
import type { EngineHandle } from "../engine/types.js";
import {
  EngineStartError,
  OrchestratorError,
  SessionBusyError,
  SessionNotFoundError,
  ShuttingDownError,
  errorMessage,
} from "../errors.js";
import { KeyedLock } from "../utils/index.js";

/**
 * Read-only view of a session handed to callers
 */
export interface AgentSession {
  readonly id: string;
  readonly owner: string;
  readonly handle: EngineHandle;
  readonly createdAt: number;
  readonly lastActivity: number;
  readonly isProcessing: boolean;
  readonly turnCount: number;
}

interface SessionRecord {
  id: string;
  owner: string;
  handle: EngineHandle;
  createdAt: number;
  lastActivity: number;
  isProcessing: boolean;
  turnCount: number;
}

export interface SessionStoreOptions {
  /**
   * Idle time after which the reaper closes a session
   * @default 30 minutes
   */
  timeoutMs?: number;

  /**
   * How often the reaper scans
   * @default 60 seconds
   */
  reaperIntervalMs?: number;

  /** Clock, for tests */
  now?: () => number;
}

export const DEFAULT_SESSION_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_REAPER_INTERVAL_MS = 60 * 1000;

export class AgentSessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly ownerSessions = new Map<string, string>();
  private readonly ownerLocks = new KeyedLock();
  private readonly timeoutMs: number;
  private readonly reaperIntervalMs: number;
  private readonly now: () => number;
  private reaper: NodeJS.Timeout | null = null;
  private reaping = false;
  private shutDown = false;

  constructor(options: SessionStoreOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.reaperIntervalMs = options.reaperIntervalMs ?? DEFAULT_REAPER_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Open a new conversation for the owner
   *
   * Any session the owner already has is closed first, even if starting
   * the replacement then fails. Calls for the same owner are serialized.
   *
   * @throws {EngineStartError} when `startEngine` fails; nothing is recorded
   */
  createSession(owner: string, startEngine: () => Promise<EngineHandle>): Promise<AgentSession> {
    return this.ownerLocks.run(owner, async () => {
      this.assertOpen();
      const log = getContextLogger();

      const previousId = this.ownerSessions.get(owner);
      if (previousId) {
        log.info({ owner, sessionId: previousId }, "Replacing existing session");
        await this.closeSession(previousId);
      }

      let handle: EngineHandle;
      try {
        handle = await startEngine();
      } catch (error) {
        if (error instanceof OrchestratorError) {
          throw error;
        }
        throw new EngineStartError(errorMessage(error), { cause: error });
      }

      if (this.shutDown) {
        await this.releaseHandle("unrecorded", handle);
        throw new ShuttingDownError();
      }

      const timestamp = this.now();
      const record: SessionRecord = {
        id: randomUUID(),
        owner,
        handle,
        createdAt: timestamp,
        lastActivity: timestamp,
        isProcessing: false,
        turnCount: 0,
      };

      this.sessions.set(record.id, record);
      this.ownerSessions.set(owner, record.id);

      log.info({ owner, sessionId: record.id }, "Session created");
      return record;
    });
  }

  /**
   * Look up a session and mark it active
   */
  getSession(id: string): AgentSession | undefined {
    const record = this.sessions.get(id);
    if (record) {
      record.lastActivity = this.now();
    }
    return record;
  }

  /**
   * Who a session belongs to; leaves its activity untouched
   */
  ownerOf(id: string): string | undefined {
    return this.sessions.get(id)?.owner;
  }

  /**
   * The owner's live session, marked active
   */
  getOwnerSession(owner: string): AgentSession | undefined {
    const id = this.ownerSessions.get(owner);
    return id ? this.getSession(id) : undefined;
  }

  /**
   * Run one turn through a session
   *
   * The session is flagged as processing for the duration of `turn`, which
   * keeps the reaper away from it however long the turn takes.
   *
   * @throws {SessionNotFoundError} if the session is gone
   * @throws {SessionBusyError} if another turn is in flight
   */
  async runTurn<T>(id: string, turn: (session: AgentSession) => Promise<T>): Promise<T> {
    const record = this.sessions.get(id);
    if (!record) {
      throw new SessionNotFoundError(id);
    }
    if (record.isProcessing) {
      throw new SessionBusyError(id);
    }

    record.isProcessing = true;
    record.lastActivity = this.now();
    try {
      const result = await turn(record);
      record.turnCount++;
      return result;
    } finally {
      record.isProcessing = false;
      record.lastActivity = this.now();
    }
  }

  /**
   * Remove a session and release its engine handle
   *
   * The entry is removed before the handle is released, so concurrent
   * closes release it once. Release failures are logged, not thrown.
   *
   * @returns whether a session was closed
   */
  async closeSession(id: string): Promise<boolean> {
    const record = this.sessions.get(id);
    if (!record) {
      return false;
    }

    this.sessions.delete(id);
    if (this.ownerSessions.get(record.owner) === id) {
      this.ownerSessions.delete(record.owner);
    }

    await this.releaseHandle(id, record.handle);
    getContextLogger().info({ owner: record.owner, sessionId: id, turns: record.turnCount }, "Session closed");
    return true;
  }

  async closeOwnerSession(owner: string): Promise<boolean> {
    const id = this.ownerSessions.get(owner);
    return id ? this.closeSession(id) : false;
  }

  private async releaseHandle(sessionId: string, handle: EngineHandle): Promise<void> {
    try {
      await handle.close();
    } catch (err) {
      getContextLogger().warn({ err, sessionId }, "Error closing engine handle");
    }
  }

  /**
   * Close every idle session whose last activity is older than the timeout
   *
   * @returns ids of the sessions closed by this scan
   */
  async reapExpired(now: number = this.now()): Promise<string[]> {
    const isExpired = (record: SessionRecord): boolean =>
      now - record.lastActivity > this.timeoutMs && !record.isProcessing;

    const candidates = Array.from(this.sessions.values())
      .filter(isExpired)
      .map((record) => record.id);

    const closed: string[] = [];
    for (const id of candidates) {
      // A turn may have started while an earlier close was awaited
      const record = this.sessions.get(id);
      if (!record || !isExpired(record)) {
        continue;
      }
      getContextLogger().info({ sessionId: id, owner: record.owner }, "Cleaning up expired session");
      if (await this.closeSession(id)) {
        closed.push(id);
      }
    }

    return closed;
  }

  /**
   * Start the periodic reaper (idempotent)
   */
  start(): void {
    if (this.reaper || this.shutDown) {
      return;
    }

    this.reaper = setInterval(() => {
      if (this.reaping) {
        return;
      }
      this.reaping = true;
      void this.reapExpired()
        .catch((err: unknown) => {
          getContextLogger().error({ err }, "Session reaper failed");
        })
        .finally(() => {
          this.reaping = false;
        });
    }, this.reaperIntervalMs);
    this.reaper.unref();
  }

  /**
   * Stop the periodic reaper; sessions stay open
   */
  stop(): void {
    if (this.reaper) {
      clearInterval(this.reaper);
      this.reaper = null;
    }
  }

  /**
   * Stop the reaper and close every session, idle or not
   */
  async shutdown(): Promise<void> {
    this.stop();
    this.shutDown = true;
    const ids = Array.from(this.sessions.keys());
    await Promise.all(ids.map((id) => this.closeSession(id)));
    getContextLogger().info({ closed: ids.length }, "Session store shut down");
  }

  private assertOpen(): void {
    if (this.shutDown) {
      throw new ShuttingDownError();
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  get isReaperRunning(): boolean {
    return this.reaper !== null;
  }

  list(): AgentSession[] {
    return Array.from(this.sessions.values(), (record) => ({ ...record }));
  }
}
