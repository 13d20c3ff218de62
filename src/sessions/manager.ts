import { canonicalize } from "../security/path-boundary.js";
import { SessionError } from "../shared/errors.js";
import { genPlaceholderId } from "../shared/ids.js";
import { componentLogger } from "../shared/logging.js";
import type { SessionStore } from "./store.js";
import {
  isExpired,
  parseSessionId,
  sessionIdString,
  toSession,
  type Session,
  type SessionId,
  type SessionRecord,
} from "./types.js";

export interface SessionManagerOptions {
  timeoutMs: number;
  /** Oldest sessions over this count are evicted when a fresh one is created. */
  maxSessionsPerUser?: number;
}

export interface GetOrCreateOptions {
  sessionId?: string;
  forceNew?: boolean;
}

/** The parts of a finished turn that feed the session's counters. */
export interface TurnUpdate {
  sessionId?: string;
  cost: number;
  toolsUsed: readonly { name: string }[];
}

export interface SessionInfo {
  sessionId: string;
  projectPath: string;
  createdAt: number;
  lastUsed: number;
  totalCost: number;
  messageCount: number;
  toolsUsed: Record<string, number>;
  expired: boolean;
}

export interface UserSessionSummary {
  userId: number;
  totalSessions: number;
  activeSessions: number;
  totalCost: number;
  totalMessages: number;
  projects: string[];
}

/** Most recently used first; ties go to the later creation, then the larger id. */
function byRecency(a: SessionRecord, b: SessionRecord): number {
  if (a.lastUsed !== b.lastUsed) return b.lastUsed - a.lastUsed;
  if (a.createdAt !== b.createdAt) return b.createdAt - a.createdAt;
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

function blankRecord(id: string, userId: number, projectPath: string): SessionRecord {
  const now = Date.now();
  return {
    id,
    userId,
    projectPath,
    createdAt: now,
    lastUsed: now,
    totalCost: 0,
    messageCount: 0,
    toolsUsed: {},
  };
}

/** Fields a lost record is rebuilt from when a finished turn has to be saved anyway. */
export type SessionOwner = Pick<Session, "userId" | "projectPath" | "createdAt">;

export class SessionManager {
  private readonly logger = componentLogger("sessions");
  /** Ids with a turn in flight, and how many turns hold each. */
  private readonly retained = new Map<string, number>();

  constructor(
    private readonly store: SessionStore,
    private readonly options: SessionManagerOptions
  ) {}

  get timeoutMs(): number {
    return this.options.timeoutMs;
  }

  async getOrCreate(userId: number, directory: string, options: GetOrCreateOptions = {}): Promise<Session> {
    const projectPath = canonicalize(directory);
    const requested = options.sessionId ? parseSessionId(options.sessionId) : undefined;

    if (requested?.kind === "assigned") {
      const existing = await this.store.get(requested.value);
      if (existing) {
        if (existing.userId !== userId) {
          throw new SessionError(`Session ${requested.value} belongs to another user`);
        }
        this.logger.debug({ sessionId: requested.value, userId }, "Continuing requested session");
        return toSession(existing);
      }
      // The engine may know a conversation we never stored.
      const shell = blankRecord(requested.value, userId, projectPath);
      await this.store.create(shell);
      this.logger.info({ sessionId: requested.value, userId }, "Recorded unknown session for resumption");
      return toSession(shell);
    }

    if (!options.forceNew) {
      const resumable = await this.findResumable(userId, projectPath);
      if (resumable) {
        this.logger.debug({ sessionId: sessionIdString(resumable.id), userId }, "Auto-resuming session");
        return resumable;
      }
    }

    return this.createFresh(userId, projectPath);
  }

  async findResumable(userId: number, directory: string): Promise<Session | undefined> {
    const now = Date.now();
    const candidates = (await this.candidates(userId, directory)).filter(
      (r) => !isExpired(r, this.options.timeoutMs, now)
    );
    const best = candidates.sort(byRecency)[0];
    return best ? toSession(best) : undefined;
  }

  /** Like `findResumable`, but expired sessions still count. */
  async findLatest(userId: number, directory: string): Promise<Session | undefined> {
    const best = (await this.candidates(userId, directory)).sort(byRecency)[0];
    return best ? toSession(best) : undefined;
  }

  private async candidates(userId: number, directory: string): Promise<SessionRecord[]> {
    const projectPath = canonicalize(directory);
    const records = await this.store.listByUser(userId);
    return records.filter((r) => r.projectPath === projectPath && parseSessionId(r.id).kind === "assigned");
  }

  private async createFresh(userId: number, projectPath: string): Promise<Session> {
    await this.evictOverLimit(userId);
    const record = blankRecord(genPlaceholderId(), userId, projectPath);
    await this.store.create(record);
    this.logger.info({ sessionId: record.id, userId, projectPath }, "Created session");
    return toSession(record, true);
  }

  private async evictOverLimit(userId: number): Promise<void> {
    const limit = this.options.maxSessionsPerUser;
    if (limit === undefined || limit <= 0) return;
    const records = await this.store.listByUser(userId);
    const excess = records.length - limit + 1;
    if (excess <= 0) return;
    // Pending leftovers first, then the least recently used.
    const evictable = records.filter((r) => !this.isRetained(r.id)).sort(byRecency);
    const victims = [
      ...evictable.filter((r) => parseSessionId(r.id).kind === "pending").reverse(),
      ...evictable.filter((r) => parseSessionId(r.id).kind === "assigned").reverse(),
    ].slice(0, excess);
    if (victims.length < excess) {
      this.logger.debug(
        { userId, limit, inFlight: excess - victims.length },
        "Session limit exceeded by in-flight turns"
      );
    }
    for (const record of victims) {
      await this.store.delete(record.id);
      this.logger.info({ sessionId: record.id, userId }, "Evicted session over per-user limit");
    }
  }

  /**
   * Keep `id` out of eviction and expiry sweeps until the returned release runs.
   * Safe to release more than once.
   */
  retain(id: string): () => void {
    this.retained.set(id, (this.retained.get(id) ?? 0) + 1);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const count = (this.retained.get(id) ?? 1) - 1;
      if (count > 0) this.retained.set(id, count);
      else this.retained.delete(id);
    };
  }

  isRetained(id: string): boolean {
    return this.retained.has(id);
  }

  /**
   * Fold a finished turn into the session. Not idempotent: each call counts a turn.
   * A pending session is re-keyed under the engine's id the first time one comes back.
   * When the record is gone and `owner` is given, it is rebuilt rather than failing the turn.
   */
  async updateSession(id: SessionId, update: TurnUpdate, owner?: SessionOwner): Promise<Session> {
    const key = sessionIdString(id);
    let record = await this.store.get(key);
    if (!record) {
      if (!owner) throw new SessionError(`Session not found: ${key}`);
      this.logger.warn({ sessionId: key, userId: owner.userId }, "Session removed during turn, recreating");
      record = { ...blankRecord(key, owner.userId, owner.projectPath), createdAt: owner.createdAt };
    }

    const toolsUsed = { ...record.toolsUsed };
    for (const tool of update.toolsUsed) {
      toolsUsed[tool.name] = (toolsUsed[tool.name] ?? 0) + 1;
    }
    const next: SessionRecord = {
      ...record,
      messageCount: record.messageCount + 1,
      totalCost: record.totalCost + update.cost,
      toolsUsed,
      lastUsed: Date.now(),
    };

    const engineId = update.sessionId ? parseSessionId(update.sessionId) : undefined;
    if (id.kind === "pending" && engineId?.kind === "assigned") {
      next.id = engineId.value;
      await this.store.delete(key);
      this.logger.info({ placeholder: key, sessionId: next.id }, "Session assigned engine id");
    }
    if (!(await this.store.update(next))) await this.store.create(next);
    return toSession(next);
  }

  async removeSession(id: string): Promise<boolean> {
    const removed = await this.store.delete(id);
    if (removed) this.logger.info({ sessionId: id }, "Removed session");
    return removed;
  }

  async cleanupExpired(timeoutMs = this.options.timeoutMs): Promise<number> {
    const now = Date.now();
    let removed = 0;
    for (const record of await this.store.listAll()) {
      if (this.isRetained(record.id) || !isExpired(record, timeoutMs, now)) continue;
      if (await this.store.delete(record.id)) removed++;
    }
    if (removed > 0) this.logger.info({ removed }, "Cleaned up expired sessions");
    return removed;
  }

  async getSessionInfo(id: string): Promise<SessionInfo | undefined> {
    const record = await this.store.get(id);
    return record ? this.info(record, Date.now()) : undefined;
  }

  async listUserSessions(userId: number): Promise<SessionInfo[]> {
    const now = Date.now();
    const records = await this.store.listByUser(userId);
    return records.sort(byRecency).map((r) => this.info(r, now));
  }

  async getUserSessionSummary(userId: number): Promise<UserSessionSummary> {
    const sessions = await this.listUserSessions(userId);
    return {
      userId,
      totalSessions: sessions.length,
      activeSessions: sessions.filter((s) => !s.expired).length,
      totalCost: sessions.reduce((sum, s) => sum + s.totalCost, 0),
      totalMessages: sessions.reduce((sum, s) => sum + s.messageCount, 0),
      projects: [...new Set(sessions.map((s) => s.projectPath))],
    };
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  private info(record: SessionRecord, now: number): SessionInfo {
    return {
      sessionId: record.id,
      projectPath: record.projectPath,
      createdAt: record.createdAt,
      lastUsed: record.lastUsed,
      totalCost: record.totalCost,
      messageCount: record.messageCount,
      toolsUsed: { ...record.toolsUsed },
      expired: isExpired(record, this.options.timeoutMs, now),
    };
  }
}
