import { mkdirSync, mkdtempSync, realpathSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createInMemorySessionStore } from "../../src/sessions/in-memory.js";
import { SessionManager } from "../../src/sessions/manager.js";
import type { SessionStore } from "../../src/sessions/store.js";
import { sessionIdString, type Session } from "../../src/sessions/types.js";
import { SessionError } from "../../src/shared/errors.js";

const HOUR = 3_600_000;
const T0 = new Date("2026-01-10T12:00:00Z").getTime();

describe("SessionManager", () => {
  let base: string;
  let dir: string;
  let store: SessionStore;
  let manager: SessionManager;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(T0);
    base = realpathSync(mkdtempSync(path.join(tmpdir(), "toolgate-sm-")));
    dir = path.join(base, "app");
    mkdirSync(dir);
    store = createInMemorySessionStore();
    manager = new SessionManager(store, { timeoutMs: HOUR });
  });

  afterEach(() => {
    vi.useRealTimers();
    rmSync(base, { recursive: true, force: true });
  });

  /** Create a session and give it an engine id, as a finished first turn would. */
  async function assigned(engineId: string, userId = 1): Promise<Session> {
    const created = await manager.getOrCreate(userId, dir, { forceNew: true });
    return manager.updateSession(created.id, { sessionId: engineId, cost: 0, toolsUsed: [] });
  }

  it("creates a pending session when nothing matches", async () => {
    const session = await manager.getOrCreate(1, dir);
    expect(session.id.kind).toBe("pending");
    expect(sessionIdString(session.id)).toMatch(/^temp-/);
    expect(session.isNewSession).toBe(true);
    expect(session.projectPath).toBe(dir);
    expect(await store.get(sessionIdString(session.id))).toMatchObject({ userId: 1, messageCount: 0 });
  });

  it("never resumes a pending session", async () => {
    const first = await manager.getOrCreate(1, dir);
    expect(await manager.findResumable(1, dir)).toBeUndefined();
    const second = await manager.getOrCreate(1, dir);
    expect(sessionIdString(second.id)).not.toBe(sessionIdString(first.id));
    expect(second.isNewSession).toBe(true);
  });

  it("re-keys a pending session under the engine id and folds in the turn", async () => {
    const created = await manager.getOrCreate(1, dir);
    vi.setSystemTime(T0 + 1_000);
    const updated = await manager.updateSession(created.id, {
      sessionId: "sess-A",
      cost: 0.5,
      toolsUsed: [{ name: "Read" }, { name: "Read" }, { name: "Bash" }],
    });

    expect(updated.id).toEqual({ kind: "assigned", value: "sess-A" });
    expect(updated).toMatchObject({
      messageCount: 1,
      totalCost: 0.5,
      toolsUsed: { Read: 2, Bash: 1 },
      lastUsed: T0 + 1_000,
      createdAt: T0,
      isNewSession: false,
    });
    expect(await store.get(sessionIdString(created.id))).toBeUndefined();
    expect(await store.get("sess-A")).toMatchObject({ messageCount: 1 });
  });

  it("keeps an assigned id even when the engine reports another", async () => {
    const session = await assigned("sess-A");
    const again = await manager.updateSession(session.id, { sessionId: "sess-B", cost: 0, toolsUsed: [] });
    expect(again.id).toEqual({ kind: "assigned", value: "sess-A" });
    expect(await store.get("sess-B")).toBeUndefined();
  });

  it("double-counts when a turn is applied twice", async () => {
    const session = await assigned("sess-A");
    const turn = { cost: 0.25, toolsUsed: [{ name: "Read" }] };
    await manager.updateSession(session.id, turn);
    const twice = await manager.updateSession(session.id, turn);
    expect(twice).toMatchObject({ messageCount: 3, totalCost: 0.5, toolsUsed: { Read: 2 } });
  });

  it("rejects updates for unknown sessions", async () => {
    await expect(
      manager.updateSession({ kind: "assigned", value: "nope" }, { cost: 0, toolsUsed: [] })
    ).rejects.toBeInstanceOf(SessionError);
  });

  it("resumes the same session on repeated calls", async () => {
    await assigned("sess-A");
    const a = await manager.getOrCreate(1, dir);
    const b = await manager.getOrCreate(1, dir);
    expect(a.id).toEqual({ kind: "assigned", value: "sess-A" });
    expect(b.id).toEqual(a.id);
    expect(a.isNewSession).toBe(false);
  });

  it("only resumes sessions of the same user and directory", async () => {
    await assigned("sess-A", 1);
    expect(await manager.findResumable(2, dir)).toBeUndefined();
    expect(await manager.findResumable(1, base)).toBeUndefined();
  });

  it("picks the most recently used, then the later created, then the larger id", async () => {
    const row = { userId: 1, projectPath: dir, totalCost: 0, messageCount: 1, toolsUsed: {} };
    await store.create({ ...row, id: "sess-old", createdAt: T0, lastUsed: T0 + 10 });
    await store.create({ ...row, id: "sess-recent", createdAt: T0, lastUsed: T0 + 20 });
    expect((await manager.findResumable(1, dir))?.id).toEqual({ kind: "assigned", value: "sess-recent" });

    await store.create({ ...row, id: "sess-later", createdAt: T0 + 5, lastUsed: T0 + 20 });
    expect((await manager.findResumable(1, dir))?.id).toEqual({ kind: "assigned", value: "sess-later" });

    await store.create({ ...row, id: "sess-m", createdAt: T0 + 5, lastUsed: T0 + 20 });
    expect((await manager.findResumable(1, dir))?.id).toEqual({ kind: "assigned", value: "sess-m" });
  });

  it("does not auto-resume expired sessions but can still find them", async () => {
    await assigned("sess-A");
    vi.setSystemTime(T0 + 2 * HOUR);
    expect(await manager.findResumable(1, dir)).toBeUndefined();
    expect((await manager.findLatest(1, dir))?.id).toEqual({ kind: "assigned", value: "sess-A" });
    const fresh = await manager.getOrCreate(1, dir);
    expect(fresh.id.kind).toBe("pending");
  });

  it("continues an explicitly requested session even when expired", async () => {
    await assigned("sess-A");
    vi.setSystemTime(T0 + 2 * HOUR);
    const session = await manager.getOrCreate(1, dir, { sessionId: "sess-A" });
    expect(session.id).toEqual({ kind: "assigned", value: "sess-A" });
    expect(session.isNewSession).toBe(false);
  });

  it("records a shell for an unknown requested id", async () => {
    const session = await manager.getOrCreate(1, dir, { sessionId: "sess-external" });
    expect(session.id).toEqual({ kind: "assigned", value: "sess-external" });
    expect(session.isNewSession).toBe(false);
    expect(await store.get("sess-external")).toMatchObject({ userId: 1, projectPath: dir, messageCount: 0 });
  });

  it("refuses a requested id owned by another user", async () => {
    await assigned("sess-A", 1);
    await expect(manager.getOrCreate(2, dir, { sessionId: "sess-A" })).rejects.toBeInstanceOf(SessionError);
  });

  it("ignores a requested placeholder id", async () => {
    await assigned("sess-A");
    const session = await manager.getOrCreate(1, dir, { sessionId: "temp-1234" });
    expect(session.id).toEqual({ kind: "assigned", value: "sess-A" });
  });

  it("creates a new session when forced", async () => {
    await assigned("sess-A");
    const session = await manager.getOrCreate(1, dir, { forceNew: true });
    expect(session.id.kind).toBe("pending");
    expect(session.isNewSession).toBe(true);
  });

  it("evicts the least recently used sessions over the per-user limit", async () => {
    manager = new SessionManager(store, { timeoutMs: HOUR, maxSessionsPerUser: 2 });
    await assigned("sess-1");
    vi.setSystemTime(T0 + 1_000);
    await assigned("sess-2");
    vi.setSystemTime(T0 + 2_000);
    const third = await manager.getOrCreate(1, dir, { forceNew: true });

    const ids = (await store.listByUser(1)).map((r) => r.id).sort();
    expect(ids).toEqual(["sess-2", sessionIdString(third.id)].sort());
  });

  it("evicts unnamed sessions before resumable ones", async () => {
    manager = new SessionManager(store, { timeoutMs: HOUR, maxSessionsPerUser: 2 });
    await assigned("sess-1");
    vi.setSystemTime(T0 + 1_000);
    const orphan = await manager.getOrCreate(1, dir, { forceNew: true });
    vi.setSystemTime(T0 + 2_000);
    const third = await manager.getOrCreate(1, dir, { forceNew: true });

    expect(await store.get(sessionIdString(orphan.id))).toBeUndefined();
    const ids = (await store.listByUser(1)).map((r) => r.id).sort();
    expect(ids).toEqual(["sess-1", sessionIdString(third.id)].sort());
  });

  it("leaves retained sessions to their turn when evicting and sweeping", async () => {
    manager = new SessionManager(store, { timeoutMs: HOUR, maxSessionsPerUser: 1 });
    await assigned("sess-1");
    const releaseFirst = manager.retain("sess-1");
    const releaseSecond = manager.retain("sess-1");
    await manager.getOrCreate(1, dir, { forceNew: true });
    expect(await store.get("sess-1")).toBeDefined();

    vi.setSystemTime(T0 + 2 * HOUR);
    expect(await manager.cleanupExpired()).toBe(1);
    expect(await store.get("sess-1")).toBeDefined();

    releaseFirst();
    releaseFirst();
    expect(manager.isRetained("sess-1")).toBe(true);
    releaseSecond();
    expect(manager.isRetained("sess-1")).toBe(false);
    expect(await manager.cleanupExpired()).toBe(1);
  });

  it("rebuilds a record that vanished mid-turn only when the owner is known", async () => {
    const created = await manager.getOrCreate(1, dir);
    await store.delete(sessionIdString(created.id));
    const update = { sessionId: "sess-9", cost: 0.5, toolsUsed: [] };

    await expect(manager.updateSession(created.id, update)).rejects.toThrow(SessionError);
    const saved = await manager.updateSession(created.id, update, created);

    expect(saved.id).toEqual({ kind: "assigned", value: "sess-9" });
    expect(await store.get("sess-9")).toMatchObject({
      userId: 1,
      projectPath: dir,
      createdAt: T0,
      messageCount: 1,
      totalCost: 0.5,
    });
  });

  it("sweeps expired sessions", async () => {
    await assigned("sess-A");
    vi.setSystemTime(T0 + 30 * 60_000);
    await assigned("sess-B");
    vi.setSystemTime(T0 + 70 * 60_000);
    expect(await manager.cleanupExpired()).toBe(1);
    expect(await store.get("sess-A")).toBeUndefined();
    expect(await manager.cleanupExpired(10 * 60_000)).toBe(1);
  });

  it("removes sessions by id", async () => {
    await assigned("sess-A");
    expect(await manager.removeSession("sess-A")).toBe(true);
    expect(await manager.removeSession("sess-A")).toBe(false);
  });

  it("reports per-session info and a user summary", async () => {
    const a = await assigned("sess-A");
    await manager.updateSession(a.id, { cost: 0.25, toolsUsed: [{ name: "Read" }] });
    vi.setSystemTime(T0 + 2 * HOUR);
    await assigned("sess-B");

    const list = await manager.listUserSessions(1);
    expect(list.map((s) => [s.sessionId, s.expired])).toEqual([
      ["sess-B", false],
      ["sess-A", true],
    ]);
    expect(await manager.getSessionInfo("sess-A")).toEqual({
      sessionId: "sess-A",
      projectPath: dir,
      createdAt: T0,
      lastUsed: T0,
      totalCost: 0.25,
      messageCount: 2,
      toolsUsed: { Read: 1 },
      expired: true,
    });
    expect(await manager.getUserSessionSummary(1)).toEqual({
      userId: 1,
      totalSessions: 2,
      activeSessions: 1,
      totalCost: 0.25,
      totalMessages: 3,
      projects: [dir],
    });
  });
});
