import { mkdirSync, mkdtempSync, realpathSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ExecutionResult, Executor } from "../../src/agent/types.js";
import { parseConfig } from "../../src/config.js";
import { createGateway } from "../../src/gateway/factory.js";
import type { AgentGateway } from "../../src/gateway/gateway.js";
import { createAdminApp } from "../../src/server/server.js";
import { createInMemorySessionStore } from "../../src/sessions/in-memory.js";

const TOKEN = "test-secret";
const auth = { headers: { Authorization: `Bearer ${TOKEN}` } };

const fixedExecutor: Executor = {
  async execute(): Promise<ExecutionResult> {
    return { content: "done", sessionId: "sess-1", cost: 0.1, durationMs: 5, numTurns: 1, toolsUsed: [] };
  },
};

describe("admin API", () => {
  let base: string;
  let app: string;
  let gateway: AgentGateway;

  beforeEach(async () => {
    base = realpathSync(mkdtempSync(path.join(tmpdir(), "toolgate-api-")));
    app = path.join(base, "app");
    mkdirSync(app);
    gateway = await createGateway(parseConfig({ approvedDirectory: base }), {
      executor: fixedExecutor,
      store: createInMemorySessionStore(),
    });
  });

  afterEach(() => {
    rmSync(base, { recursive: true, force: true });
  });

  it("serves health without a token", async () => {
    const res = await createAdminApp(gateway, { token: TOKEN }).request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, version: "0.1.0" });
  });

  it("requires the token on API routes", async () => {
    const server = createAdminApp(gateway, { token: TOKEN });
    expect((await server.request("/api/tools/stats")).status).toBe(401);
    expect((await server.request("/api/tools/stats", { headers: { Authorization: "Bearer wrong" } })).status).toBe(401);
    expect((await server.request("/api/tools/stats", auth)).status).toBe(200);
    expect((await server.request(`/api/tools/stats?token=${TOKEN}`)).status).toBe(200);
  });

  it("lists, inspects and removes sessions", async () => {
    await gateway.run("hi", 7, app);
    const server = createAdminApp(gateway);

    const list = await server.request("/api/users/7/sessions");
    expect(await list.json()).toMatchObject({ sessions: [{ sessionId: "sess-1", messageCount: 1, totalCost: 0.1 }] });

    const summary = await server.request("/api/users/7/summary");
    expect(await summary.json()).toMatchObject({ userId: 7, totalSessions: 1, projects: [app] });

    expect((await server.request("/api/sessions/sess-1")).status).toBe(200);
    const removed = await server.request("/api/sessions/sess-1", { method: "DELETE" });
    expect(await removed.json()).toEqual({ ok: true });
    expect((await server.request("/api/sessions/sess-1")).status).toBe(404);
    expect((await server.request("/api/sessions/sess-1", { method: "DELETE" })).status).toBe(404);
  });

  it("rejects non-integer user ids", async () => {
    const server = createAdminApp(gateway);
    expect((await server.request("/api/users/abc/summary")).status).toBe(400);
    expect((await server.request("/api/tools/violations?userId=1.5")).status).toBe(400);
  });

  it("reports tool statistics and violations", async () => {
    const server = createAdminApp(gateway);
    expect(await (await server.request("/api/tools/stats")).json()).toEqual({
      totalCalls: 0,
      byTool: {},
      uniqueTools: 0,
      securityViolations: 0,
    });
    expect(await (await server.request("/api/tools/violations?userId=7")).json()).toEqual({ violations: [] });
    expect(await (await server.request("/api/sessions/cleanup", { method: "POST" })).json()).toEqual({ removed: 0 });
  });
});
