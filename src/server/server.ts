import { serve } from "@hono/node-server";
import { Hono } from "hono";
import type { AgentGateway } from "../gateway/gateway.js";
import { VERSION } from "../shared/constants.js";
import { componentLogger } from "../shared/logging.js";

export interface AdminAppOptions {
  /** When set, every /api route needs `Authorization: Bearer <token>` or `?token=`. */
  token?: string;
}

export interface AdminServeOptions extends AdminAppOptions {
  host: string;
  port: number;
}

export interface ServerHandle {
  port: number;
  host: string;
  close: () => Promise<void>;
}

function parseUserId(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^-?\d+$/.test(raw)) return undefined;
  return Number(raw);
}

/** Read-mostly audit API over a gateway's sessions and tool statistics. */
export function createAdminApp(gateway: AgentGateway, options: AdminAppOptions = {}): Hono {
  const app = new Hono();

  app.get("/health", (c) => c.json({ ok: true, version: VERSION }));

  if (options.token) {
    const expected = options.token;
    app.use("/api/*", async (c, next) => {
      const auth = c.req.header("authorization");
      const token = typeof auth === "string" && auth.startsWith("Bearer ") ? auth.slice(7) : c.req.query("token");
      if (token !== expected) {
        return c.json({ error: "Unauthorized" }, 401);
      }
      await next();
    });
  }

  app.get("/api/users/:userId/sessions", async (c) => {
    const userId = parseUserId(c.req.param("userId"));
    if (userId === undefined) return c.json({ error: "userId must be an integer" }, 400);
    return c.json({ sessions: await gateway.getUserSessions(userId) });
  });

  app.get("/api/users/:userId/summary", async (c) => {
    const userId = parseUserId(c.req.param("userId"));
    if (userId === undefined) return c.json({ error: "userId must be an integer" }, 400);
    return c.json(await gateway.getUserSummary(userId));
  });

  app.get("/api/sessions/:id", async (c) => {
    const info = await gateway.getSessionInfo(c.req.param("id"));
    if (!info) return c.json({ error: "Session not found" }, 404);
    return c.json(info);
  });

  app.delete("/api/sessions/:id", async (c) => {
    const removed = await gateway.removeSession(c.req.param("id"));
    if (!removed) return c.json({ error: "Session not found" }, 404);
    return c.json({ ok: true });
  });

  app.post("/api/sessions/cleanup", async (c) => {
    return c.json({ removed: await gateway.cleanupExpiredSessions() });
  });

  app.get("/api/tools/stats", (c) => c.json(gateway.getToolStats()));

  app.get("/api/tools/violations", (c) => {
    const raw = c.req.query("userId");
    const userId = parseUserId(raw);
    if (raw !== undefined && userId === undefined) return c.json({ error: "userId must be an integer" }, 400);
    return c.json({ violations: gateway.getSecurityViolations(userId) });
  });

  return app;
}

export async function startAdminServer(gateway: AgentGateway, options: AdminServeOptions): Promise<ServerHandle> {
  const app = createAdminApp(gateway, { token: options.token });
  const nodeServer = serve({
    fetch: app.fetch,
    port: options.port,
    hostname: options.host,
  });
  componentLogger("admin").info({ host: options.host, port: options.port }, "Admin API listening");

  return {
    port: options.port,
    host: options.host,
    close: () =>
      new Promise((resolve, reject) => {
        nodeServer.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
