import chalk from "chalk";
import { openSessionStore } from "../../gateway/factory.js";
import { SessionManager } from "../../sessions/manager.js";
import { formatTime, setupCli, writeJson, type CliContext, type GlobalOptions } from "../utils.js";

function openManager({ config }: CliContext): Promise<SessionManager> {
  if (!config.databasePath) {
    process.stderr.write(chalk.yellow("No databasePath configured; sessions are not persisted between runs.\n"));
  }
  return openSessionStore(config).then(
    (store) => new SessionManager(store, { timeoutMs: config.sessionTimeoutHours * 3_600_000 })
  );
}

export async function runSessions(opts: GlobalOptions & { user: number; json?: boolean }): Promise<void> {
  const manager = await openManager(await setupCli(opts));
  try {
    const sessions = await manager.listUserSessions(opts.user);
    if (opts.json) {
      writeJson({ sessions });
      return;
    }
    if (sessions.length === 0) {
      process.stdout.write("No sessions.\n");
      return;
    }
    process.stdout.write(chalk.bold(`Sessions for user ${opts.user}`) + "\n");
    for (const s of sessions) {
      const state = s.expired ? chalk.dim("expired") : chalk.green("active");
      process.stdout.write(
        `${s.sessionId}  ${state}  ${s.projectPath}  ${s.messageCount} msgs  $${s.totalCost.toFixed(4)}  last ${formatTime(s.lastUsed)}\n`
      );
    }
  } finally {
    await manager.close();
  }
}

export async function runCleanup(opts: GlobalOptions): Promise<void> {
  const manager = await openManager(await setupCli(opts));
  try {
    const removed = await manager.cleanupExpired();
    process.stdout.write(`Removed ${removed} expired session${removed === 1 ? "" : "s"}.\n`);
  } finally {
    await manager.close();
  }
}
