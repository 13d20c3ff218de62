/**
 * SQLite session store backed by better-sqlite3, loaded on first use so the
 * in-memory store works without the native module.
 */

import { type } from "arktype";
import { SessionError } from "../shared/errors.js";
import type { SessionStore } from "./store.js";
import type { SessionRecord } from "./types.js";

const ToolsUsedSchema = type({ "[string]": "number" });

interface SessionRow {
  id: string;
  userId: number;
  projectPath: string;
  createdAt: number;
  lastUsed: number;
  totalCost: number;
  messageCount: number;
  toolsUsed: string;
}

function parseToolsUsed(raw: string, id: string): Record<string, number> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new SessionError(`Corrupt toolsUsed column for session ${id}`, { cause: err });
  }
  const out = ToolsUsedSchema(parsed);
  if (out instanceof type.errors) {
    throw new SessionError(`Invalid toolsUsed for session ${id}: ${out.summary}`);
  }
  return out;
}

function rowToRecord(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    userId: row.userId,
    projectPath: row.projectPath,
    createdAt: row.createdAt,
    lastUsed: row.lastUsed,
    totalCost: row.totalCost,
    messageCount: row.messageCount,
    toolsUsed: parseToolsUsed(row.toolsUsed, row.id),
  };
}

function recordToParams(record: SessionRecord): SessionRow {
  return { ...record, toolsUsed: JSON.stringify(record.toolsUsed) };
}

const COLUMNS = "id, userId, projectPath, createdAt, lastUsed, totalCost, messageCount, toolsUsed";

export async function createSqliteSessionStore(dbPath: string): Promise<SessionStore> {
  const Database = (await import("better-sqlite3")).default;
  const db = new Database(dbPath);

  db.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      userId INTEGER NOT NULL,
      projectPath TEXT NOT NULL,
      createdAt INTEGER NOT NULL,
      lastUsed INTEGER NOT NULL,
      totalCost REAL NOT NULL DEFAULT 0,
      messageCount INTEGER NOT NULL DEFAULT 0,
      toolsUsed TEXT NOT NULL DEFAULT '{}'
    );
    CREATE INDEX IF NOT EXISTS idx_sessions_user ON sessions(userId, projectPath);
  `);

  const insert = db.prepare<SessionRow>(
    `INSERT INTO sessions (${COLUMNS})
     VALUES (@id, @userId, @projectPath, @createdAt, @lastUsed, @totalCost, @messageCount, @toolsUsed)`
  );
  const selectOne = db.prepare<{ id: string }, SessionRow>(`SELECT ${COLUMNS} FROM sessions WHERE id = @id`);
  const selectByUser = db.prepare<{ userId: number }, SessionRow>(
    `SELECT ${COLUMNS} FROM sessions WHERE userId = @userId ORDER BY lastUsed DESC`
  );
  const selectAll = db.prepare<[], SessionRow>(`SELECT ${COLUMNS} FROM sessions ORDER BY lastUsed DESC`);
  const updateOne = db.prepare<SessionRow>(
    `UPDATE sessions SET userId = @userId, projectPath = @projectPath, createdAt = @createdAt,
       lastUsed = @lastUsed, totalCost = @totalCost, messageCount = @messageCount, toolsUsed = @toolsUsed
     WHERE id = @id`
  );
  const deleteOne = db.prepare<{ id: string }>("DELETE FROM sessions WHERE id = @id");

  return {
    async create(record: SessionRecord): Promise<void> {
      if (selectOne.get({ id: record.id })) throw new SessionError(`Session already exists: ${record.id}`);
      insert.run(recordToParams(record));
    },

    async get(id: string): Promise<SessionRecord | undefined> {
      const row = selectOne.get({ id });
      return row ? rowToRecord(row) : undefined;
    },

    async update(record: SessionRecord): Promise<boolean> {
      return updateOne.run(recordToParams(record)).changes > 0;
    },

    async delete(id: string): Promise<boolean> {
      return deleteOne.run({ id }).changes > 0;
    },

    async listByUser(userId: number): Promise<SessionRecord[]> {
      return selectByUser.all({ userId }).map(rowToRecord);
    },

    async listAll(): Promise<SessionRecord[]> {
      return selectAll.all().map(rowToRecord);
    },

    async close(): Promise<void> {
      db.close();
    },
  };
}
