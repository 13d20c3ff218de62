import { SessionError } from "../shared/errors.js";
import type { SessionStore } from "./store.js";
import type { SessionRecord } from "./types.js";

function copy(record: SessionRecord): SessionRecord {
  return { ...record, toolsUsed: { ...record.toolsUsed } };
}

export function createInMemorySessionStore(): SessionStore {
  const sessions = new Map<string, SessionRecord>();

  return {
    async create(record: SessionRecord): Promise<void> {
      if (sessions.has(record.id)) throw new SessionError(`Session already exists: ${record.id}`);
      sessions.set(record.id, copy(record));
    },

    async get(id: string): Promise<SessionRecord | undefined> {
      const record = sessions.get(id);
      return record ? copy(record) : undefined;
    },

    async update(record: SessionRecord): Promise<boolean> {
      if (!sessions.has(record.id)) return false;
      sessions.set(record.id, copy(record));
      return true;
    },

    async delete(id: string): Promise<boolean> {
      return sessions.delete(id);
    },

    async listByUser(userId: number): Promise<SessionRecord[]> {
      return [...sessions.values()].filter((s) => s.userId === userId).map(copy);
    },

    async listAll(): Promise<SessionRecord[]> {
      return [...sessions.values()].map(copy);
    },

    async close(): Promise<void> {
      sessions.clear();
    },
  };
}
