import type { SessionRecord } from "./types.js";

/** Each call is atomic for a single row; nothing spans rows. */
export interface SessionStore {
  create(record: SessionRecord): Promise<void>;
  get(id: string): Promise<SessionRecord | undefined>;
  /** Returns false when no row has `record.id`. */
  update(record: SessionRecord): Promise<boolean>;
  delete(id: string): Promise<boolean>;
  listByUser(userId: number): Promise<SessionRecord[]>;
  listAll(): Promise<SessionRecord[]>;
  close(): Promise<void>;
}
