export type { SessionStore } from "./store.js";
export { createInMemorySessionStore } from "./in-memory.js";
export { createSqliteSessionStore } from "./sqlite.js";
export {
  SessionManager,
  type GetOrCreateOptions,
  type SessionInfo,
  type SessionManagerOptions,
  type TurnUpdate,
  type UserSessionSummary,
} from "./manager.js";
export {
  assignedValue,
  isExpired,
  parseSessionId,
  sessionIdString,
  type Session,
  type SessionId,
  type SessionRecord,
} from "./types.js";
