import { isPlaceholderId } from "../shared/ids.js";

/**
 * A session is named by a local placeholder until the engine issues its own id.
 * Only `assigned` ids can be handed back to the engine for resumption.
 */
export type SessionId =
  | { kind: "pending"; placeholder: string }
  | { kind: "assigned"; value: string };

export function parseSessionId(raw: string): SessionId {
  return isPlaceholderId(raw) ? { kind: "pending", placeholder: raw } : { kind: "assigned", value: raw };
}

export function sessionIdString(id: SessionId): string {
  return id.kind === "pending" ? id.placeholder : id.value;
}

export function assignedValue(id: SessionId): string | undefined {
  return id.kind === "assigned" ? id.value : undefined;
}

/** Persisted row shape. */
export interface SessionRecord {
  id: string;
  userId: number;
  projectPath: string;
  createdAt: number;
  lastUsed: number;
  totalCost: number;
  messageCount: number;
  toolsUsed: Record<string, number>;
}

export interface Session extends Omit<SessionRecord, "id"> {
  id: SessionId;
  /** True only on the instance `getOrCreate` just created. Never persisted. */
  isNewSession: boolean;
}

export function toSession(record: SessionRecord, isNewSession = false): Session {
  return {
    ...record,
    id: parseSessionId(record.id),
    toolsUsed: { ...record.toolsUsed },
    isNewSession,
  };
}

export function isExpired(session: Pick<SessionRecord, "lastUsed">, timeoutMs: number, now = Date.now()): boolean {
  return now - session.lastUsed > timeoutMs;
}
