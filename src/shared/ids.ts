import { randomUUID } from "node:crypto";

export const PLACEHOLDER_PREFIX = "temp-";

/** Local stand-in id for a session the engine has not named yet. */
export function genPlaceholderId(): string {
  return `${PLACEHOLDER_PREFIX}${randomUUID()}`;
}

export function isPlaceholderId(id: string): boolean {
  return id.startsWith(PLACEHOLDER_PREFIX);
}
