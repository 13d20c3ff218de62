import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  SERVER_FAILURE: 3,
  AGENT_FAILURE: 4,
  POLICY_VIOLATION: 5,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

export type GatewayErrorCode =
  | "timeout"
  | "process_failure"
  | "protocol_decode"
  | "stale_session"
  | "tool_validation"
  | "session";

/** Base for every fault the gateway raises or forwards from the execution engine. */
export class GatewayError extends Error {
  constructor(
    message: string,
    readonly code: GatewayErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GatewayError";
  }
}

/** The execution engine did not finish within its time budget. Never retried. */
export class ExecutionTimeoutError extends GatewayError {
  constructor(readonly timeoutMs: number, options?: { cause?: unknown }) {
    super(`Agent execution timed out after ${Math.round(timeoutMs / 1000)}s`, "timeout", options);
    this.name = "ExecutionTimeoutError";
  }
}

export class ProcessFailureError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "process_failure", options);
    this.name = "ProcessFailureError";
  }
}

export class ProtocolDecodeError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "protocol_decode", options);
    this.name = "ProtocolDecodeError";
  }
}

/** The engine no longer recognises the conversation we asked it to resume. */
export class StaleSessionError extends GatewayError {
  constructor(message: string, readonly sessionId?: string, options?: { cause?: unknown }) {
    super(message, "stale_session", options);
    this.name = "StaleSessionError";
  }
}

/** A critical tool call was blocked by policy; the turn was aborted. */
export class ToolValidationError extends GatewayError {
  readonly blockedTools: string[];
  readonly allowedTools: string[];

  constructor(message: string, blockedTools: string[], allowedTools: string[]) {
    super(message, "tool_validation");
    this.name = "ToolValidationError";
    this.blockedTools = [...blockedTools];
    this.allowedTools = [...allowedTools];
  }
}

export class SessionError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "session", options);
    this.name = "SessionError";
  }
}

const STALE_SESSION_MARKERS = ["no conversation found", "conversation not found"];

/**
 * True when the error means the engine lost the conversation. Engines report this
 * as free text, so anything carrying one of the markers counts.
 */
export function isStaleSessionError(err: unknown): boolean {
  if (err instanceof StaleSessionError) return true;
  const message = err instanceof Error ? err.message : typeof err === "string" ? err : "";
  const lower = message.toLowerCase();
  return STALE_SESSION_MARKERS.some((marker) => lower.includes(marker));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
