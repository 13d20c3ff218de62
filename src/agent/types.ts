/** A tool invocation the engine announced. Validated, never persisted. */
export interface ToolCall {
  id?: string;
  name: string;
  input: Record<string, unknown>;
}

export type AgentEvent =
  | { type: "assistant"; text: string; toolCalls: ToolCall[] }
  | { type: "tool_results"; results: { toolUseId: string; isError: boolean }[] };

/** Throwing from the handler aborts the execution; the error propagates unchanged. */
export type AgentEventHandler = (event: AgentEvent) => void | Promise<void>;

export interface ExecutionRequest {
  prompt: string;
  workingDirectory: string;
  sessionId?: string;
  continueSession: boolean;
  signal?: AbortSignal;
}

export interface ToolUse {
  name: string;
  input: Record<string, unknown>;
}

export interface ExecutionResult {
  content: string;
  /** The engine's conversation id, or "" when it reported none. */
  sessionId: string;
  cost: number;
  durationMs: number;
  numTurns: number;
  toolsUsed: ToolUse[];
}

/**
 * The agent engine. Faults are `GatewayError` subclasses: timeout, process
 * failure, protocol decode, stale session.
 */
export interface Executor {
  execute(request: ExecutionRequest, onEvent?: AgentEventHandler): Promise<ExecutionResult>;
}
