export { ClaudeExecutor, type ClaudeExecutorOptions } from "./claude-executor.js";
export { mapSdkMessage, type MappedMessage } from "./sdk-messages.js";
export type {
  AgentEvent,
  AgentEventHandler,
  ExecutionRequest,
  ExecutionResult,
  Executor,
  ToolCall,
  ToolUse,
} from "./types.js";
