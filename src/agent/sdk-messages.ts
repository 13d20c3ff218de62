import { type } from "arktype";
import type { ToolCall } from "./types.js";

const TextBlock = type({ type: "'text'", text: "string" });

const ToolUseBlock = type({
  type: "'tool_use'",
  id: "string",
  name: "string",
  input: { "[string]": "unknown" },
});

const ToolResultBlock = type({
  type: "'tool_result'",
  tool_use_id: "string",
  "is_error?": "boolean",
});

const AssistantMessage = type({
  type: "'assistant'",
  message: { content: "unknown[]" },
  "session_id?": "string",
});

const UserMessage = type({
  type: "'user'",
  message: { content: "unknown" },
});

const ResultMessage = type({
  type: "'result'",
  subtype: "string",
  session_id: "string",
  "is_error?": "boolean",
  "total_cost_usd?": "number",
  "num_turns?": "number",
  "duration_ms?": "number",
  "result?": "string",
});

const AnyMessage = type({ type: "string" });

export type MappedMessage =
  | { kind: "assistant"; sessionId?: string; text: string; toolCalls: ToolCall[] }
  | { kind: "tool_results"; results: { toolUseId: string; isError: boolean }[] }
  | {
      kind: "result";
      sessionId: string;
      subtype: string;
      isError: boolean;
      cost: number;
      numTurns?: number;
      durationMs?: number;
      result?: string;
    }
  | { kind: "other"; type: string };

/**
 * Narrow a raw SDK stream message to the fields the executor reads.
 * Unknown content blocks (thinking, images) are skipped.
 */
export function mapSdkMessage(message: unknown): MappedMessage {
  const assistant = AssistantMessage(message);
  if (!(assistant instanceof type.errors)) {
    const texts: string[] = [];
    const toolCalls: ToolCall[] = [];
    for (const block of assistant.message.content) {
      const text = TextBlock(block);
      if (!(text instanceof type.errors)) {
        texts.push(text.text);
        continue;
      }
      const tool = ToolUseBlock(block);
      if (!(tool instanceof type.errors)) {
        toolCalls.push({ id: tool.id, name: tool.name, input: tool.input });
      }
    }
    return { kind: "assistant", sessionId: assistant.session_id, text: texts.join("\n"), toolCalls };
  }

  const user = UserMessage(message);
  if (!(user instanceof type.errors)) {
    const blocks = Array.isArray(user.message.content) ? user.message.content : [];
    const results: { toolUseId: string; isError: boolean }[] = [];
    for (const block of blocks) {
      const out = ToolResultBlock(block);
      if (!(out instanceof type.errors)) results.push({ toolUseId: out.tool_use_id, isError: out.is_error ?? false });
    }
    return { kind: "tool_results", results };
  }

  const result = ResultMessage(message);
  if (!(result instanceof type.errors)) {
    return {
      kind: "result",
      sessionId: result.session_id,
      subtype: result.subtype,
      isError: result.is_error ?? result.subtype !== "success",
      cost: result.total_cost_usd ?? 0,
      numTurns: result.num_turns,
      durationMs: result.duration_ms,
      result: result.result,
    };
  }

  const any = AnyMessage(message);
  return { kind: "other", type: any instanceof type.errors ? "unknown" : any.type };
}
