import type { Options } from "@anthropic-ai/claude-agent-sdk";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ClaudeExecutor } from "../../src/agent/claude-executor.js";
import type { AgentEvent, ExecutionRequest } from "../../src/agent/types.js";
import {
  ExecutionTimeoutError,
  ProcessFailureError,
  ProtocolDecodeError,
  StaleSessionError,
} from "../../src/shared/errors.js";

const queryMock = vi.hoisted(() => vi.fn<(args: { prompt: string; options?: Options }) => AsyncIterable<unknown>>());

vi.mock("@anthropic-ai/claude-agent-sdk", () => ({ query: queryMock }));

async function* stream(...messages: unknown[]): AsyncGenerator<unknown> {
  for (const message of messages) yield message;
}

async function* failing(err: Error, ...before: unknown[]): AsyncGenerator<unknown> {
  for (const message of before) yield message;
  throw err;
}

const assistant = (content: unknown[]) => ({ type: "assistant", session_id: "sess-1", message: { content } });
const success = (extra: Record<string, unknown> = {}) => ({
  type: "result",
  subtype: "success",
  session_id: "sess-1",
  total_cost_usd: 0.5,
  num_turns: 2,
  ...extra,
});

const request = (overrides: Partial<ExecutionRequest> = {}): ExecutionRequest => ({
  prompt: "fix it",
  workingDirectory: "/work/app",
  continueSession: false,
  ...overrides,
});

function executor(timeoutMs = 5_000) {
  return new ClaudeExecutor({ allowedTools: ["Read", "Bash"], maxTurns: 10, timeoutMs, model: "claude-test" });
}

function lastOptions(): Options | undefined {
  return queryMock.mock.calls.at(-1)?.[0].options;
}

describe("ClaudeExecutor", () => {
  beforeEach(() => {
    queryMock.mockReset();
  });

  it("collects text, tool use and the final result", async () => {
    queryMock.mockImplementation(() =>
      stream(
        { type: "system", subtype: "init" },
        assistant([
          { type: "text", text: "Reading" },
          { type: "tool_use", id: "tu-1", name: "Read", input: { file_path: "a.ts" } },
        ]),
        { type: "user", message: { content: [{ type: "tool_result", tool_use_id: "tu-1" }] } },
        assistant([{ type: "text", text: "Done" }]),
        success()
      )
    );
    const events: AgentEvent[] = [];

    const result = await executor().execute(request(), (event) => {
      events.push(event);
    });

    expect(result).toMatchObject({
      content: "Reading\nDone",
      sessionId: "sess-1",
      cost: 0.5,
      numTurns: 2,
      toolsUsed: [{ name: "Read", input: { file_path: "a.ts" } }],
    });
    expect(events).toEqual([
      {
        type: "assistant",
        text: "Reading",
        toolCalls: [{ id: "tu-1", name: "Read", input: { file_path: "a.ts" } }],
      },
      { type: "tool_results", results: [{ toolUseId: "tu-1", isError: false }] },
      { type: "assistant", text: "Done", toolCalls: [] },
    ]);
  });

  it("passes sandbox options and resumes only when continuing", async () => {
    queryMock.mockImplementation(() => stream(success()));
    await executor().execute(request({ sessionId: "sess-1", continueSession: true }));
    expect(queryMock.mock.calls[0]?.[0].prompt).toBe("fix it");
    expect(lastOptions()).toMatchObject({
      cwd: "/work/app",
      allowedTools: ["Read", "Bash"],
      disallowedTools: [],
      maxTurns: 10,
      model: "claude-test",
      resume: "sess-1",
      systemPrompt: "All file operations must stay within /work/app. Use relative paths.",
    });

    await executor().execute(request({ sessionId: "sess-1", continueSession: false }));
    expect(lastOptions()?.resume).toBeUndefined();
  });

  it("falls back to the counted turns and the requested id", async () => {
    queryMock.mockImplementation(() =>
      stream(
        { type: "assistant", message: { content: [{ type: "text", text: "hi" }] } },
        { type: "result", subtype: "success", session_id: "" }
      )
    );
    const result = await executor().execute(request({ sessionId: "sess-7", continueSession: true }));
    expect(result).toMatchObject({ sessionId: "sess-7", numTurns: 1, cost: 0 });
  });

  it("rethrows handler errors unchanged and aborts the engine", async () => {
    queryMock.mockImplementation(() => stream(assistant([{ type: "text", text: "one" }]), success()));
    const blocked = new Error("blocked by policy");

    await expect(
      executor().execute(request(), () => {
        throw blocked;
      })
    ).rejects.toBe(blocked);
    expect(lastOptions()?.abortController?.signal.aborted).toBe(true);
  });

  it("classifies a lost conversation as stale", async () => {
    queryMock.mockImplementation(() => failing(new Error("No conversation found with session ID: sess-1")));
    const run = executor().execute(request({ sessionId: "sess-1", continueSession: true }));
    await expect(run).rejects.toBeInstanceOf(StaleSessionError);
  });

  it("classifies a stale error result as stale", async () => {
    queryMock.mockImplementation(() =>
      stream(success({ subtype: "error_during_execution", is_error: true, result: "Conversation not found" }))
    );
    await expect(executor().execute(request())).rejects.toBeInstanceOf(StaleSessionError);
  });

  it("reports a failed execution result as a process failure", async () => {
    queryMock.mockImplementation(() =>
      stream(success({ subtype: "error_during_execution", is_error: true, result: "exit code 1" }))
    );
    await expect(executor().execute(request())).rejects.toThrow(
      new ProcessFailureError("Agent process error: exit code 1")
    );
  });

  it("classifies malformed output as a decode failure", async () => {
    queryMock.mockImplementation(() => failing(new SyntaxError("Unexpected token < in JSON at position 0")));
    const err = await executor()
      .execute(request())
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProtocolDecodeError);
    expect(err).toHaveProperty("message", "Failed to decode agent response: Unexpected token < in JSON at position 0");
  });

  it("wraps other failures as process failures", async () => {
    queryMock.mockImplementation(() => failing(new Error("spawn claude ENOENT")));
    const err = await executor()
      .execute(request())
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProcessFailureError);
    expect(err).toHaveProperty("message", "Agent process error: spawn claude ENOENT");
  });

  it("recognises JSON parse wording on plain errors", async () => {
    queryMock.mockImplementation(() => failing(new Error("Unexpected end of JSON input")));
    await expect(executor().execute(request())).rejects.toBeInstanceOf(ProtocolDecodeError);
  });

  it("does not mistake a missing package.json for a decode failure", async () => {
    queryMock.mockImplementation(() => failing(new Error("ENOENT: no such file, open '/work/app/package.json'")));
    const err = await executor()
      .execute(request())
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProcessFailureError);
    expect(err).toHaveProperty("message", "Agent process error: ENOENT: no such file, open '/work/app/package.json'");
  });

  it("fails when the stream ends without a result", async () => {
    queryMock.mockImplementation(() => stream(assistant([{ type: "text", text: "partial" }])));
    await expect(executor().execute(request())).rejects.toThrow(
      new ProtocolDecodeError("Agent stream ended without a result message")
    );
  });

  it("reports a cancelled execution", async () => {
    queryMock.mockImplementation(() => failing(new Error("Operation aborted")));
    const controller = new AbortController();
    controller.abort();
    await expect(executor().execute(request({ signal: controller.signal }))).rejects.toThrow(
      "Agent execution cancelled"
    );
  });

  it("times out a run that never finishes", async () => {
    queryMock.mockImplementation(({ options }) => ({
      async *[Symbol.asyncIterator]() {
        const signal = options?.abortController?.signal;
        await new Promise<void>((resolve) => signal?.addEventListener("abort", () => resolve(), { once: true }));
        throw new Error("Operation aborted");
      },
    }));
    await expect(executor(20).execute(request())).rejects.toBeInstanceOf(ExecutionTimeoutError);
  });
});
