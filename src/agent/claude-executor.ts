import { query, type Options } from "@anthropic-ai/claude-agent-sdk";
import {
  ExecutionTimeoutError,
  GatewayError,
  ProcessFailureError,
  ProtocolDecodeError,
  StaleSessionError,
  errorMessage,
  isStaleSessionError,
} from "../shared/errors.js";
import { componentLogger } from "../shared/logging.js";
import { mapSdkMessage, type MappedMessage } from "./sdk-messages.js";
import type {
  AgentEvent,
  AgentEventHandler,
  ExecutionRequest,
  ExecutionResult,
  Executor,
  ToolUse,
} from "./types.js";

export interface ClaudeExecutorOptions {
  allowedTools: readonly string[];
  disallowedTools?: readonly string[];
  maxTurns: number;
  timeoutMs: number;
  model?: string;
}

function isDecodeFailure(err: unknown): boolean {
  if (err instanceof SyntaxError) return true;
  return /unexpected token|unexpected end of json|is not valid json|in json at position/i.test(errorMessage(err));
}

/** Runs agent turns through the Claude Agent SDK. */
export class ClaudeExecutor implements Executor {
  private readonly logger = componentLogger("claude");

  constructor(private readonly options: ClaudeExecutorOptions) {}

  async execute(request: ExecutionRequest, onEvent?: AgentEventHandler): Promise<ExecutionResult> {
    const started = Date.now();
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const forwardAbort = () => controller.abort();
    if (request.signal?.aborted) controller.abort();
    request.signal?.addEventListener("abort", forwardAbort, { once: true });

    const resume = request.continueSession ? request.sessionId : undefined;
    const sdkOptions: Options = {
      cwd: request.workingDirectory,
      allowedTools: [...this.options.allowedTools],
      disallowedTools: [...(this.options.disallowedTools ?? [])],
      maxTurns: this.options.maxTurns,
      abortController: controller,
      systemPrompt: `All file operations must stay within ${request.workingDirectory}. Use relative paths.`,
      ...(this.options.model ? { model: this.options.model } : {}),
      ...(resume ? { resume } : {}),
    };

    this.logger.info(
      { workingDirectory: request.workingDirectory, sessionId: request.sessionId, resume: Boolean(resume) },
      "Starting agent execution"
    );

    const texts: string[] = [];
    const toolsUsed: ToolUse[] = [];
    let turns = 0;
    let lastSessionId: string | undefined;
    let final: Extract<MappedMessage, { kind: "result" }> | undefined;
    let eventFailure: { error: unknown } | undefined;

    try {
      for await (const message of query({ prompt: request.prompt, options: sdkOptions })) {
        const mapped = mapSdkMessage(message);
        let event: AgentEvent | undefined;

        if (mapped.kind === "assistant") {
          turns++;
          lastSessionId = mapped.sessionId ?? lastSessionId;
          if (mapped.text) texts.push(mapped.text);
          for (const call of mapped.toolCalls) toolsUsed.push({ name: call.name, input: call.input });
          if (mapped.text || mapped.toolCalls.length > 0) {
            event = { type: "assistant", text: mapped.text, toolCalls: mapped.toolCalls };
          }
        } else if (mapped.kind === "tool_results") {
          turns++;
          if (mapped.results.length > 0) event = { type: "tool_results", results: mapped.results };
        } else if (mapped.kind === "result") {
          final = mapped;
        }

        if (event && onEvent) {
          try {
            await onEvent(event);
          } catch (err) {
            eventFailure = { error: err };
            break;
          }
        }
      }
    } catch (err) {
      throw this.toGatewayError(err, timedOut, request);
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", forwardAbort);
      if (eventFailure) controller.abort();
    }

    if (eventFailure) throw eventFailure.error;
    if (timedOut) throw new ExecutionTimeoutError(this.options.timeoutMs);
    if (!final) throw new ProtocolDecodeError("Agent stream ended without a result message");

    if (final.isError) {
      const detail = final.result ?? `Agent run ended with ${final.subtype}`;
      if (isStaleSessionError(detail)) throw new StaleSessionError(detail, request.sessionId);
      if (final.subtype === "error_during_execution") throw new ProcessFailureError(`Agent process error: ${detail}`);
      this.logger.warn({ subtype: final.subtype }, "Agent run ended early");
    }

    const result: ExecutionResult = {
      content: texts.join("\n"),
      sessionId: final.sessionId || lastSessionId || request.sessionId || "",
      cost: final.cost,
      durationMs: Date.now() - started,
      numTurns: final.numTurns ?? turns,
      toolsUsed,
    };
    this.logger.info(
      { sessionId: result.sessionId, cost: result.cost, durationMs: result.durationMs, numTurns: result.numTurns },
      "Agent execution finished"
    );
    return result;
  }

  private toGatewayError(err: unknown, timedOut: boolean, request: ExecutionRequest): GatewayError {
    if (err instanceof GatewayError) return err;
    if (timedOut) return new ExecutionTimeoutError(this.options.timeoutMs, { cause: err });
    if (request.signal?.aborted) return new ProcessFailureError("Agent execution cancelled", { cause: err });
    const message = errorMessage(err);
    if (isStaleSessionError(err)) return new StaleSessionError(message, request.sessionId, { cause: err });
    if (isDecodeFailure(err)) {
      return new ProtocolDecodeError(`Failed to decode agent response: ${message}`, { cause: err });
    }
    return new ProcessFailureError(`Agent process error: ${message}`, { cause: err });
  }
}
