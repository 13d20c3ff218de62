import type { AgentEventHandler, ExecutionResult, Executor, ToolUse } from "../agent/types.js";
import { canonicalize } from "../security/path-boundary.js";
import type { ToolStats, ToolValidator, UserToolUsage, ViolationRecord } from "../security/validator.js";
import type { SessionInfo, SessionManager, UserSessionSummary } from "../sessions/manager.js";
import { assignedValue, sessionIdString, type Session } from "../sessions/types.js";
import { DEFAULT_CONTINUE_PROMPT, DEFAULT_CRITICAL_TOOLS } from "../shared/constants.js";
import { ProcessFailureError, ToolValidationError, errorMessage, isStaleSessionError } from "../shared/errors.js";
import { isPlaceholderId } from "../shared/ids.js";
import { componentLogger } from "../shared/logging.js";
import { KeyedMutex } from "../shared/mutex.js";
import { passthroughEnricher, type PromptEnricher } from "./enricher.js";
import { softFailureContent, toolBlockedErrorMessage } from "./messages.js";

export interface AgentGatewayOptions {
  executor: Executor;
  sessions: SessionManager;
  validator: ToolValidator;
  enricher?: PromptEnricher;
  /** A blocked call to one of these aborts the turn. */
  criticalTools?: readonly string[];
}

export interface RunOptions {
  sessionId?: string;
  forceNew?: boolean;
  signal?: AbortSignal;
  /** Called after validation for every engine event. Errors are logged, not raised. */
  onStream?: AgentEventHandler;
}

export interface AgentResponse {
  content: string;
  /** Resumable engine id, or "" when the engine never named the conversation. */
  sessionId: string;
  cost: number;
  durationMs: number;
  numTurns: number;
  isError: boolean;
  errorType?: "tool_validation_failed";
  toolsUsed: ToolUse[];
}

export type UserSummary = UserSessionSummary & UserToolUsage;

/** Tool calls blocked during one execution attempt without aborting it. */
interface SoftFailures {
  blocked: Set<string>;
  denied: Set<string>;
  reasons: string[];
}

function newSoftFailures(): SoftFailures {
  return { blocked: new Set(), denied: new Set(), reasons: [] };
}

interface Attempt {
  result: ExecutionResult;
  failures: SoftFailures;
}

/**
 * Front door for agent turns: resolves the session, runs the engine with every
 * tool call validated, recovers once from a stale remote session, and folds the
 * result back into the session.
 */
export class AgentGateway {
  private readonly logger = componentLogger("gateway");
  private readonly executor: Executor;
  private readonly sessions: SessionManager;
  private readonly validator: ToolValidator;
  private readonly enricher: PromptEnricher;
  private readonly criticalTools: ReadonlySet<string>;
  private readonly locks = new KeyedMutex();
  private readonly inFlight = new Set<AbortController>();

  constructor(options: AgentGatewayOptions) {
    this.executor = options.executor;
    this.sessions = options.sessions;
    this.validator = options.validator;
    this.enricher = options.enricher ?? passthroughEnricher;
    this.criticalTools = new Set(options.criticalTools ?? DEFAULT_CRITICAL_TOOLS);
  }

  async run(prompt: string, userId: number, directory: string, options: RunOptions = {}): Promise<AgentResponse> {
    const projectPath = canonicalize(directory);
    return this.locks.runExclusive(`${userId}:${projectPath}`, () =>
      this.runLocked(prompt, userId, projectPath, options)
    );
  }

  private async runLocked(
    prompt: string,
    userId: number,
    projectPath: string,
    options: RunOptions
  ): Promise<AgentResponse> {
    const requested = options.sessionId && !isPlaceholderId(options.sessionId) ? options.sessionId : undefined;
    this.logger.info(
      { userId, projectPath, sessionId: requested, promptLength: prompt.length, forceNew: Boolean(options.forceNew) },
      "Running agent turn"
    );

    let session = await this.sessions.getOrCreate(userId, projectPath, {
      sessionId: requested,
      forceNew: options.forceNew,
    });
    let release = this.sessions.retain(sessionIdString(session.id));
    const cancel = this.link(options.signal);

    try {
      const enriched = await this.enrich(userId, prompt, assignedValue(session.id));
      let attempt: Attempt;
      try {
        attempt = await this.attempt(enriched, session, userId, projectPath, cancel.signal, options.onStream);
      } catch (err) {
        const staleId = this.continuing(session) ? assignedValue(session.id) : undefined;
        if (staleId === undefined || !isStaleSessionError(err)) throw err;

        this.logger.warn({ sessionId: staleId, userId, err: errorMessage(err) }, "Session resume failed, starting fresh");
        release();
        await this.sessions.removeSession(staleId);
        session = await this.sessions.getOrCreate(userId, projectPath, { forceNew: true });
        release = this.sessions.retain(sessionIdString(session.id));
        try {
          attempt = await this.attempt(enriched, session, userId, projectPath, cancel.signal, options.onStream);
        } catch (retryErr) {
          if (!isStaleSessionError(retryErr)) throw retryErr;
          throw new ProcessFailureError(`Engine rejected a fresh session: ${errorMessage(retryErr)}`, {
            cause: retryErr,
          });
        }
      }

      return await this.finalize(session, attempt, userId);
    } catch (err) {
      this.logger.error(
        { userId, sessionId: sessionIdString(session.id), err: errorMessage(err) },
        "Agent turn failed"
      );
      await this.discardUnfinished(session);
      throw err;
    } finally {
      release();
      cancel.release();
    }
  }

  /** A fresh session whose first turn failed never becomes resumable; drop its placeholder. */
  private async discardUnfinished(session: Session): Promise<void> {
    if (!session.isNewSession || session.id.kind !== "pending") return;
    try {
      await this.sessions.removeSession(session.id.placeholder);
    } catch (err) {
      this.logger.warn(
        { sessionId: session.id.placeholder, err: errorMessage(err) },
        "Could not remove placeholder of failed turn"
      );
    }
  }

  private continuing(session: Session): boolean {
    return session.id.kind === "assigned" && !session.isNewSession;
  }

  private async enrich(userId: number, prompt: string, sessionId: string | undefined): Promise<string> {
    try {
      return await this.enricher.enrich(userId, prompt, sessionId);
    } catch (err) {
      this.logger.warn({ userId, err: errorMessage(err) }, "Prompt enrichment failed, using raw prompt");
      return prompt;
    }
  }

  private async attempt(
    prompt: string,
    session: Session,
    userId: number,
    projectPath: string,
    signal: AbortSignal,
    onStream: AgentEventHandler | undefined
  ): Promise<Attempt> {
    const failures = newSoftFailures();
    const continueSession = this.continuing(session);
    const result = await this.executor.execute(
      {
        prompt,
        workingDirectory: projectPath,
        sessionId: continueSession ? assignedValue(session.id) : undefined,
        continueSession,
        signal,
      },
      this.validatingHandler(failures, userId, projectPath, onStream)
    );
    return { result, failures };
  }

  private validatingHandler(
    failures: SoftFailures,
    userId: number,
    projectPath: string,
    onStream: AgentEventHandler | undefined
  ): AgentEventHandler {
    return async (event) => {
      if (event.type === "assistant") {
        for (const call of event.toolCalls) {
          const outcome = this.validator.validate(call.name, call.input, projectPath, userId);
          if (outcome.allowed) continue;

          failures.blocked.add(call.name);
          failures.reasons.push(outcome.reason);
          if (outcome.code === "not_allowed" || outcome.code === "explicitly_disallowed") {
            failures.denied.add(call.name);
          }

          if (this.criticalTools.has(call.name)) {
            const blocked = [...failures.blocked];
            const allowed = this.validator.allowedTools;
            throw new ToolValidationError(toolBlockedErrorMessage(blocked, allowed), blocked, allowed);
          }
        }
      }

      if (onStream) {
        try {
          await onStream(event);
        } catch (err) {
          this.logger.warn({ err: errorMessage(err) }, "Stream callback failed");
        }
      }
    };
  }

  private async finalize(session: Session, attempt: Attempt, userId: number): Promise<AgentResponse> {
    const { result, failures } = attempt;
    const response: AgentResponse = {
      content: result.content,
      sessionId: result.sessionId,
      cost: result.cost,
      durationMs: result.durationMs,
      numTurns: result.numTurns,
      isError: false,
      toolsUsed: result.toolsUsed,
    };

    if (failures.reasons.length > 0) {
      this.logger.warn({ userId, reasons: failures.reasons }, "Turn completed with blocked tool calls");
      response.isError = true;
      response.errorType = "tool_validation_failed";
      response.content = softFailureContent([...failures.denied], failures.reasons, this.validator.allowedTools);
    }

    await this.sessions.updateSession(
      session.id,
      { sessionId: result.sessionId, cost: result.cost, toolsUsed: result.toolsUsed },
      session
    );

    const finalId =
      session.isNewSession && result.sessionId ? result.sessionId : sessionIdString(session.id);
    response.sessionId = isPlaceholderId(finalId) ? "" : finalId;
    if (!response.sessionId) {
      this.logger.warn({ userId }, "No engine session id after execution; session cannot be resumed");
    }

    this.logger.info(
      {
        sessionId: response.sessionId,
        cost: response.cost,
        durationMs: response.durationMs,
        numTurns: response.numTurns,
        isError: response.isError,
      },
      "Agent turn completed"
    );
    return response;
  }

  /** Tie the caller's signal to one the gateway can abort on shutdown. */
  private link(signal: AbortSignal | undefined): { signal: AbortSignal; release: () => void } {
    const controller = new AbortController();
    const forward = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener("abort", forward, { once: true });
    this.inFlight.add(controller);
    return {
      signal: controller.signal,
      release: () => {
        signal?.removeEventListener("abort", forward);
        this.inFlight.delete(controller);
      },
    };
  }

  /** Resume the most recent session in `directory`, even an expired one. Null when there is none. */
  async continueSession(
    userId: number,
    directory: string,
    prompt?: string,
    options: Omit<RunOptions, "sessionId" | "forceNew"> = {}
  ): Promise<AgentResponse | null> {
    const latest = await this.sessions.findLatest(userId, directory);
    const sessionId = latest ? assignedValue(latest.id) : undefined;
    if (sessionId === undefined) {
      this.logger.info({ userId, directory }, "No session to continue");
      return null;
    }
    return this.run(prompt || DEFAULT_CONTINUE_PROMPT, userId, directory, { ...options, sessionId });
  }

  /** One turn with no session bookkeeping. Tool calls are still validated. */
  async quickQuery(prompt: string, directory: string, userId = 0): Promise<string> {
    const projectPath = canonicalize(directory);
    const cancel = this.link(undefined);
    try {
      const result = await this.executor.execute(
        { prompt, workingDirectory: projectPath, continueSession: false, signal: cancel.signal },
        this.validatingHandler(newSoftFailures(), userId, projectPath, undefined)
      );
      return result.content;
    } finally {
      cancel.release();
    }
  }

  getUserSessions(userId: number): Promise<SessionInfo[]> {
    return this.sessions.listUserSessions(userId);
  }

  getSessionInfo(sessionId: string): Promise<SessionInfo | undefined> {
    return this.sessions.getSessionInfo(sessionId);
  }

  removeSession(sessionId: string): Promise<boolean> {
    return this.sessions.removeSession(sessionId);
  }

  getToolStats(): ToolStats {
    return this.validator.getToolStats();
  }

  getSecurityViolations(userId?: number): ViolationRecord[] {
    return this.validator.getSecurityViolations(userId);
  }

  isToolAllowed(toolName: string): boolean {
    return this.validator.isToolAllowed(toolName);
  }

  async getUserSummary(userId: number): Promise<UserSummary> {
    const sessions = await this.sessions.getUserSessionSummary(userId);
    return { ...sessions, ...this.validator.getUserToolUsage(userId) };
  }

  cleanupExpiredSessions(): Promise<number> {
    return this.sessions.cleanupExpired();
  }

  /** Abort in-flight turns, sweep expired sessions and close the store. */
  async shutdown(): Promise<void> {
    this.logger.info({ inFlight: this.inFlight.size }, "Shutting down gateway");
    for (const controller of this.inFlight) controller.abort();
    await this.cleanupExpiredSessions();
    await this.sessions.close();
    this.logger.info("Gateway shutdown complete");
  }
}
