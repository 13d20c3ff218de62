import { readFile } from "node:fs/promises";
import { ClaudeExecutor } from "../agent/claude-executor.js";
import type { Executor } from "../agent/types.js";
import { allApprovedDirectories, expandHome, type ToolgateConfig } from "../config.js";
import { ToolValidator, ValidatorState, createToolPolicy } from "../security/validator.js";
import { createInMemorySessionStore } from "../sessions/in-memory.js";
import { SessionManager } from "../sessions/manager.js";
import { createSqliteSessionStore } from "../sessions/sqlite.js";
import type { SessionStore } from "../sessions/store.js";
import { createContextEnricher } from "./enricher.js";
import { AgentGateway } from "./gateway.js";

export interface GatewayOverrides {
  executor?: Executor;
  store?: SessionStore;
  state?: ValidatorState;
}

export function createValidator(config: ToolgateConfig, state?: ValidatorState): ToolValidator {
  return new ToolValidator(
    createToolPolicy({
      allowedTools: config.allowedTools,
      disallowedTools: config.disallowedTools,
      disableToolValidation: config.disableToolValidation,
      agenticMode: config.agenticMode,
      approvedDirectories: allApprovedDirectories(config),
      dangerousPatterns: config.dangerousPatterns,
      blockedPathSegments: config.blockedPathSegments,
    }),
    state
  );
}

export async function openSessionStore(config: ToolgateConfig): Promise<SessionStore> {
  return config.databasePath
    ? createSqliteSessionStore(expandHome(config.databasePath))
    : createInMemorySessionStore();
}

/** Wire a gateway from configuration; collaborators can be swapped for tests. */
export async function createGateway(config: ToolgateConfig, overrides: GatewayOverrides = {}): Promise<AgentGateway> {
  const store = overrides.store ?? (await openSessionStore(config));
  const sessions = new SessionManager(store, {
    timeoutMs: config.sessionTimeoutHours * 3_600_000,
    maxSessionsPerUser: config.maxSessionsPerUser,
  });

  const executor =
    overrides.executor ??
    new ClaudeExecutor({
      allowedTools: config.allowedTools,
      disallowedTools: config.disallowedTools,
      maxTurns: config.maxTurns,
      timeoutMs: config.executionTimeoutSeconds * 1000,
      model: config.model,
    });

  const profilePath = config.profilePath;
  const enricher = createContextEnricher({
    language: config.language,
    timezone: config.timezone,
    profile: profilePath ? () => readFile(expandHome(profilePath), "utf8") : undefined,
  });

  return new AgentGateway({
    executor,
    sessions,
    validator: createValidator(config, overrides.state),
    enricher,
    criticalTools: config.criticalTools,
  });
}
