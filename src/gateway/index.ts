export {
  AgentGateway,
  type AgentGatewayOptions,
  type AgentResponse,
  type RunOptions,
  type UserSummary,
} from "./gateway.js";
export { createContextEnricher, passthroughEnricher, type ContextEnricherOptions, type PromptEnricher } from "./enricher.js";
export { createGateway, createValidator, openSessionStore, type GatewayOverrides } from "./factory.js";
export { adminInstructions, softFailureContent, toolBlockedErrorMessage } from "./messages.js";
export * from "../agent/index.js";
export * from "../security/index.js";
export * from "../sessions/index.js";
export * from "../shared/errors.js";
export { KeyedMutex } from "../shared/mutex.js";
export {
  ConfigSchema,
  allApprovedDirectories,
  getDataDir,
  loadConfig,
  type ToolgateConfig,
} from "../config.js";
