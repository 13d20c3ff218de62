/** Environment variables read on top of toolgate.json. */
export const TOOLGATE_ENV = {
  DATA_DIR: "TOOLGATE_DATA_DIR",
  APPROVED_DIRECTORY: "TOOLGATE_APPROVED_DIRECTORY",
  ALLOWED_PATHS: "TOOLGATE_ALLOWED_PATHS",
  ALLOWED_TOOLS: "TOOLGATE_ALLOWED_TOOLS",
  DISALLOWED_TOOLS: "TOOLGATE_DISALLOWED_TOOLS",
  DISABLE_TOOL_VALIDATION: "TOOLGATE_DISABLE_TOOL_VALIDATION",
  AGENTIC_MODE: "TOOLGATE_AGENTIC_MODE",
  SESSION_TIMEOUT_HOURS: "TOOLGATE_SESSION_TIMEOUT_HOURS",
  DATABASE_PATH: "TOOLGATE_DATABASE_PATH",
  MODEL: "TOOLGATE_MODEL",
  LOG_LEVEL: "TOOLGATE_LOG_LEVEL",
  ADMIN_TOKEN: "TOOLGATE_ADMIN_TOKEN",
  LISTEN: "TOOLGATE_LISTEN",
} as const;

export type EnvKey = keyof typeof TOOLGATE_ENV;

export function getEnv(key: EnvKey, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[TOOLGATE_ENV[key]];
  return value === undefined || value === "" ? undefined : value;
}
