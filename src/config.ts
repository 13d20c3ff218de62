import { readFile, writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import {
  DEFAULT_ADMIN_LISTEN,
  DEFAULT_ALLOWED_TOOLS,
  DEFAULT_BLOCKED_PATH_SEGMENTS,
  DEFAULT_CRITICAL_TOOLS,
  DEFAULT_DANGEROUS_PATTERNS,
  DEFAULT_EXECUTION_TIMEOUT_SECONDS,
  DEFAULT_MAX_SESSIONS_PER_USER,
  DEFAULT_MAX_TURNS,
  DEFAULT_SESSION_TIMEOUT_HOURS,
} from "./shared/constants.js";
import { getEnv } from "./shared/env.js";

const CONFIG_FILENAME = "toolgate.json";

export function expandHome(p: string): string {
  if (p === "~") return homedir();
  if (p.startsWith("~/")) return path.join(homedir(), p.slice(2));
  return p;
}

export function getDataDir(custom?: string, env: NodeJS.ProcessEnv = process.env): string {
  const dir = custom ?? getEnv("DATA_DIR", env);
  if (dir) return path.resolve(expandHome(dir));
  return path.join(homedir(), ".toolgate");
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILENAME);
}

const toolList = (defaults: readonly string[]) => z.array(z.string().min(1)).default([...defaults]);

export const ConfigSchema = z.object({
  approvedDirectory: z.string().min(1).default("~/toolgate-projects"),
  allowedPaths: z.array(z.string().min(1)).default([]),
  allowedTools: toolList(DEFAULT_ALLOWED_TOOLS),
  disallowedTools: toolList([]),
  disableToolValidation: z.boolean().default(false),
  agenticMode: z.boolean().default(true),
  criticalTools: toolList(DEFAULT_CRITICAL_TOOLS),
  dangerousPatterns: toolList(DEFAULT_DANGEROUS_PATTERNS),
  blockedPathSegments: toolList(DEFAULT_BLOCKED_PATH_SEGMENTS),
  sessionTimeoutHours: z.number().positive().default(DEFAULT_SESSION_TIMEOUT_HOURS),
  maxSessionsPerUser: z.number().int().positive().default(DEFAULT_MAX_SESSIONS_PER_USER),
  executionTimeoutSeconds: z.number().positive().default(DEFAULT_EXECUTION_TIMEOUT_SECONDS),
  maxTurns: z.number().int().positive().default(DEFAULT_MAX_TURNS),
  model: z.string().min(1).optional(),
  /** Absent means sessions live in memory only. */
  databasePath: z.string().min(1).optional(),
  language: z.string().min(1).default("auto"),
  timezone: z.string().min(1).default("UTC"),
  profilePath: z.string().min(1).optional(),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  listen: z.string().min(1).default(DEFAULT_ADMIN_LISTEN),
  adminToken: z.string().min(1).optional(),
});

export type ToolgateConfig = z.infer<typeof ConfigSchema>;
export type ConfigKey = keyof ToolgateConfig;

type ValueKind = "string" | "list" | "boolean" | "number";

const CONFIG_KEYS = {
  approvedDirectory: "string",
  allowedPaths: "list",
  allowedTools: "list",
  disallowedTools: "list",
  disableToolValidation: "boolean",
  agenticMode: "boolean",
  criticalTools: "list",
  dangerousPatterns: "list",
  blockedPathSegments: "list",
  sessionTimeoutHours: "number",
  maxSessionsPerUser: "number",
  executionTimeoutSeconds: "number",
  maxTurns: "number",
  model: "string",
  databasePath: "string",
  language: "string",
  timezone: "string",
  profilePath: "string",
  logLevel: "string",
  listen: "string",
  adminToken: "string",
} as const satisfies Record<ConfigKey, ValueKind>;

export function isConfigKey(s: string): s is ConfigKey {
  return Object.hasOwn(CONFIG_KEYS, s);
}

export function configKeys(): ConfigKey[] {
  return Object.keys(ConfigSchema.shape).filter(isConfigKey);
}

export type RawConfig = Record<string, unknown>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function formatConfigError(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

export async function readFullConfig(dataDir: string): Promise<RawConfig> {
  const configPath = getConfigPath(dataDir);
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }
  const data: unknown = JSON.parse(raw);
  const parsed = z.record(z.unknown()).safeParse(data);
  if (!parsed.success) throw new Error(`${configPath} must contain a JSON object`);
  return parsed.data;
}

export async function writeFullConfig(dataDir: string, cfg: RawConfig): Promise<void> {
  await mkdir(dataDir, { recursive: true });
  await writeFile(getConfigPath(dataDir), JSON.stringify(cfg, null, 2) + "\n", "utf8");
}

/** Ensure a config file exists with defaults. Called on first CLI entry. */
export async function ensureDefaultConfig(dataDir: string): Promise<void> {
  try {
    await readFile(getConfigPath(dataDir), "utf8");
    return;
  } catch (err) {
    if (!isMissingFile(err)) throw err;
  }
  try {
    await writeFullConfig(dataDir, ConfigSchema.parse({}));
  } catch (error) {
    // Read-only homes still get the in-memory defaults.
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code === "EPERM" || code === "EACCES" || code === "EROFS") return;
    throw error;
  }
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function parseBool(value: string): boolean {
  return value === "1" || value.toLowerCase() === "true";
}

function coerce(kind: ValueKind, value: string): unknown {
  switch (kind) {
    case "list":
      return splitList(value);
    case "boolean":
      return parseBool(value);
    case "number":
      return Number(value);
    case "string":
      return value;
  }
}

/** Overlay TOOLGATE_* variables on top of the file contents. */
export function applyEnv(raw: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const out: RawConfig = { ...raw };
  const set = (key: ConfigKey, value: string | undefined) => {
    if (value !== undefined) out[key] = coerce(CONFIG_KEYS[key], value);
  };
  set("approvedDirectory", getEnv("APPROVED_DIRECTORY", env));
  set("allowedPaths", getEnv("ALLOWED_PATHS", env));
  set("allowedTools", getEnv("ALLOWED_TOOLS", env));
  set("disallowedTools", getEnv("DISALLOWED_TOOLS", env));
  set("disableToolValidation", getEnv("DISABLE_TOOL_VALIDATION", env));
  set("agenticMode", getEnv("AGENTIC_MODE", env));
  set("sessionTimeoutHours", getEnv("SESSION_TIMEOUT_HOURS", env));
  set("databasePath", getEnv("DATABASE_PATH", env));
  set("model", getEnv("MODEL", env));
  set("logLevel", getEnv("LOG_LEVEL", env));
  set("listen", getEnv("LISTEN", env));
  set("adminToken", getEnv("ADMIN_TOKEN", env));
  return out;
}

export function parseConfig(raw: RawConfig): ToolgateConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) throw new Error(`Invalid configuration: ${formatConfigError(parsed.error)}`);
  return parsed.data;
}

export async function loadConfig(dataDir: string, env: NodeJS.ProcessEnv = process.env): Promise<ToolgateConfig> {
  return parseConfig(applyEnv(await readFullConfig(dataDir), env));
}

/** The primary sandbox root followed by the extra roots, `~` expanded, absolute, without duplicates. */
export function allApprovedDirectories(config: Pick<ToolgateConfig, "approvedDirectory" | "allowedPaths">): string[] {
  const dirs = [config.approvedDirectory, ...config.allowedPaths].map((d) => path.resolve(expandHome(d)));
  return [...new Set(dirs)];
}

export async function configGet(dataDir: string, key: ConfigKey): Promise<string | undefined> {
  const cfg = parseConfig(await readFullConfig(dataDir));
  const value = cfg[key];
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.join(",") : String(value);
}

export async function configSet(dataDir: string, key: ConfigKey, value: string): Promise<void> {
  const cfg = await readFullConfig(dataDir);
  const next = { ...cfg, [key]: coerce(CONFIG_KEYS[key], value) };
  parseConfig(next);
  await writeFullConfig(dataDir, next);
}
