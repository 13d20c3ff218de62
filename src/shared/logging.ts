import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

const LOGGER_NAME = "toolgate";

export function redactSecrets(input: string): string {
  return input
    .replace(/\bsk-ant-[A-Za-z0-9_-]{16,}\b/g, "[REDACTED]")
    .replace(/\bsk-[A-Za-z0-9_-]{16,}\b/g, "[REDACTED]")
    .replace(/\bghp_[A-Za-z0-9]{20,}\b/g, "[REDACTED]")
    .replace(
      /\b(ANTHROPIC_API_KEY|CLAUDE_CODE_OAUTH_TOKEN|GITHUB_TOKEN|TOOLGATE_ADMIN_TOKEN)\s*=\s*([^\s]+)/gi,
      (_match, name: string) => `${name}=[REDACTED]`
    )
    .replace(
      /\b(ANTHROPIC_API_KEY|CLAUDE_CODE_OAUTH_TOKEN|GITHUB_TOKEN|TOOLGATE_ADMIN_TOKEN)\b["']?\s*:\s*["']([^"']+)["']/gi,
      (_match, name: string) => `${name}:"[REDACTED]"`
    );
}

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((level) => level === s);
}

export function isLogFormat(s: string): s is LogFormat {
  return LOG_FORMATS.some((format) => format === s);
}

function redactingStderr(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      const s = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      process.stderr.write(redactSecrets(s));
      cb();
    },
  });
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        process.stderr.write(redactSecrets(messageOf(line)) + "\n");
      }
      cb();
    },
  });
}

function messageOf(line: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return line;
  }
  if (parsed && typeof parsed === "object" && "msg" in parsed && typeof parsed.msg === "string") {
    return parsed.msg;
  }
  return line;
}

let rootLogger: pino.Logger | null = null;

export function initLogger(level = "info", format: LogFormat = "text"): pino.Logger {
  const logLevel = isLogLevel(level) ? level : "info";
  if (format === "plain") {
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, plainMessageStderr());
  } else if (format === "text") {
    const prettyStream = pinoPretty({ colorize: true, destination: redactingStderr() });
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, prettyStream);
  } else {
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, redactingStderr());
  }
  return rootLogger;
}

/**
 * Root logger. Initialised lazily in `plain` mode so library callers that never
 * call `initLogger` still get readable stderr output.
 */
export function getLogger(): pino.Logger {
  return rootLogger ?? initLogger(process.env.TOOLGATE_LOG_LEVEL ?? "info", "plain");
}

export function componentLogger(component: string): pino.Logger {
  return getLogger().child({ component });
}
