import path from "node:path";
import { canonicalize, resolveToken, withinAny } from "./path-boundary.js";
import { tokenize } from "./tokenizer.js";

/** Commands that modify the filesystem; their path arguments are checked. */
const FS_MODIFYING_COMMANDS = new Set([
  "mkdir",
  "touch",
  "cp",
  "mv",
  "rm",
  "rmdir",
  "ln",
  "install",
  "tee",
]);

/** Commands that only read, or take no filesystem paths at all. */
const READ_ONLY_COMMANDS = new Set([
  "cat",
  "ls",
  "head",
  "tail",
  "less",
  "more",
  "which",
  "whoami",
  "pwd",
  "echo",
  "printf",
  "env",
  "printenv",
  "date",
  "wc",
  "sort",
  "uniq",
  "diff",
  "file",
  "stat",
  "du",
  "df",
  "tree",
  "realpath",
  "dirname",
  "basename",
]);

/** `find` actions that turn it into a filesystem-modifying command. */
const FIND_MUTATING_ACTIONS = new Set(["-delete", "-exec", "-execdir", "-ok", "-okdir"]);

export type CommandClass = "read_only" | "mutating" | "find_mutating" | "unchecked";

export function classifyCommand(tokens: readonly string[]): CommandClass {
  if (tokens.length === 0) return "unchecked";
  const base = path.basename(tokens[0]);
  if (READ_ONLY_COMMANDS.has(base)) return "read_only";
  if (base === "find") {
    return tokens.slice(1).some((t) => FIND_MUTATING_ACTIONS.has(t)) ? "find_mutating" : "unchecked";
  }
  return FS_MODIFYING_COMMANDS.has(base) ? "mutating" : "unchecked";
}

export type ShellBoundaryResult =
  | { ok: true; checked: boolean; unparsable?: string }
  | { ok: false; command: string; token: string; resolved: string; error: string };

/**
 * Check that every path argument of a filesystem-modifying command stays inside
 * one of `approvedDirectories`.
 *
 * A command that cannot be tokenized is let through with `unparsable` set: its
 * paths cannot be checked reliably, so enforcement falls to the OS-level sandbox.
 */
export function checkShellBoundary(
  command: string,
  workingDirectory: string,
  approvedDirectories: readonly string[]
): ShellBoundaryResult {
  const parsed = tokenize(command);
  if (!parsed.ok) return { ok: true, checked: false, unparsable: parsed.error };

  const { tokens } = parsed;
  const kind = classifyCommand(tokens);
  if (kind === "read_only" || kind === "unchecked") return { ok: true, checked: false };

  const base = path.basename(tokens[0]);
  const roots = approvedDirectories.map(canonicalize);

  for (const token of tokens.slice(1)) {
    if (token.startsWith("-")) continue;
    const resolved = resolveToken(workingDirectory, token);
    if (!withinAny(roots, resolved)) {
      return {
        ok: false,
        command: base,
        token,
        resolved,
        error: `Directory boundary violation: '${base}' targets '${token}' which is outside approved directories`,
      };
    }
  }
  return { ok: true, checked: true };
}
