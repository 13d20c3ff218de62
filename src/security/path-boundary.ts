import { realpathSync } from "node:fs";
import { homedir } from "node:os";
import path from "node:path";

function isMissingPathError(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return err.code === "ENOENT" || err.code === "ENOTDIR";
}

/**
 * Absolute, `..`-free, symlink-free form of `target`. Symlinks are resolved through
 * the deepest ancestor that exists; the missing tail is appended lexically so
 * paths that do not exist yet still get a usable answer.
 */
export function canonicalize(target: string): string {
  const absolute = path.resolve(target);
  const missing: string[] = [];
  let current = absolute;

  for (;;) {
    try {
      const real = realpathSync(current);
      return missing.length === 0 ? real : path.join(real, ...missing.reverse());
    } catch (err) {
      if (!isMissingPathError(err)) throw err;
      const parent = path.dirname(current);
      if (parent === current) return absolute;
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

/**
 * Resolve a command-line token the way the shell would see it: absolute tokens
 * as-is, `~` against the home directory, everything else against `workingDirectory`.
 */
export function resolveToken(workingDirectory: string, token: string): string {
  if (path.isAbsolute(token)) return canonicalize(token);
  if (token === "~" || token.startsWith("~/")) {
    return canonicalize(path.join(homedir(), token.slice(1)));
  }
  return canonicalize(path.join(workingDirectory, token));
}

/** Both arguments must already be canonical. */
export function contains(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === "") return true;
  if (path.isAbsolute(relative)) return false;
  return relative !== ".." && !relative.startsWith(`..${path.sep}`);
}

export function withinAny(roots: readonly string[], candidate: string): boolean {
  return roots.some((root) => contains(root, candidate));
}
