import path from "node:path";
import {
  DEFAULT_BLOCKED_PATH_SEGMENTS,
  DEFAULT_DANGEROUS_PATTERNS,
  FILE_TOOLS,
  SHELL_TOOLS,
} from "../shared/constants.js";
import { errorMessage } from "../shared/errors.js";
import { componentLogger } from "../shared/logging.js";
import { canonicalize, contains, resolveToken } from "./path-boundary.js";
import { checkShellBoundary } from "./shell-boundary.js";
import { parseToolInput, type ToolFamilies } from "./tool-inputs.js";

export type ViolationType =
  | "disallowed_tool"
  | "explicitly_disallowed_tool"
  | "missing_file_path"
  | "invalid_file_path"
  | "missing_command"
  | "dangerous_command"
  | "directory_boundary_violation";

export interface ViolationRecord {
  type: ViolationType;
  toolName: string;
  userId: number;
  workingDirectory: string;
  detail: string;
  timestamp: number;
}

export type BlockCode =
  | "not_allowed"
  | "explicitly_disallowed"
  | "invalid_path"
  | "dangerous_pattern"
  | "boundary_violation";

export type ValidationOutcome =
  | { allowed: true }
  | { allowed: false; code: BlockCode; reason: string };

/**
 * Usage counters and the violation log. Owned by whoever constructs the
 * validator, so tests and long-lived processes control its lifetime.
 */
export class ValidatorState {
  private readonly usage = new Map<string, number>();
  private readonly violations: ViolationRecord[] = [];

  recordUsage(toolName: string): void {
    this.usage.set(toolName, (this.usage.get(toolName) ?? 0) + 1);
  }

  recordViolation(violation: ViolationRecord): void {
    this.violations.push(violation);
  }

  usageByTool(): Record<string, number> {
    return Object.fromEntries(this.usage);
  }

  getViolations(): ViolationRecord[] {
    return this.violations.map((v) => ({ ...v }));
  }

  reset(): void {
    this.usage.clear();
    this.violations.length = 0;
  }
}

export interface ToolPolicy {
  /** `null` or empty means every tool name passes the allow check. */
  allowedTools: readonly string[] | null;
  disallowedTools: readonly string[];
  /** Skips the allow/disallow name checks only. */
  disableToolValidation: boolean;
  /** Skips the dangerous-pattern blacklist only; the engine sandboxes shell use. */
  agenticMode: boolean;
  approvedDirectories: readonly string[];
  dangerousPatterns: readonly string[];
  blockedPathSegments: readonly string[];
  fileTools: readonly string[];
  shellTools: readonly string[];
}

export function createToolPolicy(
  policy: Partial<ToolPolicy> & Pick<ToolPolicy, "approvedDirectories">
): ToolPolicy {
  return {
    allowedTools: null,
    disallowedTools: [],
    disableToolValidation: false,
    agenticMode: false,
    dangerousPatterns: DEFAULT_DANGEROUS_PATTERNS,
    blockedPathSegments: DEFAULT_BLOCKED_PATH_SEGMENTS,
    fileTools: FILE_TOOLS,
    shellTools: SHELL_TOOLS,
    ...policy,
  };
}

export interface ToolStats {
  totalCalls: number;
  byTool: Record<string, number>;
  uniqueTools: number;
  securityViolations: number;
}

export interface UserToolUsage {
  userId: number;
  securityViolations: number;
  violationTypes: ViolationType[];
}

type PathCheck = { ok: true; resolved: string } | { ok: false; error: string };

export class ToolValidator {
  private readonly logger = componentLogger("tool-validator");
  private readonly allowed: ReadonlySet<string> | null;
  private readonly disallowed: ReadonlySet<string>;
  private readonly blockedSegments: ReadonlySet<string>;
  private readonly families: ToolFamilies;

  constructor(
    readonly policy: ToolPolicy,
    readonly state: ValidatorState = new ValidatorState()
  ) {
    this.allowed =
      policy.allowedTools && policy.allowedTools.length > 0 ? new Set(policy.allowedTools) : null;
    this.disallowed = new Set(policy.disallowedTools);
    this.blockedSegments = new Set(policy.blockedPathSegments.map((s) => s.toLowerCase()));
    this.families = {
      fileTools: new Set(policy.fileTools),
      shellTools: new Set(policy.shellTools),
    };
  }

  get allowedTools(): string[] {
    return [...(this.policy.allowedTools ?? [])];
  }

  validate(
    toolName: string,
    input: unknown,
    workingDirectory: string,
    userId: number
  ): ValidationOutcome {
    this.logger.debug({ toolName, workingDirectory, userId }, "Validating tool call");

    const block = (code: BlockCode, type: ViolationType, reason: string, detail = reason): ValidationOutcome => {
      const violation: ViolationRecord = {
        type,
        toolName,
        userId,
        workingDirectory,
        detail,
        timestamp: Date.now(),
      };
      this.state.recordViolation(violation);
      this.logger.warn(violation, "Tool call blocked");
      return { allowed: false, code, reason };
    };

    if (!this.policy.disableToolValidation) {
      if (this.disallowed.has(toolName)) {
        return block("explicitly_disallowed", "explicitly_disallowed_tool", `Tool explicitly disallowed: ${toolName}`);
      }
      if (this.allowed && !this.allowed.has(toolName)) {
        return block("not_allowed", "disallowed_tool", `Tool not allowed: ${toolName}`);
      }
    }

    const parsed = parseToolInput(toolName, input, this.families);

    if (parsed.family === "file") {
      if (!parsed.path) {
        return block("invalid_path", "missing_file_path", "File path required");
      }
      const check = this.checkFilePath(parsed.path, workingDirectory);
      if (!check.ok) {
        return block("invalid_path", "invalid_file_path", check.error, `${parsed.path}: ${check.error}`);
      }
    }

    if (parsed.family === "shell") {
      const command = parsed.command;
      if (command === undefined) {
        return block("invalid_path", "missing_command", "Shell command required");
      }

      if (!this.policy.agenticMode) {
        const lower = command.toLowerCase();
        const pattern = this.policy.dangerousPatterns.find((p) => lower.includes(p.toLowerCase()));
        if (pattern !== undefined) {
          return block(
            "dangerous_pattern",
            "dangerous_command",
            `Dangerous command pattern detected: ${pattern}`,
            `${command} (pattern: ${pattern})`
          );
        }
      }

      let boundary: ReturnType<typeof checkShellBoundary>;
      try {
        boundary = checkShellBoundary(command, workingDirectory, this.policy.approvedDirectories);
      } catch (err) {
        const reason = `Cannot resolve command paths: ${errorMessage(err)}`;
        return block("boundary_violation", "directory_boundary_violation", reason, `${command}: ${reason}`);
      }
      if (!boundary.ok) {
        return block("boundary_violation", "directory_boundary_violation", boundary.error, `${command}: ${boundary.error}`);
      }
      if (boundary.unparsable !== undefined) {
        this.logger.debug(
          { toolName, userId, error: boundary.unparsable },
          "Shell command could not be tokenized; path checks deferred to the OS sandbox"
        );
      }
    }

    this.state.recordUsage(toolName);
    this.logger.debug({ toolName }, "Tool call validated");
    return { allowed: true };
  }

  private checkFilePath(filePath: string, workingDirectory: string): PathCheck {
    if (filePath.includes("\0")) return { ok: false, error: "Path contains a null byte" };

    let resolved: string;
    let roots: string[];
    try {
      resolved = resolveToken(workingDirectory, filePath);
      roots = this.policy.approvedDirectories.map(canonicalize);
    } catch (err) {
      return { ok: false, error: `Cannot resolve path '${filePath}': ${errorMessage(err)}` };
    }

    const root = roots.find((r) => contains(r, resolved));
    if (root === undefined) {
      return { ok: false, error: `Path outside approved directories: ${filePath}` };
    }

    const segments = path.relative(root, resolved).split(path.sep);
    if (segments.some((seg) => this.blockedSegments.has(seg.toLowerCase()))) {
      return { ok: false, error: `Access to sensitive path denied: ${filePath}` };
    }
    return { ok: true, resolved };
  }

  /** Name-only check, ignoring `disableToolValidation`. */
  isToolAllowed(toolName: string): boolean {
    if (this.allowed && !this.allowed.has(toolName)) return false;
    return !this.disallowed.has(toolName);
  }

  getToolStats(): ToolStats {
    const byTool = this.state.usageByTool();
    const counts = Object.values(byTool);
    return {
      totalCalls: counts.reduce((sum, n) => sum + n, 0),
      byTool,
      uniqueTools: counts.length,
      securityViolations: this.state.getViolations().length,
    };
  }

  getSecurityViolations(userId?: number): ViolationRecord[] {
    const all = this.state.getViolations();
    return userId === undefined ? all : all.filter((v) => v.userId === userId);
  }

  getUserToolUsage(userId: number): UserToolUsage {
    const violations = this.getSecurityViolations(userId);
    return {
      userId,
      securityViolations: violations.length,
      violationTypes: [...new Set(violations.map((v) => v.type))],
    };
  }

  resetStats(): void {
    this.state.reset();
    this.logger.info("Tool validator statistics reset");
  }
}
