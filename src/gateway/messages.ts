import { DEFAULT_ALLOWED_TOOLS } from "../shared/constants.js";
import { TOOLGATE_ENV } from "../shared/env.js";

function codeList(names: readonly string[]): string {
  return names.length > 0 ? names.map((n) => `\`${n}\``).join(", ") : "None";
}

export function adminInstructions(blockedTools: readonly string[], allowedTools: readonly string[]): string {
  if (blockedTools.length === 0) return "";
  const base = allowedTools.length > 0 ? allowedTools : DEFAULT_ALLOWED_TOOLS;
  const merged = [...new Set([...base, ...blockedTools])].join(",");
  return [
    "**For administrators:**",
    "",
    `To enable these tools, set ${TOOLGATE_ENV.ALLOWED_TOOLS} in the gateway's environment:`,
    "```",
    `${TOOLGATE_ENV.ALLOWED_TOOLS}="${merged}"`,
    "```",
    "",
    "Or persist it in the config file:",
    "```",
    `toolgate config set allowedTools ${merged}`,
    "```",
  ].join("\n");
}

/** Message carried by `ToolValidationError` when a critical tool is blocked. */
export function toolBlockedErrorMessage(blockedTools: readonly string[], allowedTools: readonly string[]): string {
  return [
    "**Tool Access Blocked**",
    "",
    "The agent tried to use tools that are not currently allowed:",
    codeList(blockedTools),
    "",
    "**What you can do:**",
    "- Ask the administrator to allow these tools",
    "- Rephrase the request so it needs different tools",
    "",
    "**Currently allowed tools:**",
    codeList(allowedTools),
    "",
    adminInstructions(blockedTools, allowedTools),
  ].join("\n");
}

/** Replaces the agent's reply when non-critical tool calls were blocked during the turn. */
export function softFailureContent(
  deniedTools: readonly string[],
  reasons: readonly string[],
  allowedTools: readonly string[]
): string {
  if (deniedTools.length > 0) {
    return [
      "**Tool Access Blocked**",
      "",
      "The agent tried to use tools that are not allowed:",
      codeList(deniedTools),
      "",
      "**Currently allowed tools:**",
      codeList(allowedTools),
    ].join("\n");
  }
  return [
    "**Tool Validation Failed**",
    "",
    "Tool calls failed security validation. Try a different approach.",
    "",
    `Details: ${reasons.join("; ")}`,
  ].join("\n");
}
