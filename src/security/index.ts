export { canonicalize, contains, resolveToken, withinAny } from "./path-boundary.js";
export { tokenize, type TokenizeResult } from "./tokenizer.js";
export { checkShellBoundary, classifyCommand, type CommandClass, type ShellBoundaryResult } from "./shell-boundary.js";
export { parseToolInput, toolFamily, type ToolFamily, type ToolInput } from "./tool-inputs.js";
export {
  ToolValidator,
  ValidatorState,
  createToolPolicy,
  type BlockCode,
  type ToolPolicy,
  type ToolStats,
  type UserToolUsage,
  type ValidationOutcome,
  type ViolationRecord,
  type ViolationType,
} from "./validator.js";
