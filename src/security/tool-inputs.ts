import { type } from "arktype";

/** File tools name their target as `path` or `file_path`. */
export const FileToolInputSchema = type({
  "path?": "string",
  "file_path?": "string",
});

/** Shell tools carry the full command line in `command`. */
export const ShellToolInputSchema = type({
  command: "string",
});

export type ToolFamily = "file" | "shell" | "other";

export type ToolInput =
  | { family: "file"; path: string | undefined }
  | { family: "shell"; command: string | undefined }
  | { family: "other" };

export interface ToolFamilies {
  fileTools: ReadonlySet<string>;
  shellTools: ReadonlySet<string>;
}

export function toolFamily(toolName: string, families: ToolFamilies): ToolFamily {
  if (families.fileTools.has(toolName)) return "file";
  if (families.shellTools.has(toolName)) return "shell";
  return "other";
}

/**
 * Narrow an opaque tool payload to what the validator needs for its family.
 * Malformed payloads come back with the field unset rather than throwing.
 */
export function parseToolInput(toolName: string, input: unknown, families: ToolFamilies): ToolInput {
  const family = toolFamily(toolName, families);
  if (family === "file") {
    const out = FileToolInputSchema(input);
    if (out instanceof type.errors) return { family, path: undefined };
    return { family, path: out.path || out.file_path || undefined };
  }
  if (family === "shell") {
    const out = ShellToolInputSchema(input);
    if (out instanceof type.errors) return { family, command: undefined };
    return { family, command: out.command };
  }
  return { family };
}
