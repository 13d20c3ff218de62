export const VERSION = "0.1.0";

export const DEFAULT_ADMIN_LISTEN = "127.0.0.1:7340";

export const DEFAULT_SESSION_TIMEOUT_HOURS = 24;
export const DEFAULT_MAX_SESSIONS_PER_USER = 5;
export const DEFAULT_EXECUTION_TIMEOUT_SECONDS = 300;
export const DEFAULT_MAX_TURNS = 10;

export const DEFAULT_CONTINUE_PROMPT = "Please continue where we left off";

/** Tool names the agent engine is allowed to use out of the box. */
export const DEFAULT_ALLOWED_TOOLS: readonly string[] = [
  "Read",
  "Write",
  "Edit",
  "Bash",
  "Glob",
  "Grep",
  "LS",
  "Task",
  "MultiEdit",
  "NotebookRead",
  "NotebookEdit",
  "WebFetch",
  "TodoRead",
  "TodoWrite",
  "WebSearch",
];

/** A blocked call to one of these aborts the whole turn. */
export const DEFAULT_CRITICAL_TOOLS: readonly string[] = ["Task", "Read", "Write", "Edit", "Bash"];

export const FILE_TOOLS: readonly string[] = [
  "Read",
  "Write",
  "Edit",
  "MultiEdit",
  "read_file",
  "create_file",
  "edit_file",
];

export const SHELL_TOOLS: readonly string[] = ["Bash", "bash", "shell"];

/** Substrings that block a shell command outright (matched case-insensitively, in order). */
export const DEFAULT_DANGEROUS_PATTERNS: readonly string[] = [
  "rm -rf",
  "sudo",
  "chmod 777",
  "curl",
  "wget",
  "nc ",
  "netcat",
  ">",
  ">>",
  "|",
  "&",
  ";",
  "$(",
  "`",
];

/** Path segments file tools may never touch, even inside an approved root. */
export const DEFAULT_BLOCKED_PATH_SEGMENTS: readonly string[] = [
  ".ssh",
  ".gnupg",
  ".aws",
  ".azure",
  ".gcloud",
  ".docker",
  ".netrc",
  ".npmrc",
  ".pypirc",
  ".git-credentials",
];
