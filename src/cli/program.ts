import { Command } from "commander";
import { DEFAULT_ADMIN_LISTEN, VERSION } from "../shared/constants.js";
import { runCheck, type CheckCommandOptions } from "./commands/check.js";
import { runConfigGet, runConfigSet, runConfigShow } from "./commands/config.js";
import { runRun, type RunCommandOptions } from "./commands/run.js";
import { runServe } from "./commands/serve.js";
import { runCleanup, runSessions } from "./commands/sessions.js";
import { runStatus } from "./commands/status.js";
import { parseUserIdArg, type GlobalOptions } from "./utils.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("toolgate")
    .description("toolgate: tool-security gateway and session lifecycle for coding agents")
    .version(VERSION)
    .option("--data-dir <path>", "Data directory (default ~/.toolgate)")
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", "Log level: error, warn, info, debug")
    .option("--log-format <format>", "Log format: text, json or plain", "plain");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .command("run")
    .description("Run one agent turn through the gateway")
    .argument("<prompt...>", "Prompt text")
    .option("--user <id>", "User id", parseUserIdArg, 0)
    .option("--cwd <dir>", "Working directory (default: current directory)")
    .option("--session <id>", "Continue this engine session id")
    .option("--new", "Start a fresh session instead of auto-resuming")
    .option("--json", "Print the full response as JSON")
    .action((prompt: string[], opts: Omit<RunCommandOptions, keyof GlobalOptions>) =>
      runRun(prompt, { ...globals(), ...opts })
    );

  program
    .command("check")
    .description("Dry-run a tool call through the validator")
    .argument("[command...]", "Shell command to check")
    .option("--tool <name>", "Tool name (default Bash)")
    .option("--path <path>", "File path for a file tool")
    .option("--cwd <dir>", "Working directory (default: current directory)")
    .option("--user <id>", "User id", parseUserIdArg, 0)
    .option("--json", "Print the outcome as JSON")
    .action((command: string[], opts: Omit<CheckCommandOptions, keyof GlobalOptions>) =>
      runCheck(command, { ...globals(), ...opts })
    );

  program
    .command("sessions")
    .description("List a user's sessions")
    .option("--user <id>", "User id", parseUserIdArg, 0)
    .option("--json", "Print as JSON")
    .action((opts: { user: number; json?: boolean }) => runSessions({ ...globals(), ...opts }));

  program
    .command("cleanup")
    .description("Delete expired sessions")
    .action(() => runCleanup(globals()));

  program
    .command("serve")
    .description("Start the admin/audit HTTP API")
    .option("--listen <host:port>", `Listen address (default ${DEFAULT_ADMIN_LISTEN})`)
    .action((opts: { listen?: string }) => runServe({ ...globals(), ...opts }));

  program
    .command("status")
    .description("Show the effective policy and storage settings")
    .action(() => runStatus(globals()));

  const config = program.command("config").description("Read or change toolgate.json");
  config
    .command("get")
    .argument("<key>")
    .action((key: string) => runConfigGet(key, globals()));
  config
    .command("set")
    .argument("<key>")
    .argument("<value>")
    .action((key: string, value: string) => runConfigSet(key, value, globals()));
  config
    .command("show")
    .action(() => runConfigShow(globals()));

  return program;
}
