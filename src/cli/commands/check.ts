import chalk from "chalk";
import { createValidator } from "../../gateway/factory.js";
import { EXIT, exit } from "../../shared/errors.js";
import { resolveCwd, setupCli, writeJson, type GlobalOptions } from "../utils.js";

export interface CheckCommandOptions extends GlobalOptions {
  tool?: string;
  path?: string;
  cwd?: string;
  user: number;
  json?: boolean;
}

/** Dry-run one tool call through the validator. Exits non-zero when it would be blocked. */
export async function runCheck(commandParts: string[], opts: CheckCommandOptions): Promise<void> {
  const { config } = await setupCli(opts);
  const command = commandParts.join(" ");
  const tool = opts.tool ?? "Bash";

  let input: Record<string, unknown>;
  if (opts.path !== undefined) input = { file_path: opts.path };
  else if (command) input = { command };
  else exit(EXIT.INVALID_ARGS, "Provide a shell command or --path.");

  const validator = createValidator(config);
  const outcome = validator.validate(tool, input, resolveCwd(opts.cwd), opts.user);

  if (opts.json) {
    writeJson({ tool, input, ...outcome });
  } else if (outcome.allowed) {
    process.stdout.write(`${chalk.green("ALLOWED")} ${tool}\n`);
  } else {
    process.stdout.write(`${chalk.red("BLOCKED")} ${tool} [${outcome.code}] ${outcome.reason}\n`);
  }
  if (!outcome.allowed) process.exitCode = EXIT.POLICY_VIOLATION;
}
