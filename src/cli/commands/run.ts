import chalk from "chalk";
import type { AgentEvent } from "../../agent/types.js";
import { createGateway } from "../../gateway/factory.js";
import { EXIT, GatewayError, ToolValidationError, errorMessage, exit } from "../../shared/errors.js";
import { resolveCwd, setupCli, writeJson, type GlobalOptions } from "../utils.js";

export interface RunCommandOptions extends GlobalOptions {
  user: number;
  cwd?: string;
  session?: string;
  new?: boolean;
  json?: boolean;
}

function printEvent(event: AgentEvent): void {
  if (event.type !== "assistant") return;
  for (const call of event.toolCalls) {
    process.stderr.write(chalk.dim(`  > ${call.name}\n`));
  }
}

export async function runRun(promptParts: string[], opts: RunCommandOptions): Promise<void> {
  const { config } = await setupCli(opts);
  const prompt = promptParts.join(" ").trim();
  if (!prompt) exit(EXIT.INVALID_ARGS, "A prompt is required.");

  const gateway = await createGateway(config);
  let failure: { code: number; message: string } | undefined;
  try {
    const response = await gateway.run(prompt, opts.user, resolveCwd(opts.cwd), {
      sessionId: opts.session,
      forceNew: opts.new,
      onStream: opts.json ? undefined : printEvent,
    });

    if (opts.json) {
      writeJson(response);
    } else {
      process.stdout.write(response.content + "\n");
      const meta = [
        response.sessionId ? `session ${response.sessionId}` : "no session id",
        `$${response.cost.toFixed(4)}`,
        `${response.numTurns} turns`,
        `${(response.durationMs / 1000).toFixed(1)}s`,
      ].join(" · ");
      process.stderr.write(chalk.dim(meta) + "\n");
    }
    if (response.isError) process.exitCode = EXIT.POLICY_VIOLATION;
  } catch (err) {
    const code =
      err instanceof ToolValidationError
        ? EXIT.POLICY_VIOLATION
        : err instanceof GatewayError
          ? EXIT.AGENT_FAILURE
          : EXIT.GENERIC_ERROR;
    failure = { code, message: errorMessage(err) };
  } finally {
    await gateway.shutdown();
  }
  if (failure) exit(failure.code, failure.message);
}
