#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { EXIT, exit } from "./shared/errors.js";

async function main() {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  const code =
    message.includes("Invalid") || message.includes("Unknown option") ? EXIT.INVALID_ARGS : EXIT.GENERIC_ERROR;
  exit(code, message);
});
