import { InvalidArgumentError } from "commander";
import path from "node:path";
import { ensureDefaultConfig, getDataDir, loadConfig, type ToolgateConfig } from "../config.js";
import { initLogger, isLogFormat, type LogFormat } from "../shared/logging.js";

export interface GlobalOptions {
  dataDir?: string;
  logLevel?: string;
  logFormat?: string;
  verbose?: boolean;
}

export interface CliContext {
  dataDir: string;
  config: ToolgateConfig;
}

/** Resolve the data dir, load config and start logging. Every command runs this first. */
export async function setupCli(opts: GlobalOptions): Promise<CliContext> {
  const dataDir = getDataDir(opts.dataDir);
  await ensureDefaultConfig(dataDir);
  const config = await loadConfig(dataDir);
  const format: LogFormat = opts.logFormat && isLogFormat(opts.logFormat) ? opts.logFormat : "plain";
  initLogger(opts.verbose ? "debug" : (opts.logLevel ?? config.logLevel), format);
  return { dataDir, config };
}

export function parseUserIdArg(value: string): number {
  if (!/^-?\d+$/.test(value)) throw new InvalidArgumentError("Expected an integer user id.");
  return Number(value);
}

export function resolveCwd(value: string | undefined): string {
  return path.resolve(value ?? process.cwd());
}

export function writeJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + "\n");
}

export function formatTime(epochMs: number): string {
  return new Date(epochMs).toISOString().replace("T", " ").slice(0, 19);
}
