import {
  configGet,
  configKeys,
  configSet,
  getDataDir,
  isConfigKey,
  loadConfig,
  type ConfigKey,
} from "../../config.js";
import { EXIT, exit } from "../../shared/errors.js";
import { writeJson } from "../utils.js";

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) exit(EXIT.INVALID_ARGS, `Unknown config key: ${key}. Known keys: ${configKeys().join(", ")}`);
  return key;
}

export async function runConfigGet(key: string, opts: { dataDir?: string }): Promise<void> {
  const value = await configGet(getDataDir(opts.dataDir), requireKey(key));
  process.stdout.write((value ?? "") + "\n");
}

export async function runConfigSet(key: string, value: string, opts: { dataDir?: string }): Promise<void> {
  await configSet(getDataDir(opts.dataDir), requireKey(key), value);
}

/** Effective configuration, environment overlay included. */
export async function runConfigShow(opts: { dataDir?: string }): Promise<void> {
  const config = await loadConfig(getDataDir(opts.dataDir));
  writeJson({ ...config, adminToken: config.adminToken ? "[REDACTED]" : undefined });
}
