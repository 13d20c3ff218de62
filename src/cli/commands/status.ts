import { allApprovedDirectories, getConfigPath } from "../../config.js";
import { VERSION } from "../../shared/constants.js";
import { setupCli, writeJson, type GlobalOptions } from "../utils.js";

export async function runStatus(opts: GlobalOptions): Promise<void> {
  const { dataDir, config } = await setupCli(opts);
  writeJson({
    version: VERSION,
    dataDir,
    configPath: getConfigPath(dataDir),
    approvedDirectories: allApprovedDirectories(config),
    sessionStore: config.databasePath ?? "memory",
    agenticMode: config.agenticMode,
    toolValidation: config.disableToolValidation ? "names unchecked" : "enforced",
    allowedTools: config.allowedTools,
    disallowedTools: config.disallowedTools,
    criticalTools: config.criticalTools,
    sessionTimeoutHours: config.sessionTimeoutHours,
    model: config.model ?? "default",
  });
}
