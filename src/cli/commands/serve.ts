import chalk from "chalk";
import { createGateway } from "../../gateway/factory.js";
import { startAdminServer } from "../../server/server.js";
import { DEFAULT_ADMIN_LISTEN } from "../../shared/constants.js";
import { EXIT, errorMessage, exit } from "../../shared/errors.js";
import { parseListen } from "../../shared/net.js";
import { setupCli, type GlobalOptions } from "../utils.js";

export async function runServe(opts: GlobalOptions & { listen?: string }): Promise<void> {
  const { config } = await setupCli(opts);
  const { host, port } = parseListen(opts.listen ?? config.listen ?? DEFAULT_ADMIN_LISTEN);
  const gateway = await createGateway(config);

  let handle: Awaited<ReturnType<typeof startAdminServer>>;
  try {
    handle = await startAdminServer(gateway, { host, port, token: config.adminToken });
  } catch (err) {
    await gateway.shutdown();
    exit(EXIT.SERVER_FAILURE, errorMessage(err));
  }

  process.stderr.write(chalk.bold("toolgate admin API") + "\n");
  process.stderr.write(`Listening:   http://${handle.host}:${handle.port}\n`);
  process.stderr.write(`Auth:        ${config.adminToken ? "bearer token" : "none"}\n`);
  process.stderr.write("Press Ctrl+C to stop.\n");

  await new Promise<void>((_, reject) => {
    const closeAll = () =>
      Promise.all([handle.close(), gateway.shutdown()])
        .then(() => process.exit(EXIT.SUCCESS))
        .catch(reject);
    process.on("SIGINT", closeAll);
    process.on("SIGTERM", closeAll);
  });
}
