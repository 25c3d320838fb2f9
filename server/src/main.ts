/**
 * Shelf gateway process: HTTP commands in, device commands over NATS out,
 * answered once the device acknowledges.
 */

import "dotenv/config";
import { createNodeJSLogger } from "./logger.js";
import { loadConfig } from "./config.js";
import { startShelfServer } from "./app.js";

const SERVICE_NAME = "shelf-gateway";

async function main(): Promise<void> {
  const bootstrap = createNodeJSLogger(SERVICE_NAME);
  const config = loadConfig({ log: bootstrap.get(`${SERVICE_NAME}:main`) });

  const loggerFactory = createNodeJSLogger(config.serviceName, { level: config.logLevel });
  const log = loggerFactory.get(`${SERVICE_NAME}:main`);

  const server = await startShelfServer({ config, loggerFactory });

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, `${SERVICE_NAME}:main - Shutting down`);
    await server.stop();
    process.exit(0);
  };

  const onSignal = (signal: string) => () => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ signal, error: String(err) }, `${SERVICE_NAME}:main - Shutdown failed`);
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal("SIGTERM"));
  process.on("SIGINT", onSignal("SIGINT"));
}

main().catch((err) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
