#!/usr/bin/env node
import type { Server } from "node:http";
import { ConfigError, loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createGateway, ensureBootstrapAdmin } from "./gateway.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const gateway = createGateway(config, logger);
  await ensureBootstrapAdmin(config, gateway, logger);

  const server: Server = gateway.app.listen(config.port, () => {
    logger.info(
      { port: config.port, authMode: config.authMode, apiPrefix: config.apiPrefix },
      "storefront gateway listening",
    );
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "shutting down");
    server.close((closeErr) => {
      if (closeErr) logger.error({ err: closeErr }, "http server close failed");
      gateway
        .close()
        .then(() => process.exit(closeErr ? 1 : 0))
        .catch((e: unknown) => {
          logger.error({ err: e }, "resource cleanup failed");
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((e: unknown) => {
  if (e instanceof ConfigError) {
    createLogger("error").error({ issues: e.issues }, "invalid configuration");
  } else {
    createLogger("error").error({ err: e }, "startup failed");
  }
  process.exit(1);
});
