#!/usr/bin/env node
import { loadConfig, resolveConfigPath } from "./config/config.js";
import { startGateway } from "./gateway.js";
import { configureLogging, getChildLogger, toLogFns } from "./logging.js";

async function main(): Promise<void> {
  const configPath = resolveConfigPath();
  const config = await loadConfig({ configPath, log: toLogFns(getChildLogger({ module: "config" })) });
  configureLogging(config.logging);

  const log = getChildLogger({ module: "entry" });
  log.info(config.source ? `loaded config from ${config.source}` : `no config at ${configPath}; using defaults`);

  const gateway = await startGateway({ config });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    log.info(`received ${signal}, shutting down`);
    gateway.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error(`shutdown failed: ${String(err)}`);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  getChildLogger({ module: "entry" }).fatal(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
