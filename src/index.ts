#!/usr/bin/env node
import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig, loadCredentials } from "./config";
import { errorMessage } from "./errors";
import { createTwitterClient, createTwitterSource } from "./feed/twitter";
import { createHarvestDeps } from "./pipeline";
import { createStore } from "./store";
import { runLockedHarvest } from "./run";
import { createHarvestScheduler } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<number> {
  const logger = createLogger();

  let config;
  let credentials;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
    credentials = loadCredentials(process.env);
  } catch (err) {
    logger.fatal({ error: errorMessage(err) }, "configuration error");
    return 1;
  }

  logger.info(
    {
      maxItems: config.feed.maxItems,
      store: config.store.format,
      artifactDir: config.artifacts.dir,
    },
    "config loaded",
  );

  let store;
  try {
    store = createStore(config);
  } catch (err) {
    logger.fatal({ error: errorMessage(err) }, "store unavailable");
    return 1;
  }

  const source = createTwitterSource(createTwitterClient(credentials), logger);
  const deps = createHarvestDeps(config, source, store, logger);

  if (config.schedule) {
    const scheduler = createHarvestScheduler(config.schedule, deps, logger);
    registerShutdownHandlers({
      schedulers: [scheduler],
      closeStore: store.close,
      logger,
    });
    logger.info({ schedule: config.schedule }, "harvest scheduler started");
    return 0;
  }

  try {
    const summary = await runLockedHarvest(deps);
    if (summary.failed > 0) {
      logger.warn(
        { failed: summary.failed },
        "some papers failed and will be retried next run",
      );
    }
    return 0;
  } catch (err) {
    logger.fatal({ error: errorMessage(err) }, "harvest aborted");
    return 1;
  } finally {
    store.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("fatal startup error:", err);
    process.exit(1);
  });
