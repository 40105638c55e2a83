#!/usr/bin/env node
import { parseConfig, type MonitorConfigT } from "./config.js";
import { createBackend } from "./modules/index.js";
import type { BackendParamsT } from "./modules/backend-module.js";
import { HotplugDetector } from "./services/hotplug/hotplug-detector.js";
import { createLogger } from "./services/logger.js";

function buildParams(config: MonitorConfigT): BackendParamsT {
  const params: BackendParamsT = {};
  if (config.vid !== undefined) {
    params.idVendor = config.vid;
  }
  if (config.pid !== undefined) {
    params.idProduct = config.pid;
  }
  return params;
}

/**
 * Monitor entry point
 * Parses CLI arguments, picks a backend and logs every hotplug event
 * until SIGINT/SIGTERM.
 */
async function main() {
  // Skip node executable and script path
  const config = parseConfig(process.argv.slice(2));
  const logger = createLogger({ level: config.logLevel, component: "monitor" });

  const backend = await createBackend(config.backend, {
    allowFallback: config.allowFallback,
    logger,
    usb: {
      hotplug: config.hotplug,
      pollIntervalMs: config.pollIntervalMs,
      settleMs: config.settleMs,
    },
  });
  const detector = new HotplugDetector(buildParams(config), {
    backend,
    logger,
  });

  const controller = new AbortController();
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    controller.abort();
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  logger.info(`Watching USB bus with backend ${backend.name}`);
  for await (const event of detector.events({ signal: controller.signal })) {
    logger.info(`${event.type} device ${event.key}`);
  }
  logger.info("Monitor stopped");
}

main().catch((error: unknown) => {
  console.error("Failed to run USB hotplug monitor:", error);
  process.exit(1);
});
