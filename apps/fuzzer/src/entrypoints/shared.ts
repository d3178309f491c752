/**
 * Shared initialization logic for the CLI commands.
 */

import { buildRunConfig, type RunConfig, type RunOverrides } from "@vecdiff/config";
import { createAdapters, type AdapterFactoryOptions } from "../adapters/index.js";
import type { VectorStoreAdapter } from "../adapters/types.js";
import { config } from "../config.js";
import { log } from "../logger.js";

export { config, log };

export const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

export interface Runtime {
  runConfig: RunConfig;
  adapters: VectorStoreAdapter[];
}

/** Environment config + command-line overrides -> frozen run config and its adapters */
export function initRuntime(overrides: RunOverrides = {}, options: AdapterFactoryOptions = {}): Runtime {
  const runConfig = buildRunConfig(config, overrides);
  const adapters = createAdapters(runConfig, options);
  return { runConfig, adapters };
}

// Graceful shutdown helper
const SHUTDOWN_TIMEOUT_MS = 10000;

export function createShutdownHandler(name: string, shutdownFn: () => Promise<void>): void {
  let shutdownInProgress = false;

  async function initiateShutdown() {
    if (shutdownInProgress) {
      log.system.warn({ command: name }, "shutdown already in progress, forcing exit");
      process.exit(1);
    }
    shutdownInProgress = true;

    log.system.info({ command: name }, "interrupted, shutting down");

    const forceExitTimer = setTimeout(() => {
      log.system.error({ command: name }, "shutdown timeout exceeded, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimer.unref();

    try {
      await shutdownFn();
      process.exit(130);
    } catch (error) {
      log.system.error({ command: name, error: error instanceof Error ? error.message : String(error) }, "shutdown error");
      process.exit(1);
    }
  }

  process.on("SIGTERM", initiateShutdown);
  process.on("SIGINT", initiateShutdown);
}

// Banner for interactive runs
export function printBanner(title: string, extras: Record<string, string | number | boolean> = {}): void {
  if (config.NODE_ENV !== "production") {
    const lines = [`  ${title}`, ...Object.entries(extras).map(([k, v]) => `  ${k}: ${v}`)];

    console.log(`
========================================
${lines.join("\n")}
========================================
`);
  }
}
