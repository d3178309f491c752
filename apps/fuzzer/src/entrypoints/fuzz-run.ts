/**
 * `vecdiff run`: one differential fuzz run with results on disk.
 */

import type { RunOverrides } from "@vecdiff/config";
import { ResultWriter } from "../results/report-writer.js";
import { FuzzRunner } from "../run/fuzz-runner.js";
import { colors, createShutdownHandler, initRuntime, printBanner } from "./shared.js";

/** Exit code when no service was reachable */
export const EXIT_NO_SERVICES = 2;

export async function runFuzz(overrides: RunOverrides): Promise<number> {
  const { runConfig, adapters } = initRuntime(overrides);
  const writer = new ResultWriter({ resultsDir: runConfig.output.resultsDir });
  const runner = new FuzzRunner({ runConfig, adapters, writer });

  printBanner("vecdiff differential fuzz run", {
    "Run ID": runner.runId,
    Seed: runner.seed,
    Tests: runConfig.run.numTests,
    Services: runConfig.services.map((service) => service.name).join(", "),
    "Health mode": runConfig.health.mode,
  });

  createShutdownHandler("run", async () => {
    await Promise.allSettled(adapters.map((adapter) => adapter.close()));
  });

  const summary = await runner.run();
  const stats = summary.statistics;

  if (summary.status === "aborted_no_services") {
    console.log(`${colors.red}✗ No reachable services; run aborted${colors.reset}`);
    return EXIT_NO_SERVICES;
  }

  const color = stats.inconsistentTests > 0 ? colors.yellow : colors.green;
  console.log(
    `${color}${stats.inconsistentTests}/${stats.totalTests} tests inconsistent ` +
      `(${(stats.consistencyRate * 100).toFixed(1)}% consistent)${colors.reset}`
  );
  console.log(`Results: ${colors.cyan}${writer.dir}${colors.reset}`);
  return 0;
}
