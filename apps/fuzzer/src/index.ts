#!/usr/bin/env node
import { parseCli, USAGE, UsageError } from "./cli.js";
import { FuzzConfigError } from "./errors.js";
import { checkServices } from "./entrypoints/check-services.js";
import { runFuzz } from "./entrypoints/fuzz-run.js";
import { logFailure } from "./logger.js";

async function main(): Promise<number> {
  const cli = parseCli(process.argv.slice(2));

  switch (cli.command) {
    case "help":
      console.log(USAGE);
      return 0;
    case "check":
      return checkServices(cli.services);
    case "run":
      return runFuzz(cli.overrides);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      process.exitCode = 64;
      return;
    }
    const event = error instanceof FuzzConfigError ? "invalid fuzz configuration" : "fatal error";
    logFailure("system", event, error, {});
    process.exitCode = 1;
  });
